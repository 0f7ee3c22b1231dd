import type { JobStatusResult } from '../../domain/model/Job.js';
import type { JobContext } from '../JobContext.js';

/** Use case: read-only snapshot of the job state and counters. */
export class GetJobStatus<R> {
  constructor(private readonly ctx: JobContext<R>) {}

  execute(): JobStatusResult {
    return {
      jobId: this.ctx.jobId,
      status: this.ctx.status,
      progress: this.ctx.buildProgress(),
    };
  }
}
