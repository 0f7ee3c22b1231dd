import type { JobStatus } from '../domain/model/JobStatus.js';
import type { JobOutcome, JobProgress, JobSummary } from '../domain/model/Job.js';
import type { DataSource } from '../domain/ports/DataSource.js';
import type { RecordGrouper } from '../domain/services/RecordGrouper.js';
import { canTransition } from '../domain/model/JobStatus.js';
import { LineReader } from '../domain/services/LineReader.js';
import { StreamingError } from '../domain/errors/StreamingError.js';
import type { EventBus } from './EventBus.js';

/**
 * Mutable state shared by the use cases of a single reduce job.
 *
 * Internal: not exported from the public API.
 */
export class JobContext<R> {
  readonly eventBus: EventBus;
  readonly grouper: RecordGrouper<R>;
  readonly lineReader = new LineReader();
  readonly jobId: string;

  source: DataSource | null = null;
  status: JobStatus = 'CREATED';
  linesRead = 0;
  groupsReduced = 0;
  startedAt?: number;
  finishedAt?: number;
  abortController: AbortController | null = null;

  constructor(grouper: RecordGrouper<R>, eventBus: EventBus) {
    this.grouper = grouper;
    this.eventBus = eventBus;
    this.jobId = crypto.randomUUID();
  }

  transitionTo(newStatus: JobStatus): void {
    if (!canTransition(this.status, newStatus)) {
      throw new Error(`Invalid state transition: ${this.status} → ${newStatus}`);
    }
    this.status = newStatus;
  }

  requireSource(): DataSource {
    if (!this.source) {
      throw new StreamingError('CONFIGURATION', 'ReduceJob: no source configured. Call .from(source) first.');
    }
    return this.source;
  }

  assertNotStarted(): void {
    if (this.status !== 'CREATED') {
      throw new Error(`ReduceJob: job has already run (status '${this.status}')`);
    }
  }

  isRunning(): boolean {
    return this.status === 'RUNNING';
  }

  buildProgress(): JobProgress {
    return {
      linesRead: this.linesRead,
      groupsReduced: this.groupsReduced,
      elapsedMs: this.elapsedMs(),
    };
  }

  buildSummary(outcome: JobOutcome): JobSummary {
    return { ...this.buildProgress(), outcome };
  }

  private elapsedMs(): number {
    if (this.startedAt === undefined) return 0;
    return (this.finishedAt ?? Date.now()) - this.startedAt;
  }
}
