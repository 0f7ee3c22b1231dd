import type { JobContext } from '../JobContext.js';

/** Use case: stop pulling input. The group being reduced finishes; no further group is read. */
export class AbortJob<R> {
  constructor(private readonly ctx: JobContext<R>) {}

  execute(): void {
    if (!this.ctx.isRunning()) {
      throw new Error(`Cannot abort job from status '${this.ctx.status}'`);
    }

    this.ctx.transitionTo('ABORTED');
    this.ctx.abortController?.abort();

    this.ctx.eventBus.emit({
      type: 'job:aborted',
      jobId: this.ctx.jobId,
      progress: this.ctx.buildProgress(),
      timestamp: Date.now(),
    });
  }
}
