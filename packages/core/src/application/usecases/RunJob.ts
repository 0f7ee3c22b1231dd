import type { JobSummary } from '../../domain/model/Job.js';
import type { DataSource } from '../../domain/ports/DataSource.js';
import type { ReduceFn } from '../../domain/ports/Reducer.js';
import type { JobContext } from '../JobContext.js';

/** Use case: stream the source through the grouper and reduce every group in order. */
export class RunJob<R> {
  constructor(private readonly ctx: JobContext<R>) {}

  async execute(reducer: ReduceFn<R>): Promise<JobSummary> {
    const source = this.ctx.requireSource();
    this.ctx.assertNotStarted();

    this.ctx.transitionTo('RUNNING');
    const abortController = new AbortController();
    this.ctx.abortController = abortController;
    this.ctx.startedAt = Date.now();

    // Yield to next microtask so handlers registered after run() on the same tick receive this event
    await Promise.resolve();

    this.ctx.eventBus.emit({ type: 'job:started', jobId: this.ctx.jobId, timestamp: Date.now() });

    try {
      for await (const group of this.ctx.grouper.groupStream(this.readLines(source, abortController.signal))) {
        if (abortController.signal.aborted) break;

        await reducer(group, { jobId: this.ctx.jobId, groupIndex: this.ctx.groupsReduced });
        this.ctx.groupsReduced++;
        if (abortController.signal.aborted) break;
      }
    } catch (error) {
      this.ctx.finishedAt = Date.now();
      if (this.ctx.isRunning()) {
        this.ctx.transitionTo('FAILED');
        this.ctx.eventBus.emit({
          type: 'job:failed',
          jobId: this.ctx.jobId,
          error: error instanceof Error ? error.message : String(error),
          timestamp: Date.now(),
        });
      }
      throw error;
    }

    this.ctx.finishedAt = Date.now();
    const completed = this.ctx.isRunning();
    if (completed) {
      this.ctx.transitionTo('COMPLETED');
    }
    const summary = this.ctx.buildSummary(completed ? 'COMPLETED' : 'ABORTED');

    if (completed) {
      this.ctx.eventBus.emit({ type: 'job:completed', jobId: this.ctx.jobId, summary, timestamp: Date.now() });
    }

    return summary;
  }

  /**
   * Lines of the source, counted as they are pulled. Ends as soon as the job is
   * aborted, including while a read is still waiting for input.
   */
  private async *readLines(source: DataSource, signal: AbortSignal): AsyncIterable<string> {
    const iterator = this.ctx.lineReader.lines(source.read())[Symbol.asyncIterator]();
    const aborted = new Promise<'aborted'>((resolve) => {
      signal.addEventListener('abort', () => resolve('aborted'), { once: true });
    });
    let pullPending = false;

    try {
      while (!signal.aborted) {
        pullPending = true;
        const next = await Promise.race([iterator.next(), aborted]);
        if (next === 'aborted') return;
        pullPending = false;

        if (next.done) return;
        this.ctx.linesRead++;
        yield next.value;
      }
    } finally {
      // A read left waiting by abort() cannot be cancelled; the stream stays with its owner.
      if (!pullPending) {
        await iterator.return?.();
      }
    }
  }
}
