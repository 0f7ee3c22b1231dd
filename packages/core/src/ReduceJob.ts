import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { JobStatusResult, JobSummary } from './domain/model/Job.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { ReduceFn } from './domain/ports/Reducer.js';
import type { RecordGrouper } from './domain/services/RecordGrouper.js';
import { EventBus } from './application/EventBus.js';
import { JobContext } from './application/JobContext.js';
import { RunJob } from './application/usecases/RunJob.js';
import { AbortJob } from './application/usecases/AbortJob.js';
import { GetJobStatus } from './application/usecases/GetJobStatus.js';

export interface ReduceJobConfig<R> {
  /** Grouper applied to the source lines. */
  readonly grouper: RecordGrouper<R>;
  /**
   * Bus the job publishes its lifecycle events on. Pass the same bus to the
   * grouper (and any session splitter) to observe everything in one place.
   * Default: a private bus, reachable through `on()`/`onAny()`.
   */
  readonly eventBus?: EventBus;
}

/**
 * Facade for the reduce side of a streaming job: read → split lines → group → reduce.
 *
 * One job runs once. Groups are reduced strictly one at a time, in stream
 * order; an async reducer is awaited before the next group is read.
 *
 * @example
 * ```typescript
 * const bus = new EventBus();
 * const job = new ReduceJob({ grouper: RecordGrouper.delimited({ eventBus: bus }), eventBus: bus });
 * job.from(new StreamSource(process.stdin));
 * await job.run(({ key, rows }) => {
 *   emit(key, [rows.length]);
 * });
 * ```
 */
export class ReduceJob<R> {
  private readonly ctx: JobContext<R>;

  constructor(config: ReduceJobConfig<R>) {
    this.ctx = new JobContext(config.grouper, config.eventBus ?? new EventBus());
  }

  /** Set the input. The caller keeps ownership of the underlying stream. */
  from(source: DataSource): this {
    this.ctx.source = source;
    return this;
  }

  /** Read the whole source and reduce every group. Rejects with the first error thrown by reading, grouping or the reducer. */
  run(reducer: ReduceFn<R>): Promise<JobSummary> {
    return new RunJob(this.ctx).execute(reducer);
  }

  /** Stop after the group currently being reduced, or while waiting for input. `run()` then resolves with the partial summary. */
  abort(): void {
    new AbortJob(this.ctx).execute();
  }

  getStatus(): JobStatusResult {
    return new GetJobStatus(this.ctx).execute();
  }

  get jobId(): string {
    return this.ctx.jobId;
  }

  /** Subscribe to a specific domain event type. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to all domain events. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }
}
