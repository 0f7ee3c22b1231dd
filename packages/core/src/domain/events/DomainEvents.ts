import type { JobSummary, JobProgress } from '../model/Job.js';

/** Emitted when `run()` begins reading the source. */
export interface JobStartedEvent {
  readonly type: 'job:started';
  readonly jobId: string;
  readonly timestamp: number;
}

/** Emitted after the last group has been reduced. */
export interface JobCompletedEvent {
  readonly type: 'job:completed';
  readonly jobId: string;
  readonly summary: JobSummary;
  readonly timestamp: number;
}

/** Emitted when `abort()` stops a running job. */
export interface JobAbortedEvent {
  readonly type: 'job:aborted';
  readonly jobId: string;
  readonly progress: JobProgress;
  readonly timestamp: number;
}

/** Emitted when reading, grouping or the reducer throws. The error is rethrown from `run()`. */
export interface JobFailedEvent {
  readonly type: 'job:failed';
  readonly jobId: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted for a line that has no key/value separator. The line is still grouped, with an empty payload. */
export interface LineMalformedEvent {
  readonly type: 'line:malformed';
  /** 1-based position of the line in the grouper's input. */
  readonly lineNumber: number;
  readonly line: string;
  readonly timestamp: number;
}

/** Emitted each time the grouper closes a group. */
export interface GroupCompletedEvent {
  readonly type: 'group:completed';
  readonly key: string;
  readonly groupIndex: number;
  readonly rowCount: number;
  readonly timestamp: number;
}

/** Emitted each time the session splitter closes a session. */
export interface SessionCompletedEvent {
  readonly type: 'session:completed';
  readonly sessionIndex: number;
  readonly start: number;
  readonly end: number;
  readonly eventCount: number;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | JobStartedEvent
  | JobCompletedEvent
  | JobAbortedEvent
  | JobFailedEvent
  | LineMalformedEvent
  | GroupCompletedEvent
  | SessionCompletedEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
