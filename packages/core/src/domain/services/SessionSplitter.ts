import type { EventBus } from '../../application/EventBus.js';
import type { Session } from '../model/Session.js';
import { StreamingError } from '../errors/StreamingError.js';

/** Reads the timestamp of an event. Numeric strings are accepted. */
export type TimestampFn<T> = (event: T) => number | string;

export interface SessionSplitterOptions<T> {
  /** Largest gap between consecutive events that keeps them in one session. Same unit as the timestamps. */
  readonly inactivityTimeout: number;
  /** Default: the first field of an array row. */
  readonly timestampFn?: TimestampFn<T>;
  /** Receives `session:completed` events. */
  readonly eventBus?: EventBus;
}

interface SessionState<T> {
  events: T[];
  start: number;
  previous: number | undefined;
  sessionIndex: number;
}

const INTEGER_LITERAL = /^\s*[+-]?\d+\s*$/;

/**
 * Coerce a timestamp to an integer: numbers are truncated toward zero, strings
 * must be integer literals. Anything else throws `INVALID_TIMESTAMP`.
 */
export function toIntegerTimestamp(value: unknown): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === 'string' && INTEGER_LITERAL.test(value)) {
    return Number.parseInt(value.trim(), 10);
  }
  throw new StreamingError('INVALID_TIMESTAMP', `SessionSplitter: timestamp ${JSON.stringify(value)} is not an integer`);
}

function firstField(event: unknown): number | string {
  if (Array.isArray(event)) {
    const [first]: unknown[] = event;
    if (typeof first === 'number' || typeof first === 'string') return first;
  }
  throw new StreamingError(
    'INVALID_TIMESTAMP',
    'SessionSplitter: event has no leading timestamp field; pass a timestampFn for non-array events',
  );
}

/**
 * Domain service that splits time-ordered events into sessions on inactivity.
 *
 * Consecutive events share a session when the gap between their timestamps is
 * less than or equal to `inactivityTimeout`; a strictly larger gap starts a new
 * one. Events MUST arrive sorted ascending by timestamp.
 */
export class SessionSplitter<T> {
  private readonly inactivityTimeout: number;
  private readonly timestampFn: TimestampFn<T>;
  private readonly eventBus: EventBus | null;

  constructor(options: SessionSplitterOptions<T>) {
    if (!Number.isFinite(options.inactivityTimeout) || options.inactivityTimeout < 0) {
      throw new StreamingError(
        'CONFIGURATION',
        `SessionSplitter: inactivity timeout must be a non-negative number, got ${String(options.inactivityTimeout)}`,
      );
    }

    this.inactivityTimeout = options.inactivityTimeout;
    this.timestampFn = options.timestampFn ?? firstField;
    this.eventBus = options.eventBus ?? null;
  }

  *split(events: Iterable<T>): Iterable<Session<T>> {
    const state = this.initialState();

    for (const event of events) {
      const completed = this.accept(state, event);
      if (completed) yield completed;
    }

    const last = this.flush(state);
    if (last) yield last;
  }

  async *splitStream(events: AsyncIterable<T>): AsyncIterable<Session<T>> {
    const state = this.initialState();

    for await (const event of events) {
      const completed = this.accept(state, event);
      if (completed) yield completed;
    }

    const last = this.flush(state);
    if (last) yield last;
  }

  private initialState(): SessionState<T> {
    return { events: [], start: 0, previous: undefined, sessionIndex: 0 };
  }

  private accept(state: SessionState<T>, event: T): Session<T> | undefined {
    const current = toIntegerTimestamp(this.timestampFn(event));

    let completed: Session<T> | undefined;
    if (state.previous !== undefined && current - state.previous > this.inactivityTimeout) {
      completed = this.flush(state);
    }

    if (state.events.length === 0) {
      state.start = current;
    }
    state.events.push(event);
    state.previous = current;
    return completed;
  }

  private flush(state: SessionState<T>): Session<T> | undefined {
    if (state.events.length === 0 || state.previous === undefined) return undefined;

    const session: Session<T> = { start: state.start, end: state.previous, events: state.events };
    this.eventBus?.emit({
      type: 'session:completed',
      sessionIndex: state.sessionIndex,
      start: session.start,
      end: session.end,
      eventCount: session.events.length,
      timestamp: Date.now(),
    });

    state.events = [];
    state.sessionIndex++;
    return session;
  }
}
