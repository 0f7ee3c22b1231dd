/**
 * Events separated by gaps no larger than the inactivity timeout.
 *
 * `start` and `end` are the integer timestamps of the first and last event.
 */
export interface Session<T> {
  readonly start: number;
  readonly end: number;
  readonly events: readonly T[];
}
