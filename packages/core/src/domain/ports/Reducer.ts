import type { Group } from '../model/Group.js';

/** Context passed to the reducer alongside each group. */
export interface ReduceContext {
  readonly jobId: string;
  /** Zero-based position of the group in the stream. */
  readonly groupIndex: number;
}

/** User callback invoked once per group, strictly in stream order. */
export type ReduceFn<R> = (group: Group<R>, context: ReduceContext) => void | Promise<void>;
