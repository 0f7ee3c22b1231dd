import type { JobStatus } from './JobStatus.js';

/** Live counters for a running reduce job. */
export interface JobProgress {
  /** Lines read from the source so far. */
  readonly linesRead: number;
  /** Groups handed to the reducer and settled. */
  readonly groupsReduced: number;
  /** Time since the job started, or its total run time once it has finished. */
  readonly elapsedMs: number;
}

/** How a run that did not fail ended. */
export type JobOutcome = 'COMPLETED' | 'ABORTED';

/** Final counters returned by `run()` and emitted with `job:completed`. */
export interface JobSummary extends JobProgress {
  readonly outcome: JobOutcome;
}

/** Snapshot returned by `ReduceJob.getStatus()`. */
export interface JobStatusResult {
  readonly jobId: string;
  readonly status: JobStatus;
  readonly progress: JobProgress;
}
