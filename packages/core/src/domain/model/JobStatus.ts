/**
 * Finite state machine for the reduce job lifecycle.
 *
 * Valid transitions:
 * - `CREATED` → `RUNNING`
 * - `RUNNING` → `COMPLETED` | `ABORTED` | `FAILED`
 * - `COMPLETED`, `ABORTED`, `FAILED` → (terminal)
 */
export const JobStatus = {
  CREATED: 'CREATED',
  RUNNING: 'RUNNING',
  COMPLETED: 'COMPLETED',
  ABORTED: 'ABORTED',
  FAILED: 'FAILED',
} as const;

export type JobStatus = (typeof JobStatus)[keyof typeof JobStatus];

const VALID_TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  [JobStatus.CREATED]: [JobStatus.RUNNING],
  [JobStatus.RUNNING]: [JobStatus.COMPLETED, JobStatus.ABORTED, JobStatus.FAILED],
  [JobStatus.COMPLETED]: [],
  [JobStatus.ABORTED]: [],
  [JobStatus.FAILED]: [],
};

/** Check whether a state transition is valid according to the job lifecycle FSM. */
export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}
