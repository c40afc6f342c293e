/**
 * Lifecycle of a consolidation run.
 *
 * Valid transitions:
 * - `RUNNING` → `SUCCESS` | `FAILED`
 * - `SUCCESS`, `FAILED` → (terminal)
 */
export const RunStatus = {
  RUNNING: 'RUNNING',
  SUCCESS: 'SUCCESS',
  FAILED: 'FAILED',
} as const;

export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus];

/** Statuses a run may end in. */
export type TerminalRunStatus = Exclude<RunStatus, 'RUNNING'>;

const VALID_TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  [RunStatus.RUNNING]: [RunStatus.SUCCESS, RunStatus.FAILED],
  [RunStatus.SUCCESS]: [],
  [RunStatus.FAILED]: [],
};

/** Check whether a run status transition is allowed. */
export function canTransition(from: RunStatus, to: RunStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isRunStatus(value: unknown): value is RunStatus {
  return value === RunStatus.RUNNING || value === RunStatus.SUCCESS || value === RunStatus.FAILED;
}
