/** Machine-readable codes for pipeline-level failures. */
export type PipelineErrorCode =
  | 'MALFORMED_FILE'
  | 'EVENT_SHAPE'
  | 'RUN_FAILURE'
  | 'CONFIGURATION'
  | 'INVALID_TRANSITION'
  | 'RUN_CONFLICT';

/** Base class for failures that abort a file, an event or a run. Per-record problems are never thrown. */
export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The source file cannot be parsed as a whole. No partition is written for it. */
export class MalformedFileError extends PipelineError {
  readonly code = 'MALFORMED_FILE';

  constructor(
    readonly format: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${format}: ${message}`, options);
  }
}

/** A trigger event is missing or does not have the expected shape. */
export class EventShapeError extends PipelineError {
  readonly code = 'EVENT_SHAPE';
}

/** A consolidation run aborted. `cause` holds the original error. */
export class RunFailureError extends PipelineError {
  readonly code = 'RUN_FAILURE';

  constructor(
    readonly runId: string,
    cause: unknown,
  ) {
    super(`Run ${runId} failed: ${errorMessage(cause)}`, { cause });
  }
}

export class ConfigurationError extends PipelineError {
  readonly code = 'CONFIGURATION';
}

export class InvalidTransitionError extends PipelineError {
  readonly code = 'INVALID_TRANSITION';
}

/** A run record with the same id already exists in the tracking table. */
export class RunConflictError extends PipelineError {
  readonly code = 'RUN_CONFLICT';

  constructor(readonly runId: string) {
    super(`Run '${runId}' already exists`);
  }
}

/** Extract a printable message from any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
