export type RunErrorKind =
  | 'configuration'
  | 'submission'
  | 'termination'
  | 'finalization'
  | 'cancelled';

/** Exit code for any failure of the run itself, as opposed to a container's. */
export const ORCHESTRATION_FAILURE_EXIT_CODE = 125;

export abstract class RunError extends Error {
  abstract readonly kind: RunErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad flags, overrides, environment references or task definition. Nothing was started. */
export class ConfigurationError extends RunError {
  readonly kind = 'configuration';
}

/** Registration or RunTask was rejected. Nothing is running. */
export class SubmissionError extends RunError {
  readonly kind = 'submission';
}

/** Waiting for the tasks to stop failed. Tasks may still be running. */
export class TerminationError extends RunError {
  readonly kind = 'termination';
}

/** A container had no usable terminal state, or its finish marker could not be written. */
export class FinalizationError extends RunError {
  readonly kind = 'finalization';
}

export class CancelledError extends RunError {
  readonly kind = 'cancelled';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
