/**
 * Error taxonomy for form mutations.
 *
 * Callers switch on `code` to tell "not written" (invalid_argument,
 * persistence_failed) apart from "written but not fully propagated"
 * (post_write_fetch_failed, propagation_failed).
 */

export type MutationErrorCode =
  | "invalid_argument"
  | "persistence_failed"
  | "post_write_fetch_failed"
  | "propagation_failed";

export type PropagationTask = "cache" | "notification";

export abstract class MutationError extends Error {
  abstract readonly code: MutationErrorCode;

  constructor(
    message: string,
    readonly operation: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  /** True when the durable write committed before the failure */
  get committed(): boolean {
    return this.code === "post_write_fetch_failed" || this.code === "propagation_failed";
  }
}

/** Input rejected before any side effect */
export class ValidationError extends MutationError {
  readonly code = "invalid_argument";

  constructor(operation: string, readonly issues: string[]) {
    super(`${operation}: invalid argument (${issues.join("; ")})`, operation);
  }
}

/** The critical persistence call failed; nothing was propagated */
export class PersistenceError extends MutationError {
  readonly code = "persistence_failed";

  constructor(operation: string, cause: unknown) {
    super(`${operation}: persistence failed: ${errorMessage(cause)}`, operation, { cause });
  }
}

/** The write committed but the form could not be read back for propagation */
export class PostWriteFetchError extends MutationError {
  readonly code = "post_write_fetch_failed";

  constructor(operation: string, readonly formId: string, cause: unknown) {
    super(`${operation}: failed to retrieve form ${formId} after write: ${errorMessage(cause)}`, operation, { cause });
  }
}

/** Cache refresh or notification exhausted its retries after a committed write */
export class PropagationError extends MutationError {
  readonly code = "propagation_failed";

  constructor(
    operation: string,
    readonly task: PropagationTask,
    readonly attempts: number,
    cause: unknown
  ) {
    super(`${operation}: ${task} propagation failed after ${attempts} attempts: ${errorMessage(cause)}`, operation, { cause });
  }
}

// =============================================================================
// Persistence-layer errors
// =============================================================================

export class FormNotFoundError extends Error {
  constructor(readonly formId: string) {
    super(`form ${formId} not found`);
    this.name = "FormNotFoundError";
  }
}

export class InvalidFormUpdateError extends Error {
  constructor(readonly issues: string[]) {
    super(`invalid form update: ${issues.join("; ")}`);
    this.name = "InvalidFormUpdateError";
  }
}

// =============================================================================
// Broker edge
// =============================================================================

export class EnvelopeDecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EnvelopeDecodeError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
