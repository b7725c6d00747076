/**
 * latent/errors
 *
 * Error types synthesized by the library itself. User errors carried by a
 * `Failure` are opaque (`unknown`); these are the ones latent creates.
 *
 * @example
 * ```typescript
 * import { isTimeoutError } from 'latent';
 *
 * future.timeout('2s').onFailure((error) => {
 *   if (isTimeoutError(error)) {
 *     console.log(`gave up after ${error.ms}ms`);
 *   }
 * });
 * ```
 */

import { TaggedError, isTaggedError } from "./tagged-error";

// =============================================================================
// Helpers
// =============================================================================

/** Render a value for an error message. */
function describeValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value !== "object" || value === null) return String(value);
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // circular structures
    return String(value);
  }
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * A `filter` predicate rejected the success value.
 *
 * @example
 * ```typescript
 * const error = new NoSuchElementError({ value: 4 });
 * console.log(error.message); // "NoSuchElementError: Predicate does not hold for 4"
 * ```
 */
export class NoSuchElementError extends TaggedError("NoSuchElementError", {
  message: (p: {
    /** The value the predicate rejected */
    value: unknown;
  }) => `NoSuchElementError: Predicate does not hold for ${describeValue(p.value)}`,
}) {}

/**
 * A future did not complete before its deadline.
 *
 * @example
 * ```typescript
 * const error = new TimeoutError({ ms: 100, deadline: 1100 });
 * console.log(error.message); // "TimeoutError: Future timed out after 100ms"
 * ```
 */
export class TimeoutError extends TaggedError("TimeoutError", {
  message: (p: {
    /** Timeout duration in milliseconds */
    ms: number;
    /** Queue clock reading at which the timeout expires */
    deadline: number;
  }) => `TimeoutError: Future timed out after ${p.ms}ms`,
}) {}

/**
 * A guarded cell was written to while its own lock was held.
 */
export class AtomicReentrancyError extends TaggedError("AtomicReentrancyError", {
  message: () => "AtomicReentrancyError: Write attempted while the lock is held",
}) {}

/**
 * A duration could not be parsed.
 */
export class InvalidDurationError extends TaggedError("InvalidDurationError", {
  message: (p: {
    /** The rejected input */
    input: unknown;
    /** Operation the duration was given to */
    operation?: string;
  }) =>
    p.operation
      ? `InvalidDurationError: ${p.operation}: invalid duration '${describeValue(p.input)}'`
      : `InvalidDurationError: invalid duration '${describeValue(p.input)}'`,
}) {}

/** Any error created by latent. */
export type LatentError =
  | NoSuchElementError
  | TimeoutError
  | AtomicReentrancyError
  | InvalidDurationError;

// =============================================================================
// Type Guards
// =============================================================================

export const isNoSuchElementError = (error: unknown): error is NoSuchElementError =>
  error instanceof NoSuchElementError;

export const isTimeoutError = (error: unknown): error is TimeoutError =>
  error instanceof TimeoutError;

export const isAtomicReentrancyError = (error: unknown): error is AtomicReentrancyError =>
  error instanceof AtomicReentrancyError;

export const isInvalidDurationError = (error: unknown): error is InvalidDurationError =>
  error instanceof InvalidDurationError;

/**
 * Check whether an error is one of latent's own error types.
 */
export function isLatentError(error: unknown): error is LatentError {
  return (
    isTaggedError(error) &&
    (isNoSuchElementError(error) ||
      isTimeoutError(error) ||
      isAtomicReentrancyError(error) ||
      isInvalidDurationError(error))
  );
}
