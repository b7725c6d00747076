/**
 * latent/try
 *
 * The result algebra: a value that either succeeded or failed, with a closed
 * set of pure transformations. No scheduling and no I/O happen here; `Future`
 * stores its completed state as a `Try` and defines every combinator in
 * terms of these functions.
 *
 * @example
 * ```typescript
 * import { Try } from 'latent';
 *
 * const parsed = Try.attempt(() => JSON.parse(input) as unknown);
 * const port = Try.getOrElse(
 *   Try.filter(Try.map(parsed, readPort), (p) => p > 0),
 *   8080
 * );
 * ```
 */

import { NoSuchElementError } from "./errors";

// =============================================================================
// Types
// =============================================================================

/**
 * A successful computation.
 * Use `success(value)` to create instances.
 */
export type Success<T> = { readonly ok: true; readonly value: T };

/**
 * A failed computation. The error is any error-like value.
 * Use `failure(error)` to create instances.
 */
export type Failure = { readonly ok: false; readonly error: unknown };

/**
 * Either a `Success<T>` or a `Failure`.
 */
export type Try<T> = Success<T> | Failure;

/** Extract the success type of a Try. */
export type SuccessOf<T> = T extends Success<infer U> ? U : never;

// =============================================================================
// Constructors
// =============================================================================

/**
 * Create a successful Try.
 *
 * @example
 * ```typescript
 * const t = success(42);
 * // t: { ok: true, value: 42 }
 * ```
 */
export const success = <T>(value: T): Success<T> => ({ ok: true, value });

/**
 * Create a failed Try.
 */
export const failure = (error: unknown): Failure => ({ ok: false, error });

/**
 * Run `fn` and capture a throw as a `Failure`.
 *
 * @example
 * ```typescript
 * attempt(() => JSON.parse("{"));  // Failure(SyntaxError)
 * attempt(() => 1 + 1);            // Success(2)
 * ```
 */
export function attempt<T>(fn: () => T): Try<T> {
  try {
    return success(fn());
  } catch (error) {
    return failure(error);
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export const isSuccess = <T>(t: Try<T>): t is Success<T> => t.ok;

export const isFailure = <T>(t: Try<T>): t is Failure => !t.ok;

// =============================================================================
// Side Effects
// =============================================================================

/**
 * Run `fn` with the value when `t` succeeded. Returns `t` unchanged.
 */
export function onSuccess<T>(t: Try<T>, fn: (value: T) => void): Try<T> {
  if (t.ok) fn(t.value);
  return t;
}

/**
 * Run `fn` with the error when `t` failed. Returns `t` unchanged.
 */
export function onFailure<T>(t: Try<T>, fn: (error: unknown) => void): Try<T> {
  if (!t.ok) fn(t.error);
  return t;
}

/**
 * Like `onSuccess`, without returning the Try.
 */
export function foreach<T>(t: Try<T>, fn: (value: T) => void): void {
  onSuccess(t, fn);
}

// =============================================================================
// Extraction
// =============================================================================

/**
 * The success value, or `defaultValue` when `t` failed.
 */
export function getOrElse<T>(t: Try<T>, defaultValue: T): T {
  return t.ok ? t.value : defaultValue;
}

/**
 * The success value. When `t` failed, throws the stored error as-is.
 *
 * @remarks When to use: only at a boundary that expects exceptions.
 * Everywhere else prefer `getOrElse`, `match` or the `ok` discriminant.
 */
export function get<T>(t: Try<T>): T {
  if (t.ok) return t.value;
  throw t.error;
}

/**
 * Fold both variants into one value.
 */
export function match<T, U>(
  t: Try<T>,
  handlers: { success: (value: T) => U; failure: (error: unknown) => U }
): U {
  return t.ok ? handlers.success(t.value) : handlers.failure(t.error);
}

// =============================================================================
// Transformations
// =============================================================================

/**
 * Chain a computation that may itself fail. A failure short-circuits and
 * `fn` is not called.
 *
 * `map` and `flatMap` are both special cases of this operator.
 */
export function transform<T, U>(t: Try<T>, fn: (value: T) => Try<U>): Try<U> {
  return t.ok ? fn(t.value) : t;
}

/**
 * Alias of `transform`.
 */
export function flatMap<T, U>(t: Try<T>, fn: (value: T) => Try<U>): Try<U> {
  return transform(t, fn);
}

/**
 * Transform the success value. `fn` must not throw; use `transform` with
 * `attempt` when it can fail.
 *
 * @example
 * ```typescript
 * map(success(21), (n) => n * 2);   // Success(42)
 * map(failure(oops), (n) => n * 2); // the same Failure
 * ```
 */
export function map<T, U>(t: Try<T>, fn: (value: T) => U): Try<U> {
  return transform(t, (value) => success(fn(value)));
}

/**
 * Recover from a failure with a computation that may fail again.
 * Successes pass through.
 */
export function rescue<T>(t: Try<T>, fn: (error: unknown) => Try<T>): Try<T> {
  return t.ok ? t : fn(t.error);
}

/**
 * Turn any failure into a success. Successes pass through.
 */
export function handle<T>(t: Try<T>, fn: (error: unknown) => T): Try<T> {
  return rescue(t, (error) => success(fn(error)));
}

/**
 * Keep a success only when `predicate` holds; otherwise fail with
 * `NoSuchElementError`. Failures pass through.
 *
 * @example
 * ```typescript
 * filter(success(4), (x) => x > 10); // Failure(NoSuchElementError)
 * filter(success(4), (x) => x > 0);  // Success(4)
 * ```
 */
export function filter<T>(t: Try<T>, predicate: (value: T) => boolean): Try<T> {
  return transform(t, (value) =>
    predicate(value) ? t : failure(new NoSuchElementError({ value }))
  );
}

// =============================================================================
// Namespace
// =============================================================================

/**
 * All Try operations under one name.
 *
 * @example
 * ```typescript
 * Try.getOrElse(Try.map(Try.success(2), (n) => n + 1), 0); // 3
 * ```
 */
export const Try = {
  success,
  failure,
  attempt,
  isSuccess,
  isFailure,
  onSuccess,
  onFailure,
  foreach,
  getOrElse,
  get,
  match,
  transform,
  flatMap,
  map,
  rescue,
  handle,
  filter,
} as const;
