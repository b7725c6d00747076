/**
 * Synchronization primitives
 *
 * Guarded state shared between observers that may be registered from one
 * queue while completion arrives from another. Reads are plain; every write
 * goes through an exclusive lock held only for the write itself, never while
 * user code runs.
 *
 * @example
 * ```typescript
 * const latch = createCompletionLatch<number[]>([], 2, (all) => done(all));
 * latch.push((xs) => [...xs, 1]);
 * latch.push((xs) => [...xs, 2]); // done([1, 2])
 * ```
 */

import { AtomicReentrancyError } from "../errors";

// =============================================================================
// Types
// =============================================================================

/**
 * A single guarded value.
 */
export interface Atomic<T> {
  /** Current value. */
  get(): T;

  /** Replace the value. */
  set(value: T): void;

  /**
   * Replace the value with `fn(current)` and return it. `fn` runs under the
   * lock, so it must not write to this cell.
   */
  update(fn: (current: T) => T): T;

  /**
   * Replace the value only if it is still `expected` (compared with
   * `Object.is`). Returns whether the write happened.
   */
  compareAndSet(expected: T, next: T): boolean;
}

/**
 * A guarded integer.
 */
export interface AtomicCounter {
  get(): number;
  incrementAndGet(): number;
  decrementAndGet(): number;
}

/**
 * Collects `expected` partial results and fires once when the last arrives.
 */
export interface CompletionLatch<S> {
  /** Accumulated state. */
  readonly value: S;

  /** Number of pushes so far. */
  readonly count: number;

  /**
   * Fold a partial result into the state and count it. The push that brings
   * the count to `expected` calls `onComplete` with the final state.
   */
  push(update: (current: S) => S): void;
}

// =============================================================================
// Atomic
// =============================================================================

/**
 * Create a guarded cell holding `initial`.
 *
 * A write attempted while the lock is held (from inside `update`) throws
 * `AtomicReentrancyError`.
 */
export function createAtomic<T>(initial: T): Atomic<T> {
  let value = initial;
  let locked = false;

  function withLock<R>(critical: () => R): R {
    if (locked) throw new AtomicReentrancyError();
    locked = true;
    try {
      return critical();
    } finally {
      locked = false;
    }
  }

  return {
    get: () => value,

    set(next) {
      withLock(() => {
        value = next;
      });
    },

    update(fn) {
      return withLock(() => {
        value = fn(value);
        return value;
      });
    },

    compareAndSet(expected, next) {
      return withLock(() => {
        if (!Object.is(value, expected)) return false;
        value = next;
        return true;
      });
    },
  };
}

// =============================================================================
// AtomicCounter
// =============================================================================

export function createAtomicCounter(initial = 0): AtomicCounter {
  const cell = createAtomic(initial);

  return {
    get: () => cell.get(),
    incrementAndGet: () => cell.update((n) => n + 1),
    decrementAndGet: () => cell.update((n) => n - 1),
  };
}

// =============================================================================
// CompletionLatch
// =============================================================================

/**
 * Create a latch that calls `onComplete` exactly once, on the push that
 * brings the count to `expected`. Later pushes still update the state.
 *
 * @param initial - Starting state
 * @param expected - Number of pushes to wait for
 * @param onComplete - Called with the state after the last expected push
 */
export function createCompletionLatch<S>(
  initial: S,
  expected: number,
  onComplete: (value: S) => void
): CompletionLatch<S> {
  const state = createAtomic(initial);
  const counter = createAtomicCounter();

  return {
    get value() {
      return state.get();
    },

    get count() {
      return counter.get();
    },

    push(update) {
      state.update(update);
      if (counter.incrementAndGet() === expected) {
        onComplete(state.get());
      }
    },
  };
}
