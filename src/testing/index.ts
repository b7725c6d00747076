/**
 * latent/testing
 *
 * Deterministic test harness: a manually driven execution queue on a virtual
 * clock, and assertions for Try values.
 *
 * @example
 * ```typescript
 * import { createTestQueue, unwrapSuccess } from 'latent/testing';
 *
 * const queue = createTestQueue();
 * const results: Try<number>[] = [];
 *
 * Future.success(queue, 21).map((n) => n * 2).respond((r) => results.push(r));
 * queue.runAll();
 *
 * expect(unwrapSuccess(results[0])).toBe(42);
 * ```
 */

import type { ExecutionQueue, ScheduledWork, Work } from "../queue";
import type { Failure, Success, Try } from "../try";

// =============================================================================
// Test Clock
// =============================================================================

/**
 * Create a deterministic clock for testing.
 */
export function createTestClock(startTime = 0): {
  now: () => number;
  advance: (ms: number) => void;
  set: (time: number) => void;
  reset: () => void;
} {
  let currentTime = startTime;

  return {
    now: () => currentTime,
    advance: (ms: number) => {
      currentTime += ms;
    },
    set: (time: number) => {
      currentTime = time;
    },
    reset: () => {
      currentTime = startTime;
    },
  };
}

// =============================================================================
// Test Queue
// =============================================================================

/**
 * Options for `createTestQueue`.
 */
export interface TestQueueOptions {
  /** @default "test" */
  name?: string;
  /** Initial virtual time in milliseconds. @default 0 */
  startTime?: number;
}

/**
 * An execution queue that only runs work when told to.
 */
export interface TestQueue extends ExecutionQueue {
  /** Work items submitted and not yet run. */
  readonly pendingCount: number;

  /** Delayed items that have not fired and are not cancelled. */
  readonly timerCount: number;

  /** Errors thrown by work items, in the order they were thrown. */
  readonly errors: readonly unknown[];

  /** Run the oldest pending item. Returns false when nothing was pending. */
  runNext(): boolean;

  /**
   * Run pending work, including work submitted while running, until none is
   * left. Returns the number of items run.
   *
   * @throws {Error} When more than `limit` items run, which usually means
   * work keeps resubmitting itself.
   */
  runAll(limit?: number): number;

  /**
   * Move the virtual clock forward by `ms`, firing due timers in deadline
   * order and running all work after each. Returns the number of items run.
   */
  advance(ms: number): number;
}

interface Timer {
  readonly due: number;
  readonly seq: number;
  readonly work: Work;
  cancelled: boolean;
}

/**
 * Create a manually driven queue on a virtual clock.
 */
export function createTestQueue(options: TestQueueOptions = {}): TestQueue {
  const { name = "test", startTime = 0 } = options;
  const clock = createTestClock(startTime);
  const pending: Work[] = [];
  const errors: unknown[] = [];
  let timers: Timer[] = [];
  let seq = 0;

  function runNext(): boolean {
    const work = pending.shift();
    if (!work) return false;
    try {
      work();
    } catch (error) {
      errors.push(error);
    }
    return true;
  }

  function runAll(limit = 10_000): number {
    let ran = 0;
    while (runNext()) {
      ran++;
      if (ran > limit) {
        throw new Error(`[latent] test queue '${name}' ran more than ${limit} work items`);
      }
    }
    return ran;
  }

  function nextDue(until: number): Timer | undefined {
    let earliest: Timer | undefined;
    for (const timer of timers) {
      if (timer.cancelled || timer.due > until) continue;
      if (!earliest || timer.due < earliest.due || (timer.due === earliest.due && timer.seq < earliest.seq)) {
        earliest = timer;
      }
    }
    return earliest;
  }

  function advance(ms: number): number {
    const target = clock.now() + ms;
    let ran = runAll();

    for (let timer = nextDue(target); timer; timer = nextDue(target)) {
      const fired = timer;
      timers = timers.filter((t) => t !== fired);
      clock.set(Math.max(clock.now(), fired.due));
      pending.push(fired.work);
      ran += runAll();
    }

    clock.set(target);
    return ran;
  }

  function submitAfter(work: Work, delayMs: number): ScheduledWork {
    const timer: Timer = { due: clock.now() + Math.max(0, delayMs), seq: seq++, work, cancelled: false };
    timers.push(timer);

    return {
      get cancelled() {
        return timer.cancelled;
      },
      cancel() {
        if (!timers.includes(timer)) return;
        timer.cancelled = true;
        timers = timers.filter((t) => t !== timer);
      },
    };
  }

  return {
    name,
    now: clock.now,
    submit: (work) => {
      pending.push(work);
    },
    submitAfter,
    runNext,
    runAll,
    advance,
    errors,
    get pendingCount() {
      return pending.length;
    },
    get timerCount() {
      return timers.filter((t) => !t.cancelled).length;
    },
  };
}

// =============================================================================
// Assertions
// =============================================================================

function format(value: unknown): string {
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  try {
    return JSON.stringify(value, null, 2) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Asserts that a Try is a Success and narrows the type.
 */
export function expectSuccess<T>(result: Try<T> | undefined): asserts result is Success<T> {
  if (!result) throw new Error("Expected Success, got no result");
  if (!result.ok) {
    throw new Error(`Expected Success, got Failure: ${format(result.error)}`);
  }
}

/**
 * Asserts that a Try is a Failure and narrows the type.
 */
export function expectFailure<T>(result: Try<T> | undefined): asserts result is Failure {
  if (!result) throw new Error("Expected Failure, got no result");
  if (result.ok) {
    throw new Error(`Expected Failure, got Success: ${format(result.value)}`);
  }
}

/**
 * Asserts Success and returns the value.
 *
 * @example
 * ```typescript
 * expect(unwrapSuccess(future.poll())).toBe(42);
 * ```
 */
export function unwrapSuccess<T>(result: Try<T> | undefined): T {
  expectSuccess(result);
  return result.value;
}

/**
 * Asserts Failure and returns the error.
 */
export function unwrapFailure<T>(result: Try<T> | undefined): unknown {
  expectFailure(result);
  return result.error;
}
