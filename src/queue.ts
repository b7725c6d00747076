/**
 * latent/queue
 *
 * Execution queues: where producers and observers run. Every `Future` is
 * bound to one queue; latent never creates a queue on its own.
 *
 * @example
 * ```typescript
 * import { createQueue, Future } from 'latent';
 *
 * const io = createQueue({
 *   name: 'io',
 *   logger: (message) => console.warn(message),
 * });
 *
 * const user = new Future<User>(io, (complete) => {
 *   db.findUser(id, (error, row) => complete(error ? failure(error) : success(row)));
 * });
 * ```
 */

// =============================================================================
// Types
// =============================================================================

/** A unit of work submitted to a queue. */
export type Work = () => void;

/**
 * Handle to delayed work.
 */
export interface ScheduledWork {
  /**
   * Prevent the work from running. Has no effect once it has run.
   */
  cancel(): void;

  /** Whether `cancel()` was called before the work ran. */
  readonly cancelled: boolean;
}

/**
 * The scheduling capability futures are bound to.
 *
 * Implementations run submitted work in FIFO order per queue. Nothing is
 * promised about which call stack runs it.
 */
export interface ExecutionQueue {
  /** Name used in log messages and events. */
  readonly name: string;

  /** Monotonic clock, in milliseconds. */
  now(): number;

  /** Run `work` after everything already submitted. */
  submit(work: Work): void;

  /** Submit `work` once `delayMs` has elapsed, unless cancelled first. */
  submitAfter(work: Work, delayMs: number): ScheduledWork;
}

/**
 * Events emitted by queues created with `createQueue`.
 */
export type QueueEvent =
  | { type: "work_failed"; queue: string; error: unknown; ts: number }
  | { type: "scheduled_work_cancelled"; queue: string; delayMs: number; ts: number };

/**
 * Configuration for `createQueue`.
 */
export interface QueueOptions {
  /**
   * Queue name, used in log messages and events.
   * @default "latent"
   */
  name?: string;

  /**
   * Logger function.
   * @default no-op
   */
  logger?: (message: string) => void;

  /** Structured event listener. */
  onEvent?: (event: QueueEvent) => void;

  /**
   * Monotonic clock in milliseconds.
   * @default performance.now
   */
  now?: () => number;
}

/**
 * Statistics for a queue.
 */
export interface QueueStats {
  /** Work items waiting to run */
  pending: number;
  /** Delayed items whose timer has not fired and that are not cancelled */
  scheduled: number;
  /** Work items that ran to completion */
  executed: number;
  /** Work items that threw */
  failed: number;
}

/**
 * Queue returned by `createQueue`.
 */
export interface Queue extends ExecutionQueue {
  getStats(): QueueStats;
}

// =============================================================================
// Implementation
// =============================================================================

/**
 * Create a FIFO queue drained on the microtask queue.
 *
 * Work that throws is reported through `logger` and a `work_failed` event;
 * the remaining work still runs, even when the reporters throw too. Delayed work is held by a timer and then
 * joins the FIFO.
 */
export function createQueue(options: QueueOptions = {}): Queue {
  const {
    name = "latent",
    logger = () => {},
    onEvent,
    now = () => performance.now(),
  } = options;

  const pending: Work[] = [];
  let draining = false;
  let scheduled = 0;
  let executed = 0;
  let failed = 0;

  /** Run a reporter; one that throws is dropped. */
  function guarded(reporter: () => void): void {
    try {
      reporter();
    } catch {
      // reporter errors never reach the drain loop
    }
  }

  function report(message: string | undefined, event: QueueEvent): void {
    if (message !== undefined) guarded(() => logger(message));
    guarded(() => onEvent?.(event));
  }

  function run(work: Work): void {
    try {
      work();
      executed++;
    } catch (error) {
      failed++;
      report(`[latent] work on queue '${name}' threw: ${String(error)}`, {
        type: "work_failed",
        queue: name,
        error,
        ts: Date.now(),
      });
    }
  }

  function drain(): void {
    try {
      for (let work = pending.shift(); work; work = pending.shift()) {
        run(work);
      }
    } finally {
      draining = false;
      if (pending.length > 0) schedule();
    }
  }

  function schedule(): void {
    draining = true;
    queueMicrotask(drain);
  }

  function submit(work: Work): void {
    pending.push(work);
    if (!draining) schedule();
  }

  function submitAfter(work: Work, delayMs: number): ScheduledWork {
    const state = { cancelled: false, fired: false, ran: false };
    scheduled++;

    const timer = setTimeout(() => {
      state.fired = true;
      scheduled--;
      submit(() => {
        if (state.cancelled) return;
        state.ran = true;
        work();
      });
    }, Math.max(0, delayMs));

    return {
      get cancelled() {
        return state.cancelled;
      },
      cancel() {
        if (state.cancelled || state.ran) return;
        state.cancelled = true;
        if (!state.fired) {
          clearTimeout(timer);
          scheduled--;
        }
        report(undefined, { type: "scheduled_work_cancelled", queue: name, delayMs, ts: Date.now() });
      },
    };
  }

  return {
    name,
    now,
    submit,
    submitAfter,
    getStats: () => ({ pending: pending.length, scheduled, executed, failed }),
  };
}
