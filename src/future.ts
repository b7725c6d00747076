/**
 * latent/future
 *
 * A single-assignment container for a `Try` that will exist later, bound to
 * an execution queue. Observers registered with `respond` (or any combinator
 * built on it) run on that queue exactly once with the final result, whether
 * they were registered before or after completion.
 *
 * @example
 * ```typescript
 * import { Future, createQueue } from 'latent';
 *
 * const queue = createQueue({ name: 'app' });
 *
 * const profile = fetchUser(queue, id)
 *   .flatMap((user) => fetchProfile(queue, user.profileId))
 *   .timeout('2s')
 *   .rescue(() => Future.success(queue, anonymousProfile));
 *
 * const result = await profile.toPromise();
 * if (result.ok) render(result.value);
 * ```
 */

import { left, right, type Either } from "./either";
import { TimeoutError } from "./errors";
import { toMillis, type DurationInput } from "./duration";
import type { ExecutionQueue } from "./queue";
import { createAtomic, createCompletionLatch, type Atomic } from "./sync";
import {
  success,
  failure,
  attempt,
  map as mapTry,
  filter as filterTry,
  handle as handleTry,
  onSuccess as onTrySuccess,
  onFailure as onTryFailure,
  type Try,
} from "./try";

// =============================================================================
// Types
// =============================================================================

/** One-shot completion handle passed to a producer. */
export type Complete<R> = (result: Try<R>) => void;

/**
 * Supplies the eventual result by calling `complete` once. Calls after the
 * first are ignored; a synchronous throw completes with a failure.
 */
export type Producer<R> = (complete: Complete<R>) => void;

/** A registered observer. Wrapped so the same function can be registered twice. */
type Observer<R> = { readonly notify: (result: Try<R>) => void };

type FutureState<R> =
  | { readonly status: "pending"; readonly observers: readonly Observer<R>[] }
  | { readonly status: "completed"; readonly result: Try<R> };

/** Shared accumulator for `join`. */
type JoinState<L, R> = { left?: { value: L }; right?: { value: R } };

const noop = (): void => {};

// =============================================================================
// Future
// =============================================================================

export class Future<R> {
  /** Queue this future's producer and observers run on. */
  readonly queue: ExecutionQueue;

  private readonly state: Atomic<FutureState<R>>;

  /**
   * Submit `producer` to `queue`. Never runs the producer synchronously.
   */
  constructor(queue: ExecutionQueue, producer: Producer<R>) {
    this.queue = queue;
    this.state = createAtomic<FutureState<R>>({ status: "pending", observers: [] });

    queue.submit(() => {
      try {
        producer((result) => this.complete(result));
      } catch (error) {
        this.complete(failure(error));
      }
    });
  }

  // ===========================================================================
  // Constructors
  // ===========================================================================

  /** A future that completes with `value` once `queue` runs it. */
  static success<R>(queue: ExecutionQueue, value: R): Future<R> {
    return Future.fromTry(queue, success(value));
  }

  /** A future that fails with `error` once `queue` runs it. */
  static failed<R = never>(queue: ExecutionQueue, error: unknown): Future<R> {
    return Future.fromTry<R>(queue, failure(error));
  }

  /**
   * A future holding an already known result. Completion still goes through
   * the queue, so it orders after work submitted before it.
   */
  static fromTry<R>(queue: ExecutionQueue, result: Try<R>): Future<R> {
    return new Future<R>(queue, (complete) => complete(result));
  }

  /**
   * Adapt a promise: fulfilment becomes a success, rejection a failure.
   */
  static fromPromise<R>(queue: ExecutionQueue, promise: PromiseLike<R>): Future<R> {
    return new Future<R>(queue, (complete) => {
      void Promise.resolve(promise).then(
        (value) => complete(success(value)),
        (error: unknown) => complete(failure(error))
      );
    });
  }

  /**
   * Wait for every future. Succeeds with the values in input order, or fails
   * with the first failure to arrive. Remaining futures are not stopped.
   */
  static collect<R>(queue: ExecutionQueue, futures: readonly Future<R>[]): Future<R[]> {
    if (futures.length === 0) return Future.success<R[]>(queue, []);

    return new Future<R[]>(queue, (complete) => {
      const slots: ReadonlyArray<{ value: R } | undefined> = futures.map(() => undefined);
      const latch = createCompletionLatch(slots, futures.length, (filled) => {
        const values: R[] = [];
        for (const slot of filled) {
          if (!slot) return;
          values.push(slot.value);
        }
        complete(success(values));
      });

      futures.forEach((future, index) => {
        future
          .onSuccess((value) =>
            latch.push((current) => current.map((slot, i) => (i === index ? { value } : slot)))
          )
          .onFailure((error) => complete(failure(error)));
      });
    });
  }

  // ===========================================================================
  // State
  // ===========================================================================

  /** Whether the result has been set. */
  get isCompleted(): boolean {
    return this.state.get().status === "completed";
  }

  /** The result if completed, otherwise `undefined`. */
  poll(): Try<R> | undefined {
    const current = this.state.get();
    return current.status === "completed" ? current.result : undefined;
  }

  private complete(result: Try<R>): void {
    const current = this.state.get();
    if (current.status === "completed") return;
    if (!this.state.compareAndSet(current, { status: "completed", result })) {
      this.complete(result);
      return;
    }
    for (const observer of current.observers) {
      this.queue.submit(() => observer.notify(result));
    }
  }

  /**
   * Register `notify` and return a function that unregisters it while it is
   * still pending.
   */
  private listen(notify: (result: Try<R>) => void): () => void {
    const current = this.state.get();
    if (current.status === "completed") {
      const { result } = current;
      this.queue.submit(() => notify(result));
      return noop;
    }

    const observer: Observer<R> = { notify };
    if (
      !this.state.compareAndSet(current, {
        status: "pending",
        observers: [...current.observers, observer],
      })
    ) {
      return this.listen(notify);
    }
    return () => this.unlisten(observer);
  }

  private unlisten(observer: Observer<R>): void {
    const current = this.state.get();
    if (current.status === "completed" || !current.observers.includes(observer)) return;
    const next: FutureState<R> = {
      status: "pending",
      observers: current.observers.filter((o) => o !== observer),
    };
    if (!this.state.compareAndSet(current, next)) this.unlisten(observer);
  }

  // ===========================================================================
  // Observers
  // ===========================================================================

  /**
   * Run `fn` on this future's queue with the eventual result. Returns `this`
   * so several observers can be chained off one future.
   */
  respond(fn: (result: Try<R>) => void): this {
    this.listen(fn);
    return this;
  }

  onSuccess(fn: (value: R) => void): this {
    return this.respond((result) => onTrySuccess(result, fn));
  }

  onFailure(fn: (error: unknown) => void): this {
    return this.respond((result) => onTryFailure(result, fn));
  }

  foreach(fn: (value: R) => void): this {
    return this.onSuccess(fn);
  }

  /**
   * Bridge to `await`. The promise always resolves, with a `Try`.
   */
  toPromise(): Promise<Try<R>> {
    return new Promise((resolve) => {
      this.respond(resolve);
    });
  }

  // ===========================================================================
  // Combinators
  // ===========================================================================

  /**
   * Wait for this future, hand its result (either variant) to `fn`, and
   * forward the result of the future `fn` returns. Every other combinator is
   * built on this one. A throwing `fn` yields a failure.
   */
  transform<R2>(fn: (result: Try<R>) => Future<R2>): Future<R2> {
    return new Future<R2>(this.queue, (complete) => {
      this.respond((result) => {
        const next = attempt(() => fn(result));
        if (next.ok) {
          next.value.respond(complete);
        } else {
          complete(next);
        }
      });
    });
  }

  map<R2>(fn: (value: R) => R2): Future<R2> {
    return this.transform((result) => Future.fromTry(this.queue, mapTry(result, fn)));
  }

  /**
   * Chain a dependent asynchronous step. Failures short-circuit without
   * calling `fn`.
   */
  flatMap<R2>(fn: (value: R) => Future<R2>): Future<R2> {
    return this.transform((result) =>
      result.ok ? fn(result.value) : Future.failed<R2>(this.queue, result.error)
    );
  }

  /** Fail with `NoSuchElementError` when `predicate` rejects the value. */
  filter(predicate: (value: R) => boolean): Future<R> {
    return this.transform((result) => Future.fromTry(this.queue, filterTry(result, predicate)));
  }

  /** Recover from a failure with another future. Successes pass through. */
  rescue(fn: (error: unknown) => Future<R>): Future<R> {
    return this.transform((result) =>
      result.ok ? Future.success(this.queue, result.value) : fn(result.error)
    );
  }

  /** Turn a failure into a success value. Successes pass through. */
  handle(fn: (error: unknown) => R): Future<R> {
    return this.transform((result) => Future.fromTry(this.queue, handleTry(result, fn)));
  }

  /**
   * Race this future against `other`. The first result to arrive wins,
   * success or failure. A success is tagged `left` when it came from this
   * future and `right` when it came from `other`.
   *
   * The losing future keeps running; releasing whatever it holds is up to the
   * caller.
   */
  or<R2>(other: Future<R2>): Future<Either<R, R2>> {
    return new Future<Either<R, R2>>(this.queue, (complete) => {
      this.respond((result) => complete(mapTry(result, (value) => left(value))));
      other.respond((result) => complete(mapTry(result, (value) => right(value))));
    });
  }

  /**
   * Wait for both futures to succeed. Either failure completes the joined
   * future at once; the other side keeps running.
   */
  join<R2>(that: Future<R2>): Future<[R, R2]> {
    return new Future<[R, R2]>(this.queue, (complete) => {
      const latch = createCompletionLatch<JoinState<R, R2>>({}, 2, (state) => {
        if (state.left && state.right) {
          complete(success<[R, R2]>([state.left.value, state.right.value]));
        }
      });

      this.onSuccess((value) => latch.push((state) => ({ ...state, left: { value } }))).onFailure(
        (error) => complete(failure(error))
      );

      that.onSuccess((value) => latch.push((state) => ({ ...state, right: { value } }))).onFailure(
        (error) => complete(failure(error))
      );
    });
  }

  /**
   * Complete with this future's result if it arrives within `duration` of
   * this call, otherwise fail with `TimeoutError`.
   *
   * When the deadline passes first, the observer on this future is removed,
   * so nothing is forwarded afterwards. This future itself keeps running.
   *
   * @param queue - Queue for the returned future and its timer. Defaults to
   * this future's queue.
   * @throws {InvalidDurationError} When `duration` cannot be parsed
   */
  timeout(duration: DurationInput, queue: ExecutionQueue = this.queue): Future<R> {
    const ms = toMillis(duration, "timeout");
    const deadline = queue.now() + ms;

    return new Future<R>(queue, (complete) => {
      let detach = noop;

      const timer = queue.submitAfter(() => {
        detach();
        complete(failure(new TimeoutError({ ms, deadline })));
      }, deadline - queue.now());

      detach = this.listen((result) => {
        timer.cancel();
        complete(result);
      });
    });
  }

  /**
   * Mirror this future on another queue, so downstream observers run there.
   */
  observe(queue: ExecutionQueue): Future<R> {
    return new Future<R>(queue, (complete) => {
      this.respond((result) => queue.submit(() => complete(result)));
    });
  }
}
