/**
 * latent
 *
 * Results that exist later: a `Try` algebra for success-or-failure values and
 * a queue-bound `Future` that composes them without callback bookkeeping.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { Future, createQueue, success, failure } from 'latent';
 *
 * const queue = createQueue({ name: 'app' });
 *
 * const config = new Future<string>(queue, (complete) => {
 *   readFile('config.json', 'utf8', (error, text) =>
 *     complete(error ? failure(error) : success(text))
 *   );
 * });
 *
 * const port = config
 *   .map((text) => JSON.parse(text) as { port: number })
 *   .map((c) => c.port)
 *   .filter((p) => p > 0)
 *   .timeout('1s')
 *   .handle(() => 8080);
 *
 * const result = await port.toPromise();
 * ```
 *
 * ## Entry Points
 *
 * - `latent` - Try, Either, Future, queues, errors, durations
 * - `latent/testing` - virtual-time test queue and Try assertions
 */

import * as tryOps from "./try";
import * as eitherOps from "./either";
import { Future } from "./future";
import { createQueue } from "./queue";
import { TaggedError } from "./tagged-error";

// =============================================================================
// Latent namespace (single export)
// =============================================================================

const Latent = {
  // Try (all value exports, including the Try namespace)
  ...tryOps,
  // Either
  ...eitherOps,
  Future,
  createQueue,
  TaggedError,
} as const;

export { Latent };

// =============================================================================
// Named value exports (tree-shake friendly)
// =============================================================================

export {
  Try,
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
} from "./try";

export { left, right, isLeft, isRight, fold } from "./either";

export { Future } from "./future";

export { createQueue } from "./queue";

export { createAtomic, createAtomicCounter, createCompletionLatch } from "./sync";

export { TaggedError, isTaggedError } from "./tagged-error";

export {
  NoSuchElementError,
  TimeoutError,
  AtomicReentrancyError,
  InvalidDurationError,
  isNoSuchElementError,
  isTimeoutError,
  isAtomicReentrancyError,
  isInvalidDurationError,
  isLatentError,
} from "./errors";

export { millis, seconds, parseDuration, toMillis } from "./duration";

// =============================================================================
// Type exports (cannot live on runtime object)
// =============================================================================

export type { Success, Failure, SuccessOf } from "./try";
export type { Either, Left, Right } from "./either";
export type { Complete, Producer } from "./future";
export type {
  ExecutionQueue,
  ScheduledWork,
  Work,
  Queue,
  QueueOptions,
  QueueEvent,
  QueueStats,
} from "./queue";
export type { Atomic, AtomicCounter, CompletionLatch } from "./sync";
export type {
  TaggedErrorBase,
  TaggedErrorOptions,
  TaggedErrorCreateOptions,
  TaggedErrorConstructor,
  TagOf,
  ErrorByTag,
  PropsOf,
} from "./tagged-error";
export type { LatentError } from "./errors";
export type { Duration, DurationInput } from "./duration";
