/**
 * latent/testing
 *
 * Deterministic future testing: drive a queue by hand on a virtual clock and
 * assert on Try values.
 *
 * @example
 * ```typescript
 * import { createTestQueue, unwrapFailure } from 'latent/testing';
 *
 * const queue = createTestQueue();
 * const slow = new Future<number>(queue, () => {});
 * const guarded = slow.timeout(100);
 *
 * queue.advance(100);
 * expect(isTimeoutError(unwrapFailure(guarded.poll()))).toBe(true);
 * ```
 */

export {
  // Types
  type TestQueue,
  type TestQueueOptions,

  // Queue and clock
  createTestQueue,
  createTestClock,

  // Assertions
  expectSuccess,
  expectFailure,
  unwrapSuccess,
  unwrapFailure,
} from "./testing";
