/**
 * latent/either
 *
 * A value tagged with the side it came from. `Future.or` uses it so the
 * winner of a race stays distinguishable even when both sides share a type.
 */

export type Left<L> = { readonly side: "left"; readonly value: L };
export type Right<R> = { readonly side: "right"; readonly value: R };
export type Either<L, R> = Left<L> | Right<R>;

export const left = <L>(value: L): Left<L> => ({ side: "left", value });

export const right = <R>(value: R): Right<R> => ({ side: "right", value });

export const isLeft = <L, R>(e: Either<L, R>): e is Left<L> => e.side === "left";

export const isRight = <L, R>(e: Either<L, R>): e is Right<R> => e.side === "right";

/**
 * Fold both sides into one value.
 *
 * @example
 * ```typescript
 * const label = fold(winner, {
 *   left: (user) => `cache: ${user.name}`,
 *   right: (user) => `origin: ${user.name}`,
 * });
 * ```
 */
export function fold<L, R, U>(
  e: Either<L, R>,
  handlers: { left: (value: L) => U; right: (value: R) => U }
): U {
  return e.side === "left" ? handlers.left(e.value) : handlers.right(e.value);
}
