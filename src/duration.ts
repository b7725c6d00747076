/**
 * latent/duration
 *
 * Duration inputs accepted wherever latent takes a delay.
 *
 * @example
 * ```typescript
 * toMillis(250);          // 250
 * toMillis("1.5s");       // 1500
 * toMillis(millis(100));  // 100
 * ```
 */

import { InvalidDurationError } from "./errors";

/** Duration object with tagged type for type safety */
export type Duration = { readonly _tag: "Duration"; readonly millis: number };

/** Milliseconds, a string such as "100ms" or "5s", or a Duration object */
export type DurationInput = number | string | Duration;

const UNIT_MILLIS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

/** Create a Duration from milliseconds. */
export const millis = (ms: number): Duration => ({ _tag: "Duration", millis: ms });

/** Create a Duration from seconds. */
export const seconds = (s: number): Duration => millis(s * 1000);

/** Parse a duration string like "100ms", "5s", "2m", "1h", "1d" */
export function parseDuration(input: string): Duration | undefined {
  const match = input.trim().match(/^(\d+(?:\.\d+)?)\s*(ms|s|m|h|d)$/i);
  if (!match) return undefined;
  const multiplier = UNIT_MILLIS[match[2].toLowerCase()] ?? 1;
  return millis(parseFloat(match[1]) * multiplier);
}

/**
 * Resolve a duration input to milliseconds.
 *
 * @param operation - Name used in the error message when the input is invalid
 * @throws {InvalidDurationError} For malformed strings and negative or non-finite numbers
 */
export function toMillis(duration: DurationInput, operation?: string): number {
  const ms =
    typeof duration === "number"
      ? duration
      : typeof duration === "string"
        ? parseDuration(duration)?.millis
        : duration.millis;

  if (ms === undefined || !Number.isFinite(ms) || ms < 0) {
    throw new InvalidDurationError({ input: duration, operation });
  }
  return ms;
}
