/**
 * Type tests for latent
 *
 * Checked by `tsc --noEmit`; the runtime assertions are incidental.
 */
import { describe, expectTypeOf, it } from "vitest";
import {
  Future,
  TaggedError,
  TimeoutError,
  success,
  failure,
  map,
  filter,
  fold,
  type Either,
  type Failure,
  type Success,
  type SuccessOf,
  type TagOf,
  type PropsOf,
  type Try,
} from "./index";
import { createTestQueue } from "./testing";

describe("Try types", () => {
  it("constructors produce their variant", () => {
    expectTypeOf(success(1)).toEqualTypeOf<Success<number>>();
    expectTypeOf(failure("E")).toEqualTypeOf<Failure>();
  });

  it("combinators keep the value type", () => {
    const t: Try<number> = success(1);
    expectTypeOf(map(t, (n) => `${n}`)).toEqualTypeOf<Try<string>>();
    expectTypeOf(filter(t, (n) => n > 0)).toEqualTypeOf<Try<number>>();
  });

  it("narrows on ok", () => {
    const t: Try<string> = success("x");
    if (t.ok) {
      expectTypeOf(t.value).toEqualTypeOf<string>();
    } else {
      expectTypeOf(t.error).toEqualTypeOf<unknown>();
    }
  });

  it("SuccessOf extracts the value type", () => {
    expectTypeOf<SuccessOf<Success<Date>>>().toEqualTypeOf<Date>();
  });
});

describe("Future types", () => {
  const queue = createTestQueue();

  it("join pairs the value types", () => {
    const joined = Future.success(queue, 1).join(Future.success(queue, "x"));
    expectTypeOf(joined).toEqualTypeOf<Future<[number, string]>>();
  });

  it("or tags the sides", () => {
    const raced = Future.success(queue, 1).or(Future.success(queue, "x"));
    expectTypeOf(raced).toEqualTypeOf<Future<Either<number, string>>>();

    raced.onSuccess((either) => {
      const label = fold(either, {
        left: (n) => n.toFixed(0),
        right: (s) => s.toUpperCase(),
      });
      expectTypeOf(label).toEqualTypeOf<string>();
    });
  });

  it("collect gathers an array", () => {
    const all = Future.collect(queue, [Future.success(queue, 1), Future.success(queue, 2)]);
    expectTypeOf(all).toEqualTypeOf<Future<number[]>>();
  });

  it("flatMap and map change the value type", () => {
    const chained = Future.success(queue, 1)
      .flatMap((n) => Future.success(queue, n > 0))
      .map((b) => `${b}`);
    expectTypeOf(chained).toEqualTypeOf<Future<string>>();
  });
});

describe("TaggedError types", () => {
  it("carries the literal tag", () => {
    class Missing extends TaggedError("Missing") {}
    expectTypeOf(new Missing()._tag).toEqualTypeOf<"Missing">();
    expectTypeOf<TagOf<Missing>>().toEqualTypeOf<"Missing">();
  });

  it("types props from the message builder", () => {
    const error = new TimeoutError({ ms: 100, deadline: 1100 });
    expectTypeOf(error.ms).toEqualTypeOf<number>();
    expectTypeOf(error.deadline).toEqualTypeOf<number>();
    expectTypeOf<keyof PropsOf<TimeoutError>>().toEqualTypeOf<"ms" | "deadline">();
    expectTypeOf<ConstructorParameters<typeof TimeoutError>[0]>().toEqualTypeOf<{
      ms: number;
      deadline: number;
    }>();
  });
});
