/**
 * latent/tagged-error
 *
 * Tagged error classes: errors carrying a literal `_tag` discriminant so they
 * can be narrowed in a `switch` or with a type guard. Props passed to the
 * constructor are assigned onto the instance.
 *
 * @example
 * ```typescript
 * class QuotaExceeded extends TaggedError('QuotaExceeded', {
 *   message: (p: { limit: number }) => `QuotaExceeded: limit ${p.limit} reached`,
 * }) {}
 *
 * const error = new QuotaExceeded({ limit: 10 });
 * error._tag; // "QuotaExceeded"
 * error.limit; // 10
 * ```
 */

// =============================================================================
// Types
// =============================================================================

/**
 * Instance shape shared by every tagged error.
 */
export interface TaggedErrorBase<Tag extends string = string> extends Error {
  readonly _tag: Tag;
}

/**
 * Second constructor argument. `cause` is passed through to `Error`.
 */
export type TaggedErrorOptions = ErrorOptions;

/**
 * Options for {@link TaggedError}.
 */
export interface TaggedErrorCreateOptions<Props extends object> {
  /**
   * Build the message from the constructor props.
   * @default the tag
   */
  message?: (props: Props) => string;
}

/**
 * Constructor returned by {@link TaggedError}. Props are optional when the
 * error declares none.
 */
export type TaggedErrorConstructor<Tag extends string, Props extends object = object> = new (
  ...args: keyof Props extends never
    ? [props?: Props, options?: TaggedErrorOptions]
    : [props: Props, options?: TaggedErrorOptions]
) => TaggedErrorBase<Tag> & Readonly<Props>;

/** Extract the tag literal from a tagged error type. */
export type TagOf<E> = E extends TaggedErrorBase<infer Tag> ? Tag : never;

/** Narrow a union of tagged errors to the member carrying `Tag`. */
export type ErrorByTag<E, Tag extends string> = Extract<E, TaggedErrorBase<Tag>>;

/** The props a tagged error was constructed with. */
export type PropsOf<E> = E extends TaggedErrorBase ? Omit<E, keyof TaggedErrorBase> : never;

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a base class for errors identified by `tag`.
 *
 * @example
 * ```typescript
 * class Cancelled extends TaggedError('Cancelled') {}
 *
 * class NotFound extends TaggedError('NotFound', {
 *   message: (p: { id: string }) => `NotFound: ${p.id}`,
 * }) {}
 * ```
 */
export function TaggedError<Tag extends string>(tag: Tag): TaggedErrorConstructor<Tag>;
export function TaggedError<Tag extends string, Props extends object>(
  tag: Tag,
  options: TaggedErrorCreateOptions<Props>
): TaggedErrorConstructor<Tag, Props>;
export function TaggedError(
  tag: string,
  options: TaggedErrorCreateOptions<Record<string, unknown>> = {}
): new (props?: Record<string, unknown>, errorOptions?: TaggedErrorOptions) => TaggedErrorBase {
  const { message = () => tag } = options;

  return class extends Error {
    readonly _tag: string = tag;

    constructor(props: Record<string, unknown> = {}, errorOptions?: TaggedErrorOptions) {
      super(message(props), errorOptions);
      this.name = tag;
      Object.assign(this, props);
    }
  };
}

/**
 * Type guard for any tagged error, optionally matching a specific tag.
 */
export function isTaggedError<Tag extends string = string>(
  error: unknown,
  tag?: Tag
): error is TaggedErrorBase<Tag> {
  if (!(error instanceof Error) || !("_tag" in error)) return false;
  const actual = error._tag;
  return typeof actual === "string" && (tag === undefined || actual === tag);
}
