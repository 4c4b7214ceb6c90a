import type { CollectionErrorCode } from "../../ports/error"
import {
  type CollectionErrorByCode,
  IndexOutOfRangeError,
  type IndexOutOfRangeContext,
  InvalidArgumentError,
  type InvalidArgumentContext,
  KeyNotFoundError,
  type KeyNotFoundContext,
  UnderflowError,
  type UnderflowContext,
} from "../errors"

export type CollectionErrorContextByCode = {
  underflow: UnderflowContext
  index_out_of_range: IndexOutOfRangeContext
  key_not_found: KeyNotFoundContext
  invalid_argument: InvalidArgumentContext & { reason: string }
}

type ErrorBuilders = {
  [C in CollectionErrorCode]: (
    context: CollectionErrorContextByCode[C],
    cause?: unknown,
  ) => CollectionErrorByCode[C]
}

const builders: ErrorBuilders = {
  underflow: (context, cause) => new UnderflowError(context, cause),
  index_out_of_range: (context, cause) => new IndexOutOfRangeError(context, cause),
  key_not_found: (context, cause) => new KeyNotFoundError(context, cause),
  invalid_argument: ({ reason, ...context }, cause) =>
    new InvalidArgumentError(context, reason, cause),
}

/**
 * Factory building the error class that matches a code.
 *
 * @example
 * ```ts
 * throw createError("index_out_of_range", {
 *   collection: "Vector",
 *   index: 7,
 *   min: 0,
 *   max: 2,
 * })
 * ```
 */
export function createError<C extends CollectionErrorCode>(
  code: C,
  context: CollectionErrorContextByCode[C],
  cause?: unknown,
): CollectionErrorByCode[C] {
  const build: (context: CollectionErrorContextByCode[C], cause?: unknown) => CollectionErrorByCode[C] =
    builders[code]

  return build(context, cause)
}
