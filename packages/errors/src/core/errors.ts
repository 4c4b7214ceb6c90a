import type { CollectionErrorCode } from "../ports/error"
import { CollectionError } from "./collection-error"
import { describeValue } from "./utils/describe-value"

export type UnderflowContext = {
  collection: string
  operation: string
}

/**
 * A read or removal was attempted on an empty structure
 * (`pop`, `shift`, `first`, `last`, `peek`).
 */
export class UnderflowError extends CollectionError<"underflow"> {
  constructor(context: UnderflowContext, cause?: unknown) {
    super(`${context.collection}.${context.operation}() called on an empty collection`, {
      code: "underflow",
      context,
      cause,
    })
  }
}

export type IndexOutOfRangeContext = {
  collection: string
  index: number

  /** Inclusive bounds of the valid range at the time of the call. */
  min: number
  max: number
}

export class IndexOutOfRangeError extends CollectionError<"index_out_of_range"> {
  constructor(context: IndexOutOfRangeContext, cause?: unknown) {
    const range = context.max < context.min ? "none (empty)" : `[${context.min}, ${context.max}]`

    super(`Index ${context.index} is out of range for ${context.collection}, valid: ${range}`, {
      code: "index_out_of_range",
      context,
      cause,
    })
  }
}

export type KeyNotFoundContext = {
  collection: string
  key: unknown
}

export class KeyNotFoundError extends CollectionError<"key_not_found"> {
  constructor(context: KeyNotFoundContext, cause?: unknown) {
    const key = describeValue(context.key)

    super(`Key ${key} not found in ${context.collection}`, {
      code: "key_not_found",
      context: { collection: context.collection, key },
      cause,
    })
  }
}

export type InvalidArgumentContext = {
  collection: string
  operation: string
  argument: string
}

export class InvalidArgumentError extends CollectionError<"invalid_argument"> {
  constructor(context: InvalidArgumentContext, reason: string, cause?: unknown) {
    super(
      `Invalid argument "${context.argument}" for ${context.collection}.${context.operation}(): ${reason}`,
      { code: "invalid_argument", context, cause },
    )
  }
}

export type CollectionErrorByCode = {
  underflow: UnderflowError
  index_out_of_range: IndexOutOfRangeError
  key_not_found: KeyNotFoundError
  invalid_argument: InvalidArgumentError
}

export type AnyCollectionError = CollectionErrorByCode[CollectionErrorCode]
