/**
 * Failure kinds raised by the collections.
 *
 * @remarks
 * - `underflow`: read or removal on an empty structure.
 * - `index_out_of_range`: positional access outside the valid range.
 * - `key_not_found`: lookup or removal of an absent key with no default.
 * - `invalid_argument`: malformed input to an operation.
 */
export type CollectionErrorCode =
  | "underflow"
  | "index_out_of_range"
  | "key_not_found"
  | "invalid_argument"

export type ErrorCode = Lowercase<string>

/**
 * Contextual metadata attached to errors.
 * Carries the structure name, the operation and offending inputs.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface CollectionFailure<C extends string = CollectionErrorCode> extends Error {
  /** Error code for programmatic handling */
  readonly code: C

  /** Structured metadata for debugging */
  readonly context: ErrorContext

  /**
   * Indicates whether this is an expected runtime failure (true) or an
   * invariant violation inside a structure (false).
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  /**
   * Underlying cause
   *
   * See {@link https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Error/cause Error.cause}
   */
  readonly cause?: unknown
}

/**
 * Serialized error shape for logging and transport.
 *
 * Designed to be JSON.stringify-safe.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
