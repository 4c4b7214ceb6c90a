export {
  CollectionError,
  type CollectionErrorOptions,
  type SerializeOptions,
  serializeError,
} from "./core/collection-error"
export {
  type AnyCollectionError,
  type CollectionErrorByCode,
  IndexOutOfRangeError,
  type IndexOutOfRangeContext,
  InvalidArgumentError,
  type InvalidArgumentContext,
  KeyNotFoundError,
  type KeyNotFoundContext,
  UnderflowError,
  type UnderflowContext,
} from "./core/errors"
export { type CollectionErrorContextByCode, createError } from "./core/utils/create-error"
export { describeValue } from "./core/utils/describe-value"
export { isCollectionError } from "./core/utils/is-collection-error"
export type {
  CollectionErrorCode,
  CollectionFailure,
  ErrorCode,
  ErrorContext,
  SerializedError,
} from "./ports/error"
