import type { CollectionErrorCode, CollectionFailure } from "../../ports/error"

const COLLECTION_ERROR_CODES: ReadonlySet<string> = new Set<CollectionErrorCode>([
  "underflow",
  "index_out_of_range",
  "key_not_found",
  "invalid_argument",
])

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Type guard to check if a value is a collection failure, optionally of a
 * specific code.
 *
 * @example
 * ```ts
 * try {
 *   queue.pop()
 * } catch (err) {
 *   if (isCollectionError(err, "underflow")) return undefined
 *   throw err
 * }
 * ```
 */
export function isCollectionError<C extends CollectionErrorCode>(
  e: unknown,
  code?: C,
): e is CollectionFailure<C> {
  if (!isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    COLLECTION_ERROR_CODES.has(e.code) &&
    (code === undefined || e.code === code) &&
    isRecord(e.context) &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp) &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}
