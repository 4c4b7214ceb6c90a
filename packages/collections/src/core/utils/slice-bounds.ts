import { InvalidArgumentError } from "@tessera/errors"

export type SliceBounds = Readonly<{ start: number; end: number }>

/**
 * Resolve `slice(offset, length)` against `size`.
 *
 * A negative offset counts from the end; a negative length stops that
 * many values before the end. Out of range values are clipped, so the
 * result may be empty but never fails.
 */
export function sliceBounds(
  collection: string,
  size: number,
  offset: number,
  length?: number,
): SliceBounds {
  if (!Number.isInteger(offset)) {
    throw new InvalidArgumentError(
      { collection, operation: "slice", argument: "offset" },
      `expected an integer, got ${offset}`,
    )
  }

  if (length !== undefined && !Number.isInteger(length)) {
    throw new InvalidArgumentError(
      { collection, operation: "slice", argument: "length" },
      `expected an integer, got ${length}`,
    )
  }

  const start = offset < 0 ? Math.max(0, size + offset) : Math.min(offset, size)

  let end = size
  if (length !== undefined) end = length < 0 ? size + length : start + length

  return { start, end: Math.max(start, Math.min(end, size)) }
}
