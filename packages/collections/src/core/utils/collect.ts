import { InvalidArgumentError } from "@tessera/errors"

export function isIterable(value: unknown): value is Iterable<unknown> {
  if (typeof value === "string") return true

  return (
    typeof value === "object" &&
    value !== null &&
    Symbol.iterator in value &&
    typeof value[Symbol.iterator] === "function"
  )
}

/**
 * Materialize a bulk argument before anything is mutated, so a bad
 * argument leaves the structure untouched.
 */
export function collect<T>(
  values: Iterable<T>,
  context: Readonly<{ collection: string; operation: string; argument?: string }>,
): T[] {
  if (!isIterable(values)) {
    throw new InvalidArgumentError(
      { collection: context.collection, operation: context.operation, argument: context.argument ?? "values" },
      "expected an iterable",
    )
  }

  return Array.from(values)
}
