const MAX_DESCRIPTION_LENGTH = 64

/**
 * Render an arbitrary key or value as a short, log-safe string.
 *
 * @example
 * ```ts
 * describeValue("id")        // "\"id\""
 * describeValue(42n)         // "42n"
 * describeValue(new Point()) // "[Point]"
 * ```
 */
export function describeValue(value: unknown): string {
  switch (typeof value) {
    case "string":
      return truncate(JSON.stringify(value))
    case "bigint":
      return `${value}n`
    case "symbol":
      return value.toString()
    case "function":
      return `[function ${value.name || "anonymous"}]`
    case "object": {
      if (value === null) return "null"
      if (Array.isArray(value)) return `[Array(${value.length})]`

      const name = value.constructor?.name
      return name ? `[${name}]` : "[object]"
    }
    default:
      return String(value)
  }
}

function truncate(text: string): string {
  if (text.length <= MAX_DESCRIPTION_LENGTH) return text

  return `${text.slice(0, MAX_DESCRIPTION_LENGTH - 1)}…`
}
