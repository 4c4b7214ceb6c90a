/**
 * A source of raw configuration values.
 *
 * Sources only load; validation and coercion happen in
 * `loadCollectionsConfig`. Later sources override earlier ones, and an
 * `undefined` value means "not provided".
 */
export interface ConfigSource {
  /** Human-readable name, e.g. "env" or "object:overrides". */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
