import { logLevelNames } from "@tessera/logger"
import { z } from "zod"
import { EnvSource } from "../../adapters/env/env-source"
import type { ConfigSource } from "../../ports/config-source"
import { DEFAULT_VECTOR_GROWTH_FACTOR, DEFAULT_VECTOR_MIN_CAPACITY } from "../capacity/multiplicative-capacity-policy"
import { DEFAULT_SQUARED_MIN_CAPACITY, square } from "../capacity/squared-capacity-policy"

export const collectionsConfigSchema = z.object({
  VECTOR_MIN_CAPACITY: z.coerce.number().int().min(1).default(DEFAULT_VECTOR_MIN_CAPACITY),
  VECTOR_GROWTH_FACTOR: z.coerce.number().gt(1).default(DEFAULT_VECTOR_GROWTH_FACTOR),
  SQUARED_MIN_CAPACITY: z.coerce
    .number()
    .int()
    .min(1)
    .refine((n) => square(n) === n, "must be a power of two")
    .default(DEFAULT_SQUARED_MIN_CAPACITY),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.union([z.boolean(), z.stringbool()]).default(false),
})

export type CollectionsConfig = z.infer<typeof collectionsConfigSchema>

export type LoadCollectionsConfigOptions = {
  /** Default: a single `EnvSource` reading `TESSERA_*` variables. */
  sources?: ConfigSource[]
}

/**
 * Merge `sources` in order, then validate and coerce the result.
 *
 * @throws {Error} listing every invalid key.
 *
 * @example
 * ```ts
 * const config = await loadCollectionsConfig({
 *   sources: [new EnvSource(), new ObjectSource({ VECTOR_GROWTH_FACTOR: 2 })],
 * })
 * ```
 */
export async function loadCollectionsConfig({
  sources,
}: LoadCollectionsConfigOptions = {}): Promise<Readonly<CollectionsConfig>> {
  const merged: Record<string, unknown> = {}

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) merged[key] = value
    }
  }

  return parseCollectionsConfig(merged)
}

/** Validate already merged values, filling in defaults. */
export function parseCollectionsConfig(values: Record<string, unknown>): Readonly<CollectionsConfig> {
  const result = collectionsConfigSchema.safeParse(values)

  if (!result.success) {
    throw new Error(`Configuration validation failed:\n${z.prettifyError(result.error)}`)
  }

  return Object.freeze(result.data)
}
