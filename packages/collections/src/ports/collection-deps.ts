import type { Logger } from "@tessera/logger"
import type { CapacityPolicy } from "./capacity-policy"

/**
 * Collaborators every structure accepts.
 *
 * Omitted members fall back to the structure's own policy and a
 * `NullLogger`.
 */
export type CollectionDeps = Readonly<{
  policy?: CapacityPolicy
  logger?: Logger
}>

export type ResolvedCollectionDeps = Required<CollectionDeps>
