/**
 * Session Types
 */

import type { Entity } from "../entity"
import type { SchemaRegistry } from "../schema/registry"
import type { GraphStore, NodeHandle } from "../store/types"
import type { Logger } from "../utils/logger"
import type { ChangeTracker } from "./change-tracker"
import type { IdentityMap } from "./identity-map"

/**
 * Session configuration.
 */
export interface SessionConfig {
  /** Defaults to a logger that discards everything */
  logger?: Logger
}

/**
 * What entities and collections see of their session.
 * @internal
 */
export interface UnitOfWork {
  readonly registry: SchemaRegistry
  readonly store: GraphStore
  readonly tracker: ChangeTracker
  readonly identityMap: IdentityMap
  readonly logger: Logger

  /** Resolve a handle through the identity map. */
  resolve(handle: NodeHandle): Promise<Entity>

  /** Throw unless the session accepts changes right now. */
  assertMutable(): void
}

/**
 * Counts of the store operations a commit issued.
 */
export interface CommitResult {
  created: number
  updated: number
  deleted: number
  linked: number
  unlinked: number
}
