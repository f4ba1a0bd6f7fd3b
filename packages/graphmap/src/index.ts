/**
 * graphmap - Object-Graph Mapper
 *
 * Plain in-memory entities backed by the nodes and relationships of a property
 * graph. A session keeps one entity per node, tracks what changed, keeps both
 * sides of every association in step, and commits the minimal set of graph
 * operations to a store.
 *
 * @example
 * ```typescript
 * import { defineSchema, entity, relationship, openSession } from 'graphmap'
 * import { MemoryGraphStore } from 'graphmap-memory'
 * import { z } from 'zod'
 *
 * const schema = defineSchema({
 *   entities: {
 *     Series: entity({
 *       properties: { title: z.string() },
 *       relationships: {
 *         episodes: relationship({ target: 'Episode', variant: 'list', direction: 'in', inverse: 'series' }),
 *       },
 *     }),
 *     Episode: entity({
 *       properties: { season: z.number().int(), episodeNumber: z.number().int() },
 *       relationships: {
 *         series: relationship({ target: 'Series', variant: 'single', inverse: 'episodes' }),
 *       },
 *     }),
 *   },
 * })
 *
 * const session = openSession(schema, new MemoryGraphStore())
 * const series = session.create('Series', { title: 'The Expanse' })
 * series.assoc.episodes.append(session.create('Episode', { season: 1, episodeNumber: 1 }))
 * await session.commit()
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// SCHEMA
// =============================================================================

export { defineSchema, entity, relationship, SchemaRegistry, compileSchema, scalarKindOf } from "./schema"
export type {
  SchemaDefinition,
  AnySchema,
  EntityDefinition,
  RelationshipDefinition,
  AssociationVariant,
  CascadePolicy,
  ScalarKind,
  PropertyDescriptor,
  RelationshipDescriptor,
  EntityDescriptor,
  EntityConfig,
  RelationshipConfig,
  SchemaConfig,
  EntityTypes,
  EntityProps,
  EntityInput,
  EntityAssociations,
  AssociationNames,
} from "./schema"

// =============================================================================
// SESSION
// =============================================================================

export { Session, openSession, ChangeTracker, IdentityMap } from "./session"
export type { SessionConfig, CommitResult, DirtyRecord, EntityFilter } from "./session"

export { Entity } from "./entity"
export type { EntityOf, EntityState } from "./entity"

export { AssociationCollection, SingleReference, OrderedList, UnorderedSet } from "./collections"
export type { LinkRecord } from "./collections"

export { SyncEngine, assignOrdinals, longestIncreasingRun } from "./sync"

// =============================================================================
// STORES
// =============================================================================

export * from "./store"

// =============================================================================
// ERRORS
// =============================================================================

export {
  GraphMapError,
  SchemaError,
  TypeMismatchError,
  ReferentialError,
  DetachedEntityError,
  StoreUnavailableError,
  StoreTimeoutError,
  NodeNotFoundError,
  NotLoadedError,
  DuplicateLinkError,
  SessionStateError,
} from "./errors"

// =============================================================================
// UTILITIES
// =============================================================================

export { consoleLogger, noopLogger } from "./utils"
export type { Logger } from "./utils"
