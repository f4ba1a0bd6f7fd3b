/**
 * Schema Builder Functions
 *
 * Declarative API for mapping entity types onto a graph, with full type inference.
 */

import { type z } from "zod"
import type { Direction } from "../store/types"
import type {
  SchemaDefinition,
  EntityDefinition,
  RelationshipDefinition,
  AssociationVariant,
  CascadePolicy,
} from "./types"
import { compileSchema } from "./registry"

// =============================================================================
// RELATIONSHIP BUILDER
// =============================================================================

/**
 * Configuration options for a relationship attribute.
 */
export interface RelationshipConfig<TTarget extends string, TVariant extends AssociationVariant> {
  /** Target entity type */
  target: TTarget

  /**
   * Cardinality variant of this side. Required: a one-to-many side must say
   * whether it is an ordered 'list' or an unordered 'set'.
   */
  variant: TVariant

  /** 'out' (default) when the owner is the edge's source */
  direction?: Direction

  /** Mirrored relationship on the target type */
  inverse?: string

  /** Edge type override */
  type?: string

  /** Deletion behavior, 'restrict' by default */
  cascade?: CascadePolicy

  description?: string
}

/**
 * Creates a relationship definition.
 *
 * @example
 * ```typescript
 * // Episode -[series]-> Series, read back from the series as an ordered list
 * const series = relationship({ target: 'Series', variant: 'single', inverse: 'episodes' })
 * const episodes = relationship({
 *   target: 'Episode',
 *   variant: 'list',
 *   direction: 'in',
 *   inverse: 'series',
 * })
 * ```
 */
export function relationship<TTarget extends string, TVariant extends AssociationVariant>(
  config: RelationshipConfig<TTarget, TVariant>,
): RelationshipDefinition<TTarget, TVariant> {
  return {
    _type: "relationship",
    target: config.target,
    variant: config.variant,
    direction: config.direction ?? "out",
    inverse: config.inverse,
    type: config.type,
    cascade: config.cascade ?? "restrict",
    description: config.description,
  }
}

// =============================================================================
// ENTITY BUILDER
// =============================================================================

/**
 * Configuration options for an entity type.
 */
export interface EntityConfig<
  TProps extends z.ZodRawShape,
  TRels extends Record<string, RelationshipDefinition>,
  TExtends extends string | undefined,
> {
  /** Graph label, the entity type name by default */
  label?: string

  /** Parent entity type */
  extends?: TExtends

  /**
   * Zod shape of the properties. Each must be a string, number, boolean or
   * date schema, optionally wrapped (optional, nullable, default, refinements).
   */
  properties: TProps

  /** Graph property names that differ from attribute names */
  keys?: Partial<Record<keyof TProps & string, string>>

  relationships?: TRels

  /** Attributes identifying an entity for findOrCreate */
  unique?: string[]

  description?: string
}

/**
 * Creates an entity definition.
 *
 * @example
 * ```typescript
 * const Episode = entity({
 *   extends: 'Metadata',
 *   properties: {
 *     season: z.number().int(),
 *     episodeNumber: z.number().int(),
 *     title: z.string().optional(),
 *   },
 *   relationships: {
 *     series: relationship({ target: 'Series', variant: 'single', inverse: 'episodes' }),
 *   },
 *   unique: ['season', 'episodeNumber'],
 * })
 * ```
 */
export function entity<
  TProps extends z.ZodRawShape,
  TRels extends Record<string, RelationshipDefinition> = Record<never, RelationshipDefinition>,
  TExtends extends string | undefined = undefined,
>(config: EntityConfig<TProps, TRels, TExtends>): EntityDefinition<TProps, TRels, TExtends> {
  const keys: Record<string, string> = {}
  for (const [name, key] of Object.entries(config.keys ?? {})) {
    if (typeof key === "string") keys[name] = key
  }

  return {
    _type: "entity",
    label: config.label,
    extends: config.extends as TExtends,
    properties: config.properties,
    keys,
    relationships: config.relationships ?? ({} as TRels),
    unique: config.unique ?? [],
    description: config.description,
  }
}

// =============================================================================
// SCHEMA BUILDER
// =============================================================================

/**
 * Configuration for schema definition.
 */
export interface SchemaConfig<
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  TEntities extends Record<string, EntityDefinition<any, any, any>>,
> {
  entities: TEntities
  version?: string
  meta?: {
    name?: string
    description?: string
  }
}

/**
 * Creates a complete schema definition and compiles its lookup tables.
 *
 * Validation happens here, once; mapping operations never re-validate.
 * Throws SchemaError on any contradiction (unknown targets, colliding
 * attributes or graph keys, inverses that do not mirror each other, ...).
 *
 * @example
 * ```typescript
 * const schema = defineSchema({
 *   entities: {
 *     Series: entity({ ... }),
 *     Episode: entity({ ... }),
 *   },
 * })
 * ```
 */
export function defineSchema<
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  TEntities extends Record<string, EntityDefinition<any, any, any>>,
>(config: SchemaConfig<TEntities>): SchemaDefinition<TEntities> {
  return {
    entities: config.entities,
    registry: compileSchema(config.entities),
    version: config.version,
    meta: config.meta,
  }
}
