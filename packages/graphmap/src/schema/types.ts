/**
 * Core Schema Type Definitions
 *
 * These types define how application entity types map onto a property graph.
 * The schema is the "source of truth" for all type inference and for the
 * runtime lookup tables compiled by `defineSchema()`.
 */

import { type z } from "zod"
import type { Direction } from "../store/types"
import type { SchemaRegistry } from "./registry"

// =============================================================================
// PROPERTY TYPES
// =============================================================================

/**
 * Scalar kinds a mapped property can have.
 */
export type ScalarKind = "string" | "number" | "boolean" | "date"

// =============================================================================
// RELATIONSHIP DEFINITION
// =============================================================================

/**
 * Shape of one side of a relationship.
 * - 'single': zero or one target (one-to-one, many-to-one)
 * - 'list': ordered targets, persisted with an ordinal on the edge
 * - 'set': unordered targets, unique by identity
 */
export type AssociationVariant = "single" | "list" | "set"

/**
 * What a staged deletion does with relationships of this association.
 * - 'restrict': leave them; the store refuses the delete while they exist
 * - 'unlink': delete them right before the node
 */
export type CascadePolicy = "restrict" | "unlink"

/**
 * Definition of one relationship attribute.
 *
 * @template TTarget - Target entity type
 * @template TVariant - Cardinality variant of this side
 */
export interface RelationshipDefinition<
  TTarget extends string = string,
  TVariant extends AssociationVariant = AssociationVariant,
> {
  readonly _type: "relationship"

  /** Target entity type (subtypes are accepted too) */
  readonly target: TTarget

  /** Cardinality variant; never inferred */
  readonly variant: TVariant

  /** Whether the owner is the source ('out') or the target ('in') of the edge */
  readonly direction: Direction

  /** Name of the mirrored relationship on the target type */
  readonly inverse?: string

  /** Edge type; defaults to the relationship name ('out') or the inverse's edge type ('in') */
  readonly type?: string

  readonly cascade: CascadePolicy

  readonly description?: string
}

// =============================================================================
// ENTITY DEFINITION
// =============================================================================

/**
 * Definition of an entity type.
 *
 * @template TProps - Zod shape of the entity's own properties
 * @template TRels - Own relationship attributes
 * @template TExtends - Parent entity type, if any
 */
export interface EntityDefinition<
  TProps extends z.ZodRawShape = z.ZodRawShape,
  TRels extends Record<string, RelationshipDefinition> = Record<string, RelationshipDefinition>,
  TExtends extends string | undefined = string | undefined,
> {
  readonly _type: "entity"

  /** Graph label; defaults to the entity type name */
  readonly label?: string

  /** Parent entity type whose attributes are inherited */
  readonly extends: TExtends

  /** Own properties as a zod shape */
  readonly properties: TProps

  /** Attribute name -> graph property name overrides */
  readonly keys: Readonly<Record<string, string>>

  readonly relationships: TRels

  /** Attributes identifying an entity for findOrCreate */
  readonly unique: readonly string[]

  readonly description?: string
}

// =============================================================================
// SCHEMA DEFINITION
// =============================================================================

/**
 * Complete schema definition.
 *
 * @template TEntities - Record of entity type names to definitions
 */
export interface SchemaDefinition<
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  TEntities extends Record<string, EntityDefinition<any, any, any>> = Record<string, EntityDefinition>,
> {
  /** All entity definitions keyed by type name */
  readonly entities: TEntities

  /** Compiled lookup tables */
  readonly registry: SchemaRegistry

  /** Schema version for migrations */
  readonly version?: string

  readonly meta?: {
    name?: string
    description?: string
  }
}

/**
 * Base type for schema constraints in generic functions and classes.
 *
 * Uses `any` to bypass TypeScript's invariant checking of interface default
 * parameters, so that concrete schemas are assignable to it.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AnySchema = SchemaDefinition<any>

// =============================================================================
// COMPILED DESCRIPTORS
// =============================================================================

export interface PropertyDescriptor {
  /** Attribute name */
  readonly name: string
  /** Graph property name */
  readonly key: string
  readonly kind: ScalarKind
  /** Validator for assigned values */
  readonly schema: z.ZodTypeAny
  /** Entity type that declared it */
  readonly owner: string
}

export interface RelationshipDescriptor {
  readonly name: string
  /** Entity type that declared it */
  readonly owner: string
  readonly target: string
  readonly variant: AssociationVariant
  readonly direction: Direction
  readonly edgeType: string
  readonly inverse?: string
  readonly cascade: CascadePolicy
  /** Edge property holding this side's list position */
  readonly ordinalKey: string
}

export interface EntityDescriptor {
  readonly name: string
  readonly label: string
  readonly parent?: string
  /** The type itself followed by its ancestors, nearest first */
  readonly ancestry: readonly string[]
  readonly properties: ReadonlyMap<string, PropertyDescriptor>
  readonly propertiesByKey: ReadonlyMap<string, PropertyDescriptor>
  readonly relationships: ReadonlyMap<string, RelationshipDescriptor>
  /** Keyed by `${edgeType}:${direction}` */
  readonly relationshipsByEdge: ReadonlyMap<string, RelationshipDescriptor>
  /** Zod object over all properties, for create-time validation */
  readonly input: z.ZodObject<z.ZodRawShape>
  readonly unique: readonly string[]
}
