/**
 * Schema Type Inference Utilities
 *
 * Types extracting property and association shapes from a schema, inherited
 * attributes included. They give sessions and entities their typed surface.
 */

import { type z } from "zod"
import type { Scalar } from "../store/types"
import type {
  AssociationCollection,
  OrderedList,
  SingleReference,
  UnorderedSet,
} from "../collections"
import type { AnySchema, EntityDefinition, RelationshipDefinition } from "./types"

// =============================================================================
// TYPE NAMES
// =============================================================================

/**
 * Extract all entity type names from a schema.
 *
 * @example
 * EntityTypes<typeof schema> // 'Metadata' | 'Series' | 'Episode'
 */
export type EntityTypes<S extends AnySchema> = keyof S["entities"] & string

/**
 * Parent type of an entity type, `never` for a root type.
 */
export type ParentOf<S extends AnySchema, N extends EntityTypes<S>> =
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  S["entities"][N] extends EntityDefinition<any, any, infer TExtends>
    ? TExtends extends EntityTypes<S>
      ? TExtends
      : never
    : never

// =============================================================================
// PROPERTY EXTRACTION
// =============================================================================

/**
 * Zod shape of all properties of a type, inherited ones included.
 */
export type PropertyShape<S extends AnySchema, N extends EntityTypes<S>> =
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  S["entities"][N] extends EntityDefinition<infer TProps, any, infer TExtends>
    ? TExtends extends EntityTypes<S>
      ? TProps & PropertyShape<S, TExtends>
      : TProps
    : never

/**
 * Property values as read from and written to an entity.
 * Every property may be unset, as on a partially loaded node.
 *
 * @example
 * EntityProps<typeof schema, 'Episode'> // { season?: number | null; title?: string | null; ... }
 */
export type EntityProps<S extends AnySchema, N extends string> = string extends N
  ? Record<string, Scalar | null | undefined>
  : N extends EntityTypes<S>
    ? {
        [K in keyof PropertyShape<S, N>]?:
          | (PropertyShape<S, N>[K] extends z.ZodTypeAny ? z.output<PropertyShape<S, N>[K]> : never)
          | null
      }
    : never

/**
 * Input accepted when creating an entity: required properties must be given,
 * properties with defaults may be omitted.
 */
export type EntityInput<S extends AnySchema, N extends EntityTypes<S>> =
  PropertyShape<S, N> extends infer TShape extends z.ZodRawShape
    ? z.input<z.ZodObject<TShape>>
    : never

// =============================================================================
// ASSOCIATION EXTRACTION
// =============================================================================

/**
 * Relationship definitions of a type, inherited ones included.
 */
export type RelationshipShape<S extends AnySchema, N extends EntityTypes<S>> =
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  S["entities"][N] extends EntityDefinition<any, infer TRels, infer TExtends>
    ? TExtends extends EntityTypes<S>
      ? TRels & RelationshipShape<S, TExtends>
      : TRels
    : never

/**
 * Collection class backing a relationship definition.
 */
export type CollectionFor<S extends AnySchema, R> =
  R extends RelationshipDefinition<infer TTarget, infer TVariant>
    ? TTarget extends EntityTypes<S>
      ? TVariant extends "single"
        ? SingleReference<S, TTarget>
        : TVariant extends "list"
          ? OrderedList<S, TTarget>
          : UnorderedSet<S, TTarget>
      : never
    : never

/**
 * Association collections of an entity, keyed by relationship name.
 *
 * @example
 * EntityAssociations<typeof schema, 'Series'>['episodes'] // OrderedList<typeof schema, 'Episode'>
 */
export type EntityAssociations<S extends AnySchema, N extends string> = string extends N
  ? Readonly<Record<string, AssociationCollection<S>>>
  : N extends EntityTypes<S>
    ? { readonly [K in keyof RelationshipShape<S, N>]: CollectionFor<S, RelationshipShape<S, N>[K]> }
    : never

/**
 * Relationship names of a type.
 */
export type AssociationNames<S extends AnySchema, N extends EntityTypes<S>> =
  keyof RelationshipShape<S, N> & string
