/**
 * Schema Module
 *
 * Entity and relationship declarations, their compiled registry, and the
 * types inferred from them.
 */

export { entity, relationship, defineSchema } from "./builders"
export type { EntityConfig, RelationshipConfig, SchemaConfig } from "./builders"
export { SchemaRegistry, compileSchema, scalarKindOf } from "./registry"
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
} from "./types"
export type {
  EntityTypes,
  ParentOf,
  PropertyShape,
  EntityProps,
  EntityInput,
  RelationshipShape,
  CollectionFor,
  EntityAssociations,
  AssociationNames,
} from "./inference"
