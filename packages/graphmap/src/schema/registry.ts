/**
 * Schema Registry
 *
 * Validates entity declarations once and compiles them into lookup tables the
 * rest of the mapper consults at runtime.
 */

import { z } from "zod"
import { SchemaError } from "../errors"
import type {
  EntityDefinition,
  EntityDescriptor,
  PropertyDescriptor,
  RelationshipDescriptor,
  RelationshipDefinition,
  ScalarKind,
  AssociationVariant,
} from "./types"

// =============================================================================
// DECLARATION SHAPE
// =============================================================================

const relationshipShape = z.object({
  _type: z.literal("relationship"),
  target: z.string().min(1),
  variant: z.enum(["single", "list", "set"]),
  direction: z.enum(["out", "in"]),
  inverse: z.string().min(1).optional(),
  type: z.string().min(1).optional(),
  cascade: z.enum(["restrict", "unlink"]),
})

const entityShape = z.object({
  _type: z.literal("entity"),
  label: z.string().min(1).optional(),
  extends: z.string().min(1).optional(),
  properties: z.record(
    z.custom<z.ZodTypeAny>((value) => value instanceof z.ZodType, "must be a zod schema"),
  ),
  keys: z.record(z.string().min(1)),
  relationships: z.record(relationshipShape),
  unique: z.array(z.string()),
})

// =============================================================================
// SCALAR KINDS
// =============================================================================

/**
 * Derive the scalar kind of a property schema, looking through wrappers.
 */
export function scalarKindOf(schema: z.ZodTypeAny): ScalarKind | undefined {
  if (schema instanceof z.ZodString || schema instanceof z.ZodEnum) return "string"
  if (schema instanceof z.ZodNumber) return "number"
  if (schema instanceof z.ZodBoolean) return "boolean"
  if (schema instanceof z.ZodDate) return "date"
  if (schema instanceof z.ZodOptional || schema instanceof z.ZodNullable) {
    return scalarKindOf(schema.unwrap())
  }
  if (schema instanceof z.ZodDefault) return scalarKindOf(schema.removeDefault())
  if (schema instanceof z.ZodEffects) return scalarKindOf(schema.innerType())
  return undefined
}

function variantsMirror(a: AssociationVariant, b: AssociationVariant): boolean {
  if (a === "single" || b === "single") return true
  return a === b
}

function edgeKey(edgeType: string, direction: string): string {
  return `${edgeType}:${direction}`
}

// =============================================================================
// REGISTRY
// =============================================================================

/**
 * Compiled, read-only view of a schema.
 */
export class SchemaRegistry {
  private readonly byLabelIndex = new Map<string, EntityDescriptor>()

  constructor(private readonly descriptors: ReadonlyMap<string, EntityDescriptor>) {
    for (const descriptor of descriptors.values()) {
      this.byLabelIndex.set(descriptor.label, descriptor)
    }
  }

  /**
   * Get the descriptor of an entity type.
   */
  descriptor(type: string): EntityDescriptor {
    const descriptor = this.descriptors.get(type)
    if (!descriptor) {
      throw new SchemaError(`Unknown entity type '${type}'`, type)
    }
    return descriptor
  }

  has(type: string): boolean {
    return this.descriptors.has(type)
  }

  /**
   * Get the entity type mapped to a graph label.
   */
  byLabel(label: string): EntityDescriptor | undefined {
    return this.byLabelIndex.get(label)
  }

  types(): string[] {
    return Array.from(this.descriptors.keys())
  }

  /**
   * Whether an entity of type `actual` may stand where `expected` is declared.
   */
  isAssignable(actual: string, expected: string): boolean {
    const descriptor = this.descriptors.get(actual)
    return descriptor !== undefined && descriptor.ancestry.includes(expected)
  }

  /**
   * The type and all types deriving from it.
   */
  subtypes(type: string): EntityDescriptor[] {
    return Array.from(this.descriptors.values()).filter((d) => d.ancestry.includes(type))
  }

  /**
   * The relationship on the target type mirroring `rel`, if declared.
   */
  inverseOf(rel: RelationshipDescriptor): RelationshipDescriptor | undefined {
    if (rel.inverse === undefined) return undefined
    return this.descriptor(rel.target).relationships.get(rel.inverse)
  }
}

// =============================================================================
// COMPILATION
// =============================================================================

interface Draft {
  name: string
  definition: EntityDefinition
  parent: Draft | undefined
  ancestry: string[]
  properties: Map<string, PropertyDescriptor>
  propertiesByKey: Map<string, PropertyDescriptor>
  relationships: Map<string, RelationshipDescriptor>
  own: Map<string, RelationshipDefinition>
}

/**
 * Validate entity definitions and compile a registry.
 *
 * @throws SchemaError
 */
export function compileSchema(entities: Record<string, EntityDefinition>): SchemaRegistry {
  for (const [name, definition] of Object.entries(entities)) {
    const parsed = entityShape.safeParse(definition)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const where = issue ? issue.path.join(".") : ""
      throw new SchemaError(
        `Invalid declaration of '${name}'${where ? ` at ${where}` : ""}: ${issue?.message ?? "unknown issue"}`,
        name,
      )
    }
  }

  const ancestry = resolveAncestry(entities)

  const labels = new Map<string, string>()
  for (const [name, definition] of Object.entries(entities)) {
    const label = definition.label ?? name
    const other = labels.get(label)
    if (other !== undefined) {
      throw new SchemaError(`Entity types '${other}' and '${name}' share the label '${label}'`, name)
    }
    labels.set(label, name)
  }

  // Parents first, so inherited attributes are already compiled
  const order = Object.keys(entities).sort(
    (a, b) => (ancestry.get(a)?.length ?? 0) - (ancestry.get(b)?.length ?? 0),
  )

  const drafts = new Map<string, Draft>()
  for (const name of order) {
    const definition = entities[name]
    const chain = ancestry.get(name)
    if (!definition || !chain) continue
    const parent = definition.extends !== undefined ? drafts.get(definition.extends) : undefined
    drafts.set(name, compileAttributes(name, definition, chain, parent, entities))
  }

  for (const name of order) {
    const draft = drafts.get(name)
    if (draft) compileRelationships(draft, drafts)
  }

  const registry = new SchemaRegistry(
    new Map(
      order.flatMap((name) => {
        const draft = drafts.get(name)
        return draft ? [[name, finalize(draft)] as const] : []
      }),
    ),
  )

  for (const draft of drafts.values()) {
    validateInverses(draft, registry)
  }
  for (const type of order) {
    validateFarEnds(registry.descriptor(type), registry)
  }

  return registry
}

function resolveAncestry(entities: Record<string, EntityDefinition>): Map<string, string[]> {
  const result = new Map<string, string[]>()

  for (const name of Object.keys(entities)) {
    const chain: string[] = []
    let current: string | undefined = name

    while (current !== undefined) {
      if (chain.includes(current)) {
        throw new SchemaError(`Inheritance cycle through '${current}'`, name)
      }
      const definition: EntityDefinition | undefined = entities[current]
      if (!definition) {
        throw new SchemaError(
          `'${chain[chain.length - 1] ?? name}' extends unknown entity type '${current}'`,
          name,
        )
      }
      chain.push(current)
      current = definition.extends
    }

    result.set(name, chain)
  }

  return result
}

function compileAttributes(
  name: string,
  definition: EntityDefinition,
  ancestry: string[],
  parent: Draft | undefined,
  entities: Record<string, EntityDefinition>,
): Draft {
  const properties = new Map(parent?.properties)
  const propertiesByKey = new Map(parent?.propertiesByKey)
  const relationships = new Map<string, RelationshipDescriptor>()

  // Inherited relationships are compiled later; their names are known now
  const inherited = new Set<string>()
  for (let ancestor = parent; ancestor; ancestor = ancestor.parent) {
    for (const attribute of ancestor.own.keys()) inherited.add(attribute)
  }
  const taken = (attribute: string) => properties.has(attribute) || inherited.has(attribute)

  for (const [attribute, schema] of Object.entries(definition.properties)) {
    if (taken(attribute)) {
      throw new SchemaError(`'${name}.${attribute}' is already declared`, name, attribute)
    }

    const kind = scalarKindOf(schema)
    if (!kind) {
      throw new SchemaError(
        `'${name}.${attribute}' must be a string, number, boolean or date property`,
        name,
        attribute,
      )
    }

    const key = definition.keys[attribute] ?? attribute
    const collision = propertiesByKey.get(key)
    if (collision) {
      throw new SchemaError(
        `'${name}.${attribute}' and '${collision.owner}.${collision.name}' both map to graph property '${key}'`,
        name,
        attribute,
      )
    }

    const descriptor: PropertyDescriptor = { name: attribute, key, kind, schema, owner: name }
    properties.set(attribute, descriptor)
    propertiesByKey.set(key, descriptor)
  }

  for (const attribute of Object.keys(definition.keys)) {
    if (!(attribute in definition.properties)) {
      throw new SchemaError(`'${name}' maps unknown property '${attribute}'`, name, attribute)
    }
  }

  const own = new Map<string, RelationshipDefinition>()
  for (const [attribute, rel] of Object.entries(definition.relationships)) {
    if (taken(attribute)) {
      throw new SchemaError(`'${name}.${attribute}' is already declared`, name, attribute)
    }
    if (!entities[rel.target]) {
      throw new SchemaError(
        `'${name}.${attribute}' targets unknown entity type '${rel.target}'`,
        name,
        attribute,
      )
    }
    own.set(attribute, rel)
  }

  for (const attribute of definition.unique) {
    if (!properties.has(attribute)) {
      throw new SchemaError(`'${name}' declares unknown unique property '${attribute}'`, name, attribute)
    }
  }

  return { name, definition, parent, ancestry, properties, propertiesByKey, relationships, own }
}

function compileRelationships(draft: Draft, drafts: Map<string, Draft>): void {
  for (const [attribute, rel] of draft.own) {
    draft.relationships.set(attribute, {
      name: attribute,
      owner: draft.name,
      target: rel.target,
      variant: rel.variant,
      direction: rel.direction,
      edgeType: resolveEdgeType(attribute, rel, drafts),
      inverse: rel.inverse,
      cascade: rel.cascade,
      ordinalKey: `_ordinal_${rel.direction}`,
    })
  }

  // Inherited relationships were compiled on the parent draft
  const parent = draft.definition.extends !== undefined ? drafts.get(draft.definition.extends) : undefined
  if (parent) {
    for (const [attribute, descriptor] of parent.relationships) {
      if (!draft.relationships.has(attribute)) draft.relationships.set(attribute, descriptor)
    }
  }
}

function resolveEdgeType(
  attribute: string,
  rel: RelationshipDefinition,
  drafts: Map<string, Draft>,
): string {
  if (rel.type !== undefined) return rel.type
  if (rel.direction === "out" || rel.inverse === undefined) return attribute

  const inverse = findOwnRelationship(rel.target, rel.inverse, drafts)
  if (inverse && inverse.direction === "out") {
    return inverse.type ?? rel.inverse
  }
  return attribute
}

function findOwnRelationship(
  type: string,
  attribute: string,
  drafts: Map<string, Draft>,
): RelationshipDefinition | undefined {
  let draft = drafts.get(type)
  while (draft) {
    const rel = draft.own.get(attribute)
    if (rel) return rel
    draft = draft.definition.extends !== undefined ? drafts.get(draft.definition.extends) : undefined
  }
  return undefined
}

function finalize(draft: Draft): EntityDescriptor {
  const relationshipsByEdge = new Map<string, RelationshipDescriptor>()
  for (const rel of draft.relationships.values()) {
    const key = edgeKey(rel.edgeType, rel.direction)
    const other = relationshipsByEdge.get(key)
    if (other) {
      throw new SchemaError(
        `'${draft.name}.${rel.name}' and '${draft.name}.${other.name}' both map to ${rel.direction} edges of type '${rel.edgeType}'`,
        draft.name,
        rel.name,
      )
    }
    relationshipsByEdge.set(key, rel)
  }

  const shape: z.ZodRawShape = {}
  for (const property of draft.properties.values()) {
    shape[property.name] = property.schema
  }

  return {
    name: draft.name,
    label: draft.definition.label ?? draft.name,
    parent: draft.definition.extends,
    ancestry: draft.ancestry,
    properties: draft.properties,
    propertiesByKey: draft.propertiesByKey,
    relationships: draft.relationships,
    relationshipsByEdge,
    input: z.object(shape),
    unique: draft.definition.unique,
  }
}

function validateInverses(draft: Draft, registry: SchemaRegistry): void {
  for (const attribute of draft.own.keys()) {
    const rel = draft.relationships.get(attribute)
    if (!rel || rel.inverse === undefined) continue

    const where = `'${draft.name}.${attribute}'`
    const target = registry.descriptor(rel.target)
    const inverse = target.relationships.get(rel.inverse)

    if (!inverse) {
      throw new SchemaError(
        `${where} declares inverse '${rel.inverse}', which does not exist on '${rel.target}'`,
        draft.name,
        attribute,
      )
    }
    if (inverse === rel) {
      throw new SchemaError(`${where} cannot be its own inverse`, draft.name, attribute)
    }
    if (inverse.inverse !== attribute) {
      throw new SchemaError(
        `${where} and '${inverse.owner}.${inverse.name}' do not name each other as inverses`,
        draft.name,
        attribute,
      )
    }
    if (!registry.isAssignable(draft.name, inverse.target)) {
      throw new SchemaError(
        `${where}: inverse '${inverse.owner}.${inverse.name}' targets '${inverse.target}', not '${draft.name}'`,
        draft.name,
        attribute,
      )
    }
    if (inverse.direction === rel.direction) {
      throw new SchemaError(
        `${where} and its inverse must have opposite directions`,
        draft.name,
        attribute,
      )
    }
    if (inverse.edgeType !== rel.edgeType) {
      throw new SchemaError(
        `${where} maps to edge type '${rel.edgeType}' but its inverse maps to '${inverse.edgeType}'`,
        draft.name,
        attribute,
      )
    }
    if (!variantsMirror(rel.variant, inverse.variant)) {
      throw new SchemaError(
        `${where} is a ${rel.variant} but its inverse is a ${inverse.variant}; many-to-many sides must both be lists or both be sets`,
        draft.name,
        attribute,
      )
    }
  }
}

/**
 * A relationship's far end may only see its edges through the declared inverse.
 */
function validateFarEnds(descriptor: EntityDescriptor, registry: SchemaRegistry): void {
  for (const rel of descriptor.relationships.values()) {
    if (rel.owner !== descriptor.name) continue
    const inverse = registry.inverseOf(rel)
    const opposite = rel.direction === "out" ? "in" : "out"

    for (const target of registry.subtypes(rel.target)) {
      const other = target.relationshipsByEdge.get(edgeKey(rel.edgeType, opposite))
      if (!other || (inverse && other.owner === inverse.owner && other.name === inverse.name)) continue
      throw new SchemaError(
        `'${descriptor.name}.${rel.name}' and '${other.owner}.${other.name}' share edge type '${rel.edgeType}' ` +
          `from opposite ends but are not declared inverses`,
        descriptor.name,
        rel.name,
      )
    }
  }
}
