/**
 * Relationship Plan
 *
 * Turns dirty associations into relationship writes and deletions. Both sides
 * of a relationship may be dirty; their contributions are merged per edge
 * `(type, from, to)` so each relationship is written once.
 */

import type { AssociationCollection, LinkRecord } from "../collections"
import type { Entity } from "../entity"
import type { DirtyRecord } from "../session/change-tracker"
import type { PropertyMap, RelationshipHandle } from "../store/types"
import { assignOrdinals } from "./ordinals"

export interface Endpoints {
  readonly type: string
  readonly from: Entity
  readonly to: Entity
}

/**
 * A relationship to create, possibly replacing an existing one.
 */
export interface EdgeWrite extends Endpoints {
  /** Persisted relationship, deleted once its replacement exists */
  existing: LinkRecord | undefined
  /** Requested relationship properties */
  properties: PropertyMap
  /** Ordinal key -> position */
  ordinals: Record<string, number>
  /** Ordinal keys positioned after the last persisted member, resolved against the store */
  appendTo: Array<{ key: string; owner: Entity; append: number }>
  /** Whether the relationship must be (re)created */
  write: boolean
}

export interface RelationshipPlan {
  writes: Map<string, EdgeWrite>
  /** Known relationships to delete */
  deletes: Map<RelationshipHandle, Endpoints>
  /** Relationships to delete that unloaded collections know by endpoints only */
  lookups: Map<string, Endpoints>
}

function endpoints(collection: AssociationCollection, member: Entity): Endpoints {
  const { descriptor, owner } = collection
  return descriptor.direction === "out"
    ? { type: descriptor.edgeType, from: owner, to: member }
    : { type: descriptor.edgeType, from: member, to: owner }
}

export function edgeKey(edge: Endpoints): string {
  return `${edge.type}|${edge.from.key}|${edge.to.key}`
}

/**
 * Ordinal currently persisted on a relationship.
 */
function ordinalOf(record: LinkRecord | undefined, key: string): number | undefined {
  const value = record?.properties[key]
  return typeof value === "number" ? value : undefined
}

function samePropertyValues(requested: PropertyMap, persisted: PropertyMap): boolean {
  return Object.entries(requested).every(([key, value]) => {
    const current = persisted[key]
    if (value instanceof Date && current instanceof Date) return value.getTime() === current.getTime()
    return current === value
  })
}

export function buildPlan(snapshot: ReadonlyMap<Entity, DirtyRecord>): RelationshipPlan {
  const plan: RelationshipPlan = { writes: new Map(), deletes: new Map(), lookups: new Map() }

  const entry = (edge: Endpoints): EdgeWrite => {
    const key = edgeKey(edge)
    let write = plan.writes.get(key)
    if (!write) {
      write = {
        ...edge,
        existing: undefined,
        properties: {},
        ordinals: {},
        appendTo: [],
        write: false,
      }
      plan.writes.set(key, write)
    }
    return write
  }

  for (const [entity, record] of snapshot) {
    const lifecycle = entity.lifecycleState
    if (lifecycle === "deleted" || lifecycle === "detached") continue

    for (const name of record.associations) {
      const collection = entity.peekAssociation(name)
      if (!collection) continue

      if (collection.loaded) {
        contributeLoaded(collection, entry, plan)
      } else {
        contributePending(collection, entry, plan)
      }
    }
  }

  return plan
}

function contributeLoaded(
  collection: AssociationCollection,
  entry: (edge: Endpoints) => EdgeWrite,
  plan: RelationshipPlan,
): void {
  const { descriptor } = collection
  const desired = collection.desired()
  const persisted = collection.persisted()

  const ordinals =
    collection.variant === "list"
      ? assignOrdinals(
          desired.map(({ entity }) => ordinalOf(persisted.get(entity), descriptor.ordinalKey)),
        )
      : undefined

  desired.forEach(({ entity, properties }, index) => {
    const edge = endpoints(collection, entity)
    const write = entry(edge)
    const record = persisted.get(entity)

    if (record) {
      write.existing ??= record
      if (!samePropertyValues(properties, record.properties)) write.write = true
    } else {
      write.write = true
    }
    Object.assign(write.properties, properties)

    const ordinal = ordinals?.[index]
    if (ordinal !== undefined) {
      write.ordinals[descriptor.ordinalKey] = ordinal
      if (ordinalOf(record, descriptor.ordinalKey) !== ordinal) write.write = true
    }
  })

  const kept = new Set(desired.map(({ entity }) => entity))
  for (const [entity, record] of persisted) {
    if (!kept.has(entity)) plan.deletes.set(record.handle, endpoints(collection, entity))
  }
  for (const [handle, entity] of collection.superseded()) {
    plan.deletes.set(handle, endpoints(collection, entity))
  }
}

function contributePending(
  collection: AssociationCollection,
  entry: (edge: Endpoints) => EdgeWrite,
  plan: RelationshipPlan,
): void {
  const { added, removed } = collection.pending()

  let append = 0
  for (const [entity, properties] of added) {
    const write = entry(endpoints(collection, entity))
    write.write = true
    Object.assign(write.properties, properties)
    if (collection.variant === "list") {
      append++
      write.appendTo.push({
        key: collection.descriptor.ordinalKey,
        owner: collection.owner,
        append,
      })
    }
  }

  for (const entity of removed) {
    const edge = endpoints(collection, entity)
    plan.lookups.set(edgeKey(edge), edge)
  }
}
