/**
 * Change Tracker
 *
 * Records, per entity, which properties and associations changed since the
 * last commit. Bookkeeping is weak: a record never keeps its entity alive, and
 * records of collected entities are dropped.
 */

import type { Entity } from "../entity"

export type AttributeKind = "property" | "association"

/**
 * Unsaved changes of one entity.
 */
export interface DirtyRecord {
  /** The entity has no node yet */
  readonly created: boolean
  /** Deletion of the node is staged */
  readonly removed: boolean
  readonly properties: ReadonlySet<string>
  readonly associations: ReadonlySet<string>
}

interface MutableRecord {
  created: boolean
  removed: boolean
  properties: Set<string>
  associations: Set<string>
  ref: WeakRef<Entity> | undefined
}

function isEmpty(record: MutableRecord): boolean {
  return (
    !record.created &&
    !record.removed &&
    record.properties.size === 0 &&
    record.associations.size === 0
  )
}

export class ChangeTracker {
  private readonly records = new WeakMap<Entity, MutableRecord>()
  /** Entities with a non-empty record */
  private readonly dirty = new Set<WeakRef<Entity>>()
  private readonly finalizer = new FinalizationRegistry<WeakRef<Entity>>((ref) => {
    this.dirty.delete(ref)
  })

  /**
   * Start tracking an entity with an empty record.
   */
  track(entity: Entity): void {
    this.recordFor(entity)
  }

  /**
   * Flag an entity that needs a node created.
   */
  markNew(entity: Entity): void {
    const record = this.recordFor(entity)
    record.created = true
    this.enlist(entity, record)
  }

  /**
   * The entity's node exists now; its other changes stay recorded.
   */
  settleCreated(entity: Entity): void {
    const record = this.records.get(entity)
    if (!record) return
    record.created = false
    if (isEmpty(record)) this.delist(record)
  }

  /**
   * Flag an entity whose node is to be deleted.
   */
  markRemoved(entity: Entity): void {
    const record = this.recordFor(entity)
    record.removed = true
    this.enlist(entity, record)
  }

  /**
   * Record a changed attribute. Marking twice records it once.
   */
  markDirty(entity: Entity, attribute: string, kind: AttributeKind): void {
    const record = this.recordFor(entity)
    if (kind === "property") {
      record.properties.add(attribute)
    } else {
      record.associations.add(attribute)
    }
    this.enlist(entity, record)
  }

  isDirty(entity: Entity): boolean {
    const record = this.records.get(entity)
    return record !== undefined && !isEmpty(record)
  }

  recordOf(entity: Entity): DirtyRecord | undefined {
    const record = this.records.get(entity)
    if (!record) return undefined
    return {
      created: record.created,
      removed: record.removed,
      properties: new Set(record.properties),
      associations: new Set(record.associations),
    }
  }

  /**
   * Dirty entities still alive, with a copy of their records.
   */
  snapshot(): Map<Entity, DirtyRecord> {
    const result = new Map<Entity, DirtyRecord>()
    for (const ref of this.dirty) {
      const entity = ref.deref()
      const record = entity ? this.recordOf(entity) : undefined
      if (entity && record) result.set(entity, record)
    }
    return result
  }

  /**
   * Empty the record of an entity.
   */
  clear(entity: Entity): void {
    const record = this.records.get(entity)
    if (!record) return
    record.created = false
    record.removed = false
    record.properties.clear()
    record.associations.clear()
    this.delist(record)
  }

  /**
   * Forget an entity entirely.
   */
  forget(entity: Entity): void {
    const record = this.records.get(entity)
    if (!record) return
    this.delist(record)
    this.records.delete(entity)
  }

  clearAll(): void {
    for (const ref of Array.from(this.dirty)) {
      const entity = ref.deref()
      if (entity) this.clear(entity)
    }
    this.dirty.clear()
  }

  /** Number of dirty entities not yet collected */
  get size(): number {
    return this.dirty.size
  }

  private recordFor(entity: Entity): MutableRecord {
    let record = this.records.get(entity)
    if (!record) {
      record = {
        created: false,
        removed: false,
        properties: new Set(),
        associations: new Set(),
        ref: undefined,
      }
      this.records.set(entity, record)
    }
    return record
  }

  private enlist(entity: Entity, record: MutableRecord): void {
    if (record.ref) return
    const ref = new WeakRef(entity)
    record.ref = ref
    this.dirty.add(ref)
    this.finalizer.register(entity, ref, ref)
  }

  private delist(record: MutableRecord): void {
    if (!record.ref) return
    this.dirty.delete(record.ref)
    this.finalizer.unregister(record.ref)
    record.ref = undefined
  }
}
