/**
 * Association Collection Base
 *
 * One side of a typed relationship. Mutations are validated before anything
 * changes, then applied to this side and mirrored onto the inverse side.
 * Nothing here writes to the store: changes are staged and realized by commit.
 *
 * A hydrated entity's collection starts unloaded. Reading it fails until
 * `load()`; mirrored changes arriving meanwhile are kept as pending deltas and
 * merged when the members are fetched.
 */

import type { Entity, EntityOf } from "../entity"
import {
  NotLoadedError,
  SessionStateError,
  TypeMismatchError,
} from "../errors"
import type { AnySchema, AssociationVariant, RelationshipDescriptor } from "../schema/types"
import type { PropertyMap, RelationshipHandle } from "../store/types"

/**
 * A persisted relationship as seen from this side.
 */
export interface LinkRecord {
  readonly handle: RelationshipHandle
  readonly properties: PropertyMap
}

const ORDINAL_PREFIX = "_ordinal_"

export function isOrdinalKey(key: string): boolean {
  return key.startsWith(ORDINAL_PREFIX)
}

export abstract class AssociationCollection<
  S extends AnySchema = AnySchema,
  T extends string = string,
> implements Iterable<EntityOf<S, T>>
{
  abstract readonly variant: AssociationVariant

  /** Members in order, when loaded */
  protected members: Entity[] = []

  /** Edge properties requested for members, ordinals excluded */
  protected readonly requested = new Map<Entity, PropertyMap>()

  /** Persisted links of loaded members */
  protected readonly baseline = new Map<Entity, LinkRecord>()

  /** Superseded relationships still to delete, with their member */
  protected readonly obsolete = new Map<RelationshipHandle, Entity>()

  protected readonly pendingAdded = new Map<Entity, PropertyMap>()
  protected readonly pendingRemoved = new Set<Entity>()

  private isLoaded: boolean
  private loading: Promise<void> | undefined

  constructor(
    readonly owner: Entity,
    readonly descriptor: RelationshipDescriptor,
    loaded: boolean,
  ) {
    this.isLoaded = loaded
  }

  get name(): string {
    return this.descriptor.name
  }

  get loaded(): boolean {
    return this.isLoaded
  }

  get size(): number {
    this.requireLoaded()
    return this.members.length
  }

  has(entity: Entity): boolean {
    this.requireLoaded()
    return this.members.includes(entity)
  }

  toArray(): EntityOf<S, T>[] {
    this.requireLoaded()
    return this.members.map((member) => member as EntityOf<S, T>)
  }

  *[Symbol.iterator](): Iterator<EntityOf<S, T>> {
    this.requireLoaded()
    for (const member of this.members.slice()) {
      yield member as EntityOf<S, T>
    }
  }

  /**
   * Properties of the relationship to a member.
   */
  linkProperties(entity: Entity): PropertyMap | undefined {
    this.requireLoaded()
    if (!this.members.includes(entity)) return undefined
    const persisted = this.baseline.get(entity)?.properties ?? {}
    const result: PropertyMap = {}
    for (const [key, value] of Object.entries(persisted)) {
      if (!isOrdinalKey(key)) result[key] = value
    }
    return { ...result, ...this.requested.get(entity) }
  }

  /**
   * Fetch the members from the store. Loading twice is a no-op.
   */
  async load(): Promise<void> {
    if (this.isLoaded) return
    if (!this.loading) {
      this.loading = this.fetch().finally(() => {
        this.loading = undefined
      })
    }
    return this.loading
  }

  /**
   * Drop the cached members and fetch them again.
   *
   * @throws SessionStateError when the association has unsaved changes
   */
  async refresh(): Promise<void> {
    if (this.owner.lifecycleState === "transient") return
    if (this.owner.uow.tracker.recordOf(this.owner)?.associations.has(this.name)) {
      throw new SessionStateError(
        `Cannot refresh '${this.owner.type}.${this.name}' while it has unsaved changes`,
      )
    }
    this.isLoaded = false
    this.members = []
    this.requested.clear()
    this.baseline.clear()
    await this.load()
  }

  // ===========================================================================
  // LINKING
  // ===========================================================================

  /**
   * Validate a link from the owner to `target`, then apply it on both sides.
   * A single side displaces its current member, and an inverse single side
   * of the target displaces its own.
   */
  protected link(target: Entity, properties: PropertyMap, index?: number): void {
    this.owner.assertWritable()
    target.assertWritable()
    if (target.uow !== this.owner.uow) {
      throw new SessionStateError(
        `Cannot link ${this.owner} to ${target}: they belong to different sessions`,
      )
    }
    if (!target.is(this.descriptor.target)) {
      throw new TypeMismatchError(
        `'${this.owner.type}.${this.name}' expects ${this.descriptor.target}, got ${target.type}`,
        this.name,
        this.descriptor.target,
        target.type,
      )
    }
    for (const key of Object.keys(properties)) {
      if (isOrdinalKey(key)) {
        throw new TypeMismatchError(
          `'${key}' is reserved for list positions`,
          this.name,
          "relationship property",
          key,
        )
      }
    }
    this.requireLoaded()

    const inverse = this.inverseOn(target)
    if (inverse && inverse.variant === "single" && !inverse.loaded) {
      throw new NotLoadedError(target.type, inverse.name)
    }

    // Validation done; apply
    if (this.variant === "single") {
      const current = this.members[0]
      if (current && current !== target) this.unlinkBoth(current)
    }
    if (inverse && inverse.variant === "single") {
      const held = inverse.members[0]
      if (held && held !== this.owner) inverse.unlinkBoth(held)
    }

    this.attach(target, properties, index)
    inverse?.attach(this.owner, properties)
  }

  /**
   * Remove the link to `target` on both sides.
   */
  protected unlink(target: Entity): void {
    this.owner.assertWritable()
    this.requireLoaded()
    this.unlinkBoth(target)
  }

  /**
   * Unlink every member.
   */
  clear(): void {
    this.owner.assertWritable()
    this.requireLoaded()
    for (const member of this.members.slice()) this.unlinkBoth(member)
  }

  private unlinkBoth(target: Entity): void {
    this.detach(target)
    this.inverseOn(target)?.detach(this.owner)
  }

  /**
   * The collection mirroring this one on `target`, if the relationship has an inverse.
   */
  protected inverseOn(target: Entity): AssociationCollection | undefined {
    if (this.descriptor.inverse === undefined) return undefined
    return target.association(this.descriptor.inverse)
  }

  /** @internal Add one member on this side only. */
  attach(entity: Entity, properties: PropertyMap, index?: number): void {
    if (this.isLoaded) {
      if (!this.members.includes(entity)) {
        if (index === undefined) {
          this.members.push(entity)
        } else {
          this.members.splice(index, 0, entity)
        }
      }
      this.requested.set(entity, properties)
    } else if (this.pendingRemoved.has(entity)) {
      this.pendingRemoved.delete(entity)
    } else {
      this.pendingAdded.set(entity, properties)
    }
    this.markDirty()
  }

  /** @internal Remove one member on this side only. */
  detach(entity: Entity): void {
    if (this.isLoaded) {
      const index = this.members.indexOf(entity)
      if (index >= 0) this.members.splice(index, 1)
      this.requested.delete(entity)
    } else if (this.pendingAdded.has(entity)) {
      this.pendingAdded.delete(entity)
    } else {
      this.pendingRemoved.add(entity)
    }
    this.markDirty()
  }

  protected markDirty(): void {
    this.owner.uow.tracker.markDirty(this.owner, this.name, "association")
  }

  protected requireLoaded(): void {
    if (!this.isLoaded) throw new NotLoadedError(this.owner.type, this.name)
  }

  // ===========================================================================
  // SYNC ENGINE HOOKS
  // ===========================================================================

  /** @internal Members with requested properties, in order. */
  desired(): Array<{ entity: Entity; properties: PropertyMap }> {
    return this.members.map((entity) => ({ entity, properties: this.requested.get(entity) ?? {} }))
  }

  /** @internal */
  persisted(): ReadonlyMap<Entity, LinkRecord> {
    return this.baseline
  }

  /** @internal */
  superseded(): ReadonlyMap<RelationshipHandle, Entity> {
    return this.obsolete
  }

  /** @internal */
  pending(): { added: ReadonlyMap<Entity, PropertyMap>; removed: ReadonlySet<Entity> } {
    return { added: this.pendingAdded, removed: this.pendingRemoved }
  }

  /**
   * A relationship to `entity` was created in the store.
   * @internal
   */
  settleLink(entity: Entity, record: LinkRecord): void {
    if (this.isLoaded) {
      const previous = this.baseline.get(entity)
      if (previous && previous.handle !== record.handle) this.obsolete.set(previous.handle, entity)
      this.baseline.set(entity, record)
    } else {
      this.pendingAdded.delete(entity)
    }
  }

  /**
   * A relationship to `entity` was deleted from the store.
   * @internal
   */
  settleUnlink(entity: Entity, handle: RelationshipHandle): void {
    this.obsolete.delete(handle)
    if (this.isLoaded) {
      if (this.baseline.get(entity)?.handle === handle) this.baseline.delete(entity)
    } else {
      this.pendingRemoved.delete(entity)
    }
  }

  /**
   * Drop every trace of `entity`, whose node is gone.
   * @internal
   */
  forget(entity: Entity): void {
    const index = this.members.indexOf(entity)
    if (index >= 0) this.members.splice(index, 1)
    this.requested.delete(entity)
    this.baseline.delete(entity)
    this.pendingAdded.delete(entity)
    this.pendingRemoved.delete(entity)
  }

  /**
   * Everything staged is persisted once a commit succeeds.
   * @internal
   */
  rebase(): void {
    this.requested.clear()
    this.obsolete.clear()
    this.pendingAdded.clear()
    this.pendingRemoved.clear()
  }

  // ===========================================================================
  // LOADING
  // ===========================================================================

  private async fetch(): Promise<void> {
    const { uow } = this.owner
    const handle = this.owner.handle
    const links: Array<{ entity: Entity; record: LinkRecord }> = []

    if (handle !== undefined) {
      const refs = await uow.store.fetchRelationships(
        handle,
        this.descriptor.edgeType,
        this.descriptor.direction,
      )
      for (const ref of refs) {
        const entity = await uow.resolve(ref.otherEnd)
        if (!entity.is(this.descriptor.target)) {
          throw new TypeMismatchError(
            `'${this.owner.type}.${this.name}' expects ${this.descriptor.target}, found ${entity} in the store`,
            this.name,
            this.descriptor.target,
            entity.type,
          )
        }
        links.push({ entity, record: { handle: ref.handle, properties: ref.properties } })
      }
    }

    if (this.variant === "list") {
      const key = this.descriptor.ordinalKey
      const position = (record: LinkRecord): number => {
        const value = record.properties[key]
        return typeof value === "number" ? value : Number.POSITIVE_INFINITY
      }
      links.sort((a, b) => position(a.record) - position(b.record))
    }
    if (this.variant === "single" && links.length > 1) {
      uow.logger.warn(
        `'${this.owner.type}.${this.name}' of ${this.owner} has ${links.length} relationships; keeping the first`,
      )
    }

    this.members = []
    this.baseline.clear()
    for (const { entity, record } of links) {
      this.baseline.set(entity, record)
      if (this.pendingRemoved.has(entity)) continue
      if (this.variant === "single" && this.members.length > 0) continue
      this.members.push(entity)
    }
    for (const [entity, properties] of this.pendingAdded) {
      if (!this.members.includes(entity)) this.members.push(entity)
      this.requested.set(entity, properties)
    }
    this.pendingAdded.clear()
    this.pendingRemoved.clear()
    this.isLoaded = true

    uow.logger.debug(`Loaded ${this.owner}.${this.name}: ${this.members.length} member(s)`)
  }
}
