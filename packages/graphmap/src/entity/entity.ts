/**
 * Entity
 *
 * In-memory view of one graph node. Properties are read and written through
 * `props`, associations reached through `assoc`; both validate against the
 * schema and report changes to the session's change tracker.
 */

import { createCollection, type AssociationCollection } from "../collections"
import { DetachedEntityError, SchemaError, TypeMismatchError } from "../errors"
import type { EntityAssociations, EntityProps } from "../schema/inference"
import type { AnySchema, EntityDescriptor, PropertyDescriptor } from "../schema/types"
import type { UnitOfWork } from "../session/types"
import type { NodeHandle, PropertyMap, PropertyPatch, Scalar } from "../store/types"

/**
 * Lifecycle of an entity within its session.
 */
export type Lifecycle = "transient" | "managed" | "removed" | "deleted" | "detached"

/**
 * Observable state, splitting `managed` on pending changes.
 */
export type EntityState =
  | "transient"
  | "managed-clean"
  | "managed-dirty"
  | "removed"
  | "deleted"
  | "detached"

/**
 * An entity typed by its schema.
 *
 * @example
 * const episode: EntityOf<typeof schema, 'Episode'> = session.create('Episode', { season: 1, episodeNumber: 3 })
 * episode.props.title = 'Pilot'
 * episode.assoc.series.set(series)
 */
export type EntityOf<S extends AnySchema, N extends string> = Entity & {
  readonly type: N
  readonly props: EntityProps<S, N>
  readonly assoc: EntityAssociations<S, N>
}

export function isScalar(value: unknown): value is Scalar {
  return (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof Date
  )
}

function sameValue(a: Scalar | undefined, b: Scalar | undefined): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime()
  return a === b
}

export class Entity {
  private static nextKey = 1

  /** Process-unique key, stable across commits */
  readonly key: number = Entity.nextKey++

  readonly type: string

  readonly props: Record<string, Scalar | null | undefined>

  readonly assoc: Readonly<Record<string, AssociationCollection>>

  private readonly values = new Map<string, Scalar>()
  private readonly collections = new Map<string, AssociationCollection>()
  private currentHandle: NodeHandle | undefined
  private lifecycle: Lifecycle

  /** @internal Use `session.create()` or `session.resolve()`. */
  constructor(
    /** @internal */
    readonly uow: UnitOfWork,
    readonly descriptor: EntityDescriptor,
    values: Iterable<readonly [string, Scalar]> = [],
    handle?: NodeHandle,
  ) {
    this.type = descriptor.name
    this.currentHandle = handle
    this.lifecycle = handle === undefined ? "transient" : "managed"
    for (const [name, value] of values) this.values.set(name, value)

    this.props = new Proxy<Record<string, Scalar | null | undefined>>(Object.create(null), {
      get: (_target, name) => (typeof name === "string" ? this.values.get(name) : undefined),
      set: (_target, name, value: unknown) => {
        if (typeof name !== "string") return false
        this.write(name, value)
        return true
      },
      deleteProperty: (_target, name) => {
        if (typeof name !== "string") return false
        this.write(name, undefined)
        return true
      },
      has: (_target, name) => typeof name === "string" && this.values.has(name),
      ownKeys: () => Array.from(this.values.keys()),
      getOwnPropertyDescriptor: (_target, name) => {
        if (typeof name !== "string" || !this.values.has(name)) return undefined
        return { value: this.values.get(name), writable: true, enumerable: true, configurable: true }
      },
    })

    this.assoc = new Proxy<Record<string, AssociationCollection>>(Object.create(null), {
      get: (_target, name) =>
        typeof name === "string" && descriptor.relationships.has(name)
          ? this.association(name)
          : undefined,
      set: () => false,
      has: (_target, name) => typeof name === "string" && descriptor.relationships.has(name),
      ownKeys: () => Array.from(descriptor.relationships.keys()),
      getOwnPropertyDescriptor: (_target, name) => {
        if (typeof name !== "string" || !descriptor.relationships.has(name)) return undefined
        return { value: this.association(name), writable: false, enumerable: true, configurable: true }
      },
    })
  }

  /** Store handle, absent until the first commit */
  get handle(): NodeHandle | undefined {
    return this.currentHandle
  }

  get state(): EntityState {
    if (this.lifecycle === "managed") {
      return this.uow.tracker.isDirty(this) ? "managed-dirty" : "managed-clean"
    }
    return this.lifecycle
  }

  get isDirty(): boolean {
    return this.uow.tracker.isDirty(this)
  }

  /**
   * Whether this entity is of the given type or one of its subtypes.
   */
  is(type: string): boolean {
    return this.descriptor.ancestry.includes(type)
  }

  /**
   * Plain copy of the property values that are set.
   */
  toObject(): Record<string, Scalar> {
    const result: Record<string, Scalar> = {}
    for (const [name, value] of this.values) {
      result[name] = value instanceof Date ? new Date(value.getTime()) : value
    }
    return result
  }

  toString(): string {
    return `${this.type}(${this.currentHandle ?? `#${this.key}`})`
  }

  // ===========================================================================
  // INTERNALS (session, collections and sync engine)
  // ===========================================================================

  /** @internal */
  get lifecycleState(): Lifecycle {
    return this.lifecycle
  }

  /** @internal */
  assertWritable(): void {
    if (
      this.lifecycle === "removed" ||
      this.lifecycle === "deleted" ||
      this.lifecycle === "detached"
    ) {
      throw new DetachedEntityError(this.type, this.lifecycle, this.currentHandle)
    }
    this.uow.assertMutable()
  }

  /**
   * Validate and assign a property. `null` and `undefined` unset it.
   * @internal
   */
  write(name: string, value: unknown): void {
    this.assertWritable()
    const property = this.property(name)

    let next: Scalar | undefined
    if (value === null || value === undefined) {
      if (!property.schema.safeParse(undefined).success && !property.schema.safeParse(null).success) {
        throw new TypeMismatchError(
          `'${this.type}.${name}' is required and cannot be unset`,
          name,
          property.kind,
          value,
        )
      }
      next = undefined
    } else {
      const parsed = property.schema.safeParse(value)
      if (!parsed.success) {
        const issue = parsed.error.issues[0]
        throw new TypeMismatchError(
          `Invalid value for '${this.type}.${name}': ${issue?.message ?? "rejected"}`,
          name,
          property.kind,
          value,
        )
      }
      const data: unknown = parsed.data
      if (!isScalar(data)) {
        throw new TypeMismatchError(
          `Invalid value for '${this.type}.${name}': expected ${property.kind}`,
          name,
          property.kind,
          value,
        )
      }
      next = data
    }

    if (sameValue(this.values.get(name), next)) return
    if (next === undefined) {
      this.values.delete(name)
    } else {
      this.values.set(name, next)
    }
    this.uow.tracker.markDirty(this, name, "property")
  }

  /**
   * Collection backing a relationship, created on first use.
   * @internal
   */
  association(name: string): AssociationCollection {
    const existing = this.collections.get(name)
    if (existing) return existing

    const relationship = this.descriptor.relationships.get(name)
    if (!relationship) {
      throw new SchemaError(`'${this.type}' has no association '${name}'`, this.type, name)
    }
    // Nothing can be linked to a node that does not exist yet
    const collection = createCollection(this, relationship, this.lifecycle === "transient")
    this.collections.set(name, collection)
    return collection
  }

  /** @internal */
  peekAssociation(name: string): AssociationCollection | undefined {
    return this.collections.get(name)
  }

  /** @internal */
  instantiatedAssociations(): AssociationCollection[] {
    return Array.from(this.collections.values())
  }

  /**
   * Properties keyed by graph property name, for node creation.
   * @internal
   */
  nodeProperties(): PropertyMap {
    const result: PropertyMap = {}
    for (const [name, value] of this.values) {
      result[this.property(name).key] = value
    }
    return result
  }

  /**
   * Changed properties keyed by graph property name; unset ones map to null.
   * @internal
   */
  propertyPatch(names: Iterable<string>): PropertyPatch {
    const patch: PropertyPatch = {}
    for (const name of names) {
      patch[this.property(name).key] = this.values.get(name) ?? null
    }
    return patch
  }

  /**
   * Replace property values with the ones read from the store.
   * @internal
   */
  reset(values: Iterable<readonly [string, Scalar]>): void {
    this.values.clear()
    for (const [name, value] of values) this.values.set(name, value)
  }

  /** @internal */
  attachHandle(handle: NodeHandle): void {
    this.currentHandle = handle
    if (this.lifecycle === "transient") this.lifecycle = "managed"
  }

  /** @internal */
  markRemoved(): void {
    this.lifecycle = "removed"
  }

  /** @internal */
  markDeleted(): void {
    this.lifecycle = "deleted"
  }

  /** @internal */
  markDetached(): void {
    if (this.lifecycle !== "deleted") this.lifecycle = "detached"
  }

  private property(name: string): PropertyDescriptor {
    const property = this.descriptor.properties.get(name)
    if (!property) {
      throw new SchemaError(`'${this.type}' has no property '${name}'`, this.type, name)
    }
    return property
  }
}
