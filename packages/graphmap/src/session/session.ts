/**
 * Session
 *
 * A single-writer unit of work over a graph store. Owns the identity map and
 * change tracker; entities created or resolved here belong to it until they
 * are evicted or the session is closed.
 *
 * @example
 * ```typescript
 * const session = openSession(schema, new MemoryGraphStore())
 * const series = session.create('Series', { title: 'The Expanse' })
 * const pilot = session.create('Episode', { season: 1, episodeNumber: 1 })
 * series.assoc.episodes.append(pilot)
 * await session.commit()
 * ```
 */

import { Entity, isScalar, type EntityOf } from "../entity"
import {
  NodeNotFoundError,
  SchemaError,
  SessionStateError,
  TypeMismatchError,
} from "../errors"
import type { EntityInput, EntityTypes } from "../schema/inference"
import type { SchemaRegistry } from "../schema/registry"
import type { AnySchema, EntityDescriptor } from "../schema/types"
import type { GraphStore, NodeHandle, PropertyMap, Scalar } from "../store/types"
import { SyncEngine } from "../sync/engine"
import { noopLogger, type Logger } from "../utils/logger"
import { ChangeTracker } from "./change-tracker"
import { IdentityMap } from "./identity-map"
import type { CommitResult, SessionConfig, UnitOfWork } from "./types"

/**
 * Property filter for queries, by attribute name.
 */
export type EntityFilter = Record<string, Scalar>

export class Session<S extends AnySchema = AnySchema> implements UnitOfWork {
  readonly registry: SchemaRegistry
  readonly tracker = new ChangeTracker()
  readonly identityMap: IdentityMap
  readonly logger: Logger

  private readonly engine: SyncEngine
  private committing = false
  private closed = false

  constructor(
    readonly schema: S,
    readonly store: GraphStore,
    config: SessionConfig = {},
  ) {
    this.registry = schema.registry
    this.logger = config.logger ?? noopLogger
    this.identityMap = new IdentityMap((handle) => this.hydrate(handle))
    this.engine = new SyncEngine(this)
  }

  static open<S extends AnySchema>(schema: S, store: GraphStore, config?: SessionConfig): Session<S> {
    return new Session(schema, store, config)
  }

  get isClosed(): boolean {
    return this.closed
  }

  // ===========================================================================
  // ENTITIES
  // ===========================================================================

  /**
   * Create a transient entity. Properties are validated and defaults applied.
   *
   * @throws TypeMismatchError on invalid properties
   */
  create<N extends EntityTypes<S>>(type: N, properties?: EntityInput<S, N>): EntityOf<S, N> {
    this.assertMutable()
    const descriptor = this.registry.descriptor(type)
    const parsed = descriptor.input.safeParse(properties ?? {})
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const attribute = issue?.path.join(".") ?? ""
      throw new TypeMismatchError(
        `Invalid properties for ${type}${attribute ? `.${attribute}` : ""}: ${issue?.message ?? "rejected"}`,
        attribute,
        descriptor.properties.get(attribute)?.kind ?? "properties",
        properties,
      )
    }

    const values: Array<[string, Scalar]> = []
    for (const [name, value] of Object.entries(parsed.data)) {
      if (isScalar(value)) values.push([name, value])
    }

    const entity = new Entity(this, descriptor, values)
    this.tracker.markNew(entity)
    this.logger.debug(`Created ${entity}`)
    return entity as EntityOf<S, N>
  }

  /**
   * The session's entity for a handle, hydrated from the store if needed.
   *
   * @throws NodeNotFoundError
   */
  async resolve(handle: NodeHandle): Promise<Entity> {
    this.assertOpen()
    return this.identityMap.resolve(handle)
  }

  /**
   * Resolve a handle and check the entity's type.
   *
   * @throws TypeMismatchError when the node is not a `type`
   */
  async get<N extends EntityTypes<S>>(type: N, handle: NodeHandle): Promise<EntityOf<S, N>> {
    const entity = await this.resolve(handle)
    if (!entity.is(type)) {
      throw new TypeMismatchError(`Node '${handle}' is a ${entity.type}, not a ${type}`, "type", type, entity.type)
    }
    return entity as EntityOf<S, N>
  }

  /**
   * Committed entities of a type (subtypes included) whose properties equal the filter.
   */
  async find<N extends EntityTypes<S>>(type: N, filter: EntityFilter = {}): Promise<EntityOf<S, N>[]> {
    this.assertOpen()
    const result: EntityOf<S, N>[] = []
    for (const descriptor of this.registry.subtypes(type)) {
      const graphFilter = this.toGraphFilter(descriptor, filter)
      if (!graphFilter) continue
      const handles = await this.store.findNodes(descriptor.label, graphFilter)
      for (const handle of handles) {
        const entity = await this.identityMap.resolve(handle)
        result.push(entity as EntityOf<S, N>)
      }
    }
    return result
  }

  async findOne<N extends EntityTypes<S>>(
    type: N,
    filter: EntityFilter = {},
  ): Promise<EntityOf<S, N> | undefined> {
    const [first] = await this.find(type, filter)
    return first
  }

  /**
   * Find a committed entity matching the type's unique attributes (all given
   * properties when it declares none), or create one.
   */
  async findOrCreate<N extends EntityTypes<S>>(
    type: N,
    properties: EntityInput<S, N>,
  ): Promise<EntityOf<S, N>> {
    const descriptor = this.registry.descriptor(type)
    const given: Record<string, unknown> = { ...properties }
    const names = descriptor.unique.length > 0 ? descriptor.unique : Object.keys(given)

    const filter: EntityFilter = {}
    for (const name of names) {
      const value = given[name]
      if (isScalar(value)) filter[name] = value
    }

    const found = await this.findOne(type, filter)
    return found ?? this.create(type, properties)
  }

  /**
   * Load associations of an entity; all of them when no name is given.
   */
  async load(entity: Entity, ...names: string[]): Promise<void> {
    this.assertOpen()
    this.assertOwned(entity)
    const selected = names.length > 0 ? names : Array.from(entity.descriptor.relationships.keys())
    for (const name of selected) {
      await entity.association(name).load()
    }
  }

  /**
   * Stage the deletion of an entity. A transient entity is unlinked and
   * dropped at once; a managed one is deleted by the next commit, after its
   * `cascade: 'unlink'` associations are unlinked.
   */
  delete(entity: Entity): void {
    this.assertOwned(entity)
    entity.assertWritable()

    for (const relationship of entity.descriptor.relationships.values()) {
      const transient = entity.lifecycleState === "transient"
      if (!transient && relationship.cascade !== "unlink") continue
      const collection = entity.peekAssociation(relationship.name)
      if (collection?.loaded) collection.clear()
    }

    if (entity.lifecycleState === "transient") {
      entity.markDeleted()
      this.tracker.forget(entity)
      this.logger.debug(`Dropped ${entity}`)
      return
    }

    entity.markRemoved()
    this.tracker.markRemoved(entity)
    this.logger.debug(`Staged deletion of ${entity}`)
  }

  /**
   * Detach an entity from the session, dropping its unsaved changes.
   */
  evict(entity: Entity): void {
    this.assertOpen()
    this.assertOwned(entity)
    if (entity.handle !== undefined && this.identityMap.get(entity.handle) === entity) {
      this.identityMap.evict(entity.handle)
    }
    this.tracker.forget(entity)
    entity.markDetached()
  }

  /**
   * Re-read an entity's properties and loaded associations from the store.
   *
   * @throws SessionStateError when the entity has unsaved changes
   */
  async refresh(entity: Entity): Promise<void> {
    this.assertOpen()
    this.assertOwned(entity)
    if (this.tracker.isDirty(entity)) {
      throw new SessionStateError(`Cannot refresh ${entity} while it has unsaved changes`)
    }
    const handle = entity.handle
    if (handle === undefined) return

    const record = await this.store.fetchNode(handle)
    if (!record) throw new NodeNotFoundError(handle)
    entity.reset(this.toAttributes(entity.descriptor, record.properties))
    for (const collection of entity.instantiatedAssociations()) {
      if (collection.loaded) await collection.refresh()
    }
  }

  isDirty(entity: Entity): boolean {
    return this.tracker.isDirty(entity)
  }

  dirtyEntities(): Entity[] {
    return Array.from(this.tracker.snapshot().keys())
  }

  // ===========================================================================
  // LIFECYCLE
  // ===========================================================================

  /**
   * Write all tracked changes to the store.
   *
   * @throws SessionStateError when a commit is already running
   */
  async commit(): Promise<CommitResult> {
    this.assertOpen()
    if (this.committing) {
      throw new SessionStateError("A commit is already in progress")
    }
    this.committing = true
    try {
      return await this.engine.commit(this.tracker.snapshot())
    } finally {
      this.committing = false
    }
  }

  /**
   * Detach every entity and drop the caches. Committed store state is untouched.
   */
  close(): void {
    if (this.closed) return
    for (const entity of this.identityMap.entities()) entity.markDetached()
    for (const entity of this.tracker.snapshot().keys()) entity.markDetached()
    this.identityMap.clear()
    this.tracker.clearAll()
    this.closed = true
    this.logger.debug("Session closed")
  }

  // ===========================================================================
  // UNIT OF WORK
  // ===========================================================================

  /** @internal */
  assertMutable(): void {
    this.assertOpen()
    if (this.committing) {
      throw new SessionStateError("Entities cannot change while a commit is in progress")
    }
  }

  private assertOpen(): void {
    if (this.closed) throw new SessionStateError("Session is closed")
  }

  private assertOwned(entity: Entity): void {
    if (entity.uow !== this) {
      throw new SessionStateError(`${entity} belongs to another session`)
    }
  }

  private async hydrate(handle: NodeHandle): Promise<Entity> {
    const record = await this.store.fetchNode(handle)
    if (!record) throw new NodeNotFoundError(handle)

    const descriptor = this.registry.byLabel(record.label)
    if (!descriptor) {
      throw new SchemaError(`Node '${handle}' has label '${record.label}', which no entity type maps`)
    }

    const entity = new Entity(this, descriptor, this.toAttributes(descriptor, record.properties), handle)
    this.tracker.track(entity)
    this.logger.debug(`Hydrated ${entity}`)
    return entity
  }

  private toAttributes(descriptor: EntityDescriptor, properties: PropertyMap): Array<[string, Scalar]> {
    const values: Array<[string, Scalar]> = []
    for (const [key, value] of Object.entries(properties)) {
      const property = descriptor.propertiesByKey.get(key)
      if (property) {
        values.push([property.name, value])
      } else {
        this.logger.debug(`Ignoring unmapped property '${key}' of a ${descriptor.name} node`)
      }
    }
    return values
  }

  /**
   * Map an attribute filter to graph keys; undefined when the type lacks one of the attributes.
   */
  private toGraphFilter(descriptor: EntityDescriptor, filter: EntityFilter): PropertyMap | undefined {
    const result: PropertyMap = {}
    for (const [name, value] of Object.entries(filter)) {
      const property = descriptor.properties.get(name)
      if (!property) return undefined
      result[property.key] = value
    }
    return result
  }
}

/**
 * Open a session on a store.
 */
export function openSession<S extends AnySchema>(
  schema: S,
  store: GraphStore,
  config?: SessionConfig,
): Session<S> {
  return Session.open(schema, store, config)
}
