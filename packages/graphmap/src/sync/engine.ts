/**
 * Sync Engine
 *
 * Reconciles tracked changes with the store in one `store.transaction()`:
 *
 * 1. create nodes of new entities
 * 2. update changed properties of managed entities
 * 3. create relationships (re-creations included), then delete relationships
 * 4. delete nodes of removed entities, unlinking `cascade: 'unlink'` associations first
 *
 * Completed operations are journaled and applied to the session only once the
 * transaction settles. On failure the journal is applied for a store that
 * cannot roll back, so a retried commit does not repeat what already
 * happened; dirty records stay in place either way.
 */

import type { LinkRecord } from "../collections"
import type { Entity } from "../entity"
import { SessionStateError } from "../errors"
import type { DirtyRecord } from "../session/change-tracker"
import type { CommitResult, UnitOfWork } from "../session/types"
import type {
  Direction,
  GraphStoreOperations,
  NodeHandle,
  PropertyMap,
  RelationshipHandle,
} from "../store/types"
import { buildPlan, type EdgeWrite, type Endpoints } from "./plan"

type Effect =
  | { kind: "node-created"; entity: Entity; handle: NodeHandle }
  | { kind: "node-deleted"; entity: Entity }
  | { kind: "edge-created"; edge: Endpoints; record: LinkRecord }
  | {
      kind: "edge-deleted"
      type: string
      from: Entity | undefined
      to: Entity | undefined
      handle: RelationshipHandle
      /** The far end is being deleted too */
      forget: boolean
    }

export class SyncEngine {
  constructor(private readonly uow: UnitOfWork) {}

  /**
   * Commit a snapshot of dirty records.
   */
  async commit(snapshot: ReadonlyMap<Entity, DirtyRecord>): Promise<CommitResult> {
    const { store, logger } = this.uow
    const journal: Effect[] = []
    const result: CommitResult = { created: 0, updated: 0, deleted: 0, linked: 0, unlinked: 0 }

    try {
      await store.transaction((ops) => this.run(ops, snapshot, journal, result))
    } catch (error) {
      if (!store.transactional) this.apply(journal)
      logger.error(
        `Commit to ${store.name} failed after ${journal.length} completed operation(s)`,
        error,
      )
      throw error
    }

    this.apply(journal)
    for (const entity of snapshot.keys()) {
      if (entity.lifecycleState === "deleted") continue
      this.uow.tracker.clear(entity)
      for (const collection of entity.instantiatedAssociations()) collection.rebase()
    }

    logger.info(
      `Committed to ${store.name}: ${result.created} created, ${result.updated} updated, ` +
        `${result.deleted} deleted, ${result.linked} linked, ${result.unlinked} unlinked`,
    )
    return result
  }

  private async run(
    ops: GraphStoreOperations,
    snapshot: ReadonlyMap<Entity, DirtyRecord>,
    journal: Effect[],
    result: CommitResult,
  ): Promise<void> {
    // A store may retry the unit of work; only the last attempt counts
    journal.length = 0
    Object.assign(result, { created: 0, updated: 0, deleted: 0, linked: 0, unlinked: 0 })

    const created = new Map<Entity, NodeHandle>()
    const handleOf = (entity: Entity): NodeHandle => {
      const handle = entity.handle ?? created.get(entity)
      if (handle === undefined) {
        throw new SessionStateError(`${entity} is linked but was never created`)
      }
      return handle
    }

    // Nodes
    for (const [entity, record] of snapshot) {
      if (!record.created || entity.lifecycleState !== "transient") continue
      const handle = await ops.createNode(entity.descriptor.label, entity.nodeProperties())
      created.set(entity, handle)
      journal.push({ kind: "node-created", entity, handle })
      result.created++
    }

    for (const [entity, record] of snapshot) {
      if (entity.lifecycleState !== "managed" || record.properties.size === 0) continue
      await ops.updateNode(handleOf(entity), entity.propertyPatch(record.properties))
      result.updated++
    }

    // Relationships: creations first
    const plan = buildPlan(snapshot)
    for (const write of plan.writes.values()) {
      if (!write.write) continue
      const properties = await this.edgeProperties(ops, write, handleOf)
      const handle = await ops.createRelationship(
        write.type,
        handleOf(write.from),
        handleOf(write.to),
        properties,
      )
      journal.push({ kind: "edge-created", edge: write, record: { handle, properties } })
      result.linked++
      if (write.existing) {
        plan.deletes.set(write.existing.handle, { type: write.type, from: write.from, to: write.to })
      }
    }

    for (const [handle, edge] of plan.deletes) {
      await ops.deleteRelationship(handle)
      journal.push({ kind: "edge-deleted", ...edge, handle, forget: false })
      result.unlinked++
    }

    for (const edge of plan.lookups.values()) {
      const to = handleOf(edge.to)
      const refs = await ops.fetchRelationships(handleOf(edge.from), edge.type, "out")
      for (const ref of refs) {
        if (ref.otherEnd !== to) continue
        await ops.deleteRelationship(ref.handle)
        journal.push({ kind: "edge-deleted", ...edge, handle: ref.handle, forget: false })
        result.unlinked++
      }
    }

    // Staged deletions
    for (const [entity, record] of snapshot) {
      if (!record.removed || entity.lifecycleState !== "removed") continue
      const handle = handleOf(entity)

      for (const relationship of entity.descriptor.relationships.values()) {
        if (relationship.cascade !== "unlink") continue
        const refs = await ops.fetchRelationships(handle, relationship.edgeType, relationship.direction)
        for (const ref of refs) {
          await ops.deleteRelationship(ref.handle)
          const other = this.uow.identityMap.get(ref.otherEnd)
          journal.push({
            kind: "edge-deleted",
            type: relationship.edgeType,
            ...orient(relationship.direction, entity, other),
            handle: ref.handle,
            forget: true,
          })
          result.unlinked++
        }
      }

      await ops.deleteNode(handle)
      journal.push({ kind: "node-deleted", entity })
      result.deleted++
    }
  }

  /**
   * Final properties of a relationship to create: what it already carries,
   * then requested properties and positions.
   */
  private async edgeProperties(
    ops: GraphStoreOperations,
    write: EdgeWrite,
    handleOf: (entity: Entity) => NodeHandle,
  ): Promise<PropertyMap> {
    const properties: PropertyMap = {
      ...write.existing?.properties,
      ...write.properties,
      ...write.ordinals,
    }

    for (const { key, owner, append } of write.appendTo) {
      const direction: Direction = owner === write.from ? "out" : "in"
      const refs = await ops.fetchRelationships(handleOf(owner), write.type, direction)
      let last = 0
      for (const ref of refs) {
        const ordinal = ref.properties[key]
        if (typeof ordinal === "number" && ordinal > last) last = ordinal
      }
      properties[key] = last + append
    }

    return properties
  }

  /**
   * Reflect completed store operations in the session.
   */
  private apply(journal: readonly Effect[]): void {
    const { identityMap, tracker } = this.uow

    for (const effect of journal) {
      switch (effect.kind) {
        case "node-created":
          effect.entity.attachHandle(effect.handle)
          identityMap.register(effect.entity, effect.handle)
          tracker.settleCreated(effect.entity)
          break

        case "edge-created": {
          const { type, from, to } = effect.edge
          collectionAt(from, type, "out")?.settleLink(to, effect.record)
          collectionAt(to, type, "in")?.settleLink(from, effect.record)
          break
        }

        case "edge-deleted": {
          const { type, from, to, handle, forget } = effect
          if (from && to) {
            const outgoing = collectionAt(from, type, "out")
            const incoming = collectionAt(to, type, "in")
            if (forget) {
              // Only the surviving end keeps a collection worth cleaning
              outgoing?.forget(to)
              incoming?.forget(from)
            } else {
              outgoing?.settleUnlink(to, handle)
              incoming?.settleUnlink(from, handle)
            }
          }
          break
        }

        case "node-deleted":
          if (effect.entity.handle !== undefined) identityMap.evict(effect.entity.handle)
          effect.entity.markDeleted()
          tracker.forget(effect.entity)
          break
      }
    }
  }
}

function orient(
  direction: Direction,
  owner: Entity,
  other: Entity | undefined,
): { from: Entity | undefined; to: Entity | undefined } {
  return direction === "out" ? { from: owner, to: other } : { from: other, to: owner }
}

function collectionAt(entity: Entity, type: string, direction: Direction) {
  const relationship = entity.descriptor.relationshipsByEdge.get(`${type}:${direction}`)
  return relationship ? entity.peekAssociation(relationship.name) : undefined
}
