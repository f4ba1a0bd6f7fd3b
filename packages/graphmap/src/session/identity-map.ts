/**
 * Identity Map
 *
 * One live entity per node handle within a session. Entries are weak: once the
 * application drops an entity it may be collected, and the next resolve
 * hydrates a fresh one.
 */

import type { Entity } from "../entity"
import type { NodeHandle } from "../store/types"

export type Hydrator = (handle: NodeHandle) => Promise<Entity>

export class IdentityMap {
  private readonly entries = new Map<NodeHandle, WeakRef<Entity>>()
  private readonly pending = new Map<NodeHandle, Promise<Entity>>()
  private readonly finalizer = new FinalizationRegistry<NodeHandle>((handle) => {
    const ref = this.entries.get(handle)
    if (ref && ref.deref() === undefined) this.entries.delete(handle)
  })

  constructor(private readonly hydrate: Hydrator) {}

  /**
   * Return the live entity for a handle, hydrating it if absent. Concurrent
   * resolves of one handle share one hydration.
   */
  async resolve(handle: NodeHandle): Promise<Entity> {
    const live = this.get(handle)
    if (live) return live

    let inflight = this.pending.get(handle)
    if (!inflight) {
      inflight = this.hydrate(handle)
        .then((entity) => {
          // A commit may have registered an entity for this handle meanwhile
          const winner = this.get(handle)
          if (winner) return winner
          this.register(entity, handle)
          return entity
        })
        .finally(() => {
          this.pending.delete(handle)
        })
      this.pending.set(handle, inflight)
    }
    return inflight
  }

  /**
   * Bind an entity to its handle.
   */
  register(entity: Entity, handle: NodeHandle): void {
    const previous = this.entries.get(handle)
    if (previous) this.finalizer.unregister(previous)
    const ref = new WeakRef(entity)
    this.entries.set(handle, ref)
    this.finalizer.register(entity, handle, ref)
  }

  evict(handle: NodeHandle): void {
    const ref = this.entries.get(handle)
    if (!ref) return
    this.finalizer.unregister(ref)
    this.entries.delete(handle)
  }

  get(handle: NodeHandle): Entity | undefined {
    return this.entries.get(handle)?.deref()
  }

  /** Number of registered handles, collected entries included until finalized */
  get size(): number {
    return this.entries.size
  }

  /**
   * Live entities currently registered.
   */
  entities(): Entity[] {
    const result: Entity[] = []
    for (const ref of this.entries.values()) {
      const entity = ref.deref()
      if (entity) result.push(entity)
    }
    return result
  }

  clear(): void {
    for (const ref of this.entries.values()) this.finalizer.unregister(ref)
    this.entries.clear()
  }
}
