/**
 * In-Memory Graph Store
 *
 * `GraphStore` over a `MemoryGraph`. Reads answer immediately from the
 * current state. Mutations, and whole units of work passed to
 * `transaction()`, run one at a time behind a mutex, so commits from
 * different sessions never interleave.
 *
 * Not transactional: operations applied before a failure stay applied.
 *
 * @example
 * ```typescript
 * const store = new MemoryGraphStore({
 *   deletePolicy: 'restrict',
 *   lockTimeoutMs: 5000,
 *   indexes: [{ label: 'Person', property: 'name' }],
 * })
 * const session = openSession(schema, store)
 * ```
 */

import { Mutex, withTimeout, type MutexInterface } from "async-mutex"
import {
  StoreTimeoutError,
  noopLogger,
  type Direction,
  type GraphStore,
  type GraphStoreOperations,
  type Logger,
  type NodeHandle,
  type NodeRecord,
  type PropertyMap,
  type PropertyPatch,
  type RelationshipHandle,
  type RelationshipRef,
} from "graphmap"
import { MemoryGraph } from "./graph-store"
import type { IndexConfig, MemoryGraphData, MemoryGraphStoreConfig, MemoryStoreStats } from "./types"

export class MemoryGraphStore implements GraphStore {
  readonly name: string
  readonly transactional = false

  private readonly graph: MemoryGraph
  private readonly lock: MutexInterface
  private readonly logger: Logger

  constructor(config: MemoryGraphStoreConfig = {}) {
    this.name = config.name ?? "memory"
    this.logger = config.logger ?? noopLogger
    this.graph = new MemoryGraph(config.deletePolicy ?? "restrict", config.indexes ?? [])

    const timeout = config.lockTimeoutMs
    this.lock =
      timeout === undefined
        ? new Mutex()
        : withTimeout(new Mutex(), timeout, new StoreTimeoutError(timeout, this.name))
  }

  /**
   * Whether a mutation or unit of work currently holds the store.
   */
  get isLocked(): boolean {
    return this.lock.isLocked()
  }

  // ===========================================================================
  // TRANSACTIONS
  // ===========================================================================

  /**
   * Run a unit of work while holding the store lock. `work` must use `ops`:
   * calling the store's own mutations from inside would wait for the lock
   * it already holds.
   */
  async transaction<T>(work: (ops: GraphStoreOperations) => Promise<T>): Promise<T> {
    return this.lock.runExclusive(async () => {
      this.logger.debug(`${this.name}: transaction started`)
      const result = await work(this.graph)
      this.logger.debug(`${this.name}: transaction finished`)
      return result
    })
  }

  // ===========================================================================
  // MUTATIONS
  // ===========================================================================

  async createNode(label: string, properties: PropertyMap): Promise<NodeHandle> {
    return this.exclusive(() => this.graph.createNode(label, properties))
  }

  async updateNode(handle: NodeHandle, properties: PropertyPatch): Promise<void> {
    return this.exclusive(() => this.graph.updateNode(handle, properties))
  }

  async deleteNode(handle: NodeHandle): Promise<void> {
    return this.exclusive(() => this.graph.deleteNode(handle))
  }

  async createRelationship(
    type: string,
    from: NodeHandle,
    to: NodeHandle,
    properties: PropertyMap,
  ): Promise<RelationshipHandle> {
    return this.exclusive(() => this.graph.createRelationship(type, from, to, properties))
  }

  async deleteRelationship(handle: RelationshipHandle): Promise<void> {
    return this.exclusive(() => this.graph.deleteRelationship(handle))
  }

  async createIndex(index: IndexConfig): Promise<void> {
    return this.exclusive(() => this.graph.createIndex(index.label, index.property))
  }

  async clear(): Promise<void> {
    return this.exclusive(() => this.graph.clear())
  }

  async import(data: MemoryGraphData): Promise<void> {
    return this.exclusive(() => this.graph.import(data))
  }

  // ===========================================================================
  // READS
  // ===========================================================================

  fetchNode(handle: NodeHandle): NodeRecord | undefined {
    return this.graph.fetchNode(handle)
  }

  fetchRelationships(handle: NodeHandle, type: string, direction: Direction): RelationshipRef[] {
    return this.graph.fetchRelationships(handle, type, direction)
  }

  findNodes(label: string, filter: PropertyMap): NodeHandle[] {
    return this.graph.findNodes(label, filter)
  }

  degree(handle: NodeHandle): number {
    return this.graph.degree(handle)
  }

  stats(): MemoryStoreStats {
    return this.graph.stats()
  }

  export(): MemoryGraphData {
    return this.graph.export()
  }

  private async exclusive<T>(operation: () => T): Promise<T> {
    return this.lock.runExclusive(operation)
  }
}
