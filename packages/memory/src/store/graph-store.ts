/**
 * In-Memory Graph
 *
 * Core data structure for storing nodes and relationships in memory.
 * Every operation is synchronous; locking is the caller's business.
 */

import {
  GraphMapError,
  NodeNotFoundError,
  ReferentialError,
  type DeletePolicy,
  type Direction,
  type GraphStoreOperations,
  type NodeHandle,
  type NodeRecord,
  type PropertyMap,
  type PropertyPatch,
  type RelationshipHandle,
  type RelationshipRef,
  type Scalar,
} from "graphmap"
import type { IndexConfig, MemoryGraphData, MemoryStoreStats, StoredEdge, StoredNode } from "./types"

function copyProperties(properties: PropertyMap): PropertyMap {
  return structuredClone(properties)
}

/**
 * Reject a dump before anything is replaced.
 *
 * @throws GraphMapError on a repeated handle
 * @throws NodeNotFoundError on a relationship to a node missing from the dump
 */
function validateDump(data: MemoryGraphData): void {
  const nodes = new Set<NodeHandle>()
  for (const node of data.nodes) {
    if (nodes.has(node.handle)) throw new GraphMapError(`Duplicate node handle '${node.handle}' in dump`)
    nodes.add(node.handle)
  }

  const edges = new Set<RelationshipHandle>()
  for (const edge of data.edges) {
    if (edges.has(edge.handle)) {
      throw new GraphMapError(`Duplicate relationship handle '${edge.handle}' in dump`)
    }
    edges.add(edge.handle)
    if (!nodes.has(edge.from)) throw new NodeNotFoundError(edge.from)
    if (!nodes.has(edge.to)) throw new NodeNotFoundError(edge.to)
  }
}

function sameValue(a: Scalar | undefined, b: Scalar): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime()
  return a === b
}

/**
 * Index key of a value; dates compare by instant.
 */
function indexKey(value: Scalar): string {
  if (value instanceof Date) return `date:${value.getTime()}`
  return `${typeof value}:${String(value)}`
}

function addTo<K, V>(map: Map<K, Set<V>>, key: K, value: V): void {
  let set = map.get(key)
  if (!set) {
    set = new Set()
    map.set(key, set)
  }
  set.add(value)
}

function sequenceOf(handle: string, prefix: string): number {
  const match = new RegExp(`^${prefix}(\\d+)$`).exec(handle)
  return match?.[1] ? Number(match[1]) : 0
}

/**
 * In-memory graph with:
 * - handles assigned from monotonic counters (`n1`, `r1`, ...)
 * - adjacency sets per node
 * - label and relationship type indexes
 * - optional property indexes
 */
export class MemoryGraph implements GraphStoreOperations {
  /** All nodes by handle */
  private nodes = new Map<NodeHandle, StoredNode>()

  /** All relationships by handle */
  private edges = new Map<RelationshipHandle, StoredEdge>()

  /** Outgoing relationships per node */
  private outEdges = new Map<NodeHandle, Set<RelationshipHandle>>()

  /** Incoming relationships per node */
  private inEdges = new Map<NodeHandle, Set<RelationshipHandle>>()

  private nodesByLabel = new Map<string, Set<NodeHandle>>()
  private edgesByType = new Map<string, Set<RelationshipHandle>>()

  /** "label.property" -> index key -> handles */
  private propertyIndexes = new Map<string, Map<string, Set<NodeHandle>>>()

  private nodeSequence = 0
  private edgeSequence = 0

  constructor(
    private readonly deletePolicy: DeletePolicy = "restrict",
    indexes: IndexConfig[] = [],
  ) {
    for (const { label, property } of indexes) this.createIndex(label, property)
  }

  // ===========================================================================
  // NODE OPERATIONS
  // ===========================================================================

  createNode(label: string, properties: PropertyMap): NodeHandle {
    const handle = `n${++this.nodeSequence}`
    this.insertNode({ handle, label, properties: copyProperties(properties) })
    return handle
  }

  /**
   * Merge properties into a node; `null` removes a property.
   */
  updateNode(handle: NodeHandle, patch: PropertyPatch): void {
    const node = this.nodes.get(handle)
    if (!node) throw new NodeNotFoundError(handle)

    this.removeNodeFromIndexes(node)
    const properties: PropertyMap = { ...node.properties }
    for (const [key, value] of Object.entries(patch)) {
      if (value === null) {
        delete properties[key]
      } else {
        properties[key] = value instanceof Date ? new Date(value.getTime()) : value
      }
    }
    node.properties = properties
    this.indexNodeProperties(node)
  }

  deleteNode(handle: NodeHandle): void {
    const node = this.nodes.get(handle)
    if (!node) throw new NodeNotFoundError(handle)

    const connected = [...(this.outEdges.get(handle) ?? []), ...(this.inEdges.get(handle) ?? [])]
    if (connected.length > 0 && this.deletePolicy === "restrict") {
      throw new ReferentialError(handle, connected.length)
    }
    for (const edge of connected) this.deleteRelationship(edge)

    this.removeNodeFromIndexes(node)
    this.nodesByLabel.get(node.label)?.delete(handle)
    this.outEdges.delete(handle)
    this.inEdges.delete(handle)
    this.nodes.delete(handle)
  }

  fetchNode(handle: NodeHandle): NodeRecord | undefined {
    const node = this.nodes.get(handle)
    if (!node) return undefined
    return { handle, label: node.label, properties: copyProperties(node.properties) }
  }

  /**
   * Handles of nodes with the label whose properties equal every filter entry.
   * An indexed filter property narrows the candidates first.
   */
  findNodes(label: string, filter: PropertyMap): NodeHandle[] {
    const entries = Object.entries(filter)
    let candidates: Iterable<NodeHandle> = this.nodesByLabel.get(label) ?? []

    for (const [property, value] of entries) {
      const index = this.propertyIndexes.get(`${label}.${property}`)
      if (index) {
        candidates = index.get(indexKey(value)) ?? []
        break
      }
    }

    const result: NodeHandle[] = []
    for (const handle of candidates) {
      const node = this.nodes.get(handle)
      if (!node || node.label !== label) continue
      if (entries.every(([key, value]) => sameValue(node.properties[key], value))) {
        result.push(handle)
      }
    }
    return result
  }

  // ===========================================================================
  // RELATIONSHIP OPERATIONS
  // ===========================================================================

  createRelationship(
    type: string,
    from: NodeHandle,
    to: NodeHandle,
    properties: PropertyMap,
  ): RelationshipHandle {
    if (!this.nodes.has(from)) throw new NodeNotFoundError(from)
    if (!this.nodes.has(to)) throw new NodeNotFoundError(to)

    const handle = `r${++this.edgeSequence}`
    this.insertEdge({ handle, type, from, to, properties: copyProperties(properties) })
    return handle
  }

  /**
   * Delete a relationship. Unknown handles are ignored.
   */
  deleteRelationship(handle: RelationshipHandle): void {
    const edge = this.edges.get(handle)
    if (!edge) return

    this.edgesByType.get(edge.type)?.delete(handle)
    this.outEdges.get(edge.from)?.delete(handle)
    this.inEdges.get(edge.to)?.delete(handle)
    this.edges.delete(handle)
  }

  fetchRelationships(handle: NodeHandle, type: string, direction: Direction): RelationshipRef[] {
    const adjacent = (direction === "out" ? this.outEdges : this.inEdges).get(handle)
    if (!adjacent) return []

    const result: RelationshipRef[] = []
    for (const edgeHandle of adjacent) {
      const edge = this.edges.get(edgeHandle)
      if (!edge || edge.type !== type) continue
      result.push({
        handle: edgeHandle,
        otherEnd: direction === "out" ? edge.to : edge.from,
        properties: copyProperties(edge.properties),
      })
    }
    return result
  }

  /**
   * Number of relationships touching a node, in both directions.
   */
  degree(handle: NodeHandle): number {
    return (this.outEdges.get(handle)?.size ?? 0) + (this.inEdges.get(handle)?.size ?? 0)
  }

  // ===========================================================================
  // PROPERTY INDEXES
  // ===========================================================================

  createIndex(label: string, property: string): void {
    const key = `${label}.${property}`
    if (this.propertyIndexes.has(key)) return

    const index = new Map<string, Set<NodeHandle>>()
    this.propertyIndexes.set(key, index)
    for (const handle of this.nodesByLabel.get(label) ?? []) {
      const value = this.nodes.get(handle)?.properties[property]
      if (value !== undefined) addTo(index, indexKey(value), handle)
    }
  }

  private indexNodeProperties(node: StoredNode): void {
    for (const [property, index] of this.indexesOf(node.label)) {
      const value = node.properties[property]
      if (value !== undefined) addTo(index, indexKey(value), node.handle)
    }
  }

  private removeNodeFromIndexes(node: StoredNode): void {
    for (const [property, index] of this.indexesOf(node.label)) {
      const value = node.properties[property]
      if (value !== undefined) index.get(indexKey(value))?.delete(node.handle)
    }
  }

  private *indexesOf(label: string): Generator<[string, Map<string, Set<NodeHandle>>]> {
    const prefix = `${label}.`
    for (const [key, index] of this.propertyIndexes) {
      if (key.startsWith(prefix)) yield [key.slice(prefix.length), index]
    }
  }

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  /**
   * Remove all data. Declared indexes stay, emptied.
   */
  clear(): void {
    this.nodes.clear()
    this.edges.clear()
    this.outEdges.clear()
    this.inEdges.clear()
    this.nodesByLabel.clear()
    this.edgesByType.clear()
    for (const index of this.propertyIndexes.values()) index.clear()
    this.nodeSequence = 0
    this.edgeSequence = 0
  }

  stats(): MemoryStoreStats {
    return {
      nodes: this.nodes.size,
      edges: this.edges.size,
      labels: Array.from(this.nodesByLabel.values()).filter((set) => set.size > 0).length,
      edgeTypes: Array.from(this.edgesByType.values()).filter((set) => set.size > 0).length,
      indexes: this.propertyIndexes.size,
    }
  }

  export(): MemoryGraphData {
    return {
      nodes: Array.from(this.nodes.values(), (node) => structuredClone(node)),
      edges: Array.from(this.edges.values(), (edge) => structuredClone(edge)),
    }
  }

  /**
   * Replace all data with a dump. Handles are kept; new handles continue
   * after the highest imported one.
   */
  import(data: MemoryGraphData): void {
    validateDump(data)

    this.clear()
    for (const node of data.nodes) {
      this.insertNode(structuredClone(node))
      this.nodeSequence = Math.max(this.nodeSequence, sequenceOf(node.handle, "n"))
    }
    for (const edge of data.edges) {
      this.insertEdge(structuredClone(edge))
      this.edgeSequence = Math.max(this.edgeSequence, sequenceOf(edge.handle, "r"))
    }
  }

  private insertNode(node: StoredNode): void {
    this.nodes.set(node.handle, node)
    addTo(this.nodesByLabel, node.label, node.handle)
    this.outEdges.set(node.handle, new Set())
    this.inEdges.set(node.handle, new Set())
    this.indexNodeProperties(node)
  }

  private insertEdge(edge: StoredEdge): void {
    this.edges.set(edge.handle, edge)
    addTo(this.edgesByType, edge.type, edge.handle)
    addTo(this.outEdges, edge.from, edge.handle)
    addTo(this.inEdges, edge.to, edge.handle)
  }
}
