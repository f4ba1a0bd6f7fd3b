/**
 * In-Memory Graph Store Types
 */

import type {
  DeletePolicy,
  Logger,
  NodeHandle,
  PropertyMap,
  RelationshipHandle,
} from "graphmap"

/**
 * Stored node.
 */
export interface StoredNode {
  handle: NodeHandle
  label: string
  properties: PropertyMap
}

/**
 * Stored relationship with its endpoints.
 */
export interface StoredEdge {
  handle: RelationshipHandle
  type: string
  from: NodeHandle
  to: NodeHandle
  properties: PropertyMap
}

/**
 * Property index declaration. `findNodes` uses the index when its filter
 * names the property for the label.
 */
export interface IndexConfig {
  label: string
  property: string
}

/**
 * Plain-data dump of a store, as produced by `export()`.
 */
export interface MemoryGraphData {
  nodes: StoredNode[]
  edges: StoredEdge[]
}

export interface MemoryStoreStats {
  nodes: number
  edges: number
  labels: number
  edgeTypes: number
  indexes: number
}

export interface MemoryGraphStoreConfig {
  /** Name used in logs and errors (default: "memory") */
  name?: string
  /**
   * What `deleteNode` does with relationships that still reference the node.
   * - 'restrict' (default): fail with ReferentialError
   * - 'cascade': delete them with the node
   */
  deletePolicy?: DeletePolicy
  /** Fail with StoreTimeoutError when the store lock is not acquired in time */
  lockTimeoutMs?: number
  indexes?: IndexConfig[]
  logger?: Logger
}
