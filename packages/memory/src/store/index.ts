/**
 * In-Memory Store Module
 */

export { MemoryGraph } from "./graph-store"
export { MemoryGraphStore } from "./memory-store"
export type {
  StoredNode,
  StoredEdge,
  IndexConfig,
  MemoryGraphData,
  MemoryGraphStoreConfig,
  MemoryStoreStats,
} from "./types"
