/**
 * Neo4j/Bolt Store Module
 *
 * Graph store for Neo4j, Memgraph, and other Bolt-compatible databases.
 */

export { Neo4jGraphStore } from "./store"
export { cypher, escapeIdentifier } from "./cypher"
export type { Statement } from "./cypher"
export { fromNeo4jValue, fromNeo4jProperties, toNeo4jValue, toNeo4jProperties } from "./values"
export type {
  Neo4jStoreConfig,
  BoltDriver,
  BoltSession,
  BoltTransaction,
  BoltResult,
  BoltRecord,
} from "./types"
