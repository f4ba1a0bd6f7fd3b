/**
 * Store Module
 */

export type {
  NodeHandle,
  RelationshipHandle,
  Scalar,
  PropertyMap,
  PropertyPatch,
  Direction,
  DeletePolicy,
  MaybePromise,
  NodeRecord,
  RelationshipRef,
  GraphStoreOperations,
  GraphStore,
} from "./types"
export * from "./neo4j"
