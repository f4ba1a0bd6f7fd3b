/**
 * Graph Store Contract
 *
 * The boundary between the sync engine and a backing graph. The in-memory
 * store and the Neo4j store both implement it; anything else that can create,
 * update, delete and enumerate nodes and relationships by handle can too.
 */

/** Opaque store-assigned reference to a node. */
export type NodeHandle = string

/** Opaque store-assigned reference to a relationship. */
export type RelationshipHandle = string

/** Values a node or relationship property can hold. */
export type Scalar = string | number | boolean | Date

/** Properties as read back from the store. */
export type PropertyMap = Record<string, Scalar>

/** Properties as written to the store; `null` removes the property. */
export type PropertyPatch = Record<string, Scalar | null>

/**
 * Direction of a relationship relative to the node it is enumerated from.
 * - 'out': the node is the relationship's source
 * - 'in': the node is the relationship's target
 */
export type Direction = "out" | "in"

/** What `deleteNode` does when relationships still reference the node. */
export type DeletePolicy = "restrict" | "cascade"

export type MaybePromise<T> = T | Promise<T>

/**
 * A node read from the store.
 */
export interface NodeRecord {
  handle: NodeHandle
  label: string
  properties: PropertyMap
}

/**
 * One relationship seen from one of its endpoints.
 */
export interface RelationshipRef {
  /** Relationship handle */
  handle: RelationshipHandle
  /** Handle of the node at the other end */
  otherEnd: NodeHandle
  /** Relationship properties */
  properties: PropertyMap
}

/**
 * Primitive operations the sync engine issues.
 */
export interface GraphStoreOperations {
  createNode(label: string, properties: PropertyMap): MaybePromise<NodeHandle>

  /** Merge properties into a node. Fails with NodeNotFoundError for an unknown handle. */
  updateNode(handle: NodeHandle, properties: PropertyPatch): MaybePromise<void>

  /** Fails with ReferentialError while relationships reference the node, unless the store cascades. */
  deleteNode(handle: NodeHandle): MaybePromise<void>

  createRelationship(
    type: string,
    from: NodeHandle,
    to: NodeHandle,
    properties: PropertyMap,
  ): MaybePromise<RelationshipHandle>

  deleteRelationship(handle: RelationshipHandle): MaybePromise<void>

  fetchNode(handle: NodeHandle): MaybePromise<NodeRecord | undefined>

  fetchRelationships(
    handle: NodeHandle,
    type: string,
    direction: Direction,
  ): MaybePromise<RelationshipRef[]>

  /** Handles of nodes with the label whose properties equal every filter entry. */
  findNodes(label: string, filter: PropertyMap): MaybePromise<NodeHandle[]>
}

/**
 * A backing graph.
 */
export interface GraphStore extends GraphStoreOperations {
  /** Store name, used in logs and errors */
  readonly name: string

  /**
   * Whether a failed `transaction()` undoes its own side.
   * When false, operations applied before the failure stay applied.
   */
  readonly transactional: boolean

  /**
   * Run a unit of work exclusively. Operations must go through `ops`, not
   * through the store itself.
   */
  transaction<T>(work: (ops: GraphStoreOperations) => Promise<T>): Promise<T>

  /** Release connections. */
  close?(): Promise<void>
}
