/**
 * Neo4j Graph Store
 *
 * Graph store over a Bolt driver (Neo4j, Memgraph, ...). Handles are element
 * ids; `transaction()` is a managed write transaction, rolled back by the
 * server when the unit of work fails.
 */

import neo4j from "neo4j-driver"
import {
  GraphMapError,
  NodeNotFoundError,
  ReferentialError,
  StoreTimeoutError,
  StoreUnavailableError,
} from "../../errors"
import { noopLogger, type Logger } from "../../utils/logger"
import type {
  DeletePolicy,
  Direction,
  GraphStore,
  GraphStoreOperations,
  NodeHandle,
  NodeRecord,
  PropertyMap,
  PropertyPatch,
  RelationshipHandle,
  RelationshipRef,
} from "../types"
import { cypher, type Statement } from "./cypher"
import type { BoltDriver, BoltTransaction, Neo4jStoreConfig } from "./types"
import { fromNeo4jProperties, fromNeo4jValue, toNeo4jProperties } from "./values"

type Row = Record<string, unknown>
type Runner = (statement: Statement) => Promise<Row[]>

const UNAVAILABLE_CODES = new Set(["ServiceUnavailable", "SessionExpired"])

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code
  }
  return undefined
}

function stringField(row: Row | undefined, key: string): string | undefined {
  const value = row?.[key]
  return typeof value === "string" ? value : undefined
}

/**
 * The eight primitive operations, issued through one transaction.
 */
class CypherOperations implements GraphStoreOperations {
  constructor(
    private readonly run: Runner,
    private readonly deletePolicy: DeletePolicy,
  ) {}

  async createNode(label: string, properties: PropertyMap): Promise<NodeHandle> {
    const rows = await this.run(cypher.createNode(label, properties))
    return this.handleFrom(rows, "createNode")
  }

  async updateNode(handle: NodeHandle, properties: PropertyPatch): Promise<void> {
    const rows = await this.run(cypher.updateNode(handle, toNeo4jProperties(properties)))
    if (rows.length === 0) throw new NodeNotFoundError(handle)
  }

  async deleteNode(handle: NodeHandle): Promise<void> {
    if (this.deletePolicy === "cascade") {
      await this.run(cypher.deleteNode(handle, true))
      return
    }
    const [row] = await this.run(cypher.degree(handle))
    if (!row) throw new NodeNotFoundError(handle)
    const degree = fromNeo4jValue(row.degree)
    if (typeof degree === "number" && degree > 0) throw new ReferentialError(handle, degree)
    await this.run(cypher.deleteNode(handle, false))
  }

  async createRelationship(
    type: string,
    from: NodeHandle,
    to: NodeHandle,
    properties: PropertyMap,
  ): Promise<RelationshipHandle> {
    const rows = await this.run(cypher.createRelationship(type, from, to, properties))
    if (rows.length === 0) {
      const existing = await this.run(cypher.existingNodes([from, to]))
      const found = new Set(existing.map((row) => stringField(row, "handle")))
      throw new NodeNotFoundError(found.has(from) ? to : from)
    }
    return this.handleFrom(rows, "createRelationship")
  }

  async deleteRelationship(handle: RelationshipHandle): Promise<void> {
    await this.run(cypher.deleteRelationship(handle))
  }

  async fetchNode(handle: NodeHandle): Promise<NodeRecord | undefined> {
    const [row] = await this.run(cypher.fetchNode(handle))
    if (!row) return undefined
    const labels = Array.isArray(row.labels) ? row.labels : []
    const label = labels.find((value): value is string => typeof value === "string")
    if (label === undefined) return undefined
    return { handle, label, properties: fromNeo4jProperties(row.properties) }
  }

  async fetchRelationships(
    handle: NodeHandle,
    type: string,
    direction: Direction,
  ): Promise<RelationshipRef[]> {
    const rows = await this.run(cypher.fetchRelationships(handle, type, direction))
    const result: RelationshipRef[] = []
    for (const row of rows) {
      const ref = stringField(row, "handle")
      const otherEnd = stringField(row, "otherEnd")
      if (ref === undefined || otherEnd === undefined) continue
      result.push({ handle: ref, otherEnd, properties: fromNeo4jProperties(row.properties) })
    }
    return result
  }

  async findNodes(label: string, filter: PropertyMap): Promise<NodeHandle[]> {
    const rows = await this.run(cypher.findNodes(label, filter))
    return rows.flatMap((row) => {
      const handle = stringField(row, "handle")
      return handle === undefined ? [] : [handle]
    })
  }

  private handleFrom(rows: Row[], operation: string): string {
    const handle = stringField(rows[0], "handle")
    if (handle === undefined) throw new GraphMapError(`${operation} returned no element id`)
    return handle
  }
}

export class Neo4jGraphStore implements GraphStore {
  readonly name: string
  readonly transactional = true

  private readonly driver: BoltDriver
  private readonly logger: Logger

  /**
   * @param driver - Driver to use instead of connecting to `config.uri`
   */
  constructor(
    private readonly config: Neo4jStoreConfig,
    driver?: BoltDriver,
  ) {
    this.name = `neo4j(${config.uri})`
    this.logger = config.logger ?? noopLogger
    this.driver = driver ?? Neo4jGraphStore.connect(config)
  }

  private static connect(config: Neo4jStoreConfig): BoltDriver {
    const auth = config.auth ? neo4j.auth.basic(config.auth.username, config.auth.password) : undefined

    const driverConfig: Record<string, unknown> = {}
    if (config.pool?.maxSize) driverConfig.maxConnectionPoolSize = config.pool.maxSize
    if (config.pool?.acquisitionTimeout) {
      driverConfig.connectionAcquisitionTimeout = config.pool.acquisitionTimeout
    }
    if (config.encrypted !== undefined) driverConfig.encrypted = config.encrypted
    if (config.trust) driverConfig.trust = config.trust

    return neo4j.driver(config.uri, auth, driverConfig) as unknown as BoltDriver
  }

  /**
   * Check that the server is reachable.
   *
   * @throws StoreUnavailableError
   */
  async verifyConnectivity(): Promise<void> {
    try {
      await this.driver.verifyConnectivity()
    } catch (error) {
      throw this.mapError(error)
    }
  }

  async transaction<T>(work: (ops: GraphStoreOperations) => Promise<T>): Promise<T> {
    return this.execute("write", (tx) => work(this.operations(tx)))
  }

  createNode(label: string, properties: PropertyMap): Promise<NodeHandle> {
    return this.execute("write", (tx) => this.operations(tx).createNode(label, properties))
  }

  updateNode(handle: NodeHandle, properties: PropertyPatch): Promise<void> {
    return this.execute("write", (tx) => this.operations(tx).updateNode(handle, properties))
  }

  deleteNode(handle: NodeHandle): Promise<void> {
    return this.execute("write", (tx) => this.operations(tx).deleteNode(handle))
  }

  createRelationship(
    type: string,
    from: NodeHandle,
    to: NodeHandle,
    properties: PropertyMap,
  ): Promise<RelationshipHandle> {
    return this.execute("write", (tx) =>
      this.operations(tx).createRelationship(type, from, to, properties),
    )
  }

  deleteRelationship(handle: RelationshipHandle): Promise<void> {
    return this.execute("write", (tx) => this.operations(tx).deleteRelationship(handle))
  }

  fetchNode(handle: NodeHandle): Promise<NodeRecord | undefined> {
    return this.execute("read", (tx) => this.operations(tx).fetchNode(handle))
  }

  fetchRelationships(
    handle: NodeHandle,
    type: string,
    direction: Direction,
  ): Promise<RelationshipRef[]> {
    return this.execute("read", (tx) => this.operations(tx).fetchRelationships(handle, type, direction))
  }

  findNodes(label: string, filter: PropertyMap): Promise<NodeHandle[]> {
    return this.execute("read", (tx) => this.operations(tx).findNodes(label, filter))
  }

  async close(): Promise<void> {
    await this.driver.close()
  }

  private operations(tx: BoltTransaction): CypherOperations {
    const run: Runner = async ({ query, params }) => {
      this.logger.debug(query, params)
      const result = await tx.run(query, params)
      return result.records.map((record) => record.toObject())
    }
    return new CypherOperations(run, this.config.deletePolicy ?? "restrict")
  }

  private async execute<T>(mode: "read" | "write", work: (tx: BoltTransaction) => Promise<T>): Promise<T> {
    const session = this.driver.session({
      database: this.config.database,
      defaultAccessMode: mode === "read" ? neo4j.session.READ : neo4j.session.WRITE,
    })
    const txConfig = this.config.timeoutMs !== undefined ? { timeout: this.config.timeoutMs } : undefined

    try {
      return mode === "read"
        ? await session.executeRead(work, txConfig)
        : await session.executeWrite(work, txConfig)
    } catch (error) {
      throw this.mapError(error)
    } finally {
      await session.close()
    }
  }

  /**
   * Translate driver failures into store errors; anything else passes through.
   */
  private mapError(error: unknown): unknown {
    if (error instanceof GraphMapError) return error
    const code = errorCode(error)
    if (code === undefined) return error
    const cause = error instanceof Error ? error : undefined

    if (UNAVAILABLE_CODES.has(code)) {
      return new StoreUnavailableError(
        `${this.name} is unavailable: ${cause?.message ?? code}`,
        this.name,
        cause,
      )
    }
    if (code.includes("TransactionTimedOut")) {
      return new StoreTimeoutError(this.config.timeoutMs ?? 0, this.name, cause)
    }
    return error
  }
}
