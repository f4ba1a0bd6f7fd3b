/**
 * Neo4j Store Type Definitions
 */

import type { DeletePolicy } from "../types"
import type { Logger } from "../../utils/logger"

/**
 * Connection and behavior settings of a Neo4j (or any Bolt) store.
 */
export interface Neo4jStoreConfig {
  uri: string
  auth?: {
    username: string
    password: string
  }
  database?: string
  /** Transaction timeout passed to the server */
  timeoutMs?: number
  pool?: {
    maxSize?: number
    acquisitionTimeout?: number
  }
  encrypted?: boolean
  trust?: "TRUST_ALL_CERTIFICATES" | "TRUST_SYSTEM_CA_SIGNED_CERTIFICATES"
  /** 'restrict' (default) refuses to delete linked nodes; 'cascade' detaches them */
  deletePolicy?: DeletePolicy
  logger?: Logger
}

// Structural view of the Bolt driver, as much of it as the store uses

export interface BoltDriver {
  session(config?: { database?: string; defaultAccessMode?: string }): BoltSession
  verifyConnectivity(): Promise<unknown>
  close(): Promise<void>
}

export interface BoltSession {
  executeRead<T>(work: (tx: BoltTransaction) => Promise<T>, config?: { timeout?: number }): Promise<T>
  executeWrite<T>(work: (tx: BoltTransaction) => Promise<T>, config?: { timeout?: number }): Promise<T>
  close(): Promise<void>
}

export interface BoltTransaction {
  run(query: string, params?: Record<string, unknown>): Promise<BoltResult>
}

export interface BoltResult {
  records: BoltRecord[]
}

export interface BoltRecord {
  keys: readonly PropertyKey[]
  toObject(): Record<string, unknown>
}
