/**
 * Custom Error Classes
 */

/**
 * Base error for everything raised by the mapper.
 */
export class GraphMapError extends Error {
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = "GraphMapError"
    this.cause = cause

    // V8-specific stack trace capture (not in TypeScript's lib)
    if (typeof (Error as { captureStackTrace?: unknown }).captureStackTrace === "function") {
      ;(Error as { captureStackTrace: (target: Error, ctor: unknown) => void }).captureStackTrace(
        this,
        this.constructor,
      )
    }
  }
}

/**
 * Schema error.
 * Thrown by `defineSchema()` when a declaration is contradictory.
 */
export class SchemaError extends GraphMapError {
  constructor(
    message: string,
    public readonly entityType?: string,
    public readonly attribute?: string,
  ) {
    super(message)
    this.name = "SchemaError"
  }
}

/**
 * Type mismatch error.
 * Thrown at mutation time when a value or a linked entity does not match the declaration.
 */
export class TypeMismatchError extends GraphMapError {
  constructor(
    message: string,
    public readonly attribute: string,
    public readonly expected: string,
    public readonly received?: unknown,
  ) {
    super(message)
    this.name = "TypeMismatchError"
  }
}

/**
 * Referential error.
 * Thrown by a store when deleting a node that relationships still reference.
 */
export class ReferentialError extends GraphMapError {
  constructor(
    public readonly handle: string,
    public readonly degree: number,
  ) {
    super(`Cannot delete node '${handle}': ${degree} relationship(s) still reference it`)
    this.name = "ReferentialError"
  }
}

/**
 * Detached entity error.
 * Thrown when mutating an entity that was deleted, evicted or belongs to a closed session.
 */
export class DetachedEntityError extends GraphMapError {
  constructor(
    public readonly entityType: string,
    public readonly state: string,
    public readonly handle?: string,
  ) {
    const details = handle ? ` '${handle}'` : ""
    super(`Entity ${entityType}${details} is ${state} and can no longer be modified`)
    this.name = "DetachedEntityError"
  }
}

/**
 * Store unavailable error.
 * Thrown when the backing store cannot be reached. Transient.
 */
export class StoreUnavailableError extends GraphMapError {
  constructor(
    message: string,
    public readonly store?: string,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = "StoreUnavailableError"
  }
}

/**
 * Store timeout error.
 * Thrown when a store operation exceeds its timeout. Transient.
 */
export class StoreTimeoutError extends GraphMapError {
  constructor(
    public readonly timeoutMs: number,
    public readonly store?: string,
    cause?: Error,
  ) {
    super(`Store operation timed out after ${timeoutMs}ms`, cause)
    this.name = "StoreTimeoutError"
  }
}

/**
 * Node not found error.
 */
export class NodeNotFoundError extends GraphMapError {
  constructor(public readonly handle: string) {
    super(`Node not found: '${handle}'`)
    this.name = "NodeNotFoundError"
  }
}

/**
 * Thrown when reading or mutating an association collection that was never loaded.
 */
export class NotLoadedError extends GraphMapError {
  constructor(
    public readonly entityType: string,
    public readonly association: string,
  ) {
    super(`Association '${entityType}.${association}' is not loaded; call load() first`)
    this.name = "NotLoadedError"
  }
}

/**
 * Thrown when an ordered list would contain the same entity twice.
 */
export class DuplicateLinkError extends GraphMapError {
  constructor(
    public readonly entityType: string,
    public readonly association: string,
  ) {
    super(`'${entityType}.${association}' already contains this entity`)
    this.name = "DuplicateLinkError"
  }
}

/**
 * Thrown when a session is used outside of its single-writer contract.
 */
export class SessionStateError extends GraphMapError {
  constructor(message: string) {
    super(message)
    this.name = "SessionStateError"
  }
}
