/**
 * Errors Module
 */

export {
  GraphMapError,
  SchemaError,
  TypeMismatchError,
  ReferentialError,
  DetachedEntityError,
  StoreUnavailableError,
  StoreTimeoutError,
  NodeNotFoundError,
  NotLoadedError,
  DuplicateLinkError,
  SessionStateError,
} from "./errors"
