/**
 * Session Module
 */

export { Session, openSession } from "./session"
export type { EntityFilter } from "./session"
export { ChangeTracker } from "./change-tracker"
export type { DirtyRecord, AttributeKind } from "./change-tracker"
export { IdentityMap } from "./identity-map"
export type { Hydrator } from "./identity-map"
export type { SessionConfig, CommitResult, UnitOfWork } from "./types"
