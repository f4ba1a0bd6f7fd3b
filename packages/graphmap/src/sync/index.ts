/**
 * Sync Module
 */

export { SyncEngine } from "./engine"
export { buildPlan, edgeKey } from "./plan"
export type { EdgeWrite, Endpoints, RelationshipPlan } from "./plan"
export { assignOrdinals, longestIncreasingRun } from "./ordinals"
