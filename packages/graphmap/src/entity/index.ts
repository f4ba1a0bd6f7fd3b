/**
 * Entity Module
 */

export { Entity, isScalar } from "./entity"
export type { EntityOf, EntityState, Lifecycle } from "./entity"
