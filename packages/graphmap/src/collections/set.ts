/**
 * Unordered Set
 *
 * Targets unique by identity, in no particular order. Adding a member or
 * discarding a non-member changes nothing, dirty state included.
 */

import type { Entity } from "../entity"
import type { AnySchema } from "../schema/types"
import type { PropertyMap } from "../store/types"
import { AssociationCollection } from "./base"

export class UnorderedSet<
  S extends AnySchema = AnySchema,
  T extends string = string,
> extends AssociationCollection<S, T> {
  readonly variant = "set" as const

  /**
   * @returns whether the entity was added
   */
  add(entity: Entity, properties: PropertyMap = {}): boolean {
    if (this.has(entity)) return false
    this.link(entity, properties)
    return true
  }

  /**
   * @returns whether the entity was a member
   */
  discard(entity: Entity): boolean {
    if (!this.has(entity)) return false
    this.unlink(entity)
    return true
  }
}
