/**
 * Ordered List
 *
 * Targets in a significant order, persisted as an ordinal on each
 * relationship. An entity appears at most once.
 */

import type { Entity, EntityOf } from "../entity"
import { DuplicateLinkError, TypeMismatchError } from "../errors"
import type { AnySchema } from "../schema/types"
import type { PropertyMap } from "../store/types"
import { AssociationCollection } from "./base"

export class OrderedList<
  S extends AnySchema = AnySchema,
  T extends string = string,
> extends AssociationCollection<S, T> {
  readonly variant = "list" as const

  at(index: number): EntityOf<S, T> | undefined {
    this.requireLoaded()
    const member = this.members.at(index)
    return member as EntityOf<S, T> | undefined
  }

  indexOf(entity: Entity): number {
    this.requireLoaded()
    return this.members.indexOf(entity)
  }

  includes(entity: Entity): boolean {
    return this.has(entity)
  }

  append(entity: Entity, properties: PropertyMap = {}): void {
    this.insert(this.size, entity, properties)
  }

  /**
   * Insert at a position; indexes past the end append.
   *
   * @throws DuplicateLinkError when the entity is already a member
   */
  insert(index: number, entity: Entity, properties: PropertyMap = {}): void {
    if (this.has(entity)) throw new DuplicateLinkError(this.owner.type, this.name)
    const position = Math.max(0, Math.min(index < 0 ? this.size + index : index, this.size))
    this.link(entity, properties, position)
  }

  /**
   * @returns whether the entity was a member
   */
  remove(entity: Entity): boolean {
    if (!this.has(entity)) return false
    this.unlink(entity)
    return true
  }

  /**
   * Put the current members in a new order.
   *
   * @throws TypeMismatchError unless `order` is a permutation of the members
   */
  reorder(order: readonly Entity[]): void {
    this.owner.assertWritable()
    this.requireLoaded()
    const current = new Set(this.members)
    const next = new Set(order)
    if (next.size !== order.length || next.size !== current.size || order.some((e) => !current.has(e))) {
      throw new TypeMismatchError(
        `reorder() of '${this.owner.type}.${this.name}' needs a permutation of its members`,
        this.name,
        "permutation",
      )
    }
    if (order.every((entity, i) => this.members[i] === entity)) return
    this.members = order.slice()
    this.markDirty()
  }
}
