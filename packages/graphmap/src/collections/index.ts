/**
 * Collections Module
 */

import type { Entity } from "../entity"
import type { RelationshipDescriptor } from "../schema/types"
import type { AssociationCollection } from "./base"
import { OrderedList } from "./list"
import { UnorderedSet } from "./set"
import { SingleReference } from "./single"

export { AssociationCollection, isOrdinalKey } from "./base"
export type { LinkRecord } from "./base"
export { SingleReference } from "./single"
export { OrderedList } from "./list"
export { UnorderedSet } from "./set"

/**
 * Create the collection class matching a relationship's variant.
 */
export function createCollection(
  owner: Entity,
  descriptor: RelationshipDescriptor,
  loaded: boolean,
): AssociationCollection {
  switch (descriptor.variant) {
    case "single":
      return new SingleReference(owner, descriptor, loaded)
    case "list":
      return new OrderedList(owner, descriptor, loaded)
    case "set":
      return new UnorderedSet(owner, descriptor, loaded)
  }
}
