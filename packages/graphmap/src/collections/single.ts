/**
 * Single Reference
 *
 * Zero or one target: one-to-one and many-to-one sides.
 */

import type { Entity, EntityOf } from "../entity"
import type { AnySchema } from "../schema/types"
import type { PropertyMap } from "../store/types"
import { AssociationCollection } from "./base"

export class SingleReference<
  S extends AnySchema = AnySchema,
  T extends string = string,
> extends AssociationCollection<S, T> {
  readonly variant = "single" as const

  get(): EntityOf<S, T> | undefined {
    this.requireLoaded()
    const member = this.members[0]
    return member as EntityOf<S, T> | undefined
  }

  /**
   * Replace the held reference; `null` clears it. Setting the entity already
   * held changes nothing.
   */
  set(entity: Entity | null | undefined, properties: PropertyMap = {}): void {
    const current = this.get()
    if (entity === null || entity === undefined) {
      if (current) this.unlink(current)
      return
    }
    if (current === entity) return
    this.link(entity, properties)
  }
}
