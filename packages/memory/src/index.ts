/**
 * graphmap-memory
 *
 * Zero-infrastructure in-memory graph store for graphmap sessions.
 *
 * @example
 * ```typescript
 * import { defineSchema, entity, relationship, openSession } from 'graphmap'
 * import { MemoryGraphStore } from 'graphmap-memory'
 * import { z } from 'zod'
 *
 * const schema = defineSchema({
 *   entities: {
 *     Tag: entity({
 *       properties: { name: z.string() },
 *       unique: ['name'],
 *       relationships: {
 *         related: relationship({ target: 'Tag', variant: 'set', inverse: 'relatedBy' }),
 *         relatedBy: relationship({ target: 'Tag', variant: 'set', direction: 'in', inverse: 'related' }),
 *       },
 *     }),
 *   },
 * })
 *
 * // No database required
 * const store = new MemoryGraphStore({ indexes: [{ label: 'Tag', property: 'name' }] })
 * const session = openSession(schema, store)
 *
 * const scifi = await session.findOrCreate('Tag', { name: 'sci-fi' })
 * await session.load(scifi, 'related')
 * scifi.assoc.related.add(session.create('Tag', { name: 'space' }))
 * await session.commit()
 * ```
 *
 * @packageDocumentation
 */

export { MemoryGraph, MemoryGraphStore } from "./store"
export type {
  StoredNode,
  StoredEdge,
  IndexConfig,
  MemoryGraphData,
  MemoryGraphStoreConfig,
  MemoryStoreStats,
} from "./store"
