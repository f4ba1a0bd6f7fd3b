/**
 * Session Scenarios
 *
 * Whole units of work against the in-memory store: commits, reloads in a
 * fresh session, lazy collections, staged deletions and failed commits.
 */

import { describe, it, expect, beforeEach } from "vitest"
import {
  NotLoadedError,
  openSession,
  ReferentialError,
  SessionStateError,
  StoreUnavailableError,
  type GraphStore,
  type GraphStoreOperations,
  type NodeHandle,
  type PropertyMap,
  type PropertyPatch,
  type Direction,
  type Session,
} from "graphmap"
import { MemoryGraphStore } from "../src"
import { handleOf, mediaSchema, type MediaSchema } from "./fixtures/media-schema"

// =============================================================================
// FIXTURES
// =============================================================================

/**
 * Memory store whose n-th node creation fails once, as a dropped connection would.
 */
class FlakyStore implements GraphStore {
  readonly name = "flaky"
  readonly transactional = false
  private creations = 0

  constructor(
    readonly inner: MemoryGraphStore,
    private readonly failingCreation: number,
  ) {}

  transaction<T>(work: (ops: GraphStoreOperations) => Promise<T>): Promise<T> {
    return this.inner.transaction((ops) => work(this.wrap(ops)))
  }

  createNode(label: string, properties: PropertyMap) {
    return this.inner.createNode(label, properties)
  }

  updateNode(handle: NodeHandle, properties: PropertyPatch) {
    return this.inner.updateNode(handle, properties)
  }

  deleteNode(handle: NodeHandle) {
    return this.inner.deleteNode(handle)
  }

  createRelationship(type: string, from: NodeHandle, to: NodeHandle, properties: PropertyMap) {
    return this.inner.createRelationship(type, from, to, properties)
  }

  deleteRelationship(handle: string) {
    return this.inner.deleteRelationship(handle)
  }

  fetchNode(handle: NodeHandle) {
    return this.inner.fetchNode(handle)
  }

  fetchRelationships(handle: NodeHandle, type: string, direction: Direction) {
    return this.inner.fetchRelationships(handle, type, direction)
  }

  findNodes(label: string, filter: PropertyMap) {
    return this.inner.findNodes(label, filter)
  }

  private wrap(ops: GraphStoreOperations): GraphStoreOperations {
    return {
      createNode: (label, properties) => {
        this.creations++
        if (this.creations === this.failingCreation) {
          throw new StoreUnavailableError("connection dropped", this.name)
        }
        return ops.createNode(label, properties)
      },
      updateNode: (handle, properties) => ops.updateNode(handle, properties),
      deleteNode: (handle) => ops.deleteNode(handle),
      createRelationship: (type, from, to, properties) => ops.createRelationship(type, from, to, properties),
      deleteRelationship: (handle) => ops.deleteRelationship(handle),
      fetchNode: (handle) => ops.fetchNode(handle),
      fetchRelationships: (handle, type, direction) => ops.fetchRelationships(handle, type, direction),
      findNodes: (label, filter) => ops.findNodes(label, filter),
    }
  }
}

// =============================================================================
// TESTS
// =============================================================================

describe("Session over MemoryGraphStore", () => {
  let store: MemoryGraphStore
  let open: () => Session<MediaSchema>

  beforeEach(() => {
    store = new MemoryGraphStore()
    open = () => openSession(mediaSchema, store)
  })

  /** Series n1 with episodes n2 and n3, in that order. */
  async function seedSeries(): Promise<void> {
    const session = open()
    const series = session.create("Series", { title: "The Expanse", network: "Syfy" })
    const pilot = session.create("Episode", {
      title: "Dulcinea",
      season: 1,
      episodeNumber: 1,
      released: new Date("2015-12-14T00:00:00Z"),
    })
    const second = session.create("Episode", { title: "The Big Empty", season: 1, episodeNumber: 2 })
    series.assoc.episodes.append(pilot)
    series.assoc.episodes.append(second)
    await session.commit()
    session.close()
  }

  // ===========================================================================
  // ROUND TRIP
  // ===========================================================================

  describe("commit", () => {
    it("creates nodes and positioned relationships", async () => {
      const session = open()
      const series = session.create("Series", { title: "The Expanse", network: "Syfy" })
      const pilot = session.create("Episode", { title: "Dulcinea", season: 1, episodeNumber: 1 })
      const second = session.create("Episode", { title: "The Big Empty", season: 1, episodeNumber: 2 })
      series.assoc.episodes.append(pilot)
      series.assoc.episodes.append(second)

      const result = await session.commit()

      expect(result).toEqual({ created: 3, updated: 0, deleted: 0, linked: 2, unlinked: 0 })
      expect([series.handle, pilot.handle, second.handle]).toEqual(["n1", "n2", "n3"])
      expect(series.state).toBe("managed-clean")
      expect(store.fetchNode("n1")).toEqual({
        handle: "n1",
        label: "TVSeries",
        properties: { title: "The Expanse", network: "Syfy" },
      })
      expect(store.fetchRelationships("n1", "PART_OF", "in")).toEqual([
        { handle: "r1", otherEnd: "n2", properties: { _ordinal_in: 1 } },
        { handle: "r2", otherEnd: "n3", properties: { _ordinal_in: 2 } },
      ])
    })

    it("commits nothing twice", async () => {
      await seedSeries()
      const session = open()
      await session.get("Series", "n1")

      expect(await session.commit()).toEqual({ created: 0, updated: 0, deleted: 0, linked: 0, unlinked: 0 })
    })

    it("reads the graph back in a fresh session", async () => {
      await seedSeries()
      const session = open()

      const series = await session.get("Series", "n1")
      await series.assoc.episodes.load()
      const episodes = series.assoc.episodes.toArray()

      expect(series.props.network).toBe("Syfy")
      expect(episodes.map((episode) => episode.props.title)).toEqual(["Dulcinea", "The Big Empty"])
      expect(episodes[0]?.props.released).toEqual(new Date("2015-12-14T00:00:00Z"))
    })

    it("resolves each node to one entity", async () => {
      await seedSeries()
      const session = open()
      const series = await session.get("Series", "n1")
      await series.assoc.episodes.load()
      const pilot = series.assoc.episodes.at(0)

      await pilot?.assoc.series.load()

      expect(await session.resolve("n2")).toBe(pilot)
      expect(pilot?.assoc.series.get()).toBe(series)
      expect(await session.get("Metadata", "n1")).toBe(series)
    })

    it("rejects a handle of another type", async () => {
      await seedSeries()
      const session = open()

      await expect(session.get("Tag", "n1")).rejects.toThrow("Node 'n1' is a Series, not a Tag")
    })

    it("writes property changes and removals", async () => {
      await seedSeries()
      const session = open()
      const series = await session.get("Series", "n1")

      series.props.network = null
      series.props.title = "The Expanse (2015)"
      const result = await session.commit()

      expect(result).toEqual({ created: 0, updated: 1, deleted: 0, linked: 0, unlinked: 0 })
      expect(store.fetchNode("n1")?.properties).toEqual({ title: "The Expanse (2015)" })
      expect(series.state).toBe("managed-clean")
    })

    it("stores properties under their graph keys", async () => {
      const session = open()
      const file = session.create("File", { path: "/media/expanse/s01e01.mkv" })
      await session.commit()

      expect(store.fetchNode(handleOf(file))?.properties).toEqual({
        file_path: "/media/expanse/s01e01.mkv",
        size: 0,
      })
    })
  })

  // ===========================================================================
  // LISTS
  // ===========================================================================

  describe("ordered lists", () => {
    it("re-creates only the relationships whose position changed", async () => {
      const session = open()
      const series = session.create("Series", { title: "The Expanse" })
      const [first, second, third] = [1, 2, 3].map((episodeNumber) =>
        session.create("Episode", { title: `Episode ${episodeNumber}`, season: 1, episodeNumber }),
      )
      if (!first || !second || !third) throw new Error("episodes were not created")
      series.assoc.episodes.append(first)
      series.assoc.episodes.append(second)
      series.assoc.episodes.append(third)
      await session.commit()

      series.assoc.episodes.reorder([second, first, third])
      const result = await session.commit()

      expect(result).toEqual({ created: 0, updated: 0, deleted: 0, linked: 1, unlinked: 1 })
      expect(store.fetchRelationships("n1", "PART_OF", "in")).toEqual([
        { handle: "r1", otherEnd: "n2", properties: { _ordinal_in: 1 } },
        { handle: "r3", otherEnd: "n4", properties: { _ordinal_in: 3 } },
        { handle: "r4", otherEnd: "n3", properties: { _ordinal_in: 0 } },
      ])

      const reader = open()
      const reloaded = await reader.get("Series", "n1")
      await reloaded.assoc.episodes.load()
      expect(reloaded.assoc.episodes.toArray().map((e) => e.props.title)).toEqual([
        "Episode 2",
        "Episode 1",
        "Episode 3",
      ])
    })

    it("appends to an unloaded list after its last persisted member", async () => {
      await seedSeries()
      const session = open()
      const series = await session.get("Series", "n1")
      const third = session.create("Episode", { title: "Remember the Cant", season: 1, episodeNumber: 3 })

      third.assoc.series.set(series)
      const result = await session.commit()

      expect(result).toEqual({ created: 1, updated: 0, deleted: 0, linked: 1, unlinked: 0 })
      expect(store.fetchRelationships("n4", "PART_OF", "out")).toEqual([
        { handle: "r3", otherEnd: "n1", properties: { _ordinal_in: 3 } },
      ])

      await series.assoc.episodes.load()
      expect(series.assoc.episodes.size).toBe(3)
      expect(series.assoc.episodes.at(2)).toBe(third)
    })
  })

  // ===========================================================================
  // LAZY COLLECTIONS
  // ===========================================================================

  describe("unloaded collections", () => {
    it("refuses to read before load()", async () => {
      await seedSeries()
      const session = open()
      const pilot = await session.get("Episode", "n2")

      expect(pilot.assoc.series.loaded).toBe(false)
      expect(() => pilot.assoc.series.get()).toThrow(NotLoadedError)
    })

    it("refuses to displace an unloaded single inverse", async () => {
      await seedSeries()
      const session = open()
      const pilot = await session.get("Episode", "n2")
      const other = session.create("Series", { title: "Firefly" })

      expect(() => other.assoc.episodes.append(pilot)).toThrow(
        "Association 'Episode.series' is not loaded; call load() first",
      )
      expect(other.assoc.episodes.size).toBe(0)
    })

    it("merges changes staged before load()", async () => {
      await seedSeries()
      const session = open()
      const pilot = await session.get("Episode", "n2")
      const tag = session.create("Tag", { name: "space" })

      tag.assoc.items.add(pilot)
      await pilot.assoc.tags.load()

      expect(pilot.assoc.tags.toArray()).toEqual([tag])

      const result = await session.commit()
      expect(result).toEqual({ created: 1, updated: 0, deleted: 0, linked: 1, unlinked: 0 })
      expect(store.fetchRelationships("n2", "TAGGED", "out")).toEqual([
        { handle: "r3", otherEnd: "n4", properties: {} },
      ])
    })

    it("leaves an entity clean when a set already holds the member", async () => {
      await seedSeries()
      const session = open()
      const pilot = await session.get("Episode", "n2")
      const tag = session.create("Tag", { name: "space" })
      tag.assoc.items.add(pilot)
      await session.commit()

      expect(tag.assoc.items.add(pilot)).toBe(false)
      expect(session.isDirty(tag)).toBe(false)
      expect(session.isDirty(pilot)).toBe(false)
    })

    it("loads every association through session.load()", async () => {
      await seedSeries()
      const session = open()
      const series = await session.get("Series", "n1")

      await session.load(series)

      expect(series.assoc.episodes.size).toBe(2)
      expect(series.assoc.tags.size).toBe(0)
    })
  })

  // ===========================================================================
  // ONE-TO-ONE
  // ===========================================================================

  describe("single references", () => {
    it("keeps a one-to-one relationship exclusive on both sides", async () => {
      const session = open()
      const ada = session.create("Person", { name: "Ada" })
      const grace = session.create("Person", { name: "Grace" })
      const alan = session.create("Person", { name: "Alan" })

      ada.assoc.partner.set(grace)
      alan.assoc.partner.set(grace)

      expect(ada.assoc.partner.get()).toBeUndefined()
      expect(grace.assoc.partnerOf.get()).toBe(alan)

      const result = await session.commit()
      expect(result).toEqual({ created: 3, updated: 0, deleted: 0, linked: 1, unlinked: 0 })
      expect(store.fetchRelationships("n3", "partner", "out")).toEqual([
        { handle: "r1", otherEnd: "n2", properties: {} },
      ])
    })
  })

  // ===========================================================================
  // DELETION
  // ===========================================================================

  describe("delete", () => {
    it("fails the commit on a node that is still referenced", async () => {
      await seedSeries()
      const session = open()
      const pilot = await session.get("Episode", "n2")

      session.delete(pilot)
      const error = await session.commit().catch((e: unknown) => e)

      expect(error).toBeInstanceOf(ReferentialError)
      expect(error).toHaveProperty("message", "Cannot delete node 'n2': 1 relationship(s) still reference it")
      expect(pilot.state).toBe("removed")
      expect(session.isDirty(pilot)).toBe(true)
      expect(store.fetchNode("n2")).toBeDefined()
    })

    it("deletes a node once its last link is discarded", async () => {
      const setup = open()
      const space = setup.create("Tag", { name: "space" })
      space.assoc.items.add(setup.create("Episode", { title: "Dulcinea", season: 1, episodeNumber: 1 }))
      await setup.commit()

      const session = open()
      const pilot = await session.get("Episode", "n2")
      const tag = await session.get("Tag", "n1")
      session.delete(pilot)
      await expect(session.commit()).rejects.toThrow(ReferentialError)

      await tag.assoc.items.load()
      expect(tag.assoc.items.discard(pilot)).toBe(true)
      const result = await session.commit()

      expect(result).toEqual({ created: 0, updated: 0, deleted: 1, linked: 0, unlinked: 1 })
      expect(pilot.state).toBe("deleted")
      expect(tag.assoc.items.size).toBe(0)
      expect(store.fetchNode("n2")).toBeUndefined()
      expect(store.fetchRelationships("n1", "TAGGED", "in")).toEqual([])
    })

    it("unlinks a loaded cascading association before deleting", async () => {
      await seedSeries()
      const session = open()
      const series = await session.get("Series", "n1")
      await series.assoc.episodes.load()
      const pilot = series.assoc.episodes.at(0)

      session.delete(series)
      const result = await session.commit()

      expect(result).toEqual({ created: 0, updated: 0, deleted: 1, linked: 0, unlinked: 2 })
      expect(series.state).toBe("deleted")
      expect(store.fetchNode("n1")).toBeUndefined()
      expect(store.stats()).toEqual({ nodes: 2, edges: 0, labels: 1, edgeTypes: 0, indexes: 0 })

      await pilot?.assoc.series.load()
      expect(pilot?.assoc.series.get()).toBeUndefined()
    })

    it("unlinks an unloaded cascading association from the store", async () => {
      await seedSeries()
      const session = open()
      const series = await session.get("Series", "n1")

      session.delete(series)
      const result = await session.commit()

      expect(result).toEqual({ created: 0, updated: 0, deleted: 1, linked: 0, unlinked: 2 })
      expect(store.stats().edges).toBe(0)
      await expect(session.resolve("n1")).rejects.toThrow("Node not found: 'n1'")
    })

    it("refuses changes to a removed entity", async () => {
      await seedSeries()
      const session = open()
      const series = await session.get("Series", "n1")

      session.delete(series)

      expect(() => {
        series.props.title = "Firefly"
      }).toThrow("Entity Series 'n1' is removed and can no longer be modified")
    })
  })

  // ===========================================================================
  // FAILURES AND CONCURRENCY
  // ===========================================================================

  describe("failed commits", () => {
    it("keeps what a store without rollback already applied", async () => {
      const flaky = new FlakyStore(store, 2)
      const session = openSession(mediaSchema, flaky)
      const series = session.create("Series", { title: "The Expanse" })
      const pilot = session.create("Episode", { title: "Dulcinea", season: 1, episodeNumber: 1 })
      const second = session.create("Episode", { title: "The Big Empty", season: 1, episodeNumber: 2 })
      series.assoc.episodes.append(pilot)
      series.assoc.episodes.append(second)

      await expect(session.commit()).rejects.toThrow("connection dropped")

      expect(series.handle).toBe("n1")
      expect(series.state).toBe("managed-dirty")
      expect(pilot.handle).toBeUndefined()
      expect(pilot.state).toBe("transient")
      expect(second.handle).toBeUndefined()
      expect(store.stats().nodes).toBe(1)

      const retry = await session.commit()

      expect(retry).toEqual({ created: 2, updated: 0, deleted: 0, linked: 2, unlinked: 0 })
      expect([pilot.handle, second.handle]).toEqual(["n2", "n3"])
      expect(store.stats().nodes).toBe(3)
      expect(store.fetchRelationships("n1", "PART_OF", "in")).toEqual([
        { handle: "r1", otherEnd: "n2", properties: { _ordinal_in: 1 } },
        { handle: "r2", otherEnd: "n3", properties: { _ordinal_in: 2 } },
      ])
    })
  })

  describe("concurrency", () => {
    it("refuses a second commit while one is running", async () => {
      const session = open()
      session.create("Tag", { name: "space" })

      const first = session.commit()

      await expect(session.commit()).rejects.toThrow(SessionStateError)
      await expect(first).resolves.toEqual({ created: 1, updated: 0, deleted: 0, linked: 0, unlinked: 0 })
    })

    it("refuses changes while a commit is running", async () => {
      const session = open()
      const tag = session.create("Tag", { name: "space" })

      const commit = session.commit()

      expect(() => {
        tag.props.name = "drama"
      }).toThrow("Entities cannot change while a commit is in progress")
      expect(() => session.create("Tag", { name: "drama" })).toThrow(SessionStateError)
      await commit
      expect(store.fetchNode("n1")?.properties).toEqual({ name: "space" })
    })

    it("keeps sessions apart", async () => {
      await seedSeries()
      const first = open()
      const second = open()

      const a = await first.get("Series", "n1")
      const b = await second.get("Series", "n1")

      expect(a).not.toBe(b)
      a.props.title = "Changed"
      expect(b.props.title).toBe("The Expanse")
    })
  })

  // ===========================================================================
  // REFRESH AND LIFECYCLE
  // ===========================================================================

  describe("refresh", () => {
    it("re-reads properties and loaded collections", async () => {
      await seedSeries()
      const reader = open()
      const series = await reader.get("Series", "n1")
      await series.assoc.episodes.load()

      const writer = open()
      const latest = await writer.get("Series", "n1")
      latest.props.title = "The Expanse (2015)"
      writer.create("Episode", { title: "Remember the Cant", season: 1, episodeNumber: 3 }).assoc.series.set(latest)
      await writer.commit()

      await reader.refresh(series)

      expect(series.props.title).toBe("The Expanse (2015)")
      expect(series.assoc.episodes.toArray().map((e) => e.props.episodeNumber)).toEqual([1, 2, 3])
    })

    it("refuses to refresh unsaved changes", async () => {
      await seedSeries()
      const session = open()
      const series = await session.get("Series", "n1")
      series.props.network = "Amazon"

      await expect(session.refresh(series)).rejects.toThrow(SessionStateError)
      expect(series.props.network).toBe("Amazon")
    })

    it("lists dirty entities until they are committed", async () => {
      const session = open()
      const tag = session.create("Tag", { name: "space" })

      expect(session.dirtyEntities()).toEqual([tag])
      await session.commit()
      expect(session.dirtyEntities()).toEqual([])
    })

    it("refuses every call once closed", async () => {
      await seedSeries()
      const session = open()
      session.close()

      await expect(session.resolve("n1")).rejects.toThrow("Session is closed")
      await expect(session.commit()).rejects.toThrow(SessionStateError)
    })
  })

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  describe("find", () => {
    beforeEach(seedSeries)

    it("includes subtypes", async () => {
      const session = open()

      const all = await session.find("Metadata")
      const titled = await session.find("Metadata", { title: "Dulcinea" })

      expect(all.map((entity) => entity.type).sort()).toEqual(["Episode", "Episode", "Series"])
      expect(titled).toHaveLength(1)
      expect(titled[0]?.type).toBe("Episode")
      expect(titled[0]).toBe(await session.resolve("n2"))
    })

    it("skips types lacking a filtered attribute", async () => {
      const session = open()

      const found = await session.find("Metadata", { episodeNumber: 2 })

      expect(found.map((entity) => entity.handle)).toEqual(["n3"])
    })

    it("matches dates and graph keys", async () => {
      const session = open()
      const file = session.create("File", { path: "/media/expanse/s01e01.mkv", size: 1024 })
      await session.commit()

      const reader = open()
      expect(await reader.findOne("File", { path: "/media/expanse/s01e01.mkv" })).toBe(
        await reader.resolve(handleOf(file)),
      )
      expect(
        (await reader.find("Episode", { released: new Date("2015-12-14T00:00:00Z") })).map((e) => e.handle),
      ).toEqual(["n2"])
      expect(await reader.findOne("File", { path: "/elsewhere" })).toBeUndefined()
    })

    it("finds or creates by unique attributes", async () => {
      const session = open()
      const tag = session.create("Tag", { name: "space" })
      await session.commit()

      const reader = open()
      const found = await reader.findOrCreate("Tag", { name: "space" })
      const created = await reader.findOrCreate("Tag", { name: "noir" })

      expect(found.handle).toBe(tag.handle)
      expect(found.state).toBe("managed-clean")
      expect(created.state).toBe("transient")
      expect(created.props.name).toBe("noir")
    })

    it("evicts an entity so the next lookup hydrates a new one", async () => {
      const session = open()
      const series = await session.get("Series", "n1")

      session.evict(series)

      expect(series.state).toBe("detached")
      const again = await session.get("Series", "n1")
      expect(again).not.toBe(series)
      expect(again.props.title).toBe("The Expanse")
    })
  })
})
