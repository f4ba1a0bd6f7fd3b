/**
 * Entity Tests
 *
 * Property access and validation on transient entities, and their lifecycle
 * within a session that never reaches its store.
 */

import { describe, it, expect, beforeEach } from "vitest"
import {
  DetachedEntityError,
  openSession,
  SchemaError,
  SessionStateError,
  TypeMismatchError,
  type Entity,
  type Session,
} from "../../src"
import { UnreachableStore } from "./fixtures/stores"
import { librarySchema, type LibrarySchema } from "./fixtures/test-schema"

describe("Entity", () => {
  let session: Session<LibrarySchema>

  beforeEach(() => {
    session = openSession(librarySchema, new UnreachableStore())
  })

  // ===========================================================================
  // CREATION
  // ===========================================================================

  describe("session.create()", () => {
    it("applies defaults and starts transient", () => {
      const book = session.create("Book", { title: "Dune", isbn: "9780441013593" })

      expect(book.type).toBe("Book")
      expect(book.state).toBe("transient")
      expect(book.handle).toBeUndefined()
      expect(book.props.available).toBe(true)
      expect(book.toObject()).toEqual({ title: "Dune", isbn: "9780441013593", available: true })
    })

    it("rejects invalid properties", () => {
      expect(() => session.create("Book", { title: "", isbn: "9780441013593" })).toThrow(TypeMismatchError)
    })

    it("names the offending attribute", () => {
      try {
        session.create("Book", { title: "Dune", isbn: "9780441013593", pages: -3 })
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(TypeMismatchError)
        if (error instanceof TypeMismatchError) {
          expect(error.attribute).toBe("pages")
          expect(error.expected).toBe("number")
        }
      }
    })

    it("gives every entity its own key", () => {
      const a = session.create("Author", { name: "Ursula K. Le Guin" })
      const b = session.create("Author", { name: "Ursula K. Le Guin" })

      expect(a.key).not.toBe(b.key)
      expect(a.toString()).toBe(`Author(#${a.key})`)
    })
  })

  // ===========================================================================
  // PROPERTIES
  // ===========================================================================

  describe("props", () => {
    it("validates assigned values", () => {
      const book = session.create("Book", { title: "Dune", isbn: "9780441013593" })

      expect(() => {
        book.props.pages = 0
      }).toThrow(TypeMismatchError)
      expect(() => {
        book.props.pages = 1.5
      }).toThrow(TypeMismatchError)

      book.props.pages = 412
      expect(book.props.pages).toBe(412)
      expect(session.tracker.recordOf(book)?.properties).toEqual(new Set(["pages"]))
    })

    it("refuses to unset a required property", () => {
      const book = session.create("Book", { title: "Dune", isbn: "9780441013593" })

      expect(() => {
        book.props.title = null
      }).toThrow("'Book.title' is required and cannot be unset")
      expect(book.props.title).toBe("Dune")
    })

    it("unsets an optional property", () => {
      const book = session.create("Book", { title: "Dune", isbn: "9780441013593", pages: 412 })

      book.props.pages = null
      expect(book.props.pages).toBeUndefined()
      expect("pages" in book.props).toBe(false)

      book.props.pages = 412
      delete book.props.pages
      expect(book.props.pages).toBeUndefined()
    })

    it("ignores assigning the current value", () => {
      const acquired = new Date("2020-03-01T00:00:00Z")
      const book = session.create("Book", { title: "Dune", isbn: "9780441013593", acquired })

      book.props.title = "Dune"
      book.props.acquired = new Date("2020-03-01T00:00:00Z")

      expect(session.tracker.recordOf(book)?.properties.size).toBe(0)
    })

    it("rejects an unknown property", () => {
      const book: Entity = session.create("Book", { title: "Dune", isbn: "9780441013593" })

      const assign = () => {
        book.props.subtitle = "Part One"
      }
      expect(assign).toThrow(SchemaError)
      expect(assign).toThrow("'Book' has no property 'subtitle'")
    })

    it("enumerates the properties that are set", () => {
      const book = session.create("Book", { title: "Dune", isbn: "9780441013593" })

      expect(Object.keys(book.props)).toEqual(["title", "isbn", "available"])
    })

    it("copies dates in toObject()", () => {
      const acquired = new Date("2020-03-01T00:00:00Z")
      const book = session.create("Book", { title: "Dune", isbn: "9780441013593", acquired })
      const copy = book.toObject().acquired

      expect(copy).toEqual(acquired)
      expect(copy).not.toBe(book.props.acquired)
    })
  })

  // ===========================================================================
  // TYPES AND ASSOCIATIONS
  // ===========================================================================

  describe("types", () => {
    it("is an instance of its ancestors", () => {
      const book = session.create("Book", { title: "Dune", isbn: "9780441013593" })

      expect(book.is("Book")).toBe(true)
      expect(book.is("Item")).toBe(true)
      expect(book.is("Author")).toBe(false)
    })

    it("exposes inherited associations", () => {
      const book = session.create("Book", { title: "Dune", isbn: "9780441013593" })

      expect(Object.keys(book.assoc)).toEqual(["authors", "shelf"])
      expect("shelf" in book.assoc).toBe(true)
      expect(book.assoc.shelf.variant).toBe("single")
    })

    it("rejects an unknown association", () => {
      const book: Entity = session.create("Book", { title: "Dune", isbn: "9780441013593" })

      expect(book.assoc.readers).toBeUndefined()
      expect(() => book.association("readers")).toThrow("'Book' has no association 'readers'")
    })
  })

  // ===========================================================================
  // LIFECYCLE
  // ===========================================================================

  describe("lifecycle", () => {
    it("drops a deleted transient entity at once", () => {
      const book = session.create("Book", { title: "Dune", isbn: "9780441013593" })
      const author = session.create("Author", { name: "Frank Herbert" })
      book.assoc.authors.append(author)

      session.delete(book)

      expect(book.state).toBe("deleted")
      expect(author.assoc.books.size).toBe(0)
      expect(session.isDirty(book)).toBe(false)
      expect(() => {
        book.props.title = "Dune Messiah"
      }).toThrow(DetachedEntityError)
    })

    it("detaches entities when the session closes", () => {
      const book = session.create("Book", { title: "Dune", isbn: "9780441013593" })

      session.close()

      expect(session.isClosed).toBe(true)
      expect(book.state).toBe("detached")
      expect(() => {
        book.props.pages = 10
      }).toThrow(DetachedEntityError)
      expect(() => session.create("Author", { name: "Frank Herbert" })).toThrow(SessionStateError)
    })

    it("detaches an evicted entity", () => {
      const author = session.create("Author", { name: "Frank Herbert" })

      session.evict(author)

      expect(author.state).toBe("detached")
      expect(session.isDirty(author)).toBe(false)
      expect(() => {
        author.props.name = "F. Herbert"
      }).toThrow("Entity Author is detached and can no longer be modified")
    })

    it("refuses entities of another session", () => {
      const other = openSession(librarySchema, new UnreachableStore())
      const author = other.create("Author", { name: "Frank Herbert" })

      expect(() => session.delete(author)).toThrow(SessionStateError)
    })
  })
})
