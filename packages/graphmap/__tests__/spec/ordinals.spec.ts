/**
 * List Ordinal Tests
 */

import { describe, it, expect } from "vitest"
import { assignOrdinals, longestIncreasingRun } from "../../src"

describe("List Ordinals", () => {
  describe("longestIncreasingRun()", () => {
    it("finds the longest strictly increasing run", () => {
      expect(longestIncreasingRun([1, 5, 2, 3, 4])).toEqual(new Set([0, 2, 3, 4]))
    })

    it("skips undefined values", () => {
      expect(longestIncreasingRun([undefined, 2, undefined, 3])).toEqual(new Set([1, 3]))
    })

    it("is empty without values", () => {
      expect(longestIncreasingRun([])).toEqual(new Set())
      expect(longestIncreasingRun([undefined, undefined])).toEqual(new Set())
    })

    it("treats equal values as not increasing", () => {
      expect(longestIncreasingRun([2, 2]).size).toBe(1)
    })
  })

  describe("assignOrdinals()", () => {
    it("numbers a new list from 1", () => {
      expect(assignOrdinals([undefined, undefined, undefined])).toEqual([1, 2, 3])
    })

    it("keeps ordinals that are already in order", () => {
      expect(assignOrdinals([1, 2, 3])).toEqual([1, 2, 3])
      expect(assignOrdinals([4, 10, 11])).toEqual([4, 10, 11])
    })

    it("moves only the member that left the run", () => {
      // Last member moved to the front
      expect(assignOrdinals([3, 1, 2])).toEqual([0, 1, 2])
      // First member moved to the back
      expect(assignOrdinals([2, 3, 1])).toEqual([2, 3, 4])
    })

    it("places insertions between their neighbours", () => {
      expect(assignOrdinals([1, undefined, 2])).toEqual([1, 1.5, 2])
      expect(assignOrdinals([1, undefined, undefined, 4])).toEqual([1, 2, 3, 4])
    })

    it("places insertions before the first kept member", () => {
      expect(assignOrdinals([undefined, 5])).toEqual([4, 5])
    })

    it("appends after the last kept member", () => {
      expect(assignOrdinals([5, undefined])).toEqual([5, 6])
    })

    it("separates duplicated ordinals", () => {
      expect(assignOrdinals([2, 2])).toEqual([1, 2])
    })

    it("handles an empty list", () => {
      expect(assignOrdinals([])).toEqual([])
    })
  })
})
