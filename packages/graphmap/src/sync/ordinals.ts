/**
 * List Ordinals
 *
 * Choose positions for the members of an ordered list so that as many
 * members as possible keep the ordinal already persisted on their
 * relationship. Every changed ordinal costs a relationship re-creation.
 */

/**
 * Indexes of a longest strictly increasing run among the defined values.
 */
export function longestIncreasingRun(values: ReadonlyArray<number | undefined>): Set<number> {
  // tails[k]: index of the smallest tail of an increasing run of length k + 1
  const tails: number[] = []
  const previous = new Map<number, number>()

  values.forEach((value, index) => {
    if (value === undefined) return
    let low = 0
    let high = tails.length
    while (low < high) {
      const middle = (low + high) >> 1
      const tail = values[tails[middle] ?? -1]
      if (tail !== undefined && tail < value) {
        low = middle + 1
      } else {
        high = middle
      }
    }
    const before = tails[low - 1]
    if (low > 0 && before !== undefined) previous.set(index, before)
    tails[low] = index
  })

  const run = new Set<number>()
  let cursor = tails[tails.length - 1]
  while (cursor !== undefined) {
    run.add(cursor)
    cursor = previous.get(cursor)
  }
  return run
}

/**
 * Assign an ordinal to every position of a list, given the ordinal each
 * member currently has in the store (undefined for new links).
 *
 * Members on the longest increasing run keep their ordinal; the others are
 * spread into the gaps around them.
 *
 * @example
 * assignOrdinals([undefined, undefined, undefined]) // [1, 2, 3]
 * assignOrdinals([3, 1, 2])                         // [0, 1, 2]
 * assignOrdinals([1, undefined, 2])                 // [1, 1.5, 2]
 */
export function assignOrdinals(existing: ReadonlyArray<number | undefined>): number[] {
  const kept = longestIncreasingRun(existing)
  const result: number[] = new Array<number>(existing.length)

  let start = 0
  while (start < existing.length) {
    const value = existing[start]
    if (kept.has(start) && value !== undefined) {
      result[start] = value
      start++
      continue
    }

    // Gap [start, end) between two kept members
    let end = start
    while (end < existing.length && !kept.has(end)) end++

    const lower = start > 0 ? result[start - 1] : undefined
    const upper = end < existing.length ? existing[end] : undefined
    const count = end - start

    for (let k = 1; k <= count; k++) {
      let ordinal: number
      if (lower === undefined && upper === undefined) {
        ordinal = k
      } else if (upper === undefined) {
        ordinal = (lower ?? 0) + k
      } else if (lower === undefined) {
        ordinal = upper - (count + 1) + k
      } else {
        ordinal = lower + ((upper - lower) * k) / (count + 1)
      }
      result[start + k - 1] = ordinal
    }
    start = end
  }

  return result
}
