/**
 * Neo4j Value Conversion
 *
 * Scalars go out as driver integers and DateTimes; driver Integers and
 * temporal values come back as numbers and Dates.
 */

import neo4j from "neo4j-driver"
import type { PropertyMap, PropertyPatch, Scalar } from "../types"

interface Neo4jInteger {
  toNumber(): number
}

interface Neo4jDateTime {
  toStandardDate(): Date
}

function isNeo4jInteger(value: unknown): value is Neo4jInteger {
  return (
    typeof value === "object" &&
    value !== null &&
    "toNumber" in value &&
    typeof value.toNumber === "function"
  )
}

function isNeo4jDateTime(value: unknown): value is Neo4jDateTime {
  return (
    typeof value === "object" &&
    value !== null &&
    "toStandardDate" in value &&
    typeof value.toStandardDate === "function"
  )
}

/**
 * Convert a value read from the driver; undefined for non-scalars.
 */
export function fromNeo4jValue(value: unknown): Scalar | undefined {
  if (isNeo4jInteger(value)) return value.toNumber()
  if (isNeo4jDateTime(value)) return value.toStandardDate()
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    value instanceof Date
  ) {
    return value
  }
  return undefined
}

export function fromNeo4jProperties(properties: unknown): PropertyMap {
  const result: PropertyMap = {}
  if (typeof properties !== "object" || properties === null) return result
  for (const [key, value] of Object.entries(properties)) {
    const converted = fromNeo4jValue(value)
    if (converted !== undefined) result[key] = converted
  }
  return result
}

export function toNeo4jValue(value: Scalar): unknown {
  if (value instanceof Date) return neo4j.types.DateTime.fromStandardDate(value)
  if (typeof value === "number" && Number.isSafeInteger(value)) return neo4j.int(value)
  return value
}

export function toNeo4jProperties(properties: PropertyMap | PropertyPatch): Record<string, unknown> {
  const result: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(properties)) {
    result[key] = value === null ? null : toNeo4jValue(value)
  }
  return result
}
