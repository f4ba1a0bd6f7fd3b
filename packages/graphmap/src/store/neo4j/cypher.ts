/**
 * Cypher Statements
 *
 * Every statement the Neo4j store issues. Labels and relationship types are
 * interpolated as escaped identifiers, everything else is a parameter.
 */

import type { Direction, PropertyMap } from "../types"
import { toNeo4jProperties, toNeo4jValue } from "./values"

export interface Statement {
  query: string
  params: Record<string, unknown>
}

/**
 * Quote an identifier with backticks.
 */
export function escapeIdentifier(name: string): string {
  return "`" + name.replace(/`/g, "``") + "`"
}

function pattern(type: string, direction: Direction): string {
  const rel = `[r:${escapeIdentifier(type)}]`
  return direction === "out" ? `(n)-${rel}->(m)` : `(n)<-${rel}-(m)`
}

export const cypher = {
  createNode(label: string, properties: PropertyMap): Statement {
    return {
      query: `CREATE (n:${escapeIdentifier(label)}) SET n = $props RETURN elementId(n) AS handle`,
      params: { props: toNeo4jProperties(properties) },
    }
  },

  updateNode(handle: string, properties: Record<string, unknown>): Statement {
    return {
      query: "MATCH (n) WHERE elementId(n) = $handle SET n += $props RETURN elementId(n) AS handle",
      params: { handle, props: properties },
    }
  },

  degree(handle: string): Statement {
    return {
      query:
        "MATCH (n) WHERE elementId(n) = $handle OPTIONAL MATCH (n)-[r]-() RETURN count(r) AS degree",
      params: { handle },
    }
  },

  deleteNode(handle: string, detach: boolean): Statement {
    return {
      query: `MATCH (n) WHERE elementId(n) = $handle ${detach ? "DETACH DELETE" : "DELETE"} n`,
      params: { handle },
    }
  },

  createRelationship(type: string, from: string, to: string, properties: PropertyMap): Statement {
    return {
      query:
        "MATCH (a) WHERE elementId(a) = $from MATCH (b) WHERE elementId(b) = $to " +
        `CREATE (a)-[r:${escapeIdentifier(type)}]->(b) SET r = $props RETURN elementId(r) AS handle`,
      params: { from, to, props: toNeo4jProperties(properties) },
    }
  },

  existingNodes(handles: string[]): Statement {
    return {
      query: "MATCH (n) WHERE elementId(n) IN $handles RETURN elementId(n) AS handle",
      params: { handles },
    }
  },

  deleteRelationship(handle: string): Statement {
    return {
      query: "MATCH ()-[r]->() WHERE elementId(r) = $handle DELETE r",
      params: { handle },
    }
  },

  fetchNode(handle: string): Statement {
    return {
      query:
        "MATCH (n) WHERE elementId(n) = $handle RETURN labels(n) AS labels, properties(n) AS properties",
      params: { handle },
    }
  },

  fetchRelationships(handle: string, type: string, direction: Direction): Statement {
    return {
      query:
        `MATCH ${pattern(type, direction)} WHERE elementId(n) = $handle ` +
        "RETURN elementId(r) AS handle, elementId(m) AS otherEnd, properties(r) AS properties",
      params: { handle },
    }
  },

  findNodes(label: string, filter: PropertyMap): Statement {
    const params: Record<string, unknown> = {}
    const conditions = Object.entries(filter).map(([key, value], index) => {
      params[`p${index}`] = toNeo4jValue(value)
      return `n.${escapeIdentifier(key)} = $p${index}`
    })
    const where = conditions.length > 0 ? ` WHERE ${conditions.join(" AND ")}` : ""
    return {
      query: `MATCH (n:${escapeIdentifier(label)})${where} RETURN elementId(n) AS handle`,
      params,
    }
  },
}
