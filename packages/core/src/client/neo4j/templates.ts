/**
 * Cypher Templates
 *
 * Neo4j/Memgraph Cypher used by the Bolt session.
 */

import { InputValidationError } from "../../errors"
import type { PlannedRelationship, PropertyMap, SavePlan } from "../../graph"

/** Label carried by every persisted node; the id index is declared on it */
export const BASE_LABEL = "Node"
export const NODE_ID_INDEX = "graph_node_id"

export interface CypherStatement {
  query: string
  params: Record<string, unknown>
}

// =============================================================================
// ADMIN OPERATIONS
// =============================================================================

const adminTemplates = {
  purge: () => `MATCH (n) DETACH DELETE n`,

  createIdIndex: () =>
    `
    CREATE INDEX ${NODE_ID_INDEX} IF NOT EXISTS
    FOR (n:${BASE_LABEL}) ON (n.id)
  `.trim(),

  showIndexes: () =>
    `
    SHOW INDEXES YIELD labelsOrTypes, properties
    RETURN labelsOrTypes, properties
  `.trim(),
}

// =============================================================================
// BATCH OPERATIONS
// =============================================================================

const batchTemplates = {
  mergeNodes: (labels: readonly string[]) => {
    const extra = labels.length > 0 ? `\n    SET n:${labels.join(":")}` : ""
    return `
    UNWIND $rows AS row
    MERGE (n:${BASE_LABEL} {id: row.id})
    SET n = row.props, n.id = row.id${extra}
  `.trim()
  },

  mergeRelationships: (type: string) =>
    `
    UNWIND $rows AS row
    MATCH (a:${BASE_LABEL} {id: row.fromId})
    MATCH (b:${BASE_LABEL} {id: row.toId})
    MERGE (a)-[r:${type}]->(b)
    SET r = row.props
  `.trim(),
}

// =============================================================================
// UTILITIES
// =============================================================================

const utils = {
  /** Drop null values; a stored property is never null */
  buildProps(properties: PropertyMap): Record<string, unknown> {
    const filtered: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(properties)) {
      if (value !== null) {
        filtered[key] = value
      }
    }
    return filtered
  },

  sanitizeIdentifier(identifier: string): string {
    if (!/^[a-zA-Z_][a-zA-Z0-9_]*$/.test(identifier)) {
      throw new InputValidationError(`Invalid identifier: ${identifier}`, "identifier", identifier)
    }
    return identifier
  },
}

export const CypherTemplates = {
  name: "cypher",
  admin: adminTemplates,
  batch: batchTemplates,
  utils,
} as const

// =============================================================================
// STATEMENT BUILDING
// =============================================================================

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size))
  }
  return chunks
}

/**
 * Turn a save plan into UNWIND statements.
 *
 * Nodes are grouped by label set (labels are not parameterizable), then
 * relationships by type. Node statements come first so every MATCH in the
 * relationship statements finds its endpoints.
 */
export function buildSaveStatements(plan: SavePlan, batchSize: number): CypherStatement[] {
  const nodeGroups = new Map<string, { labels: string[]; rows: Record<string, unknown>[] }>()

  for (const node of plan.nodes) {
    const labels = [...new Set(node.labels.filter((l) => l !== BASE_LABEL))]
      .map((l) => utils.sanitizeIdentifier(l))
      .sort()
    const key = labels.join(":")
    let group = nodeGroups.get(key)
    if (!group) {
      group = { labels, rows: [] }
      nodeGroups.set(key, group)
    }
    group.rows.push({ id: node.id, props: utils.buildProps(node.properties) })
  }

  const relationshipGroups = new Map<string, PlannedRelationship[]>()
  for (const rel of plan.relationships) {
    const type = utils.sanitizeIdentifier(rel.type)
    const group = relationshipGroups.get(type)
    if (group) {
      group.push(rel)
    } else {
      relationshipGroups.set(type, [rel])
    }
  }

  const statements: CypherStatement[] = []

  for (const group of nodeGroups.values()) {
    const query = batchTemplates.mergeNodes(group.labels)
    for (const rows of chunk(group.rows, batchSize)) {
      statements.push({ query, params: { rows } })
    }
  }

  for (const [type, rels] of relationshipGroups) {
    const query = batchTemplates.mergeRelationships(type)
    const rows = rels.map((rel) => ({
      fromId: rel.fromId,
      toId: rel.toId,
      props: utils.buildProps(rel.properties),
    }))
    for (const batch of chunk(rows, batchSize)) {
      statements.push({ query, params: { rows: batch } })
    }
  }

  return statements
}
