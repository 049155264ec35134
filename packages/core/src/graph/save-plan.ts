/**
 * Save Planner
 *
 * Expands a node set into the node and relationship records written by one
 * bulk save, bounded by a traversal depth.
 */

import { InputValidationError } from "../errors"
import type { GraphNode, NodeSet, PlannedRelationship, SavePlan } from "./types"

/** Depth value meaning "follow relationships without limit" */
export const UNBOUNDED_DEPTH = -1

function relationshipKey(fromId: string, type: string, toId: string): string {
  return `${fromId}\u0000${type}\u0000${toId}`
}

/**
 * Validate a save depth.
 *
 * @throws {InputValidationError} If depth is not an integer >= -1
 */
export function assertSaveDepth(depth: number): void {
  if (!Number.isInteger(depth) || depth < UNBOUNDED_DEPTH) {
    throw new InputValidationError(
      `Save depth must be an integer >= -1, got ${depth}`,
      "saveDepth",
      depth,
    )
  }
}

/**
 * Plan a bulk save.
 *
 * Every input node is a node record at hop 0. Relationships of any type are
 * expanded breadth-first from all input nodes at once: a relationship leaving
 * a node at hop `h` is written when depth is -1 or `h < depth`, and its target
 * becomes a node record at hop `h + 1`. With depth 0 only node records are
 * written.
 */
export function planSave(input: NodeSet | Iterable<GraphNode>, depth: number): SavePlan {
  assertSaveDepth(depth)

  const start = isNodeSet(input) ? input.values() : input
  const hops = new Map<string, number>()
  const nodes: GraphNode[] = []
  const queue: GraphNode[] = []

  for (const node of start) {
    if (hops.has(node.id)) continue
    hops.set(node.id, 0)
    nodes.push(node)
    queue.push(node)
  }

  const relationships: PlannedRelationship[] = []
  const seen = new Set<string>()

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head]
    if (current === undefined) continue
    const hop = hops.get(current.id) ?? 0
    if (depth !== UNBOUNDED_DEPTH && hop >= depth) continue

    for (const rel of current.relationships) {
      const key = relationshipKey(current.id, rel.type, rel.target.id)
      if (!seen.has(key)) {
        seen.add(key)
        relationships.push({
          fromId: current.id,
          toId: rel.target.id,
          type: rel.type,
          properties: rel.properties ?? {},
        })
      }

      if (!hops.has(rel.target.id)) {
        hops.set(rel.target.id, hop + 1)
        nodes.push(rel.target)
        queue.push(rel.target)
      }
    }
  }

  return { nodes, relationships }
}

function isNodeSet(input: NodeSet | Iterable<GraphNode>): input is NodeSet {
  return input instanceof Map
}
