/**
 * Graph Flattener
 *
 * Turns the root nodes of an analysis run into the set of nodes to persist.
 */

import { STRUCTURAL_RELATIONSHIP, type GraphNode, type NodeSet } from "./types"

export interface FlattenOptions {
  /** Relationship type walked from parent to child (default: AST) */
  relationship?: string
}

/**
 * Deduplicate nodes by identity. The first occurrence wins.
 */
export function dedupeById(nodes: Iterable<GraphNode>): Map<string, GraphNode> {
  const unique = new Map<string, GraphNode>()
  for (const node of nodes) {
    if (!unique.has(node.id)) {
      unique.set(node.id, node)
    }
  }
  return unique
}

/**
 * Collect every node reachable from `root` over the structural relationship.
 *
 * Nodes already present in `visited` are neither collected nor expanded again,
 * which keeps shared substructure linear. Uses an explicit stack so deeply
 * nested trees do not exhaust the call stack.
 */
function walkSubtree(
  root: GraphNode,
  relationship: string,
  visited: Set<string>,
): Map<string, GraphNode> {
  const collected = new Map<string, GraphNode>()
  const stack: GraphNode[] = [root]

  while (stack.length > 0) {
    const current = stack.pop()
    if (current === undefined || visited.has(current.id)) continue

    visited.add(current.id)
    collected.set(current.id, current)

    // Push in reverse so children come out in declaration order
    const children = current.relationships.filter((r) => r.type === relationship)
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i]
      if (child && !visited.has(child.target.id)) {
        stack.push(child.target)
      }
    }
  }

  return collected
}

/**
 * Flatten a root sequence into the deduplicated set of all reachable nodes.
 *
 * Roots may repeat (same object or same id); they are deduplicated first.
 * Only the structural relationship is followed, so cycles through semantic
 * edges never affect the walk.
 *
 * @example
 * ```typescript
 * const nodes = flatten(result.translationUnits)
 * console.log(`Count nodes to save: ${nodes.size}`)
 * ```
 */
export function flatten(roots: Iterable<GraphNode>, options: FlattenOptions = {}): NodeSet {
  const relationship = options.relationship ?? STRUCTURAL_RELATIONSHIP
  const uniqueRoots = dedupeById(roots)
  const visited = new Set<string>()
  const combined = new Map<string, GraphNode>()

  for (const root of uniqueRoots.values()) {
    for (const [id, node] of walkSubtree(root, relationship, visited)) {
      combined.set(id, node)
    }
  }

  return combined
}
