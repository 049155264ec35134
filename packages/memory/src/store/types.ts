/**
 * In-Memory Graph Store Types
 *
 * Core data structures for the in-memory graph database.
 */

/**
 * Stored node with its labels and properties.
 */
export interface StoredNode {
  /** Unique identifier */
  id: string
  /** Node labels, base label included */
  labels: string[]
  /** Node properties (excluding id) */
  properties: Record<string, unknown>
}

/**
 * Stored edge with endpoints and properties.
 */
export interface StoredEdge {
  /** Identifier derived from endpoints and type */
  id: string
  /** Edge type */
  type: string
  /** Source node ID */
  fromId: string
  /** Target node ID */
  toId: string
  /** Edge properties */
  properties: Record<string, unknown>
}

/**
 * Transaction snapshot for rollback support.
 */
export interface TransactionSnapshot {
  nodes: Map<string, StoredNode>
  edges: Map<string, StoredEdge>
  outEdges: Map<string, Set<string>>
  inEdges: Map<string, Set<string>>
}
