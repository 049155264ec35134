/**
 * In-Memory Graph Store
 *
 * Core data structure for storing nodes and edges in memory.
 * Merge semantics match the Cypher written by the Bolt session.
 */

import type { StoredNode, StoredEdge, TransactionSnapshot } from './types'

/**
 * Deep clone a value.
 */
function clone<T>(value: T): T {
  return structuredClone(value)
}

export function edgeId(fromId: string, type: string, toId: string): string {
  return `${fromId}-[${type}]->${toId}`
}

/**
 * In-memory graph store with support for:
 * - Node/edge merge operations
 * - Adjacency lists for fast traversal
 * - Label-based node lookup
 * - Transaction support with rollback
 */
export class GraphStore {
  /** All nodes by ID */
  private nodes = new Map<string, StoredNode>()

  /** All edges by ID */
  private edges = new Map<string, StoredEdge>()

  /** Outgoing edges per node: nodeId -> Set<edgeId> */
  private outEdges = new Map<string, Set<string>>()

  /** Incoming edges per node: nodeId -> Set<edgeId> */
  private inEdges = new Map<string, Set<string>>()

  /** Transaction state */
  private transactionSnapshot: TransactionSnapshot | null = null

  // ===========================================================================
  // NODE OPERATIONS
  // ===========================================================================

  /**
   * Create or replace a node: properties are overwritten, labels are added.
   */
  mergeNode(id: string, labels: readonly string[], properties: Record<string, unknown>): void {
    const existing = this.nodes.get(id)

    if (existing) {
      existing.labels = [...new Set([...existing.labels, ...labels])]
      existing.properties = clone(properties)
      return
    }

    this.nodes.set(id, { id, labels: [...new Set(labels)], properties: clone(properties) })
    this.outEdges.set(id, new Set())
    this.inEdges.set(id, new Set())
  }

  /**
   * Get a node by ID.
   */
  getNode(id: string): StoredNode | undefined {
    const node = this.nodes.get(id)
    return node ? clone(node) : undefined
  }

  hasNode(id: string): boolean {
    return this.nodes.has(id)
  }

  /**
   * Get all nodes carrying a label.
   */
  getNodesByLabel(label: string): StoredNode[] {
    return this.getAllNodes().filter((node) => node.labels.includes(label))
  }

  getAllNodes(): StoredNode[] {
    return Array.from(this.nodes.values()).map(clone)
  }

  /**
   * Delete a node and all its edges.
   */
  deleteNode(id: string): void {
    if (!this.nodes.has(id)) return

    for (const id_ of [...(this.outEdges.get(id) ?? []), ...(this.inEdges.get(id) ?? [])]) {
      this.deleteEdge(id_)
    }

    this.nodes.delete(id)
    this.outEdges.delete(id)
    this.inEdges.delete(id)
  }

  // ===========================================================================
  // EDGE OPERATIONS
  // ===========================================================================

  /**
   * Create or replace an edge between two existing nodes.
   */
  mergeEdge(fromId: string, type: string, toId: string, properties: Record<string, unknown>): void {
    if (!this.nodes.has(fromId)) {
      throw new Error(`Source node not found: ${fromId}`)
    }
    if (!this.nodes.has(toId)) {
      throw new Error(`Target node not found: ${toId}`)
    }

    const id = edgeId(fromId, type, toId)
    this.edges.set(id, { id, type, fromId, toId, properties: clone(properties) })
    this.outEdges.get(fromId)?.add(id)
    this.inEdges.get(toId)?.add(id)
  }

  /**
   * Get outgoing edges from a node, optionally filtered by type.
   */
  getOutgoingEdges(nodeId: string, type?: string): StoredEdge[] {
    return this.collectEdges(this.outEdges.get(nodeId), type)
  }

  /**
   * Get incoming edges to a node, optionally filtered by type.
   */
  getIncomingEdges(nodeId: string, type?: string): StoredEdge[] {
    return this.collectEdges(this.inEdges.get(nodeId), type)
  }

  getAllEdges(): StoredEdge[] {
    return Array.from(this.edges.values()).map(clone)
  }

  deleteEdge(id: string): void {
    const edge = this.edges.get(id)
    if (!edge) return

    this.edges.delete(id)
    this.outEdges.get(edge.fromId)?.delete(id)
    this.inEdges.get(edge.toId)?.delete(id)
  }

  private collectEdges(ids: Set<string> | undefined, type?: string): StoredEdge[] {
    const result: StoredEdge[] = []
    for (const id of ids ?? []) {
      const edge = this.edges.get(id)
      if (edge && (type === undefined || edge.type === type)) {
        result.push(clone(edge))
      }
    }
    return result
  }

  // ===========================================================================
  // TRANSACTIONS
  // ===========================================================================

  /**
   * Begin a transaction.
   */
  beginTransaction(): void {
    if (this.transactionSnapshot) {
      throw new Error('Transaction already in progress')
    }

    this.transactionSnapshot = {
      nodes: new Map(Array.from(this.nodes.entries()).map(([k, v]) => [k, clone(v)])),
      edges: new Map(Array.from(this.edges.entries()).map(([k, v]) => [k, clone(v)])),
      outEdges: new Map(Array.from(this.outEdges.entries()).map(([k, v]) => [k, new Set(v)])),
      inEdges: new Map(Array.from(this.inEdges.entries()).map(([k, v]) => [k, new Set(v)])),
    }
  }

  /**
   * Commit the current transaction.
   */
  commit(): void {
    if (!this.transactionSnapshot) {
      throw new Error('No transaction in progress')
    }
    this.transactionSnapshot = null
  }

  /**
   * Rollback the current transaction.
   */
  rollback(): void {
    if (!this.transactionSnapshot) {
      throw new Error('No transaction in progress')
    }

    this.nodes = this.transactionSnapshot.nodes
    this.edges = this.transactionSnapshot.edges
    this.outEdges = this.transactionSnapshot.outEdges
    this.inEdges = this.transactionSnapshot.inEdges
    this.transactionSnapshot = null
  }

  /**
   * Check if in a transaction.
   */
  inTransaction(): boolean {
    return this.transactionSnapshot !== null
  }

  // ===========================================================================
  // UTILITIES
  // ===========================================================================

  /**
   * Remove all nodes and edges. An open transaction stays open.
   */
  clear(): void {
    this.nodes.clear()
    this.edges.clear()
    this.outEdges.clear()
    this.inEdges.clear()
  }

  /**
   * Get store statistics.
   */
  stats(): { nodes: number; edges: number } {
    return {
      nodes: this.nodes.size,
      edges: this.edges.size,
    }
  }
}
