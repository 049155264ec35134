/**
 * Graph Database Client Interface
 *
 * Abstraction over the database client used by the persistence pipeline.
 * Allows plugging different backends (Neo4j over Bolt, in-memory for tests).
 */

import type { AutoIndexMode } from "../config"
import type { GraphNode, NodeSet } from "../graph"

// =============================================================================
// SESSION FACTORY
// =============================================================================

/**
 * Configuration a session factory is built from.
 */
export interface SessionFactoryConfig {
  /** Connection URI (e.g., 'bolt://localhost:7687') */
  uri: string
  /** Authentication credentials */
  credentials: {
    username: string
    password: string
  }
  /** Database name (for multi-database setups) */
  database?: string
  /** Index handling when a session opens */
  autoIndex: AutoIndexMode
  /** Check the server is reachable and accepts the credentials before returning a session */
  verifyConnection: boolean
  /** Rows per write statement */
  batchSize: number
}

/**
 * Owns the underlying connection (driver, pool, store) sessions are opened on.
 */
export interface SessionFactory {
  /** Unique name for this backend (e.g., 'neo4j', 'in-memory') */
  readonly name: string

  /**
   * Open a session.
   *
   * Implementations raise TransientConnectionError when the database is
   * unreachable and AuthenticationError when the credentials are rejected.
   */
  openSession(): Promise<GraphSession>

  /** Close the underlying connection */
  close(): Promise<void>
}

/**
 * Factory function type for creating session factories.
 */
export type SessionFactoryProvider = (config: SessionFactoryConfig) => SessionFactory

// =============================================================================
// SESSION & TRANSACTION
// =============================================================================

/**
 * Counts reported by a bulk save.
 */
export interface SaveResult {
  nodesWritten: number
  relationshipsWritten: number
}

/**
 * A live handle to the database.
 */
export interface GraphSession {
  /** Remove every node and relationship. Irreversible. */
  purgeDatabase(): Promise<void>

  /** Begin a transaction; saves run inside it until it is closed */
  beginTransaction(): Promise<GraphTransaction>

  /**
   * Persist nodes and the relationships reachable from them within `depth` hops.
   * -1 means no limit.
   */
  save(nodes: NodeSet | Iterable<GraphNode>, depth: number): Promise<SaveResult>

  /** Forget the session's mapping context and release its resources */
  clear(): Promise<void>
}

export type TransactionStatus = "open" | "committed" | "rolledBack"

/**
 * Transaction bound to the session that began it.
 */
export interface GraphTransaction {
  readonly status: TransactionStatus
  commit(): Promise<void>
  rollback(): Promise<void>
  /** Roll back if still open, then detach from the session */
  close(): Promise<void>
}
