/**
 * Neo4j Graph Session
 *
 * GraphSession over a Bolt driver. Works with Neo4j, Memgraph, and other
 * Bolt-compatible databases.
 */

import type { AutoIndexMode } from "../../config"
import { PersistenceError } from "../../errors"
import { planSave, type GraphNode, type NodeSet } from "../../graph"
import type { Logger } from "../../logging"
import type { GraphSession, GraphTransaction, SaveResult, TransactionStatus } from "../provider"
import { BASE_LABEL, buildSaveStatements, CypherTemplates, NODE_ID_INDEX } from "./templates"

// Bolt driver surface used here; neo4j-driver's Driver satisfies it
export type BoltRecord = {
  get: (key: string) => unknown
}

export type BoltQueryResult = {
  records: BoltRecord[]
}

export type BoltTransaction = {
  run: (query: string, params?: Record<string, unknown>) => PromiseLike<BoltQueryResult>
  commit: () => Promise<void>
  rollback: () => Promise<void>
}

export type BoltSession = {
  run: (query: string, params?: Record<string, unknown>) => PromiseLike<BoltQueryResult>
  beginTransaction: () => BoltTransaction
  close: () => Promise<void>
}

export type BoltDriver = {
  session: (config?: { database?: string; defaultAccessMode?: "READ" | "WRITE" }) => BoltSession
  verifyConnectivity: () => Promise<unknown>
  close: () => Promise<void>
}

export interface Neo4jGraphSessionOptions {
  database?: string
  batchSize: number
  logger: Logger
}

// =============================================================================
// TRANSACTION
// =============================================================================

class Neo4jGraphTransaction implements GraphTransaction {
  private current: TransactionStatus = "open"

  constructor(
    private readonly tx: BoltTransaction,
    private readonly detach: () => void,
  ) {}

  get status(): TransactionStatus {
    return this.current
  }

  async run(query: string, params: Record<string, unknown>): Promise<void> {
    this.assertOpen("run")
    await this.tx.run(query, params)
  }

  async commit(): Promise<void> {
    this.assertOpen("commit")
    await this.tx.commit()
    this.current = "committed"
  }

  async rollback(): Promise<void> {
    this.assertOpen("rollback")
    await this.tx.rollback()
    this.current = "rolledBack"
  }

  async close(): Promise<void> {
    try {
      if (this.current === "open") {
        await this.rollback()
      }
    } finally {
      this.detach()
    }
  }

  private assertOpen(operation: string): void {
    if (this.current !== "open") {
      throw new PersistenceError(`Cannot ${operation}: transaction is ${this.current}`, "commit")
    }
  }
}

// =============================================================================
// SESSION
// =============================================================================

export class Neo4jGraphSession implements GraphSession {
  private bolt: BoltSession | null = null
  private transaction: Neo4jGraphTransaction | null = null

  constructor(
    private readonly driver: BoltDriver,
    private readonly options: Neo4jGraphSessionOptions,
  ) {}

  async purgeDatabase(): Promise<void> {
    this.options.logger.warn("Purging all nodes and relationships from the database")
    await this.runAutoCommit(CypherTemplates.admin.purge())
  }

  async beginTransaction(): Promise<GraphTransaction> {
    if (this.transaction) {
      throw new PersistenceError("A transaction is already open on this session", "save")
    }
    const tx = new Neo4jGraphTransaction(this.getBoltSession().beginTransaction(), () => {
      this.transaction = null
    })
    this.transaction = tx
    return tx
  }

  async save(nodes: NodeSet | Iterable<GraphNode>, depth: number): Promise<SaveResult> {
    const plan = planSave(nodes, depth)
    const statements = buildSaveStatements(plan, this.options.batchSize)

    this.options.logger.debug(
      { nodes: plan.nodes.length, relationships: plan.relationships.length, statements: statements.length },
      "Writing save plan",
    )

    for (const statement of statements) {
      if (this.transaction) {
        await this.transaction.run(statement.query, statement.params)
      } else {
        await this.runAutoCommit(statement.query, statement.params)
      }
    }

    return { nodesWritten: plan.nodes.length, relationshipsWritten: plan.relationships.length }
  }

  async clear(): Promise<void> {
    const bolt = this.bolt
    const tx = this.transaction
    this.bolt = null
    try {
      if (tx) {
        await tx.close()
      }
    } finally {
      if (bolt) {
        await bolt.close()
      }
    }
  }

  /**
   * Create or check the index on the node id, per the auto-index mode.
   *
   * @throws {PersistenceError} In 'validate' mode when the index is missing
   */
  async applyAutoIndex(mode: AutoIndexMode): Promise<void> {
    if (mode === "none") return

    if (mode === "assert") {
      await this.runAutoCommit(CypherTemplates.admin.createIdIndex())
      this.options.logger.info({ index: NODE_ID_INDEX }, "Ensured node id index")
      return
    }

    const result = await this.getBoltSession().run(CypherTemplates.admin.showIndexes())
    const covered = result.records.some((record) => {
      const labels = record.get("labelsOrTypes")
      const properties = record.get("properties")
      return (
        Array.isArray(labels) &&
        labels.includes(BASE_LABEL) &&
        Array.isArray(properties) &&
        properties.includes("id")
      )
    })

    if (!covered) {
      throw new PersistenceError(`No index covers ${BASE_LABEL}.id (auto-index mode 'validate')`, "index")
    }
  }

  private getBoltSession(): BoltSession {
    if (!this.bolt) {
      this.bolt = this.driver.session({
        database: this.options.database,
        defaultAccessMode: "WRITE",
      })
    }
    return this.bolt
  }

  private async runAutoCommit(query: string, params?: Record<string, unknown>): Promise<void> {
    if (this.transaction) {
      throw new PersistenceError("Cannot run an auto-commit statement while a transaction is open", "save")
    }
    await this.getBoltSession().run(query, params)
  }
}
