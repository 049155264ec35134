/**
 * Persistence Pipeline
 *
 * purge → flatten → begin transaction → bulk save → commit, inside one scoped
 * connection. The connection is released on every exit path.
 */

import type { PersistenceConfig } from "../config"
import type { GraphSession, GraphTransaction } from "../client"
import type { ConnectionManager } from "../connection"
import { GraphSinkError, PersistenceError, toError, type PersistencePhase } from "../errors"
import { dedupeById, flatten, type GraphNode, type NodeSet } from "../graph"
import { getComponentLogger, type Logger } from "../logging"

export interface PersistSummary {
  /** Roots handed in, duplicates included */
  rootCount: number
  /** Nodes pushed to the database */
  nodeCount: number
  flattenMs: number
  saveMs: number
}

export interface PersistencePipelineOptions {
  connectionManager: ConnectionManager
  /** Relationship type walked when flattening (default: AST) */
  structuralRelationship?: string
  logger?: Logger
  /** Millisecond clock, injectable for tests */
  now?: () => number
}

/**
 * Run `step`, wrapping any failure that is not already a graphsink error.
 */
async function inPhase<T>(phase: PersistencePhase, step: () => T | Promise<T>): Promise<T> {
  try {
    return await step()
  } catch (error) {
    if (error instanceof GraphSinkError) throw error
    throw new PersistenceError(`Failed to ${phase}: ${toError(error).message}`, phase, toError(error))
  }
}

/**
 * Run `work` inside a transaction that commits only when `work` succeeded.
 *
 * The transaction is closed on every path; closing an uncommitted one rolls it
 * back. When `work` fails, a close failure is logged and the work error wins.
 */
async function withTransaction<T>(session: GraphSession, logger: Logger, work: () => Promise<T>): Promise<T> {
  const transaction: GraphTransaction = await inPhase("save", () => session.beginTransaction())

  let result: T
  try {
    result = await work()
    await inPhase("commit", () => transaction.commit())
  } catch (error) {
    try {
      await transaction.close()
    } catch (closeError) {
      logger.error({ err: toError(closeError) }, "Failed to roll back transaction after an error")
    }
    throw error
  }

  await transaction.close()
  return result
}

export class PersistencePipeline {
  private readonly connectionManager: ConnectionManager
  private readonly structuralRelationship?: string
  private readonly logger: Logger
  private readonly now: () => number

  constructor(options: PersistencePipelineOptions) {
    this.connectionManager = options.connectionManager
    this.structuralRelationship = options.structuralRelationship
    this.logger = options.logger ?? getComponentLogger("pipeline")
    this.now = options.now ?? Date.now
  }

  /**
   * Push the graph below `roots` to the database.
   *
   * @returns Counts and timings of the run
   * @throws {ConnectionError} When no session could be opened
   * @throws {PersistenceError} When purge, flatten, save or commit fails
   */
  async persist(roots: Iterable<GraphNode>, config: PersistenceConfig): Promise<PersistSummary> {
    const rootList = [...roots]

    return this.connectionManager.withConnection(config, async ({ session }) => {
      if (config.purgeBeforeWrite) {
        await inPhase("purge", () => session.purgeDatabase())
      }

      const flattenStart = this.now()
      const nodes = await inPhase("flatten", () =>
        flatten(rootList, { relationship: this.structuralRelationship }),
      )
      const flattenMs = this.now() - flattenStart

      this.logger.info({ depth: config.saveDepth }, `Using import depth: ${config.saveDepth}`)
      const unitCount = dedupeById(rootList).size
      this.logger.info({ roots: unitCount, received: rootList.length }, `Count translation units: ${unitCount}`)
      this.logger.info(
        { metric: "graphsink.flatten_ms", value: flattenMs, nodes: nodes.size },
        `Count nodes to save: ${nodes.size}`,
      )

      const saveMs = await this.saveInTransaction(session, nodes, config.saveDepth)

      return { rootCount: rootList.length, nodeCount: nodes.size, flattenMs, saveMs }
    })
  }

  private async saveInTransaction(session: GraphSession, nodes: NodeSet, depth: number): Promise<number> {
    return withTransaction(session, this.logger, async () => {
      const saveStart = this.now()
      await inPhase("save", () => session.save(nodes, depth))
      const saveMs = this.now() - saveStart

      this.logger.info(
        { metric: "graphsink.save_ms", value: saveMs },
        `Benchmark: pure push time: ${Math.floor(saveMs / 1000)} s.`,
      )
      return saveMs
    })
  }
}
