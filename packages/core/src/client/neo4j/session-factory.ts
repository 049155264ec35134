/**
 * Neo4j Session Factory
 *
 * Owns the Bolt driver lifecycle.
 */

import neo4j from "neo4j-driver"
import { getComponentLogger, type Logger } from "../../logging"
import type { GraphSession, SessionFactory, SessionFactoryConfig } from "../provider"
import { mapNeo4jError } from "./errors"
import { Neo4jGraphSession, type BoltDriver } from "./session"

export type CreateBoltDriver = (uri: string, credentials: { username: string; password: string }) => BoltDriver

export interface Neo4jSessionFactoryOptions {
  /** Driver constructor (defaults to neo4j-driver) */
  createDriver?: CreateBoltDriver
  logger?: Logger
}

const createDefaultDriver: CreateBoltDriver = (uri, credentials) =>
  neo4j.driver(uri, neo4j.auth.basic(credentials.username, credentials.password))

/**
 * Session factory for Neo4j and other Bolt databases.
 */
export class Neo4jSessionFactory implements SessionFactory {
  readonly name = "neo4j"
  private driver: BoltDriver | null = null
  private readonly createDriver: CreateBoltDriver
  private readonly logger: Logger

  constructor(
    private readonly config: SessionFactoryConfig,
    options: Neo4jSessionFactoryOptions = {},
  ) {
    this.createDriver = options.createDriver ?? createDefaultDriver
    this.logger = options.logger ?? getComponentLogger("neo4j")
  }

  /**
   * Build the driver if needed, verify connectivity, apply the auto-index mode
   * and return a session.
   *
   * @throws {TransientConnectionError} When the server is unreachable
   * @throws {AuthenticationError} When the credentials are rejected
   */
  async openSession(): Promise<GraphSession> {
    const driver = this.getDriver()

    try {
      if (this.config.verifyConnection) {
        await driver.verifyConnectivity()
      }

      const session = new Neo4jGraphSession(driver, {
        database: this.config.database,
        batchSize: this.config.batchSize,
        logger: this.logger,
      })
      await session.applyAutoIndex(this.config.autoIndex)

      this.logger.debug({ uri: this.config.uri }, "Session opened")
      return session
    } catch (error) {
      throw mapNeo4jError(error, this.config.uri)
    }
  }

  async close(): Promise<void> {
    if (this.driver) {
      const driver = this.driver
      this.driver = null
      await driver.close()
    }
  }

  private getDriver(): BoltDriver {
    if (!this.driver) {
      this.driver = this.createDriver(this.config.uri, this.config.credentials)
    }
    return this.driver
  }
}

/**
 * SessionFactoryProvider for Neo4j.
 */
export function createNeo4jSessionFactory(
  config: SessionFactoryConfig,
  options?: Neo4jSessionFactoryOptions,
): Neo4jSessionFactory {
  return new Neo4jSessionFactory(config, options)
}
