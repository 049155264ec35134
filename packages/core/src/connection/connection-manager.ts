/**
 * Connection Manager
 *
 * Opens a database session with bounded retry and owns its release.
 * Transient failures are retried with a fixed delay; rejected credentials end
 * the process, since no retry can fix them.
 */

import { setTimeout as delay } from "node:timers/promises"
import type { PersistenceConfig } from "../config"
import { AuthenticationError, ConnectionError, TransientConnectionError, toError } from "../errors"
import type { GraphSession, SessionFactory, SessionFactoryConfig, SessionFactoryProvider } from "../client"
import { getComponentLogger, type Logger } from "../logging"

// =============================================================================
// TYPES
// =============================================================================

export type ConnectionStatus = "attempting" | "connected" | "authFailed" | "exhaustedRetries"

export interface ConnectionState {
  status: ConnectionStatus
  /** Failed attempts so far */
  failures: number
}

/**
 * A live session and the factory it came from, owned together for one run.
 */
export interface Connection {
  session: GraphSession
  factory: SessionFactory
}

export interface ConnectionManagerOptions {
  /** Builds a session factory per attempt */
  provider: SessionFactoryProvider
  /** Wait between attempts (defaults to a timer) */
  sleep?: (ms: number) => Promise<void>
  /** Ends the process on authentication failure (defaults to process.exit) */
  terminate?: (code: number) => never
  /** Observes every state transition */
  onStateChange?: (state: ConnectionState) => void
  logger?: Logger
}

export function toSessionFactoryConfig(config: PersistenceConfig): SessionFactoryConfig {
  return {
    uri: config.uri,
    credentials: { username: config.username, password: config.password },
    database: config.database,
    autoIndex: config.autoIndex,
    verifyConnection: config.verifyConnection,
    batchSize: config.batchSize,
  }
}

// =============================================================================
// CONNECTION MANAGER
// =============================================================================

export class ConnectionManager {
  private readonly provider: SessionFactoryProvider
  private readonly sleep: (ms: number) => Promise<void>
  private readonly terminate: (code: number) => never
  private readonly onStateChange?: (state: ConnectionState) => void
  private readonly logger: Logger
  private current: ConnectionState = { status: "attempting", failures: 0 }

  constructor(options: ConnectionManagerOptions) {
    this.provider = options.provider
    this.sleep = options.sleep ?? ((ms) => delay(ms))
    this.terminate = options.terminate ?? ((code) => process.exit(code))
    this.onStateChange = options.onStateChange
    this.logger = options.logger ?? getComponentLogger("connection")
  }

  get state(): ConnectionState {
    return { ...this.current }
  }

  /**
   * Open a session, retrying transient failures up to `retry.maxAttempts`.
   *
   * @throws {ConnectionError} Once every attempt failed
   */
  async connect(config: PersistenceConfig): Promise<Connection> {
    const { maxAttempts, delayMs } = config.retry
    const factoryConfig = toSessionFactoryConfig(config)
    this.transition({ status: "attempting", failures: 0 })

    for (;;) {
      const factory = this.provider(factoryConfig)

      try {
        const session = await factory.openSession()
        this.transition({ status: "connected", failures: this.current.failures })
        this.logger.info({ uri: config.uri, backend: factory.name }, "Connected")
        return { session, factory }
      } catch (error) {
        try {
          await factory.close()
        } catch (closeError) {
          this.logger.warn({ uri: config.uri, err: toError(closeError) }, "Failed to close session factory after a failed attempt")
        }

        if (error instanceof AuthenticationError) {
          this.transition({ status: "authFailed", failures: this.current.failures + 1 })
          this.logger.fatal({ uri: config.uri, err: error }, `Unable to connect to ${config.uri}, wrong username/password!`)
          return this.terminate(1)
        }

        if (!(error instanceof TransientConnectionError)) {
          throw error
        }

        const failures = this.current.failures + 1
        this.logger.error(
          { uri: config.uri, attempt: failures, maxAttempts, err: error },
          `Unable to connect to ${config.uri}, ensure the database is running and that there is a working network connection to it.`,
        )

        if (failures >= maxAttempts) {
          this.transition({ status: "exhaustedRetries", failures })
          throw new ConnectionError(`Unable to connect to ${config.uri}`, config.uri, failures, error)
        }

        this.transition({ status: "attempting", failures })
        await this.sleep(delayMs)
      }
    }
  }

  /**
   * Run `work` with a live connection and release it afterwards, on every path.
   *
   * Release clears the session, then closes the factory even if clearing failed.
   * When `work` fails, a release failure is logged and the work error wins.
   */
  async withConnection<T>(config: PersistenceConfig, work: (connection: Connection) => Promise<T>): Promise<T> {
    const connection = await this.connect(config)

    let result: T
    try {
      result = await work(connection)
    } catch (error) {
      try {
        await this.release(connection)
      } catch (releaseError) {
        this.logger.error({ err: toError(releaseError) }, "Failed to release connection after an error")
      }
      throw error
    }

    await this.release(connection)
    return result
  }

  private async release(connection: Connection): Promise<void> {
    try {
      await connection.session.clear()
    } finally {
      await connection.factory.close()
      this.logger.debug("Connection released")
    }
  }

  private transition(next: ConnectionState): void {
    this.current = next
    this.onStateChange?.({ ...next })
  }
}
