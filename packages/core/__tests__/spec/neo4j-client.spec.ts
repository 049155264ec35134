/**
 * Neo4j Client Specification Tests
 *
 * Exercises the Bolt session against a recording driver.
 */

import { describe, it, expect, beforeEach } from "vitest"
import {
  buildSaveStatements,
  CypherTemplates,
  isAuthenticationNeo4jError,
  isTransientNeo4jError,
  mapNeo4jError,
  Neo4jSessionFactory,
  type BoltDriver,
  type BoltSession,
  type BoltTransaction,
  type SessionFactoryConfig,
} from "../../src/client"
import type { BoltRecord } from "../../src/client/neo4j"
import { AuthenticationError, InputValidationError, PersistenceError, TransientConnectionError } from "../../src/errors"
import { BasicGraphNode, planSave } from "../../src/graph"
import { createLogger } from "../../src/logging"

// =============================================================================
// RECORDING DRIVER
// =============================================================================

interface RunCall {
  query: string
  params?: Record<string, unknown>
  tx: boolean
}

class RecordingDriver implements BoltDriver {
  readonly runs: RunCall[] = []
  readonly events: string[] = []
  indexRecords: BoltRecord[] = []
  connectivityError: Error | null = null
  sessionConfigs: Array<{ database?: string; defaultAccessMode?: "READ" | "WRITE" } | undefined> = []

  session(config?: { database?: string; defaultAccessMode?: "READ" | "WRITE" }): BoltSession {
    this.sessionConfigs.push(config)
    const run = async (query: string, params?: Record<string, unknown>) => {
      this.runs.push({ query, params, tx: false })
      return { records: query.startsWith("SHOW INDEXES") ? this.indexRecords : [] }
    }
    return {
      run,
      beginTransaction: (): BoltTransaction => {
        this.events.push("begin")
        return {
          run: async (query, params) => {
            this.runs.push({ query, params, tx: true })
            return { records: [] }
          },
          commit: async () => {
            this.events.push("commit")
          },
          rollback: async () => {
            this.events.push("rollback")
          },
        }
      },
      close: async () => {
        this.events.push("sessionClose")
      },
    }
  }

  async verifyConnectivity(): Promise<unknown> {
    this.events.push("verify")
    if (this.connectivityError) throw this.connectivityError
    return {}
  }

  async close(): Promise<void> {
    this.events.push("driverClose")
  }
}

function record(values: Record<string, unknown>): BoltRecord {
  return { get: (key) => values[key] }
}

function codedError(code: string): Error {
  return Object.assign(new Error(`failed with ${code}`), { code })
}

const baseConfig: SessionFactoryConfig = {
  uri: "bolt://localhost:7687",
  credentials: { username: "neo4j", password: "test-secret" },
  autoIndex: "none",
  verifyConnection: true,
  batchSize: 1000,
}

// =============================================================================
// TEMPLATES
// =============================================================================

describe("CypherTemplates", () => {
  it("purges every node and relationship", () => {
    expect(CypherTemplates.admin.purge()).toBe("MATCH (n) DETACH DELETE n")
  })

  it("merges nodes on the base label and sets extra labels", () => {
    expect(CypherTemplates.batch.mergeNodes(["Expr", "Identifier"])).toBe(
      "UNWIND $rows AS row\n    MERGE (n:Node {id: row.id})\n    SET n = row.props, n.id = row.id\n    SET n:Expr:Identifier",
    )
  })

  it("rejects identifiers that could inject Cypher", () => {
    expect(() => CypherTemplates.utils.sanitizeIdentifier("A`) DETACH DELETE n //")).toThrow(InputValidationError)
    expect(CypherTemplates.utils.sanitizeIdentifier("REFERS_TO")).toBe("REFERS_TO")
  })
})

describe("buildSaveStatements", () => {
  it("groups nodes by label set and writes nodes before relationships", () => {
    const b = new BasicGraphNode("b", ["Identifier"], { name: "x", value: null })
    const a = new BasicGraphNode("a", ["Node", "Expr", "Expr"]).connect("AST", b, { field: "left" })
    const c = new BasicGraphNode("c", ["Expr"])

    const statements = buildSaveStatements(planSave([a, b, c], -1), 1000)

    expect(statements).toHaveLength(3)
    expect(statements[0]?.query).toContain("SET n:Expr")
    expect(statements[0]?.params).toEqual({ rows: [{ id: "a", props: {} }, { id: "c", props: {} }] })
    expect(statements[1]?.params).toEqual({ rows: [{ id: "b", props: { name: "x" } }] })
    expect(statements[2]?.query).toContain("MERGE (a)-[r:AST]->(b)")
    expect(statements[2]?.params).toEqual({ rows: [{ fromId: "a", toId: "b", props: { field: "left" } }] })
  })

  it("splits large groups into batches", () => {
    const nodes = Array.from({ length: 5 }, (_, i) => new BasicGraphNode(`n${i}`, ["Expr"]))
    const statements = buildSaveStatements(planSave(nodes, 0), 2)
    const sizes = statements.map((s) => {
      const rows = s.params.rows
      return Array.isArray(rows) ? rows.length : 0
    })
    expect(sizes).toEqual([2, 2, 1])
  })
})

// =============================================================================
// ERROR MAPPING
// =============================================================================

describe("mapNeo4jError", () => {
  it("classifies unreachable servers as transient", () => {
    expect(isTransientNeo4jError(codedError("ServiceUnavailable"))).toBe(true)
    expect(isTransientNeo4jError(codedError("ECONNREFUSED"))).toBe(true)
    expect(isTransientNeo4jError(codedError("Neo.TransientError.General.DatabaseUnavailable"))).toBe(true)
    expect(isTransientNeo4jError(new Error("no code"))).toBe(false)
  })

  it("classifies security errors as authentication failures", () => {
    const error = codedError("Neo.ClientError.Security.Unauthorized")
    expect(isAuthenticationNeo4jError(error)).toBe(true)

    const mapped = mapNeo4jError(error, "bolt://db:7687")
    expect(mapped).toBeInstanceOf(AuthenticationError)
    expect(mapped.message).toBe("Unable to connect to bolt://db:7687, wrong username/password")
  })

  it("wraps transient errors with their cause", () => {
    const error = codedError("SessionExpired")
    const mapped = mapNeo4jError(error, "bolt://db:7687")
    expect(mapped).toBeInstanceOf(TransientConnectionError)
    expect(mapped.cause).toBe(error)
  })

  it("returns unknown errors unchanged", () => {
    const error = codedError("Neo.ClientError.Statement.SyntaxError")
    expect(mapNeo4jError(error)).toBe(error)
  })
})

// =============================================================================
// SESSION FACTORY & SESSION
// =============================================================================

describe("Neo4jSessionFactory", () => {
  let driver: RecordingDriver
  const logger = createLogger("silent")

  beforeEach(() => {
    driver = new RecordingDriver()
  })

  function factory(config: Partial<SessionFactoryConfig> = {}) {
    return new Neo4jSessionFactory({ ...baseConfig, ...config }, { createDriver: () => driver, logger })
  }

  it("verifies connectivity before returning a session", async () => {
    await factory().openSession()
    expect(driver.events).toEqual(["verify"])
  })

  it("skips verification when disabled", async () => {
    await factory({ verifyConnection: false }).openSession()
    expect(driver.events).toEqual([])
  })

  it("maps connectivity failures", async () => {
    driver.connectivityError = codedError("ServiceUnavailable")
    await expect(factory().openSession()).rejects.toBeInstanceOf(TransientConnectionError)
  })

  it("creates the id index in assert mode", async () => {
    await factory({ autoIndex: "assert" }).openSession()
    expect(driver.runs.map((r) => r.query)).toEqual([CypherTemplates.admin.createIdIndex()])
  })

  it("fails validate mode when no index covers the id", async () => {
    driver.indexRecords = [record({ labelsOrTypes: ["Node"], properties: ["name"] })]
    await expect(factory({ autoIndex: "validate" }).openSession()).rejects.toBeInstanceOf(PersistenceError)
  })

  it("passes validate mode when the id index exists", async () => {
    driver.indexRecords = [record({ labelsOrTypes: ["Node"], properties: ["id"] })]
    await expect(factory({ autoIndex: "validate" }).openSession()).resolves.toBeDefined()
  })

  it("opens write sessions on the configured database", async () => {
    const session = await factory({ database: "programs" }).openSession()
    await session.purgeDatabase()
    expect(driver.sessionConfigs).toEqual([{ database: "programs", defaultAccessMode: "WRITE" }])
  })

  it("saves inside the open transaction and commits", async () => {
    const session = await factory().openSession()
    const unit = new BasicGraphNode("u", ["TranslationUnit"]).connect("AST", new BasicGraphNode("x", ["Expr"]))

    const tx = await session.beginTransaction()
    const result = await session.save([unit], -1)
    await tx.commit()
    await tx.close()

    expect(result).toEqual({ nodesWritten: 2, relationshipsWritten: 1 })
    expect(driver.runs.every((r) => r.tx)).toBe(true)
    expect(driver.runs).toHaveLength(3)
    expect(driver.events).toEqual(["verify", "begin", "commit"])
    expect(tx.status).toBe("committed")
  })

  it("rolls back a transaction closed without commit", async () => {
    const session = await factory().openSession()
    const tx = await session.beginTransaction()
    await tx.close()

    expect(tx.status).toBe("rolledBack")
    expect(driver.events).toEqual(["verify", "begin", "rollback"])
  })

  it("refuses a second transaction while one is open", async () => {
    const session = await factory().openSession()
    await session.beginTransaction()
    await expect(session.beginTransaction()).rejects.toBeInstanceOf(PersistenceError)
  })

  it("refuses to purge inside a transaction", async () => {
    const session = await factory().openSession()
    await session.beginTransaction()
    await expect(session.purgeDatabase()).rejects.toBeInstanceOf(PersistenceError)
  })

  it("clear rolls back an open transaction and closes the bolt session", async () => {
    const session = await factory().openSession()
    await session.beginTransaction()
    await session.clear()

    expect(driver.events).toEqual(["verify", "begin", "rollback", "sessionClose"])
  })

  it("closes the driver once", async () => {
    const sessions = factory()
    await sessions.openSession()
    await sessions.close()
    await sessions.close()

    expect(driver.events.filter((e) => e === "driverClose")).toHaveLength(1)
  })
})
