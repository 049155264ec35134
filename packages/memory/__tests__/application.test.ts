import fs from "node:fs"
import os from "node:os"
import path from "node:path"
import { describe, it, expect, beforeEach, afterEach } from "vitest"
import {
  createLogger,
  resolvePersistenceConfig,
  runApplication,
  REFERS_TO,
  TransientConnectionError,
} from "@graphsink/core"
import { EXIT_FAILURE, EXIT_OK, main } from "@graphsink/core/src/cli/main"
import { createInMemoryBackend } from "../src"

const logger = createLogger("silent")
let root: string

beforeEach(() => {
  root = fs.mkdtempSync(path.join(os.tmpdir(), "graphsink-app-"))
  fs.mkdirSync(path.join(root, "src"))
  fs.writeFileSync(path.join(root, "src", "math.ts"), "export function double(n: number) { return n * 2 }\ndouble(2)\n")
  fs.writeFileSync(path.join(root, "src", "main.js"), "import { double } from './math'\n")
})

afterEach(() => {
  fs.rmSync(root, { recursive: true, force: true })
})

describe("runApplication", () => {
  it("analyzes the sources and persists every node", async () => {
    const backend = createInMemoryBackend()
    let clock = 0

    const result = await runApplication(
      { files: ["src"], cwd: root, config: resolvePersistenceConfig({ password: "test-secret" }, {}) },
      { provider: backend.provider, logger, now: () => (clock += 1000) },
    )

    const units = backend.store.getNodesByLabel("TranslationUnit")
    expect(units.map((u) => u.properties.name)).toEqual(["main.js", "math.ts"])
    expect(result.summary.rootCount).toBe(2)
    expect(backend.store.stats().nodes).toBe(result.summary.nodeCount)
    expect(backend.store.getNodesByLabel("Node")).toHaveLength(result.summary.nodeCount)
    expect(backend.store.getAllEdges().some((e) => e.type === REFERS_TO)).toBe(true)
    expect(result.exitCode).toBe(0)
  })

  it("validates paths before connecting", async () => {
    const backend = createInMemoryBackend()

    await expect(
      runApplication(
        { files: ["src/math.ts", "."], cwd: root, config: resolvePersistenceConfig({}, {}) },
        { provider: backend.provider, logger },
      ),
    ).rejects.toThrow("All files should have the same top level path.")
    expect(backend.calls).toEqual([])
  })
})

describe("main", () => {
  const write = () => {}

  it("exits 0 after pushing the graph", async () => {
    const backend = createInMemoryBackend({ credentials: { username: "reader", password: "test-secret" } })

    const code = await main(["--user", "reader", "--password", "test-secret", "--save-depth", "1", "src"], {
      cwd: root,
      env: {},
      write,
      logger,
      provider: backend.provider,
    })

    expect(code).toBe(EXIT_OK)
    expect(backend.configs[0]?.credentials).toEqual({ username: "reader", password: "test-secret" })
    expect(backend.saves[0]?.depth).toBe(1)
    expect(backend.count("purge")).toBe(1)
  })

  it("ensures the node id index and takes a separate negative depth", async () => {
    const backend = createInMemoryBackend()

    const code = await main(["--save-depth", "-1", "src"], { cwd: root, env: {}, write, logger, provider: backend.provider })

    expect(code).toBe(EXIT_OK)
    expect(backend.configs[0]?.autoIndex).toBe("assert")
    expect(backend.hasIdIndex).toBe(true)
    expect(backend.saves[0]?.depth).toBe(-1)
  })

  it("exits 1 when the database stays unreachable", async () => {
    const unreachable = Array.from({ length: 10 }, () => new TransientConnectionError("refused"))
    const backend = createInMemoryBackend({ faults: { openSession: unreachable } })
    const sleeps: number[] = []

    const code = await main(["src"], {
      cwd: root,
      env: {},
      write,
      logger,
      provider: backend.provider,
      connection: {
        sleep: async (ms) => {
          sleeps.push(ms)
        },
      },
    })

    expect(code).toBe(EXIT_FAILURE)
    expect(backend.count("openSession")).toBe(10)
    expect(sleeps).toHaveLength(9)
    expect(backend.count("purge")).toBe(0)
  })
})
