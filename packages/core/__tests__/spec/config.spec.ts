/**
 * Configuration Specification Tests
 */

import { describe, it, expect } from "vitest"
import {
  configFromEnv,
  DEFAULT_BATCH_SIZE,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
  resolvePersistenceConfig,
} from "../../src/config"
import { InputValidationError } from "../../src/errors"
import { elapsedSeconds, resolveLogLevel } from "../../src/logging"

describe("resolvePersistenceConfig", () => {
  it("applies defaults", () => {
    const config = resolvePersistenceConfig({}, {})

    expect(config).toEqual({
      uri: "bolt://localhost:7687",
      username: "neo4j",
      password: "password",
      saveDepth: -1,
      purgeBeforeWrite: true,
      autoIndex: "none",
      verifyConnection: true,
      retry: { maxAttempts: DEFAULT_MAX_ATTEMPTS, delayMs: DEFAULT_RETRY_DELAY_MS },
      batchSize: DEFAULT_BATCH_SIZE,
    })
  })

  it("lets explicit input override the environment", () => {
    const env = { GRAPHSINK_NEO4J_URI: "bolt://graph:7687", GRAPHSINK_NEO4J_DATABASE: "programs" }

    expect(resolvePersistenceConfig({}, env).uri).toBe("bolt://graph:7687")
    expect(resolvePersistenceConfig({}, env).database).toBe("programs")
    expect(resolvePersistenceConfig({ uri: "bolt://other:7687" }, env).uri).toBe("bolt://other:7687")
  })

  it("returns a frozen config", () => {
    const config = resolvePersistenceConfig({ password: "test-secret" }, {})
    expect(Object.isFrozen(config)).toBe(true)
    expect(Object.isFrozen(config.retry)).toBe(true)
  })

  it("fills in a partial retry policy", () => {
    const config = resolvePersistenceConfig({ retry: { maxAttempts: 3 } }, {})
    expect(config.retry).toEqual({ maxAttempts: 3, delayMs: DEFAULT_RETRY_DELAY_MS })
  })

  it("rejects a save depth below -1", () => {
    expect(() => resolvePersistenceConfig({ saveDepth: -2 }, {})).toThrow(InputValidationError)
  })

  it("names the offending field", () => {
    try {
      resolvePersistenceConfig({ retry: { maxAttempts: 0 } }, {})
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(InputValidationError)
      if (error instanceof InputValidationError) {
        expect(error.field).toBe("retry.maxAttempts")
        expect(error.message).toMatch(/^Invalid configuration at 'retry\.maxAttempts': /)
      }
    }
  })
})

describe("configFromEnv", () => {
  it("ignores empty variables", () => {
    expect(configFromEnv({ GRAPHSINK_NEO4J_URI: "" })).toEqual({})
  })
})

describe("logging helpers", () => {
  it("is silent under test unless a level is requested", () => {
    expect(resolveLogLevel({ NODE_ENV: "test" })).toBe("silent")
    expect(resolveLogLevel({ NODE_ENV: "test", GRAPHSINK_LOG_LEVEL: "Debug" })).toBe("debug")
  })

  it("falls back to info for unknown levels", () => {
    expect(resolveLogLevel({ GRAPHSINK_LOG_LEVEL: "verbose" })).toBe("info")
  })

  it("rounds elapsed time down to whole seconds", () => {
    expect(elapsedSeconds(1000, 3999)).toBe(2)
    expect(elapsedSeconds(0, 999)).toBe(0)
  })
})
