/**
 * Persistence Configuration
 *
 * Validated, immutable settings for one pipeline run.
 */

import { z } from "zod"
import { InputValidationError } from "../errors"

export const DEFAULT_URI = "bolt://localhost:7687"
export const DEFAULT_USERNAME = "neo4j"
export const DEFAULT_PASSWORD = "password"
export const DEFAULT_MAX_ATTEMPTS = 10
export const DEFAULT_RETRY_DELAY_MS = 2000
export const DEFAULT_BATCH_SIZE = 1000

export const autoIndexModeSchema = z.enum(["none", "assert", "validate"])
export type AutoIndexMode = z.infer<typeof autoIndexModeSchema>

export const retryPolicySchema = z.object({
  maxAttempts: z.number().int().positive().default(DEFAULT_MAX_ATTEMPTS),
  delayMs: z.number().int().nonnegative().default(DEFAULT_RETRY_DELAY_MS),
})

export const persistenceConfigSchema = z.object({
  uri: z.string().min(1).default(DEFAULT_URI),
  username: z.string().default(DEFAULT_USERNAME),
  password: z.string().default(DEFAULT_PASSWORD),
  database: z.string().min(1).optional(),
  /** Relationship hops followed on save; -1 means unbounded */
  saveDepth: z.number().int().min(-1).default(-1),
  /** Destructive: removes every node before writing */
  purgeBeforeWrite: z.boolean().default(true),
  autoIndex: autoIndexModeSchema.default("none"),
  verifyConnection: z.boolean().default(true),
  retry: retryPolicySchema.default({}),
  /** Rows per UNWIND statement */
  batchSize: z.number().int().positive().default(DEFAULT_BATCH_SIZE),
})

export type PersistenceConfigInput = z.input<typeof persistenceConfigSchema>
export type RetryPolicy = Readonly<z.output<typeof retryPolicySchema>>
export type PersistenceConfig = Readonly<Omit<z.output<typeof persistenceConfigSchema>, "retry">> & {
  readonly retry: RetryPolicy
}

/**
 * Defaults taken from the environment. Explicit input overrides them.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): PersistenceConfigInput {
  const fromEnv: PersistenceConfigInput = {}
  if (env.GRAPHSINK_NEO4J_URI) fromEnv.uri = env.GRAPHSINK_NEO4J_URI
  if (env.GRAPHSINK_NEO4J_DATABASE) fromEnv.database = env.GRAPHSINK_NEO4J_DATABASE
  return fromEnv
}

/**
 * Merge environment defaults with explicit settings and validate the result.
 *
 * @throws {InputValidationError} If any value is out of range
 */
export function resolvePersistenceConfig(
  input: PersistenceConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): PersistenceConfig {
  const parsed = persistenceConfigSchema.safeParse({ ...configFromEnv(env), ...input })

  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue ? issue.path.join(".") : undefined
    throw new InputValidationError(
      `Invalid configuration${field ? ` at '${field}'` : ""}: ${issue?.message ?? parsed.error.message}`,
      field,
    )
  }

  return Object.freeze({ ...parsed.data, retry: Object.freeze({ ...parsed.data.retry }) })
}
