export {
  resolvePersistenceConfig,
  configFromEnv,
  persistenceConfigSchema,
  retryPolicySchema,
  autoIndexModeSchema,
  DEFAULT_URI,
  DEFAULT_USERNAME,
  DEFAULT_PASSWORD,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_BATCH_SIZE,
} from "./config"
export type { PersistenceConfig, PersistenceConfigInput, RetryPolicy, AutoIndexMode } from "./config"
