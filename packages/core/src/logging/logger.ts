/**
 * Logging
 *
 * One pino root logger per process, with child loggers per component.
 */

import pino, { type Logger, type LevelWithSilent } from "pino"

export type { Logger }

const LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"]

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((level) => level === value)
}

/**
 * Resolve the log level from the environment.
 * GRAPHSINK_LOG_LEVEL wins; tests are silent unless asked otherwise.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LevelWithSilent {
  const requested = env.GRAPHSINK_LOG_LEVEL?.trim().toLowerCase()
  if (requested && isLevel(requested)) return requested
  return env.NODE_ENV === "test" ? "silent" : "info"
}

let rootLogger: Logger | null = null

export function createLogger(level: LevelWithSilent = resolveLogLevel()): Logger {
  return pino({ name: "graphsink", level })
}

export function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createLogger()
  }
  return rootLogger
}

/**
 * Child logger tagged with a component name.
 */
export function getComponentLogger(component: string): Logger {
  return getRootLogger().child({ component })
}

/**
 * Seconds elapsed since `startMs`, rounded down like the timing lines expect.
 */
export function elapsedSeconds(startMs: number, endMs: number): number {
  return Math.floor((endMs - startMs) / 1000)
}
