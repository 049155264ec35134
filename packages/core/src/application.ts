/**
 * Application
 *
 * Analyzes the given sources and pushes the resulting graph to the database.
 */

import { BabelAnalysisEngine, buildTranslationConfiguration, type AnalysisEngine } from "./analysis"
import { createNeo4jSessionFactory, type SessionFactoryProvider } from "./client"
import type { PersistenceConfig } from "./config"
import { ConnectionManager, type ConnectionManagerOptions } from "./connection"
import { elapsedSeconds, getComponentLogger, type Logger } from "./logging"
import { PersistencePipeline, type PersistSummary } from "./pipeline"

export interface ApplicationOptions {
  /** Paths to analyze; must share one top-level directory */
  files: readonly string[]
  loadIncludes?: boolean
  includesFile?: string
  cwd?: string
  config: PersistenceConfig
}

export interface ApplicationDependencies {
  engine?: AnalysisEngine
  provider?: SessionFactoryProvider
  connection?: Omit<ConnectionManagerOptions, "provider" | "logger">
  logger?: Logger
  now?: () => number
}

export interface ApplicationResult {
  exitCode: 0
  summary: PersistSummary
  analyzeMs: number
  pushMs: number
}

/**
 * Validate input, analyze, persist, and report timing.
 *
 * Path validation runs before any analysis or connection attempt.
 */
export async function runApplication(
  options: ApplicationOptions,
  dependencies: ApplicationDependencies = {},
): Promise<ApplicationResult> {
  const logger = dependencies.logger ?? getComponentLogger("application")
  const now = dependencies.now ?? Date.now

  const translationConfig = buildTranslationConfiguration({
    files: options.files,
    loadIncludes: options.loadIncludes,
    includesFile: options.includesFile,
    cwd: options.cwd,
  })
  if (translationConfig.includePaths.length > 0) {
    logger.info({ includePaths: translationConfig.includePaths.length }, `Loaded includes from file: ${options.includesFile}`)
  }

  const startTime = now()
  const engine = dependencies.engine ?? new BabelAnalysisEngine()
  const result = await engine.analyze(translationConfig)
  const analyzingTime = now()

  logger.info(
    { metric: "graphsink.analyze_ms", value: analyzingTime - startTime },
    `Benchmark: analyzing code in ${elapsedSeconds(startTime, analyzingTime)} s.`,
  )

  const connectionManager = new ConnectionManager({
    ...dependencies.connection,
    provider: dependencies.provider ?? ((config) => createNeo4jSessionFactory(config)),
  })
  const pipeline = new PersistencePipeline({ connectionManager, now })
  const summary = await pipeline.persist(result.translationUnits, options.config)
  const pushTime = now()

  logger.info(
    { metric: "graphsink.push_ms", value: pushTime - analyzingTime, nodes: summary.nodeCount },
    `Benchmark: push code in ${elapsedSeconds(analyzingTime, pushTime)} s.`,
  )

  return { exitCode: 0, summary, analyzeMs: analyzingTime - startTime, pushMs: pushTime - analyzingTime }
}
