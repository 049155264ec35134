/**
 * graphsink - Program Graph Persistence for Neo4j
 *
 * Flattens an analyzed program graph and writes it to a Bolt database in one
 * transaction, with bounded connection retry and guaranteed teardown.
 *
 * @example
 * ```typescript
 * import {
 *   ConnectionManager,
 *   PersistencePipeline,
 *   createNeo4jSessionFactory,
 *   resolvePersistenceConfig,
 * } from '@graphsink/core';
 *
 * const config = resolvePersistenceConfig({ password: 'test-secret', saveDepth: 2 });
 * const connectionManager = new ConnectionManager({ provider: createNeo4jSessionFactory });
 * const pipeline = new PersistencePipeline({ connectionManager });
 *
 * const summary = await pipeline.persist(translationUnits, config);
 * console.log(`Pushed ${summary.nodeCount} nodes`);
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// GRAPH
// =============================================================================

export {
  STRUCTURAL_RELATIONSHIP,
  BasicGraphNode,
  flatten,
  dedupeById,
  planSave,
  assertSaveDepth,
  UNBOUNDED_DEPTH,
} from "./graph"
export type {
  GraphNode,
  GraphRelationship,
  NodeSet,
  PlannedRelationship,
  PropertyMap,
  PropertyValue,
  SavePlan,
  FlattenOptions,
} from "./graph"

// =============================================================================
// CLIENT
// =============================================================================

export {
  Neo4jSessionFactory,
  createNeo4jSessionFactory,
  CypherTemplates,
  buildSaveStatements,
  BASE_LABEL,
  NODE_ID_INDEX,
  mapNeo4jError,
  isTransientNeo4jError,
  isAuthenticationNeo4jError,
} from "./client"
export type {
  SessionFactory,
  SessionFactoryConfig,
  SessionFactoryProvider,
  GraphSession,
  GraphTransaction,
  TransactionStatus,
  SaveResult,
  Neo4jSessionFactoryOptions,
  BoltDriver,
  BoltSession,
  BoltTransaction,
  CreateBoltDriver,
  CypherStatement,
} from "./client"

// =============================================================================
// CONNECTION & PIPELINE
// =============================================================================

export { ConnectionManager, toSessionFactoryConfig } from "./connection"
export type { Connection, ConnectionManagerOptions, ConnectionState, ConnectionStatus } from "./connection"

export { PersistencePipeline } from "./pipeline"
export type { PersistSummary, PersistencePipelineOptions } from "./pipeline"

// =============================================================================
// CONFIGURATION & LOGGING
// =============================================================================

export { resolvePersistenceConfig, configFromEnv, persistenceConfigSchema } from "./config"
export type { PersistenceConfig, PersistenceConfigInput, RetryPolicy, AutoIndexMode } from "./config"

export { createLogger, getComponentLogger, getRootLogger } from "./logging"
export type { Logger } from "./logging"

// =============================================================================
// ANALYSIS & APPLICATION
// =============================================================================

export {
  BabelAnalysisEngine,
  buildAstGraph,
  buildTranslationConfiguration,
  readIncludePaths,
  TRANSLATION_UNIT_LABEL,
  REFERS_TO,
} from "./analysis"
export type { AnalysisEngine, TranslationResult, TranslationConfiguration, TranslationOptions } from "./analysis"

export { runApplication } from "./application"
export type { ApplicationOptions, ApplicationDependencies, ApplicationResult } from "./application"

// =============================================================================
// ERRORS
// =============================================================================

export {
  GraphSinkError,
  TransientConnectionError,
  ConnectionError,
  AuthenticationError,
  InputValidationError,
  AnalysisError,
  PersistenceError,
} from "./errors"
export type { PersistencePhase } from "./errors"
