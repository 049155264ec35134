/**
 * Client Module
 *
 * Database client interfaces and the Neo4j implementation.
 */

export type {
  SessionFactory,
  SessionFactoryConfig,
  SessionFactoryProvider,
  GraphSession,
  GraphTransaction,
  TransactionStatus,
  SaveResult,
} from "./provider"

export { Neo4jSessionFactory, createNeo4jSessionFactory } from "./neo4j"
export type { Neo4jSessionFactoryOptions, BoltDriver, BoltSession, BoltTransaction, CreateBoltDriver } from "./neo4j"
export { CypherTemplates, buildSaveStatements, BASE_LABEL, NODE_ID_INDEX } from "./neo4j"
export type { CypherStatement } from "./neo4j"
export { mapNeo4jError, isTransientNeo4jError, isAuthenticationNeo4jError } from "./neo4j"
