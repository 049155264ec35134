/**
 * Neo4j/Bolt Client Module
 *
 * Session factory for Neo4j, Memgraph, and other Bolt-compatible databases.
 */

export { Neo4jSessionFactory, createNeo4jSessionFactory } from "./session-factory"
export type { Neo4jSessionFactoryOptions, CreateBoltDriver } from "./session-factory"
export { Neo4jGraphSession } from "./session"
export type { BoltDriver, BoltSession, BoltTransaction, BoltRecord, BoltQueryResult } from "./session"
export { CypherTemplates, buildSaveStatements, BASE_LABEL, NODE_ID_INDEX } from "./templates"
export type { CypherStatement } from "./templates"
export { mapNeo4jError, isTransientNeo4jError, isAuthenticationNeo4jError } from "./errors"
