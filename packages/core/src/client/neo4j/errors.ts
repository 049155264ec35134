/**
 * Neo4j Error Mapping
 *
 * Classifies driver errors into the failures the connection manager acts on.
 */

import { Neo4jError } from "neo4j-driver"
import { AuthenticationError, GraphSinkError, TransientConnectionError, toError } from "../../errors"

const TRANSIENT_CODES = new Set(["ServiceUnavailable", "SessionExpired"])
const TRANSIENT_SOCKET_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ETIMEDOUT", "EHOSTUNREACH", "ENOTFOUND"])
const SECURITY_CODE_PREFIX = "Neo.ClientError.Security."

function errorCode(error: unknown): string | undefined {
  if (error instanceof Neo4jError) return error.code
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code
  }
  return undefined
}

/**
 * True when the database is unreachable right now and a later attempt may succeed.
 */
export function isTransientNeo4jError(error: unknown): boolean {
  const code = errorCode(error)
  if (code === undefined) return false
  return TRANSIENT_CODES.has(code) || TRANSIENT_SOCKET_CODES.has(code) || code.startsWith("Neo.TransientError.")
}

/**
 * True when the server rejected the credentials.
 */
export function isAuthenticationNeo4jError(error: unknown): boolean {
  const code = errorCode(error)
  return code !== undefined && code.startsWith(SECURITY_CODE_PREFIX)
}

/**
 * Map a driver error to a graphsink error. Errors already mapped and errors
 * of no known class are returned unchanged.
 */
export function mapNeo4jError(error: unknown, uri?: string): Error {
  if (error instanceof GraphSinkError) return error

  const cause = toError(error)

  if (isAuthenticationNeo4jError(error)) {
    return new AuthenticationError(`Unable to connect to ${uri ?? "database"}, wrong username/password`, uri, cause)
  }

  if (isTransientNeo4jError(error)) {
    return new TransientConnectionError(
      `Unable to connect to ${uri ?? "database"}, ensure the database is running and that there is a working network connection to it`,
      uri,
      cause,
    )
  }

  return cause
}
