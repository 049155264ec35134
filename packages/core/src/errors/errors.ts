/**
 * Custom Error Classes
 */

/**
 * Base error for everything graphsink raises.
 */
export class GraphSinkError extends Error {
  public override readonly cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = "GraphSinkError"
    this.cause = cause

    // V8-specific stack trace capture
    Error.captureStackTrace(this, this.constructor)
  }
}

/**
 * Transient connection error.
 * Raised by a session factory when the database cannot be reached right now.
 * The connection manager retries these.
 */
export class TransientConnectionError extends GraphSinkError {
  constructor(
    message: string,
    public readonly uri?: string,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = "TransientConnectionError"
  }
}

/**
 * Connection error.
 * Thrown once every connection attempt failed.
 */
export class ConnectionError extends GraphSinkError {
  constructor(
    message: string,
    public readonly uri?: string,
    public readonly attempts?: number,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = "ConnectionError"
  }
}

/**
 * Authentication error.
 * The database rejected the credentials. Never retried.
 */
export class AuthenticationError extends GraphSinkError {
  constructor(
    message: string,
    public readonly uri?: string,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = "AuthenticationError"
  }
}

/**
 * Input validation error.
 * Thrown for unusable paths or configuration values, before any work starts.
 */
export class InputValidationError extends GraphSinkError {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly received?: unknown,
  ) {
    super(message)
    this.name = "InputValidationError"
  }
}

/**
 * Analysis error.
 * Thrown when a source file cannot be read or parsed.
 */
export class AnalysisError extends GraphSinkError {
  constructor(
    message: string,
    public readonly file: string,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = "AnalysisError"
  }
}

export type PersistencePhase = "index" | "purge" | "flatten" | "save" | "commit"

/**
 * Persistence error.
 * Thrown when writing to the database fails. The transaction is never committed.
 */
export class PersistenceError extends GraphSinkError {
  constructor(
    message: string,
    public readonly phase: PersistencePhase,
    cause?: Error,
  ) {
    super(message, cause)
    this.name = "PersistenceError"
  }
}

/**
 * Normalize anything thrown into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}
