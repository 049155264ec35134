/**
 * Errors Module
 */

export {
  GraphSinkError,
  TransientConnectionError,
  ConnectionError,
  AuthenticationError,
  InputValidationError,
  AnalysisError,
  PersistenceError,
  toError,
} from "./errors"
export type { PersistencePhase } from "./errors"
