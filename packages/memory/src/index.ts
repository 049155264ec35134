/**
 * graphsink In-Memory Backend
 *
 * Zero-infrastructure session factory for the persistence pipeline.
 *
 * @example
 * ```typescript
 * import { ConnectionManager, PersistencePipeline, resolvePersistenceConfig } from '@graphsink/core'
 * import { createInMemoryBackend } from '@graphsink/memory'
 *
 * const backend = createInMemoryBackend()
 * const connectionManager = new ConnectionManager({ provider: backend.provider })
 * const pipeline = new PersistencePipeline({ connectionManager })
 *
 * await pipeline.persist(translationUnits, resolvePersistenceConfig())
 *
 * backend.store.getNodesByLabel('TranslationUnit') // persisted units
 * backend.calls // ['openSession', 'purge', 'beginTransaction', 'save', 'commit', ...]
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// SESSIONS
// =============================================================================

export {
  InMemoryBackend,
  InMemorySessionFactory,
  InMemoryGraphSession,
  createInMemoryBackend,
} from './session'
export type { InMemoryBackendOptions, InMemoryCall, InMemoryFaults, SaveRecord } from './session'

// =============================================================================
// STORE
// =============================================================================

export { GraphStore, edgeId } from './store'
export type { StoredNode, StoredEdge, TransactionSnapshot } from './store'
