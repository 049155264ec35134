/**
 * In-Memory Session Factory
 *
 * Implements the core SessionFactory/GraphSession contracts over a GraphStore.
 * Every call is recorded, and failures can be scripted per operation, so the
 * pipeline can be exercised without a database.
 */

import {
  AuthenticationError,
  BASE_LABEL,
  PersistenceError,
  planSave,
  type AutoIndexMode,
  type GraphNode,
  type GraphSession,
  type GraphTransaction,
  type NodeSet,
  type SaveResult,
  type SessionFactory,
  type SessionFactoryConfig,
  type SessionFactoryProvider,
  type TransactionStatus,
} from '@graphsink/core'
import { GraphStore } from './store'

// =============================================================================
// TYPES
// =============================================================================

export type InMemoryCall =
  | 'openSession'
  | 'closeFactory'
  | 'purge'
  | 'beginTransaction'
  | 'save'
  | 'commit'
  | 'rollback'
  | 'clear'

/**
 * Scripted failures.
 */
export interface InMemoryFaults {
  /**
   * Errors thrown by successive openSession calls across all factories.
   * An undefined entry, or running past the end, means the attempt succeeds.
   */
  openSession?: Array<Error | undefined>
  purge?: Error
  save?: Error
  commit?: Error
  clear?: Error
  /** Thrown by every factory close, after the call is recorded */
  closeFactory?: Error
}

export interface InMemoryBackendOptions {
  /** Credentials the backend accepts; any credentials are accepted when omitted */
  credentials?: { username: string; password: string }
  faults?: InMemoryFaults
  /** Whether the node id index already exists */
  indexed?: boolean
}

/**
 * Ids handed to one save call, in input order.
 */
export interface SaveRecord {
  nodeIds: string[]
  depth: number
  inTransaction: boolean
}

// =============================================================================
// BACKEND
// =============================================================================

/**
 * Shared state behind every factory built by `provider`.
 */
export class InMemoryBackend {
  readonly store = new GraphStore()
  readonly calls: InMemoryCall[] = []
  readonly configs: SessionFactoryConfig[] = []
  readonly saves: SaveRecord[] = []
  private attempts = 0
  private indexed: boolean

  constructor(private readonly options: InMemoryBackendOptions = {}) {
    this.indexed = options.indexed ?? false
  }

  /** Provider to hand to a ConnectionManager */
  readonly provider: SessionFactoryProvider = (config) => {
    this.configs.push(config)
    return new InMemorySessionFactory(this, config)
  }

  get faults(): InMemoryFaults {
    return this.options.faults ?? {}
  }

  get hasIdIndex(): boolean {
    return this.indexed
  }

  /** Number of times a given call was made */
  count(call: InMemoryCall): number {
    return this.calls.filter((c) => c === call).length
  }

  /** @internal */
  record(call: InMemoryCall): void {
    this.calls.push(call)
  }

  /** @internal */
  nextOpenFailure(): Error | undefined {
    const failure = this.faults.openSession?.[this.attempts]
    this.attempts++
    return failure
  }

  /** @internal */
  checkCredentials(config: SessionFactoryConfig): void {
    const expected = this.options.credentials
    if (!expected) return

    const { username, password } = config.credentials
    if (username !== expected.username || password !== expected.password) {
      throw new AuthenticationError(`Unable to connect to ${config.uri}, wrong username/password`, config.uri)
    }
  }

  /** @internal */
  applyAutoIndex(mode: AutoIndexMode): void {
    if (mode === 'assert') {
      this.indexed = true
    } else if (mode === 'validate' && !this.indexed) {
      throw new PersistenceError(`No index covers ${BASE_LABEL}.id (auto-index mode 'validate')`, 'index')
    }
  }
}

export function createInMemoryBackend(options?: InMemoryBackendOptions): InMemoryBackend {
  return new InMemoryBackend(options)
}

// =============================================================================
// FACTORY
// =============================================================================

export class InMemorySessionFactory implements SessionFactory {
  readonly name = 'in-memory'
  private closed = false

  constructor(
    private readonly backend: InMemoryBackend,
    private readonly config: SessionFactoryConfig,
  ) {}

  async openSession(): Promise<GraphSession> {
    this.backend.record('openSession')
    if (this.closed) {
      throw new Error('Session factory is closed')
    }

    const failure = this.backend.nextOpenFailure()
    if (failure) throw failure

    this.backend.checkCredentials(this.config)
    this.backend.applyAutoIndex(this.config.autoIndex)
    return new InMemoryGraphSession(this.backend)
  }

  async close(): Promise<void> {
    this.backend.record('closeFactory')
    this.closed = true
    const failure = this.backend.faults.closeFactory
    if (failure) throw failure
  }
}

// =============================================================================
// SESSION
// =============================================================================

class InMemoryGraphTransaction implements GraphTransaction {
  private current: TransactionStatus = 'open'

  constructor(
    private readonly backend: InMemoryBackend,
    private readonly detach: () => void,
  ) {}

  get status(): TransactionStatus {
    return this.current
  }

  async commit(): Promise<void> {
    this.assertOpen('commit')
    this.backend.record('commit')
    const failure = this.backend.faults.commit
    if (failure) throw failure
    this.backend.store.commit()
    this.current = 'committed'
  }

  async rollback(): Promise<void> {
    this.assertOpen('rollback')
    this.backend.record('rollback')
    this.backend.store.rollback()
    this.current = 'rolledBack'
  }

  async close(): Promise<void> {
    try {
      if (this.current === 'open') {
        await this.rollback()
      }
    } finally {
      this.detach()
    }
  }

  private assertOpen(operation: string): void {
    if (this.current !== 'open') {
      throw new PersistenceError(`Cannot ${operation}: transaction is ${this.current}`, 'commit')
    }
  }
}

export class InMemoryGraphSession implements GraphSession {
  private transaction: InMemoryGraphTransaction | null = null

  constructor(private readonly backend: InMemoryBackend) {}

  async purgeDatabase(): Promise<void> {
    this.backend.record('purge')
    const failure = this.backend.faults.purge
    if (failure) throw failure
    this.backend.store.clear()
  }

  async beginTransaction(): Promise<GraphTransaction> {
    this.backend.record('beginTransaction')
    if (this.transaction) {
      throw new PersistenceError('A transaction is already open on this session', 'save')
    }
    this.backend.store.beginTransaction()
    const tx = new InMemoryGraphTransaction(this.backend, () => {
      this.transaction = null
    })
    this.transaction = tx
    return tx
  }

  async save(nodes: NodeSet | Iterable<GraphNode>, depth: number): Promise<SaveResult> {
    this.backend.record('save')
    const plan = planSave(nodes, depth)
    this.backend.saves.push({
      nodeIds: plan.nodes.map((node) => node.id),
      depth,
      inTransaction: this.transaction !== null,
    })

    const failure = this.backend.faults.save
    if (failure) throw failure

    const { store } = this.backend
    for (const node of plan.nodes) {
      store.mergeNode(node.id, [BASE_LABEL, ...node.labels], withoutNulls(node.properties))
    }
    for (const rel of plan.relationships) {
      store.mergeEdge(rel.fromId, rel.type, rel.toId, withoutNulls(rel.properties))
    }

    return { nodesWritten: plan.nodes.length, relationshipsWritten: plan.relationships.length }
  }

  async clear(): Promise<void> {
    this.backend.record('clear')
    const tx = this.transaction
    if (tx) {
      await tx.close()
    }
    const failure = this.backend.faults.clear
    if (failure) throw failure
  }
}

function withoutNulls(properties: Readonly<Record<string, unknown>>): Record<string, unknown> {
  const result: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(properties)) {
    if (value !== null && value !== undefined) {
      result[key] = value
    }
  }
  return result
}
