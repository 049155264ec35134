export { GraphStore, edgeId } from './graph-store'
export type { StoredNode, StoredEdge, TransactionSnapshot } from './types'
