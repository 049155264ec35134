/**
 * Program Graph Types
 *
 * The in-memory program graph handed over by an analysis engine.
 * The persistence core only reads these values.
 */

// =============================================================================
// PROPERTIES
// =============================================================================

/**
 * Values a node or relationship property may hold.
 * Restricted to what a Bolt database stores as a property.
 */
export type PropertyValue = string | number | boolean | null | string[] | number[] | boolean[]

export type PropertyMap = Readonly<Record<string, PropertyValue>>

// =============================================================================
// NODES & RELATIONSHIPS
// =============================================================================

/**
 * A unit of the analyzed program graph.
 */
export interface GraphNode {
  /** Unique identity, stable for the duration of a run */
  readonly id: string
  /** Labels written to the database (the base label is added on save) */
  readonly labels: readonly string[]
  /** Attributes, opaque to the persistence core */
  readonly properties: PropertyMap
  /** Outgoing relationships, structural and semantic */
  readonly relationships: readonly GraphRelationship[]
}

/**
 * A labeled outgoing edge of a graph node.
 */
export interface GraphRelationship {
  readonly type: string
  readonly target: GraphNode
  readonly properties?: PropertyMap
}

/**
 * Relationship type of the parent-to-child containment edge.
 */
export const STRUCTURAL_RELATIONSHIP = "AST"

/**
 * Deduplicated nodes keyed by identity, in discovery order.
 */
export type NodeSet = ReadonlyMap<string, GraphNode>

// =============================================================================
// SAVE PLAN
// =============================================================================

/**
 * A relationship record to write, detached from the object graph.
 */
export interface PlannedRelationship {
  fromId: string
  toId: string
  type: string
  properties: PropertyMap
}

/**
 * Node and relationship records produced for one bulk save.
 */
export interface SavePlan {
  nodes: GraphNode[]
  relationships: PlannedRelationship[]
}
