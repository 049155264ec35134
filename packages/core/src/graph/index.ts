/**
 * Graph Module
 *
 * Program graph model, flattening and save planning.
 */

export { STRUCTURAL_RELATIONSHIP } from "./types"
export type {
  GraphNode,
  GraphRelationship,
  NodeSet,
  PlannedRelationship,
  PropertyMap,
  PropertyValue,
  SavePlan,
} from "./types"
export { BasicGraphNode } from "./node"
export { flatten, dedupeById } from "./flatten"
export type { FlattenOptions } from "./flatten"
export { planSave, assertSaveDepth, UNBOUNDED_DEPTH } from "./save-plan"
