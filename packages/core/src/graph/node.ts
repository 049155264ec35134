/**
 * Basic Graph Node
 *
 * Mutable-while-building implementation of GraphNode used by the analysis engine.
 */

import type { GraphNode, GraphRelationship, PropertyMap } from "./types"

export class BasicGraphNode implements GraphNode {
  private readonly outgoing: GraphRelationship[] = []

  constructor(
    readonly id: string,
    readonly labels: readonly string[],
    readonly properties: PropertyMap = {},
  ) {}

  get relationships(): readonly GraphRelationship[] {
    return this.outgoing
  }

  /**
   * Add an outgoing relationship. Returns this node for chaining.
   */
  connect(type: string, target: GraphNode, properties?: PropertyMap): this {
    this.outgoing.push(properties ? { type, target, properties } : { type, target })
    return this
  }
}
