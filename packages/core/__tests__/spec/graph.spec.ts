/**
 * Program Graph Specification Tests
 *
 * Tests for flattening and save planning.
 */

import { describe, it, expect } from "vitest"
import { BasicGraphNode, dedupeById, flatten } from "../../src/graph"
import { planSave, UNBOUNDED_DEPTH } from "../../src/graph/save-plan"
import { InputValidationError } from "../../src/errors"

// =============================================================================
// FIXTURES
// =============================================================================

function node(id: string, label = "Expr"): BasicGraphNode {
  return new BasicGraphNode(id, [label], { name: id })
}

/**
 * unit
 * ├── a
 * │   └── b
 * └── c
 */
function smallTree() {
  const unit = node("unit", "TranslationUnit")
  const a = node("a")
  const b = node("b")
  const c = node("c")
  unit.connect("AST", a).connect("AST", c)
  a.connect("AST", b)
  return { unit, a, b, c }
}

// =============================================================================
// FLATTEN
// =============================================================================

describe("flatten", () => {
  it("collects a tree in preorder", () => {
    const { unit } = smallTree()
    expect([...flatten([unit]).keys()]).toEqual(["unit", "a", "b", "c"])
  })

  it("returns an empty set for no roots", () => {
    expect(flatten([]).size).toBe(0)
  })

  it("deduplicates repeated roots by identity", () => {
    const { unit } = smallTree()
    const twin = node("unit", "TranslationUnit")

    const result = flatten([unit, unit, twin])

    expect(result.size).toBe(4)
    expect(result.get("unit")).toBe(unit)
  })

  it("keeps shared substructure once", () => {
    const shared = node("shared")
    const left = node("left").connect("AST", shared)
    const right = node("right").connect("AST", shared)

    const result = flatten([left, right])

    expect([...result.keys()]).toEqual(["left", "shared", "right"])
  })

  it("follows only the structural relationship", () => {
    const { unit, a, b } = smallTree()
    const outside = node("outside")
    b.connect("REFERS_TO", outside)
    // Cycle through a semantic edge
    b.connect("REFERS_TO", a)

    const result = flatten([unit])

    expect(result.has("outside")).toBe(false)
    expect(result.size).toBe(4)
  })

  it("terminates on a structural cycle", () => {
    const x = node("x")
    const y = node("y")
    x.connect("AST", y)
    y.connect("AST", x)

    expect([...flatten([x]).keys()]).toEqual(["x", "y"])
  })

  it("walks a custom relationship type", () => {
    const parent = node("parent").connect("CONTAINS", node("child"))
    expect([...flatten([parent], { relationship: "CONTAINS" }).keys()]).toEqual(["parent", "child"])
  })

  it("handles deep nesting without recursion", () => {
    const root = node("n0")
    let current = root
    for (let i = 1; i <= 20000; i++) {
      const next = node(`n${i}`)
      current.connect("AST", next)
      current = next
    }

    expect(flatten([root]).size).toBe(20001)
  })
})

describe("dedupeById", () => {
  it("keeps the first occurrence", () => {
    const first = node("x")
    const second = node("x")
    const result = dedupeById([first, second])
    expect(result.size).toBe(1)
    expect(result.get("x")).toBe(first)
  })
})

// =============================================================================
// SAVE PLAN
// =============================================================================

describe("planSave", () => {
  it("writes only node records at depth 0", () => {
    const { unit, a } = smallTree()
    const plan = planSave([unit, a], 0)

    expect(plan.nodes.map((n) => n.id)).toEqual(["unit", "a"])
    expect(plan.relationships).toEqual([])
  })

  it("follows one hop at depth 1", () => {
    const { unit } = smallTree()
    const plan = planSave([unit], 1)

    expect(plan.nodes.map((n) => n.id)).toEqual(["unit", "a", "c"])
    expect(plan.relationships).toEqual([
      { fromId: "unit", toId: "a", type: "AST", properties: {} },
      { fromId: "unit", toId: "c", type: "AST", properties: {} },
    ])
  })

  it("follows everything when unbounded", () => {
    const { unit } = smallTree()
    const plan = planSave([unit], UNBOUNDED_DEPTH)

    expect(plan.nodes.map((n) => n.id)).toEqual(["unit", "a", "c", "b"])
    expect(plan.relationships).toHaveLength(3)
  })

  it("includes semantic relationships and their properties", () => {
    const decl = node("decl")
    const use = node("use").connect("REFERS_TO", decl, { kind: "call" })

    const plan = planSave(new Map([["use", use], ["decl", decl]]), UNBOUNDED_DEPTH)

    expect(plan.nodes.map((n) => n.id)).toEqual(["use", "decl"])
    expect(plan.relationships).toEqual([{ fromId: "use", toId: "decl", type: "REFERS_TO", properties: { kind: "call" } }])
  })

  it("deduplicates relationships and input nodes", () => {
    const target = node("t")
    const source = node("s").connect("AST", target).connect("AST", target)

    const plan = planSave([source, source, target], 1)

    expect(plan.nodes.map((n) => n.id)).toEqual(["s", "t"])
    expect(plan.relationships).toHaveLength(1)
  })

  it("measures hops from every input node", () => {
    const { unit, b } = smallTree()
    const leaf = node("leaf")
    b.connect("AST", leaf)

    // b is an input node, so its edge to leaf is at hop 0
    const plan = planSave([unit, b], 1)

    expect(plan.relationships.map((r) => `${r.fromId}->${r.toId}`)).toEqual(["unit->a", "unit->c", "b->leaf"])
  })

  it.each([-2, 1.5, Number.NaN])("rejects depth %s", (depth) => {
    expect(() => planSave([], depth)).toThrow(InputValidationError)
  })
})
