/**
 * AST Graph Builder
 *
 * Converts a Babel AST into program graph nodes: one node per AST node,
 * containment as AST relationships, and REFERS_TO edges from identifier uses
 * to the top-level declarations they name.
 */

import {
  VISITOR_KEYS,
  isBooleanLiteral,
  isClassDeclaration,
  isExportNamedDeclaration,
  isFunctionDeclaration,
  isIdentifier,
  isImportDeclaration,
  isExportAllDeclaration,
  isNode,
  isNumericLiteral,
  isStringLiteral,
  isVariableDeclaration,
  type File,
  type Identifier,
  type Node as BabelNode,
  type Statement,
} from "@babel/types"
import { AnalysisError } from "../errors"
import { BasicGraphNode, STRUCTURAL_RELATIONSHIP, type PropertyValue } from "../graph"

export const TRANSLATION_UNIT_LABEL = "TranslationUnit"
export const REFERS_TO = "REFERS_TO"

// Identifier slots that name a member rather than a binding
const NON_REFERENCE_FIELDS = new Set(["property", "key", "label", "meta", "exported", "imported"])

export interface AstGraph {
  unit: BasicGraphNode
  /** Relative import specifiers and bare module names, in source order */
  imports: string[]
  nodeCount: number
}

interface PendingNode {
  node: BabelNode
  parent: BasicGraphNode | null
  field: string
  index: number
}

function describe(node: BabelNode, file: string): Record<string, PropertyValue> {
  const props: Record<string, PropertyValue> = { type: node.type, file }

  if (node.loc) {
    props.startLine = node.loc.start.line
    props.startColumn = node.loc.start.column
    props.endLine = node.loc.end.line
    props.endColumn = node.loc.end.column
  }

  if (isIdentifier(node)) {
    props.name = node.name
  } else if (isStringLiteral(node) || isNumericLiteral(node) || isBooleanLiteral(node)) {
    props.value = node.value
  }

  return props
}

function childrenOf(node: BabelNode): Array<{ child: BabelNode; field: string; index: number }> {
  const children: Array<{ child: BabelNode; field: string; index: number }> = []

  for (const field of VISITOR_KEYS[node.type] ?? []) {
    const value: unknown = Reflect.get(node, field)
    if (Array.isArray(value)) {
      value.forEach((item: unknown, index) => {
        if (isNode(item)) children.push({ child: item, field, index })
      })
    } else if (isNode(value)) {
      children.push({ child: value, field, index: 0 })
    }
  }

  return children
}

/**
 * Identifiers that declare a top-level function, class or variable.
 */
function topLevelDeclarations(body: readonly Statement[]): Identifier[] {
  const declared: Identifier[] = []

  for (const statement of body) {
    const declaration = isExportNamedDeclaration(statement) ? statement.declaration : statement
    if (!declaration) continue

    if ((isFunctionDeclaration(declaration) || isClassDeclaration(declaration)) && declaration.id) {
      declared.push(declaration.id)
    } else if (isVariableDeclaration(declaration)) {
      for (const declarator of declaration.declarations) {
        if (isIdentifier(declarator.id)) declared.push(declarator.id)
      }
    }
  }

  return declared
}

function importSpecifiers(body: readonly Statement[]): string[] {
  const specifiers: string[] = []
  for (const statement of body) {
    if (isImportDeclaration(statement) || isExportAllDeclaration(statement)) {
      specifiers.push(statement.source.value)
    } else if (isExportNamedDeclaration(statement) && statement.source) {
      specifiers.push(statement.source.value)
    }
  }
  return specifiers
}

/**
 * Build the graph of one parsed file.
 *
 * @param ast - Babel File node
 * @param file - Path used in node ids and the `file` property (relative to the top level)
 */
export function buildAstGraph(ast: File, file: string): AstGraph {
  const graphNodes = new Map<BabelNode, BasicGraphNode>()
  const identifiers: Array<{ node: Identifier; graphNode: BasicGraphNode; field: string }> = []
  const stack: PendingNode[] = [{ node: ast, parent: null, field: "", index: 0 }]
  let counter = 0
  let unit: BasicGraphNode | null = null

  while (stack.length > 0) {
    const pending = stack.pop()
    if (!pending) continue
    const { node, parent, field, index } = pending

    const id = `${file}#${counter++}`
    const graphNode =
      parent === null
        ? new BasicGraphNode(id, [TRANSLATION_UNIT_LABEL], { name: file, file })
        : new BasicGraphNode(id, [node.type], describe(node, file))

    graphNodes.set(node, graphNode)
    if (parent === null) {
      unit = graphNode
    } else {
      parent.connect(STRUCTURAL_RELATIONSHIP, graphNode, { field, index })
    }

    if (isIdentifier(node)) {
      identifiers.push({ node, graphNode, field })
    }

    // Reverse so children pop in source order
    const children = childrenOf(node)
    for (let i = children.length - 1; i >= 0; i--) {
      const entry = children[i]
      if (entry) stack.push({ node: entry.child, parent: graphNode, field: entry.field, index: entry.index })
    }
  }

  const declarations = new Map<string, BasicGraphNode>()
  const declaringIdentifiers = new Set<BabelNode>()
  for (const declared of topLevelDeclarations(ast.program.body)) {
    const graphNode = graphNodes.get(declared)
    if (graphNode && !declarations.has(declared.name)) {
      declarations.set(declared.name, graphNode)
      declaringIdentifiers.add(declared)
    }
  }

  for (const { node, graphNode, field } of identifiers) {
    if (declaringIdentifiers.has(node) || NON_REFERENCE_FIELDS.has(field)) continue
    const target = declarations.get(node.name)
    if (target) {
      graphNode.connect(REFERS_TO, target)
    }
  }

  if (!unit) {
    throw new AnalysisError(`No translation unit built for ${file}`, file)
  }

  return { unit, imports: importSpecifiers(ast.program.body), nodeCount: counter }
}
