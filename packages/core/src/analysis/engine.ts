/**
 * Analysis Engine
 *
 * Turns source files into program graph roots, one translation unit per file.
 */

import fs from "node:fs"
import path from "node:path"
import { parse, type ParserPlugin } from "@babel/parser"
import { AnalysisError, toError } from "../errors"
import type { GraphNode } from "../graph"
import { getComponentLogger, type Logger } from "../logging"
import { buildAstGraph, type AstGraph } from "./ast-graph"
import { expandSourceLocations, resolveImport } from "./source-files"
import type { TranslationConfiguration } from "./translation-config"

export interface TranslationResult {
  /** One root per analyzed file; a file named twice appears twice */
  translationUnits: GraphNode[]
  /** Total graph nodes built */
  nodeCount: number
}

export interface AnalysisEngine {
  analyze(config: TranslationConfiguration): Promise<TranslationResult>
}

function pluginsFor(file: string): ParserPlugin[] {
  switch (path.extname(file)) {
    case ".ts":
    case ".mts":
    case ".cts":
      return ["typescript"]
    case ".tsx":
      return ["typescript", "jsx"]
    default:
      return ["jsx"]
  }
}

function relativeId(topLevel: string, file: string): string {
  return path.relative(topLevel, file).split(path.sep).join("/")
}

/**
 * Analysis engine for JavaScript and TypeScript, built on @babel/parser.
 */
export class BabelAnalysisEngine implements AnalysisEngine {
  private readonly logger: Logger

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? getComponentLogger("analysis")
  }

  async analyze(config: TranslationConfiguration): Promise<TranslationResult> {
    const analyzed = new Map<string, AstGraph>()
    const translationUnits: GraphNode[] = []

    for (const file of expandSourceLocations(config.sourceLocations)) {
      translationUnits.push(this.analyzeFile(file, config.topLevel, analyzed).unit)
    }

    if (config.loadIncludes) {
      const pending = [...analyzed.keys()]
      while (pending.length > 0) {
        const file = pending.shift()
        const graph = file === undefined ? undefined : analyzed.get(file)
        if (file === undefined || !graph) continue

        for (const specifier of graph.imports) {
          const resolved = resolveImport(specifier, file, config.includePaths)
          if (resolved === null || analyzed.has(resolved)) continue

          this.logger.debug({ file: resolved, from: file }, "Loading include")
          translationUnits.push(this.analyzeFile(resolved, config.topLevel, analyzed).unit)
          pending.push(resolved)
        }
      }
    }

    let nodeCount = 0
    for (const graph of analyzed.values()) {
      nodeCount += graph.nodeCount
    }

    this.logger.info({ files: analyzed.size, units: translationUnits.length, nodes: nodeCount }, "Analysis finished")
    return { translationUnits, nodeCount }
  }

  private analyzeFile(file: string, topLevel: string, analyzed: Map<string, AstGraph>): AstGraph {
    const cached = analyzed.get(file)
    if (cached) return cached

    let source: string
    try {
      source = fs.readFileSync(file, "utf8")
    } catch (error) {
      throw new AnalysisError(`Unable to read ${file}`, file, toError(error))
    }

    let graph: AstGraph
    try {
      const ast = parse(source, {
        sourceType: "unambiguous",
        sourceFilename: file,
        plugins: pluginsFor(file),
      })
      graph = buildAstGraph(ast, relativeId(topLevel, file))
    } catch (error) {
      if (error instanceof AnalysisError) throw error
      throw new AnalysisError(`Unable to parse ${file}: ${toError(error).message}`, file, toError(error))
    }

    analyzed.set(file, graph)
    return graph
  }
}
