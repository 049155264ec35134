/**
 * Analysis Module
 *
 * Builds program graphs from JavaScript/TypeScript sources.
 */

export { BabelAnalysisEngine } from "./engine"
export type { AnalysisEngine, TranslationResult } from "./engine"
export { buildAstGraph, TRANSLATION_UNIT_LABEL, REFERS_TO } from "./ast-graph"
export type { AstGraph } from "./ast-graph"
export { buildTranslationConfiguration, readIncludePaths } from "./translation-config"
export type { TranslationConfiguration, TranslationOptions } from "./translation-config"
export { expandSourceLocations, walkSourceDirectory, resolveImport, isSourceFile } from "./source-files"
