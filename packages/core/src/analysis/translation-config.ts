/**
 * Translation Configuration
 *
 * Validated input for an analysis run: source locations sharing one top-level
 * directory, plus include paths.
 */

import fs from "node:fs"
import path from "node:path"
import { InputValidationError } from "../errors"

export interface TranslationConfiguration {
  /** Absolute, normalized source files or directories */
  sourceLocations: string[]
  /** Directory shared by every source location */
  topLevel: string
  /** Extra directories imports are resolved against */
  includePaths: string[]
  /** Analyze relative imports as additional translation units */
  loadIncludes: boolean
}

export interface TranslationOptions {
  files: readonly string[]
  loadIncludes?: boolean
  includesFile?: string
  /** Base for relative paths (defaults to process.cwd()) */
  cwd?: string
}

function isHidden(file: string): boolean {
  return path.basename(file).startsWith(".")
}

/**
 * Read an includes file: one path per line, relative entries resolved against
 * the file's own directory.
 */
export function readIncludePaths(includesFile: string): string[] {
  let contents: string
  try {
    contents = fs.readFileSync(includesFile, "utf8")
  } catch (error) {
    throw new InputValidationError(`Unable to read includes file: ${includesFile}`, "includesFile", error)
  }

  const baseDir = path.dirname(includesFile)
  return contents
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => (path.isAbsolute(line) ? line : path.join(baseDir, line)))
}

/**
 * Validate the paths to analyze and build the translation configuration.
 *
 * @throws {InputValidationError} If no path is given, a path does not exist
 *   or is hidden, or the paths do not share one top-level directory
 */
export function buildTranslationConfiguration(options: TranslationOptions): TranslationConfiguration {
  const cwd = options.cwd ?? process.cwd()

  if (options.files.length === 0) {
    throw new InputValidationError("At least one path to analyze is required", "files", options.files)
  }

  const sourceLocations: string[] = []
  let topLevel: string | null = null

  for (const file of options.files) {
    const resolved = path.resolve(cwd, file)
    const stat = fs.statSync(resolved, { throwIfNoEntry: false })

    if (!stat || isHidden(resolved)) {
      throw new InputValidationError(`Please use a correct path. It was: ${resolved}`, "files", resolved)
    }

    const currentTopLevel = stat.isDirectory() ? resolved : path.dirname(resolved)
    if (topLevel === null) {
      topLevel = currentTopLevel
    }
    if (topLevel !== currentTopLevel) {
      throw new InputValidationError("All files should have the same top level path.", "files", resolved)
    }

    sourceLocations.push(resolved)
  }

  const includePaths = options.includesFile
    ? readIncludePaths(path.resolve(cwd, options.includesFile))
    : []

  return {
    sourceLocations,
    topLevel: topLevel ?? cwd,
    includePaths,
    loadIncludes: options.loadIncludes ?? false,
  }
}
