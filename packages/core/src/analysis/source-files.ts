/**
 * Source File Discovery
 */

import fs from "node:fs"
import path from "node:path"

export const SOURCE_EXTENSIONS = [".ts", ".tsx", ".mts", ".cts", ".js", ".jsx", ".mjs", ".cjs"]
export const IGNORED_DIRECTORIES = ["node_modules", ".git", "dist", "build", "coverage"]

export function isSourceFile(file: string): boolean {
  return SOURCE_EXTENSIONS.includes(path.extname(file))
}

/**
 * Recursively collect source files below `dir`, sorted, skipping ignored and
 * hidden entries.
 */
export function walkSourceDirectory(dir: string): string[] {
  const out: string[] = []
  const entries = fs
    .readdirSync(dir, { withFileTypes: true })
    .sort((a, b) => a.name.localeCompare(b.name))

  for (const entry of entries) {
    if (entry.name.startsWith(".") || IGNORED_DIRECTORIES.includes(entry.name)) continue
    const full = path.join(dir, entry.name)

    if (entry.isDirectory()) {
      out.push(...walkSourceDirectory(full))
    } else if (entry.isFile() && isSourceFile(full)) {
      out.push(full)
    }
  }

  return out
}

/**
 * Expand source locations into files. Files named explicitly are kept as given;
 * a file reached twice is listed twice.
 */
export function expandSourceLocations(locations: readonly string[]): string[] {
  const files: string[] = []
  for (const location of locations) {
    if (fs.statSync(location).isDirectory()) {
      files.push(...walkSourceDirectory(location))
    } else {
      files.push(location)
    }
  }
  return files
}

/**
 * Resolve an import specifier to a source file.
 *
 * Relative specifiers resolve against the importing file's directory; bare
 * specifiers against each include path in order.
 */
export function resolveImport(specifier: string, fromFile: string, includePaths: readonly string[]): string | null {
  const bases = specifier.startsWith(".")
    ? [path.resolve(path.dirname(fromFile), specifier)]
    : includePaths.map((dir) => path.resolve(dir, specifier))

  for (const base of bases) {
    const candidates = [
      base,
      ...SOURCE_EXTENSIONS.map((ext) => base + ext),
      ...SOURCE_EXTENSIONS.map((ext) => path.join(base, `index${ext}`)),
    ]
    for (const candidate of candidates) {
      const stat = fs.statSync(candidate, { throwIfNoEntry: false })
      if (stat?.isFile() && isSourceFile(candidate)) {
        return candidate
      }
    }
  }

  return null
}
