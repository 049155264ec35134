#!/usr/bin/env node
/**
 * graphsink command line
 *
 * Exports the program graph of the given sources to a Neo4j database.
 * The target database is purged before every export.
 */

import { parseArgs } from "node:util"
import { runApplication, type ApplicationDependencies } from "../application"
import { DEFAULT_PASSWORD, DEFAULT_USERNAME, resolvePersistenceConfig } from "../config"
import { toError } from "../errors"
import { getComponentLogger } from "../logging"

export const USAGE = `Usage: graphsink [options] <paths...>

Analyze the given files or directories and push the program graph to Neo4j.
All paths must share the same top-level directory.

Options:
  --user <name>          Neo4j user name (default: ${DEFAULT_USERNAME})
  --password <password>  Neo4j password (default: ${DEFAULT_PASSWORD})
  --save-depth <n>       Limit how many relationship hops are followed when
                         saving; -1 (default) means no limit
  --load-includes        Also analyze files reached through imports
  --includes-file <file> Load include paths from a file, one per line
  -h, --help             Show this help

Environment:
  GRAPHSINK_NEO4J_URI       Bolt URI (default: bolt://localhost:7687)
  GRAPHSINK_NEO4J_DATABASE  Database name
  GRAPHSINK_LOG_LEVEL       Log level (default: info)
`

export const EXIT_OK = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

export interface CliOptions extends ApplicationDependencies {
  /** Where usage text goes (defaults to stdout/stderr) */
  write?: (text: string, stream: "stdout" | "stderr") => void
  env?: NodeJS.ProcessEnv
  cwd?: string
}

const defaultWrite = (text: string, stream: "stdout" | "stderr"): void => {
  if (stream === "stdout") {
    process.stdout.write(text)
  } else {
    process.stderr.write(text)
  }
}

/**
 * Attach a negative number following --save-depth to the option, since
 * parseArgs takes any dash-prefixed token for an option.
 */
export function attachNegativeValues(argv: readonly string[]): string[] {
  const args: string[] = []
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === "--") {
      args.push(...argv.slice(i))
      break
    }
    const next = argv[i + 1]
    if (arg === "--save-depth" && next !== undefined && /^-\d+$/.test(next)) {
      args.push(`${arg}=${next}`)
      i++
    } else if (arg !== undefined) {
      args.push(arg)
    }
  }
  return args
}

function parseCliArgs(argv: readonly string[]) {
  return parseArgs({
    args: attachNegativeValues(argv),
    allowPositionals: true,
    strict: true,
    options: {
      user: { type: "string" },
      password: { type: "string" },
      "save-depth": { type: "string" },
      "load-includes": { type: "boolean" },
      "includes-file": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  })
}

/**
 * Run the command line and return the exit code.
 */
export async function main(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  const { write = defaultWrite, env = process.env, cwd, ...dependencies } = options
  const logger = dependencies.logger ?? getComponentLogger("cli")

  let parsed: ReturnType<typeof parseCliArgs>
  try {
    parsed = parseCliArgs(argv)
  } catch (error) {
    write(`${toError(error).message}\n\n${USAGE}`, "stderr")
    return EXIT_USAGE
  }

  const { values, positionals } = parsed

  if (values.help) {
    write(USAGE, "stdout")
    return EXIT_OK
  }

  if (positionals.length === 0) {
    write(`Missing paths to analyze\n\n${USAGE}`, "stderr")
    return EXIT_USAGE
  }

  const rawDepth = values["save-depth"] ?? "-1"
  const saveDepth = Number(rawDepth)
  if (!/^-?\d+$/.test(rawDepth.trim()) || !Number.isSafeInteger(saveDepth)) {
    write(`--save-depth must be an integer, got '${rawDepth}'\n\n${USAGE}`, "stderr")
    return EXIT_USAGE
  }

  try {
    // Purge before write and an ensured Node.id index are fixed policies of the command line
    const config = resolvePersistenceConfig(
      {
        username: values.user ?? DEFAULT_USERNAME,
        password: values.password ?? DEFAULT_PASSWORD,
        saveDepth,
        purgeBeforeWrite: true,
        autoIndex: "assert",
      },
      env,
    )

    await runApplication(
      {
        files: positionals,
        loadIncludes: values["load-includes"] ?? false,
        includesFile: values["includes-file"],
        cwd,
        config,
      },
      dependencies,
    )
    return EXIT_OK
  } catch (error) {
    const err = toError(error)
    logger.error({ err }, err.message)
    return EXIT_FAILURE
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code
    },
    (error: unknown) => {
      process.stderr.write(`Fatal: ${toError(error).message}\n`)
      process.exitCode = EXIT_FAILURE
    },
  )
}
