/**
 * Command-line entry for the diagram generator
 *
 * Usage:
 *   boxwright <input.json> [--output <file.drawio>] [--palette <palette.json>] [--debug]
 *   cat input.json | boxwright --output out.drawio
 *
 * Options:
 *   --output   Where to write the document (default: input path with .drawio, or stdout)
 *   --palette  Palette JSON to use instead of the bundled one
 *   --debug    Log pipeline stages to stderr (same as BOXWRIGHT_DEBUG=1)
 */

import { readFileSync, writeFileSync } from 'node:fs'
import { parseArgs } from 'node:util'
import { enableDebug, formatIssues } from '@boxwright/shared'
import { ConfigError } from './errors.ts'
import { generateDiagram } from './generate.ts'
import { getDefaultPalette, loadPalette } from './palette.ts'

export interface CliIO {
  stdout: (text: string) => void
  stderr: (text: string) => void
  readStdin: () => string
}

export const defaultIO: CliIO = {
  stdout: text => process.stdout.write(text),
  stderr: text => process.stderr.write(text),
  readStdin: () => readFileSync(0, 'utf-8'),
}

const USAGE = 'Usage: boxwright <input.json> [--output <file.drawio>] [--palette <palette.json>] [--debug]\n'

/** Default output path: the input path with its extension replaced by .drawio */
export function defaultOutputPath(input: string): string {
  return input.replace(/\.[^./\\]*$/, '') + '.drawio'
}

function readInput(path: string | undefined, io: CliIO): unknown {
  const text = path === undefined ? io.readStdin() : readFileSync(path, 'utf-8')
  try {
    return JSON.parse(text)
  } catch (e) {
    throw new Error(`Invalid JSON in ${path ?? 'stdin'}: ${e instanceof Error ? e.message : String(e)}`)
  }
}

/**
 * Run the CLI and return its exit code. Never calls process.exit so tests can
 * drive it directly.
 */
export function runCli(args: readonly string[], io: CliIO = defaultIO): number {
  try {
    const { values, positionals } = parseArgs({
      args: [...args],
      allowPositionals: true,
      options: {
        output: { type: 'string', short: 'o' },
        palette: { type: 'string', short: 'p' },
        debug: { type: 'boolean', default: false },
        help: { type: 'boolean', short: 'h', default: false },
      },
    })

    if (values.help) {
      io.stdout(USAGE)
      return 0
    }
    if (positionals.length > 1) {
      io.stderr(USAGE)
      return 1
    }
    if (values.debug) enableDebug()

    const inputPath = positionals[0]
    const palette = values.palette ? loadPalette(values.palette) : getDefaultPalette()
    const result = generateDiagram(readInput(inputPath, io), palette)

    for (const warning of result.warnings) {
      io.stderr(`Warning: ${warning.path}: ${warning.message}\n`)
    }

    const outputPath = values.output ?? (inputPath !== undefined ? defaultOutputPath(inputPath) : undefined)
    if (outputPath === undefined) {
      io.stdout(result.xml)
      return 0
    }
    writeFileSync(outputPath, result.xml, 'utf-8')
    io.stdout(`Generated: ${outputPath} (${result.diagram.nodes.length} nodes, ${result.diagram.edges.length} edges)\n`)
    return 0
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e)
    io.stderr(`Error: ${message}\n`)
    if (e instanceof ConfigError && e.issues.length > 1) {
      io.stderr(formatIssues([...e.issues]) + '\n')
    }
    return 1
  }
}
