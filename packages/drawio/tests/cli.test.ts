/**
 * CLI tests: file and stdin input, default output path, error exit codes.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, readFileSync, rmSync, writeFileSync, existsSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { fileURLToPath } from 'node:url'
import { runCli, defaultOutputPath, type CliIO } from '../src/cli.ts'
import { checkDocument } from '../src/checker.ts'

const FIXTURE = fileURLToPath(new URL('./fixtures/release.json', import.meta.url))

function captureIO(stdin = ''): CliIO & { out: string[]; err: string[] } {
  const out: string[] = []
  const err: string[] = []
  return {
    out,
    err,
    stdout: text => { out.push(text) },
    stderr: text => { err.push(text) },
    readStdin: () => stdin,
  }
}

describe('runCli', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'boxwright-cli-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('writes the document and reports counts', () => {
    const output = join(dir, 'release.drawio')
    const io = captureIO()
    expect(runCli([FIXTURE, '--output', output], io)).toBe(0)
    expect(io.out).toEqual([`Generated: ${output} (5 nodes, 5 edges)\n`])
    expect(io.err).toEqual([])
    expect(checkDocument(readFileSync(output, 'utf-8'))).toEqual([])
  })

  it('derives the output path from the input path', () => {
    const input = join(dir, 'flow.json')
    writeFileSync(input, readFileSync(FIXTURE, 'utf-8'))
    expect(runCli([input], captureIO())).toBe(0)
    expect(existsSync(join(dir, 'flow.drawio'))).toBe(true)
  })

  it('reads stdin and prints the document without an output path', () => {
    const io = captureIO(readFileSync(FIXTURE, 'utf-8'))
    expect(runCli([], io)).toBe(0)
    expect(io.out).toHaveLength(1)
    expect(io.out[0]?.startsWith('<mxfile host="boxwright">')).toBe(true)
  })

  it('exits 1 with the validation message', () => {
    const io = captureIO(JSON.stringify({
      title: 'Broken',
      layout: 'linear',
      nodes: [{ id: 'X', label: 'X', type: 'process' }],
      edges: [{ from: 'X', to: 'Y' }],
    }))
    expect(runCli(['--output', join(dir, 'out.drawio')], io)).toBe(1)
    expect(io.err).toEqual(['Error: edges.0.to: Edge references unknown node "Y"\n'])
    expect(existsSync(join(dir, 'out.drawio'))).toBe(false)
  })

  it('exits 1 on input that is not JSON', () => {
    const io = captureIO('{ nope')
    expect(runCli([], io)).toBe(1)
    expect(io.err[0]?.startsWith('Error: Invalid JSON in stdin:')).toBe(true)
  })

  it('rejects an unreadable palette', () => {
    const io = captureIO()
    expect(runCli([FIXTURE, '--palette', join(dir, 'missing.json')], io)).toBe(1)
    expect(io.err[0]?.startsWith(`Error: Cannot read palette ${join(dir, 'missing.json')}:`)).toBe(true)
  })

  it('prints warnings for singleton groups', () => {
    const input: Record<string, unknown> = JSON.parse(readFileSync(FIXTURE, 'utf-8'))
    const io = captureIO(JSON.stringify({ ...input, groups: [{ id: 'solo', label: 'Solo', members: ['ship'] }] }))
    expect(runCli(['--output', join(dir, 'solo.drawio')], io)).toBe(0)
    expect(io.err).toEqual(['Warning: groups.0: Group "solo" has a single member\n'])
  })
})

describe('defaultOutputPath', () => {
  it('swaps the extension for .drawio', () => {
    expect(defaultOutputPath('diagrams/flow.json')).toBe('diagrams/flow.drawio')
    expect(defaultOutputPath('notes')).toBe('notes.drawio')
  })
})
