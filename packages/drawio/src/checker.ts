import { XMLParser, XMLValidator } from 'fast-xml-parser'
import { INVALID_XML_CHAR } from './serializer.ts'

// ============================================================================
// Document checker: well-formedness and structural checks on .drawio text
//
// Runs over the rendered XML rather than the in-memory model, so it can gate
// any document before it reaches a renderer.
// ============================================================================

export type DocumentIssueCode =
  | 'malformed'
  | 'structure'
  | 'duplicate-id'
  | 'unknown-parent'
  | 'dangling-edge'
  | 'missing-geometry'
  | 'edge-after-node'

export interface DocumentIssue {
  code: DocumentIssueCode
  message: string
  cellId?: string
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  isArray: (name: string) => name === 'diagram' || name === 'mxCell',
})

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function stringAttr(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key]
  return typeof value === 'string' ? value : undefined
}

interface ParsedCell {
  id: string
  parent?: string
  vertex: boolean
  edge: boolean
  source?: string
  target?: string
  hasGeometry: boolean
}

/** Pull the mxCell list of every page out of the parsed tree */
function extractCells(tree: unknown, issues: DocumentIssue[]): ParsedCell[][] {
  const file = isRecord(tree) ? tree['mxfile'] : undefined
  const diagrams = isRecord(file) ? file['diagram'] : undefined
  if (!Array.isArray(diagrams) || diagrams.length === 0) {
    issues.push({ code: 'structure', message: 'Expected <mxfile> with at least one <diagram>' })
    return []
  }

  const pages: ParsedCell[][] = []
  diagrams.forEach((diagram: unknown, page) => {
    const model = isRecord(diagram) ? diagram['mxGraphModel'] : undefined
    const root = isRecord(model) ? model['root'] : undefined
    const rawCells = isRecord(root) ? root['mxCell'] : undefined
    if (!Array.isArray(rawCells)) {
      issues.push({ code: 'structure', message: `Diagram ${page} has no <mxGraphModel><root> with cells` })
      return
    }

    const cells: ParsedCell[] = []
    for (const raw of rawCells) {
      if (!isRecord(raw)) continue
      const id = stringAttr(raw, 'id')
      if (id === undefined) {
        issues.push({ code: 'structure', message: `Cell without id in diagram ${page}` })
        continue
      }
      const geometry = raw['mxGeometry']
      cells.push({
        id,
        parent: stringAttr(raw, 'parent'),
        vertex: stringAttr(raw, 'vertex') === '1',
        edge: stringAttr(raw, 'edge') === '1',
        source: stringAttr(raw, 'source'),
        target: stringAttr(raw, 'target'),
        hasGeometry: isRecord(geometry) && stringAttr(geometry, 'as') === 'geometry',
      })
    }
    pages.push(cells)
  })
  return pages
}

function checkPage(cells: readonly ParsedCell[], issues: DocumentIssue[]): void {
  const ids = new Set<string>()
  for (const cell of cells) {
    if (ids.has(cell.id)) {
      issues.push({ code: 'duplicate-id', message: `Duplicate cell id "${cell.id}"`, cellId: cell.id })
    }
    ids.add(cell.id)
  }

  const vertices = new Set(cells.filter(c => c.vertex).map(c => c.id))
  const endpoints = new Set<string>()

  cells.forEach((cell, index) => {
    if (index > 0 && (cell.parent === undefined || !ids.has(cell.parent))) {
      issues.push({ code: 'unknown-parent', message: `Cell "${cell.id}" has unknown parent "${cell.parent ?? ''}"`, cellId: cell.id })
    }
    if (cell.vertex && !cell.hasGeometry) {
      issues.push({ code: 'missing-geometry', message: `Vertex "${cell.id}" has no geometry`, cellId: cell.id })
    }
    if (cell.edge) {
      for (const end of [cell.source, cell.target]) {
        if (end === undefined || !vertices.has(end)) {
          issues.push({ code: 'dangling-edge', message: `Edge "${cell.id}" references missing vertex "${end ?? ''}"`, cellId: cell.id })
        } else {
          endpoints.add(end)
        }
      }
    }
  })

  const firstNode = cells.findIndex(c => c.vertex && endpoints.has(c.id))
  if (firstNode === -1) return
  cells.slice(firstNode + 1).forEach((cell) => {
    if (cell.edge) {
      issues.push({ code: 'edge-after-node', message: `Edge "${cell.id}" is emitted after node cells`, cellId: cell.id })
    }
  })
}

/** XMLValidator accepts raw control characters, so they are looked for separately */
function findInvalidChar(xml: string): DocumentIssue | undefined {
  const match = INVALID_XML_CHAR.exec(xml)
  if (!match) return undefined
  const before = xml.slice(0, match.index)
  const line = before.split('\n').length
  const col = match.index - before.lastIndexOf('\n')
  const hex = xml.charCodeAt(match.index).toString(16).toUpperCase().padStart(4, '0')
  return { code: 'malformed', message: `Control character U+${hex} is not allowed (line ${line}, column ${col})` }
}

/**
 * Check a .drawio document. Returns an empty list when it is well-formed and
 * structurally sound.
 */
export function checkDocument(xml: string): DocumentIssue[] {
  const valid = XMLValidator.validate(xml)
  if (valid !== true) {
    return [{ code: 'malformed', message: `${valid.err.msg} (line ${valid.err.line}, column ${valid.err.col})` }]
  }
  const invalidChar = findInvalidChar(xml)
  if (invalidChar) return [invalidChar]

  const issues: DocumentIssue[] = []
  const tree: unknown = parser.parse(xml)
  for (const cells of extractCells(tree, issues)) {
    checkPage(cells, issues)
  }
  return issues
}
