import type { MxCell, MxDocument } from './document.ts'
import type { Box } from './types.ts'

// ============================================================================
// draw.io serializer: MxDocument → mxfile XML text
//
// Pure string concatenation in cell order; attribute order is fixed so the
// same document always renders to the same bytes.
// ============================================================================

const INDENT = '  '

/** C0 controls other than tab, LF and CR are not allowed anywhere in XML 1.0 */
export const INVALID_XML_CHAR = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
}

/** Round to two decimals and never print -0 */
export function formatNumber(value: number): string {
  const rounded = Math.round(value * 100) / 100
  return Object.is(rounded, -0) ? '0' : String(rounded)
}

function attrs(pairs: ReadonlyArray<readonly [string, string | undefined]>): string {
  return pairs
    .filter((pair): pair is readonly [string, string] => pair[1] !== undefined)
    .map(([key, value]) => ` ${key}="${escapeXml(value)}"`)
    .join('')
}

function renderGeometry(box: Box): string {
  return `<mxGeometry${attrs([
    ['x', formatNumber(box.x)],
    ['y', formatNumber(box.y)],
    ['width', formatNumber(box.width)],
    ['height', formatNumber(box.height)],
  ])} as="geometry" />`
}

function renderCell(cell: MxCell, depth: number): string {
  const pad = INDENT.repeat(depth)
  switch (cell.kind) {
    case 'root':
      return `${pad}<mxCell${attrs([['id', cell.id]])} />`
    case 'layer':
      return `${pad}<mxCell${attrs([['id', cell.id], ['parent', cell.parent]])} />`
    case 'vertex':
      return [
        `${pad}<mxCell${attrs([
          ['id', cell.id],
          ['value', cell.value],
          ['style', cell.style],
          ['vertex', '1'],
          ['parent', cell.parent],
        ])}>`,
        `${pad}${INDENT}${renderGeometry(cell.geometry)}`,
        `${pad}</mxCell>`,
      ].join('\n')
    case 'edge':
      return [
        `${pad}<mxCell${attrs([
          ['id', cell.id],
          ['value', cell.value],
          ['style', cell.style],
          ['edge', '1'],
          ['parent', cell.parent],
          ['source', cell.source],
          ['target', cell.target],
        ])}>`,
        `${pad}${INDENT}<mxGeometry relative="1" as="geometry" />`,
        `${pad}</mxCell>`,
      ].join('\n')
  }
}

/** Render the document as an uncompressed .drawio file */
export function renderDocument(doc: MxDocument): string {
  const parts: string[] = []
  parts.push('<mxfile host="boxwright">')
  parts.push(`${INDENT}<diagram${attrs([['id', doc.id], ['name', doc.name]])}>`)
  parts.push(`${INDENT.repeat(2)}<mxGraphModel${attrs([
    ['dx', '0'],
    ['dy', '0'],
    ['grid', '1'],
    ['gridSize', '10'],
    ['guides', '1'],
    ['tooltips', '1'],
    ['connect', '1'],
    ['arrows', '1'],
    ['fold', '1'],
    ['page', '1'],
    ['pageScale', '1'],
    ['pageWidth', formatNumber(doc.page.width)],
    ['pageHeight', formatNumber(doc.page.height)],
    ['math', '0'],
    ['shadow', '0'],
    ['background', doc.background],
  ])}>`)
  parts.push(`${INDENT.repeat(3)}<root>`)
  for (const cell of doc.cells) {
    parts.push(renderCell(cell, 4))
  }
  parts.push(`${INDENT.repeat(3)}</root>`)
  parts.push(`${INDENT.repeat(2)}</mxGraphModel>`)
  parts.push(`${INDENT}</diagram>`)
  parts.push('</mxfile>')
  return parts.join('\n') + '\n'
}
