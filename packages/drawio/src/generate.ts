import { createLogger, type ValidationIssue } from '@boxwright/shared'
import { buildDocument, type MxDocument } from './document.ts'
import { layoutDiagram } from './layout/index.ts'
import { getDefaultPalette, type Palette } from './palette.ts'
import { routeEdges } from './router.ts'
import { renderDocument } from './serializer.ts'
import type { Diagram, LayoutResult } from './types.ts'
import { validateDiagram } from './validate.ts'

const log = createLogger('generate')

export interface GenerateResult {
  /** The .drawio document text */
  xml: string
  diagram: Diagram
  layout: LayoutResult
  document: MxDocument
  warnings: ValidationIssue[]
}

/**
 * Validate, lay out, style, route and serialize a diagram description in one
 * synchronous pass. Any failure throws before document text exists.
 *
 * @example
 * const { xml } = generateDiagram({
 *   title: 'Deploy',
 *   layout: 'linear',
 *   nodes: [{ id: 'a', label: 'Build', type: 'process' }],
 * })
 */
export function generateDiagram(input: unknown, palette: Palette = getDefaultPalette()): GenerateResult {
  const { diagram, warnings } = validateDiagram(input)
  const layout = layoutDiagram(diagram, palette)
  const routing = routeEdges(diagram, layout, palette)
  const document = buildDocument(diagram, layout, routing, palette)
  const xml = renderDocument(document)

  log.info('Generated document', {
    layout: diagram.layout,
    nodes: diagram.nodes.length,
    edges: diagram.edges.length,
    cells: document.cells.length,
  })

  return { xml, diagram, layout, document, warnings }
}
