/**
 * @boxwright/drawio
 *
 * Turns a JSON diagram description into a draw.io (.drawio) document:
 * validate → lay out → style and route → serialize.
 *
 *   import { generateDiagram } from '@boxwright/drawio'
 *   const { xml, warnings } = generateDiagram(description)
 */

export { generateDiagram } from './generate.ts'
export type { GenerateResult } from './generate.ts'

export { validateDiagram, DiagramInputSchema, isReservedId, normalizeRowKey } from './validate.ts'
export type { DiagramInput, DiagramValidation } from './validate.ts'

export { layoutDiagram, assignLevels, groupRows, packFlowRows, contentTop, nodeSize } from './layout/index.ts'

export {
  resolveNodeStyle,
  resolveNodeColors,
  resolveEdgeStyle,
  resolveGroupStyle,
  resolveLaneStyle,
  styleToString,
} from './styles.ts'

export { routeEdges, chooseAnchors, findFanOutEdges, ANCHORS } from './router.ts'
export type { EdgeRoute, RoutingMode, RoutingResult, AnchorPair } from './router.ts'

export { buildDocument, escapeHtml, documentId } from './document.ts'
export type { MxCell, MxDocument } from './document.ts'
export { renderDocument, escapeXml } from './serializer.ts'
export { checkDocument } from './checker.ts'
export type { DocumentIssue, DocumentIssueCode } from './checker.ts'

export {
  loadPalette,
  parsePalette,
  checkPalette,
  getDefaultPalette,
  isLegibleDarkFill,
  parseHexColor,
  PaletteSchema,
  DEFAULT_PALETTE_PATH,
  DARK_FILL_MIN_CHANNEL,
} from './palette.ts'
export type { Palette, ThemePalette, ColorSet } from './palette.ts'

export { DiagramError, SchemaError, LayoutError, StyleError, ConfigError } from './errors.ts'
export type { DiagramErrorCode } from './errors.ts'

export * from './types.ts'
