import { createLogger } from '@boxwright/shared'
import { ContainerIndex, containerFill } from './containers.ts'
import type { Palette } from './palette.ts'
import { resolveEdgeStyle } from './styles.ts'
import type { Box, Diagram, DiagramEdge, LayoutResult, Point, StyleAttrs } from './types.ts'

const log = createLogger('router')

// ============================================================================
// Edge router: routing mode, anchors and label background per connector
//
//   fan-out  (source with 2+ distinct targets on one tier) → direct, floating
//   self loop                                               → orthogonal, floating
//   curved style                                            → curved, fixed anchors
//   anything else                                           → orthogonal, fixed anchors
//
// Anchors are fractions of the node box: (0.5, 1) is the bottom center.
// ============================================================================

export type RoutingMode = 'orthogonal' | 'curved' | 'direct'

export const ANCHORS = {
  top: { x: 0.5, y: 0 },
  bottom: { x: 0.5, y: 1 },
  left: { x: 0, y: 0.5 },
  right: { x: 1, y: 0.5 },
} as const satisfies Record<string, Point>

/** Fixed exit/entry pair, or null when the renderer picks floating anchors */
export type AnchorPair = { exit: Point; entry: Point } | null

export interface EdgeRoute {
  edge: DiagramEdge
  /** Position of the edge in input order */
  index: number
  mode: RoutingMode
  anchors: AnchorPair
  fanOut: boolean
  /** Surface color behind the edge label */
  labelBackground: string
  /** Routing attributes followed by the resolved connector style */
  attrs: StyleAttrs
}

export interface RoutingResult {
  edges: EdgeRoute[]
  /** Label background per icon node id (icon labels sit below the image) */
  iconLabelBackgrounds: Map<string, string>
}

const ORTHOGONAL_ATTRS: StyleAttrs = [
  ['edgeStyle', 'orthogonalEdgeStyle'],
  ['rounded', '1'],
  ['orthogonalLoop', '1'],
  ['jettySize', 'auto'],
]

const DIRECT_ATTRS: StyleAttrs = [['edgeStyle', 'none']]

/**
 * Pick fixed anchors from the relative position of two boxes. Vertical
 * separation wins over horizontal; overlapping boxes get floating anchors.
 */
export function chooseAnchors(source: Box, target: Box): AnchorPair {
  if (target.y >= source.y + source.height) return { exit: ANCHORS.bottom, entry: ANCHORS.top }
  if (target.y + target.height <= source.y) return { exit: ANCHORS.top, entry: ANCHORS.bottom }
  if (target.x >= source.x + source.width) return { exit: ANCHORS.right, entry: ANCHORS.left }
  if (target.x + target.width <= source.x) return { exit: ANCHORS.left, entry: ANCHORS.right }
  return null
}

/** Indices of edges whose source fans out to two or more distinct targets on one tier */
export function findFanOutEdges(
  edges: readonly DiagramEdge[],
  tiers: ReadonlyMap<string, number>,
): Set<number> {
  const targetsByTier = new Map<string, Map<number, Set<string>>>()
  for (const edge of edges) {
    if (edge.source === edge.target) continue
    const tier = tiers.get(edge.target)
    if (tier === undefined) continue
    const bySource = targetsByTier.get(edge.source) ?? new Map<number, Set<string>>()
    targetsByTier.set(edge.source, bySource)
    const targets = bySource.get(tier) ?? new Set<string>()
    bySource.set(tier, targets)
    targets.add(edge.target)
  }

  const fanOut = new Set<number>()
  edges.forEach((edge, index) => {
    if (edge.source === edge.target) return
    const tier = tiers.get(edge.target)
    const targets = tier === undefined ? undefined : targetsByTier.get(edge.source)?.get(tier)
    if (targets && targets.size >= 2) fanOut.add(index)
  })
  return fanOut
}

function anchorAttrs(anchors: AnchorPair): StyleAttrs {
  if (!anchors) return []
  return [
    ['exitX', String(anchors.exit.x)],
    ['exitY', String(anchors.exit.y)],
    ['exitDx', '0'],
    ['exitDy', '0'],
    ['entryX', String(anchors.entry.x)],
    ['entryY', String(anchors.entry.y)],
    ['entryDx', '0'],
    ['entryDy', '0'],
  ]
}

function routingMode(edge: DiagramEdge, fanOut: boolean): RoutingMode {
  if (fanOut) return 'direct'
  return edge.style === 'curved' && edge.source !== edge.target ? 'curved' : 'orthogonal'
}

function boxFor(layout: LayoutResult, id: string): Box {
  const box = layout.nodes.get(id)
  if (!box) throw new Error(`Edge endpoint "${id}" has no layout box`)
  return box
}

export function routeEdges(diagram: Diagram, layout: LayoutResult, palette: Palette): RoutingResult {
  const containers = new ContainerIndex(diagram)
  const fanOut = findFanOutEdges(diagram.edges, layout.tiers)

  const edges = diagram.edges.map((edge, index): EdgeRoute => {
    const isFanOut = fanOut.has(index)
    const mode = routingMode(edge, isFanOut)
    const anchors = isFanOut || edge.source === edge.target
      ? null
      : chooseAnchors(boxFor(layout, edge.source), boxFor(layout, edge.target))
    const labelBackground = containerFill(containers.common(edge.source, edge.target), diagram, palette)
    const style = resolveEdgeStyle(edge, diagram.theme, palette)

    const attrs: StyleAttrs = [
      ...(mode === 'direct' ? DIRECT_ATTRS : ORTHOGONAL_ATTRS),
      ...style.attrs,
      ...anchorAttrs(anchors),
      ...(edge.label ? [['labelBackgroundColor', labelBackground] as const] : []),
    ]

    return { edge, index, mode, anchors, fanOut: isFanOut, labelBackground, attrs }
  })

  const iconLabelBackgrounds = new Map<string, string>()
  for (const node of diagram.nodes) {
    if (node.type !== 'icon') continue
    iconLabelBackgrounds.set(node.id, containerFill(containers.ofNode(node.id), diagram, palette))
  }

  log.debug('Routed edges', { total: edges.length, fanOut: fanOut.size })
  return { edges, iconLabelBackgrounds }
}
