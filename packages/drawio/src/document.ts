import { createHash } from 'node:crypto'
import { ContainerIndex, LAYER_ID, containerCellId, groupCellId, laneCellId, type Container } from './containers.ts'
import { TITLE_BLOCK_HEIGHT, SUBTITLE_BLOCK_HEIGHT } from './layout/common.ts'
import type { Palette } from './palette.ts'
import type { RoutingResult } from './router.ts'
import {
  resolveGroupStyle,
  resolveLaneStyle,
  resolveNodeStyle,
  resolveTextStyle,
  styleToString,
  themePalette,
  withAttr,
} from './styles.ts'
import type { Box, Diagram, DiagramNode, LayoutResult } from './types.ts'

// ============================================================================
// Document model: the flat cell list of one draw.io page
//
// Cell order: root (0), layer (1), title, subtitle, lanes, groups, edges,
// nodes. Edges precede nodes so connectors never paint over node labels.
// Children of a lane or group carry geometry relative to that container.
// ============================================================================

export const ROOT_ID = '0'
export const TITLE_ID = '__title'
export const SUBTITLE_ID = '__subtitle'
export const edgeCellId = (index: number): string => `__edge_${index}`

export type MxCell =
  | { kind: 'root'; id: string }
  | { kind: 'layer'; id: string; parent: string }
  | {
      kind: 'vertex'
      id: string
      parent: string
      value: string
      style: string
      geometry: Box
    }
  | {
      kind: 'edge'
      id: string
      parent: string
      value: string
      style: string
      source: string
      target: string
    }

export interface MxDocument {
  /** Stable page id derived from the diagram content */
  id: string
  name: string
  page: { width: number; height: number }
  /** Canvas background, set for the dark theme only */
  background?: string
  cells: MxCell[]
}

/** Escape text for an HTML label (draw.io styles here all carry html=1) */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
}

/** Node label: the label, plus a smaller muted detail line when present */
export function nodeLabel(node: Pick<DiagramNode, 'label' | 'detail'>, detailColor: string, detailSize: number): string {
  const label = escapeHtml(node.label)
  if (!node.detail) return label
  return `${label}<br><font style='font-size:${detailSize}px;color:${detailColor}'>${escapeHtml(node.detail)}</font>`
}

/** First 16 hex chars of the SHA-256 of the validated diagram */
export function documentId(diagram: Diagram): string {
  return createHash('sha256').update(JSON.stringify(diagram)).digest('hex').slice(0, 16)
}

function relativeTo(box: Box, origin: Box | null): Box {
  if (!origin) return { ...box }
  return { x: box.x - origin.x, y: box.y - origin.y, width: box.width, height: box.height }
}

export function buildDocument(
  diagram: Diagram,
  layout: LayoutResult,
  routing: RoutingResult,
  palette: Palette,
): MxDocument {
  const themed = themePalette(palette, diagram.theme)
  const containers = new ContainerIndex(diagram)
  const { content_left: left, content_right: right, title_top: titleTop } = palette.page

  const containerBox = (container: Container): Box | null => {
    switch (container.kind) {
      case 'root': return null
      case 'lane': return layout.lanes.get(container.id) ?? null
      case 'group': return layout.groups.get(container.id) ?? null
    }
  }

  const cells: MxCell[] = [
    { kind: 'root', id: ROOT_ID },
    { kind: 'layer', id: LAYER_ID, parent: ROOT_ID },
  ]

  // Title block
  let textY = titleTop
  if (diagram.title) {
    cells.push({
      kind: 'vertex',
      id: TITLE_ID,
      parent: LAYER_ID,
      value: escapeHtml(diagram.title),
      style: styleToString(resolveTextStyle('title', diagram.theme, palette)),
      geometry: { x: left, y: textY, width: right - left, height: TITLE_BLOCK_HEIGHT },
    })
    textY += TITLE_BLOCK_HEIGHT
  }
  if (diagram.subtitle) {
    cells.push({
      kind: 'vertex',
      id: SUBTITLE_ID,
      parent: LAYER_ID,
      value: escapeHtml(diagram.subtitle),
      style: styleToString(resolveTextStyle('subtitle', diagram.theme, palette)),
      geometry: { x: left, y: textY, width: right - left, height: SUBTITLE_BLOCK_HEIGHT },
    })
  }

  // Containers
  for (const lane of diagram.lanes) {
    const box = layout.lanes.get(lane.id)
    if (!box) throw new Error(`Lane "${lane.id}" has no layout box`)
    cells.push({
      kind: 'vertex',
      id: laneCellId(lane.id),
      parent: LAYER_ID,
      value: escapeHtml(lane.label),
      style: styleToString(resolveLaneStyle(lane.color, diagram.theme, palette)),
      geometry: { ...box },
    })
  }
  for (const group of diagram.groups) {
    const box = layout.groups.get(group.id)
    if (!box) throw new Error(`Group "${group.id}" has no layout box`)
    const parent = containers.ofGroup(group.id)
    cells.push({
      kind: 'vertex',
      id: groupCellId(group.id),
      parent: containerCellId(parent),
      value: escapeHtml(group.label),
      style: styleToString(resolveGroupStyle(group.color, diagram.theme, palette)),
      geometry: relativeTo(box, containerBox(parent)),
    })
  }

  // Edges, parented to the innermost container both ends share
  for (const route of routing.edges) {
    const { source, target, label } = route.edge
    cells.push({
      kind: 'edge',
      id: edgeCellId(route.index),
      parent: containerCellId(containers.common(source, target)),
      value: label ? escapeHtml(label) : '',
      style: styleToString(route.attrs),
      source,
      target,
    })
  }

  // Nodes
  for (const node of diagram.nodes) {
    const box = layout.nodes.get(node.id)
    if (!box) throw new Error(`Node "${node.id}" has no layout box`)
    const parent = containers.ofNode(node.id)
    let attrs = resolveNodeStyle(node, diagram.theme, palette).attrs
    const iconBackground = routing.iconLabelBackgrounds.get(node.id)
    if (iconBackground !== undefined) {
      attrs = withAttr(attrs, 'labelBackgroundColor', iconBackground)
    }
    cells.push({
      kind: 'vertex',
      id: node.id,
      parent: containerCellId(parent),
      value: nodeLabel(node, themed.detail_text, palette.text.detail_size),
      style: styleToString(attrs),
      geometry: relativeTo(box, containerBox(parent)),
    })
  }

  return {
    id: documentId(diagram),
    name: diagram.title || 'Diagram',
    page: { ...layout.page },
    ...(diagram.theme === 'dark' && { background: themed.background }),
    cells,
  }
}
