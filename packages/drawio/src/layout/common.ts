import type { Palette } from '../palette.ts'
import { lookup } from '../styles.ts'
import type { Box, Diagram, DiagramNode } from '../types.ts'

// ============================================================================
// Shared geometry helpers for the layout strategies
// ============================================================================

/** Height reserved for the title line */
export const TITLE_BLOCK_HEIGHT = 50
/** Height reserved for the subtitle line */
export const SUBTITLE_BLOCK_HEIGHT = 24
/** Content never starts above this y, even without a title */
export const MIN_CONTENT_TOP = 100

export interface Size {
  width: number
  height: number
}

/** Node box size: palette dimensions for the type, taller when a detail line is shown */
export function nodeSize(node: Pick<DiagramNode, 'type' | 'detail'>, palette: Palette): Size {
  const [width, height] = lookup(palette.dimensions, node.type, `dimensions.${node.type}`)
  return {
    width,
    height: node.detail ? height + palette.spacing.detail_extra_height : height,
  }
}

export function sizeMap(diagram: Diagram, palette: Palette): Map<string, Size> {
  return new Map(diagram.nodes.map(n => [n.id, nodeSize(n, palette)]))
}

/** Height of the title/subtitle block including its bottom margin; 0 when neither is shown */
export function titleBlockHeight(diagram: Pick<Diagram, 'title' | 'subtitle'>, palette: Palette): number {
  let height = 0
  if (diagram.title) height += TITLE_BLOCK_HEIGHT
  if (diagram.subtitle) height += SUBTITLE_BLOCK_HEIGHT
  return height > 0 ? height + palette.spacing.title_bottom_margin : 0
}

export function contentTop(diagram: Pick<Diagram, 'title' | 'subtitle'>, palette: Palette): number {
  return Math.max(palette.page.title_top + titleBlockHeight(diagram, palette), MIN_CONTENT_TOP)
}

/** Left edge that centers `width` on the page axis, never left of the content margin */
export function centeredStart(width: number, palette: Palette): number {
  return Math.max(palette.page.content_left, Math.floor((palette.page.width - width) / 2))
}

/** Total width of boxes laid side by side with `gap` between neighbours */
export function rowWidth(sizes: readonly Size[], gap: number): number {
  if (sizes.length === 0) return 0
  return sizes.reduce((sum, s) => sum + s.width, 0) + gap * (sizes.length - 1)
}

/**
 * Place one centered row at `top`. Each box is vertically centered on the
 * tallest member. Returns the row height.
 */
export function placeRow(
  ids: readonly string[],
  sizes: ReadonlyMap<string, Size>,
  top: number,
  palette: Palette,
  out: Map<string, Box>,
): number {
  const members = ids.map(id => sizeOf(sizes, id))
  const gap = palette.spacing.h_gap
  const rowHeight = Math.max(0, ...members.map(s => s.height))
  let x = centeredStart(rowWidth(members, gap), palette)

  ids.forEach((id, i) => {
    const size = members[i] ?? sizeOf(sizes, id)
    out.set(id, {
      x,
      y: top + Math.floor((rowHeight - size.height) / 2),
      width: size.width,
      height: size.height,
    })
    x += size.width + gap
  })
  return rowHeight
}

/** Stack rows top to bottom with v_gap, recording the row index as the tier */
export function placeRows(
  rows: readonly (readonly string[])[],
  sizes: ReadonlyMap<string, Size>,
  top: number,
  palette: Palette,
  boxes: Map<string, Box>,
  tiers: Map<string, number>,
): void {
  let y = top
  rows.forEach((row, index) => {
    const height = placeRow(row, sizes, y, palette, boxes)
    for (const id of row) tiers.set(id, index)
    y += height + palette.spacing.v_gap
  })
}

export function sizeOf(sizes: ReadonlyMap<string, Size>, id: string): Size {
  const size = sizes.get(id)
  if (!size) throw new Error(`No size computed for node "${id}"`)
  return size
}

export function boxOf(boxes: ReadonlyMap<string, Box>, id: string): Box {
  const box = boxes.get(id)
  if (!box) throw new Error(`No box computed for node "${id}"`)
  return box
}

/** Smallest box containing every input box */
export function unionBox(boxes: readonly Box[]): Box {
  const minX = Math.min(...boxes.map(b => b.x))
  const minY = Math.min(...boxes.map(b => b.y))
  const maxX = Math.max(...boxes.map(b => b.x + b.width))
  const maxY = Math.max(...boxes.map(b => b.y + b.height))
  return { x: minX, y: minY, width: maxX - minX, height: maxY - minY }
}

export function expandBox(box: Box, padding: number): Box {
  return {
    x: box.x - padding,
    y: box.y - padding,
    width: box.width + padding * 2,
    height: box.height + padding * 2,
  }
}

export function centerX(box: Box): number {
  return box.x + box.width / 2
}

/** What every layout strategy produces before groups and page size are derived */
export interface Placement {
  nodes: Map<string, Box>
  tiers: Map<string, number>
  lanes?: Map<string, Box>
}

export interface LayoutContext {
  diagram: Diagram
  sizes: ReadonlyMap<string, Size>
  /** y at which node content starts */
  top: number
  palette: Palette
}
