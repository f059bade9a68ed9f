import type { Box } from '../types.ts'
import { centeredStart, placeRows, sizeOf, type LayoutContext, type Placement } from './common.ts'

/** linear: input order top to bottom, each box centered on the page axis */
export function layoutLinear({ diagram, sizes, top, palette }: LayoutContext): Placement {
  const nodes = new Map<string, Box>()
  const tiers = new Map<string, number>()
  let y = top

  diagram.nodes.forEach((node, index) => {
    const { width, height } = sizeOf(sizes, node.id)
    nodes.set(node.id, { x: centeredStart(width, palette), y, width, height })
    tiers.set(node.id, index)
    y += height + palette.spacing.v_gap
  })
  return { nodes, tiers }
}

/** horizontal: one centered row, left to right */
export function layoutHorizontal({ diagram, sizes, top, palette }: LayoutContext): Placement {
  const nodes = new Map<string, Box>()
  const tiers = new Map<string, number>()
  placeRows([diagram.nodes.map(n => n.id)], sizes, top, palette, nodes, tiers)
  return { nodes, tiers }
}
