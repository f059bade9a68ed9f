import { DEFAULT_GRID_COLUMNS, type Box } from '../types.ts'
import { centeredStart, sizeOf, type LayoutContext, type Placement } from './common.ts'

/**
 * grid: node i goes to row floor(i / columns), column i % columns.
 * Cells are as wide as the widest node; each node is centered in its cell and
 * each row vertically centers on its tallest member.
 */
export function layoutGrid({ diagram, sizes, top, palette }: LayoutContext): Placement {
  const columns = diagram.gridColumns ?? DEFAULT_GRID_COLUMNS
  const { h_gap: hGap, v_gap: vGap } = palette.spacing
  const all = diagram.nodes.map(n => sizeOf(sizes, n.id))
  const cellWidth = Math.max(...all.map(s => s.width))
  const used = Math.min(columns, diagram.nodes.length)
  const left = centeredStart(used * cellWidth + (used - 1) * hGap, palette)

  const nodes = new Map<string, Box>()
  const tiers = new Map<string, number>()
  let y = top

  for (let start = 0; start < diagram.nodes.length; start += columns) {
    const row = diagram.nodes.slice(start, start + columns)
    const rowHeight = Math.max(...row.map(n => sizeOf(sizes, n.id).height))
    const rowIndex = start / columns

    row.forEach((node, col) => {
      const { width, height } = sizeOf(sizes, node.id)
      nodes.set(node.id, {
        x: left + col * (cellWidth + hGap) + Math.floor((cellWidth - width) / 2),
        y: y + Math.floor((rowHeight - height) / 2),
        width,
        height,
      })
      tiers.set(node.id, rowIndex)
    })
    y += rowHeight + vGap
  }

  return { nodes, tiers }
}
