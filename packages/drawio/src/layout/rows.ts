import type { Box } from '../types.ts'
import { isNumericRowKey } from '../validate.ts'
import { placeRows, sizeOf, type LayoutContext, type Placement } from './common.ts'

// ============================================================================
// Row-based layouts: explicit row keys (rows) and greedy packing (flow)
// ============================================================================

/**
 * Group node ids by row key. Numeric keys come first in ascending order, then
 * non-numeric keys by first occurrence. A node without a key gets a row of its
 * own at its position among the non-numeric keys.
 */
export function groupRows(nodes: readonly { id: string; row?: string }[]): string[][] {
  const numeric = new Map<number, string[]>()
  const named: string[][] = []
  const namedIndex = new Map<string, string[]>()

  for (const node of nodes) {
    if (node.row === undefined) {
      named.push([node.id])
    } else if (isNumericRowKey(node.row)) {
      const key = Number(node.row)
      const row = numeric.get(key)
      if (row) row.push(node.id)
      else numeric.set(key, [node.id])
    } else {
      const row = namedIndex.get(node.row)
      if (row) {
        row.push(node.id)
      } else {
        const created = [node.id]
        namedIndex.set(node.row, created)
        named.push(created)
      }
    }
  }

  const ordered = [...numeric.entries()].sort(([a], [b]) => a - b).map(([, ids]) => ids)
  return [...ordered, ...named]
}

export function layoutRows({ diagram, sizes, top, palette }: LayoutContext): Placement {
  const nodes = new Map<string, Box>()
  const tiers = new Map<string, number>()
  placeRows(groupRows(diagram.nodes), sizes, top, palette, nodes, tiers)
  return { nodes, tiers }
}

/**
 * Pack node ids into rows. With `columns` every row takes that many nodes;
 * otherwise rows fill up to a width budget aiming at a 16:9 block.
 */
export function packFlowRows(
  items: readonly { id: string; width: number }[],
  hGap: number,
  columns?: number,
): string[][] {
  const rows: string[][] = []
  if (columns !== undefined) {
    for (let i = 0; i < items.length; i += columns) {
      rows.push(items.slice(i, i + columns).map(item => item.id))
    }
    return rows
  }

  const n = items.length
  const target = Math.max(2, Math.min(n, Math.round(Math.sqrt((n * 16) / 9))))
  const meanWidth = items.reduce((sum, item) => sum + item.width, 0) / n
  const budget = target * (meanWidth + hGap)

  let current: string[] = []
  let used = 0
  for (const item of items) {
    const cell = item.width + hGap
    if (current.length > 0 && used + cell > budget + 1e-9) {
      rows.push(current)
      current = []
      used = 0
    }
    current.push(item.id)
    used += cell
  }
  if (current.length > 0) rows.push(current)
  return rows
}

export function layoutFlow({ diagram, sizes, top, palette }: LayoutContext): Placement {
  const items = diagram.nodes.map(n => ({ id: n.id, width: sizeOf(sizes, n.id).width }))
  const rows = packFlowRows(items, palette.spacing.h_gap, diagram.flowColumns)
  const nodes = new Map<string, Box>()
  const tiers = new Map<string, number>()
  placeRows(rows, sizes, top, palette, nodes, tiers)
  return { nodes, tiers }
}
