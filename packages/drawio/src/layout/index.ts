import { createLogger } from '@boxwright/shared'
import type { Palette } from '../palette.ts'
import type { Box, Diagram, LayoutKind, LayoutResult } from '../types.ts'
import {
  boxOf,
  contentTop,
  expandBox,
  sizeMap,
  unionBox,
  type LayoutContext,
  type Placement,
} from './common.ts'
import { layoutGrid } from './grid.ts'
import { layoutPipeline } from './pipeline.ts'
import { layoutFlow, layoutRows } from './rows.ts'
import { layoutHorizontal, layoutLinear } from './stack.ts'
import { layoutSwimlane } from './swimlane.ts'
import { layoutTree } from './tree.ts'

export { assignLevels } from './tree.ts'
export { groupRows, packFlowRows } from './rows.ts'
export { contentTop, nodeSize, titleBlockHeight } from './common.ts'

const log = createLogger('layout')

function place(kind: LayoutKind, context: LayoutContext): Placement {
  switch (kind) {
    case 'linear':
      return layoutLinear(context)
    case 'horizontal':
      return layoutHorizontal(context)
    case 'branching':
    case 'hierarchical':
      return layoutTree(context)
    case 'grid':
      return layoutGrid(context)
    case 'swimlane':
      return layoutSwimlane(context)
    case 'rows':
      return layoutRows(context)
    case 'flow':
      return layoutFlow(context)
    case 'pipeline':
      return layoutPipeline(context)
    default: {
      const unreachable: never = kind
      throw new Error(`Unhandled layout kind: ${String(unreachable)}`)
    }
  }
}

/**
 * Compute absolute geometry for a validated diagram: a box per node, group
 * and lane, the tier of every node and the page size.
 *
 * @throws LayoutError when a tree layout meets a cycle
 * @throws StyleError when the palette has no dimensions for a node type
 */
export function layoutDiagram(diagram: Diagram, palette: Palette): LayoutResult {
  const top = contentTop(diagram, palette)
  const placement = place(diagram.layout, {
    diagram,
    sizes: sizeMap(diagram, palette),
    top,
    palette,
  })

  const groups = new Map<string, Box>()
  for (const group of diagram.groups) {
    const members = group.members.map(id => boxOf(placement.nodes, id))
    groups.set(group.id, expandBox(unionBox(members), palette.spacing.group_padding))
  }
  const lanes = placement.lanes ?? new Map<string, Box>()

  const extents = [...placement.nodes.values(), ...groups.values(), ...lanes.values()]
  const maxX = Math.max(...extents.map(b => b.x + b.width))
  const maxY = Math.max(...extents.map(b => b.y + b.height))
  const page = {
    width: Math.max(palette.page.width, maxX + palette.page.margin),
    height: Math.max(palette.page.min_height, maxY + palette.page.margin),
  }

  log.debug('Laid out diagram', { kind: diagram.layout, nodes: placement.nodes.size, page })

  return {
    kind: diagram.layout,
    nodes: placement.nodes,
    tiers: placement.tiers,
    groups,
    lanes,
    contentTop: top,
    page,
  }
}
