import { lookup } from '../styles.ts'
import type { Box } from '../types.ts'
import { sizeOf, type LayoutContext, type Placement } from './common.ts'

/**
 * swimlane: one horizontal band per lane, stacked without gaps. Members run
 * left to right under the lane header; every band shares the width of the
 * widest lane and is never narrower than the content area.
 */
export function layoutSwimlane({ diagram, sizes, top, palette }: LayoutContext): Placement {
  const { h_gap: hGap, swimlane_header: header, swimlane_padding: pad } = palette.spacing
  const { content_left: left, content_right: right } = palette.page
  const [, emptyHeight] = lookup(palette.dimensions, 'process', 'dimensions.process')

  const nodes = new Map<string, Box>()
  const tiers = new Map<string, number>()
  const heights = new Map<string, number>()
  let widest = right - left
  let y = top

  diagram.lanes.forEach((lane, index) => {
    const tallest = lane.members.length > 0
      ? Math.max(...lane.members.map(id => sizeOf(sizes, id).height))
      : emptyHeight
    const laneHeight = header + tallest + pad * 2
    const bodyTop = y + header + pad

    let x = left + pad
    for (const id of lane.members) {
      const { width, height } = sizeOf(sizes, id)
      nodes.set(id, { x, y: bodyTop + Math.floor((tallest - height) / 2), width, height })
      tiers.set(id, index)
      x += width + hGap
    }
    if (lane.members.length > 0) {
      widest = Math.max(widest, x - hGap + pad - left)
    }

    heights.set(lane.id, laneHeight)
    y += laneHeight
  })

  const lanes = new Map<string, Box>()
  let laneTop = top
  for (const lane of diagram.lanes) {
    const height = heights.get(lane.id) ?? 0
    lanes.set(lane.id, { x: left, y: laneTop, width: widest, height })
    laneTop += height
  }

  return { nodes, tiers, lanes }
}
