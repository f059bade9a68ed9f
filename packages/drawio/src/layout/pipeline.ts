import type { Box, PipelineStep } from '../types.ts'
import { centeredStart, sizeOf, type LayoutContext, type Placement } from './common.ts'

/**
 * pipeline: steps left to right, each step a vertical stack. Every step is
 * centered on the midline of the tallest step; members are centered within
 * their step's width.
 */
export function layoutPipeline({ diagram, sizes, top, palette }: LayoutContext): Placement {
  const { h_gap: hGap, v_gap: vGap } = palette.spacing
  const steps: readonly PipelineStep[] = diagram.pipeline ?? diagram.nodes.map(n => [n.id])

  const measured = steps.map((ids) => {
    const members = ids.map(id => sizeOf(sizes, id))
    return {
      ids,
      width: Math.max(...members.map(s => s.width)),
      height: members.reduce((sum, s) => sum + s.height, 0) + vGap * (members.length - 1),
    }
  })

  const totalWidth = measured.reduce((sum, s) => sum + s.width, 0) + hGap * (measured.length - 1)
  const tallest = Math.max(...measured.map(s => s.height))
  const midY = top + Math.floor(tallest / 2)

  const nodes = new Map<string, Box>()
  const tiers = new Map<string, number>()
  let x = centeredStart(totalWidth, palette)

  measured.forEach((step, index) => {
    let y = midY - Math.floor(step.height / 2)
    for (const id of step.ids) {
      const { width, height } = sizeOf(sizes, id)
      nodes.set(id, { x: x + Math.floor((step.width - width) / 2), y, width, height })
      tiers.set(id, index)
      y += height + vGap
    }
    x += step.width + hGap
  })

  return { nodes, tiers }
}
