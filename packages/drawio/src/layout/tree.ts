import { graphlib } from '@dagrejs/dagre'
import { LayoutError } from '../errors.ts'
import type { Box, DiagramEdge } from '../types.ts'
import {
  boxOf,
  centerX,
  placeRow,
  rowWidth,
  sizeOf,
  type LayoutContext,
  type Placement,
} from './common.ts'

// ============================================================================
// Tree layout (branching / hierarchical)
//
//   1. Assign levels by longest path from the roots (Kahn order, input order)
//   2. Level 0 is one centered row
//   3. Deeper levels split into clusters of nodes that share a parent set;
//      each cluster centers under the mean x-center of its parents
//   4. Clusters are ordered by that center and pushed right to keep h_gap
// ============================================================================

/**
 * Level of every node: 0 without incoming edges, otherwise
 * max(level of parents) + 1. Self loops do not count as dependencies.
 *
 * @throws LayoutError naming the nodes on a cycle
 */
export function assignLevels(
  nodeIds: readonly string[],
  edges: readonly Pick<DiagramEdge, 'source' | 'target'>[],
): Map<string, number> {
  const incoming = new Map<string, number>(nodeIds.map(id => [id, 0]))
  const outgoing = new Map<string, string[]>(nodeIds.map(id => [id, []]))

  for (const edge of edges) {
    if (edge.source === edge.target) continue
    incoming.set(edge.target, (incoming.get(edge.target) ?? 0) + 1)
    outgoing.get(edge.source)?.push(edge.target)
  }

  const levels = new Map<string, number>()
  const queue = nodeIds.filter(id => incoming.get(id) === 0)
  for (const id of queue) levels.set(id, 0)

  for (let i = 0; i < queue.length; i++) {
    const id = queue[i]
    if (id === undefined) break
    const level = levels.get(id) ?? 0
    for (const target of outgoing.get(id) ?? []) {
      levels.set(target, Math.max(levels.get(target) ?? 0, level + 1))
      const remaining = (incoming.get(target) ?? 0) - 1
      incoming.set(target, remaining)
      if (remaining === 0) queue.push(target)
    }
  }

  if (queue.length < nodeIds.length) {
    const onCycle = findCycleNodes(nodeIds, edges)
    throw new LayoutError(onCycle, `Edges form a cycle through ${onCycle.map(id => `"${id}"`).join(', ')}; tree levels are undefined`)
  }
  return levels
}

/** Nodes that sit on at least one cycle, in input order */
function findCycleNodes(
  nodeIds: readonly string[],
  edges: readonly Pick<DiagramEdge, 'source' | 'target'>[],
): string[] {
  const graph = new graphlib.Graph()
  for (const id of nodeIds) graph.setNode(id, id)
  for (const edge of edges) {
    if (edge.source !== edge.target) graph.setEdge(edge.source, edge.target)
  }
  const members = new Set(graphlib.alg.findCycles(graph).flat())
  return nodeIds.filter(id => members.has(id))
}

interface Cluster {
  ids: string[]
  center: number
  firstIndex: number
}

export function layoutTree({ diagram, sizes, top, palette }: LayoutContext): Placement {
  const nodeIds = diagram.nodes.map(n => n.id)
  const levels = assignLevels(nodeIds, diagram.edges)
  const inputIndex = new Map(nodeIds.map((id, i) => [id, i]))
  const gap = palette.spacing.h_gap

  const parents = new Map<string, string[]>(nodeIds.map(id => [id, []]))
  for (const edge of diagram.edges) {
    const list = parents.get(edge.target)
    if (edge.source !== edge.target && list && !list.includes(edge.source)) {
      list.push(edge.source)
    }
  }

  const depth = Math.max(...levels.values())
  const byLevel: string[][] = Array.from({ length: depth + 1 }, () => [])
  for (const id of nodeIds) byLevel[levels.get(id) ?? 0]?.push(id)

  const nodes = new Map<string, Box>()
  let y = top

  byLevel.forEach((ids, level) => {
    const rowHeight = Math.max(...ids.map(id => sizeOf(sizes, id).height))

    if (level === 0) {
      placeRow(ids, sizes, y, palette, nodes)
    } else {
      const clusters = clusterByParents(ids, parents, nodes, inputIndex)
      let minLeft = palette.page.content_left
      for (const cluster of clusters) {
        const width = rowWidth(cluster.ids.map(id => sizeOf(sizes, id)), gap)
        let x = Math.max(cluster.center - width / 2, minLeft)
        for (const id of cluster.ids) {
          const { width: w, height: h } = sizeOf(sizes, id)
          nodes.set(id, { x, y: y + Math.floor((rowHeight - h) / 2), width: w, height: h })
          x += w + gap
        }
        minLeft = x
      }
    }

    y += rowHeight + palette.spacing.v_gap
  })

  return { nodes, tiers: levels }
}

/** Split one level into sibling clusters keyed by parent set, ordered by parent center */
function clusterByParents(
  ids: readonly string[],
  parents: ReadonlyMap<string, readonly string[]>,
  placed: ReadonlyMap<string, Box>,
  inputIndex: ReadonlyMap<string, number>,
): Cluster[] {
  const clusters = new Map<string, Cluster>()

  for (const id of ids) {
    const parentIds = [...(parents.get(id) ?? [])].sort()
    const key = parentIds.join('\u0000')
    const existing = clusters.get(key)
    if (existing) {
      existing.ids.push(id)
      continue
    }
    const centers = parentIds.map(p => centerX(boxOf(placed, p)))
    clusters.set(key, {
      ids: [id],
      center: centers.reduce((sum, c) => sum + c, 0) / centers.length,
      firstIndex: inputIndex.get(id) ?? 0,
    })
  }

  return [...clusters.values()].sort((a, b) => a.center - b.center || a.firstIndex - b.firstIndex)
}
