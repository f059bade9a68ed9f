import type { Palette } from './palette.ts'
import { themePalette } from './styles.ts'
import type { Diagram, DiagramGroup } from './types.ts'

// ============================================================================
// Container membership: which group or lane encloses a node or a group.
// Drives both cell parenting in the document and label background colors.
// ============================================================================

/** Cell id of the default layer every top-level cell hangs from */
export const LAYER_ID = '1'

export type Container =
  | { kind: 'root' }
  | { kind: 'lane'; id: string }
  | { kind: 'group'; id: string }

export const laneCellId = (id: string): string => `__lane_${id}`
export const groupCellId = (id: string): string => `__group_${id}`

export function containerCellId(container: Container): string {
  switch (container.kind) {
    case 'root': return LAYER_ID
    case 'lane': return laneCellId(container.id)
    case 'group': return groupCellId(container.id)
  }
}

export class ContainerIndex {
  private readonly nodeGroup = new Map<string, string>()
  private readonly nodeLane = new Map<string, string>()
  private readonly groupLane = new Map<string, string>()

  constructor(diagram: Diagram) {
    for (const node of diagram.nodes) {
      if (node.group !== undefined) this.nodeGroup.set(node.id, node.group)
      if (node.lane !== undefined) this.nodeLane.set(node.id, node.lane)
    }
    for (const group of diagram.groups) {
      const lane = this.sharedLane(group)
      if (lane !== undefined) this.groupLane.set(group.id, lane)
    }
  }

  /** Lane holding every member of the group, if they all share one */
  private sharedLane(group: DiagramGroup): string | undefined {
    const lanes = new Set(group.members.map(id => this.nodeLane.get(id)))
    const [only] = lanes
    return lanes.size === 1 ? only : undefined
  }

  /** Innermost container of a node: its group, else its lane, else the root */
  ofNode(nodeId: string): Container {
    const group = this.nodeGroup.get(nodeId)
    if (group !== undefined) return { kind: 'group', id: group }
    const lane = this.nodeLane.get(nodeId)
    if (lane !== undefined) return { kind: 'lane', id: lane }
    return { kind: 'root' }
  }

  /** A group sits inside a lane only when all its members do */
  ofGroup(groupId: string): Container {
    const lane = this.groupLane.get(groupId)
    return lane !== undefined ? { kind: 'lane', id: lane } : { kind: 'root' }
  }

  /** Innermost container shared by two nodes */
  common(a: string, b: string): Container {
    const groupA = this.nodeGroup.get(a)
    if (groupA !== undefined && groupA === this.nodeGroup.get(b)) {
      return { kind: 'group', id: groupA }
    }
    const laneA = this.nodeLane.get(a)
    if (laneA !== undefined && laneA === this.nodeLane.get(b) && this.drawnInLane(a) && this.drawnInLane(b)) {
      return { kind: 'lane', id: laneA }
    }
    return { kind: 'root' }
  }

  /** False when the node's group spans lanes and so paints above all of them */
  private drawnInLane(nodeId: string): boolean {
    const group = this.nodeGroup.get(nodeId)
    return group === undefined || this.groupLane.has(group)
  }
}

/** Surface color painted behind anything sitting directly in the container */
export function containerFill(container: Container, diagram: Pick<Diagram, 'theme'>, palette: Palette): string {
  const themed = themePalette(palette, diagram.theme)
  switch (container.kind) {
    case 'group': return themed.group.fill
    case 'lane': return themed.lane.fill
    case 'root': return themed.background
  }
}
