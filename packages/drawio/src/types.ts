// ============================================================================
// Validated diagram: the logical structure accepted by validateDiagram()
// ============================================================================

export const NODE_TYPES = [
  'start',
  'end',
  'process',
  'decision',
  'note',
  'success',
  'dark_panel',
  'cylinder',
  'cloud',
  'actor',
  'icon',
] as const

export type NodeType = (typeof NODE_TYPES)[number]

export const VARIANTS = ['primary', 'secondary', 'accent', 'warning', 'danger', 'neutral'] as const

export type Variant = (typeof VARIANTS)[number]

export const EDGE_STYLES = ['solid', 'curved', 'dashed', 'dotted', 'bidirectional'] as const

export type EdgeStyle = (typeof EDGE_STYLES)[number]

export const THEMES = ['light', 'dark'] as const

export type Theme = (typeof THEMES)[number]

export const LAYOUT_KINDS = [
  'linear',
  'horizontal',
  'branching',
  'hierarchical',
  'grid',
  'swimlane',
  'rows',
  'flow',
  'pipeline',
] as const

export type LayoutKind = (typeof LAYOUT_KINDS)[number]

/** Variant used when a node does not name one */
export const DEFAULT_VARIANT: Variant = 'primary'

/** Column count for grid layout when grid_columns is omitted */
export const DEFAULT_GRID_COLUMNS = 3

export interface DiagramNode {
  readonly id: string
  readonly label: string
  readonly type: NodeType
  readonly variant: Variant
  readonly detail?: string
  /** Path reference for icon nodes, inserted verbatim into the style's image= attribute */
  readonly icon?: string
  /** Normalized row key (rows layout). Numbers and numeric strings share one key. */
  readonly row?: string
  /** Resolved lane id (swimlane layout) */
  readonly lane?: string
  /** Id of the group this node belongs to, if any */
  readonly group?: string
}

export interface DiagramEdge {
  readonly source: string
  readonly target: string
  readonly style: EdgeStyle
  readonly color?: string
  readonly label?: string
}

export interface DiagramGroup {
  readonly id: string
  readonly label: string
  /** Stroke override for the group container */
  readonly color?: string
  readonly members: readonly string[]
}

export interface DiagramLane {
  readonly id: string
  readonly label: string
  readonly color?: string
  /** Member node ids in node input order */
  readonly members: readonly string[]
}

/** One pipeline step: a single node, or a vertical stack of nodes */
export type PipelineStep = readonly string[]

export interface Diagram {
  readonly title: string
  readonly subtitle?: string
  readonly theme: Theme
  readonly layout: LayoutKind
  readonly nodes: readonly DiagramNode[]
  readonly edges: readonly DiagramEdge[]
  readonly groups: readonly DiagramGroup[]
  readonly lanes: readonly DiagramLane[]
  /** Normalized steps (pipeline layout only); every node appears in exactly one step */
  readonly pipeline?: readonly PipelineStep[]
  readonly gridColumns?: number
  readonly flowColumns?: number
}

// ============================================================================
// Layout result: absolute geometry computed by layoutDiagram()
// ============================================================================

export interface Point {
  x: number
  y: number
}

export interface Box {
  x: number
  y: number
  width: number
  height: number
}

export interface LayoutResult {
  readonly kind: LayoutKind
  /** Absolute box for every node, keyed by node id */
  readonly nodes: ReadonlyMap<string, Box>
  /** Level / row / step index of each node; siblings share a tier */
  readonly tiers: ReadonlyMap<string, number>
  /** Padded container box per group id */
  readonly groups: ReadonlyMap<string, Box>
  /** Band box per lane id (swimlane layout only) */
  readonly lanes: ReadonlyMap<string, Box>
  /** Where the content area starts (below the title block) */
  readonly contentTop: number
  readonly page: { readonly width: number; readonly height: number }
}

// ============================================================================
// Style descriptors: ordered key/value attribute pairs
// ============================================================================

/** Ordered style attributes; rendered as `key=value;` in insertion order */
export type StyleAttrs = ReadonlyArray<readonly [string, string]>

export interface ResolvedNodeStyle {
  fill: string
  stroke: string
  font: string
  /** Shape descriptor from the palette (e.g. rounded=1, shape=cylinder3) */
  shape: StyleAttrs
  /** Full attribute list: shape, colors, text attributes */
  attrs: StyleAttrs
}

export interface ResolvedEdgeStyle {
  stroke: string
  font: string
  attrs: StyleAttrs
}
