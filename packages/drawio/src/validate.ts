import { z } from 'zod'
import { createLogger, formatIssuePath, type ValidationIssue } from '@boxwright/shared'
import { SchemaError } from './errors.ts'
import {
  DEFAULT_VARIANT,
  EDGE_STYLES,
  LAYOUT_KINDS,
  NODE_TYPES,
  THEMES,
  VARIANTS,
  type Diagram,
  type DiagramEdge,
  type DiagramGroup,
  type DiagramLane,
  type DiagramNode,
  type EdgeStyle,
  type LayoutKind,
  type PipelineStep,
  type Theme,
} from './types.ts'

const log = createLogger('validate')

// ============================================================================
// Input shape: what a caller hands to validateDiagram()
//
// Enumerated fields are plain strings here. The shape pass checks presence
// and JSON types; enumeration membership belongs to the ordered semantic
// pass below.
// ============================================================================

// Text ends up in XML attributes, which cannot carry C0 controls other than tab, LF and CR
const TextSchema = z.string().regex(/^[^\u0000-\u0008\u000B\u000C\u000E-\u001F]*$/, 'Control characters are not allowed')

const ColorSchema = z.string().regex(/^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/, 'Expected a #RGB or #RRGGBB color')

export const NodeInputSchema = z.object({
  id: TextSchema.min(1, 'Node id cannot be empty'),
  label: TextSchema,
  type: TextSchema,
  variant: TextSchema.optional(),
  detail: TextSchema.optional(),
  icon: TextSchema.optional(),
  row: z.union([TextSchema, z.number()]).optional(),
  lane: TextSchema.optional(),
})

export const EdgeInputSchema = z.object({
  from: TextSchema,
  to: TextSchema,
  style: TextSchema.optional(),
  color: TextSchema.optional(),
  label: TextSchema.optional(),
})

export const GroupInputSchema = z.object({
  id: TextSchema.min(1, 'Group id cannot be empty').optional(),
  label: TextSchema,
  color: ColorSchema.optional(),
  members: z.array(TextSchema),
})

export const LaneInputSchema = z.object({
  id: TextSchema.min(1, 'Lane id cannot be empty'),
  label: TextSchema,
  color: ColorSchema.optional(),
  members: z.array(TextSchema).optional(),
})

export const DiagramInputSchema = z.object({
  title: TextSchema,
  subtitle: TextSchema.optional(),
  theme: TextSchema.optional(),
  layout: TextSchema,
  nodes: z.array(NodeInputSchema).min(1, 'At least one node is required'),
  edges: z.array(EdgeInputSchema).optional(),
  groups: z.array(GroupInputSchema).optional(),
  lanes: z.array(LaneInputSchema).optional(),
  pipeline: z.array(z.union([TextSchema, z.array(TextSchema)])).optional(),
  grid_columns: z.number().int().positive().optional(),
  flow_columns: z.number().int().positive().optional(),
})

export type DiagramInput = z.infer<typeof DiagramInputSchema>

export interface DiagramValidation {
  diagram: Diagram
  warnings: ValidationIssue[]
}

// ============================================================================
// Helpers
// ============================================================================

/** Ids "0" and "1" are the document root and layer; "__" prefixes generated cells */
export function isReservedId(id: string): boolean {
  return id === '0' || id === '1' || id.startsWith('__')
}

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some(v => v === value)
}

/** Numbers and numeric strings collapse to one key: 1, "1" and "1.0" are all "1" */
export function normalizeRowKey(row: string | number): string {
  if (typeof row === 'number') return String(row)
  return isNumericRowKey(row) ? String(Number(row)) : row
}

export function isNumericRowKey(key: string): boolean {
  return key.trim() !== '' && Number.isFinite(Number(key))
}

/** Narrow `value` to a member of `values`, or fail with a SchemaError */
function oneOf<T extends string>(values: readonly T[], value: string, path: string, message: string, id?: string): T {
  if (!isOneOf(values, value)) fail(path, message, id)
  return value
}

function fail(path: string, message: string, id?: string): never {
  throw new SchemaError(path, message, id)
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate a raw diagram description and normalize it into a Diagram.
 *
 * Checks run in a fixed order and stop at the first failure: node ids,
 * edge endpoints, lane references, enumerations, layout kind, then
 * layout-specific fields. Nothing is coerced; an unknown enumeration value is
 * an error, never a default.
 *
 * @throws SchemaError naming the offending field path (and id, where one applies)
 */
export function validateDiagram(input: unknown): DiagramValidation {
  const parsed = DiagramInputSchema.safeParse(input)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    fail(issue ? formatIssuePath(issue.path) : 'root', issue?.message ?? 'Invalid diagram description')
  }
  const data = parsed.data
  const edges = data.edges ?? []
  const groups = data.groups ?? []
  const lanes = data.lanes ?? []
  const warnings: ValidationIssue[] = []

  // 1. Node ids: unique and not reserved
  const nodeIds = new Set<string>()
  data.nodes.forEach((node, i) => {
    if (isReservedId(node.id)) {
      fail(`nodes.${i}.id`, `Node id "${node.id}" is reserved`, node.id)
    }
    if (nodeIds.has(node.id)) {
      fail(`nodes.${i}.id`, `Duplicate node id "${node.id}"`, node.id)
    }
    nodeIds.add(node.id)
  })

  // 2. Edge endpoints
  edges.forEach((edge, i) => {
    if (!nodeIds.has(edge.from)) {
      fail(`edges.${i}.from`, `Edge references unknown node "${edge.from}"`, edge.from)
    }
    if (!nodeIds.has(edge.to)) {
      fail(`edges.${i}.to`, `Edge references unknown node "${edge.to}"`, edge.to)
    }
  })

  // 3. Lanes: unique ids, node references, member lists that agree with them
  const laneIds = new Set<string>()
  lanes.forEach((lane, i) => {
    if (laneIds.has(lane.id)) {
      fail(`lanes.${i}.id`, `Duplicate lane id "${lane.id}"`, lane.id)
    }
    laneIds.add(lane.id)
  })
  data.nodes.forEach((node, i) => {
    if (node.lane !== undefined && !laneIds.has(node.lane)) {
      fail(`nodes.${i}.lane`, `Node "${node.id}" references undeclared lane "${node.lane}"`, node.lane)
    }
  })
  const laneOf = new Map<string, string>()
  for (const node of data.nodes) {
    if (node.lane !== undefined) laneOf.set(node.id, node.lane)
  }
  const listedIn = new Map<string, string>()
  lanes.forEach((lane, i) => {
    (lane.members ?? []).forEach((member, j) => {
      const path = `lanes.${i}.members.${j}`
      if (!nodeIds.has(member)) {
        fail(path, `Lane "${lane.id}" lists unknown node "${member}"`, member)
      }
      const declared = laneOf.get(member)
      if (declared !== undefined && declared !== lane.id) {
        fail(path, `Node "${member}" is in lane "${declared}" but listed by lane "${lane.id}"`, member)
      }
      const other = listedIn.get(member)
      if (other !== undefined && other !== lane.id) {
        fail(path, `Node "${member}" is listed by lanes "${other}" and "${lane.id}"`, member)
      }
      listedIn.set(member, lane.id)
    })
  })

  // 4. Closed enumerations
  const typedNodes = data.nodes.map((node, i) => {
    const type = oneOf(NODE_TYPES, node.type, `nodes.${i}.type`, `Unknown node type "${node.type}" on node "${node.id}"`, node.id)
    const variant = node.variant === undefined
      ? DEFAULT_VARIANT
      : oneOf(VARIANTS, node.variant, `nodes.${i}.variant`, `Unknown variant "${node.variant}" on node "${node.id}"`, node.id)
    if (type === 'icon' && !node.icon) {
      fail(`nodes.${i}.icon`, `Icon node "${node.id}" needs an icon reference`, node.id)
    }
    if (node.icon?.includes(';')) {
      fail(`nodes.${i}.icon`, `Icon reference on node "${node.id}" cannot contain ";"`, node.id)
    }
    return { ...node, type, variant }
  })
  const typedEdges = edges.map((edge, i) => {
    const style: EdgeStyle = edge.style === undefined
      ? 'solid'
      : oneOf(EDGE_STYLES, edge.style, `edges.${i}.style`, `Unknown edge style "${edge.style}"`)
    return { ...edge, style }
  })
  const theme: Theme = data.theme === undefined
    ? 'light'
    : oneOf(THEMES, data.theme, 'theme', `Unknown theme "${data.theme}"`)

  // 5. Layout kind
  const layout: LayoutKind = oneOf(LAYOUT_KINDS, data.layout, 'layout', `Unknown layout "${data.layout}"`)

  // 6. Layout-specific fields and containers
  if (data.pipeline !== undefined && layout !== 'pipeline') {
    fail('pipeline', 'pipeline is only valid with layout "pipeline"')
  }
  if (data.grid_columns !== undefined && layout !== 'grid') {
    fail('grid_columns', 'grid_columns is only valid with layout "grid"')
  }
  if (data.flow_columns !== undefined && layout !== 'flow') {
    fail('flow_columns', 'flow_columns is only valid with layout "flow"')
  }
  data.nodes.forEach((node, i) => {
    if (node.row !== undefined && layout !== 'rows') {
      fail(`nodes.${i}.row`, `Node "${node.id}" has a row but layout is "${layout}"`, node.id)
    }
    if (node.lane !== undefined && layout !== 'swimlane') {
      fail(`nodes.${i}.lane`, `Node "${node.id}" has a lane but layout is "${layout}"`, node.id)
    }
  })
  if (lanes.length > 0 && layout !== 'swimlane') {
    fail('lanes', 'lanes are only valid with layout "swimlane"')
  }
  if (layout === 'swimlane' && lanes.length === 0) {
    fail('lanes', 'swimlane layout requires at least one lane')
  }

  const pipeline = layout === 'pipeline'
    ? normalizePipeline(data.pipeline, data.nodes.map(n => n.id), nodeIds)
    : undefined

  const groupOf = validateGroups(groups, nodeIds, warnings)

  // Build the normalized, immutable diagram
  const firstLane = lanes[0]?.id
  const nodes: DiagramNode[] = typedNodes.map((node) => {
    const lane = layout === 'swimlane'
      ? node.lane ?? listedIn.get(node.id) ?? firstLane
      : undefined
    const group = groupOf.get(node.id)
    return {
      id: node.id,
      label: node.label,
      type: node.type,
      variant: node.variant,
      ...(node.detail !== undefined && { detail: node.detail }),
      ...(node.icon !== undefined && { icon: node.icon }),
      ...(node.row !== undefined && { row: normalizeRowKey(node.row) }),
      ...(lane !== undefined && { lane }),
      ...(group !== undefined && { group }),
    }
  })

  const diagramLanes: DiagramLane[] = lanes.map(lane => ({
    id: lane.id,
    label: lane.label,
    ...(lane.color !== undefined && { color: lane.color }),
    members: nodes.filter(n => n.lane === lane.id).map(n => n.id),
  }))

  const diagramEdges: DiagramEdge[] = typedEdges.map(edge => ({
    source: edge.from,
    target: edge.to,
    style: edge.style,
    ...(edge.color !== undefined && { color: edge.color }),
    ...(edge.label !== undefined && { label: edge.label }),
  }))

  const diagramGroups: DiagramGroup[] = groups.map((group, i) => ({
    id: group.id ?? `g${i}`,
    label: group.label,
    ...(group.color !== undefined && { color: group.color }),
    members: [...group.members],
  }))

  const diagram: Diagram = {
    title: data.title,
    ...(data.subtitle !== undefined && { subtitle: data.subtitle }),
    theme,
    layout,
    nodes,
    edges: diagramEdges,
    groups: diagramGroups,
    lanes: diagramLanes,
    ...(pipeline !== undefined && { pipeline }),
    ...(data.grid_columns !== undefined && { gridColumns: data.grid_columns }),
    ...(data.flow_columns !== undefined && { flowColumns: data.flow_columns }),
  }

  for (const warning of warnings) {
    log.warn(`${warning.path}: ${warning.message}`)
  }
  log.debug('Validated diagram', { layout, nodes: nodes.length, edges: diagramEdges.length })

  return { diagram, warnings }
}

/**
 * Turn raw pipeline entries into steps. Every id must exist and appear once;
 * nodes missing from the pipeline become trailing single steps in input order.
 */
function normalizePipeline(
  entries: DiagramInput['pipeline'],
  orderedIds: readonly string[],
  nodeIds: ReadonlySet<string>,
): PipelineStep[] {
  const steps: PipelineStep[] = []
  const placed = new Set<string>()

  const place = (id: string, path: string) => {
    if (!nodeIds.has(id)) {
      fail(path, `Pipeline references unknown node "${id}"`, id)
    }
    if (placed.has(id)) {
      fail(path, `Node "${id}" appears more than once in the pipeline`, id)
    }
    placed.add(id)
  }

  (entries ?? []).forEach((entry, i) => {
    if (typeof entry === 'string') {
      place(entry, `pipeline.${i}`)
      steps.push([entry])
      return
    }
    if (entry.length === 0) {
      fail(`pipeline.${i}`, 'Pipeline step cannot be an empty list')
    }
    entry.forEach((id, j) => place(id, `pipeline.${i}.${j}`))
    steps.push([...entry])
  })

  for (const id of orderedIds) {
    if (!placed.has(id)) steps.push([id])
  }
  return steps
}

/**
 * Check groups and map each member node to its group id.
 * Singleton groups are accepted but reported as low-value.
 */
function validateGroups(
  groups: NonNullable<DiagramInput['groups']>,
  nodeIds: ReadonlySet<string>,
  warnings: ValidationIssue[],
): Map<string, string> {
  const groupIds = new Set<string>()
  const groupOf = new Map<string, string>()

  groups.forEach((group, i) => {
    const id = group.id ?? `g${i}`
    if (groupIds.has(id)) {
      fail(`groups.${i}.id`, `Duplicate group id "${id}"`, id)
    }
    groupIds.add(id)

    if (group.members.length === 0) {
      fail(`groups.${i}.members`, `Group "${id}" has no members`, id)
    }
    group.members.forEach((member, j) => {
      const path = `groups.${i}.members.${j}`
      if (!nodeIds.has(member)) {
        fail(path, `Group "${id}" lists unknown node "${member}"`, member)
      }
      const other = groupOf.get(member)
      if (other !== undefined) {
        fail(path, other === id
          ? `Group "${id}" lists node "${member}" twice`
          : `Node "${member}" belongs to groups "${other}" and "${id}"`, member)
      }
      groupOf.set(member, id)
    })

    if (group.members.length === 1) {
      warnings.push({
        file: 'diagram',
        path: `groups.${i}`,
        message: `Group "${id}" has a single member`,
        severity: 'warning',
        suggestion: 'Groups read best with two or more related nodes',
      })
    }
  })

  return groupOf
}
