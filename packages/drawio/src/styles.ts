import type { DiagramEdge, DiagramNode, ResolvedEdgeStyle, ResolvedNodeStyle, StyleAttrs, Theme } from './types.ts'
import type { ColorSet, Palette, ThemePalette } from './palette.ts'
import { isLegibleDarkFill } from './palette.ts'
import { StyleError } from './errors.ts'

// ============================================================================
// Style resolver: (type, variant, theme) and (style, color, theme) lookups
// against the palette.
//
// Every lookup is strict: an absent key is a StyleError naming the dotted
// palette path. There is no fallback color.
// ============================================================================

// ============================================================================
// Attribute list helpers
// ============================================================================

/** Render attributes as a draw.io style string: `k1=v1;k2=v2;` */
export function styleToString(attrs: StyleAttrs): string {
  return attrs.map(([key, value]) => `${key}=${value};`).join('')
}

/** Replace the value of `key` in place of its first occurrence, or append it */
export function withAttr(attrs: StyleAttrs, key: string, value: string): StyleAttrs {
  let replaced = false
  const next = attrs.map(([k, v]): readonly [string, string] => {
    if (k !== key || replaced) return [k, v]
    replaced = true
    return [k, value]
  })
  return replaced ? next : [...next, [key, value]]
}

/** Look up an attribute value, or undefined */
export function getAttr(attrs: StyleAttrs, key: string): string | undefined {
  return attrs.find(([k]) => k === key)?.[1]
}

function attrsFromRecord(record: Readonly<Record<string, string>>): StyleAttrs {
  return Object.entries(record)
}

/** Own-property lookup; prototype keys such as "constructor" never match */
export function lookup<T>(table: Readonly<Record<string, T>>, key: string, path: string): T {
  if (!Object.hasOwn(table, key)) {
    throw new StyleError('style-missing', path, `Missing palette entry "${path}"`)
  }
  const value = table[key]
  if (value === undefined) {
    throw new StyleError('style-missing', path, `Missing palette entry "${path}"`)
  }
  return value
}

export function themePalette(palette: Palette, theme: Theme): ThemePalette {
  return lookup(palette.themes, theme, `themes.${theme}`)
}

// ============================================================================
// Node styles
// ============================================================================

/** Fill/stroke/font colors for a node, checked for dark-canvas legibility */
export function resolveNodeColors(
  type: DiagramNode['type'],
  variant: DiagramNode['variant'],
  theme: Theme,
  palette: Palette,
): ColorSet {
  const variants = lookup(themePalette(palette, theme).nodes, type, `themes.${theme}.nodes.${type}`)
  const key = `themes.${theme}.nodes.${type}.${variant}`
  const colors = lookup(variants, variant, key)
  if (theme === 'dark' && !isLegibleDarkFill(colors.fill)) {
    throw new StyleError('style-illegible', `${key}.fill`, `Dark fill ${colors.fill} at "${key}.fill" is illegible on the dark canvas`)
  }
  return colors
}

/**
 * Resolve the full style for a node.
 *
 * Attribute order: shape descriptor, image reference (icon nodes), colors,
 * text and stroke attributes. Icon label backgrounds depend on the container
 * and are filled in by the edge router, not here.
 */
export function resolveNodeStyle(
  node: Pick<DiagramNode, 'type' | 'variant' | 'icon'>,
  theme: Theme,
  palette: Palette,
): ResolvedNodeStyle {
  const colors = resolveNodeColors(node.type, node.variant, theme, palette)
  const shape = attrsFromRecord(lookup(palette.shapes, node.type, `shapes.${node.type}`))

  const attrs: Array<readonly [string, string]> = [...shape]
  if (node.type === 'icon') {
    attrs.push(['image', node.icon ?? ''])
  }
  attrs.push(
    ['fillColor', colors.fill],
    ['strokeColor', colors.stroke],
    ['fontColor', colors.font],
    ['fontSize', String(palette.text.node_size)],
    ['fontFamily', palette.text.font_family],
    ['strokeWidth', String(palette.stroke_widths.node)],
  )

  return { fill: colors.fill, stroke: colors.stroke, font: colors.font, shape, attrs }
}

// ============================================================================
// Connector styles
// ============================================================================

/**
 * Resolve a connector's line attributes. A semantic `color` replaces the
 * theme's default stroke and must exist in that theme's edge color table.
 */
export function resolveEdgeStyle(
  edge: Pick<DiagramEdge, 'style' | 'color'>,
  theme: Theme,
  palette: Palette,
): ResolvedEdgeStyle {
  const themed = themePalette(palette, theme)
  const base = attrsFromRecord(lookup(palette.edges, edge.style, `edges.${edge.style}`))
  const stroke = edge.color !== undefined
    ? lookup(themed.edge.colors, edge.color, `themes.${theme}.edge.colors.${edge.color}`)
    : themed.edge.stroke

  const attrs: StyleAttrs = [
    ...base,
    ['strokeColor', stroke],
    ['strokeWidth', String(palette.stroke_widths.edge)],
    ['fontColor', themed.edge.font],
    ['fontSize', String(palette.text.edge_size)],
    ['fontFamily', palette.text.font_family],
  ]

  return { stroke, font: themed.edge.font, attrs }
}

// ============================================================================
// Containers and text
// ============================================================================

/** Group container style; an explicit group color overrides the stroke */
export function resolveGroupStyle(color: string | undefined, theme: Theme, palette: Palette): StyleAttrs {
  const colors = themePalette(palette, theme).group
  return [
    ...attrsFromRecord(palette.containers.group),
    ['fillColor', colors.fill],
    ['strokeColor', color ?? colors.stroke],
    ['fontColor', colors.font],
    ['fontSize', String(palette.text.group_size)],
    ['fontFamily', palette.text.font_family],
    ['strokeWidth', String(palette.stroke_widths.container)],
  ]
}

/** Swimlane band style; the header height comes from the spacing table */
export function resolveLaneStyle(color: string | undefined, theme: Theme, palette: Palette): StyleAttrs {
  const colors = themePalette(palette, theme).lane
  return [
    ...attrsFromRecord(palette.containers.lane),
    ['startSize', String(palette.spacing.swimlane_header)],
    ['fillColor', colors.fill],
    ['swimlaneFillColor', colors.fill],
    ['strokeColor', color ?? colors.stroke],
    ['fontColor', colors.font],
    ['fontSize', String(palette.text.lane_size)],
    ['fontFamily', palette.text.font_family],
    ['strokeWidth', String(palette.stroke_widths.container)],
  ]
}

export function resolveTextStyle(role: 'title' | 'subtitle', theme: Theme, palette: Palette): StyleAttrs {
  const themed = themePalette(palette, theme)
  const title = role === 'title'
  return [
    ['strokeColor', 'none'],
    ['fillColor', 'none'],
    ['html', '1'],
    ['align', 'left'],
    ['verticalAlign', 'middle'],
    ['whiteSpace', 'wrap'],
    ['fontSize', String(title ? palette.text.title_size : palette.text.subtitle_size)],
    ['fontStyle', title ? '1' : '0'],
    ['fontColor', title ? themed.title : themed.subtitle],
    ['fontFamily', palette.text.font_family],
  ]
}
