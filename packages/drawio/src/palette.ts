import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import { zodErrorToIssues, type ValidationIssue } from '@boxwright/shared'
import { ConfigError } from './errors.ts'

// ============================================================================
// Palette: the read-only style/dimension resource.
//
// One JSON document holds page geometry, spacing, node dimensions, shape
// descriptors, connector styles and a color table per theme. It is validated
// once, deep-frozen and then threaded explicitly through layout, styling and
// routing. Nothing in the engine reads it from ambient state.
// ============================================================================

/** Minimum value the brightest channel of a dark-theme fill must reach */
export const DARK_FILL_MIN_CHANNEL = 70

export const DEFAULT_PALETTE_PATH = fileURLToPath(new URL('../config/palette.json', import.meta.url))

// ============================================================================
// Zod schema
// ============================================================================

const ColorSchema = z.string().regex(/^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/, 'Expected a #RGB or #RRGGBB color')

/** Style attribute values end up inside `key=value;`; neither separator may appear */
const AttrMapSchema = z.record(
  z.string().regex(/^[A-Za-z][\w.]*$/, 'Invalid style attribute name'),
  z.string().regex(/^[^;=]*$/, 'Style attribute values cannot contain ";" or "="'),
)

const PositiveInt = z.number().int().positive()
const NonNegativeInt = z.number().int().min(0)

const ColorSetSchema = z.object({
  fill: ColorSchema,
  stroke: ColorSchema,
  font: ColorSchema,
})

const ThemePaletteSchema = z.object({
  background: ColorSchema,
  detail_text: ColorSchema,
  title: ColorSchema,
  subtitle: ColorSchema,
  group: ColorSetSchema,
  lane: ColorSetSchema,
  edge: z.object({
    stroke: ColorSchema,
    font: ColorSchema,
    colors: z.record(z.string(), ColorSchema),
  }),
  /** type → variant → colors */
  nodes: z.record(z.string(), z.record(z.string(), ColorSetSchema)),
})

export const PaletteSchema = z.object({
  page: z.object({
    width: PositiveInt,
    content_left: NonNegativeInt,
    content_right: PositiveInt,
    min_height: PositiveInt,
    margin: NonNegativeInt,
    title_top: NonNegativeInt,
  }).refine(p => p.content_right > p.content_left && p.content_right <= p.width, {
    message: 'content_right must lie between content_left and the page width',
  }),
  spacing: z.object({
    h_gap: NonNegativeInt,
    v_gap: NonNegativeInt,
    group_padding: NonNegativeInt,
    title_bottom_margin: NonNegativeInt,
    swimlane_header: NonNegativeInt,
    swimlane_padding: NonNegativeInt,
    detail_extra_height: NonNegativeInt,
  }),
  text: z.object({
    font_family: z.string().regex(/^[^;=]+$/),
    node_size: PositiveInt,
    detail_size: PositiveInt,
    edge_size: PositiveInt,
    group_size: PositiveInt,
    lane_size: PositiveInt,
    title_size: PositiveInt,
    subtitle_size: PositiveInt,
  }),
  stroke_widths: z.object({
    node: z.number().positive(),
    edge: z.number().positive(),
    container: z.number().positive(),
  }),
  dimensions: z.record(z.string(), z.tuple([PositiveInt, PositiveInt])),
  shapes: z.record(z.string(), AttrMapSchema),
  containers: z.object({
    group: AttrMapSchema,
    lane: AttrMapSchema,
  }),
  edges: z.record(z.string(), AttrMapSchema),
  themes: z.record(z.string(), ThemePaletteSchema),
})

export type Palette = z.infer<typeof PaletteSchema>
export type ThemePalette = z.infer<typeof ThemePaletteSchema>
export type ColorSet = z.infer<typeof ColorSetSchema>

// ============================================================================
// Color helpers
// ============================================================================

/** Parse #RGB / #RRGGBB into channel values, or null when the text is not a hex color */
export function parseHexColor(color: string): { r: number; g: number; b: number } | null {
  const match = /^#([0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/.exec(color)
  if (!match?.[1]) return null
  const hex = match[1].length === 3
    ? match[1].split('').map(c => c + c).join('')
    : match[1]
  return {
    r: parseInt(hex.slice(0, 2), 16),
    g: parseInt(hex.slice(2, 4), 16),
    b: parseInt(hex.slice(4, 6), 16),
  }
}

/**
 * A dark-theme fill stays distinguishable from a near-black canvas only when
 * its brightest channel reaches DARK_FILL_MIN_CHANNEL.
 */
export function isLegibleDarkFill(color: string): boolean {
  const rgb = parseHexColor(color)
  if (!rgb) return false
  return Math.max(rgb.r, rgb.g, rgb.b) >= DARK_FILL_MIN_CHANNEL
}

// ============================================================================
// Validation & loading
// ============================================================================

/**
 * Report every dark-theme node fill that breaks the legibility rule.
 * The palette is never corrected; a defective entry is a configuration bug.
 */
export function checkPalette(palette: Palette, file = 'palette.json'): ValidationIssue[] {
  const issues: ValidationIssue[] = []
  const dark = palette.themes['dark']
  if (!dark) return issues

  for (const [type, variants] of Object.entries(dark.nodes)) {
    for (const [variant, colors] of Object.entries(variants)) {
      if (isLegibleDarkFill(colors.fill)) continue
      issues.push({
        file,
        path: `themes.dark.nodes.${type}.${variant}.fill`,
        message: `Dark fill ${colors.fill} has no channel >= ${DARK_FILL_MIN_CHANNEL}`,
        severity: 'error',
        suggestion: 'Use a lighter shade so the fill reads as colored on the dark canvas',
      })
    }
  }
  return issues
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
  }
  return value
}

/**
 * Validate an in-memory palette object. Returns a deep-frozen copy.
 * @throws ConfigError when the shape is wrong or a dark fill is illegible
 */
export function parsePalette(value: unknown, file = 'palette.json'): Palette {
  const result = PaletteSchema.safeParse(value)
  if (!result.success) {
    const issues = zodErrorToIssues(result.error, file)
    throw new ConfigError(`Invalid palette ${file}: ${issues[0]?.path}: ${issues[0]?.message}`, issues)
  }

  const issues = checkPalette(result.data, file)
  if (issues.length > 0) {
    throw new ConfigError(`Invalid palette ${file}: ${issues.map(i => i.path).join(', ')} illegible on dark canvas`, issues)
  }

  return deepFreeze(result.data)
}

/**
 * Read and validate a palette JSON file.
 * @throws ConfigError when the file is unreadable, not JSON or invalid
 */
export function loadPalette(path: string = DEFAULT_PALETTE_PATH): Palette {
  let content: unknown
  try {
    content = JSON.parse(readFileSync(path, 'utf-8'))
  } catch (e) {
    const message = e instanceof Error ? e.message : 'Unknown error'
    throw new ConfigError(`Cannot read palette ${path}: ${message}`, [{
      file: path,
      path: '',
      message,
      severity: 'error',
    }])
  }
  return parsePalette(content, path)
}

let defaultPalette: Palette | null = null

/** The bundled palette, loaded once and shared by every invocation */
export function getDefaultPalette(): Palette {
  defaultPalette ??= loadPalette()
  return defaultPalette
}
