// ============================================================================
// Style resolver and palette tests
// ============================================================================

import { describe, it, expect } from 'vitest'
import {
  resolveEdgeStyle,
  resolveNodeColors,
  resolveNodeStyle,
  styleToString,
  withAttr,
  lookup,
} from '../styles.ts'
import {
  checkPalette,
  getDefaultPalette,
  isLegibleDarkFill,
  loadPalette,
  parseHexColor,
  parsePalette,
  type Palette,
} from '../palette.ts'
import { ConfigError, StyleError } from '../errors.ts'
import { VARIANTS, NODE_TYPES } from '../types.ts'

const palette = getDefaultPalette()

/** Mutable copy of the bundled palette with one dark fill replaced */
function withDarkFill(fill: string): Palette {
  const copy = structuredClone(palette)
  const process = copy.themes['dark']?.nodes['process']?.['primary']
  if (!process) throw new Error('bundled palette has no dark process fill')
  process.fill = fill
  return copy
}

function styleError(run: () => unknown): StyleError {
  try {
    run()
  } catch (e) {
    if (e instanceof StyleError) return e
    throw e
  }
  throw new Error('expected a StyleError')
}

describe('attribute helpers', () => {
  it('renders attributes in order as key=value;', () => {
    expect(styleToString([['a', '1'], ['b', 'x']])).toBe('a=1;b=x;')
  })

  it('replaces an existing attribute in place', () => {
    expect(withAttr([['a', '1'], ['b', '2']], 'a', '9')).toEqual([['a', '9'], ['b', '2']])
    expect(withAttr([['a', '1']], 'c', '3')).toEqual([['a', '1'], ['c', '3']])
  })

  it('never matches prototype keys', () => {
    expect(() => lookup({}, 'constructor', 'shapes.constructor')).toThrow(StyleError)
  })
})

describe('resolveNodeStyle', () => {
  it('combines the shape descriptor with theme colors', () => {
    const style = resolveNodeStyle({ type: 'process', variant: 'primary' }, 'light', palette)
    expect(style.fill).toBe('#DBEAFE')
    expect(styleToString(style.attrs)).toBe(
      'rounded=1;arcSize=12;whiteSpace=wrap;html=1;'
      + 'fillColor=#DBEAFE;strokeColor=#2563EB;fontColor=#1E3A8A;'
      + 'fontSize=13;fontFamily=Helvetica;strokeWidth=1.5;',
    )
  })

  it('puts the icon reference into image=', () => {
    const style = resolveNodeStyle({ type: 'icon', variant: 'primary', icon: 'icons/db.svg' }, 'light', palette)
    expect(style.attrs.find(([key]) => key === 'image')).toEqual(['image', 'icons/db.svg'])
  })

  it('resolves every variant of every node type in both themes', () => {
    for (const theme of ['light', 'dark'] as const) {
      for (const type of NODE_TYPES) {
        for (const variant of VARIANTS) {
          expect(() => resolveNodeColors(type, variant, theme, palette)).not.toThrow()
        }
      }
    }
    expect(resolveNodeColors('start', 'secondary', 'light', palette).fill).toBe('#F1F5F9')
  })

  it('fails with the missing key instead of substituting a color', () => {
    const copy = structuredClone(palette)
    delete copy.themes['light']?.nodes['decision']?.['danger']
    const error = styleError(() => resolveNodeStyle({ type: 'decision', variant: 'danger' }, 'light', copy))
    expect(error.code).toBe('style-missing')
    expect(error.key).toBe('themes.light.nodes.decision.danger')
  })

  it('rejects an illegible dark fill', () => {
    const error = styleError(() => resolveNodeColors('process', 'primary', 'dark', withDarkFill('#202020')))
    expect(error.code).toBe('style-illegible')
    expect(error.key).toBe('themes.dark.nodes.process.primary.fill')
  })

  it('resolves every bundled dark fill to a legible color', () => {
    for (const type of NODE_TYPES) {
      for (const variant of VARIANTS) {
        const { fill } = resolveNodeColors(type, variant, 'dark', palette)
        const rgb = parseHexColor(fill)
        expect(rgb).not.toBeNull()
        if (rgb) expect(Math.max(rgb.r, rgb.g, rgb.b)).toBeGreaterThanOrEqual(70)
      }
    }
  })
})

describe('resolveEdgeStyle', () => {
  it('overrides the stroke with a semantic color', () => {
    const style = resolveEdgeStyle({ style: 'dashed', color: 'red' }, 'light', palette)
    expect(style.stroke).toBe('#DC2626')
    expect(styleToString(style.attrs)).toBe(
      'dashed=1;endArrow=block;endFill=1;html=1;'
      + 'strokeColor=#DC2626;strokeWidth=1.5;fontColor=#334155;fontSize=11;fontFamily=Helvetica;',
    )
  })

  it('uses the theme stroke without a color', () => {
    expect(resolveEdgeStyle({ style: 'solid' }, 'dark', palette).stroke).toBe('#94A3B8')
  })

  it('fails on an unknown semantic color', () => {
    const error = styleError(() => resolveEdgeStyle({ style: 'solid', color: 'teal' }, 'light', palette))
    expect(error.key).toBe('themes.light.edge.colors.teal')
  })
})

describe('palette', () => {
  it('parses hex colors', () => {
    expect(parseHexColor('#abc')).toEqual({ r: 170, g: 187, b: 204 })
    expect(parseHexColor('#1E40AF')).toEqual({ r: 30, g: 64, b: 175 })
    expect(parseHexColor('blue')).toBeNull()
  })

  it('draws the legibility line at a channel of 70', () => {
    expect(isLegibleDarkFill('#464646')).toBe(true)
    expect(isLegibleDarkFill('#454545')).toBe(false)
  })

  it('ships a palette with no illegible dark fills', () => {
    expect(checkPalette(palette)).toEqual([])
  })

  it('freezes the loaded palette', () => {
    expect(Object.isFrozen(palette)).toBe(true)
    expect(Object.isFrozen(palette.themes)).toBe(true)
  })

  it('rejects a palette with an illegible dark fill', () => {
    try {
      parsePalette(withDarkFill('#111111'), 'custom.json')
      expect.unreachable('parsePalette should throw')
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError)
      if (e instanceof ConfigError) {
        expect(e.issues.map(i => i.path)).toEqual(['themes.dark.nodes.process.primary.fill'])
      }
    }
  })

  it('rejects style values containing a separator', () => {
    const copy = structuredClone(palette)
    copy.edges['solid'] = { endArrow: 'block;fillColor=red' }
    expect(() => parsePalette(copy)).toThrow(ConfigError)
  })

  it('reports an unreadable palette file as a ConfigError', () => {
    expect(() => loadPalette('/nonexistent/palette.json')).toThrow(ConfigError)
  })
})
