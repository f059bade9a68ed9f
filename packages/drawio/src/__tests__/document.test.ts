// ============================================================================
// Document tests: cell order, parenting, labels, serialization, determinism
// ============================================================================

import { describe, it, expect } from 'vitest'
import { generateDiagram } from '../generate.ts'
import { checkDocument } from '../checker.ts'
import { escapeXml, formatNumber } from '../serializer.ts'
import { nodeLabel, type MxCell } from '../document.ts'
import { LAYOUT_KINDS } from '../types.ts'

const scenarioA = {
  title: 'Release',
  layout: 'linear',
  nodes: [
    { id: 'start', label: 'Start', type: 'start' },
    { id: 'A', label: 'Build', type: 'process' },
    { id: 'B', label: 'Test', type: 'process', detail: 'unit + e2e' },
    { id: 'end', label: 'Ship', type: 'end' },
  ],
  edges: [
    { from: 'start', to: 'A' },
    { from: 'A', to: 'B' },
    { from: 'B', to: 'end' },
  ],
}

function cell(cells: MxCell[], id: string): MxCell {
  const found = cells.find(c => c.id === id)
  if (!found) throw new Error(`no cell ${id}`)
  return found
}

describe('buildDocument', () => {
  const { document } = generateDiagram(scenarioA)

  it('orders root, layer, title, edges, then nodes', () => {
    expect(document.cells.map(c => c.id)).toEqual([
      '0', '1', '__title', '__edge_0', '__edge_1', '__edge_2', 'start', 'A', 'B', 'end',
    ])
  })

  it('keeps edges in source order with node references', () => {
    const edges = document.cells.flatMap(c => c.kind === 'edge' ? [[c.source, c.target]] : [])
    expect(edges).toEqual([['start', 'A'], ['A', 'B'], ['B', 'end']])
  })

  it('stacks the four nodes with equal gaps', () => {
    const ys = ['start', 'A', 'B', 'end'].map((id) => {
      const c = cell(document.cells, id)
      return c.kind === 'vertex' ? c.geometry : null
    })
    // the detail line makes B 20px taller
    expect(ys.map(g => g?.y)).toEqual([100, 216, 336, 476])
    expect(ys.map(g => g?.height)).toEqual([56, 60, 80, 56])
  })

  it('renders a detail line as an HTML label', () => {
    const b = cell(document.cells, 'B')
    expect(b.kind === 'vertex' && b.value).toBe(
      "Test<br><font style='font-size:10px;color:#64748B'>unit + e2e</font>",
    )
  })

  it('escapes labels for HTML', () => {
    expect(nodeLabel({ label: 'A & <B>' }, '#000000', 10)).toBe('A &amp; &lt;B&gt;')
  })

  it('has no canvas background for the light theme', () => {
    expect(document.background).toBeUndefined()
  })
})

describe('containers', () => {
  it('parents group members to the group with relative geometry', () => {
    const { document } = generateDiagram({
      ...scenarioA,
      groups: [{ id: 'ci', label: 'CI', members: ['A', 'B'] }],
    })
    const group = cell(document.cells, '__group_ci')
    expect(group.kind === 'vertex' && group.parent).toBe('1')
    expect(group.kind === 'vertex' && group.geometry).toEqual({ x: 416, y: 192, width: 268, height: 248 })

    const a = cell(document.cells, 'A')
    expect(a.kind === 'vertex' && a.parent).toBe('__group_ci')
    expect(a.kind === 'vertex' && a.geometry).toEqual({ x: 24, y: 24, width: 220, height: 60 })

    // A→B lies inside the group, the others cross its border
    const parents = document.cells.flatMap(c => c.kind === 'edge' ? [c.parent] : [])
    expect(parents).toEqual(['1', '__group_ci', '1'])
  })

  it('parents lane members to the lane band', () => {
    const { document, xml } = generateDiagram({
      title: 'Flow',
      layout: 'swimlane',
      theme: 'dark',
      lanes: [{ id: 'ops', label: 'Ops' }],
      nodes: [{ id: 'a', label: 'A', type: 'process' }],
    })
    const a = cell(document.cells, 'a')
    expect(a.kind === 'vertex' && a.parent).toBe('__lane_ops')
    expect(a.kind === 'vertex' && a.geometry).toEqual({ x: 32, y: 76, width: 220, height: 60 })
    expect(document.background).toBe('#0F172A')
    expect(xml).toContain('shadow="0" background="#0F172A">')
  })

  it('keeps edges off a lane when one end sits in a group spanning lanes', () => {
    const { document } = generateDiagram({
      title: 'Flow',
      layout: 'swimlane',
      lanes: [{ id: 'L1', label: 'L1' }, { id: 'L2', label: 'L2' }],
      nodes: [
        { id: 'a', label: 'A', type: 'process', lane: 'L1' },
        { id: 'c', label: 'C', type: 'process', lane: 'L1' },
        { id: 'd', label: 'D', type: 'process', lane: 'L1' },
        { id: 'b', label: 'B', type: 'process', lane: 'L2' },
      ],
      edges: [{ from: 'a', to: 'c' }, { from: 'c', to: 'd' }],
      groups: [{ id: 'g0', label: 'G', members: ['a', 'b'] }],
    })
    const group = cell(document.cells, '__group_g0')
    expect(group.kind === 'vertex' && group.parent).toBe('1')

    const parents = document.cells.flatMap(c => c.kind === 'edge' ? [c.parent] : [])
    expect(parents).toEqual(['1', '__lane_L1'])
  })
})

describe('renderDocument', () => {
  const { xml } = generateDiagram(scenarioA)

  it('wraps cells in mxfile > diagram > mxGraphModel > root', () => {
    const lines = xml.split('\n')
    expect(lines[0]).toBe('<mxfile host="boxwright">')
    expect(lines[1]).toMatch(/^ {2}<diagram id="[0-9a-f]{16}" name="Release">$/)
    expect(lines[3]).toBe('      <root>')
    expect(lines[4]).toBe('        <mxCell id="0" />')
    expect(lines[5]).toBe('        <mxCell id="1" parent="0" />')
  })

  it('writes edge cells with relative geometry', () => {
    expect(xml).toContain(
      '<mxCell id="__edge_0" value="" style="edgeStyle=orthogonalEdgeStyle;rounded=1;orthogonalLoop=1;jettySize=auto;'
      + 'endArrow=block;endFill=1;html=1;strokeColor=#64748B;strokeWidth=1.5;fontColor=#334155;fontSize=11;fontFamily=Helvetica;'
      + 'exitX=0.5;exitY=1;exitDx=0;exitDy=0;entryX=0.5;entryY=0;entryDx=0;entryDy=0;" edge="1" parent="1" source="start" target="A">',
    )
  })

  it('escapes HTML labels again for XML', () => {
    expect(xml).toContain(
      'value="Test&lt;br&gt;&lt;font style=&#39;font-size:10px;color:#64748B&#39;&gt;unit + e2e&lt;/font&gt;"',
    )
  })

  it('formats numbers without -0 or float noise', () => {
    expect(formatNumber(-0)).toBe('0')
    expect(formatNumber(0.1 + 0.2)).toBe('0.3')
    expect(formatNumber(302.5)).toBe('302.5')
    expect(escapeXml(`<"'&>`)).toBe('&lt;&quot;&#39;&amp;&gt;')
  })

  it('produces byte-identical output for identical input', () => {
    const again = generateDiagram(structuredClone(scenarioA)).xml
    expect(again).toBe(xml)
  })
})

describe('checkDocument', () => {
  const wrap = (cells: string) =>
    `<mxfile><diagram id="d" name="p"><mxGraphModel><root>${cells}</root></mxGraphModel></diagram></mxfile>`
  const vertex = (id: string, parent = '1') =>
    `<mxCell id="${id}" value="" vertex="1" parent="${parent}"><mxGeometry x="0" y="0" width="10" height="10" as="geometry" /></mxCell>`
  const edge = (id: string, source: string, target: string) =>
    `<mxCell id="${id}" edge="1" parent="1" source="${source}" target="${target}"><mxGeometry relative="1" as="geometry" /></mxCell>`
  const layers = '<mxCell id="0" /><mxCell id="1" parent="0" />'

  it('accepts every generated layout', () => {
    for (const layout of LAYOUT_KINDS) {
      const input = {
        title: layout,
        layout,
        nodes: [
          { id: 'a', label: 'A', type: 'process' },
          { id: 'b', label: 'B', type: 'decision' },
          { id: 'c', label: 'C', type: 'icon', icon: 'icons/c.svg' },
        ],
        edges: [{ from: 'a', to: 'b' }, { from: 'a', to: 'c', label: 'x' }],
        groups: [{ label: 'G', members: ['a', 'b'] }],
        ...(layout === 'swimlane' && { lanes: [{ id: 'l1', label: 'L1' }] }),
      }
      expect(checkDocument(generateDiagram(input).xml)).toEqual([])
    }
  })

  it('reports text that is not well-formed', () => {
    expect(checkDocument('<mxfile><diagram>').map(i => i.code)).toEqual(['malformed'])
  })

  it('reports control characters that XMLValidator lets through', () => {
    expect(checkDocument('<mxfile>\n  <diagram name="a\u0007" />\n</mxfile>')).toEqual([
      { code: 'malformed', message: 'Control character U+0007 is not allowed (line 2, column 19)' },
    ])
  })

  it('reports a missing diagram', () => {
    expect(checkDocument('<mxfile></mxfile>').map(i => i.code)).toEqual(['structure'])
  })

  it('reports duplicate ids, unknown parents and dangling edges', () => {
    const issues = checkDocument(wrap(layers + edge('e', 'a', 'zz') + vertex('a') + vertex('a') + vertex('b', 'nope')))
    expect(issues.map(i => [i.code, i.cellId])).toEqual([
      ['duplicate-id', 'a'],
      ['dangling-edge', 'e'],
      ['unknown-parent', 'b'],
    ])
  })

  it('reports edges emitted after their nodes', () => {
    const issues = checkDocument(wrap(layers + vertex('a') + vertex('b') + edge('e', 'a', 'b')))
    expect(issues).toEqual([{ code: 'edge-after-node', message: 'Edge "e" is emitted after node cells', cellId: 'e' }])
  })

  it('reports vertices without geometry', () => {
    const issues = checkDocument(wrap(`${layers}<mxCell id="a" vertex="1" parent="1" />`))
    expect(issues.map(i => i.code)).toEqual(['missing-geometry'])
  })
})
