import { describe, it, expect } from 'vitest'
import { neighborhood } from '../src/graph/neighborhood.js'
import { isRecord } from '../src/records.js'
import type { Graph } from '../src/types.js'

// A - B - C - D, with edges pointing in mixed directions
const path: Graph = {
  nodes: [{ id: 'A' }, { id: 'B' }, { id: 'C' }, { id: 'D' }],
  edges: [
    { source: 'A', target: 'B' },
    { source: 'C', target: 'B' },
    { source: 'C', target: 'D' }
  ]
}

const ids = (g: Graph) => g.nodes.map(n => (isRecord(n) ? n.id : n))

describe('neighborhood', () => {
  it('takes one hop', () => {
    const sub = neighborhood(path, 'A', 1)
    expect(ids(sub)).toEqual(['A', 'B'])
    expect(sub.edges).toEqual([{ source: 'A', target: 'B' }])
  })

  it('walks edges against their direction', () => {
    const sub = neighborhood(path, 'A', 2)
    expect(ids(sub)).toEqual(['A', 'B', 'C'])
    expect(sub.edges).toEqual([
      { source: 'A', target: 'B' },
      { source: 'C', target: 'B' }
    ])
  })

  it('starts from the middle in both directions', () => {
    expect(ids(neighborhood(path, 'C', 1))).toEqual(['B', 'C', 'D'])
  })

  it('stops when the graph is exhausted', () => {
    const sub = neighborhood(path, 'D', 5)
    expect(ids(sub)).toEqual(['A', 'B', 'C', 'D'])
    expect(sub.edges).toHaveLength(3)
  })

  it('keeps only edges with both endpoints reached', () => {
    const tri: Graph = {
      nodes: [{ id: 'S' }, { id: 'X' }, { id: 'Y' }, { id: 'Z' }],
      edges: [
        { source: 'S', target: 'X' },
        { source: 'S', target: 'Y' },
        { source: 'X', target: 'Y' },
        { source: 'Y', target: 'Z' }
      ]
    }
    const sub = neighborhood(tri, 'S', 1)
    expect(ids(sub)).toEqual(['S', 'X', 'Y'])
    expect(sub.edges).toEqual([
      { source: 'S', target: 'X' },
      { source: 'S', target: 'Y' },
      { source: 'X', target: 'Y' }
    ])
  })

  it('returns an isolated seed alone', () => {
    const g: Graph = { nodes: [{ id: 'solo', label: 'x' }], edges: [] }
    expect(neighborhood(g, 'solo', 3)).toEqual({ nodes: [{ id: 'solo', label: 'x' }], edges: [] })
  })

  it('matches numeric ids by their string form and skips unusable entries', () => {
    const g: Graph = {
      nodes: [{ id: 7 }, 'stray', { label: 'no id' }, { id: 'B' }, { id: 9 }],
      edges: [{ source: 7, target: 'B' }, { source: 'B' }, 'junk', { source: 'B', target: 9 }]
    }
    expect(neighborhood(g, '7', 1)).toEqual({ nodes: [{ id: 7 }, { id: 'B' }], edges: [{ source: 7, target: 'B' }] })
    expect(ids(neighborhood(g, '7', 2))).toEqual([7, 'B', 9])
    expect(neighborhood(g, 'stray', 1)).toEqual({ nodes: [], edges: [] })
  })

  it('returns an empty graph for an unknown seed', () => {
    expect(neighborhood(path, 'nope', 2)).toEqual({ nodes: [], edges: [] })
  })
})
