import { isGraphEdge, isGraphNode } from '../records.js'
import type { Graph } from '../types.js'

export const MIN_NEIGHBORHOOD_DEPTH = 1
export const MAX_NEIGHBORHOOD_DEPTH = 5

/**
 * Induced subgraph within `depth` hops of `seedId`.
 *
 * Edges are walked in both directions. Ids compare by their string form, so a
 * numeric id `7` is reached from the seed `'7'`. Nodes without a usable id and
 * edges without usable endpoints are never traversed or returned. The result
 * keeps the input order of nodes and edges, and only keeps edges whose two
 * endpoints were both reached. An unknown seed yields an empty graph. Depth
 * bounds are the caller's concern.
 */
export function neighborhood(graph: Graph, seedId: string, depth: number): Graph {
  const nodes = graph.nodes.filter(isGraphNode)
  const edges = graph.edges.filter(isGraphEdge)
  if (!nodes.some(n => String(n.id) === seedId)) return { nodes: [], edges: [] }

  const adjacency = new Map<string, string[]>()
  const link = (from: string, to: string) => {
    const list = adjacency.get(from)
    if (list) list.push(to)
    else adjacency.set(from, [to])
  }
  for (const e of edges) {
    link(String(e.source), String(e.target))
    link(String(e.target), String(e.source))
  }

  const visited = new Set<string>([seedId])
  let frontier = [seedId]
  for (let hop = 0; hop < depth && frontier.length > 0; hop++) {
    const next: string[] = []
    for (const id of frontier) {
      for (const peer of adjacency.get(id) ?? []) {
        if (visited.has(peer)) continue
        visited.add(peer)
        next.push(peer)
      }
    }
    frontier = next
  }

  return {
    nodes: nodes.filter(n => visited.has(String(n.id))),
    edges: edges.filter(e => visited.has(String(e.source)) && visited.has(String(e.target)))
  }
}
