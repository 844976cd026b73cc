import type { GraphEdge, GraphNode } from './types.js'

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

const isKey = (value: unknown): value is string | number =>
  typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value))

export function isGraphNode(value: unknown): value is GraphNode {
  return isRecord(value) && isKey(value.id)
}

export function isGraphEdge(value: unknown): value is GraphEdge {
  return isRecord(value) && isKey(value.source) && isKey(value.target)
}
