export type RunType = 'scan' | 'inventory'

export const RUN_TYPES: readonly RunType[] = ['scan', 'inventory']

export type RunStatus = 'pending' | 'done' | 'error'

export type TerminalStatus = Exclude<RunStatus, 'pending'>

export interface Run {
  readonly id: string
  type: RunType
  // ISO-8601, UTC
  created: string
  status: RunStatus
  path: string
}

// The fields the server reads; a finding may carry any others.
export interface Finding {
  severity: string
  owaspId?: string
  location?: string
  [key: string]: unknown
}

export interface ScanReport {
  // entries in any other shape are carried through untouched
  findings: unknown[]
  scannedPath?: string | null
  errors?: unknown[] | null
  [key: string]: unknown
}

export interface GraphNode {
  id: string | number
  [key: string]: unknown
}

export interface GraphEdge {
  source: string | number
  target: string | number
  [key: string]: unknown
}

/** Nodes without an id and edges without both endpoints stay in place but are never traversed. */
export interface Graph {
  nodes: unknown[]
  edges: unknown[]
}

export interface InventoryReport {
  graph: Graph
  [key: string]: unknown
}

export type Report =
  | { type: 'scan'; data: ScanReport }
  | { type: 'inventory'; data: InventoryReport }

export type ReportResult =
  | { state: 'pending' }
  | { state: 'ready'; report: Report }

export interface FindingCriteria {
  severity?: string
  owaspId?: string
  component?: string
}
