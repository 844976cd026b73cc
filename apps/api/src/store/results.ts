import path from 'node:path'
import { mkdir } from 'node:fs/promises'
import { MalformedReportError, WorkspaceGuard, isGraphEdge, isGraphNode, isRecord, relocateFindings } from '@runboard/core'
import type { InventoryReport, ReportResult, RunType, ScanReport } from '@runboard/core'
import { readTextIfExists } from '../fs/files.js'
import type { Log } from '../types.js'

export const REPORT_FILES: Record<RunType, string> = {
  scan: 'scan_report.json',
  inventory: 'inventory.json'
}

export class ResultStore {
  private readonly guard: WorkspaceGuard

  constructor(readonly dataDir: string, private readonly log: Log) {
    this.guard = new WorkspaceGuard(dataDir)
  }

  // One sandbox subdirectory per run; uploads and the report both live there.
  runDir(runId: string): string {
    return this.guard.resolve(runId)
  }

  reportPath(runId: string, type: RunType): string {
    return path.join(this.runDir(runId), REPORT_FILES[type])
  }

  async ensureRunDir(runId: string): Promise<string> {
    const dir = this.runDir(runId)
    await mkdir(dir, { recursive: true })
    return dir
  }

  async load(runId: string, type: RunType): Promise<ReportResult> {
    const text = await readTextIfExists(this.reportPath(runId, type))
    if (text === null) return { state: 'pending' }
    let raw: unknown
    try {
      raw = JSON.parse(text)
    } catch {
      throw new MalformedReportError(runId, 'not valid JSON')
    }
    if (type === 'scan') return { state: 'ready', report: { type, data: this.toScan(runId, raw) } }
    return { state: 'ready', report: { type, data: this.toInventory(runId, raw) } }
  }

  private toScan(runId: string, raw: unknown): ScanReport {
    if (!isRecord(raw) || !Array.isArray(raw.findings)) throw new MalformedReportError(runId, "scan report missing 'findings'")
    const entries: unknown[] = raw.findings
    const { findings, rewritten, skipped } = relocateFindings(entries, this.runDir(runId))
    if (skipped) this.log.warn({ runId, skipped }, 'Left finding locations unchanged')
    this.log.debug({ runId, findings: findings.length, rewritten }, 'Scan report loaded')
    return {
      ...raw,
      findings,
      scannedPath: typeof raw.scannedPath === 'string' ? raw.scannedPath : null,
      errors: Array.isArray(raw.errors) ? raw.errors : null
    }
  }

  private toInventory(runId: string, raw: unknown): InventoryReport {
    const graph = isRecord(raw) ? raw.graph : undefined
    if (!isRecord(raw) || !isRecord(graph) || !Array.isArray(graph.nodes) || !Array.isArray(graph.edges)) {
      throw new MalformedReportError(runId, "inventory report missing 'graph.nodes' or 'graph.edges'")
    }
    const nodes: unknown[] = graph.nodes
    const edges: unknown[] = graph.edges
    const untraversableNodes = nodes.filter(n => !isGraphNode(n)).length
    const untraversableEdges = edges.filter(e => !isGraphEdge(e)).length
    if (untraversableNodes || untraversableEdges) {
      this.log.warn({ runId, untraversableNodes, untraversableEdges }, 'Graph records without usable ids are skipped in traversal')
    }
    return { ...raw, graph: { ...graph, nodes, edges } }
  }
}
