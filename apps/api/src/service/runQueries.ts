import {
  InvalidRequestError,
  MAX_NEIGHBORHOOD_DEPTH,
  MIN_NEIGHBORHOOD_DEPTH,
  RunNotFoundError,
  WrongRunTypeError,
  filterFindings,
  neighborhood
} from '@runboard/core'
import type { FindingCriteria, Graph, InventoryReport, ReportResult, Run, RunType, ScanReport } from '@runboard/core'
import type { ResultStore } from '../store/results.js'
import type { RunRegistry } from '../store/runs.js'
import type { Log } from '../types.js'

export interface RunResult {
  run: Run
  result: ReportResult
}

export type LatestResult = RunResult | { run: null; result: null }

export interface HistoryEntry {
  type: RunType
  date: string
  scannedPath: string | null
  errors: unknown[] | null
  run: Run
  report: ScanReport | InventoryReport | null
}

export type SubgraphResult = { state: 'pending' } | { state: 'ready'; graph: Graph }

function latest(runs: readonly Run[]): Run | null {
  let best: Run | null = null
  for (const run of runs) {
    if (!best || Date.parse(run.created) >= Date.parse(best.created)) best = run
  }
  return best
}

export class RunQueries {
  constructor(
    private readonly registry: RunRegistry,
    private readonly results: ResultStore,
    private readonly log: Log
  ) {}

  listRuns(): Run[] {
    return this.registry.list()
  }

  async getResult(id: string): Promise<RunResult> {
    const run = this.require(id)
    return { run, result: await this.results.load(run.id, run.type) }
  }

  async lastResult(type?: RunType): Promise<LatestResult> {
    const runs = this.registry.list().filter(r => !type || r.type === type)
    const run = latest(runs)
    if (!run) return { run: null, result: null }
    return { run, result: await this.results.load(run.id, run.type) }
  }

  async history(): Promise<HistoryEntry[]> {
    const entries: HistoryEntry[] = []
    for (const run of this.registry.list()) {
      let report: ScanReport | InventoryReport | null = null
      try {
        const result = await this.results.load(run.id, run.type)
        if (result.state === 'ready') report = result.report.data
      } catch (err) {
        // one unreadable report must not hide the rest of the history
        this.log.warn({ err, runId: run.id }, 'Skipping unreadable report in history')
      }
      entries.push({
        type: run.type,
        date: run.created,
        scannedPath: report && typeof report.scannedPath === 'string' ? report.scannedPath : null,
        errors: report && Array.isArray(report.errors) ? report.errors : null,
        run,
        report
      })
    }
    return entries
  }

  async filterFindings(id: string, criteria: FindingCriteria): Promise<RunResult> {
    const run = this.require(id)
    if (run.type !== 'scan') throw new WrongRunTypeError('scan')
    const result = await this.results.load(run.id, run.type)
    if (result.state === 'pending') return { run, result }
    const { report } = result
    if (report.type !== 'scan') throw new WrongRunTypeError('scan')
    const findings = filterFindings(report, criteria)
    return { run, result: { state: 'ready', report: { type: 'scan', data: { ...report.data, findings } } } }
  }

  async subgraph(id: string, node: string, depth: number): Promise<SubgraphResult> {
    const run = this.require(id)
    if (run.type !== 'inventory') throw new WrongRunTypeError('inventory')
    if (!node) throw new InvalidRequestError('node is required')
    if (!Number.isInteger(depth) || depth < MIN_NEIGHBORHOOD_DEPTH || depth > MAX_NEIGHBORHOOD_DEPTH) {
      throw new InvalidRequestError(`depth must be an integer between ${MIN_NEIGHBORHOOD_DEPTH} and ${MAX_NEIGHBORHOOD_DEPTH}`)
    }
    const result = await this.results.load(run.id, run.type)
    if (result.state === 'pending') return result
    const { report } = result
    if (report.type !== 'inventory') throw new WrongRunTypeError('inventory')
    return { state: 'ready', graph: neighborhood(report.data.graph, node, depth) }
  }

  private require(id: string): Run {
    const run = this.registry.lookup(id)
    if (!run) throw new RunNotFoundError(id)
    return run
  }
}
