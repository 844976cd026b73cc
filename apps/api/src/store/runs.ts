import { DuplicateRunError, RUN_TYPES, isRecord, isTerminal, transition } from '@runboard/core'
import type { Run, RunStatus, TerminalStatus } from '@runboard/core'
import { RegistryLoadError } from '../errors.js'
import { readTextIfExists, writeFileAtomic } from '../fs/files.js'
import type { Log } from '../types.js'

export interface RunRegistry {
  create(run: Run): Promise<Run>
  list(): Run[]
  lookup(id: string): Run | undefined
  /** Never rejects: completion handlers call it and must not crash. */
  setStatus(id: string, status: TerminalStatus): Promise<void>
}

const STATUSES: readonly RunStatus[] = ['pending', 'done', 'error']

export function isRun(value: unknown): value is Run {
  if (!isRecord(value)) return false
  return typeof value.id === 'string' && value.id.length > 0
    && RUN_TYPES.some(t => t === value.type)
    && typeof value.created === 'string'
    && STATUSES.some(s => s === value.status)
    && typeof value.path === 'string'
}

/**
 * Ordered run records owned by a single instance. Every mutation happens
 * synchronously in memory; subclasses mirror the result to storage in
 * `persist`.
 */
export class MemoryRunRegistry implements RunRegistry {
  protected runs: Run[] = []

  constructor(protected readonly log: Log, initial: readonly Run[] = []) {
    for (const run of initial) {
      if (this.indexOf(run.id) !== -1) {
        log.warn({ runId: run.id }, 'Skipping duplicate run record')
        continue
      }
      this.runs.push({ ...run })
    }
  }

  async create(run: Run): Promise<Run> {
    if (this.indexOf(run.id) !== -1) throw new DuplicateRunError(run.id)
    const record: Run = { ...run, status: 'pending' }
    this.runs.push(record)
    try {
      await this.persist()
    } catch (err) {
      this.runs = this.runs.filter(r => r !== record)
      throw err
    }
    return { ...record }
  }

  list(): Run[] {
    return this.runs.map(r => ({ ...r }))
  }

  lookup(id: string): Run | undefined {
    const run = this.runs.find(r => r.id === id)
    return run ? { ...run } : undefined
  }

  async setStatus(id: string, status: TerminalStatus): Promise<void> {
    const idx = this.indexOf(id)
    const current = this.runs[idx]
    if (idx === -1 || !current) {
      this.log.warn({ runId: id, status }, 'Status update for unknown run ignored')
      return
    }
    if (isTerminal(current.status)) {
      this.log.warn({ runId: id, from: current.status, to: status }, 'Run already finished; status left unchanged')
      return
    }
    this.runs[idx] = transition(current, status)
    try {
      await this.persist()
    } catch (err) {
      this.log.error({ err, runId: id, status }, 'Failed to persist run status')
    }
  }

  protected indexOf(id: string): number {
    return this.runs.findIndex(r => r.id === id)
  }

  protected async persist(): Promise<void> {}
}

export async function loadRuns(file: string, log: Log): Promise<Run[]> {
  const text = await readTextIfExists(file)
  if (text === null) return []
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    throw new RegistryLoadError(file, err instanceof Error ? err.message : String(err))
  }
  if (!Array.isArray(raw)) throw new RegistryLoadError(file, 'expected a JSON array')
  const runs: Run[] = []
  raw.forEach((entry: unknown, index) => {
    if (isRun(entry)) runs.push({ id: entry.id, type: entry.type, created: entry.created, status: entry.status, path: entry.path })
    else log.warn({ file, index }, 'Skipping invalid run record')
  })
  return runs
}

/**
 * Registry mirrored to a JSON file. Snapshots are written one at a time,
 * each by write-then-rename, and always carry the latest in-memory state, so
 * two completions landing together cannot lose an update.
 */
export class FileRunRegistry extends MemoryRunRegistry {
  private writes: Promise<void> = Promise.resolve()

  private constructor(readonly file: string, log: Log, runs: Run[]) {
    super(log, runs)
  }

  static async open(file: string, log: Log): Promise<FileRunRegistry> {
    const runs = await loadRuns(file, log)
    log.info({ file, runs: runs.length }, 'Run registry loaded')
    return new FileRunRegistry(file, log, runs)
  }

  protected override persist(): Promise<void> {
    const next = this.writes.then(() => writeFileAtomic(this.file, JSON.stringify(this.runs, null, 2)))
    // the caller sees a failed write through `next`; the chain itself keeps going
    this.writes = next.catch(() => undefined)
    return next
  }
}
