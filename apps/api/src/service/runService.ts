import path from 'node:path'
import { randomUUID } from 'node:crypto'
import { mkdir, writeFile } from 'node:fs/promises'
import { InvalidRequestError, RUN_TYPES, RunNotFoundError, WorkspaceGuard, isInside } from '@runboard/core'
import type { Run, RunType } from '@runboard/core'
import type { EnvFiles } from '../config/envFiles.js'
import type { PreferencesStore } from '../config/preferences.js'
import type { JobDispatcher } from '../jobs/dispatcher.js'
import { buildInvocation, chooseEnvFile } from '../jobs/invocation.js'
import type { ResultStore } from '../store/results.js'
import type { RunRegistry } from '../store/runs.js'
import type { Log, Preferences, ScanSubmission, SubmissionInput } from '../types.js'

export interface RunServiceDeps {
  guard: WorkspaceGuard
  registry: RunRegistry
  results: ResultStore
  dispatcher: JobDispatcher
  preferences: PreferencesStore
  envFiles: EnvFiles
  toolBin: string
  log: Log
}

interface Launch {
  id: string
  type: RunType
  target: string
  recordedPath: string
  input: SubmissionInput
  prefs: Preferences
}

export class RunService {
  constructor(private readonly deps: RunServiceDeps) {}

  async startScan(input: ScanSubmission): Promise<Run> {
    const id = randomUUID()
    const files = input.files ?? []
    const runDir = this.deps.results.runDir(id)
    // every upload must land inside the run's own directory, clear of the report files
    const uploads = new WorkspaceGuard(runDir)
    const reserved = RUN_TYPES.map(type => this.deps.results.reportPath(id, type))
    const placed = files.map(f => {
      const dest = uploads.resolve(f.filename)
      if (dest === runDir) throw new InvalidRequestError('uploaded file has no name')
      if (reserved.some(report => isInside(report, dest))) throw new InvalidRequestError(`uploaded file name ${f.filename} is reserved`)
      return { dest, content: f.content }
    })

    const prefs = await this.deps.preferences.load()
    const target = placed.length ? runDir : this.deps.guard.resolve(input.path ?? prefs.sourcePath)
    const recordedPath = placed.length ? (input.path ?? '.') : (input.path ?? prefs.sourcePath)

    await this.deps.results.ensureRunDir(id)
    for (const { dest, content } of placed) {
      await mkdir(path.dirname(dest), { recursive: true })
      await writeFile(dest, content)
    }
    return this.launch({ id, type: 'scan', target, recordedPath, input, prefs })
  }

  async startInventory(input: SubmissionInput): Promise<Run> {
    const id = randomUUID()
    const prefs = await this.deps.preferences.load()
    const requested = input.path ?? prefs.sourcePath
    const target = this.deps.guard.resolve(requested)
    await this.deps.results.ensureRunDir(id)
    return this.launch({ id, type: 'inventory', target, recordedPath: requested, input, prefs })
  }

  cancel(runId: string): { cancelled: boolean } {
    if (!this.deps.registry.lookup(runId)) throw new RunNotFoundError(runId)
    return { cancelled: this.deps.dispatcher.cancel(runId) }
  }

  private async launch(l: Launch): Promise<Run> {
    const { registry, results, dispatcher, envFiles, toolBin, log } = this.deps
    const run = await registry.create({
      id: l.id,
      type: l.type,
      created: new Date().toISOString(),
      status: 'pending',
      path: l.recordedPath
    })
    const envFile = chooseEnvFile(l.prefs, envFiles, await envFiles.existing())
    const invocation = buildInvocation(
      toolBin,
      { type: l.type, target: l.target, output: results.reportPath(l.id, l.type), depth: l.input.depth, logLevel: l.input.logLevel },
      l.prefs,
      envFile
    )
    try {
      dispatcher.submit(invocation, l.id)
    } catch (err) {
      await registry.setStatus(l.id, 'error')
      throw err
    }
    log.info({ runId: run.id, type: run.type, path: run.path }, 'Run submitted')
    return run
  }
}
