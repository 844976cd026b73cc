import type { RunRegistry } from '../store/runs.js'
import { DispatcherClosedError } from '../errors.js'
import type { Invocation, JobDiagnostic, Log } from '../types.js'
import type { ProcessRunner } from './runner.js'

export interface DispatcherOptions {
  registry: RunRegistry
  runner: ProcessRunner
  log: Log
  // maximum number of tool processes alive at once
  concurrency?: number
  // per-job wall clock limit; 0 or undefined means none
  timeoutMs?: number
  // failure diagnostics kept, oldest evicted first
  diagnosticLimit?: number
}

interface Job {
  runId: string
  invocation: Invocation
  controller: AbortController
}

type Failure = Omit<JobDiagnostic, 'runId' | 'finishedAt'>

const cancelled = (): Failure => ({ reason: 'cancelled', exitCode: null, signal: null, output: '', message: 'job cancelled' })

/**
 * Bounded worker pool in front of the analysis tool.
 *
 * `submit` only enqueues and returns. At most `concurrency` jobs run at once;
 * the rest wait in FIFO order. Each outcome is reconciled into the registry
 * as `done` (exit 0) or `error` (anything else), and failures keep a
 * diagnostic on the server side.
 */
export class JobDispatcher {
  readonly concurrency: number
  readonly timeoutMs: number
  readonly diagnosticLimit: number
  private readonly queue: Job[] = []
  private readonly running = new Map<string, Job>()
  private readonly active = new Set<Promise<void>>()
  private readonly diagnostics = new Map<string, JobDiagnostic>()
  private closed = false

  constructor(private readonly options: DispatcherOptions) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? 2))
    this.timeoutMs = Math.max(0, options.timeoutMs ?? 0)
    this.diagnosticLimit = Math.max(1, Math.floor(options.diagnosticLimit ?? 200))
  }

  submit(invocation: Invocation, runId: string): void {
    if (this.closed) throw new DispatcherClosedError()
    this.queue.push({ runId, invocation, controller: new AbortController() })
    this.options.log.debug({ runId, queued: this.queue.length, running: this.running.size }, 'Job queued')
    this.pump()
  }

  cancel(runId: string): boolean {
    const idx = this.queue.findIndex(j => j.runId === runId)
    if (idx !== -1) {
      this.queue.splice(idx, 1)
      this.track(this.finish(runId, cancelled()))
      return true
    }
    const job = this.running.get(runId)
    if (!job || job.controller.signal.aborted) return false
    job.controller.abort()
    return true
  }

  stats(): { queued: number; running: number } {
    return { queued: this.queue.length, running: this.running.size }
  }

  diagnostic(runId: string): JobDiagnostic | undefined {
    return this.diagnostics.get(runId)
  }

  async idle(): Promise<void> {
    while (this.active.size > 0) {
      await Promise.all([...this.active])
    }
  }

  async close(): Promise<void> {
    this.closed = true
    for (const job of [...this.queue]) this.cancel(job.runId)
    for (const job of this.running.values()) job.controller.abort()
    await this.idle()
  }

  private pump(): void {
    while (this.running.size < this.concurrency) {
      const job = this.queue.shift()
      if (!job) return
      this.running.set(job.runId, job)
      this.track(this.execute(job))
    }
  }

  private track(task: Promise<void>): void {
    const tracked = task.then(() => {
      this.active.delete(tracked)
    })
    this.active.add(tracked)
  }

  private async execute(job: Job): Promise<void> {
    const { runner, log } = this.options
    const { command, args, cwd } = job.invocation
    log.info({ runId: job.runId, command, args }, 'Job started')
    let failure: Failure | null = null
    try {
      const outcome = await runner.run(command, args, {
        signal: job.controller.signal,
        timeoutMs: this.timeoutMs || undefined,
        cwd
      })
      const base = { exitCode: outcome.exitCode, signal: outcome.signal, output: outcome.output }
      if (outcome.cancelled) failure = { ...base, reason: 'cancelled', message: 'job cancelled' }
      else if (outcome.timedOut) failure = { ...base, reason: 'timeout', message: `timed out after ${this.timeoutMs} ms` }
      else if (outcome.exitCode !== 0) failure = { ...base, reason: 'exit', message: `exited with ${outcome.exitCode ?? outcome.signal}` }
    } catch (err) {
      failure = { reason: 'launch', exitCode: null, signal: null, output: '', message: err instanceof Error ? err.message : String(err) }
    }
    this.running.delete(job.runId)
    this.pump()
    await this.finish(job.runId, failure)
  }

  private async finish(runId: string, failure: Failure | null): Promise<void> {
    const { registry, log } = this.options
    if (!failure) {
      log.info({ runId }, 'Job finished')
      await registry.setStatus(runId, 'done')
      return
    }
    const diagnostic: JobDiagnostic = { runId, ...failure, finishedAt: new Date().toISOString() }
    this.diagnostics.set(runId, diagnostic)
    for (const oldest of this.diagnostics.keys()) {
      if (this.diagnostics.size <= this.diagnosticLimit) break
      this.diagnostics.delete(oldest)
    }
    log.error({ runId, reason: diagnostic.reason, exitCode: diagnostic.exitCode, signal: diagnostic.signal, output: diagnostic.output }, `Job failed: ${diagnostic.message}`)
    await registry.setStatus(runId, 'error')
  }
}
