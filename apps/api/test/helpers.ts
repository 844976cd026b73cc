import os from 'node:os'
import path from 'node:path'
import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { vi } from 'vitest'
import type { ProcessOutcome, ProcessRunner, RunOptions } from '../src/jobs/runner.js'
import type { Log } from '../src/types.js'

export function tempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'runboard-test-'))
}

export function removeDir(dir: string): Promise<void> {
  return rm(dir, { recursive: true, force: true })
}

export function fakeLog() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Log
}

export function exited(exitCode: number | null, extra: Partial<ProcessOutcome> = {}): ProcessOutcome {
  return { exitCode, signal: null, timedOut: false, cancelled: false, output: '', ...extra }
}

export function outputArg(args: readonly string[]): string {
  const out = args[args.indexOf('--output') + 1]
  if (!out) throw new Error(`no --output in ${args.join(' ')}`)
  return out
}

export interface GatedCall {
  command: string
  args: readonly string[]
  options: RunOptions
  settled: boolean
  resolve(outcome: ProcessOutcome): void
  reject(err: Error): void
}

/** Holds every process open until the test settles it; an abort settles it as cancelled. */
export class GatedRunner implements ProcessRunner {
  readonly calls: GatedCall[] = []

  run(command: string, args: readonly string[], options: RunOptions = {}): Promise<ProcessOutcome> {
    return new Promise((resolve, reject) => {
      const call: GatedCall = {
        command,
        args,
        options,
        settled: false,
        resolve: outcome => {
          call.settled = true
          resolve(outcome)
        },
        reject: err => {
          call.settled = true
          reject(err)
        }
      }
      options.signal?.addEventListener('abort', () => call.resolve(exited(null, { signal: 'SIGTERM', cancelled: true })), { once: true })
      this.calls.push(call)
    })
  }

  call(index: number): GatedCall {
    const call = this.calls[index]
    if (!call) throw new Error(`no call #${index}`)
    return call
  }
}

/** Writes the report produced by `reports[subcommand]` to the --output path and exits 0. */
export class ReportRunner implements ProcessRunner {
  readonly calls: string[][] = []

  constructor(private readonly reports: Record<string, (target: string) => unknown>) {}

  async run(command: string, args: readonly string[]): Promise<ProcessOutcome> {
    this.calls.push([command, ...args])
    const [subcommand = '', target = ''] = args
    const report = this.reports[subcommand]
    if (!report) return exited(2, { output: `unknown subcommand ${subcommand}` })
    await writeFile(outputArg(args), JSON.stringify(report(target)))
    return exited(0)
  }
}
