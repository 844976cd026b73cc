import { spawn } from 'node:child_process'

export interface ProcessOutcome {
  exitCode: number | null
  signal: string | null
  timedOut: boolean
  cancelled: boolean
  // tail of interleaved stdout/stderr
  output: string
}

export interface RunOptions {
  signal?: AbortSignal
  timeoutMs?: number
  // time between SIGTERM and SIGKILL once a job is stopped
  killGraceMs?: number
  cwd?: string
}

export interface ProcessRunner {
  /** Resolves once the process exits; rejects only when it cannot be launched. */
  run(command: string, args: readonly string[], options?: RunOptions): Promise<ProcessOutcome>
}

const OUTPUT_LIMIT = 16 * 1024
const KILL_GRACE_MS = 5000
// a descendant may keep the pipes open after the tool itself exited
const DRAIN_MS = 1000

export const spawnRunner: ProcessRunner = {
  run(command, args, options = {}) {
    return new Promise((resolve, reject) => {
      if (options.signal?.aborted) {
        resolve({ exitCode: null, signal: null, timedOut: false, cancelled: true, output: '' })
        return
      }
      const proc = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'], cwd: options.cwd })
      let output = ''
      let timedOut = false
      let cancelled = false
      let settled = false
      let exit: { code: number | null; signal: NodeJS.Signals | null } | null = null
      const timers: NodeJS.Timeout[] = []

      const append = (chunk: string) => {
        output = (output + chunk).slice(-OUTPUT_LIMIT)
      }
      proc.stdout.setEncoding('utf8')
      proc.stderr.setEncoding('utf8')
      proc.stdout.on('data', append)
      proc.stderr.on('data', append)

      const stop = () => {
        proc.kill('SIGTERM')
        timers.push(setTimeout(() => {
          if (!exit) proc.kill('SIGKILL')
        }, options.killGraceMs ?? KILL_GRACE_MS))
      }
      if (options.timeoutMs) {
        timers.push(setTimeout(() => {
          timedOut = true
          stop()
        }, options.timeoutMs))
      }
      const onAbort = () => {
        if (exit) return
        cancelled = true
        stop()
      }
      options.signal?.addEventListener('abort', onAbort, { once: true })

      const cleanup = () => {
        settled = true
        for (const timer of timers) clearTimeout(timer)
        options.signal?.removeEventListener('abort', onAbort)
      }
      const settle = () => {
        const status = exit
        if (settled || !status) return
        cleanup()
        proc.stdout.destroy()
        proc.stderr.destroy()
        resolve({ exitCode: status.code, signal: status.signal, timedOut, cancelled, output })
      }

      proc.on('error', err => {
        if (settled) return
        cleanup()
        reject(err)
      })
      proc.on('exit', (code, signal) => {
        if (settled) return
        exit = { code, signal }
        timers.push(setTimeout(settle, DRAIN_MS))
      })
      proc.on('close', settle)
    })
  }
}
