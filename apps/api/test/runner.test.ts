import os from 'node:os'
import { realpath } from 'node:fs/promises'
import { describe, it, expect } from 'vitest'
import { spawnRunner } from '../src/jobs/runner.js'
import type { RunOptions } from '../src/jobs/runner.js'

// Each case runs a short script in a child Node.js process.
const node = (script: string, options?: RunOptions) => spawnRunner.run(process.execPath, ['-e', script], options)

describe('spawnRunner', () => {
  it('reports a clean exit with its output', async () => {
    expect(await node("process.stdout.write('hello')")).toEqual({
      exitCode: 0,
      signal: null,
      timedOut: false,
      cancelled: false,
      output: 'hello'
    })
  })

  it('reports nonzero exits and keeps stderr', async () => {
    const outcome = await node("process.stderr.write('boom'); process.exitCode = 3")
    expect(outcome).toMatchObject({ exitCode: 3, signal: null, output: 'boom' })
  })

  it('keeps only the tail of long output', async () => {
    const outcome = await node("process.stdout.write('x'.repeat(20000) + 'END')")
    expect(outcome.output).toHaveLength(16 * 1024)
    expect(outcome.output.endsWith('xxEND')).toBe(true)
  })

  it('decodes characters split across chunks', async () => {
    const outcome = await node(
      'process.stdout.write(Buffer.from([0xe2, 0x82])); setTimeout(() => process.stdout.write(Buffer.from([0xac])), 100)'
    )
    expect(outcome.output).toBe('€')
  })

  it('runs in the requested directory', async () => {
    const dir = await realpath(os.tmpdir())
    const outcome = await node('process.stdout.write(process.cwd())', { cwd: dir })
    expect(outcome.output).toBe(dir)
  })

  it('stops a job that runs past its timeout', async () => {
    const outcome = await node('setInterval(() => {}, 1000)', { timeoutMs: 300 })
    expect(outcome).toMatchObject({ exitCode: null, signal: 'SIGTERM', timedOut: true, cancelled: false })
  }, 10000)

  it('kills a job that ignores SIGTERM once the grace period ends', async () => {
    const started = Date.now()
    const outcome = await node("process.on('SIGTERM', () => {}); setInterval(() => {}, 1000)", { timeoutMs: 1000, killGraceMs: 200 })
    expect(outcome).toMatchObject({ exitCode: null, signal: 'SIGKILL', timedOut: true })
    expect(Date.now() - started).toBeLessThan(5000)
  }, 10000)

  it('settles when a descendant keeps the pipes open', async () => {
    const started = Date.now()
    const outcome = await node([
      "require('node:child_process').spawn(process.execPath, ['-e', 'setTimeout(() => {}, 3000)'], { stdio: ['ignore', 'inherit', 'inherit'] })",
      "process.stdout.write('parent done')",
      'process.exit(0)'
    ].join('; '))
    expect(outcome).toMatchObject({ exitCode: 0, output: 'parent done' })
    expect(Date.now() - started).toBeLessThan(2500)
  }, 10000)

  it('stops a job when its signal aborts', async () => {
    const controller = new AbortController()
    setTimeout(() => controller.abort(), 300)
    const outcome = await node('setInterval(() => {}, 1000)', { signal: controller.signal })
    expect(outcome).toMatchObject({ exitCode: null, signal: 'SIGTERM', timedOut: false, cancelled: true })
  }, 10000)

  it('does not launch when already aborted', async () => {
    const outcome = await spawnRunner.run('/nonexistent/runboard-tool', [], { signal: AbortSignal.abort() })
    expect(outcome).toEqual({ exitCode: null, signal: null, timedOut: false, cancelled: true, output: '' })
  })

  it('rejects when the command cannot be launched', async () => {
    await expect(spawnRunner.run('/nonexistent/runboard-tool', [])).rejects.toMatchObject({ code: 'ENOENT' })
  })
})
