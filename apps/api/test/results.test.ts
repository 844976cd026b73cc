import path from 'node:path'
import { mkdir, writeFile } from 'node:fs/promises'
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { MalformedReportError, PathEscapeError } from '@runboard/core'
import { ResultStore } from '../src/store/results.js'
import { fakeLog, removeDir, tempDir } from './helpers.js'

let dir = ''
let store: ResultStore
let log: ReturnType<typeof fakeLog>

async function putReport(runId: string, name: string, body: unknown) {
  await mkdir(path.join(dir, runId), { recursive: true })
  await writeFile(path.join(dir, runId, name), typeof body === 'string' ? body : JSON.stringify(body))
}

beforeEach(async () => {
  dir = await tempDir()
  log = fakeLog()
  store = new ResultStore(dir, log)
})

afterEach(async () => {
  await removeDir(dir)
})

describe('ResultStore', () => {
  it('lays out one directory per run', () => {
    expect(store.runDir('r1')).toBe(path.join(dir, 'r1'))
    expect(store.reportPath('r1', 'scan')).toBe(path.join(dir, 'r1', 'scan_report.json'))
    expect(store.reportPath('r1', 'inventory')).toBe(path.join(dir, 'r1', 'inventory.json'))
    expect(() => store.runDir('../elsewhere')).toThrow(PathEscapeError)
  })

  it('reports pending until the report file exists', async () => {
    expect(await store.load('r1', 'scan')).toEqual({ state: 'pending' })
  })

  it('rewrites absolute locations inside the run directory', async () => {
    const runDir = path.join(dir, 'r1')
    await putReport('r1', 'scan_report.json', {
      findings: [
        { severity: 'high', owaspId: 'A03:2021', location: path.join(runDir, 'src', 'app.py') },
        { severity: 'low', location: 'lib/util.py' },
        { severity: 'low', location: '/opt/elsewhere/x.py' },
        'not a finding'
      ],
      scannedPath: 'uploads',
      tool: 'lintai'
    })
    expect(await store.load('r1', 'scan')).toEqual({
      state: 'ready',
      report: {
        type: 'scan',
        data: {
          findings: [
            { severity: 'high', owaspId: 'A03:2021', location: 'src/app.py' },
            { severity: 'low', location: 'lib/util.py' },
            { severity: 'low', location: '/opt/elsewhere/x.py' },
            'not a finding'
          ],
          scannedPath: 'uploads',
          errors: null,
          tool: 'lintai'
        }
      }
    })
    expect(log.warn).toHaveBeenCalledWith({ runId: 'r1', skipped: 3 }, 'Left finding locations unchanged')
  })

  it('refuses reports that are not valid JSON or lack findings', async () => {
    await putReport('r1', 'scan_report.json', '{"findings": [')
    await expect(store.load('r1', 'scan')).rejects.toBeInstanceOf(MalformedReportError)
    await putReport('r2', 'scan_report.json', { results: [] })
    await expect(store.load('r2', 'scan')).rejects.toThrow("report for run r2 is malformed: scan report missing 'findings'")
  })

  it('keeps graph records it cannot traverse', async () => {
    const graph = {
      nodes: [{ id: 'A', label: 'agent' }, { label: 'no id' }, { id: 2 }, 'stray'],
      edges: [{ source: 'A', target: 2 }, { source: 'A' }]
    }
    await putReport('r1', 'inventory.json', { graph, version: 3 })
    expect(await store.load('r1', 'inventory')).toEqual({
      state: 'ready',
      report: { type: 'inventory', data: { graph, version: 3 } }
    })
    expect(log.warn).toHaveBeenCalledWith(
      { runId: 'r1', untraversableNodes: 2, untraversableEdges: 1 },
      'Graph records without usable ids are skipped in traversal'
    )
  })

  it('refuses inventories without a graph', async () => {
    await putReport('r1', 'inventory.json', { nodes: [] })
    await expect(store.load('r1', 'inventory')).rejects.toBeInstanceOf(MalformedReportError)
  })
})
