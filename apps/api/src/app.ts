import path from 'node:path'
import { mkdir, readdir, stat } from 'node:fs/promises'
import Fastify from 'fastify'
import type { FastifyInstance, FastifyServerOptions } from 'fastify'
import fastifyMultipart from '@fastify/multipart'
import { InvalidRequestError, RunboardError, WorkspaceGuard, isRecord } from '@runboard/core'
import type { FindingCriteria, RunType } from '@runboard/core'
import type { Settings } from './config/settings.js'
import { DEFAULT_PREFERENCES, PreferencesStore } from './config/preferences.js'
import { EnvFiles, SECRET_KEYS, SETTING_KEYS } from './config/envFiles.js'
import type { EnvValues, SecretKey, SettingKey } from './config/envFiles.js'
import { isNotFound } from './fs/files.js'
import { JobDispatcher } from './jobs/dispatcher.js'
import { spawnRunner } from './jobs/runner.js'
import type { ProcessRunner } from './jobs/runner.js'
import { ResultStore } from './store/results.js'
import { FileRunRegistry } from './store/runs.js'
import type { RunRegistry } from './store/runs.js'
import { RunQueries } from './service/runQueries.js'
import { RunService } from './service/runService.js'
import type { DirectoryListing, Preferences, SubmissionInput, UploadedFile } from './types.js'

export interface AppOptions {
  settings: Settings
  logger?: FastifyServerOptions['logger']
  // injectable for tests; default spawns the real tool
  runner?: ProcessRunner
  registry?: RunRegistry
}

export interface App {
  app: FastifyInstance
  registry: RunRegistry
  results: ResultStore
  dispatcher: JobDispatcher
  service: RunService
  queries: RunQueries
}

const preferencesBody = {
  type: 'object',
  additionalProperties: false,
  properties: {
    sourcePath: { type: 'string', default: DEFAULT_PREFERENCES.sourcePath },
    depth: { type: 'integer', minimum: 0, default: DEFAULT_PREFERENCES.depth },
    logLevel: { type: 'string', default: DEFAULT_PREFERENCES.logLevel },
    ruleset: { type: ['string', 'null'], default: null },
    envFile: { type: ['string', 'null'], default: null }
  }
}

function envBody(keys: readonly string[], types: string[]) {
  return {
    type: 'object',
    additionalProperties: false,
    properties: Object.fromEntries(keys.map(k => [k, { type: types }]))
  }
}

const subgraphQuery = {
  type: 'object',
  required: ['node'],
  properties: {
    node: { type: 'string', minLength: 1 },
    depth: { type: 'integer', minimum: 1, maximum: 5, default: 1 }
  }
}

const filterQuery = {
  type: 'object',
  properties: {
    severity: { type: 'string' },
    owaspId: { type: 'string' },
    component: { type: 'string' }
  }
}

const runTypeParams = {
  type: 'object',
  required: ['type'],
  properties: { type: { type: 'string', enum: ['scan', 'inventory'] } }
}

// multipart fields arrive as strings, JSON bodies as numbers
function toDepth(value: unknown): number {
  if (typeof value === 'number') return value
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) return Number(value)
  return NaN
}

function readSubmission(fields: Record<string, unknown>): SubmissionInput {
  const out: SubmissionInput = {}
  const { path: target, depth, logLevel } = fields
  if (target !== undefined && target !== '') {
    if (typeof target !== 'string') throw new InvalidRequestError('path must be a string')
    out.path = target
  }
  if (depth !== undefined && depth !== '') {
    const n = toDepth(depth)
    if (!Number.isInteger(n) || n < 0) throw new InvalidRequestError('depth must be a non-negative integer')
    out.depth = n
  }
  if (logLevel !== undefined && logLevel !== '') {
    if (typeof logLevel !== 'string') throw new InvalidRequestError('logLevel must be a string')
    out.logLevel = logLevel
  }
  return out
}

const toPosix = (p: string) => p.split(path.sep).join('/')

export async function buildApp(options: AppOptions): Promise<App> {
  const { settings } = options
  const app = Fastify({ logger: options.logger ?? { level: settings.logLevel } })
  await app.register(fastifyMultipart, { limits: { fileSize: 50 * 1024 * 1024, files: 5000 } })

  await mkdir(settings.dataDir, { recursive: true })
  const guard = new WorkspaceGuard(settings.workspaceRoot)
  const registry = options.registry ?? await FileRunRegistry.open(path.join(settings.dataDir, 'runs.json'), app.log)
  const results = new ResultStore(settings.dataDir, app.log)
  const preferences = new PreferencesStore(settings.dataDir, app.log)
  const envFiles = new EnvFiles(settings.dataDir)
  const dispatcher = new JobDispatcher({
    registry,
    runner: options.runner ?? spawnRunner,
    log: app.log,
    concurrency: settings.maxConcurrentJobs,
    timeoutMs: settings.jobTimeoutMs
  })
  const service = new RunService({ guard, registry, results, dispatcher, preferences, envFiles, toolBin: settings.toolBin, log: app.log })
  const queries = new RunQueries(registry, results, app.log)

  app.addHook('onClose', async () => {
    await dispatcher.close()
  })

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof RunboardError) {
      if (err.statusCode >= 500) req.log.error({ err }, err.message)
      return reply.code(err.statusCode).send({ code: err.code, message: err.message })
    }
    if (err.validation) return reply.code(400).send({ code: 'BAD_REQUEST', message: err.message })
    if (err.statusCode && err.statusCode < 500) return reply.code(err.statusCode).send({ code: err.code, message: err.message })
    req.log.error({ err }, 'Request failed')
    return reply.code(500).send({ code: 'INTERNAL', message: 'internal error' })
  })

  // Minimal CORS for the local UI dev servers
  app.addHook('onSend', async (req, reply, payload) => {
    const origin = req.headers.origin
    if (origin && settings.corsOrigins.includes(origin)) {
      reply.header('Access-Control-Allow-Origin', origin)
      reply.header('Vary', 'Origin')
      reply.header('Access-Control-Allow-Headers', '*')
      reply.header('Access-Control-Allow-Methods', 'GET,POST,OPTIONS')
    }
    return payload
  })
  app.options('/*', async (req, reply) => {
    reply.code(204).send()
  })

  app.get('/api/health', async () => ({ status: 'ok', jobs: dispatcher.stats() }))

  // File system browsing, sandboxed to the workspace root
  app.get<{ Querystring: { path?: string } }>('/api/fs', {
    schema: { querystring: { type: 'object', properties: { path: { type: 'string' } } } }
  }, async (req): Promise<DirectoryListing> => {
    const dir = guard.resolve(req.query.path ?? '')
    const info = await stat(dir).catch((err: unknown) => {
      if (isNotFound(err)) return null
      throw err
    })
    if (!info?.isDirectory()) throw new InvalidRequestError('not a directory')
    const entries = await readdir(dir, { withFileTypes: true })
    const items = entries
      .filter(e => !e.name.startsWith('.'))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
      .map(e => ({ name: e.name, path: toPosix(guard.relative(path.join(dir, e.name))), dir: e.isDirectory() }))
    return { cwd: toPosix(guard.relative(dir)), items }
  })

  // Preferences
  app.get('/api/config', async () => preferences.load())
  app.post<{ Body: Preferences }>('/api/config', { schema: { body: preferencesBody } }, async (req) => preferences.save(req.body))

  // Tool env files
  app.get('/api/env', async () => envFiles.readSettings())
  app.post<{ Body: EnvValues<SettingKey> }>('/api/env', {
    schema: { body: envBody(SETTING_KEYS, ['string', 'number', 'null']) }
  }, async (req, reply) => {
    await envFiles.writeSettings(req.body)
    return reply.code(204).send()
  })
  app.post<{ Body: EnvValues<SecretKey> }>('/api/secrets', {
    schema: { body: envBody(SECRET_KEYS, ['string', 'null']) }
  }, async (req, reply) => {
    await envFiles.writeSecrets(req.body)
    return reply.code(204).send()
  })

  // Submissions
  app.post('/api/scan', async (req, reply) => {
    let fields: Record<string, unknown> = isRecord(req.query) ? { ...req.query } : {}
    const files: UploadedFile[] = []
    if (req.isMultipart()) {
      for await (const part of req.parts({ preservePath: true })) {
        if (part.type === 'file') files.push({ filename: part.filename, content: await part.toBuffer() })
        else fields[part.fieldname] = part.value
      }
    } else if (isRecord(req.body)) {
      fields = { ...fields, ...req.body }
    }
    const run = await service.startScan({ ...readSubmission(fields), files })
    return reply.code(202).send(run)
  })

  app.post('/api/inventory', async (req, reply) => {
    const fields = { ...(isRecord(req.query) ? req.query : {}), ...(isRecord(req.body) ? req.body : {}) }
    const run = await service.startInventory(readSubmission(fields))
    return reply.code(202).send(run)
  })

  // Runs & results
  app.get('/api/runs', async () => queries.listRuns())

  app.post<{ Params: { id: string } }>('/api/runs/:id/cancel', async (req) => service.cancel(req.params.id))

  app.get<{ Params: { id: string } }>('/api/results/:id', async (req) => queries.getResult(req.params.id))

  app.get<{ Params: { id: string }; Querystring: FindingCriteria }>('/api/results/:id/filter', {
    schema: { querystring: filterQuery }
  }, async (req) => queries.filterFindings(req.params.id, req.query))

  app.get<{ Params: { id: string }; Querystring: { node: string; depth: number } }>('/api/inventory/:id/subgraph', {
    schema: { querystring: subgraphQuery }
  }, async (req) => queries.subgraph(req.params.id, req.query.node, req.query.depth))

  app.get('/api/last-result', async () => queries.lastResult())
  app.get<{ Params: { type: RunType } }>('/api/last-result/:type', {
    schema: { params: runTypeParams }
  }, async (req) => queries.lastResult(req.params.type))

  app.get('/api/history', async () => queries.history())

  return { app, registry, results, dispatcher, service, queries }
}
