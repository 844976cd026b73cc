import os from 'node:os'
import path from 'node:path'
import fs from 'node:fs'
import { SettingsError } from '../errors.js'

export interface Settings {
  port: number
  host: string
  logLevel: string
  workspaceRoot: string
  dataDir: string
  toolBin: string
  maxConcurrentJobs: number
  // 0 disables the per-job timeout
  jobTimeoutMs: number
  corsOrigins: string[]
}

const LOG_LEVELS = new Set(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim()
  if (!raw) return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value < min) throw new SettingsError(`${name} must be an integer >= ${min}, got "${raw}"`)
  return value
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const workspaceRoot = path.resolve(env.WORKSPACE_ROOT?.trim() || process.cwd())
  if (!fs.existsSync(workspaceRoot) || !fs.statSync(workspaceRoot).isDirectory()) {
    throw new SettingsError(`Workspace root ${workspaceRoot} does not exist or is not a directory`)
  }
  const logLevel = (env.LOG_LEVEL?.trim() || 'info').toLowerCase()
  if (!LOG_LEVELS.has(logLevel)) throw new SettingsError(`LOG_LEVEL "${logLevel}" is not a known level`)

  return {
    port: readInt(env, 'PORT', 3333, 0),
    host: env.HOST?.trim() || '0.0.0.0',
    logLevel,
    workspaceRoot,
    dataDir: path.resolve(env.DATA_DIR?.trim() || path.join(os.tmpdir(), 'runboard')),
    toolBin: env.TOOL_BIN?.trim() || 'lintai',
    maxConcurrentJobs: readInt(env, 'MAX_CONCURRENT_JOBS', 2, 1),
    jobTimeoutMs: readInt(env, 'JOB_TIMEOUT_MS', 15 * 60 * 1000, 0),
    corsOrigins: (env.CORS_ORIGINS ?? 'http://localhost:5173,http://localhost:3000')
      .split(',')
      .map(s => s.trim())
      .filter(Boolean)
  }
}
