import path from 'node:path'
import { isRecord } from '@runboard/core'
import { readTextIfExists, writeFileAtomic } from '../fs/files.js'
import type { Log, Preferences } from '../types.js'

export const DEFAULT_PREFERENCES: Preferences = {
  sourcePath: '.',
  depth: 2,
  logLevel: 'INFO',
  ruleset: null,
  envFile: null
}

function pick<T>(raw: Record<string, unknown>, key: keyof Preferences, ok: (v: unknown) => v is T, fallback: T, bad: string[]): T {
  if (!(key in raw)) return fallback
  const value = raw[key]
  if (ok(value)) return value
  bad.push(key)
  return fallback
}

const isString = (v: unknown): v is string => typeof v === 'string'
const isDepth = (v: unknown): v is number => typeof v === 'number' && Number.isInteger(v) && v >= 0
const isOptionalString = (v: unknown): v is string | null => v === null || typeof v === 'string'

export class PreferencesStore {
  readonly file: string

  constructor(dataDir: string, private readonly log: Log) {
    this.file = path.join(dataDir, 'config.json')
  }

  async load(): Promise<Preferences> {
    const text = await readTextIfExists(this.file)
    if (text === null) return { ...DEFAULT_PREFERENCES }
    let raw: unknown
    try {
      raw = JSON.parse(text)
    } catch (err) {
      this.log.warn({ err, file: this.file }, 'Preferences file is not valid JSON; using defaults')
      return { ...DEFAULT_PREFERENCES }
    }
    if (!isRecord(raw)) {
      this.log.warn({ file: this.file }, 'Preferences file is not an object; using defaults')
      return { ...DEFAULT_PREFERENCES }
    }
    const bad: string[] = []
    const d = DEFAULT_PREFERENCES
    const prefs: Preferences = {
      sourcePath: pick(raw, 'sourcePath', isString, d.sourcePath, bad),
      depth: pick(raw, 'depth', isDepth, d.depth, bad),
      logLevel: pick(raw, 'logLevel', isString, d.logLevel, bad),
      ruleset: pick(raw, 'ruleset', isOptionalString, d.ruleset, bad),
      envFile: pick(raw, 'envFile', isOptionalString, d.envFile, bad)
    }
    if (bad.length) this.log.warn({ file: this.file, fields: bad }, 'Ignoring invalid preference fields')
    return prefs
  }

  async save(prefs: Preferences): Promise<Preferences> {
    await writeFileAtomic(this.file, JSON.stringify(prefs, null, 2))
    return prefs
  }
}
