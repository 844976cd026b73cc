import path from 'node:path'
import { access } from 'node:fs/promises'
import { isNotFound, readTextIfExists, writeFileAtomic } from '../fs/files.js'

// Knobs the analysis tool reads from its env file.
export const SETTING_KEYS = [
  'LINTAI_MAX_LLM_TOKENS',
  'LINTAI_MAX_LLM_COST_USD',
  'LINTAI_MAX_LLM_REQUESTS',
  'LINTAI_LLM_PROVIDER',
  'LLM_ENDPOINT_URL',
  'LLM_API_VERSION',
  'LLM_MODEL_NAME'
] as const

export const SECRET_KEYS = [
  'LLM_API_KEY',
  'OPENAI_API_KEY',
  'AZURE_OPENAI_API_KEY',
  'ANTHROPIC_API_KEY',
  'GOOGLE_API_KEY',
  'COHERE_API_KEY'
] as const

export type SettingKey = (typeof SETTING_KEYS)[number]
export type SecretKey = (typeof SECRET_KEYS)[number]
export type EnvValues<K extends string> = Partial<Record<K, string | number | null>>

export function parseEnv(text: string): Record<string, string> {
  const out: Record<string, string> = {}
  for (const line of text.split(/\r?\n/)) {
    if (!line || line.startsWith('#')) continue
    const eq = line.indexOf('=')
    if (eq === -1) continue
    out[line.slice(0, eq)] = line.slice(eq + 1)
  }
  return out
}

export function serializeEnv<K extends string>(keys: readonly K[], values: EnvValues<K>): string {
  const lines: string[] = []
  for (const key of keys) {
    const value = values[key]
    if (value === undefined || value === null) continue
    lines.push(`${key}=${String(value)}`)
  }
  return lines.join('\n')
}

async function exists(file: string): Promise<boolean> {
  try {
    await access(file)
    return true
  } catch (err) {
    if (isNotFound(err)) return false
    throw err
  }
}

export class EnvFiles {
  readonly settingsFile: string
  readonly secretsFile: string

  constructor(dataDir: string) {
    this.settingsFile = path.join(dataDir, 'config.env')
    this.secretsFile = path.join(dataDir, 'secrets.env')
  }

  /** Non-secret knobs only; anything else pasted into the file is dropped. */
  async readSettings(): Promise<EnvValues<SettingKey>> {
    const text = await readTextIfExists(this.settingsFile)
    if (text === null) return {}
    const parsed = parseEnv(text)
    const out: EnvValues<SettingKey> = {}
    for (const key of SETTING_KEYS) {
      if (key in parsed) out[key] = parsed[key]
    }
    return out
  }

  async writeSettings(values: EnvValues<SettingKey>): Promise<void> {
    await writeFileAtomic(this.settingsFile, serializeEnv(SETTING_KEYS, values), 0o600)
  }

  async writeSecrets(values: EnvValues<SecretKey>): Promise<void> {
    await writeFileAtomic(this.secretsFile, serializeEnv(SECRET_KEYS, values), 0o600)
  }

  async existing(): Promise<{ secrets: boolean; settings: boolean }> {
    const [secrets, settings] = await Promise.all([exists(this.secretsFile), exists(this.settingsFile)])
    return { secrets, settings }
  }
}
