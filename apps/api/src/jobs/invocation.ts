import type { RunType } from '@runboard/core'
import type { Invocation, Preferences } from '../types.js'

export interface InvocationRequest {
  type: RunType
  target: string
  output: string
  depth?: number
  logLevel?: string
}

const SUBCOMMANDS: Record<RunType, string[]> = {
  scan: ['scan'],
  inventory: ['ai-inventory']
}

/**
 * Picks the env file handed to the tool: an explicit one, then the one set in
 * preferences, then the server's secrets file, then its settings file. With
 * none, the tool falls back to a .env in its working directory.
 */
export function chooseEnvFile(
  prefs: Preferences,
  files: { secretsFile: string; settingsFile: string },
  existing: { secrets: boolean; settings: boolean },
  explicit?: string | null
): string | null {
  if (explicit) return explicit
  if (prefs.envFile) return prefs.envFile
  if (existing.secrets) return files.secretsFile
  if (existing.settings) return files.settingsFile
  return null
}

export function buildInvocation(bin: string, req: InvocationRequest, prefs: Preferences, envFile: string | null): Invocation {
  const args = [...SUBCOMMANDS[req.type], req.target]
  // the UI always wants the graph for inventories
  if (req.type === 'inventory') args.push('--graph')
  args.push('--output', req.output)
  args.push('-d', String(req.depth ?? prefs.depth))
  args.push('-l', req.logLevel || prefs.logLevel)
  if (prefs.ruleset) args.push('-r', prefs.ruleset)
  if (envFile) args.push('-e', envFile)
  return { command: bin, args }
}
