import type { FastifyBaseLogger } from 'fastify'

export type Log = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>

// UI defaults, mirrored onto the analysis tool's flags
export interface Preferences {
  sourcePath: string
  depth: number
  logLevel: string
  ruleset: string | null
  envFile: string | null
}

export interface Invocation {
  command: string
  args: string[]
  cwd?: string
}

export interface SubmissionInput {
  path?: string
  depth?: number
  logLevel?: string
}

export interface UploadedFile {
  filename: string
  content: Buffer
}

export interface ScanSubmission extends SubmissionInput {
  files?: UploadedFile[]
}

export type FailureReason = 'exit' | 'timeout' | 'cancelled' | 'launch'

export interface JobDiagnostic {
  runId: string
  reason: FailureReason
  exitCode: number | null
  signal: string | null
  output: string
  message: string
  finishedAt: string
}

export interface DirectoryListing {
  cwd: string
  items: { name: string; path: string; dir: boolean }[]
}
