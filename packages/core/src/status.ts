import { InvalidTransitionError } from './errors.js'
import type { Run, RunStatus, TerminalStatus } from './types.js'

const TRANSITIONS: Record<RunStatus, readonly RunStatus[]> = {
  pending: ['done', 'error'],
  done: [],
  error: []
}

export function isTerminal(status: RunStatus): status is TerminalStatus {
  return TRANSITIONS[status].length === 0
}

export function canTransition(from: RunStatus, to: RunStatus): boolean {
  return TRANSITIONS[from].includes(to)
}

export function transition(run: Run, to: TerminalStatus): Run {
  if (!canTransition(run.status, to)) throw new InvalidTransitionError(run.status, to)
  return { ...run, status: to }
}
