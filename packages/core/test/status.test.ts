import { describe, it, expect } from 'vitest'
import { canTransition, isTerminal, transition } from '../src/status.js'
import { InvalidTransitionError } from '../src/errors.js'
import type { Run } from '../src/types.js'

const run: Run = { id: 'r1', type: 'scan', created: '2026-01-01T00:00:00.000Z', status: 'pending', path: '.' }

describe('run status machine', () => {
  it('allows only pending -> done and pending -> error', () => {
    expect(canTransition('pending', 'done')).toBe(true)
    expect(canTransition('pending', 'error')).toBe(true)
    expect(canTransition('done', 'error')).toBe(false)
    expect(canTransition('error', 'done')).toBe(false)
    expect(canTransition('done', 'pending')).toBe(false)
  })

  it('marks done and error as terminal', () => {
    expect(isTerminal('pending')).toBe(false)
    expect(isTerminal('done')).toBe(true)
    expect(isTerminal('error')).toBe(true)
  })

  it('returns a new record on transition and refuses to leave a terminal state', () => {
    const done = transition(run, 'done')
    expect(done.status).toBe('done')
    expect(run.status).toBe('pending')
    expect(() => transition(done, 'error')).toThrow(InvalidTransitionError)
  })
})
