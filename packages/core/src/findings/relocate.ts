import path from 'node:path'
import { isRecord } from '../records.js'
import { isInside } from '../workspace/guard.js'

export interface RelocateResult {
  findings: unknown[]
  rewritten: number
  skipped: number
}

function relocateOne(location: unknown, base: string): string | null {
  if (typeof location !== 'string' || !location) return null
  if (location.includes('\0') || !path.isAbsolute(location)) return null
  const resolved = path.resolve(location)
  if (!isInside(base, resolved)) return null
  return path.relative(base, resolved) || '.'
}

/**
 * Rewrites absolute finding locations that sit inside `baseDir` so they read
 * relative to it. Everything else comes back as the same value: entries that
 * are not objects, and locations that are relative, outside the base or
 * otherwise unusable. Those are counted in `skipped`; entries with no
 * location at all are not.
 */
export function relocateFindings(findings: readonly unknown[], baseDir: string): RelocateResult {
  const base = path.resolve(baseDir)
  let rewritten = 0
  let skipped = 0
  const out = findings.map(f => {
    if (!isRecord(f)) {
      skipped++
      return f
    }
    const next = relocateOne(f.location, base)
    if (next === null) {
      if (f.location !== undefined) skipped++
      return f
    }
    rewritten++
    return { ...f, location: next }
  })
  return { findings: out, rewritten, skipped }
}
