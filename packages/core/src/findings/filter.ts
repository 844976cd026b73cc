import { WrongRunTypeError } from '../errors.js'
import { isRecord } from '../records.js'
import type { FindingCriteria, Report } from '../types.js'

const text = (value: unknown): string => (typeof value === 'string' ? value : '')

// Entries that are not objects never match a criterion.
export function matchesCriteria(entry: unknown, criteria: FindingCriteria): boolean {
  if (!isRecord(entry)) return false
  if (criteria.severity && entry.severity !== criteria.severity) return false
  if (criteria.owaspId && !text(entry.owaspId).includes(criteria.owaspId)) return false
  if (criteria.component && !text(entry.location).includes(criteria.component)) return false
  return true
}

// Criteria are ANDed; empty strings count as absent.
export function filterFindings(report: Report, criteria: FindingCriteria = {}): unknown[] {
  if (report.type !== 'scan') throw new WrongRunTypeError('scan')
  const findings = report.data.findings
  if (!criteria.severity && !criteria.owaspId && !criteria.component) return findings
  return findings.filter(f => matchesCriteria(f, criteria))
}
