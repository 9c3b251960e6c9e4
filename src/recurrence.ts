/**
 * Recurrence Engine
 *
 * Lazily expands a first occurrence and a frequency/interval/end rule into the
 * concrete occurrences that start inside a query window.
 */

import {
  type LocalDate,
  type LocalDateTime,
  type TimeWindow,
  addDays,
  addMonths,
  dateOf,
  daysBetween,
  monthsBetween,
  withDate,
  addElapsedMinutes,
  systemTimezone,
} from './time-date'
import { ValidationError } from './errors'

export type { LocalDate, LocalDateTime, TimeWindow } from './time-date'

// ============================================================================
// Types
// ============================================================================

export const FREQUENCIES = ['daily', 'weekly', 'monthly', 'yearly'] as const

export type Frequency = (typeof FREQUENCIES)[number]

export type RecurrenceRule = {
  frequency: Frequency
  interval: number
  /** Last day (inclusive) on which an occurrence may start */
  until?: LocalDate
  /** Maximum number of occurrences, counting the first */
  count?: number
}

export type Occurrence = {
  start: LocalDateTime
  end: LocalDateTime
}

export type ExpandOptions = {
  /** Elapsed length of each occurrence; 0 yields zero-length occurrences */
  durationMinutes?: number
  timezone?: string
}

export function isFrequency(value: string): value is Frequency {
  return (FREQUENCIES as readonly string[]).includes(value)
}

// ============================================================================
// Stepping
// ============================================================================

/**
 * Start of occurrence k. Monthly and yearly steps are measured from the first
 * occurrence and clamped to the target month's length, so a rule anchored on
 * the 31st lands on the last day of shorter months and returns to the 31st in
 * long ones.
 */
export function nthOccurrence(first: LocalDateTime, rule: RecurrenceRule, k: number): LocalDateTime {
  const date = dateOf(first)
  switch (rule.frequency) {
    case 'daily':
      return withDate(first, addDays(date, k * rule.interval))
    case 'weekly':
      return withDate(first, addDays(date, k * rule.interval * 7))
    case 'monthly':
      return withDate(first, addMonths(date, k * rule.interval))
    case 'yearly':
      return withDate(first, addMonths(date, k * rule.interval * 12))
  }
}

/** Length of one step in days (daily, weekly) or months (monthly, yearly) */
const STEP_UNITS: Record<Frequency, number> = {
  daily: 1,
  weekly: 7,
  monthly: 1,
  yearly: 12,
}

/** Lowest k whose occurrence could start inside a window opening at `from` */
function firstCandidateIndex(first: LocalDateTime, rule: RecurrenceRule, from: LocalDateTime): number {
  const a = dateOf(first)
  const b = dateOf(from)
  const span = rule.frequency === 'daily' || rule.frequency === 'weekly'
    ? daysBetween(a, b)
    : monthsBetween(a, b)
  return Math.max(0, Math.floor(span / (STEP_UNITS[rule.frequency] * rule.interval)) - 1)
}

export function validateRule(rule: RecurrenceRule, firstDate?: LocalDate): void {
  if (!Number.isInteger(rule.interval) || rule.interval < 1) {
    throw new ValidationError(`Recurrence interval must be a positive integer, got ${rule.interval}`)
  }
  if (rule.count !== undefined && (!Number.isInteger(rule.count) || rule.count < 1)) {
    throw new ValidationError(`Recurrence count must be a positive integer, got ${rule.count}`)
  }
  if (rule.count !== undefined && rule.until !== undefined) {
    throw new ValidationError('Recurrence count and until are mutually exclusive')
  }
  if (firstDate !== undefined && rule.until !== undefined && rule.until < firstDate) {
    throw new ValidationError(`Recurrence until ${rule.until} is before the first occurrence ${firstDate}`)
  }
}

// ============================================================================
// Expansion
// ============================================================================

/**
 * Yields, in start order and without duplicates, every occurrence whose start
 * lies in [window.start, window.end). Stops at the window end, after `until`,
 * or after `count` occurrences, whichever comes first.
 */
export function* expandRecurrence(
  first: LocalDateTime,
  rule: RecurrenceRule,
  window: TimeWindow,
  options: ExpandOptions = {}
): Generator<Occurrence, void, undefined> {
  validateRule(rule)
  if (window.start > window.end) {
    throw new ValidationError('Window start must be <= end')
  }

  const duration = options.durationMinutes ?? 0
  const tz = options.timezone ?? systemTimezone()

  for (let k = firstCandidateIndex(first, rule, window.start); ; k++) {
    if (rule.count !== undefined && k >= rule.count) return
    const start = nthOccurrence(first, rule, k)
    if (rule.until !== undefined && dateOf(start) > rule.until) return
    if (start >= window.end) return
    if (start < window.start) continue
    yield {
      start,
      end: duration === 0 ? start : addElapsedMinutes(start, duration, tz),
    }
  }
}
