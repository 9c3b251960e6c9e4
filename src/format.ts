/**
 * Plain-text formatting of records, occurrences and buckets.
 */

import {
  type LocalDate,
  type LocalDateTime,
  dateOf,
  dayOf,
  dayOfWeek,
  monthOf,
  timeOf,
  weekdayToIndex,
  yearOf,
} from './time-date'
import type { EventInstance, EventRecord, RecurrenceRule } from './event-record'
import type { Bucket } from './buckets'

const WEEKDAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday']
const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
]

function weekdayName(date: LocalDate): string {
  return WEEKDAY_NAMES[weekdayToIndex(dayOfWeek(date))] ?? ''
}

function monthName(date: LocalDate): string {
  return MONTH_NAMES[monthOf(date) - 1] ?? ''
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

/** 09:30 */
export function formatClock(dt: LocalDateTime): string {
  return timeOf(dt).slice(0, 5)
}

/** Wed 31 Jan */
export function formatShortDate(date: LocalDate): string {
  return `${weekdayName(date).slice(0, 3)} ${pad2(dayOf(date))} ${monthName(date).slice(0, 3)}`
}

/** Wednesday, 31 January */
export function formatLongDate(date: LocalDate): string {
  return `${weekdayName(date)}, ${pad2(dayOf(date))} ${monthName(date)}`
}

function withLocation(record: EventRecord): string {
  return record.location !== undefined ? `${record.name} in ${record.location}` : record.name
}

/** Wed 31 Jan 09:00-10:00 - Standup in Room 4 */
export function formatInstanceLine(instance: EventInstance, options: { showId?: boolean } = {}): string {
  const { start, end } = instance.occurrence
  const line = `${formatShortDate(dateOf(start))} ${formatClock(start)}-${formatClock(end)} - ${withLocation(instance.record)}`
  return options.showId ? `${instance.record.id}: ${line}` : line
}

export function describeRule(rule: RecurrenceRule): string {
  const unit = { daily: 'day', weekly: 'week', monthly: 'month', yearly: 'year' }[rule.frequency]
  let text = rule.interval === 1 ? `every ${unit}` : `every ${rule.interval} ${unit}s`
  if (rule.until !== undefined) text += ` until ${rule.until}`
  if (rule.count !== undefined) text += `, ${rule.count} times`
  return text
}

export function formatDetails(record: EventRecord): string[] {
  const lines = [
    `Name: ${record.name}`,
    `Date: ${formatLongDate(dateOf(record.start))}`,
    `Time: ${formatClock(record.start)}-${formatClock(record.end)}`,
  ]
  if (record.location !== undefined) lines.push(`Location: ${record.location}`)
  if (record.description !== undefined) lines.push(`Description: ${record.description}`)
  if (record.recurrence) lines.push(`Repeats: ${describeRule(record.recurrence)}`)
  lines.push(`Calendar: ${record.calendar}`)
  lines.push(`Id: ${record.id}`)
  return lines
}

export function formatBucketHeading(bucket: Bucket): string {
  switch (bucket.mode) {
    case 'day':
      return `${formatLongDate(bucket.start)} ${yearOf(bucket.start)}`
    case 'week':
      return `Week of ${pad2(dayOf(bucket.start))} ${monthName(bucket.start).slice(0, 3)} ${yearOf(bucket.start)}`
    case 'month':
      return `${monthName(bucket.start)} ${yearOf(bucket.start)}`
  }
}

export function formatBuckets(buckets: Bucket[]): string[] {
  const lines: string[] = []
  for (const bucket of buckets) {
    lines.push(formatBucketHeading(bucket))
    if (bucket.instances.length === 0) lines.push('  (no events)')
    for (const instance of bucket.instances) {
      const { start, end } = instance.occurrence
      const when = bucket.mode === 'day' ? '' : `${formatShortDate(dateOf(start))} `
      lines.push(`  ${when}${formatClock(start)}-${formatClock(end)} - ${withLocation(instance.record)}`)
    }
  }
  return lines
}
