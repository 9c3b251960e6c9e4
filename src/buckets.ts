/**
 * Buckets
 *
 * Groups occurrences into day, week (Monday-based) or month buckets for the
 * rendering layer, and computes the window a multi-bucket view covers.
 */

import {
  type LocalDate,
  type TimeWindow,
  addDays,
  addMonths,
  dateOf,
  startOfDay,
  startOfMonth,
  startOfWeek,
} from './time-date'
import type { EventInstance } from './event-record'
import { ValidationError } from './errors'

export const VIEW_MODES = ['day', 'week', 'month'] as const

export type ViewMode = (typeof VIEW_MODES)[number]

export type Bucket = {
  mode: ViewMode
  /** First day of the bucket */
  start: LocalDate
  /** Day after the last day of the bucket */
  end: LocalDate
  instances: EventInstance[]
}

export function isViewMode(value: string): value is ViewMode {
  return (VIEW_MODES as readonly string[]).includes(value)
}

export function bucketStart(date: LocalDate, mode: ViewMode): LocalDate {
  switch (mode) {
    case 'day':
      return date
    case 'week':
      return startOfWeek(date)
    case 'month':
      return startOfMonth(date)
  }
}

function advance(start: LocalDate, mode: ViewMode, n: number): LocalDate {
  switch (mode) {
    case 'day':
      return addDays(start, n)
    case 'week':
      return addDays(start, n * 7)
    case 'month':
      return addMonths(start, n)
  }
}

/** Window covering `count` buckets, starting with the one that contains `date` */
export function viewWindow(date: LocalDate, mode: ViewMode, count = 1): TimeWindow {
  if (!Number.isInteger(count) || count < 1) {
    throw new ValidationError(`View count must be a positive integer, got ${count}`)
  }
  const start = bucketStart(date, mode)
  return { start: startOfDay(start), end: startOfDay(advance(start, mode, count)) }
}

/**
 * Places each instance in the bucket holding its start day. With a window,
 * every bucket the window touches is returned, empty ones included, and an
 * instance that began before the window lands in the first bucket. Without
 * one, only non-empty buckets are returned. Instance order is preserved.
 */
export function groupOccurrences(instances: EventInstance[], mode: ViewMode, window?: TimeWindow): Bucket[] {
  const buckets = new Map<LocalDate, Bucket>()

  function bucketFor(day: LocalDate): Bucket {
    const start = bucketStart(day, mode)
    let bucket = buckets.get(start)
    if (!bucket) {
      bucket = { mode, start, end: advance(start, mode, 1), instances: [] }
      buckets.set(start, bucket)
    }
    return bucket
  }

  if (window) {
    const last = dateOf(window.end)
    for (let day = bucketStart(dateOf(window.start), mode); day < last; day = advance(day, mode, 1)) {
      bucketFor(day)
    }
  }

  for (const instance of instances) {
    let day = dateOf(instance.occurrence.start)
    if (window && instance.occurrence.start < window.start) day = dateOf(window.start)
    bucketFor(day).instances.push(instance)
  }

  return [...buckets.values()].sort((a, b) => (a.start < b.start ? -1 : a.start > b.start ? 1 : 0))
}
