/**
 * Event Record Model
 *
 * The persisted unit of a calendar, its invariants, partial updates, and the
 * derivation of display instances from a record's recurrence rule.
 */

import { randomUUID } from 'node:crypto'
import {
  type LocalDateTime,
  type TimeWindow,
  addElapsedMinutes,
  addMinutes,
  dateOf,
  elapsedMinutes,
  inWindow,
  toUTC,
  parseIsoDate,
  parseIsoDateTime,
  systemTimezone,
} from './time-date'
import { type Occurrence, type RecurrenceRule, expandRecurrence, isFrequency, validateRule } from './recurrence'
import type { EventId } from './types'
import { ValidationError } from './errors'

export { ValidationError } from './errors'
export type { EventId } from './types'
export type { Occurrence, RecurrenceRule } from './recurrence'

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_CALENDAR = 'personal'
export const DEFAULT_DURATION_MINUTES = 60

export type EventRecord = {
  id: EventId
  calendar: string
  name: string
  start: LocalDateTime
  end: LocalDateTime
  location?: string
  description?: string
  recurrence?: RecurrenceRule
}

export type EventInput = {
  calendar?: string
  name: string
  start: LocalDateTime
  /** Defaults to one hour after start */
  end?: LocalDateTime
  location?: string
  description?: string
  recurrence?: RecurrenceRule
}

/** Omitted fields keep their value; null removes an optional field. */
export type EventUpdate = {
  name?: string
  start?: LocalDateTime
  end?: LocalDateTime
  location?: string | null
  description?: string | null
  recurrence?: RecurrenceRule | null
}

export type EventInstance = {
  occurrence: Occurrence
  record: EventRecord
}

export type RecordOptions = {
  timezone?: string
}

// ============================================================================
// Identifiers
// ============================================================================

export function newEventId(): EventId {
  return randomUUID() as EventId
}

/** Names that are safe to use as a single path segment */
function checkPathSegment(value: string, what: string): void {
  if (value.length === 0) throw new ValidationError(`${what} must not be empty`)
  if (value.startsWith('.')) throw new ValidationError(`${what} must not start with '.': '${value}'`)
  if (/[/\\\0]/.test(value)) throw new ValidationError(`${what} must not contain path separators: '${value}'`)
}

export function validateCalendarName(name: string): void {
  checkPathSegment(name, 'Calendar name')
}

export function validateEventId(id: string): asserts id is EventId {
  checkPathSegment(id, 'Event id')
}

// ============================================================================
// Validation
// ============================================================================

function checkDateTime(value: string, field: string): void {
  if (!parseIsoDateTime(value).ok) {
    throw new ValidationError(`Invalid ${field}: '${value}'`)
  }
}

function checkRule(rule: RecurrenceRule, start: LocalDateTime): void {
  if (!isFrequency(rule.frequency)) {
    throw new ValidationError(`Unknown recurrence frequency: '${rule.frequency}'`)
  }
  if (rule.until !== undefined && !parseIsoDate(rule.until).ok) {
    throw new ValidationError(`Invalid recurrence until: '${rule.until}'`)
  }
  validateRule(rule, dateOf(start))
}

/** Zone-dependent checks read wall-clock values in options.timezone */
export function validateEventRecord(record: EventRecord, options: RecordOptions = {}): void {
  validateEventId(record.id)
  validateCalendarName(record.calendar)
  if (record.name.trim().length === 0) {
    throw new ValidationError('Event name must not be empty')
  }
  checkDateTime(record.start, 'start')
  checkDateTime(record.end, 'end')
  if (elapsedMinutes(record.start, record.end, options.timezone ?? systemTimezone()) <= 0) {
    throw new ValidationError(`Event end ${record.end} must be after start ${record.start}`)
  }
  if (record.recurrence) checkRule(record.recurrence, record.start)
}

// ============================================================================
// Construction & Update
// ============================================================================

/** Line breaks are stored as LF only */
function normalizeText(text: string): string {
  return text.replace(/\r\n?/g, '\n')
}

/** Builds a record without undefined-valued keys, dropping empty optional text */
function assemble(fields: {
  id: EventId
  calendar: string
  name: string
  start: LocalDateTime
  end: LocalDateTime
  location?: string | null
  description?: string | null
  recurrence?: RecurrenceRule | null
}): EventRecord {
  const record: EventRecord = {
    id: fields.id,
    calendar: fields.calendar,
    name: normalizeText(fields.name),
    start: fields.start,
    end: fields.end,
  }
  if (fields.location) record.location = normalizeText(fields.location)
  if (fields.description) record.description = normalizeText(fields.description)
  if (fields.recurrence) record.recurrence = { ...fields.recurrence }
  return record
}

export function createEventRecord(
  input: EventInput,
  options: RecordOptions & { id?: EventId } = {}
): EventRecord {
  checkDateTime(input.start, 'start')
  const tz = options.timezone ?? systemTimezone()
  const record = assemble({
    ...input,
    id: options.id ?? newEventId(),
    calendar: input.calendar ?? DEFAULT_CALENDAR,
    end: input.end ?? addElapsedMinutes(input.start, DEFAULT_DURATION_MINUTES, tz),
  })
  validateEventRecord(record, { timezone: tz })
  return record
}

/**
 * Returns a new record with the supplied fields changed. The input record is
 * never mutated, and nothing is returned unless every invariant still holds.
 */
export function applyEventUpdate(
  record: EventRecord,
  changes: EventUpdate,
  options: RecordOptions = {}
): EventRecord {
  const next = assemble({
    id: record.id,
    calendar: record.calendar,
    name: changes.name ?? record.name,
    start: changes.start ?? record.start,
    end: changes.end ?? record.end,
    location: changes.location === undefined ? record.location : changes.location,
    description: changes.description === undefined ? record.description : changes.description,
    recurrence: changes.recurrence === undefined ? record.recurrence : changes.recurrence,
  })
  validateEventRecord(next, options)
  return next
}

// ============================================================================
// Instances
// ============================================================================

export function durationOf(record: EventRecord, options: RecordOptions = {}): number {
  return elapsedMinutes(record.start, record.end, options.timezone ?? systemTimezone())
}

export type IntersectOptions = RecordOptions & {
  /** Elapsed length of the occurrence; measured from its readings when omitted */
  durationMinutes?: number
}

/** Compares UTC instants in the given zone */
export function intersects(occurrence: Occurrence, window: TimeWindow, options: IntersectOptions = {}): boolean {
  const tz = options.timezone ?? systemTimezone()
  const duration = options.durationMinutes ?? elapsedMinutes(occurrence.start, occurrence.end, tz)
  const start = toUTC(occurrence.start, tz)
  const utcWindow: TimeWindow = { start: toUTC(window.start, tz), end: toUTC(window.end, tz) }
  if (duration <= 0) {
    return inWindow(start, utcWindow)
  }
  return start < utcWindow.end && addMinutes(start, duration) > utcWindow.start
}

/**
 * Every occurrence of the record that intersects the window, in start order.
 * Each recurring occurrence lasts as many elapsed minutes as the record itself.
 */
export function* instancesIn(
  record: EventRecord,
  window: TimeWindow,
  options: RecordOptions = {}
): Generator<EventInstance, void, undefined> {
  const timezone = options.timezone ?? systemTimezone()
  const durationMinutes = durationOf(record, { timezone })
  if (!record.recurrence) {
    const occurrence = { start: record.start, end: record.end }
    if (intersects(occurrence, window, { timezone, durationMinutes })) yield { occurrence, record }
    return
  }

  // Occurrences starting up to one duration (plus a DST hour) early can still overlap
  const lookBehind: TimeWindow = {
    start: addMinutes(window.start, -(durationMinutes + 60)),
    end: window.end,
  }
  for (const occurrence of expandRecurrence(record.start, record.recurrence, lookBehind, {
    durationMinutes,
    timezone,
  })) {
    if (intersects(occurrence, window, { timezone, durationMinutes })) yield { occurrence, record }
  }
}

export function firstInstanceIn(
  record: EventRecord,
  window: TimeWindow,
  options: RecordOptions = {}
): EventInstance | undefined {
  for (const instance of instancesIn(record, window, options)) return instance
  return undefined
}
