/**
 * Event Store
 *
 * Calendar-level operations over an EventAdapter: windowed and filtered
 * listing, lookup by id, insert, partial update and delete.
 */

import { type LocalDateTime, type TimeWindow, compareDateTimes } from './time-date'
import type { EventAdapter } from './adapter'
import type { EventId } from './types'
import {
  type EventInput,
  type EventInstance,
  type EventRecord,
  type EventUpdate,
  applyEventUpdate,
  createEventRecord,
  firstInstanceIn,
  instancesIn,
  validateCalendarName,
  validateEventId,
} from './event-record'
import { NotFoundError, ValidationError } from './errors'

export { NotFoundError, ValidationError } from './errors'
export type { EventInput, EventInstance, EventRecord, EventUpdate } from './event-record'

// ============================================================================
// Types
// ============================================================================

export type EventQuery = {
  /** Every calendar when omitted */
  calendar?: string
  window: TimeWindow
  /** Whitespace-separated terms; all must match */
  text?: string
  limit?: number
}

export type StoreOptions = {
  timezone?: string
}

// ============================================================================
// Helpers
// ============================================================================

function checkQuery(query: EventQuery): void {
  if (query.window.start > query.window.end) {
    throw new ValidationError(`Window start ${query.window.start} is after end ${query.window.end}`)
  }
  if (query.limit !== undefined && (!Number.isInteger(query.limit) || query.limit < 0)) {
    throw new ValidationError(`Limit must be a non-negative integer, got ${query.limit}`)
  }
}

/** Case-insensitive; every term must appear in the name, location or description */
export function matchesText(record: EventRecord, text: string): boolean {
  const terms = text.toLowerCase().split(/\s+/).filter((t) => t.length > 0)
  const fields = [record.name, record.location ?? '', record.description ?? ''].map((f) => f.toLowerCase())
  return terms.every((term) => fields.some((field) => field.includes(term)))
}

function recordsFor(adapter: EventAdapter, query: EventQuery): EventRecord[] {
  const calendars = query.calendar !== undefined ? [query.calendar] : adapter.listCalendars()
  const records: EventRecord[] = []
  for (const calendar of calendars) {
    validateCalendarName(calendar)
    records.push(...adapter.listEvents(calendar))
  }
  const text = query.text
  return text !== undefined ? records.filter((r) => matchesText(r, text)) : records
}

function byNameThenId(a: EventRecord, b: EventRecord): number {
  if (a.name !== b.name) return a.name < b.name ? -1 : 1
  if (a.id !== b.id) return a.id < b.id ? -1 : 1
  return 0
}

function truncate<T>(items: T[], limit: number | undefined): T[] {
  return limit === undefined ? items : items.slice(0, limit)
}

// ============================================================================
// Queries
// ============================================================================

export function listCalendars(adapter: EventAdapter): string[] {
  return adapter.listCalendars()
}

/**
 * Records with at least one occurrence intersecting the window, ordered by
 * the start of their first such occurrence.
 */
export function listEvents(adapter: EventAdapter, query: EventQuery, options: StoreOptions = {}): EventRecord[] {
  checkQuery(query)
  const keyed: { start: LocalDateTime; record: EventRecord }[] = []
  for (const record of recordsFor(adapter, query)) {
    const first = firstInstanceIn(record, query.window, options)
    if (first) keyed.push({ start: first.occurrence.start, record })
  }
  keyed.sort((a, b) => compareDateTimes(a.start, b.start) || byNameThenId(a.record, b.record))
  return truncate(keyed.map((k) => k.record), query.limit)
}

/** Every occurrence intersecting the window, ordered by occurrence start */
export function listOccurrences(
  adapter: EventAdapter,
  query: EventQuery,
  options: StoreOptions = {}
): EventInstance[] {
  checkQuery(query)
  const instances: EventInstance[] = []
  for (const record of recordsFor(adapter, query)) {
    instances.push(...instancesIn(record, query.window, options))
  }
  instances.sort(
    (a, b) => compareDateTimes(a.occurrence.start, b.occurrence.start) || byNameThenId(a.record, b.record)
  )
  return truncate(instances, query.limit)
}

export function getEvent(adapter: EventAdapter, calendar: string, id: string): EventRecord {
  validateCalendarName(calendar)
  validateEventId(id)
  if (!adapter.hasCalendar(calendar)) {
    throw new NotFoundError(`Calendar '${calendar}' not found`)
  }
  const record = adapter.getEvent(calendar, id)
  if (!record) throw new NotFoundError(`No event '${id}' in calendar '${calendar}'`)
  return record
}

// ============================================================================
// Mutations
// ============================================================================

/** Creates the calendar on first use. Returns the new event's id. */
export function insertEvent(
  adapter: EventAdapter,
  input: EventInput,
  options: StoreOptions & { id?: EventId } = {}
): EventId {
  const record = createEventRecord(input, options)
  adapter.createCalendar(record.calendar)
  adapter.putEvent(record)
  return record.id
}

/** Changes only the supplied fields; nothing is written if the result is invalid */
export function updateEvent(
  adapter: EventAdapter,
  calendar: string,
  id: string,
  changes: EventUpdate,
  options: StoreOptions = {}
): EventRecord {
  const current = getEvent(adapter, calendar, id)
  const next = applyEventUpdate(current, changes, options)
  adapter.putEvent(next)
  return next
}

export function deleteEvent(adapter: EventAdapter, calendar: string, id: string): void {
  validateCalendarName(calendar)
  validateEventId(id)
  if (!adapter.hasCalendar(calendar) || !adapter.deleteEvent(calendar, id)) {
    throw new NotFoundError(`No event '${id}' in calendar '${calendar}'`)
  }
}
