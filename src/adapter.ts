/**
 * Adapter
 *
 * Persistence interface for event records, grouped by calendar, plus an
 * in-memory mock implementation. Operations are synchronous: the tool runs
 * one command, performs blocking I/O, and exits.
 */

import type { EventRecord } from './event-record'
import type { EventId } from './types'
import { NotFoundError } from './errors'

export { NotFoundError, InvalidDataError, StoreIoError } from './errors'
export type { EventRecord } from './event-record'

// ============================================================================
// Interface
// ============================================================================

export interface EventAdapter {
  /** Calendar names, sorted */
  listCalendars(): string[]
  hasCalendar(calendar: string): boolean
  /** No-op when the calendar already exists */
  createCalendar(calendar: string): void

  /** Every record in the calendar; throws NotFoundError for an unknown calendar */
  listEvents(calendar: string): EventRecord[]
  getEvent(calendar: string, id: EventId): EventRecord | null
  /** Inserts or replaces by id; the calendar must exist */
  putEvent(record: EventRecord): void
  /** Returns false when no such event exists */
  deleteEvent(calendar: string, id: EventId): boolean
}

// ============================================================================
// Mock Adapter
// ============================================================================

export function createMockAdapter(): EventAdapter {
  // ---- State ----
  const calendars = new Map<string, Map<string, EventRecord>>()

  // ---- Helpers ----
  function clone<T>(obj: T): T {
    return structuredClone(obj)
  }

  function calendarOrThrow(calendar: string): Map<string, EventRecord> {
    const events = calendars.get(calendar)
    if (!events) throw new NotFoundError(`Calendar '${calendar}' not found`)
    return events
  }

  return {
    listCalendars() {
      return [...calendars.keys()].sort()
    },

    hasCalendar(calendar) {
      return calendars.has(calendar)
    },

    createCalendar(calendar) {
      if (!calendars.has(calendar)) calendars.set(calendar, new Map())
    },

    listEvents(calendar) {
      return [...calendarOrThrow(calendar).values()].map(clone)
    },

    getEvent(calendar, id) {
      const record = calendars.get(calendar)?.get(id)
      return record ? clone(record) : null
    },

    putEvent(record) {
      calendarOrThrow(record.calendar).set(record.id, clone(record))
    },

    deleteEvent(calendar, id) {
      return calendars.get(calendar)?.delete(id) ?? false
    },
  }
}
