/**
 * Arbitraries for calendar values.
 */
import * as fc from 'fast-check'
import type { Arbitrary } from 'fast-check'
import {
  type LocalDate,
  type LocalDateTime,
  type LocalTime,
  daysInMonth,
  makeDate,
  makeDateTime,
  makeTime,
} from '../../../src/time-date'
import { FREQUENCIES, type RecurrenceRule } from '../../../src/recurrence'
import type { EventInput } from '../../../src/event-record'

// ============================================================================
// Dates and Times
// ============================================================================

export function localDateGen(options: { minYear?: number; maxYear?: number } = {}): Arbitrary<LocalDate> {
  return fc
    .record({
      year: fc.integer({ min: options.minYear ?? 1990, max: options.maxYear ?? 2090 }),
      month: fc.integer({ min: 1, max: 12 }),
    })
    .chain(({ year, month }) =>
      fc.integer({ min: 1, max: daysInMonth(year, month) }).map((day) => makeDate(year, month, day))
    )
}

export function localTimeGen(): Arbitrary<LocalTime> {
  return fc
    .record({ hour: fc.integer({ min: 0, max: 23 }), minute: fc.integer({ min: 0, max: 59 }) })
    .map(({ hour, minute }) => makeTime(hour, minute, 0))
}

export function localDateTimeGen(options: { minYear?: number; maxYear?: number } = {}): Arbitrary<LocalDateTime> {
  return fc.tuple(localDateGen(options), localTimeGen()).map(([date, time]) => makeDateTime(date, time))
}

// ============================================================================
// Rules and Records
// ============================================================================

/** Rules without `until`, optionally capped by a count */
export function ruleGen(): Arbitrary<RecurrenceRule> {
  return fc
    .record({
      frequency: fc.constantFrom(...FREQUENCIES),
      interval: fc.integer({ min: 1, max: 4 }),
      count: fc.option(fc.integer({ min: 1, max: 30 }), { nil: undefined }),
    })
    .map(({ frequency, interval, count }) => (count === undefined ? { frequency, interval } : { frequency, interval, count }))
}

const textGen = fc
  .stringOf(fc.oneof(fc.char(), fc.constantFrom('\r', '\n', '\r\n')), { minLength: 1, maxLength: 40 })
  .filter((s) => s.trim().length > 0)

export function eventInputGen(): Arbitrary<EventInput> {
  return fc
    .record({
      calendar: fc.constantFrom('personal', 'work', 'family'),
      name: textGen,
      start: localDateTimeGen({ minYear: 2000, maxYear: 2040 }),
      location: fc.option(textGen, { nil: undefined }),
      description: fc.option(textGen, { nil: undefined }),
      recurrence: fc.option(ruleGen(), { nil: undefined }),
    })
    .map(({ location, description, recurrence, ...required }) => ({
      ...required,
      ...(location !== undefined ? { location } : {}),
      ...(description !== undefined ? { description } : {}),
      ...(recurrence !== undefined ? { recurrence } : {}),
    }))
}
