/**
 * Time & Date Utilities
 *
 * Pure functions for calendar dates, wall-clock date-times and their arithmetic.
 * Uses Julian Day Number for all day arithmetic to avoid month-length edge cases.
 * Zero external dependencies: uses Intl.DateTimeFormat for time zone offsets.
 *
 * Nothing here reads the clock. Callers hand in the reference instant.
 */

import { type Result, Ok, Err } from './result'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol
declare const __localDateTime: unique symbol

/** ISO 8601 date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** ISO 8601 time string: HH:MM:SS */
export type LocalTime = string & { readonly [__localTime]: true }

/** ISO 8601 local wall-clock datetime string: YYYY-MM-DDThh:mm:ss */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

export type Weekday = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun'

/** Half-open interval [start, end) of wall-clock instants */
export type TimeWindow = {
  start: LocalDateTime
  end: LocalDateTime
}

// ============================================================================
// Errors
// ============================================================================

export { ParseError } from './errors'
import { ParseError, ParseErrorReason } from './errors'

// ============================================================================
// Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  const days = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]
  if (month === 2 && isLeapYear(year)) return 29
  return days[month]!
}

export function isValidDate(year: number, month: number, day: number): boolean {
  return (
    Number.isInteger(year) && year >= 1 && year <= 9999 &&
    Number.isInteger(month) && month >= 1 && month <= 12 &&
    Number.isInteger(day) && day >= 1 && day <= daysInMonth(year, month)
  )
}

export function isValidTime(hour: number, minute: number, second: number): boolean {
  return hour >= 0 && hour <= 23 && minute >= 0 && minute <= 59 && second >= 0 && second <= 59
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

// ============================================================================
// Julian Day Number (for date arithmetic)
// ============================================================================

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): { year: number; month: number; day: number } {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

// ============================================================================
// Strict ISO Parsing
// ============================================================================

export function parseIsoDate(str: string): Result<LocalDate, ParseError> {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(ParseErrorReason.UNRECOGNIZED_FORMAT, str))

  const year = parseInt(match[1]!, 10)
  const month = parseInt(match[2]!, 10)
  const day = parseInt(match[3]!, 10)

  if (!isValidDate(year, month, day)) {
    return Err(new ParseError(ParseErrorReason.INVALID_DATE, str))
  }
  return Ok(str as LocalDate)
}

export function parseIsoDateTime(str: string): Result<LocalDateTime, ParseError> {
  const tIdx = str.indexOf('T')
  if (tIdx === -1) return Err(new ParseError(ParseErrorReason.UNRECOGNIZED_FORMAT, str))

  const dateResult = parseIsoDate(str.substring(0, tIdx))
  if (!dateResult.ok) return Err(new ParseError(dateResult.error.reason, str))

  const match = /^(\d{2}):(\d{2})(?::(\d{2}))?$/.exec(str.substring(tIdx + 1))
  if (!match) return Err(new ParseError(ParseErrorReason.UNRECOGNIZED_FORMAT, str))

  const hour = parseInt(match[1]!, 10)
  const minute = parseInt(match[2]!, 10)
  const second = match[3] ? parseInt(match[3], 10) : 0
  if (!isValidTime(hour, minute, second)) {
    return Err(new ParseError(ParseErrorReason.INVALID_TIME, str))
  }
  return Ok(makeDateTime(dateResult.value, makeTime(hour, minute, second)))
}

// ============================================================================
// Construction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

export function makeTime(hour: number, minute: number, second?: number): LocalTime {
  return `${pad2(hour)}:${pad2(minute)}:${pad2(second ?? 0)}` as LocalTime
}

export function makeDateTime(date: LocalDate, time: LocalTime): LocalDateTime {
  return `${date}T${time}` as LocalDateTime
}

export const MIDNIGHT = makeTime(0, 0, 0)

export function startOfDay(date: LocalDate): LocalDateTime {
  return makeDateTime(date, MIDNIGHT)
}

/** Wall-clock reading of a JS Date in the process time zone */
export function fromJsDate(d: Date): LocalDateTime {
  return makeDateTime(
    makeDate(d.getFullYear(), d.getMonth() + 1, d.getDate()),
    makeTime(d.getHours(), d.getMinutes(), d.getSeconds())
  )
}

// ============================================================================
// Component Extraction
// ============================================================================

export function yearOf(date: LocalDate): number {
  return parseInt(date.substring(0, 4), 10)
}

export function monthOf(date: LocalDate): number {
  return parseInt(date.substring(5, 7), 10)
}

export function dayOf(date: LocalDate): number {
  return parseInt(date.substring(8, 10), 10)
}

export function hourOf(time: LocalTime): number {
  return parseInt(time.substring(0, 2), 10)
}

export function minuteOf(time: LocalTime): number {
  return parseInt(time.substring(3, 5), 10)
}

export function secondOf(time: LocalTime): number {
  return parseInt(time.substring(6, 8), 10)
}

export function dateOf(dt: LocalDateTime): LocalDate {
  return dt.substring(0, 10) as LocalDate
}

export function timeOf(dt: LocalDateTime): LocalTime {
  return dt.substring(11) as LocalTime
}

// ============================================================================
// Date Arithmetic (via JDN)
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  const jdn = dateToJDN(yearOf(date), monthOf(date), dayOf(date))
  const { year, month, day } = jdnToDate(jdn + n)
  return makeDate(year, month, day)
}

export function daysBetween(a: LocalDate, b: LocalDate): number {
  const jdnA = dateToJDN(yearOf(a), monthOf(a), dayOf(a))
  const jdnB = dateToJDN(yearOf(b), monthOf(b), dayOf(b))
  return jdnB - jdnA
}

/**
 * Adds calendar months. A day-of-month missing from the target month is
 * clamped to that month's last day (Jan 31 + 1 month = Feb 28/29).
 */
export function addMonths(date: LocalDate, n: number): LocalDate {
  const total = yearOf(date) * 12 + (monthOf(date) - 1) + n
  const year = Math.floor(total / 12)
  const month = total - year * 12 + 1
  const day = Math.min(dayOf(date), daysInMonth(year, month))
  return makeDate(year, month, day)
}

export function addYears(date: LocalDate, n: number): LocalDate {
  return addMonths(date, n * 12)
}

/** Whole months from a to b, ignoring the day of month */
export function monthsBetween(a: LocalDate, b: LocalDate): number {
  return (yearOf(b) - yearOf(a)) * 12 + (monthOf(b) - monthOf(a))
}

// ============================================================================
// DateTime Arithmetic (wall clock)
// ============================================================================

export function addMinutes(dt: LocalDateTime, n: number): LocalDateTime {
  const date = dateOf(dt)
  const time = timeOf(dt)

  let totalMinutes = hourOf(time) * 60 + minuteOf(time) + n
  const seconds = secondOf(time)

  // Handle day overflow/underflow (avoid JS % sign-preservation bug)
  const dayDelta = Math.floor(totalMinutes / 1440)
  totalMinutes = totalMinutes - dayDelta * 1440

  const newHour = Math.floor(totalMinutes / 60)
  const newMinute = totalMinutes % 60

  const newDate = dayDelta === 0 ? date : addDays(date, dayDelta)
  return makeDateTime(newDate, makeTime(newHour, newMinute, seconds))
}

export function minutesBetween(a: LocalDateTime, b: LocalDateTime): number {
  return Math.round((dtToMs(b) - dtToMs(a)) / 60000)
}

/** Moves the date part of dt, keeping its wall-clock time */
export function withDate(dt: LocalDateTime, date: LocalDate): LocalDateTime {
  return makeDateTime(date, timeOf(dt))
}

// ============================================================================
// Day-of-Week
// ============================================================================

const WEEKDAYS: Weekday[] = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']

export function dayOfWeek(date: LocalDate): Weekday {
  const jdn = dateToJDN(yearOf(date), monthOf(date), dayOf(date))
  // JDN mod 7: 0 = Monday
  const idx = ((jdn % 7) + 7) % 7
  return WEEKDAYS[idx]!
}

export function weekdayToIndex(w: Weekday): number {
  return WEEKDAYS.indexOf(w)
}

/** Monday on or before the given date */
export function startOfWeek(date: LocalDate): LocalDate {
  return addDays(date, -weekdayToIndex(dayOfWeek(date)))
}

export function startOfMonth(date: LocalDate): LocalDate {
  return makeDate(yearOf(date), monthOf(date), 1)
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDates(a: LocalDate, b: LocalDate): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function compareDateTimes(a: LocalDateTime, b: LocalDateTime): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function inWindow(dt: LocalDateTime, window: TimeWindow): boolean {
  return dt >= window.start && dt < window.end
}

// ============================================================================
// Timezone Conversion
// ============================================================================

/** IANA name of the process time zone */
export function systemTimezone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone
}

/** Given a UTC epoch in ms, return the UTC offset in minutes for timezone tz */
function utcOffsetAtMs(utcMs: number, tz: string): number {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: tz,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  })

  const parts = formatter.formatToParts(new Date(utcMs))
  const get = (type: string) => {
    const part = parts.find((p) => p.type === type)
    return part ? parseInt(part.value, 10) : 0
  }

  let h = get('hour')
  if (h === 24) h = 0
  const localMs = Date.UTC(get('year'), get('month') - 1, get('day'), h, get('minute'), get('second'))
  return (localMs - utcMs) / 60000
}

/** Convert a LocalDateTime to epoch ms (treating it as UTC) */
function dtToMs(dt: LocalDateTime): number {
  const d = dateOf(dt), t = timeOf(dt)
  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC
  const ms = new Date(0)
  ms.setUTCFullYear(yearOf(d), monthOf(d) - 1, dayOf(d))
  ms.setUTCHours(hourOf(t), minuteOf(t), secondOf(t), 0)
  return ms.getTime()
}

/** Convert epoch ms to a LocalDateTime (treating ms as UTC) */
function msToDt(ms: number): LocalDateTime {
  const d = new Date(ms)
  return makeDateTime(
    makeDate(d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate()),
    makeTime(d.getUTCHours(), d.getUTCMinutes(), d.getUTCSeconds())
  )
}

export function toLocal(utc: LocalDateTime, tz: string): LocalDateTime {
  const utcMs = dtToMs(utc)
  const offset = utcOffsetAtMs(utcMs, tz)
  return msToDt(utcMs + offset * 60000)
}

export function toUTC(local: LocalDateTime, tz: string): LocalDateTime {
  if (tz === 'UTC') return local

  const localMs = dtToMs(local)
  const year = yearOf(dateOf(local))

  // Determine standard and daylight offsets from Jan/Jul
  const janOffset = utcOffsetAtMs(Date.UTC(year, 0, 15, 12, 0, 0), tz)
  const julOffset = utcOffsetAtMs(Date.UTC(year, 6, 15, 12, 0, 0), tz)

  if (janOffset === julOffset) {
    return msToDt(localMs - janOffset * 60000)
  }

  const stdOffset = Math.min(janOffset, julOffset)
  const dstOffset = Math.max(janOffset, julOffset)
  const dstStatus = isDSTAt(local, tz)

  if (dstStatus === 'gap') {
    // DST transitions are always minute-aligned
    const utcViaDst = localMs - dstOffset * 60000
    const utcViaStd = localMs - stdOffset * 60000
    for (let ms = utcViaDst; ms <= utcViaStd; ms += 60000) {
      if (utcOffsetAtMs(ms, tz) !== stdOffset) {
        return msToDt(ms)
      }
    }
    return msToDt(utcViaStd)
  }

  if (dstStatus === 'overlap') {
    // Earlier of the two readings, i.e. still on daylight time
    return msToDt(localMs - dstOffset * 60000)
  }

  if (dstStatus === true) {
    return msToDt(localMs - dstOffset * 60000)
  }

  return msToDt(localMs - stdOffset * 60000)
}

export function isDSTAt(
  dt: LocalDateTime,
  tz: string
): boolean | 'gap' | 'overlap' {
  if (tz === 'UTC') return false

  const localMs = dtToMs(dt)
  const year = yearOf(dateOf(dt))

  const janOffset = utcOffsetAtMs(Date.UTC(year, 0, 15, 12, 0, 0), tz)
  const julOffset = utcOffsetAtMs(Date.UTC(year, 6, 15, 12, 0, 0), tz)

  if (janOffset === julOffset) return false

  const stdOffset = Math.min(janOffset, julOffset)
  const dstOffset = Math.max(janOffset, julOffset)

  // Try both possible offsets to map local → UTC, then check round-trip
  const utcViaStd = localMs - stdOffset * 60000
  const utcViaDst = localMs - dstOffset * 60000

  const stdMapsBack = utcViaStd + utcOffsetAtMs(utcViaStd, tz) * 60000 === localMs
  const dstMapsBack = utcViaDst + utcOffsetAtMs(utcViaDst, tz) * 60000 === localMs

  if (stdMapsBack && dstMapsBack) return 'overlap'
  if (!stdMapsBack && !dstMapsBack) return 'gap'

  return dstMapsBack
}

// ============================================================================
// Elapsed-Time Arithmetic (through a time zone)
// ============================================================================

/** UTC reading of the second (standard-time) occurrence of a repeated local reading */
function laterReading(local: LocalDateTime, tz: string): LocalDateTime {
  const year = yearOf(dateOf(local))
  const stdOffset = Math.min(
    utcOffsetAtMs(Date.UTC(year, 0, 15, 12, 0, 0), tz),
    utcOffsetAtMs(Date.UTC(year, 6, 15, 12, 0, 0), tz)
  )
  return msToDt(dtToMs(local) - stdOffset * 60000)
}

/**
 * Real minutes elapsed between two wall-clock readings in zone tz. A reading
 * that occurs twice when clocks go back means its first instant for `a`, and
 * for `b` the first of its instants that comes after `a`.
 */
export function elapsedMinutes(a: LocalDateTime, b: LocalDateTime, tz: string): number {
  const from = toUTC(a, tz)
  const to = toUTC(b, tz)
  if (to <= from && isDSTAt(b, tz) === 'overlap') {
    return minutesBetween(from, laterReading(b, tz))
  }
  return minutesBetween(from, to)
}

/** Wall-clock reading in zone tz after n real minutes have elapsed from dt */
export function addElapsedMinutes(dt: LocalDateTime, n: number, tz: string): LocalDateTime {
  return toLocal(msToDt(dtToMs(toUTC(dt, tz)) + n * 60000), tz)
}
