/**
 * Expression Parser
 *
 * Turns loose human date/time expressions ("tom@14", "jan-08@10:00",
 * "mon@09:30", "2w") into concrete dates and wall-clock instants.
 *
 * Date expressions are matched by an ordered list of independent recognizers.
 * The first recognizer that claims the input decides the outcome, even when
 * a later one would also have matched. The reference date is always an
 * explicit argument; the clock is never read here.
 */

import {
  type LocalDate,
  type LocalTime,
  type LocalDateTime,
  type Weekday,
  addDays,
  addMonths,
  addYears,
  dayOfWeek,
  weekdayToIndex,
  isValidDate,
  isValidTime,
  makeDate,
  makeTime,
  makeDateTime,
  yearOf,
  monthOf,
  compareDates,
  MIDNIGHT,
} from './time-date'
import { type Result, Ok, Err } from './result'
import { ParseError, ParseErrorReason } from './errors'

export { ParseError, ParseErrorReason } from './errors'
export type { LocalDate, LocalTime, LocalDateTime } from './time-date'

// ============================================================================
// Types
// ============================================================================

/**
 * Outcome of one recognizer: null when the input is not of its grammar class,
 * otherwise a definite parse result (which may still be a failure, such as a
 * well-formed numeric date that names day 30 of February).
 */
export type Recognition = Result<LocalDate, ParseError> | null

export type DateRecognizer = {
  readonly name: string
  recognize(text: string, reference: LocalDate): Recognition
}

export type DateTimeOptions = {
  /** Reject expressions without an `@time` part instead of defaulting to midnight */
  requireTime?: boolean
}

// ============================================================================
// Vocabulary
// ============================================================================

const MONTHS: Record<string, number> = {
  jan: 1, january: 1,
  feb: 2, february: 2,
  mar: 3, march: 3,
  apr: 4, april: 4,
  may: 5,
  jun: 6, june: 6,
  jul: 7, july: 7,
  aug: 8, august: 8,
  sep: 9, september: 9,
  oct: 10, october: 10,
  nov: 11, november: 11,
  dec: 12, december: 12,
}

const WEEKDAY_NAMES: Record<string, Weekday> = {
  mon: 'mon', monday: 'mon',
  tue: 'tue', tuesday: 'tue',
  wed: 'wed', wednesday: 'wed',
  thu: 'thu', thursday: 'thu',
  fri: 'fri', friday: 'fri',
  sat: 'sat', saturday: 'sat',
  sun: 'sun', sunday: 'sun',
}

function monthNumber(name: string): number | undefined {
  return Object.prototype.hasOwnProperty.call(MONTHS, name) ? MONTHS[name] : undefined
}

// ============================================================================
// Shared Rules
// ============================================================================

function invalidDate(text: string, detail?: string): Recognition {
  return Err(new ParseError(ParseErrorReason.INVALID_DATE, text, detail))
}

function checkedDate(text: string, year: number, month: number, day: number): Recognition {
  if (!isValidDate(year, month, day)) return invalidDate(text)
  return Ok(makeDate(year, month, day))
}

/** Year-range guard for arithmetic that can run off the calendar */
function checkedArithmetic(text: string, result: LocalDate): Recognition {
  const year = yearOf(result)
  if (year < 1 || year > 9999) return invalidDate(text, 'out of range')
  return Ok(result)
}

/**
 * Resolves a yearless day and month: this year when that date is on or after
 * the reference date, otherwise next year. A date that only exists next year
 * (29 February) resolves to next year.
 */
function nextOccurrenceOf(text: string, reference: LocalDate, month: number, day: number): Recognition {
  const thisYear = yearOf(reference)
  if (isValidDate(thisYear, month, day)) {
    const candidate = makeDate(thisYear, month, day)
    if (compareDates(candidate, reference) >= 0) return Ok(candidate)
  }
  if (isValidDate(thisYear + 1, month, day)) {
    return Ok(makeDate(thisYear + 1, month, day))
  }
  return invalidDate(text, 'no such day in that month')
}

// ============================================================================
// Recognizers (priority order)
// ============================================================================

const FULL_YMD = /^(\d{4})([-/])(\d{1,2})\2(\d{1,2})$/
const FULL_DMY = /^(\d{1,2})([-/])(\d{1,2})\2(\d{4})$/

/** YYYY-MM-DD, DD-MM-YYYY, YYYY/MM/DD, DD/MM/YYYY */
export const fullNumericDate: DateRecognizer = {
  name: 'full-numeric',
  recognize(text) {
    let m = FULL_YMD.exec(text)
    if (m) return checkedDate(text, parseInt(m[1]!, 10), parseInt(m[3]!, 10), parseInt(m[4]!, 10))
    m = FULL_DMY.exec(text)
    if (m) return checkedDate(text, parseInt(m[4]!, 10), parseInt(m[3]!, 10), parseInt(m[1]!, 10))
    return null
  },
}

const SHORT_DM = /^(\d{1,2})[-/](\d{1,2})$/

/** DD-MM, DD/MM with the year inferred */
export const shortNumericDate: DateRecognizer = {
  name: 'short-numeric',
  recognize(text, reference) {
    const m = SHORT_DM.exec(text)
    if (!m) return null
    const day = parseInt(m[1]!, 10)
    const month = parseInt(m[2]!, 10)
    if (month < 1 || month > 12 || day < 1 || day > 31) return invalidDate(text)
    return nextOccurrenceOf(text, reference, month, day)
  },
}

const RELATIVE_OFFSET = /^(\d+)([dwmy])$/

/** yesterday/yes, today, tomorrow/tom, and <N>d, <N>w, <N>m, <N>y */
export const relativeKeyword: DateRecognizer = {
  name: 'relative',
  recognize(text, reference) {
    switch (text) {
      case 'yesterday':
      case 'yes':
        return checkedArithmetic(text, addDays(reference, -1))
      case 'today':
        return Ok(reference)
      case 'tomorrow':
      case 'tom':
        return checkedArithmetic(text, addDays(reference, 1))
    }

    const m = RELATIVE_OFFSET.exec(text)
    if (!m) return null
    const n = parseInt(m[1]!, 10)
    if (n > 3_650_000) return invalidDate(text, 'out of range')
    switch (m[2]) {
      case 'd':
        return checkedArithmetic(text, addDays(reference, n))
      case 'w':
        return checkedArithmetic(text, addDays(reference, n * 7))
      case 'm':
        return checkedArithmetic(text, addMonths(reference, n))
      default:
        return checkedArithmetic(text, addYears(reference, n))
    }
  },
}

/**
 * Full or three-letter weekday name: the next such day strictly after the
 * reference date. Typing "monday" on a Monday means the Monday a week later.
 */
export const weekdayName: DateRecognizer = {
  name: 'weekday',
  recognize(text, reference) {
    const target = Object.prototype.hasOwnProperty.call(WEEKDAY_NAMES, text) ? WEEKDAY_NAMES[text] : undefined
    if (target === undefined) return null
    const diff = (weekdayToIndex(target) - weekdayToIndex(dayOfWeek(reference)) + 7) % 7
    return checkedArithmetic(text, addDays(reference, diff === 0 ? 7 : diff))
  },
}

/** Bare month name: the 1st of that month, this year unless the month is already behind us */
export const monthName: DateRecognizer = {
  name: 'month',
  recognize(text, reference) {
    const month = monthNumber(text)
    if (month === undefined) return null
    const year = monthOf(reference) > month ? yearOf(reference) + 1 : yearOf(reference)
    return checkedDate(text, year, month, 1)
  },
}

const MONTH_YEAR = /^([a-z]+)[-/](\d{4})$/
const YEAR_MONTH = /^(\d{4})[-/]([a-z]+)$/

/** MMM-YYYY, YYYY-MMM: the 1st of that month */
export const monthYear: DateRecognizer = {
  name: 'month-year',
  recognize(text) {
    let month: number | undefined
    let year: number
    let m = MONTH_YEAR.exec(text)
    if (m) {
      month = monthNumber(m[1]!)
      year = parseInt(m[2]!, 10)
    } else {
      m = YEAR_MONTH.exec(text)
      if (!m) return null
      year = parseInt(m[1]!, 10)
      month = monthNumber(m[2]!)
    }
    if (month === undefined) return null
    return checkedDate(text, year, month, 1)
  },
}

const DAY_NAMED_MONTH = /^(\d{1,2})[-/]([a-z]+)$/
const NAMED_MONTH_DAY = /^([a-z]+)[-/](\d{1,2})$/

/** DD-MMM, MMM-DD (and slash forms) with the year inferred */
export const namedDayMonth: DateRecognizer = {
  name: 'named-day-month',
  recognize(text, reference) {
    let day: number
    let month: number | undefined
    let m = DAY_NAMED_MONTH.exec(text)
    if (m) {
      day = parseInt(m[1]!, 10)
      month = monthNumber(m[2]!)
    } else {
      m = NAMED_MONTH_DAY.exec(text)
      if (!m) return null
      month = monthNumber(m[1]!)
      day = parseInt(m[2]!, 10)
    }
    if (month === undefined) return null
    if (day < 1 || day > 31) return invalidDate(text)
    return nextOccurrenceOf(text, reference, month, day)
  },
}

/** The dispatch order. Earlier entries win on ambiguous input. */
export const DATE_RECOGNIZERS: readonly DateRecognizer[] = [
  fullNumericDate,
  shortNumericDate,
  relativeKeyword,
  weekdayName,
  monthName,
  monthYear,
  namedDayMonth,
]

// ============================================================================
// Public Parsing API
// ============================================================================

export function parseDate(text: string, reference: LocalDate): Result<LocalDate, ParseError> {
  const normalized = text.trim().toLowerCase()
  for (const recognizer of DATE_RECOGNIZERS) {
    const outcome = recognizer.recognize(normalized, reference)
    if (outcome !== null) return outcome
  }
  return Err(new ParseError(ParseErrorReason.UNRECOGNIZED_FORMAT, text))
}

const CLOCK_TIME = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/
const BARE_HOUR = /^\d{1,2}$/

/** HH:MM, HH:MM:SS, or a bare hour ("2" is 02:00) */
export function parseTime(text: string): Result<LocalTime, ParseError> {
  const normalized = text.trim()

  const m = CLOCK_TIME.exec(normalized)
  if (m) {
    const hour = parseInt(m[1]!, 10)
    const minute = parseInt(m[2]!, 10)
    const second = m[3] ? parseInt(m[3], 10) : 0
    if (!isValidTime(hour, minute, second)) {
      return Err(new ParseError(ParseErrorReason.INVALID_TIME, text))
    }
    return Ok(makeTime(hour, minute, second))
  }

  if (BARE_HOUR.test(normalized)) {
    const hour = parseInt(normalized, 10)
    if (hour > 23) return Err(new ParseError(ParseErrorReason.INVALID_TIME, text))
    return Ok(makeTime(hour, 0, 0))
  }

  return Err(new ParseError(ParseErrorReason.UNRECOGNIZED_FORMAT, text))
}

/**
 * `<date-expr>@<time-expr>`. Without an `@` the whole text is a date at
 * midnight, unless `requireTime` is set.
 */
export function parseDateTime(
  text: string,
  reference: LocalDate,
  options: DateTimeOptions = {}
): Result<LocalDateTime, ParseError> {
  const parts = text.split('@')
  if (parts.length > 2) {
    return Err(new ParseError(ParseErrorReason.UNRECOGNIZED_FORMAT, text, "more than one '@'"))
  }

  const datePart = parts[0]!
  const timePart = parts[1]
  if (datePart.trim() === '') {
    return Err(new ParseError(ParseErrorReason.UNRECOGNIZED_FORMAT, text, 'missing date'))
  }

  if (timePart === undefined || timePart.trim() === '') {
    if (options.requireTime || timePart !== undefined) {
      return Err(new ParseError(ParseErrorReason.MISSING_TIME, text))
    }
  }

  const date = parseDate(datePart, reference)
  if (!date.ok) return date

  if (timePart === undefined) return Ok(makeDateTime(date.value, MIDNIGHT))

  const time = parseTime(timePart)
  if (!time.ok) return time

  return Ok(makeDateTime(date.value, time.value))
}
