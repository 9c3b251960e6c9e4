/**
 * Segment 02: Expression Parser Tests
 *
 * Human date/time expressions resolved against an explicit reference date.
 */

import { describe, it, expect } from 'vitest'
import {
  parseDate,
  parseTime,
  parseDateTime,
  DATE_RECOGNIZERS,
  ParseError,
  ParseErrorReason,
  type LocalDate,
} from '../src/expression-parser'
import type { Result } from '../src/result'

const d = (s: string) => s as LocalDate

/** Thursday */
const REF = d('2024-02-01')

function value<T>(result: Result<T, ParseError>): T {
  if (!result.ok) throw new Error(`expected success, got ${result.error.message}`)
  return result.value
}

function failure<T>(result: Result<T, ParseError>): ParseError {
  if (result.ok) throw new Error(`expected failure, got ${String(result.value)}`)
  return result.error
}

// ============================================================================
// 1. DISPATCH ORDER
// ============================================================================

describe('Recognizer order', () => {
  it('tries grammar classes in a fixed order', () => {
    expect(DATE_RECOGNIZERS.map((r) => r.name)).toEqual([
      'full-numeric',
      'short-numeric',
      'relative',
      'weekday',
      'month',
      'month-year',
      'named-day-month',
    ])
  })

  it('lets a definite failure from an earlier class stand', () => {
    // Short numeric claims the input even though no later class would accept it
    expect(failure(parseDate('10-13', REF)).reason).toBe(ParseErrorReason.INVALID_DATE)
  })
})

// ============================================================================
// 2. FULL NUMERIC DATES
// ============================================================================

describe('Full numeric dates', () => {
  it('accepts every separator and field order', () => {
    expect(value(parseDate('2024-03-15', REF))).toBe('2024-03-15')
    expect(value(parseDate('15-03-2024', REF))).toBe('2024-03-15')
    expect(value(parseDate('2024/3/5', REF))).toBe('2024-03-05')
    expect(value(parseDate('5/3/2024', REF))).toBe('2024-03-05')
  })

  it('requires one separator throughout', () => {
    expect(failure(parseDate('2024-03/15', REF)).reason).toBe(ParseErrorReason.UNRECOGNIZED_FORMAT)
  })

  it('rejects dates outside the calendar without clamping', () => {
    expect(failure(parseDate('2024-02-30', REF)).reason).toBe(ParseErrorReason.INVALID_DATE)
    expect(failure(parseDate('29-02-2023', REF)).reason).toBe(ParseErrorReason.INVALID_DATE)
    expect(failure(parseDate('2024-13-01', REF)).reason).toBe(ParseErrorReason.INVALID_DATE)
  })
})

// ============================================================================
// 3. SHORT NUMERIC DATES
// ============================================================================

describe('Short numeric dates', () => {
  it('moves a date already passed this year to next year', () => {
    expect(value(parseDate('31-01', d('2024-02-01')))).toBe('2025-01-31')
    expect(value(parseDate('31-01', d('2024-01-01')))).toBe('2024-01-31')
  })

  it('keeps the reference date itself in this year', () => {
    expect(value(parseDate('01/02', REF))).toBe('2024-02-01')
  })

  it('resolves 29 February to the next year that has it', () => {
    expect(value(parseDate('29-02', d('2023-03-01')))).toBe('2024-02-29')
  })

  it('rejects days that exist in neither year', () => {
    expect(failure(parseDate('30-02', REF)).reason).toBe(ParseErrorReason.INVALID_DATE)
    expect(failure(parseDate('32-01', REF)).reason).toBe(ParseErrorReason.INVALID_DATE)
  })
})

// ============================================================================
// 4. RELATIVE KEYWORDS
// ============================================================================

describe('Relative keywords', () => {
  it('resolves named days', () => {
    expect(value(parseDate('today', REF))).toBe('2024-02-01')
    expect(value(parseDate('yesterday', REF))).toBe('2024-01-31')
    expect(value(parseDate('yes', REF))).toBe('2024-01-31')
    expect(value(parseDate('tomorrow', REF))).toBe('2024-02-02')
    expect(value(parseDate('TOM', REF))).toBe('2024-02-02')
  })

  it('adds day, week, month and year offsets', () => {
    expect(value(parseDate('3d', REF))).toBe('2024-02-04')
    expect(value(parseDate('2w', REF))).toBe('2024-02-15')
    expect(value(parseDate('1m', d('2024-01-31')))).toBe('2024-02-29')
    expect(value(parseDate('1y', d('2024-02-29')))).toBe('2025-02-28')
  })

  it('rejects offsets that leave the calendar', () => {
    expect(failure(parseDate('5000000d', REF)).reason).toBe(ParseErrorReason.INVALID_DATE)
    expect(failure(parseDate('3000000d', REF)).reason).toBe(ParseErrorReason.INVALID_DATE)
  })
})

// ============================================================================
// 5. WEEKDAY NAMES
// ============================================================================

describe('Weekday names', () => {
  const MONDAY = d('2024-01-01')

  it('moves a weekday matching the reference to the next week', () => {
    expect(value(parseDate('monday', MONDAY))).toBe('2024-01-08')
    expect(value(parseDate('mon', MONDAY))).toBe('2024-01-08')
  })

  it('picks the nearest following day otherwise', () => {
    expect(value(parseDate('tue', MONDAY))).toBe('2024-01-02')
    expect(value(parseDate('Sunday', MONDAY))).toBe('2024-01-07')
    expect(value(parseDate('mon', REF))).toBe('2024-02-05')
  })
})

// ============================================================================
// 6. MONTH NAMES
// ============================================================================

describe('Month names', () => {
  const MID_MARCH = d('2024-03-15')

  it('resolves to the first of the next such month', () => {
    expect(value(parseDate('jan', MID_MARCH))).toBe('2025-01-01')
    expect(value(parseDate('december', MID_MARCH))).toBe('2024-12-01')
  })

  it('treats the current month as not yet passed', () => {
    expect(value(parseDate('march', MID_MARCH))).toBe('2024-03-01')
  })

  it('takes an explicit year', () => {
    expect(value(parseDate('jan-2025', REF))).toBe('2025-01-01')
    expect(value(parseDate('2025/feb', REF))).toBe('2025-02-01')
  })

  it('combines with a day, inferring the year', () => {
    expect(value(parseDate('08-jan', REF))).toBe('2025-01-08')
    expect(value(parseDate('jan-08', REF))).toBe('2025-01-08')
    expect(value(parseDate('feb-10', REF))).toBe('2024-02-10')
    expect(value(parseDate('15/aug', REF))).toBe('2024-08-15')
  })

  it('rejects a day the month never has', () => {
    expect(failure(parseDate('feb-30', REF)).reason).toBe(ParseErrorReason.INVALID_DATE)
  })

  it('does not accept unknown names', () => {
    expect(failure(parseDate('foo-2025', REF)).reason).toBe(ParseErrorReason.UNRECOGNIZED_FORMAT)
    expect(failure(parseDate('xyz-10', REF)).reason).toBe(ParseErrorReason.UNRECOGNIZED_FORMAT)
  })
})

// ============================================================================
// 7. ERRORS
// ============================================================================

describe('Unrecognized input', () => {
  it('echoes the input in the error', () => {
    const error = failure(parseDate('next blursday', REF))
    expect(error).toBeInstanceOf(ParseError)
    expect(error.input).toBe('next blursday')
    expect(error.message).toBe("Unrecognized format: 'next blursday'")
  })
})

// ============================================================================
// 8. TIMES
// ============================================================================

describe('parseTime', () => {
  it('accepts clock times and bare hours', () => {
    expect(value(parseTime('14'))).toBe('14:00:00')
    expect(value(parseTime('2'))).toBe('02:00:00')
    expect(value(parseTime('9:05'))).toBe('09:05:00')
    expect(value(parseTime('23:59:59'))).toBe('23:59:59')
  })

  it('rejects out-of-range components', () => {
    expect(failure(parseTime('24:00')).reason).toBe(ParseErrorReason.INVALID_TIME)
    expect(failure(parseTime('12:60')).reason).toBe(ParseErrorReason.INVALID_TIME)
    expect(failure(parseTime('24')).reason).toBe(ParseErrorReason.INVALID_TIME)
  })

  it('rejects other shapes', () => {
    expect(failure(parseTime('noon')).reason).toBe(ParseErrorReason.UNRECOGNIZED_FORMAT)
    expect(failure(parseTime('12:5')).reason).toBe(ParseErrorReason.UNRECOGNIZED_FORMAT)
  })
})

// ============================================================================
// 9. DATE-TIMES
// ============================================================================

describe('parseDateTime', () => {
  it('joins a date and a time at the @', () => {
    expect(value(parseDateTime('tom@14', REF))).toBe('2024-02-02T14:00:00')
    expect(value(parseDateTime('jan-08@10:00', REF))).toBe('2025-01-08T10:00:00')
    expect(value(parseDateTime('mon@09:30', REF))).toBe('2024-02-05T09:30:00')
  })

  it('defaults to midnight without an @', () => {
    expect(value(parseDateTime('today', REF))).toBe('2024-02-01T00:00:00')
  })

  it('reports a missing time when one is required', () => {
    expect(failure(parseDateTime('today', REF, { requireTime: true })).reason).toBe(ParseErrorReason.MISSING_TIME)
    expect(failure(parseDateTime('today@', REF)).reason).toBe(ParseErrorReason.MISSING_TIME)
  })

  it('rejects a missing date or a second @', () => {
    expect(failure(parseDateTime('@10', REF)).message).toBe("Unrecognized format: '@10' (missing date)")
    expect(failure(parseDateTime('a@b@c', REF)).message).toBe("Unrecognized format: 'a@b@c' (more than one '@')")
  })

  it('passes through failures of either part', () => {
    expect(failure(parseDateTime('today@25', REF)).reason).toBe(ParseErrorReason.INVALID_TIME)
    expect(failure(parseDateTime('foo@10', REF)).input).toBe('foo')
  })
})
