/**
 * iCalendar Codec
 *
 * Encodes one event record as a VCALENDAR document holding a single VEVENT,
 * and decodes such documents back, including files written by other tools
 * (UTC and TZID date-times, all-day dates, folded lines).
 */

import {
  type LocalDate,
  type LocalDateTime,
  addElapsedMinutes,
  isValidDate,
  isValidTime,
  makeDate,
  makeDateTime,
  makeTime,
  MIDNIGHT,
  dateOf,
  systemTimezone,
  toLocal,
  toUTC,
} from './time-date'
import {
  type EventRecord,
  type RecurrenceRule,
  DEFAULT_DURATION_MINUTES,
  createEventRecord,
  validateEventId,
} from './event-record'
import { type Frequency, isFrequency } from './recurrence'
import { CalendirError, InvalidDataError } from './errors'

export { InvalidDataError } from './errors'

// ============================================================================
// Constants
// ============================================================================

export const PRODUCT_ID = '-//calendir//EN'
const CRLF = '\r\n'
const MAX_LINE_OCTETS = 75

export type SerializeOptions = {
  /** DTSTAMP value; defaults to the current time */
  stamp?: Date
}

export type ParseOptions = {
  /** Zone that floating and converted date-times are expressed in */
  timezone?: string
}

// ============================================================================
// Text Escaping & Folding
// ============================================================================

export function escapeText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r\n|\r|\n/g, '\\n')
}

export function unescapeText(text: string): string {
  return text.replace(/\\([\\;,nN])/g, (_, ch: string) => (ch === 'n' || ch === 'N' ? '\n' : ch))
}

/** Splits a content line so no physical line exceeds 75 octets */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line) <= MAX_LINE_OCTETS) return line

  const out: string[] = []
  let current = ''
  let octets = 0
  // Continuation lines carry a leading space, which counts toward the limit
  let limit = MAX_LINE_OCTETS
  for (const ch of line) {
    const size = Buffer.byteLength(ch)
    if (octets + size > limit) {
      out.push(current)
      current = ''
      octets = 0
      limit = MAX_LINE_OCTETS - 1
    }
    current += ch
    octets += size
  }
  out.push(current)
  return out.join(CRLF + ' ')
}

export function unfoldLines(content: string): string[] {
  return content
    .replace(/\r?\n[ \t]/g, '')
    .split(/\r?\n/)
    .filter((line) => line.length > 0)
}

// ============================================================================
// Value Formats
// ============================================================================

/** 2024-01-31T09:00:00 -> 20240131T090000 */
export function formatDateTimeValue(dt: LocalDateTime): string {
  return dt.replace(/[-:]/g, '')
}

function formatDateValue(date: LocalDate): string {
  return date.replace(/-/g, '')
}

function formatStamp(stamp: Date): string {
  return stamp.toISOString().replace(/\.\d{3}Z$/, 'Z').replace(/[-:]/g, '')
}

const DATE_TIME_VALUE = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(Z?)$/
const DATE_VALUE = /^(\d{4})(\d{2})(\d{2})$/

type DecodedValue = {
  value: LocalDateTime
  utc: boolean
  dateOnly: boolean
}

function decodeDateValue(raw: string, field: string): DecodedValue {
  let m = DATE_TIME_VALUE.exec(raw)
  if (m) {
    const year = parseInt(m[1]!, 10)
    const month = parseInt(m[2]!, 10)
    const day = parseInt(m[3]!, 10)
    const hour = parseInt(m[4]!, 10)
    const minute = parseInt(m[5]!, 10)
    const second = parseInt(m[6]!, 10)
    if (!isValidDate(year, month, day) || !isValidTime(hour, minute, second)) {
      throw new InvalidDataError(`Invalid ${field} value: '${raw}'`)
    }
    return {
      value: makeDateTime(makeDate(year, month, day), makeTime(hour, minute, second)),
      utc: m[7] === 'Z',
      dateOnly: false,
    }
  }

  m = DATE_VALUE.exec(raw)
  if (m) {
    const year = parseInt(m[1]!, 10)
    const month = parseInt(m[2]!, 10)
    const day = parseInt(m[3]!, 10)
    if (!isValidDate(year, month, day)) {
      throw new InvalidDataError(`Invalid ${field} value: '${raw}'`)
    }
    return { value: makeDateTime(makeDate(year, month, day), MIDNIGHT), utc: false, dateOnly: true }
  }

  throw new InvalidDataError(`Invalid ${field} value: '${raw}'`)
}

// ============================================================================
// Content Lines
// ============================================================================

export type ContentLine = {
  name: string
  params: Record<string, string>
  value: string
}

/** NAME;PARAM=x;PARAM="y:z":VALUE */
export function parseContentLine(line: string): ContentLine {
  let inQuotes = false
  let colon = -1
  for (let i = 0; i < line.length; i++) {
    const ch = line[i]
    if (ch === '"') inQuotes = !inQuotes
    else if (ch === ':' && !inQuotes) {
      colon = i
      break
    }
  }
  if (colon === -1) throw new InvalidDataError(`Malformed content line: '${line}'`)

  const head = line.slice(0, colon)
  const value = line.slice(colon + 1)
  const segments = head.match(/(?:[^;"]|"[^"]*")+/g) ?? []
  const name = (segments[0] ?? '').toUpperCase()
  if (name === '') throw new InvalidDataError(`Malformed content line: '${line}'`)

  const params: Record<string, string> = {}
  for (const segment of segments.slice(1)) {
    const eq = segment.indexOf('=')
    if (eq === -1) continue
    params[segment.slice(0, eq).toUpperCase()] = segment.slice(eq + 1).replace(/^"|"$/g, '')
  }
  return { name, params, value }
}

// ============================================================================
// Recurrence Rule
// ============================================================================

function formatRule(rule: RecurrenceRule): string {
  let out = `FREQ=${rule.frequency.toUpperCase()};INTERVAL=${rule.interval}`
  if (rule.until !== undefined) out += `;UNTIL=${formatDateValue(rule.until)}T235959`
  if (rule.count !== undefined) out += `;COUNT=${rule.count}`
  return out
}

function parseRule(value: string, tz: string): RecurrenceRule {
  const parts = new Map<string, string>()
  for (const part of value.split(';')) {
    const eq = part.indexOf('=')
    if (eq > 0) parts.set(part.slice(0, eq).toUpperCase(), part.slice(eq + 1))
  }

  const freq = (parts.get('FREQ') ?? '').toLowerCase()
  if (!isFrequency(freq)) throw new InvalidDataError(`Unsupported RRULE frequency: '${value}'`)
  const frequency: Frequency = freq

  const rule: RecurrenceRule = { frequency, interval: 1 }
  const interval = parts.get('INTERVAL')
  if (interval !== undefined) {
    if (!/^\d+$/.test(interval)) throw new InvalidDataError(`Invalid RRULE interval: '${value}'`)
    rule.interval = parseInt(interval, 10)
  }
  const count = parts.get('COUNT')
  if (count !== undefined) {
    if (!/^\d+$/.test(count)) throw new InvalidDataError(`Invalid RRULE count: '${value}'`)
    rule.count = parseInt(count, 10)
  }
  const until = parts.get('UNTIL')
  if (until !== undefined) {
    const decoded = decodeDateValue(until, 'UNTIL')
    rule.until = dateOf(decoded.utc ? toLocal(decoded.value, tz) : decoded.value)
  }
  return rule
}

// ============================================================================
// Serialization
// ============================================================================

export function serializeEvent(record: EventRecord, options: SerializeOptions = {}): string {
  const lines = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    `PRODID:${PRODUCT_ID}`,
    'BEGIN:VEVENT',
    `UID:${record.id}`,
    `DTSTAMP:${formatStamp(options.stamp ?? new Date())}`,
    `DTSTART:${formatDateTimeValue(record.start)}`,
    `DTEND:${formatDateTimeValue(record.end)}`,
    `SUMMARY:${escapeText(record.name)}`,
  ]
  if (record.location !== undefined) lines.push(`LOCATION:${escapeText(record.location)}`)
  if (record.description !== undefined) lines.push(`DESCRIPTION:${escapeText(record.description)}`)
  if (record.recurrence) lines.push(`RRULE:${formatRule(record.recurrence)}`)
  lines.push('END:VEVENT', 'END:VCALENDAR')

  return lines.map(foldLine).join(CRLF) + CRLF
}

// ============================================================================
// Parsing
// ============================================================================

/** Properties of the first VEVENT, ignoring nested components such as VALARM */
function eventProperties(content: string): Map<string, ContentLine> {
  const props = new Map<string, ContentLine>()
  const stack: string[] = []
  let seenEvent = false

  for (const raw of unfoldLines(content)) {
    const line = parseContentLine(raw)
    if (line.name === 'BEGIN') {
      stack.push(line.value.toUpperCase())
      continue
    }
    if (line.name === 'END') {
      if (stack.pop() === 'VEVENT') seenEvent = true
      continue
    }
    if (seenEvent) continue
    if (stack[stack.length - 1] === 'VEVENT' && !props.has(line.name)) {
      props.set(line.name, line)
    }
  }
  return props
}

/** UID of the first VEVENT, without decoding the rest of the document */
export function readUid(content: string): string | undefined {
  let inEvent = false
  for (const raw of unfoldLines(content)) {
    if (/^BEGIN:VEVENT$/i.test(raw)) inEvent = true
    else if (/^END:VEVENT$/i.test(raw)) return undefined
    else if (inEvent && /^UID[:;]/i.test(raw)) {
      return raw.slice(raw.indexOf(':') + 1)
    }
  }
  return undefined
}

function localValue(line: ContentLine, tz: string): DecodedValue {
  const decoded = decodeDateValue(line.value, line.name)
  if (decoded.dateOnly) return decoded
  if (decoded.utc) return { ...decoded, value: toLocal(decoded.value, tz) }

  const tzid = line.params['TZID']
  if (tzid === undefined || tzid === tz) return decoded
  try {
    return { ...decoded, value: toLocal(toUTC(decoded.value, tzid), tz) }
  } catch (err) {
    if (err instanceof RangeError) throw new InvalidDataError(`Unknown TZID '${tzid}'`)
    throw err
  }
}

/**
 * Decodes an event document into a record of the given calendar. Throws
 * InvalidDataError when the content is not a usable event.
 */
export function parseEventFile(content: string, calendar: string, options: ParseOptions = {}): EventRecord {
  const tz = options.timezone ?? systemTimezone()
  const props = eventProperties(content)

  const uid = props.get('UID')?.value
  const summary = props.get('SUMMARY')
  const dtstart = props.get('DTSTART')
  if (uid === undefined || uid === '') throw new InvalidDataError('Event has no UID')
  if (summary === undefined) throw new InvalidDataError(`Event '${uid}' has no SUMMARY`)
  if (dtstart === undefined) throw new InvalidDataError(`Event '${uid}' has no DTSTART`)

  try {
    validateEventId(uid)
    const start = localValue(dtstart, tz).value
    const dtend = props.get('DTEND')
    const end = dtend ? localValue(dtend, tz).value : addElapsedMinutes(start, DEFAULT_DURATION_MINUTES, tz)
    const location = props.get('LOCATION')
    const description = props.get('DESCRIPTION')
    const rrule = props.get('RRULE')

    return createEventRecord(
      {
        calendar,
        name: unescapeText(summary.value),
        start,
        end,
        ...(location ? { location: unescapeText(location.value) } : {}),
        ...(description ? { description: unescapeText(description.value) } : {}),
        ...(rrule ? { recurrence: parseRule(rrule.value, tz) } : {}),
      },
      { id: uid, timezone: tz }
    )
  } catch (err) {
    if (err instanceof InvalidDataError) throw err
    if (err instanceof CalendirError) throw new InvalidDataError(`Event '${uid}': ${err.message}`)
    throw err
  }
}
