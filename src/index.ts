/**
 * calendir
 *
 * Public API exports
 */

// Error system
export {
  CalendirError, CalendirErrorCode, ParseErrorReason,
  ParseError, ValidationError, NotFoundError, InvalidDataError, StoreIoError, SyncError,
} from './errors'
export type { CalendirErrorCode as CalendirErrorCodeType, ParseErrorReason as ParseErrorReasonType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, unwrap } from './result'

// Time & Date
export type { LocalDate, LocalTime, LocalDateTime, Weekday, TimeWindow } from './time-date'
export {
  isLeapYear, daysInMonth, isValidDate, isValidTime,
  parseIsoDate, parseIsoDateTime,
  makeDate, makeTime, makeDateTime, startOfDay, fromJsDate,
  yearOf, monthOf, dayOf, hourOf, minuteOf, secondOf, dateOf, timeOf,
  addDays, daysBetween, addMonths, addYears, addMinutes, minutesBetween,
  dayOfWeek, startOfWeek, startOfMonth,
  compareDates, compareDateTimes,
  systemTimezone, toLocal, toUTC, elapsedMinutes, addElapsedMinutes,
} from './time-date'

// Expression parser
export type { DateRecognizer, Recognition, DateTimeOptions } from './expression-parser'
export { parseDate, parseTime, parseDateTime, DATE_RECOGNIZERS } from './expression-parser'

// Recurrence
export type { Frequency, RecurrenceRule, Occurrence, ExpandOptions } from './recurrence'
export { FREQUENCIES, isFrequency, expandRecurrence, nthOccurrence, validateRule } from './recurrence'

// Event records
export type { EventId } from './types'
export type { EventRecord, EventInput, EventUpdate, EventInstance } from './event-record'
export {
  DEFAULT_CALENDAR, DEFAULT_DURATION_MINUTES,
  createEventRecord, validateEventRecord, applyEventUpdate,
  instancesIn, firstInstanceIn, durationOf,
} from './event-record'

// iCalendar codec
export { serializeEvent, parseEventFile } from './ics'

// Adapters
export type { EventAdapter } from './adapter'
export { createMockAdapter } from './adapter'
export type { FileAdapterOptions } from './file-adapter'
export { createFileAdapter } from './file-adapter'

// Store
export type { EventQuery } from './event-store'
export {
  listCalendars, listEvents, listOccurrences,
  getEvent, insertEvent, updateEvent, deleteEvent, matchesText,
} from './event-store'

// Buckets & formatting
export type { ViewMode, Bucket } from './buckets'
export { groupOccurrences, viewWindow } from './buckets'
export { formatInstanceLine, formatDetails, formatBuckets } from './format'

// Sync, config, logging
export type { CommandRunner, SyncOptions } from './sync'
export { runSync } from './sync'
export type { CalendirConfig, ConfigOverrides } from './config'
export { resolveConfig } from './config'
export type { LogLevel, LoggerOptions } from './logger'
export { Logger, createLogger } from './logger'

// CLI
export type { CliDeps } from './cli'
export { createProgram, runCli } from './cli'
