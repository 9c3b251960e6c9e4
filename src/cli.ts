/**
 * calendir CLI
 *
 * Command-line surface over the event store:
 *   calendir list [query...]   - Events in a date range, optionally filtered
 *   calendir add <name...>     - Create an event
 *   calendir edit <id>         - Change fields of an event
 *   calendir delete <id>       - Remove an event
 *   calendir show <id>         - Print every field of an event
 *   calendir view [date]       - Occurrences grouped by day, week or month
 *   calendir sync              - Run the external synchronization tool
 *
 * The reference "now" is supplied by the caller; nothing here reads the clock.
 */

import { Command, CommanderError } from 'commander'
import {
  type LocalDate,
  type LocalDateTime,
  addDays,
  addElapsedMinutes,
  dateOf,
  elapsedMinutes,
  makeDateTime,
  startOfDay,
} from './time-date'
import { parseDate, parseDateTime, parseTime } from './expression-parser'
import { type RecurrenceRule, isFrequency } from './recurrence'
import type { EventAdapter } from './adapter'
import type { EventUpdate } from './event-record'
import { deleteEvent, getEvent, insertEvent, listEvents, listOccurrences, updateEvent } from './event-store'
import { firstInstanceIn } from './event-record'
import { groupOccurrences, isViewMode, viewWindow } from './buckets'
import { formatBuckets, formatDetails, formatInstanceLine } from './format'
import { type CommandRunner, runSync } from './sync'
import type { CalendirConfig } from './config'
import type { Logger } from './logger'
import { unwrap } from './result'
import { CalendirError, SyncError, ValidationError } from './errors'

export const VERSION = '0.1.0'

/** Days after the start date that `list` covers by default */
export const DEFAULT_LIST_DAYS = 30

export interface CliDeps {
  adapter: EventAdapter
  config: CalendirConfig
  now: LocalDateTime
  logger: Logger
  /** Command output, one line per call */
  out: (line: string) => void
  /** User-facing error messages */
  err: (line: string) => void
  run?: CommandRunner
}

interface ListOptions {
  calendar?: string
  from?: string
  to?: string
  limit?: string
  showIds?: boolean
}

interface AddOptions {
  at: string
  to?: string
  calendar?: string
  location?: string
  description?: string
  repeat?: string
  every?: string
  until?: string
  count?: string
}

interface EditOptions {
  calendar?: string
  name?: string
  at?: string
  to?: string
  location?: string
  description?: string
}

interface ViewOptions {
  mode: string
  calendar?: string
  count: string
}

// ============================================================================
// Argument Helpers
// ============================================================================

function positiveInt(value: string, option: string): number {
  if (!/^\d+$/.test(value) || parseInt(value, 10) < 1) {
    throw new ValidationError(`${option} must be a positive integer, got '${value}'`)
  }
  return parseInt(value, 10)
}

/** A full date-time expression, or a bare time on the same day as `start` */
function resolveEnd(text: string, start: LocalDateTime, reference: LocalDate): LocalDateTime {
  if (!text.includes('@')) {
    const time = parseTime(text)
    if (time.ok) return makeDateTime(dateOf(start), time.value)
  }
  return unwrap(parseDateTime(text, reference, { requireTime: true }))
}

function buildRule(options: AddOptions, reference: LocalDate): RecurrenceRule | undefined {
  if (options.repeat === undefined) {
    if (options.every !== undefined || options.until !== undefined || options.count !== undefined) {
      throw new ValidationError('--every, --until and --count need --repeat')
    }
    return undefined
  }
  const frequency = options.repeat.toLowerCase()
  if (!isFrequency(frequency)) {
    throw new ValidationError(`Unknown repeat frequency '${options.repeat}' (daily, weekly, monthly, yearly)`)
  }
  const rule: RecurrenceRule = {
    frequency,
    interval: options.every !== undefined ? positiveInt(options.every, '--every') : 1,
  }
  if (options.until !== undefined) rule.until = unwrap(parseDate(options.until, reference))
  if (options.count !== undefined) rule.count = positiveInt(options.count, '--count')
  return rule
}

// ============================================================================
// Program
// ============================================================================

export function createProgram(deps: CliDeps): Command {
  const { adapter, config, out } = deps
  const reference = dateOf(deps.now)
  const storeOptions = { timezone: config.timezone }

  const program = new Command()
    .name('calendir')
    .description('Terminal calendar manager storing one .ics file per event')
    .version(VERSION, '-v, --version', 'Show version number')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => out(str.replace(/\n$/, '')),
      writeErr: (str) => deps.err(str.replace(/\n$/, '')),
    })

  program
    .command('list')
    .description('List events in a date range')
    .argument('[query...]', 'Terms that must all appear in name, location or description')
    .option('-c, --calendar <name>', 'Only this calendar')
    .option('-f, --from <date>', 'First day (default: today)')
    .option('-t, --to <date>', `Last day (default: ${DEFAULT_LIST_DAYS} days after --from)`)
    .option('-l, --limit <n>', 'Show at most n events')
    .option('-i, --show-ids', 'Prefix each event with its id')
    .action((query: string[], options: ListOptions) => {
      const from = options.from !== undefined ? unwrap(parseDate(options.from, reference)) : reference
      const to = options.to !== undefined ? unwrap(parseDate(options.to, reference)) : addDays(from, DEFAULT_LIST_DAYS)
      if (to < from) throw new ValidationError(`--to ${to} is before --from ${from}`)
      const window = { start: startOfDay(from), end: startOfDay(addDays(to, 1)) }

      const records = listEvents(
        adapter,
        {
          window,
          ...(options.calendar !== undefined ? { calendar: options.calendar } : {}),
          ...(query.length > 0 ? { text: query.join(' ') } : {}),
          ...(options.limit !== undefined ? { limit: positiveInt(options.limit, '--limit') } : {}),
        },
        storeOptions
      )
      if (records.length === 0) {
        out('No events found')
        return
      }
      for (const record of records) {
        const instance = firstInstanceIn(record, window, storeOptions)
        if (instance) out(formatInstanceLine(instance, { showId: options.showIds ?? false }))
      }
    })

  program
    .command('add')
    .description('Create an event')
    .argument('<name...>', 'Event name')
    .requiredOption('-a, --at <when>', 'Start, as <date>@<time>')
    .option('-t, --to <when>', 'End, as <date>@<time> or a time on the start day (default: one hour later)')
    .option('-c, --calendar <name>', 'Calendar', config.defaultCalendar)
    .option('-l, --location <text>', 'Location')
    .option('-d, --description <text>', 'Description')
    .option('-r, --repeat <frequency>', 'Repeat daily, weekly, monthly or yearly')
    .option('-e, --every <n>', 'Repeat every n days/weeks/months/years')
    .option('-u, --until <date>', 'Last day of the repetition')
    .option('-n, --count <n>', 'Number of occurrences')
    .action((name: string[], options: AddOptions) => {
      const start = unwrap(parseDateTime(options.at, reference, { requireTime: true }))
      const recurrence = buildRule(options, reference)
      const id = insertEvent(
        adapter,
        {
          name: name.join(' '),
          start,
          calendar: options.calendar ?? config.defaultCalendar,
          ...(options.to !== undefined ? { end: resolveEnd(options.to, start, reference) } : {}),
          ...(options.location !== undefined ? { location: options.location } : {}),
          ...(options.description !== undefined ? { description: options.description } : {}),
          ...(recurrence ? { recurrence } : {}),
        },
        storeOptions
      )
      out(`Created event ${id}`)
    })

  program
    .command('edit')
    .description('Change fields of an event; omitted fields keep their value')
    .argument('<id>', 'Event id')
    .option('-c, --calendar <name>', 'Calendar', config.defaultCalendar)
    .option('-n, --name <text>', 'New name')
    .option('-a, --at <when>', 'New start; the duration is kept unless --to is given')
    .option('-t, --to <when>', 'New end')
    .option('-l, --location <text>', 'New location ("" removes it)')
    .option('-d, --description <text>', 'New description ("" removes it)')
    .action((id: string, options: EditOptions) => {
      const calendar = options.calendar ?? config.defaultCalendar
      const changes: EventUpdate = {}
      if (options.name !== undefined) changes.name = options.name
      if (options.location !== undefined) changes.location = options.location === '' ? null : options.location
      if (options.description !== undefined) {
        changes.description = options.description === '' ? null : options.description
      }

      if (options.at !== undefined || options.to !== undefined) {
        const current = getEvent(adapter, calendar, id)
        const start = options.at !== undefined
          ? unwrap(parseDateTime(options.at, reference, { requireTime: true }))
          : current.start
        changes.start = start
        changes.end = options.to !== undefined
          ? resolveEnd(options.to, start, reference)
          : addElapsedMinutes(start, elapsedMinutes(current.start, current.end, config.timezone), config.timezone)
      }

      const updated = updateEvent(adapter, calendar, id, changes, storeOptions)
      out(`Updated event ${updated.id}`)
    })

  program
    .command('delete')
    .description('Remove an event')
    .argument('<id>', 'Event id')
    .option('-c, --calendar <name>', 'Calendar', config.defaultCalendar)
    .action((id: string, options: { calendar?: string }) => {
      deleteEvent(adapter, options.calendar ?? config.defaultCalendar, id)
      out(`Deleted event ${id}`)
    })

  program
    .command('show')
    .description('Print every field of an event')
    .argument('<id>', 'Event id')
    .option('-c, --calendar <name>', 'Calendar', config.defaultCalendar)
    .action((id: string, options: { calendar?: string }) => {
      for (const line of formatDetails(getEvent(adapter, options.calendar ?? config.defaultCalendar, id))) {
        out(line)
      }
    })

  program
    .command('view')
    .description('Show occurrences grouped by day, week or month')
    .argument('[date]', 'A day inside the first period (default: today)')
    .option('-m, --mode <mode>', 'day, week or month', 'week')
    .option('-c, --calendar <name>', 'Only this calendar')
    .option('-n, --count <n>', 'Number of periods', '1')
    .action((date: string | undefined, options: ViewOptions) => {
      if (!isViewMode(options.mode)) {
        throw new ValidationError(`Unknown view mode '${options.mode}' (day, week, month)`)
      }
      const day = date !== undefined ? unwrap(parseDate(date, reference)) : reference
      const window = viewWindow(day, options.mode, positiveInt(options.count, '--count'))
      const instances = listOccurrences(
        adapter,
        { window, ...(options.calendar !== undefined ? { calendar: options.calendar } : {}) },
        storeOptions
      )
      for (const line of formatBuckets(groupOccurrences(instances, options.mode, window))) out(line)
    })

  program
    .command('sync')
    .description('Run the synchronization tool')
    .option('-c, --calendar <name>', 'Only this calendar')
    .action((options: { calendar?: string }) => {
      runSync({
        command: config.syncCommand,
        logger: deps.logger,
        ...(options.calendar !== undefined ? { calendar: options.calendar } : {}),
        ...(deps.run ? { run: deps.run } : {}),
      })
      out('Sync completed')
    })

  return program
}

/**
 * Parses and runs one command line (without the node and script entries).
 * Returns the process exit status.
 */
export function runCli(argv: readonly string[], deps: CliDeps): number {
  const program = createProgram(deps)
  try {
    program.parse(argv, { from: 'user' })
    return 0
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode
    if (err instanceof SyncError) {
      deps.logger.error(err.message, { status: err.status })
    }
    if (err instanceof CalendirError) {
      // StoreIoError has already been logged with its path by the adapter
      deps.err(`Error: ${err.message}`)
      return 1
    }
    throw err
  }
}
