/**
 * File Adapter
 *
 * EventAdapter over a directory tree: one subdirectory per calendar, one
 * .ics file per event. New events are written as <calendar>/<id>.ics; files
 * placed deeper by a sync tool are found by scanning the calendar tree and
 * matching their UID. Every write goes to a temporary file that is then
 * renamed over the target.
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import type { EventAdapter } from './adapter'
import type { EventRecord } from './event-record'
import type { EventId } from './types'
import { validateCalendarName } from './event-record'
import { parseEventFile, readUid, serializeEvent } from './ics'
import { type Logger, silentLogger } from './logger'
import { CalendirError, NotFoundError, StoreIoError } from './errors'

export type FileAdapterOptions = {
  baseDir: string
  logger?: Logger
  /** Zone used to read foreign UTC/TZID values; defaults to the system zone */
  timezone?: string
  /** DTSTAMP source for written files */
  clock?: () => Date
}

const EVENT_EXTENSION = '.ics'

function errnoCode(err: unknown): string | undefined {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined
}

export function createFileAdapter(options: FileAdapterOptions): EventAdapter {
  const baseDir = options.baseDir
  const log = (options.logger ?? silentLogger).child('files')
  const clock = options.clock ?? (() => new Date())
  const parseOptions = options.timezone !== undefined ? { timezone: options.timezone } : {}

  // ---- Helpers ----

  /** Runs a filesystem operation, converting failures to StoreIoError */
  function io<T>(action: string, target: string, fn: () => T): T {
    try {
      return fn()
    } catch (err) {
      if (err instanceof CalendirError) throw err
      const wrapped = new StoreIoError(action, target, err)
      log.error(wrapped.message, { path: target })
      throw wrapped
    }
  }

  function calendarDir(calendar: string): string {
    validateCalendarName(calendar)
    return path.join(baseDir, calendar)
  }

  function isDirectory(dir: string): boolean {
    return io('Cannot inspect', dir, () => {
      try {
        return fs.statSync(dir).isDirectory()
      } catch (err) {
        if (errnoCode(err) === 'ENOENT') return false
        throw err
      }
    })
  }

  function existingCalendarDir(calendar: string): string {
    const dir = calendarDir(calendar)
    if (!isDirectory(dir)) throw new NotFoundError(`Calendar '${calendar}' not found`)
    return dir
  }

  /** Event files under dir, depth first, in name order; dot entries are skipped */
  function collectFiles(dir: string, out: string[] = []): string[] {
    const entries = io('Cannot read directory', dir, () => fs.readdirSync(dir, { withFileTypes: true }))
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue
      const full = path.join(dir, entry.name)
      if (entry.isDirectory()) collectFiles(full, out)
      else if (entry.isFile() && entry.name.endsWith(EVENT_EXTENSION)) out.push(full)
    }
    return out
  }

  function readFile(file: string): string {
    return io('Cannot read event file', file, () => fs.readFileSync(file, 'utf8'))
  }

  function decode(file: string, calendar: string): EventRecord {
    const content = readFile(file)
    try {
      return parseEventFile(content, calendar, parseOptions)
    } catch (err) {
      const wrapped = new StoreIoError('Cannot decode event file', file, err)
      log.error(wrapped.message, { path: file })
      throw wrapped
    }
  }

  function findFile(calendar: string, id: EventId): string | undefined {
    const dir = existingCalendarDir(calendar)
    const direct = path.join(dir, id + EVENT_EXTENSION)
    if (fs.existsSync(direct) && readUid(readFile(direct)) === id) return direct

    for (const file of collectFiles(dir)) {
      if (file !== direct && readUid(readFile(file)) === id) return file
    }
    return undefined
  }

  function writeAtomically(target: string, content: string): void {
    const temp = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`)
    io('Cannot write event file', target, () => {
      try {
        fs.writeFileSync(temp, content, 'utf8')
        fs.renameSync(temp, target)
      } catch (err) {
        fs.rmSync(temp, { force: true })
        throw err
      }
    })
  }

  // ---- Adapter ----

  return {
    listCalendars() {
      if (!isDirectory(baseDir)) return []
      const entries = io('Cannot read directory', baseDir, () =>
        fs.readdirSync(baseDir, { withFileTypes: true })
      )
      return entries
        .filter((entry) => entry.isDirectory() && !entry.name.startsWith('.'))
        .map((entry) => entry.name)
        .sort()
    },

    hasCalendar(calendar) {
      return isDirectory(calendarDir(calendar))
    },

    createCalendar(calendar) {
      const dir = calendarDir(calendar)
      if (isDirectory(dir)) return
      io('Cannot create calendar directory', dir, () => fs.mkdirSync(dir, { recursive: true }))
      log.debug(`Created calendar '${calendar}'`, { path: dir })
    },

    listEvents(calendar) {
      const seen = new Set<string>()
      const records: EventRecord[] = []
      for (const file of collectFiles(existingCalendarDir(calendar))) {
        const record = decode(file, calendar)
        if (seen.has(record.id)) {
          log.warn(`Duplicate event id '${record.id}' ignored`, { path: file })
          continue
        }
        seen.add(record.id)
        records.push(record)
      }
      return records
    },

    getEvent(calendar, id) {
      const file = findFile(calendar, id)
      return file === undefined ? null : decode(file, calendar)
    },

    putEvent(record) {
      const dir = existingCalendarDir(record.calendar)
      const target = findFile(record.calendar, record.id) ?? path.join(dir, record.id + EVENT_EXTENSION)
      writeAtomically(target, serializeEvent(record, { stamp: clock() }))
      log.debug(`Wrote event '${record.id}'`, { path: target })
    },

    deleteEvent(calendar, id) {
      const file = findFile(calendar, id)
      if (file === undefined) return false
      io('Cannot delete event file', file, () => fs.unlinkSync(file))
      log.debug(`Deleted event '${id}'`, { path: file })
      return true
    },
  }
}
