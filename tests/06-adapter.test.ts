/**
 * Segment 06: Adapter Tests
 *
 * The in-memory mock adapter and the directory-backed file adapter.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import * as fs from 'node:fs'
import * as os from 'node:os'
import * as path from 'node:path'
import { createMockAdapter, NotFoundError, StoreIoError, type EventAdapter } from '../src/adapter'
import { createFileAdapter } from '../src/file-adapter'
import { serializeEvent } from '../src/ics'
import { createLogger } from '../src/logger'
import type { EventId, EventRecord } from '../src/event-record'
import type { LocalDateTime } from '../src/time-date'

const dt = (s: string) => s as LocalDateTime
const STAMP = new Date(Date.UTC(2024, 0, 1, 0, 0, 0))

function record(id: string, calendar = 'work', overrides: Partial<EventRecord> = {}): EventRecord {
  return {
    id: id as EventId,
    calendar,
    name: `Event ${id}`,
    start: dt('2024-01-15T09:00:00'),
    end: dt('2024-01-15T10:00:00'),
    ...overrides,
  }
}

/** Shared contract both adapters satisfy */
function adapterContract(name: string, make: () => EventAdapter) {
  describe(`${name} contract`, () => {
    let adapter: EventAdapter

    beforeEach(() => {
      adapter = make()
    })

    it('starts without calendars', () => {
      expect(adapter.listCalendars()).toEqual([])
      expect(adapter.hasCalendar('work')).toBe(false)
    })

    it('creates calendars idempotently and lists them sorted', () => {
      adapter.createCalendar('work')
      adapter.createCalendar('personal')
      adapter.createCalendar('work')
      expect(adapter.listCalendars()).toEqual(['personal', 'work'])
    })

    it('stores and returns records', () => {
      adapter.createCalendar('work')
      const r = record('a', 'work', { location: 'Room 1', recurrence: { frequency: 'daily', interval: 2 } })
      adapter.putEvent(r)
      expect(adapter.getEvent('work', r.id)).toEqual(r)
      expect(adapter.listEvents('work')).toEqual([r])
    })

    it('replaces a record with the same id', () => {
      adapter.createCalendar('work')
      adapter.putEvent(record('a'))
      adapter.putEvent(record('a', 'work', { name: 'Renamed' }))
      expect(adapter.listEvents('work').map((r) => r.name)).toEqual(['Renamed'])
    })

    it('returns null or false for unknown ids', () => {
      adapter.createCalendar('work')
      expect(adapter.getEvent('work', 'missing' as EventId)).toBeNull()
      expect(adapter.deleteEvent('work', 'missing' as EventId)).toBe(false)
    })

    it('deletes records', () => {
      adapter.createCalendar('work')
      adapter.putEvent(record('a'))
      expect(adapter.deleteEvent('work', 'a' as EventId)).toBe(true)
      expect(adapter.listEvents('work')).toEqual([])
    })

    it('refuses unknown calendars', () => {
      expect(() => adapter.listEvents('nope')).toThrow(NotFoundError)
      expect(() => adapter.putEvent(record('a', 'nope'))).toThrow(NotFoundError)
    })
  })
}

// ============================================================================
// 1. MOCK ADAPTER
// ============================================================================

adapterContract('Mock adapter', createMockAdapter)

describe('Mock adapter isolation', () => {
  it('hands out copies', () => {
    const adapter = createMockAdapter()
    adapter.createCalendar('work')
    const r = record('a')
    adapter.putEvent(r)
    r.name = 'Mutated'
    const fetched = adapter.getEvent('work', r.id)
    expect(fetched?.name).toBe('Event a')
    if (fetched) fetched.name = 'Also mutated'
    expect(adapter.getEvent('work', r.id)?.name).toBe('Event a')
  })
})

// ============================================================================
// 2. FILE ADAPTER
// ============================================================================

describe('File adapter', () => {
  let baseDir: string
  let logLines: string[]

  function make(): EventAdapter {
    return createFileAdapter({
      baseDir,
      timezone: 'UTC',
      clock: () => STAMP,
      logger: createLogger('test', { level: 'info', sink: (line) => logLines.push(line) }),
    })
  }

  beforeEach(() => {
    baseDir = fs.mkdtempSync(path.join(os.tmpdir(), 'calendir-'))
    logLines = []
  })

  afterEach(() => {
    fs.rmSync(baseDir, { recursive: true, force: true })
  })

  adapterContract('File adapter', () => make())

  it('writes one file per event named by its id', () => {
    const adapter = make()
    adapter.createCalendar('work')
    const r = record('a')
    adapter.putEvent(r)
    const file = path.join(baseDir, 'work', 'a.ics')
    expect(fs.readFileSync(file, 'utf8')).toBe(serializeEvent(r, { stamp: STAMP }))
    expect(fs.readdirSync(path.join(baseDir, 'work'))).toEqual(['a.ics'])
  })

  it('finds events in nested directories by UID and rewrites them in place', () => {
    const adapter = make()
    const nested = path.join(baseDir, 'work', 'remote')
    fs.mkdirSync(nested, { recursive: true })
    const original = record('nested-1')
    fs.writeFileSync(path.join(nested, 'other-name.ics'), serializeEvent(original, { stamp: STAMP }))

    expect(adapter.getEvent('work', original.id)).toEqual(original)

    adapter.putEvent({ ...original, name: 'Renamed' })
    expect(fs.readdirSync(path.join(baseDir, 'work')).sort()).toEqual(['remote'])
    expect(adapter.getEvent('work', original.id)?.name).toBe('Renamed')

    expect(adapter.deleteEvent('work', original.id)).toBe(true)
    expect(fs.readdirSync(nested)).toEqual([])
  })

  it('ignores hidden entries and non-event files', () => {
    const adapter = make()
    adapter.createCalendar('work')
    fs.mkdirSync(path.join(baseDir, '.cache'))
    fs.writeFileSync(path.join(baseDir, 'work', 'notes.txt'), 'not an event')
    fs.writeFileSync(path.join(baseDir, 'work', '.a.ics.tmp'), 'partial')
    expect(adapter.listCalendars()).toEqual(['work'])
    expect(adapter.listEvents('work')).toEqual([])
  })

  it('reports and logs an undecodable file with its path', () => {
    const adapter = make()
    adapter.createCalendar('work')
    const file = path.join(baseDir, 'work', 'bad.ics')
    fs.writeFileSync(file, 'BEGIN:VCALENDAR\r\nBEGIN:VEVENT\r\nSUMMARY:x\r\nEND:VEVENT\r\nEND:VCALENDAR\r\n')

    let caught: unknown
    try {
      adapter.listEvents('work')
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(StoreIoError)
    expect(caught instanceof StoreIoError ? caught.path : undefined).toBe(file)
    expect(logLines).toEqual([
      `[error] (test:files) Cannot decode event file '${file}': Event has no UID {"path":"${file}"}`,
    ])
  })

  it('lists no calendars when the base directory does not exist', () => {
    fs.rmSync(baseDir, { recursive: true, force: true })
    expect(make().listCalendars()).toEqual([])
  })
})
