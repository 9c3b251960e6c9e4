/**
 * Segment 09: Configuration Tests
 */

import { describe, it, expect } from 'vitest'
import * as os from 'node:os'
import * as path from 'node:path'
import { resolveConfig, expandHome, DEFAULT_SYNC_COMMAND } from '../src/config'
import { systemTimezone } from '../src/time-date'
import { ValidationError } from '../src/errors'

describe('expandHome', () => {
  it('expands a leading tilde only', () => {
    expect(expandHome('~', '/home/u')).toBe('/home/u')
    expect(expandHome('~/.calendars', '/home/u')).toBe('/home/u/.calendars')
    expect(expandHome('/data/~/x', '/home/u')).toBe('/data/~/x')
    expect(expandHome('~other/x', '/home/u')).toBe('~other/x')
  })
})

describe('resolveConfig', () => {
  it('falls back to defaults', () => {
    expect(resolveConfig({}, {})).toEqual({
      baseDir: path.join(os.homedir(), '.calendars'),
      defaultCalendar: 'personal',
      syncCommand: ['vdirsyncer', 'sync', '--force-delete'],
      timezone: systemTimezone(),
      logLevel: 'info',
    })
  })

  it('reads the environment', () => {
    const config = resolveConfig(
      {},
      {
        CALENDIR_DIR: '/srv/cal',
        CALENDIR_DEFAULT_CALENDAR: 'work',
        CALENDIR_SYNC_COMMAND: ' mysync  --all ',
        CALENDIR_LOG_LEVEL: 'warn',
      }
    )
    expect(config.baseDir).toBe('/srv/cal')
    expect(config.defaultCalendar).toBe('work')
    expect(config.syncCommand).toEqual(['mysync', '--all'])
    expect(config.logLevel).toBe('warn')
  })

  it('prefers overrides to the environment', () => {
    const config = resolveConfig(
      { baseDir: '/override', defaultCalendar: 'home', syncCommand: ['true'], logLevel: 'error' },
      { CALENDIR_DIR: '/srv/cal', CALENDIR_DEFAULT_CALENDAR: 'work', CALENDIR_LOG_LEVEL: 'warn' }
    )
    expect(config).toMatchObject({ baseDir: '/override', defaultCalendar: 'home', syncCommand: ['true'], logLevel: 'error' })
  })

  it('treats empty variables as unset', () => {
    const config = resolveConfig({}, { CALENDIR_DIR: '', CALENDIR_SYNC_COMMAND: '   ' })
    expect(config.baseDir).toBe(path.join(os.homedir(), '.calendars'))
    expect(config.syncCommand).toEqual([...DEFAULT_SYNC_COMMAND])
  })

  it('switches to debug logging when DEBUG is set', () => {
    expect(resolveConfig({}, { DEBUG: '1' }).logLevel).toBe('debug')
    expect(resolveConfig({}, { DEBUG: '1', CALENDIR_LOG_LEVEL: 'error' }).logLevel).toBe('error')
  })

  it('resolves a relative directory', () => {
    expect(resolveConfig({ baseDir: 'cals' }, {}).baseDir).toBe(path.resolve('cals'))
  })

  it('rejects bad values', () => {
    expect(() => resolveConfig({}, { CALENDIR_LOG_LEVEL: 'loud' })).toThrow("Unknown log level: 'loud'")
    expect(() => resolveConfig({}, { CALENDIR_DEFAULT_CALENDAR: '../x' })).toThrow(ValidationError)
    expect(() => resolveConfig({ syncCommand: [] }, {})).toThrow(ValidationError)
  })

  it('freezes the result', () => {
    expect(Object.isFrozen(resolveConfig({}, {}))).toBe(true)
  })
})
