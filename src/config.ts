/**
 * Configuration
 *
 * Resolves settings from explicit overrides, then CALENDIR_* environment
 * variables, then defaults.
 */

import * as os from 'node:os'
import * as path from 'node:path'
import { type LogLevel, isLogLevel } from './logger'
import { systemTimezone } from './time-date'
import { DEFAULT_CALENDAR, validateCalendarName } from './event-record'
import { ValidationError } from './errors'

export const DEFAULT_BASE_DIR = '~/.calendars'
export const DEFAULT_SYNC_COMMAND: readonly string[] = ['vdirsyncer', 'sync', '--force-delete']

export type CalendirConfig = {
  readonly baseDir: string
  readonly defaultCalendar: string
  readonly syncCommand: readonly string[]
  /** Local system zone; not user-selectable */
  readonly timezone: string
  readonly logLevel: LogLevel
}

export type ConfigOverrides = {
  baseDir?: string
  defaultCalendar?: string
  syncCommand?: readonly string[]
  logLevel?: LogLevel
}

export type Env = Record<string, string | undefined>

export function expandHome(p: string, home: string = os.homedir()): string {
  if (p === '~') return home
  if (p.startsWith('~/')) return path.join(home, p.slice(2))
  return p
}

/** Empty values count as unset */
function fromEnv(env: Env, name: string): string | undefined {
  const value = env[name]?.trim()
  return value ? value : undefined
}

export function resolveConfig(overrides: ConfigOverrides = {}, env: Env = process.env): CalendirConfig {
  const baseDir = overrides.baseDir ?? fromEnv(env, 'CALENDIR_DIR') ?? DEFAULT_BASE_DIR

  const defaultCalendar =
    overrides.defaultCalendar ?? fromEnv(env, 'CALENDIR_DEFAULT_CALENDAR') ?? DEFAULT_CALENDAR
  validateCalendarName(defaultCalendar)

  const envSync = fromEnv(env, 'CALENDIR_SYNC_COMMAND')
  const syncCommand = overrides.syncCommand ?? (envSync ? envSync.split(/\s+/) : DEFAULT_SYNC_COMMAND)
  if (syncCommand.length === 0) throw new ValidationError('Sync command must not be empty')

  let logLevel: LogLevel
  if (overrides.logLevel !== undefined) {
    logLevel = overrides.logLevel
  } else {
    const raw = fromEnv(env, 'CALENDIR_LOG_LEVEL') ?? (env['DEBUG'] ? 'debug' : 'info')
    if (!isLogLevel(raw)) throw new ValidationError(`Unknown log level: '${raw}'`)
    logLevel = raw
  }

  return Object.freeze({
    baseDir: path.resolve(expandHome(baseDir)),
    defaultCalendar,
    syncCommand: Object.freeze([...syncCommand]),
    timezone: systemTimezone(),
    logLevel,
  })
}
