/**
 * Sync
 *
 * Runs the external synchronization tool as a blocking subprocess. Only its
 * exit status is inspected.
 */

import { spawnSync } from 'node:child_process'
import { type Logger, silentLogger } from './logger'
import { validateCalendarName } from './event-record'
import { SyncError } from './errors'

export { SyncError } from './errors'

export type SpawnResult = {
  status: number | null
  error?: Error
}

/** Runs a program to completion with inherited stdio */
export type CommandRunner = (program: string, args: readonly string[]) => SpawnResult

export type SyncOptions = {
  calendar?: string
  command: readonly string[]
  run?: CommandRunner
  logger?: Logger
}

export const spawnRunner: CommandRunner = (program, args) => {
  const result = spawnSync(program, args, { stdio: 'inherit' })
  return result.error ? { status: result.status, error: result.error } : { status: result.status }
}

export function runSync(options: SyncOptions): void {
  const [program, ...baseArgs] = options.command
  if (program === undefined) throw new SyncError('Sync command is empty', null)

  const args = [...baseArgs]
  if (options.calendar !== undefined) {
    validateCalendarName(options.calendar)
    args.push(options.calendar)
  }

  const log = (options.logger ?? silentLogger).child('sync')
  log.info(options.calendar !== undefined ? `Syncing calendar '${options.calendar}'` : 'Syncing all calendars', {
    command: [program, ...args].join(' '),
  })

  const result = (options.run ?? spawnRunner)(program, args)
  if (result.error) {
    throw new SyncError(`Failed to run '${program}': ${result.error.message}`, null, result.error)
  }
  if (result.status !== 0) {
    throw new SyncError(`'${program}' exited with status ${result.status ?? 'unknown'}`, result.status)
  }
  log.debug('Sync completed')
}
