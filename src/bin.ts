#!/usr/bin/env node
/**
 * calendir executable: reads configuration and the clock once, then hands
 * the command line to the CLI.
 */

import { runCli } from './cli'
import { resolveConfig } from './config'
import { createFileAdapter } from './file-adapter'
import { createLogger } from './logger'
import { fromJsDate } from './time-date'
import { CalendirError } from './errors'

function main(): number {
  try {
    const config = resolveConfig()
    const logger = createLogger('calendir', { level: config.logLevel })
    return runCli(process.argv.slice(2), {
      adapter: createFileAdapter({ baseDir: config.baseDir, logger, timezone: config.timezone }),
      config,
      now: fromJsDate(new Date()),
      logger,
      out: (line) => process.stdout.write(line + '\n'),
      err: (line) => process.stderr.write(line + '\n'),
    })
  } catch (err) {
    // Configuration errors; everything later is reported by runCli
    if (err instanceof CalendirError) {
      process.stderr.write(`Error: ${err.message}\n`)
      return 1
    }
    throw err
  }
}

process.exitCode = main()
