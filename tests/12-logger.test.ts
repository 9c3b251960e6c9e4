/**
 * Segment 12: Logger Tests
 */

import { describe, it, expect } from 'vitest'
import { Logger, createLogger, isLogLevel, silentLogger } from '../src/logger'

function capture(level: 'debug' | 'info' | 'warn' | 'error', context?: string) {
  const lines: string[] = []
  const logger = createLogger(context, { level, sink: (line) => lines.push(line) })
  return { lines, logger }
}

describe('Logger', () => {
  it('formats level, context, message and data', () => {
    const { lines, logger } = capture('debug', 'calendir')
    logger.info('Created event', { id: 'a' })
    logger.debug('plain')
    expect(lines).toEqual(['[info] (calendir) Created event {"id":"a"}', '[debug] (calendir) plain'])
  })

  it('omits an empty context', () => {
    const { lines, logger } = capture('info')
    logger.warn('careful')
    expect(lines).toEqual(['[warn] careful'])
  })

  it('drops messages below its level', () => {
    const { lines, logger } = capture('warn')
    logger.debug('a')
    logger.info('b')
    logger.warn('c')
    logger.error('d')
    expect(lines).toEqual(['[warn] c', '[error] d'])
  })

  it('nests child contexts and shares the sink and level', () => {
    const { lines, logger } = capture('info', 'calendir')
    const child = logger.child('files').child('scan')
    child.debug('hidden')
    child.error('failed')
    expect(lines).toEqual(['[error] (calendir:files:scan) failed'])
  })

  it('writes nothing when silent', () => {
    const lines: string[] = []
    const logger = new Logger({ silent: true, sink: (line) => lines.push(line) })
    logger.error('x')
    logger.child('y').error('z')
    expect(lines).toEqual([])
    expect(() => silentLogger.error('ignored')).not.toThrow()
  })
})

describe('isLogLevel', () => {
  it('accepts the four levels only', () => {
    expect(['debug', 'info', 'warn', 'error', 'trace', ''].map(isLogLevel)).toEqual([true, true, true, true, false, false])
  })
})
