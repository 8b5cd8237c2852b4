import { afterEach, describe, expect, it } from 'vitest'
import { createLogger, getLogLevel, log, setLogLevel } from './logger.js'

describe('logger', () => {
  afterEach(() => {
    setLogLevel('silent')
  })

  it('setLogLevel changes the active level', () => {
    setLogLevel('debug')
    expect(getLogLevel()).toBe('debug')

    setLogLevel('warn')
    expect(getLogLevel()).toBe('warn')
  })

  it('accepts plain messages, field objects and errors', () => {
    setLogLevel('trace')
    const child = createLogger('logger-test')

    expect(() => {
      log.info('plain message')
      child.warn('with fields', { key: 'k', count: 2 })
      child.error('with error', new Error('boom'))
      child.child({ requestId: 'r-1' }).debug('nested child')
    }).not.toThrow()
  })
})
