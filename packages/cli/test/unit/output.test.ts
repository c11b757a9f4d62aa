import { describe, it, expect } from 'vitest'
import { CipherError, ConfigError, IOError, KeyLoadError } from 'keyseal'
import { EXIT_FAILURE, EXIT_FATAL, exitCodeFor, formatError } from '../../src/output.js'

describe('formatError', () => {
  it('should format Error instances with name and message', () => {
    const err = new Error('something broke')
    expect(formatError(err)).toBe('Error: something broke')
  })

  it('should format keyseal errors with their class name', () => {
    expect(formatError(new KeyLoadError('no key', '/k'))).toBe('KeyLoadError: no key')
  })

  it('should stringify non-Error values', () => {
    expect(formatError('string error')).toBe('string error')
    expect(formatError(42)).toBe('42')
    expect(formatError(null)).toBe('null')
  })
})

describe('exitCodeFor', () => {
  it('maps fatal keyseal errors to 2', () => {
    expect(exitCodeFor(new KeyLoadError('x', '/k'))).toBe(EXIT_FATAL)
    expect(exitCodeFor(new ConfigError('x'))).toBe(EXIT_FATAL)
    expect(EXIT_FATAL).toBe(2)
  })

  it('maps recoverable keyseal errors to 1', () => {
    expect(exitCodeFor(new CipherError('x', 'decrypt'))).toBe(EXIT_FAILURE)
    expect(exitCodeFor(new IOError('x', '/m', 'read'))).toBe(EXIT_FAILURE)
  })

  it('maps anything else to 1', () => {
    expect(exitCodeFor(new Error('x'))).toBe(1)
    expect(exitCodeFor('x')).toBe(1)
  })
})
