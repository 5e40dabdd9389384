/**
 * Logger tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  consoleLogger,
  createLeveledLogger,
  noopLogger,
  setLogger,
  type Logger,
} from '../../src/utils/logger'
import { configure } from '../../src/config'
import { BidirectionalQueue } from '../../src/linked/queue'
import { RevisionWindowedMap } from '../../src/window/windowed-map'
import { InvariantViolationError } from '../../src/errors'

function createRecordingLogger(): Logger & { calls: string[] } {
  const calls: string[] = []
  return {
    calls,
    debug: (message) => calls.push(`debug:${message}`),
    info: (message) => calls.push(`info:${message}`),
    warn: (message) => calls.push(`warn:${message}`),
    error: (message) => calls.push(`error:${message}`),
  }
}

afterEach(() => {
  vi.restoreAllMocks()
})

describe('consoleLogger', () => {
  it('should prefix each level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    consoleLogger.debug('d', 1)
    consoleLogger.info('i')
    consoleLogger.warn('w', { k: 'v' })

    expect(debug).toHaveBeenCalledWith('[DEBUG] d', 1)
    expect(info).toHaveBeenCalledWith('[INFO] i')
    expect(warn).toHaveBeenCalledWith('[WARN] w', { k: 'v' })
  })

  it('should pass an error through only when given', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    const cause = new Error('boom')

    consoleLogger.error('with', cause)
    consoleLogger.error('without')

    expect(error).toHaveBeenNthCalledWith(1, '[ERROR] with', cause)
    expect(error).toHaveBeenNthCalledWith(2, '[ERROR] without')
  })
})

describe('createLeveledLogger', () => {
  it('should drop messages below the level', () => {
    const base = createRecordingLogger()
    const leveled = createLeveledLogger(base, 'warn')

    leveled.debug('a')
    leveled.info('b')
    leveled.warn('c')
    leveled.error('d')

    expect(base.calls).toEqual(['warn:c', 'error:d'])
  })

  it('should pass everything at debug', () => {
    const base = createRecordingLogger()
    const leveled = createLeveledLogger(base, 'debug')

    leveled.debug('a')
    leveled.error('b')

    expect(base.calls).toEqual(['debug:a', 'error:b'])
  })

  it('should be the noop logger when silent', () => {
    expect(createLeveledLogger(consoleLogger, 'silent')).toBe(noopLogger)
  })
})

describe('container logging', () => {
  it('should log truncation at debug level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => {})
    configure({ logLevel: 'debug' })

    const map = new RevisionWindowedMap([[5, 'a'], [10, 'b']])
    map.truncateFrom(8)

    expect(debug).toHaveBeenCalledWith('[DEBUG] Truncated history from revision 8', { discarded: 1 })
  })

  it('should warn when rejecting a batch', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    configure({ logLevel: 'warn' })

    const map = new RevisionWindowedMap<string>()
    expect(() => map.update([[3, 'x'], [1, 'y']])).toThrow()

    expect(warn).toHaveBeenCalledWith('[WARN] Rejecting batch: revision 1 follows revision 3')
  })

  it('should log an invariant failure before throwing it', () => {
    const base = createRecordingLogger()
    setLogger(base)

    const q = new BidirectionalQueue([1, 2], { checkInvariants: false })
    Reflect.set(q, '_length', 0)

    expect(() => q.assertInvariants()).toThrow(InvariantViolationError)
    expect(base.calls).toEqual(['error:Queue invariant check failed'])
  })
})
