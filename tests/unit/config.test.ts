/**
 * Configuration tests
 *
 * tests/setup.ts configures every test with invariant checks on and
 * restores the defaults afterwards.
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  DEFAULT_CONFIG,
  ENV_CHECK_INVARIANTS,
  ENV_LOG_LEVEL,
  configure,
  getConfig,
  loadConfig,
  resetConfig,
} from '../../src/config'
import { ConfigurationError, InvariantViolationError } from '../../src/errors'
import { BidirectionalQueue } from '../../src/linked/queue'
import { logger, noopLogger } from '../../src/utils/logger'

function reader(values: Record<string, string>): (name: string) => string | undefined {
  const env = new Map(Object.entries(values))
  return (name) => env.get(name)
}

afterEach(() => {
  vi.unstubAllEnvs()
  vi.restoreAllMocks()
})

describe('loadConfig', () => {
  it('should fall back to defaults when nothing is set', () => {
    expect(loadConfig(reader({}))).toEqual({ logLevel: 'silent', checkInvariants: false })
  })

  it('should read and normalise both variables', () => {
    const config = loadConfig(reader({
      [ENV_LOG_LEVEL]: ' Warn ',
      [ENV_CHECK_INVARIANTS]: 'YES',
    }))
    expect(config).toEqual({ logLevel: 'warn', checkInvariants: true })
  })

  it('should treat blank values as unset', () => {
    const config = loadConfig(reader({ [ENV_LOG_LEVEL]: '  ', [ENV_CHECK_INVARIANTS]: '' }))
    expect(config).toEqual(DEFAULT_CONFIG)
  })

  it('should read process.env by default', () => {
    vi.stubEnv('REVWINDOW_LOG_LEVEL', 'debug')
    vi.stubEnv('REVWINDOW_CHECK_INVARIANTS', '0')
    expect(loadConfig()).toEqual({ logLevel: 'debug', checkInvariants: false })
  })

  it('should reject an unknown log level', () => {
    try {
      loadConfig(reader({ [ENV_LOG_LEVEL]: 'loud' }))
      expect.fail('expected a configuration error')
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError)
      if (error instanceof ConfigurationError) {
        expect(error.message).toBe('Invalid REVWINDOW_LOG_LEVEL: "loud"')
        expect(error.context).toEqual({
          configKey: 'REVWINDOW_LOG_LEVEL',
          expectedValue: 'silent | error | warn | info | debug',
          actualValue: 'loud',
        })
      }
    }
  })

  it('should reject an unknown boolean', () => {
    expect(() => loadConfig(reader({ [ENV_CHECK_INVARIANTS]: 'maybe' }))).toThrow(
      'Invalid REVWINDOW_CHECK_INVARIANTS: "maybe"'
    )
  })
})

describe('configure', () => {
  it('should merge overrides into the active configuration', () => {
    configure({ logLevel: 'info' })
    expect(getConfig()).toEqual({ logLevel: 'info', checkInvariants: true })
  })

  it('should install a logger at the configured level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})

    configure({ logLevel: 'warn' })
    logger.warn('kept')
    logger.info('dropped')

    expect(warn).toHaveBeenCalledWith('[WARN] kept')
    expect(info).not.toHaveBeenCalled()
  })

  it('should restore the defaults', () => {
    configure({ logLevel: 'debug' })
    resetConfig()

    expect(getConfig()).toEqual(DEFAULT_CONFIG)
    expect(logger).toBe(noopLogger)
  })
})

describe('invariant checking', () => {
  it('should follow the global setting', () => {
    configure({ checkInvariants: false })
    const q = new BidirectionalQueue([1, 2, 3])
    Reflect.set(q, '_length', 5)
    q.append(4)

    configure({ checkInvariants: true })
    expect(() => q.append(5)).toThrow(InvariantViolationError)
    expect(() => q.append(6)).toThrow('BidirectionalQueue: forward walk counts 6 nodes, length is 8')
  })

  it('should let a container override the global setting', () => {
    const q = new BidirectionalQueue([1, 2, 3], { checkInvariants: false })
    Reflect.set(q, '_length', 5)

    expect(() => q.append(4)).not.toThrow()
    expect(q.length).toBe(6)
  })
})
