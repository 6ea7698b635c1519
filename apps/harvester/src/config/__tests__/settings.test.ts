import { resolve } from 'node:path'
import { describe, expect, it } from 'vitest'
import { DEFAULT_EVENT_CONFIG_PATH, loadSettings } from '../settings.js'
import { ConfigError } from '../../errors.js'

describe('loadSettings', () => {
  it('applies defaults', () => {
    const settings = loadSettings({})

    expect(settings).toMatchObject({
      env: 'development',
      port: 10000,
      scrapeToken: 'changeme',
      bounds: { min: 200, max: 20000 },
      pacing: { minMs: 3000, maxMs: 8000 },
      fetchTimeoutMs: 25000,
      fetchMaxAttempts: 2,
      cycleDeadlineMs: 300000,
      lockTimeoutMs: 10000,
      scrapeCron: null,
      serviceName: 'Ticket Desk v1.0',
      eventConfigPath: DEFAULT_EVENT_CONFIG_PATH,
    })
    expect(settings.historyFile).toBe(resolve('./data', 'ticket_data.json'))
    expect(settings.relayFile).toBe(resolve('./data', 'relay_cache.json'))
  })

  it('coerces numeric variables', () => {
    const settings = loadSettings({ PORT: '8080', PRICE_MIN: '300', PRICE_MAX: '15000', SCRAPE_TOKEN: 'test-secret' })
    expect(settings.port).toBe(8080)
    expect(settings.bounds).toEqual({ min: 300, max: 15000 })
    expect(settings.scrapeToken).toBe('test-secret')
  })

  it('returns a frozen object', () => {
    const settings = loadSettings({})
    expect(Object.isFrozen(settings)).toBe(true)
    expect(Object.isFrozen(settings.bounds)).toBe(true)
  })

  it('rejects inverted price bounds', () => {
    expect(() => loadSettings({ PRICE_MIN: '5000', PRICE_MAX: '1000' })).toThrow(
      'Invalid configuration: PRICE_MAX: PRICE_MAX must be greater than PRICE_MIN'
    )
  })

  it('rejects a pacing window that ends before it starts', () => {
    expect(() => loadSettings({ PACING_MIN_MS: '9000', PACING_MAX_MS: '1000' })).toThrow(ConfigError)
  })

  it('requires a scrape token in production', () => {
    expect(() => loadSettings({ NODE_ENV: 'production' })).toThrow('SCRAPE_TOKEN is required in production')
    expect(loadSettings({ NODE_ENV: 'production', SCRAPE_TOKEN: 'test-secret' }).env).toBe('production')
  })

  it('rejects a non-numeric port', () => {
    expect(() => loadSettings({ PORT: 'eighty' })).toThrow(/^Invalid configuration: PORT: /)
  })
})
