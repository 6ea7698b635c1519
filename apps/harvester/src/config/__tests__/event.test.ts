import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'
import { loadEventDefinition, parseEventDefinition } from '../event.js'
import { DEFAULT_EVENT_CONFIG_PATH } from '../settings.js'
import { ConfigError } from '../../errors.js'

describe('parseEventDefinition', () => {
  it('normalizes optional fields and page lists', () => {
    const event = parseEventDefinition({
      event: 'Test Event',
      section: '101',
      platforms: {
        seatgeek: { apiUrl: 'https://api.example.test/listings' },
      },
    })

    expect(event).toEqual({
      event: 'Test Event',
      section: '101',
      row: null,
      seatType: null,
      platforms: {
        seatgeek: { apiUrl: 'https://api.example.test/listings', pageUrls: [] },
      },
    })
  })

  it('rejects unknown platforms', () => {
    expect(() =>
      parseEventDefinition({ event: 'Test Event', section: '101', platforms: { craigslist: { pageUrls: [] } } })
    ).toThrow(ConfigError)
  })

  it('rejects malformed URLs', () => {
    expect(() =>
      parseEventDefinition({ event: 'Test Event', section: '101', platforms: { stubhub: { pageUrls: ['not a url'] } } })
    ).toThrow(/^Invalid event definition: platforms\.stubhub\.pageUrls\.0: /)
  })
})

describe('loadEventDefinition', () => {
  it('loads the bundled event file', async () => {
    const event = await loadEventDefinition(DEFAULT_EVENT_CONFIG_PATH)

    expect(event.section).toBe('224')
    expect(Object.keys(event.platforms)).toEqual(['stubhub', 'seatgeek', 'tickpick', 'vividseats', 'ticketmaster'])
    expect(event.platforms.ticketmaster?.pageUrls).toHaveLength(2)
  })

  it('wraps unreadable files in a ConfigError', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'event-'))
    try {
      const path = join(dir, 'event.json')
      await writeFile(path, '{ nope', 'utf8')
      await expect(loadEventDefinition(path)).rejects.toBeInstanceOf(ConfigError)
      await expect(loadEventDefinition(join(dir, 'missing.json'))).rejects.toThrow('Cannot load event definition')
    } finally {
      await rm(dir, { recursive: true, force: true })
    }
  })
})
