import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { RelayIngestor } from '../relay-ingestor.js'
import { RelayValidationError } from '../../errors.js'
import { registerAllAdapters } from '../../scraper/adapters/index.js'
import { InMemoryPlatformRegistry } from '../../scraper/registry.js'

const BOUNDS = { min: 200, max: 20000 }

describe('RelayIngestor', () => {
  let dir: string
  let path: string
  let now: Date
  let relay: RelayIngestor

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'relay-'))
    path = join(dir, 'relay_cache.json')
    now = new Date('2026-05-01T09:15:00.000Z')
    relay = new RelayIngestor({
      path,
      registry: registerAllAdapters(new InMemoryPlatformRegistry()),
      bounds: BOUNDS,
      now: () => now,
    })
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('accepts a valid submission and stamps it with the UTC date', async () => {
    const entry = await relay.submit({ platform: 'seatgeek', floor: 640, median: 910, sampleCount: 14 })

    expect(entry).toEqual({
      platform: 'seatgeek',
      floor: 640,
      median: 910,
      sampleCount: 14,
      date: '2026-05-01',
      timestamp: '2026-05-01T09:15:00.000Z',
    })
    expect(await relay.getEligible('seatgeek', '2026-05-01')).toEqual(entry)
  })

  it('accepts numeric strings, normalizes the platform and defaults the sample count', async () => {
    const entry = await relay.submit({ platform: 'StubHub', floor: '700', median: ' 1050 ' })

    expect(entry.platform).toBe('stubhub')
    expect(entry.median).toBe(1050)
    expect(entry.sampleCount).toBe(0)
  })

  it('rejects a floor below the minimum and leaves the cache unchanged', async () => {
    await relay.submit({ platform: 'tickpick', floor: 500, median: 700 })

    await expect(relay.submit({ platform: 'tickpick', floor: 150, median: 700 })).rejects.toThrow(
      'floor: must be between 200 and 20000'
    )

    const entry = await relay.getEligible('tickpick', '2026-05-01')
    expect(entry?.floor).toBe(500)
  })

  it('rejects missing fields, unknown platforms and inverted summaries', async () => {
    await expect(relay.submit({ floor: 500, median: 700 })).rejects.toBeInstanceOf(RelayValidationError)
    await expect(relay.submit({ platform: 'craigslist', floor: 500, median: 700 })).rejects.toThrow(
      "platform: unknown platform 'craigslist'"
    )
    await expect(relay.submit({ platform: 'seatgeek', floor: 900, median: 700 })).rejects.toThrow(
      'floor: must not exceed median'
    )
    await expect(relay.submit({ platform: 'seatgeek', floor: 500, median: 700, sampleCount: 2.5 })).rejects.toThrow(
      'sampleCount: must be a non-negative integer'
    )
    await expect(relay.submit(undefined)).rejects.toBeInstanceOf(RelayValidationError)

    expect(await relay.list()).toEqual({})
  })

  it('never returns a stale entry', async () => {
    await relay.submit({ platform: 'ticketmaster', floor: 800, median: 1200 })

    expect(await relay.getEligible('ticketmaster', '2026-05-02')).toBeNull()
    expect(await relay.getEligible('stubhub', '2026-05-01')).toBeNull()
  })

  it('keeps the last submission for a platform', async () => {
    await relay.submit({ platform: 'vividseats', floor: 500, median: 700 })
    now = new Date('2026-05-01T18:00:00.000Z')
    await relay.submit({ platform: 'vividseats', floor: 520, median: 760 })

    const cache = await relay.list()
    expect(cache.vividseats).toMatchObject({ floor: 520, median: 760, timestamp: '2026-05-01T18:00:00.000Z' })
  })

  it('summarizes freshness for every registered platform', async () => {
    await relay.submit({ platform: 'seatgeek', floor: 640, median: 910 })
    now = new Date('2026-05-02T06:00:00.000Z')

    const freshness = await relay.summarizeFreshness('2026-05-02')

    expect(freshness.seatgeek).toEqual({
      present: true,
      fresh: false,
      date: '2026-05-01',
      timestamp: '2026-05-01T09:15:00.000Z',
    })
    expect(freshness.stubhub).toEqual({ present: false, fresh: false, date: null, timestamp: null })
    expect(Object.keys(freshness)).toHaveLength(5)
  })

  it('treats an unreadable cache file as empty', async () => {
    await writeFile(path, 'not json', 'utf8')
    expect(await relay.list()).toEqual({})
  })
})
