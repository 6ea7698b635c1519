import { describe, expect, it, vi } from 'vitest'
import { silentLogger, type ILogger } from '@ticketdesk/logger'
import { buildPlatformScrapers, PlatformScraper } from '../platform-scraper.js'
import { InMemoryPlatformRegistry } from '../registry.js'
import { registerAllAdapters, tickpickAdapter, vividseatsAdapter } from '../adapters/index.js'
import type { RelayEntry, RelayLookup } from '../../relay/types.js'
import type { EventDefinition } from '../../config/event.js'
import type { Fetcher, FetchResult, PlatformId, RetrievalStrategy, StrategyOutcome } from '../types.js'

const BOUNDS = { min: 200, max: 20000 }
const DATE = '2026-05-01'

const runCtx = { date: DATE, bounds: BOUNDS, logger: silentLogger }

const NOT_FOUND_RESPONSE: FetchResult = { status: 'error', statusCode: 404, error: 'HTTP 404: Not Found', durationMs: 1 }

function fetcherFor(responses: Record<string, FetchResult>) {
  return {
    fetch: vi.fn(async (url: string): Promise<FetchResult> => responses[url] ?? NOT_FOUND_RESPONSE),
  } satisfies Fetcher
}

function relayWith(entry: RelayEntry | null): RelayLookup {
  return {
    getEligible: vi.fn(async (_platform: PlatformId, date: string): Promise<RelayEntry | null> =>
      entry && entry.date === date ? entry : null
    ),
  }
}

function stubStrategy(stage: RetrievalStrategy['stage'], outcome: StrategyOutcome | Error): RetrievalStrategy {
  return {
    stage,
    attempt: vi.fn(async () => {
      if (outcome instanceof Error) throw outcome
      return outcome
    }),
  }
}

const event: EventDefinition = {
  event: 'Test Event',
  section: '224',
  row: null,
  seatType: null,
  platforms: {
    vividseats: {
      apiUrl: 'https://vivid.test/api/listings',
      pageUrls: ['https://vivid.test/event'],
    },
  },
}

describe('PlatformScraper', () => {
  it('stops at the first stage that finds a result', async () => {
    const secondary = stubStrategy('secondary', { kind: 'not_found', detail: 'unused' })
    const scraper = new PlatformScraper(vividseatsAdapter, [
      stubStrategy('primary', { kind: 'found', result: { floor: 500, median: 800, sampleCount: 12, provenance: 'direct' } }),
      secondary,
    ])

    const outcome = await scraper.run(runCtx)

    expect(outcome.result).toEqual({ floor: 500, median: 800, sampleCount: 12, provenance: 'direct' })
    expect(outcome.attempts.map((a) => a.stage)).toEqual(['primary'])
    expect(secondary.attempt).not.toHaveBeenCalled()
  })

  it('logs the result with the adapter name and version', async () => {
    const info = vi.fn()
    const logger: ILogger = { ...silentLogger, info, child: () => logger }
    const scraper = new PlatformScraper(vividseatsAdapter, [
      stubStrategy('primary', { kind: 'found', result: { floor: 500, median: 800, sampleCount: 12, provenance: 'direct' } }),
    ])

    await scraper.run({ ...runCtx, logger })

    expect(info).toHaveBeenCalledWith('PLATFORM_RESULT', {
      event_name: 'PLATFORM_RESULT',
      platform: 'vividseats',
      displayName: 'Vivid Seats',
      adapterVersion: '1.0.0',
      provenance: 'direct',
      floor: 500,
      median: 800,
      sampleCount: 12,
    })
  })

  it('falls through an HTTP 500 and a page with no prices to a fresh relay entry', async () => {
    const fetcher = fetcherFor({
      'https://vivid.test/api/listings': { status: 'error', statusCode: 500, error: 'HTTP 500: Server Error', durationMs: 3 },
      'https://vivid.test/event': { status: 'ok', statusCode: 200, body: '<html><p>No listings</p></html>', durationMs: 3 },
    })
    const relay = relayWith({ platform: 'vividseats', floor: 650, median: 900, sampleCount: 7, date: DATE, timestamp: `${DATE}T08:00:00.000Z` })

    const registry = new InMemoryPlatformRegistry()
    registry.register(vividseatsAdapter)
    const [scraper] = buildPlatformScrapers(registry, event, { fetcher, relay, bounds: BOUNDS })

    const outcome = await scraper.run(runCtx)

    expect(outcome.result).toEqual({ floor: 650, median: 900, sampleCount: 7, provenance: 'relay' })
    expect(outcome.attempts.map((a) => [a.stage, a.outcome])).toEqual([
      ['primary', 'transport_error'],
      ['secondary', 'not_found'],
      ['relay', 'found'],
    ])
    expect(outcome.attempts[0].detail).toBe('http_error (500): HTTP 500: Server Error')
  })

  it('returns no data when every stage is exhausted', async () => {
    const fetcher = fetcherFor({})
    const relay = relayWith({ platform: 'vividseats', floor: 650, median: 900, sampleCount: 7, date: '2026-04-30', timestamp: '2026-04-30T08:00:00.000Z' })

    const registry = new InMemoryPlatformRegistry()
    registry.register(vividseatsAdapter)
    const [scraper] = buildPlatformScrapers(registry, event, { fetcher, relay, bounds: BOUNDS })

    const outcome = await scraper.run(runCtx)

    expect(outcome.result).toBeNull()
    expect(outcome.attempts.map((a) => a.outcome)).toEqual(['transport_error', 'transport_error', 'not_found'])
  })

  it('reports a throwing strategy as a transport error and continues', async () => {
    const scraper = new PlatformScraper(vividseatsAdapter, [
      stubStrategy('primary', new Error('socket hang up')),
      stubStrategy('secondary', { kind: 'found', result: { floor: 300, median: 420, sampleCount: 5, provenance: 'direct' } }),
    ])

    const outcome = await scraper.run(runCtx)

    expect(outcome.attempts[0]).toMatchObject({ stage: 'primary', outcome: 'transport_error', detail: 'unexpected: socket hang up' })
    expect(outcome.result?.median).toBe(420)
  })

  it('discards a result whose floor exceeds its median', async () => {
    const scraper = new PlatformScraper(vividseatsAdapter, [
      stubStrategy('primary', { kind: 'found', result: { floor: 900, median: 800, sampleCount: 2, provenance: 'direct' } }),
    ])

    const outcome = await scraper.run(runCtx)

    expect(outcome.result).toBeNull()
    expect(outcome.attempts[0]).toMatchObject({ outcome: 'not_found', detail: 'result failed consistency check' })
  })

  it('extracts from the API body with the adapter-narrowed bounds', async () => {
    const tickEvent: EventDefinition = {
      ...event,
      platforms: { tickpick: { apiUrl: 'https://tick.test/api', pageUrls: [] } },
    }
    const fetcher = fetcherFor({
      'https://tick.test/api': {
        status: 'ok',
        statusCode: 200,
        body: JSON.stringify({ listings: [{ price: 250 }, { price: 400 }, { price: 600 }, { price: 16000 }] }),
        durationMs: 2,
      },
    })

    const registry = new InMemoryPlatformRegistry()
    registry.register(tickpickAdapter)
    const [scraper] = buildPlatformScrapers(registry, tickEvent, { fetcher, relay: relayWith(null), bounds: BOUNDS })

    const outcome = await scraper.run(runCtx)

    expect(outcome.result).toEqual({ floor: 400, median: 500, sampleCount: 2, provenance: 'direct' })
  })

  it('treats a malformed API body as a transport error', async () => {
    const fetcher = fetcherFor({
      'https://vivid.test/api/listings': { status: 'ok', statusCode: 200, body: '<html>', durationMs: 2 },
      'https://vivid.test/event': { status: 'ok', statusCode: 200, body: '<span>$1,480</span>', durationMs: 2 },
    })

    const registry = new InMemoryPlatformRegistry()
    registry.register(vividseatsAdapter)
    const [scraper] = buildPlatformScrapers(registry, event, { fetcher, relay: relayWith(null), bounds: BOUNDS })

    const outcome = await scraper.run(runCtx)

    expect(outcome.attempts[0]).toMatchObject({ stage: 'primary', outcome: 'transport_error' })
    expect(outcome.result).toEqual({ floor: 1480, median: 1480, sampleCount: 1, provenance: 'direct' })
  })

  it('skips network stages once the cycle signal has aborted', async () => {
    const fetcher = fetcherFor({})
    const controller = new AbortController()
    controller.abort()

    const registry = new InMemoryPlatformRegistry()
    registry.register(vividseatsAdapter)
    const [scraper] = buildPlatformScrapers(registry, event, { fetcher, relay: relayWith(null), bounds: BOUNDS })

    const outcome = await scraper.run({ ...runCtx, signal: controller.signal })

    expect(fetcher.fetch).not.toHaveBeenCalled()
    expect(outcome.result).toBeNull()
  })
})

describe('registry', () => {
  it('registers every platform in scrape order', () => {
    const registry = registerAllAdapters(new InMemoryPlatformRegistry())
    expect(registry.list().map((a) => a.id)).toEqual(['stubhub', 'seatgeek', 'tickpick', 'vividseats', 'ticketmaster'])
  })

  it('rejects a duplicate registration', () => {
    const registry = new InMemoryPlatformRegistry()
    registry.register(tickpickAdapter)
    expect(() => registry.register(tickpickAdapter)).toThrow("Platform 'tickpick' is already registered")
  })
})
