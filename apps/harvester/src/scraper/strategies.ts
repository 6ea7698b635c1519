/**
 * Retrieval strategies
 *
 * primary:   structured listings endpoint (JSON)
 * secondary: event page, embedded script state, then dollar amounts in markup
 * relay:     today's externally supplied summary
 *
 * Each returns a StrategyOutcome; nothing here throws for expected failures.
 */

import type { RelayLookup } from '../relay/types.js'
import { extractEmbeddedJson } from './extract/embedded-json.js'
import { tryParseJson } from './extract/json-value.js'
import { extractPrices, withinBounds, type PriceExtraction } from './extract/price-extractor.js'
import { summarizePrices } from './process/stats.js'
import type {
  Fetcher,
  FetchResult,
  PlatformAdapter,
  PlatformTargets,
  PriceBounds,
  RetrievalStrategy,
  StrategyContext,
  StrategyOutcome,
  TransportFailureReason,
} from './types.js'

export interface FetchStrategyDeps {
  fetcher: Fetcher
  timeoutMs?: number
}

function transportFailure(result: FetchResult): StrategyOutcome {
  const reasons: Record<Exclude<FetchResult['status'], 'ok'>, TransportFailureReason> = {
    error: result.statusCode !== undefined ? 'http_error' : 'network_error',
    blocked: 'blocked',
    timeout: 'timeout',
    too_large: 'too_large',
    aborted: 'aborted',
  }
  const reason = result.status === 'ok' ? 'unexpected' : reasons[result.status]

  return {
    kind: 'transport_error',
    reason,
    detail: result.error ?? result.status,
    statusCode: result.statusCode,
  }
}

/**
 * Turn extracted prices into a direct PlatformResult, or not_found.
 */
export function outcomeFromExtraction(extraction: PriceExtraction, source: string): StrategyOutcome {
  const summary = summarizePrices(extraction.prices)
  if (!summary) {
    return { kind: 'not_found', detail: `no in-bounds prices in ${source}`, samplesSeen: 0 }
  }

  return {
    kind: 'found',
    result: {
      floor: summary.floor,
      median: summary.median,
      sampleCount: summary.count,
      provenance: 'direct',
    },
  }
}

export function createApiStrategy(
  adapter: PlatformAdapter,
  targets: PlatformTargets | undefined,
  deps: FetchStrategyDeps
): RetrievalStrategy {
  return {
    stage: 'primary',
    async attempt(ctx: StrategyContext): Promise<StrategyOutcome> {
      const apiUrl = targets?.apiUrl
      if (!apiUrl) {
        return { kind: 'not_found', detail: 'no structured endpoint configured' }
      }

      const response = await deps.fetcher.fetch(apiUrl, {
        timeoutMs: deps.timeoutMs,
        signal: ctx.signal,
        headers: { Accept: 'application/json', ...adapter.apiHeaders },
      })
      if (response.status !== 'ok') {
        return transportFailure(response)
      }

      const body = response.body ?? ''
      const parsed = tryParseJson(body)
      if (!parsed.ok) {
        return { kind: 'transport_error', reason: 'parse_error', detail: `malformed JSON: ${parsed.error}` }
      }

      return outcomeFromExtraction(extractPrices([parsed.value], body, ctx.bounds), 'API response')
    },
  }
}

export function createPageStrategy(
  adapter: PlatformAdapter,
  targets: PlatformTargets | undefined,
  deps: FetchStrategyDeps
): RetrievalStrategy {
  return {
    stage: 'secondary',
    async attempt(ctx: StrategyContext): Promise<StrategyOutcome> {
      const pageUrls = targets?.pageUrls ?? []
      if (pageUrls.length === 0) {
        return { kind: 'not_found', detail: 'no event page configured' }
      }

      let lastFailure: StrategyOutcome | null = null

      for (const url of pageUrls) {
        const response = await deps.fetcher.fetch(url, { timeoutMs: deps.timeoutMs, signal: ctx.signal })
        if (response.status !== 'ok') {
          lastFailure = transportFailure(response)
          ctx.logger.debug('Event page fetch failed', { url, status: response.status })
          if (response.status === 'aborted') break
          continue
        }

        const html = response.body ?? ''
        const embedded = extractEmbeddedJson(html, adapter.embeddedScriptSelectors)
        const extraction = extractPrices(embedded.documents, html, ctx.bounds)

        ctx.logger.debug('Event page extracted', {
          url,
          scriptBlocks: embedded.blocksFound,
          scriptBlocksFailed: embedded.blocksFailed,
          method: extraction.method,
          samples: extraction.prices.length,
        })

        return outcomeFromExtraction(extraction, 'event page')
      }

      return lastFailure ?? { kind: 'not_found', detail: 'no event page fetched' }
    },
  }
}

/**
 * Relay entries were validated against the global bounds at submission; the
 * same bounds are re-checked here, not the adapter's narrower extraction bounds.
 */
export function createRelayStrategy(relay: RelayLookup, bounds: PriceBounds): RetrievalStrategy {
  return {
    stage: 'relay',
    async attempt(ctx: StrategyContext): Promise<StrategyOutcome> {
      const entry = await relay.getEligible(ctx.platform, ctx.date)
      if (!entry) {
        return { kind: 'not_found', detail: `no relay entry dated ${ctx.date}` }
      }

      if (!withinBounds(entry.floor, bounds) || !withinBounds(entry.median, bounds)) {
        return { kind: 'not_found', detail: 'relay entry outside price bounds' }
      }

      return {
        kind: 'found',
        result: {
          floor: entry.floor,
          median: entry.median,
          sampleCount: entry.sampleCount,
          provenance: 'relay',
        },
      }
    },
  }
}
