/**
 * Platform Scraper
 *
 * Runs one marketplace's strategy chain:
 *
 *   TRY_PRIMARY → TRY_SECONDARY → TRY_RELAY → DONE(result | none)
 *
 * The first stage that yields a usable result ends the chain. Exhausting every
 * stage is "no data" for this cycle, an expected outcome that is logged and
 * returned, never thrown.
 */

import type { ILogger } from '@ticketdesk/logger'
import { effectiveBounds } from './extract/price-extractor.js'
import { recordPlatformResult, recordStrategyAttempt } from './metrics.js'
import { createApiStrategy, createPageStrategy, createRelayStrategy } from './strategies.js'
import type { EventDefinition } from '../config/event.js'
import type { RelayLookup } from '../relay/types.js'
import {
  STRATEGY_STAGES,
  type Fetcher,
  type PlatformAdapter,
  type PlatformRegistry,
  type PlatformResult,
  type PlatformScrapeOutcome,
  type PriceBounds,
  type RetrievalStrategy,
  type StrategyAttempt,
  type StrategyContext,
  type StrategyOutcome,
  type StrategyStage,
} from './types.js'

export interface PlatformRunContext {
  /** UTC date of the cycle */
  date: string
  /** Global price bounds; intersected with the adapter's own */
  bounds: PriceBounds
  logger: ILogger
  signal?: AbortSignal
}

function isUsable(result: PlatformResult): boolean {
  return (
    Number.isFinite(result.floor) &&
    Number.isFinite(result.median) &&
    result.floor > 0 &&
    result.floor <= result.median &&
    Number.isInteger(result.sampleCount) &&
    result.sampleCount >= 0
  )
}

export class PlatformScraper {
  readonly adapter: PlatformAdapter
  private readonly strategies: Map<StrategyStage, RetrievalStrategy>

  constructor(adapter: PlatformAdapter, strategies: readonly RetrievalStrategy[]) {
    this.adapter = adapter
    this.strategies = new Map(strategies.map((strategy) => [strategy.stage, strategy]))
  }

  get platform() {
    return this.adapter.id
  }

  async run(ctx: PlatformRunContext): Promise<PlatformScrapeOutcome> {
    const log = ctx.logger.child({ platform: this.adapter.id })
    const strategyCtx: StrategyContext = {
      platform: this.adapter.id,
      date: ctx.date,
      bounds: effectiveBounds(ctx.bounds, this.adapter.bounds),
      logger: log,
      signal: ctx.signal,
    }

    const attempts: StrategyAttempt[] = []

    for (const stage of STRATEGY_STAGES) {
      const strategy = this.strategies.get(stage)
      if (!strategy) continue

      if (ctx.signal?.aborted && stage !== 'relay') {
        attempts.push({ stage, outcome: 'transport_error', detail: 'cycle deadline reached', durationMs: 0 })
        continue
      }

      const startedAt = Date.now()
      const outcome = await this.attemptSafely(strategy, strategyCtx)
      const attempt = this.describeAttempt(stage, outcome, Date.now() - startedAt)
      attempts.push(attempt)
      recordStrategyAttempt(log, this.adapter.id, attempt)

      if (outcome.kind === 'found') {
        if (isUsable(outcome.result)) {
          recordPlatformResult(log, this.adapter, outcome.result, attempts)
          return { platform: this.adapter.id, result: outcome.result, attempts }
        }
        attempt.outcome = 'not_found'
        attempt.detail = 'result failed consistency check'
      }
    }

    recordPlatformResult(log, this.adapter, null, attempts)
    return { platform: this.adapter.id, result: null, attempts }
  }

  /**
   * A throwing strategy is a transport failure for its stage, not for the chain.
   */
  private async attemptSafely(strategy: RetrievalStrategy, ctx: StrategyContext): Promise<StrategyOutcome> {
    try {
      return await strategy.attempt(ctx)
    } catch (error) {
      ctx.logger.warn('Strategy threw', { stage: strategy.stage }, error)
      return {
        kind: 'transport_error',
        reason: 'unexpected',
        detail: error instanceof Error ? error.message : String(error),
      }
    }
  }

  private describeAttempt(stage: StrategyStage, outcome: StrategyOutcome, durationMs: number): StrategyAttempt {
    switch (outcome.kind) {
      case 'found':
        return { stage, outcome: 'found', sampleCount: outcome.result.sampleCount, durationMs }
      case 'not_found':
        return { stage, outcome: 'not_found', detail: outcome.detail, sampleCount: outcome.samplesSeen, durationMs }
      case 'transport_error':
        return {
          stage,
          outcome: 'transport_error',
          detail: outcome.statusCode !== undefined ? `${outcome.reason} (${outcome.statusCode}): ${outcome.detail}` : `${outcome.reason}: ${outcome.detail}`,
          durationMs,
        }
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Construction
// ═══════════════════════════════════════════════════════════════════════════════

export interface PlatformScraperDeps {
  fetcher: Fetcher
  relay: RelayLookup
  /** Global bounds, used to re-check relay entries */
  bounds: PriceBounds
  fetchTimeoutMs?: number
}

/**
 * One scraper per registered platform, in registration order. A platform the
 * event file does not mention still gets its relay stage.
 */
export function buildPlatformScrapers(
  registry: PlatformRegistry,
  event: EventDefinition,
  deps: PlatformScraperDeps
): PlatformScraper[] {
  const fetchDeps = { fetcher: deps.fetcher, timeoutMs: deps.fetchTimeoutMs }

  return registry.list().map((adapter) => {
    const targets = event.platforms[adapter.id]
    return new PlatformScraper(adapter, [
      createApiStrategy(adapter, targets, fetchDeps),
      createPageStrategy(adapter, targets, fetchDeps),
      createRelayStrategy(deps.relay, deps.bounds),
    ])
  })
}
