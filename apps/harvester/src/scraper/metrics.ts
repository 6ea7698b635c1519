/**
 * Scraper Metrics
 *
 * No metrics backend; this module emits structured log events only.
 */

import type { ILogger } from '@ticketdesk/logger'
import type { PlatformAdapter, PlatformId, PlatformResult, StrategyAttempt } from './types.js'

export function recordStrategyAttempt(log: ILogger, platform: PlatformId, attempt: StrategyAttempt): void {
  const payload = {
    event_name: 'PLATFORM_STRATEGY_ATTEMPT',
    platform,
    stage: attempt.stage,
    outcome: attempt.outcome,
    detail: attempt.detail,
    sampleCount: attempt.sampleCount,
    durationMs: attempt.durationMs,
  }

  if (attempt.outcome === 'transport_error') {
    log.warn('PLATFORM_STRATEGY_ATTEMPT', payload)
  } else {
    log.info('PLATFORM_STRATEGY_ATTEMPT', payload)
  }
}

export function recordPlatformResult(
  log: ILogger,
  adapter: PlatformAdapter,
  result: PlatformResult | null,
  attempts: StrategyAttempt[]
): void {
  const source = {
    platform: adapter.id,
    displayName: adapter.displayName,
    adapterVersion: adapter.version,
  }

  if (!result) {
    log.warn('PLATFORM_NO_DATA', {
      event_name: 'PLATFORM_NO_DATA',
      ...source,
      stagesTried: attempts.map((a) => `${a.stage}:${a.outcome}`),
    })
    return
  }

  log.info('PLATFORM_RESULT', {
    event_name: 'PLATFORM_RESULT',
    ...source,
    provenance: result.provenance,
    floor: result.floor,
    median: result.median,
    sampleCount: result.sampleCount,
  })
}
