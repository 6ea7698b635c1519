/**
 * Scraper Core Types
 *
 * Price samples, platform results, strategy outcomes, fetcher and adapter
 * contracts shared by the acquisition pipeline.
 */

import type { ILogger } from '@ticketdesk/logger'

// ═══════════════════════════════════════════════════════════════════════════════
// Platforms
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Fixed set of marketplaces. Registry order is scrape order.
 */
export const PLATFORM_IDS = ['stubhub', 'seatgeek', 'tickpick', 'vividseats', 'ticketmaster'] as const

export type PlatformId = (typeof PLATFORM_IDS)[number]

export function isPlatformId(value: string): value is PlatformId {
  return PLATFORM_IDS.some((id) => id === value)
}

// ═══════════════════════════════════════════════════════════════════════════════
// Prices and results
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Inclusive validity window for a single listing price.
 * Prices outside belong to other inventory tiers (suites, pit) and are dropped.
 */
export interface PriceBounds {
  min: number
  max: number
}

export interface PriceSummary {
  floor: number
  median: number
  count: number
}

export type Provenance = 'direct' | 'relay'

/**
 * Summarized result for one platform in one cycle. floor <= median always.
 */
export interface PlatformResult {
  readonly floor: number
  readonly median: number
  readonly sampleCount: number
  readonly provenance: Provenance
}

// ═══════════════════════════════════════════════════════════════════════════════
// Strategy chain
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Chain stages, tried in this order.
 */
export const STRATEGY_STAGES = ['primary', 'secondary', 'relay'] as const

export type StrategyStage = (typeof STRATEGY_STAGES)[number]

export type TransportFailureReason =
  | 'timeout'
  | 'http_error'
  | 'blocked'
  | 'too_large'
  | 'network_error'
  | 'parse_error'
  | 'aborted'
  | 'unexpected'

/**
 * Outcome of one retrieval strategy.
 * not_found and transport_error are both expected; both advance the chain.
 */
export type StrategyOutcome =
  | { kind: 'found'; result: PlatformResult }
  | { kind: 'not_found'; detail: string; samplesSeen?: number }
  | { kind: 'transport_error'; reason: TransportFailureReason; detail: string; statusCode?: number }

export interface StrategyAttempt {
  stage: StrategyStage
  outcome: StrategyOutcome['kind']
  detail?: string
  sampleCount?: number
  durationMs: number
}

/**
 * What one PlatformScraper run produced: a result, or null for "no data".
 */
export interface PlatformScrapeOutcome {
  platform: PlatformId
  result: PlatformResult | null
  attempts: StrategyAttempt[]
}

export interface StrategyContext {
  platform: PlatformId
  /** UTC calendar date of the cycle (YYYY-MM-DD) */
  date: string
  bounds: PriceBounds
  logger: ILogger
  /** Aborted when the cycle deadline passes */
  signal?: AbortSignal
}

export interface RetrievalStrategy {
  readonly stage: StrategyStage
  attempt(ctx: StrategyContext): Promise<StrategyOutcome>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetcher
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Fetcher interface - lets tests and alternative transports stand in for HTTP.
 */
export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>
}

export interface FetchOptions {
  /** Request timeout in ms (default: 25000) */
  timeoutMs?: number

  /** Maximum response size in bytes (default: 10MB) */
  maxSizeBytes?: number

  /** Custom headers (merged with defaults) */
  headers?: Record<string, string>

  /** External cancellation (cycle deadline) */
  signal?: AbortSignal
}

/**
 * Browser-like defaults; marketplaces reject obvious bot user agents outright.
 */
export const DEFAULT_FETCH_HEADERS = {
  'User-Agent':
    'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
} as const

export const DEFAULT_FETCH_OPTIONS = {
  timeoutMs: 25000,
  maxSizeBytes: 10 * 1024 * 1024, // 10 MB
} as const

export type FetchResultStatus =
  | 'ok'
  | 'error'
  | 'blocked'
  | 'timeout'
  | 'too_large'
  | 'aborted'

export interface FetchResult {
  status: FetchResultStatus
  statusCode?: number
  body?: string
  contentType?: string
  error?: string
  durationMs: number
}

export interface RetryPolicy {
  maxAttempts: number
  initialDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
  retryableStatusCodes: number[]
}

/**
 * 429 is reported as `blocked` and never retried, so it is not listed.
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 2,
  initialDelayMs: 1000,
  maxDelayMs: 8000,
  backoffMultiplier: 2,
  retryableStatusCodes: [500, 502, 503, 504],
}

// ═══════════════════════════════════════════════════════════════════════════════
// Platform adapters
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Endpoints for one platform, from the event definition file.
 */
export interface PlatformTargets {
  /** Structured listings endpoint (JSON). Absent means the primary stage is skipped. */
  apiUrl?: string
  /** Event pages, tried in order until one fetches successfully */
  pageUrls: string[]
}

/**
 * Static description of one marketplace.
 * Adapters must be explicitly registered; no auto-discovery.
 */
export interface PlatformAdapter {
  /** Unique platform identifier */
  readonly id: PlatformId

  /** Shown in result logs */
  readonly displayName: string

  /** Semver version (increment on extraction logic changes); logged with every result */
  readonly version: string

  /**
   * Narrower bounds for this platform. Intersected with the global bounds;
   * never widens them.
   */
  readonly bounds?: Partial<PriceBounds>

  /** CSS selectors for script tags carrying embedded page state */
  readonly embeddedScriptSelectors: readonly string[]

  /** Extra request headers for the structured endpoint */
  readonly apiHeaders?: Readonly<Record<string, string>>
}

export interface PlatformRegistry {
  register(adapter: PlatformAdapter): void
  get(id: PlatformId): PlatformAdapter | undefined
  list(): PlatformAdapter[]
}
