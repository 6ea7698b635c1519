/**
 * HTTP Fetcher
 *
 * Native fetch with per-request timeout, response size limit, retries with
 * exponential backoff for retryable status codes, blocked-page detection,
 * and an optional external AbortSignal (the cycle deadline).
 *
 * Never throws: every failure comes back as a FetchResult status.
 */

import type { Fetcher, FetchOptions, FetchResult, RetryPolicy } from '../types.js'
import { DEFAULT_FETCH_HEADERS, DEFAULT_FETCH_OPTIONS, DEFAULT_RETRY_POLICY } from '../types.js'

export interface HttpFetcherOptions {
  /** Retry policy for transient failures */
  retryPolicy?: RetryPolicy

  /** Default per-request timeout */
  timeoutMs?: number

  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>
}

const BLOCK_INDICATORS = [
  'captcha',
  'recaptcha',
  'hcaptcha',
  'challenge-form',
  'challenge-running',
  'cf-browser-verification',
  'please verify you are a human',
  'px-captcha',
  'access denied',
  'pardon our interruption',
]

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')
}

export class HttpFetcher implements Fetcher {
  private readonly retryPolicy: RetryPolicy
  private readonly timeoutMs: number
  private readonly sleep: (ms: number) => Promise<void>

  constructor(options: HttpFetcherOptions = {}) {
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_OPTIONS.timeoutMs
    this.sleep = options.sleep ?? defaultSleep
  }

  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const startTime = Date.now()
    const timeoutMs = options.timeoutMs ?? this.timeoutMs
    const maxSizeBytes = options.maxSizeBytes ?? DEFAULT_FETCH_OPTIONS.maxSizeBytes

    const headers = {
      ...DEFAULT_FETCH_HEADERS,
      ...(options.headers ?? {}),
    }

    let lastError: Error | null = null

    for (let attempt = 1; attempt <= this.retryPolicy.maxAttempts; attempt++) {
      if (options.signal?.aborted) {
        return { status: 'aborted', durationMs: Date.now() - startTime, error: 'Cancelled before request' }
      }

      try {
        const result = await this.fetchOnce(url, headers, timeoutMs, maxSizeBytes, startTime, options.signal)

        if (
          result.status === 'error' &&
          result.statusCode !== undefined &&
          this.retryPolicy.retryableStatusCodes.includes(result.statusCode) &&
          attempt < this.retryPolicy.maxAttempts
        ) {
          await this.sleep(this.backoffDelay(attempt))
          continue
        }

        return result
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error))

        if (attempt < this.retryPolicy.maxAttempts) {
          await this.sleep(this.backoffDelay(attempt))
          continue
        }
      }
    }

    return {
      status: 'error',
      durationMs: Date.now() - startTime,
      error: lastError?.message ?? 'Unknown error after retries',
    }
  }

  private backoffDelay(attempt: number): number {
    return Math.min(
      this.retryPolicy.initialDelayMs * Math.pow(this.retryPolicy.backoffMultiplier, attempt - 1),
      this.retryPolicy.maxDelayMs
    )
  }

  /**
   * Single fetch attempt (no retries). Network errors propagate to the retry loop.
   */
  private async fetchOnce(
    url: string,
    headers: Record<string, string>,
    timeoutMs: number,
    maxSizeBytes: number,
    startTime: number,
    external?: AbortSignal
  ): Promise<FetchResult> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)
    const onExternalAbort = () => controller.abort()
    external?.addEventListener('abort', onExternalAbort, { once: true })

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      if (response.status === 403 || response.status === 429 || response.status === 503) {
        const text = await response.text()
        if (response.status === 429 || this.looksLikeBlockedPage(text)) {
          return {
            status: 'blocked',
            statusCode: response.status,
            durationMs: Date.now() - startTime,
            error: 'Request blocked (captcha, rate limit or access denied)',
          }
        }
      }

      if (!response.ok) {
        return {
          status: 'error',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `HTTP ${response.status}: ${response.statusText}`,
        }
      }

      const contentLength = response.headers.get('content-length')
      if (contentLength && parseInt(contentLength, 10) > maxSizeBytes) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `Response too large: ${contentLength} bytes`,
        }
      }

      const body = await this.readBodyWithLimit(response, maxSizeBytes)
      if (body === null) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: 'Response exceeded size limit',
        }
      }

      return {
        status: 'ok',
        statusCode: response.status,
        body,
        contentType: response.headers.get('content-type') ?? undefined,
        durationMs: Date.now() - startTime,
      }
    } catch (error) {
      if (isAbortError(error)) {
        if (external?.aborted) {
          return {
            status: 'aborted',
            durationMs: Date.now() - startTime,
            error: 'Request cancelled by cycle deadline',
          }
        }
        return {
          status: 'timeout',
          durationMs: Date.now() - startTime,
          error: `Request timed out after ${timeoutMs}ms`,
        }
      }

      throw error
    } finally {
      clearTimeout(timeoutId)
      external?.removeEventListener('abort', onExternalAbort)
    }
  }

  /**
   * Read response body with size limit.
   * Returns null if size exceeds limit.
   */
  private async readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
    const reader = response.body?.getReader()
    if (!reader) {
      return ''
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > maxBytes) {
          await reader.cancel()
          return null
        }

        chunks.push(value)
      }

      return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
    } finally {
      reader.releaseLock()
    }
  }

  private looksLikeBlockedPage(html: string): boolean {
    const lowerHtml = html.toLowerCase()
    return BLOCK_INDICATORS.some((indicator) => lowerHtml.includes(indicator))
  }
}
