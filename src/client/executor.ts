/**
 * Single-request executor with response classification, bounded exponential
 * backoff, and the mandatory rate-limit cooldown.
 *
 * Retries only retriable outcomes (5xx, configured extra statuses, network
 * failures, timeouts, rate-limit signal). 4xx and `ok: false` bodies fail on
 * the first attempt.
 */

import { setTimeout as delay } from 'node:timers/promises'
import { Value } from '@sinclair/typebox/value'
import { ApiEnvelopeSchema, type ApiEnvelope } from '../types/api.js'
import { createChildLogger } from '../logger.js'
import { ApiError } from './errors.js'

const log = createChildLogger('executor')

/** Body `error` value the API returns with a 200 when throttling */
export const RATE_LIMIT_ERROR = 'rate_limit_exceeded'

export type HttpMethod = 'GET' | 'POST'

export type Classification =
  | { kind: 'success'; body: unknown }
  | { kind: 'rate_limited' }
  | { kind: 'retriable' }
  | { kind: 'fatal' }

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>

export interface ExecutorOptions {
  /** Statuses retried in addition to 5xx */
  extraRetryStatuses?: readonly number[]
  /** Total attempts including the first (default 5) */
  maxAttempts?: number
  /** Backoff factor in seconds; wait n is factor * 2^(n-1) seconds, full jitter (default 2) */
  backoffFactor?: number
  rateLimitCooldownMs?: number
  requestTimeoutMs?: number
  userAgent?: string
  /** Aborts the retry loop between attempts */
  signal?: AbortSignal
  sleep?: Sleep
  random?: () => number
}

interface AttemptResult {
  classification: Classification
  status: number
  text: string
  url: string
}

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal })
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

/**
 * Classify a raw HTTP response. `body` is the parsed JSON body, or undefined
 * when the body was not JSON.
 */
export function classifyResponse(
  status: number,
  body: unknown,
  extraRetryStatuses: readonly number[] = [429],
): Classification {
  // A body whose envelope fields have the wrong types is judged on status alone
  const envelope: ApiEnvelope = Value.Check(ApiEnvelopeSchema, body) ? body : {}

  if (status === 200 && envelope.error === RATE_LIMIT_ERROR) {
    return { kind: 'rate_limited' }
  }
  if (extraRetryStatuses.includes(status) || (status >= 500 && status < 600)) {
    return { kind: 'retriable' }
  }
  if ((status >= 400 && status < 500) || (status === 200 && envelope.ok === false)) {
    return { kind: 'fatal' }
  }
  if (body === undefined) {
    return { kind: 'fatal' }
  }
  return { kind: 'success', body }
}

export class RequestExecutor {
  private readonly extraRetryStatuses: readonly number[]
  private readonly maxAttempts: number
  private readonly backoffFactor: number
  private readonly rateLimitCooldownMs: number
  private readonly requestTimeoutMs: number
  private readonly userAgent?: string
  private readonly signal?: AbortSignal
  private readonly sleep: Sleep
  private readonly random: () => number

  constructor(options: ExecutorOptions = {}) {
    this.extraRetryStatuses = options.extraRetryStatuses ?? [429]
    this.maxAttempts = options.maxAttempts ?? 5
    this.backoffFactor = options.backoffFactor ?? 2
    this.rateLimitCooldownMs = options.rateLimitCooldownMs ?? 120_000
    this.requestTimeoutMs = options.requestTimeoutMs ?? 300_000
    this.userAgent = options.userAgent
    this.signal = options.signal
    this.sleep = options.sleep ?? defaultSleep
    this.random = options.random ?? Math.random
  }

  /** Wait before retry `attempt` (1-based): factor * 2^(attempt-1) seconds, full jitter. */
  backoffDelayMs(attempt: number): number {
    return this.random() * this.backoffFactor * Math.pow(2, attempt - 1) * 1000
  }

  /**
   * Issue a request and return the parsed JSON body.
   *
   * @throws ApiError FATAL on a non-retriable response,
   *         RETRIES_EXHAUSTED once maxAttempts retriable outcomes are seen
   */
  async execute(method: HttpMethod, url: string, payload?: unknown): Promise<unknown> {
    for (let attempt = 1; ; attempt++) {
      this.signal?.throwIfAborted()

      const result = await this.attempt(method, url, payload)
      const { classification } = result

      if (classification.kind === 'success') {
        return classification.body
      }
      if (classification.kind === 'fatal') {
        throw new ApiError('FATAL', result.status, result.text, result.url)
      }

      if (classification.kind === 'rate_limited') {
        log.info('Rate limit exceeded, cooling down', {
          url,
          cooldownMs: this.rateLimitCooldownMs,
        })
        await this.sleep(this.rateLimitCooldownMs, this.signal)
      }

      if (attempt >= this.maxAttempts) {
        log.error('Giving up after retries', { url, attempts: attempt, status: result.status })
        throw new ApiError('RETRIES_EXHAUSTED', result.status, result.text, result.url)
      }

      const waitMs = this.backoffDelayMs(attempt)
      log.warn('Retriable response, backing off', {
        url,
        status: result.status,
        attempt,
        waitMs: Math.round(waitMs),
      })
      await this.sleep(waitMs, this.signal)
    }
  }

  private async attempt(method: HttpMethod, url: string, payload: unknown): Promise<AttemptResult> {
    const headers: Record<string, string> = { 'Content-Type': 'application/json' }
    if (this.userAgent) headers['User-Agent'] = this.userAgent

    try {
      const res = await fetch(url, {
        method,
        headers,
        body: payload === undefined ? undefined : JSON.stringify(payload),
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      })
      const text = await res.text()
      return {
        classification: classifyResponse(res.status, parseJson(text), this.extraRetryStatuses),
        status: res.status,
        text,
        url: res.url || url,
      }
    } catch (err) {
      // Network failures and timeouts
      const message = err instanceof Error ? err.message : String(err)
      return { classification: { kind: 'retriable' }, status: 0, text: message, url }
    }
  }
}
