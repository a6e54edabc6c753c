// ABOUTME: Deezer-specific fetch with rate limiting and retry logic.
// ABOUTME: Retries 429/502/503 and quota error payloads, then validates the JSON body.

import type { z } from 'zod';
import {
  ExternalApiError,
  fetchWithTimeout,
  type TimedRequestInit,
} from '@albumsmith/shared';
import { DEEZER_CONFIG, RATE_LIMITS } from '@albumsmith/config';
import type { DeezerRateLimiter } from './rate-limit';
import { deezerErrorSchema } from './types';

const RETRYABLE_STATUSES = new Set([429, 502, 503]);

function backoffMs(attempt: number): number {
  return Math.min(RATE_LIMITS.deezer.retryDelayMs * Math.pow(2, attempt), 10000); // 1s, 2s, 4s, max 10s
}

/**
 * Make a rate-limited request to the Deezer API with automatic retry on 429, 502, 503.
 * Returns the last response once retries are exhausted.
 */
export async function deezerFetch(
  url: string,
  options: TimedRequestInit,
  rateLimiter: DeezerRateLimiter
): Promise<Response> {
  const maxRetries = RATE_LIMITS.deezer.maxRetries;
  const headers = { 'User-Agent': DEEZER_CONFIG.userAgent, Accept: 'application/json' };

  for (let attempt = 0; ; attempt++) {
    await rateLimiter.acquire();

    const response = await fetchWithTimeout(url, { ...options, headers });

    if (!RETRYABLE_STATUSES.has(response.status)) {
      return response;
    }

    if (attempt === maxRetries) {
      console.error(`[Deezer] Max retries (${maxRetries}) exceeded for ${url} - ${response.status}`);
      return response;
    }

    if (response.status === 429) {
      const retryAfter = parseInt(response.headers.get('Retry-After') || '5', 10);
      rateLimiter.recordRateLimitResponse(retryAfter);
      continue;
    }

    const waitMs = backoffMs(attempt);
    console.log(`[Deezer] ${response.status} retry ${attempt + 1}/${maxRetries} after ${waitMs}ms for ${url}`);
    await rateLimiter.wait(waitMs);
  }
}

/**
 * GET a Deezer endpoint and validate the body against a schema.
 * Throws ExternalApiError for non-2xx responses, error payloads and unexpected shapes.
 */
export async function deezerGet<S extends z.ZodTypeAny>(
  url: string,
  schema: S,
  options: TimedRequestInit,
  rateLimiter: DeezerRateLimiter
): Promise<z.output<S>> {
  const maxRetries = RATE_LIMITS.deezer.maxRetries;

  for (let attempt = 0; ; attempt++) {
    const response = await deezerFetch(url, options, rateLimiter);

    if (!response.ok) {
      throw new ExternalApiError('Deezer', `${response.status} ${response.statusText}`.trim());
    }

    const body: unknown = await response.json();

    const failure = deezerErrorSchema.safeParse(body);
    if (failure.success) {
      const { code, type = 'Exception', message = 'unknown error' } = failure.data.error;
      if (code === RATE_LIMITS.deezer.quotaErrorCode && attempt < maxRetries) {
        rateLimiter.recordRateLimitResponse(5);
        continue;
      }
      throw new ExternalApiError('Deezer', `${type}: ${message}`);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ExternalApiError('Deezer', `unexpected response from ${url}`);
    }
    return parsed.data;
  }
}
