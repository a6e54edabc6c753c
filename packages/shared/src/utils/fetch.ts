// ABOUTME: fetch with a deadline. Each external call gets its own timer, so one slow
// ABOUTME: artist lookup costs at most its own timeout and never stalls the others.

/** Request deadlines in milliseconds */
export const REQUEST_TIMEOUTS = {
  /** Artist search and top tracks: the album cannot credit the artist without them */
  lookup: 10_000,
  /** Per-album genre requests, skipped when they fail */
  enrichment: 5_000,
} as const;

export type TimeoutPreset = keyof typeof REQUEST_TIMEOUTS;

export interface TimedRequestInit extends RequestInit {
  timeout?: number | TimeoutPreset;
}

export class TimeoutError extends Error {
  constructor(
    public url: string,
    public timeoutMs: number
  ) {
    super(`Request to ${url} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Fetch that aborts after `timeout` (default: the lookup deadline) and
 * reports the abort as a TimeoutError. Other network failures propagate as-is.
 */
export async function fetchWithTimeout(url: string | URL, init: TimedRequestInit = {}): Promise<Response> {
  const { timeout = 'lookup', ...requestInit } = init;
  const timeoutMs = typeof timeout === 'number' ? timeout : REQUEST_TIMEOUTS[timeout];
  const target = url.toString();

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(target, { ...requestInit, signal: controller.signal });
  } catch (error) {
    if (controller.signal.aborted) {
      throw new TimeoutError(target, timeoutMs);
    }
    throw error;
  } finally {
    clearTimeout(timer);
  }
}
