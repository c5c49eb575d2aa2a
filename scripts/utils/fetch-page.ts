import fetch from 'node-fetch';

import { getFetchConfig } from '../config';
import { createLogger } from '../logger';

export interface FetchPageOptions {
  /** Backoff before attempt n+1 is `baseDelayMs * (n + 1)`. */
  baseDelayMs?: number;
  timeoutMs?: number;
  userAgent?: string;
}

const DEFAULT_BASE_DELAY_MS = 2000;

const logger = createLogger('fetch');

export function sleep(durationMs: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, durationMs);
  });
}

/**
 * Fetches `url`, retrying up to `retries` extra times. Resolves to `null` once
 * every attempt has failed so callers can skip the unit of work.
 */
export async function fetchPage(
  url: string,
  retries = 0,
  options: FetchPageOptions = {},
): Promise<Buffer | null> {
  if (!Number.isInteger(retries) || retries < 0) {
    throw new RangeError('Number of retries must be a non-negative integer.');
  }

  const config = getFetchConfig();
  const timeoutMs = options.timeoutMs ?? config.timeoutMs;
  const userAgent = options.userAgent ?? config.userAgent;
  const baseDelayMs = Math.max(options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS, 0);

  for (let attempt = 0; attempt <= retries; attempt += 1) {
    try {
      const response = await fetch(url, {
        headers: { 'User-Agent': userAgent },
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (!response.ok) {
        throw new Error(`HTTP ${response.status} ${response.statusText}`);
      }
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      logger.warn({
        event: 'fetch.retry',
        message: `Attempt ${attempt + 1} failed for ${url}`,
        data: { attempt: attempt + 1, attempts: retries + 1 },
        error,
      });
      if (attempt < retries && baseDelayMs > 0) {
        await sleep(baseDelayMs * (attempt + 1));
      }
    }
  }

  logger.error({
    event: 'fetch.failed',
    message: `Failed to fetch ${url} after ${retries + 1} attempt(s)`,
  });
  return null;
}
