/**
 * Playlist Fetcher for Channel Sorter Worker
 *
 * Downloads M3U playlists from source URLs. Failures never throw; they are
 * reported as unsuccessful results so one bad source cannot stop the run.
 */

import { Agent, fetch as undiciFetch } from 'undici';
import { createLogger } from '../../src/lib/logger';
import { FetchError, toError } from '../../src/lib/iptv';
import { FETCH_CONFIG } from './config';
import type { FetchOptions, PlaylistFetchResult } from './types';

const logger = createLogger('PlaylistFetcher');

/**
 * HTTP agent that skips SSL validation (many IPTV providers have bad certs)
 */
const insecureAgent = new Agent({
  connect: {
    rejectUnauthorized: false,
    // Allow legacy TLS versions that some IPTV providers use
    minVersion: 'TLSv1' as const,
    // Don't fail on self-signed or expired certs
    checkServerIdentity: () => undefined,
  },
});

const DEFAULT_FETCH_OPTIONS: FetchOptions = {
  timeout: FETCH_CONFIG.timeout,
  maxRetries: FETCH_CONFIG.maxRetries,
  retryBaseDelay: FETCH_CONFIG.retryBaseDelay,
};

/**
 * Sleep for a given number of milliseconds
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Extract the playlist URL from a source line
 */
export function extractSourceUrl(source: string): string | null {
  const match = source.match(/https?:\/\/\S+/);
  return match ? match[0] : null;
}

/**
 * Fetch a body as text with retry logic and exponential backoff.
 * The timeout covers both the response headers and the body read.
 */
async function fetchTextWithRetry(
  url: string,
  options: FetchOptions
): Promise<string> {
  let lastError: Error | null = null;

  for (let attempt = 0; attempt < options.maxRetries; attempt++) {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeout);

    try {
      const response = await undiciFetch(url, {
        signal: controller.signal,
        headers: {
          'User-Agent': FETCH_CONFIG.userAgent,
          Accept: '*/*',
        },
        dispatcher: insecureAgent,
      });

      if (!response.ok) {
        throw new FetchError(url, `HTTP ${response.status}: ${response.statusText}`);
      }

      return await response.text();
    } catch (error) {
      if (error instanceof FetchError) {
        lastError = error;
      } else {
        const cause = toError(error);
        lastError = new FetchError(url, cause.message, cause);
      }

      if (attempt < options.maxRetries - 1) {
        const delay = options.retryBaseDelay * Math.pow(2, attempt);
        logger.debug(
          `Fetch attempt ${attempt + 1} failed, retrying in ${delay}ms: ${lastError.message}`
        );
        await sleep(delay);
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }

  throw lastError ?? new FetchError(url, 'Fetch failed after retries');
}

/**
 * Fetch a playlist source and return its raw text
 */
export async function fetchPlaylist(
  source: string,
  options: FetchOptions = DEFAULT_FETCH_OPTIONS
): Promise<PlaylistFetchResult> {
  const startTime = Date.now();

  const url = extractSourceUrl(source);
  if (!url) {
    logger.warn(`Invalid source URL: ${source}`);
    return {
      success: false,
      error: 'Invalid source URL',
      durationMs: Date.now() - startTime,
    };
  }

  try {
    logger.info(`Fetching playlist from: ${url}`);

    const content = await fetchTextWithRetry(url, options);

    return {
      success: true,
      content,
      durationMs: Date.now() - startTime,
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    logger.warn(`Failed to fetch playlist ${url}: ${errorMessage}`);

    return {
      success: false,
      error: errorMessage,
      durationMs: Date.now() - startTime,
    };
  }
}
