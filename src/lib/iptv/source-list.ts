/**
 * Source List
 *
 * Parses the list of playlist URLs to aggregate, one per line.
 */

import { createLogger } from '../logger';

const logger = createLogger('SourceList');

/**
 * Source used when the list is missing or has no usable entries
 */
export const DEFAULT_SOURCE_URL = 'https://live.fanmingming.com/tv/m3u/ipv6.m3u';

/**
 * Parses source list content into URLs, falling back to the default source.
 * Blank lines, "#" comments and lines that are not http(s) URLs are ignored.
 */
export function parseSourceList(content: string): string[] {
  const urls: string[] = [];

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith('#')) continue;

    if (line.startsWith('http')) {
      urls.push(line);
      logger.debug(`Loaded source: ${line}`);
    }
  }

  if (urls.length === 0) {
    logger.warn('Source list is empty, using default source');
    return defaultSources();
  }

  return urls;
}

/**
 * The single-entry fallback source list
 */
export function defaultSources(): string[] {
  return [DEFAULT_SOURCE_URL];
}
