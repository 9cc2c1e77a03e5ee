/**
 * Channel Sorter Worker Configuration
 *
 * Configuration constants and environment resolution for the worker that
 * merges IPTV playlists and sorts them into a template-driven channel list.
 */

import { join } from 'node:path';
import { createLogger } from '../../src/lib/logger';

const logger = createLogger('ChannelSorterConfig');

/**
 * Default directory holding the input lists and the generated output
 */
export const DEFAULT_DATA_DIR = 'TV';

/**
 * File names inside the data directory
 */
export const FILE_NAMES = {
  /** Playlist source URLs, one per line */
  sources: 'sources.txt',

  /** Category template ("{category},#genre#" + channel names) */
  template: 'moban.txt',

  /** Channel name aliases ("{oldName},{newName}") */
  mapping: 'channel_mapping.txt',

  /** Generated channel list */
  output: 'live.txt',
} as const;

/**
 * HTTP fetch configuration
 */
export const FETCH_CONFIG = {
  /** User agent for M3U requests */
  userAgent: 'Mozilla/5.0 (compatible; Channel-Sorter/1.0)',

  /** Request timeout in milliseconds */
  timeout: 10_000,

  /** Max attempts per source */
  maxRetries: 3,

  /** Base delay for exponential backoff (ms) */
  retryBaseDelay: 1000,
} as const;

/**
 * Resolved runtime configuration
 */
export interface ChannelSorterConfig {
  dataDir: string;
  sourcesFile: string;
  templateFile: string;
  mappingFile: string;
  outputFile: string;
  fetch: {
    timeout: number;
    maxRetries: number;
    retryBaseDelay: number;
  };
}

/**
 * Parse a positive integer env value, falling back to the default
 */
function readPositiveInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    logger.warn(`Ignoring invalid ${name}="${raw}", using ${fallback}`);
    return fallback;
  }

  return value;
}

/**
 * Resolve worker configuration from environment variables
 *
 * Environment variables:
 *   - CHANNEL_SORTER_DATA_DIR: directory for input/output files (default: TV)
 *   - CHANNEL_SORTER_SOURCES_FILE / _TEMPLATE_FILE / _MAPPING_FILE / _OUTPUT_FILE
 *   - FETCH_TIMEOUT_MS, FETCH_MAX_RETRIES
 */
export function resolveChannelSorterConfig(
  env: NodeJS.ProcessEnv = process.env
): ChannelSorterConfig {
  const dataDir = env.CHANNEL_SORTER_DATA_DIR?.trim() || DEFAULT_DATA_DIR;

  return {
    dataDir,
    sourcesFile: env.CHANNEL_SORTER_SOURCES_FILE || join(dataDir, FILE_NAMES.sources),
    templateFile: env.CHANNEL_SORTER_TEMPLATE_FILE || join(dataDir, FILE_NAMES.template),
    mappingFile: env.CHANNEL_SORTER_MAPPING_FILE || join(dataDir, FILE_NAMES.mapping),
    outputFile: env.CHANNEL_SORTER_OUTPUT_FILE || join(dataDir, FILE_NAMES.output),
    fetch: {
      timeout: readPositiveInt(env, 'FETCH_TIMEOUT_MS', FETCH_CONFIG.timeout),
      maxRetries: readPositiveInt(env, 'FETCH_MAX_RETRIES', FETCH_CONFIG.maxRetries),
      retryBaseDelay: FETCH_CONFIG.retryBaseDelay,
    },
  };
}
