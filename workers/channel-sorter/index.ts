#!/usr/bin/env npx tsx

/**
 * Channel Sorter Worker
 *
 * Merges the configured IPTV playlists, normalizes channel names and writes
 * a categorized channel list ordered by the category template.
 *
 * Usage:
 *   npm run channel-sorter
 *
 * Environment variables:
 *   - CHANNEL_SORTER_DATA_DIR: directory holding sources.txt, moban.txt,
 *     channel_mapping.txt and the generated live.txt (default: TV)
 *   - LOG_LEVEL: debug | info | warn | error
 */

import { config } from 'dotenv';

// Load environment variables
config();

import { createLogger } from '../../src/lib/logger';
import { resolveChannelSorterConfig } from './config';
import { readTextFile } from './file-loader';
import { writeOutput } from './output-writer';
import { fetchPlaylist } from './playlist-fetcher';
import { exitCodeFor, runChannelSorter } from './pipeline';

const logger = createLogger('ChannelSorterWorker');

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const sorterConfig = resolveChannelSorterConfig();
  logger.info(`Starting channel sorter (data dir: ${sorterConfig.dataDir})`);

  const result = await runChannelSorter(sorterConfig, {
    readTextFile,
    fetchPlaylist,
    writeOutput,
  });

  process.exitCode = exitCodeFor(result);
}

main().catch((error) => {
  logger.error('Fatal error', error);
  process.exitCode = 1;
});
