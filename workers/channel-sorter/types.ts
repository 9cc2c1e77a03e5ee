/**
 * Channel Sorter Worker Types
 */

import type { ChannelSorterConfig } from './config';

/**
 * Result from fetching a playlist source
 */
export interface PlaylistFetchResult {
  /** Whether fetch was successful */
  success: boolean;
  /** Raw playlist text (if successful) */
  content?: string;
  /** Error message (if failed) */
  error?: string;
  /** Fetch duration in ms */
  durationMs: number;
}

/**
 * Options for a single source fetch
 */
export type FetchOptions = ChannelSorterConfig['fetch'];

/**
 * Collaborators the pipeline depends on
 */
export interface ChannelSorterDeps {
  /** Read a UTF-8 file; throws ConfigMissingError when it does not exist */
  readTextFile: (path: string) => Promise<string>;
  /** Fetch one playlist source */
  fetchPlaylist: (source: string, options: FetchOptions) => Promise<PlaylistFetchResult>;
  /** Persist the rendered document; throws WriteError on failure */
  writeOutput: (path: string, content: string) => Promise<void>;
}

/**
 * Counters reported after a successful run
 */
export interface RunSummary {
  /** Sources attempted */
  sources: number;
  /** Sources that failed to fetch or produced no channels */
  failedSources: number;
  /** Channel records aggregated */
  records: number;
  /** Distinct lines claimed by a template category */
  matched: number;
  /** Lines routed to the catch-all category */
  others: number;
  /** Where the document was written */
  outputPath: string;
}

/**
 * Outcome of a pipeline run
 */
export type RunResult =
  | { status: 'written'; summary: RunSummary }
  | { status: 'template-empty'; templateFile: string }
  | { status: 'no-content'; sources: number }
  | { status: 'write-failed'; error: string };
