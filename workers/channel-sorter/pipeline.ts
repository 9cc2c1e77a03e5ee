/**
 * Channel Sorter Pipeline
 *
 * One run: load the template, fetch and parse every source in list order,
 * classify the aggregated channels and write the rendered document.
 */

import { createLogger } from '../../src/lib/logger';
import {
  WriteError,
  aggregate,
  classify,
  countExpectedNames,
  parsePlaylist,
  renderDocument,
  toError,
  type ChannelRecord,
} from '../../src/lib/iptv';
import type { ChannelSorterConfig } from './config';
import { loadCategoryTemplate, loadChannelMapping, loadSourceList } from './file-loader';
import type { ChannelSorterDeps, RunResult } from './types';

const logger = createLogger('ChannelSorter');

/**
 * Run the channel sorter once
 *
 * Returns an outcome instead of throwing: an empty template or an empty
 * aggregate stop the run before anything is written.
 */
export async function runChannelSorter(
  config: ChannelSorterConfig,
  deps: ChannelSorterDeps
): Promise<RunResult> {
  const template = await loadCategoryTemplate(config.templateFile, deps.readTextFile);
  if (template.length === 0) {
    logger.error(`Template is empty, check the format of ${config.templateFile}`);
    return { status: 'template-empty', templateFile: config.templateFile };
  }

  logger.info(
    `Loaded template: ${template.length} categories, ${countExpectedNames(template)} channels`
  );

  const mapping = await loadChannelMapping(config.mappingFile, deps.readTextFile);
  const sources = await loadSourceList(config.sourcesFile, deps.readTextFile);

  const perSource: ChannelRecord[][] = [];
  let failedSources = 0;

  // Aggregation order follows the source list
  for (const source of sources) {
    const sourceLogger = logger.child({ source });
    const result = await deps.fetchPlaylist(source, config.fetch);

    if (!result.success || !result.content) {
      sourceLogger.debug(`Skipping source: ${result.error ?? 'empty response'}`);
      failedSources++;
      perSource.push([]);
      continue;
    }

    const records = parsePlaylist(result.content, mapping);
    if (records.length === 0) {
      sourceLogger.warn('No channels found');
      failedSources++;
    } else {
      sourceLogger.info(`Parsed ${records.length} channels (${result.durationMs}ms)`);
    }
    perSource.push(records);
  }

  const records = aggregate(perSource);
  if (records.length === 0) {
    logger.error('No content could be fetched from any source');
    return { status: 'no-content', sources: sources.length };
  }

  const document = classify(template, records);
  const content = renderDocument(document);

  try {
    await deps.writeOutput(config.outputFile, content);
  } catch (error) {
    const writeError = error instanceof WriteError ? error : new WriteError(config.outputFile, toError(error));
    logger.error('Failed to save output', writeError);
    return { status: 'write-failed', error: writeError.message };
  }

  logger.info(
    `Merged ${sources.length} source(s) into ${config.outputFile}: ` +
      `${document.matchedCount} matched channels, ${document.otherCount} uncategorized`
  );

  return {
    status: 'written',
    summary: {
      sources: sources.length,
      failedSources,
      records: records.length,
      matched: document.matchedCount,
      others: document.otherCount,
      outputPath: config.outputFile,
    },
  };
}

/**
 * Process exit code for a run outcome
 */
export function exitCodeFor(result: RunResult): number {
  return result.status === 'write-failed' ? 1 : 0;
}
