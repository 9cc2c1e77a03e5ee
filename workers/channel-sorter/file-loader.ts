/**
 * Input File Loader
 *
 * Reads the source list, category template and name mapping from disk.
 * Missing source lists and mappings degrade to defaults; a missing
 * template is reported as an empty template so the run can abort.
 */

import { readFile } from 'node:fs/promises';
import { createLogger } from '../../src/lib/logger';
import {
  ConfigMissingError,
  defaultSources,
  parseCategoryTemplate,
  parseChannelMapping,
  parseSourceList,
  toError,
  type CategoryTemplate,
  type NameMapping,
} from '../../src/lib/iptv';

const logger = createLogger('FileLoader');

/**
 * Read a UTF-8 text file
 *
 * @throws ConfigMissingError when the file is absent or unreadable
 */
export async function readTextFile(path: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigMissingError(path, toError(error));
  }
}

type ReadTextFile = (path: string) => Promise<string>;

/**
 * Load playlist source URLs, falling back to the default source
 */
export async function loadSourceList(
  path: string,
  read: ReadTextFile = readTextFile
): Promise<string[]> {
  try {
    const sources = parseSourceList(await read(path));
    logger.info(`Loaded ${sources.length} source(s)`);
    return sources;
  } catch (error) {
    logger.warn(`Source list unavailable (${toError(error).message}), using default source`);
    return defaultSources();
  }
}

/**
 * Load the channel name mapping; a missing file means no mapping
 */
export async function loadChannelMapping(
  path: string,
  read: ReadTextFile = readTextFile
): Promise<NameMapping> {
  try {
    const mapping = parseChannelMapping(await read(path));
    logger.debug(`Loaded ${mapping.size} channel name mapping(s)`);
    return mapping;
  } catch (error) {
    logger.debug(`No channel mapping loaded: ${toError(error).message}`);
    return new Map();
  }
}

/**
 * Load the category template; a missing file yields an empty template
 */
export async function loadCategoryTemplate(
  path: string,
  read: ReadTextFile = readTextFile
): Promise<CategoryTemplate> {
  try {
    return parseCategoryTemplate(await read(path));
  } catch (error) {
    logger.error('Template file could not be loaded', error, { path });
    return [];
  }
}
