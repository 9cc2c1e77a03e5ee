/**
 * Output Writer
 *
 * Persists the generated channel list, creating its directory if needed.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { WriteError, toError } from '../../src/lib/iptv';

/**
 * Write the document to disk as UTF-8
 *
 * @throws WriteError when the directory or file cannot be written
 */
export async function writeOutput(path: string, content: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf-8');
  } catch (error) {
    throw new WriteError(path, toError(error));
  }
}
