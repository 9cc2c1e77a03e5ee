/**
 * Channel Name Mapping
 *
 * Parses the alias table used to normalize channel names across sources.
 * Each line has the form "{oldName},{newName}".
 */

import type { NameMapping } from './types';

/**
 * Parses mapping file content into a name lookup.
 * Lines without a comma are skipped; later duplicates win.
 */
export function parseChannelMapping(content: string): NameMapping {
  const mapping = new Map<string, string>();

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    const commaIndex = line.indexOf(',');
    if (!line || commaIndex === -1) {
      continue;
    }

    const oldName = line.substring(0, commaIndex).trim();
    const newName = line.substring(commaIndex + 1).trim();
    mapping.set(oldName, newName);
  }

  return mapping;
}
