/**
 * M3U Parser
 *
 * Parses M3U/M3U8 playlist files into grouped channel records.
 * Supports the extended M3U format with EXTINF tags, group-title and tvg-name.
 *
 * Example entry:
 *   #EXTINF:-1 tvg-name="CCTV1" group-title="央视频道",CCTV-1 综合
 *   http://example.com/cctv1.m3u8
 */

import type { ChannelRecord, NameMapping } from './types';

/**
 * Group assigned to entries seen before any group-title
 */
export const DEFAULT_GROUP = '未分组';

/**
 * Prefix of the per-entry metadata line
 */
const EXTINF_PREFIX = '#EXTINF:';

/**
 * Parser state threaded through the line scan
 */
interface ParserState {
  /** Group inherited by entries without a group-title */
  readonly currentGroup: string;
  /** Records bucketed by group, in first-seen group order */
  readonly groups: Map<string, ChannelRecord[]>;
}

function createParserState(): ParserState {
  return { currentGroup: DEFAULT_GROUP, groups: new Map() };
}

/**
 * Adds a record to its group bucket. The record's group becomes the
 * carry-over group for following entries.
 */
function appendRecord(state: ParserState, record: ChannelRecord): ParserState {
  const bucket = state.groups.get(record.group);
  if (bucket) {
    bucket.push(record);
  } else {
    state.groups.set(record.group, [record]);
  }
  return { ...state, currentGroup: record.group };
}

/**
 * Escapes special regex characters in a string
 */
export function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Extracts an attribute value from an EXTINF line
 */
export function extractAttribute(line: string, attribute: string): string | undefined {
  // Match attribute="value" or attribute='value'; the closing quote must match the opening one
  const regex = new RegExp(`${escapeRegex(attribute)}=(?:"([^"]*)"|'([^']*)')`);
  const match = line.match(regex);
  return match?.[1] ?? match?.[2];
}

/**
 * Resolves the group of an entry: the group-title attribute when present,
 * otherwise the carried-over group.
 */
export function extractGroup(line: string, currentGroup: string): string {
  const group = extractAttribute(line, 'group-title')?.trim();
  return group ? group : currentGroup;
}

/**
 * Extracts the channel name from an EXTINF line.
 * tvg-name wins; otherwise everything after the last comma.
 */
export function extractName(line: string): string | undefined {
  const tvgName = extractAttribute(line, 'tvg-name')?.trim();
  if (tvgName) {
    return tvgName;
  }

  const commaIndex = line.lastIndexOf(',');
  if (commaIndex === -1) {
    return undefined;
  }

  const displayName = line.substring(commaIndex + 1).trim();
  return displayName.length > 0 ? displayName : undefined;
}

/**
 * Replaces a raw channel name with its canonical name, if mapped
 */
export function normalizeName(name: string, mapping: NameMapping): string {
  return mapping.get(name) ?? name;
}

/**
 * Whether a line can serve as the stream URL of the preceding EXTINF line
 */
function isUrlLine(line: string): boolean {
  return line.length > 0 && !line.startsWith('#');
}

/**
 * Parses M3U playlist content into channel records
 *
 * Each EXTINF line must be immediately followed by its URL line; entries
 * whose next line is blank or another directive are dropped. Records are
 * returned grouped by first-seen group, in playlist order within a group.
 *
 * @param content - Raw M3U playlist content
 * @param mapping - Raw name -> canonical name lookup applied to every entry
 */
export function parsePlaylist(
  content: string,
  mapping: NameMapping = new Map()
): ChannelRecord[] {
  if (!content || content.trim().length === 0) {
    return [];
  }

  // Normalize line endings
  const lines = content.replace(/\r\n/g, '\n').replace(/\r/g, '\n').split('\n');

  let state = createParserState();

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line.startsWith(EXTINF_PREFIX)) {
      continue;
    }

    const url = i + 1 < lines.length ? lines[i + 1].trim() : '';
    if (!isUrlLine(url)) {
      continue;
    }

    const name = extractName(line);
    if (name === undefined) {
      continue;
    }

    state = appendRecord(state, {
      group: extractGroup(line, state.currentGroup),
      name: normalizeName(name, mapping),
      url,
    });
  }

  return Array.from(state.groups.values()).flat();
}
