/**
 * Channel Sorter Types
 *
 * Shared data model for parsing, normalizing and classifying IPTV channels.
 */

/**
 * A single channel entry parsed from a playlist
 */
export interface ChannelRecord {
  /** Group the entry was listed under (group-title or carried-over group) */
  readonly group: string;
  /** Channel name after name mapping */
  readonly name: string;
  /** Stream URL */
  readonly url: string;
}

/**
 * Raw channel name -> canonical channel name
 */
export type NameMapping = ReadonlyMap<string, string>;

/**
 * One category of the output template
 */
export interface TemplateCategory {
  /** Category title, emitted as the section header */
  category: string;
  /** Channel names in output order */
  expectedNames: readonly string[];
}

/**
 * Ordered category template. Order determines output order.
 */
export type CategoryTemplate = readonly TemplateCategory[];

/**
 * A category of the classified output with its serialized "name,url" lines
 */
export interface ClassifiedCategory {
  category: string;
  lines: string[];
}

/**
 * Result of classifying records against a template
 */
export interface ClassifiedDocument {
  /** Template categories in order, followed by the catch-all when non-empty */
  categories: ClassifiedCategory[];
  /** Number of distinct lines claimed by a template category */
  matchedCount: number;
  /** Number of lines routed to the catch-all category */
  otherCount: number;
}
