/**
 * Content Aggregator
 *
 * Flattens per-source channel records into one collection, preserving
 * source order and each source's emitted order.
 */

import type { ChannelRecord } from './types';

export function aggregate(
  sources: readonly (readonly ChannelRecord[])[]
): ChannelRecord[] {
  const records: ChannelRecord[] = [];
  for (const source of sources) {
    records.push(...source);
  }
  return records;
}
