/**
 * Template Classifier
 *
 * Sorts aggregated channel records into the categories of an ordered
 * template. Within a category, channels follow the template's name order;
 * every record no template name claims lands in the catch-all category.
 */

import { escapeRegex } from './m3u-parser';
import { formatCategoryHeader } from './category-template';
import type {
  CategoryTemplate,
  ChannelRecord,
  ClassifiedCategory,
  ClassifiedDocument,
} from './types';

/**
 * Catch-all category for unmatched records
 */
export const OTHER_CATEGORY = '其它';

/**
 * Serializes a record to its output line
 */
export function serializeRecord(record: ChannelRecord): string {
  return `${record.name},${record.url}`;
}

/**
 * Builds the case-insensitive matcher for one expected channel name.
 * The name must open the line and be followed by a comma, so "CCTV1"
 * never claims "CCTV10,...".
 */
export function createNameMatcher(expectedName: string): RegExp {
  return new RegExp(`^\\s*${escapeRegex(expectedName)}\\s*,`, 'i');
}

/**
 * Classifies records against a template
 *
 * Each expected name scans the full line collection, so records shared by
 * several sources all surface under one slot in aggregation order.
 */
export function classify(
  template: CategoryTemplate,
  records: readonly ChannelRecord[]
): ClassifiedDocument {
  const lines = records.map(serializeRecord);
  const matched = new Set<string>();
  const categories: ClassifiedCategory[] = [];

  for (const { category, expectedNames } of template) {
    const categoryLines: string[] = [];

    for (const expectedName of expectedNames) {
      const matcher = createNameMatcher(expectedName);
      for (const line of lines) {
        if (matcher.test(line)) {
          categoryLines.push(line);
          matched.add(line);
        }
      }
    }

    categories.push({ category, lines: categoryLines });
  }

  const others = lines.filter((line) => !matched.has(line));
  if (others.length > 0) {
    categories.push({ category: OTHER_CATEGORY, lines: others });
  }

  return {
    categories,
    matchedCount: matched.size,
    otherCount: others.length,
  };
}

/**
 * Renders a classified document as text: a header per category, its lines,
 * and a blank separator. Trailing separators are trimmed.
 */
export function renderDocument(document: ClassifiedDocument): string {
  const output: string[] = [];

  for (const { category, lines } of document.categories) {
    output.push(formatCategoryHeader(category), ...lines, '');
  }

  while (output.length > 0 && output[output.length - 1] === '') {
    output.pop();
  }

  return output.join('\n');
}
