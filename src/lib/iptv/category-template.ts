/**
 * Category Template
 *
 * Parses the output template. A line containing ",#genre#" opens a category;
 * the non-empty lines that follow are the channel names expected in it.
 *
 *   央视频道,#genre#
 *   CCTV1
 *   CCTV2
 */

import { createLogger } from '../logger';
import type { CategoryTemplate, TemplateCategory } from './types';

const logger = createLogger('CategoryTemplate');

/**
 * Marker that turns a line into a category header
 */
export const GENRE_MARKER = '#genre#';

/**
 * Formats a category header line
 */
export function formatCategoryHeader(category: string): string {
  return `${category},${GENRE_MARKER}`;
}

/**
 * Parses template content into an ordered category template.
 *
 * Names before the first header are ignored. A repeated header resets that
 * category's names but keeps its original position.
 */
export function parseCategoryTemplate(content: string): CategoryTemplate {
  const categories = new Map<string, string[]>();
  let current: string[] | null = null;

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;

    if (line.includes(`,${GENRE_MARKER}`)) {
      const category = line.split(',')[0].trim();
      if (categories.has(category)) {
        logger.warn(`Category "${category}" is declared more than once; earlier names are discarded`);
      }
      current = [];
      categories.set(category, current);
    } else if (current) {
      current.push(line);
    }
  }

  const template: TemplateCategory[] = Array.from(categories, ([category, expectedNames]) => ({
    category,
    expectedNames,
  }));

  warnOnRepeatedNames(template);

  return template;
}

/**
 * A name listed twice surfaces its channels once per listing
 */
function warnOnRepeatedNames(template: CategoryTemplate): void {
  const seen = new Map<string, string>();

  for (const { category, expectedNames } of template) {
    for (const name of expectedNames) {
      const key = name.toLowerCase();
      const firstCategory = seen.get(key);
      if (firstCategory !== undefined) {
        logger.warn(`Channel "${name}" in "${category}" is already listed in "${firstCategory}"`);
      } else {
        seen.set(key, category);
      }
    }
  }
}

/**
 * Total number of expected channel names across all categories
 */
export function countExpectedNames(template: CategoryTemplate): number {
  return template.reduce((total, { expectedNames }) => total + expectedNames.length, 0);
}
