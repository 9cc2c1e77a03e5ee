/**
 * IPTV Module
 *
 * M3U parsing, channel name normalization and template classification
 */

export {
  // Types
  type ChannelRecord,
  type NameMapping,
  type TemplateCategory,
  type CategoryTemplate,
  type ClassifiedCategory,
  type ClassifiedDocument,
} from './types';

export {
  // Errors
  FetchError,
  ConfigMissingError,
  WriteError,
  toError,
} from './errors';

export {
  // M3U Parsing
  DEFAULT_GROUP,
  parsePlaylist,
  extractAttribute,
  extractGroup,
  extractName,
  normalizeName,
  escapeRegex,
} from './m3u-parser';

export {
  // Input files
  parseChannelMapping,
} from './channel-mapping';

export {
  GENRE_MARKER,
  parseCategoryTemplate,
  formatCategoryHeader,
  countExpectedNames,
} from './category-template';

export {
  DEFAULT_SOURCE_URL,
  parseSourceList,
  defaultSources,
} from './source-list';

export {
  // Aggregation & classification
  aggregate,
} from './aggregator';

export {
  OTHER_CATEGORY,
  classify,
  renderDocument,
  serializeRecord,
  createNameMatcher,
} from './template-classifier';
