/**
 * @fileoverview Configuration entry point
 */

export {
  SearchConfigSchema,
  DEFAULT_SEARCH_CONFIG,
  resolveSearchConfig,
  type SearchConfig,
  type SearchConfigInput,
} from './search_config.js';

export { parseSearchConfig, loadSearchConfigFile } from './loader.js';
