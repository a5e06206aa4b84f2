/**
 * @fileoverview Load search configuration from YAML or JSON files
 */

import yaml from 'yaml';
import { ConfigurationError } from '../core/errors.js';
import { safeReadFile, safeSync } from '../core/result.js';
import { resolveSearchConfig, type SearchConfig } from './search_config.js';

/**
 * Parse configuration text. JSON is a subset of YAML, so one parser serves
 * both. An empty document yields the defaults.
 */
export function parseSearchConfig(text: string, source = 'config'): SearchConfig {
  const parsed = safeSync((): unknown => yaml.parse(text));
  if (!parsed.ok) {
    throw new ConfigurationError(source, `unparseable document: ${parsed.error.message}`);
  }
  return resolveSearchConfig(parsed.value ?? {});
}

/**
 * Read and resolve a configuration file.
 *
 * @throws ConfigurationError when the file cannot be read, parsed or validated
 */
export async function loadSearchConfigFile(path: string): Promise<SearchConfig> {
  const text = await safeReadFile(path);
  if (!text.ok) {
    throw new ConfigurationError(path, `cannot read file: ${text.error.message}`);
  }
  return parseSearchConfig(text.value, path);
}
