/**
 * @fileoverview Search configuration schema and resolution
 *
 * Every key is optional on input; omitted keys take the defaults below.
 * Unknown keys are rejected so a misspelt option never passes silently.
 */

import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';

// ============================================================================
// SCHEMA
// ============================================================================

export const SearchConfigSchema = z
  .object({
    twoCycleAlpha: z
      .number()
      .gt(0)
      .lt(1)
      .default(0.05)
      .describe('Level of each Welch test in the two-cycle detector'),
    penaltyDiscount: z
      .number()
      .positive()
      .default(1)
      .describe('Multiplier on the BIC penalty of the default skeleton'),
    depth: z
      .number()
      .int()
      .min(0)
      .default(1000)
      .describe('Largest conditioning subset tried by the two-cycle detector'),
    maxIterations: z
      .number()
      .int()
      .min(0)
      .default(15)
      .describe('Cap on orientation rounds after the bootstrap pass'),
    faithfulnessAssumed: z
      .boolean()
      .default(true)
      .describe('Prune skeleton candidates with no marginal gain'),
    symmetricFirstStep: z
      .boolean()
      .default(false)
      .describe('Require both endpoints to select each other in the skeleton'),
    maxDegree: z
      .number()
      .int()
      .min(-1)
      .default(-1)
      .describe('Largest skeleton neighbourhood, -1 for no limit'),
    verbose: z.boolean().default(false).describe('Log per-stage diagnostics to stderr'),
  })
  .strict();

export type SearchConfig = z.output<typeof SearchConfigSchema>;
export type SearchConfigInput = z.input<typeof SearchConfigSchema>;

export const DEFAULT_SEARCH_CONFIG: Readonly<SearchConfig> = Object.freeze(SearchConfigSchema.parse({}));

// ============================================================================
// RESOLUTION
// ============================================================================

/**
 * Validate `input` and fill in defaults.
 *
 * @throws ConfigurationError naming the first invalid key
 */
export function resolveSearchConfig(input: unknown = {}): SearchConfig {
  const result = SearchConfigSchema.safeParse(input ?? {});
  if (result.success) return result.data;

  const [issue] = result.error.errors;
  if (!issue) throw new ConfigurationError('config', result.error.message);
  if (issue.code === 'unrecognized_keys') {
    throw new ConfigurationError(issue.keys[0] ?? 'config', `unknown option ${issue.keys.join(', ')}`);
  }
  throw new ConfigurationError(issue.path.length > 0 ? issue.path.join('.') : 'config', issue.message);
}
