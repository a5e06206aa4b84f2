/**
 * @fileoverview Knowledge predicates used by the search stages
 */

import type { Variable } from '../data/dataset.js';
import type { Knowledge } from './background_knowledge.js';

/** Tier whose members are never used as conditioning variables. */
export const PROTECTED_TIER = 1;

/**
 * True when knowledge fixes the direction a→b: either b→a is forbidden or
 * a→b is required.
 */
export function knowledgeOrients(knowledge: Knowledge, a: Variable, b: Variable): boolean {
  return knowledge.isForbidden(b.name, a.name) || knowledge.isRequired(a.name, b.name);
}

/** True when neither direction between a and b is allowed. */
export function edgeForbiddenByKnowledge(knowledge: Knowledge, a: Variable, b: Variable): boolean {
  return knowledge.isForbidden(a.name, b.name) && knowledge.isForbidden(b.name, a.name);
}

/**
 * Drop members of the protected tier. Knowledge with fewer than two tiers
 * protects nothing.
 */
export function removeProtectedTier(knowledge: Knowledge, nodes: readonly Variable[]): Variable[] {
  if (knowledge.getNumTiers() <= PROTECTED_TIER) return [...nodes];
  return nodes.filter((node) => !knowledge.isInTier(PROTECTED_TIER, node.name));
}
