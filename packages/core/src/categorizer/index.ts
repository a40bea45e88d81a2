/**
 * Categorizer module: taxonomy, merchant normalization, learned rules and
 * the layered categorizer.
 */

export { Taxonomy, loadDefaultTaxonomy, defaultTaxonomyPath } from './taxonomy.js';
export type { PartialMerchantMatch } from './taxonomy.js';
export { MerchantNormalizer } from './normalizer.js';
export type { NormalizationResult, NormalizationMatchType } from './normalizer.js';
export { LearnedRuleStore } from './learning.js';
export type { LearnOptions, Correction, AppliedRule } from './learning.js';
export { Categorizer, categorizeAll } from './categorize.js';
export type { CategorizerOptions } from './categorize.js';
export { validatePattern, checkPatternCollision } from './validate.js';
export type { CategorizationStats } from './types.js';
