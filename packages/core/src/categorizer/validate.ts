/**
 * Pattern validation for learned rules.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Results returned as data.
 */

import { normalizeKey } from '../utils/normalize.js';
import { PATTERN_VALIDATION } from '../types/index.js';
import type { CollisionResult, LearnedRule, PatternValidationResult, RawTransaction } from '../types/index.js';

/**
 * Validate a pattern before learning it.
 *
 * - Empty pattern = rejected
 * - Pattern shorter than the minimum length = rejected
 * - Pattern matching >20% of the given transactions AND >3 of them = too broad (warning)
 *
 * @param transactions - Optional transaction list for the breadth check
 */
export function validatePattern(
    pattern: string,
    transactions?: ReadonlyArray<Pick<RawTransaction, 'description'>>
): PatternValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const normalized = normalizeKey(pattern);

    if (!normalized) {
        errors.push('Pattern cannot be empty');
        return { valid: false, errors, warnings };
    }

    if (normalized.length < PATTERN_VALIDATION.MIN_LENGTH) {
        errors.push(
            `Pattern must be at least ${PATTERN_VALIDATION.MIN_LENGTH} characters (got ${normalized.length})`
        );
        return { valid: false, errors, warnings };
    }

    // If no transactions provided, can only do length validation
    if (!transactions || transactions.length === 0) {
        return { valid: true, errors, warnings };
    }

    let matchCount = 0;
    for (const txn of transactions) {
        if (normalizeKey(txn.description).includes(normalized)) matchCount++;
    }

    const matchPercent = matchCount / transactions.length;

    if (
        matchPercent > PATTERN_VALIDATION.MAX_MATCH_PERCENT &&
        matchCount > PATTERN_VALIDATION.MAX_MATCHES_FOR_BROAD
    ) {
        warnings.push(
            `Pattern "${pattern}" is too broad: matches ${matchCount} transactions ` +
            `(${(matchPercent * 100).toFixed(1)}% > ${PATTERN_VALIDATION.MAX_MATCH_PERCENT * 100}%)`
        );
    }

    return {
        valid: true,
        errors,
        warnings,
        matchCount,
        matchPercent,
    };
}

/**
 * Check if a new pattern overlaps existing learned rules.
 * Overlap = one pattern contains the other; an exact repeat is an overwrite.
 */
export function checkPatternCollision(
    pattern: string,
    existingRules: readonly LearnedRule[]
): CollisionResult {
    const collidingPatterns: string[] = [];
    const normalizedNew = normalizeKey(pattern);

    for (const rule of existingRules) {
        const existing = normalizeKey(rule.pattern);
        if (existing === normalizedNew) {
            continue;
        }
        if (normalizedNew.includes(existing) || existing.includes(normalizedNew)) {
            collidingPatterns.push(rule.pattern);
        }
    }

    return {
        hasCollision: collidingPatterns.length > 0,
        collidingPatterns,
    };
}
