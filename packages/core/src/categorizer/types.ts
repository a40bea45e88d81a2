/**
 * Internal types for categorizer module.
 */

import type { CategorizationMethod } from '../types/index.js';

/**
 * Statistics from batch categorization.
 */
export interface CategorizationStats {
    total: number;
    byMethod: Record<CategorizationMethod, number>;
    /** Results below the review threshold, fallbacks included. */
    needsReview: number;
}
