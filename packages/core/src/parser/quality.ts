/**
 * Extraction quality scoring.
 *
 * Score = mean per-transaction confidence, minus metadata penalties,
 * clamped to [0, 1]. Bands: >= 0.95 auto-accept, 0.80-0.95 review flagged
 * rows, < 0.80 manual review.
 */

import { QUALITY_PENALTY } from '../types/index.js';
import type { RawTransaction } from '../types/index.js';

/**
 * Header metadata a parser may recover from the first page.
 */
export interface StatementMetadata {
    account_number?: string;
    account_holder?: string;
    period_start?: string;
    period_end?: string;
}

function clamp01(value: number): number {
    return Math.min(1, Math.max(0, value));
}

/**
 * Mean confidence of the extracted transactions; 0 when there are none.
 */
export function calculateQualityScore(transactions: readonly RawTransaction[]): number {
    if (transactions.length === 0) {
        return 0;
    }
    const total = transactions.reduce((sum, txn) => sum + txn.confidence, 0);
    return clamp01(total / transactions.length);
}

/**
 * Subtract the missing-account and missing-period penalties.
 */
export function applyQualityPenalties(score: number, metadata: StatementMetadata): number {
    let adjusted = score;
    if (!metadata.account_number) {
        adjusted -= QUALITY_PENALTY.MISSING_ACCOUNT;
    }
    if (!metadata.period_start || !metadata.period_end) {
        adjusted -= QUALITY_PENALTY.MISSING_PERIOD;
    }
    return clamp01(adjusted);
}
