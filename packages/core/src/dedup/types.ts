import type { MatchType } from '../types/index.js';

/**
 * Minimal shape the detector compares. LedgerTransaction satisfies it.
 */
export interface DedupCandidate {
    id: string;
    date: string;
    description: string;
    amount: string;
    source?: string;
}

/**
 * A pair of transactions judged to be the same event.
 */
export interface DuplicateMatch<T extends DedupCandidate = DedupCandidate> {
    transaction_a: T;
    transaction_b: T;
    confidence: number;
    match_type: MatchType;
    reasons: string[];
}

export interface DetectorConfig {
    timeThresholdHours: number;
    amountThresholdPercent: number;
}

export interface AutoResolveOptions {
    keepFirst?: boolean;
    minConfidence?: number;
}

/**
 * One graded signal; `strongest` marks the top grade of its kind.
 */
export interface SignalScore {
    reason: string;
    weight: number;
    strongest: boolean;
}
