/**
 * Duplicate detection across statements.
 *
 * Three signals are graded independently; any one failing rejects the pair:
 * - date: same instant (0.35), same UTC day within threshold (0.35),
 *   or near (0.25)
 * - amount: equal (0.35) or within the percentage threshold (0.25)
 * - description: equal (0.35), contained (0.25), common prefix (0.20)
 *
 * Confidence is the clamped sum. Every comparison is symmetric in (a, b).
 *
 * ARCHITECTURAL NOTE: No console.* calls. Pure functions over plain data.
 */

import { Decimal } from 'decimal.js';
import { DEDUP_CONFIG, DEDUP_WEIGHTS } from '../types/index.js';
import type { MatchType } from '../types/index.js';
import { normalizeKey } from '../utils/normalize.js';
import { MS_PER_HOUR, formatDuration, isSameUtcDay, msBetween } from './date-diff.js';
import type { DedupCandidate, DetectorConfig, DuplicateMatch, SignalScore } from './types.js';

const FIVE_MINUTES_MS = 5 * 60 * 1000;

export class DuplicateDetector {
    private readonly config: DetectorConfig;

    constructor(config: Partial<DetectorConfig> = {}) {
        this.config = {
            timeThresholdHours: config.timeThresholdHours ?? DEDUP_CONFIG.TIME_THRESHOLD_HOURS,
            amountThresholdPercent: config.amountThresholdPercent ?? DEDUP_CONFIG.AMOUNT_THRESHOLD_PERCENT,
        };
    }

    /**
     * Compare two transactions; null when they are not duplicates.
     */
    isDuplicate<T extends DedupCandidate>(a: T, b: T): DuplicateMatch<T> | null {
        const date = this.compareDates(a.date, b.date);
        if (!date) return null;

        const amount = this.compareAmounts(a.amount, b.amount);
        if (!amount) return null;

        const description = compareDescriptions(a.description, b.description);
        if (!description) return null;

        const signals = [date, amount, description];
        const reasons = signals.map(s => s.reason);
        const crossSource = a.source !== undefined && b.source !== undefined && a.source !== b.source;
        if (crossSource) {
            reasons.push('Cross-source duplicate');
        }

        let matchType: MatchType = 'near';
        if (crossSource) {
            matchType = 'cross_source';
        } else if (signals.every(s => s.strongest)) {
            matchType = 'exact';
        }

        const total = signals.reduce((sum, s) => sum + s.weight, 0);

        return {
            transaction_a: a,
            transaction_b: b,
            confidence: Math.min(1, total),
            match_type: matchType,
            reasons,
        };
    }

    /**
     * Every matching pair (i < j), in input order.
     */
    findDuplicates<T extends DedupCandidate>(transactions: readonly T[]): DuplicateMatch<T>[] {
        const matches: DuplicateMatch<T>[] = [];
        for (let i = 0; i < transactions.length; i++) {
            for (let j = i + 1; j < transactions.length; j++) {
                const match = this.isDuplicate(transactions[i], transactions[j]);
                if (match) matches.push(match);
            }
        }
        return matches;
    }

    /**
     * Connected components (size >= 2) of the duplicate graph.
     * Groups are ordered by their first member; members keep input order.
     */
    groupDuplicates<T extends DedupCandidate>(transactions: readonly T[]): T[][] {
        const adjacency = new Map<number, number[]>();
        const link = (from: number, to: number): void => {
            const edges = adjacency.get(from) ?? [];
            edges.push(to);
            adjacency.set(from, edges);
        };

        for (let i = 0; i < transactions.length; i++) {
            for (let j = i + 1; j < transactions.length; j++) {
                if (this.isDuplicate(transactions[i], transactions[j])) {
                    link(i, j);
                    link(j, i);
                }
            }
        }

        const visited = new Set<number>();
        const groups: T[][] = [];

        for (let start = 0; start < transactions.length; start++) {
            if (visited.has(start) || !adjacency.has(start)) continue;

            const component: number[] = [];
            const queue: number[] = [start];
            visited.add(start);

            while (queue.length > 0) {
                const current = queue.shift();
                if (current === undefined) break;
                component.push(current);
                for (const next of adjacency.get(current) ?? []) {
                    if (!visited.has(next)) {
                        visited.add(next);
                        queue.push(next);
                    }
                }
            }

            component.sort((x, y) => x - y);
            groups.push(component.map(idx => transactions[idx]));
        }

        return groups;
    }

    private compareDates(dateA: string, dateB: string): SignalScore | null {
        const diff = msBetween(dateA, dateB);
        if (diff === null) return null;

        if (diff === 0) {
            return { reason: 'Same date and time', weight: DEDUP_WEIGHTS.SAME_DATE, strongest: true };
        }

        const threshold = this.config.timeThresholdHours * MS_PER_HOUR;

        if (isSameUtcDay(dateA, dateB) && diff <= threshold) {
            let reason = 'Same date';
            if (diff <= FIVE_MINUTES_MS) {
                reason = 'Same date (within 5 minutes)';
            } else if (diff <= MS_PER_HOUR) {
                reason = 'Same date (within 1 hour)';
            }
            return { reason, weight: DEDUP_WEIGHTS.SAME_DATE, strongest: false };
        }

        if (diff < threshold && diff < DEDUP_CONFIG.NEAR_DATE_MAX_HOURS * MS_PER_HOUR) {
            return {
                reason: `Near date (within ${formatDuration(diff)})`,
                weight: DEDUP_WEIGHTS.NEAR_DATE,
                strongest: false,
            };
        }

        return null;
    }

    private compareAmounts(amountA: string, amountB: string): SignalScore | null {
        let a: Decimal;
        let b: Decimal;
        try {
            a = new Decimal(amountA);
            b = new Decimal(amountB);
        } catch {
            // Unparseable amounts never match
            return null;
        }

        if (a.equals(b)) {
            return { reason: 'Same amount', weight: DEDUP_WEIGHTS.SAME_AMOUNT, strongest: true };
        }

        const mean = a.plus(b).dividedBy(2);
        if (mean.isZero()) return null;

        const diffPercent = a.minus(b).dividedBy(mean).abs().times(100);
        if (diffPercent.lessThanOrEqualTo(this.config.amountThresholdPercent)) {
            return {
                reason: `Similar amount (${diffPercent.toFixed(1)}% difference)`,
                weight: DEDUP_WEIGHTS.SIMILAR_AMOUNT,
                strongest: false,
            };
        }

        return null;
    }
}

function compareDescriptions(descA: string, descB: string): SignalScore | null {
    const a = normalizeKey(descA);
    const b = normalizeKey(descB);
    if (!a || !b) return null;

    if (a === b) {
        return { reason: 'Same description', weight: DEDUP_WEIGHTS.SAME_DESCRIPTION, strongest: true };
    }

    if (a.includes(b) || b.includes(a)) {
        return { reason: 'Similar description', weight: DEDUP_WEIGHTS.CONTAINED_DESCRIPTION, strongest: false };
    }

    const minLength = Math.min(a.length, b.length);
    if (commonPrefixLength(a, b) >= minLength * DEDUP_CONFIG.DESCRIPTION_PREFIX_RATIO) {
        return {
            reason: 'Similar description (common prefix)',
            weight: DEDUP_WEIGHTS.PREFIX_DESCRIPTION,
            strongest: false,
        };
    }

    return null;
}

function commonPrefixLength(a: string, b: string): number {
    const limit = Math.min(a.length, b.length);
    let length = 0;
    while (length < limit && a[length] === b[length]) {
        length++;
    }
    return length;
}
