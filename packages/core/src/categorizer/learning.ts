/**
 * Learned categorization rules from user corrections.
 *
 * One rule per pattern (the uppercased, trimmed description). Learning the
 * same pattern again overwrites it in place, so the store is idempotent.
 *
 * ARCHITECTURAL NOTE: No file I/O here. toRecord()/mergeRecord() exchange
 * plain data; the CLI reads and writes the JSON files.
 */

import { CONFIDENCE, LearnedRuleSchema, PERSISTENCE_VERSION } from '../types/index.js';
import type { LearnedRule, PersistedRecord } from '../types/index.js';
import { ValidationError } from '../errors.js';
import { normalizeKey } from '../utils/normalize.js';
import { parseRecordEnvelope } from '../utils/record.js';
import type { LoadReport } from '../utils/record.js';

export interface LearnOptions {
    normalizedMerchant?: string;
    source?: LearnedRule['source'];
    confidence?: number;
}

export interface Correction {
    description: string;
    category: string;
    normalizedMerchant?: string;
}

/**
 * A learned rule applied to one description.
 */
export interface AppliedRule {
    category: string;
    normalized_merchant?: string;
    confidence: number;
    rule: LearnedRule;
}

export class LearnedRuleStore {
    private readonly rules = new Map<string, LearnedRule>();

    constructor(private readonly clock: () => Date = () => new Date()) {}

    /**
     * Learn (or overwrite) the rule for a description.
     *
     * @throws ValidationError for an empty pattern or category, or a
     *         confidence outside [0, 1]
     */
    learn(description: string, category: string, options: LearnOptions = {}): LearnedRule {
        const pattern = normalizeKey(description);
        if (!pattern) {
            throw new ValidationError('Learned rule pattern cannot be empty', 'pattern');
        }
        if (!category.trim()) {
            throw new ValidationError('Learned rule category cannot be empty', 'category');
        }

        const confidence = options.confidence ?? CONFIDENCE.LEARNED_DEFAULT;
        if (!(confidence >= 0 && confidence <= 1)) {
            throw new ValidationError(`Confidence must be between 0 and 1 (got ${confidence})`, 'confidence');
        }

        const rule: LearnedRule = {
            pattern,
            category: category.trim(),
            normalized_merchant: options.normalizedMerchant,
            source: options.source ?? 'user',
            confidence,
            created_at: this.clock().toISOString(),
        };
        this.rules.set(pattern, rule);
        return rule;
    }

    /**
     * Learn several corrections; returns how many were learned.
     */
    learnBatch(corrections: readonly Correction[]): number {
        let count = 0;
        for (const correction of corrections) {
            this.learn(correction.description, correction.category, {
                normalizedMerchant: correction.normalizedMerchant,
            });
            count++;
        }
        return count;
    }

    /**
     * Apply the rules to a description.
     * Exact pattern first; otherwise the first rule (in learning order) whose
     * pattern occurs inside the description, at 0.9x its confidence.
     */
    apply(description: string): AppliedRule | null {
        const key = normalizeKey(description);
        if (!key) return null;

        const exact = this.rules.get(key);
        if (exact) {
            return {
                category: exact.category,
                normalized_merchant: exact.normalized_merchant,
                confidence: exact.confidence,
                rule: exact,
            };
        }

        for (const [pattern, rule] of this.rules) {
            if (key.includes(pattern)) {
                return {
                    category: rule.category,
                    normalized_merchant: rule.normalized_merchant,
                    confidence: rule.confidence * CONFIDENCE.LEARNED_SUBSTRING_FACTOR,
                    rule,
                };
            }
        }

        return null;
    }

    getRules(): LearnedRule[] {
        return [...this.rules.values()];
    }

    getRule(pattern: string): LearnedRule | null {
        return this.rules.get(normalizeKey(pattern)) ?? null;
    }

    /**
     * Delete a rule by pattern; false when no such rule exists.
     */
    deleteRule(pattern: string): boolean {
        return this.rules.delete(normalizeKey(pattern));
    }

    clear(): void {
        this.rules.clear();
    }

    count(): number {
        return this.rules.size;
    }

    toRecord(): PersistedRecord {
        return { version: PERSISTENCE_VERSION, items: this.getRules() };
    }

    /**
     * Merge a persisted record. Loaded rules win for the same pattern.
     *
     * @throws ValidationError when the envelope itself is malformed or newer
     *         than this version understands
     */
    mergeRecord(data: unknown): LoadReport {
        const envelope = parseRecordEnvelope(data, 'learned rules');
        const report: LoadReport = { loaded: 0, rejected: 0, errors: [] };

        envelope.items.forEach((item, idx) => {
            const parsed = LearnedRuleSchema.safeParse(item);
            if (!parsed.success) {
                report.rejected++;
                report.errors.push(`Rule ${idx + 1}: ${parsed.error.issues.map(i => i.message).join(', ')}`);
                return;
            }
            const rule = { ...parsed.data, pattern: normalizeKey(parsed.data.pattern) };
            if (!rule.pattern) {
                report.rejected++;
                report.errors.push(`Rule ${idx + 1}: pattern is blank`);
                return;
            }
            this.rules.set(rule.pattern, rule);
            report.loaded++;
        });

        return report;
    }
}
