/**
 * Transaction categorization with a layered hierarchy.
 *
 * Layer priority (first match wins):
 * 1. learned rules (rule confidence; 0.9x for substring hits)
 * 2. exact merchant key (0.98)
 * 3. partial merchant key, earliest then longest (0.90-0.95)
 * 4. keyword: whole token (0.75), then substring (0.70)
 * 5. Uncategorized fallback (0.0)
 *
 * ARCHITECTURAL NOTE: No console.* calls. Never throws for any description.
 */

import { CONFIDENCE, UNCATEGORIZED_CATEGORY } from '../types/index.js';
import type { CategorizationResult, RawTransaction } from '../types/index.js';
import { normalizeKey } from '../utils/normalize.js';
import { Taxonomy, loadDefaultTaxonomy } from './taxonomy.js';
import type { LearnedRuleStore } from './learning.js';
import type { CategorizationStats } from './types.js';

const UNCATEGORIZED_RESULT: CategorizationResult = {
    category: UNCATEGORIZED_CATEGORY,
    confidence: CONFIDENCE.UNCATEGORIZED,
    method: 'none',
};

export interface CategorizerOptions {
    taxonomy?: Taxonomy;
    learnedRules?: LearnedRuleStore;
}

export class Categorizer {
    private readonly taxonomy: Taxonomy;
    private readonly learnedRules?: LearnedRuleStore;
    /** Lowercase keyword -> category, in taxonomy order. */
    private readonly keywordIndex = new Map<string, string>();

    constructor(options: CategorizerOptions = {}) {
        this.taxonomy = options.taxonomy ?? loadDefaultTaxonomy();
        this.learnedRules = options.learnedRules;

        for (const category of this.taxonomy.categories) {
            for (const keyword of category.keywords) {
                this.keywordIndex.set(keyword.toLowerCase(), category.name);
            }
        }
    }

    /**
     * Categorize one description.
     */
    categorize(description: string): CategorizationResult {
        const key = normalizeKey(description);
        if (!key) {
            return { ...UNCATEGORIZED_RESULT };
        }

        return this.tryLearned(description)
            ?? this.tryMerchant(key)
            ?? this.tryKeyword(key)
            ?? { ...UNCATEGORIZED_RESULT };
    }

    categorizeBatch(descriptions: readonly string[]): CategorizationResult[] {
        return descriptions.map(desc => this.categorize(desc));
    }

    categorizeTransaction(transaction: Pick<RawTransaction, 'description'>): CategorizationResult {
        return this.categorize(transaction.description);
    }

    categorizeTransactions(transactions: ReadonlyArray<Pick<RawTransaction, 'description'>>): CategorizationResult[] {
        return transactions.map(txn => this.categorizeTransaction(txn));
    }

    private tryLearned(description: string): CategorizationResult | null {
        const applied = this.learnedRules?.apply(description);
        if (!applied) return null;

        return {
            category: applied.category,
            confidence: applied.confidence,
            method: 'learned',
            normalized_merchant: applied.normalized_merchant,
        };
    }

    private tryMerchant(key: string): CategorizationResult | null {
        const exact = this.taxonomy.getMerchant(key);
        if (exact) {
            return {
                category: exact.category,
                confidence: CONFIDENCE.EXACT_MERCHANT,
                method: 'exact_merchant',
                normalized_merchant: exact.normalized,
            };
        }

        const partial = this.taxonomy.findPartialMerchant(key);
        if (partial) {
            const ratio = partial.key.length / key.length;
            return {
                category: partial.mapping.category,
                confidence: Math.min(
                    CONFIDENCE.PARTIAL_MERCHANT_MAX,
                    CONFIDENCE.PARTIAL_MERCHANT_BASE + ratio * CONFIDENCE.PARTIAL_MERCHANT_SPAN
                ),
                method: 'partial_merchant',
                normalized_merchant: partial.mapping.normalized,
            };
        }

        return null;
    }

    private tryKeyword(key: string): CategorizationResult | null {
        const lower = key.toLowerCase();

        for (const word of lower.split(/\s+/)) {
            const category = this.keywordIndex.get(word);
            if (category !== undefined) {
                return { category, confidence: CONFIDENCE.KEYWORD_TOKEN, method: 'keyword' };
            }
        }

        for (const [keyword, category] of this.keywordIndex) {
            if (lower.includes(keyword)) {
                return { category, confidence: CONFIDENCE.KEYWORD_SUBSTRING, method: 'keyword' };
            }
        }

        return null;
    }
}

/**
 * Categorize all transactions in a batch.
 *
 * @returns One result per transaction (same order) plus method stats
 */
export function categorizeAll(
    transactions: ReadonlyArray<Pick<RawTransaction, 'description'>>,
    categorizer: Categorizer
): {
    results: CategorizationResult[];
    stats: CategorizationStats;
} {
    const stats: CategorizationStats = {
        total: transactions.length,
        byMethod: {
            learned: 0,
            exact_merchant: 0,
            partial_merchant: 0,
            keyword: 0,
            none: 0,
        },
        needsReview: 0,
    };

    const results = transactions.map(txn => {
        const result = categorizer.categorizeTransaction(txn);
        stats.byMethod[result.method]++;
        if (result.confidence < CONFIDENCE.NEEDS_REVIEW_BELOW) {
            stats.needsReview++;
        }
        return result;
    });

    return { results, stats };
}
