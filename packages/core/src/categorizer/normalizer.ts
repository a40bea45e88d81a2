/**
 * Merchant name normalization.
 *
 * Resolution order (first match wins):
 * 1. custom mappings added by the caller (0.98, exact)
 * 2. spelling variation collapsed, then exact taxonomy key (0.98, exact)
 * 3. earliest taxonomy key inside the input, longer key on ties (partial)
 * 4. no match (normalized null, confidence 0)
 */

import { NORMALIZER } from '../types/index.js';
import { normalizeKey } from '../utils/normalize.js';
import { Taxonomy, loadDefaultTaxonomy } from './taxonomy.js';

export type NormalizationMatchType = 'exact' | 'partial';

export interface NormalizationResult {
    original: string;
    normalized: string | null;
    confidence: number;
    matchType: NormalizationMatchType | null;
}

function noMatch(original: string): NormalizationResult {
    return { original, normalized: null, confidence: 0, matchType: null };
}

export class MerchantNormalizer {
    private readonly customMappings = new Map<string, string>();

    constructor(private readonly taxonomy: Taxonomy = loadDefaultTaxonomy()) {}

    /**
     * Normalize a raw merchant name.
     */
    normalize(merchantName: string): NormalizationResult {
        const key = normalizeKey(merchantName);
        if (!key) {
            return noMatch(merchantName);
        }

        const custom = this.customMappings.get(key);
        if (custom !== undefined) {
            return { original: merchantName, normalized: custom, confidence: NORMALIZER.EXACT, matchType: 'exact' };
        }

        const exact = this.taxonomy.getMerchant(this.taxonomy.resolveVariation(key));
        if (exact) {
            return { original: merchantName, normalized: exact.normalized, confidence: NORMALIZER.EXACT, matchType: 'exact' };
        }

        const partial = this.taxonomy.findPartialMerchant(key);
        if (partial) {
            const ratio = partial.key.length / key.length;
            const penalty = partial.position > 0 ? NORMALIZER.PARTIAL_OFFSET_PENALTY : 0;
            const confidence = Math.max(
                NORMALIZER.PARTIAL_MIN,
                Math.min(NORMALIZER.PARTIAL_MAX, NORMALIZER.PARTIAL_BASE + ratio * NORMALIZER.PARTIAL_SPAN - penalty)
            );
            return { original: merchantName, normalized: partial.mapping.normalized, confidence, matchType: 'partial' };
        }

        return noMatch(merchantName);
    }

    /**
     * Extract a merchant from a full transaction description.
     * Falls back to word prefixes (4 words down to 1) so trailing order
     * numbers and branch names do not block a match.
     */
    extractMerchant(description: string): NormalizationResult {
        const direct = this.normalize(description);
        if (direct.normalized !== null) {
            return direct;
        }

        const words = normalizeKey(description).split(/\s+/).filter(Boolean);
        for (let count = Math.min(NORMALIZER.MAX_PREFIX_WORDS, words.length); count > 0; count--) {
            const prefix = this.normalize(words.slice(0, count).join(' '));
            if (prefix.normalized !== null) {
                return {
                    original: description,
                    normalized: prefix.normalized,
                    confidence: prefix.confidence * NORMALIZER.PREFIX_FACTOR,
                    matchType: 'partial',
                };
            }
        }

        return noMatch(description);
    }

    normalizeBatch(merchantNames: readonly string[]): NormalizationResult[] {
        return merchantNames.map(name => this.normalize(name));
    }

    /**
     * Map a raw name to a canonical one; takes precedence over the taxonomy.
     */
    addMapping(rawName: string, normalizedName: string): void {
        const key = normalizeKey(rawName);
        if (key) {
            this.customMappings.set(key, normalizedName);
        }
    }
}
