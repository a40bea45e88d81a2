/**
 * Category taxonomy and merchant mappings.
 *
 * The bundled data lives in assets/taxonomy.json and is validated with zod
 * on load. A Taxonomy is immutable once built; callers needing extra
 * merchants use MerchantNormalizer.addMapping or learned rules instead.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { TaxonomyDataSchema } from '../types/index.js';
import type { CategoryDefinition, MerchantMapping, TaxonomyData } from '../types/index.js';
import { ValidationError } from '../errors.js';
import { normalizeKey } from '../utils/normalize.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/**
 * A merchant key found inside a longer description.
 */
export interface PartialMerchantMatch {
    key: string;
    mapping: MerchantMapping;
    position: number;
}

export class Taxonomy {
    readonly categories: readonly CategoryDefinition[];
    private readonly merchants: ReadonlyMap<string, MerchantMapping>;
    private readonly variations: ReadonlyMap<string, string>;

    private constructor(data: TaxonomyData) {
        this.categories = Object.freeze(data.categories.map(c => ({ ...c, keywords: [...c.keywords] })));

        const merchants = new Map<string, MerchantMapping>();
        for (const merchant of data.merchants) {
            const key = normalizeKey(merchant.key);
            merchants.set(key, Object.freeze({ ...merchant, key }));
        }
        this.merchants = merchants;

        const variations = new Map<string, string>();
        for (const [raw, canonical] of Object.entries(data.variations)) {
            variations.set(normalizeKey(raw), normalizeKey(canonical));
        }
        this.variations = variations;
    }

    /**
     * Build a taxonomy from untrusted data.
     *
     * @throws ValidationError listing every schema issue
     */
    static fromData(data: unknown): Taxonomy {
        const parsed = TaxonomyDataSchema.safeParse(data);
        if (!parsed.success) {
            throw new ValidationError(
                'Invalid taxonomy data',
                'taxonomy',
                parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            );
        }
        return new Taxonomy(parsed.data);
    }

    getCategoryNames(): string[] {
        return this.categories.map(c => c.name);
    }

    hasCategory(name: string): boolean {
        return this.categories.some(c => c.name === name);
    }

    /**
     * Merchant entries in file order.
     */
    merchantEntries(): MerchantMapping[] {
        return [...this.merchants.values()];
    }

    /**
     * Exact lookup by an already-normalized key.
     */
    getMerchant(key: string): MerchantMapping | null {
        return this.merchants.get(key) ?? null;
    }

    /**
     * Canonical key for a known spelling variation, or the key itself.
     */
    resolveVariation(key: string): string {
        return this.variations.get(key) ?? key;
    }

    /**
     * Merchant key occurring earliest in the text; ties go to the longer key,
     * then to the key listed first.
     */
    findPartialMerchant(normalizedText: string): PartialMerchantMatch | null {
        let best: PartialMerchantMatch | null = null;

        for (const [key, mapping] of this.merchants) {
            const position = normalizedText.indexOf(key);
            if (position < 0) continue;

            if (
                best === null ||
                position < best.position ||
                (position === best.position && key.length > best.key.length)
            ) {
                best = { key, mapping, position };
            }
        }

        return best;
    }

    /**
     * Category of a merchant name: exact key, else the first key it contains.
     */
    getCategory(merchantName: string): string | null {
        return this.lookup(merchantName)?.category ?? null;
    }

    /**
     * Proper-cased merchant name: exact key, else the first key it contains.
     */
    getNormalizedName(merchantName: string): string | null {
        return this.lookup(merchantName)?.normalized ?? null;
    }

    private lookup(merchantName: string): MerchantMapping | null {
        const key = normalizeKey(merchantName);
        if (!key) return null;

        const exact = this.merchants.get(key);
        if (exact) return exact;

        for (const [merchantKey, mapping] of this.merchants) {
            if (key.includes(merchantKey)) {
                return mapping;
            }
        }
        return null;
    }
}

let defaultTaxonomy: Taxonomy | null = null;

/**
 * Path of the bundled taxonomy file.
 * In dev: packages/core/src/categorizer -> packages/core/assets
 */
export function defaultTaxonomyPath(): string {
    return join(__dirname, '..', '..', 'assets', 'taxonomy.json');
}

/**
 * Load the bundled taxonomy once and share it.
 */
export function loadDefaultTaxonomy(): Taxonomy {
    if (defaultTaxonomy === null) {
        const content = readFileSync(defaultTaxonomyPath(), 'utf-8');
        defaultTaxonomy = Taxonomy.fromData(JSON.parse(content));
    }
    return defaultTaxonomy;
}
