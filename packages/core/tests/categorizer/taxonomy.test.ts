import { describe, it, expect } from 'vitest';
import { Taxonomy, loadDefaultTaxonomy } from '../../src/categorizer/taxonomy.js';
import { ValidationError } from '../../src/errors.js';

const smallTaxonomy = () => Taxonomy.fromData({
    categories: [
        { name: 'Food', keywords: ['food'] },
        { name: 'Transport', keywords: ['ride'] },
    ],
    merchants: [
        { key: 'grab', normalized: 'Grab', category: 'Transport' },
        { key: 'GRABFOOD', normalized: 'GrabFood', category: 'Food' },
        { key: 'FOOD', normalized: 'Food Court', category: 'Food' },
    ],
    variations: { 'GRAB RIDE': 'GRAB' },
});

describe('Taxonomy', () => {
    it('normalizes merchant keys on load', () => {
        expect(smallTaxonomy().getMerchant('GRAB')?.normalized).toBe('Grab');
    });

    it('prefers the earliest, then the longest, partial key', () => {
        const taxonomy = smallTaxonomy();

        expect(taxonomy.findPartialMerchant('GRABFOOD ORDER')?.key).toBe('GRABFOOD');
        expect(taxonomy.findPartialMerchant('PAID FOOD VIA GRAB')).toEqual({
            key: 'FOOD',
            mapping: { key: 'FOOD', normalized: 'Food Court', category: 'Food' },
            position: 5,
        });
        expect(taxonomy.findPartialMerchant('NOTHING HERE')).toBeNull();
    });

    it('resolves variations to canonical keys', () => {
        expect(smallTaxonomy().resolveVariation('GRAB RIDE')).toBe('GRAB');
        expect(smallTaxonomy().resolveVariation('OTHER')).toBe('OTHER');
    });

    it('looks up category and name by exact key, then containment', () => {
        const taxonomy = smallTaxonomy();

        expect(taxonomy.getCategory('grab')).toBe('Transport');
        expect(taxonomy.getNormalizedName('GRAB CAR 123')).toBe('Grab');
        expect(taxonomy.getCategory('')).toBeNull();
    });

    it('rejects merchants pointing at unknown categories', () => {
        try {
            Taxonomy.fromData({
                categories: [{ name: 'Food', keywords: [] }],
                merchants: [{ key: 'X', normalized: 'X', category: 'Nope' }],
                variations: {},
            });
            expect.unreachable('should have thrown');
        } catch (err) {
            expect(err).toBeInstanceOf(ValidationError);
            expect(err instanceof ValidationError && err.issues.length).toBeGreaterThan(0);
        }
    });

    it('rejects malformed data', () => {
        expect(() => Taxonomy.fromData({ categories: 'nope' })).toThrow('Invalid taxonomy data');
    });
});

describe('loadDefaultTaxonomy', () => {
    it('loads the bundled categories once', () => {
        const taxonomy = loadDefaultTaxonomy();

        expect(taxonomy).toBe(loadDefaultTaxonomy());
        expect(taxonomy.hasCategory('Food & Dining')).toBe(true);
        expect(taxonomy.hasCategory('Uncategorized')).toBe(true);
        expect(taxonomy.getCategoryNames()).toHaveLength(15);
        expect(taxonomy.getMerchant('JOLLIBEE')?.category).toBe('Food & Dining');
    });
});
