import { describe, it, expect } from 'vitest';
import {
    RawTransactionSchema,
    ExtractionResultSchema,
    LedgerTransactionSchema,
    LearnedRuleSchema,
    ResolutionSchema,
    PersistedRecordSchema,
    TaxonomyDataSchema,
} from '../src/schemas.js';

describe('RawTransactionSchema', () => {
    const valid = {
        date: '2024-11-15',
        description: 'JOLLIBEE MAKATI',
        amount: '-150.00',
        reference: '1234567890',
        confidence: 1,
    };

    it('validates a complete transaction', () => {
        expect(RawTransactionSchema.safeParse(valid).success).toBe(true);
    });

    it('accepts a timestamp with zone', () => {
        const withTime = { ...valid, date: '2024-11-15T08:30:00Z' };
        expect(RawTransactionSchema.safeParse(withTime).success).toBe(true);
    });

    it('accepts a timestamp with offset', () => {
        const withOffset = { ...valid, date: '2024-11-15T08:30:00+08:00' };
        expect(RawTransactionSchema.safeParse(withOffset).success).toBe(true);
    });

    it('rejects a slash date', () => {
        expect(RawTransactionSchema.safeParse({ ...valid, date: '11/15/2024' }).success).toBe(false);
    });

    it('rejects a non-decimal amount', () => {
        expect(RawTransactionSchema.safeParse({ ...valid, amount: '₱150.00' }).success).toBe(false);
    });

    it('rejects confidence above 1', () => {
        expect(RawTransactionSchema.safeParse({ ...valid, confidence: 1.2 }).success).toBe(false);
    });

    it('allows reference to be omitted', () => {
        const { reference: _reference, ...rest } = valid;
        expect(RawTransactionSchema.safeParse(rest).success).toBe(true);
    });
});

describe('ExtractionResultSchema', () => {
    it('validates an empty extraction', () => {
        const result = ExtractionResultSchema.safeParse({
            transactions: [],
            quality_score: 0,
            source_kind: 'unknown',
            parsing_errors: [],
            warnings: [],
        });
        expect(result.success).toBe(true);
    });

    it('rejects an unknown source kind', () => {
        const result = ExtractionResultSchema.safeParse({
            transactions: [],
            quality_score: 0,
            source_kind: 'paypal',
            parsing_errors: [],
            warnings: [],
        });
        expect(result.success).toBe(false);
    });
});

describe('LedgerTransactionSchema', () => {
    const valid = {
        id: 'a1b2c3d4e5f67890',
        date: '2024-11-15',
        description: 'GRAB RIDE',
        amount: '-250',
        source: 'gcash',
        source_file: 'gcash_nov.xlsx',
        confidence: 0.95,
    };

    it('accepts id with collision suffix', () => {
        expect(LedgerTransactionSchema.safeParse({ ...valid, id: 'a1b2c3d4e5f67890-02' }).success).toBe(true);
    });

    it('rejects invalid id length', () => {
        expect(LedgerTransactionSchema.safeParse({ ...valid, id: 'tooshort' }).success).toBe(false);
    });
});

describe('LearnedRuleSchema', () => {
    it('defaults source to user', () => {
        const rule = LearnedRuleSchema.parse({
            pattern: 'LOCAL STORE',
            category: 'Shopping',
            confidence: 1,
            created_at: '2024-11-15T08:30:00.000Z',
        });
        expect(rule.source).toBe('user');
    });

    it('rejects empty pattern', () => {
        const result = LearnedRuleSchema.safeParse({
            pattern: '',
            category: 'Shopping',
            confidence: 1,
            created_at: '2024-11-15T08:30:00.000Z',
        });
        expect(result.success).toBe(false);
    });
});

describe('ResolutionSchema', () => {
    const base = {
        transaction_ids: ['a', 'b'],
        resolution_type: 'duplicate',
        keep_id: 'a',
        created_at: '2024-11-15T08:30:00.000Z',
    };

    it('validates a duplicate resolution', () => {
        expect(ResolutionSchema.safeParse(base).success).toBe(true);
    });

    it('rejects empty transaction_ids', () => {
        expect(ResolutionSchema.safeParse({ ...base, transaction_ids: [] }).success).toBe(false);
    });

    it('rejects keep_id outside transaction_ids', () => {
        expect(ResolutionSchema.safeParse({ ...base, keep_id: 'z' }).success).toBe(false);
    });
});

describe('PersistedRecordSchema', () => {
    it('rejects a newer version', () => {
        expect(PersistedRecordSchema.safeParse({ version: 2, items: [] }).success).toBe(false);
    });

    it('rejects missing items', () => {
        expect(PersistedRecordSchema.safeParse({ version: 1 }).success).toBe(false);
    });
});

describe('TaxonomyDataSchema', () => {
    it('rejects a merchant pointing at an unknown category', () => {
        const result = TaxonomyDataSchema.safeParse({
            categories: [{ name: 'Food & Dining', description: '', keywords: ['food'] }],
            merchants: [{ key: 'SHELL', normalized: 'Shell', category: 'Transportation' }],
            variations: {},
        });
        expect(result.success).toBe(false);
    });
});
