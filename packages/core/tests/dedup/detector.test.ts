import { describe, it, expect } from 'vitest';
import { DuplicateDetector } from '../../src/dedup/detector.js';
import type { DedupCandidate } from '../../src/dedup/types.js';

function txn(id: string, overrides: Partial<DedupCandidate> = {}): DedupCandidate {
    return {
        id,
        date: '2024-01-15',
        description: 'JOLLIBEE',
        amount: '-100.00',
        source: 'gcash',
        ...overrides,
    };
}

describe('DuplicateDetector', () => {
    const detector = new DuplicateDetector();

    describe('isDuplicate', () => {
        it('treats identical rows as an exact match', () => {
            const match = detector.isDuplicate(txn('a'), txn('b'));

            expect(match).not.toBeNull();
            expect(match?.match_type).toBe('exact');
            expect(match?.confidence).toBe(1);
            expect(match?.reasons).toEqual(['Same date and time', 'Same amount', 'Same description']);
        });

        it('is symmetric', () => {
            const a = txn('a', { date: '2024-01-15T22:00:00Z', amount: '-100', description: 'JOLLIBEE MAKATI' });
            const b = txn('b', { date: '2024-01-16T01:30:00Z', amount: '-100.5', source: 'bpi' });

            const ab = detector.isDuplicate(a, b);
            const ba = detector.isDuplicate(b, a);

            expect(ab?.confidence).toBe(ba?.confidence);
            expect(ab?.reasons).toEqual(ba?.reasons);
            expect(ab?.match_type).toBe(ba?.match_type);
        });

        it('grades timestamps on the same day', () => {
            const at = (date: string) => txn(date, { date });

            expect(detector.isDuplicate(at('2024-01-15T10:00:00Z'), at('2024-01-15T10:03:00Z'))?.reasons[0])
                .toBe('Same date (within 5 minutes)');
            expect(detector.isDuplicate(at('2024-01-15T10:00:00Z'), at('2024-01-15T10:45:00Z'))?.reasons[0])
                .toBe('Same date (within 1 hour)');
            expect(detector.isDuplicate(at('2024-01-15T01:00:00Z'), at('2024-01-15T20:00:00Z'))?.reasons[0])
                .toBe('Same date');
        });

        it('only calls a match exact at the strongest grade of every signal', () => {
            const match = detector.isDuplicate(
                txn('a', { date: '2024-01-15T10:00:00Z' }),
                txn('b', { date: '2024-01-15T10:03:00Z' })
            );

            expect(match?.match_type).toBe('near');
            expect(match?.confidence).toBe(1);
        });

        it('accepts near dates across midnight', () => {
            const match = detector.isDuplicate(
                txn('a', { date: '2024-01-15T22:00:00Z' }),
                txn('b', { date: '2024-01-16T01:30:00Z' })
            );

            expect(match?.reasons[0]).toBe('Near date (within 3h 30m)');
            expect(match?.confidence).toBeCloseTo(0.95, 10);
        });

        it('rejects different days a full day apart', () => {
            expect(detector.isDuplicate(txn('a'), txn('b', { date: '2024-01-16' }))).toBeNull();
        });

        it('respects a tighter time threshold', () => {
            const strict = new DuplicateDetector({ timeThresholdHours: 2 });

            expect(strict.isDuplicate(
                txn('a', { date: '2024-01-15T10:00:00Z' }),
                txn('b', { date: '2024-01-15T13:00:00Z' })
            )).toBeNull();
        });

        it('grades amounts by percentage difference', () => {
            const match = detector.isDuplicate(txn('a', { amount: '-100' }), txn('b', { amount: '-100.5' }));

            expect(match?.reasons[1]).toBe('Similar amount (0.5% difference)');
            expect(match?.match_type).toBe('near');
            expect(detector.isDuplicate(txn('a', { amount: '100' }), txn('b', { amount: '103' }))).toBeNull();
        });

        it('rejects amounts whose mean is zero', () => {
            expect(detector.isDuplicate(txn('a', { amount: '5' }), txn('b', { amount: '-5' }))).toBeNull();
        });

        it('treats two zero amounts as the same', () => {
            const match = detector.isDuplicate(txn('a', { amount: '0' }), txn('b', { amount: '0.00' }));
            expect(match?.reasons[1]).toBe('Same amount');
        });

        it('grades descriptions', () => {
            const contained = detector.isDuplicate(txn('a'), txn('b', { description: ' jollibee makati ' }));
            expect(contained?.reasons[2]).toBe('Similar description');
            expect(contained?.confidence).toBeCloseTo(0.95, 10);

            const prefix = detector.isDuplicate(
                txn('a', { description: 'GRAB RIDE 123456' }),
                txn('b', { description: 'GRAB RIDE 123999' })
            );
            expect(prefix?.reasons[2]).toBe('Similar description (common prefix)');
            expect(prefix?.confidence).toBeCloseTo(0.9, 10);

            expect(detector.isDuplicate(txn('a'), txn('b', { description: 'MCDONALDS' }))).toBeNull();
            expect(detector.isDuplicate(txn('a', { description: '' }), txn('b', { description: '' }))).toBeNull();
        });

        it('marks matches across sources', () => {
            const match = detector.isDuplicate(txn('a'), txn('b', { source: 'bpi' }));

            expect(match?.match_type).toBe('cross_source');
            expect(match?.reasons).toEqual([
                'Same date and time',
                'Same amount',
                'Same description',
                'Cross-source duplicate',
            ]);
        });

        it('rejects unparseable dates and amounts', () => {
            expect(detector.isDuplicate(txn('a', { date: 'soon' }), txn('b'))).toBeNull();
            expect(detector.isDuplicate(txn('a', { amount: 'lots' }), txn('b'))).toBeNull();
        });
    });

    describe('findDuplicates', () => {
        it('returns every matching pair', () => {
            const matches = detector.findDuplicates([txn('a'), txn('b'), txn('c')]);

            expect(matches.map(m => [m.transaction_a.id, m.transaction_b.id])).toEqual([
                ['a', 'b'],
                ['a', 'c'],
                ['b', 'c'],
            ]);
            expect(matches.every(m => m.match_type === 'exact' && m.confidence === 1)).toBe(true);
        });

        it('returns nothing for fewer than two transactions', () => {
            expect(detector.findDuplicates([])).toEqual([]);
            expect(detector.findDuplicates([txn('a')])).toEqual([]);
        });
    });

    describe('groupDuplicates', () => {
        it('groups identical rows together', () => {
            const groups = detector.groupDuplicates([txn('a'), txn('b'), txn('c')]);
            expect(groups.map(g => g.map(t => t.id))).toEqual([['a', 'b', 'c']]);
        });

        it('joins groups transitively', () => {
            const a = txn('a', { amount: '-100' });
            const b = txn('b', { amount: '-100.9' });
            const c = txn('c', { amount: '-101.8' });
            const other = txn('d', { description: 'MERALCO' });

            expect(detector.isDuplicate(a, c)).toBeNull();
            expect(detector.groupDuplicates([other, a, b, c]).map(g => g.map(t => t.id))).toEqual([['a', 'b', 'c']]);
        });

        it('keeps separate groups apart in input order', () => {
            const groups = detector.groupDuplicates([
                txn('m1', { description: 'MERALCO' }),
                txn('j1'),
                txn('m2', { description: 'MERALCO' }),
                txn('j2'),
            ]);

            expect(groups.map(g => g.map(t => t.id))).toEqual([['m1', 'm2'], ['j1', 'j2']]);
        });
    });
});
