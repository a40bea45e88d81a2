import { describe, it, expect } from 'vitest';
import { validatePattern, checkPatternCollision } from '../../src/categorizer/validate.js';
import type { LearnedRule } from '../../src/types/index.js';

const makeTxn = (description: string) => ({ description });

function makeRule(pattern: string): LearnedRule {
    return {
        pattern,
        category: 'Shopping',
        source: 'user',
        confidence: 1,
        created_at: '2024-11-20T08:00:00.000Z',
    };
}

describe('validatePattern', () => {
    it('rejects empty and whitespace-only patterns', () => {
        expect(validatePattern('')).toEqual({ valid: false, errors: ['Pattern cannot be empty'], warnings: [] });
        expect(validatePattern('   ').valid).toBe(false);
    });

    it('rejects patterns shorter than the minimum length', () => {
        expect(validatePattern('ab').errors).toEqual(['Pattern must be at least 3 characters (got 2)']);
    });

    it('accepts a pattern without transactions to check', () => {
        expect(validatePattern('SUKI')).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it('warns when a pattern matches too many transactions', () => {
        const txns = [
            makeTxn('GRAB RIDE 1'),
            makeTxn('grab ride 2'),
            makeTxn('GRAB RIDE 3'),
            makeTxn('GRAB RIDE 4'),
            makeTxn('JOLLIBEE'),
        ];

        const result = validatePattern('grab', txns);

        expect(result.valid).toBe(true);
        expect(result.matchCount).toBe(4);
        expect(result.matchPercent).toBe(0.8);
        expect(result.warnings).toEqual([
            'Pattern "grab" is too broad: matches 4 transactions (80.0% > 20%)',
        ]);
    });

    it('does not warn for three or fewer matches', () => {
        const txns = [makeTxn('GRAB 1'), makeTxn('GRAB 2'), makeTxn('GRAB 3')];
        expect(validatePattern('GRAB', txns).warnings).toEqual([]);
    });
});

describe('checkPatternCollision', () => {
    it('reports patterns that contain or are contained by the new one', () => {
        const rules = [makeRule('SUKI'), makeRule('SUKI STORE QC'), makeRule('JOLLIBEE')];

        expect(checkPatternCollision('suki store', rules)).toEqual({
            hasCollision: true,
            collidingPatterns: ['SUKI', 'SUKI STORE QC'],
        });
    });

    it('reports no collision for unrelated patterns', () => {
        expect(checkPatternCollision('MERALCO', [makeRule('SUKI')])).toEqual({
            hasCollision: false,
            collidingPatterns: [],
        });
    });

    it('treats an exact repeat as an overwrite, not a collision', () => {
        expect(checkPatternCollision('suki', [makeRule('SUKI'), makeRule('SUKI STORE')])).toEqual({
            hasCollision: true,
            collidingPatterns: ['SUKI STORE'],
        });
        expect(checkPatternCollision('suki', [makeRule('SUKI')]).hasCollision).toBe(false);
    });
});
