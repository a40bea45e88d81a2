import { describe, it, expect } from 'vitest';
import { cleanDescription, normalizeKey } from '../../src/utils/normalize.js';

describe('normalizeKey', () => {
    it('uppercases and trims', () => {
        expect(normalizeKey('  grab food ')).toBe('GRAB FOOD');
    });

    it('keeps inner spacing and punctuation', () => {
        expect(normalizeKey('7-Eleven  #12')).toBe('7-ELEVEN  #12');
    });

    it('returns empty string for whitespace', () => {
        expect(normalizeKey('   ')).toBe('');
    });
});

describe('cleanDescription', () => {
    it('collapses whitespace and line breaks', () => {
        expect(cleanDescription('Payment to\n  Meralco\t Inc ')).toBe('Payment to Meralco Inc');
    });

    it('keeps case', () => {
        expect(cleanDescription('Jollibee')).toBe('Jollibee');
    });
});
