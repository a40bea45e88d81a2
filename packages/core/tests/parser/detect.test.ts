import { describe, it, expect } from 'vitest';
import { detectSourceKind } from '../../src/parser/detect.js';

const page = (text: string) => [{ text, tables: [] }];

describe('detectSourceKind', () => {
    it('detects GCash', () => {
        expect(detectSourceKind(page('GCash Transaction History'))).toBe('gcash');
        expect(detectSourceKind(page('G-Xchange, Inc.'))).toBe('gcash');
    });

    it('detects BPI', () => {
        expect(detectSourceKind(page('Bank of the Philippine Islands'))).toBe('bpi');
        expect(detectSourceKind(page('BPI Savings'))).toBe('bpi');
    });

    it('separates Maya savings from wallet', () => {
        expect(detectSourceKind(page('Maya Savings Statement'))).toBe('maya_savings');
        expect(detectSourceKind(page('Maya Wallet Statement'))).toBe('maya_wallet');
    });

    it('only inspects the first page', () => {
        expect(detectSourceKind([{ text: 'Statement', tables: [] }, { text: 'GCash', tables: [] }])).toBe('unknown');
    });

    it('returns unknown for empty documents', () => {
        expect(detectSourceKind([])).toBe('unknown');
    });
});
