import { describe, it, expect } from 'vitest';
import { createMemoryDocument } from '../../src/document/memory.js';
import { ExtractionError } from '../../src/errors.js';

describe('createMemoryDocument', () => {
    it('fills missing page parts', () => {
        const doc = createMemoryDocument('a.pdf', [{ text: 'hello' }, {}]);
        expect(doc.open()).toEqual([
            { text: 'hello', tables: [] },
            { text: '', tables: [] },
        ]);
    });

    it('hands out copies of its tables', () => {
        const doc = createMemoryDocument('a.pdf', [{ tables: [[['x']]] }]);
        doc.open()[0].tables[0][0][0] = 'changed';
        expect(doc.open()[0].tables[0][0][0]).toBe('x');
    });

    it('derives content from the pages unless given', () => {
        expect(createMemoryDocument('a.pdf', [{ text: 'x' }]).content)
            .toBe(createMemoryDocument('b.pdf', [{ text: 'x' }]).content);
        expect(createMemoryDocument('a.pdf', [], { content: 'raw-bytes' }).content).toBe('raw-bytes');
    });

    it('requires the matching credential when protected', () => {
        const doc = createMemoryDocument('a.pdf', [], { credential: 'test-secret' });

        expect(() => doc.open()).toThrow('Document is password-protected. Provide a credential.');
        expect(() => doc.open('nope')).toThrow(ExtractionError);
        expect(doc.open('test-secret')).toEqual([]);
    });
});
