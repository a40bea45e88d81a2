import { describe, it, expect } from 'vitest';
import { parseArgs } from '../src/args.js';

describe('parseArgs', () => {
    it('should split command, positionals and flags', () => {
        const args = parseArgs(['learn', 'JOLLIBEE', 'Food & Dining', '--merchant', 'Jollibee', '--workspace=/work']);

        expect(args.command).toBe('learn');
        expect(args.positionals).toEqual(['JOLLIBEE', 'Food & Dining']);
        expect(args.values.get('--merchant')).toBe('Jollibee');
        expect(args.values.get('--workspace')).toBe('/work');
    });

    it('should collect boolean flags', () => {
        const args = parseArgs(['import', '--dry-run', '--yes']);

        expect(args.command).toBe('import');
        expect([...args.flags]).toEqual(['--dry-run', '--yes']);
        expect(args.positionals).toEqual([]);
    });

    it('should have no command for empty input', () => {
        expect(parseArgs([]).command).toBeUndefined();
    });

    it('should reject a valued flag without a value', () => {
        expect(() => parseArgs(['import', '--workspace'])).toThrow('Missing value for --workspace');
    });
});
