import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { DuplicateResolver, LearnedRuleStore, ValidationError } from '@ledger-recon/core';
import {
    loadManifest,
    loadResolver,
    loadRuleStore,
    saveManifest,
    saveResolver,
    saveRuleStore,
} from '../src/store/records.js';
import { isSupportedStatementFile, loadStatementDocument } from '../src/store/documents.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const TEMP_DIR = join(__dirname, 'tmp-store');

const fixedClock = () => new Date('2024-11-30T08:00:00.000Z');

describe('Record persistence', () => {
    beforeEach(async () => {
        await fs.mkdir(TEMP_DIR, { recursive: true });
    });

    afterEach(async () => {
        await fs.rm(TEMP_DIR, { recursive: true, force: true });
    });

    it('should round-trip learned rules through a JSON file', async () => {
        const path = join(TEMP_DIR, 'config', 'learned-rules.json');
        const store = new LearnedRuleStore(fixedClock);
        store.learn('jollibee', 'Food & Dining', { normalizedMerchant: 'Jollibee' });
        store.learn('MERALCO', 'Bills & Utilities');

        await saveRuleStore(path, store);

        const loaded = new LearnedRuleStore();
        const report = await loadRuleStore(path, loaded);

        expect(report).toEqual({ loaded: 2, rejected: 0, errors: [] });
        expect(loaded.getRules()).toEqual(store.getRules());
        expect(loaded.apply('JOLLIBEE')?.normalized_merchant).toBe('Jollibee');
    });

    it('should write a versioned envelope', async () => {
        const path = join(TEMP_DIR, 'learned-rules.json');
        const store = new LearnedRuleStore(fixedClock);
        store.learn('MERALCO', 'Bills & Utilities');

        await saveRuleStore(path, store);
        const data: unknown = JSON.parse(await fs.readFile(path, 'utf-8'));

        expect(data).toEqual({
            version: 1,
            items: [{
                pattern: 'MERALCO',
                category: 'Bills & Utilities',
                source: 'user',
                confidence: 1,
                created_at: '2024-11-30T08:00:00.000Z',
            }],
        });
    });

    it('should load nothing from a missing file', async () => {
        const store = new LearnedRuleStore();
        const report = await loadRuleStore(join(TEMP_DIR, 'missing.json'), store);

        expect(report).toEqual({ loaded: 0, rejected: 0, errors: [] });
        expect(store.count()).toBe(0);
    });

    it('should reject a file that is not JSON', async () => {
        const path = join(TEMP_DIR, 'learned-rules.json');
        await fs.writeFile(path, '{ not json', 'utf-8');

        await expect(loadRuleStore(path, new LearnedRuleStore())).rejects.toThrow(ValidationError);
    });

    it('should round-trip resolutions', async () => {
        const path = join(TEMP_DIR, 'resolutions.json');
        const resolver = new DuplicateResolver(fixedClock);
        resolver.markDuplicate(['txn-a', 'txn-b'], 'txn-a', 'Same purchase');
        resolver.markUnique(['txn-c', 'txn-d']);

        await saveResolver(path, resolver);

        const loaded = new DuplicateResolver();
        const report = await loadResolver(path, loaded);

        expect(report.loaded).toBe(2);
        expect(loaded.getResolutions()).toEqual(resolver.getResolutions());
        expect(loaded.getDuplicateIds()).toEqual(new Set(['txn-b']));
    });

    it('should return an empty manifest when none exists', async () => {
        const manifest = await loadManifest(join(TEMP_DIR, 'import-manifest.json'));

        expect(manifest).toEqual({ version: 1, files: {} });
    });

    it('should round-trip the import manifest', async () => {
        const path = join(TEMP_DIR, 'import-manifest.json');
        const manifest = {
            version: 1,
            files: {
                'sha256:abc': { path: '/work/imports/gcash.json', imported_at: '2024-11-30T08:00:00.000Z', transaction_count: 2 },
            },
        };

        await saveManifest(path, manifest);

        expect(await loadManifest(path)).toEqual(manifest);
    });

    it('should reject a malformed manifest', async () => {
        const path = join(TEMP_DIR, 'import-manifest.json');
        await fs.writeFile(path, JSON.stringify({ version: 1, files: [] }), 'utf-8');

        await expect(loadManifest(path)).rejects.toThrow('Invalid import manifest');
    });
});

describe('Statement documents', () => {
    beforeEach(async () => {
        await fs.mkdir(TEMP_DIR, { recursive: true });
    });

    afterEach(async () => {
        await fs.rm(TEMP_DIR, { recursive: true, force: true });
    });

    it('should recognize supported file types', () => {
        expect(isSupportedStatementFile('gcash_2024_11.CSV')).toBe(true);
        expect(isSupportedStatementFile('bpi.xlsx')).toBe(true);
        expect(isSupportedStatementFile('maya.xls')).toBe(true);
        expect(isSupportedStatementFile('bpi_pages.json')).toBe(true);
        expect(isSupportedStatementFile('statement.pdf')).toBe(false);
        expect(isSupportedStatementFile('notes')).toBe(false);
    });

    it('should open extracted pages from a JSON file', async () => {
        const path = join(TEMP_DIR, 'gcash.json');
        await fs.writeFile(path, JSON.stringify({
            pages: [{ text: 'GCash', tables: [[['Date', 'Description']]] }, { text: 'Page 2' }],
        }), 'utf-8');

        const document = await loadStatementDocument(path);

        expect(document.path).toBe(path);
        expect(document.open()).toEqual([
            { text: 'GCash', tables: [[['Date', 'Description']]] },
            { text: 'Page 2', tables: [] },
        ]);
    });

    it('should reject extracted pages of the wrong shape', async () => {
        const path = join(TEMP_DIR, 'broken.json');
        await fs.writeFile(path, JSON.stringify({ pages: 'none' }), 'utf-8');

        await expect(loadStatementDocument(path)).rejects.toThrow('Cannot read extracted pages');
    });

    it('should read CSV exports as spreadsheets', async () => {
        const path = join(TEMP_DIR, 'export.csv');
        await fs.writeFile(path, 'Date,Description,Amount\n2024-11-05,JOLLIBEE,-250.00\n', 'utf-8');

        const document = await loadStatementDocument(path);
        const pages = document.open();

        expect(pages).toHaveLength(1);
        expect(pages[0].tables[0][1]).toEqual(['2024-11-05', 'JOLLIBEE', '-250.00']);
    });
});
