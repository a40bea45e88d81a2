import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ImportManifestSchema, PERSISTENCE_VERSION, type ImportManifest } from '@ledger-recon/shared';
import { ValidationError, errorMessage } from '@ledger-recon/core';
import type { DuplicateResolver, LearnedRuleStore, LoadReport } from '@ledger-recon/core';

/**
 * JSON persistence for the workspace config files.
 * The core hands over plain records; reading and writing happens here.
 */

export function isNotFound(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Reads and parses a JSON file. A missing file reads as null.
 *
 * @throws ValidationError when the file is not valid JSON
 */
export async function readJsonFile(filePath: string): Promise<unknown> {
    let content: string;
    try {
        content = await readFile(filePath, 'utf-8');
    } catch (err) {
        if (isNotFound(err)) {
            return null;
        }
        throw err;
    }

    try {
        const data: unknown = JSON.parse(content);
        return data;
    } catch (err) {
        throw new ValidationError(
            `Invalid JSON in ${filePath}: ${errorMessage(err)}`,
            'file'
        );
    }
}

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
}

const EMPTY_REPORT: LoadReport = { loaded: 0, rejected: 0, errors: [] };

export async function saveRuleStore(filePath: string, store: LearnedRuleStore): Promise<void> {
    await writeJsonFile(filePath, store.toRecord());
}

/**
 * Merges the rules saved at filePath into the store. A missing file loads 0 rules.
 */
export async function loadRuleStore(filePath: string, store: LearnedRuleStore): Promise<LoadReport> {
    const data = await readJsonFile(filePath);
    if (data === null) {
        return { ...EMPTY_REPORT, errors: [] };
    }
    return store.mergeRecord(data);
}

export async function saveResolver(filePath: string, resolver: DuplicateResolver): Promise<void> {
    await writeJsonFile(filePath, resolver.toRecord());
}

/**
 * Merges the resolutions saved at filePath. A missing file loads 0 resolutions.
 */
export async function loadResolver(filePath: string, resolver: DuplicateResolver): Promise<LoadReport> {
    const data = await readJsonFile(filePath);
    if (data === null) {
        return { ...EMPTY_REPORT, errors: [] };
    }
    return resolver.mergeRecord(data);
}

export function emptyManifest(): ImportManifest {
    return { version: PERSISTENCE_VERSION, files: {} };
}

/**
 * Content hashes of statements imported by earlier runs.
 *
 * @throws ValidationError when the manifest has the wrong shape
 */
export async function loadManifest(filePath: string): Promise<ImportManifest> {
    const data = await readJsonFile(filePath);
    if (data === null) {
        return emptyManifest();
    }

    const parsed = ImportManifestSchema.safeParse(data);
    if (!parsed.success) {
        throw new ValidationError(
            `Invalid import manifest: ${filePath}`,
            'manifest',
            parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }
    return parsed.data;
}

export async function saveManifest(filePath: string, manifest: ImportManifest): Promise<void> {
    await writeJsonFile(filePath, manifest);
}
