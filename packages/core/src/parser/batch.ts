/**
 * Batch ingestion: runs parser variants over many documents.
 *
 * Documents are processed in caller order so the first occurrence of a
 * content hash wins. A hash joins the seen set only after its document
 * parsed, so a failed document can be retried in a later batch.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Failures are returned in the result.
 */

import { Decimal } from 'decimal.js';
import { ExtractionError, errorMessage } from '../errors.js';
import type {
    BatchError,
    BatchResult,
    ExtractionResult,
    FileExtraction,
    LedgerTransaction,
    SkippedFile,
} from '../types/index.js';
import type { StatementDocument } from '../document/types.js';
import { hashContent } from '../utils/hash.js';
import { generateTxnId, resolveCollisions } from '../utils/txn-id.js';
import { openPages } from './rows.js';
import { detectSourceKind } from './detect.js';
import { parserForSource, getSupportedParsers } from './registry.js';

export type ImportStatus = 'success' | 'failed' | 'skipped';

/**
 * Progress callback, called once per document with a 1-based position.
 */
export type ProgressSink = (current: number, total: number, path: string, status: ImportStatus) => void;

export interface ImportOptions {
    /** Credentials for protected documents, keyed by document path. */
    credentials?: Readonly<Record<string, string>>;
    /** Content hashes imported by earlier batches. */
    knownHashes?: Iterable<string>;
    onProgress?: ProgressSink;
}

/**
 * Extract one document: detected source kind first, otherwise every
 * variant in registry order until one yields at least one transaction.
 *
 * @throws ExtractionError when no variant can read the document
 */
export function extractDocument(document: StatementDocument, credential?: string): ExtractionResult {
    const pages = openPages(document, credential);
    const parser = parserForSource(detectSourceKind(pages));
    if (parser) {
        return parser.extract(document, credential);
    }

    const attempts: string[] = [];
    for (const candidate of getSupportedParsers()) {
        try {
            const result = candidate.extract(document, credential);
            if (result.transactions.length > 0) {
                return result;
            }
            attempts.push(`${candidate.name}: no transactions`);
        } catch (err) {
            if (err instanceof ExtractionError && err.reason === 'credential') {
                throw err;
            }
            attempts.push(`${candidate.name}: ${errorMessage(err)}`);
        }
    }

    throw new ExtractionError(
        document.path,
        `Could not determine statement source (${attempts.join('; ')})`,
        'unsupported'
    );
}

/**
 * Import every document, skipping content already seen.
 * Never throws for a single document's failure.
 */
export function importAll(documents: readonly StatementDocument[], options: ImportOptions = {}): BatchResult {
    const known = new Set(options.knownHashes ?? []);
    const seenInBatch = new Map<string, string>();
    const results: FileExtraction[] = [];
    const errors: BatchError[] = [];
    const skippedFiles: SkippedFile[] = [];
    const total = documents.length;

    documents.forEach((document, idx) => {
        const report = (status: ImportStatus): void => {
            options.onProgress?.(idx + 1, total, document.path, status);
        };

        const hash = hashContent(document.content);
        const firstPath = seenInBatch.get(hash);
        if (firstPath !== undefined || known.has(hash)) {
            skippedFiles.push({
                path: document.path,
                hash,
                reason: firstPath !== undefined ? `Duplicate of ${firstPath} in this batch` : 'Previously imported',
            });
            report('skipped');
            return;
        }

        try {
            const result = extractDocument(document, options.credentials?.[document.path]);
            seenInBatch.set(hash, document.path);
            results.push({ ...result, source_file: document.path, content_hash: hash });
            report('success');
        } catch (err) {
            errors.push({ path: document.path, message: errorMessage(err) });
            report('failed');
        }
    });

    const averageQuality = results.length === 0
        ? 0
        : results.reduce((sum, r) => sum + r.quality_score, 0) / results.length;

    return {
        total_files: total,
        successful: results.length,
        failed: errors.length,
        skipped: skippedFiles.length,
        average_quality_score: averageQuality,
        results,
        errors,
        skipped_files: skippedFiles,
        imported_hashes: [...seenInBatch.keys()],
    };
}

/**
 * Identify the transactions of one extracted file.
 * Ids hash against the account number, or the file when there is none.
 */
export function toLedgerTransactions(result: FileExtraction): LedgerTransaction[] {
    const account = result.account_number ?? result.source_file;

    const transactions = result.transactions.map((txn): LedgerTransaction => ({
        id: generateTxnId(txn.date, txn.description, new Decimal(txn.amount), account),
        date: txn.date,
        description: txn.description,
        amount: txn.amount,
        reference: txn.reference,
        source: result.source_kind,
        source_file: result.source_file,
        confidence: txn.confidence,
    }));

    return resolveCollisions(transactions);
}
