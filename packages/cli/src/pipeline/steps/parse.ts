import { basename } from 'node:path';
import { claimUniqueIds, errorMessage, importAll, toLedgerTransactions } from '@ledger-recon/core';
import type { FileExtraction, LedgerTransaction, StatementDocument } from '@ledger-recon/core';
import type { PipelineStep } from '../types.js';
import { promptContinue } from '../../utils/prompt.js';
import { log } from '../../utils/console.js';
import { credentialsByPath } from '../../workspace/config.js';
import { loadStatementDocument } from '../../store/documents.js';

/**
 * Step 3: Parsing
 * Reads statement files and runs the batch import over them. Files already
 * in the import manifest are skipped by content hash.
 */
export const parseFiles: PipelineStep = async (state) => {
    const documents: StatementDocument[] = [];

    for (const file of state.files) {
        try {
            documents.push(await loadStatementDocument(file.path));
        } catch (err) {
            state.errors.push({
                step: 'parse',
                message: `Failed to read ${file.filename}: ${errorMessage(err)}`,
                fatal: false,
                error: err,
            });
        }
    }

    const batch = importAll(documents, {
        credentials: credentialsByPath(state.settings, state.files),
        knownHashes: Object.keys(state.manifest.files),
        onProgress: (current, total, path, status) => log(`  [${current}/${total}] ${basename(path)}: ${status}`),
    });
    state.batch = batch;

    for (const failure of batch.errors) {
        state.errors.push({
            step: 'parse',
            message: `Failed to parse ${basename(failure.path)}: ${failure.message}`,
            fatal: false,
        });
    }

    for (const skipped of batch.skipped_files) {
        state.warnings.push(`[${basename(skipped.path)}] Skipped: ${skipped.reason}`);
    }

    // Overlapping exports of one account repeat ids; later copies get a
    // suffix and go through duplicate detection like any other pair.
    const takenIds = new Set<string>();
    const accepted: FileExtraction[] = [];
    for (const result of batch.results) {
        const filename = basename(result.source_file);
        for (const warning of result.warnings) {
            state.warnings.push(`[${filename}] ${warning}`);
        }
        for (const rowError of result.parsing_errors) {
            state.warnings.push(`[${filename}] ${rowError}`);
        }

        let ledger: LedgerTransaction[];
        let transactions: LedgerTransaction[];
        const claimed = new Set(takenIds);
        try {
            ledger = toLedgerTransactions(result);
            transactions = claimUniqueIds(ledger, claimed);
        } catch (err) {
            state.errors.push({
                step: 'parse',
                message: `Failed to identify transactions in ${filename}: ${errorMessage(err)}`,
                fatal: false,
                error: err,
            });
            continue;
        }

        claimed.forEach(id => takenIds.add(id));
        state.statistics.overlapCount += transactions.filter((txn, idx) => txn.id !== ledger[idx]?.id).length;
        state.transactions.push(...transactions);
        accepted.push(result);
    }

    // Files whose transactions could not be identified stay out of the manifest
    if (accepted.length < batch.results.length) {
        const rejected = batch.results.length - accepted.length;
        const rejectedHashes = new Set(
            batch.results.filter(r => !accepted.includes(r)).map(r => r.content_hash)
        );
        state.batch = {
            ...batch,
            results: accepted,
            successful: batch.successful - rejected,
            failed: batch.failed + rejected,
            imported_hashes: batch.imported_hashes.filter(h => !rejectedHashes.has(h)),
        };
    }

    if (state.statistics.overlapCount > 0) {
        state.warnings.push(
            `${state.statistics.overlapCount} transactions already present in an earlier file were renamed for duplicate review.`
        );
    }

    if (state.errors.some(e => e.step === 'parse')) {
        const errorCount = state.errors.filter(e => e.step === 'parse').length;
        const shouldContinue = await promptContinue(
            `\n⚠️  ${errorCount} file(s) failed to parse. Some data will be missing.`,
            state.options
        );

        if (!shouldContinue) {
            state.errors.push({
                step: 'parse',
                message: 'Aborted by user after parse errors.',
                fatal: true,
            });
        }
    }

    if (state.transactions.length === 0 && state.errors.length === 0) {
        state.warnings.push('No transactions found in any of the files.');
    }

    return state;
};
