import { errorMessage } from '@ledger-recon/core';
import type { PipelineStep } from '../types.js';
import { saveManifest, saveResolver } from '../../store/records.js';

/**
 * Step 7: Save
 * Writes resolutions and records the imported files in the manifest.
 * Nothing is written in a dry run or after a fatal error.
 */
export const saveState: PipelineStep = async (state) => {
    if (state.options.dryRun) {
        state.warnings.push('Dry run: Skipping save.');
        return state;
    }

    if (state.errors.some(e => e.fatal)) {
        state.warnings.push('Save skipped due to previous fatal errors.');
        return state;
    }

    const importedAt = new Date().toISOString();
    for (const result of state.batch?.results ?? []) {
        state.manifest.files[result.content_hash] = {
            path: result.source_file,
            imported_at: importedAt,
            transaction_count: result.transactions.length,
        };
    }

    try {
        await saveResolver(state.workspace.config.resolutionsPath, state.resolver);
        await saveManifest(state.workspace.config.manifestPath, state.manifest);
    } catch (err) {
        state.errors.push({
            step: 'save',
            message: `Failed to save workspace state: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
