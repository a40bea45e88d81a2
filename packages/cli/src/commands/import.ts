import { errorMessage } from '@ledger-recon/core';
import type { Settings } from '@ledger-recon/shared';
import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace } from '../workspace/paths.js';
import { loadSettings } from '../workspace/config.js';
import { runPipeline } from '../pipeline/runner.js';
import type { PipelineState } from '../pipeline/types.js';
import { log, success, warn, info, arrow, fail } from '../utils/console.js';
import type { ImportCommandOptions } from '../types.js';

/**
 * Prints the end-of-run summary lines.
 */
export function printSummary(state: PipelineState): void {
    const batch = state.batch;
    if (batch) {
        arrow(`Files: ${batch.successful} imported, ${batch.failed} failed, ${batch.skipped} skipped`);
        arrow(`Average quality: ${(batch.average_quality_score * 100).toFixed(1)}%`);
    }
    arrow(`Total transactions: ${state.transactions.length}`);
    arrow(`Duplicates found: ${state.statistics.duplicatesFound} (auto-resolved: ${state.statistics.autoResolved})`);
    if (state.duplicates.length > 0) {
        arrow(`Duplicate pairs pending review: ${state.duplicates.length}`);
    }
    if (state.categorizationStats) {
        arrow(`Needs review: ${state.categorizationStats.needsReview}`);
    }
}

export async function importStatements(options: ImportCommandOptions): Promise<void> {
    log('\nLedger Recon - Importing statements');

    // 1. Workspace detection
    arrow('Detecting workspace...');
    const root = options.workspace || detectWorkspaceRoot();
    if (!root) {
        fail('Workspace not found.');
        console.error('Expected "config/settings.yaml" in the workspace root.');
        process.exit(1);
    }
    const workspace = resolveWorkspace(root);
    success(`Workspace: ${workspace.root}`);

    // 2. Settings
    let settings: Settings;
    try {
        settings = loadSettings(workspace);
    } catch (err) {
        fail(`Failed to load settings. ${errorMessage(err)}`);
        process.exit(1);
    }

    // 3. Run Pipeline
    const state = await runPipeline(workspace, settings, options);

    // 4. Report Final Status
    log('\n--- Import Summary ---');

    for (const w of state.warnings) {
        warn(w);
    }

    if (state.errors.length > 0) {
        for (const e of state.errors) {
            console.error(`✖ ERROR [${e.step}]: ${e.message}`);
        }
        if (state.errors.some(e => e.fatal)) {
            log('\n✖ Import failed with fatal errors.');
            process.exit(1);
        }
    }

    success('Import complete.');
    printSummary(state);

    if (state.options.dryRun) {
        info('Dry run: no files were written.');
    } else {
        arrow(`Resolutions saved to: ${workspace.config.resolutionsPath}`);
    }
}
