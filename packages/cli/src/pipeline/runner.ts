import { DuplicateResolver, LearnedRuleStore } from '@ledger-recon/core';
import type { Settings } from '@ledger-recon/shared';
import type { PipelineState, PipelineStep } from './types.js';
import { loadWorkspaceState } from './steps/load-state.js';
import { detectFiles } from './steps/detect.js';
import { parseFiles } from './steps/parse.js';
import { categorizeTransactions } from './steps/categorize.js';
import { detectDuplicates } from './steps/dedup.js';
import { resolveDuplicates } from './steps/resolve.js';
import { saveState } from './steps/save.js';
import { emptyManifest } from '../store/records.js';
import type { Workspace, ImportCommandOptions } from '../types.js';

export const PIPELINE_STEPS: ReadonlyArray<{ name: string; fn: PipelineStep }> = [
    { name: 'Workspace State', fn: loadWorkspaceState },
    { name: 'File Detection', fn: detectFiles },
    { name: 'Parsing', fn: parseFiles },
    { name: 'Categorization', fn: categorizeTransactions },
    { name: 'Duplicate Detection', fn: detectDuplicates },
    { name: 'Auto-Resolution', fn: resolveDuplicates },
    { name: 'Save', fn: saveState },
];

export function createPipelineState(
    workspace: Workspace,
    settings: Settings,
    options: ImportCommandOptions
): PipelineState {
    return {
        workspace,
        options,
        settings,
        rules: new LearnedRuleStore(),
        resolver: new DuplicateResolver(),
        manifest: emptyManifest(),
        files: [],
        transactions: [],
        categorizations: [],
        duplicates: [],
        statistics: {
            overlapCount: 0,
            duplicatesFound: 0,
            autoResolved: 0,
        },
        warnings: [],
        errors: [],
    };
}

/**
 * Orchestrates the execution of the import pipeline.
 * Runs each step sequentially, stopping if a fatal error occurs.
 */
export async function runPipeline(
    workspace: Workspace,
    settings: Settings,
    options: ImportCommandOptions,
    steps: ReadonlyArray<{ name: string; fn: PipelineStep }> = PIPELINE_STEPS
): Promise<PipelineState> {
    let state = createPipelineState(workspace, settings, options);

    for (let i = 0; i < steps.length; i++) {
        const step = steps[i];
        console.log(`\n→ Step ${i + 1}/${steps.length}: ${step.name}...`);

        state = await step.fn(state);

        if (state.errors.some(e => e.fatal)) {
            console.error(`\n✖ Fatal error in step "${step.name}". Stopping.`);
            break;
        }
    }

    return state;
}
