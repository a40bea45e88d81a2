import { errorMessage } from '@ledger-recon/core';
import type { PipelineStep } from '../types.js';
import { loadManifest, loadResolver, loadRuleStore } from '../../store/records.js';

/**
 * Step 1: Workspace State
 * Loads the import manifest, learned rules and earlier resolutions.
 * Malformed entries are reported as warnings; an unreadable file is fatal.
 */
export const loadWorkspaceState: PipelineStep = async (state) => {
    const { config } = state.workspace;

    try {
        state.manifest = await loadManifest(config.manifestPath);

        const rules = await loadRuleStore(config.learnedRulesPath, state.rules);
        for (const error of rules.errors) {
            state.warnings.push(`[learned-rules.json] ${error}`);
        }

        const resolutions = await loadResolver(config.resolutionsPath, state.resolver);
        for (const error of resolutions.errors) {
            state.warnings.push(`[resolutions.json] ${error}`);
        }
    } catch (err) {
        state.errors.push({
            step: 'load-state',
            message: `Failed to load workspace state: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
