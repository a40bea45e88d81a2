import { Categorizer, categorizeAll } from '@ledger-recon/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 4: Categorization
 * Runs the layered categorizer (learned rules first) over every transaction.
 */
export const categorizeTransactions: PipelineStep = async (state) => {
    const categorizer = new Categorizer({ learnedRules: state.rules });
    const result = categorizeAll(state.transactions, categorizer);

    state.categorizations = result.results;
    state.categorizationStats = result.stats;

    return state;
};
