import type { PipelineStep } from '../types.js';

/**
 * Step 6: Auto-Resolution
 * Settles high-confidence duplicate pairs; the rest stay pending for review.
 */
export const resolveDuplicates: PipelineStep = async (state) => {
    const { auto_resolve: autoResolve } = state.settings;
    if (!autoResolve.enabled) {
        return state;
    }

    state.statistics.autoResolved = state.resolver.autoResolve(state.duplicates, {
        keepFirst: autoResolve.keep_first,
        minConfidence: autoResolve.min_confidence,
    });
    state.duplicates = state.resolver.pendingMatches(state.duplicates);

    return state;
};
