import { DuplicateDetector } from '@ledger-recon/core';
import type { PipelineStep } from '../types.js';

/**
 * Step 5: Duplicate Detection
 * Compares every pair of transactions once all files are collected.
 * Pairs settled by an earlier run are left out.
 */
export const detectDuplicates: PipelineStep = async (state) => {
    const detector = new DuplicateDetector({
        timeThresholdHours: state.settings.dedup.time_threshold_hours,
        amountThresholdPercent: state.settings.dedup.amount_threshold_percent,
    });

    const matches = detector.findDuplicates(state.transactions);
    state.duplicates = state.resolver.pendingMatches(matches);
    state.statistics.duplicatesFound = state.duplicates.length;

    return state;
};
