import type { BatchResult, ImportManifest, LedgerTransaction, CategorizationResult, Settings } from '@ledger-recon/shared';
import type {
    CategorizationStats,
    DuplicateMatch,
    DuplicateResolver,
    LearnedRuleStore,
} from '@ledger-recon/core';
import type { Workspace, ImportCommandOptions } from '../types.js';

/**
 * A statement file discovered in the imports directory.
 */
export interface InputFile {
    path: string;
    filename: string;
}

/**
 * Representation of an error occurring within a pipeline step.
 */
export interface PipelineError {
    step: string;
    message: string;
    fatal: boolean;
    error?: unknown;
}

export interface PipelineStatistics {
    /** Transactions renamed because an earlier file already had the same id. */
    overlapCount: number;
    duplicatesFound: number;
    autoResolved: number;
}

/**
 * Central state object passed through the import pipeline.
 */
export interface PipelineState {
    workspace: Workspace;
    options: ImportCommandOptions;
    settings: Settings;
    rules: LearnedRuleStore;
    resolver: DuplicateResolver;
    manifest: ImportManifest;

    // Accumulated during pipeline execution
    files: InputFile[];
    batch?: BatchResult;
    transactions: LedgerTransaction[];
    /** One result per transaction, same order. */
    categorizations: CategorizationResult[];
    categorizationStats?: CategorizationStats;
    duplicates: DuplicateMatch<LedgerTransaction>[];

    statistics: PipelineStatistics;
    warnings: string[];
    errors: PipelineError[];
}

/**
 * Function signature for a discrete pipeline step.
 */
export type PipelineStep = (state: PipelineState) => Promise<PipelineState>;
