/**
 * Ledger Recon CLI - Core Types
 */

export interface ImportCommandOptions {
    dryRun: boolean;
    yes: boolean;
    workspace?: string;
}

export interface LearnCommandOptions {
    merchant?: string;
    workspace?: string;
}

export interface WorkspaceConfig {
    settingsPath: string;
    learnedRulesPath: string;
    resolutionsPath: string;
    manifestPath: string;
}

export interface Workspace {
    root: string;
    imports: string;
    config: WorkspaceConfig;
}
