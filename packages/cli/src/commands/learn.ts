import { validatePattern, checkPatternCollision, loadDefaultTaxonomy, LearnedRuleStore, errorMessage } from '@ledger-recon/core';
import { detectWorkspaceRoot } from '../workspace/detect.js';
import { resolveWorkspace } from '../workspace/paths.js';
import { loadRuleStore, saveRuleStore } from '../store/records.js';
import { success, log, arrow, warn, info, fail } from '../utils/console.js';
import type { LearnCommandOptions } from '../types.js';

export async function learnRule(pattern: string, category: string, options: LearnCommandOptions): Promise<void> {
    const validation = validatePattern(pattern);
    if (!validation.valid) {
        fail(validation.errors.join(', '));
        process.exit(1);
    }

    const taxonomy = loadDefaultTaxonomy();
    if (!taxonomy.hasCategory(category)) {
        fail(`Unknown category "${category}".`);
        info(`Known categories: ${taxonomy.getCategoryNames().join(', ')}`);
        process.exit(1);
    }

    // 1. Workspace detection
    const root = options.workspace || detectWorkspaceRoot();
    if (!root) {
        fail('Workspace not found.');
        process.exit(1);
    }
    const workspace = resolveWorkspace(root);
    const rulesPath = workspace.config.learnedRulesPath;

    const store = new LearnedRuleStore();
    try {
        const report = await loadRuleStore(rulesPath, store);
        for (const error of report.errors) {
            warn(`[learned-rules.json] ${error}`);
        }
    } catch (err) {
        fail(`Cannot load learned rules: ${errorMessage(err)}`);
        process.exit(1);
    }

    // Overlapping patterns are allowed; the exact pattern wins at lookup.
    const collision = checkPatternCollision(pattern, store.getRules());
    if (collision.hasCollision) {
        warn('Pattern overlaps existing rules:');
        for (const existing of collision.collidingPatterns) {
            log(`  "${existing}"`);
        }
    }

    // 2. Learn and save
    log(`Saving learned rule to: ${rulesPath}`);

    try {
        const rule = store.learn(pattern, category, { normalizedMerchant: options.merchant });
        await saveRuleStore(rulesPath, store);

        success('Rule learned!');
        arrow(`Pattern:  "${rule.pattern}"`);
        arrow(`Category: ${rule.category}`);
        if (rule.normalized_merchant) {
            arrow(`Merchant: ${rule.normalized_merchant}`);
        }
    } catch (err) {
        fail(`Failed to learn rule: ${errorMessage(err)}`);
        process.exit(1);
    }
}
