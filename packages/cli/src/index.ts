#!/usr/bin/env node
/**
 * Ledger Recon CLI
 *
 * The CLI owns all file I/O and console output; the core receives documents
 * and returns data.
 */

import { importStatements } from './commands/import.js';
import { learnRule } from './commands/learn.js';
import { errorMessage } from '@ledger-recon/core';
import { parseArgs, type ParsedArgs } from './args.js';
import { fail } from './utils/console.js';
import type { ImportCommandOptions, LearnCommandOptions } from './types.js';

const USAGE = [
    'Ledger Recon CLI v1.0.0',
    '',
    'Usage:',
    '  ledger-recon import [--workspace DIR] [--dry-run] [--yes]',
    '  ledger-recon learn <pattern> <category> [--merchant NAME] [--workspace DIR]',
    '',
    'Example:',
    '  ledger-recon learn "JOLLIBEE" "Food & Dining" --merchant Jollibee',
].join('\n');

async function main(): Promise<void> {
    let args: ParsedArgs;
    try {
        args = parseArgs(process.argv.slice(2));
    } catch (err) {
        fail(errorMessage(err));
        console.log(USAGE);
        process.exit(1);
    }

    switch (args.command) {
        case 'import': {
            const options: ImportCommandOptions = {
                dryRun: args.flags.has('--dry-run'),
                yes: args.flags.has('--yes'),
                workspace: args.values.get('--workspace'),
            };
            await importStatements(options);
            break;
        }
        case 'learn': {
            const [pattern, category] = args.positionals;
            if (pattern === undefined || category === undefined) {
                fail('learn needs a pattern and a category.');
                console.log(USAGE);
                process.exit(1);
            }
            const options: LearnCommandOptions = {
                merchant: args.values.get('--merchant'),
                workspace: args.values.get('--workspace'),
            };
            await learnRule(pattern, category, options);
            break;
        }
        default:
            console.log(USAGE);
            process.exit(args.command === undefined ? 0 : 1);
    }
}

main().catch((err: unknown) => {
    console.error('Unexpected error:', errorMessage(err));
    process.exit(1);
});
