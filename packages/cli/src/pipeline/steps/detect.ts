import { readdir, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { errorMessage } from '@ledger-recon/core';
import type { PipelineStep, InputFile } from '../types.js';
import { isSupportedStatementFile } from '../../store/documents.js';

/**
 * Step 2: File Detection
 * Lists statement files in the imports directory, sorted by name.
 */
export const detectFiles: PipelineStep = async (state) => {
    const importsPath = state.workspace.imports;

    try {
        const entries = (await readdir(importsPath)).sort();
        const files: InputFile[] = [];

        for (const filename of entries) {
            // Skip hidden and temporary files
            if (filename.startsWith('.') || filename.startsWith('~')) {
                continue;
            }

            const filePath = join(importsPath, filename);
            const s = await stat(filePath);

            if (!s.isFile()) {
                continue;
            }

            if (!isSupportedStatementFile(filename)) {
                state.warnings.push(`File skipped (unsupported type): ${filename}`);
                continue;
            }

            files.push({ path: filePath, filename });
        }

        state.files = files;

        if (files.length === 0) {
            state.errors.push({
                step: 'detect',
                message: `No statement files found in ${importsPath}. Expected .csv, .xls, .xlsx or extracted .json pages.`,
                fatal: true,
            });
        }
    } catch (err) {
        state.errors.push({
            step: 'detect',
            message: `Error scanning directory ${importsPath}: ${errorMessage(err)}`,
            fatal: true,
            error: err,
        });
    }

    return state;
};
