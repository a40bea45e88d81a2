import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { z } from 'zod';
import { createMemoryDocument, createSpreadsheetDocument, ExtractionError, errorMessage } from '@ledger-recon/core';
import type { StatementDocument } from '@ledger-recon/core';

/**
 * Statement files the import step can open.
 *
 * Spreadsheet exports are read with SheetJS. A `.json` file holds pages an
 * upstream extractor already produced: { pages: [{ text, tables }] }.
 */
export const SPREADSHEET_EXTENSIONS = ['.csv', '.xls', '.xlsx'] as const;
export const EXTRACTED_PAGES_EXTENSION = '.json';

const ExtractedPagesSchema = z.object({
    pages: z.array(z.object({
        text: z.string().default(''),
        tables: z.array(z.array(z.array(z.string()))).default([]),
    })),
});

export function isSupportedStatementFile(filename: string): boolean {
    const ext = extname(filename).toLowerCase();
    return ext === EXTRACTED_PAGES_EXTENSION || SPREADSHEET_EXTENSIONS.some(e => e === ext);
}

function toArrayBuffer(buffer: Buffer): ArrayBuffer {
    const copy = new ArrayBuffer(buffer.byteLength);
    new Uint8Array(copy).set(buffer);
    return copy;
}

/**
 * Reads a statement file into a document.
 *
 * @throws ExtractionError when an extracted-pages file is malformed
 */
export async function loadStatementDocument(filePath: string): Promise<StatementDocument> {
    const buffer = await readFile(filePath);
    const data = toArrayBuffer(buffer);

    if (extname(filePath).toLowerCase() !== EXTRACTED_PAGES_EXTENSION) {
        return createSpreadsheetDocument(filePath, data);
    }

    let json: unknown;
    try {
        json = JSON.parse(buffer.toString('utf-8'));
    } catch (err) {
        throw new ExtractionError(filePath, `Cannot read extracted pages: ${errorMessage(err)}`, 'corrupt');
    }

    const parsed = ExtractedPagesSchema.safeParse(json);
    if (!parsed.success) {
        throw new ExtractionError(
            filePath,
            `Cannot read extracted pages: ${parsed.error.issues.map(i => i.message).join(', ')}`,
            'corrupt'
        );
    }

    return createMemoryDocument(filePath, parsed.data.pages, { content: data });
}
