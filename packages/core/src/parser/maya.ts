/**
 * Maya statement parser (savings and wallet accounts).
 *
 * Format:
 * - Table columns: Date | Description | Amount | Balance
 * - Date format: "YYYY-MM-DD", or a slash date whose field order varies
 * - Amount format: "PHP 1,234.56", "₱1,234.56" or "-1,234.56" (signed)
 * - No account header, so no metadata penalties
 */

import type { ExtractionResult } from '../types/index.js';
import type { StatementDocument } from '../document/types.js';
import { parseIsoDate, parseSlashDate, formatIsoDate } from '../utils/date-parse.js';
import { parseAmount, formatAmount } from '../utils/amount-parse.js';
import { cleanDescription } from '../utils/normalize.js';
import { openPages, collectRows, extractRows, cell, readBalance, rowConfidence } from './rows.js';
import type { ParsedRow } from './rows.js';
import { calculateQualityScore } from './quality.js';
import type { StatementParser } from './types.js';

const MAYA_MIN_COLUMNS = 3;

/**
 * Parse a Maya date. Ambiguous slash dates are read month-first and
 * reported through onAmbiguous.
 */
export function parseMayaDate(raw: string, onAmbiguous: (message: string) => void): Date {
    const iso = parseIsoDate(raw);
    if (iso) {
        return iso;
    }

    const slash = parseSlashDate(raw);
    if (slash) {
        if (slash.ambiguous) {
            onAmbiguous(
                `Ambiguous date "${raw.trim()}" read as MM/DD/YYYY (${formatIsoDate(slash.date)})`
            );
        }
        return slash.date;
    }

    throw new Error(`Invalid date format: ${raw}`);
}

/**
 * Parse a Maya statement document.
 *
 * @throws ExtractionError when the document cannot be opened
 */
export function parseMaya(document: StatementDocument, credential?: string): ExtractionResult {
    const pages = openPages(document, credential);
    const firstPage = (pages[0]?.text ?? '').toLowerCase();
    const sourceKind = firstPage.includes('savings') ? 'maya_savings' : 'maya_wallet';

    const warnings: string[] = [];
    const parseMayaRow = (cells: string[]): ParsedRow => {
        const date = parseMayaDate(cell(cells, 0), message => warnings.push(message));
        const description = cleanDescription(cell(cells, 1));
        const amount = parseAmount(cell(cells, 2));

        return {
            transaction: {
                date: formatIsoDate(date),
                description,
                amount: formatAmount(amount),
                confidence: rowConfidence(description),
            },
            balance: readBalance(cell(cells, 3)),
        };
    };

    const extraction = extractRows(collectRows(pages, MAYA_MIN_COLUMNS), parseMayaRow);

    return {
        transactions: extraction.transactions,
        quality_score: calculateQualityScore(extraction.transactions),
        source_kind: sourceKind,
        parsing_errors: extraction.parsingErrors,
        warnings,
        opening_balance: extraction.openingBalance,
        closing_balance: extraction.closingBalance,
    };
}

export const mayaParser: StatementParser = {
    name: 'maya',
    extract: parseMaya,
};
