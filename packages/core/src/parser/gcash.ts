/**
 * GCash e-wallet statement parser.
 *
 * Format:
 * - Table columns: Date | Description | Reference | Debit | Credit | Balance
 * - Date format: "MMM DD, YYYY" (e.g., "Nov 15, 2024")
 * - Amount format: "₱1,234.56" or "1234.56"
 * - Header text carries the mobile number, holder name and statement period
 */

import { EXTRACTION } from '../types/index.js';
import type { ExtractionResult } from '../types/index.js';
import type { StatementDocument } from '../document/types.js';
import { parseMonthNameDate, parseIsoDate, formatIsoDate, buildUtcDate, monthFromName } from '../utils/date-parse.js';
import { parseDebitCredit, formatAmount } from '../utils/amount-parse.js';
import { cleanDescription } from '../utils/normalize.js';
import { openPages, collectRows, extractRows, cell, readBalance, rowConfidence } from './rows.js';
import type { ParsedRow } from './rows.js';
import { calculateQualityScore, applyQualityPenalties } from './quality.js';
import type { StatementMetadata } from './quality.js';
import type { StatementParser } from './types.js';

const GCASH_MIN_COLUMNS = 4;

function parseGcashRow(cells: string[]): ParsedRow {
    const rawDate = cell(cells, 0);
    // Spreadsheet date cells arrive as ISO dates
    const date = parseMonthNameDate(rawDate) ?? parseIsoDate(rawDate);
    if (!date) {
        throw new Error(`Invalid date format: ${rawDate}`);
    }

    const description = cleanDescription(cell(cells, 1));
    const reference = cell(cells, 2);
    const amount = parseDebitCredit(cell(cells, 3), cell(cells, 4));

    return {
        transaction: {
            date: formatIsoDate(date),
            description,
            amount: formatAmount(amount),
            reference: reference || undefined,
            confidence: rowConfidence(description, reference ? 0 : EXTRACTION.MISSING_REFERENCE_PENALTY),
        },
        balance: readBalance(cell(cells, 5)),
    };
}

/**
 * Account number, holder and period from the first page text.
 */
export function extractGcashMetadata(text: string): StatementMetadata {
    const metadata: StatementMetadata = {};

    const mobile = text.match(/09\d{2}[\s-]?\d{3}[\s-]?\d{4}/);
    if (mobile) {
        metadata.account_number = mobile[0].replace(/[\s-]/g, '');
    }

    const name = text.match(/Name:[ \t]*([A-Za-z][A-Za-z \t]+?)[ \t]*(?:\n|$)/i);
    if (name) {
        metadata.account_holder = name[1].trim();
    }

    const period = text.match(
        /Statement\s*Period:\s*([A-Za-z]{3})\s+(\d{1,2})\s*-\s*([A-Za-z]{3})\s+(\d{1,2}),?\s*(\d{4})/i
    );
    if (period) {
        const year = parseInt(period[5], 10);
        const startMonth = monthFromName(period[1]);
        const endMonth = monthFromName(period[3]);
        if (startMonth !== null && endMonth !== null) {
            const start = buildUtcDate(year, startMonth, parseInt(period[2], 10));
            const end = buildUtcDate(year, endMonth, parseInt(period[4], 10));
            if (start && end) {
                metadata.period_start = formatIsoDate(start);
                metadata.period_end = formatIsoDate(end);
            }
        }
    }

    return metadata;
}

/**
 * Parse a GCash statement document.
 *
 * @throws ExtractionError when the document cannot be opened
 */
export function parseGcash(document: StatementDocument, credential?: string): ExtractionResult {
    const pages = openPages(document, credential);
    const metadata = extractGcashMetadata(pages[0]?.text ?? '');
    const extraction = extractRows(collectRows(pages, GCASH_MIN_COLUMNS), parseGcashRow);

    const warnings: string[] = [];
    if (!metadata.account_number) {
        warnings.push('Could not extract account number from statement');
    }
    if (!metadata.period_start || !metadata.period_end) {
        warnings.push('Could not extract statement period dates');
    }

    return {
        transactions: extraction.transactions,
        quality_score: applyQualityPenalties(calculateQualityScore(extraction.transactions), metadata),
        source_kind: 'gcash',
        parsing_errors: extraction.parsingErrors,
        warnings,
        opening_balance: extraction.openingBalance,
        closing_balance: extraction.closingBalance,
        ...metadata,
    };
}

export const gcashParser: StatementParser = {
    name: 'gcash',
    extract: parseGcash,
};
