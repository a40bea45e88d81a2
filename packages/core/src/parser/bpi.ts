/**
 * BPI (Bank of the Philippine Islands) statement parser.
 *
 * Format:
 * - Table columns: Date | Description | Debit | Credit | Balance
 * - Date format: "MM/DD/YYYY" (e.g., "11/15/2024")
 * - No reference numbers
 *
 * Savings-account statements print transactions as text lines instead of
 * tables ("Sep 29 INSTAPAY TRANSFER 1,000.00 5,230.50"). When the tables
 * yield nothing usable the page text is parsed instead.
 */

import { Decimal } from 'decimal.js';
import { EXTRACTION } from '../types/index.js';
import type { ExtractionResult, RawTransaction } from '../types/index.js';
import type { DocumentPage, StatementDocument } from '../document/types.js';
import { parseMdyDate, parseIsoDate, formatIsoDate, buildUtcDate, monthFromName } from '../utils/date-parse.js';
import { parseAmount, parseDebitCredit, formatAmount } from '../utils/amount-parse.js';
import { cleanDescription } from '../utils/normalize.js';
import { errorMessage } from '../errors.js';
import { openPages, collectRows, extractRows, cell, readBalance, rowConfidence } from './rows.js';
import type { ParsedRow } from './rows.js';
import { calculateQualityScore, applyQualityPenalties } from './quality.js';
import type { StatementMetadata } from './quality.js';
import type { StatementParser } from './types.js';

const BPI_MIN_COLUMNS = 4;
const MAX_TEXT_DESCRIPTION = 200;

const TEXT_LINE = /^(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)\s+(\d{1,2})\s+(.+)$/;
const TEXT_NUMBER = /^\d{1,3}(,\d{3})*(\.\d{2})?$/;
const DEBIT_KEYWORDS = ['transfer fee', 'payment', 'bills payment', 'tax withheld'];
const CREDIT_KEYWORDS = ['from:', 'interest earned', 'cash in'];

function parseBpiRow(cells: string[]): ParsedRow {
    const rawDate = cell(cells, 0);
    // Spreadsheet date cells arrive as ISO dates
    const date = parseMdyDate(rawDate) ?? parseIsoDate(rawDate);
    if (!date) {
        throw new Error(`Invalid date format: ${rawDate}`);
    }

    const description = cleanDescription(cell(cells, 1));
    const amount = parseDebitCredit(cell(cells, 2), cell(cells, 3));

    return {
        transaction: {
            date: formatIsoDate(date),
            description,
            amount: formatAmount(amount),
            confidence: rowConfidence(description),
        },
        balance: readBalance(cell(cells, 4)),
    };
}

/**
 * Sign a text-line amount from keywords in its description.
 * Unrecognized descriptions keep the amount as printed.
 */
function signTextAmount(amount: Decimal, description: string): Decimal {
    const lower = description.toLowerCase();
    if (DEBIT_KEYWORDS.some(kw => lower.includes(kw))) {
        return amount.abs().negated();
    }
    if (CREDIT_KEYWORDS.some(kw => lower.includes(kw))) {
        return amount.abs();
    }
    if (lower.includes('instapay transfer')) {
        return amount.abs().negated();
    }
    return amount;
}

/**
 * Parse "MMM DD description amount balance" lines from one page.
 */
export function parseBpiTextPage(
    text: string,
    pageNumber: number,
    defaultYear: number
): { transactions: RawTransaction[]; errors: string[] } {
    const transactions: RawTransaction[] = [];
    const errors: string[] = [];

    const yearMatch = text.match(/PERIOD COVERED.*?(\d{4})/);
    const year = yearMatch ? parseInt(yearMatch[1], 10) : defaultYear;

    text.split('\n').forEach((line, lineIdx) => {
        const match = line.trim().match(TEXT_LINE);
        if (!match) return;

        const [, monthName, day, rest] = match;
        const numbers: string[] = [];
        const descParts: string[] = [];
        for (const part of rest.split(/\s+/)) {
            if (TEXT_NUMBER.test(part)) {
                numbers.push(part);
            } else if (numbers.length === 0) {
                descParts.push(part);
            }
        }

        // Need at least amount + balance
        if (numbers.length < 2) return;

        try {
            const month = monthFromName(monthName);
            const date = month === null ? null : buildUtcDate(year, month, parseInt(day, 10));
            if (!date) {
                throw new Error(`Invalid date: ${monthName} ${day} ${year}`);
            }

            const description = (descParts.join(' ') || 'Transaction').slice(0, MAX_TEXT_DESCRIPTION);
            const amount = signTextAmount(parseAmount(numbers[numbers.length - 2]), description);

            transactions.push({
                date: formatIsoDate(date),
                description,
                amount: formatAmount(amount),
                confidence: EXTRACTION.TEXT_FALLBACK_CONFIDENCE,
            });
        } catch (err) {
            errors.push(`Page ${pageNumber}, line ${lineIdx + 1}: ${errorMessage(err)}`);
        }
    });

    return { transactions, errors };
}

/**
 * Account number (masked to the last 4 digits), holder and period.
 */
export function extractBpiMetadata(text: string): StatementMetadata {
    const metadata: StatementMetadata = {};

    const account = text.match(/(?:Account\s*(?:Number|No\.?)|Acct\s*No\.?)[\s:]*(\d[\d\s-]+\d)/i);
    if (account) {
        const digits = account[1].replace(/[\s-]/g, '');
        if (digits.length >= 4) {
            metadata.account_number = `****${digits.slice(-4)}`;
        }
    }

    const name = text.match(/Account\s*Name:[ \t]*([A-Za-z][A-Za-z \t]+?)[ \t]*(?:\n|$)/i);
    if (name) {
        metadata.account_holder = name[1].trim();
    }

    const period = text.match(
        /(?:Statement\s*Period|PERIOD\s*COVERED)[\s:]*([A-Za-z]+)\s+(\d{1,2}),?\s*(\d{4})\s*[-–]\s*([A-Za-z]+)\s+(\d{1,2}),?\s*(\d{4})/i
    );
    if (period) {
        const startMonth = monthFromName(period[1]);
        const endMonth = monthFromName(period[4]);
        if (startMonth !== null && endMonth !== null) {
            const start = buildUtcDate(parseInt(period[3], 10), startMonth, parseInt(period[2], 10));
            const end = buildUtcDate(parseInt(period[6], 10), endMonth, parseInt(period[5], 10));
            if (start && end) {
                metadata.period_start = formatIsoDate(start);
                metadata.period_end = formatIsoDate(end);
            }
        }
    }

    return metadata;
}

function textFallbackYear(metadata: StatementMetadata): number {
    const fromPeriod = metadata.period_end ?? metadata.period_start;
    return fromPeriod ? parseInt(fromPeriod.slice(0, 4), 10) : new Date().getUTCFullYear();
}

function parseTextPages(
    pages: readonly DocumentPage[],
    defaultYear: number
): { transactions: RawTransaction[]; errors: string[] } {
    const transactions: RawTransaction[] = [];
    const errors: string[] = [];
    pages.forEach((page, idx) => {
        const parsed = parseBpiTextPage(page.text, idx + 1, defaultYear);
        transactions.push(...parsed.transactions);
        errors.push(...parsed.errors);
    });
    return { transactions, errors };
}

/**
 * Parse a BPI statement document.
 *
 * @throws ExtractionError when the document cannot be opened
 */
export function parseBpi(document: StatementDocument, credential?: string): ExtractionResult {
    const pages = openPages(document, credential);
    const metadata = extractBpiMetadata(pages[0]?.text ?? '');
    const extraction = extractRows(collectRows(pages, BPI_MIN_COLUMNS), parseBpiRow);

    let transactions = extraction.transactions;
    let parsingErrors = extraction.parsingErrors;
    let openingBalance = extraction.openingBalance;
    let closingBalance = extraction.closingBalance;
    const warnings: string[] = [];

    const tablesUnusable = transactions.length === 0 ||
        transactions.every(txn => txn.confidence < EXTRACTION.LOW_CONFIDENCE_THRESHOLD);
    if (tablesUnusable) {
        const text = parseTextPages(pages, textFallbackYear(metadata));
        // Keep the table outcome (and its errors) when the text yields nothing either
        if (text.transactions.length > 0) {
            transactions = text.transactions;
            parsingErrors = text.errors;
            openingBalance = undefined;
            closingBalance = undefined;
            warnings.push('No usable transaction tables; parsed statement text lines instead');
        }
    }

    if (!metadata.account_number) {
        warnings.push('Could not extract account number from statement');
    }
    if (!metadata.period_start || !metadata.period_end) {
        warnings.push('Could not extract statement period dates');
    }

    return {
        transactions,
        quality_score: applyQualityPenalties(calculateQualityScore(transactions), metadata),
        source_kind: 'bpi',
        parsing_errors: parsingErrors,
        warnings,
        opening_balance: openingBalance,
        closing_balance: closingBalance,
        ...metadata,
    };
}

export const bpiParser: StatementParser = {
    name: 'bpi',
    extract: parseBpi,
};
