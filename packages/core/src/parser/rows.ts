/**
 * Table-walking helpers shared by the parser variants.
 *
 * ARCHITECTURAL NOTE: No console.* calls. Row failures are returned as data.
 */

import { Decimal } from 'decimal.js';
import { ExtractionError, errorMessage } from '../errors.js';
import { RawTransactionSchema, EXTRACTION } from '../types/index.js';
import type { RawTransaction } from '../types/index.js';
import type { DocumentPage, StatementDocument } from '../document/types.js';
import { parseAmount, formatAmount } from '../utils/amount-parse.js';

/** First-cell values that mark a header or filler row. */
const HEADER_CELLS = new Set(['date', 'transaction date', 'posting date', '']);

/** A transaction row carries at least a date and an amount. */
const MIN_FILLED_CELLS = 2;

export interface TableRow {
    /** 1-based page number. */
    page: number;
    /** 1-based row number within its table. */
    row: number;
    cells: string[];
}

/**
 * Transaction parsed from one row, with the running balance when the
 * layout has a balance column.
 */
export interface ParsedRow {
    transaction: RawTransaction;
    balance?: Decimal;
}

export interface RowExtraction {
    transactions: RawTransaction[];
    parsingErrors: string[];
    openingBalance?: string;
    closingBalance?: string;
}

/**
 * Open a document, wrapping reader failures in ExtractionError.
 */
export function openPages(document: StatementDocument, credential?: string): DocumentPage[] {
    try {
        return document.open(credential);
    } catch (err) {
        if (err instanceof ExtractionError) {
            throw err;
        }
        throw new ExtractionError(document.path, `Failed to open document: ${errorMessage(err)}`, 'corrupt');
    }
}

/**
 * Data rows of every table, skipping short rows, header rows and title
 * rows. Spreadsheet tables pad every row to the sheet width, so a title
 * row is recognized by its filled cells rather than its length.
 */
export function collectRows(pages: readonly DocumentPage[], minWidth: number): TableRow[] {
    const rows: TableRow[] = [];

    pages.forEach((page, pageIdx) => {
        for (const table of page.tables) {
            table.forEach((cells, rowIdx) => {
                if (cells.length < minWidth) {
                    return;
                }
                if (cells.filter(value => value.trim() !== '').length < MIN_FILLED_CELLS) {
                    return;
                }
                const firstCell = (cells[0] ?? '').trim().toLowerCase();
                if (HEADER_CELLS.has(firstCell)) {
                    return;
                }
                rows.push({ page: pageIdx + 1, row: rowIdx + 1, cells });
            });
        }
    });

    return rows;
}

/**
 * Cell text by index; missing cells read as empty.
 */
export function cell(cells: readonly string[], index: number): string {
    return (cells[index] ?? '').trim();
}

/**
 * Optional balance cell; unreadable balances are ignored.
 */
export function readBalance(raw: string): Decimal | undefined {
    if (!raw) return undefined;
    try {
        return parseAmount(raw);
    } catch {
        return undefined;
    }
}

/**
 * Row confidence: base 1.0 minus the short-description penalty.
 */
export function rowConfidence(description: string, penalty = 0): number {
    let confidence = EXTRACTION.BASE_CONFIDENCE - penalty;
    if (description.length < EXTRACTION.SHORT_DESCRIPTION_LENGTH) {
        confidence -= EXTRACTION.SHORT_DESCRIPTION_PENALTY;
    }
    return Math.max(0, confidence);
}

/**
 * Run a row parser over every data row.
 * A throwing row is skipped and recorded as "Page p, row r: message".
 */
export function extractRows(
    rows: readonly TableRow[],
    parseRow: (cells: string[]) => ParsedRow
): RowExtraction {
    const transactions: RawTransaction[] = [];
    const parsingErrors: string[] = [];
    const balances: Array<{ amount: Decimal; balance: Decimal }> = [];

    for (const { page, row, cells } of rows) {
        let parsed: ParsedRow;
        try {
            parsed = parseRow(cells);
        } catch (err) {
            parsingErrors.push(`Page ${page}, row ${row}: ${errorMessage(err)}`);
            continue;
        }

        const check = RawTransactionSchema.safeParse(parsed.transaction);
        if (!check.success) {
            const issue = check.error.issues[0]?.message ?? 'invalid transaction';
            parsingErrors.push(`Page ${page}, row ${row}: ${issue}`);
            continue;
        }

        transactions.push(check.data);
        if (parsed.balance) {
            balances.push({ amount: new Decimal(parsed.transaction.amount), balance: parsed.balance });
        }
    }

    const first = balances[0];
    const last = balances[balances.length - 1];
    return {
        transactions,
        parsingErrors,
        openingBalance: first ? formatAmount(first.balance.minus(first.amount)) : undefined,
        closingBalance: last ? formatAmount(last.balance) : undefined,
    };
}
