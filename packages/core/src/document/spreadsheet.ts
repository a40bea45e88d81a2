/**
 * Spreadsheet-backed statement documents (CSV, XLS, XLSX exports).
 *
 * Each sheet becomes one page: its rows form a single table of cell
 * strings, and the same rows joined by spaces form the page text.
 */

import * as XLSX from 'xlsx';
import { ExtractionError, errorMessage } from '../errors.js';
import { spreadsheetDateToUtc, formatIsoDate } from '../utils/date-parse.js';
import type { DocumentPage, StatementDocument } from './types.js';

/** CSV exports may start with a UTF-8 byte order mark. */
function stripBom(value: string): string {
    return value.startsWith('\uFEFF') ? value.slice(1) : value;
}

/**
 * Cell value as page text. Date cells become ISO dates whatever number
 * format the sheet applied.
 */
function cellText(value: unknown): string {
    if (value instanceof Date) {
        const date = spreadsheetDateToUtc(value);
        return date ? formatIsoDate(date) : '';
    }
    return value === null || value === undefined ? '' : String(value).trim();
}

function sheetToPage(sheet: XLSX.WorkSheet): DocumentPage {
    const rawRows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
        header: 1,
        raw: true,
        defval: '',
        blankrows: false,
    });

    const rows = rawRows.map((row, rowIdx) =>
        row.map((value, cellIdx) => {
            const text = cellText(value);
            return rowIdx === 0 && cellIdx === 0 ? stripBom(text) : text;
        })
    );

    const text = rows
        .map(row => row.filter(cell => cell !== '').join(' '))
        .filter(line => line !== '')
        .join('\n');

    return { text, tables: rows.length > 0 ? [rows] : [] };
}

/**
 * Read a workbook into pages, mapping reader failures to ExtractionError.
 */
export function readWorkbookPages(path: string, data: ArrayBuffer, credential?: string): DocumentPage[] {
    let workbook: XLSX.WorkBook;
    try {
        // raw: keep CSV cells as typed text; cellDates: date cells arrive as Date values
        workbook = XLSX.read(data, { type: 'array', raw: true, cellDates: true, password: credential });
    } catch (err) {
        const message = errorMessage(err);
        if (/password|encrypt/i.test(message)) {
            throw new ExtractionError(path, 'Document is password-protected. Provide a credential.', 'credential');
        }
        throw new ExtractionError(path, `Cannot read spreadsheet: ${message}`, 'corrupt');
    }

    if (workbook.SheetNames.length === 0) {
        throw new ExtractionError(path, 'Spreadsheet has no sheets', 'corrupt');
    }

    const pages: DocumentPage[] = [];
    for (const name of workbook.SheetNames) {
        const sheet = workbook.Sheets[name];
        if (sheet) {
            pages.push(sheetToPage(sheet));
        }
    }
    return pages;
}

export function createSpreadsheetDocument(path: string, data: ArrayBuffer): StatementDocument {
    return {
        path,
        content: data,
        open(credential?: string): DocumentPage[] {
            return readWorkbookPages(path, data, credential);
        },
    };
}
