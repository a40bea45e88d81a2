/**
 * Date parsing utilities for statement parsers.
 * All dates returned as UTC (00:00:00Z).
 */

const MONTHS: Record<string, number> = {
    jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
    jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

const HALF_DAY_MS = 12 * 60 * 60 * 1000;

/**
 * Month number (1-12) for a month name or abbreviation, any case.
 * Full names ("November") resolve through their first three letters.
 */
export function monthFromName(name: string): number | null {
    return MONTHS[name.slice(0, 3).toLowerCase()] ?? null;
}

/**
 * Build a UTC date, rejecting rollovers such as Feb 30.
 */
export function buildUtcDate(year: number, month: number, day: number): Date | null {
    const date = new Date(Date.UTC(year, month - 1, day));
    if (!isValidDate(date)) return null;

    if (date.getUTCFullYear() !== year ||
        date.getUTCMonth() !== month - 1 ||
        date.getUTCDate() !== day) {
        return null;
    }

    return date;
}

/**
 * Parse "Nov 15, 2024", "Nov 15 2024" or "November 15, 2024" to Date (UTC).
 */
export function parseMonthNameDate(value: string): Date | null {
    const match = value.trim().match(/^([A-Za-z]{3,9})\.?\s+(\d{1,2}),?\s*(\d{4})$/);
    if (!match) return null;

    const month = monthFromName(match[1]);
    if (month === null) return null;

    return buildUtcDate(parseInt(match[3], 10), month, parseInt(match[2], 10));
}

/**
 * Parse MM/DD/YYYY date string to Date (UTC).
 */
export function parseMdyDate(value: string): Date | null {
    const match = value.trim().match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
    if (!match) return null;

    return buildUtcDate(parseInt(match[3], 10), parseInt(match[1], 10), parseInt(match[2], 10));
}

/**
 * Parse YYYY-MM-DD date string to Date (UTC).
 */
export function parseIsoDate(value: string): Date | null {
    const match = value.trim().match(/^(\d{4})-(\d{1,2})-(\d{1,2})$/);
    if (!match) return null;

    return buildUtcDate(parseInt(match[1], 10), parseInt(match[2], 10), parseInt(match[3], 10));
}

export interface SlashDateResult {
    date: Date;
    /** True when both leading fields were <= 12 and month-first was assumed. */
    ambiguous: boolean;
}

/**
 * Parse a slash date whose field order is not fixed.
 *
 * First field > 12: DD/MM/YYYY. Second field > 12: MM/DD/YYYY.
 * Both <= 12: MM/DD/YYYY, flagged ambiguous so the caller can warn.
 */
export function parseSlashDate(value: string): SlashDateResult | null {
    const match = value.trim().match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
    if (!match) return null;

    const first = parseInt(match[1], 10);
    const second = parseInt(match[2], 10);
    const year = parseInt(match[3], 10);

    if (first > 12) {
        const date = buildUtcDate(year, second, first);
        return date ? { date, ambiguous: false } : null;
    }

    const date = buildUtcDate(year, first, second);
    if (!date) return null;
    return { date, ambiguous: second <= 12 && first !== second };
}

/**
 * Format Date as ISO YYYY-MM-DD string (UTC).
 */
export function formatIsoDate(date: Date): string {
    const year = date.getUTCFullYear();
    const month = String(date.getUTCMonth() + 1).padStart(2, '0');
    const day = String(date.getUTCDate()).padStart(2, '0');
    return `${year}-${month}-${day}`;
}

/**
 * Calendar day of a spreadsheet date cell, as UTC midnight.
 * Readers build cell dates in local time; a time of day rounds to the nearest day.
 */
export function spreadsheetDateToUtc(value: Date): Date | null {
    if (!isValidDate(value)) {
        return null;
    }
    const nearest = new Date(value.getTime() + HALF_DAY_MS);
    return buildUtcDate(nearest.getFullYear(), nearest.getMonth() + 1, nearest.getDate());
}

/**
 * Parse a stored transaction date (YYYY-MM-DD or ISO timestamp) to Date.
 * Date-only values are taken as midnight UTC.
 */
export function parseStoredDate(value: string): Date | null {
    const date = /^\d{4}-\d{2}-\d{2}$/.test(value)
        ? new Date(`${value}T00:00:00Z`)
        : new Date(value);
    return isValidDate(date) ? date : null;
}

/**
 * Check if date is valid.
 */
export function isValidDate(date: Date): boolean {
    return !isNaN(date.getTime());
}
