/**
 * Date arithmetic for duplicate detection, on native Date.
 */

import { formatIsoDate, parseStoredDate } from '../utils/date-parse.js';

const MS_PER_MINUTE = 60 * 1000;
export const MS_PER_HOUR = 60 * MS_PER_MINUTE;

/**
 * Absolute difference between two stored dates in milliseconds,
 * or null when either cannot be parsed.
 */
export function msBetween(date1: string, date2: string): number | null {
    const d1 = parseStoredDate(date1);
    const d2 = parseStoredDate(date2);
    if (!d1 || !d2) return null;
    return Math.abs(d1.getTime() - d2.getTime());
}

/**
 * True when both dates fall on the same UTC calendar day.
 */
export function isSameUtcDay(date1: string, date2: string): boolean {
    const d1 = parseStoredDate(date1);
    const d2 = parseStoredDate(date2);
    if (!d1 || !d2) return false;
    return formatIsoDate(d1) === formatIsoDate(d2);
}

/**
 * Short human form of a duration: "3h 20m", "45m".
 */
export function formatDuration(ms: number): string {
    const totalMinutes = Math.round(ms / MS_PER_MINUTE);
    const hours = Math.floor(totalMinutes / 60);
    const minutes = totalMinutes % 60;
    return hours > 0 ? `${hours}h ${minutes}m` : `${minutes}m`;
}
