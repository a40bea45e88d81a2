/**
 * Text normalization helpers.
 *
 * NOTE: normalizeKey is for matching, NOT for id generation.
 * Transaction ids hash the description exactly as extracted.
 */

/**
 * Lookup key for merchants, learned rules and duplicate comparison:
 * uppercase, leading/trailing whitespace removed.
 */
export function normalizeKey(raw: string): string {
    return raw.toUpperCase().trim();
}

/**
 * Clean a description cell as read from a statement.
 *
 * Transformations:
 * - Collapse runs of whitespace (including cell line breaks) to one space
 * - Trim leading/trailing whitespace
 */
export function cleanDescription(raw: string): string {
    return raw.replace(/\s+/g, ' ').trim();
}
