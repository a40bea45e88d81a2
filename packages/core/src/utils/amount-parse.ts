/**
 * Amount parsing for statement cells.
 *
 * Accepts "₱1,234.56", "PHP 1,234.56", "1234.56", "(1,234.56)" and "-1,234.56".
 * Parenthesized and minus-prefixed values are negative.
 */

import { Decimal } from 'decimal.js';

const EMPTY_AMOUNT_CELLS = new Set(['', '-', '0', '0.00']);

/**
 * True for cells that carry no amount: empty, a dash, or zero.
 */
export function isEmptyAmount(raw: string): boolean {
    return EMPTY_AMOUNT_CELLS.has(raw.trim());
}

/**
 * Parse an amount cell. Throws with a row-level message on bad input.
 */
export function parseAmount(raw: string): Decimal {
    let value = raw.trim();
    if (!value) {
        throw new Error('Empty amount string');
    }

    let negative = false;
    if (value.startsWith('(') && value.endsWith(')')) {
        negative = true;
        value = value.slice(1, -1);
    } else if (value.startsWith('-')) {
        negative = true;
        value = value.slice(1);
    }

    const cleaned = value
        .replace(/PHP/gi, '')
        .replace(/₱/g, '')
        .replace(/,/g, '')
        .replace(/\s+/g, '');

    if (!/^\d+(\.\d+)?$/.test(cleaned)) {
        throw new Error(`Cannot parse amount "${raw.trim()}"`);
    }

    const amount = new Decimal(cleaned);
    return negative ? amount.negated() : amount;
}

/**
 * Resolve a debit / credit column pair into one signed amount.
 * Debit wins when both are filled; debit is negative, credit positive.
 */
export function parseDebitCredit(debit: string, credit: string): Decimal {
    if (!isEmptyAmount(debit)) {
        return parseAmount(debit).abs().negated();
    }
    if (!isEmptyAmount(credit)) {
        return parseAmount(credit).abs();
    }
    throw new Error('No valid amount found in debit or credit columns');
}

/**
 * Plain decimal string for storage: no exponent, no trailing zeros.
 */
export function formatAmount(amount: Decimal): string {
    return amount.toFixed();
}
