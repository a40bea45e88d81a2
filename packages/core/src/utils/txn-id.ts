/**
 * Transaction ID generation and collision handling.
 *
 * ARCHITECTURAL NOTE: Uses js-sha256 for cross-platform compatibility.
 * Node's crypto module is not available in browser.
 */

import { sha256 } from 'js-sha256';
import { Decimal } from 'decimal.js';
import type { LedgerTransaction } from '../types/index.js';
import { TXN_ID } from '../types/index.js';
import { LedgerReconError, ErrorCodes } from '../errors.js';

/**
 * Generate deterministic transaction ID via SHA-256 hash.
 *
 * Payload format: "{date}|{description}|{amount}|{account}"
 *
 * - date: the stored ISO date string
 * - description: as extracted (no case folding before hash)
 * - amount: plain decimal string, no trailing zeros
 * - account: account number when the statement has one, else the source file
 *
 * @returns 16-character hex transaction ID
 */
export function generateTxnId(
    date: string,
    description: string,
    amount: Decimal,
    account: string
): string {
    // Decimal.toFixed() without args removes trailing zeros
    const amountStr = amount.toFixed();

    const payload = `${date}|${description}|${amountStr}|${account}`;
    return sha256(payload).slice(0, TXN_ID.LENGTH);
}

/**
 * Resolve collisions by adding deterministic suffixes.
 * Identical rows within one statement get -02, -03, etc.
 *
 * PURE FUNCTION: Returns new array with updated IDs. Does not mutate input.
 *
 * @throws LedgerReconError (ID_COLLISION_OVERFLOW) past TXN_ID.MAX_COLLISIONS copies of one id
 */
export function resolveCollisions(transactions: readonly LedgerTransaction[]): LedgerTransaction[] {
    const seen: Record<string, number> = {};
    const result: LedgerTransaction[] = [];

    for (const txn of transactions) {
        const baseId = txn.id;
        const count = (seen[baseId] ?? 0) + 1;
        seen[baseId] = count;

        if (count === 1) {
            result.push({ ...txn });
            continue;
        }

        if (count > TXN_ID.MAX_COLLISIONS) {
            throw new LedgerReconError(
                `Collision overflow: ${baseId} has reached max limit of ${TXN_ID.MAX_COLLISIONS} duplicates`,
                ErrorCodes.ID_COLLISION_OVERFLOW,
                { baseId, limit: TXN_ID.MAX_COLLISIONS }
            );
        }

        const suffix = String(count).padStart(2, '0');
        result.push({ ...txn, id: `${baseId}-${suffix}` });
    }

    return result;
}

const SUFFIXED_ID = new RegExp(`^([0-9a-f]{${TXN_ID.LENGTH}})-\\d{2}$`);

/**
 * Keep ids unique across files. An id that an earlier file already
 * produced (overlapping exports of one account) takes the next free
 * suffix of its base id, so both copies reach duplicate detection.
 *
 * Claimed ids are added to `taken`.
 *
 * @throws LedgerReconError (ID_COLLISION_OVERFLOW) when every suffix is taken
 */
export function claimUniqueIds(
    transactions: readonly LedgerTransaction[],
    taken: Set<string>
): LedgerTransaction[] {
    return transactions.map(txn => {
        let id = txn.id;
        if (taken.has(id)) {
            const baseId = SUFFIXED_ID.exec(id)?.[1] ?? id;
            let count = TXN_ID.COLLISION_SUFFIX_START;
            while (taken.has(`${baseId}-${String(count).padStart(2, '0')}`)) {
                count++;
            }
            if (count > TXN_ID.MAX_COLLISIONS) {
                throw new LedgerReconError(
                    `Collision overflow: ${baseId} has reached max limit of ${TXN_ID.MAX_COLLISIONS} duplicates`,
                    ErrorCodes.ID_COLLISION_OVERFLOW,
                    { baseId, limit: TXN_ID.MAX_COLLISIONS }
                );
            }
            id = `${baseId}-${String(count).padStart(2, '0')}`;
        }
        taken.add(id);
        return id === txn.id ? { ...txn } : { ...txn, id };
    });
}
