/**
 * Duplicate resolution decisions.
 *
 * Resolutions are append-only; a per-id index points at the latest
 * decision touching each transaction. A transaction is hidden when a
 * `duplicate` resolution names it and it is not kept anywhere.
 *
 * ARCHITECTURAL NOTE: No file I/O here. toRecord()/mergeRecord() exchange
 * plain data; the CLI reads and writes the JSON files.
 */

import { DEDUP_CONFIG, PERSISTENCE_VERSION, ResolutionSchema } from '../types/index.js';
import type { PersistedRecord, Resolution, ResolutionStats } from '../types/index.js';
import { ValidationError } from '../errors.js';
import { parseRecordEnvelope } from '../utils/record.js';
import type { LoadReport } from '../utils/record.js';
import type { AutoResolveOptions, DedupCandidate, DuplicateMatch } from './types.js';

export class DuplicateResolver {
    private readonly resolutions: Resolution[] = [];
    private readonly resolvedIds = new Map<string, Resolution>();

    constructor(private readonly clock: () => Date = () => new Date()) {}

    /**
     * Mark transactions as the same event, keeping one of them.
     *
     * @throws ValidationError when ids is empty or keepId is not among them
     */
    markDuplicate(transactionIds: readonly string[], keepId: string, reason?: string): Resolution {
        const ids = requireIds(transactionIds);
        if (!ids.includes(keepId)) {
            throw new ValidationError(`Keep id "${keepId}" is not one of the resolved transactions`, 'keep_id');
        }
        return this.record({
            transaction_ids: ids,
            resolution_type: 'duplicate',
            keep_id: keepId,
            reason,
            created_at: this.clock().toISOString(),
        });
    }

    /**
     * Mark transactions as distinct events (a false positive).
     *
     * @throws ValidationError when ids is empty
     */
    markUnique(transactionIds: readonly string[], reason?: string): Resolution {
        return this.record({
            transaction_ids: requireIds(transactionIds),
            resolution_type: 'unique',
            reason,
            created_at: this.clock().toISOString(),
        });
    }

    /**
     * Resolve high-confidence matches whose transactions are still open.
     * Running it twice over the same matches adds nothing the second time.
     *
     * @returns Number of new resolutions
     */
    autoResolve<T extends DedupCandidate>(
        matches: ReadonlyArray<DuplicateMatch<T>>,
        options: AutoResolveOptions = {}
    ): number {
        const keepFirst = options.keepFirst ?? true;
        const minConfidence = options.minConfidence ?? DEDUP_CONFIG.AUTO_RESOLVE_MIN_CONFIDENCE;
        let resolved = 0;

        for (const match of matches) {
            if (match.confidence < minConfidence) continue;

            const idA = match.transaction_a.id;
            const idB = match.transaction_b.id;
            if (!idA || !idB || idA === idB) continue;
            if (this.isResolved(idA) || this.isResolved(idB)) continue;

            const pct = Math.round(match.confidence * 100);
            this.markDuplicate(
                [idA, idB],
                keepFirst ? idA : idB,
                `Auto-resolved (${match.match_type}, ${pct}% confidence)`
            );
            resolved++;
        }

        return resolved;
    }

    /**
     * Matches with neither transaction resolved yet.
     */
    pendingMatches<T extends DedupCandidate>(matches: ReadonlyArray<DuplicateMatch<T>>): DuplicateMatch<T>[] {
        return matches.filter(m => !this.isResolved(m.transaction_a.id) && !this.isResolved(m.transaction_b.id));
    }

    /**
     * Drop hidden duplicates; order is preserved.
     */
    filterTransactions<T extends Pick<DedupCandidate, 'id'>>(transactions: readonly T[]): T[] {
        const hidden = this.getDuplicateIds();
        return transactions.filter(txn => !hidden.has(txn.id));
    }

    /**
     * Ids to hide: named by a duplicate resolution without being its keep id,
     * and not kept by any other duplicate resolution.
     */
    getDuplicateIds(): Set<string> {
        const kept = new Set<string>();
        const hidden = new Set<string>();

        for (const resolution of this.resolutions) {
            if (resolution.resolution_type !== 'duplicate' || resolution.keep_id === undefined) continue;
            kept.add(resolution.keep_id);
            for (const id of resolution.transaction_ids) {
                if (id !== resolution.keep_id) hidden.add(id);
            }
        }

        for (const id of kept) {
            hidden.delete(id);
        }
        return hidden;
    }

    isResolved(transactionId: string): boolean {
        return this.resolvedIds.has(transactionId);
    }

    getResolutionFor(transactionId: string): Resolution | null {
        return this.resolvedIds.get(transactionId) ?? null;
    }

    getResolutions(): Resolution[] {
        return [...this.resolutions];
    }

    getStats(): ResolutionStats {
        return {
            total_resolutions: this.resolutions.length,
            duplicates: this.resolutions.filter(r => r.resolution_type === 'duplicate').length,
            unique: this.resolutions.filter(r => r.resolution_type === 'unique').length,
            resolved_transactions: this.resolvedIds.size,
            hidden_transactions: this.getDuplicateIds().size,
        };
    }

    /**
     * Forget every resolution.
     */
    clear(): void {
        this.resolutions.length = 0;
        this.resolvedIds.clear();
    }

    toRecord(): PersistedRecord {
        return { version: PERSISTENCE_VERSION, items: this.getResolutions() };
    }

    /**
     * Append resolutions from a persisted record; loaded entries take over
     * the per-id index.
     *
     * @throws ValidationError when the envelope itself is malformed
     */
    mergeRecord(data: unknown): LoadReport {
        const envelope = parseRecordEnvelope(data, 'resolutions');
        const report: LoadReport = { loaded: 0, rejected: 0, errors: [] };

        envelope.items.forEach((item, idx) => {
            const parsed = ResolutionSchema.safeParse(item);
            if (!parsed.success) {
                report.rejected++;
                report.errors.push(
                    `Resolution ${idx + 1}: ${parsed.error.issues.map(i => i.message).join(', ')}`
                );
                return;
            }
            this.record(parsed.data);
            report.loaded++;
        });

        return report;
    }

    private record(resolution: Resolution): Resolution {
        this.resolutions.push(resolution);
        for (const id of resolution.transaction_ids) {
            this.resolvedIds.set(id, resolution);
        }
        return resolution;
    }
}

function requireIds(transactionIds: readonly string[]): string[] {
    const ids = [...new Set(transactionIds)];
    if (ids.length === 0) {
        throw new ValidationError('Resolution needs at least one transaction id', 'transaction_ids');
    }
    if (ids.some(id => !id)) {
        throw new ValidationError('Transaction ids cannot be empty', 'transaction_ids');
    }
    return ids;
}
