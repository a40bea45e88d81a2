/**
 * Persisted record envelopes: { version, items }.
 */

import { PersistedRecordSchema, PERSISTENCE_VERSION } from '../types/index.js';
import type { PersistedRecord } from '../types/index.js';
import { ValidationError } from '../errors.js';

/**
 * Outcome of merging a persisted record. Malformed items are counted and
 * described, never dropped silently.
 */
export interface LoadReport {
    loaded: number;
    rejected: number;
    errors: string[];
}

/**
 * Parse a persisted envelope or throw ValidationError.
 */
export function parseRecordEnvelope(data: unknown, field: string): PersistedRecord {
    const envelope = PersistedRecordSchema.safeParse(data);
    if (!envelope.success) {
        throw new ValidationError(
            `Invalid ${field} file: expected { version <= ${PERSISTENCE_VERSION}, items: [...] }`,
            field,
            envelope.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }
    return envelope.data;
}
