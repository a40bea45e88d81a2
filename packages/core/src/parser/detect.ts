/**
 * Statement source detection from document header text.
 *
 * Only the first page is inspected. When no identifying token is present
 * the result is 'unknown'; the orchestrator then tries every parser.
 */

import type { SourceKind } from '../types/index.js';
import type { DocumentPage } from '../document/types.js';

/**
 * Detect the source kind of a statement from its first page text.
 */
export function detectSourceKind(pages: readonly DocumentPage[]): SourceKind {
    const text = (pages[0]?.text ?? '').toLowerCase();

    if (text.includes('gcash') || text.includes('g-xchange')) {
        return 'gcash';
    }
    if (text.includes('bank of the philippine islands') || text.includes('bpi')) {
        return 'bpi';
    }
    if (text.includes('maya')) {
        return text.includes('savings') ? 'maya_savings' : 'maya_wallet';
    }
    return 'unknown';
}
