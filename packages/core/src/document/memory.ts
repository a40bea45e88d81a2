import { ExtractionError } from '../errors.js';
import type { DocumentPage, StatementDocument } from './types.js';

export interface MemoryDocumentOptions {
    /** When set, open() requires exactly this credential. */
    credential?: string;
    /** Bytes to hash; defaults to the serialized pages. */
    content?: ArrayBuffer | Uint8Array | string;
}

/**
 * Document over pages that were already extracted.
 */
export function createMemoryDocument(
    path: string,
    pages: Array<Partial<DocumentPage>>,
    options: MemoryDocumentOptions = {}
): StatementDocument {
    const normalized: DocumentPage[] = pages.map(page => ({
        text: page.text ?? '',
        tables: page.tables ?? [],
    }));

    return {
        path,
        content: options.content ?? JSON.stringify(normalized),
        open(credential?: string): DocumentPage[] {
            if (options.credential !== undefined && credential !== options.credential) {
                throw new ExtractionError(
                    path,
                    credential === undefined
                        ? 'Document is password-protected. Provide a credential.'
                        : 'Incorrect credential for protected document',
                    'credential'
                );
            }
            return normalized.map(page => ({
                text: page.text,
                tables: page.tables.map(table => table.map(row => [...row])),
            }));
        },
    };
}
