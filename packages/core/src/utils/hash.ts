import { sha256 } from 'js-sha256';

/**
 * Computes a SHA-256 hash of a document's content.
 * Returns the hash prefixed with 'sha256:'.
 */
export function hashContent(content: ArrayBuffer | Uint8Array | string): string {
    return `sha256:${sha256(content)}`;
}
