/**
 * Statement document handle.
 *
 * The core never extracts text itself: an upstream reader (a PDF table
 * extractor, a spreadsheet reader, a test fixture) hands over page text and
 * row-structured tables through this interface.
 */

export interface DocumentPage {
    /** Full page text, lines separated by "\n". */
    text: string;
    /** Tables on the page; each table is a list of rows of cell strings. */
    tables: string[][][];
}

export interface StatementDocument {
    /** Path or name used in errors, progress and results. */
    readonly path: string;
    /** Raw bytes (or text) the content hash is computed over. */
    readonly content: ArrayBuffer | Uint8Array | string;
    /**
     * Read every page. Throws ExtractionError when the document cannot be
     * opened, including a missing or wrong credential.
     */
    open(credential?: string): DocumentPage[];
}
