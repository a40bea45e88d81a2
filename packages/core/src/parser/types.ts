/**
 * Parser variant contract.
 */

import type { ExtractionResult } from '../types/index.js';
import type { StatementDocument } from '../document/types.js';

/**
 * Closed set of statement layouts the core understands.
 */
export type ParserName = 'gcash' | 'bpi' | 'maya';

/**
 * One statement layout. extract() throws ExtractionError for document-level
 * failures and returns partial results for row-level failures.
 */
export interface StatementParser {
    readonly name: ParserName;
    extract(document: StatementDocument, credential?: string): ExtractionResult;
}
