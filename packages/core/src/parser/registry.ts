/**
 * Parser dispatch table.
 *
 * A closed record keyed by parser name, plus an exhaustive map from detected
 * source kind to the variant that reads it.
 */

import type { SourceKind } from '../types/index.js';
import { gcashParser } from './gcash.js';
import { bpiParser } from './bpi.js';
import { mayaParser } from './maya.js';
import type { ParserName, StatementParser } from './types.js';

export const PARSERS = {
    gcash: gcashParser,
    bpi: bpiParser,
    maya: mayaParser,
} as const satisfies Record<ParserName, StatementParser>;

const PARSER_FOR_SOURCE = {
    gcash: 'gcash',
    bpi: 'bpi',
    maya_savings: 'maya',
    maya_wallet: 'maya',
} as const satisfies Record<Exclude<SourceKind, 'unknown'>, ParserName>;

/**
 * Parser for a detected source kind; null for 'unknown'.
 */
export function parserForSource(kind: SourceKind): StatementParser | null {
    if (kind === 'unknown') {
        return null;
    }
    return PARSERS[PARSER_FOR_SOURCE[kind]];
}

/**
 * Every parser, in the order they are tried for unrecognized documents.
 */
export function getSupportedParsers(): StatementParser[] {
    return [PARSERS.gcash, PARSERS.bpi, PARSERS.maya];
}
