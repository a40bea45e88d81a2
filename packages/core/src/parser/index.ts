export { parseGcash, extractGcashMetadata, gcashParser } from './gcash.js';
export { parseBpi, parseBpiTextPage, extractBpiMetadata, bpiParser } from './bpi.js';
export { parseMaya, parseMayaDate, mayaParser } from './maya.js';
export { detectSourceKind } from './detect.js';
export { PARSERS, parserForSource, getSupportedParsers } from './registry.js';
export { calculateQualityScore, applyQualityPenalties } from './quality.js';
export type { StatementMetadata } from './quality.js';
export { importAll, extractDocument, toLedgerTransactions } from './batch.js';
export type { ImportOptions, ImportStatus, ProgressSink } from './batch.js';
export type { ParserName, StatementParser } from './types.js';
