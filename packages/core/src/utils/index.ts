export {
    monthFromName,
    buildUtcDate,
    parseMonthNameDate,
    parseMdyDate,
    parseIsoDate,
    parseSlashDate,
    parseStoredDate,
    formatIsoDate,
    isValidDate,
} from './date-parse.js';
export type { SlashDateResult } from './date-parse.js';
export { isEmptyAmount, parseAmount, parseDebitCredit, formatAmount } from './amount-parse.js';
export { normalizeKey, cleanDescription } from './normalize.js';
export { generateTxnId, resolveCollisions, claimUniqueIds } from './txn-id.js';
export { hashContent } from './hash.js';
export { parseRecordEnvelope } from './record.js';
export type { LoadReport } from './record.js';
