// Types (re-exported from shared)
export type {
    RawTransaction,
    SourceKind,
    ExtractionResult,
    FileExtraction,
    BatchError,
    SkippedFile,
    BatchResult,
    LedgerTransaction,
    CategorizationMethod,
    CategorizationResult,
    PatternValidationResult,
    CollisionResult,
    LearnedRule,
    CategoryDefinition,
    MerchantMapping,
    TaxonomyData,
    MatchType,
    Resolution,
    ResolutionStats,
    PersistedRecord,
} from './types/index.js';

export {
    RawTransactionSchema,
    ExtractionResultSchema,
    LedgerTransactionSchema,
    LearnedRuleSchema,
    TaxonomyDataSchema,
    ResolutionSchema,
    PersistedRecordSchema,
    UNCATEGORIZED_CATEGORY,
    CONFIDENCE,
    NORMALIZER,
    EXTRACTION,
    QUALITY_PENALTY,
    DEDUP_CONFIG,
    DEDUP_WEIGHTS,
    PATTERN_VALIDATION,
    PERSISTENCE_VERSION,
    TXN_ID,
} from './types/index.js';

// Errors
export { ErrorCodes, LedgerReconError, ExtractionError, ValidationError, errorMessage } from './errors.js';
export type { ErrorCode, ExtractionFailureReason } from './errors.js';

// Utils
export { generateTxnId, resolveCollisions, claimUniqueIds, hashContent, normalizeKey, cleanDescription } from './utils/index.js';
export { parseAmount, parseDebitCredit, formatAmount, parseSlashDate, formatIsoDate } from './utils/index.js';
export type { LoadReport, SlashDateResult } from './utils/index.js';

// Documents
export { createMemoryDocument, createSpreadsheetDocument, readWorkbookPages } from './document/index.js';
export type { DocumentPage, StatementDocument, MemoryDocumentOptions } from './document/index.js';

// Parsers
export {
    parseGcash,
    parseBpi,
    parseMaya,
    gcashParser,
    bpiParser,
    mayaParser,
    detectSourceKind,
    parserForSource,
    getSupportedParsers,
    calculateQualityScore,
    applyQualityPenalties,
    importAll,
    extractDocument,
    toLedgerTransactions,
} from './parser/index.js';
export type {
    ParserName,
    StatementParser,
    StatementMetadata,
    ImportOptions,
    ImportStatus,
    ProgressSink,
} from './parser/index.js';

// Categorizer
export {
    Taxonomy,
    loadDefaultTaxonomy,
    MerchantNormalizer,
    LearnedRuleStore,
    Categorizer,
    categorizeAll,
    validatePattern,
    checkPatternCollision,
} from './categorizer/index.js';
export type {
    NormalizationResult,
    LearnOptions,
    Correction,
    AppliedRule,
    CategorizerOptions,
    CategorizationStats,
} from './categorizer/index.js';

// Duplicate detection
export { DuplicateDetector, DuplicateResolver } from './dedup/index.js';
export type { DedupCandidate, DuplicateMatch, DetectorConfig, AutoResolveOptions } from './dedup/index.js';
