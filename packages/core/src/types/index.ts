/**
 * Re-export all types from shared package.
 * Core package uses these types but doesn't define them.
 */
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
} from '@ledger-recon/shared';

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
} from '@ledger-recon/shared';
