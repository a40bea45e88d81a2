// Schemas
export {
    RawTransactionSchema,
    SourceKindSchema,
    ExtractionResultSchema,
    FileExtractionSchema,
    BatchErrorSchema,
    SkippedFileSchema,
    BatchResultSchema,
    LedgerTransactionSchema,
    CategorizationMethodSchema,
    CategorizationResultSchema,
    PatternValidationResultSchema,
    CollisionResultSchema,
    LearnedRuleSchema,
    CategoryDefinitionSchema,
    MerchantMappingSchema,
    TaxonomyDataSchema,
    MatchTypeSchema,
    ResolutionSchema,
    ResolutionStatsSchema,
    PersistedRecordSchema,
    ImportManifestSchema,
    SettingsSchema,
} from './schemas.js';

// Types
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
    ImportManifest,
    Settings,
} from './schemas.js';

// Constants
export {
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
} from './constants.js';
