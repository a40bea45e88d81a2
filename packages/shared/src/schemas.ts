/**
 * Zod schemas for pipeline data structures.
 *
 * IMPORTANT: Decimal values are stored as strings in schemas.
 * Convert to Decimal at computation boundaries, back to string at output.
 */

import { z } from 'zod';
import { TXN_ID, PERSISTENCE_VERSION, DEDUP_CONFIG } from './constants.js';

// ============================================================================
// Primitive Validators
// ============================================================================

/**
 * ISO date string: YYYY-MM-DD, or a full timestamp carrying a zone.
 */
const isoDateString = z.string().regex(
    /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2}))?$/,
    'Must be YYYY-MM-DD or an ISO-8601 timestamp with zone'
);

/**
 * Decimal amount as string (never native number for money).
 */
const decimalString = z.string().regex(/^-?\d+(\.\d+)?$/, 'Must be valid decimal string');

const confidence = z.number().min(0).max(1);

/**
 * Transaction ID: 16-char hex, optionally with collision suffix.
 */
const txnId = z.string().regex(
    new RegExp(`^[0-9a-f]{${TXN_ID.LENGTH}}(-\\d{2})?$`),
    `Must be ${TXN_ID.LENGTH}-char hex, optionally with -NN suffix`
);

// ============================================================================
// Extraction Schemas
// ============================================================================

/**
 * One transaction as read from a statement, before identification.
 */
export const RawTransactionSchema = z.object({
    date: isoDateString,
    description: z.string(),
    amount: decimalString,
    reference: z.string().optional(),
    confidence,
});

export type RawTransaction = z.infer<typeof RawTransactionSchema>;

export const SourceKindSchema = z.enum(['gcash', 'bpi', 'maya_savings', 'maya_wallet', 'unknown']);

export type SourceKind = z.infer<typeof SourceKindSchema>;

/**
 * Output of one parser run over one document.
 * Parsers return data, not side effects. Warnings are returned as data.
 */
export const ExtractionResultSchema = z.object({
    transactions: z.array(RawTransactionSchema),
    quality_score: confidence,
    source_kind: SourceKindSchema,
    parsing_errors: z.array(z.string()),
    warnings: z.array(z.string()),
    opening_balance: decimalString.optional(),
    closing_balance: decimalString.optional(),
    period_start: isoDateString.optional(),
    period_end: isoDateString.optional(),
    account_number: z.string().optional(),
    account_holder: z.string().optional(),
});

export type ExtractionResult = z.infer<typeof ExtractionResultSchema>;

export const FileExtractionSchema = ExtractionResultSchema.extend({
    source_file: z.string(),
    content_hash: z.string(),
});

export type FileExtraction = z.infer<typeof FileExtractionSchema>;

export const BatchErrorSchema = z.object({
    path: z.string(),
    message: z.string(),
});

export type BatchError = z.infer<typeof BatchErrorSchema>;

export const SkippedFileSchema = z.object({
    path: z.string(),
    hash: z.string(),
    reason: z.string(),
});

export type SkippedFile = z.infer<typeof SkippedFileSchema>;

export const BatchResultSchema = z.object({
    total_files: z.number().int().min(0),
    successful: z.number().int().min(0),
    failed: z.number().int().min(0),
    skipped: z.number().int().min(0),
    average_quality_score: confidence,
    results: z.array(FileExtractionSchema),
    errors: z.array(BatchErrorSchema),
    skipped_files: z.array(SkippedFileSchema),
    imported_hashes: z.array(z.string()),
});

export type BatchResult = z.infer<typeof BatchResultSchema>;

// ============================================================================
// Ledger Transaction Schema
// ============================================================================

/**
 * Identified transaction - the form deduplication and resolution work on.
 */
export const LedgerTransactionSchema = z.object({
    id: txnId,
    date: isoDateString,
    description: z.string(),
    amount: decimalString,
    reference: z.string().optional(),
    source: SourceKindSchema,
    source_file: z.string(),
    confidence,
});

export type LedgerTransaction = z.infer<typeof LedgerTransactionSchema>;

// ============================================================================
// Categorization Schemas
// ============================================================================

export const CategorizationMethodSchema = z.enum([
    'learned',
    'exact_merchant',
    'partial_merchant',
    'keyword',
    'none',
]);

export type CategorizationMethod = z.infer<typeof CategorizationMethodSchema>;

/**
 * Categorization result - what categorize() returns.
 */
export const CategorizationResultSchema = z.object({
    category: z.string(),
    confidence,
    method: CategorizationMethodSchema,
    normalized_merchant: z.string().optional(),
});

export type CategorizationResult = z.infer<typeof CategorizationResultSchema>;

/**
 * Pattern validation result.
 */
export const PatternValidationResultSchema = z.object({
    valid: z.boolean(),
    errors: z.array(z.string()),
    warnings: z.array(z.string()),
    matchCount: z.number().int().min(0).optional(),
    matchPercent: z.number().min(0).max(1).optional(),
});

export type PatternValidationResult = z.infer<typeof PatternValidationResultSchema>;

/**
 * Pattern collision check result.
 */
export const CollisionResultSchema = z.object({
    hasCollision: z.boolean(),
    collidingPatterns: z.array(z.string()),
});

export type CollisionResult = z.infer<typeof CollisionResultSchema>;

/**
 * A user correction remembered as a categorization rule.
 * One rule per pattern; learning the same pattern again overwrites it.
 */
export const LearnedRuleSchema = z.object({
    pattern: z.string().min(1),
    category: z.string().min(1),
    normalized_merchant: z.string().optional(),
    source: z.enum(['user', 'import', 'auto']).default('user'),
    confidence,
    created_at: z.string().datetime({ offset: true }),
});

export type LearnedRule = z.infer<typeof LearnedRuleSchema>;

// ============================================================================
// Taxonomy Schemas
// ============================================================================

export const CategoryDefinitionSchema = z.object({
    name: z.string().min(1),
    description: z.string().default(''),
    keywords: z.array(z.string().min(1)),
});

export type CategoryDefinition = z.infer<typeof CategoryDefinitionSchema>;

export const MerchantMappingSchema = z.object({
    key: z.string().min(1),
    normalized: z.string().min(1),
    category: z.string().min(1),
});

export type MerchantMapping = z.infer<typeof MerchantMappingSchema>;

export const TaxonomyDataSchema = z.object({
    categories: z.array(CategoryDefinitionSchema),
    merchants: z.array(MerchantMappingSchema),
    variations: z.record(z.string(), z.string()),
}).superRefine((data, ctx) => {
    const names = new Set(data.categories.map(c => c.name));
    for (const merchant of data.merchants) {
        if (!names.has(merchant.category)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `Merchant "${merchant.key}" references unknown category "${merchant.category}"`,
            });
        }
    }
});

export type TaxonomyData = z.infer<typeof TaxonomyDataSchema>;

// ============================================================================
// Duplicate Schemas
// ============================================================================

export const MatchTypeSchema = z.enum(['exact', 'near', 'cross_source']);

export type MatchType = z.infer<typeof MatchTypeSchema>;

export const ResolutionSchema = z.object({
    transaction_ids: z.array(z.string().min(1)).min(1),
    resolution_type: z.enum(['duplicate', 'unique']),
    keep_id: z.string().min(1).optional(),
    reason: z.string().optional(),
    created_at: z.string().datetime({ offset: true }),
}).refine(
    r => r.keep_id === undefined || r.transaction_ids.includes(r.keep_id),
    { message: 'keep_id must be one of transaction_ids', path: ['keep_id'] }
);

export type Resolution = z.infer<typeof ResolutionSchema>;

export const ResolutionStatsSchema = z.object({
    total_resolutions: z.number().int().min(0),
    duplicates: z.number().int().min(0),
    unique: z.number().int().min(0),
    resolved_transactions: z.number().int().min(0),
    hidden_transactions: z.number().int().min(0),
});

export type ResolutionStats = z.infer<typeof ResolutionStatsSchema>;

// ============================================================================
// Persistence Schemas
// ============================================================================

/**
 * Envelope shared by every persisted record file.
 * Items stay unknown here so that each one can be validated on its own.
 */
export const PersistedRecordSchema = z.object({
    version: z.number().int().min(1).max(PERSISTENCE_VERSION),
    items: z.array(z.unknown()),
});

export type PersistedRecord = z.infer<typeof PersistedRecordSchema>;

/**
 * Import manifest: content hashes of every statement already imported.
 */
export const ImportManifestSchema = z.object({
    version: z.number().int().min(1).max(PERSISTENCE_VERSION),
    files: z.record(z.string(), z.object({
        path: z.string(),
        imported_at: z.string(),
        transaction_count: z.number().int().min(0),
    })),
});

export type ImportManifest = z.infer<typeof ImportManifestSchema>;

// ============================================================================
// Workspace Settings
// ============================================================================

/**
 * config/settings.yaml. Every field has a default, so an empty file is valid.
 */
export const SettingsSchema = z.object({
    dedup: z.object({
        time_threshold_hours: z.number().positive().default(DEDUP_CONFIG.TIME_THRESHOLD_HOURS),
        amount_threshold_percent: z.number().min(0).default(DEDUP_CONFIG.AMOUNT_THRESHOLD_PERCENT),
    }).default({}),
    auto_resolve: z.object({
        enabled: z.boolean().default(true),
        min_confidence: confidence.default(DEDUP_CONFIG.AUTO_RESOLVE_MIN_CONFIDENCE),
        keep_first: z.boolean().default(true),
    }).default({}),
    /** Statement file name -> password. */
    credentials: z.record(z.string(), z.string()).default({}),
});

export type Settings = z.infer<typeof SettingsSchema>;
