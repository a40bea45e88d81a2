/**
 * Constants for the ingestion and reconciliation pipeline.
 *
 * Every confidence value lives in [0, 1]. Thresholds that a user may want to
 * tune are also exposed through the CLI settings file.
 */

/**
 * Category assigned when no rule, merchant or keyword matches.
 */
export const UNCATEGORIZED_CATEGORY = 'Uncategorized';

/**
 * Confidence scores per categorization method.
 */
export const CONFIDENCE = {
    EXACT_MERCHANT: 0.98,
    PARTIAL_MERCHANT_BASE: 0.9,
    PARTIAL_MERCHANT_SPAN: 0.05,
    PARTIAL_MERCHANT_MAX: 0.95,
    KEYWORD_TOKEN: 0.75,
    KEYWORD_SUBSTRING: 0.7,
    LEARNED_SUBSTRING_FACTOR: 0.9,
    LEARNED_DEFAULT: 1.0,
    UNCATEGORIZED: 0.0,
    NEEDS_REVIEW_BELOW: 0.7,
} as const;

/**
 * Merchant normalizer scoring.
 */
export const NORMALIZER = {
    EXACT: 0.98,
    PARTIAL_BASE: 0.85,
    PARTIAL_SPAN: 0.1,
    PARTIAL_OFFSET_PENALTY: 0.05,
    PARTIAL_MIN: 0.7,
    PARTIAL_MAX: 0.95,
    PREFIX_FACTOR: 0.95,
    MAX_PREFIX_WORDS: 4,
} as const;

/**
 * Per-row confidence adjustments applied by the statement parsers.
 */
export const EXTRACTION = {
    BASE_CONFIDENCE: 1.0,
    MISSING_REFERENCE_PENALTY: 0.05,
    SHORT_DESCRIPTION_PENALTY: 0.1,
    SHORT_DESCRIPTION_LENGTH: 3,
    TEXT_FALLBACK_CONFIDENCE: 0.9,
    LOW_CONFIDENCE_THRESHOLD: 0.5,
} as const;

/**
 * Metadata penalties subtracted from the mean row confidence.
 */
export const QUALITY_PENALTY = {
    MISSING_ACCOUNT: 0.05,
    MISSING_PERIOD: 0.02,
} as const;

/**
 * Duplicate detection defaults and per-signal weights.
 */
export const DEDUP_CONFIG = {
    TIME_THRESHOLD_HOURS: 24,
    AMOUNT_THRESHOLD_PERCENT: 1,
    AUTO_RESOLVE_MIN_CONFIDENCE: 0.95,
    NEAR_DATE_MAX_HOURS: 12,
    DESCRIPTION_PREFIX_RATIO: 0.7,
} as const;

export const DEDUP_WEIGHTS = {
    SAME_DATE: 0.35,
    NEAR_DATE: 0.25,
    SAME_AMOUNT: 0.35,
    SIMILAR_AMOUNT: 0.25,
    SAME_DESCRIPTION: 0.35,
    CONTAINED_DESCRIPTION: 0.25,
    PREFIX_DESCRIPTION: 0.2,
} as const;

/**
 * Pattern validation thresholds for learned rules.
 */
export const PATTERN_VALIDATION = {
    MIN_LENGTH: 3,
    MAX_MATCH_PERCENT: 0.2,
    MAX_MATCHES_FOR_BROAD: 3,
} as const;

/**
 * Version written into every persisted record envelope.
 */
export const PERSISTENCE_VERSION = 1;

/**
 * Transaction ID configuration.
 */
export const TXN_ID = {
    LENGTH: 16,
    COLLISION_SUFFIX_START: 2,
    MAX_COLLISIONS: 99,
} as const;
