/**
 * Error types thrown by the core.
 *
 * Document-level failures and invalid caller input throw. Row-level problems
 * never do: they are returned as data (parsing_errors, warnings).
 */

export const ErrorCodes = {
    EXTRACTION_FAILED: 'EXTRACTION_FAILED',
    VALIDATION_FAILED: 'VALIDATION_FAILED',
    ID_COLLISION_OVERFLOW: 'ID_COLLISION_OVERFLOW',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

/**
 * Why a whole document could not be read.
 */
export type ExtractionFailureReason = 'credential' | 'corrupt' | 'unsupported' | 'unreadable';

export class LedgerReconError extends Error {
    readonly code: ErrorCode;
    readonly details?: Record<string, unknown>;

    constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
        super(message);
        this.name = 'LedgerReconError';
        this.code = code;
        this.details = details;
    }
}

export class ExtractionError extends LedgerReconError {
    readonly filePath: string;
    readonly reason: ExtractionFailureReason;

    constructor(filePath: string, message: string, reason: ExtractionFailureReason = 'unreadable') {
        super(message, ErrorCodes.EXTRACTION_FAILED, { filePath, reason });
        this.name = 'ExtractionError';
        this.filePath = filePath;
        this.reason = reason;
    }
}

export class ValidationError extends LedgerReconError {
    readonly field?: string;
    readonly issues: string[];

    constructor(message: string, field?: string, issues: string[] = []) {
        super(message, ErrorCodes.VALIDATION_FAILED, { field, issues });
        this.name = 'ValidationError';
        this.field = field;
        this.issues = issues;
    }
}

/**
 * Message of any thrown value.
 */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
