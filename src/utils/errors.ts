/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Caller can fix the input and retry
    TRANSIENT = "TRANSIENT", // Upstream issue, may resolve on its own
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Configuration errors
    INVALID_CONFIG = "INVALID_CONFIG",

    // Caller contract violations
    INVALID_ENTROPY = "INVALID_ENTROPY",
    INVALID_BYTE_REQUEST = "INVALID_BYTE_REQUEST",
    INVALID_RECOMMENDATION_COUNT = "INVALID_RECOMMENDATION_COUNT",
}

/**
 * Custom application error class
 */
export class AppError extends Error {
    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "AppError";
        Object.setPrototypeOf(this, AppError.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

/**
 * Fails fast when an entropy value falls outside [0, 1]. The value is never
 * clamped.
 */
export function assertEntropy(entropy: number): void {
    if (!Number.isFinite(entropy) || entropy < 0 || entropy > 1) {
        throw new AppError(
            ErrorCode.INVALID_ENTROPY,
            ErrorCategory.RECOVERABLE,
            `Entropy must be between 0.0 and 1.0 (received ${entropy})`,
            { entropy }
        );
    }
}
