/**
 * Signal Error Taxonomy
 *
 * Every failure inside the evaluation pipeline is mapped to one of these codes.
 * Errors are local to a single evaluation: they never mutate indicator state.
 */

export enum SignalErrorCode {
    // Malformed or out-of-order bars
    DATA_INTEGRITY = "DATA_INTEGRITY",

    // Fewer bars than the warm-up window
    INSUFFICIENT_HISTORY = "INSUFFICIENT_HISTORY",

    // Non-positive ATR / entry price, zero risk-per-share, bad parameters
    INVALID_INPUT = "INVALID_INPUT",

    // Price collaborator failures
    SOURCE_AUTH_FAILED = "SOURCE_AUTH_FAILED",
    SOURCE_RATE_LIMITED = "SOURCE_RATE_LIMITED",
    SOURCE_NOT_FOUND = "SOURCE_NOT_FOUND",
    SOURCE_TIMEOUT = "SOURCE_TIMEOUT",
    SOURCE_NETWORK_ERROR = "SOURCE_NETWORK_ERROR",
    SOURCE_SERVER_ERROR = "SOURCE_SERVER_ERROR",

    UNKNOWN = "UNKNOWN"
}

export interface SignalErrorDetail {
    readonly code: SignalErrorCode;
    readonly message: string;
    readonly timestamp: number;
    readonly retryable: boolean;
    readonly metadata?: Record<string, unknown>;
}

export class SignalError extends Error {
    readonly code: SignalErrorCode;
    readonly timestamp: number;
    readonly retryable: boolean;
    readonly metadata?: Record<string, unknown>;

    constructor(detail: SignalErrorDetail) {
        super(detail.message);
        this.name = "SignalError";
        this.code = detail.code;
        this.timestamp = detail.timestamp;
        this.retryable = detail.retryable;
        this.metadata = detail.metadata;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, new.target);
        }
    }

    toJSON(): SignalErrorDetail {
        return {
            code: this.code,
            message: this.message,
            timestamp: this.timestamp,
            retryable: this.retryable,
            metadata: this.metadata
        };
    }
}

/**
 * Malformed bar (missing/non-finite OHLC, high < low) or a bar out of timestamp order.
 * Fatal to the evaluation, never retried.
 */
export class DataIntegrityError extends SignalError {
    constructor(message: string, metadata?: Record<string, unknown>) {
        super({
            code: SignalErrorCode.DATA_INTEGRITY,
            message,
            timestamp: Date.now(),
            retryable: false,
            metadata
        });
        this.name = "DataIntegrityError";
    }
}

/**
 * Not enough bars to complete the warm-up window. The caller has to gather more data.
 */
export class InsufficientHistoryError extends SignalError {
    readonly required: number;
    readonly available: number;

    constructor(required: number, available: number) {
        super({
            code: SignalErrorCode.INSUFFICIENT_HISTORY,
            message: `insufficient history: ${available} bars available, ${required} required`,
            timestamp: Date.now(),
            retryable: false,
            metadata: { required, available }
        });
        this.name = "InsufficientHistoryError";
        this.required = required;
        this.available = available;
    }
}

export type InvalidInputKind = "NO_VOLATILITY_BASIS" | "BAD_INPUT";

/**
 * Terminal rejection of an evaluation. `kind` separates the missing-volatility
 * case from every other bad value so the Decision can say which one happened.
 */
export class InvalidInputError extends SignalError {
    readonly kind: InvalidInputKind;

    constructor(kind: InvalidInputKind, message: string, metadata?: Record<string, unknown>) {
        super({
            code: SignalErrorCode.INVALID_INPUT,
            message,
            timestamp: Date.now(),
            retryable: false,
            metadata
        });
        this.name = "InvalidInputError";
        this.kind = kind;
    }
}

export class PriceSourceError extends SignalError {
    readonly source: string;
    readonly status?: number;

    constructor(source: string, code: SignalErrorCode, message: string, status?: number) {
        super({
            code,
            message,
            timestamp: Date.now(),
            retryable: isRetryableError(code),
            metadata: status === undefined ? { source } : { source, status }
        });
        this.name = "PriceSourceError";
        this.source = source;
        this.status = status;
    }
}

/**
 * Determines if an error is retryable based on error code.
 */
export function isRetryableError(code: SignalErrorCode): boolean {
    const retryableCodes: SignalErrorCode[] = [
        SignalErrorCode.SOURCE_RATE_LIMITED,
        SignalErrorCode.SOURCE_TIMEOUT,
        SignalErrorCode.SOURCE_NETWORK_ERROR,
        SignalErrorCode.SOURCE_SERVER_ERROR
    ];
    return retryableCodes.includes(code);
}

/**
 * Wrap anything thrown by a price collaborator into a PriceSourceError.
 */
export function createPriceSourceError(source: string, error: unknown): PriceSourceError {
    if (error instanceof PriceSourceError) {
        return error;
    }

    if (error instanceof Error) {
        if (error.message.includes("ECONNREFUSED") || error.message.includes("fetch failed")) {
            return new PriceSourceError(source, SignalErrorCode.SOURCE_NETWORK_ERROR, `Connection to ${source} failed: ${error.message}`);
        }
        if (error.message.includes("ETIMEDOUT") || error.message.includes("timeout")) {
            return new PriceSourceError(source, SignalErrorCode.SOURCE_TIMEOUT, `Request timeout to ${source}`);
        }
        return new PriceSourceError(source, SignalErrorCode.UNKNOWN, error.message);
    }

    return new PriceSourceError(source, SignalErrorCode.UNKNOWN, String(error));
}
