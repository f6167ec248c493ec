// src/core/common/errors.ts

/**
 * Base class for custom application errors.
 * Separates operational errors (expected, like a bad ledger row) from programmer errors.
 */
export class AppError extends Error {
    public readonly exitCode: number;
    public readonly isOperational: boolean;

    constructor(
        name: string,
        message: string,
        exitCode: number = 1,
        isOperational: boolean = true
        ) {
        super(message);
        this.name = name;
        this.exitCode = exitCode;
        this.isOperational = isOperational;

        // Maintain proper stack trace (only available on V8)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }

        // Set the prototype explicitly for extending built-in classes
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Error for issues during configuration loading or validation.
 */
export class ConfigurationError extends AppError {
    constructor(message: string) {
        // Configuration errors prevent startup.
        super('ConfigurationError', message, 1, false);
    }
}

/**
 * Error for operations on records whose fields are not populated.
 */
export class ValidationError extends AppError {
    constructor(message: string = 'Data validation failed') {
        super('ValidationError', message, 1, true);
    }
}

/**
 * Raised when the ledger file cannot be trusted (bad header, malformed row)
 * or a record cannot be written without corrupting it. Always fatal for a run.
 */
export class LedgerFormatError extends AppError {
    public readonly lineNumber?: number;

    constructor(message: string, lineNumber?: number) {
        super('LedgerFormatError', lineNumber !== undefined ? `Line ${lineNumber}: ${message}` : message, 2, true);
        this.lineNumber = lineNumber;
    }
}

/**
 * Per-file failure of the remote extraction call. Recoverable: the batch continues.
 */
export class ExtractionError extends AppError {
    public readonly filename: string;
    public readonly status?: number;

    constructor(filename: string, message: string, status?: number, originalError?: Error) {
        const fullMessage = originalError
            ? `${message}: ${originalError.message}`
            : message;
        super('ExtractionError', fullMessage, 1, true);
        this.filename = filename;
        this.status = status;
        if (originalError) {
            this.stack = originalError.stack; // Preserve original stack if available
        }
    }
}
