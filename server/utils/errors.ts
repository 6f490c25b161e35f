/**
 * Raised when the environment or the reconciled field table is invalid.
 * Start-up aborts on it.
 */
export class ConfigurationError extends Error {
    constructor(message: string, readonly issues: string[] = []) {
        super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Raised when the document store cannot be reached at session start.
 * Fatal for the whole session.
 */
export class StorageConnectionError extends Error {
    constructor(message: string, readonly cause?: unknown) {
        super(message);
        this.name = 'StorageConnectionError';
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
