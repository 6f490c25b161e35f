/**
 * Retry Logic with Exponential Backoff
 *
 * Retries an async operation while `shouldRetry` accepts the error. Used to
 * ride out a document store that is still starting when a session opens.
 */

export interface RetryOptions {
    maxRetries?: number;
    initialDelay?: number;
    maxDelay?: number;
    shouldRetry?: (error: unknown) => boolean;
    onRetry?: (attempt: number, error: unknown, delay: number) => void;
    /** Injected in tests to skip real waiting. */
    sleep?: (ms: number) => Promise<void>;
}

const TRANSIENT_ERROR_NAMES = new Set([
    'MongoServerSelectionError',
    'MongoNetworkError',
    'MongoNetworkTimeoutError',
    'MongoTopologyClosedError'
]);

export function isTransientConnectionError(error: unknown): boolean {
    if (!(error instanceof Error)) return false;
    if (TRANSIENT_ERROR_NAMES.has(error.name)) return true;
    return /ECONNREFUSED|ETIMEDOUT|ECONNRESET/.test(error.message);
}

function delay(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
    maxRetries: 3,
    initialDelay: 500,
    maxDelay: 5000,
    shouldRetry: isTransientConnectionError,
    onRetry: () => { },
    sleep: delay
};

export async function retryWithBackoff<T>(
    fn: () => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const opts = { ...DEFAULT_OPTIONS, ...options };

    for (let attempt = 0; ; attempt++) {
        try {
            return await fn();
        } catch (error) {
            if (!opts.shouldRetry(error) || attempt >= opts.maxRetries) {
                throw error;
            }

            // 2^attempt * initialDelay, capped at maxDelay
            const backoffDelay = Math.min(opts.initialDelay * Math.pow(2, attempt), opts.maxDelay);
            opts.onRetry(attempt + 1, error, backoffDelay);
            await opts.sleep(backoffDelay);
        }
    }
}
