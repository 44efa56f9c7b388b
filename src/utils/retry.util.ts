import { logger as defaultLogger, ILogger } from '../config/logger';
import { toError } from './errors';

export type RetryOutcome<T> =
    | { status: 'succeeded'; value: T; attempts: number }
    | { status: 'fatal'; error: Error; attempts: number }
    | { status: 'exhausted'; error: Error; attempts: number };

export interface RetryOptions<T> {
    maxAttempts?: number;
    baseDelay?: number;
    maxDelay?: number;
    backoffMultiplier?: number;
    operationName?: string;
    /** Decides whether a thrown value may be retried. Defaults to network/5xx detection. */
    isRetryable?: (error: unknown) => boolean;
    /** Quality gate on a returned value; a rejected value counts as a retryable failure. */
    accept?: (value: T) => boolean;
    sleep?: (ms: number) => Promise<void>;
    logger?: ILogger;
}

export interface IRetryUtil {
    execute<T>(operation: (attempt: number) => Promise<T>, options?: RetryOptions<T>): Promise<RetryOutcome<T>>;
}

/**
 * Retry Utility
 *
 * Bounded retry loop with configurable backoff. Attempts end in one of three
 * states: succeeded, fatal (a non-retryable error stops the loop at once) or
 * exhausted (every attempt failed). The caller receives the state and the
 * number of attempts used instead of a rethrown error.
 */
export class RetryUtil {
    static async execute<T>(
        operation: (attempt: number) => Promise<T>,
        options: RetryOptions<T> = {}
    ): Promise<RetryOutcome<T>> {
        const {
            maxAttempts = 3,
            baseDelay = 1000,
            maxDelay = 10000,
            backoffMultiplier = 2,
            operationName = 'operation',
            isRetryable = RetryUtil.isRetryableError,
            accept = () => true,
            sleep = RetryUtil.sleep,
            logger = defaultLogger
        } = options;

        let lastError: Error = new Error(`${operationName} failed after ${maxAttempts} attempts`);

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            try {
                logger.debug({
                    operation: operationName,
                    attempt,
                    maxAttempts
                }, `Executing ${operationName} (attempt ${attempt}/${maxAttempts})`);

                const value = await operation(attempt);

                if (accept(value)) {
                    if (attempt > 1) {
                        logger.info({
                            operation: operationName,
                            attempt,
                            maxAttempts
                        }, `${operationName} succeeded on attempt ${attempt}`);
                    }
                    return { status: 'succeeded', value, attempts: attempt };
                }

                lastError = new Error(`${operationName} returned a result that failed the acceptance check`);
                logger.warn({
                    operation: operationName,
                    attempt,
                    maxAttempts
                }, `${operationName} result rejected on attempt ${attempt}`);

            } catch (error: unknown) {
                lastError = toError(error);
                const retryable = isRetryable(error);

                logger.warn({
                    operation: operationName,
                    attempt,
                    maxAttempts,
                    error: lastError.message,
                    isRetryable: retryable
                }, `${operationName} failed on attempt ${attempt}`);

                if (!retryable) {
                    logger.error({
                        operation: operationName,
                        attempt,
                        error: lastError.message
                    }, `${operationName} failed with non-retryable error`);
                    return { status: 'fatal', error: lastError, attempts: attempt };
                }
            }

            // Don't wait after the last attempt
            if (attempt === maxAttempts) {
                break;
            }

            const delay = RetryUtil.computeDelay(attempt, baseDelay, maxDelay, backoffMultiplier);

            logger.info({
                operation: operationName,
                attempt,
                delay
            }, `Retrying ${operationName} in ${delay}ms`);

            await sleep(delay);
        }

        logger.error({
            operation: operationName,
            maxAttempts,
            error: lastError.message
        }, `${operationName} failed after ${maxAttempts} attempts`);

        return { status: 'exhausted', error: lastError, attempts: maxAttempts };
    }

    /**
     * Delay before the attempt following `attempt`. A multiplier of 1 gives a fixed delay.
     */
    static computeDelay(attempt: number, baseDelay: number, maxDelay: number, backoffMultiplier: number): number {
        return Math.min(baseDelay * Math.pow(backoffMultiplier, attempt - 1), maxDelay);
    }

    /**
     * Check if error is retryable
     */
    static isRetryableError(error: unknown): boolean {
        if (typeof error !== 'object' || error === null) {
            return false;
        }

        const code: unknown = Reflect.get(error, 'code');
        const status: unknown = Reflect.get(error, 'status');
        const rawMessage: unknown = Reflect.get(error, 'message');
        const message = typeof rawMessage === 'string' ? rawMessage.toLowerCase() : '';

        // Network errors
        if (code === 'ECONNRESET' || code === 'ENOTFOUND' || code === 'ECONNREFUSED' || code === 'ETIMEDOUT') {
            return true;
        }

        // Server-side errors
        if (status === 500 || status === 502 || status === 503 || status === 504) {
            return true;
        }

        return message.includes('timeout') || message.includes('connection') || message.includes('network');
    }

    static sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}
