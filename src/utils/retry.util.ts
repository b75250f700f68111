import OpenAI from 'openai';
import { logger } from '../config/logger';
import { errorMessage } from './errors';

export interface RetryOptions {
    maxAttempts?: number;
    baseDelay?: number;
    maxDelay?: number;
    backoffMultiplier?: number;
    operationName?: string;
}

export interface IRetryUtil {
    executeWithRetry<T>(operation: () => Promise<T>, options?: RetryOptions): Promise<T>;
}

const RETRYABLE_CODES = new Set(['ECONNRESET', 'ENOTFOUND', 'ECONNREFUSED', 'ETIMEDOUT']);
const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);
const RETRYABLE_MESSAGES = ['timeout', 'rate limit', 'quota', 'connection', 'network'];

function readProperty(error: unknown, key: 'code' | 'status'): unknown {
    if (typeof error === 'object' && error !== null && key in error) {
        return Reflect.get(error, key);
    }
    return undefined;
}

/**
 * Retry Utility
 *
 * Exponential backoff for calls to flaky external services. Only errors that
 * look transient (network codes, OpenAI connection errors, 429/5xx, rate
 * limit messages) are retried.
 */
export class RetryUtil {
    static async executeWithRetry<T>(
        operation: () => Promise<T>,
        options: RetryOptions = {}
    ): Promise<T> {
        const {
            maxAttempts = 3,
            baseDelay = 1000,
            maxDelay = 10000,
            backoffMultiplier = 2,
            operationName = 'operation'
        } = options;

        let lastError: unknown = null;

        for (let attempt = 1; attempt <= maxAttempts; attempt++) {
            try {
                logger.debug({
                    operation: operationName,
                    attempt,
                    maxAttempts
                }, `Executing ${operationName} (attempt ${attempt}/${maxAttempts})`);

                const result = await operation();

                if (attempt > 1) {
                    logger.info({
                        operation: operationName,
                        attempt,
                        maxAttempts
                    }, `${operationName} succeeded on attempt ${attempt}`);
                }

                return result;

            } catch (error) {
                lastError = error;
                const retryable = this.isRetryableError(error);

                logger.warn({
                    operation: operationName,
                    attempt,
                    maxAttempts,
                    error: errorMessage(error),
                    isRetryable: retryable
                }, `${operationName} failed on attempt ${attempt}`);

                if (attempt === maxAttempts) {
                    break;
                }

                if (!retryable) {
                    logger.error({
                        operation: operationName,
                        error: errorMessage(error)
                    }, `${operationName} failed with non-retryable error`);
                    break;
                }

                const delay = Math.min(
                    baseDelay * Math.pow(backoffMultiplier, attempt - 1),
                    maxDelay
                );

                logger.info({
                    operation: operationName,
                    attempt,
                    delay
                }, `Retrying ${operationName} in ${delay}ms`);

                await this.sleep(delay);
            }
        }

        logger.error({
            operation: operationName,
            maxAttempts,
            error: lastError === null ? undefined : errorMessage(lastError)
        }, `${operationName} failed after ${maxAttempts} attempts`);

        throw lastError ?? new Error(`${operationName} failed after ${maxAttempts} attempts`);
    }

    static isRetryableError(error: unknown): boolean {
        // Includes APIConnectionTimeoutError
        if (error instanceof OpenAI.APIConnectionError) {
            return true;
        }

        const code = readProperty(error, 'code');
        if (typeof code === 'string' && RETRYABLE_CODES.has(code)) {
            return true;
        }

        const status = readProperty(error, 'status');
        if (typeof status === 'number' && RETRYABLE_STATUSES.has(status)) {
            return true;
        }

        const message = errorMessage(error).toLowerCase();
        return RETRYABLE_MESSAGES.some(fragment => message.includes(fragment));
    }

    private static sleep(ms: number): Promise<void> {
        return new Promise(resolve => setTimeout(resolve, ms));
    }
}
