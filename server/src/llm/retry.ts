import { RunCancelledError, errorMessage, throwIfCancelled } from '../errors.js';

export interface RetryOptions {
    maxRetries?: number;
    initialDelay?: number;
    maxDelay?: number;
    backoffFactor?: number;
    /** Returning false stops retrying and rethrows immediately. */
    shouldRetry?: (error: unknown) => boolean;
    signal?: AbortSignal;
    label?: string;
}

const defaultOptions: Required<Omit<RetryOptions, 'signal'>> = {
    maxRetries: 5,
    initialDelay: 1000,
    maxDelay: 60000,
    backoffFactor: 2,
    shouldRetry: () => true,
    label: 'Retry',
};

export function isRateLimitError(error: unknown): boolean {
    const message = errorMessage(error);
    return message.includes('429') || message.includes('quota') || message.includes('RESOURCE_EXHAUSTED');
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(new RunCancelledError());
            return;
        }
        const onAbort = () => {
            clearTimeout(timer);
            reject(new RunCancelledError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions = {}
): Promise<T> {
    const opts = { ...defaultOptions, ...options };
    let lastError: unknown;
    let delay = opts.initialDelay;

    for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
        throwIfCancelled(opts.signal);
        try {
            return await fn(attempt);
        } catch (error) {
            lastError = error;
            if (error instanceof RunCancelledError || opts.signal?.aborted) throw error;
            if (!opts.shouldRetry(error) || attempt === opts.maxRetries) break;

            if (isRateLimitError(error)) {
                // Rate limits need a longer pause than ordinary transient failures
                if (delay < 5000 && opts.initialDelay > 0) delay = Math.min(5000, opts.maxDelay);
                console.warn(`[${opts.label}] Rate limit hit (attempt ${attempt + 1}/${opts.maxRetries + 1}). Waiting ${delay}ms...`);
            } else {
                console.warn(`[${opts.label}] Attempt ${attempt + 1} failed, retrying in ${delay}ms...`, errorMessage(error));
            }

            await sleep(delay, opts.signal);

            // Exponential backoff
            delay = Math.min(delay * opts.backoffFactor, opts.maxDelay);
        }
    }

    throw lastError;
}
