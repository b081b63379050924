import { CompletionError, statusOf } from '../errors.js';
import { isRateLimitError } from './retry.js';

export interface GenerateOptions {
    systemInstruction?: string;
    temperature?: number;
    maxTokens?: number; // Maximum number of tokens to generate
    signal?: AbortSignal;
}

export interface LLMProvider {
    /**
     * unique identifier for the provider (e.g. "gemini", "openrouter")
     */
    readonly id: string;

    /**
     * Generate text response (non-streaming). Rejects with CompletionError on
     * rate limits, server errors and empty responses.
     */
    generate(
        modelId: string,
        prompt: string,
        options?: GenerateOptions
    ): Promise<string>;
}

/**
 * Rate limits, server errors and network failures are worth another attempt;
 * other 4xx answers (bad key, unknown model) are not.
 */
export function isRetryableCompletionError(error: unknown): boolean {
    if (isRateLimitError(error)) return true;
    const status = statusOf(error);
    if (status === undefined) return error instanceof CompletionError || error instanceof TypeError;
    return status === 408 || status === 429 || status >= 500;
}
