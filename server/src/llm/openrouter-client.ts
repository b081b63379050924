import { z } from 'zod';
import { CompletionError } from '../errors.js';
import type { LLMProvider, GenerateOptions } from './provider.js';

const completionSchema = z.object({
    choices: z.array(z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
    })),
});

/**
 * Chat-completions client for OpenRouter. Any OpenAI-compatible endpoint works
 * by passing its base URL.
 */
export class OpenRouterClient implements LLMProvider {
    readonly id = 'openrouter';
    private apiKey: string;
    private baseUrl: string;

    constructor(apiKey: string, baseUrl = 'https://openrouter.ai/api/v1', private fetchImpl: typeof fetch = fetch) {
        if (!apiKey) {
            throw new Error('OpenRouter API key is required');
        }
        this.apiKey = apiKey;
        this.baseUrl = `${baseUrl.replace(/\/+$/, '')}/chat/completions`;
    }

    private get headers() {
        return {
            'Authorization': `Bearer ${this.apiKey}`,
            'Content-Type': 'application/json',
            'X-Title': 'Assignment Assistant',
        };
    }

    async generate(
        modelId: string,
        prompt: string,
        options?: GenerateOptions
    ): Promise<string> {
        const body = {
            model: modelId,
            messages: [
                ...(options?.systemInstruction ? [{ role: 'system', content: options.systemInstruction }] : []),
                { role: 'user', content: prompt }
            ],
            temperature: options?.temperature,
            max_tokens: options?.maxTokens,
        };

        console.log(`[OpenRouter] Sending request to ${modelId}...`);

        let response: Response;
        try {
            response = await this.fetchImpl(this.baseUrl, {
                method: 'POST',
                headers: this.headers,
                body: JSON.stringify(body),
                signal: options?.signal,
            });
        } catch (error) {
            if (options?.signal?.aborted) throw error;
            throw new CompletionError(`OpenRouter request failed: ${String(error)}`, this.id);
        }

        if (!response.ok) {
            const error = await response.text();
            throw new CompletionError(`OpenRouter API error: ${response.status} ${error}`, this.id, response.status);
        }

        const parsed = completionSchema.safeParse(await response.json());
        if (!parsed.success) {
            throw new CompletionError('OpenRouter returned an unexpected response shape', this.id, response.status);
        }
        const text = parsed.data.choices[0]?.message?.content ?? '';
        if (!text) {
            throw new CompletionError('Empty response from OpenRouter', this.id);
        }
        return text;
    }
}
