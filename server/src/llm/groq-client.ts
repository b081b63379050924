import Groq from 'groq-sdk';
import { CompletionError, statusOf } from '../errors.js';
import type { LLMProvider, GenerateOptions } from './provider.js';

export class GroqClient implements LLMProvider {
    readonly id = 'groq';
    private client: Groq;

    constructor(apiKey: string) {
        if (!apiKey) {
            throw new Error('Groq API key is required');
        }
        // Retries are owned by the pipeline's own backoff policy
        this.client = new Groq({ apiKey, maxRetries: 0 });
    }

    async generate(
        modelId: string,
        prompt: string,
        options?: GenerateOptions
    ): Promise<string> {
        let text = '';
        try {
            const completion = await this.client.chat.completions.create(
                {
                    messages: [
                        {
                            role: 'system',
                            content: options?.systemInstruction || 'You are a helpful AI assistant.'
                        },
                        {
                            role: 'user',
                            content: prompt
                        }
                    ],
                    model: modelId,
                    temperature: options?.temperature ?? 0.7,
                    max_tokens: options?.maxTokens,
                },
                { signal: options?.signal }
            );
            text = completion.choices[0]?.message?.content || '';
        } catch (error) {
            if (options?.signal?.aborted) throw error;
            console.error('Groq generate error:', error);
            throw new CompletionError(`Groq API error: ${String(error)}`, this.id, statusOf(error));
        }

        if (!text) {
            throw new CompletionError('Empty response from Groq', this.id);
        }
        return text;
    }
}
