import { GoogleGenAI } from '@google/genai';
import { CompletionError, statusOf } from '../errors.js';
import type { LLMProvider, GenerateOptions } from './provider.js';

export class GeminiClient implements LLMProvider {
    readonly id = 'gemini';
    private client: GoogleGenAI;

    constructor(apiKey: string) {
        if (!apiKey) {
            throw new Error('Gemini API key is required');
        }
        this.client = new GoogleGenAI({ apiKey });
    }

    async generate(
        modelId: string,
        prompt: string,
        options?: GenerateOptions
    ): Promise<string> {
        let text: string | undefined;
        try {
            const result = await this.client.models.generateContent({
                model: modelId,
                contents: [{ role: 'user', parts: [{ text: prompt }] }],
                config: {
                    systemInstruction: options?.systemInstruction,
                    temperature: options?.temperature,
                    maxOutputTokens: options?.maxTokens,
                    abortSignal: options?.signal,
                },
            });
            text = result.text;
        } catch (error) {
            if (options?.signal?.aborted) throw error;
            console.error('Gemini generate error:', error);
            throw new CompletionError(`Gemini API error: ${String(error)}`, this.id, statusOf(error));
        }

        if (!text) {
            throw new CompletionError('Empty response from Gemini', this.id);
        }
        return text;
    }
}
