import type { ProviderId } from '../config/pipeline-config.js';
import type { ServerConfig } from '../config/server-config.js';
import { GeminiClient } from './gemini-client.js';
import { GroqClient } from './groq-client.js';
import { OpenRouterClient } from './openrouter-client.js';
import type { LLMProvider } from './provider.js';

export function createProvider(provider: ProviderId, config: ServerConfig): LLMProvider {
    switch (provider) {
        case 'gemini':
            return new GeminiClient(config.apiKeys.gemini ?? '');
        case 'groq':
            return new GroqClient(config.apiKeys.groq ?? '');
        case 'openrouter':
            return new OpenRouterClient(config.apiKeys.openrouter ?? '', config.openaiBaseUrl);
    }
}

export function availableProviders(config: ServerConfig): ProviderId[] {
    const providers: ProviderId[] = [];
    if (config.apiKeys.gemini) providers.push('gemini');
    if (config.apiKeys.groq) providers.push('groq');
    if (config.apiKeys.openrouter) providers.push('openrouter');
    return providers;
}
