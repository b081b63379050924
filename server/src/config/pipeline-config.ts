import { z } from 'zod';

export const providerIds = ['gemini', 'groq', 'openrouter'] as const;
export type ProviderId = (typeof providerIds)[number];

const pipelineSchema = z.object({
    MAX_CONCURRENT_FETCHES: z.coerce.number().int().min(1).max(32).default(4),
    SUMMARIZATION_THRESHOLD_CHARS: z.coerce.number().int().min(200).default(6000),
    MAX_PROMPT_CHARS: z.coerce.number().int().min(1000).default(60000),
    FETCH_RETRY_LIMIT: z.coerce.number().int().min(0).max(10).default(2),
    GENERATION_RETRY_LIMIT: z.coerce.number().int().min(0).max(10).default(3),
    ETHICS_GATE_TIMEOUT_MS: z.coerce.number().int().min(1000).default(5 * 60 * 1000),
    FETCH_TIMEOUT_MS: z.coerce.number().int().min(1000).default(20000),
    RETRY_INITIAL_DELAY_MS: z.coerce.number().int().min(0).default(1000),
    RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(30000),
    LLM_PROVIDER: z.enum(providerIds).default('gemini'),
    CONDENSATION_MODEL: z.string().min(1).default('gemini-2.0-flash-lite'),
    GENERATION_MODEL: z.string().min(1).default('gemini-2.5-pro'),
});

export interface PipelineConfig {
    maxConcurrentFetches: number;
    summarizationThresholdChars: number;
    maxPromptChars: number;
    fetchRetryLimit: number;
    generationRetryLimit: number;
    ethicsGateTimeoutMs: number;
    fetchTimeoutMs: number;
    retryInitialDelayMs: number;
    retryMaxDelayMs: number;
    provider: ProviderId;
    condensationModel: string;
    generationModel: string;
}

const defaults: PipelineConfig = toPipelineConfig(pipelineSchema.parse({}));

function toPipelineConfig(env: z.infer<typeof pipelineSchema>): PipelineConfig {
    return {
        maxConcurrentFetches: env.MAX_CONCURRENT_FETCHES,
        summarizationThresholdChars: env.SUMMARIZATION_THRESHOLD_CHARS,
        maxPromptChars: env.MAX_PROMPT_CHARS,
        fetchRetryLimit: env.FETCH_RETRY_LIMIT,
        generationRetryLimit: env.GENERATION_RETRY_LIMIT,
        ethicsGateTimeoutMs: env.ETHICS_GATE_TIMEOUT_MS,
        fetchTimeoutMs: env.FETCH_TIMEOUT_MS,
        retryInitialDelayMs: env.RETRY_INITIAL_DELAY_MS,
        retryMaxDelayMs: env.RETRY_MAX_DELAY_MS,
        provider: env.LLM_PROVIDER,
        condensationModel: env.CONDENSATION_MODEL,
        generationModel: env.GENERATION_MODEL,
    };
}

/**
 * Reads the pipeline settings once at process start. The result is frozen and
 * passed by reference into every run; nothing below the orchestrator reads env.
 */
export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): Readonly<PipelineConfig> {
    // Empty strings in .env mean "unset"
    const cleaned = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== ''));
    const parsed = pipelineSchema.safeParse(cleaned);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new Error(`Invalid pipeline configuration: ${issues}`);
    }
    return Object.freeze(toPipelineConfig(parsed.data));
}

/** Defaults merged with explicit overrides, frozen. Used by tests and scripts. */
export function createPipelineConfig(overrides: Partial<PipelineConfig> = {}): Readonly<PipelineConfig> {
    return Object.freeze({ ...defaults, ...overrides });
}
