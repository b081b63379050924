import type { PipelineContext } from '../types.js';
import type { GenerateOptions } from '../llm/provider.js';
import { isRetryableCompletionError } from '../llm/provider.js';
import { withRetry } from '../llm/retry.js';

export abstract class BaseAgent<TInput, TOutput> {
    abstract readonly id: string;
    abstract readonly name: string;
    abstract readonly description: string;

    protected context: PipelineContext;

    constructor(context: PipelineContext) {
        this.context = context;
    }

    abstract run(input: TInput): Promise<TOutput>;

    protected async generateText(
        modelId: string,
        prompt: string,
        options: GenerateOptions = {},
        maxRetries = 0
    ): Promise<string> {
        const { llm, config, signal } = this.context;

        this.log(`Generating text with model ${modelId}...`);

        return withRetry(() => llm.generate(modelId, prompt, { ...options, signal }), {
            maxRetries,
            initialDelay: config.retryInitialDelayMs,
            maxDelay: config.retryMaxDelayMs,
            shouldRetry: isRetryableCompletionError,
            signal,
            label: this.name,
        });
    }

    protected log(message: string) {
        console.log(`[${this.name}] ${message}`);
        this.context.emit?.({
            type: 'agent:thinking',
            runId: this.context.runId,
            agent: this.name,
            message,
            timestamp: new Date().toISOString(),
        });
    }
}
