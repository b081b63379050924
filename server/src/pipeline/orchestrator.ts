import { v4 as uuidv4 } from 'uuid';
import { SolutionAgent } from '../agents/solution-agent.js';
import { SummaryAgent } from '../agents/summary-agent.js';
import type { PipelineConfig } from '../config/pipeline-config.js';
import { EthicsGateRejectedError, GenerationFailureError, throwIfCancelled } from '../errors.js';
import type { LLMProvider } from '../llm/provider.js';
import { ResourceFetcher } from '../resources/resource-fetcher.js';
import { TranscriptEnricher, collectVideoReferences } from '../resources/transcript-enricher.js';
import type { ResourceReader, TranscriptSource } from '../sources/types.js';
import type {
    Assignment,
    ContextBundle,
    FetchOutcome,
    PipelineContext,
    PipelineEvent,
    PipelineObserver,
    PipelineRunResult,
    PipelineStage,
    ResolvedResource,
    SummaryArtifact,
} from '../types.js';
import { assembleContext, omissions } from './context-assembler.js';
import type { EthicsGate, GateState } from './ethics-gate.js';
import { mapWithConcurrency } from './worker-pool.js';

export interface OrchestratorDeps {
    config: Readonly<PipelineConfig>;
    llm: LLMProvider;
    reader: ResourceReader;
    transcripts: TranscriptSource;
}

export interface RunOptions {
    gate: EthicsGate;
    signal?: AbortSignal;
    runId?: string;
}

/**
 * Drives one assignment through fetch → enrich → summarize → assemble →
 * ethics → generate. Holds no per-run state, so one instance can serve
 * several concurrent runs. Every completion call waits for the ethics gate:
 * when a unit needs condensing, the summarize stage asks for the decision and
 * the ethics stage reuses it.
 */
export class PipelineOrchestrator {
    private observers = new Set<PipelineObserver>();
    private fetcher: ResourceFetcher;
    private enricher: TranscriptEnricher;

    constructor(private deps: OrchestratorDeps) {
        const { config } = deps;
        this.fetcher = new ResourceFetcher(deps.reader, {
            retryLimit: config.fetchRetryLimit,
            timeoutMs: config.fetchTimeoutMs,
            initialDelayMs: config.retryInitialDelayMs,
            maxDelayMs: config.retryMaxDelayMs,
        });
        this.enricher = new TranscriptEnricher(deps.transcripts);
    }

    subscribe(observer: PipelineObserver): () => void {
        this.observers.add(observer);
        return () => this.observers.delete(observer);
    }

    private emit(event: PipelineEvent) {
        for (const observer of this.observers) {
            try {
                observer(event);
            } catch (error) {
                console.error('[Orchestrator] Observer threw:', error);
            }
        }
    }

    private createContext(runId: string, signal?: AbortSignal): PipelineContext {
        return {
            runId,
            config: this.deps.config,
            llm: this.deps.llm,
            signal,
            emit: event => this.emit(event),
        };
    }

    private async stage<T>(runId: string, stage: PipelineStage, signal: AbortSignal | undefined, work: () => Promise<T>): Promise<T> {
        throwIfCancelled(signal);
        this.emit({ type: 'stage:entered', runId, stage });
        const result = await work();
        throwIfCancelled(signal);
        this.emit({ type: 'stage:completed', runId, stage });
        return result;
    }

    /**
     * Full run. Resolves with a completed draft or a named run-level failure;
     * rejects only with RunCancelledError when the caller aborts.
     */
    async run(assignment: Assignment, options: RunOptions): Promise<PipelineRunResult> {
        const runId = options.runId ?? uuidv4();
        console.log(`[Orchestrator] Run ${runId}: "${assignment.title}" with ${assignment.resources.length} linked resources`);

        let bundle: ContextBundle;
        try {
            bundle = await this.collect(assignment, runId, options.gate, options.signal);
        } catch (error) {
            if (error instanceof EthicsGateRejectedError) return this.rejected(runId, error);
            throw error;
        }
        return this.generate(bundle, { ...options, runId });
    }

    /** Re-runs only the ethics and generation stages on an already assembled bundle. */
    async retryGeneration(bundle: ContextBundle, options: RunOptions): Promise<PipelineRunResult> {
        return this.generate(bundle, options);
    }

    /** Rejects with EthicsGateRejectedError when condensation is needed and the gate says no. */
    async collect(assignment: Assignment, runId: string, gate: EthicsGate, signal?: AbortSignal): Promise<ContextBundle> {
        const { config } = this.deps;
        const context = this.createContext(runId, signal);

        const resolveOne = (resolved: ResolvedResource): ResolvedResource => {
            const { outcome } = resolved;
            this.emit({
                type: 'resource:resolved',
                runId,
                resourceId: resolved.resource.id,
                outcome: outcome.type,
                ...(outcome.type === 'failed' ? { reason: outcome.reason } : {}),
            });
            return resolved;
        };

        // 1. Fetch every non-video resource through the bounded pool
        const documents = assignment.resources.filter(r => r.kind !== 'video');
        const fetched = await this.stage(runId, 'fetch', signal, () =>
            mapWithConcurrency(documents, config.maxConcurrentFetches, async resource =>
                resolveOne({ resource, outcome: await this.fetcher.fetch(resource, signal) }), signal)
        );

        // 2. Transcripts for listed videos and for videos mentioned in any text
        const references = collectVideoReferences(assignment, fetched);
        const transcripts = await this.stage(runId, 'enrich', signal, () =>
            mapWithConcurrency(references, config.maxConcurrentFetches, async reference =>
                resolveOne({
                    resource: reference.resource,
                    outcome: await this.enricher.enrich(reference, signal),
                    discovered: reference.discovered,
                }), signal)
        );

        const byId = new Map<string, ResolvedResource>();
        for (const entry of [...fetched, ...transcripts]) byId.set(entry.resource.id, entry);
        const ordered: ResolvedResource[] = assignment.resources.map(resource => byId.get(resource.id) ?? {
            resource,
            outcome: { type: 'failed', reason: 'NoTranscript', detail: 'Duplicate video reference' } satisfies FetchOutcome,
        });
        ordered.push(...transcripts.filter(t => t.discovered));

        // 3. Condense oversized units, one model call at a time
        const artifacts = await this.stage(runId, 'summarize', signal, async () => {
            const summarizer = new SummaryAgent(context);
            const collected = new Map<string, SummaryArtifact>();
            const oversized = ordered.filter(({ outcome }) =>
                outcome.type !== 'failed' && outcome.text.length > config.summarizationThresholdChars);
            console.log(`[Orchestrator] Run ${runId}: ${oversized.length} units over ${config.summarizationThresholdChars} characters`);

            if (oversized.length > 0) {
                const decision = await this.awaitGate(runId, gate, signal);
                if (decision !== 'acknowledged') throw new EthicsGateRejectedError(gate.rejectionReason ?? 'declined');
            }

            for (const { resource, outcome } of ordered) {
                if (outcome.type === 'failed') continue;
                collected.set(resource.id, await summarizer.run({
                    resourceId: resource.id,
                    text: outcome.text,
                    budget: config.summarizationThresholdChars,
                    focus: assignment.title,
                }));
            }
            return collected;
        });

        // 4. Merge
        const bundle = await this.stage(runId, 'assemble', signal, async () => assembleContext(assignment, ordered, artifacts));
        console.log(`[Orchestrator] Run ${runId}: ${bundle.sections.length} sections, ${omissions(bundle).length} omitted`);
        return bundle;
    }

    private awaitGate(runId: string, gate: EthicsGate, signal?: AbortSignal): Promise<GateState> {
        const { ethicsGateTimeoutMs } = this.deps.config;
        if (gate.state === 'pending') {
            this.emit({ type: 'ethics:pending', runId, timeoutMs: ethicsGateTimeoutMs });
        }
        return gate.awaitDecision(ethicsGateTimeoutMs, signal);
    }

    private rejected(runId: string, error: EthicsGateRejectedError): PipelineRunResult {
        console.warn(`[Orchestrator] Run ${runId} stopped: ${error.message}`);
        this.emit({ type: 'run:failed', runId, error: 'EthicsGateRejected', message: error.message });
        return { status: 'failed', error: 'EthicsGateRejected', message: error.message };
    }

    private async generate(bundle: ContextBundle, options: RunOptions): Promise<PipelineRunResult> {
        const runId = options.runId ?? uuidv4();
        const { signal, gate } = options;

        const decision = await this.stage(runId, 'ethics', signal, () => this.awaitGate(runId, gate, signal));
        if (decision !== 'acknowledged') {
            return this.rejected(runId, new EthicsGateRejectedError(gate.rejectionReason ?? 'declined'));
        }

        try {
            const draft = await this.stage(runId, 'generate', signal, () =>
                new SolutionAgent(this.createContext(runId, signal)).run({ bundle, gate })
            );
            this.emit({ type: 'run:completed', runId, draft });
            return { status: 'completed', draft };
        } catch (error) {
            if (!(error instanceof GenerationFailureError)) throw error;
            console.error(`[Orchestrator] Run ${runId} failed: ${error.message}`);
            this.emit({ type: 'run:failed', runId, error: 'GenerationFailure', message: error.message });
            return { status: 'failed', error: 'GenerationFailure', message: error.message, bundle: error.bundle };
        }
    }
}
