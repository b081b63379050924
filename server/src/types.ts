import type { LLMProvider } from './llm/provider.js';
import type { PipelineConfig } from './config/pipeline-config.js';

export type ResourceKind = 'document' | 'webpage' | 'plainText' | 'video';

export interface LinkedResource {
    id: string;
    url: string;
    kind: ResourceKind;
    label?: string;
}

export interface Assignment {
    id: string;
    courseId: string;
    courseName?: string;
    title: string;
    description: string; // plain text, HTML already stripped
    resources: readonly LinkedResource[];
    dueAt?: string | null;
    htmlUrl?: string;
}

export type FailureReason = 'AccessError' | 'FetchError' | 'UnsupportedFormat' | 'NoTranscript';

export type FetchOutcome =
    | { type: 'content'; text: string; videoIds?: readonly string[] } // ids linked or embedded in the markup
    | { type: 'videoTranscript'; text: string }
    | { type: 'failed'; reason: FailureReason; detail: string };

/** A fetch outcome together with the resource it belongs to. */
export interface ResolvedResource {
    resource: LinkedResource;
    outcome: FetchOutcome;
    discovered?: boolean; // video found inside text rather than in the resource list
}

export interface SummaryArtifact {
    text: string;
    wasSummarized: boolean;
    degraded?: boolean;
    sourceChars: number;
}

export type SectionSource = 'resource' | 'transcript';

export interface ContextSection {
    resourceId: string;
    label: string;
    source: SectionSource;
    artifact: SummaryArtifact;
}

export type ManifestEntry =
    | {
        resourceId: string;
        url: string;
        kind: ResourceKind;
        status: 'included';
        source: SectionSource;
        wasSummarized: boolean;
        degraded: boolean;
        chars: number;
    }
    | {
        resourceId: string;
        url: string;
        kind: ResourceKind;
        status: 'omitted';
        reason: FailureReason;
        detail: string;
    };

export interface ContextBundle {
    assignmentId: string;
    assignmentTitle: string;
    assignmentText: string;
    sections: readonly ContextSection[];
    manifest: readonly ManifestEntry[];
}

export interface SolutionDraft {
    assignmentId: string;
    assignmentTitle: string;
    answer: string;
    prompt: string;
    modelId: string;
    manifest: readonly ManifestEntry[];
    droppedSections: readonly string[];
    createdAt: string;
}

export type RunFailure = 'EthicsGateRejected' | 'GenerationFailure';

export type PipelineRunResult =
    | { status: 'completed'; draft: SolutionDraft }
    | { status: 'failed'; error: RunFailure; message: string; bundle?: ContextBundle };

export type PipelineStage = 'fetch' | 'enrich' | 'summarize' | 'assemble' | 'ethics' | 'generate';

export type PipelineEvent =
    | { type: 'stage:entered'; runId: string; stage: PipelineStage }
    | { type: 'stage:completed'; runId: string; stage: PipelineStage }
    | { type: 'resource:resolved'; runId: string; resourceId: string; outcome: FetchOutcome['type']; reason?: FailureReason }
    | { type: 'summary:degraded'; runId: string; resourceId: string; message: string }
    | { type: 'ethics:pending'; runId: string; timeoutMs: number }
    | { type: 'agent:thinking'; runId: string; agent: string; message: string; timestamp: string }
    | { type: 'run:completed'; runId: string; draft: SolutionDraft }
    | { type: 'run:failed'; runId: string; error: RunFailure; message: string };

export type PipelineObserver = (event: PipelineEvent) => void;

/** Per-run state handed to agents, the way every agent reaches its collaborators. */
export interface PipelineContext {
    runId: string;
    config: PipelineConfig;
    llm: LLMProvider;
    signal?: AbortSignal;
    emit?: PipelineObserver;
}

export interface AgentResult<T> {
    success: boolean;
    data?: T;
    error?: string;
}
