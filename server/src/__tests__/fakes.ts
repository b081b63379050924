import { CompletionError, HttpStatusError, TranscriptNotFoundError } from '../errors.js';
import type { GenerateOptions, LLMProvider } from '../llm/provider.js';
import type { RawResource, ResourceReader, TranscriptSegment, TranscriptSource } from '../sources/types.js';
import type { LinkedResource } from '../types.js';

export interface LLMCall {
    modelId: string;
    prompt: string;
    options?: GenerateOptions;
}

type Responder = (call: LLMCall) => string | Error;

/** Completion provider that answers from a function and records every call. */
export class FakeLLM implements LLMProvider {
    readonly id = 'fake';
    readonly calls: LLMCall[] = [];

    constructor(private responder: Responder = () => 'ok') {}

    respondWith(responder: Responder) {
        this.responder = responder;
    }

    callsTo(modelId: string): LLMCall[] {
        return this.calls.filter(c => c.modelId === modelId);
    }

    async generate(modelId: string, prompt: string, options?: GenerateOptions): Promise<string> {
        const call = { modelId, prompt, options };
        this.calls.push(call);
        const answer = this.responder(call);
        if (answer instanceof Error) throw answer;
        return answer;
    }
}

export const serverError = () => new CompletionError('HTTP 503: overloaded', 'fake', 503);

type ReaderEntry = RawResource | HttpStatusError | Error | ((signal?: AbortSignal) => Promise<RawResource>);

export const page = (url: string, text: string, contentType = 'text/plain'): RawResource => ({
    bytes: new TextEncoder().encode(text),
    contentType,
    finalUrl: url,
});

/** Serves resources from a URL map; unknown URLs answer 404. */
export class FakeReader implements ResourceReader {
    readonly reads: string[] = [];
    private entries = new Map<string, ReaderEntry[]>();

    /** Entries are served in order; the last one repeats. */
    on(url: string, ...entries: ReaderEntry[]): this {
        this.entries.set(url, entries);
        return this;
    }

    count(url: string): number {
        return this.reads.filter(u => u === url).length;
    }

    async readResource(resource: LinkedResource, signal?: AbortSignal): Promise<RawResource> {
        this.reads.push(resource.url);
        const queue = this.entries.get(resource.url);
        if (!queue || queue.length === 0) throw new HttpStatusError(404, resource.url);

        const entry = queue.length > 1 ? queue.shift() : queue[0];
        if (typeof entry === 'function') return entry(signal);
        if (entry instanceof Error) throw entry;
        if (!entry) throw new HttpStatusError(404, resource.url);
        return entry;
    }
}

export class FakeTranscripts implements TranscriptSource {
    readonly requested: string[] = [];

    constructor(private transcripts: Record<string, string[]> = {}) {}

    async fetchTranscript(videoId: string): Promise<TranscriptSegment[]> {
        this.requested.push(videoId);
        const lines = this.transcripts[videoId];
        if (!lines) throw new TranscriptNotFoundError(videoId, 'captions are disabled or unavailable');
        return lines.map((text, i) => ({ text, offsetMs: i * 1000, durationMs: 1000 }));
    }
}

/** Rejects once the signal aborts, like a stalled network read. */
export const hangUntilAborted = (signal?: AbortSignal): Promise<RawResource> =>
    new Promise((_, reject) => {
        signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    });
