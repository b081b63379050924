import {
    AccessError,
    FetchError,
    HttpStatusError,
    ResourceError,
    RunCancelledError,
    UnsupportedFormatError,
    errorMessage,
} from '../errors.js';
import { withRetry } from '../llm/retry.js';
import type { RawResource, ResourceReader } from '../sources/types.js';
import type { FetchOutcome, LinkedResource } from '../types.js';
import { extractResourceText } from './extractors.js';

export interface ResourceFetcherOptions {
    retryLimit: number;
    timeoutMs: number;
    initialDelayMs: number;
    maxDelayMs: number;
}

const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504]);

export function classifyReadError(error: unknown, timedOut: boolean): ResourceError {
    if (timedOut) return new FetchError('Request timed out', true);
    if (error instanceof HttpStatusError) {
        if (error.status === 401 || error.status === 403) {
            return new AccessError(`Permission denied (${error.status})`);
        }
        const transient = TRANSIENT_STATUSES.has(error.status) || error.status >= 500;
        return new FetchError(`Server answered ${error.status}`, transient);
    }
    return new FetchError(`Network error: ${errorMessage(error)}`, true);
}

function isWellFormed(url: string): boolean {
    try {
        const { protocol } = new URL(url);
        return protocol === 'http:' || protocol === 'https:';
    } catch {
        return false;
    }
}

/**
 * Turns one linked resource into a FetchOutcome. Every failure is folded into
 * a `failed` outcome; only cancellation of the run escapes.
 */
export class ResourceFetcher {
    constructor(private reader: ResourceReader, private options: ResourceFetcherOptions) {}

    async fetch(resource: LinkedResource, signal?: AbortSignal): Promise<FetchOutcome> {
        if (!isWellFormed(resource.url)) {
            return { type: 'failed', reason: 'FetchError', detail: `Malformed URL: ${resource.url}` };
        }
        if (resource.kind === 'video') {
            return { type: 'failed', reason: 'UnsupportedFormat', detail: 'Video links are resolved through transcripts' };
        }

        try {
            const raw = await withRetry(() => this.readOnce(resource, signal), {
                maxRetries: this.options.retryLimit,
                initialDelay: this.options.initialDelayMs,
                maxDelay: this.options.maxDelayMs,
                shouldRetry: error => error instanceof FetchError && error.transient,
                signal,
                label: 'Fetcher',
            });

            const { kind, text, videoIds } = await extractResourceText(
                { bytes: raw.bytes, contentType: raw.contentType, url: raw.finalUrl },
                resource.kind
            );
            console.log(`[Fetcher] ${resource.id} resolved as ${kind} (${text.length} chars)`);
            return { type: 'content', text, ...(videoIds ? { videoIds } : {}) };
        } catch (error) {
            if (error instanceof RunCancelledError) throw error;
            if (signal?.aborted) throw new RunCancelledError();

            const failure = error instanceof ResourceError
                ? error
                : new UnsupportedFormatError(`Text extraction failed: ${errorMessage(error)}`);
            console.warn(`[Fetcher] ${resource.id} failed with ${failure.code}: ${failure.message}`);
            return { type: 'failed', reason: failure.code, detail: failure.message };
        }
    }

    private async readOnce(resource: LinkedResource, signal?: AbortSignal): Promise<RawResource> {
        const timeout = AbortSignal.timeout(this.options.timeoutMs);
        const combined = signal ? AbortSignal.any([signal, timeout]) : timeout;
        try {
            return await this.reader.readResource(resource, combined);
        } catch (error) {
            if (signal?.aborted) throw new RunCancelledError();
            throw classifyReadError(error, timeout.aborted);
        }
    }
}
