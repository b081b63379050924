import type { ContextBundle, FailureReason } from './types.js';

/** Failures that stay local to one resource and end up in the manifest. */
export abstract class ResourceError extends Error {
    abstract readonly code: FailureReason;
}

export class AccessError extends ResourceError {
    readonly code = 'AccessError';
    constructor(message: string) {
        super(message);
        this.name = 'AccessError';
    }
}

export class FetchError extends ResourceError {
    readonly code = 'FetchError';
    constructor(message: string, readonly transient = true) {
        super(message);
        this.name = 'FetchError';
    }
}

export class UnsupportedFormatError extends ResourceError {
    readonly code = 'UnsupportedFormat';
    constructor(message: string) {
        super(message);
        this.name = 'UnsupportedFormatError';
    }
}

export class HttpStatusError extends Error {
    constructor(readonly status: number, readonly url: string, detail = '') {
        super(`HTTP ${status} for ${url}${detail ? `: ${detail}` : ''}`);
        this.name = 'HttpStatusError';
    }
}

export class TranscriptNotFoundError extends Error {
    constructor(readonly videoId: string, detail: string) {
        super(`No transcript for video ${videoId}: ${detail}`);
        this.name = 'TranscriptNotFoundError';
    }
}

/** Raised by completion clients; `status` is absent for network-level failures. */
export class CompletionError extends Error {
    constructor(message: string, readonly provider: string, readonly status?: number) {
        super(message);
        this.name = 'CompletionError';
    }
}

export class GenerationFailureError extends Error {
    readonly code = 'GenerationFailure';
    constructor(message: string, readonly bundle: ContextBundle, cause?: unknown) {
        super(message, { cause });
        this.name = 'GenerationFailureError';
    }
}

export class EthicsGateRejectedError extends Error {
    readonly code = 'EthicsGateRejected';
    constructor(readonly reason: 'declined' | 'timeout' | 'not-acknowledged') {
        super(reason === 'timeout'
            ? 'No acknowledgment received before the ethics gate timed out'
            : reason === 'declined'
                ? 'The operator declined the ethics acknowledgment'
                : 'Generation requires an acknowledged ethics gate');
        this.name = 'EthicsGateRejectedError';
    }
}

export class RunCancelledError extends Error {
    constructor(message = 'Run was cancelled') {
        super(message);
        this.name = 'RunCancelledError';
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return typeof error === 'string' ? error : JSON.stringify(error);
}

export function statusOf(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return undefined;
}

/** Throws RunCancelledError when the run's signal has been aborted. */
export function throwIfCancelled(signal?: AbortSignal): void {
    if (signal?.aborted) {
        throw signal.reason instanceof RunCancelledError ? signal.reason : new RunCancelledError();
    }
}
