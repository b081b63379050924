import { RunCancelledError, errorMessage } from '../errors.js';
import type { TranscriptSource } from '../sources/types.js';
import type { Assignment, FetchOutcome, LinkedResource, ResolvedResource } from '../types.js';
import { extractVideoId, findVideoIds } from './video-links.js';

export interface VideoReference {
    resource: LinkedResource;
    videoId: string | null;
    discovered: boolean;
}

/**
 * Listed video links first (in resource order), then videos mentioned in the
 * assignment text and in fetched resources (their text, then the links and
 * frames of fetched pages), each id only once.
 */
export function collectVideoReferences(assignment: Assignment, fetched: readonly ResolvedResource[]): VideoReference[] {
    const references: VideoReference[] = [];
    const seen = new Set<string>();

    for (const resource of assignment.resources) {
        if (resource.kind !== 'video') continue;
        const videoId = extractVideoId(resource.url);
        if (videoId) {
            if (seen.has(videoId)) continue;
            seen.add(videoId);
        }
        references.push({ resource, videoId, discovered: false });
    }

    const mentioned = [
        findVideoIds(assignment.description),
        ...fetched.flatMap(({ outcome }) =>
            outcome.type === 'content' ? [[...findVideoIds(outcome.text), ...(outcome.videoIds ?? [])]] : []),
    ];
    for (const ids of mentioned) {
        for (const videoId of ids) {
            if (seen.has(videoId)) continue;
            seen.add(videoId);
            references.push({
                resource: { id: `video:${videoId}`, url: `https://www.youtube.com/watch?v=${videoId}`, kind: 'video' },
                videoId,
                discovered: true,
            });
        }
    }

    return references;
}

export class TranscriptEnricher {
    constructor(private transcripts: TranscriptSource) {}

    /** One reference, one outcome; a missing transcript never throws. */
    async enrich(reference: VideoReference, signal?: AbortSignal): Promise<FetchOutcome> {
        const { videoId, resource } = reference;
        if (!videoId) {
            return { type: 'failed', reason: 'NoTranscript', detail: `Unrecognized video URL: ${resource.url}` };
        }

        try {
            const segments = await this.transcripts.fetchTranscript(videoId, signal);
            const text = segments.map(s => s.text.trim()).filter(Boolean).join(' ');
            if (!text) {
                return { type: 'failed', reason: 'NoTranscript', detail: `Transcript for ${videoId} is empty` };
            }
            console.log(`[Transcripts] ${videoId}: ${segments.length} segments`);
            return { type: 'videoTranscript', text };
        } catch (error) {
            if (error instanceof RunCancelledError) throw error;
            if (signal?.aborted) throw new RunCancelledError();
            console.warn(`[Transcripts] ${videoId} unavailable: ${errorMessage(error)}`);
            return { type: 'failed', reason: 'NoTranscript', detail: errorMessage(error) };
        }
    }
}
