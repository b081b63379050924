import * as cheerio from 'cheerio';
import { z } from 'zod';
import { TranscriptNotFoundError, errorMessage } from '../errors.js';
import type { TranscriptSegment, TranscriptSource } from './types.js';

const captionTrackSchema = z.object({
    baseUrl: z.string(),
    languageCode: z.string(),
    kind: z.string().optional(),
});

type CaptionTrack = z.infer<typeof captionTrackSchema>;

const USER_AGENT = 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

/** Caption tracks advertised in a watch page's player response. */
export function parseCaptionTracks(watchPageHtml: string): CaptionTrack[] {
    const marker = '"captionTracks":';
    const start = watchPageHtml.indexOf(marker);
    if (start === -1) return [];

    // The array is JSON; find its closing bracket by depth counting
    const from = start + marker.length;
    let depth = 0;
    let end = -1;
    let inString = false;
    for (let i = from; i < watchPageHtml.length; i++) {
        const ch = watchPageHtml[i];
        if (inString) {
            if (ch === '\\') i++;
            else if (ch === '"') inString = false;
            continue;
        }
        if (ch === '"') inString = true;
        else if (ch === '[') depth++;
        else if (ch === ']' && --depth === 0) {
            end = i + 1;
            break;
        }
    }
    if (end === -1) return [];

    const parsed = z.array(captionTrackSchema).safeParse(JSON.parse(watchPageHtml.slice(from, end)));
    return parsed.success ? parsed.data : [];
}

/** Manual tracks in the preferred language win over auto-generated ones. */
export function pickTrack(tracks: CaptionTrack[], language: string): CaptionTrack | undefined {
    const inLanguage = tracks.filter(t => t.languageCode === language || t.languageCode.startsWith(`${language}-`));
    return inLanguage.find(t => t.kind !== 'asr') ?? inLanguage[0] ?? tracks.find(t => t.kind !== 'asr') ?? tracks[0];
}

export function parseTimedText(xml: string): TranscriptSegment[] {
    const $ = cheerio.load(xml, { xml: true });
    const segments: TranscriptSegment[] = [];
    $('text').each((_, el) => {
        const node = $(el);
        // Entities can be double-encoded in timedtext payloads
        const text = cheerio.load(node.text()).root().text().replace(/\s+/g, ' ').trim();
        if (!text) return;
        segments.push({
            text,
            offsetMs: Math.round(Number(node.attr('start') ?? 0) * 1000),
            durationMs: Math.round(Number(node.attr('dur') ?? 0) * 1000),
        });
    });
    return segments;
}

export class YouTubeTranscriptClient implements TranscriptSource {
    constructor(private language = 'en', private fetchImpl: typeof fetch = fetch) {}

    async fetchTranscript(videoId: string, signal?: AbortSignal): Promise<TranscriptSegment[]> {
        let tracks: CaptionTrack[];
        try {
            const page = await this.fetchImpl(`https://www.youtube.com/watch?v=${encodeURIComponent(videoId)}`, {
                headers: { 'User-Agent': USER_AGENT, 'Accept-Language': this.language },
                signal,
            });
            if (!page.ok) throw new Error(`watch page returned ${page.status}`);
            tracks = parseCaptionTracks(await page.text());
        } catch (error) {
            if (signal?.aborted) throw error;
            throw new TranscriptNotFoundError(videoId, errorMessage(error));
        }

        const track = pickTrack(tracks, this.language);
        if (!track) {
            throw new TranscriptNotFoundError(videoId, 'captions are disabled or unavailable');
        }

        try {
            const response = await this.fetchImpl(track.baseUrl, { signal });
            if (!response.ok) throw new Error(`timedtext returned ${response.status}`);
            return parseTimedText(await response.text());
        } catch (error) {
            if (signal?.aborted) throw error;
            throw new TranscriptNotFoundError(videoId, errorMessage(error));
        }
    }
}
