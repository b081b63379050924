import mammoth from 'mammoth';
import { extractText } from 'unpdf';
import { UnsupportedFormatError } from '../errors.js';
import type { ResourceKind } from '../types.js';
import { embeddedVideoIds, htmlToText, normalizeWhitespace } from './html.js';

export type TextKind = Exclude<ResourceKind, 'video'>;

export interface ExtractionInput {
    bytes: Uint8Array;
    contentType: string;
    url: string;
}

export interface ExtractedText {
    text: string;
    videoIds?: string[];
}

type Extractor = (input: ExtractionInput) => Promise<ExtractedText>;

const HTML_TYPES = new Set(['text/html', 'application/xhtml+xml']);
const PLAIN_TYPES = new Set(['text/plain', 'text/markdown', 'text/x-markdown', 'text/csv', 'text/tab-separated-values', 'application/json']);
const PDF_TYPE = 'application/pdf';
const DOCX_TYPE = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';
// Servers often mislabel downloads; these defer to the link's hint
const GENERIC_TYPES = new Set(['', 'application/octet-stream', 'binary/octet-stream', 'application/force-download']);

const decoder = new TextDecoder('utf-8');

function hasExtension(url: string, ...extensions: string[]): boolean {
    try {
        const pathname = new URL(url).pathname.toLowerCase();
        return extensions.some(ext => pathname.endsWith(ext));
    } catch {
        return false;
    }
}

function isPdf({ bytes, contentType, url }: ExtractionInput): boolean {
    // %PDF magic number
    const magic = bytes.length >= 4 && bytes[0] === 0x25 && bytes[1] === 0x50 && bytes[2] === 0x44 && bytes[3] === 0x46;
    return contentType === PDF_TYPE || magic || hasExtension(url, '.pdf');
}

function isDocx({ contentType, url }: ExtractionInput): boolean {
    return contentType === DOCX_TYPE || hasExtension(url, '.docx');
}

const extractors: Record<TextKind, Extractor> = {
    webpage: async ({ bytes }) => {
        const html = decoder.decode(bytes);
        const videoIds = embeddedVideoIds(html);
        return { text: htmlToText(html), ...(videoIds.length > 0 ? { videoIds } : {}) };
    },

    plainText: async ({ bytes }) => ({ text: normalizeWhitespace(decoder.decode(bytes)) }),

    document: async input => {
        if (isPdf(input)) {
            const { text } = await extractText(new Uint8Array(input.bytes), { mergePages: true });
            return { text: normalizeWhitespace(text) };
        }
        if (isDocx(input)) {
            const { value } = await mammoth.extractRawText({ buffer: Buffer.from(input.bytes) });
            return { text: normalizeWhitespace(value) };
        }
        throw new UnsupportedFormatError(`No text extractor for document type "${input.contentType || 'unknown'}"`);
    },
};

/**
 * Content type decides first; the link's hint only applies when the server
 * sent nothing more specific than a generic binary type.
 */
export function resolveKind(contentType: string, hint: ResourceKind): TextKind | null {
    if (HTML_TYPES.has(contentType)) return 'webpage';
    if (PLAIN_TYPES.has(contentType)) return 'plainText';
    if (contentType === PDF_TYPE || contentType === DOCX_TYPE) return 'document';
    if (GENERIC_TYPES.has(contentType) && hint !== 'video') return hint;
    return null;
}

/** Dispatches on the resolved kind; unrecognized shapes reject with UnsupportedFormatError. */
export async function extractResourceText(input: ExtractionInput, hint: ResourceKind): Promise<ExtractedText & { kind: TextKind }> {
    const kind = resolveKind(input.contentType, hint);
    if (!kind) {
        throw new UnsupportedFormatError(`Unsupported content type "${input.contentType || 'unknown'}"`);
    }

    const extracted = await extractors[kind](input);
    if (!extracted.text.trim()) {
        throw new UnsupportedFormatError(`No extractable text in ${kind} resource`);
    }
    return { kind, ...extracted };
}
