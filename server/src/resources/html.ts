import * as cheerio from 'cheerio';
import type { LinkedResource, ResourceKind } from '../types.js';
import { findVideoIds, isVideoUrl } from './video-links.js';

const STRIPPED_ELEMENTS = 'script, style, noscript, template, svg, nav, header, footer, iframe, form, button';
const BLOCK_ELEMENTS = 'p, div, section, article, li, tr, h1, h2, h3, h4, h5, h6, pre, blockquote, dt, dd, table, ul, ol';

const DOCUMENT_EXTENSIONS = ['.pdf', '.doc', '.docx', '.odt', '.rtf', '.ppt', '.pptx'];
const PLAIN_TEXT_EXTENSIONS = ['.txt', '.md', '.markdown', '.csv', '.tsv', '.json', '.log'];

/** Visible text of an HTML document or fragment, one block per line. */
export function htmlToText(html: string): string {
    const $ = cheerio.load(html);
    $(STRIPPED_ELEMENTS).remove();
    $('br').replaceWith('\n');
    $(BLOCK_ELEMENTS).each((_, el) => {
        $(el).append('\n');
    });

    return normalizeWhitespace($('body').text());
}

/** Video ids behind the page's anchors and embedded frames, which the visible text loses. */
export function embeddedVideoIds(html: string): string[] {
    const $ = cheerio.load(html);
    const targets = $('a[href], iframe[src]')
        .map((_, el) => $(el).attr('href') ?? $(el).attr('src') ?? '')
        .get();
    return findVideoIds(targets.join('\n'));
}

export function normalizeWhitespace(text: string): string {
    return text
        .split('\n')
        .map(line => line.replace(/[\t \u00a0]+/g, ' ').trim())
        .filter(line => line.length > 0)
        .join('\n');
}

export function inferKind(url: string): ResourceKind {
    if (isVideoUrl(url)) return 'video';

    let pathname: string;
    try {
        pathname = new URL(url).pathname.toLowerCase();
    } catch {
        return 'webpage';
    }
    if (/\/files\/\d+/.test(pathname)) return 'document';
    if (DOCUMENT_EXTENSIONS.some(ext => pathname.endsWith(ext))) return 'document';
    if (PLAIN_TEXT_EXTENSIONS.some(ext => pathname.endsWith(ext))) return 'plainText';
    return 'webpage';
}

/**
 * Links referenced by an assignment description: anchors and embedded frames,
 * resolved against the platform URL, deduplicated, in document order.
 */
export function extractLinkedResources(html: string, baseUrl: string): LinkedResource[] {
    const $ = cheerio.load(html);
    const resources: LinkedResource[] = [];
    const seen = new Set<string>();

    $('a[href], iframe[src]').each((_, el) => {
        const node = $(el);
        const raw = node.attr('href') ?? node.attr('src') ?? '';
        if (!raw || raw.startsWith('#') || /^(mailto|javascript|tel):/i.test(raw)) return;

        let url: URL;
        try {
            url = new URL(raw, baseUrl);
        } catch {
            return;
        }
        if (url.protocol !== 'http:' && url.protocol !== 'https:') return;
        url.hash = '';

        const href = url.toString();
        if (seen.has(href)) return;
        seen.add(href);

        const label = (node.attr('title') ?? node.text()).trim() || undefined;
        resources.push({
            id: `res-${resources.length + 1}`,
            url: href,
            kind: inferKind(href),
            ...(label ? { label } : {}),
        });
    });

    return resources;
}
