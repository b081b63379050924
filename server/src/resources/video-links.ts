// Video hosting URL shapes with an 11-character YouTube id
const VIDEO_URL_PATTERNS: RegExp[] = [
    /(?:https?:\/\/)?(?:www\.|m\.)?youtube\.com\/watch\?(?:[^\s"'<>#]*&)?v=([\w-]{11})/g,
    /(?:https?:\/\/)?youtu\.be\/([\w-]{11})/g,
    /(?:https?:\/\/)?(?:www\.)?youtube(?:-nocookie)?\.com\/(?:embed|shorts|live|v)\/([\w-]{11})/g,
];

/** Video ids in order of first appearance, without duplicates. */
export function findVideoIds(text: string): string[] {
    const found: { id: string; index: number }[] = [];
    for (const pattern of VIDEO_URL_PATTERNS) {
        for (const match of text.matchAll(pattern)) {
            found.push({ id: match[1], index: match.index ?? 0 });
        }
    }
    found.sort((a, b) => a.index - b.index);

    const seen = new Set<string>();
    const ids: string[] = [];
    for (const { id } of found) {
        if (!seen.has(id)) {
            seen.add(id);
            ids.push(id);
        }
    }
    return ids;
}

export function extractVideoId(url: string): string | null {
    return findVideoIds(url)[0] ?? null;
}

export function isVideoUrl(url: string): boolean {
    return extractVideoId(url) !== null;
}
