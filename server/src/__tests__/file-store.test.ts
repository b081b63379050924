import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { SolutionDraft } from '../types.js';
import { createDraftStore, formatTimestamp, safeName } from '../utils/file-store.js';

const draftAt = (createdAt: string, title = 'Essay: part 1/2'): SolutionDraft => ({
    assignmentId: 'a1',
    assignmentTitle: title,
    answer: '# Answer\n\nErosion moves soil.',
    prompt: '# Assignment: Essay',
    modelId: 'generate',
    manifest: [
        { resourceId: 'r1', url: 'https://example.edu/a', kind: 'webpage', status: 'included', source: 'resource', wasSummarized: false, degraded: false, chars: 12 },
        { resourceId: 'r2', url: 'https://example.edu/b', kind: 'document', status: 'omitted', reason: 'AccessError', detail: 'Permission denied (403)' },
    ],
    droppedSections: [],
    createdAt,
});

describe('safeName', () => {
    it('strips characters that are unsafe in file names', () => {
        expect(safeName('Essay: part 1/2')).toBe('Essay_part_12');
        expect(safeName('???')).toBe('Untitled');
    });
});

describe('formatTimestamp', () => {
    it('formats local time as YYYYMMDD_HHMMSS', () => {
        expect(formatTimestamp(new Date(2026, 2, 4, 5, 6, 7))).toBe('20260304_050607');
    });
});

describe('draft store', () => {
    let dataDir: string;

    beforeEach(async () => {
        dataDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'drafts-'));
    });

    afterEach(async () => {
        await fs.promises.rm(dataDir, { recursive: true, force: true });
    });

    it('saves a draft with its prompt and answer exports', async () => {
        const store = createDraftStore(dataDir);
        const draft = draftAt('2026-03-04T05:06:07.000Z');

        const { id } = await store.saveDraft(draft, 'c1');

        expect(id).toBe(`${formatTimestamp(new Date(draft.createdAt))}_Essay_part_12`);
        expect(await fs.promises.readFile(path.join(store.draftsDir, `${id}_answer.md`), 'utf-8')).toBe(draft.answer);
        expect(await fs.promises.readFile(path.join(store.draftsDir, `${id}_prompt.txt`), 'utf-8')).toBe(draft.prompt);
        expect(await store.loadDraft(id)).toEqual({ id, courseId: 'c1', draft });
    });

    it('lists drafts newest first with their omission count', async () => {
        const store = createDraftStore(dataDir);
        const older = await store.saveDraft(draftAt('2026-01-01T10:00:00.000Z', 'Older'));
        const newer = await store.saveDraft(draftAt('2026-02-01T10:00:00.000Z', 'Newer'));

        const listings = await store.listDrafts();

        expect(listings.map(l => l.id)).toEqual([newer.id, older.id]);
        expect(listings[0]).toEqual({
            id: newer.id,
            assignmentId: 'a1',
            assignmentTitle: 'Newer',
            modelId: 'generate',
            omitted: 1,
            createdAt: '2026-02-01T10:00:00.000Z',
        });
    });

    it('returns an empty list before anything is saved', async () => {
        await expect(createDraftStore(dataDir).listDrafts()).resolves.toEqual([]);
    });

    it('refuses ids that leave the drafts directory', async () => {
        const store = createDraftStore(dataDir);

        await expect(store.loadDraft('../secrets')).resolves.toBeNull();
        await expect(store.deleteDraft('../secrets')).resolves.toBe(false);
    });

    it('deletes every file of a draft', async () => {
        const store = createDraftStore(dataDir);
        const { id } = await store.saveDraft(draftAt('2026-03-04T05:06:07.000Z'));

        await expect(store.deleteDraft(id)).resolves.toBe(true);
        await expect(store.loadDraft(id)).resolves.toBeNull();
        await expect(fs.promises.readdir(store.draftsDir)).resolves.toEqual([]);
        await expect(store.deleteDraft(id)).resolves.toBe(false);
    });
});
