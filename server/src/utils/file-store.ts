import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { SolutionDraft } from '../types.js';

const manifestEntrySchema = z.discriminatedUnion('status', [
    z.object({
        resourceId: z.string(),
        url: z.string(),
        kind: z.enum(['document', 'webpage', 'plainText', 'video']),
        status: z.literal('included'),
        source: z.enum(['resource', 'transcript']),
        wasSummarized: z.boolean(),
        degraded: z.boolean(),
        chars: z.number(),
    }),
    z.object({
        resourceId: z.string(),
        url: z.string(),
        kind: z.enum(['document', 'webpage', 'plainText', 'video']),
        status: z.literal('omitted'),
        reason: z.enum(['AccessError', 'FetchError', 'UnsupportedFormat', 'NoTranscript']),
        detail: z.string(),
    }),
]);

const storedDraftSchema = z.object({
    id: z.string(),
    courseId: z.string().optional(),
    draft: z.object({
        assignmentId: z.string(),
        assignmentTitle: z.string(),
        answer: z.string(),
        prompt: z.string(),
        modelId: z.string(),
        manifest: z.array(manifestEntrySchema),
        droppedSections: z.array(z.string()),
        createdAt: z.string(),
    }),
});

export type StoredDraft = z.infer<typeof storedDraftSchema>;

export interface DraftListing {
    id: string;
    assignmentId: string;
    assignmentTitle: string;
    modelId: string;
    omitted: number;
    createdAt: string;
}

// YYYYMMDD_HHMMSS
export const formatTimestamp = (date: Date) => {
    return date.getFullYear().toString()
        + String(date.getMonth() + 1).padStart(2, '0')
        + String(date.getDate()).padStart(2, '0')
        + '_'
        + String(date.getHours()).padStart(2, '0')
        + String(date.getMinutes()).padStart(2, '0')
        + String(date.getSeconds()).padStart(2, '0');
};

export const safeName = (name: string) => name
    .replace(/[<>:"/\\|?*]/g, '')
    .replace(/\s+/g, '_')
    .substring(0, 60) || 'Untitled';

// Ids are file stems produced by saveDraft; anything else never touches the disk
const isSafeId = (id: string) => /^[\w.-]+$/.test(id) && !id.includes('..');

/**
 * Persists finished drafts: `<id>.json` holds the draft and its manifest,
 * `<id>_prompt.txt` and `<id>_answer.md` are the plain exports.
 */
export function createDraftStore(dataDir: string) {
    const draftsDir = path.join(dataDir, 'drafts');

    const ensureDir = async () => {
        await fs.promises.mkdir(draftsDir, { recursive: true });
    };

    return {
        draftsDir,

        async saveDraft(draft: SolutionDraft, courseId?: string) {
            await ensureDir();
            const id = `${formatTimestamp(new Date(draft.createdAt))}_${safeName(draft.assignmentTitle)}`;
            const record: StoredDraft = {
                id,
                courseId,
                draft: { ...draft, manifest: [...draft.manifest], droppedSections: [...draft.droppedSections] },
            };

            await fs.promises.writeFile(path.join(draftsDir, `${id}.json`), JSON.stringify(record, null, 2), 'utf-8');
            await fs.promises.writeFile(path.join(draftsDir, `${id}_prompt.txt`), draft.prompt, 'utf-8');
            await fs.promises.writeFile(path.join(draftsDir, `${id}_answer.md`), draft.answer, 'utf-8');
            console.log(`[FileStore] Saved draft ${id}`);
            return { id };
        },

        async loadDraft(id: string): Promise<StoredDraft | null> {
            if (!isSafeId(id)) return null;
            const filePath = path.join(draftsDir, `${id}.json`);
            try {
                const raw = await fs.promises.readFile(filePath, 'utf-8');
                return storedDraftSchema.parse(JSON.parse(raw));
            } catch (error) {
                if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
                console.error(`[FileStore] Error reading draft ${id}:`, error);
                return null;
            }
        },

        async listDrafts(): Promise<DraftListing[]> {
            let files: string[];
            try {
                files = await fs.promises.readdir(draftsDir);
            } catch {
                return [];
            }

            const listings: DraftListing[] = [];
            for (const file of files.filter(f => f.endsWith('.json'))) {
                const stored = await this.loadDraft(path.basename(file, '.json'));
                if (!stored) continue;
                listings.push({
                    id: stored.id,
                    assignmentId: stored.draft.assignmentId,
                    assignmentTitle: stored.draft.assignmentTitle,
                    modelId: stored.draft.modelId,
                    omitted: stored.draft.manifest.filter(m => m.status === 'omitted').length,
                    createdAt: stored.draft.createdAt,
                });
            }
            return listings.sort((a, b) => new Date(b.createdAt).getTime() - new Date(a.createdAt).getTime());
        },

        async deleteDraft(id: string): Promise<boolean> {
            if (!isSafeId(id)) return false;
            let deleted = false;
            for (const suffix of ['.json', '_prompt.txt', '_answer.md']) {
                try {
                    await fs.promises.unlink(path.join(draftsDir, `${id}${suffix}`));
                    deleted = true;
                } catch (error) {
                    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error;
                }
            }
            if (deleted) console.log(`[FileStore] Deleted draft ${id}`);
            return deleted;
        },
    };
}

export type DraftStore = ReturnType<typeof createDraftStore>;
