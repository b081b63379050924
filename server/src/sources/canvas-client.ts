import { z } from 'zod';
import { HttpStatusError } from '../errors.js';
import { withRetry } from '../llm/retry.js';
import { extractLinkedResources, htmlToText } from '../resources/html.js';
import type { Assignment, LinkedResource } from '../types.js';
import type { AssignmentSummary, CourseSource, CourseSummary, RawResource } from './types.js';

const courseSchema = z.object({
    id: z.union([z.number(), z.string()]),
    name: z.string().optional(),
    course_code: z.string().optional(),
    end_at: z.string().nullable().optional(),
});

const assignmentSchema = z.object({
    id: z.union([z.number(), z.string()]),
    name: z.string(),
    description: z.string().nullable().optional(),
    due_at: z.string().nullable().optional(),
    html_url: z.string().optional(),
    submission: z.object({ workflow_state: z.string() }).nullable().optional(),
});

const fileSchema = z.object({
    url: z.string().url(),
    'content-type': z.string().optional(),
});

type CanvasAssignment = z.infer<typeof assignmentSchema>;

const SUBMITTED_STATES = new Set(['submitted', 'graded', 'pending_review']);

export function mediaType(header: string | null): string {
    return (header ?? '').split(';')[0].trim().toLowerCase();
}

/** URL of the next page from a Canvas `Link` header, if any. */
export function nextPageUrl(linkHeader: string | null): string | null {
    if (!linkHeader) return null;
    for (const part of linkHeader.split(',')) {
        const match = part.match(/<([^>]+)>\s*;\s*rel="next"/);
        if (match) return match[1];
    }
    return null;
}

export function toAssignment(raw: CanvasAssignment, courseId: string, baseUrl: string, courseName?: string): Assignment {
    const html = raw.description ?? '';
    return {
        id: String(raw.id),
        courseId,
        courseName,
        title: raw.name,
        description: htmlToText(html),
        resources: extractLinkedResources(html, baseUrl),
        dueAt: raw.due_at ?? null,
        htmlUrl: raw.html_url,
    };
}

/**
 * Read-only Canvas LMS REST client. Only requests to the Canvas host carry the
 * token; links to other hosts are fetched anonymously.
 */
export class CanvasClient implements CourseSource {
    private baseUrl: string;
    private host: string;

    constructor(
        baseUrl: string,
        private token: string,
        private fetchImpl: typeof fetch = fetch,
        private now: () => Date = () => new Date()
    ) {
        if (!token) {
            throw new Error('Canvas API token is required');
        }
        this.baseUrl = baseUrl.replace(/\/+$/, '');
        this.host = new URL(this.baseUrl).host;
    }

    private headersFor(url: string): Record<string, string> {
        return new URL(url).host === this.host ? { Authorization: `Bearer ${this.token}` } : {};
    }

    private async request(url: string, signal?: AbortSignal): Promise<Response> {
        const response = await this.fetchImpl(url, {
            headers: { Accept: 'application/json', ...this.headersFor(url) },
            signal,
        });
        if (!response.ok) {
            const detail = await response.text();
            throw new HttpStatusError(response.status, url, detail.slice(0, 200));
        }
        return response;
    }

    private async getAll<T>(path: string, schema: z.ZodType<T>, signal?: AbortSignal): Promise<T[]> {
        const items: T[] = [];
        let url: string | null = `${this.baseUrl}/api/v1${path}`;

        while (url) {
            const pageUrl: string = url;
            const response = await withRetry(() => this.request(pageUrl, signal), {
                maxRetries: 2,
                initialDelay: 500,
                label: 'Canvas',
                signal,
                shouldRetry: error => !(error instanceof HttpStatusError) || error.status === 429 || error.status >= 500,
            });
            items.push(...z.array(schema).parse(await response.json()));
            url = nextPageUrl(response.headers.get('link'));
        }
        return items;
    }

    async listCourses(signal?: AbortSignal): Promise<CourseSummary[]> {
        console.log('[Canvas] Listing active courses');
        const courses = await this.getAll('/courses?enrollment_state=active&per_page=100', courseSchema, signal);
        const now = this.now().getTime();

        return courses
            .filter(c => !c.end_at || new Date(c.end_at).getTime() >= now)
            .map(c => ({
                id: String(c.id),
                name: c.name ?? `Course ${c.id}`,
                courseCode: c.course_code,
                endAt: c.end_at ?? null,
            }));
    }

    async listAssignments(
        courseId: string,
        options: { pendingOnly?: boolean; signal?: AbortSignal } = {}
    ): Promise<AssignmentSummary[]> {
        console.log(`[Canvas] Listing assignments for course ${courseId}`);
        const raw = await this.getAll(
            `/courses/${encodeURIComponent(courseId)}/assignments?per_page=100&include[]=submission&order_by=due_at`,
            assignmentSchema,
            options.signal
        );
        const now = this.now().getTime();

        const assignments = raw.map((a): AssignmentSummary => ({
            ...toAssignment(a, courseId, this.baseUrl),
            submitted: a.submission ? SUBMITTED_STATES.has(a.submission.workflow_state) : false,
            pastDue: a.due_at ? new Date(a.due_at).getTime() < now : false,
        }));

        return options.pendingOnly ? assignments.filter(a => !a.submitted && !a.pastDue) : assignments;
    }

    async getAssignment(courseId: string, assignmentId: string, signal?: AbortSignal): Promise<Assignment> {
        const url = `${this.baseUrl}/api/v1/courses/${encodeURIComponent(courseId)}/assignments/${encodeURIComponent(assignmentId)}`;
        const response = await this.request(url, signal);
        return toAssignment(assignmentSchema.parse(await response.json()), courseId, this.baseUrl);
    }

    async readResource(resource: LinkedResource, signal?: AbortSignal): Promise<RawResource> {
        const downloadUrl = await this.resolveDownloadUrl(resource.url, signal);
        const response = await this.fetchImpl(downloadUrl, {
            headers: this.headersFor(downloadUrl),
            redirect: 'follow',
            signal,
        });
        if (!response.ok) {
            throw new HttpStatusError(response.status, downloadUrl);
        }

        return {
            bytes: new Uint8Array(await response.arrayBuffer()),
            contentType: mediaType(response.headers.get('content-type')),
            finalUrl: response.url || downloadUrl,
        };
    }

    /** Canvas file pages resolve to a signed download URL through the files API. */
    private async resolveDownloadUrl(url: string, signal?: AbortSignal): Promise<string> {
        const parsed = new URL(url);
        const match = parsed.pathname.match(/\/files\/(\d+)/);
        if (parsed.host !== this.host || !match || parsed.pathname.startsWith('/api/')) return url;

        const response = await this.request(`${this.baseUrl}/api/v1/files/${match[1]}`, signal);
        return fileSchema.parse(await response.json()).url;
    }
}
