import type { Assignment, LinkedResource } from '../types.js';

export interface RawResource {
    bytes: Uint8Array;
    contentType: string; // lower-cased media type without parameters, '' when unknown
    finalUrl: string;
}

/** The read side the pipeline needs from the course platform. */
export interface ResourceReader {
    /** Rejects with HttpStatusError on non-2xx answers. */
    readResource(resource: LinkedResource, signal?: AbortSignal): Promise<RawResource>;
}

export interface CourseSummary {
    id: string;
    name: string;
    courseCode?: string;
    endAt?: string | null;
}

export interface AssignmentSummary extends Assignment {
    submitted: boolean;
    pastDue: boolean;
}

export interface CourseSource extends ResourceReader {
    listCourses(signal?: AbortSignal): Promise<CourseSummary[]>;
    listAssignments(courseId: string, options?: { pendingOnly?: boolean; signal?: AbortSignal }): Promise<AssignmentSummary[]>;
    getAssignment(courseId: string, assignmentId: string, signal?: AbortSignal): Promise<Assignment>;
}

export interface TranscriptSegment {
    text: string;
    offsetMs: number;
    durationMs: number;
}

export interface TranscriptSource {
    /** Ordered segments; rejects with TranscriptNotFoundError when captions are missing. */
    fetchTranscript(videoId: string, signal?: AbortSignal): Promise<TranscriptSegment[]>;
}
