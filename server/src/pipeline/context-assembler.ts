import type {
    Assignment,
    ContextBundle,
    ContextSection,
    ManifestEntry,
    ResolvedResource,
    SummaryArtifact,
} from '../types.js';

function labelFor(resolved: ResolvedResource): string {
    const { resource } = resolved;
    return resource.label ? `${resource.label} (${resource.url})` : resource.url;
}

/**
 * Pure merge of the run's outcomes into one frozen bundle. `resolved` lists
 * the assignment's resources in their original order followed by videos
 * discovered in text; `artifacts` holds the summary of every successful one.
 */
export function assembleContext(
    assignment: Assignment,
    resolved: readonly ResolvedResource[],
    artifacts: ReadonlyMap<string, SummaryArtifact>
): ContextBundle {
    const resourceSections: ContextSection[] = [];
    const transcriptSections: ContextSection[] = [];
    const manifest: ManifestEntry[] = [];

    for (const entry of resolved) {
        const { resource, outcome } = entry;
        if (outcome.type === 'failed') {
            manifest.push({
                resourceId: resource.id,
                url: resource.url,
                kind: resource.kind,
                status: 'omitted',
                reason: outcome.reason,
                detail: outcome.detail,
            });
            continue;
        }

        const artifact: SummaryArtifact = artifacts.get(resource.id)
            ?? { text: outcome.text, wasSummarized: false, sourceChars: outcome.text.length };
        const source = outcome.type === 'videoTranscript' ? 'transcript' : 'resource';
        const section: ContextSection = { resourceId: resource.id, label: labelFor(entry), source, artifact };
        (source === 'transcript' ? transcriptSections : resourceSections).push(section);

        manifest.push({
            resourceId: resource.id,
            url: resource.url,
            kind: resource.kind,
            status: 'included',
            source,
            wasSummarized: artifact.wasSummarized,
            degraded: artifact.degraded ?? false,
            chars: artifact.text.length,
        });
    }

    return Object.freeze({
        assignmentId: assignment.id,
        assignmentTitle: assignment.title,
        assignmentText: assignment.description,
        sections: Object.freeze([...resourceSections, ...transcriptSections]),
        manifest: Object.freeze(manifest),
    });
}

export function omissions(bundle: ContextBundle): ManifestEntry[] {
    return bundle.manifest.filter(entry => entry.status === 'omitted');
}
