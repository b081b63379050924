import { BaseAgent } from './base-agent.js';
import { EthicsGateRejectedError, GenerationFailureError, RunCancelledError, errorMessage } from '../errors.js';
import type { EthicsGate } from '../pipeline/ethics-gate.js';
import type { ContextBundle, ContextSection, SolutionDraft } from '../types.js';

export interface SolutionInput {
    bundle: ContextBundle;
    gate: EthicsGate;
}

export interface BuiltPrompt {
    prompt: string;
    dropped: string[]; // resource ids, in the order they were dropped
}

const SYSTEM_INSTRUCTION = 'You are a careful academic tutor. You write clear, well-structured, factually grounded answers and say so when the material is insufficient.';

function renderSection(section: ContextSection): string {
    const note = section.artifact.wasSummarized ? ' (condensed)' : '';
    return `### ${section.label}${note}\n${section.artifact.text}\n`;
}

function renderPrompt(title: string, assignmentText: string, sections: readonly ContextSection[]): string {
    const resources = sections.filter(s => s.source === 'resource');
    const transcripts = sections.filter(s => s.source === 'transcript');

    let prompt = `# Assignment: ${title}\n\n${assignmentText}\n\n`;
    if (resources.length > 0) {
        prompt += `## Reference material\n\n${resources.map(renderSection).join('\n')}\n`;
    }
    if (transcripts.length > 0) {
        prompt += `## Video transcripts\n\n${transcripts.map(renderSection).join('\n')}\n`;
    }
    prompt += `## Task\n\nWrite a complete draft answer to the assignment above, using the reference material and transcripts where relevant. Follow any format or length requirements stated in the assignment. Cite which material you relied on.\n`;
    return prompt;
}

/**
 * Fits the bundle into `maxChars`: transcripts go first (last one first), then
 * resource sections, and only then is the assignment text itself cut.
 */
export function buildPrompt(bundle: ContextBundle, maxChars: number): BuiltPrompt {
    const sections = [...bundle.sections];
    const dropped: string[] = [];

    let prompt = renderPrompt(bundle.assignmentTitle, bundle.assignmentText, sections);
    while (prompt.length > maxChars && sections.length > 0) {
        let index = sections.map(s => s.source).lastIndexOf('transcript');
        if (index === -1) index = sections.length - 1;
        dropped.push(sections[index].resourceId);
        sections.splice(index, 1);
        prompt = renderPrompt(bundle.assignmentTitle, bundle.assignmentText, sections);
    }

    if (prompt.length > maxChars) {
        const overhead = prompt.length - bundle.assignmentText.length;
        const allowed = Math.max(0, maxChars - overhead);
        prompt = renderPrompt(bundle.assignmentTitle, bundle.assignmentText.slice(0, allowed), sections).slice(0, maxChars);
    }

    return { prompt, dropped };
}

export class SolutionAgent extends BaseAgent<SolutionInput, SolutionDraft> {
    readonly id = 'solution-agent';
    readonly name = 'Solution Generator';
    readonly description = 'Builds the final prompt from the context bundle and drafts the answer.';

    async run({ bundle, gate }: SolutionInput): Promise<SolutionDraft> {
        if (gate.state !== 'acknowledged') {
            throw new EthicsGateRejectedError(gate.rejectionReason ?? 'not-acknowledged');
        }

        const { config } = this.context;
        const { prompt, dropped } = buildPrompt(bundle, config.maxPromptChars);
        if (dropped.length > 0) {
            this.log(`Prompt over ${config.maxPromptChars} characters, dropped: ${dropped.join(', ')}`);
        }

        let answer: string;
        try {
            answer = await this.generateText(
                config.generationModel,
                prompt,
                { systemInstruction: SYSTEM_INSTRUCTION, temperature: 0.4 },
                config.generationRetryLimit
            );
        } catch (error) {
            if (error instanceof RunCancelledError) throw error;
            if (this.context.signal?.aborted) throw new RunCancelledError();
            throw new GenerationFailureError(
                `Generation failed after ${config.generationRetryLimit + 1} attempts: ${errorMessage(error)}`,
                bundle,
                error
            );
        }

        this.log(`Draft ready (${answer.length} characters)`);
        return Object.freeze({
            assignmentId: bundle.assignmentId,
            assignmentTitle: bundle.assignmentTitle,
            answer: answer.trim(),
            prompt,
            modelId: config.generationModel,
            manifest: bundle.manifest,
            droppedSections: Object.freeze(dropped),
            createdAt: new Date().toISOString(),
        });
    }
}
