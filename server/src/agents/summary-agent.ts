import { BaseAgent } from './base-agent.js';
import { RunCancelledError, errorMessage } from '../errors.js';
import type { SummaryArtifact } from '../types.js';

export interface SummaryInput {
    resourceId: string;
    text: string;
    budget: number;
    focus: string; // assignment title the digest should serve
}

export class SummaryAgent extends BaseAgent<SummaryInput, SummaryArtifact> {
    readonly id = 'summary-agent';
    readonly name = 'Summary Agent';
    readonly description = 'Condenses oversized resource text so it fits the generation budget.';

    async run({ resourceId, text, budget, focus }: SummaryInput): Promise<SummaryArtifact> {
        const sourceChars = text.length;
        if (sourceChars <= budget) {
            return { text, wasSummarized: false, sourceChars };
        }

        this.log(`Condensing ${resourceId} from ${sourceChars} to at most ${budget} characters`);

        // The condensation model gets no more than the final prompt could hold
        const source = text.slice(0, this.context.config.maxPromptChars);
        const prompt = `
You are preparing study material for answering the assignment "${focus}".
Condense the SOURCE below to at most ${budget} characters.

Rules:
- Keep every fact, definition, figure, formula, date, name and requirement that could matter for answering the assignment.
- Keep instructions, grading criteria and constraints verbatim where possible.
- Drop navigation text, boilerplate, repetition and anecdotes.
- Do not add information that is not in the source.
- Output ONLY the condensed text.

SOURCE:
${source}
`;

        try {
            const condensed = (await this.generateText(
                this.context.config.condensationModel,
                prompt,
                { temperature: 0.2 }
            )).trim();
            if (!condensed) {
                throw new Error('Condensation returned no text');
            }
            return { text: condensed.slice(0, budget), wasSummarized: true, sourceChars };
        } catch (error) {
            if (error instanceof RunCancelledError) throw error;
            if (this.context.signal?.aborted) throw new RunCancelledError();

            const message = `SummarizationDegraded: ${errorMessage(error)}; truncated ${resourceId} to ${budget} characters`;
            console.warn(`[${this.name}] ${message}`);
            this.context.emit?.({ type: 'summary:degraded', runId: this.context.runId, resourceId, message });
            return { text: text.slice(0, budget), wasSummarized: true, degraded: true, sourceChars };
        }
    }
}
