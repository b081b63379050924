import { BaseAgent } from './base-agent.js';
import { RunCancelledError } from '../errors.js';
import type { AgentResult, Assignment } from '../types.js';

export const FALLBACK_QUESTIONS = [
    'What is this assignment asking you to demonstrate?',
    'Which parts of the material could you explain without notes?',
    'How will you check that the final answer reflects your own understanding?',
];

export function parseQuestions(text: string, limit = 5): string[] {
    return text
        .split('\n')
        .map(line => line.replace(/^\s*(?:[-*•]|\d+[.)])\s*/, '').trim())
        .filter(line => line.endsWith('?'))
        .slice(0, limit);
}

/** Asks the operator to pause and reflect before the integrity acknowledgment. */
export class ReflectionAgent extends BaseAgent<Assignment, AgentResult<string[]>> {
    readonly id = 'reflection-agent';
    readonly name = 'Reflection Coach';
    readonly description = 'Writes reflective questions about an assignment before any draft is generated.';

    async run(assignment: Assignment): Promise<AgentResult<string[]>> {
        this.log(`Writing reflective questions for: "${assignment.title}"`);

        const prompt = `
A student is about to use an AI assistant on the assignment below.
Write 3 to 5 short reflective questions that make the student think about what they already know,
what the assignment is meant to teach, and how they will make the final work their own.

COURSE: ${assignment.courseName ?? assignment.courseId}
ASSIGNMENT: ${assignment.title}
DESCRIPTION:
${assignment.description.slice(0, 4000)}

Output one question per line, nothing else.
`;

        try {
            const text = await this.generateText(this.context.config.condensationModel, prompt, { temperature: 0.7 });
            const questions = parseQuestions(text);
            if (questions.length === 0) {
                throw new Error('No questions in response');
            }
            return { success: true, data: questions };
        } catch (error) {
            if (error instanceof RunCancelledError) throw error;
            this.log('Falling back to the default reflective questions');
            return { success: true, data: FALLBACK_QUESTIONS };
        }
    }
}
