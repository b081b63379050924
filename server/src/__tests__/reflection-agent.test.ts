import { describe, it, expect } from 'vitest';
import { FALLBACK_QUESTIONS, ReflectionAgent, parseQuestions } from '../agents/reflection-agent.js';
import { createPipelineConfig } from '../config/pipeline-config.js';
import type { Assignment } from '../types.js';
import { FakeLLM } from './fakes.js';

const assignment: Assignment = {
    id: 'a1',
    courseId: 'c1',
    title: 'Essay on erosion',
    description: 'Write 500 words.',
    resources: [],
};

describe('parseQuestions', () => {
    it('keeps question lines and strips list markers', () => {
        const text = '1. What is erosion?\n- Why does it matter?\nHere are some thoughts.\n* How will you check your work?';

        expect(parseQuestions(text)).toEqual(['What is erosion?', 'Why does it matter?', 'How will you check your work?']);
    });

    it('caps the number of questions', () => {
        expect(parseQuestions('A?\nB?\nC?', 2)).toEqual(['A?', 'B?']);
    });
});

describe('ReflectionAgent', () => {
    const config = createPipelineConfig({ condensationModel: 'condense' });

    it('returns the questions from the model', async () => {
        const agent = new ReflectionAgent({ runId: 'run-1', config, llm: new FakeLLM(() => 'What do you know already?') });

        await expect(agent.run(assignment)).resolves.toEqual({ success: true, data: ['What do you know already?'] });
    });

    it('falls back to default questions when the model fails', async () => {
        const agent = new ReflectionAgent({ runId: 'run-1', config, llm: new FakeLLM(() => new Error('offline')) });

        await expect(agent.run(assignment)).resolves.toEqual({ success: true, data: FALLBACK_QUESTIONS });
    });
});
