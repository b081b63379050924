import { describe, it, expect } from 'vitest';
import { SummaryAgent } from '../agents/summary-agent.js';
import { createPipelineConfig } from '../config/pipeline-config.js';
import type { PipelineEvent } from '../types.js';
import { FakeLLM } from './fakes.js';

const setup = (llm: FakeLLM) => {
    const events: PipelineEvent[] = [];
    const agent = new SummaryAgent({
        runId: 'run-1',
        config: createPipelineConfig({ condensationModel: 'condense', retryInitialDelayMs: 0 }),
        llm,
        emit: event => events.push(event),
    });
    return { agent, events };
};

const longText = 'abcdefghij'.repeat(5);

describe('SummaryAgent', () => {
    it('passes text within budget through untouched', async () => {
        const llm = new FakeLLM();
        const { agent } = setup(llm);

        await expect(agent.run({ resourceId: 'res-1', text: 'short', budget: 10, focus: 'Essay' }))
            .resolves.toEqual({ text: 'short', wasSummarized: false, sourceChars: 5 });
        expect(llm.calls).toHaveLength(0);
    });

    it('condenses oversized text with the condensation model', async () => {
        const llm = new FakeLLM(() => '  condensed digest  ');
        const { agent } = setup(llm);

        await expect(agent.run({ resourceId: 'res-1', text: longText, budget: 20, focus: 'Essay' }))
            .resolves.toEqual({ text: 'condensed digest', wasSummarized: true, sourceChars: 50 });
        expect(llm.callsTo('condense')).toHaveLength(1);
        expect(llm.calls[0].options?.temperature).toBe(0.2);
        expect(llm.calls[0].prompt).toContain('at most 20 characters');
    });

    it('clamps a condensation that overshoots the budget', async () => {
        const { agent } = setup(new FakeLLM(() => 'y'.repeat(30)));

        const artifact = await agent.run({ resourceId: 'res-1', text: longText, budget: 20, focus: 'Essay' });
        expect(artifact.text).toBe('y'.repeat(20));
    });

    it('falls back to a truncated prefix when condensation fails', async () => {
        const llm = new FakeLLM(() => new Error('upstream unavailable'));
        const { agent, events } = setup(llm);

        await expect(agent.run({ resourceId: 'res-1', text: longText, budget: 20, focus: 'Essay' }))
            .resolves.toEqual({ text: 'abcdefghijabcdefghij', wasSummarized: true, degraded: true, sourceChars: 50 });
        expect(llm.calls).toHaveLength(1);
        expect(events.filter(e => e.type === 'summary:degraded')).toEqual([{
            type: 'summary:degraded',
            runId: 'run-1',
            resourceId: 'res-1',
            message: 'SummarizationDegraded: upstream unavailable; truncated res-1 to 20 characters',
        }]);
    });
});
