import { describe, it, expect } from 'vitest';
import { createPipelineConfig } from '../config/pipeline-config.js';
import { HttpStatusError, RunCancelledError } from '../errors.js';
import { EthicsGate } from '../pipeline/ethics-gate.js';
import { PipelineOrchestrator } from '../pipeline/orchestrator.js';
import type { Assignment, PipelineEvent } from '../types.js';
import { FakeLLM, FakeReader, FakeTranscripts, hangUntilAborted, page, serverError } from './fakes.js';

const READING = 'https://example.edu/reading.txt';
const PAGE = 'https://example.edu/page';
const VIDEO = 'https://youtu.be/lecture0001';

const config = createPipelineConfig({
    summarizationThresholdChars: 1000,
    maxConcurrentFetches: 2,
    fetchRetryLimit: 1,
    generationRetryLimit: 1,
    retryInitialDelayMs: 0,
    retryMaxDelayMs: 0,
    ethicsGateTimeoutMs: 20,
    condensationModel: 'condense',
    generationModel: 'generate',
});

const assignment: Assignment = {
    id: 'a1',
    courseId: 'c1',
    title: 'Essay on erosion',
    description: 'Write 500 words on erosion.',
    resources: [
        { id: 'r1', url: READING, kind: 'plainText', label: 'Reading' },
        { id: 'r2', url: PAGE, kind: 'webpage' },
        { id: 'r3', url: VIDEO, kind: 'video' },
    ],
};

const answers = (call: { modelId: string }) => (call.modelId === 'condense' ? 'condensed doc' : 'The answer');

const setup = (options: { reader?: FakeReader; llm?: FakeLLM; transcripts?: FakeTranscripts } = {}) => {
    const reader = options.reader ?? new FakeReader()
        .on(READING, page(READING, 'word '.repeat(600)))
        .on(PAGE, page(PAGE, '<p>Short page</p>', 'text/html'));
    const llm = options.llm ?? new FakeLLM(answers);
    const transcripts = options.transcripts ?? new FakeTranscripts({ lecture0001: ['hello there'] });
    const orchestrator = new PipelineOrchestrator({ config, llm, reader, transcripts });
    const events: PipelineEvent[] = [];
    orchestrator.subscribe(event => events.push(event));
    return { orchestrator, reader, llm, events };
};

const acknowledged = () => {
    const gate = new EthicsGate();
    gate.acknowledge();
    return gate;
};

describe('PipelineOrchestrator', () => {
    it('condenses only oversized resources and drafts an answer', async () => {
        const { orchestrator, llm } = setup();

        const result = await orchestrator.run(assignment, { gate: acknowledged(), runId: 'run-1' });

        expect(result.status).toBe('completed');
        if (result.status !== 'completed') return;
        expect(result.draft.answer).toBe('The answer');
        expect(result.draft.manifest).toEqual([
            { resourceId: 'r1', url: READING, kind: 'plainText', status: 'included', source: 'resource', wasSummarized: true, degraded: false, chars: 13 },
            { resourceId: 'r2', url: PAGE, kind: 'webpage', status: 'included', source: 'resource', wasSummarized: false, degraded: false, chars: 10 },
            { resourceId: 'r3', url: VIDEO, kind: 'video', status: 'included', source: 'transcript', wasSummarized: false, degraded: false, chars: 11 },
        ]);
        expect(result.draft.prompt).toContain('### Reading (https://example.edu/reading.txt) (condensed)\ncondensed doc\n');
        expect(result.draft.prompt).toContain('## Video transcripts\n\n### https://youtu.be/lecture0001\nhello there\n');
        expect(llm.callsTo('condense')).toHaveLength(1);
        expect(llm.callsTo('generate')).toHaveLength(1);
    });

    it('reports stages in order over the event stream', async () => {
        const { orchestrator, events } = setup();

        await orchestrator.run(assignment, { gate: acknowledged(), runId: 'run-1' });

        expect(events.filter(e => e.type === 'stage:entered').map(e => e.type === 'stage:entered' && e.stage))
            .toEqual(['fetch', 'enrich', 'summarize', 'assemble', 'ethics', 'generate']);
        expect(events.filter(e => e.type === 'resource:resolved')).toHaveLength(3);
        expect(events.every(e => e.runId === 'run-1')).toBe(true);
        expect(events[events.length - 1].type).toBe('run:completed');
    });

    it('still generates when every resource is inaccessible', async () => {
        const reader = new FakeReader()
            .on(READING, new HttpStatusError(403, READING))
            .on(PAGE, new HttpStatusError(403, PAGE));
        const { orchestrator, llm } = setup({ reader, transcripts: new FakeTranscripts() });

        const result = await orchestrator.run(assignment, { gate: acknowledged() });

        expect(result.status).toBe('completed');
        if (result.status !== 'completed') return;
        expect(result.draft.manifest.map(e => (e.status === 'omitted' ? e.reason : e.status)))
            .toEqual(['AccessError', 'AccessError', 'NoTranscript']);
        expect(result.draft.prompt).toContain('Write 500 words on erosion.');
        expect(llm.callsTo('condense')).toHaveLength(0);
        expect(reader.count(READING)).toBe(1);
    });

    it('keeps going when some resources fail', async () => {
        const reader = new FakeReader()
            .on(READING, new HttpStatusError(500, READING))
            .on(PAGE, page(PAGE, '<p>Short page</p>', 'text/html'));
        const { orchestrator } = setup({ reader });

        const result = await orchestrator.run(assignment, { gate: acknowledged() });

        expect(result.status).toBe('completed');
        if (result.status !== 'completed') return;
        expect(result.draft.manifest[0]).toEqual({
            resourceId: 'r1',
            url: READING,
            kind: 'plainText',
            status: 'omitted',
            reason: 'FetchError',
            detail: 'Server answered 500',
        });
        expect(result.draft.manifest.filter(e => e.status === 'included')).toHaveLength(2);
        expect(reader.count(READING)).toBe(2);
    });

    it('appends videos discovered in text and flags duplicate links', async () => {
        const { orchestrator } = setup({
            transcripts: new FakeTranscripts({ lecture0001: ['hello there'], extra000001: ['bonus clip'] }),
        });
        const withVideos: Assignment = {
            ...assignment,
            description: 'Also see https://www.youtube.com/watch?v=extra000001',
            resources: [...assignment.resources, { id: 'r4', url: 'https://www.youtube.com/watch?v=lecture0001', kind: 'video' }],
        };

        const result = await orchestrator.run(withVideos, { gate: acknowledged() });

        expect(result.status).toBe('completed');
        if (result.status !== 'completed') return;
        expect(result.draft.manifest.map(e => [e.resourceId, e.status])).toEqual([
            ['r1', 'included'],
            ['r2', 'included'],
            ['r3', 'included'],
            ['r4', 'omitted'],
            ['video:extra000001', 'included'],
        ]);
        const duplicate = result.draft.manifest[3];
        expect(duplicate.status === 'omitted' && duplicate.detail).toBe('Duplicate video reference');
    });

    it('stops at the ethics gate when nobody acknowledges', async () => {
        const { orchestrator, llm, events } = setup({
            reader: new FakeReader().on(READING, page(READING, 'short')).on(PAGE, page(PAGE, 'short')),
        });

        const result = await orchestrator.run(assignment, { gate: new EthicsGate() });

        expect(result).toEqual({
            status: 'failed',
            error: 'EthicsGateRejected',
            message: 'No acknowledgment received before the ethics gate timed out',
        });
        expect(llm.calls).toHaveLength(0);
        expect(events.some(e => e.type === 'ethics:pending')).toBe(true);
        expect(events.some(e => e.type === 'stage:entered' && e.stage === 'generate')).toBe(false);
    });

    it('holds condensation until the gate decides and makes no calls on a timeout', async () => {
        const { orchestrator, llm, events } = setup();

        const result = await orchestrator.run(assignment, { gate: new EthicsGate() });

        expect(result).toEqual({
            status: 'failed',
            error: 'EthicsGateRejected',
            message: 'No acknowledgment received before the ethics gate timed out',
        });
        expect(llm.calls).toHaveLength(0);
        expect(events.filter(e => e.type === 'stage:entered').map(e => e.type === 'stage:entered' && e.stage))
            .toEqual(['fetch', 'enrich', 'summarize']);
        expect(events.filter(e => e.type === 'ethics:pending')).toHaveLength(1);
    });

    it('makes no calls at all when the operator declines', async () => {
        const { orchestrator, llm } = setup();
        const gate = new EthicsGate();
        gate.reject('declined');

        const result = await orchestrator.run(assignment, { gate });

        expect(result).toEqual({
            status: 'failed',
            error: 'EthicsGateRejected',
            message: 'The operator declined the ethics acknowledgment',
        });
        expect(llm.calls).toHaveLength(0);
    });

    it('asks for the acknowledgment once when condensation comes first', async () => {
        const { orchestrator, llm, events } = setup();
        const gate = new EthicsGate();
        orchestrator.subscribe(event => {
            if (event.type === 'ethics:pending') gate.acknowledge();
        });

        const result = await orchestrator.run(assignment, { gate });

        expect(result.status).toBe('completed');
        expect(events.filter(e => e.type === 'ethics:pending')).toHaveLength(1);
        expect(llm.callsTo('condense')).toHaveLength(1);
        expect(llm.callsTo('generate')).toHaveLength(1);
    });

    it('finds videos linked or embedded in a fetched page', async () => {
        const html = '<p>Notes</p><iframe src="https://www.youtube.com/embed/embedvid001"></iframe>'
            + '<a href="https://youtu.be/linkvid0002">clip</a>';
        const reader = new FakeReader()
            .on(READING, page(READING, 'short'))
            .on(PAGE, page(PAGE, html, 'text/html'));
        const transcripts = new FakeTranscripts({ lecture0001: ['hello there'], embedvid001: ['embedded talk'] });
        const { orchestrator } = setup({ reader, transcripts });

        const result = await orchestrator.run(assignment, { gate: acknowledged() });

        expect(result.status).toBe('completed');
        if (result.status !== 'completed') return;
        expect(result.draft.manifest.map(e => [e.resourceId, e.status])).toEqual([
            ['r1', 'included'],
            ['r2', 'included'],
            ['r3', 'included'],
            ['video:embedvid001', 'included'],
            ['video:linkvid0002', 'omitted'],
        ]);
        expect([...transcripts.requested].sort()).toEqual(['embedvid001', 'lecture0001', 'linkvid0002']);
        expect(result.draft.prompt).toContain('embedded talk');
    });

    it('keeps the bundle after a generation failure so only generation is retried', async () => {
        const llm = new FakeLLM(call => (call.modelId === 'condense' ? 'condensed doc' : serverError()));
        const { orchestrator, reader } = setup({ llm });
        const gate = acknowledged();

        const failed = await orchestrator.run(assignment, { gate, runId: 'run-2' });

        expect(failed.status).toBe('failed');
        if (failed.status !== 'failed' || !failed.bundle) throw new Error('expected a bundle');
        expect(failed.error).toBe('GenerationFailure');
        expect(llm.callsTo('generate')).toHaveLength(2);

        const readsBefore = reader.reads.length;
        llm.respondWith(answers);
        const retried = await orchestrator.retryGeneration(failed.bundle, { gate, runId: 'run-2' });

        expect(retried.status).toBe('completed');
        expect(reader.reads.length).toBe(readsBefore);
        expect(llm.callsTo('condense')).toHaveLength(1);
    });

    it('rejects with RunCancelledError when cancelled mid-fetch', async () => {
        const reader = new FakeReader().on(READING, hangUntilAborted).on(PAGE, hangUntilAborted);
        const { orchestrator, llm } = setup({ reader });
        const controller = new AbortController();

        const run = orchestrator.run(assignment, { gate: acknowledged(), signal: controller.signal });
        setTimeout(() => controller.abort(), 5);

        await expect(run).rejects.toBeInstanceOf(RunCancelledError);
        expect(llm.calls).toHaveLength(0);
    });

    it('lets unsubscribed observers go', async () => {
        const { orchestrator } = setup();
        const seen: PipelineEvent[] = [];
        const unsubscribe = orchestrator.subscribe(event => seen.push(event));
        unsubscribe();

        await orchestrator.run(assignment, { gate: acknowledged() });

        expect(seen).toEqual([]);
    });
});
