import { Router, Request, Response } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { ReflectionAgent } from '../agents/reflection-agent.js';
import type { PipelineConfig } from '../config/pipeline-config.js';
import { pickIntegrityReminder } from '../config/reminders.js';
import type { ServerConfig } from '../config/server-config.js';
import { HttpStatusError, errorMessage } from '../errors.js';
import { availableProviders } from '../llm/create-provider.js';
import type { LLMProvider } from '../llm/provider.js';
import type { RunRegistry } from '../pipeline/run-registry.js';
import type { CourseSource } from '../sources/types.js';
import { generateDraftDocx } from '../utils/docx-exporter.js';
import type { DraftStore } from '../utils/file-store.js';
import { safeName } from '../utils/file-store.js';
import type { RunRelay } from './socket-handlers.js';

export interface ApiDeps {
    pipelineConfig: Readonly<PipelineConfig>;
    serverConfig: Readonly<ServerConfig>;
    courses?: CourseSource;
    llm: LLMProvider;
    registry: RunRegistry;
    relay: RunRelay;
    store: DraftStore;
}

const startRunSchema = z.object({
    socketId: z.string().min(1),
    courseId: z.string().min(1),
    assignmentId: z.string().min(1),
});

const sendError = (res: Response, error: unknown, label: string) => {
    console.error(`[API] ${label}:`, error);
    if (error instanceof HttpStatusError) {
        // Upstream answers are reported as gateway failures except "not found"
        const status = error.status === 404 ? 404 : 502;
        return res.status(status).json({ error: error.message });
    }
    return res.status(500).json({ error: errorMessage(error) });
};

export function createApiRouter(deps: ApiDeps) {
    const { pipelineConfig, serverConfig, courses, llm, registry, relay, store } = deps;
    const router = Router();

    const requireCourses = (res: Response): CourseSource | null => {
        if (!courses) {
            res.status(503).json({ error: 'Canvas is not configured (set CANVAS_API_URL and CANVAS_API_KEY)' });
            return null;
        }
        return courses;
    };

    router.get('/config', (_req: Request, res: Response) => {
        res.json({
            providers: availableProviders(serverConfig),
            provider: pipelineConfig.provider,
            models: {
                condensation: pipelineConfig.condensationModel,
                generation: pipelineConfig.generationModel,
            },
            pipeline: pipelineConfig,
            canvasConfigured: Boolean(courses),
        });
    });

    router.get('/courses', async (_req: Request, res: Response) => {
        const source = requireCourses(res);
        if (!source) return;
        try {
            res.json(await source.listCourses());
        } catch (error) {
            sendError(res, error, 'Course listing error');
        }
    });

    router.get('/courses/:courseId/assignments', async (req: Request, res: Response) => {
        const source = requireCourses(res);
        if (!source) return;
        try {
            const pendingOnly = req.query.pending === 'true';
            res.json(await source.listAssignments(req.params.courseId, { pendingOnly }));
        } catch (error) {
            sendError(res, error, 'Assignment listing error');
        }
    });

    // Start a run: progress and the ethics prompt go over the socket
    router.post('/runs', async (req: Request, res: Response) => {
        const source = requireCourses(res);
        if (!source) return;

        const parsed = startRunSchema.safeParse(req.body);
        if (!parsed.success) {
            return res.status(400).json({ error: 'socketId, courseId and assignmentId are required' });
        }
        const { socketId, courseId, assignmentId } = parsed.data;

        if (!relay.isConnected(socketId)) {
            return res.status(404).json({ error: 'Socket not found' });
        }

        try {
            console.log(`[API] /runs request for assignment ${assignmentId} in course ${courseId}`);
            const assignment = await source.getAssignment(courseId, assignmentId);

            // Bind first: the run starts emitting as soon as it is registered
            const runId = uuidv4();
            relay.bind(runId, socketId);
            const record = registry.start(assignment, runId);

            const reflection = await new ReflectionAgent({
                runId: record.id,
                config: pipelineConfig,
                llm,
                signal: record.controller.signal,
                emit: event => relay.observe(event),
            }).run(assignment);

            res.json({
                runId: record.id,
                assignment: { id: assignment.id, title: assignment.title, resources: assignment.resources.length },
                reflectionQuestions: reflection.data ?? [],
                reminder: pickIntegrityReminder(),
                ethicsTimeoutMs: pipelineConfig.ethicsGateTimeoutMs,
            });
        } catch (error) {
            sendError(res, error, 'Run start error');
        }
    });

    router.post('/runs/:runId/retry-generation', (req: Request, res: Response) => {
        const { runId } = req.params;
        if (!registry.get(runId)) {
            return res.status(404).json({ error: 'Run not found' });
        }
        const record = registry.retryGeneration(runId);
        if (!record) {
            return res.status(409).json({ error: 'Only runs that failed during generation can be retried' });
        }
        res.json({ success: true, runId: record.id });
    });

    router.get('/runs/:runId', (req: Request, res: Response) => {
        const record = registry.get(req.params.runId);
        if (!record) {
            return res.status(404).json({ error: 'Run not found' });
        }
        res.json({
            runId: record.id,
            status: record.status,
            gate: record.gate.state,
            draftId: record.draftId,
            saveError: record.saveError,
            failure: record.result?.status === 'failed'
                ? { error: record.result.error, message: record.result.message }
                : undefined,
        });
    });

    router.get('/drafts', async (_req: Request, res: Response) => {
        try {
            res.json(await store.listDrafts());
        } catch (error) {
            sendError(res, error, 'Draft listing error');
        }
    });

    router.get('/drafts/:id', async (req: Request, res: Response) => {
        try {
            const stored = await store.loadDraft(req.params.id);
            if (!stored) {
                return res.status(404).json({ error: 'Draft not found' });
            }
            res.json(stored);
        } catch (error) {
            sendError(res, error, 'Draft load error');
        }
    });

    router.delete('/drafts/:id', async (req: Request, res: Response) => {
        try {
            const deleted = await store.deleteDraft(req.params.id);
            if (!deleted) {
                return res.status(404).json({ error: 'Draft not found' });
            }
            res.json({ success: true });
        } catch (error) {
            sendError(res, error, 'Draft delete error');
        }
    });

    router.get('/drafts/:id/docx', async (req: Request, res: Response) => {
        try {
            const stored = await store.loadDraft(req.params.id);
            if (!stored) {
                return res.status(404).json({ error: 'Draft not found' });
            }
            const buffer = await generateDraftDocx(stored.draft);

            res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.wordprocessingml.document');
            res.setHeader('Content-Disposition', `attachment; filename="${safeName(stored.draft.assignmentTitle)}.docx"`);
            res.send(buffer);
        } catch (error) {
            sendError(res, error, 'DOCX export error');
        }
    });

    return router;
}
