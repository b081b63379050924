import dotenv from 'dotenv';
import path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Load .env from project root
dotenv.config({ path: path.join(__dirname, '../../.env') });

import express from 'express';
import { createServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import cors from 'cors';
import { loadPipelineConfig } from './config/pipeline-config.js';
import { loadServerConfig } from './config/server-config.js';
import { createProvider } from './llm/create-provider.js';
import { PipelineOrchestrator } from './pipeline/orchestrator.js';
import { RunRegistry } from './pipeline/run-registry.js';
import { createApiRouter } from './routes/api.js';
import { createRunRelay, registerSocketHandlers } from './routes/socket-handlers.js';
import { HttpStatusError } from './errors.js';
import { CanvasClient, mediaType } from './sources/canvas-client.js';
import type { RawResource, ResourceReader } from './sources/types.js';
import { YouTubeTranscriptClient } from './sources/youtube-transcripts.js';
import { createDraftStore } from './utils/file-store.js';

const serverConfig = loadServerConfig();
const pipelineConfig = loadPipelineConfig();

// Allow any localhost origin in dev, plus requests with no origin (curl)
const isAllowedOrigin = (origin: string | undefined) => !origin || origin.startsWith('http://localhost:');

const corsOrigin = (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
    if (isAllowedOrigin(origin)) return callback(null, true);
    callback(new Error('Not allowed by CORS'));
};

const app = express();
const httpServer = createServer(app);
const io = new SocketIOServer(httpServer, {
    cors: { origin: corsOrigin, methods: ['GET', 'POST', 'DELETE'] },
});

const canvas = serverConfig.canvas
    ? new CanvasClient(serverConfig.canvas.baseUrl, serverConfig.canvas.token)
    : undefined;

// Without Canvas, linked resources are still read straight from their URLs
const reader: ResourceReader = canvas ?? {
    async readResource(resource, signal): Promise<RawResource> {
        const response = await fetch(resource.url, { signal, redirect: 'follow' });
        if (!response.ok) throw new HttpStatusError(response.status, resource.url);
        return {
            bytes: new Uint8Array(await response.arrayBuffer()),
            contentType: mediaType(response.headers.get('content-type')),
            finalUrl: response.url || resource.url,
        };
    },
};

const llm = createProvider(pipelineConfig.provider, serverConfig);
const orchestrator = new PipelineOrchestrator({
    config: pipelineConfig,
    llm,
    reader,
    transcripts: new YouTubeTranscriptClient(),
});

const store = createDraftStore(serverConfig.dataDir);
const relay = createRunRelay(io);
const registry = new RunRegistry(orchestrator, store, relay.notify);
orchestrator.subscribe(event => relay.observe(event));

app.use(cors({ origin: corsOrigin }));
app.use(express.json());

app.use('/api', createApiRouter({
    pipelineConfig,
    serverConfig,
    courses: canvas,
    llm,
    registry,
    relay,
    store,
}));

registerSocketHandlers(io, registry, relay);

httpServer.listen(serverConfig.port, () => {
    console.log(`\n  📚 Assignment Assistant running on http://localhost:${serverConfig.port}`);
    console.log(`     Provider: ${pipelineConfig.provider} (${pipelineConfig.condensationModel} / ${pipelineConfig.generationModel})`);
    console.log(`     Canvas: ${canvas ? serverConfig.canvas?.baseUrl : 'not configured'}\n`);
});

export { io };
