import type { Server as SocketIOServer } from 'socket.io';
import { z } from 'zod';
import type { RunRegistry } from '../pipeline/run-registry.js';
import type { PipelineEvent } from '../types.js';

const ethicsResponseSchema = z.object({
    runId: z.string().min(1),
    acknowledged: z.boolean(),
});

const cancelSchema = z.object({ runId: z.string().min(1) });

/** Routes run events to the socket that started the run. */
export function createRunRelay(io: SocketIOServer) {
    const owners = new Map<string, string>();

    const send = (runId: string, event: string, payload: unknown) => {
        const socketId = owners.get(runId);
        if (socketId) io.to(socketId).emit(event, payload);
    };

    return {
        isConnected(socketId: string) {
            return io.sockets.sockets.has(socketId);
        },
        bind(runId: string, socketId: string) {
            owners.set(runId, socketId);
        },
        observe(event: PipelineEvent) {
            send(event.runId, event.type, event);
        },
        notify(runId: string, event: string, payload: Record<string, unknown>) {
            send(runId, event, payload);
        },
        release(socketId: string): string[] {
            const released = [...owners].filter(([, owner]) => owner === socketId).map(([runId]) => runId);
            for (const runId of released) owners.delete(runId);
            return released;
        },
    };
}

export type RunRelay = ReturnType<typeof createRunRelay>;

export function registerSocketHandlers(io: SocketIOServer, registry: RunRegistry, relay: RunRelay) {
    io.on('connection', (socket) => {
        console.log(`  ↔ Client connected: ${socket.id}`);

        socket.on('disconnect', () => {
            console.log(`  ↔ Client disconnected: ${socket.id}`);
            // Nobody is left to answer the gate
            for (const runId of relay.release(socket.id)) registry.cancel(runId);
        });

        socket.on('ethics:respond', (payload: unknown) => {
            const parsed = ethicsResponseSchema.safeParse(payload);
            if (!parsed.success) {
                socket.emit('error', { message: 'Invalid ethics response' });
                return;
            }
            const { runId, acknowledged } = parsed.data;
            const applied = registry.respond(runId, acknowledged);
            console.log(`[Socket] Ethics ${acknowledged ? 'acknowledged' : 'declined'} for run ${runId}${applied ? '' : ' (ignored)'}`);
            socket.emit('ethics:recorded', { runId, acknowledged, applied });
        });

        socket.on('run:cancel', (payload: unknown) => {
            const parsed = cancelSchema.safeParse(payload);
            if (!parsed.success) {
                socket.emit('error', { message: 'Invalid cancel request' });
                return;
            }
            if (!registry.cancel(parsed.data.runId)) {
                socket.emit('error', { runId: parsed.data.runId, message: 'Run is not running' });
            }
        });
    });
}
