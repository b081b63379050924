import { v4 as uuidv4 } from 'uuid';
import { RunCancelledError, errorMessage } from '../errors.js';
import type { Assignment, PipelineRunResult, SolutionDraft } from '../types.js';
import type { DraftStore } from '../utils/file-store.js';
import { EthicsGate } from './ethics-gate.js';
import type { PipelineOrchestrator } from './orchestrator.js';

export type RunStatus = 'running' | 'completed' | 'failed' | 'cancelled';

export interface RunRecord {
    id: string;
    assignment: Assignment;
    gate: EthicsGate;
    controller: AbortController;
    status: RunStatus;
    result?: PipelineRunResult;
    draftId?: string;
    saveError?: string; // the run completed but its draft could not be written
}

export type RunNotifier = (runId: string, event: string, payload: Record<string, unknown>) => void;

export interface RunRegistryOptions {
    retentionMs?: number; // how long a finished run stays queryable and retryable
}

const DEFAULT_RETENTION_MS = 15 * 60 * 1000;

/**
 * In-memory bookkeeping for runs started from the operator surface. Finished
 * runs are dropped once the retention window passes without a retry.
 */
export class RunRegistry {
    private runs = new Map<string, RunRecord>();
    private evictions = new Map<string, ReturnType<typeof setTimeout>>();
    private retentionMs: number;

    constructor(
        private orchestrator: PipelineOrchestrator,
        private store: DraftStore,
        private notify: RunNotifier = () => {},
        options: RunRegistryOptions = {}
    ) {
        this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
    }

    get(runId: string): RunRecord | undefined {
        return this.runs.get(runId);
    }

    start(assignment: Assignment, runId: string = uuidv4()): RunRecord {
        const record: RunRecord = {
            id: runId,
            assignment,
            gate: new EthicsGate(),
            controller: new AbortController(),
            status: 'running',
        };
        this.runs.set(record.id, record);
        this.track(record, this.orchestrator.run(assignment, {
            gate: record.gate,
            signal: record.controller.signal,
            runId: record.id,
        }));
        return record;
    }

    /** Generation only, on the bundle a GenerationFailure left behind. */
    retryGeneration(runId: string): RunRecord | null {
        const record = this.runs.get(runId);
        if (!record || record.status !== 'failed' || record.result?.status !== 'failed' || !record.result.bundle) {
            return null;
        }

        const bundle = record.result.bundle;
        this.keep(record.id);
        record.status = 'running';
        record.result = undefined;
        record.controller = new AbortController();
        this.track(record, this.orchestrator.retryGeneration(bundle, {
            gate: record.gate,
            signal: record.controller.signal,
            runId: record.id,
        }));
        return record;
    }

    respond(runId: string, acknowledged: boolean): boolean {
        const record = this.runs.get(runId);
        if (!record) return false;
        return acknowledged ? record.gate.acknowledge() : record.gate.reject('declined');
    }

    cancel(runId: string): boolean {
        const record = this.runs.get(runId);
        if (!record || record.status !== 'running') return false;
        record.controller.abort(new RunCancelledError());
        return true;
    }

    private track(record: RunRecord, run: Promise<PipelineRunResult>) {
        run
            .then(async result => {
                record.result = result;
                record.status = result.status;
                if (result.status === 'completed') await this.saveDraft(record, result.draft);
            })
            .catch(error => {
                if (error instanceof RunCancelledError) {
                    record.status = 'cancelled';
                    console.log(`[Runs] Run ${record.id} cancelled`);
                    this.notify(record.id, 'run:cancelled', { runId: record.id });
                    return;
                }
                record.status = 'failed';
                console.error(`[Runs] Run ${record.id} crashed:`, error);
                this.notify(record.id, 'error', { runId: record.id, message: errorMessage(error) });
            })
            .finally(() => this.scheduleEviction(record.id));
    }

    private async saveDraft(record: RunRecord, draft: SolutionDraft) {
        try {
            const { id } = await this.store.saveDraft(draft, record.assignment.courseId);
            record.draftId = id;
            this.notify(record.id, 'draft:saved', { runId: record.id, draftId: id });
        } catch (error) {
            record.saveError = errorMessage(error);
            console.error(`[Runs] Draft for run ${record.id} was not saved:`, error);
            this.notify(record.id, 'draft:save-failed', { runId: record.id, message: record.saveError });
        }
    }

    private scheduleEviction(runId: string) {
        this.keep(runId);
        const timer = setTimeout(() => {
            this.evictions.delete(runId);
            this.runs.delete(runId);
        }, this.retentionMs);
        timer.unref();
        this.evictions.set(runId, timer);
    }

    private keep(runId: string) {
        clearTimeout(this.evictions.get(runId));
        this.evictions.delete(runId);
    }
}
