import { RunCancelledError } from '../errors.js';

export type GateState = 'pending' | 'acknowledged' | 'rejected';
export type RejectionReason = 'declined' | 'timeout';

type Waiter = (state: GateState) => void;

/**
 * Human acknowledgment checkpoint for one run. Starts pending; the first
 * decision is final. Silence until the timeout counts as a decline.
 */
export class EthicsGate {
    private current: GateState = 'pending';
    private reason: RejectionReason | undefined;
    private waiters = new Set<Waiter>();

    get state(): GateState {
        return this.current;
    }

    get rejectionReason(): RejectionReason | undefined {
        return this.reason;
    }

    acknowledge(): boolean {
        return this.settle('acknowledged');
    }

    reject(reason: RejectionReason = 'declined'): boolean {
        return this.settle('rejected', reason);
    }

    awaitDecision(timeoutMs: number, signal?: AbortSignal): Promise<GateState> {
        if (this.current !== 'pending') return Promise.resolve(this.current);
        if (signal?.aborted) return Promise.reject(new RunCancelledError());

        return new Promise<GateState>((resolve, reject) => {
            const cleanup = () => {
                clearTimeout(timer);
                this.waiters.delete(waiter);
                signal?.removeEventListener('abort', onAbort);
            };
            const waiter: Waiter = state => {
                cleanup();
                resolve(state);
            };
            const onAbort = () => {
                cleanup();
                reject(new RunCancelledError());
            };
            const timer = setTimeout(() => this.reject('timeout'), timeoutMs);

            this.waiters.add(waiter);
            signal?.addEventListener('abort', onAbort, { once: true });
        });
    }

    private settle(state: Exclude<GateState, 'pending'>, reason?: RejectionReason): boolean {
        if (this.current !== 'pending') return false;
        this.current = state;
        this.reason = reason;
        for (const waiter of [...this.waiters]) waiter(state);
        return true;
    }
}
