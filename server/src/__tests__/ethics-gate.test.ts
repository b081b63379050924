import { describe, it, expect } from 'vitest';
import { RunCancelledError } from '../errors.js';
import { EthicsGate } from '../pipeline/ethics-gate.js';

describe('EthicsGate', () => {
    it('starts pending', () => {
        const gate = new EthicsGate();
        expect(gate.state).toBe('pending');
        expect(gate.rejectionReason).toBeUndefined();
    });

    it('resolves when the operator acknowledges', async () => {
        const gate = new EthicsGate();
        const decision = gate.awaitDecision(60_000);

        expect(gate.acknowledge()).toBe(true);
        await expect(decision).resolves.toBe('acknowledged');
    });

    it('treats silence until the timeout as a rejection', async () => {
        const gate = new EthicsGate();

        await expect(gate.awaitDecision(10)).resolves.toBe('rejected');
        expect(gate.rejectionReason).toBe('timeout');
    });

    it('keeps the first decision', () => {
        const gate = new EthicsGate();

        expect(gate.reject()).toBe(true);
        expect(gate.acknowledge()).toBe(false);
        expect(gate.state).toBe('rejected');
        expect(gate.rejectionReason).toBe('declined');
    });

    it('answers immediately once decided', async () => {
        const gate = new EthicsGate();
        gate.acknowledge();

        await expect(gate.awaitDecision(10)).resolves.toBe('acknowledged');
    });

    it('rejects the wait when the run is cancelled', async () => {
        const gate = new EthicsGate();
        const controller = new AbortController();
        const decision = gate.awaitDecision(60_000, controller.signal);

        controller.abort();

        await expect(decision).rejects.toBeInstanceOf(RunCancelledError);
        expect(gate.state).toBe('pending');
    });
});
