import { RateGate } from '../src/core/rateGate';
import { RateGateTimeout } from '../src/core/errors';
import { sleep } from '../src/utils/sleep';

describe('RateGate', () => {
    test('grants up to the burst capacity immediately', async () => {
        const gate = new RateGate({ requestsPerSecond: 5, maxWaitMs: 1000 });
        const permits = await Promise.all([1, 2, 3, 4, 5].map(i => gate.acquire(`call-${i}`)));

        expect(permits.map(permit => permit.waitedMs)).toEqual([0, 0, 0, 0, 0]);
        expect(gate.getStats().granted).toBe(5);
    });

    test('paces calls beyond the burst at the configured rate', async () => {
        const gate = new RateGate({ requestsPerSecond: 20, burst: 1, maxWaitMs: 2000 });
        const started = Date.now();

        await Promise.all([gate.acquire(), gate.acquire(), gate.acquire(), gate.acquire()]);

        // First permit is free, the next three need ~50ms each
        expect(Date.now() - started).toBeGreaterThanOrEqual(140);
        expect(gate.getStats().granted).toBe(4);
    });

    test('serves waiters in arrival order', async () => {
        const gate = new RateGate({ requestsPerSecond: 100, burst: 1, maxWaitMs: 2000 });
        const order: string[] = [];

        await Promise.all(
            ['a', 'b', 'c', 'd'].map(label => gate.acquire(label).then(permit => {
                order.push(permit.label);
            }))
        );

        expect(order).toEqual(['a', 'b', 'c', 'd']);
    });

    test('rejects a waiter that cannot be served within maxWaitMs', async () => {
        const gate = new RateGate({ requestsPerSecond: 1, burst: 1, maxWaitMs: 50 });
        await gate.acquire('first');

        await expect(gate.acquire('second')).rejects.toBeInstanceOf(RateGateTimeout);
        expect(gate.getStats()).toEqual(expect.objectContaining({ timedOut: 1, queued: 0 }));
    });

    test('run() does not invoke the call when the permit times out', async () => {
        const gate = new RateGate({ requestsPerSecond: 1, burst: 1, maxWaitMs: 30 });
        await gate.acquire('first');
        const call = jest.fn(async () => 'sent');

        await expect(gate.run('second', call)).rejects.toBeInstanceOf(RateGateTimeout);
        expect(call).not.toHaveBeenCalled();
    });

    test('run() returns the call result', async () => {
        const gate = new RateGate({ requestsPerSecond: 10, maxWaitMs: 100 });
        await expect(gate.run('ok', async () => 'result')).resolves.toBe('result');
    });

    test('refills tokens over time', async () => {
        const gate = new RateGate({ requestsPerSecond: 100, burst: 2, maxWaitMs: 100 });
        await gate.acquire();
        await gate.acquire();
        expect(gate.getStats().tokens).toBe(0);

        await sleep(40);
        expect(gate.getStats().tokens).toBe(2);
    });

    test('refuses a non-positive rate', () => {
        expect(() => new RateGate({ requestsPerSecond: 0, maxWaitMs: 100 })).toThrow('requestsPerSecond');
    });
});
