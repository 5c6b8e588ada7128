/**
 * Scan Loop Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * One cycle: scan → filter → size → reserve → place, then the loop's
 * start/stop lifecycle, fatal halting and shutdown of in-flight entries.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { ScanLoop, ScanLoopOptions } from '../src/runtime/scanLoop';
import { ExitEngine } from '../src/engines/exitEngine';
import { AuthenticationError } from '../src/core/errors';
import { DEFAULT_EXIT_POLICY } from '../src/core/exitRules';
import { CycleSummary, Opportunity, OpportunitySource, Order } from '../src/types';
import { harness, Harness, market, terminalOrder, waitFor } from './helpers/fakeExchange';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function opportunity(marketId: string, partial: Partial<Opportunity> = {}): Opportunity {
    return {
        marketId,
        side: 'yes',
        priceCents: 70,
        liquidityCents: 10_000_000,
        volume: 1000,
        hoursToClose: 12,
        observedAt: 0,
        ...partial,
    };
}

/** Yields batch n on scan n; the last batch repeats */
class ListSource implements OpportunitySource {
    scans = 0;

    constructor(private readonly batches: Opportunity[][]) {}

    async *scan(): AsyncGenerator<Opportunity> {
        const batch = this.batches[Math.min(this.scans, this.batches.length - 1)] ?? [];
        this.scans++;
        for (const item of batch) {
            yield item;
        }
    }
}

class FailingSource implements OpportunitySource {
    constructor(private readonly error: Error) {}

    async *scan(): AsyncGenerator<Opportunity> {
        throw this.error;
    }
}

function scanLoop(
    h: Harness,
    scanner: OpportunitySource,
    options: Partial<ScanLoopOptions> = {},
    exitOrderTimeoutMs: number = 100
): ScanLoop {
    const exitEngine = new ExitEngine({
        transport: h.exchange,
        gate: h.gate,
        ledger: h.ledger,
        lifecycle: h.lifecycle,
        events: h.events,
        policy: DEFAULT_EXIT_POLICY,
        options: { monitorIntervalMs: 10, marketFetchTimeoutMs: 100, exitOrderTimeoutMs },
    });
    return new ScanLoop({
        scanner,
        ledger: h.ledger,
        lifecycle: h.lifecycle,
        exitEngine,
        events: h.events,
        options: {
            scanIntervalMs: 10,
            orderTimeoutMs: 100,
            entryCutoffHours: null,
            sizing: {
                minPositionPercent: 0.02,
                maxPositionPercent: 0.10,
                minContracts: 1,
                maxContracts: null,
                maxConcurrentPositions: 10,
                maxPriceCents: 90,
                compoundProfits: true,
                feeAllowancePerContractCents: 2,
            },
            ...options,
        },
    });
}

// ═══════════════════════════════════════════════════════════════════════════════
// CYCLE
// ═══════════════════════════════════════════════════════════════════════════════

describe('ScanLoop.runCycle', () => {
    test('sizes, reserves and enters an opportunity', async () => {
        const h = harness();
        const loop = scanLoop(h, new ListSource([[opportunity('EVT-A')]]));

        const summary = await loop.runCycle();

        expect(summary.opportunities).toBe(1);
        expect(summary.entered).toBe(1);
        expect(summary.outcomes[0].kind).toBe('ENTERED');
        expect(h.exchange.submitted[0]).toEqual(expect.objectContaining({
            marketId: 'EVT-A',
            action: 'buy',
            priceCents: 70,
            quantity: 142,
        }));
        expect(h.exchange.submitted[0].clientOrderId.startsWith('b-')).toBe(true);
        expect(h.ledger.getPosition('EVT-A')?.quantity).toBe(142);
        expect(loop.getBaselineCents()).toBe(100_000);
    });

    test('a second opportunity in a held market is skipped', async () => {
        const h = harness();
        const loop = scanLoop(h, new ListSource([[opportunity('EVT-A'), opportunity('EVT-A')]]));

        const summary = await loop.runCycle();

        expect(summary.outcomes.map(outcome => outcome.kind)).toEqual(['ENTERED', 'SKIPPED']);
        expect(summary.outcomes[1]).toEqual({ kind: 'SKIPPED', marketId: 'EVT-A', reason: 'MARKET_OCCUPIED' });
        expect(h.exchange.submitted).toHaveLength(1);
    });

    test('markets closing inside the entry cutoff are skipped', async () => {
        const h = harness();
        const loop = scanLoop(h, new ListSource([[opportunity('EVT-A', { hoursToClose: 1 })]]), { entryCutoffHours: 2 });

        const summary = await loop.runCycle();

        expect(summary.outcomes).toEqual([{ kind: 'SKIPPED', marketId: 'EVT-A', reason: 'CLOSE_TOO_SOON' }]);
    });

    test('sizing rejections are reported and nothing is placed', async () => {
        const h = harness();
        const loop = scanLoop(h, new ListSource([[opportunity('EVT-A', { priceCents: 95 })]]));

        const summary = await loop.runCycle();

        expect(summary.outcomes[0]).toEqual(expect.objectContaining({ kind: 'SIZING_REJECTED', reason: 'PRICE_ABOVE_CAP' }));
        expect(h.exchange.submitted).toHaveLength(0);
    });

    test('the concurrency cap counts open positions', async () => {
        const h = harness();
        const loop = scanLoop(h, new ListSource([[opportunity('EVT-A'), opportunity('EVT-B')]]), {
            sizing: {
                minPositionPercent: 0.02,
                maxPositionPercent: 0.10,
                minContracts: 1,
                maxContracts: null,
                maxConcurrentPositions: 1,
                maxPriceCents: 90,
                compoundProfits: true,
                feeAllowancePerContractCents: 2,
            },
        });

        const summary = await loop.runCycle();

        expect(summary.outcomes[1]).toEqual(expect.objectContaining({ kind: 'SIZING_REJECTED', reason: 'CAP_REACHED' }));
    });

    test('an entry that never fills is NOT_FILLED and frees the market', async () => {
        const h = harness();
        h.exchange.planFor = () => ({ onSubmit: 0 });
        const loop = scanLoop(h, new ListSource([[opportunity('EVT-A')]]), { orderTimeoutMs: 20 });

        const summary = await loop.runCycle();

        expect(summary.outcomes[0].kind).toBe('NOT_FILLED');
        expect(h.ledger.hasExposure('EVT-A')).toBe(false);
        expect((await h.ledger.snapshot()).cashCents).toBe(100_000);
    });

    test('a halted ledger blocks new entries', async () => {
        const h = harness();
        await expect(
            h.ledger.applyFill(terminalOrder({ clientOrderId: 'b-x', marketId: 'EVT-X', action: 'buy' }))
        ).rejects.toThrow();
        const loop = scanLoop(h, new ListSource([[opportunity('EVT-A')]]));

        const summary = await loop.runCycle();

        expect(summary.outcomes).toEqual([{ kind: 'SKIPPED', marketId: 'EVT-A', reason: 'LEDGER_HALTED' }]);
    });

    test('emits cycle:completed with the summary', async () => {
        const h = harness();
        const summaries: CycleSummary[] = [];
        h.events.on('cycle:completed', summary => summaries.push(summary));
        const loop = scanLoop(h, new ListSource([[opportunity('EVT-A'), opportunity('EVT-B', { priceCents: 95 })]]));

        await loop.runCycle();

        expect(summaries).toHaveLength(1);
        expect(summaries[0]).toEqual(expect.objectContaining({ cycle: 1, opportunities: 2, entered: 1, error: null }));
    });

    test('a cash-capped entry with exchange fees opens the position without halting', async () => {
        const h = harness(1000);
        h.exchange.planFor = () => ({ feesCents: 25 });
        const loop = scanLoop(h, new ListSource([[opportunity('EVT-A')]]), {
            sizing: {
                minPositionPercent: 0.02,
                maxPositionPercent: 1,
                minContracts: 1,
                maxContracts: null,
                maxConcurrentPositions: 10,
                maxPriceCents: 90,
                compoundProfits: true,
                feeAllowancePerContractCents: 2,
            },
        });

        const summary = await loop.runCycle();

        expect(summary.outcomes[0].kind).toBe('ENTERED');
        expect(h.exchange.submitted[0].quantity).toBe(13);
        expect(h.ledger.isHalted()).toBe(false);
        expect(h.ledger.getPosition('EVT-A')).toEqual(expect.objectContaining({ quantity: 13, entryFeesCents: 25 }));
        expect((await h.ledger.snapshot()).cashCents).toBe(65);
        expect(loop.getFatalError()).toBeNull();
    });

    test('a non-fatal scan failure is recorded on the cycle', async () => {
        const h = harness();
        const loop = scanLoop(h, new FailingSource(new Error('listing unavailable')));

        const summary = await loop.runCycle();

        expect(summary.error).toBe('listing unavailable');
        expect(loop.getFatalError()).toBeNull();
    });
});

// ═══════════════════════════════════════════════════════════════════════════════
// LIFECYCLE
// ═══════════════════════════════════════════════════════════════════════════════

describe('ScanLoop lifecycle', () => {
    test('runs cycles until stopped', async () => {
        const h = harness();
        h.exchange.addMarket(market({ marketId: 'EVT-A', yesPriceCents: 70 }));
        const source = new ListSource([[opportunity('EVT-A')], []]);
        const loop = scanLoop(h, source);

        await loop.start();
        await waitFor(() => source.scans >= 3);
        const stopping = loop.stop();
        expect(loop.stop()).toBe(stopping);
        await stopping;

        expect(loop.isActive()).toBe(false);
        expect(h.ledger.getPosition('EVT-A')?.quantity).toBe(142);
        expect(h.lifecycle.outstanding()).toBe(0);
    });

    test('a fatal error halts the loop', async () => {
        const h = harness();
        const loop = scanLoop(h, new FailingSource(new AuthenticationError('HTTP 401')));

        await loop.start();
        await loop.done();

        expect(loop.getFatalError()).toBeInstanceOf(AuthenticationError);
        await loop.stop();
        expect(loop.isActive()).toBe(false);
    });

    test('stop cancels a resting entry and releases its reservation', async () => {
        const h = harness();
        h.exchange.planFor = () => ({ onSubmit: 0 });
        const loop = scanLoop(h, new ListSource([[opportunity('EVT-A')], []]), { orderTimeoutMs: 60_000 });

        await loop.start();
        await waitFor(() => h.exchange.submitted.length === 1);
        await loop.stop();

        expect(h.exchange.canceled).toEqual(['ex-1']);
        expect(h.ledger.hasExposure('EVT-A')).toBe(false);
        expect((await h.ledger.snapshot()).cashCents).toBe(100_000);
        expect(h.lifecycle.getStats().canceled).toBe(1);
    });

    test('stop cancels a resting exit order promptly', async () => {
        const h = harness();
        h.exchange.addMarket(market({ marketId: 'EVT-A', yesPriceCents: 70 }));
        h.exchange.planFor = request => (request.action === 'sell' ? { onSubmit: 0 } : {});
        await h.ledger.reserveEntry('EVT-A', 'yes', 600, 'b-1');
        await h.ledger.applyFill(terminalOrder({ clientOrderId: 'b-1', marketId: 'EVT-A', action: 'buy', requestedPriceCents: 60 }));
        const terminal: Order[] = [];
        h.events.on('order:terminal', order => terminal.push(order));
        const loop = scanLoop(h, new ListSource([[]]), {}, 60_000);

        await loop.start();
        await waitFor(() => h.exchange.submitted.length === 1);
        const stoppedAt = Date.now();
        await loop.stop();

        expect(Date.now() - stoppedAt).toBeLessThan(1000);
        expect(h.exchange.canceled).toEqual(['ex-1']);
        expect(terminal.map(order => `${order.action}:${order.status}`)).toEqual(['sell:CANCELED']);
        expect(h.ledger.getPosition('EVT-A')).toEqual(expect.objectContaining({ quantity: 10, status: 'OPEN' }));
    });
});
