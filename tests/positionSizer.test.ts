import { sizePosition, SizingConfig } from '../src/capital/positionSizer';
import { Opportunity, PortfolioSnapshot } from '../src/types';

// ═══════════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function snapshot(partial: Partial<PortfolioSnapshot> = {}): PortfolioSnapshot {
    return {
        cashCents: 100_000,
        reservedCents: 0,
        costBasisCents: 0,
        unrealizedPnlCents: 0,
        realizedPnlCents: 0,
        feesPaidCents: 0,
        totalValueCents: 100_000,
        openPositions: 0,
        pendingEntries: 0,
        takenAt: 0,
        ...partial,
    };
}

function opportunity(priceCents: number): Opportunity {
    return {
        marketId: 'EVT-A',
        side: 'yes',
        priceCents,
        liquidityCents: 10_000_000,
        volume: 1000,
        hoursToClose: 12,
        observedAt: 0,
    };
}

function config(partial: Partial<SizingConfig> = {}): SizingConfig {
    return {
        minPositionPercent: 0.02,
        maxPositionPercent: 0.10,
        minContracts: 1,
        maxContracts: null,
        maxConcurrentPositions: 10,
        maxPriceCents: 90,
        compoundProfits: true,
        feeAllowancePerContractCents: 0,
        ...partial,
    };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SIZING
// ═══════════════════════════════════════════════════════════════════════════════

describe('sizePosition', () => {
    test('$1,000 portfolio at 70c buys 142 contracts for $99.40', () => {
        const decision = sizePosition(snapshot(), opportunity(70), config(), 100_000);
        expect(decision).toEqual({
            kind: 'SIZED',
            contracts: 142,
            limitPriceCents: 70,
            notionalCents: 9940,
            reserveCents: 9940,
            baseCapitalCents: 100_000,
        });
    });

    test('compounding sizes from current total value', () => {
        const decision = sizePosition(snapshot({ totalValueCents: 150_000 }), opportunity(70), config(), 100_000);
        expect(decision).toEqual(expect.objectContaining({ kind: 'SIZED', contracts: 214, baseCapitalCents: 150_000 }));
    });

    test('without compounding the starting baseline is used', () => {
        const decision = sizePosition(
            snapshot({ totalValueCents: 150_000 }),
            opportunity(70),
            config({ compoundProfits: false }),
            100_000
        );
        expect(decision).toEqual(expect.objectContaining({ kind: 'SIZED', contracts: 142, baseCapitalCents: 100_000 }));
    });

    test('free cash limits the target', () => {
        const decision = sizePosition(snapshot({ cashCents: 5000 }), opportunity(70), config(), 100_000);
        expect(decision).toEqual(expect.objectContaining({ kind: 'SIZED', contracts: 71, notionalCents: 4970 }));
    });

    test('the fee allowance is reserved on top of the notional', () => {
        const decision = sizePosition(snapshot(), opportunity(70), config({ feeAllowancePerContractCents: 2 }), 100_000);
        expect(decision).toEqual(expect.objectContaining({
            kind: 'SIZED',
            contracts: 142,
            notionalCents: 9940,
            reserveCents: 10_224,
        }));
    });

    test('when cash binds, the count leaves room for the fee allowance', () => {
        const decision = sizePosition(
            snapshot({ cashCents: 5000 }),
            opportunity(70),
            config({ feeAllowancePerContractCents: 2 }),
            100_000
        );
        expect(decision).toEqual(expect.objectContaining({
            kind: 'SIZED',
            contracts: 69,
            notionalCents: 4830,
            reserveCents: 4968,
        }));
    });

    test('maxContracts caps the count', () => {
        const decision = sizePosition(snapshot(), opportunity(70), config({ maxContracts: 50 }), 100_000);
        expect(decision).toEqual(expect.objectContaining({ kind: 'SIZED', contracts: 50, notionalCents: 3500 }));
    });

    test('never exceeds base × maxPositionPercent', () => {
        for (const price of [1, 7, 33, 50, 64, 81, 90]) {
            const decision = sizePosition(snapshot(), opportunity(price), config(), 100_000);
            expect(decision.kind).toBe('SIZED');
            if (decision.kind === 'SIZED') {
                expect(decision.notionalCents).toBeLessThanOrEqual(10_000);
                expect(decision.contracts).toBeGreaterThan(0);
            }
        }
    });

    describe('rejections', () => {
        test('prices outside 1-99 or fractional are invalid', () => {
            for (const price of [0, 100, 70.5]) {
                const decision = sizePosition(snapshot(), opportunity(price), config({ maxPriceCents: 99 }), 100_000);
                expect(decision).toEqual(expect.objectContaining({ kind: 'REJECTED', reason: 'INVALID_PRICE' }));
            }
        });

        test('price above the cap', () => {
            const decision = sizePosition(snapshot(), opportunity(95), config(), 100_000);
            expect(decision).toEqual(expect.objectContaining({ kind: 'REJECTED', reason: 'PRICE_ABOVE_CAP' }));
        });

        test('open plus pending entries at the concurrency cap', () => {
            const decision = sizePosition(snapshot({ openPositions: 8, pendingEntries: 2 }), opportunity(70), config(), 100_000);
            expect(decision).toEqual(expect.objectContaining({ kind: 'REJECTED', reason: 'CAP_REACHED' }));
        });

        test('cash below the price of the minimum order', () => {
            const decision = sizePosition(snapshot({ cashCents: 60 }), opportunity(70), config(), 100_000);
            expect(decision).toEqual(expect.objectContaining({ kind: 'REJECTED', reason: 'INSUFFICIENT_FUNDS' }));
        });

        test('target too small for the minimum contract count', () => {
            const decision = sizePosition(snapshot(), opportunity(70), config({ minContracts: 200 }), 100_000);
            expect(decision).toEqual(expect.objectContaining({ kind: 'REJECTED', reason: 'BELOW_MIN_CONTRACTS' }));
        });
    });
});
