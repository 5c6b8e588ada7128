import {
    closesWithin,
    defaultPredicates,
    eventPrefix,
    favoredSide,
    hasLiquidity,
    isOpen,
    probabilityInRange,
    toOpportunity,
} from '../src/services/marketFilters';
import { MarketScanner } from '../src/services/marketScanner';
import { TransientChannelError } from '../src/core/errors';
import { Opportunity } from '../src/types';
import { FakeExchange, fastGate, market } from './helpers/fakeExchange';

const HOUR = 3_600_000;

describe('Market filters', () => {
    test('the favored side is the higher priced one, yes on a tie', () => {
        expect(favoredSide(market({ yesPriceCents: 85, noPriceCents: 15 }))).toBe('yes');
        expect(favoredSide(market({ yesPriceCents: 40, noPriceCents: 60 }))).toBe('no');
        expect(favoredSide(market({ yesPriceCents: 50, noPriceCents: 50 }))).toBe('yes');
    });

    test('eventPrefix drops the last ticker segment', () => {
        expect(eventPrefix('KXBTC-25JAN-T100')).toBe('KXBTC-25JAN');
        expect(eventPrefix('NODASH')).toBe('NODASH');
    });

    test('isOpen', () => {
        expect(isOpen(market(), 0)).toBeNull();
        expect(isOpen(market({ status: 'closed' }), 0)).toBe('status closed');
    });

    test('hasLiquidity falls back to volume × mid when no liquidity is reported', () => {
        const check = hasLiquidity(50_000);
        expect(check(market({ liquidityCents: 0, volume: 1000 }), 0)).toBeNull();
        expect(check(market({ liquidityCents: 0, volume: 999 }), 0)).toBe('liquidity 49950c < 50000c');
        expect(check(market({ liquidityCents: 60_000, volume: 0 }), 0)).toBeNull();
    });

    test('closesWithin bounds the time to close', () => {
        const check = closesWithin(24);
        expect(check(market({ closeTime: 12 * HOUR }), 0)).toBeNull();
        expect(check(market({ closeTime: 30 * HOUR }), 0)).toBe('closes in 30.0h > 24h');
        expect(check(market({ closeTime: -HOUR }), 0)).toBe('already closed');
        expect(check(market({ closeTime: null }), 0)).toBeNull();
        expect(closesWithin(0)(market({ closeTime: 30 * HOUR }), 0)).toBeNull();
    });

    test('probabilityInRange prices the favored side at its ask', () => {
        const check = probabilityInRange(80, 90);
        expect(check(market({ yesPriceCents: 84, yesAskCents: 86 }), 0)).toBeNull();
        expect(check(market({ yesPriceCents: 92, yesAskCents: null }), 0)).toBe('yes entry 92c outside [80c, 90c]');
        expect(check(market({ yesPriceCents: 89, yesAskCents: 91 }), 0)).toBe('yes entry 91c outside [80c, 90c]');
    });

    test('toOpportunity is a frozen snapshot of the favored side', () => {
        const opportunity = toOpportunity(market({ marketId: 'EVT-A', yesAskCents: 86, closeTime: 6 * HOUR }), 0);
        expect(opportunity).toEqual({
            marketId: 'EVT-A',
            side: 'yes',
            priceCents: 86,
            liquidityCents: 10_000_000,
            volume: 1000,
            hoursToClose: 6,
            observedAt: 0,
        });
        expect(Object.isFrozen(opportunity)).toBe(true);
    });
});

describe('MarketScanner', () => {
    const predicates = defaultPredicates({
        liquidityThresholdCents: 0,
        minProbabilityCents: 80,
        maxProbabilityCents: 90,
        minMarketVolume: 0,
        maxHoursUntilClose: 0,
    });

    function scannerFor(exchange: FakeExchange, isHeld?: (marketId: string) => boolean): MarketScanner {
        return new MarketScanner(exchange, fastGate(), predicates, {
            pageSize: 2,
            maxTransientRetries: 2,
            retryBaseDelayMs: 1,
            isHeld,
            now: () => 0,
        });
    }

    async function collect(source: AsyncIterable<Opportunity>): Promise<string[]> {
        const ids: string[] = [];
        for await (const opportunity of source) {
            ids.push(opportunity.marketId);
        }
        return ids;
    }

    function exchangeWithMarkets(): FakeExchange {
        return new FakeExchange()
            .addMarket(market({ marketId: 'EVT1-A' }))
            .addMarket(market({ marketId: 'EVT1-B' }))
            .addMarket(market({ marketId: 'EVT2-X', status: 'closed' }))
            .addMarket(market({ marketId: 'EVT3-Y' }))
            .addMarket(market({ marketId: 'EVT4-Z' }));
    }

    test('pages through every market and yields one opportunity per event', async () => {
        const exchange = exchangeWithMarkets();

        const ids = await collect(scannerFor(exchange, marketId => marketId === 'EVT3-Y').scan(new AbortController().signal));

        expect(ids).toEqual(['EVT1-A', 'EVT4-Z']);
        expect(exchange.callCount('listMarkets')).toBe(3);
    });

    test('stops paging once aborted', async () => {
        const exchange = exchangeWithMarkets();
        const controller = new AbortController();
        const ids: string[] = [];

        for await (const opportunity of scannerFor(exchange).scan(controller.signal)) {
            ids.push(opportunity.marketId);
            controller.abort();
        }

        expect(ids).toEqual(['EVT1-A']);
        expect(exchange.callCount('listMarkets')).toBe(1);
    });

    test('retries a transient page failure', async () => {
        const exchange = exchangeWithMarkets();
        exchange.failNext('listMarkets', new TransientChannelError('timeout'));

        const ids = await collect(scannerFor(exchange).scan(new AbortController().signal));

        expect(ids).toEqual(['EVT1-A', 'EVT3-Y', 'EVT4-Z']);
        expect(exchange.callCount('listMarkets')).toBe(4);
    });

    test('scanSingle evaluates one market by id', async () => {
        const exchange = exchangeWithMarkets();
        const scanner = scannerFor(exchange);

        expect((await scanner.scanSingle('EVT1-A'))?.priceCents).toBe(85);
        expect(await scanner.scanSingle('EVT2-X')).toBeNull();
        expect(await scanner.scanSingle('MISSING')).toBeNull();
    });
});
