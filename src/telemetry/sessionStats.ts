/**
 * Session Statistics
 *
 * Keeps every filled entry and exit of the session and derives:
 *   - FIFO round trips per market: (exit − entry) × matched contracts − exit fees
 *   - win rate, average profit per round trip
 *   - growth rate and compound multiplier against the starting value
 */

import logger from '../utils/logger';
import { TradeEventBus } from './tradeEvents';
import { centsToUsd, Order, Side } from '../types';

export interface TradeRecord {
    marketId: string;
    side: Side;
    action: 'entry' | 'exit';
    contracts: number;
    priceCents: number;
    feesCents: number;
    timestamp: number;
}

export interface RoundTrip {
    marketId: string;
    side: Side;
    contracts: number;
    entryCostCents: number;
    exitRevenueCents: number;
    pnlCents: number;
    closedAt: number;
}

export interface SessionSummary {
    entries: number;
    exits: number;
    roundTrips: number;
    winningTrips: number;
    winRate: number;
    totalPnlCents: number;
    averagePnlCents: number;
    initialValueCents: number;
    currentValueCents: number;
    growthRate: number;
    compoundMultiplier: number;
}

export class SessionStats {
    private readonly trades: TradeRecord[] = [];
    private unsubscribe: (() => void) | null = null;

    constructor(private readonly initialValueCents: number) {}

    attach(events: TradeEventBus): void {
        this.detach();
        this.unsubscribe = events.on('order:terminal', order => this.recordOrder(order));
    }

    detach(): void {
        this.unsubscribe?.();
        this.unsubscribe = null;
    }

    recordOrder(order: Order): void {
        if (order.filledQuantity <= 0) {
            return;
        }
        this.trades.push({
            marketId: order.marketId,
            side: order.side,
            action: order.action === 'buy' ? 'entry' : 'exit',
            contracts: order.filledQuantity,
            priceCents: order.averageFillPriceCents,
            feesCents: order.feesCents,
            timestamp: order.terminalAt ?? Date.now(),
        });
    }

    getTrades(): TradeRecord[] {
        return this.trades.map(trade => ({ ...trade }));
    }

    roundTrips(): RoundTrip[] {
        const queues = new Map<string, Array<{ priceCents: number; remaining: number }>>();
        const trips: RoundTrip[] = [];
        const ordered = [...this.trades].sort((a, b) => a.timestamp - b.timestamp);

        for (const trade of ordered) {
            const queue = queues.get(trade.marketId) ?? [];
            queues.set(trade.marketId, queue);

            if (trade.action === 'entry') {
                queue.push({ priceCents: trade.priceCents, remaining: trade.contracts });
                continue;
            }

            let toMatch = trade.contracts;
            let matched = 0;
            let matchedCost = 0;
            while (toMatch > 0 && queue.length > 0) {
                const head = queue[0];
                const take = Math.min(toMatch, head.remaining);
                matchedCost += head.priceCents * take;
                matched += take;
                head.remaining -= take;
                toMatch -= take;
                if (head.remaining === 0) {
                    queue.shift();
                }
            }

            if (matched > 0) {
                const revenue = trade.priceCents * matched;
                trips.push({
                    marketId: trade.marketId,
                    side: trade.side,
                    contracts: matched,
                    entryCostCents: matchedCost,
                    exitRevenueCents: revenue,
                    pnlCents: revenue - matchedCost - trade.feesCents,
                    closedAt: trade.timestamp,
                });
            }
        }
        return trips;
    }

    summary(currentValueCents: number): SessionSummary {
        const trips = this.roundTrips();
        const winning = trips.filter(trip => trip.pnlCents > 0).length;
        const totalPnl = trips.reduce((sum, trip) => sum + trip.pnlCents, 0);
        const initial = this.initialValueCents;

        return {
            entries: this.trades.filter(trade => trade.action === 'entry').length,
            exits: this.trades.filter(trade => trade.action === 'exit').length,
            roundTrips: trips.length,
            winningTrips: winning,
            winRate: trips.length === 0 ? 0 : winning / trips.length,
            totalPnlCents: totalPnl,
            averagePnlCents: trips.length === 0 ? 0 : totalPnl / trips.length,
            initialValueCents: initial,
            currentValueCents,
            growthRate: initial === 0 ? 0 : (currentValueCents - initial) / initial,
            compoundMultiplier: initial === 0 ? 1 : currentValueCents / initial,
        };
    }

    /**
     * Linear projection: current value plus `trades` more average round trips
     */
    projectValue(currentValueCents: number, trades: number): number {
        const { roundTrips, averagePnlCents } = this.summary(currentValueCents);
        if (roundTrips === 0) {
            return currentValueCents;
        }
        return Math.max(0, currentValueCents + averagePnlCents * trades);
    }

    logSummary(currentValueCents: number): void {
        const s = this.summary(currentValueCents);
        logger.info('════════════════════════════════════════════════════════════════');
        logger.info('📊 SESSION SUMMARY');
        logger.info('════════════════════════════════════════════════════════════════');
        logger.info(`   Entries: ${s.entries}  Exits: ${s.exits}  Round trips: ${s.roundTrips}`);
        logger.info(`   Win rate: ${(s.winRate * 100).toFixed(1)}% (${s.winningTrips}/${s.roundTrips})`);
        logger.info(`   Round-trip P&L: ${centsToUsd(s.totalPnlCents)} (avg ${centsToUsd(s.averagePnlCents)})`);
        logger.info(
            `   Value: ${centsToUsd(s.initialValueCents)} → ${centsToUsd(s.currentValueCents)} ` +
            `(${(s.growthRate * 100).toFixed(2)}%, ×${s.compoundMultiplier.toFixed(4)})`
        );
    }
}
