/**
 * Exit Engine
 *
 * One monitor task per open position. Each task, on its own cadence:
 *   1. fetches the market through the rate gate, bounded by a per-poll timeout
 *   2. records the mark on the ledger
 *   3. evaluates the exit rules
 *   4. on a trigger: OPEN → CLOSING, then a closing order for the full
 *      remaining quantity at the mark
 *
 * A slow or failing fetch only skips that position's tick. A partially filled
 * close returns the position to OPEN and is re-evaluated on the next tick.
 */

import logger from '../utils/logger';
import { sleep, withTimeout } from '../utils/sleep';
import { generateClientOrderId } from '../utils/id';
import { RateGate } from '../core/rateGate';
import { TransientChannelError, errorMessage, isFatalError } from '../core/errors';
import { evaluateExit, ExitPolicy, ExitReason, ExitTrigger } from '../core/exitRules';
import { PortfolioLedger } from '../capital/portfolioLedger';
import { OrderLifecycleManager } from './orderLifecycle';
import { TradeEventBus } from '../telemetry/tradeEvents';
import { ExchangeTransport } from '../types/exchange';
import { markFor, MarketSnapshot, Order } from '../types';

// ═══════════════════════════════════════════════════════════════════════════════
// INTERFACES
// ═══════════════════════════════════════════════════════════════════════════════

export interface ExitEngineOptions {
    monitorIntervalMs: number;
    marketFetchTimeoutMs: number;
    exitOrderTimeoutMs: number;
}

export interface ExitEngineDeps {
    transport: ExchangeTransport;
    gate: RateGate;
    ledger: PortfolioLedger;
    lifecycle: OrderLifecycleManager;
    events: TradeEventBus;
    policy: ExitPolicy;
    options: ExitEngineOptions;
    /** Called with LedgerInvariantViolation / AuthenticationError from a monitor task */
    onFatal?: (error: unknown) => void;
}

/**
 * Result of one evaluation tick
 */
export type ExitOutcome =
    | { kind: 'NO_POSITION'; marketId: string }
    | { kind: 'SKIPPED'; marketId: string; reason: string }
    | { kind: 'HELD'; marketId: string; trigger: ExitTrigger }
    | { kind: 'EXITED'; marketId: string; reason: ExitReason; order: Order; remainingQuantity: number };

// ═══════════════════════════════════════════════════════════════════════════════
// ENGINE
// ═══════════════════════════════════════════════════════════════════════════════

export class ExitEngine {
    private readonly deps: ExitEngineDeps;
    private readonly tasks = new Map<string, Promise<void>>();
    private controller = new AbortController();
    private unsubscribe: (() => void) | null = null;
    private running = false;

    constructor(deps: ExitEngineDeps) {
        this.deps = deps;
    }

    /**
     * Monitor every open position, and every position opened from now on
     */
    start(): void {
        if (this.running) {
            return;
        }
        this.running = true;
        this.controller = new AbortController();
        this.unsubscribe = this.deps.events.on('position:opened', position => {
            this.track(position.marketId);
        });
        for (const position of this.deps.ledger.openPositions()) {
            this.track(position.marketId);
        }
        logger.info(`[EXIT] Exit engine started (${this.tasks.size} position(s) monitored)`);
    }

    /**
     * Start a monitor task for `marketId` unless one is already running
     */
    track(marketId: string): boolean {
        if (!this.running || this.tasks.has(marketId)) {
            return false;
        }
        const task = this.monitor(marketId, this.controller.signal).finally(() => {
            this.tasks.delete(marketId);
        });
        this.tasks.set(marketId, task);
        return true;
    }

    /**
     * Abort every monitor and wait for them, including any closing order
     * they have in flight.
     */
    async stop(): Promise<void> {
        if (!this.running) {
            return;
        }
        this.running = false;
        this.controller.abort();
        this.unsubscribe?.();
        this.unsubscribe = null;

        const pending = Array.from(this.tasks.values());
        logger.info(`[EXIT] Stopping ${pending.length} monitor task(s)...`);
        await Promise.allSettled(pending);
        logger.info('[EXIT] ✅ Exit engine stopped');
    }

    activeMonitors(): string[] {
        return Array.from(this.tasks.keys());
    }

    /**
     * One monitor tick for one market
     */
    async evaluateOnce(marketId: string): Promise<ExitOutcome> {
        const position = this.deps.ledger.getPosition(marketId);
        if (!position) {
            return { kind: 'NO_POSITION', marketId };
        }
        if (position.status !== 'OPEN') {
            return { kind: 'SKIPPED', marketId, reason: 'exit already in progress' };
        }

        let snapshot: MarketSnapshot;
        try {
            snapshot = await this.fetchMarket(marketId);
        } catch (error) {
            if (isFatalError(error)) {
                throw error;
            }
            logger.warn(`[EXIT] ${marketId}: market fetch failed, skipping tick (${errorMessage(error)})`);
            return { kind: 'SKIPPED', marketId, reason: errorMessage(error) };
        }

        const markCents = markFor(snapshot, position.side);
        await this.deps.ledger.recordMark(marketId, markCents);

        const trigger = evaluateExit(position, snapshot, this.deps.policy);
        if (!trigger.triggered || trigger.reason === null) {
            logger.debug(`[EXIT] ${marketId}: hold (${trigger.details})`);
            return { kind: 'HELD', marketId, trigger };
        }

        return this.executeExit(marketId, trigger.reason, markCents, trigger.details);
    }

    /**
     * Close a position now, at the current mark, regardless of the exit rules
     */
    async closePosition(marketId: string): Promise<ExitOutcome> {
        const position = this.deps.ledger.getPosition(marketId);
        if (!position) {
            return { kind: 'NO_POSITION', marketId };
        }
        const snapshot = await this.fetchMarket(marketId);
        const markCents = markFor(snapshot, position.side);
        await this.deps.ledger.recordMark(marketId, markCents);
        return this.executeExit(marketId, 'MANUAL', markCents, 'manual exit requested');
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PRIVATE
    // ═══════════════════════════════════════════════════════════════════════════

    private async monitor(marketId: string, signal: AbortSignal): Promise<void> {
        logger.info(`[EXIT] Monitoring ${marketId}`);

        while (!signal.aborted) {
            try {
                const outcome = await this.evaluateOnce(marketId);
                if (outcome.kind === 'NO_POSITION') {
                    break;
                }
            } catch (error) {
                if (isFatalError(error)) {
                    logger.error(`[EXIT] ${marketId}: fatal error, monitor stopping: ${errorMessage(error)}`);
                    this.deps.onFatal?.(error);
                    break;
                }
                logger.error(`[EXIT] ${marketId}: evaluation failed: ${errorMessage(error)}`);
            }
            await sleep(this.deps.options.monitorIntervalMs, signal);
        }

        logger.info(`[EXIT] Monitor for ${marketId} finished`);
    }

    private async executeExit(marketId: string, reason: ExitReason, markCents: number, details: string): Promise<ExitOutcome> {
        const { ledger, lifecycle, options } = this.deps;

        if (ledger.isHalted()) {
            return { kind: 'SKIPPED', marketId, reason: 'ledger halted' };
        }
        const position = await ledger.beginClose(marketId);
        if (!position) {
            return { kind: 'SKIPPED', marketId, reason: 'position not open' };
        }

        const priceCents = Math.min(99, Math.max(1, Math.round(markCents)));
        logger.info(
            `[EXIT] 🚪 ${reason} ${marketId}: ${details} → selling ${position.quantity} ` +
            `${position.side.toUpperCase()} @ ${priceCents}c`
        );

        let order: Order;
        try {
            order = await lifecycle.placeAndTrack(
                {
                    clientOrderId: generateClientOrderId('sell'),
                    marketId,
                    side: position.side,
                    action: 'sell',
                    priceCents,
                    quantity: position.quantity,
                },
                options.exitOrderTimeoutMs,
                this.controller.signal
            );
        } catch (error) {
            await ledger.releaseClose(marketId);
            throw error;
        }

        const remainingQuantity = ledger.getPosition(marketId)?.quantity ?? 0;
        if (remainingQuantity > 0) {
            logger.info(`[EXIT] ${marketId}: ${order.status}, ${remainingQuantity} contract(s) still held`);
        }
        return { kind: 'EXITED', marketId, reason, order, remainingQuantity };
    }

    private fetchMarket(marketId: string): Promise<MarketSnapshot> {
        const timeoutMs = this.deps.options.marketFetchTimeoutMs;
        return withTimeout(
            this.deps.gate.run(`market ${marketId}`, () => this.deps.transport.getMarket(marketId)),
            timeoutMs,
            () => new TransientChannelError(`market fetch for ${marketId} exceeded ${timeoutMs}ms`)
        );
    }
}
