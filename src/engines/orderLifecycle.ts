/**
 * Order Lifecycle Manager
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Places one order and follows it to a terminal state.
 *
 *   submit ──► poll every pollIntervalMs ──► FILLED
 *                    │
 *                    ├── timeout  ──► cancel ──► re-query ──► FILLED / PARTIALLY_FILLED / EXPIRED
 *                    └── shutdown ──► cancel ──► re-query ──► FILLED / PARTIALLY_FILLED / CANCELED
 *
 *   A cancel counts once the re-query reports the order canceled or executed.
 *   Until then it is re-sent every poll interval, up to maxCancelAttempts rounds.
 *
 * RULES:
 *   1. Every exchange call goes through the shared rate gate
 *   2. Transient failures are retried with backoff; rejections are not
 *   3. One clientOrderId = one live order: concurrent calls share a promise
 *   4. Each terminal order is handed to the ledger exactly once
 *   5. Filled quantity is always the last exchange-confirmed figure
 *
 * DRY RUN: no submit, no cancel. The order fills instantly at the requested
 * price and is reconciled like any other.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import logger from '../utils/logger';
import { sleep } from '../utils/sleep';
import { withRetry } from '../utils/retry';
import { RateGate } from '../core/rateGate';
import {
    ExchangeRejection,
    RateGateTimeout,
    TradingBotError,
    errorMessage,
    isFatalError,
} from '../core/errors';
import {
    applyCumulativeFill,
    createOrder,
    finalizeAfterCancel,
    isTerminal,
    mergeFill,
    reject,
    transition,
} from '../core/orderStateMachine';
import { PortfolioLedger } from '../capital/portfolioLedger';
import { TradeEventBus } from '../telemetry/tradeEvents';
import { ExchangeOrderState, ExchangeTransport } from '../types/exchange';
import { Order, OrderRequest } from '../types';

// ═══════════════════════════════════════════════════════════════════════════════
// INTERFACES
// ═══════════════════════════════════════════════════════════════════════════════

export interface OrderLifecycleOptions {
    pollIntervalMs: number;
    dryRun: boolean;
    maxTransientRetries: number;
    retryBaseDelayMs: number;
    /** Cancel rounds, one poll interval apart, before settling an unconfirmed cancel (default 3) */
    maxCancelAttempts?: number;
}

export interface OrderLifecycleDeps {
    transport: ExchangeTransport;
    gate: RateGate;
    ledger: PortfolioLedger;
    events?: TradeEventBus;
    options: OrderLifecycleOptions;
}

export interface OrderLifecycleStats {
    placed: number;
    filled: number;
    partiallyFilled: number;
    expired: number;
    canceled: number;
    rejected: number;
    duplicateCalls: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// MANAGER
// ═══════════════════════════════════════════════════════════════════════════════

export class OrderLifecycleManager {
    private readonly transport: ExchangeTransport;
    private readonly gate: RateGate;
    private readonly ledger: PortfolioLedger;
    private readonly events: TradeEventBus | null;
    private readonly options: OrderLifecycleOptions;

    private readonly inflight = new Map<string, Promise<Order>>();
    private readonly stats: OrderLifecycleStats = {
        placed: 0,
        filled: 0,
        partiallyFilled: 0,
        expired: 0,
        canceled: 0,
        rejected: 0,
        duplicateCalls: 0,
    };

    constructor(deps: OrderLifecycleDeps) {
        this.transport = deps.transport;
        this.gate = deps.gate;
        this.ledger = deps.ledger;
        this.events = deps.events ?? null;
        this.options = deps.options;
    }

    /**
     * Submit `request` and track it until terminal. Resolves with the
     * terminal order after the ledger has been updated.
     */
    placeAndTrack(request: OrderRequest, timeoutMs: number, signal?: AbortSignal): Promise<Order> {
        const existing = this.inflight.get(request.clientOrderId);
        if (existing) {
            this.stats.duplicateCalls++;
            logger.warn(`[ORDER] ${request.clientOrderId} already in flight - joining existing attempt`);
            return existing;
        }

        const tracked = this.track(request, timeoutMs, signal).finally(() => {
            this.inflight.delete(request.clientOrderId);
        });
        this.inflight.set(request.clientOrderId, tracked);
        return tracked;
    }

    /**
     * Wait for every outstanding order to reach a terminal state
     */
    async drain(): Promise<void> {
        while (this.inflight.size > 0) {
            logger.info(`[ORDER] Waiting for ${this.inflight.size} outstanding order(s)...`);
            await Promise.allSettled(Array.from(this.inflight.values()));
        }
    }

    outstanding(): number {
        return this.inflight.size;
    }

    getStats(): OrderLifecycleStats {
        return { ...this.stats };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PRIVATE: LIFECYCLE
    // ═══════════════════════════════════════════════════════════════════════════

    private async track(request: OrderRequest, timeoutMs: number, signal?: AbortSignal): Promise<Order> {
        const order = createOrder(request);
        this.stats.placed++;

        if (this.options.dryRun) {
            return this.simulate(order);
        }

        if (signal?.aborted) {
            reject(order, 'not submitted: shutdown in progress');
            await this.reconcile(order);
            return order;
        }

        let ack: ExchangeOrderState;
        try {
            ack = await this.call(`submit ${order.marketId}`, () => this.transport.submitOrder(request));
        } catch (error) {
            reject(order, this.describeSubmitFailure(error));
            await this.reconcile(order);
            if (isFatalError(error) || !(error instanceof TradingBotError)) {
                throw error;
            }
            return order;
        }

        order.exchangeOrderId = ack.orderId;
        this.observe(order, ack);
        logger.info(
            `[ORDER] ${order.action.toUpperCase()} ${order.requestedQuantity} ${order.side.toUpperCase()} ` +
            `${order.marketId} @ ${order.requestedPriceCents}c → ${order.status} (id=${ack.orderId})`
        );

        const deadline = order.createdAt + timeoutMs;
        while (!isTerminal(order)) {
            if (signal?.aborted) {
                await this.cancelAndFinalize(order, 'CANCELED', 'canceled on shutdown');
                break;
            }
            const remaining = deadline - Date.now();
            if (remaining <= 0) {
                await this.cancelAndFinalize(order, 'EXPIRED', `not filled within ${timeoutMs}ms`);
                break;
            }
            await sleep(Math.min(this.options.pollIntervalMs, remaining), signal);
            if (signal?.aborted) {
                continue;
            }
            await this.poll(order);
        }

        await this.reconcile(order);
        return order;
    }

    private async simulate(order: Order): Promise<Order> {
        order.exchangeOrderId = `dry-run-${order.clientOrderId}`;
        mergeFill(order, order.requestedQuantity, order.requestedPriceCents);
        transition(order, 'FILLED');
        logger.info(
            `[ORDER] [DRY-RUN] ${order.action.toUpperCase()} ${order.filledQuantity} ${order.side.toUpperCase()} ` +
            `${order.marketId} @ ${order.requestedPriceCents}c`
        );
        await this.reconcile(order);
        return order;
    }

    private async poll(order: Order): Promise<void> {
        const orderId = order.exchangeOrderId;
        if (orderId === null) {
            return;
        }
        try {
            const state = await this.call(`poll ${order.marketId}`, () => this.transport.getOrder(orderId));
            this.observe(order, state);
        } catch (error) {
            // A missed poll only delays the next observation; the deadline still applies.
            logger.warn(`[ORDER] Poll of ${orderId} failed: ${errorMessage(error)}`);
        }
    }

    /**
     * Cancel the remainder until the exchange confirms the order is done,
     * then settle on what actually filled.
     */
    private async cancelAndFinalize(order: Order, emptyOutcome: 'EXPIRED' | 'CANCELED', reason: string): Promise<void> {
        const orderId = order.exchangeOrderId;
        if (orderId !== null) {
            const attempts = Math.max(1, this.options.maxCancelAttempts ?? 3);
            let confirmed = false;

            for (let attempt = 1; attempt <= attempts && !confirmed; attempt++) {
                if (attempt > 1) {
                    await sleep(this.options.pollIntervalMs);
                }
                try {
                    await this.call(`cancel ${order.marketId}`, () => this.transport.cancelOrder(orderId));
                } catch (error) {
                    logger.warn(
                        `[ORDER] Cancel of ${orderId} failed (${errorMessage(error)}), ` +
                        `re-querying (attempt ${attempt}/${attempts})`
                    );
                }

                try {
                    const state = await this.call(`requery ${order.marketId}`, () => this.transport.getOrder(orderId));
                    applyCumulativeFill(order, state.filledQuantity, state.averageFillPriceCents, state.feesCents);
                    confirmed = state.status === 'canceled' || state.status === 'executed';
                } catch (error) {
                    logger.warn(`[ORDER] Post-cancel query of ${orderId} failed: ${errorMessage(error)}`);
                }
            }

            if (!confirmed) {
                logger.error(
                    `🚨 [ORDER] Cancel of ${orderId} unconfirmed after ${attempts} attempt(s); ` +
                    `settling on last confirmed fill ${order.filledQuantity}/${order.requestedQuantity}. ` +
                    `The order may still be resting on the exchange`
                );
            }
        }

        finalizeAfterCancel(order, emptyOutcome, reason);
        logger.info(
            `[ORDER] ${order.marketId} ${order.status} after cancel: ` +
            `filled ${order.filledQuantity}/${order.requestedQuantity} (${reason})`
        );
    }

    /**
     * Fold an exchange report into the local order
     */
    private observe(order: Order, state: ExchangeOrderState): void {
        const next = applyCumulativeFill(order, state.filledQuantity, state.averageFillPriceCents, state.feesCents);

        transition(order, next);

        if (next !== 'FILLED' && (state.status === 'canceled' || state.status === 'executed')) {
            finalizeAfterCancel(order, 'CANCELED', `${state.status} by exchange`);
        }
    }

    /**
     * Exactly one ledger update per terminal order
     */
    private async reconcile(order: Order): Promise<void> {
        if (order.action === 'buy') {
            await this.ledger.applyFill(order);
        } else {
            await this.ledger.applyClose(order);
        }

        switch (order.status) {
            case 'FILLED': this.stats.filled++; break;
            case 'PARTIALLY_FILLED': this.stats.partiallyFilled++; break;
            case 'EXPIRED': this.stats.expired++; break;
            case 'CANCELED': this.stats.canceled++; break;
            case 'REJECTED': this.stats.rejected++; break;
            default: break;
        }

        this.events?.emit('order:terminal', { ...order });
    }

    private call<T>(label: string, operation: () => Promise<T>): Promise<T> {
        return withRetry(label, () => this.gate.run(label, operation), {
            maxRetries: this.options.maxTransientRetries,
            baseDelayMs: this.options.retryBaseDelayMs,
        });
    }

    private describeSubmitFailure(error: unknown): string {
        if (error instanceof ExchangeRejection) {
            logger.warn(`[ORDER] Exchange rejected order: [${error.exchangeCode}] ${error.message}`);
            return `rejected by exchange: ${error.exchangeCode}`;
        }
        if (error instanceof RateGateTimeout) {
            return 'not attempted: rate gate timeout';
        }
        logger.error(`[ORDER] Submission failed: ${errorMessage(error)}`);
        return `submission failed: ${errorMessage(error)}`;
    }
}
