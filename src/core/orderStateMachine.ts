/**
 * Order State Machine
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * ONE transition table for every order the bot places.
 *
 *   SUBMITTING ──► PENDING ◄──► PARTIALLY_FILLED ──► FILLED
 *        │            │                │
 *        │            ├──► CANCELED    ├──► CANCELED / EXPIRED
 *        │            └──► EXPIRED     └──► (finalized as PARTIALLY_FILLED)
 *        └──► REJECTED
 *
 * An order is terminal once `terminalAt` is set. FILLED, CANCELED, EXPIRED and
 * REJECTED are always terminal; PARTIALLY_FILLED becomes terminal when a
 * canceled order is reconciled with some quantity filled.
 *
 * INVARIANTS:
 *   - filledQuantity never decreases and never exceeds requestedQuantity
 *   - FILLED implies filledQuantity === requestedQuantity
 *   - terminal orders never change again
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { IllegalOrderTransition } from './errors';
import { Order, OrderRequest, OrderStatus } from '../types';

export const ORDER_TRANSITIONS: Readonly<Record<OrderStatus, readonly OrderStatus[]>> = {
    SUBMITTING: ['PENDING', 'PARTIALLY_FILLED', 'FILLED', 'REJECTED'],
    PENDING: ['PENDING', 'PARTIALLY_FILLED', 'FILLED', 'CANCELED', 'EXPIRED'],
    PARTIALLY_FILLED: ['PARTIALLY_FILLED', 'PENDING', 'FILLED', 'CANCELED', 'EXPIRED'],
    FILLED: [],
    CANCELED: [],
    EXPIRED: [],
    REJECTED: [],
};

const ALWAYS_TERMINAL: ReadonlySet<OrderStatus> = new Set(['FILLED', 'CANCELED', 'EXPIRED', 'REJECTED']);

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
    return ORDER_TRANSITIONS[from].includes(to);
}

export function isTerminal(order: Order): boolean {
    return order.terminalAt !== null;
}

export function createOrder(request: OrderRequest, now: number = Date.now()): Order {
    return {
        clientOrderId: request.clientOrderId,
        exchangeOrderId: null,
        marketId: request.marketId,
        side: request.side,
        action: request.action,
        requestedPriceCents: request.priceCents,
        requestedQuantity: request.quantity,
        status: 'SUBMITTING',
        filledQuantity: 0,
        averageFillPriceCents: 0,
        feesCents: 0,
        createdAt: now,
        terminalAt: null,
        reason: null,
    };
}

/**
 * Move `order` to `next`. Throws IllegalOrderTransition for anything the table
 * does not allow, or for any change to a terminal order.
 */
export function transition(order: Order, next: OrderStatus, now: number = Date.now()): void {
    if (isTerminal(order) || !canTransition(order.status, next)) {
        throw new IllegalOrderTransition(order.clientOrderId, isTerminal(order) ? `${order.status}(terminal)` : order.status, next);
    }
    order.status = next;
    if (ALWAYS_TERMINAL.has(next)) {
        order.terminalAt = now;
    }
}

/**
 * Finalize an order whose remaining quantity was canceled. The outcome
 * follows from what actually filled: everything → FILLED, something →
 * PARTIALLY_FILLED (terminal), nothing → `emptyOutcome`.
 */
export function finalizeAfterCancel(
    order: Order,
    emptyOutcome: 'EXPIRED' | 'CANCELED',
    reason: string,
    now: number = Date.now()
): void {
    order.reason = reason;
    if (order.filledQuantity >= order.requestedQuantity) {
        if (order.status !== 'FILLED') {
            transition(order, 'FILLED', now);
        }
        return;
    }
    if (order.filledQuantity > 0) {
        if (order.status !== 'PARTIALLY_FILLED') {
            transition(order, 'PARTIALLY_FILLED', now);
        }
        order.terminalAt = now;
        return;
    }
    transition(order, emptyOutcome, now);
}

export function reject(order: Order, reason: string, now: number = Date.now()): void {
    order.reason = reason;
    transition(order, 'REJECTED', now);
}

/**
 * Apply a cumulative fill report. Quantity is monotonic and clamped to the
 * requested size. Returns the status the order should move to.
 */
export function applyCumulativeFill(
    order: Order,
    filledQuantity: number,
    averagePriceCents: number | null,
    feesCents: number
): OrderStatus {
    const clamped = Math.min(order.requestedQuantity, Math.max(order.filledQuantity, Math.floor(filledQuantity)));
    if (clamped > order.filledQuantity) {
        order.averageFillPriceCents = averagePriceCents ?? order.requestedPriceCents;
        order.filledQuantity = clamped;
    }
    order.feesCents = Math.max(order.feesCents, feesCents);

    if (order.filledQuantity >= order.requestedQuantity) {
        return 'FILLED';
    }
    return order.filledQuantity > 0 ? 'PARTIALLY_FILLED' : 'PENDING';
}

/**
 * Fold one incremental fill into the running weighted average
 */
export function mergeFill(order: Order, quantity: number, priceCents: number, feesCents: number = 0): void {
    const qty = Math.min(quantity, order.requestedQuantity - order.filledQuantity);
    if (qty <= 0) {
        return;
    }
    const total = order.filledQuantity + qty;
    order.averageFillPriceCents = (order.averageFillPriceCents * order.filledQuantity + priceCents * qty) / total;
    order.filledQuantity = total;
    order.feesCents += feesCents;
}

export function notionalCents(order: Order): number {
    return order.averageFillPriceCents * order.filledQuantity;
}
