/**
 * Portfolio Ledger - Single Source of Truth for Capital State
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * ALL CASH, RESERVATION AND POSITION STATE FLOWS THROUGH ONE INSTANCE
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * INVARIANTS (HARD RULES):
 *   1. cash + reserved + Σ costBasis === startingCapital + realizedPnl − entryFees
 *      (startingCapital = starting cash + cost basis of positions held at start)
 *   2. cash >= 0
 *   3. At most one of {OPEN/CLOSING position, pending entry reservation} per market
 *   4. position.quantity >= 0 and costBasis === averageEntryPrice × quantity
 *   5. Every terminal order is applied exactly once
 *
 * VIOLATIONS:
 *   - log [LEDGER-ERROR] with the full breakdown
 *   - halt: no further reservations or closes are accepted
 *   - throw LedgerInvariantViolation to the caller
 *
 * CONCURRENCY:
 *   Every mutation and every snapshot used for sizing runs through one mutex.
 *   The mutex is never held across an exchange call.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import logger from '../utils/logger';
import { Mutex } from '../utils/mutex';
import { LedgerInvariantViolation } from '../core/errors';
import { isTerminal } from '../core/orderStateMachine';
import { TradeEventBus } from '../telemetry/tradeEvents';
import { ExchangePosition } from '../types/exchange';
import { centsToUsd, Order, PortfolioSnapshot, Position, Side } from '../types';

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export const LEDGER_CONFIG = {
    /**
     * Tolerance for invariant checks (accounts for floating point)
     */
    invariantToleranceCents: 0.01,

    /**
     * Log prefix for ledger operations
     */
    logPrefix: '[LEDGER]',

    /**
     * Enable verbose logging
     */
    verboseLogging: false,
};

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Cash set aside for one entry order while it is in flight
 */
export interface EntryReservation {
    clientOrderId: string;
    marketId: string;
    side: Side;
    amountCents: number;
    createdAt: number;
}

export type ReservationRejectionReason = 'MARKET_OCCUPIED' | 'INSUFFICIENT_FUNDS' | 'HALTED' | 'INVALID_AMOUNT';

export type ReservationResult =
    | { ok: true; reservation: EntryReservation }
    | { ok: false; reason: ReservationRejectionReason; detail: string };

export interface InvariantCheckResult {
    valid: boolean;
    errors: string[];
    computed: {
        cashCents: number;
        reservedCents: number;
        costBasisCents: number;
        expectedCapitalCents: number;
        actualCapitalCents: number;
    };
}

export interface PortfolioLedgerOptions {
    startingCashCents: number;
    /** Positions already held on the exchange when the ledger is created */
    openingPositions?: readonly ExchangePosition[];
    events?: TradeEventBus;
    now?: () => number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// LEDGER
// ═══════════════════════════════════════════════════════════════════════════════

export class PortfolioLedger {
    private readonly mutex = new Mutex();
    private readonly events: TradeEventBus | null;
    private readonly now: () => number;

    private readonly startingCashCents: number;
    private readonly startingCapitalCents: number;
    private cashCents: number;
    private realizedPnlCents = 0;
    private entryFeesCents = 0;
    private exitFeesCents = 0;

    private readonly positions = new Map<string, Position>();
    private readonly reservations = new Map<string, EntryReservation>();
    private readonly closed: Position[] = [];
    private readonly appliedOrders = new Set<string>();

    private haltReason: string | null = null;

    constructor(options: PortfolioLedgerOptions) {
        if (!Number.isFinite(options.startingCashCents) || options.startingCashCents < 0) {
            throw new Error(`${LEDGER_CONFIG.logPrefix} Invalid starting cash: ${options.startingCashCents}`);
        }
        this.startingCashCents = options.startingCashCents;
        this.cashCents = options.startingCashCents;
        this.events = options.events ?? null;
        this.now = options.now ?? Date.now;

        let openingCostCents = 0;
        for (const held of options.openingPositions ?? []) {
            openingCostCents += this.restorePosition(held);
        }
        this.startingCapitalCents = this.startingCashCents + openingCostCents;

        logger.info(
            `${LEDGER_CONFIG.logPrefix} initialized cash=${centsToUsd(this.cashCents)} ` +
            `positions=${this.positions.size} capital=${centsToUsd(this.startingCapitalCents)}`
        );
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // MUTATIONS
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Authorize an entry: moves `amountCents` from cash to reserved and marks
     * the market occupied until the entry order is reconciled by applyFill().
     */
    reserveEntry(marketId: string, side: Side, amountCents: number, clientOrderId: string): Promise<ReservationResult> {
        return this.mutex.runExclusive((): ReservationResult => {
            if (this.haltReason !== null) {
                return { ok: false, reason: 'HALTED', detail: this.haltReason };
            }
            if (this.hasExposure(marketId)) {
                return { ok: false, reason: 'MARKET_OCCUPIED', detail: `${marketId} already has a position or pending entry` };
            }
            if (!(amountCents > 0) || this.reservations.has(clientOrderId)) {
                return { ok: false, reason: 'INVALID_AMOUNT', detail: `amount=${amountCents} clientOrderId=${clientOrderId}` };
            }
            if (amountCents > this.cashCents + LEDGER_CONFIG.invariantToleranceCents) {
                return {
                    ok: false,
                    reason: 'INSUFFICIENT_FUNDS',
                    detail: `need ${centsToUsd(amountCents)}, have ${centsToUsd(this.cashCents)}`,
                };
            }

            const reservation: EntryReservation = {
                clientOrderId,
                marketId,
                side,
                amountCents,
                createdAt: this.now(),
            };
            this.cashCents -= amountCents;
            this.reservations.set(clientOrderId, reservation);

            if (LEDGER_CONFIG.verboseLogging) {
                logger.debug(`${LEDGER_CONFIG.logPrefix} RESERVE ${marketId} ${centsToUsd(amountCents)}`);
            }
            this.assertInvariants('reserveEntry');
            return { ok: true, reservation: { ...reservation } };
        });
    }

    /**
     * Reconcile a terminal BUY order. Releases its reservation and, for any
     * filled quantity, debits price × qty + fees and creates or grows the
     * position. Applying the same order twice is a no-op.
     *
     * An authorized fill is always booked first: the exchange has already
     * executed it. Fees beyond the reservation are drawn from free cash, and
     * the ledger halts only when even that cannot cover them.
     */
    applyFill(order: Order): Promise<Position | null> {
        return this.mutex.runExclusive((): Position | null => {
            if (this.appliedOrders.has(order.clientOrderId)) {
                logger.debug(`${LEDGER_CONFIG.logPrefix} fill ${order.clientOrderId} already applied`);
                return this.copyOf(this.positions.get(order.marketId));
            }
            if (order.action !== 'buy' || !isTerminal(order)) {
                throw new Error(
                    `${LEDGER_CONFIG.logPrefix} applyFill expects a terminal buy order, got ${order.action}/${order.status}`
                );
            }

            const reservation = this.reservations.get(order.clientOrderId);
            if (!reservation) {
                if (order.filledQuantity === 0) {
                    this.appliedOrders.add(order.clientOrderId);
                    return null;
                }
                this.halt('applyFill', [`fill for ${order.clientOrderId} (${order.marketId}) has no authorizing reservation`]);
            } else {
                this.reservations.delete(order.clientOrderId);
                this.cashCents += reservation.amountCents;
            }
            this.appliedOrders.add(order.clientOrderId);

            if (order.filledQuantity === 0) {
                this.assertInvariants('applyFill');
                return null;
            }

            const costCents = order.averageFillPriceCents * order.filledQuantity;
            const debitCents = costCents + order.feesCents;
            const availableCents = this.cashCents;

            this.cashCents -= debitCents;
            this.entryFeesCents += order.feesCents;

            const existing = this.positions.get(order.marketId);
            let position: Position;
            if (existing) {
                if (existing.side !== order.side) {
                    this.halt('applyFill', [`${order.marketId} holds ${existing.side}, fill is ${order.side}`]);
                }
                existing.costBasisCents += costCents;
                existing.quantity += order.filledQuantity;
                existing.averageEntryPriceCents = existing.costBasisCents / existing.quantity;
                existing.entryFeesCents += order.feesCents;
                existing.entryOrderIds.push(order.clientOrderId);
                position = existing;
            } else {
                position = {
                    marketId: order.marketId,
                    side: order.side,
                    quantity: order.filledQuantity,
                    averageEntryPriceCents: order.averageFillPriceCents,
                    costBasisCents: costCents,
                    entryFeesCents: order.feesCents,
                    markCents: order.averageFillPriceCents,
                    openedAt: this.now(),
                    closedAt: null,
                    realizedPnlCents: 0,
                    status: 'OPEN',
                    entryOrderIds: [order.clientOrderId],
                    exitOrderIds: [],
                };
                this.positions.set(order.marketId, position);
            }

            logger.info(
                `${LEDGER_CONFIG.logPrefix} OPEN ${order.marketId} ${order.side.toUpperCase()} ` +
                `qty=${order.filledQuantity} @ ${order.averageFillPriceCents.toFixed(2)}c ` +
                `cost=${centsToUsd(costCents)} fees=${centsToUsd(order.feesCents)} cash=${centsToUsd(this.cashCents)}`
            );

            if (this.cashCents < -LEDGER_CONFIG.invariantToleranceCents) {
                this.halt('applyFill', [
                    `fill ${order.clientOrderId} costs ${centsToUsd(debitCents)} but only ${centsToUsd(availableCents)} available`,
                ]);
            }
            this.assertInvariants('applyFill');
            const copy = this.toCopy(position);
            this.events?.emit('position:opened', copy, order);
            return copy;
        });
    }

    /**
     * OPEN → CLOSING. Returns null when the market has no OPEN position
     * (already closing, closed, unknown) or the ledger is halted.
     */
    beginClose(marketId: string): Promise<Position | null> {
        return this.mutex.runExclusive((): Position | null => {
            const position = this.positions.get(marketId);
            if (this.haltReason !== null || !position || position.status !== 'OPEN') {
                return null;
            }
            position.status = 'CLOSING';
            return this.toCopy(position);
        });
    }

    /**
     * CLOSING → OPEN without a fill, for a close that never reached the exchange
     */
    releaseClose(marketId: string): Promise<void> {
        return this.mutex.runExclusive(() => {
            const position = this.positions.get(marketId);
            if (position && position.status === 'CLOSING') {
                position.status = 'OPEN';
            }
        });
    }

    /**
     * Reconcile a terminal SELL order against the position in its market.
     * realized = (exitAvg − entryAvg) × qty − exitFees. The position is
     * CLOSED once its quantity reaches zero, otherwise it returns to OPEN.
     */
    applyClose(order: Order): Promise<Position | null> {
        return this.mutex.runExclusive((): Position | null => {
            if (this.appliedOrders.has(order.clientOrderId)) {
                logger.debug(`${LEDGER_CONFIG.logPrefix} close ${order.clientOrderId} already applied`);
                return this.copyOf(this.positions.get(order.marketId));
            }
            if (order.action !== 'sell' || !isTerminal(order)) {
                throw new Error(
                    `${LEDGER_CONFIG.logPrefix} applyClose expects a terminal sell order, got ${order.action}/${order.status}`
                );
            }

            const position = this.positions.get(order.marketId);
            if (!position) {
                if (order.filledQuantity === 0) {
                    this.appliedOrders.add(order.clientOrderId);
                    return null;
                }
                this.halt('applyClose', [`close fill for ${order.marketId} without an open position`]);
            }
            this.appliedOrders.add(order.clientOrderId);

            const qty = order.filledQuantity;
            if (qty > position.quantity) {
                this.halt('applyClose', [`close fill qty=${qty} exceeds held qty=${position.quantity} in ${order.marketId}`]);
            }
            if (position.side !== order.side) {
                this.halt('applyClose', [`${order.marketId} holds ${position.side}, close is ${order.side}`]);
            }

            position.exitOrderIds.push(order.clientOrderId);

            if (qty === 0) {
                position.status = 'OPEN';
                this.assertInvariants('applyClose');
                return this.toCopy(position);
            }

            const proceedsCents = order.averageFillPriceCents * qty;
            const entryPortionCents = position.averageEntryPriceCents * qty;
            const realizedCents = proceedsCents - entryPortionCents - order.feesCents;

            this.cashCents += proceedsCents - order.feesCents;
            this.realizedPnlCents += realizedCents;
            this.exitFeesCents += order.feesCents;

            position.quantity -= qty;
            position.costBasisCents = position.averageEntryPriceCents * position.quantity;
            position.realizedPnlCents += realizedCents;

            const fullyClosed = position.quantity === 0;
            if (fullyClosed) {
                position.status = 'CLOSED';
                position.closedAt = this.now();
                this.positions.delete(order.marketId);
                this.closed.push(position);
            } else {
                position.status = 'OPEN';
            }

            logger.info(
                `${LEDGER_CONFIG.logPrefix} ${fullyClosed ? 'CLOSE' : 'REDUCE'} ${order.marketId} ` +
                `qty=${qty} @ ${order.averageFillPriceCents.toFixed(2)}c ` +
                `realized=${realizedCents >= 0 ? '+' : ''}${centsToUsd(realizedCents)} ` +
                `remaining=${position.quantity} cash=${centsToUsd(this.cashCents)}`
            );

            this.assertInvariants('applyClose');
            const copy = this.toCopy(position);
            this.events?.emit(fullyClosed ? 'position:closed' : 'position:reduced', copy, order);
            return copy;
        });
    }

    recordMark(marketId: string, markCents: number): Promise<void> {
        return this.mutex.runExclusive(() => {
            const position = this.positions.get(marketId);
            if (position) {
                position.markCents = markCents;
            }
        });
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // STATE ACCESSORS (READ-ONLY)
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Serialized snapshot: waits for every mutation queued before it
     */
    snapshot(): Promise<PortfolioSnapshot> {
        return this.mutex.runExclusive(() => this.computeSnapshot());
    }

    computeSnapshot(): PortfolioSnapshot {
        let costBasisCents = 0;
        let unrealizedPnlCents = 0;
        for (const position of this.positions.values()) {
            costBasisCents += position.costBasisCents;
            unrealizedPnlCents += (position.markCents - position.averageEntryPriceCents) * position.quantity;
        }
        const reservedCents = this.reservedCents();

        return {
            cashCents: this.cashCents,
            reservedCents,
            costBasisCents,
            unrealizedPnlCents,
            realizedPnlCents: this.realizedPnlCents,
            feesPaidCents: this.entryFeesCents + this.exitFeesCents,
            totalValueCents: this.cashCents + reservedCents + costBasisCents + unrealizedPnlCents,
            openPositions: this.positions.size,
            pendingEntries: this.reservations.size,
            takenAt: this.now(),
        };
    }

    getPosition(marketId: string): Position | null {
        return this.copyOf(this.positions.get(marketId));
    }

    openPositions(): Position[] {
        return Array.from(this.positions.values(), position => this.toCopy(position));
    }

    closedPositions(): Position[] {
        return this.closed.map(position => this.toCopy(position));
    }

    hasExposure(marketId: string): boolean {
        if (this.positions.has(marketId)) {
            return true;
        }
        for (const reservation of this.reservations.values()) {
            if (reservation.marketId === marketId) {
                return true;
            }
        }
        return false;
    }

    isHalted(): boolean {
        return this.haltReason !== null;
    }

    getHaltReason(): string | null {
        return this.haltReason;
    }

    getStartingCashCents(): number {
        return this.startingCashCents;
    }

    getStartingCapitalCents(): number {
        return this.startingCapitalCents;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // INVARIANTS
    // ═══════════════════════════════════════════════════════════════════════════

    checkInvariants(): InvariantCheckResult {
        const tolerance = LEDGER_CONFIG.invariantToleranceCents;
        const errors: string[] = [];

        let costBasisCents = 0;
        for (const [marketId, position] of this.positions) {
            costBasisCents += position.costBasisCents;
            if (position.quantity < 0) {
                errors.push(`${marketId}: negative quantity ${position.quantity}`);
            }
            if (position.status === 'CLOSED') {
                errors.push(`${marketId}: CLOSED position still in open book`);
            }
            const expectedBasis = position.averageEntryPriceCents * position.quantity;
            if (Math.abs(expectedBasis - position.costBasisCents) > tolerance) {
                errors.push(`${marketId}: costBasis ${position.costBasisCents} != avg × qty ${expectedBasis}`);
            }
        }

        const reservedMarkets = new Set<string>();
        for (const reservation of this.reservations.values()) {
            if (reservedMarkets.has(reservation.marketId)) {
                errors.push(`${reservation.marketId}: more than one pending entry`);
            }
            if (this.positions.has(reservation.marketId)) {
                errors.push(`${reservation.marketId}: pending entry alongside an open position`);
            }
            reservedMarkets.add(reservation.marketId);
        }

        if (this.cashCents < -tolerance) {
            errors.push(`cash is negative: ${this.cashCents}`);
        }

        const reservedCents = this.reservedCents();
        const actualCapitalCents = this.cashCents + reservedCents + costBasisCents;
        const expectedCapitalCents = this.startingCapitalCents + this.realizedPnlCents - this.entryFeesCents;
        if (Math.abs(actualCapitalCents - expectedCapitalCents) > tolerance) {
            errors.push(
                `conservation: cash+reserved+costBasis=${actualCapitalCents.toFixed(4)} ` +
                `expected=${expectedCapitalCents.toFixed(4)}`
            );
        }

        return {
            valid: errors.length === 0,
            errors,
            computed: {
                cashCents: this.cashCents,
                reservedCents,
                costBasisCents,
                expectedCapitalCents,
                actualCapitalCents,
            },
        };
    }

    logDetailedState(): void {
        const snapshot = this.computeSnapshot();
        logger.info(`${LEDGER_CONFIG.logPrefix} ═══ DETAILED STATE ═══`);
        logger.info(`  cash=${centsToUsd(snapshot.cashCents)} reserved=${centsToUsd(snapshot.reservedCents)}`);
        logger.info(`  costBasis=${centsToUsd(snapshot.costBasisCents)} unrealized=${centsToUsd(snapshot.unrealizedPnlCents)}`);
        logger.info(`  realized=${centsToUsd(snapshot.realizedPnlCents)} fees=${centsToUsd(snapshot.feesPaidCents)}`);
        logger.info(`  total=${centsToUsd(snapshot.totalValueCents)} open=${snapshot.openPositions} pending=${snapshot.pendingEntries}`);
        for (const position of this.positions.values()) {
            logger.info(
                `    ${position.marketId} ${position.side} qty=${position.quantity} ` +
                `entry=${position.averageEntryPriceCents.toFixed(2)}c mark=${position.markCents}c ${position.status}`
            );
        }
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PRIVATE
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * Book a position held before this ledger existed. Returns its cost basis.
     */
    private restorePosition(held: ExchangePosition): number {
        const { marketId, side, quantity, averageEntryPriceCents } = held;
        if (!Number.isInteger(quantity) || quantity <= 0
            || !Number.isFinite(averageEntryPriceCents) || averageEntryPriceCents < 0 || averageEntryPriceCents > 100) {
            throw new Error(`${LEDGER_CONFIG.logPrefix} Invalid opening position ${marketId}: ${quantity} @ ${averageEntryPriceCents}c`);
        }
        if (this.positions.has(marketId)) {
            throw new Error(`${LEDGER_CONFIG.logPrefix} Duplicate opening position ${marketId}`);
        }

        const costBasisCents = averageEntryPriceCents * quantity;
        this.positions.set(marketId, {
            marketId,
            side,
            quantity,
            averageEntryPriceCents,
            costBasisCents,
            entryFeesCents: 0,
            markCents: averageEntryPriceCents,
            openedAt: this.now(),
            closedAt: null,
            realizedPnlCents: 0,
            status: 'OPEN',
            entryOrderIds: [],
            exitOrderIds: [],
        });
        logger.info(
            `${LEDGER_CONFIG.logPrefix} RESTORED ${marketId} ${side.toUpperCase()} ` +
            `qty=${quantity} @ ${averageEntryPriceCents.toFixed(2)}c`
        );
        return costBasisCents;
    }

    private assertInvariants(context: string): void {
        const result = this.checkInvariants();
        if (!result.valid) {
            this.halt(context, result.errors);
        }
    }

    private halt(context: string, violations: string[]): never {
        this.haltReason = `${context}: ${violations.join('; ')}`;
        logger.error(`[LEDGER-ERROR] Invariant violation in ${context} - ledger HALTED`);
        for (const violation of violations) {
            logger.error(`[LEDGER-ERROR]   ${violation}`);
        }
        this.logDetailedState();
        throw new LedgerInvariantViolation(violations);
    }

    private reservedCents(): number {
        let total = 0;
        for (const reservation of this.reservations.values()) {
            total += reservation.amountCents;
        }
        return total;
    }

    private toCopy(position: Position): Position {
        return {
            ...position,
            entryOrderIds: [...position.entryOrderIds],
            exitOrderIds: [...position.exitOrderIds],
        };
    }

    private copyOf(position: Position | undefined): Position | null {
        return position ? this.toCopy(position) : null;
    }
}
