// Type Definitions for the Prediction-Market Trader
//
// Units: prices are integer cents (1-99) per contract of one side,
// money amounts are cents, timestamps are epoch milliseconds.

// ═══════════════════════════════════════════════════════════════════════════════
// MARKET TYPES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * The two outcome sides of a binary market
 */
export type Side = 'yes' | 'no';

export type OrderAction = 'buy' | 'sell';

export type MarketStatus = 'open' | 'closed' | 'settled' | 'unopened' | 'unknown';

/**
 * A candidate entry produced by the scanner. Immutable once created.
 */
export interface Opportunity {
    readonly marketId: string;
    readonly side: Side;
    readonly priceCents: number;
    readonly liquidityCents: number;
    readonly volume: number;
    readonly hoursToClose: number;
    readonly observedAt: number;
}

/**
 * Lazy, restartable stream of entry candidates
 */
export interface OpportunitySource {
    scan(signal: AbortSignal): AsyncIterable<Opportunity>;
}

/**
 * Point-in-time market view used by the position monitor
 */
export interface MarketSnapshot {
    marketId: string;
    title: string;
    status: MarketStatus;
    yesPriceCents: number;
    noPriceCents: number;
    yesAskCents: number | null;
    noAskCents: number | null;
    volume: number;
    liquidityCents: number;
    closeTime: number | null;
    fetchedAt: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ORDER TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type OrderStatus =
    | 'SUBMITTING'
    | 'PENDING'
    | 'PARTIALLY_FILLED'
    | 'FILLED'
    | 'CANCELED'
    | 'EXPIRED'
    | 'REJECTED';

/**
 * What the caller asks the lifecycle manager to place
 */
export interface OrderRequest {
    clientOrderId: string;
    marketId: string;
    side: Side;
    action: OrderAction;
    priceCents: number;
    quantity: number;
}

/**
 * Locally tracked order. Terminal once terminalAt is set.
 */
export interface Order {
    readonly clientOrderId: string;
    exchangeOrderId: string | null;
    readonly marketId: string;
    readonly side: Side;
    readonly action: OrderAction;
    readonly requestedPriceCents: number;
    readonly requestedQuantity: number;
    status: OrderStatus;
    filledQuantity: number;
    averageFillPriceCents: number;
    feesCents: number;
    readonly createdAt: number;
    terminalAt: number | null;
    reason: string | null;
}

// ═══════════════════════════════════════════════════════════════════════════════
// POSITION TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type PositionStatus = 'OPEN' | 'CLOSING' | 'CLOSED';

export interface Position {
    readonly marketId: string;
    readonly side: Side;
    quantity: number;
    averageEntryPriceCents: number;
    costBasisCents: number;
    entryFeesCents: number;
    markCents: number;
    readonly openedAt: number;
    closedAt: number | null;
    realizedPnlCents: number;
    status: PositionStatus;
    entryOrderIds: string[];
    exitOrderIds: string[];
}

/**
 * Consistent view of the ledger at one instant
 */
export interface PortfolioSnapshot {
    cashCents: number;
    reservedCents: number;
    costBasisCents: number;
    unrealizedPnlCents: number;
    realizedPnlCents: number;
    feesPaidCents: number;
    totalValueCents: number;
    openPositions: number;
    pendingEntries: number;
    takenAt: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

export function markFor(snapshot: MarketSnapshot, side: Side): number {
    return side === 'yes' ? snapshot.yesPriceCents : snapshot.noPriceCents;
}

/**
 * Price to pay for one contract of `side`: the ask when quoted, else the mark
 */
export function entryPriceFor(snapshot: MarketSnapshot, side: Side): number {
    const ask = side === 'yes' ? snapshot.yesAskCents : snapshot.noAskCents;
    return ask !== null && ask > 0 ? ask : markFor(snapshot, side);
}

export function centsToUsd(cents: number): string {
    return `$${(cents / 100).toFixed(2)}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CYCLE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type EntrySkipReason =
    | 'STOPPING'
    | 'LEDGER_HALTED'
    | 'CLOSE_TOO_SOON'
    | 'MARKET_OCCUPIED';

/**
 * What happened to one opportunity in one scan cycle
 */
export type EntryOutcome =
    | { kind: 'ENTERED'; marketId: string; order: Order }
    | { kind: 'NOT_FILLED'; marketId: string; order: Order }
    | { kind: 'SKIPPED'; marketId: string; reason: EntrySkipReason }
    | { kind: 'SIZING_REJECTED'; marketId: string; reason: string; detail: string }
    | { kind: 'RESERVATION_REJECTED'; marketId: string; reason: string; detail: string };

export interface CycleSummary {
    cycle: number;
    startedAt: number;
    durationMs: number;
    opportunities: number;
    entered: number;
    outcomes: EntryOutcome[];
    error: string | null;
}
