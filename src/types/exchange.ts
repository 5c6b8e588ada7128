import { MarketSnapshot, OrderRequest, Side } from './index';

// ═══════════════════════════════════════════════════════════════════════════════
// EXCHANGE TRANSPORT CONTRACT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Exchange-side order states, normalized across API versions
 */
export type ExchangeOrderStatus = 'pending' | 'resting' | 'executed' | 'canceled';

/**
 * Cumulative view of one order as the exchange reports it
 */
export interface ExchangeOrderState {
    orderId: string;
    status: ExchangeOrderStatus;
    filledQuantity: number;
    averageFillPriceCents: number | null;
    feesCents: number;
}

/**
 * Contracts held in one unsettled market
 */
export interface ExchangePosition {
    marketId: string;
    side: Side;
    quantity: number;
    averageEntryPriceCents: number;
}

export interface MarketPage {
    markets: MarketSnapshot[];
    cursor: string | null;
}

/**
 * Everything the engine needs from the exchange. Implementations throw
 * TransientChannelError, AuthenticationError or ExchangeRejection.
 * Callers are responsible for going through the shared rate gate.
 */
export interface ExchangeTransport {
    getMarket(marketId: string): Promise<MarketSnapshot>;
    listMarkets(cursor: string | null, limit: number): Promise<MarketPage>;
    submitOrder(request: OrderRequest): Promise<ExchangeOrderState>;
    getOrder(orderId: string): Promise<ExchangeOrderState>;
    cancelOrder(orderId: string): Promise<void>;
    getBalanceCents(): Promise<number>;
    /** Every unsettled market the account holds contracts in */
    getPositions(): Promise<ExchangePosition[]>;
}
