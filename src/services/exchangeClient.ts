/**
 * Exchange HTTP Client
 *
 * axios transport for the exchange's v2 trade API. Implements ExchangeTransport;
 * it does NOT throttle; callers go through the shared RateGate.
 *
 * Authentication (when an API key is configured):
 *   KALSHI-ACCESS-KEY        key id
 *   KALSHI-ACCESS-TIMESTAMP  epoch ms
 *   KALSHI-ACCESS-SIGNATURE  base64 RSA-PSS(SHA-256) over timestamp + METHOD + path
 *
 * Error classification:
 *   no response, timeout, 5xx, 429  → TransientChannelError
 *   401, 403                        → AuthenticationError
 *   any other 4xx                   → ExchangeRejection (exchange error code kept)
 */

import * as crypto from 'crypto';
import axios, { AxiosAdapter, AxiosError, AxiosInstance, Method } from 'axios';
import logger from '../utils/logger';
import {
    AuthenticationError,
    ExchangeRejection,
    TransientChannelError,
} from '../core/errors';
import {
    ExchangeOrderState,
    ExchangeOrderStatus,
    ExchangePosition,
    ExchangeTransport,
    MarketPage,
} from '../types/exchange';
import { MarketSnapshot, MarketStatus, OrderRequest } from '../types';

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export interface ExchangeHttpClientOptions {
    baseUrl: string;
    apiKeyId: string | null;
    privateKeyPem: string | null;
    timeoutMs: number;
    /** Replaces the network layer; used by tests */
    adapter?: AxiosAdapter;
}

type JsonRecord = Record<string, unknown>;

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE PARSING
// ═══════════════════════════════════════════════════════════════════════════════

function isRecord(value: unknown): value is JsonRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function field(source: JsonRecord, key: string): JsonRecord {
    const value = source[key];
    if (!isRecord(value)) {
        throw new TransientChannelError(`Malformed exchange response: missing "${key}"`);
    }
    return value;
}

function num(value: unknown): number | null {
    if (typeof value === 'number' && Number.isFinite(value)) {
        return value;
    }
    if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
        return Number(value);
    }
    return null;
}

function str(value: unknown): string | null {
    return typeof value === 'string' ? value : null;
}

function parseTime(value: unknown): number | null {
    const text = str(value);
    if (text === null) {
        return null;
    }
    const parsed = Date.parse(text);
    return Number.isNaN(parsed) ? null : parsed;
}

const MARKET_STATUS: Record<string, MarketStatus> = {
    active: 'open',
    open: 'open',
    closed: 'closed',
    settled: 'settled',
    finalized: 'settled',
    determined: 'settled',
    initialized: 'unopened',
    unopened: 'unopened',
};

/**
 * Side price = bid when quoted, else ask, else 50
 */
export function toMarketSnapshot(raw: JsonRecord, now: number = Date.now()): MarketSnapshot {
    const ticker = str(raw.ticker) ?? '';
    const sidePrice = (bid: unknown, ask: unknown): number => num(bid) ?? (num(ask) || 50);

    return {
        marketId: ticker,
        title: str(raw.title) ?? ticker,
        status: MARKET_STATUS[str(raw.status) ?? ''] ?? 'unknown',
        yesPriceCents: sidePrice(raw.yes_bid, raw.yes_ask),
        noPriceCents: sidePrice(raw.no_bid, raw.no_ask),
        yesAskCents: num(raw.yes_ask),
        noAskCents: num(raw.no_ask),
        volume: num(raw.volume) ?? num(raw.volume_24h) ?? 0,
        liquidityCents: num(raw.liquidity) ?? 0,
        closeTime: parseTime(raw.close_time),
        fetchedAt: now,
    };
}

const ORDER_STATUS: Record<string, ExchangeOrderStatus> = {
    pending: 'pending',
    resting: 'resting',
    executed: 'executed',
    canceled: 'canceled',
    cancelled: 'canceled',
};

export function toOrderState(raw: JsonRecord): ExchangeOrderState {
    const orderId = str(raw.order_id);
    if (orderId === null) {
        throw new TransientChannelError('Malformed exchange response: order without order_id');
    }

    const filled = num(raw.fill_count)
        ?? (num(raw.taker_fill_count) ?? 0) + (num(raw.maker_fill_count) ?? 0);
    const fillCost = (num(raw.taker_fill_cost) ?? 0) + (num(raw.maker_fill_cost) ?? 0);
    const fees = (num(raw.taker_fees) ?? 0) + (num(raw.maker_fees) ?? 0);

    return {
        orderId,
        status: ORDER_STATUS[str(raw.status) ?? ''] ?? 'pending',
        filledQuantity: filled,
        averageFillPriceCents: filled > 0 && fillCost > 0 ? fillCost / filled : null,
        feesCents: fees,
    };
}

/**
 * Signed position count: positive holds YES, negative holds NO.
 * Flat and settled markets map to null.
 */
export function toExchangePosition(raw: JsonRecord): ExchangePosition | null {
    const ticker = str(raw.ticker);
    const signed = num(raw.position) ?? 0;
    const result = str(raw.market_result);
    if (ticker === null || signed === 0 || result === 'yes' || result === 'no') {
        return null;
    }
    const quantity = Math.abs(signed);
    return {
        marketId: ticker,
        side: signed > 0 ? 'yes' : 'no',
        quantity,
        averageEntryPriceCents: Math.abs(num(raw.market_exposure) ?? 0) / quantity,
    };
}

const POSITIONS_PAGE_SIZE = 200;

// ═══════════════════════════════════════════════════════════════════════════════
// CLIENT
// ═══════════════════════════════════════════════════════════════════════════════

export class ExchangeHttpClient implements ExchangeTransport {
    private readonly http: AxiosInstance;
    private readonly basePath: string;
    private readonly apiKeyId: string | null;
    private readonly privateKey: crypto.KeyObject | null;

    constructor(options: ExchangeHttpClientOptions) {
        this.http = axios.create({
            baseURL: options.baseUrl,
            timeout: options.timeoutMs,
            headers: { 'Content-Type': 'application/json' },
            adapter: options.adapter,
        });
        this.basePath = new URL(options.baseUrl).pathname.replace(/\/+$/, '');
        this.apiKeyId = options.apiKeyId;
        this.privateKey = options.privateKeyPem ? crypto.createPrivateKey(options.privateKeyPem) : null;
    }

    async getMarket(marketId: string): Promise<MarketSnapshot> {
        const body = await this.request('GET', `/markets/${encodeURIComponent(marketId)}`);
        return toMarketSnapshot(field(body, 'market'));
    }

    async listMarkets(cursor: string | null, limit: number): Promise<MarketPage> {
        const params: Record<string, string | number> = { status: 'open', limit };
        if (cursor) {
            params.cursor = cursor;
        }
        const body = await this.request('GET', '/markets', params);
        const rawMarkets = Array.isArray(body.markets) ? body.markets : [];
        const nextCursor = str(body.cursor);
        return {
            markets: rawMarkets.filter(isRecord).map(market => toMarketSnapshot(market)),
            cursor: nextCursor && nextCursor.length > 0 ? nextCursor : null,
        };
    }

    async submitOrder(request: OrderRequest): Promise<ExchangeOrderState> {
        const payload: JsonRecord = {
            ticker: request.marketId,
            client_order_id: request.clientOrderId,
            side: request.side,
            action: request.action,
            count: request.quantity,
            type: 'limit',
        };
        payload[request.side === 'yes' ? 'yes_price' : 'no_price'] = request.priceCents;

        const body = await this.request('POST', '/portfolio/orders', undefined, payload);
        return toOrderState(field(body, 'order'));
    }

    async getOrder(orderId: string): Promise<ExchangeOrderState> {
        const body = await this.request('GET', `/portfolio/orders/${encodeURIComponent(orderId)}`);
        return toOrderState(field(body, 'order'));
    }

    async cancelOrder(orderId: string): Promise<void> {
        await this.request('DELETE', `/portfolio/orders/${encodeURIComponent(orderId)}`);
    }

    async getBalanceCents(): Promise<number> {
        const body = await this.request('GET', '/portfolio/balance');
        const balance = num(body.balance);
        if (balance === null) {
            throw new TransientChannelError('Malformed exchange response: balance missing');
        }
        return balance;
    }

    async getPositions(): Promise<ExchangePosition[]> {
        const positions: ExchangePosition[] = [];
        let cursor: string | null = null;
        do {
            const params: Record<string, string | number> = { count_filter: 'position', limit: POSITIONS_PAGE_SIZE };
            if (cursor) {
                params.cursor = cursor;
            }
            const body = await this.request('GET', '/portfolio/positions', params);
            const rawPositions = Array.isArray(body.market_positions) ? body.market_positions : [];
            for (const raw of rawPositions.filter(isRecord)) {
                const position = toExchangePosition(raw);
                if (position !== null) {
                    positions.push(position);
                }
            }
            const next = str(body.cursor);
            cursor = next && next.length > 0 ? next : null;
        } while (cursor !== null);
        return positions;
    }

    /**
     * Headers for one request. Empty when no credentials are configured.
     */
    signHeaders(method: string, path: string, timestampMs: number = Date.now()): Record<string, string> {
        if (this.apiKeyId === null || this.privateKey === null) {
            return {};
        }
        const timestamp = timestampMs.toString();
        const message = `${timestamp}${method.toUpperCase()}${this.basePath}${path}`;
        const signature = crypto.sign('sha256', Buffer.from(message), {
            key: this.privateKey,
            padding: crypto.constants.RSA_PKCS1_PSS_PADDING,
            saltLength: crypto.constants.RSA_PSS_SALTLEN_DIGEST,
        });
        return {
            'KALSHI-ACCESS-KEY': this.apiKeyId,
            'KALSHI-ACCESS-TIMESTAMP': timestamp,
            'KALSHI-ACCESS-SIGNATURE': signature.toString('base64'),
        };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PRIVATE
    // ═══════════════════════════════════════════════════════════════════════════

    private async request(
        method: Method,
        path: string,
        params?: Record<string, string | number>,
        data?: JsonRecord
    ): Promise<JsonRecord> {
        try {
            const response = await this.http.request<unknown>({
                method,
                url: path,
                params,
                data,
                headers: this.signHeaders(method, path),
            });
            return isRecord(response.data) ? response.data : {};
        } catch (error) {
            throw classifyError(error, `${method} ${path}`);
        }
    }
}

/**
 * Map an axios failure onto the error taxonomy
 */
export function classifyError(error: unknown, label: string): Error {
    if (!axios.isAxiosError(error)) {
        return error instanceof Error ? error : new Error(String(error));
    }
    const axiosError: AxiosError = error;
    const status = axiosError.response?.status;

    if (status === undefined) {
        return new TransientChannelError(`${label}: ${axiosError.code ?? 'network error'} ${axiosError.message}`);
    }

    const body = axiosError.response?.data;
    const details = isRecord(body) && isRecord(body.error) ? body.error : isRecord(body) ? body : {};
    const code = str(details.code) ?? `http_${status}`;
    const message = str(details.message) ?? axiosError.message;

    if (status === 429) {
        const retryAfterSeconds = num(axiosError.response?.headers['retry-after']);
        logger.warn(`[EXCHANGE] ${label}: rate limited by exchange`);
        return new TransientChannelError(
            `${label}: rate limited`,
            retryAfterSeconds === null ? null : retryAfterSeconds * 1000
        );
    }
    if (status >= 500) {
        return new TransientChannelError(`${label}: HTTP ${status} ${message}`);
    }
    if (status === 401 || status === 403) {
        return new AuthenticationError(`${label}: HTTP ${status} ${message}`);
    }
    return new ExchangeRejection(`${label}: ${message}`, code, status);
}
