/**
 * Market Scanner
 *
 * Pages through open markets (one rate-gated call per page), applies the
 * filter predicates and yields opportunities as they are found, so the
 * orchestrator can act on the first one before the scan finishes.
 */

import logger from '../utils/logger';
import { withRetry } from '../utils/retry';
import { RateGate } from '../core/rateGate';
import { errorMessage } from '../core/errors';
import { ExchangeTransport, MarketPage } from '../types/exchange';
import { Opportunity, OpportunitySource } from '../types';
import { eventPrefix, firstFailure, OpportunityPredicate, toOpportunity } from './marketFilters';

export interface MarketScannerOptions {
    pageSize: number;
    maxTransientRetries: number;
    retryBaseDelayMs: number;
    /** Markets to leave out (already held or pending) */
    isHeld?: (marketId: string) => boolean;
    now?: () => number;
}

export class MarketScanner implements OpportunitySource {
    constructor(
        private readonly transport: ExchangeTransport,
        private readonly gate: RateGate,
        private readonly predicates: OpportunityPredicate[],
        private readonly options: MarketScannerOptions
    ) {}

    async *scan(signal: AbortSignal): AsyncGenerator<Opportunity> {
        const now = this.options.now ?? Date.now;
        const seenEvents = new Set<string>();
        let cursor: string | null = null;
        let checked = 0;
        let found = 0;

        do {
            if (signal.aborted) {
                return;
            }
            const pageCursor: string | null = cursor;
            const page: MarketPage = await withRetry(
                'list markets',
                () => this.gate.run('list markets', () => this.transport.listMarkets(pageCursor, this.options.pageSize)),
                {
                    maxRetries: this.options.maxTransientRetries,
                    baseDelayMs: this.options.retryBaseDelayMs,
                    signal,
                }
            );

            for (const market of page.markets) {
                checked++;
                const event = eventPrefix(market.marketId);
                if (this.options.isHeld?.(market.marketId) || seenEvents.has(event)) {
                    continue;
                }
                const timestamp = now();
                const failure = firstFailure(this.predicates, market, timestamp);
                if (failure !== null) {
                    logger.debug(`[SCANNER] ${market.marketId} filtered: ${failure}`);
                    continue;
                }
                seenEvents.add(event);
                found++;
                yield toOpportunity(market, timestamp);
                if (signal.aborted) {
                    return;
                }
            }
            cursor = page.cursor;
        } while (cursor !== null);

        logger.info(`[SCANNER] Scan complete: checked ${checked} markets, found ${found} opportunities`);
    }

    /**
     * Evaluate one market by id, outside a full scan
     */
    async scanSingle(marketId: string): Promise<Opportunity | null> {
        try {
            const market = await this.gate.run(`market ${marketId}`, () => this.transport.getMarket(marketId));
            const timestamp = (this.options.now ?? Date.now)();
            return firstFailure(this.predicates, market, timestamp) === null ? toOpportunity(market, timestamp) : null;
        } catch (error) {
            logger.warn(`[SCANNER] Could not evaluate ${marketId}: ${errorMessage(error)}`);
            return null;
        }
    }
}
