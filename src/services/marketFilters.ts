/**
 * Market Filters
 *
 * Each predicate returns null when the market passes, or a short reason.
 * A market qualifies when every predicate passes; the favored side (the one
 * priced higher) becomes the opportunity's side.
 */

import { entryPriceFor, MarketSnapshot, Opportunity, Side } from '../types';

export type OpportunityPredicate = (market: MarketSnapshot, now: number) => string | null;

export interface MarketFilterConfig {
    liquidityThresholdCents: number;
    minProbabilityCents: number;
    maxProbabilityCents: number;
    minMarketVolume: number;
    /** 0 disables the window */
    maxHoursUntilClose: number;
}

const MS_PER_HOUR = 3_600_000;

export function hoursUntilClose(market: MarketSnapshot, now: number): number {
    return market.closeTime === null ? Number.POSITIVE_INFINITY : (market.closeTime - now) / MS_PER_HOUR;
}

export function favoredSide(market: MarketSnapshot): Side {
    return market.yesPriceCents >= market.noPriceCents ? 'yes' : 'no';
}

/**
 * Event part of a ticker: everything before the last dash.
 * Two tickers of the same event are two sides of one question.
 */
export function eventPrefix(marketId: string): string {
    const lastDash = marketId.lastIndexOf('-');
    return lastDash > 0 ? marketId.slice(0, lastDash) : marketId;
}

export const isOpen: OpportunityPredicate = market =>
    market.status === 'open' ? null : `status ${market.status}`;

export function hasLiquidity(thresholdCents: number): OpportunityPredicate {
    return market => {
        let liquidity = market.liquidityCents;
        if (liquidity === 0) {
            // No resting book reported: volume × mid as a rough proxy
            liquidity = market.volume * ((market.yesPriceCents + market.noPriceCents) / 2);
        }
        return liquidity >= thresholdCents ? null : `liquidity ${liquidity.toFixed(0)}c < ${thresholdCents}c`;
    };
}

export function hasVolume(minVolume: number): OpportunityPredicate {
    return market => (minVolume <= 0 || market.volume >= minVolume ? null : `volume ${market.volume} < ${minVolume}`);
}

export function closesWithin(maxHours: number): OpportunityPredicate {
    return (market, now) => {
        if (maxHours <= 0 || market.closeTime === null) {
            return null;
        }
        const hours = hoursUntilClose(market, now);
        if (hours < 0) {
            return 'already closed';
        }
        return hours <= maxHours ? null : `closes in ${hours.toFixed(1)}h > ${maxHours}h`;
    };
}

export function probabilityInRange(minCents: number, maxCents: number): OpportunityPredicate {
    return market => {
        const side = favoredSide(market);
        const price = entryPriceFor(market, side);
        return price >= minCents && price <= maxCents
            ? null
            : `${side} entry ${price}c outside [${minCents}c, ${maxCents}c]`;
    };
}

export function defaultPredicates(config: MarketFilterConfig): OpportunityPredicate[] {
    return [
        isOpen,
        hasVolume(config.minMarketVolume),
        closesWithin(config.maxHoursUntilClose),
        hasLiquidity(config.liquidityThresholdCents),
        probabilityInRange(config.minProbabilityCents, config.maxProbabilityCents),
    ];
}

export function firstFailure(predicates: OpportunityPredicate[], market: MarketSnapshot, now: number): string | null {
    for (const predicate of predicates) {
        const reason = predicate(market, now);
        if (reason !== null) {
            return reason;
        }
    }
    return null;
}

export function toOpportunity(market: MarketSnapshot, now: number): Opportunity {
    const side = favoredSide(market);
    return Object.freeze({
        marketId: market.marketId,
        side,
        priceCents: entryPriceFor(market, side),
        liquidityCents: market.liquidityCents,
        volume: market.volume,
        hoursToClose: hoursUntilClose(market, now),
        observedAt: now,
    });
}
