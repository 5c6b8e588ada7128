/**
 * Position Sizer
 *
 * Pure function: (portfolio snapshot, opportunity, config, baseline) → decision.
 *
 *   base     = compounding ? snapshot.totalValue : fixed baseline
 *   target   = max(base × maxPct, base × minPct)
 *   count    = min(floor(target / price), floor(cash / (price + feeAllowance))),
 *              capped at maxContracts
 *   reserve  = count × (price + feeAllowance)
 *
 * Never returns a zero-size order: anything that cannot be sized is a typed
 * rejection. count × price never exceeds base × maxPct, and the reservation
 * always covers the notional plus the fee allowance.
 */

import { Opportunity, PortfolioSnapshot } from '../types';

export interface SizingConfig {
    minPositionPercent: number;
    maxPositionPercent: number;
    minContracts: number;
    maxContracts: number | null;
    maxConcurrentPositions: number;
    /** Hard cap on the entry price */
    maxPriceCents: number;
    compoundProfits: boolean;
    /** Cash held back per contract for exchange fees */
    feeAllowancePerContractCents: number;
}

export type SizingRejectionReason =
    | 'INVALID_PRICE'
    | 'PRICE_ABOVE_CAP'
    | 'CAP_REACHED'
    | 'INSUFFICIENT_FUNDS'
    | 'BELOW_MIN_CONTRACTS';

export type SizingDecision =
    | {
        kind: 'SIZED';
        contracts: number;
        limitPriceCents: number;
        notionalCents: number;
        /** notional + fee allowance; the amount to reserve on the ledger */
        reserveCents: number;
        baseCapitalCents: number;
    }
    | {
        kind: 'REJECTED';
        reason: SizingRejectionReason;
        detail: string;
    };

function rejected(reason: SizingRejectionReason, detail: string): SizingDecision {
    return { kind: 'REJECTED', reason, detail };
}

export function sizePosition(
    snapshot: PortfolioSnapshot,
    opportunity: Opportunity,
    config: SizingConfig,
    baselineCents: number
): SizingDecision {
    const price = opportunity.priceCents;

    if (!Number.isInteger(price) || price < 1 || price > 99) {
        return rejected('INVALID_PRICE', `price ${price}c outside 1-99`);
    }
    if (price > config.maxPriceCents) {
        return rejected('PRICE_ABOVE_CAP', `price ${price}c above cap ${config.maxPriceCents}c`);
    }

    const committed = snapshot.openPositions + snapshot.pendingEntries;
    if (committed >= config.maxConcurrentPositions) {
        return rejected('CAP_REACHED', `${committed}/${config.maxConcurrentPositions} positions in use`);
    }

    const cash = snapshot.cashCents;
    const minContracts = Math.max(1, config.minContracts);
    const perContractCents = price + Math.max(0, config.feeAllowancePerContractCents);
    if (cash < minContracts * perContractCents) {
        return rejected('INSUFFICIENT_FUNDS', `cash ${cash.toFixed(0)}c < ${minContracts} × ${perContractCents}c`);
    }

    const base = config.compoundProfits ? snapshot.totalValueCents : baselineCents;
    const ceiling = base * config.maxPositionPercent;
    const floor = base * config.minPositionPercent;
    const target = Math.max(ceiling, floor);

    let contracts = Math.min(Math.floor(target / price), Math.floor(cash / perContractCents));
    if (config.maxContracts !== null) {
        contracts = Math.min(contracts, config.maxContracts);
    }

    if (contracts < minContracts) {
        return rejected(
            'BELOW_MIN_CONTRACTS',
            `target ${target.toFixed(0)}c buys ${contracts} @ ${price}c, minimum is ${minContracts}`
        );
    }

    return {
        kind: 'SIZED',
        contracts,
        limitPriceCents: price,
        notionalCents: contracts * price,
        reserveCents: contracts * perContractCents,
        baseCapitalCents: base,
    };
}
