/**
 * Exit Rules
 *
 * Pure predicates over (position, market snapshot, policy).
 *
 * Exit a position if:
 * - (mark − entry) / entry >= profitTargetPercent
 * - stop-loss is configured, market volume >= stopLossMinVolume,
 *   and (entry − mark) / entry >= stopLossPercent
 *
 * When both hold, `policy.precedence` decides which reason is reported.
 * Time-to-close never triggers an exit; it only gates new entries.
 */

import { markFor, MarketSnapshot, Position } from '../types';

// ═══════════════════════════════════════════════════════════════════════════════
// INTERFACES
// ═══════════════════════════════════════════════════════════════════════════════

export type ExitReason = 'PROFIT_TARGET' | 'STOP_LOSS' | 'MANUAL';

export type ExitPrecedence = 'PROFIT_TARGET_FIRST' | 'STOP_LOSS_FIRST';

export interface ExitPolicy {
    profitTargetPercent: number;
    stopLossPercent: number | null;
    stopLossMinVolume: number;
    precedence: ExitPrecedence;
}

/**
 * Exit trigger result
 */
export interface ExitTrigger {
    triggered: boolean;
    reason: ExitReason | null;
    details: string;
    markCents: number;
    pnlPercent: number;
}

export const DEFAULT_EXIT_POLICY: ExitPolicy = {
    profitTargetPercent: 0.065,
    stopLossPercent: null,
    stopLossMinVolume: 100_000,
    precedence: 'PROFIT_TARGET_FIRST',
};

// ═══════════════════════════════════════════════════════════════════════════════
// CHECKS
// ═══════════════════════════════════════════════════════════════════════════════

export function pnlPercent(entryCents: number, markCents: number): number {
    if (entryCents <= 0) {
        return 0;
    }
    return (markCents - entryCents) / entryCents;
}

export function checkProfitTarget(entryCents: number, markCents: number, policy: ExitPolicy): boolean {
    return pnlPercent(entryCents, markCents) >= policy.profitTargetPercent;
}

export function checkStopLoss(entryCents: number, markCents: number, volume: number, policy: ExitPolicy): boolean {
    if (policy.stopLossPercent === null) {
        return false;
    }
    if (volume < policy.stopLossMinVolume) {
        return false;
    }
    return -pnlPercent(entryCents, markCents) >= policy.stopLossPercent;
}

/**
 * Evaluate all exit conditions for one position against one snapshot
 */
export function evaluateExit(position: Position, snapshot: MarketSnapshot, policy: ExitPolicy): ExitTrigger {
    const entry = position.averageEntryPriceCents;
    const mark = markFor(snapshot, position.side);
    const pnl = pnlPercent(entry, mark);

    const profit = checkProfitTarget(entry, mark, policy);
    const stop = checkStopLoss(entry, mark, snapshot.volume, policy);

    let reason: ExitReason | null = null;
    if (profit && stop) {
        reason = policy.precedence === 'PROFIT_TARGET_FIRST' ? 'PROFIT_TARGET' : 'STOP_LOSS';
    } else if (profit) {
        reason = 'PROFIT_TARGET';
    } else if (stop) {
        reason = 'STOP_LOSS';
    }

    const pct = (pnl * 100).toFixed(2);
    let details: string;
    if (reason === 'PROFIT_TARGET') {
        details = `P&L ${pct}% >= target ${(policy.profitTargetPercent * 100).toFixed(2)}%`;
    } else if (reason === 'STOP_LOSS') {
        details = `P&L ${pct}% <= -${((policy.stopLossPercent ?? 0) * 100).toFixed(2)}% (volume ${snapshot.volume})`;
    } else {
        details = `P&L ${pct}% within bounds`;
    }

    return {
        triggered: reason !== null,
        reason,
        details,
        markCents: mark,
        pnlPercent: pnl,
    };
}
