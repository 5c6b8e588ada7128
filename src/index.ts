/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * INDEX.TS - THIN ORCHESTRATION LAYER AND PUBLIC API
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * RULES:
 * 1. NO runtime logic at import time
 * 2. NO process handlers here; start.ts owns the process
 * 3. The runtime is passed as a parameter
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import logger from './utils/logger';
import { Runtime } from './bootstrap';
import { ScanLoop } from './runtime/scanLoop';

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY - CALLED BY start.ts AFTER BOOTSTRAP
// ═══════════════════════════════════════════════════════════════════════════════

export async function main(runtime: Runtime): Promise<ScanLoop> {
    logger.info('═══════════════════════════════════════════════════════════════════');
    logger.info(`🚀 STARTING TRADER MAIN LOOP (run ${runtime.runId})`);
    logger.info('═══════════════════════════════════════════════════════════════════');

    await runtime.scanLoop.start();
    return runtime.scanLoop;
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXPORTS
// ═══════════════════════════════════════════════════════════════════════════════

export { createRuntime, exitPolicyFrom, sizingConfigFrom } from './bootstrap';
export type { Runtime, BootstrapOverrides } from './bootstrap';
export { loadSettings, describeSettings, EXCHANGE_ENDPOINTS } from './config/settings';
export type { Settings } from './config/settings';
export * from './core/errors';
export { RateGate } from './core/rateGate';
export { evaluateExit, DEFAULT_EXIT_POLICY } from './core/exitRules';
export type { ExitPolicy, ExitPrecedence, ExitReason, ExitTrigger } from './core/exitRules';
export { PortfolioLedger } from './capital/portfolioLedger';
export { sizePosition } from './capital/positionSizer';
export type { SizingConfig, SizingDecision } from './capital/positionSizer';
export { OrderLifecycleManager } from './engines/orderLifecycle';
export { ExitEngine } from './engines/exitEngine';
export type { ExitOutcome } from './engines/exitEngine';
export { ScanLoop } from './runtime/scanLoop';
export { ExchangeHttpClient } from './services/exchangeClient';
export { MarketScanner } from './services/marketScanner';
export { defaultPredicates } from './services/marketFilters';
export { TradeEventBus } from './telemetry/tradeEvents';
export { SessionStats } from './telemetry/sessionStats';
export { attachTradeJournal } from './telemetry/tradeJournal';
export * from './types';
export type { ExchangeTransport, ExchangeOrderState, ExchangePosition, MarketPage } from './types/exchange';
