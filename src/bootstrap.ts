/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * BOOTSTRAP - COMPONENT FACTORY
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Builds one runtime from validated settings. NO RUNTIME LOOPS in this file.
 *
 * RULES:
 * 1. Exactly one RateGate, shared by scanner, lifecycle manager and exit engine
 * 2. Exactly one PortfolioLedger, owned by the runtime and passed to everyone
 * 3. Starting book:
 *    - TRADING_DRY_RUN with PAPER_CAPITAL → paper capital, no positions,
 *      no exchange calls
 *    - otherwise → exchange balance plus every position already held, so
 *      the scanner skips those markets and the exit engine monitors them
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import * as fs from 'fs';
import logger from './utils/logger';
import { generateRunId } from './utils/id';
import { withRetry } from './utils/retry';
import { RateGate } from './core/rateGate';
import { ExitPolicy } from './core/exitRules';
import { Settings, describeSettings } from './config/settings';
import { PortfolioLedger } from './capital/portfolioLedger';
import { SizingConfig } from './capital/positionSizer';
import { OrderLifecycleManager } from './engines/orderLifecycle';
import { ExitEngine } from './engines/exitEngine';
import { ScanLoop } from './runtime/scanLoop';
import { ExchangeHttpClient } from './services/exchangeClient';
import { MarketScanner } from './services/marketScanner';
import { defaultPredicates } from './services/marketFilters';
import { TradeEventBus } from './telemetry/tradeEvents';
import { SessionStats } from './telemetry/sessionStats';
import { attachTradeJournal } from './telemetry/tradeJournal';
import { ExchangePosition, ExchangeTransport } from './types/exchange';
import { centsToUsd, OpportunitySource } from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface Runtime {
    runId: string;
    settings: Settings;
    transport: ExchangeTransport;
    gate: RateGate;
    events: TradeEventBus;
    ledger: PortfolioLedger;
    lifecycle: OrderLifecycleManager;
    exitEngine: ExitEngine;
    scanLoop: ScanLoop;
    stats: SessionStats;
    detachJournal: () => void;
}

export interface BootstrapOverrides {
    transport?: ExchangeTransport;
    scanner?: OpportunitySource;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG MAPPING
// ═══════════════════════════════════════════════════════════════════════════════

export function sizingConfigFrom(settings: Settings): SizingConfig {
    const { trading } = settings;
    return {
        minPositionPercent: trading.minPositionPercent,
        maxPositionPercent: trading.maxPositionPercent,
        minContracts: trading.minContracts,
        maxContracts: trading.maxContracts,
        maxConcurrentPositions: trading.maxConcurrentPositions,
        maxPriceCents: trading.maxProbabilityCents,
        compoundProfits: trading.compoundProfits,
        feeAllowancePerContractCents: trading.feeAllowancePerContractCents,
    };
}

export function exitPolicyFrom(settings: Settings): ExitPolicy {
    const { trading } = settings;
    return {
        profitTargetPercent: trading.profitTargetPercent,
        stopLossPercent: trading.stopLossPercent,
        stopLossMinVolume: trading.stopLossMinVolume,
        precedence: trading.exitPrecedence,
    };
}

function createTransport(settings: Settings): ExchangeTransport {
    const { exchange } = settings;
    let privateKeyPem: string | null = null;
    if (exchange.apiKeyId !== null) {
        privateKeyPem = fs.readFileSync(exchange.privateKeyPath, 'utf8');
    }
    return new ExchangeHttpClient({
        baseUrl: exchange.baseUrl,
        apiKeyId: exchange.apiKeyId,
        privateKeyPem,
        timeoutMs: exchange.requestTimeoutMs,
    });
}

interface StartingBook {
    cashCents: number;
    positions: ExchangePosition[];
}

async function resolveStartingBook(settings: Settings, transport: ExchangeTransport, gate: RateGate): Promise<StartingBook> {
    const { trading, timing } = settings;
    if (trading.dryRun && trading.paperCapitalCents !== null) {
        logger.info(`[BOOTSTRAP] Paper capital: ${centsToUsd(trading.paperCapitalCents)}`);
        return { cashCents: trading.paperCapitalCents, positions: [] };
    }
    const retry = { maxRetries: timing.maxTransientRetries, baseDelayMs: timing.retryBaseDelayMs };
    const cashCents = await withRetry('balance', () => gate.run('balance', () => transport.getBalanceCents()), retry);
    const positions = await withRetry('positions', () => gate.run('positions', () => transport.getPositions()), retry);
    logger.info(`[BOOTSTRAP] Exchange balance: ${centsToUsd(cashCents)}, ${positions.length} position(s) held`);
    return { cashCents, positions };
}

// ═══════════════════════════════════════════════════════════════════════════════
// FACTORY
// ═══════════════════════════════════════════════════════════════════════════════

export async function createRuntime(settings: Settings, overrides: BootstrapOverrides = {}): Promise<Runtime> {
    const runId = generateRunId();
    const { trading, timing } = settings;

    logger.info(`[BOOTSTRAP] run=${runId} ${describeSettings(settings)}`);
    if (trading.dryRun) {
        logger.warn('[BOOTSTRAP] DRY RUN - orders are simulated, nothing is sent to the exchange');
    }

    const transport = overrides.transport ?? createTransport(settings);
    const gate = new RateGate({
        requestsPerSecond: timing.rateLimitPerSecond,
        maxWaitMs: timing.rateGateMaxWaitMs,
    });
    const events = new TradeEventBus();

    const book = await resolveStartingBook(settings, transport, gate);
    const ledger = new PortfolioLedger({
        startingCashCents: book.cashCents,
        openingPositions: book.positions,
        events,
    });

    const lifecycle = new OrderLifecycleManager({
        transport,
        gate,
        ledger,
        events,
        options: {
            pollIntervalMs: timing.orderPollIntervalMs,
            dryRun: trading.dryRun,
            maxTransientRetries: timing.maxTransientRetries,
            retryBaseDelayMs: timing.retryBaseDelayMs,
        },
    });

    let scanLoop: ScanLoop | null = null;
    const exitEngine = new ExitEngine({
        transport,
        gate,
        ledger,
        lifecycle,
        events,
        policy: exitPolicyFrom(settings),
        options: {
            monitorIntervalMs: timing.monitorIntervalMs,
            marketFetchTimeoutMs: timing.marketFetchTimeoutMs,
            exitOrderTimeoutMs: timing.exitOrderTimeoutMs,
        },
        onFatal: error => scanLoop?.halt(error),
    });

    const scanner = overrides.scanner ?? new MarketScanner(transport, gate, defaultPredicates(trading), {
        pageSize: 200,
        maxTransientRetries: timing.maxTransientRetries,
        retryBaseDelayMs: timing.retryBaseDelayMs,
        isHeld: marketId => ledger.hasExposure(marketId),
    });

    scanLoop = new ScanLoop({
        scanner,
        ledger,
        lifecycle,
        exitEngine,
        events,
        options: {
            scanIntervalMs: timing.scanIntervalMs,
            orderTimeoutMs: timing.orderTimeoutMs,
            entryCutoffHours: trading.entryCutoffHours,
            sizing: sizingConfigFrom(settings),
        },
    });

    const stats = new SessionStats(ledger.getStartingCapitalCents());
    stats.attach(events);
    const detachJournal = attachTradeJournal(events);

    return {
        runId,
        settings,
        transport,
        gate,
        events,
        ledger,
        lifecycle,
        exitEngine,
        scanLoop,
        stats,
        detachJournal,
    };
}
