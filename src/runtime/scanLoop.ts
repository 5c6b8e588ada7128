/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * SCAN LOOP - THE RUNTIME ORCHESTRATOR
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * ARCHITECTURAL RULES:
 * 1. NO module-level mutable state; everything is an instance property
 * 2. One cycle at a time: scan → filter → size → reserve → place entry
 * 3. Entries are sequential, so two cycles can never race for one market
 * 4. Exits run independently in the ExitEngine's monitor tasks
 * 5. stop() never abandons an order: it waits for the in-flight cycle,
 *    stops every monitor (canceling their closing orders), then drains
 *    the lifecycle manager
 *
 * FATAL: LedgerInvariantViolation or AuthenticationError halts the loop.
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import logger from '../utils/logger';
import { sleep } from '../utils/sleep';
import { generateClientOrderId } from '../utils/id';
import { errorMessage, isFatalError } from '../core/errors';
import { PortfolioLedger } from '../capital/portfolioLedger';
import { sizePosition, SizingConfig } from '../capital/positionSizer';
import { OrderLifecycleManager } from '../engines/orderLifecycle';
import { ExitEngine } from '../engines/exitEngine';
import { TradeEventBus } from '../telemetry/tradeEvents';
import {
    centsToUsd,
    CycleSummary,
    EntryOutcome,
    Opportunity,
    OpportunitySource,
} from '../types';

// ═══════════════════════════════════════════════════════════════════════════════
// INTERFACES
// ═══════════════════════════════════════════════════════════════════════════════

export interface ScanLoopOptions {
    scanIntervalMs: number;
    orderTimeoutMs: number;
    /** No new entries this close to market close; null disables */
    entryCutoffHours: number | null;
    sizing: SizingConfig;
}

export interface ScanLoopDeps {
    scanner: OpportunitySource;
    ledger: PortfolioLedger;
    lifecycle: OrderLifecycleManager;
    exitEngine: ExitEngine;
    events: TradeEventBus;
    options: ScanLoopOptions;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SCAN LOOP
// ═══════════════════════════════════════════════════════════════════════════════

export class ScanLoop {
    private readonly deps: ScanLoopDeps;

    private isScanning = false;
    private isRunning = false;
    private stopRequested = false;
    private controller = new AbortController();
    private loopPromise: Promise<void> = Promise.resolve();
    private stopPromise: Promise<void> | null = null;

    private baselineCents: number | null = null;
    private cycleCount = 0;
    private fatalError: unknown = null;

    constructor(deps: ScanLoopDeps) {
        this.deps = deps;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // LIFECYCLE
    // ═══════════════════════════════════════════════════════════════════════════

    async start(): Promise<void> {
        if (this.isRunning) {
            logger.warn('[SCAN-LOOP] Already running, ignoring start()');
            return;
        }

        this.isRunning = true;
        this.stopRequested = false;
        this.stopPromise = null;
        this.controller = new AbortController();

        await this.captureBaseline();
        this.deps.exitEngine.start();

        logger.info(
            `[SCAN-LOOP] ▶️ Started: interval=${this.deps.options.scanIntervalMs}ms ` +
            `baseline=${centsToUsd(this.baselineCents ?? 0)} compound=${this.deps.options.sizing.compoundProfits}`
        );

        this.loopPromise = this.loop();
    }

    /**
     * Stop scanning, cancel outstanding orders and wait for everything to settle.
     * Safe to call more than once.
     */
    stop(): Promise<void> {
        if (!this.isRunning) {
            logger.info('[SCAN-LOOP] Not running, ignoring stop()');
            return Promise.resolve();
        }
        if (this.stopPromise === null) {
            this.stopPromise = this.shutdown();
        }
        return this.stopPromise;
    }

    /**
     * Resolves when the loop exits, whether by stop() or by a fatal error
     */
    done(): Promise<void> {
        return this.loopPromise;
    }

    /**
     * Fatal condition: no new orders, loop exits after the current step
     */
    halt(error: unknown): void {
        if (this.fatalError === null) {
            this.fatalError = error;
            logger.error(`🚨 [SCAN-LOOP] FATAL: ${errorMessage(error)} - halting`);
        }
        this.stopRequested = true;
        this.controller.abort();
    }

    getFatalError(): unknown {
        return this.fatalError;
    }

    isActive(): boolean {
        return this.isRunning;
    }

    getBaselineCents(): number | null {
        return this.baselineCents;
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // CYCLE
    // ═══════════════════════════════════════════════════════════════════════════

    /**
     * One scan-and-enter pass over the scanner's current opportunities
     */
    async runCycle(): Promise<CycleSummary> {
        const cycle = ++this.cycleCount;
        const startedAt = Date.now();
        const outcomes: EntryOutcome[] = [];
        let opportunities = 0;
        let error: string | null = null;

        try {
            for await (const opportunity of this.deps.scanner.scan(this.controller.signal)) {
                opportunities++;
                const outcome = await this.tryEnter(opportunity);
                outcomes.push(outcome);
                this.logOutcome(outcome);
                if (this.stopRequested) {
                    break;
                }
            }
        } catch (caught) {
            error = errorMessage(caught);
            if (isFatalError(caught)) {
                this.halt(caught);
            } else {
                logger.error(`❌ [SCAN-LOOP] Cycle ${cycle} failed: ${error}`);
            }
        }

        const summary: CycleSummary = {
            cycle,
            startedAt,
            durationMs: Date.now() - startedAt,
            opportunities,
            entered: outcomes.filter(outcome => outcome.kind === 'ENTERED').length,
            outcomes,
            error,
        };

        const snapshot = this.deps.ledger.computeSnapshot();
        logger.info(
            `[SCAN-LOOP] Cycle ${cycle}: ${opportunities} opportunities, ${summary.entered} entered ` +
            `(${summary.durationMs}ms) | cash=${centsToUsd(snapshot.cashCents)} ` +
            `open=${snapshot.openPositions} value=${centsToUsd(snapshot.totalValueCents)}`
        );
        this.deps.events.emit('cycle:completed', summary);
        return summary;
    }

    /**
     * Decide on and, when sized, place one entry
     */
    async tryEnter(opportunity: Opportunity): Promise<EntryOutcome> {
        const { ledger, lifecycle, options } = this.deps;
        const marketId = opportunity.marketId;

        if (this.stopRequested) {
            return { kind: 'SKIPPED', marketId, reason: 'STOPPING' };
        }
        if (ledger.isHalted()) {
            return { kind: 'SKIPPED', marketId, reason: 'LEDGER_HALTED' };
        }
        if (options.entryCutoffHours !== null && opportunity.hoursToClose < options.entryCutoffHours) {
            return { kind: 'SKIPPED', marketId, reason: 'CLOSE_TOO_SOON' };
        }
        if (ledger.hasExposure(marketId)) {
            return { kind: 'SKIPPED', marketId, reason: 'MARKET_OCCUPIED' };
        }

        const baseline = await this.captureBaseline();
        const snapshot = await ledger.snapshot();
        const decision = sizePosition(snapshot, opportunity, options.sizing, baseline);
        if (decision.kind === 'REJECTED') {
            return { kind: 'SIZING_REJECTED', marketId, reason: decision.reason, detail: decision.detail };
        }

        const clientOrderId = generateClientOrderId('buy');
        const reservation = await ledger.reserveEntry(marketId, opportunity.side, decision.reserveCents, clientOrderId);
        if (!reservation.ok) {
            return { kind: 'RESERVATION_REJECTED', marketId, reason: reservation.reason, detail: reservation.detail };
        }

        logger.info(
            `[SCAN-LOOP] 🎯 ENTRY ${marketId} ${opportunity.side.toUpperCase()} ` +
            `${decision.contracts} @ ${decision.limitPriceCents}c (${centsToUsd(decision.notionalCents)} of ` +
            `${centsToUsd(decision.baseCapitalCents)})`
        );

        const order = await lifecycle.placeAndTrack(
            {
                clientOrderId,
                marketId,
                side: opportunity.side,
                action: 'buy',
                priceCents: decision.limitPriceCents,
                quantity: decision.contracts,
            },
            options.orderTimeoutMs,
            this.controller.signal
        );

        return order.filledQuantity > 0
            ? { kind: 'ENTERED', marketId, order }
            : { kind: 'NOT_FILLED', marketId, order };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PRIVATE
    // ═══════════════════════════════════════════════════════════════════════════

    private async loop(): Promise<void> {
        while (!this.stopRequested) {
            await this.runScanCycle();
            if (this.stopRequested) {
                break;
            }
            await sleep(this.deps.options.scanIntervalMs, this.controller.signal);
        }
        logger.info('[SCAN-LOOP] Loop exiting');
    }

    /**
     * Run a single scan cycle with overlap protection
     */
    private async runScanCycle(): Promise<void> {
        if (this.isScanning) {
            logger.warn('⏳ [SCAN-LOOP] Previous scan still running, skipping');
            return;
        }
        this.isScanning = true;
        try {
            await this.runCycle();
        } finally {
            this.isScanning = false;
        }
    }

    private async shutdown(): Promise<void> {
        logger.info('[SCAN-LOOP] 🛑 Stop requested, waiting for current cycle to complete...');
        this.stopRequested = true;
        this.controller.abort();

        await this.loopPromise;
        // Monitors first: aborting them cancels their closing orders and stops new ones
        await this.deps.exitEngine.stop();
        await this.deps.lifecycle.drain();

        this.isRunning = false;
        logger.info('[SCAN-LOOP] ✅ Stopped');
    }

    private async captureBaseline(): Promise<number> {
        if (this.baselineCents === null) {
            const snapshot = await this.deps.ledger.snapshot();
            this.baselineCents = snapshot.totalValueCents;
        }
        return this.baselineCents;
    }

    private logOutcome(outcome: EntryOutcome): void {
        switch (outcome.kind) {
            case 'ENTERED':
                logger.info(
                    `[SCAN-LOOP] ✅ ${outcome.marketId}: ${outcome.order.status} ` +
                    `${outcome.order.filledQuantity}/${outcome.order.requestedQuantity}`
                );
                break;
            case 'NOT_FILLED':
                logger.info(`[SCAN-LOOP] ${outcome.marketId}: ${outcome.order.status} (${outcome.order.reason ?? 'no fill'})`);
                break;
            case 'SKIPPED':
                logger.debug(`[SCAN-LOOP] ${outcome.marketId}: skipped (${outcome.reason})`);
                break;
            case 'SIZING_REJECTED':
            case 'RESERVATION_REJECTED':
                logger.info(`[SCAN-LOOP] ${outcome.marketId}: ${outcome.reason} - ${outcome.detail}`);
                break;
        }
    }
}
