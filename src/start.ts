import 'dotenv/config';

import * as fs from 'fs';
import * as path from 'path';
import logger, { configureFileLogging } from './utils/logger';
import { loadSettings, Settings } from './config/settings';
import { ConfigurationError, errorMessage } from './core/errors';
import { createRuntime, Runtime } from './bootstrap';
import { main } from './index';
import { centsToUsd } from './types';

// ═══════════════════════════════════════════════════════════════════════════════
// LOCKFILE PATH (one trader per working directory)
// ═══════════════════════════════════════════════════════════════════════════════
const LOCKFILE_PATH = path.join(process.cwd(), '.trader.lock');

const BANNER = '════════════════════════════════════════════════════════════════';

// ═══════════════════════════════════════════════════════════════════════════════
// RUNTIME STATE
// ═══════════════════════════════════════════════════════════════════════════════

let runtime: Runtime | null = null;
let isShuttingDown = false;

// ═══════════════════════════════════════════════════════════════════════════════
// LOCKFILE MANAGEMENT
// ═══════════════════════════════════════════════════════════════════════════════

function isProcessRunning(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch {
        return false;
    }
}

function acquireProcessLock(): boolean {
    try {
        if (fs.existsSync(LOCKFILE_PATH)) {
            const existingPid = parseInt(fs.readFileSync(LOCKFILE_PATH, 'utf8').trim(), 10);
            if (!isNaN(existingPid) && isProcessRunning(existingPid)) {
                return false;
            }
            console.log(`[STARTUP] Removing stale lockfile (PID ${existingPid} not running)`);
            fs.unlinkSync(LOCKFILE_PATH);
        }
        fs.writeFileSync(LOCKFILE_PATH, process.pid.toString(), 'utf8');
        return true;
    } catch (error) {
        console.error(`[STARTUP] Failed to acquire process lock: ${errorMessage(error)}`);
        return false;
    }
}

function releaseProcessLock(): void {
    try {
        if (fs.existsSync(LOCKFILE_PATH)) {
            const storedPid = parseInt(fs.readFileSync(LOCKFILE_PATH, 'utf8').trim(), 10);
            // Only remove our own lock
            if (storedPid === process.pid) {
                fs.unlinkSync(LOCKFILE_PATH);
            }
        }
    } catch (error) {
        console.error(`[SHUTDOWN] Could not release lockfile: ${errorMessage(error)}`);
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// GRACEFUL SHUTDOWN
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Graceful shutdown sequence
 * 1. Stop scan loop (waits for the cycle, cancels and reconciles open orders,
 *    stops exit monitors)
 * 2. Verify ledger invariants
 * 3. Print session summary
 * 4. Flush logs
 * 5. Release process lock
 */
async function gracefulShutdown(signal: string): Promise<void> {
    if (isShuttingDown) {
        console.log(`[SHUTDOWN] Already shutting down, ignoring ${signal}`);
        return;
    }
    isShuttingDown = true;

    console.log('');
    console.log(BANNER);
    console.log(`🛑 [SHUTDOWN] Received ${signal} - initiating graceful shutdown...`);
    console.log(BANNER);

    let exitCode = signal === 'fatal' ? 1 : 0;
    try {
        if (runtime) {
            console.log('[SHUTDOWN] Step 1: Stopping scan loop...');
            await runtime.scanLoop.stop();
            console.log('[SHUTDOWN] ✅ Scan loop stopped');

            console.log('[SHUTDOWN] Step 2: Verifying ledger...');
            const check = runtime.ledger.checkInvariants();
            if (check.valid) {
                console.log('[SHUTDOWN] ✅ Ledger balanced');
            } else {
                console.error(`[SHUTDOWN] ❌ Ledger invariants violated: ${check.errors.join('; ')}`);
                exitCode = 1;
            }

            console.log('[SHUTDOWN] Step 3: Session summary...');
            const snapshot = runtime.ledger.computeSnapshot();
            runtime.stats.logSummary(snapshot.totalValueCents);
            console.log(`[SHUTDOWN] Final value ${centsToUsd(snapshot.totalValueCents)}, ${snapshot.openPositions} position(s) still open`);
            runtime.stats.detach();
            runtime.detachJournal();
        }

        console.log('[SHUTDOWN] Step 4: Flushing logs...');
        await new Promise(resolve => setTimeout(resolve, 500));
        console.log('[SHUTDOWN] ✅ Logs flushed');
    } catch (error) {
        console.error(`[SHUTDOWN] ❌ Error during shutdown: ${errorMessage(error)}`);
        exitCode = 1;
    }

    console.log('[SHUTDOWN] Step 5: Releasing process lock...');
    releaseProcessLock();

    console.log('');
    console.log(BANNER);
    console.log(exitCode === 0 ? '✅ [SHUTDOWN] Graceful shutdown complete' : '⚠️ [SHUTDOWN] Shutdown complete with errors');
    console.log(BANNER);

    process.exit(exitCode);
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROCESS HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

function attachProcessHandlers(): void {
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

    process.on('uncaughtException', error => {
        console.error('');
        console.error(BANNER);
        console.error(`🚨 [FATAL] Uncaught Exception: ${error.message}`);
        console.error(BANNER);
        console.error(error.stack);
        void gracefulShutdown('uncaughtException');
    });

    process.on('unhandledRejection', reason => {
        console.error('');
        console.error(BANNER);
        console.error('🚨 [FATAL] Unhandled Rejection');
        console.error(BANNER);
        logger.error(`Unhandled rejection: ${errorMessage(reason)}`);
    });

    process.on('exit', () => {
        releaseProcessLock();
    });

    console.log('[STARTUP] ✅ Process handlers attached');
}

function loadSettingsOrExit(): Settings {
    try {
        return loadSettings();
    } catch (error) {
        if (error instanceof ConfigurationError) {
            console.error('🚫 Invalid configuration:');
            for (const problem of error.problems) {
                console.error(`   - ${problem}`);
            }
            process.exit(1);
        }
        throw error;
    }
}

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRYPOINT
// ═══════════════════════════════════════════════════════════════════════════════

async function run(): Promise<void> {
    console.log('');
    console.log(BANNER);
    console.log('🔧 PREDICTION MARKET TRADER - STARTING');
    console.log(BANNER);
    console.log(`   PID: ${process.pid}`);
    console.log(`   Time: ${new Date().toISOString()}`);
    console.log(BANNER);

    // STEP 0: configuration, before anything touches the exchange
    console.log('[STARTUP] Step 0: Loading settings...');
    const settings = loadSettingsOrExit();
    configureFileLogging(settings.logging.dir, settings.logging.level);

    // STEP 1: process lock
    console.log('[STARTUP] Step 1: Checking for existing instance...');
    if (!acquireProcessLock()) {
        console.error(BANNER);
        console.error('🚫 A second trader instance was prevented from starting.');
        console.error(`   Kill the existing process or remove ${path.basename(LOCKFILE_PATH)} manually.`);
        console.error(BANNER);
        process.exit(0);
    }
    console.log('[STARTUP] ✅ Process lock acquired');

    // STEP 2: process handlers before any async work
    attachProcessHandlers();

    // STEP 3: components
    console.log('[STARTUP] Step 3: Building runtime...');
    runtime = await createRuntime(settings);
    console.log(`[STARTUP] ✅ Runtime ready (run ${runtime.runId})`);

    // STEP 4: scan loop
    console.log('[STARTUP] Step 4: Starting scan loop...');
    const scanLoop = await main(runtime);

    console.log('');
    console.log(BANNER);
    console.log('🟢 TRADER RUNTIME ACTIVE');
    console.log(BANNER);
    console.log(`   PID: ${process.pid}`);
    console.log(`   Mode: ${settings.trading.dryRun ? 'DRY RUN' : 'LIVE'} (${settings.exchange.environment})`);
    console.log(`   Scan interval: ${settings.timing.scanIntervalMs / 1000}s`);
    console.log('   Press Ctrl+C for graceful shutdown');
    console.log(BANNER);

    // The loop only returns on its own after a fatal error
    await scanLoop.done();
    if (scanLoop.getFatalError() !== null) {
        await gracefulShutdown('fatal');
    }
}

run().catch(error => {
    console.error(`🚨 [FATAL] Startup failed: ${errorMessage(error)}`);
    releaseProcessLock();
    process.exit(1);
});
