/**
 * ═══════════════════════════════════════════════════════════════════════════════
 * SETTINGS - SINGLE SOURCE OF TRUTH FOR RUNTIME CONFIGURATION
 * ═══════════════════════════════════════════════════════════════════════════════
 *
 * Everything is read from environment variables (a .env file is loaded by
 * start.ts through dotenv). Every value is validated up front and all
 * problems are reported together in one ConfigurationError.
 *
 * EXCHANGE ENDPOINT PRIORITY:
 * 1. KALSHI_BASE_URL - if defined, use it directly
 * 2. KALSHI_ENVIRONMENT - sandbox (default) or production
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { ConfigurationError } from '../core/errors';
import { ExitPrecedence } from '../core/exitRules';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type ExchangeEnvironment = 'sandbox' | 'production';

export const EXCHANGE_ENDPOINTS: Record<ExchangeEnvironment, string> = {
    sandbox: 'https://demo-api.kalshi.co/trade-api/v2',
    production: 'https://api.elections.kalshi.com/trade-api/v2',
};

export interface ExchangeSettings {
    environment: ExchangeEnvironment;
    baseUrl: string;
    apiKeyId: string | null;
    privateKeyPath: string;
    requestTimeoutMs: number;
}

export interface TradingSettings {
    liquidityThresholdCents: number;
    minProbabilityCents: number;
    maxProbabilityCents: number;
    profitTargetPercent: number;
    stopLossPercent: number | null;
    stopLossMinVolume: number;
    exitPrecedence: ExitPrecedence;
    minMarketVolume: number;
    minPositionPercent: number;
    maxPositionPercent: number;
    maxConcurrentPositions: number;
    minContracts: number;
    maxContracts: number | null;
    compoundProfits: boolean;
    feeAllowancePerContractCents: number;
    maxHoursUntilClose: number;
    entryCutoffHours: number | null;
    dryRun: boolean;
    paperCapitalCents: number | null;
}

export interface TimingSettings {
    scanIntervalMs: number;
    orderTimeoutMs: number;
    exitOrderTimeoutMs: number;
    orderPollIntervalMs: number;
    monitorIntervalMs: number;
    marketFetchTimeoutMs: number;
    rateLimitPerSecond: number;
    rateGateMaxWaitMs: number;
    maxTransientRetries: number;
    retryBaseDelayMs: number;
}

export interface LoggingSettings {
    level: string;
    dir: string;
}

export interface Settings {
    exchange: ExchangeSettings;
    trading: TradingSettings;
    timing: TimingSettings;
    logging: LoggingSettings;
}

export type Env = Record<string, string | undefined>;

// ═══════════════════════════════════════════════════════════════════════════════
// ENV READER
// ═══════════════════════════════════════════════════════════════════════════════

class EnvReader {
    readonly problems: string[] = [];

    constructor(private readonly env: Env) {}

    raw(name: string): string | undefined {
        const value = this.env[name];
        if (value === undefined || value.trim() === '') {
            return undefined;
        }
        return value.trim();
    }

    number(name: string, fallback: number, min: number, max: number = Number.POSITIVE_INFINITY): number {
        const value = this.optionalNumber(name, min, max);
        return value ?? fallback;
    }

    optionalNumber(name: string, min: number, max: number = Number.POSITIVE_INFINITY): number | null {
        const raw = this.raw(name);
        if (raw === undefined) {
            return null;
        }
        const value = Number(raw);
        if (!Number.isFinite(value)) {
            this.problems.push(`${name} must be a number, got "${raw}"`);
            return null;
        }
        if (value < min || value > max) {
            this.problems.push(`${name} must be within [${min}, ${max}], got ${value}`);
            return null;
        }
        return value;
    }

    integer(name: string, fallback: number, min: number): number {
        const value = this.optionalInteger(name, min);
        return value ?? fallback;
    }

    optionalInteger(name: string, min: number): number | null {
        const value = this.optionalNumber(name, min);
        if (value !== null && !Number.isInteger(value)) {
            this.problems.push(`${name} must be an integer, got ${value}`);
            return null;
        }
        return value;
    }

    boolean(name: string, fallback: boolean): boolean {
        const raw = this.raw(name);
        if (raw === undefined) {
            return fallback;
        }
        const normalized = raw.toLowerCase();
        if (['true', '1', 'yes', 'on'].includes(normalized)) {
            return true;
        }
        if (['false', '0', 'no', 'off'].includes(normalized)) {
            return false;
        }
        this.problems.push(`${name} must be a boolean, got "${raw}"`);
        return fallback;
    }

    oneOf<T extends string>(name: string, allowed: readonly T[], fallback: T): T {
        const raw = this.raw(name);
        if (raw === undefined) {
            return fallback;
        }
        const match = allowed.find(option => option === raw.toLowerCase());
        if (match === undefined) {
            this.problems.push(`${name} must be one of ${allowed.join(', ')}, got "${raw}"`);
            return fallback;
        }
        return match;
    }
}

const PRECEDENCE_BY_NAME: Record<'profit_target_first' | 'stop_loss_first', ExitPrecedence> = {
    profit_target_first: 'PROFIT_TARGET_FIRST',
    stop_loss_first: 'STOP_LOSS_FIRST',
};

// ═══════════════════════════════════════════════════════════════════════════════
// LOADER
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Build validated settings from the environment.
 *
 * @throws ConfigurationError listing every invalid or missing value
 */
export function loadSettings(env: Env = process.env): Settings {
    const read = new EnvReader(env);

    const environment = read.oneOf<ExchangeEnvironment>('KALSHI_ENVIRONMENT', ['sandbox', 'production'], 'sandbox');
    const exchange: ExchangeSettings = {
        environment,
        baseUrl: (read.raw('KALSHI_BASE_URL') ?? EXCHANGE_ENDPOINTS[environment]).replace(/\/+$/, ''),
        apiKeyId: read.raw('KALSHI_API_KEY_ID') ?? null,
        privateKeyPath: read.raw('KALSHI_PRIVATE_KEY_PATH') ?? 'private_key.pem',
        requestTimeoutMs: read.integer('KALSHI_REQUEST_TIMEOUT_MS', 10_000, 100),
    };

    const paperCapitalUsd = read.optionalNumber('PAPER_CAPITAL', 0);
    const trading: TradingSettings = {
        liquidityThresholdCents: Math.round(read.number('TRADING_LIQUIDITY_THRESHOLD_USD', 50_000, 0) * 100),
        minProbabilityCents: Math.round(read.number('TRADING_MIN_PROBABILITY', 0.80, 0.01, 0.99) * 100),
        maxProbabilityCents: Math.round(read.number('TRADING_MAX_PROBABILITY', 0.90, 0.01, 0.99) * 100),
        profitTargetPercent: read.number('TRADING_PROFIT_TARGET_PERCENT', 0.065, 0.0001, 10),
        stopLossPercent: read.optionalNumber('TRADING_STOP_LOSS_PERCENT', 0.0001, 1),
        stopLossMinVolume: read.number('TRADING_STOP_LOSS_MIN_VOLUME', 100_000, 0),
        exitPrecedence: PRECEDENCE_BY_NAME[
            read.oneOf('TRADING_EXIT_PRECEDENCE', ['profit_target_first', 'stop_loss_first'], 'profit_target_first')
        ],
        minMarketVolume: read.number('TRADING_MIN_MARKET_VOLUME', 0, 0),
        minPositionPercent: read.number('TRADING_MIN_POSITION_PERCENT', 0.02, 0, 1),
        maxPositionPercent: read.number('TRADING_MAX_POSITION_PERCENT', 0.10, 0.0001, 1),
        maxConcurrentPositions: read.integer('TRADING_MAX_CONCURRENT_POSITIONS', 10, 1),
        minContracts: read.integer('TRADING_MIN_CONTRACTS', 1, 1),
        maxContracts: read.optionalInteger('TRADING_MAX_CONTRACTS', 1),
        compoundProfits: read.boolean('TRADING_COMPOUND_PROFITS', true),
        feeAllowancePerContractCents: read.number('TRADING_FEE_ALLOWANCE_CENTS', 2, 0, 99),
        maxHoursUntilClose: read.number('TRADING_MAX_HOURS_UNTIL_CLOSE', 24, 0),
        entryCutoffHours: read.optionalNumber('TRADING_ENTRY_CUTOFF_HOURS', 0),
        dryRun: read.boolean('TRADING_DRY_RUN', false),
        paperCapitalCents: paperCapitalUsd === null ? null : Math.round(paperCapitalUsd * 100),
    };

    const timing: TimingSettings = {
        scanIntervalMs: read.number('TIMING_SCAN_INTERVAL_SECONDS', 60, 1) * 1000,
        orderTimeoutMs: read.number('TIMING_ORDER_TIMEOUT_SECONDS', 300, 1) * 1000,
        exitOrderTimeoutMs: read.number('TIMING_EXIT_ORDER_TIMEOUT_SECONDS', 120, 1) * 1000,
        orderPollIntervalMs: read.integer('TIMING_ORDER_POLL_MS', 2000, 50),
        monitorIntervalMs: read.integer('TIMING_MONITOR_INTERVAL_MS', 10_000, 100),
        marketFetchTimeoutMs: read.integer('TIMING_MARKET_FETCH_TIMEOUT_MS', 5000, 100),
        rateLimitPerSecond: read.number('RATE_LIMIT_PER_SECOND', 10, 0.1),
        rateGateMaxWaitMs: read.integer('RATE_LIMIT_MAX_WAIT_MS', 30_000, 0),
        maxTransientRetries: read.integer('RETRY_MAX_ATTEMPTS', 3, 0),
        retryBaseDelayMs: read.integer('RETRY_BASE_DELAY_MS', 1000, 0),
    };

    const logging: LoggingSettings = {
        level: read.oneOf('LOG_LEVEL', ['error', 'warn', 'info', 'debug'], 'info'),
        dir: read.raw('LOG_DIR') ?? 'logs',
    };

    // Cross-field rules
    if (trading.minProbabilityCents > trading.maxProbabilityCents) {
        read.problems.push('TRADING_MIN_PROBABILITY must not exceed TRADING_MAX_PROBABILITY');
    }
    if (trading.minPositionPercent > trading.maxPositionPercent) {
        read.problems.push('TRADING_MIN_POSITION_PERCENT must not exceed TRADING_MAX_POSITION_PERCENT');
    }
    if (trading.maxContracts !== null && trading.maxContracts < trading.minContracts) {
        read.problems.push('TRADING_MAX_CONTRACTS must not be below TRADING_MIN_CONTRACTS');
    }
    if (exchange.apiKeyId === null && !(trading.dryRun && trading.paperCapitalCents !== null)) {
        read.problems.push('KALSHI_API_KEY_ID is required unless TRADING_DRY_RUN=true with PAPER_CAPITAL set');
    }

    if (read.problems.length > 0) {
        throw new ConfigurationError(read.problems);
    }

    return { exchange, trading, timing, logging };
}

/**
 * One-line summary safe to log (no credentials)
 */
export function describeSettings(settings: Settings): string {
    const { exchange, trading, timing } = settings;
    return [
        `env=${exchange.environment}`,
        `dryRun=${trading.dryRun}`,
        `prob=[${trading.minProbabilityCents}c,${trading.maxProbabilityCents}c]`,
        `target=${(trading.profitTargetPercent * 100).toFixed(2)}%`,
        `stop=${trading.stopLossPercent === null ? 'off' : `${(trading.stopLossPercent * 100).toFixed(2)}%`}`,
        `size=[${(trading.minPositionPercent * 100).toFixed(1)}%,${(trading.maxPositionPercent * 100).toFixed(1)}%]`,
        `maxPositions=${trading.maxConcurrentPositions}`,
        `compound=${trading.compoundProfits}`,
        `scan=${timing.scanIntervalMs / 1000}s`,
        `rate=${timing.rateLimitPerSecond}/s`,
    ].join(' ');
}
