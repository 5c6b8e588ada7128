import { describeSettings, EXCHANGE_ENDPOINTS, loadSettings } from '../src/config/settings';
import { ConfigurationError } from '../src/core/errors';

const BASE_ENV = { KALSHI_API_KEY_ID: 'test-key' };

function problemsFor(env: Record<string, string>): string[] {
    try {
        loadSettings(env);
    } catch (error) {
        if (error instanceof ConfigurationError) {
            return error.problems;
        }
        throw error;
    }
    return [];
}

describe('loadSettings', () => {
    test('applies defaults for everything not set', () => {
        const settings = loadSettings(BASE_ENV);

        expect(settings.exchange).toEqual({
            environment: 'sandbox',
            baseUrl: EXCHANGE_ENDPOINTS.sandbox,
            apiKeyId: 'test-key',
            privateKeyPath: 'private_key.pem',
            requestTimeoutMs: 10_000,
        });
        expect(settings.trading).toEqual(expect.objectContaining({
            liquidityThresholdCents: 5_000_000,
            minProbabilityCents: 80,
            maxProbabilityCents: 90,
            profitTargetPercent: 0.065,
            stopLossPercent: null,
            exitPrecedence: 'PROFIT_TARGET_FIRST',
            maxConcurrentPositions: 10,
            maxContracts: null,
            compoundProfits: true,
            dryRun: false,
            paperCapitalCents: null,
        }));
        expect(settings.timing.scanIntervalMs).toBe(60_000);
        expect(settings.timing.orderTimeoutMs).toBe(300_000);
        expect(settings.logging).toEqual({ level: 'info', dir: 'logs' });
    });

    test('reads and converts overrides', () => {
        const settings = loadSettings({
            ...BASE_ENV,
            KALSHI_ENVIRONMENT: 'production',
            TRADING_MIN_PROBABILITY: '0.70',
            TRADING_STOP_LOSS_PERCENT: '0.05',
            TRADING_EXIT_PRECEDENCE: 'STOP_LOSS_FIRST',
            TRADING_COMPOUND_PROFITS: 'off',
            TRADING_MAX_CONTRACTS: '500',
            TIMING_SCAN_INTERVAL_SECONDS: '30',
            LOG_LEVEL: 'debug',
        });

        expect(settings.exchange.baseUrl).toBe(EXCHANGE_ENDPOINTS.production);
        expect(settings.trading.minProbabilityCents).toBe(70);
        expect(settings.trading.stopLossPercent).toBe(0.05);
        expect(settings.trading.exitPrecedence).toBe('STOP_LOSS_FIRST');
        expect(settings.trading.compoundProfits).toBe(false);
        expect(settings.trading.maxContracts).toBe(500);
        expect(settings.timing.scanIntervalMs).toBe(30_000);
        expect(settings.logging.level).toBe('debug');
    });

    test('an explicit base URL wins and loses its trailing slash', () => {
        const settings = loadSettings({ ...BASE_ENV, KALSHI_BASE_URL: 'http://localhost:8080/trade-api/v2/' });
        expect(settings.exchange.baseUrl).toBe('http://localhost:8080/trade-api/v2');
    });

    test('blank values fall back to defaults', () => {
        expect(loadSettings({ ...BASE_ENV, TRADING_MAX_PROBABILITY: '   ' }).trading.maxProbabilityCents).toBe(90);
    });

    test('reports every invalid value at once', () => {
        expect(problemsFor({
            ...BASE_ENV,
            TRADING_MIN_PROBABILITY: 'abc',
            TRADING_MAX_POSITION_PERCENT: '2',
            TRADING_COMPOUND_PROFITS: 'maybe',
        })).toEqual([
            'TRADING_MIN_PROBABILITY must be a number, got "abc"',
            'TRADING_MAX_POSITION_PERCENT must be within [0.0001, 1], got 2',
            'TRADING_COMPOUND_PROFITS must be a boolean, got "maybe"',
        ]);
    });

    test('checks rules across fields', () => {
        expect(problemsFor({ ...BASE_ENV, TRADING_MIN_PROBABILITY: '0.9', TRADING_MAX_PROBABILITY: '0.8' })).toEqual([
            'TRADING_MIN_PROBABILITY must not exceed TRADING_MAX_PROBABILITY',
        ]);
        expect(problemsFor({ ...BASE_ENV, TRADING_MIN_CONTRACTS: '10', TRADING_MAX_CONTRACTS: '5' })).toEqual([
            'TRADING_MAX_CONTRACTS must not be below TRADING_MIN_CONTRACTS',
        ]);
        expect(problemsFor({ ...BASE_ENV, TRADING_MAX_CONCURRENT_POSITIONS: '2.5' })).toEqual([
            'TRADING_MAX_CONCURRENT_POSITIONS must be an integer, got 2.5',
        ]);
    });

    test('credentials are required unless paper trading', () => {
        expect(problemsFor({})).toEqual([
            'KALSHI_API_KEY_ID is required unless TRADING_DRY_RUN=true with PAPER_CAPITAL set',
        ]);

        const paper = loadSettings({ TRADING_DRY_RUN: 'true', PAPER_CAPITAL: '1000' });
        expect(paper.exchange.apiKeyId).toBeNull();
        expect(paper.trading.paperCapitalCents).toBe(100_000);
    });
});

test('describeSettings summarizes without credentials', () => {
    const line = describeSettings(loadSettings(BASE_ENV));
    expect(line).toBe(
        'env=sandbox dryRun=false prob=[80c,90c] target=6.50% stop=off size=[2.0%,10.0%] ' +
        'maxPositions=10 compound=true scan=60s rate=10/s'
    );
    expect(line).not.toContain('test-key');
});
