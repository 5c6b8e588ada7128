/**
 * Error Taxonomy
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Every failure that crosses a component boundary is one of these classes.
 *
 * HANDLING RULES:
 *   - TransientChannelError     → retried by the issuing component (withRetry)
 *   - RateGateTimeout           → operation NOT attempted; skip or reject
 *   - ExchangeRejection         → terminal for that order, never retried
 *   - AuthenticationError       → not retried; stops the scan loop
 *   - LedgerInvariantViolation  → FATAL; ledger halts, no new orders
 *   - IllegalOrderTransition    → programming error in the order state machine
 *   - ConfigurationError        → startup only
 *
 * Sizing rejections are NOT errors: see SizingDecision in positionSizer.ts.
 * ═══════════════════════════════════════════════════════════════════════════════
 */

export type TradingErrorCode =
    | 'TRANSIENT_CHANNEL'
    | 'AUTHENTICATION'
    | 'RATE_GATE_TIMEOUT'
    | 'EXCHANGE_REJECTION'
    | 'LEDGER_INVARIANT'
    | 'ILLEGAL_ORDER_TRANSITION'
    | 'CONFIGURATION';

export class TradingBotError extends Error {
    readonly code: TradingErrorCode;

    constructor(code: TradingErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * Network failure, timeout, 5xx or 429 on the exchange channel.
 */
export class TransientChannelError extends TradingBotError {
    readonly retryAfterMs: number | null;

    constructor(message: string, retryAfterMs: number | null = null) {
        super('TRANSIENT_CHANNEL', message);
        this.retryAfterMs = retryAfterMs;
    }
}

export class AuthenticationError extends TradingBotError {
    constructor(message: string) {
        super('AUTHENTICATION', message);
    }
}

export class RateGateTimeout extends TradingBotError {
    readonly waitedMs: number;

    constructor(label: string, waitedMs: number) {
        super('RATE_GATE_TIMEOUT', `Rate gate wait for "${label}" exceeded ${waitedMs}ms`);
        this.waitedMs = waitedMs;
    }
}

/**
 * The exchange understood the request and refused it
 * (closed market, insufficient balance, invalid price, ...).
 */
export class ExchangeRejection extends TradingBotError {
    readonly exchangeCode: string;
    readonly status: number | null;

    constructor(message: string, exchangeCode: string = 'unknown', status: number | null = null) {
        super('EXCHANGE_REJECTION', message);
        this.exchangeCode = exchangeCode;
        this.status = status;
    }
}

export class LedgerInvariantViolation extends TradingBotError {
    readonly violations: string[];

    constructor(violations: string[]) {
        super('LEDGER_INVARIANT', `Ledger invariant violated: ${violations.join('; ')}`);
        this.violations = violations;
    }
}

export class IllegalOrderTransition extends TradingBotError {
    constructor(clientOrderId: string, from: string, to: string) {
        super('ILLEGAL_ORDER_TRANSITION', `Order ${clientOrderId}: illegal transition ${from} -> ${to}`);
    }
}

export class ConfigurationError extends TradingBotError {
    readonly problems: string[];

    constructor(problems: string[]) {
        super('CONFIGURATION', `Invalid configuration:\n  - ${problems.join('\n  - ')}`);
        this.problems = problems;
    }
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

/**
 * Errors that stop the orchestrator rather than skipping one opportunity.
 */
export function isFatalError(error: unknown): boolean {
    return error instanceof LedgerInvariantViolation || error instanceof AuthenticationError;
}
