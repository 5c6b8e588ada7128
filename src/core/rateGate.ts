/**
 * Rate Gate - Shared Throttle for the Exchange Channel
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Every call to the exchange, from every component, takes one permit first.
 *
 * RULES:
 *   1. Token bucket: `requestsPerSecond` refill, `burst` capacity
 *   2. Waiters are served in arrival order and never dropped
 *   3. A waiter that cannot be served within `maxWaitMs` is rejected with
 *      RateGateTimeout; the caller treats the operation as NOT attempted
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import logger from '../utils/logger';
import { RateGateTimeout } from './errors';

export interface RateGateConfig {
    requestsPerSecond: number;
    /** Bucket capacity; defaults to requestsPerSecond */
    burst?: number;
    maxWaitMs: number;
}

export interface RatePermit {
    label: string;
    grantedAt: number;
    waitedMs: number;
}

interface Waiter {
    label: string;
    enqueuedAt: number;
    resolve: (permit: RatePermit) => void;
    reject: (error: RateGateTimeout) => void;
    timer: ReturnType<typeof setTimeout>;
}

export class RateGate {
    private readonly refillPerMs: number;
    private readonly capacity: number;
    private readonly maxWaitMs: number;

    private tokens: number;
    private lastRefill: number;
    private readonly queue: Waiter[] = [];
    private drainTimer: ReturnType<typeof setTimeout> | null = null;

    private granted = 0;
    private timedOut = 0;

    constructor(config: RateGateConfig) {
        if (!(config.requestsPerSecond > 0)) {
            throw new Error(`RateGate: requestsPerSecond must be > 0, got ${config.requestsPerSecond}`);
        }
        this.refillPerMs = config.requestsPerSecond / 1000;
        this.capacity = Math.max(1, config.burst ?? config.requestsPerSecond);
        this.maxWaitMs = config.maxWaitMs;
        this.tokens = this.capacity;
        this.lastRefill = Date.now();
    }

    /**
     * Wait for a permit. Rejects with RateGateTimeout after maxWaitMs.
     */
    acquire(label: string = 'request'): Promise<RatePermit> {
        const now = Date.now();
        this.refill(now);

        if (this.queue.length === 0 && this.tokens >= 1) {
            this.tokens -= 1;
            this.granted++;
            return Promise.resolve({ label, grantedAt: now, waitedMs: 0 });
        }

        return new Promise<RatePermit>((resolve, reject) => {
            const waiter: Waiter = {
                label,
                enqueuedAt: now,
                resolve,
                reject,
                timer: setTimeout(() => this.expire(waiter), this.maxWaitMs),
            };
            this.queue.push(waiter);
            this.scheduleDrain();
        });
    }

    /**
     * Acquire a permit, then run the call.
     */
    async run<T>(label: string, call: () => Promise<T>): Promise<T> {
        await this.acquire(label);
        return call();
    }

    getStats(): { granted: number; timedOut: number; queued: number; tokens: number } {
        this.refill(Date.now());
        return {
            granted: this.granted,
            timedOut: this.timedOut,
            queued: this.queue.length,
            tokens: Math.floor(this.tokens),
        };
    }

    // ═══════════════════════════════════════════════════════════════════════════
    // PRIVATE
    // ═══════════════════════════════════════════════════════════════════════════

    private refill(now: number): void {
        const elapsed = now - this.lastRefill;
        if (elapsed > 0) {
            this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.refillPerMs);
            this.lastRefill = now;
        }
    }

    private scheduleDrain(): void {
        if (this.drainTimer !== null || this.queue.length === 0) {
            return;
        }
        const deficit = Math.max(0, 1 - this.tokens);
        const delay = Math.ceil(deficit / this.refillPerMs);
        this.drainTimer = setTimeout(() => {
            this.drainTimer = null;
            this.drain();
        }, delay);
    }

    private drain(): void {
        const now = Date.now();
        this.refill(now);

        while (this.queue.length > 0 && this.tokens >= 1) {
            const waiter = this.queue.shift();
            if (!waiter) {
                break;
            }
            clearTimeout(waiter.timer);
            this.tokens -= 1;
            this.granted++;
            waiter.resolve({ label: waiter.label, grantedAt: now, waitedMs: now - waiter.enqueuedAt });
        }

        this.scheduleDrain();
    }

    private expire(waiter: Waiter): void {
        const index = this.queue.indexOf(waiter);
        if (index === -1) {
            return;
        }
        this.queue.splice(index, 1);
        this.timedOut++;
        const waited = Date.now() - waiter.enqueuedAt;
        logger.warn(`[RATE-GATE] "${waiter.label}" timed out after ${waited}ms (${this.queue.length} still queued)`);
        waiter.reject(new RateGateTimeout(waiter.label, waited));

        if (this.queue.length === 0 && this.drainTimer !== null) {
            clearTimeout(this.drainTimer);
            this.drainTimer = null;
        }
    }
}
