import logger from './logger';
import { TransientChannelError, errorMessage } from '../core/errors';
import { sleep } from './sleep';

export interface RetryOptions {
    /** Attempts after the first one */
    maxRetries: number;
    /** Delay before retry n is baseDelayMs * 2^(n-1) */
    baseDelayMs: number;
    /** Upper bound on a single delay */
    maxDelayMs?: number;
    signal?: AbortSignal;
}

export function backoffDelays(options: RetryOptions): number[] {
    const maxDelay = options.maxDelayMs ?? 30_000;
    const delays: number[] = [];
    for (let i = 0; i < options.maxRetries; i++) {
        delays.push(Math.min(maxDelay, options.baseDelayMs * 2 ** i));
    }
    return delays;
}

/**
 * Run `operation`, retrying only TransientChannelError with exponential backoff.
 * A server-provided retry-after wins over the computed delay when longer.
 * Any other error, or the last transient one, propagates.
 */
export async function withRetry<T>(
    label: string,
    operation: () => Promise<T>,
    options: RetryOptions
): Promise<T> {
    const delays = backoffDelays(options);

    for (let attempt = 0; ; attempt++) {
        try {
            return await operation();
        } catch (error) {
            if (!(error instanceof TransientChannelError) || attempt >= delays.length) {
                throw error;
            }
            if (options.signal?.aborted) {
                throw error;
            }
            const delay = Math.max(delays[attempt], error.retryAfterMs ?? 0);
            logger.warn(
                `[RETRY] ${label} attempt ${attempt + 1}/${delays.length + 1} failed: ` +
                `${errorMessage(error)} - retrying in ${delay}ms`
            );
            await sleep(delay, options.signal);
        }
    }
}
