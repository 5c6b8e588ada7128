import { backoffDelays, withRetry } from '../src/utils/retry';
import { ExchangeRejection, TransientChannelError } from '../src/core/errors';

describe('withRetry', () => {
    test('backoff doubles from the base delay and is capped', () => {
        expect(backoffDelays({ maxRetries: 4, baseDelayMs: 100 })).toEqual([100, 200, 400, 800]);
        expect(backoffDelays({ maxRetries: 3, baseDelayMs: 1000, maxDelayMs: 1500 })).toEqual([1000, 1500, 1500]);
        expect(backoffDelays({ maxRetries: 0, baseDelayMs: 100 })).toEqual([]);
    });

    test('retries transient failures until the call succeeds', async () => {
        const operation = jest.fn<Promise<string>, []>()
            .mockRejectedValueOnce(new TransientChannelError('HTTP 502'))
            .mockRejectedValueOnce(new TransientChannelError('timeout'))
            .mockResolvedValueOnce('ok');

        await expect(withRetry('test', operation, { maxRetries: 3, baseDelayMs: 1 })).resolves.toBe('ok');
        expect(operation).toHaveBeenCalledTimes(3);
    });

    test('gives up after maxRetries and rethrows the last failure', async () => {
        const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new TransientChannelError('HTTP 503'));

        await expect(withRetry('test', operation, { maxRetries: 2, baseDelayMs: 1 })).rejects.toThrow('HTTP 503');
        expect(operation).toHaveBeenCalledTimes(3);
    });

    test('never retries a rejection', async () => {
        const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new ExchangeRejection('bad price', 'invalid_price', 400));

        await expect(withRetry('test', operation, { maxRetries: 5, baseDelayMs: 1 })).rejects.toBeInstanceOf(ExchangeRejection);
        expect(operation).toHaveBeenCalledTimes(1);
    });

    test('waits at least the server retry-after', async () => {
        const operation = jest.fn<Promise<string>, []>()
            .mockRejectedValueOnce(new TransientChannelError('rate limited', 60))
            .mockResolvedValueOnce('ok');
        const started = Date.now();

        await withRetry('test', operation, { maxRetries: 1, baseDelayMs: 1 });

        expect(Date.now() - started).toBeGreaterThanOrEqual(55);
    });

    test('stops retrying once aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new TransientChannelError('HTTP 502'));

        await expect(withRetry('test', operation, { maxRetries: 5, baseDelayMs: 1, signal: controller.signal })).rejects.toThrow('HTTP 502');
        expect(operation).toHaveBeenCalledTimes(1);
    });
});
