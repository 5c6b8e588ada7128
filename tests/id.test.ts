/**
 * ID Generation Tests
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Client order ids are idempotency keys: always unique, never reused.
 *
 * Format: {b|s}-{uuid}-{nanoseconds}
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { generateClientOrderId, generateRunId, generateUUID } from '../src/utils/id';

const UUID_WITH_NANOS = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}-\d+$/i;

describe('ID Generation', () => {
    describe('generateUUID', () => {
        test('always returns unique values', () => {
            expect(generateUUID()).not.toBe(generateUUID());
        });

        test('generates collision-resistant format with UUID and nanoseconds', () => {
            expect(generateUUID()).toMatch(UUID_WITH_NANOS);
        });
    });

    describe('generateClientOrderId', () => {
        test('prefixes buys with b- and sells with s-', () => {
            const buy = generateClientOrderId('buy');
            const sell = generateClientOrderId('sell');
            expect(buy.startsWith('b-')).toBe(true);
            expect(sell.startsWith('s-')).toBe(true);
            expect(buy.slice(2)).toMatch(UUID_WITH_NANOS);
            expect(sell.slice(2)).toMatch(UUID_WITH_NANOS);
        });

        test('generates unique values across many calls', () => {
            const ids = new Set<string>();
            for (let i = 0; i < 1000; i++) {
                ids.add(generateClientOrderId(i % 2 === 0 ? 'buy' : 'sell'));
            }
            expect(ids.size).toBe(1000);
        });
    });

    describe('generateRunId', () => {
        test('is a plain v4 uuid', () => {
            expect(generateRunId()).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i);
        });
    });
});
