/**
 * ID Generation Utilities
 *
 * ═══════════════════════════════════════════════════════════════════════════════
 * Client order ids double as idempotency keys: the exchange rejects a second
 * order carrying an id it has already seen. Therefore:
 *
 * RULES:
 * 1. NEVER reuse an id for a different logical order
 * 2. A RETRY of the same logical order MUST reuse its id
 * 3. NEVER derive ids from market ids or other static values
 *
 * Format: {uuid-v4}-{nanoseconds}
 * ═══════════════════════════════════════════════════════════════════════════════
 */

import { v4 as uuidv4 } from 'uuid';
import { OrderAction } from '../types';

export function generateUUID(): string {
    return `${uuidv4()}-${process.hrtime.bigint().toString()}`;
}

/**
 * Fresh idempotency key for one logical order.
 *
 * @example
 * generateClientOrderId('buy');
 * // "b-550e8400-e29b-41d4-a716-446655440000-1234567890123456789"
 */
export function generateClientOrderId(action: OrderAction): string {
    return `${action === 'buy' ? 'b' : 's'}-${generateUUID()}`;
}

/**
 * Identifier for one bot run, used to tag log lines and journal entries
 */
export function generateRunId(): string {
    return uuidv4();
}
