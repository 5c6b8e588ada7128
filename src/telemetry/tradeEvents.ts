/**
 * Trade Event Bus
 *
 * Typed wrapper over EventEmitter. Listeners run synchronously inside the
 * emitting call, so they must not throw; a throwing listener is logged and
 * skipped.
 */

import { EventEmitter } from 'events';
import logger from '../utils/logger';
import { errorMessage } from '../core/errors';
import { CycleSummary, Order, Position } from '../types';

export interface TradeEventMap {
    'order:terminal': [order: Order];
    'position:opened': [position: Position, order: Order];
    'position:reduced': [position: Position, order: Order];
    'position:closed': [position: Position, order: Order];
    'cycle:completed': [summary: CycleSummary];
}

export type TradeEventName = keyof TradeEventMap;

export class TradeEventBus {
    private readonly emitter = new EventEmitter();

    on<K extends TradeEventName>(event: K, listener: (...args: TradeEventMap[K]) => void): () => void {
        const guarded = (...args: TradeEventMap[K]): void => {
            try {
                listener(...args);
            } catch (error) {
                logger.error(`[EVENTS] Listener for ${event} failed: ${errorMessage(error)}`);
            }
        };
        this.emitter.on(event, guarded);
        return () => {
            this.emitter.off(event, guarded);
        };
    }

    emit<K extends TradeEventName>(event: K, ...args: TradeEventMap[K]): void {
        this.emitter.emit(event, ...args);
    }

    listenerCount(event: TradeEventName): number {
        return this.emitter.listenerCount(event);
    }
}
