import { tradeLogger } from '../utils/logger';
import { TradeEventBus } from './tradeEvents';
import { Order, Position } from '../types';

function formatEntry(order: Order): string {
    return [
        'ENTRY',
        order.marketId,
        order.side.toUpperCase(),
        `${order.filledQuantity} contracts`,
        `@ ${order.averageFillPriceCents.toFixed(2)}c`,
        order.status,
        order.clientOrderId,
    ].join(' | ');
}

function formatExit(position: Position, order: Order): string {
    return [
        'EXIT',
        order.marketId,
        order.side.toUpperCase(),
        `${order.filledQuantity} contracts`,
        `@ ${order.averageFillPriceCents.toFixed(2)}c`,
        `pnl ${(position.realizedPnlCents / 100).toFixed(2)}`,
        position.status,
        order.clientOrderId,
    ].join(' | ');
}

/**
 * Write one journal line per filled entry and per reducing/closing exit.
 * Returns the unsubscribe function.
 */
export function attachTradeJournal(events: TradeEventBus, write: (line: string) => void = line => tradeLogger.info(line)): () => void {
    const offs = [
        events.on('order:terminal', order => {
            if (order.action === 'buy' && order.filledQuantity > 0) {
                write(formatEntry(order));
            }
        }),
        events.on('position:reduced', (position, order) => write(formatExit(position, order))),
        events.on('position:closed', (position, order) => write(formatExit(position, order))),
    ];
    return () => offs.forEach(off => off());
}
