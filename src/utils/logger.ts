import * as path from 'path';
import winston from 'winston';

const SILENT = process.env.NODE_ENV === 'test';

const consoleTransport = new winston.transports.Console({
    format: winston.format.combine(
        winston.format.colorize(),
        winston.format.simple()
    ),
});

const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    silent: SILENT,
    format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
    ),
    transports: [consoleTransport],
});

/**
 * Trade journal: one line per terminal order that moved capital.
 * Only gets a transport once configureFileLogging() runs.
 */
export const tradeLogger = winston.createLogger({
    level: 'info',
    silent: SILENT,
    format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.printf(({ timestamp, message }) => `${timestamp} | ${message}`)
    ),
    transports: [],
});

let fileLoggingDir: string | null = null;

/**
 * Attach error.log, combined.log and trades.log under `dir`.
 * Safe to call more than once; only the first call takes effect.
 */
export function configureFileLogging(dir: string, level?: string): void {
    if (level) {
        logger.level = level;
    }
    if (fileLoggingDir !== null) {
        return;
    }
    fileLoggingDir = dir;

    logger.add(new winston.transports.File({ filename: path.join(dir, 'error.log'), level: 'error' }));
    logger.add(new winston.transports.File({ filename: path.join(dir, 'combined.log') }));
    tradeLogger.add(new winston.transports.File({ filename: path.join(dir, 'trades.log') }));

    logger.info(`[LOGGING] File logging enabled in ${dir}`);
}

export default logger;
