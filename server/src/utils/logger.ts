/**
 * Centralized logger using Pino
 *
 * Pretty output in development, JSON in production, silent under test
 * (LOG_LEVEL overrides all three).
 */
import pino from 'pino';
import type { Logger, LoggerOptions } from 'pino';
import type { Request, Response, NextFunction } from 'express';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const isDev = nodeEnv === 'development';
const isTest = nodeEnv === 'test';

function defaultLevel(): string {
    if (isTest) return 'silent';
    return isDev ? 'debug' : 'info';
}

const options: LoggerOptions = {
    level: process.env.LOG_LEVEL || defaultLevel(),
    formatters: isDev ? {} : {
        level: (label: string) => ({ level: label }),
    },
};

// pino-pretty runs in a worker thread; only start it for interactive development
const logger: Logger = isDev
    ? pino(options, pino.transport({
        target: 'pino-pretty',
        options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
        },
    }))
    : pino(options);

// Child loggers for different modules
export const chatLogger: Logger = logger.child({ module: 'chatAgent' });
export const dbLogger: Logger = logger.child({ module: 'db' });
export const routeLogger: Logger = logger.child({ module: 'routes' });
export const knowledgeBaseLogger: Logger = logger.child({ module: 'knowledgeBase' });

export default logger;

// Request logging middleware
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
    const start = Date.now();

    res.on('finish', () => {
        const duration = Date.now() - start;
        const logData = {
            method: req.method,
            url: req.url,
            status: res.statusCode,
            duration: `${duration}ms`,
        };

        if (res.statusCode >= 500) {
            logger.error(logData, 'Request error');
        } else if (res.statusCode >= 400) {
            logger.warn(logData, 'Request warning');
        } else if (duration > 1000) {
            logger.warn(logData, 'Slow request');
        } else {
            logger.debug(logData, 'Request completed');
        }
    });

    next();
}
