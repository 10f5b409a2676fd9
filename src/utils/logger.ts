import type { LogConfig } from '../types/config.types.js';
import { getCorrelationId } from '../errors/index.js';
import pino from 'pino';

export interface LogMeta {
    correlationId?: string;
    documentId?: string;
    chunkIndex?: number;
    pageNumber?: number;
    [key: string]: unknown;
}

export interface Logger {
    debug(message: string, meta?: LogMeta): void;
    info(message: string, meta?: LogMeta): void;
    warn(message: string, meta?: LogMeta): void;
    error(message: string, meta?: LogMeta): void;
}

type LogLevel = LogConfig['level'];

/**
 * Creates a Pino logger instance
 *
 * Structured JSON output by default; pretty printing through pino-pretty
 * when `structured` is false. Every entry carries a correlation id, the
 * current run's when logged inside one.
 */
export function createLogger(config: LogConfig): Logger {
    const pinoLogger = pino({
        level: config.level,
        ...(config.structured === false && {
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname',
                    destination: 2,
                },
            },
        }),
    });

    const enrichMeta = (meta?: LogMeta): LogMeta => ({
        correlationId: meta?.correlationId ?? getCorrelationId(),
        ...meta,
    });

    const log = (level: LogLevel, message: string, meta?: LogMeta): void => {
        const enriched = enrichMeta(meta);

        if (config.customLogger) {
            config.customLogger(level, message, enriched);
            return;
        }

        pinoLogger[level](enriched, message);
    };

    return {
        debug: (message: string, meta?: LogMeta) => log('debug', message, meta),
        info: (message: string, meta?: LogMeta) => log('info', message, meta),
        warn: (message: string, meta?: LogMeta) => log('warn', message, meta),
        error: (message: string, meta?: LogMeta) => log('error', message, meta),
    };
}

/**
 * Bind fixed metadata (correlation id, document id) to every entry
 */
export function withLogContext(logger: Logger, context: LogMeta): Logger {
    const merge = (meta?: LogMeta): LogMeta => ({ ...context, ...meta });

    return {
        debug: (message: string, meta?: LogMeta) => logger.debug(message, merge(meta)),
        info: (message: string, meta?: LogMeta) => logger.info(message, merge(meta)),
        warn: (message: string, meta?: LogMeta) => logger.warn(message, merge(meta)),
        error: (message: string, meta?: LogMeta) => logger.error(message, merge(meta)),
    };
}
