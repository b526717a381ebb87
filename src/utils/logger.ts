import pino from 'pino';
import type { LogLevel } from '../types/index.js';

/**
 * Logger singleton. Configured once at startup via `initLogger()`.
 * Uses pino for structured JSON logging with human-readable default.
 */
let loggerInstance: pino.Logger | null = null;

/**
 * Initialize the logger with the specified options.
 * Should be called once at CLI startup.
 */
export function initLogger(options: {
    level?: LogLevel;
    jsonLogs?: boolean;
}): pino.Logger {
    const { level = 'info', jsonLogs = false } = options;

    // Logs go to stderr; stdout carries command output.
    // No transport worker when nothing will be printed
    if (jsonLogs || level === 'silent') {
        loggerInstance = pino({ level, base: { app: 'paperindex' } }, pino.destination(2));
    } else {
        loggerInstance = pino({
            level,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss',
                    ignore: 'pid,hostname,app',
                    destination: 2,
                },
            },
        });
    }

    return loggerInstance;
}

function levelFromEnv(): LogLevel {
    const raw = process.env['PAPERINDEX_LOG_LEVEL'];
    return raw === 'error' || raw === 'warn' || raw === 'info' || raw === 'debug' || raw === 'silent' ? raw : 'info';
}

/**
 * Get the logger instance, or a child tagged with `component`.
 * If not initialized, creates a logger at the level named by PAPERINDEX_LOG_LEVEL.
 */
export function getLogger(component?: string): pino.Logger {
    if (!loggerInstance) {
        loggerInstance = initLogger({ level: levelFromEnv() });
    }
    return component ? loggerInstance.child({ component }) : loggerInstance;
}
