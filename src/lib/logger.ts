import { createLogger as createWinstonLogger, format, transports } from 'winston';
import type { Logger } from '../types';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LogLine {
    level: string;
    message: unknown;
    timestamp?: unknown;
    stack?: unknown;
    [key: string]: unknown;
}

// "<timestamp> - <LEVEL> - <message>", then metadata and stack when present
export function formatLogLine({ timestamp, level, message, stack, ...meta }: LogLine): string {
    let line = `${timestamp} - ${level.toUpperCase()} - ${message}`;
    if (Object.keys(meta).length > 0) {
        line += ` ${JSON.stringify(meta)}`;
    }
    if (typeof stack === 'string') {
        line += `\n${stack}`;
    }
    return line;
}

// Unknown or missing levels fall back to info; config validation uses the same rule
export function readLogLevel(value: unknown): LogLevel {
    return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

export function createLogger(level: LogLevel = 'info'): Logger {
    return createWinstonLogger({
        level,
        format: format.combine(format.errors({ stack: true }), format.timestamp(), format.printf(formatLogLine)),
        transports: [new transports.Console({ stderrLevels: ['error', 'warn'] })]
    });
}
