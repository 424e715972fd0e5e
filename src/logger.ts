/**
 * @module logger
 * Leveled logging on top of winston.
 */

import { createLogger as createWinston, format, Logger as Winston, transports } from 'winston';

export enum LogLevel {
    error = 'error',
    warn = 'warn',
    info = 'info',
    verbose = 'verbose',
    debug = 'debug',
}

export const LogLevels: readonly LogLevel[] = Object.values(LogLevel);

export function isLogLevel(value: string): value is LogLevel {
    return LogLevels.some((level) => level === value);
}

/** Structured metadata attached to a log line. */
export type LogContext =
    | string
    | number
    | boolean
    | null
    | {[property: string]: LogContext}
    | LogContext[];

export interface LoggerOptions {
    /** Minimum level written. Without one the logger is silent. */
    level?: LogLevel | null;
    /** Label printed in front of every message. */
    module?: string;
}

export interface Logger {
    error(message: string, context?: LogContext, error?: Error): void;
    warn(message: string, context?: LogContext, error?: Error): void;
    info(message: string, context?: LogContext, error?: Error): void;
    verbose(message: string, context?: LogContext, error?: Error): void;
    debug(message: string, context?: LogContext, error?: Error): void;
    isLevelEnabled(level: LogLevel): boolean;
    child(module: string): Logger;
}

const humanFormat = format.printf((info) => {
    const module = info.module ? ` [${info.module}]` : '';
    const context = info.context === undefined ? '' : ` ${JSON.stringify(info.context)}`;
    return `${info.timestamp}${module} ${info.level}: ${info.message}${context}`;
});

export class WinstonLogger implements Logger {
    readonly #winston: Winston;
    readonly #level: LogLevel | null;

    constructor(options: LoggerOptions = {}, winston?: Winston) {
        this.#level = options.level ?? null;
        this.#winston = winston ?? createWinston({
            level: this.#level ?? LogLevel.error,
            silent: this.#level === null,
            defaultMeta: {module: options.module ?? ''},
            format: format.combine(format.timestamp({format: 'YYYY-MM-DD HH:mm:ss.SSS'}), humanFormat),
            transports: [new transports.Console({stderrLevels: LogLevels.slice()})],
            exitOnError: false,
        });
    }

    error(message: string, context?: LogContext, error?: Error): void {
        this.#createLogEntry(LogLevel.error, message, context, error);
    }

    warn(message: string, context?: LogContext, error?: Error): void {
        this.#createLogEntry(LogLevel.warn, message, context, error);
    }

    info(message: string, context?: LogContext, error?: Error): void {
        this.#createLogEntry(LogLevel.info, message, context, error);
    }

    verbose(message: string, context?: LogContext, error?: Error): void {
        this.#createLogEntry(LogLevel.verbose, message, context, error);
    }

    debug(message: string, context?: LogContext, error?: Error): void {
        this.#createLogEntry(LogLevel.debug, message, context, error);
    }

    isLevelEnabled(level: LogLevel): boolean {
        if (this.#level === null) return false;
        return this.#winston.levels[level] <= this.#winston.levels[this.#level];
    }

    child(module: string): WinstonLogger {
        return new WinstonLogger({level: this.#level, module}, this.#winston.child({module}));
    }

    #createLogEntry(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
        // Skip building the entry when the level is filtered out.
        if (!this.isLevelEnabled(level)) return;
        this.#winston.log(level, message, {context, error});
    }
}

export function createLogger(options: LoggerOptions = {}): Logger {
    return new WinstonLogger(options);
}
