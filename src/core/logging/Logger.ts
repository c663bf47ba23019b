// src/core/logging/Logger.ts

/**
 * Structured Logger Service
 *
 * One line per entry on stderr: `[timestamp] [LEVEL] [Module] message {context}`.
 * Generation diagnostics go through here so the generated output on stdout
 * stays clean.
 */

import { ENV } from '../../config/env';

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    SILENT = 4,
}

const LEVEL_BY_NAME: Record<NonNullable<typeof ENV.LOG_LEVEL>, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
    silent: LogLevel.SILENT,
};

function defaultLevel(): LogLevel {
    if (ENV.LOG_LEVEL) {
        return LEVEL_BY_NAME[ENV.LOG_LEVEL];
    }
    switch (ENV.NODE_ENV) {
        case 'production':
            return LogLevel.INFO;
        case 'test':
            return LogLevel.SILENT;
        default:
            return LogLevel.DEBUG;
    }
}

export class Logger {
    private static currentLevel: LogLevel = defaultLevel();

    public static setLevel(level: LogLevel): void {
        this.currentLevel = level;
    }

    public static getLevel(): LogLevel {
        return this.currentLevel;
    }

    /**
     * JSON-encodes a context value, tolerating cycles and errors.
     */
    private static serialize(value: unknown): string {
        if (typeof value === 'string') {
            return value;
        }
        const seen = new WeakSet<object>();
        try {
            return JSON.stringify(value, (_key, val: unknown) => {
                if (val instanceof Error) {
                    return { name: val.name, message: val.message };
                }
                if (typeof val === 'object' && val !== null) {
                    if (seen.has(val)) return '[Circular]';
                    seen.add(val);
                }
                return val;
            });
        } catch (e) {
            return String(value);
        }
    }

    public static formatMessage(level: string, module: string, message: unknown, context?: unknown): string {
        const timestamp = new Date().toISOString();
        let log = `[${timestamp}] [${level}] [${module}] ${this.serialize(message)}`;

        if (context !== undefined) {
            log += ` ${this.serialize(context)}`;
        }

        return log;
    }

    public static debug(module: string, message: unknown, context?: unknown): void {
        if (this.currentLevel <= LogLevel.DEBUG) {
            console.error(this.formatMessage('DEBUG', module, message, context));
        }
    }

    public static info(module: string, message: unknown, context?: unknown): void {
        if (this.currentLevel <= LogLevel.INFO) {
            console.error(this.formatMessage('INFO', module, message, context));
        }
    }

    public static warn(module: string, message: unknown, context?: unknown): void {
        if (this.currentLevel <= LogLevel.WARN) {
            console.error(this.formatMessage('WARN', module, message, context));
        }
    }

    public static error(module: string, message: unknown, error?: unknown): void {
        if (this.currentLevel <= LogLevel.ERROR) {
            let errorDetails = '';
            if (error instanceof Error) {
                errorDetails = ` Stack: ${error.stack}`;
            } else if (error !== undefined) {
                errorDetails = ` Details: ${this.serialize(error)}`;
            }

            console.error(this.formatMessage('ERROR', module, message) + errorDetails);
        }
    }
}
