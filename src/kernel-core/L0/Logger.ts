/**
 * Console logging with bracketed component prefixes: `[Authority] ...`.
 * One Logger per session; components take a scoped child.
 */

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    SILENT = 4,
}

export type LogContext = Record<string, unknown>;

export class Logger {
    constructor(private readonly level: LogLevel = LogLevel.INFO) { }

    public scope(prefix: string): ScopedLogger {
        return new ScopedLogger(prefix, this);
    }

    public debug(message: string, context?: LogContext) {
        if (this.level <= LogLevel.DEBUG) console.log(message, context ?? '');
    }

    public info(message: string, context?: LogContext) {
        if (this.level <= LogLevel.INFO) console.log(message, context ?? '');
    }

    public warn(message: string, context?: LogContext) {
        if (this.level <= LogLevel.WARN) console.warn(message, context ?? '');
    }

    public error(message: string, error?: unknown, context?: LogContext) {
        if (this.level <= LogLevel.ERROR) {
            const details = error instanceof Error ? { message: error.message, stack: error.stack } : error;
            console.error(message, details ?? '', context ?? '');
        }
    }
}

export class ScopedLogger {
    constructor(private prefix: string, private parent: Logger) { }

    public debug(message: string, context?: LogContext) {
        this.parent.debug(`[${this.prefix}] ${message}`, context);
    }

    public info(message: string, context?: LogContext) {
        this.parent.info(`[${this.prefix}] ${message}`, context);
    }

    public warn(message: string, context?: LogContext) {
        this.parent.warn(`[${this.prefix}] ${message}`, context);
    }

    public error(message: string, error?: unknown, context?: LogContext) {
        this.parent.error(`[${this.prefix}] ${message}`, error, context);
    }
}

export function parseLogLevel(name: string): LogLevel {
    switch (name.toLowerCase()) {
        case 'debug': return LogLevel.DEBUG;
        case 'warn': return LogLevel.WARN;
        case 'error': return LogLevel.ERROR;
        case 'silent': return LogLevel.SILENT;
        default: return LogLevel.INFO;
    }
}
