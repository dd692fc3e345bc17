/**
 * Structured Logger
 * JSON lines in production, one colored line per entry otherwise
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

interface LogEntry {
    timestamp: string;
    level: LogLevel;
    service: string;
    message: string;
    [key: string]: unknown;
}

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

const RESERVED_KEYS = ['timestamp', 'level', 'service', 'message'];

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && value in LOG_LEVELS;
}

/**
 * Parse a level from config, falling back to `info`
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
    const normalized = value?.trim().toLowerCase();
    return isLogLevel(normalized) ? normalized : fallback;
}

export interface LoggerOptions {
    service: string;
    level?: LogLevel;
    pretty?: boolean;
}

export interface LoggerLike {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, context?: LogContext): void;
}

export class Logger implements LoggerLike {
    private service: string;
    private minLevel: number;
    private pretty: boolean;

    constructor(options: LoggerOptions) {
        this.service = options.service;
        this.minLevel = LOG_LEVELS[options.level ?? 'info'];
        this.pretty = options.pretty ?? process.env.NODE_ENV !== 'production';
    }

    isLevelEnabled(level: LogLevel): boolean {
        return LOG_LEVELS[level] >= this.minLevel;
    }

    private log(level: LogLevel, message: string, context?: LogContext): void {
        if (!this.isLevelEnabled(level)) return;

        const entry: LogEntry = {
            ...context,
            timestamp: new Date().toISOString(),
            level,
            service: this.service,
            message,
        };

        const output = this.pretty
            ? this.formatPretty(entry)
            : JSON.stringify(entry);

        if (level === 'error') {
            console.error(output);
        } else if (level === 'warn') {
            console.warn(output);
        } else {
            console.log(output);
        }
    }

    private formatPretty(entry: LogEntry): string {
        const levelColors: Record<LogLevel, string> = {
            debug: '\x1b[90m',
            info: '\x1b[36m',
            warn: '\x1b[33m',
            error: '\x1b[31m',
        };
        const reset = '\x1b[0m';
        const color = levelColors[entry.level];

        const time = entry.timestamp.substring(11, 23);
        const ctx = Object.entries(entry)
            .filter(([k]) => !RESERVED_KEYS.includes(k))
            .map(([k, v]) => `${k}=${typeof v === 'object' ? JSON.stringify(v) : String(v)}`)
            .join(' ');

        return `${color}[${time}]${reset} ${color}${entry.level.toUpperCase().padEnd(5)}${reset} [${entry.service}] ${entry.message}${ctx ? ' ' + ctx : ''}`;
    }

    debug(message: string, context?: LogContext): void {
        this.log('debug', message, context);
    }

    info(message: string, context?: LogContext): void {
        this.log('info', message, context);
    }

    warn(message: string, context?: LogContext): void {
        this.log('warn', message, context);
    }

    error(message: string, context?: LogContext): void {
        this.log('error', message, context);
    }

    child(context: LogContext): ChildLogger {
        return new ChildLogger(this, context);
    }
}

export class ChildLogger implements LoggerLike {
    constructor(
        private parent: LoggerLike,
        private context: LogContext
    ) { }

    debug(message: string, ctx?: LogContext): void {
        this.parent.debug(message, { ...this.context, ...ctx });
    }

    info(message: string, ctx?: LogContext): void {
        this.parent.info(message, { ...this.context, ...ctx });
    }

    warn(message: string, ctx?: LogContext): void {
        this.parent.warn(message, { ...this.context, ...ctx });
    }

    error(message: string, ctx?: LogContext): void {
        this.parent.error(message, { ...this.context, ...ctx });
    }

    child(context: LogContext): ChildLogger {
        return new ChildLogger(this, context);
    }
}

// Factory function
export function createLogger(service: string, level?: LogLevel): Logger {
    return new Logger({
        service,
        level: level ?? parseLogLevel(process.env.LOG_LEVEL),
        pretty: process.env.NODE_ENV !== 'production',
    });
}
