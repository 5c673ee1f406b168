/**
 * Structured logger
 *
 * - pretty, coloured lines in development; one JSON object per line in production
 * - levels debug < info < warn < error, threshold from LOG_LEVEL
 * - child loggers merge their context into every entry
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
    [key: string]: unknown;
}

interface LogEntry {
    level: LogLevel;
    message: string;
    timestamp: string;
    service: string;
    context?: LogContext;
    error?: {
        name: string;
        message: string;
        stack?: string;
    };
}

export interface Logger {
    debug(message: string, context?: LogContext): void;
    info(message: string, context?: LogContext): void;
    warn(message: string, context?: LogContext): void;
    error(message: string, error?: unknown, context?: LogContext): void;
    child(context: LogContext): Logger;
}

export interface LoggerOptions {
    level?: LogLevel;
    format?: 'pretty' | 'json';
    service?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const COLORS = {
    reset: '\x1b[0m',
    dim: '\x1b[2m',
    red: '\x1b[31m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
    cyan: '\x1b[36m',
    gray: '\x1b[90m',
};

const LEVEL_COLORS: Record<LogLevel, string> = {
    debug: COLORS.gray,
    info: COLORS.blue,
    warn: COLORS.yellow,
    error: COLORS.red,
};

function isLogLevel(value: string | undefined): value is LogLevel {
    return value !== undefined && value in LEVEL_ORDER;
}

function formatPretty(entry: LogEntry): string {
    const color = LEVEL_COLORS[entry.level];
    const level = entry.level.toUpperCase().padEnd(5);
    let output = `${COLORS.dim}${entry.timestamp}${COLORS.reset} ${color}${level}${COLORS.reset} ${entry.message}`;

    if (entry.context) {
        const contextStr = Object.entries(entry.context)
            .map(([k, v]) => `${COLORS.cyan}${k}${COLORS.reset}=${JSON.stringify(v)}`)
            .join(' ');
        output += ` ${COLORS.dim}[${contextStr}]${COLORS.reset}`;
    }

    if (entry.error) {
        output += `\n  ${COLORS.red}${entry.error.name}: ${entry.error.message}${COLORS.reset}`;
        if (entry.error.stack) {
            const stackLines = entry.error.stack.split('\n').slice(1, 5);
            output += `\n  ${COLORS.gray}${stackLines.join('\n  ')}${COLORS.reset}`;
        }
    }
    return output;
}

function serializeError(error: unknown, withStack: boolean): LogEntry['error'] {
    if (error instanceof Error) {
        return { name: error.name, message: error.message, stack: withStack ? error.stack : undefined };
    }
    return { name: 'Error', message: String(error) };
}

export function createLogger(options: LoggerOptions = {}, baseContext: LogContext = {}): Logger {
    const envLevel = process.env.LOG_LEVEL;
    const threshold = options.level ?? (isLogLevel(envLevel) ? envLevel : 'info');
    const format = options.format ?? (process.env.NODE_ENV === 'production' ? 'json' : 'pretty');
    const service = options.service ?? 'omr-annotate';

    const log = (level: LogLevel, message: string, error?: unknown, context?: LogContext): void => {
        if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

        const merged = Object.fromEntries(
            Object.entries({ ...baseContext, ...context }).filter(([, v]) => v !== undefined)
        );
        const entry: LogEntry = {
            level,
            message,
            timestamp: new Date().toISOString(),
            service,
            context: Object.keys(merged).length > 0 ? merged : undefined,
        };
        if (error !== undefined) {
            // stack traces only at debug level
            entry.error = serializeError(error, threshold === 'debug');
        }

        const output = format === 'json' ? JSON.stringify(entry) : formatPretty(entry);
        switch (level) {
            case 'debug':
                console.debug(output);
                break;
            case 'info':
                console.info(output);
                break;
            case 'warn':
                console.warn(output);
                break;
            case 'error':
                console.error(output);
                break;
        }
    };

    return {
        debug: (message, context) => log('debug', message, undefined, context),
        info: (message, context) => log('info', message, undefined, context),
        warn: (message, context) => log('warn', message, undefined, context),
        error: (message, error, context) => log('error', message, error, context),
        child: (context) => createLogger({ level: threshold, format, service }, { ...baseContext, ...context }),
    };
}

export const logger = createLogger();

export default logger;
