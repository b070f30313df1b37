import type { Log, LogLevel } from '@/types/log';

export interface Logger {
    debug(...data: unknown[]): void;
    info(...data: unknown[]): void;
    warn(...data: unknown[]): void;
    error(...data: unknown[]): void;
    child(scope: string): Logger;
}

export type LogSink = (log: Log) => void;

export interface LoggerOptions {
    level?: LogLevel;
    sink?: LogSink;         // e.g. the session's log slice
    echo?: boolean;         // also write to the console (default true)
}

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export const isLogLevel = (v: unknown): v is LogLevel =>
    typeof v === 'string' && Object.prototype.hasOwnProperty.call(LEVELS, v);

/**
 * Scoped console logger. Every entry at or above `level` is printed with a
 * `[scope]` prefix and handed to the sink.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
    const { level = 'info', sink, echo = true } = options;
    const threshold = LEVELS[level];

    const emit = (method: LogLevel) => (...data: unknown[]) => {
        if (LEVELS[method] < threshold) return;
        if (echo) console[method](`[${scope}]`, ...data);
        sink?.({ method, scope, data, date: new Date().toISOString() });
    };

    return {
        debug: emit('debug'),
        info: emit('info'),
        warn: emit('warn'),
        error: emit('error'),
        child: (sub: string) => createLogger(`${scope}:${sub}`, options),
    };
}
