export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Log {
    method: LogLevel;
    scope: string;
    data: unknown[];
    date?: string;
}

export interface ConsoleLogState {
    logs: Log[];
}
