/**
 * Stderr logging.  stdout carries the MCP JSON-RPC stream, so nothing
 * here may ever write to it.
 */

export type LogLevel = 'debug' | 'info' | 'warning' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warning: 30, error: 40 };
const PREFIX = '[docx-field-filler]';

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

export function getLogLevel(): LogLevel {
    return threshold;
}

export function isLogLevel(value: string): value is LogLevel {
    return value in LEVEL_ORDER;
}

/**
 * Write one log line to stderr: `[docx-field-filler] LEVEL message {data}`.
 */
export function logToStderr(level: LogLevel, message: string, data?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

    let line = `${PREFIX} ${level.toUpperCase()} ${message}`;
    if (data !== undefined) line += ` ${formatData(data)}`;
    process.stderr.write(line + '\n');
}

function formatData(data: unknown): string {
    if (data instanceof Error) return data.message;
    if (typeof data === 'string') return data;
    try {
        return JSON.stringify(data);
    } catch {
        return String(data);
    }
}

export const logger = {
    debug: (message: string, data?: unknown) => logToStderr('debug', message, data),
    info: (message: string, data?: unknown) => logToStderr('info', message, data),
    warning: (message: string, data?: unknown) => logToStderr('warning', message, data),
    error: (message: string, data?: unknown) => logToStderr('error', message, data),
};
