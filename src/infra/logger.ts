import { mkdirSync, existsSync, appendFileSync } from 'fs';
import { join } from 'path';
import { env } from '../config/env.js';

const EVENTS_LOG_FILE = join(env.LOG_DIR, 'events.jsonl');

// Ensure logs directory exists
function ensureLogsDir() {
    if (!existsSync(env.LOG_DIR)) {
        mkdirSync(env.LOG_DIR, { recursive: true });
    }
}

// Only touch the filesystem when file logging is on
if (env.LOG_TO_FILE) {
    ensureLogsDir();
}

/**
 * Supported log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log event structure (one JSONL line)
 */
export interface LogEvent {
    timestamp: string;
    type: string;
    level: LogLevel;
    payload: unknown;
}

/**
 * Scoped logger: every event type is prefixed with the scope
 */
export interface Logger {
    debug(type: string, payload?: unknown): void;
    info(type: string, payload?: unknown): void;
    warn(type: string, payload?: unknown): void;
    error(type: string, payload?: unknown): void;
    child(scope: string): Logger;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
    debug: '\x1b[36m', // Cyan
    info: '\x1b[32m',  // Green
    warn: '\x1b[33m',  // Yellow
    error: '\x1b[31m', // Red
};
const RESET = '\x1b[0m';

function shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[env.LOG_LEVEL];
}

/**
 * Logs an event to the console and, when enabled, to logs/events.jsonl
 * @param type - Dotted event type, e.g. `poller.fetch.changed`
 * @param payload - Event data
 * @param level - Log level (default: 'info')
 */
export function logEvent(type: string, payload: unknown, level: LogLevel = 'info'): void {
    if (!shouldLog(level)) {
        return;
    }

    const event: LogEvent = {
        timestamp: new Date().toISOString(),
        type,
        level,
        payload,
    };

    const header = `${LEVEL_COLORS[level]}[${event.timestamp}] [${level.toUpperCase()}] [${type}]${RESET}`;
    const body = payload === undefined
        ? ''
        : typeof payload === 'object' ? JSON.stringify(payload, null, 2) : String(payload);

    // warn/error go to stderr so stdout stays usable for script output
    if (level === 'warn' || level === 'error') {
        console.error(header, body);
    } else {
        console.log(header, body);
    }

    if (env.LOG_TO_FILE) {
        try {
            appendFileSync(EVENTS_LOG_FILE, JSON.stringify(event) + '\n', 'utf-8');
        } catch (error) {
            console.error('Failed to write to log file:', error);
        }
    }
}

/**
 * Normalize an unknown thrown value for a log payload
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Create a logger whose event types are prefixed with `scope.`
 */
export function createLogger(scope?: string): Logger {
    const prefix = (type: string) => (scope ? `${scope}.${type}` : type);

    return {
        debug: (type, payload) => logEvent(prefix(type), payload, 'debug'),
        info: (type, payload) => logEvent(prefix(type), payload, 'info'),
        warn: (type, payload) => logEvent(prefix(type), payload, 'warn'),
        error: (type, payload) => logEvent(prefix(type), payload, 'error'),
        child: (child) => createLogger(scope ? `${scope}.${child}` : child),
    };
}

/**
 * Root application logger
 */
export const logger = createLogger();
