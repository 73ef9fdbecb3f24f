/**
 * Logger - Structured logging for questline
 *
 * Features:
 * - Log levels (debug, info, warn, error)
 * - Environment-based log level control (QUEST_LOG_LEVEL)
 * - Module prefixes for easy filtering
 * - Silent mode for tests
 * - Output goes to stderr so host processes keep stdout to themselves
 *
 * Usage:
 *   import { createLogger } from '../utils/logger.js';
 *   const log = createLogger('QuestManager');
 *
 *   log.debug('Registered quest One');  // Only shown when QUEST_LOG_LEVEL=debug
 *   log.info('Quest One finished by alice');
 *
 * Environment:
 *   QUEST_LOG_LEVEL=debug|info|warn|error|silent (default: info)
 *   NODE_ENV=test automatically sets silent
 */

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export interface Logger {
    debug(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;

    /** Create a child logger with additional prefix */
    child(prefix: string): Logger;

    /** Check if a log level is enabled */
    isEnabled(level: LogLevel): boolean;
}

// ═══════════════════════════════════════════════════════════════════════════
// LOG LEVEL CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4
};

export function isLogLevel(value: string): value is LogLevel {
    return value in LOG_LEVEL_PRIORITY;
}

/**
 * Get the configured log level from environment
 * - QUEST_LOG_LEVEL takes priority
 * - NODE_ENV=test defaults to silent
 * - Otherwise defaults to info
 */
function getConfiguredLevel(): LogLevel {
    const envLevel = process.env.QUEST_LOG_LEVEL?.toLowerCase();

    if (envLevel && isLogLevel(envLevel)) {
        return envLevel;
    }

    if (process.env.NODE_ENV === 'test') {
        return 'silent';
    }

    return 'info';
}

let configuredLevel: LogLevel | null = null;

function getLevel(): LogLevel {
    if (configuredLevel === null) {
        configuredLevel = getConfiguredLevel();
    }
    return configuredLevel;
}

/**
 * Reset the cached level so the environment is read again
 */
export function resetLogLevel(): void {
    configuredLevel = null;
}

/**
 * Override the log level programmatically
 */
export function setLogLevel(level: LogLevel): void {
    configuredLevel = level;
}

// ═══════════════════════════════════════════════════════════════════════════
// LOGGER IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════

class StderrLogger implements Logger {
    constructor(private readonly prefix: string) { }

    isEnabled(level: LogLevel): boolean {
        if (level === 'silent') return false;
        return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[getLevel()];
    }

    private write(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
        if (!this.isEnabled(level)) return;
        const timestamp = new Date().toISOString().slice(11, 23); // HH:mm:ss.SSS
        const levelTag = level.toUpperCase().padEnd(5);
        console.error(`[${timestamp}] [${levelTag}] [${this.prefix}] ${message}`, ...args);
    }

    debug(message: string, ...args: unknown[]): void {
        this.write('debug', message, args);
    }

    info(message: string, ...args: unknown[]): void {
        this.write('info', message, args);
    }

    warn(message: string, ...args: unknown[]): void {
        this.write('warn', message, args);
    }

    error(message: string, ...args: unknown[]): void {
        this.write('error', message, args);
    }

    child(prefix: string): Logger {
        return new StderrLogger(`${this.prefix}:${prefix}`);
    }
}

// ═══════════════════════════════════════════════════════════════════════════
// FACTORY
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Create a logger instance with the given module prefix
 *
 * @example
 * const log = createLogger('Store');
 * log.info('Saved current progress');
 * // Output: [12:34:56.789] [INFO ] [Store] Saved current progress
 *
 * const fileLog = log.child('File');
 * fileLog.debug('Renaming temp file');
 * // Output: [12:34:56.790] [DEBUG] [Store:File] Renaming temp file
 */
export function createLogger(prefix: string): Logger {
    return new StderrLogger(prefix);
}

// ═══════════════════════════════════════════════════════════════════════════
// UTILITIES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Create a timer for performance logging
 *
 * @example
 * const timer = createTimer(log);
 * // ... do work ...
 * timer.done('Saved progress'); // Logs with duration at debug level
 */
export function createTimer(logger: Logger): { done: (message: string) => void } {
    const start = performance.now();
    return {
        done(message: string): void {
            const duration = performance.now() - start;
            logger.debug(`${message} (${duration.toFixed(2)}ms)`);
        }
    };
}

/**
 * Safely extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    if (typeof error === 'string') {
        return error;
    }
    return String(error);
}

/**
 * Log an error with stack trace if available
 */
export function logError(logger: Logger, message: string, error: unknown): void {
    logger.error(`${message}: ${getErrorMessage(error)}`);

    if (error instanceof Error && error.stack && logger.isEnabled('debug')) {
        logger.debug(`Stack trace:\n${error.stack}`);
    }
}
