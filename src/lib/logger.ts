/**
 * Logger interface for graph run observability.
 * Callers can plug in their own logger (e.g., pino, winston, console).
 */
export interface Logger {
    debug(message: string, meta?: Record<string, unknown>): void;
    info(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Default no-op logger (silent)
 */
export const noopLogger: Logger = {
    debug: () => { },
    info: () => { },
    warn: () => { },
    error: () => { },
};

/**
 * Console logger for development/debugging
 */
export const consoleLogger: Logger = {
    debug: (msg, meta) => console.debug(`[Graph:DEBUG] ${msg}`, meta ?? ''),
    info: (msg, meta) => console.info(`[Graph:INFO] ${msg}`, meta ?? ''),
    warn: (msg, meta) => console.warn(`[Graph:WARN] ${msg}`, meta ?? ''),
    error: (msg, meta) => console.error(`[Graph:ERROR] ${msg}`, meta ?? ''),
};

/**
 * Log levels for filtering
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

type LogMethod = Exclude<LogLevel, 'silent'>;

/**
 * Creates a filtered logger that only logs messages at or above the specified level
 */
export function createFilteredLogger(baseLogger: Logger, level: LogLevel): Logger {
    const minPriority = LOG_LEVEL_PRIORITY[level];
    const gate = (method: LogMethod) => (msg: string, meta?: Record<string, unknown>) => {
        if (LOG_LEVEL_PRIORITY[method] >= minPriority) {
            baseLogger[method](msg, meta);
        }
    };

    return {
        debug: gate('debug'),
        info: gate('info'),
        warn: gate('warn'),
        error: gate('error'),
    };
}

/**
 * Logger that merges fixed fields (graph name, thread) into every entry.
 */
export function createChildLogger(baseLogger: Logger, bindings: Record<string, unknown>): Logger {
    const bind = (method: LogMethod) => (msg: string, meta?: Record<string, unknown>) => {
        baseLogger[method](msg, { ...bindings, ...meta });
    };

    return {
        debug: bind('debug'),
        info: bind('info'),
        warn: bind('warn'),
        error: bind('error'),
    };
}
