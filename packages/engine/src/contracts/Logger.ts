/**
 * @fileoverview Logger contract
 *
 * @module @relatedfeed/engine/contracts/Logger
 */

/**
 * Logger interface used throughout the engine.
 */
export interface FeedLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Default console logger.
 */
export const consoleLogger: FeedLogger = {
    debug: (msg, data) => console.debug(`[DEBUG] ${msg}`, data ?? ""),
    info : (msg, data) => console.info(`[INFO] ${msg}`, data ?? ""),
    warn : (msg, data) => console.warn(`[WARN] ${msg}`, data ?? ""),
    error: (msg, data) => console.error(`[ERROR] ${msg}`, data ?? ""),
};

/**
 * Logger that discards everything.
 */
export const silentLogger: FeedLogger = {
    debug: () => {},
    info : () => {},
    warn : () => {},
    error: () => {},
};

/**
 * Wrap a logger so every line carries a component scope and trace id.
 *
 * @param base - Logger to delegate to
 * @param scope - Component name, e.g. "primary"
 * @param traceId - Run trace id
 */
export function createScopedLogger(base: FeedLogger, scope: string, traceId: string): FeedLogger {
    const prefix = `[related-contacts:${scope}]`;
    return {
        debug: (msg, data) => base.debug(`${prefix} ${msg}`, { ...data, traceId }),
        info : (msg, data) => base.info(`${prefix} ${msg}`, { ...data, traceId }),
        warn : (msg, data) => base.warn(`${prefix} ${msg}`, { ...data, traceId }),
        error: (msg, data) => base.error(`${prefix} ${msg}`, { ...data, traceId }),
    };
}
