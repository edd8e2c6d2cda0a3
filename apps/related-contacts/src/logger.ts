/**
 * @fileoverview Stderr logger
 *
 * stdout carries the JSON feed, so every log line goes to stderr.
 * The threshold comes from LOG_LEVEL (debug, info, warn, error; default info).
 *
 * @module logger
 */

import type { FeedLogger } from "@relatedfeed/engine";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function parseLogLevel(value: string | undefined, fallback: LogLevel = "info"): LogLevel {
    const normalized = value?.trim().toLowerCase();
    return LEVELS.find((level) => level === normalized) ?? fallback;
}

/**
 * Create a FeedLogger writing `[LEVEL] message {data}` lines to stderr.
 */
export function createStderrLogger(threshold: LogLevel = "info"): FeedLogger {
    const minimum = LEVELS.indexOf(threshold);

    const log = (level: LogLevel) => (message: string, data?: Record<string, unknown>): void => {
        if (LEVELS.indexOf(level) < minimum) {
            return;
        }
        console.error(`[${level.toUpperCase()}] ${message}`, data ?? "");
    };

    return {
        debug: log("debug"),
        info : log("info"),
        warn : log("warn"),
        error: log("error"),
    };
}
