/**
 * @fileoverview Feed Configuration Loader
 *
 * Loads page-size, shortfall and database settings from a YAML file.
 *
 * @module config/loadFeedConfig
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { DEFAULT_ITEMS_PER_PAGE, DEFAULT_MINIMUM_ACCEPTABLE } from "@relatedfeed/engine";

/**
 * Resolved application configuration
 */
export interface FeedConfig {
    feed: {
        /** Page size used when a request does not set one */
        itemsPerPage: number;

        /** Runs with fewer records log a shortfall */
        minimumAcceptable: number;
    };
    database: {
        /** SQLite file, relative paths resolve against the working directory */
        path: string;
    };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readPositiveInt(section: Record<string, unknown>, key: string, fallback: number): number {
    const value = section[key];
    if (value === undefined) {
        return fallback;
    }
    if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
        throw new Error(`Invalid config value for '${key}': expected a positive integer`);
    }
    return value;
}

/**
 * Load the feed configuration from a YAML file.
 *
 * Missing keys take their defaults; keys that are present must be valid.
 *
 * @throws Error if the file doesn't exist or is invalid
 *
 * @example
 * ```typescript
 * const config = loadFeedConfig("./config/feed.yml");
 * console.log(config.feed.itemsPerPage); // 25
 * ```
 */
export function loadFeedConfig(filePath: string): FeedConfig {
    if (!existsSync(filePath)) {
        throw new Error(`Feed config file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    const parsed: unknown = parseYaml(content);

    if (!isRecord(parsed)) {
        throw new Error("Invalid feed config format: expected a mapping");
    }

    const defaults = getDefaultConfig();
    const feed = parsed.feed ?? {};
    const database = parsed.database ?? {};

    if (!isRecord(feed)) {
        throw new Error("Invalid feed config format: 'feed' must be a mapping");
    }
    if (!isRecord(database)) {
        throw new Error("Invalid feed config format: 'database' must be a mapping");
    }

    const dbPath = database.path ?? defaults.database.path;
    if (typeof dbPath !== "string" || dbPath.length === 0) {
        throw new Error("Invalid config value for 'path': expected a non-empty string");
    }

    return {
        feed: {
            itemsPerPage     : readPositiveInt(feed, "itemsPerPage", defaults.feed.itemsPerPage),
            minimumAcceptable: readPositiveInt(feed, "minimumAcceptable", defaults.feed.minimumAcceptable),
        },
        database: {
            path: dbPath,
        },
    };
}

/**
 * Load the feed configuration, falling back to defaults on any error.
 */
export function loadFeedConfigWithFallback(filePath: string): FeedConfig {
    try {
        return loadFeedConfig(filePath);
    }
    catch (error) {
        console.warn(`Failed to load feed config from ${filePath}:`, error);
        return getDefaultConfig();
    }
}

/**
 * Get the default configuration.
 */
export function getDefaultConfig(): FeedConfig {
    return {
        feed: {
            itemsPerPage     : DEFAULT_ITEMS_PER_PAGE,
            minimumAcceptable: DEFAULT_MINIMUM_ACCEPTABLE,
        },
        database: {
            path: "./data/directory.db",
        },
    };
}
