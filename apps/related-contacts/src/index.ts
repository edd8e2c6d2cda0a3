/**
 * @fileoverview Related Contacts - Main Entry Point
 *
 * Assembles one related-contacts feed for a requester from the SQLite
 * directory and writes it to stdout as JSON. Logs go to stderr.
 *
 * Environment:
 * - FEED_CONFIG   overrides the config file (default: ../config/feed.yml)
 * - FEED_DB_PATH  overrides database.path from the config
 * - LOG_LEVEL     debug | info | warn | error
 *
 * @module related-contacts
 */

// Load .env before anything reads the environment
import "dotenv/config";

import { join, dirname } from "path";
import { fileURLToPath } from "url";

import { FeedError, describeError } from "@relatedfeed/engine";

import { DirectoryDatabase } from "./adapters/sqlite/index.js";
import { loadFeedConfigWithFallback } from "./config/index.js";
import { loadDirectoryFixture, seedDirectory } from "./domain/index.js";
import {
    createFeedApp,
    parseCliArgs,
    runFeed,
    toFeedRequest,
    UsageError,
    type CliOptions,
} from "./feed.js";
import { createStderrLogger, parseLogLevel } from "./logger.js";

// Get directory of this file
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Main entry point
 */
async function main(): Promise<void> {
    let options: CliOptions;
    try {
        options = parseCliArgs(process.argv.slice(2));
    }
    catch (error) {
        if (error instanceof UsageError) {
            console.error(error.message);
            process.exitCode = 1;
            return;
        }
        throw error;
    }

    const logger = createStderrLogger(parseLogLevel(process.env.LOG_LEVEL));

    const configPath = process.env.FEED_CONFIG ?? join(__dirname, "..", "config", "feed.yml");
    const config = loadFeedConfigWithFallback(configPath);
    const dbPath = process.env.FEED_DB_PATH ?? config.database.path;

    const db = new DirectoryDatabase(dbPath, { create: options.seedDemo });

    try {
        if (options.seedDemo) {
            const fixture = loadDirectoryFixture(join(__dirname, "..", "data", "demo-directory.json"));
            seedDirectory(db, fixture);
            logger.info(`Seeded ${fixture.users.length} demo users into ${dbPath}`);
        }

        const app = createFeedApp({ config, db, logger });

        // Subscribe to feed events for observability
        app.assembler.eventBus.subscribe("feed:accessDenied", (event) => {
            logger.warn("[FEED] Access denied, returning partial feed", event.data);
        });

        app.assembler.eventBus.subscribe("feed:completed", (event) => {
            logger.info("[FEED] Completed", event.data);
        });

        await runFeed(app, toFeedRequest(options), process.stdout);
    }
    catch (error) {
        if (error instanceof FeedError) {
            logger.error(`[FATAL] ${error.name}: ${error.message}`, {
                cause: error.cause === undefined ? undefined : describeError(error.cause),
            });
        }
        else {
            logger.error(`[FATAL] ${describeError(error)}`);
        }
        process.exitCode = 1;
    }
    finally {
        db.close();
    }
}

// Run if this is the main module
main().catch(console.error);
