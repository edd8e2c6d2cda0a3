/**
 * @fileoverview Feed application wiring
 *
 * Builds the batch processor over the SQLite directory and runs one
 * request into a JSON writer. Kept apart from the entry point so it can
 * be driven by tests.
 *
 * @module feed
 */

import {
    BasicProfileFormatter,
    JsonRecordWriter,
    RelatedContactsAssembler,
    RelatedContactsBatchProcessor,
    PARAM_ITEMS_PER_PAGE,
    type AssemblyOutcome,
    type EventBus,
    type FeedLogger,
    type FeedRequest,
    type RandomSource,
    type TextSink,
} from "@relatedfeed/engine";
import type { DirectoryDatabase } from "./adapters/sqlite/directory-db.js";
import type { FeedConfig } from "./config/loadFeedConfig.js";
import {
    SqliteConnectionService,
    SqliteDirectoryService,
    SqliteSearchSource,
} from "./domain/providers/index.js";

export const USAGE = "Usage: related-contacts <requesterId> [--items N] [--seed-demo]";

/**
 * Parsed command line
 */
export interface CliOptions {
    requesterId: string;

    /** Raw page size, validated by the processor */
    items?: string;

    /** Load the demo directory before running */
    seedDemo: boolean;
}

/**
 * Raised for malformed command lines
 */
export class UsageError extends Error {
    constructor(message: string) {
        super(`${message}\n${USAGE}`);
        this.name = "UsageError";
    }
}

/**
 * Parse CLI arguments (without the node and script entries).
 *
 * @throws UsageError on a missing requester, a missing --items value or
 * an unknown flag
 */
export function parseCliArgs(args: readonly string[]): CliOptions {
    let requesterId: string | undefined;
    let items: string | undefined;
    let seedDemo = false;

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];

        if (arg === "--seed-demo") {
            seedDemo = true;
        }
        else if (arg === "--items") {
            const value = args[i + 1];
            if (value === undefined || value.startsWith("--")) {
                throw new UsageError("--items needs a value");
            }
            items = value;
            i++;
        }
        else if (arg.startsWith("--items=")) {
            items = arg.slice("--items=".length);
        }
        else if (arg.startsWith("--")) {
            throw new UsageError(`Unknown option: ${arg}`);
        }
        else if (requesterId === undefined) {
            requesterId = arg;
        }
        else {
            throw new UsageError(`Unexpected argument: ${arg}`);
        }
    }

    if (!requesterId) {
        throw new UsageError("Missing requester id");
    }

    return { requesterId, items, seedDemo };
}

/**
 * Turn parsed CLI options into a feed request.
 */
export function toFeedRequest(options: CliOptions): FeedRequest {
    return {
        requesterId: options.requesterId,
        parameters : { [PARAM_ITEMS_PER_PAGE]: options.items },
    };
}

export interface FeedAppOptions {
    config: FeedConfig;
    db: DirectoryDatabase;
    logger?: FeedLogger;
    eventBus?: EventBus;
    random?: RandomSource;
}

/**
 * Wired application components
 */
export interface FeedApp {
    readonly assembler: RelatedContactsAssembler;
    readonly processor: RelatedContactsBatchProcessor;
}

export function createFeedApp(options: FeedAppOptions): FeedApp {
    const directory = new SqliteDirectoryService(options.db);

    const assembler = new RelatedContactsAssembler({
        directory,
        formatter        : new BasicProfileFormatter(),
        minimumAcceptable: options.config.feed.minimumAcceptable,
        random           : options.random,
        eventBus         : options.eventBus,
        logger           : options.logger,
    });

    const processor = new RelatedContactsBatchProcessor({
        searchSource       : new SqliteSearchSource(options.db),
        connections        : new SqliteConnectionService(options.db),
        assembler,
        defaultItemsPerPage: options.config.feed.itemsPerPage,
    });

    return { assembler, processor };
}

/**
 * Run one request, streaming the JSON document to `out`.
 *
 * The document is closed only when the run returns; a failed run leaves
 * it unterminated.
 */
export async function runFeed(app: FeedApp, request: FeedRequest, out: TextSink): Promise<AssemblyOutcome> {
    const writer = new JsonRecordWriter(out, app.processor.itemsPerPage(request));
    writer.open();

    const outcome = await app.processor.process(request, writer);
    writer.close();

    return outcome;
}
