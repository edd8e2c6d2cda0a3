/**
 * @fileoverview End-to-end tests for the feed application
 *
 * Wires the processor to an in-memory SQLite directory and checks the
 * JSON document written for a request.
 *
 * @module __tests__/feed
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { InMemoryEventBus, silentLogger, type EventPayload, type TextSink } from "@relatedfeed/engine";
import { DirectoryDatabase } from "../adapters/sqlite/directory-db.js";
import { seedDirectory } from "../domain/seed/directoryFixture.js";
import type { FeedConfig } from "../config/loadFeedConfig.js";
import {
    createFeedApp,
    parseCliArgs,
    runFeed,
    toFeedRequest,
    UsageError,
    USAGE,
} from "../feed.js";
import { SMALL_DIRECTORY } from "./fixtures.js";

class StringSink implements TextSink {
    text = "";

    write(chunk: string): boolean {
        this.text += chunk;
        return true;
    }
}

const CONFIG: FeedConfig = {
    feed    : { itemsPerPage: 25, minimumAcceptable: 3 },
    database: { path: ":memory:" },
};

describe("parseCliArgs", () => {
    it("should read the requester and flags", () => {
        expect(parseCliArgs(["alice", "--items", "5", "--seed-demo"])).toEqual({
            requesterId: "alice",
            items      : "5",
            seedDemo   : true,
        });
        expect(parseCliArgs(["--items=7", "bob"])).toEqual({
            requesterId: "bob",
            items      : "7",
            seedDemo   : false,
        });
    });

    it("should leave items unset when not given", () => {
        expect(parseCliArgs(["alice"])).toEqual({ requesterId: "alice", items: undefined, seedDemo: false });
    });

    it.each([
        [[], "Missing requester id"],
        [["alice", "--items"], "--items needs a value"],
        [["alice", "--items", "--seed-demo"], "--items needs a value"],
        [["alice", "--verbose"], "Unknown option: --verbose"],
        [["alice", "bob"], "Unexpected argument: bob"],
    ])("should reject %j", (args, message) => {
        expect(() => parseCliArgs(args)).toThrow(new UsageError(message));
        expect(() => parseCliArgs(args)).toThrow(`${message}\n${USAGE}`);
    });
});

describe("toFeedRequest", () => {
    it("should pass items through as the page size parameter", () => {
        expect(toFeedRequest({ requesterId: "alice", items: "4", seedDemo: false })).toEqual({
            requesterId: "alice",
            parameters : { items: "4" },
        });
    });
});

describe("runFeed", () => {
    let db: DirectoryDatabase;

    beforeEach(() => {
        db = new DirectoryDatabase(":memory:");
        seedDirectory(db, SMALL_DIRECTORY);
    });

    afterEach(() => {
        db.close();
    });

    // Scenario: Search results first, then club members to fill the page
    it("should write search matches followed by group co-members", async () => {
        const app = createFeedApp({ config: CONFIG, db, logger: silentLogger, random: () => 0 });
        const sink = new StringSink();

        const outcome = await runFeed(app, { requesterId: "alice", parameters: { items: "4" } }, sink);

        expect(outcome.records.map((r) => r.target)).toEqual(["dave", "erin", "gina", "frank"]);
        expect(outcome.status).toEqual({ kind: "complete" });
        expect(outcome.lastPhase).toBe("CONSUMING_FALLBACK");
        expect(sink.text).toBe(
            '{"items":4,"results":[' +
            '{"target":"dave","profile":{"userid":"dave","firstName":"Dave"}},' +
            '{"target":"erin","profile":{"userid":"erin","firstName":"Erin"}},' +
            '{"target":"gina","profile":{"userid":"gina","firstName":"Gina","preferredName":"G"}},' +
            '{"target":"frank","profile":{"userid":"frank","firstName":"Frank"}}' +
            '],"total":4}\n'
        );
    });

    // Scenario: Page filled by the search section alone
    it("should stop at the requested page size", async () => {
        const app = createFeedApp({ config: CONFIG, db, logger: silentLogger });
        const sink = new StringSink();

        const outcome = await runFeed(app, { requesterId: "alice", parameters: { items: "1" } }, sink);

        expect(outcome.records.map((r) => r.target)).toEqual(["dave"]);
        expect(JSON.parse(sink.text)).toEqual({
            items  : 1,
            results: [{ target: "dave", profile: { userid: "dave", firstName: "Dave" } }],
            total  : 1,
        });
    });

    // Scenario: No page size falls back to the configured default
    it("should use the configured page size by default", async () => {
        const app = createFeedApp({ config: CONFIG, db, logger: silentLogger });
        const sink = new StringSink();

        const outcome = await runFeed(app, { requesterId: "alice", parameters: {} }, sink);

        // dave, erin, then both remaining club members; the directory has no more
        expect(outcome.records).toHaveLength(4);
        expect(sink.text.startsWith('{"items":25,"results":[')).toBe(true);
        expect(outcome.shortfall).toBe(false);
    });

    // Scenario: Events reach subscribers on a supplied bus
    it("should publish events on the supplied bus", async () => {
        const eventBus = new InMemoryEventBus();
        const completed: EventPayload[] = [];
        eventBus.subscribe("feed:completed", (event) => completed.push(event));
        const app = createFeedApp({ config: CONFIG, db, logger: silentLogger, eventBus });

        await runFeed(app, { requesterId: "bob", parameters: { items: "2" } }, new StringSink());

        expect(completed).toHaveLength(1);
        expect(completed[0].data).toEqual({ records: 0, status: "complete", lastPhase: "CONSUMING_FALLBACK" });
    });

    // Scenario: Unknown requester fails the run and leaves the document open
    it("should reject with FeedAssemblyError for an unknown requester", async () => {
        const app = createFeedApp({ config: CONFIG, db, logger: silentLogger });
        const sink = new StringSink();

        await expect(runFeed(app, { requesterId: "nobody", parameters: {} }, sink))
            .rejects.toThrow("Related contacts assembly failed for nobody: Requester not found in directory: nobody");
        expect(sink.text).toBe('{"items":25,"results":[');
    });
});
