/**
 * @fileoverview Unit tests for FallbackCandidateCollector
 *
 * @module @relatedfeed/engine/__tests__/FallbackCandidateCollector
 */

import { describe, it, expect, vi } from "vitest";
import { FallbackCandidateCollector } from "../engine/FallbackCandidateCollector.js";
import { EntityRenderer } from "../engine/EntityRenderer.js";
import { DedupLedger } from "../engine/DedupLedger.js";
import type { RandomSource } from "../engine/shuffle.js";
import { InMemoryDirectoryService } from "../impl/InMemoryDirectoryService.js";
import { BasicProfileFormatter } from "../impl/BasicProfileFormatter.js";
import { CollectingRecordWriter } from "../impl/JsonRecordWriter.js";
import type { Authorizable } from "../contracts/Authorizable.js";
import { AuthorizationDeniedError, RequesterNotFoundError } from "../contracts/errors.js";
import { createMockLogger, group, ids, seededRandom, user } from "./helpers.js";

function setup(authorizables: Authorizable[], random: RandomSource = seededRandom(7)) {
    const directory = new InMemoryDirectoryService(authorizables);
    const writer = new CollectingRecordWriter();
    const logger = createMockLogger();
    const renderer = new EntityRenderer({
        directory,
        formatter: new BasicProfileFormatter(),
        writer,
        logger,
    });
    const collector = new FallbackCandidateCollector({ directory, renderer, logger, random });
    return { directory, writer, collector };
}

describe("FallbackCandidateCollector", () => {
    // Scenario: Requester vanished from the directory
    it("should throw RequesterNotFoundError for an unknown requester", async () => {
        const { collector } = setup([]);

        await expect(collector.collect(new DedupLedger("alice", []), 5))
            .rejects.toThrow(new RequesterNotFoundError("alice"));
    });

    // Scenario: Requester id resolves to a group, not a person
    it("should throw RequesterNotFoundError when the requester is a group", async () => {
        const { collector, writer } = setup([
            group("team", ["x", "y"]),
            user("x"),
            user("y"),
        ]);

        await expect(collector.collect(new DedupLedger("team", []), 5))
            .rejects.toThrow(new RequesterNotFoundError("team"));
        expect(writer.records).toEqual([]);
    });

    // Scenario: Requester belongs to no group
    it("should return without looking up members when there are no principals", async () => {
        const { directory, collector, writer } = setup([user("alice")]);
        const getMembers = vi.spyOn(directory, "getMembers");

        const outcome = await collector.collect(new DedupLedger("alice", []), 5);

        expect(outcome).toEqual({ groupsVisited: 0, candidates: 0, rendered: 0 });
        expect(getMembers).not.toHaveBeenCalled();
        expect(writer.records).toEqual([]);
    });

    // Scenario: Overlapping groups pool unique members; non-groups are ignored
    it("should union members across groups and skip non-group principals", async () => {
        const { collector, writer } = setup([
            user("alice", ["climbers", "runners", "bob", "ghost-group"]),
            user("bob"),
            user("carol"),
            user("dave"),
            user("erin"),
            group("climbers", ["alice", "bob", "carol", "dave"]),
            group("runners", ["carol", "dave", "erin"]),
        ]);
        const ledger = new DedupLedger("alice", ["bob"]);

        const outcome = await collector.collect(ledger, 10);

        expect(outcome).toEqual({ groupsVisited: 2, candidates: 5, rendered: 3 });
        expect(writer.records.map((r) => r.target).sort()).toEqual(["carol", "dave", "erin"]);
    });

    // Scenario: Member ids missing from the directory are skipped silently
    it("should skip members that no longer resolve", async () => {
        const { collector, writer } = setup([
            user("alice", ["climbers"]),
            user("carol"),
            group("climbers", ["carol", "deleted-user"]),
        ]);

        const outcome = await collector.collect(new DedupLedger("alice", []), 10);

        expect(outcome.rendered).toBe(1);
        expect(writer.records.map((r) => r.target)).toEqual(["carol"]);
    });

    // Scenario: Rendering stops as soon as the quota is met
    it("should stop rendering members at the quota", async () => {
        const members = ids("m", 20);
        const { collector, writer } = setup([
            user("alice", ["club"]),
            group("club", members),
            ...members.map((id) => user(id)),
        ]);
        const ledger = new DedupLedger("alice", []);

        const outcome = await collector.collect(ledger, 5);

        expect(outcome).toEqual({ groupsVisited: 1, candidates: 20, rendered: 5 });
        expect(ledger.size).toBe(5);
        expect(writer.records).toHaveLength(5);
    });

    // Scenario: Ledger already full on entry
    it("should visit no group when the quota is already met", async () => {
        const { directory, collector } = setup([user("alice", ["club"]), group("club", ["bob"])]);
        const getMembers = vi.spyOn(directory, "getMembers");
        const ledger = new DedupLedger("alice", []);
        ledger.markProcessed("zed");

        const outcome = await collector.collect(ledger, 1);

        expect(outcome).toEqual({ groupsVisited: 0, candidates: 0, rendered: 0 });
        expect(getMembers).not.toHaveBeenCalled();
    });

    // Scenario: Denied principal lookup is not handled here
    it("should propagate AuthorizationDeniedError", async () => {
        const directory = new InMemoryDirectoryService(
            [user("alice", ["secret"]), group("secret", ["bob"])],
            { deniedIds: ["secret"] }
        );
        const logger = createMockLogger();
        const collector = new FallbackCandidateCollector({
            directory,
            logger,
            renderer: new EntityRenderer({
                directory,
                formatter: new BasicProfileFormatter(),
                writer   : new CollectingRecordWriter(),
                logger,
            }),
        });

        await expect(collector.collect(new DedupLedger("alice", []), 5))
            .rejects.toBeInstanceOf(AuthorizationDeniedError);
    });

    // Scenario: Same seed, same order
    it("should be reproducible for a given random source", async () => {
        const members = ids("m", 12);
        const authorizables = [
            user("alice", ["a", "b"]),
            group("a", members.slice(0, 8)),
            group("b", members.slice(6)),
            ...members.map((id) => user(id)),
        ];

        const first = setup(authorizables, seededRandom(99));
        const second = setup(authorizables, seededRandom(99));
        await first.collector.collect(new DedupLedger("alice", []), 12);
        await second.collector.collect(new DedupLedger("alice", []), 12);

        expect(first.writer.records.map((r) => r.target))
            .toEqual(second.writer.records.map((r) => r.target));
        expect(first.writer.records).toHaveLength(12);
    });

    // Scenario: Small groups are not starved by large ones
    it("should pick every pooled member with roughly equal frequency", async () => {
        const big = ids("big", 10);
        const small = ids("small", 2);
        const authorizables = [
            user("alice", ["big-group", "small-group"]),
            group("big-group", big),
            group("small-group", small),
            ...[...big, ...small].map((id) => user(id)),
        ];
        const random = seededRandom(2024);
        const counts = new Map<string, number>();
        const runs = 1200;

        for (let run = 0; run < runs; run++) {
            const { collector, writer } = setup(authorizables, random);
            await collector.collect(new DedupLedger("alice", []), 1);
            const picked = writer.records[0].target;
            counts.set(picked, (counts.get(picked) ?? 0) + 1);
        }

        // 12 members, expected 100 picks each
        expect(counts.size).toBe(12);
        for (const count of counts.values()) {
            expect(count).toBeGreaterThan(50);
            expect(count).toBeLessThan(150);
        }
    });
});
