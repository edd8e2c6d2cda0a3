/**
 * @fileoverview Shared test fixtures for engine tests
 */

import { vi } from "vitest";
import type { Group, UserProfile } from "../contracts/Authorizable.js";
import type { CandidateResult } from "../contracts/CandidateResult.js";
import type { FeedLogger } from "../contracts/Logger.js";
import type { RandomSource } from "../engine/shuffle.js";

export function user(id: string, principals: string[] = [], properties: Record<string, unknown> = {}): UserProfile {
    return {
        kind      : "user",
        id,
        principals,
        properties: { firstName: id.toUpperCase(), ...properties },
    };
}

export function group(id: string, members: string[]): Group {
    return {
        kind      : "group",
        id,
        principals: [],
        properties: { title: id },
        members,
    };
}

/**
 * Contact record pointing at `target` through `owner`'s contact list.
 */
export function contact(owner: string, target: string): CandidateResult {
    return {
        resourceKind: "contact",
        path        : `/contacts/${owner}/${target}`,
        properties  : { owner },
    };
}

export function profile(id: string): CandidateResult {
    return {
        resourceKind: "profile",
        path        : id,
        properties  : {},
    };
}

export function createMockLogger(): FeedLogger & {
    debug: ReturnType<typeof vi.fn>;
    info: ReturnType<typeof vi.fn>;
    warn: ReturnType<typeof vi.fn>;
    error: ReturnType<typeof vi.fn>;
} {
    return {
        debug: vi.fn(),
        info : vi.fn(),
        warn : vi.fn(),
        error: vi.fn(),
    };
}

/**
 * Deterministic PRNG (mulberry32) so shuffles are reproducible.
 */
export function seededRandom(seed: number): RandomSource {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Ids "prefix1" .. "prefixN".
 */
export function ids(prefix: string, count: number): string[] {
    return Array.from({ length: count }, (_, i) => `${prefix}${i + 1}`);
}
