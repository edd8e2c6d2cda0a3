/**
 * @fileoverview Directory fixture loader
 *
 * Reads a JSON description of users, groups and connections and writes
 * it into a DirectoryDatabase. Used by `--seed-demo` and by tests.
 *
 * @module domain/seed/directoryFixture
 */

import { readFileSync, existsSync } from "fs";
import type { ConnectionState } from "@relatedfeed/engine";
import type { DirectoryDatabase, UserRecord } from "../../adapters/sqlite/directory-db.js";

/**
 * A user entry; `tags` are profile interests used for tag-based search
 */
export interface FixtureUser extends UserRecord {
    tags?: string[];
}

export interface FixtureGroup {
    id: string;
    title?: string;
    members: string[];
}

export interface FixtureConnection {
    owner: string;
    target: string;
    state: ConnectionState;
}

/**
 * Parsed fixture file
 */
export interface DirectoryFixture {
    users: FixtureUser[];
    groups: FixtureGroup[];
    connections: FixtureConnection[];
}

const CONNECTION_STATES: readonly ConnectionState[] = ["ACCEPTED", "PENDING", "INVITED", "BLOCKED", "IGNORED"];

const OPTIONAL_USER_FIELDS = ["firstName", "lastName", "email", "picture", "preferredName"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
    return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isConnectionState(value: unknown): value is ConnectionState {
    return CONNECTION_STATES.some((state) => state === value);
}

function readList(parsed: Record<string, unknown>, key: string): unknown[] {
    const value = parsed[key] ?? [];
    if (!Array.isArray(value)) {
        throw new Error(`Invalid directory fixture: '${key}' must be an array`);
    }
    return value;
}

function parseUser(raw: unknown, index: number): FixtureUser {
    if (!isRecord(raw) || typeof raw.id !== "string" || raw.id.length === 0) {
        throw new Error(`Invalid user at index ${index}: missing or invalid 'id'`);
    }

    const user: FixtureUser = { id: raw.id };
    for (const field of OPTIONAL_USER_FIELDS) {
        const value = raw[field];
        if (typeof value === "string") {
            user[field] = value;
        }
    }

    if (raw.tags !== undefined) {
        if (!isStringArray(raw.tags)) {
            throw new Error(`Invalid user at index ${index}: 'tags' must be a list of strings`);
        }
        user.tags = raw.tags;
    }

    return user;
}

function parseGroup(raw: unknown, index: number): FixtureGroup {
    if (!isRecord(raw) || typeof raw.id !== "string" || raw.id.length === 0) {
        throw new Error(`Invalid group at index ${index}: missing or invalid 'id'`);
    }
    if (!isStringArray(raw.members)) {
        throw new Error(`Invalid group at index ${index}: 'members' must be a list of strings`);
    }

    return {
        id     : raw.id,
        title  : typeof raw.title === "string" ? raw.title : undefined,
        members: raw.members,
    };
}

function parseConnection(raw: unknown, index: number): FixtureConnection {
    if (!isRecord(raw) || typeof raw.owner !== "string" || typeof raw.target !== "string") {
        throw new Error(`Invalid connection at index ${index}: 'owner' and 'target' are required`);
    }

    const state = raw.state ?? "ACCEPTED";
    if (!isConnectionState(state)) {
        throw new Error(`Invalid connection at index ${index}: unknown state '${String(state)}'`);
    }

    return { owner: raw.owner, target: raw.target, state };
}

/**
 * Validate an already-parsed fixture document.
 */
export function parseDirectoryFixture(parsed: unknown): DirectoryFixture {
    if (!isRecord(parsed)) {
        throw new Error("Invalid directory fixture: expected an object");
    }

    return {
        users      : readList(parsed, "users").map(parseUser),
        groups     : readList(parsed, "groups").map(parseGroup),
        connections: readList(parsed, "connections").map(parseConnection),
    };
}

/**
 * Load and validate a fixture file.
 *
 * @throws Error if the file doesn't exist or is invalid
 */
export function loadDirectoryFixture(filePath: string): DirectoryFixture {
    if (!existsSync(filePath)) {
        throw new Error(`Directory fixture not found: ${filePath}`);
    }

    return parseDirectoryFixture(JSON.parse(readFileSync(filePath, "utf-8")));
}

/**
 * Write a fixture into the database in one transaction.
 */
export function seedDirectory(db: DirectoryDatabase, fixture: DirectoryFixture): void {
    db.transaction(() => {
        for (const { tags, ...user } of fixture.users) {
            db.addUser(user);
            if (tags) {
                db.addTags(user.id, tags);
            }
        }

        for (const group of fixture.groups) {
            db.addGroup(group.id, group.title ?? null, group.members);
        }

        for (const connection of fixture.connections) {
            db.addConnection(connection.owner, connection.target, connection.state);
        }
    });
}
