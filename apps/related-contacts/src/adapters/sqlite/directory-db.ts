/**
 * SQLite Directory Database
 *
 * Stores users, groups, group membership, connections between users and
 * the interest tags users list on their profiles. Lookups used during a
 * feed run are read-only; the write helpers exist for seeding.
 *
 * Relative paths resolve against the working directory. ":memory:" opens
 * a private in-memory database.
 */

import Database from "better-sqlite3";
import { existsSync } from "fs";
import { StorageError, type ConnectionState } from "@relatedfeed/engine";

const MEMORY_PATH = ":memory:";

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS users (
        id             TEXT PRIMARY KEY,
        first_name     TEXT,
        last_name      TEXT,
        email          TEXT,
        picture        TEXT,
        preferred_name TEXT
    );

    CREATE TABLE IF NOT EXISTS groups (
        id    TEXT PRIMARY KEY,
        title TEXT
    );

    CREATE TABLE IF NOT EXISTS group_members (
        group_id  TEXT NOT NULL,
        member_id TEXT NOT NULL,
        PRIMARY KEY (group_id, member_id)
    );

    CREATE TABLE IF NOT EXISTS connections (
        owner_id  TEXT NOT NULL,
        target_id TEXT NOT NULL,
        state     TEXT NOT NULL DEFAULT 'ACCEPTED',
        PRIMARY KEY (owner_id, target_id)
    );

    CREATE TABLE IF NOT EXISTS user_tags (
        user_id TEXT NOT NULL,
        tag     TEXT NOT NULL,
        PRIMARY KEY (user_id, tag)
    );
`;

/**
 * Raw user row from the database
 */
export interface UserRow {
    id: string;
    first_name: string | null;
    last_name: string | null;
    email: string | null;
    picture: string | null;
    preferred_name: string | null;
}

/**
 * Raw group row from the database
 */
export interface GroupRow {
    id: string;
    title: string | null;
}

/**
 * A contact of one of the requester's contacts
 */
export interface ContactOfContactRow {
    owner: string;
    target: string;
}

/**
 * A user sharing interest tags with the requester
 */
export interface SharedTagRow {
    id: string;
    shared: number;
}

/**
 * User fields accepted by the seed helpers
 */
export interface UserRecord {
    id: string;
    firstName?: string;
    lastName?: string;
    email?: string;
    picture?: string;
    preferredName?: string;
}

/**
 * Options for opening the database
 */
export interface DirectoryDatabaseOptions {
    /** Create the file when it does not exist (default: false) */
    create?: boolean;
}

/**
 * SQLite-backed directory store
 */
export class DirectoryDatabase {
    private db: Database.Database | null = null;

    constructor(
        private readonly dbPath: string,
        private readonly options: DirectoryDatabaseOptions = {}
    ) {}

    get path(): string {
        return this.dbPath;
    }

    /**
     * Open the database connection and apply the schema
     *
     * @throws StorageError when the file is missing or cannot be opened
     */
    open(): void {
        if (this.db) {
            return;
        }

        if (this.dbPath !== MEMORY_PATH && !this.options.create && !existsSync(this.dbPath)) {
            throw new StorageError(
                `Directory database not found at ${this.dbPath}. ` +
                `Run with --seed-demo to create a demo directory.`
            );
        }

        try {
            const db = new Database(this.dbPath);
            db.exec(SCHEMA);
            this.db = db;
        }
        catch (error) {
            throw new StorageError(`Cannot open directory database at ${this.dbPath}`, { cause: error });
        }
    }

    /**
     * Close the database connection
     */
    close(): void {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }

    getUser(id: string): UserRow | null {
        return this.query("getUser", (db) =>
            db.prepare<[string], UserRow>(`
                SELECT id, first_name, last_name, email, picture, preferred_name
                FROM users
                WHERE id = ?
            `).get(id) ?? null
        );
    }

    getGroup(id: string): GroupRow | null {
        return this.query("getGroup", (db) =>
            db.prepare<[string], GroupRow>("SELECT id, title FROM groups WHERE id = ?").get(id) ?? null
        );
    }

    /**
     * Ids of the groups `memberId` belongs to, in insertion order
     */
    getGroupsOf(memberId: string): string[] {
        return this.query("getGroupsOf", (db) =>
            db.prepare<[string], { group_id: string }>(`
                SELECT group_id
                FROM group_members
                WHERE member_id = ?
                ORDER BY rowid
            `).all(memberId).map((row) => row.group_id)
        );
    }

    /**
     * Member ids of a group, in insertion order
     */
    getMembers(groupId: string): string[] {
        return this.query("getMembers", (db) =>
            db.prepare<[string], { member_id: string }>(`
                SELECT member_id
                FROM group_members
                WHERE group_id = ?
                ORDER BY rowid
            `).all(groupId).map((row) => row.member_id)
        );
    }

    /**
     * Targets of `ownerId`'s connections in the given state
     */
    getConnections(ownerId: string, state: ConnectionState): string[] {
        return this.query("getConnections", (db) =>
            db.prepare<[string, string], { target_id: string }>(`
                SELECT target_id
                FROM connections
                WHERE owner_id = ? AND state = ?
                ORDER BY rowid
            `).all(ownerId, state).map((row) => row.target_id)
        );
    }

    /**
     * Accepted contacts of the requester's accepted contacts, grouped by
     * the contact they were reached through
     */
    getContactsOfContacts(requesterId: string): ContactOfContactRow[] {
        return this.query("getContactsOfContacts", (db) =>
            db.prepare<[string], ContactOfContactRow>(`
                SELECT c1.target_id AS owner, c2.target_id AS target
                FROM connections c1
                JOIN connections c2 ON c2.owner_id = c1.target_id
                WHERE c1.owner_id = ?
                    AND c1.state = 'ACCEPTED'
                    AND c2.state = 'ACCEPTED'
                ORDER BY c1.rowid, c2.rowid
            `).all(requesterId)
        );
    }

    /**
     * Users sharing at least one tag with the requester, most shared first
     */
    getUsersSharingTags(requesterId: string): SharedTagRow[] {
        return this.query("getUsersSharingTags", (db) =>
            db.prepare<[string], SharedTagRow>(`
                SELECT t2.user_id AS id, COUNT(*) AS shared
                FROM user_tags t1
                JOIN user_tags t2 ON t2.tag = t1.tag AND t2.user_id != t1.user_id
                WHERE t1.user_id = ?
                GROUP BY t2.user_id
                ORDER BY shared DESC, t2.user_id ASC
            `).all(requesterId)
        );
    }

    // Seed helpers

    addUser(user: UserRecord): void {
        this.query("addUser", (db) => {
            db.prepare(`
                INSERT OR REPLACE INTO users (id, first_name, last_name, email, picture, preferred_name)
                VALUES (@id, @firstName, @lastName, @email, @picture, @preferredName)
            `).run({
                id           : user.id,
                firstName    : user.firstName ?? null,
                lastName     : user.lastName ?? null,
                email        : user.email ?? null,
                picture      : user.picture ?? null,
                preferredName: user.preferredName ?? null,
            });
        });
    }

    addGroup(id: string, title: string | null, members: readonly string[] = []): void {
        this.query("addGroup", (db) => {
            db.prepare("INSERT OR REPLACE INTO groups (id, title) VALUES (?, ?)").run(id, title);
            const addMember = db.prepare("INSERT OR IGNORE INTO group_members (group_id, member_id) VALUES (?, ?)");
            for (const member of members) {
                addMember.run(id, member);
            }
        });
    }

    addConnection(ownerId: string, targetId: string, state: ConnectionState = "ACCEPTED"): void {
        this.query("addConnection", (db) => {
            db.prepare(`
                INSERT OR REPLACE INTO connections (owner_id, target_id, state)
                VALUES (?, ?, ?)
            `).run(ownerId, targetId, state);
        });
    }

    addTags(userId: string, tags: readonly string[]): void {
        this.query("addTags", (db) => {
            const addTag = db.prepare("INSERT OR IGNORE INTO user_tags (user_id, tag) VALUES (?, ?)");
            for (const tag of tags) {
                addTag.run(userId, tag);
            }
        });
    }

    /**
     * Run `fn` in a single transaction
     */
    transaction(fn: () => void): void {
        const db = this.ensureOpen();
        db.transaction(fn)();
    }

    /**
     * Ensure database is open
     */
    private ensureOpen(): Database.Database {
        if (!this.db) {
            this.open();
        }
        if (!this.db) {
            throw new StorageError(`Directory database at ${this.dbPath} is not open`);
        }
        return this.db;
    }

    /**
     * Run a statement, reporting SQLite failures as StorageError
     */
    private query<T>(operation: string, fn: (db: Database.Database) => T): T {
        const db = this.ensureOpen();
        try {
            return fn(db);
        }
        catch (error) {
            if (error instanceof StorageError) {
                throw error;
            }
            const message = error instanceof Error ? error.message : String(error);
            throw new StorageError(`Directory query ${operation} failed: ${message}`, { cause: error });
        }
    }
}
