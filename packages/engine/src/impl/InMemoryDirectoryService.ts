/**
 * @fileoverview In-memory directory
 *
 * @module @relatedfeed/engine/impl/InMemoryDirectoryService
 */

import type { Authorizable, EntityId, Group } from "../contracts/Authorizable.js";
import type { DirectoryService } from "../contracts/Collaborators.js";
import { AuthorizationDeniedError } from "../contracts/errors.js";

/**
 * Options for the in-memory directory.
 */
export interface InMemoryDirectoryOptions {
    /** Ids the caller may not read; lookups throw AuthorizationDeniedError */
    readonly deniedIds?: Iterable<EntityId>;
}

/**
 * Directory backed by a Map. Useful for tests and demos.
 *
 * @example
 * ```typescript
 * const directory = new InMemoryDirectoryService([
 *     { kind: "user", id: "alice", properties: {}, principals: ["hikers"] },
 *     { kind: "group", id: "hikers", properties: {}, principals: [], members: ["alice", "bob"] },
 * ]);
 * ```
 */
export class InMemoryDirectoryService implements DirectoryService {
    private readonly entries = new Map<EntityId, Authorizable>();
    private readonly denied: Set<EntityId>;

    constructor(authorizables: Iterable<Authorizable> = [], options: InMemoryDirectoryOptions = {}) {
        for (const authorizable of authorizables) {
            this.entries.set(authorizable.id, authorizable);
        }
        this.denied = new Set(options.deniedIds ?? []);
    }

    async findAuthorizable(id: EntityId): Promise<Authorizable | null> {
        if (this.denied.has(id)) {
            throw new AuthorizationDeniedError(`Access denied to ${id}`, id);
        }
        return this.entries.get(id) ?? null;
    }

    async getPrincipals(authorizable: Authorizable): Promise<readonly EntityId[]> {
        return authorizable.principals;
    }

    async getMembers(group: Group): Promise<readonly EntityId[]> {
        return group.members;
    }

    /** Add or replace an entry. */
    put(authorizable: Authorizable): void {
        this.entries.set(authorizable.id, authorizable);
    }

    /** Deny further lookups of an id. */
    deny(id: EntityId): void {
        this.denied.add(id);
    }
}
