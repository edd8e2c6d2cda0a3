/**
 * @fileoverview SQLite Directory Service
 *
 * Implements the DirectoryService contract over the directory database.
 * Users are looked up before groups; an id present in neither table is
 * reported as not found.
 *
 * @module domain/providers/SqliteDirectoryService
 */

import type {
    Authorizable,
    DirectoryService,
    EntityId,
    Group,
} from "@relatedfeed/engine";
import type { DirectoryDatabase, UserRow } from "../../adapters/sqlite/directory-db.js";

/**
 * Map a user row onto profile properties, leaving out unset columns.
 */
function userProperties(row: UserRow): Record<string, unknown> {
    const columns: Array<[string, string | null]> = [
        ["firstName", row.first_name],
        ["lastName", row.last_name],
        ["email", row.email],
        ["picture", row.picture],
        ["preferredName", row.preferred_name],
    ];

    const properties: Record<string, unknown> = {};
    for (const [key, value] of columns) {
        if (value !== null) {
            properties[key] = value;
        }
    }
    return properties;
}

export class SqliteDirectoryService implements DirectoryService {
    constructor(private readonly db: DirectoryDatabase) {}

    async findAuthorizable(id: EntityId): Promise<Authorizable | null> {
        const user = this.db.getUser(id);
        if (user) {
            return {
                kind      : "user",
                id        : user.id,
                properties: userProperties(user),
                principals: this.db.getGroupsOf(user.id),
            };
        }

        const group = this.db.getGroup(id);
        if (group) {
            return {
                kind      : "group",
                id        : group.id,
                properties: group.title === null ? {} : { title: group.title },
                principals: this.db.getGroupsOf(group.id),
                members   : this.db.getMembers(group.id),
            };
        }

        return null;
    }

    /**
     * Re-reads membership, so principals reflect the database at call time.
     */
    async getPrincipals(authorizable: Authorizable): Promise<readonly EntityId[]> {
        return this.db.getGroupsOf(authorizable.id);
    }

    async getMembers(group: Group): Promise<readonly EntityId[]> {
        return this.db.getMembers(group.id);
    }
}
