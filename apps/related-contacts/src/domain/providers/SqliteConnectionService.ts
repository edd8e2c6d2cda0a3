/**
 * @fileoverview SQLite Connection Service
 *
 * @module domain/providers/SqliteConnectionService
 */

import type { ConnectionService, ConnectionState, EntityId } from "@relatedfeed/engine";
import type { DirectoryDatabase } from "../../adapters/sqlite/directory-db.js";

export class SqliteConnectionService implements ConnectionService {
    constructor(private readonly db: DirectoryDatabase) {}

    async getConnectedUsers(requesterId: EntityId, state: ConnectionState): Promise<readonly EntityId[]> {
        return this.db.getConnections(requesterId, state);
    }
}
