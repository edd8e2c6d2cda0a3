/**
 * @fileoverview In-memory connection service
 *
 * @module @relatedfeed/engine/impl/InMemoryConnectionService
 */

import type { EntityId } from "../contracts/Authorizable.js";
import type { ConnectionService, ConnectionState } from "../contracts/Collaborators.js";

/**
 * One directed connection.
 */
export interface ConnectionEntry {
    readonly owner: EntityId;
    readonly target: EntityId;
    readonly state: ConnectionState;
}

export class InMemoryConnectionService implements ConnectionService {
    constructor(private readonly connections: readonly ConnectionEntry[] = []) {}

    async getConnectedUsers(requesterId: EntityId, state: ConnectionState): Promise<readonly EntityId[]> {
        return this.connections
            .filter((c) => c.owner === requesterId && c.state === state)
            .map((c) => c.target);
    }
}
