/**
 * Collaborator Contracts
 *
 * External services the feed engine consumes. Implementations live
 * outside the engine (SQLite adapters in the app, in-memory versions in
 * `impl/`). The engine awaits every call in sequence and never retries.
 *
 * Implementations signal:
 * - AuthorizationDeniedError when the requester may not read something
 * - StorageError when the backend fails
 */

import type { Authorizable, EntityId, Group } from "./Authorizable.js";
import type { CandidateStream } from "./CandidateResult.js";

/**
 * Criteria passed to the search source for one request.
 */
export interface SearchCriteria {
    /** Principal the feed is assembled for */
    readonly requesterId: EntityId;

    /** Page size requested by the caller */
    readonly itemsPerPage: number;
}

/**
 * Ranked search results for a requester.
 *
 * The stream is consumed lazily; implementations should defer work
 * until items are pulled.
 */
export interface SearchSource {
    readonly id: string;

    query(criteria: SearchCriteria): CandidateStream;
}

/**
 * State of a connection between two people.
 */
export type ConnectionState = "ACCEPTED" | "PENDING" | "INVITED" | "BLOCKED" | "IGNORED";

/**
 * Reports a user's existing contacts.
 */
export interface ConnectionService {
    /**
     * @param requesterId - Owner of the connections
     * @param state - Connection state to match (engine always asks for ACCEPTED)
     * @returns Connected user ids in the service's order
     */
    getConnectedUsers(requesterId: EntityId, state: ConnectionState): Promise<readonly EntityId[]>;
}

/**
 * Group-membership directory.
 */
export interface DirectoryService {
    /**
     * Resolve an id to a profile or group.
     *
     * @returns The authorizable, or null for unknown/deleted ids
     */
    findAuthorizable(id: EntityId): Promise<Authorizable | null>;

    /** Groups the authorizable belongs to */
    getPrincipals(authorizable: Authorizable): Promise<readonly EntityId[]>;

    /** Members of a group */
    getMembers(group: Group): Promise<readonly EntityId[]>;
}

/**
 * Projects an authorizable onto its public profile fields.
 */
export interface ProfileFormatter {
    getPublicFields(authorizable: Authorizable): Readonly<Record<string, unknown>>;
}
