/**
 * @fileoverview Dedup Ledger
 *
 * Tracks, for one assembly run, which entities were already emitted and
 * which are excluded up front (the requester and their accepted contacts).
 *
 * @module @relatedfeed/engine/engine/DedupLedger
 */

import type { EntityId } from "../contracts/Authorizable.js";

/**
 * An id is eligible when it is not the requester, not already connected
 * and not already emitted in this run.
 */
export function isEligible(
    id: EntityId,
    connected: ReadonlySet<EntityId>,
    processed: ReadonlySet<EntityId>,
    requesterId: EntityId
): boolean {
    return id !== requesterId && !connected.has(id) && !processed.has(id);
}

export function markProcessed(id: EntityId, processed: Set<EntityId>): void {
    processed.add(id);
}

/**
 * Run-scoped ledger.
 *
 * @example
 * ```typescript
 * const ledger = new DedupLedger("alice", ["bob"]);
 * ledger.isEligible("bob");   // false - already connected
 * ledger.isEligible("carol"); // true
 * ledger.markProcessed("carol");
 * ledger.isEligible("carol"); // false - already emitted
 * ```
 */
export class DedupLedger {
    private readonly connected: ReadonlySet<EntityId>;
    private readonly processed = new Set<EntityId>();

    constructor(
        readonly requesterId: EntityId,
        connectedUsers: Iterable<EntityId>
    ) {
        this.connected = new Set(connectedUsers);
    }

    /** Number of entities emitted so far */
    get size(): number {
        return this.processed.size;
    }

    /** Emitted ids in emission order */
    get processedIds(): readonly EntityId[] {
        return [...this.processed];
    }

    isEligible(id: EntityId): boolean {
        return isEligible(id, this.connected, this.processed, this.requesterId);
    }

    markProcessed(id: EntityId): void {
        markProcessed(id, this.processed);
    }

    hasReached(quota: number): boolean {
        return this.processed.size >= quota;
    }
}
