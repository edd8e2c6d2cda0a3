/**
 * @fileoverview In-memory search source
 *
 * Serves pre-ranked candidates per requester as a lazy async stream.
 *
 * @module @relatedfeed/engine/impl/InMemorySearchSource
 */

import type { EntityId } from "../contracts/Authorizable.js";
import type { CandidateResult } from "../contracts/CandidateResult.js";
import type { SearchCriteria, SearchSource } from "../contracts/Collaborators.js";

export class InMemorySearchSource implements SearchSource {
    readonly id = "in-memory-search";

    private readonly results: Map<EntityId, readonly CandidateResult[]>;

    /**
     * @param results - Ranked candidates keyed by requester id
     */
    constructor(results: Record<EntityId, readonly CandidateResult[]> = {}) {
        this.results = new Map(Object.entries(results));
    }

    /**
     * Yields every ranked candidate for the requester. `itemsPerPage` is
     * not applied: the consumer stops pulling once its quota is met.
     */
    async *query(criteria: SearchCriteria): AsyncGenerator<CandidateResult> {
        for (const result of this.results.get(criteria.requesterId) ?? []) {
            yield result;
        }
    }
}
