/**
 * @fileoverview SQLite Search Source
 *
 * Ranked candidate stream for a requester, in two sections:
 * 1. contacts of the requester's contacts, as contact records
 * 2. users sharing profile tags with the requester, most tags first,
 *    as profile records
 *
 * Each section is queried only when the consumer pulls into it, so a
 * feed filled by the first section never runs the second query.
 * Candidates may repeat or include already-connected users; the
 * assembler filters them.
 *
 * @module domain/providers/SqliteSearchSource
 */

import {
    ResourceKind,
    type CandidateResult,
    type SearchCriteria,
    type SearchSource,
} from "@relatedfeed/engine";
import type { DirectoryDatabase } from "../../adapters/sqlite/directory-db.js";

export class SqliteSearchSource implements SearchSource {
    readonly id = "sqlite-directory-search";

    constructor(private readonly db: DirectoryDatabase) {}

    async *query(criteria: SearchCriteria): AsyncGenerator<CandidateResult> {
        for (const row of this.db.getContactsOfContacts(criteria.requesterId)) {
            yield {
                resourceKind: ResourceKind.Contact,
                path        : `/contacts/${row.owner}/${row.target}`,
                properties  : { owner: row.owner },
            };
        }

        for (const row of this.db.getUsersSharingTags(criteria.requesterId)) {
            yield {
                resourceKind: ResourceKind.Profile,
                path        : row.id,
                properties  : { sharedTags: row.shared },
            };
        }
    }
}
