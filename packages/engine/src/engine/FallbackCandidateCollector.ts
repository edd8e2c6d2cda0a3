/**
 * @fileoverview Fallback Candidate Collector
 *
 * Tops up a short feed with people who share a group with the
 * requester. Groups are visited in random order and the pooled members
 * are shuffled again, so repeated calls do not keep showing the same
 * filler people or favour the first/largest group.
 *
 * @module @relatedfeed/engine/engine/FallbackCandidateCollector
 */

import type { EntityId } from "../contracts/Authorizable.js";
import { isGroup, isUserProfile } from "../contracts/Authorizable.js";
import type { DirectoryService } from "../contracts/Collaborators.js";
import type { FeedLogger } from "../contracts/Logger.js";
import { RequesterNotFoundError } from "../contracts/errors.js";
import type { DedupLedger } from "./DedupLedger.js";
import type { EntityRenderer } from "./EntityRenderer.js";
import { shuffle, type RandomSource } from "./shuffle.js";

/**
 * Collector dependencies.
 */
export interface FallbackCandidateCollectorOptions {
    readonly directory: DirectoryService;
    readonly renderer: EntityRenderer;
    readonly logger: FeedLogger;

    /** Random source for both shuffles (default: Math.random) */
    readonly random?: RandomSource;
}

/**
 * Summary of one fallback pass.
 */
export interface FallbackOutcome {
    /** Principals that resolved to a group */
    readonly groupsVisited: number;

    /** Unique members pooled across visited groups */
    readonly candidates: number;

    /** Records emitted by this pass */
    readonly rendered: number;
}

export class FallbackCandidateCollector {
    private readonly random: RandomSource;

    constructor(private readonly options: FallbackCandidateCollectorOptions) {
        this.random = options.random ?? Math.random;
    }

    /**
     * @throws RequesterNotFoundError if the requester is not a user profile
     * in the directory
     */
    async collect(ledger: DedupLedger, quota: number): Promise<FallbackOutcome> {
        const { directory, renderer, logger } = this.options;

        const requester = await directory.findAuthorizable(ledger.requesterId);
        if (!requester || !isUserProfile(requester)) {
            throw new RequesterNotFoundError(ledger.requesterId);
        }

        const principals = await directory.getPrincipals(requester);
        if (principals.length === 0) {
            logger.debug("Requester has no principals", { requesterId: ledger.requesterId });
            return { groupsVisited: 0, candidates: 0, rendered: 0 };
        }

        const relatedUsers = new Set<EntityId>();
        let groupsVisited = 0;

        for (const principal of shuffle(principals, this.random)) {
            if (ledger.hasReached(quota)) {
                break;
            }

            const authorizable = await directory.findAuthorizable(principal);
            if (!authorizable || !isGroup(authorizable)) {
                continue;
            }

            groupsVisited++;
            for (const member of await directory.getMembers(authorizable)) {
                relatedUsers.add(member);
            }
        }

        let rendered = 0;
        for (const candidate of shuffle([...relatedUsers], this.random)) {
            if (ledger.hasReached(quota)) {
                break;
            }
            if (await renderer.render(candidate, ledger)) {
                rendered++;
            }
        }

        logger.debug("Fallback pass finished", {
            groupsVisited,
            candidates: relatedUsers.size,
            rendered,
        });

        return { groupsVisited, candidates: relatedUsers.size, rendered };
    }
}
