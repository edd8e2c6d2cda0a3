/**
 * Candidate Result Contract
 *
 * One item of the externally ranked primary stream. The search source
 * owns ranking; the feed engine only reads the kind tag and the path.
 */

import type { EntityId } from "./Authorizable.js";
import { CallerContractError } from "./errors.js";

/**
 * Resource kinds the engine knows how to turn into an entity id.
 */
export const ResourceKind = {
    /** A contact record; the entity id is the last path segment */
    Contact: "contact",

    /** A raw profile record; the path is the entity id */
    Profile: "profile",
} as const;

/**
 * Item yielded by a search source.
 */
export interface CandidateResult {
    /** Kind tag; absent or unknown tags are skipped with a warning */
    readonly resourceKind?: string;

    /** Locator from which the entity id is derived */
    readonly path: string;

    /** Opaque properties, only used when logging unknown kinds */
    readonly properties: Readonly<Record<string, unknown>>;
}

/**
 * Lazy, forward-only sequence of candidates. May be unbounded.
 */
export type CandidateStream = AsyncIterable<CandidateResult> | Iterable<CandidateResult>;

/**
 * Closed classification of a candidate.
 */
export type CandidateVariant =
    | { readonly kind: "contact"; readonly entityId: EntityId }
    | { readonly kind: "profile"; readonly entityId: EntityId }
    | { readonly kind: "unrecognized"; readonly resourceKind: string | undefined };

/**
 * Portion of a path after its final "/" (the whole path if there is none).
 */
export function lastPathSegment(path: string): string {
    return path.substring(path.lastIndexOf("/") + 1);
}

/**
 * Classify a candidate and derive its entity id.
 *
 * @throws CallerContractError when a recognized kind yields an empty id,
 * which means the upstream locator is malformed
 *
 * @example
 * ```typescript
 * classifyCandidate({ resourceKind: "contact", path: "/contacts/alice/bob", properties: {} });
 * // => { kind: "contact", entityId: "bob" }
 * ```
 */
export function classifyCandidate(result: CandidateResult): CandidateVariant {
    switch (result.resourceKind) {
        case ResourceKind.Contact:
            return {
                kind    : "contact",
                entityId: requireEntityId(lastPathSegment(result.path), result),
            };

        case ResourceKind.Profile:
            return {
                kind    : "profile",
                entityId: requireEntityId(result.path, result),
            };

        default:
            return { kind: "unrecognized", resourceKind: result.resourceKind };
    }
}

function requireEntityId(candidate: string, result: CandidateResult): EntityId {
    if (candidate.length === 0) {
        throw new CallerContractError(
            `Missing entity id in ${result.resourceKind ?? "unknown"} result: "${result.path}"`
        );
    }
    return candidate;
}
