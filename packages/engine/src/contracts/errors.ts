/**
 * @fileoverview Feed error taxonomy
 *
 * Only caller-contract violations and backend failures escape an
 * assembly run. Authorization denials are recoverable and end the run
 * with whatever was collected.
 *
 * @module @relatedfeed/engine/contracts/errors
 */

import type { EntityId } from "./Authorizable.js";

/**
 * Base class for every error raised by the feed engine or its adapters.
 */
export class FeedError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * A caller broke the input contract (empty identifier, bad quota, ...).
 * Fatal and surfaced unchanged.
 */
export class CallerContractError extends FeedError {}

/**
 * The requesting principal may not read something the run needed.
 */
export class AuthorizationDeniedError extends FeedError {
    constructor(
        message: string,
        readonly entityId?: EntityId,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

/**
 * A storage backend failed or is unavailable.
 */
export class StorageError extends FeedError {}

/**
 * The requester could not be resolved in the directory.
 */
export class RequesterNotFoundError extends FeedError {
    constructor(readonly requesterId: EntityId) {
        super(`Requester not found in directory: ${requesterId}`);
    }
}

/**
 * Run-level failure wrapping an unexpected backend error.
 * No partial results accompany it.
 */
export class FeedAssemblyError extends FeedError {}

/**
 * Render an unknown thrown value as a log-friendly message.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
