/**
 * @fileoverview Primary Stream Consumer
 *
 * Pulls ranked candidates one at a time until the quota is met or the
 * stream runs dry, whichever comes first. The quota is checked before
 * every pull, so an unbounded stream is never read past the item that
 * filled the feed.
 *
 * @module @relatedfeed/engine/engine/PrimaryStreamConsumer
 */

import type {
    CandidateResult,
    CandidateStream,
} from "../contracts/CandidateResult.js";
import { classifyCandidate } from "../contracts/CandidateResult.js";
import type { FeedLogger } from "../contracts/Logger.js";
import type { DedupLedger } from "./DedupLedger.js";
import type { EntityRenderer } from "./EntityRenderer.js";

/**
 * Consumer dependencies.
 */
export interface PrimaryStreamConsumerOptions {
    readonly renderer: EntityRenderer;
    readonly logger: FeedLogger;

    /** Called for each candidate whose kind has no handler */
    readonly onUnrecognized?: (result: CandidateResult) => void;
}

/**
 * Summary of one pass over the primary stream.
 */
export interface PrimaryStreamOutcome {
    /** True when the stream ended before the quota was met */
    readonly exhausted: boolean;

    /** Items pulled from the stream */
    readonly pulled: number;

    /** Items skipped because of an unknown kind */
    readonly unrecognized: number;
}

function isAsyncIterable<T>(source: AsyncIterable<T> | Iterable<T>): source is AsyncIterable<T> {
    return Symbol.asyncIterator in source;
}

/**
 * Open a pull cursor over either kind of iterable.
 */
function openCursor<T>(source: AsyncIterable<T> | Iterable<T>): AsyncIterator<T> {
    if (isAsyncIterable(source)) {
        return source[Symbol.asyncIterator]();
    }

    const iterator = source[Symbol.iterator]();
    return {
        next  : async (): Promise<IteratorResult<T>> => iterator.next(),
        return: async (): Promise<IteratorResult<T>> => {
            iterator.return?.();
            return { done: true, value: undefined };
        },
    };
}

/**
 * Primary Stream Consumer
 *
 * Contact records map to the last path segment, profile records to the
 * full path; anything else is logged and skipped.
 */
export class PrimaryStreamConsumer {
    constructor(private readonly options: PrimaryStreamConsumerOptions) {}

    /**
     * @param stream - Ranked candidates, consumed lazily
     * @param ledger - Run ledger shared with the fallback phase
     * @param quota - Maximum number of records for the run
     * @throws CallerContractError on a malformed locator
     */
    async consume(
        stream: CandidateStream,
        ledger: DedupLedger,
        quota: number
    ): Promise<PrimaryStreamOutcome> {
        const cursor = openCursor(stream);
        let exhausted = false;
        let pulled = 0;
        let unrecognized = 0;

        try {
            while (!ledger.hasReached(quota)) {
                const next = await cursor.next();
                if (next.done) {
                    exhausted = true;
                    break;
                }

                pulled++;
                const result = next.value;
                const candidate = classifyCandidate(result);

                switch (candidate.kind) {
                    case "contact":
                    case "profile":
                        await this.options.renderer.render(candidate.entityId, ledger);
                        break;

                    case "unrecognized":
                        unrecognized++;
                        this.options.logger.warn("No handler for resource kind", {
                            resourceKind: candidate.resourceKind,
                            path        : result.path,
                            properties  : result.properties,
                        });
                        this.options.onUnrecognized?.(result);
                        break;

                    default: {
                        const unhandled: never = candidate;
                        throw new Error(`Unhandled candidate variant: ${JSON.stringify(unhandled)}`);
                    }
                }
            }
        }
        finally {
            if (!exhausted) {
                // Release the upstream cursor; we stopped early or failed
                await cursor.return?.();
            }
        }

        this.options.logger.debug("Primary stream consumed", {
            exhausted,
            pulled,
            unrecognized,
            processed: ledger.size,
        });

        return { exhausted, pulled, unrecognized };
    }
}
