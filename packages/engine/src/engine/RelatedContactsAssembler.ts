/**
 * @fileoverview RelatedContactsAssembler
 *
 * Orchestrates one related-contacts feed run.
 *
 * State flow:
 * 1. CONSUMING_PRIMARY  - ranked search results, until quota or exhaustion
 * 2. CONSUMING_FALLBACK - group co-members, only if the stream ran dry short
 * 3. DONE               - shortfall below the minimum is logged, never raised
 *
 * Failure handling has a single catch point here:
 * - AuthorizationDeniedError ends the run with the records collected so far
 * - CallerContractError propagates unchanged
 * - anything else is wrapped in FeedAssemblyError
 *
 * @module @relatedfeed/engine/engine/RelatedContactsAssembler
 */

import type { EntityId } from "../contracts/Authorizable.js";
import type { CandidateResult, CandidateStream } from "../contracts/CandidateResult.js";
import type { DirectoryService, ProfileFormatter } from "../contracts/Collaborators.js";
import type { RecordWriter, RenderedRecord } from "../contracts/RecordWriter.js";
import type { EventBus, EventType } from "../contracts/EventBus.js";
import { createEvent } from "../contracts/EventBus.js";
import { consoleLogger, createScopedLogger, type FeedLogger } from "../contracts/Logger.js";
import {
    AuthorizationDeniedError,
    CallerContractError,
    FeedAssemblyError,
    describeError,
} from "../contracts/errors.js";
import { InMemoryEventBus } from "../impl/InMemoryEventBus.js";
import { DedupLedger } from "./DedupLedger.js";
import { EntityRenderer } from "./EntityRenderer.js";
import { PrimaryStreamConsumer } from "./PrimaryStreamConsumer.js";
import { FallbackCandidateCollector } from "./FallbackCandidateCollector.js";
import type { RandomSource } from "./shuffle.js";

/**
 * Below this many records a run logs a shortfall notice.
 */
export const DEFAULT_MINIMUM_ACCEPTABLE = 11;

/**
 * Orchestrator states.
 */
export type AssemblyPhase = "CONSUMING_PRIMARY" | "CONSUMING_FALLBACK" | "DONE";

/**
 * How a run ended. A partial run is a valid result, not an error.
 */
export type AssemblyStatus =
    | { readonly kind: "complete" }
    | { readonly kind: "partial"; readonly reason: AuthorizationDeniedError };

/**
 * Assembler configuration.
 */
export interface AssemblerConfig {
    readonly directory: DirectoryService;
    readonly formatter: ProfileFormatter;

    /** Shortfall threshold, independent of quota (default: 11) */
    readonly minimumAcceptable?: number;

    /** Random source for the fallback shuffles (default: Math.random) */
    readonly random?: RandomSource;

    /** Custom EventBus (default: InMemoryEventBus) */
    readonly eventBus?: EventBus;

    /** Logger for assembly runs */
    readonly logger?: FeedLogger;
}

/**
 * Inputs of a single run.
 */
export interface AssemblyRequest {
    readonly requesterId: EntityId;

    /** Requester's accepted contacts, never emitted */
    readonly connectedUsers: readonly EntityId[];

    /** Ranked primary stream */
    readonly candidates: CandidateStream;

    /** Maximum number of records (the request's page size) */
    readonly quota: number;

    readonly writer: RecordWriter;
}

/**
 * Result of a run.
 */
export interface AssemblyOutcome {
    readonly traceId: string;

    /** Records in emission order */
    readonly records: readonly RenderedRecord[];

    readonly status: AssemblyStatus;

    /** Last working phase entered before DONE */
    readonly lastPhase: Exclude<AssemblyPhase, "DONE">;

    /** True when fewer than the minimum acceptable records were collected */
    readonly shortfall: boolean;
}

/**
 * Generate a trace ID for one run.
 */
function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `rc_${timestamp}_${random}`;
}

/**
 * RelatedContactsAssembler - builds one feed per call.
 *
 * Collaborators are injected once; every call to `assemble()` gets its
 * own ledger and components, so runs share no mutable state.
 *
 * @example
 * ```typescript
 * const assembler = new RelatedContactsAssembler({
 *     directory: new InMemoryDirectoryService(authorizables),
 *     formatter: new BasicProfileFormatter(),
 * });
 *
 * const outcome = await assembler.assemble({
 *     requesterId   : "alice",
 *     connectedUsers: ["bob"],
 *     candidates    : searchSource.query({ requesterId: "alice", itemsPerPage: 11 }),
 *     quota         : 11,
 *     writer        : new CollectingRecordWriter(),
 * });
 * ```
 */
export class RelatedContactsAssembler {
    private readonly config: Required<Omit<AssemblerConfig, "random">> & {
        random?: RandomSource;
    };

    /** Public access to the event bus for external subscriptions */
    public readonly eventBus: EventBus;

    constructor(config: AssemblerConfig) {
        this.eventBus = config.eventBus ?? new InMemoryEventBus();

        this.config = {
            directory        : config.directory,
            formatter        : config.formatter,
            minimumAcceptable: config.minimumAcceptable ?? DEFAULT_MINIMUM_ACCEPTABLE,
            random           : config.random,
            eventBus         : this.eventBus,
            logger           : config.logger ?? consoleLogger,
        };
    }

    get minimumAcceptable(): number {
        return this.config.minimumAcceptable;
    }

    /**
     * Run one assembly.
     *
     * @throws CallerContractError for an invalid quota or malformed candidate
     * @throws FeedAssemblyError when a collaborator fails for any reason
     * other than an authorization denial
     */
    async assemble(request: AssemblyRequest): Promise<AssemblyOutcome> {
        if (!Number.isInteger(request.quota) || request.quota < 1) {
            throw new CallerContractError(`Quota must be a positive integer, got ${request.quota}`);
        }
        if (!request.requesterId) {
            throw new CallerContractError("Requester id must be a non-empty string");
        }

        const traceId = generateTraceId();
        const logger = createScopedLogger(this.config.logger, "assembler", traceId);
        const ledger = new DedupLedger(request.requesterId, request.connectedUsers);
        const records: RenderedRecord[] = [];

        const renderer = new EntityRenderer({
            directory : this.config.directory,
            formatter : this.config.formatter,
            writer    : request.writer,
            logger    : createScopedLogger(this.config.logger, "renderer", traceId),
            onRendered: (record) => {
                records.push(record);
                this.emit("feed:recordEmitted", traceId, {
                    target  : record.target,
                    position: records.length,
                });
            },
        });

        const primary = new PrimaryStreamConsumer({
            renderer,
            logger        : createScopedLogger(this.config.logger, "primary", traceId),
            onUnrecognized: (result: CandidateResult) => {
                this.emit("feed:unrecognized", traceId, {
                    resourceKind: result.resourceKind,
                    path        : result.path,
                });
            },
        });

        const fallback = new FallbackCandidateCollector({
            directory: this.config.directory,
            renderer,
            logger   : createScopedLogger(this.config.logger, "fallback", traceId),
            random   : this.config.random,
        });

        let phase: Exclude<AssemblyPhase, "DONE"> = "CONSUMING_PRIMARY";
        let status: AssemblyStatus = { kind: "complete" };

        this.emit("feed:started", traceId, {
            requesterId: request.requesterId,
            quota      : request.quota,
            connected  : request.connectedUsers.length,
        });
        this.emit("feed:phase", traceId, { phase });

        try {
            const streamOutcome = await primary.consume(request.candidates, ledger, request.quota);

            if (streamOutcome.exhausted && !ledger.hasReached(request.quota)) {
                phase = "CONSUMING_FALLBACK";
                this.emit("feed:phase", traceId, { phase });
                await fallback.collect(ledger, request.quota);
            }
        }
        catch (error) {
            if (error instanceof AuthorizationDeniedError) {
                logger.debug(error.message, {
                    phase,
                    entityId : error.entityId,
                    collected: ledger.size,
                });
                status = { kind: "partial", reason: error };
                this.emit("feed:accessDenied", traceId, {
                    phase,
                    entityId : error.entityId,
                    collected: ledger.size,
                });
            }
            else {
                logger.error("Assembly failed", { phase, error: describeError(error) });
                this.emit("feed:failed", traceId, { phase, error: describeError(error) });

                if (error instanceof CallerContractError) {
                    throw error;
                }
                throw new FeedAssemblyError(
                    `Related contacts assembly failed for ${request.requesterId}: ${describeError(error)}`,
                    { cause: error }
                );
            }
        }

        this.emit("feed:phase", traceId, { phase: "DONE" });

        const shortfall = ledger.size < this.config.minimumAcceptable;
        if (shortfall) {
            logger.info("Feed below minimum acceptable size", {
                minimumAcceptable: this.config.minimumAcceptable,
                actual           : ledger.size,
            });
            this.emit("feed:shortfall", traceId, {
                minimumAcceptable: this.config.minimumAcceptable,
                actual           : ledger.size,
            });
        }

        this.emit("feed:completed", traceId, {
            records  : records.length,
            status   : status.kind,
            lastPhase: phase,
        });

        return {
            traceId,
            records,
            status,
            lastPhase: phase,
            shortfall,
        };
    }

    private emit(type: EventType, traceId: string, data: Record<string, unknown>): void {
        this.eventBus.emit(createEvent(type, data, traceId));
    }
}
