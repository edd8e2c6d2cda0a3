/**
 * @fileoverview RelatedContactsBatchProcessor
 *
 * Adapts the assembler to a search framework's "batch result processor"
 * shape: the framework asks for a result set, then hands it back
 * together with an output writer.
 *
 * @module @relatedfeed/engine/engine/RelatedContactsBatchProcessor
 */

import type { EntityId } from "../contracts/Authorizable.js";
import type { CandidateStream } from "../contracts/CandidateResult.js";
import type { ConnectionService, SearchSource } from "../contracts/Collaborators.js";
import type { RecordWriter } from "../contracts/RecordWriter.js";
import type { AssemblyOutcome, RelatedContactsAssembler } from "./RelatedContactsAssembler.js";

/**
 * Request parameter carrying the page size.
 */
export const PARAM_ITEMS_PER_PAGE = "items";

/**
 * Page size used when the request does not carry one.
 */
export const DEFAULT_ITEMS_PER_PAGE = 25;

/**
 * An inbound feed request.
 */
export interface FeedRequest {
    readonly requesterId: EntityId;
    readonly parameters: Readonly<Record<string, string | undefined>>;
}

/**
 * Batch result processor contract.
 */
export interface SearchBatchResultProcessor<TOutcome> {
    getResultSet(request: FeedRequest): CandidateStream;
    writeResults(request: FeedRequest, writer: RecordWriter, results: CandidateStream): Promise<TOutcome>;
}

/**
 * Read the page size from request parameters.
 *
 * Missing, non-numeric or non-positive values fall back to `fallback`.
 *
 * @example
 * ```typescript
 * resolveItemsPerPage({ items: "11" }, 25); // 11
 * resolveItemsPerPage({ items: "-3" }, 25); // 25
 * resolveItemsPerPage({}, 25);              // 25
 * ```
 */
export function resolveItemsPerPage(
    parameters: Readonly<Record<string, string | undefined>>,
    fallback: number = DEFAULT_ITEMS_PER_PAGE
): number {
    const raw = parameters[PARAM_ITEMS_PER_PAGE]?.trim();
    if (!raw || !/^\d+$/.test(raw)) {
        return fallback;
    }

    const value = Number.parseInt(raw, 10);
    return value > 0 ? value : fallback;
}

/**
 * Processor configuration.
 */
export interface BatchProcessorConfig {
    readonly searchSource: SearchSource;
    readonly connections: ConnectionService;
    readonly assembler: RelatedContactsAssembler;

    /** Page size when the request has none (default: 25) */
    readonly defaultItemsPerPage?: number;
}

export class RelatedContactsBatchProcessor implements SearchBatchResultProcessor<AssemblyOutcome> {
    private readonly defaultItemsPerPage: number;

    constructor(private readonly config: BatchProcessorConfig) {
        this.defaultItemsPerPage = config.defaultItemsPerPage ?? DEFAULT_ITEMS_PER_PAGE;
    }

    /**
     * Open the ranked result stream for a request. Nothing is read until
     * the stream is pulled.
     */
    getResultSet(request: FeedRequest): CandidateStream {
        return this.config.searchSource.query({
            requesterId : request.requesterId,
            itemsPerPage: this.itemsPerPage(request),
        });
    }

    /**
     * Load the requester's accepted contacts and run one assembly.
     */
    async writeResults(
        request: FeedRequest,
        writer: RecordWriter,
        results: CandidateStream
    ): Promise<AssemblyOutcome> {
        const connectedUsers = await this.config.connections.getConnectedUsers(
            request.requesterId,
            "ACCEPTED"
        );

        return this.config.assembler.assemble({
            requesterId: request.requesterId,
            connectedUsers,
            candidates : results,
            quota      : this.itemsPerPage(request),
            writer,
        });
    }

    /**
     * Convenience: `getResultSet` followed by `writeResults`.
     */
    async process(request: FeedRequest, writer: RecordWriter): Promise<AssemblyOutcome> {
        return this.writeResults(request, writer, this.getResultSet(request));
    }

    itemsPerPage(request: FeedRequest): number {
        return resolveItemsPerPage(request.parameters, this.defaultItemsPerPage);
    }
}
