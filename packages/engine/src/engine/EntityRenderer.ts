/**
 * @fileoverview Entity Renderer
 *
 * Turns a candidate entity id into a rendered feed record when the
 * ledger allows it and the directory still knows the entity.
 *
 * @module @relatedfeed/engine/engine/EntityRenderer
 */

import type { EntityId } from "../contracts/Authorizable.js";
import type { DirectoryService, ProfileFormatter } from "../contracts/Collaborators.js";
import type { RecordWriter, RenderedRecord } from "../contracts/RecordWriter.js";
import type { FeedLogger } from "../contracts/Logger.js";
import { CallerContractError } from "../contracts/errors.js";
import type { DedupLedger } from "./DedupLedger.js";

/**
 * Renderer dependencies.
 */
export interface EntityRendererOptions {
    readonly directory: DirectoryService;
    readonly formatter: ProfileFormatter;
    readonly writer: RecordWriter;
    readonly logger: FeedLogger;

    /** Called after each record is written and marked processed */
    readonly onRendered?: (record: RenderedRecord) => void;
}

/**
 * Entity Renderer
 *
 * Outcome per call:
 * - ineligible id: null, nothing written, ledger untouched
 * - unknown or deleted entity: null, silently
 * - otherwise: record written, id marked processed
 */
export class EntityRenderer {
    constructor(private readonly options: EntityRendererOptions) {}

    /**
     * @throws CallerContractError if `id` is empty
     */
    async render(id: EntityId, ledger: DedupLedger): Promise<RenderedRecord | null> {
        if (!id) {
            throw new CallerContractError("Entity id must be a non-empty string");
        }

        if (!ledger.isEligible(id)) {
            return null;
        }

        const authorizable = await this.options.directory.findAuthorizable(id);
        if (!authorizable) {
            this.options.logger.debug("Skipping unknown entity", { entityId: id });
            return null;
        }

        const record: RenderedRecord = {
            target : id,
            profile: this.options.formatter.getPublicFields(authorizable),
        };

        await this.options.writer.write(record);
        ledger.markProcessed(id);
        this.options.onRendered?.(record);

        return record;
    }
}
