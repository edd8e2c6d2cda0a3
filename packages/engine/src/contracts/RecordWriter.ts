/**
 * @fileoverview Record Writer Contract
 *
 * Output side of an assembly run. Records are handed to the writer one
 * at a time, in emission order: primary-stream records first, then
 * fallback records.
 *
 * @module @relatedfeed/engine/contracts/RecordWriter
 */

import type { EntityId } from "./Authorizable.js";

/**
 * One entry of the related-contacts feed.
 */
export interface RenderedRecord {
    /** The related person */
    readonly target: EntityId;

    /** Public profile projection */
    readonly profile: Readonly<Record<string, unknown>>;
}

/**
 * Streaming sink for rendered records.
 */
export interface RecordWriter {
    /**
     * Write one record.
     *
     * @param record - The record to append to the output
     */
    write(record: RenderedRecord): void | Promise<void>;
}
