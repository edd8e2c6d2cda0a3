/**
 * @fileoverview JSON record writers
 *
 * `JsonRecordWriter` streams a paginated search-results document:
 *
 * ```json
 * {"items":25,"results":[{"target":"bob","profile":{...}},...],"total":2}
 * ```
 *
 * Records are serialized as soon as they are written, so a consumer
 * reading the output sees them in emission order.
 *
 * @module @relatedfeed/engine/impl/JsonRecordWriter
 */

import type { RecordWriter, RenderedRecord } from "../contracts/RecordWriter.js";

/**
 * Anything text can be written to, e.g. `process.stdout` or a file stream.
 */
export interface TextSink {
    write(chunk: string): unknown;
}

type WriterState = "idle" | "open" | "closed";

export class JsonRecordWriter implements RecordWriter {
    private state: WriterState = "idle";
    private count = 0;

    constructor(
        private readonly out: TextSink,
        private readonly itemsPerPage: number
    ) {}

    /** Records written so far */
    get written(): number {
        return this.count;
    }

    /**
     * Write the document header. Called implicitly by the first write.
     */
    open(): void {
        if (this.state !== "idle") {
            return;
        }
        this.out.write(`{"items":${this.itemsPerPage},"results":[`);
        this.state = "open";
    }

    write(record: RenderedRecord): void {
        if (this.state === "closed") {
            throw new Error("JsonRecordWriter is closed");
        }
        this.open();

        const separator = this.count > 0 ? "," : "";
        this.out.write(separator + JSON.stringify({ target: record.target, profile: record.profile }));
        this.count++;
    }

    /**
     * Close the results array and write the total.
     */
    close(): void {
        if (this.state === "closed") {
            return;
        }
        this.open();
        this.out.write(`],"total":${this.count}}\n`);
        this.state = "closed";
    }
}

/**
 * Keeps records in memory.
 */
export class CollectingRecordWriter implements RecordWriter {
    readonly records: RenderedRecord[] = [];

    write(record: RenderedRecord): void {
        this.records.push(record);
    }
}
