/**
 * @fileoverview Unit tests for JsonRecordWriter and CollectingRecordWriter
 *
 * @module @relatedfeed/engine/__tests__/JsonRecordWriter
 */

import { describe, it, expect } from "vitest";
import { CollectingRecordWriter, JsonRecordWriter, type TextSink } from "../impl/JsonRecordWriter.js";

class StringSink implements TextSink {
    chunks: string[] = [];

    write(chunk: string): boolean {
        this.chunks.push(chunk);
        return true;
    }

    get text(): string {
        return this.chunks.join("");
    }
}

describe("JsonRecordWriter", () => {
    it("should write a complete document", () => {
        const sink = new StringSink();
        const writer = new JsonRecordWriter(sink, 11);

        writer.write({ target: "bob", profile: { userid: "bob", firstName: "Bob" } });
        writer.write({ target: "carol", profile: { userid: "carol" } });
        writer.close();

        expect(sink.text).toBe(
            '{"items":11,"results":[' +
            '{"target":"bob","profile":{"userid":"bob","firstName":"Bob"}},' +
            '{"target":"carol","profile":{"userid":"carol"}}' +
            '],"total":2}\n'
        );
        expect(JSON.parse(sink.text)).toEqual({
            items  : 11,
            results: [
                { target: "bob", profile: { userid: "bob", firstName: "Bob" } },
                { target: "carol", profile: { userid: "carol" } },
            ],
            total: 2,
        });
        expect(writer.written).toBe(2);
    });

    it("should write an empty document when nothing was written", () => {
        const sink = new StringSink();
        const writer = new JsonRecordWriter(sink, 25);

        writer.close();

        expect(sink.text).toBe('{"items":25,"results":[],"total":0}\n');
    });

    it("should stream each record as it is written", () => {
        const sink = new StringSink();
        const writer = new JsonRecordWriter(sink, 5);

        writer.write({ target: "bob", profile: {} });

        expect(sink.chunks).toEqual(['{"items":5,"results":[', '{"target":"bob","profile":{}}']);
    });

    it("should write the header only once", () => {
        const sink = new StringSink();
        const writer = new JsonRecordWriter(sink, 5);

        writer.open();
        writer.open();
        writer.close();
        writer.close();

        expect(sink.text).toBe('{"items":5,"results":[],"total":0}\n');
    });

    it("should reject writes after close", () => {
        const writer = new JsonRecordWriter(new StringSink(), 5);
        writer.close();

        expect(() => writer.write({ target: "bob", profile: {} })).toThrow("JsonRecordWriter is closed");
    });
});

describe("CollectingRecordWriter", () => {
    it("should keep records in write order", () => {
        const writer = new CollectingRecordWriter();

        writer.write({ target: "bob", profile: {} });
        writer.write({ target: "carol", profile: {} });

        expect(writer.records.map((r) => r.target)).toEqual(["bob", "carol"]);
    });
});
