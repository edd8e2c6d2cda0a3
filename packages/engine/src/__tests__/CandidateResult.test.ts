/**
 * @fileoverview Unit tests for candidate classification
 *
 * @module @relatedfeed/engine/__tests__/CandidateResult
 */

import { describe, it, expect } from "vitest";
import { classifyCandidate, lastPathSegment } from "../contracts/CandidateResult.js";
import { CallerContractError } from "../contracts/errors.js";

describe("lastPathSegment", () => {
    it("should return the text after the final slash", () => {
        expect(lastPathSegment("/contacts/alice/bob")).toBe("bob");
    });

    it("should return the whole path when it has no slash", () => {
        expect(lastPathSegment("bob")).toBe("bob");
    });

    it("should return an empty string for a trailing slash", () => {
        expect(lastPathSegment("/contacts/alice/")).toBe("");
    });
});

describe("classifyCandidate", () => {
    // Scenario: Contact record uses the last path segment
    it("should derive a contact id from the last path segment", () => {
        const variant = classifyCandidate({
            resourceKind: "contact",
            path        : "/contacts/alice/bob",
            properties  : {},
        });

        expect(variant).toEqual({ kind: "contact", entityId: "bob" });
    });

    // Scenario: Profile record uses the full path
    it("should use the full path as a profile id", () => {
        const variant = classifyCandidate({
            resourceKind: "profile",
            path        : "people/carol",
            properties  : {},
        });

        expect(variant).toEqual({ kind: "profile", entityId: "people/carol" });
    });

    // Scenario: Unknown and missing kinds are explicit variants
    it("should classify unknown or missing kinds as unrecognized", () => {
        expect(classifyCandidate({ resourceKind: "pooled-content", path: "/p/x", properties: {} }))
            .toEqual({ kind: "unrecognized", resourceKind: "pooled-content" });
        expect(classifyCandidate({ path: "/p/y", properties: {} }))
            .toEqual({ kind: "unrecognized", resourceKind: undefined });
    });

    // Scenario: Malformed locators break the caller contract
    it("should throw CallerContractError for an empty contact id", () => {
        expect(() => classifyCandidate({
            resourceKind: "contact",
            path        : "/contacts/alice/",
            properties  : {},
        })).toThrow(CallerContractError);
    });

    it("should throw CallerContractError for an empty profile path", () => {
        expect(() => classifyCandidate({ resourceKind: "profile", path: "", properties: {} }))
            .toThrow('Missing entity id in profile result: ""');
    });
});
