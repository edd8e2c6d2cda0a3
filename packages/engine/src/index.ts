/**
 * @fileoverview Related Contacts Feed Engine
 *
 * Assembles a deduplicated, quota-bounded list of people related to a
 * requester.
 *
 * The engine provides:
 * - Lazy consumption of an externally ranked candidate stream
 * - Randomized fallback to co-members of the requester's groups
 * - Exclusion of the requester, existing contacts and duplicates
 * - Partial results when authorization is denied mid-run
 *
 * @module @relatedfeed/engine
 * @example
 * ```typescript
 * import {
 *     RelatedContactsAssembler,
 *     RelatedContactsBatchProcessor,
 *     BasicProfileFormatter,
 *     JsonRecordWriter,
 * } from "@relatedfeed/engine";
 *
 * const processor = new RelatedContactsBatchProcessor({
 *     searchSource,
 *     connections,
 *     assembler: new RelatedContactsAssembler({ directory, formatter: new BasicProfileFormatter() }),
 * });
 *
 * const writer = new JsonRecordWriter(process.stdout, 25);
 * await processor.process({ requesterId: "alice", parameters: {} }, writer);
 * writer.close();
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

export * from "./contracts/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export * from "./engine/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export * from "./impl/index.js";
