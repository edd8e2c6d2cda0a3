/**
 * @fileoverview Engine barrel exports
 *
 * @module @relatedfeed/engine/engine
 */

export { DedupLedger, isEligible, markProcessed } from "./DedupLedger.js";
export { shuffle, type RandomSource } from "./shuffle.js";
export { EntityRenderer, type EntityRendererOptions } from "./EntityRenderer.js";
export {
    PrimaryStreamConsumer,
    type PrimaryStreamConsumerOptions,
    type PrimaryStreamOutcome,
} from "./PrimaryStreamConsumer.js";
export {
    FallbackCandidateCollector,
    type FallbackCandidateCollectorOptions,
    type FallbackOutcome,
} from "./FallbackCandidateCollector.js";
export {
    RelatedContactsAssembler,
    DEFAULT_MINIMUM_ACCEPTABLE,
    type AssemblerConfig,
    type AssemblyOutcome,
    type AssemblyPhase,
    type AssemblyRequest,
    type AssemblyStatus,
} from "./RelatedContactsAssembler.js";
export {
    RelatedContactsBatchProcessor,
    resolveItemsPerPage,
    DEFAULT_ITEMS_PER_PAGE,
    PARAM_ITEMS_PER_PAGE,
    type BatchProcessorConfig,
    type FeedRequest,
    type SearchBatchResultProcessor,
} from "./RelatedContactsBatchProcessor.js";
