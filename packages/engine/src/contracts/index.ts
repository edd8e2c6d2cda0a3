/**
 * @fileoverview Contract barrel exports
 *
 * Interfaces and types shared by the feed engine and its adapters.
 *
 * @module @relatedfeed/engine/contracts
 */

// Authorizables
export type { Authorizable, EntityId, Group, UserProfile } from "./Authorizable.js";
export { isGroup, isUserProfile } from "./Authorizable.js";

// Candidate results
export type {
    CandidateResult,
    CandidateStream,
    CandidateVariant,
} from "./CandidateResult.js";
export {
    ResourceKind,
    classifyCandidate,
    lastPathSegment,
} from "./CandidateResult.js";

// Collaborators
export type {
    ConnectionService,
    ConnectionState,
    DirectoryService,
    ProfileFormatter,
    SearchCriteria,
    SearchSource,
} from "./Collaborators.js";

// Output
export type { RecordWriter, RenderedRecord } from "./RecordWriter.js";

// Errors
export {
    AuthorizationDeniedError,
    CallerContractError,
    FeedAssemblyError,
    FeedError,
    RequesterNotFoundError,
    StorageError,
    describeError,
} from "./errors.js";

// Logging
export type { FeedLogger } from "./Logger.js";
export { consoleLogger, silentLogger, createScopedLogger } from "./Logger.js";

// EventBus
export type {
    EventBus,
    EventPayload,
    EventHandler,
    EventType,
    FeedEventType,
    Subscription,
} from "./EventBus.js";
export { createEvent } from "./EventBus.js";
