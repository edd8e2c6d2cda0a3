/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @relatedfeed/engine/impl
 */

export { InMemoryEventBus } from "./InMemoryEventBus.js";
export {
    InMemoryDirectoryService,
    type InMemoryDirectoryOptions,
} from "./InMemoryDirectoryService.js";
export {
    InMemoryConnectionService,
    type ConnectionEntry,
} from "./InMemoryConnectionService.js";
export { InMemorySearchSource } from "./InMemorySearchSource.js";
export { BasicProfileFormatter, BASIC_PROFILE_FIELDS } from "./BasicProfileFormatter.js";
export {
    JsonRecordWriter,
    CollectingRecordWriter,
    type TextSink,
} from "./JsonRecordWriter.js";
