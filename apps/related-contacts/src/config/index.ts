/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadFeedConfig,
    loadFeedConfigWithFallback,
    getDefaultConfig,
    type FeedConfig,
} from "./loadFeedConfig.js";
