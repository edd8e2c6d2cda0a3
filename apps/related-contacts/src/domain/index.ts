/**
 * @fileoverview Domain barrel exports
 *
 * SQLite-backed collaborators for the related-contacts app.
 *
 * @module domain
 */

export * from "./providers/index.js";
export * from "./seed/index.js";
