/**
 * @fileoverview Providers barrel exports
 *
 * @module domain/providers
 */

export { SqliteDirectoryService } from "./SqliteDirectoryService.js";
export { SqliteConnectionService } from "./SqliteConnectionService.js";
export { SqliteSearchSource } from "./SqliteSearchSource.js";
