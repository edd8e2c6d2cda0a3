/**
 * @fileoverview SQLite adapter barrel exports
 *
 * @module adapters/sqlite
 */

export {
    DirectoryDatabase,
    type DirectoryDatabaseOptions,
    type UserRow,
    type GroupRow,
    type ContactOfContactRow,
    type SharedTagRow,
    type UserRecord,
} from "./directory-db.js";
