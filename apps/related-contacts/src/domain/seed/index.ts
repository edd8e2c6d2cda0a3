/**
 * @fileoverview Seed barrel exports
 *
 * @module domain/seed
 */

export {
    loadDirectoryFixture,
    parseDirectoryFixture,
    seedDirectory,
    type DirectoryFixture,
    type FixtureUser,
    type FixtureGroup,
    type FixtureConnection,
} from "./directoryFixture.js";
