/**
 * @fileoverview Shared directory fixture for app tests
 */

import type { DirectoryFixture } from "../domain/seed/directoryFixture.js";

/**
 * alice is connected to bob and carol; both know dave. alice shares two
 * tags with dave and one with erin, and belongs to "club" with frank
 * (pending) and gina.
 */
export const SMALL_DIRECTORY: DirectoryFixture = {
    users: [
        { id: "alice", firstName: "Alice", tags: ["hiking", "chess"] },
        { id: "bob", firstName: "Bob" },
        { id: "carol", firstName: "Carol", email: "carol@example.test" },
        { id: "dave", firstName: "Dave", tags: ["chess", "hiking"] },
        { id: "erin", firstName: "Erin", tags: ["hiking"] },
        { id: "frank", firstName: "Frank" },
        { id: "gina", firstName: "Gina", preferredName: "G" },
    ],
    groups: [
        { id: "club", title: "Club", members: ["alice", "gina", "frank"] },
    ],
    connections: [
        { owner: "alice", target: "bob", state: "ACCEPTED" },
        { owner: "alice", target: "carol", state: "ACCEPTED" },
        { owner: "bob", target: "dave", state: "ACCEPTED" },
        { owner: "carol", target: "dave", state: "ACCEPTED" },
        { owner: "carol", target: "alice", state: "ACCEPTED" },
        { owner: "bob", target: "erin", state: "PENDING" },
        { owner: "alice", target: "frank", state: "PENDING" },
    ],
};
