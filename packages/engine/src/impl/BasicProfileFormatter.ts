/**
 * @fileoverview Basic profile formatter
 *
 * Projects an authorizable onto a bounded set of public fields.
 *
 * @module @relatedfeed/engine/impl/BasicProfileFormatter
 */

import type { Authorizable } from "../contracts/Authorizable.js";
import type { ProfileFormatter } from "../contracts/Collaborators.js";

/**
 * Public profile fields copied when present.
 */
export const BASIC_PROFILE_FIELDS: readonly string[] = [
    "firstName",
    "lastName",
    "email",
    "picture",
    "preferredName",
];

/**
 * Copies `userid` plus whichever public fields the profile has set.
 * Private properties never leave the directory.
 *
 * @example
 * ```typescript
 * new BasicProfileFormatter().getPublicFields({
 *     kind: "user", id: "bob", principals: [],
 *     properties: { firstName: "Bob", phone: "555-0100" },
 * });
 * // => { userid: "bob", firstName: "Bob" }
 * ```
 */
export class BasicProfileFormatter implements ProfileFormatter {
    constructor(private readonly fields: readonly string[] = BASIC_PROFILE_FIELDS) {}

    getPublicFields(authorizable: Authorizable): Readonly<Record<string, unknown>> {
        const projection: Record<string, unknown> = { userid: authorizable.id };

        for (const field of this.fields) {
            const value = authorizable.properties[field];
            if (value !== undefined && value !== null) {
                projection[field] = value;
            }
        }

        return projection;
    }
}
