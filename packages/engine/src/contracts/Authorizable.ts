/**
 * Authorizable Contract
 *
 * Anything the directory can resolve by identifier: a person's profile
 * or a group. Lookups are polymorphic, so callers narrow on `kind`
 * before reading group-only fields such as `members`.
 *
 * Authorizables are read-only within an assembly run.
 */

/**
 * Opaque identifier for a person, account or group.
 * Compared by exact string equality, never normalized.
 */
export type EntityId = string;

/**
 * Fields shared by every authorizable.
 */
interface AuthorizableBase {
    /** Directory identifier */
    readonly id: EntityId;

    /** Stored profile properties (names, email, picture, ...) */
    readonly properties: Readonly<Record<string, unknown>>;

    /** Groups this authorizable belongs to */
    readonly principals: readonly EntityId[];
}

/**
 * A person's account and profile.
 */
export interface UserProfile extends AuthorizableBase {
    readonly kind: "user";
}

/**
 * A group of authorizables.
 */
export interface Group extends AuthorizableBase {
    readonly kind: "group";

    /** Identifiers of the group's members */
    readonly members: readonly EntityId[];
}

/**
 * Result of a directory lookup.
 *
 * @example
 * ```typescript
 * const found = await directory.findAuthorizable("alice");
 * if (found && isGroup(found)) {
 *     console.log(found.members);
 * }
 * ```
 */
export type Authorizable = UserProfile | Group;

/**
 * Type guard for groups.
 */
export function isGroup(authorizable: Authorizable): authorizable is Group {
    return authorizable.kind === "group";
}

/**
 * Type guard for user profiles.
 */
export function isUserProfile(authorizable: Authorizable): authorizable is UserProfile {
    return authorizable.kind === "user";
}
