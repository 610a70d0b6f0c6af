// ============================================================
// Access scope
// Every read/write is keyed by exactly one owner: the
// authenticated user id, or the anonymous session id.
// ============================================================

import { randomUUID } from "node:crypto";

export interface AuthenticatedUser {
    userId: string;
    email?: string | null;
    name?: string | null;
}

export type UserIdentity = { kind: "user" } & AuthenticatedUser;
export type SessionIdentity = { kind: "session"; sessionId: string };
export type Identity = UserIdentity | SessionIdentity;

export type OwnerKey =
    | { field: "userId"; column: "user_id"; value: string }
    | { field: "sessionId"; column: "session_id"; value: string };

export interface OwnerColumns {
    userId: string | null;
    sessionId: string | null;
}

export interface ResolveIdentityInput {
    user?: AuthenticatedUser | null;
    sessionId?: string | null;
}

/**
 * A verified user always wins over a session cookie. Without either,
 * a fresh session id is minted; data stamped with it is reachable only
 * for as long as the caller keeps presenting that id.
 */
export function resolveIdentity(input: ResolveIdentityInput): Identity {
    const userId = input.user?.userId.trim();
    if (input.user && userId) {
        return {
            kind: "user",
            userId,
            email: input.user.email ?? null,
            name: input.user.name ?? null,
        };
    }
    const sessionId = input.sessionId?.trim();
    return { kind: "session", sessionId: sessionId || randomUUID() };
}

export function isAuthenticated(identity: Identity): identity is UserIdentity {
    return identity.kind === "user";
}

export function ownerKey(identity: Identity): OwnerKey {
    return identity.kind === "user"
        ? { field: "userId", column: "user_id", value: identity.userId }
        : { field: "sessionId", column: "session_id", value: identity.sessionId };
}

export function ownerColumns(identity: Identity): OwnerColumns {
    return identity.kind === "user"
        ? { userId: identity.userId, sessionId: null }
        : { userId: null, sessionId: identity.sessionId };
}

export function ownsRow(key: OwnerKey, row: OwnerColumns): boolean {
    return row[key.field] === key.value;
}

/** Users rows require an email; some identity providers omit it. */
export function userEmail(user: AuthenticatedUser): string {
    return user.email || `${user.userId}@users.local`;
}

export function describeIdentity(identity: Identity): string {
    return identity.kind === "user"
        ? `user ${identity.userId}`
        : `session ${identity.sessionId}`;
}
