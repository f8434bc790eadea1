/**
 * An authenticated user session.
 *
 * A session whose `expiresAt` lies in the past is treated as absent by every
 * read path, even when the backend has not purged it yet.
 */
export interface IUserSession {
    sessionId: string;

    userId: string;

    /**
     * Role names used for role-based permission checks.
     */
    roles: string[];

    /**
     * Unix timestamp (seconds) when the session was created.
     */
    createdAt: number;

    /**
     * Unix timestamp (seconds) when the session expires, or `null` for a
     * session that never expires.
     */
    expiresAt: number | null;

    /**
     * Additional session data.
     *
     * Resource-scoped grants live under `permissions`, keyed
     * `"<resourceType>:<resourceId>"`:
     *
     * ```json
     * { "permissions": { "widget:chart-1": ["read", "write"] } }
     * ```
     */
    metadata: Record<string, unknown>;
}

/**
 * Mutable parts of a session, changed by the auth layer that owns it.
 */
export interface IUserSessionUpdate {
    roles?: string[];
    metadata?: Record<string, unknown>;
}
