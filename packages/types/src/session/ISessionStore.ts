import type { IUserSession, IUserSessionUpdate } from './IUserSession.js';
import type { Permission, ResourceType } from './permissions.js';

/**
 * Authenticated session records with roles, TTL and permission checks.
 *
 * Expired sessions behave exactly like missing ones on every method.
 */
export interface ISessionStore {
    /**
     * Create a session.
     *
     * @param sessionId - Unique session identifier
     * @param userId - User the session belongs to
     * @param roles - Role names, empty by default
     * @param ttl - Lifetime in seconds; the backend default applies when omitted
     * @param metadata - Additional session data
     * @returns The stored session
     */
    createSession(
        sessionId: string,
        userId: string,
        roles?: string[] | null,
        ttl?: number | null,
        metadata?: Record<string, unknown> | null
    ): Promise<IUserSession>;

    /**
     * Get a live session.
     *
     * @returns The session, or `null` when it does not exist or has expired
     */
    getSession(sessionId: string): Promise<IUserSession | null>;

    /**
     * Check that a session exists and has not expired.
     */
    validateSession(sessionId: string): Promise<boolean>;

    /**
     * Delete a session.
     *
     * @returns `true` if the session existed
     */
    deleteSession(sessionId: string): Promise<boolean>;

    /**
     * Push a session's expiry forward.
     *
     * Without `extendTtl` the session's original duration
     * (`expiresAt - createdAt`) is reused.
     *
     * @returns `false` when the session is missing or already expired
     */
    refreshSession(sessionId: string, extendTtl?: number | null): Promise<boolean>;

    /**
     * Replace a live session's roles and/or metadata.
     *
     * @returns The updated session, or `null` when it is missing or expired
     */
    updateSession(sessionId: string, update: IUserSessionUpdate): Promise<IUserSession | null>;

    /**
     * List a user's live sessions.
     */
    listUserSessions(userId: string): Promise<IUserSession[]>;

    /**
     * Check whether a session may perform an action on a resource.
     *
     * Resolves role permissions first, then resource-scoped grants stored in
     * the session metadata, combined according to the store's permission
     * policy.
     */
    checkPermission(
        sessionId: string,
        resourceType: ResourceType,
        resourceId: string,
        permission: Permission
    ): Promise<boolean>;

    /**
     * Configure the permissions granted by a role.
     */
    setRolePermissions(role: string, permissions: Iterable<Permission>): Promise<void>;

    /**
     * Get the permissions granted by a role (empty for unknown roles).
     */
    getRolePermissions(role: string): Promise<Permission[]>;
}
