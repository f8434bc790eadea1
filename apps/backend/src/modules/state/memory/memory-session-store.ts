import {
    DEFAULT_PERMISSION_POLICY,
    DEFAULT_ROLE_PERMISSIONS,
    type IPermissionPolicy,
    type ISessionStore,
    type IUserSession,
    type IUserSessionUpdate,
    type Permission,
    type ResourceType
} from '@meshstate/types';
import { AsyncLock } from '../../../lib/async-lock.js';
import { nowSeconds } from '../../../lib/clock.js';
import { resolvePermission } from '../services/permission-resolver.js';

function copySession(session: IUserSession): IUserSession {
    return { ...session, roles: [...session.roles], metadata: { ...session.metadata } };
}

function isExpired(session: IUserSession, now: number): boolean {
    return session.expiresAt !== null && session.expiresAt < now;
}

/**
 * Sessions and role permissions held in process memory.
 *
 * A session created without a TTL never expires. Expired sessions are
 * dropped lazily by whichever read path finds them.
 */
export class MemorySessionStore implements ISessionStore {
    private readonly sessions = new Map<string, IUserSession>();
    private readonly userSessions = new Map<string, Set<string>>();
    private readonly rolePermissions = new Map<string, Set<Permission>>();
    private readonly lock = new AsyncLock();

    constructor(private readonly policy: IPermissionPolicy = DEFAULT_PERMISSION_POLICY) {
        for (const [role, permissions] of Object.entries(DEFAULT_ROLE_PERMISSIONS)) {
            this.rolePermissions.set(role, new Set(permissions));
        }
    }

    async createSession(
        sessionId: string,
        userId: string,
        roles: string[] | null = null,
        ttl: number | null = null,
        metadata: Record<string, unknown> | null = null
    ): Promise<IUserSession> {
        return this.lock.run(() => {
            const now = nowSeconds();
            const session: IUserSession = {
                sessionId,
                userId,
                roles: [...(roles ?? [])],
                createdAt: now,
                expiresAt: ttl ? now + ttl : null,
                metadata: { ...(metadata ?? {}) }
            };

            this.sessions.set(sessionId, session);
            let owned = this.userSessions.get(userId);
            if (!owned) {
                owned = new Set();
                this.userSessions.set(userId, owned);
            }
            owned.add(sessionId);

            return copySession(session);
        });
    }

    async getSession(sessionId: string): Promise<IUserSession | null> {
        return this.lock.run(() => {
            const session = this.liveSession(sessionId);
            return session ? copySession(session) : null;
        });
    }

    async validateSession(sessionId: string): Promise<boolean> {
        return (await this.getSession(sessionId)) !== null;
    }

    async deleteSession(sessionId: string): Promise<boolean> {
        return this.lock.run(() => {
            const session = this.sessions.get(sessionId);
            if (!session) {
                return false;
            }
            this.forget(session);
            return true;
        });
    }

    async refreshSession(sessionId: string, extendTtl: number | null = null): Promise<boolean> {
        return this.lock.run(() => {
            const session = this.sessions.get(sessionId);
            const now = nowSeconds();
            if (!session || isExpired(session, now)) {
                return false;
            }

            if (extendTtl !== null) {
                session.expiresAt = now + extendTtl;
            } else if (session.expiresAt !== null) {
                session.expiresAt = now + (session.expiresAt - session.createdAt);
            }
            return true;
        });
    }

    async updateSession(sessionId: string, update: IUserSessionUpdate): Promise<IUserSession | null> {
        return this.lock.run(() => {
            const session = this.liveSession(sessionId);
            if (!session) {
                return null;
            }
            if (update.roles) {
                session.roles = [...update.roles];
            }
            if (update.metadata) {
                session.metadata = { ...update.metadata };
            }
            return copySession(session);
        });
    }

    async listUserSessions(userId: string): Promise<IUserSession[]> {
        return this.lock.run(() => {
            const result: IUserSession[] = [];
            for (const sessionId of Array.from(this.userSessions.get(userId) ?? [])) {
                const session = this.liveSession(sessionId);
                if (session) {
                    result.push(copySession(session));
                }
            }
            return result;
        });
    }

    async checkPermission(
        sessionId: string,
        resourceType: ResourceType,
        resourceId: string,
        permission: Permission
    ): Promise<boolean> {
        const session = await this.getSession(sessionId);
        if (!session) {
            return false;
        }
        return resolvePermission({
            session,
            resourceType,
            resourceId,
            permission,
            rolePermissions: this.rolePermissions,
            policy: this.policy
        });
    }

    async setRolePermissions(role: string, permissions: Iterable<Permission>): Promise<void> {
        this.rolePermissions.set(role, new Set(permissions));
    }

    async getRolePermissions(role: string): Promise<Permission[]> {
        return Array.from(this.rolePermissions.get(role) ?? []);
    }

    private liveSession(sessionId: string): IUserSession | null {
        const session = this.sessions.get(sessionId);
        if (!session) {
            return null;
        }
        if (isExpired(session, nowSeconds())) {
            this.forget(session);
            return null;
        }
        return session;
    }

    private forget(session: IUserSession): void {
        this.sessions.delete(session.sessionId);
        const owned = this.userSessions.get(session.userId);
        if (owned) {
            owned.delete(session.sessionId);
            if (owned.size === 0) {
                this.userSessions.delete(session.userId);
            }
        }
    }
}
