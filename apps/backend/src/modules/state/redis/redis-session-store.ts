import type { Redis as RedisClient } from 'ioredis';
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
import { nowSeconds } from '../../../lib/clock.js';
import { resolvePermission } from '../services/permission-resolver.js';
import type { RedisKeys } from './keys.js';
import { execPipeline, numberField, parseJsonObject, parseStringList, ttlSeconds } from './pipeline.js';

export interface IRedisSessionStoreOptions {
    client: RedisClient;
    keys: RedisKeys;
    /** Lifetime in seconds of sessions created without an explicit TTL. */
    defaultTtl: number;
    policy?: IPermissionPolicy;
}

/**
 * Sessions and role permissions shared through Redis.
 *
 * Every session carries a TTL (the configured default when none is given),
 * which is kept both as the key expiry and as `expires_at` in the hash.
 * Role permissions live in one hash, seeded with the built-in roles the first
 * time this store touches it.
 */
export class RedisSessionStore implements ISessionStore {
    private readonly client: RedisClient;
    private readonly keys: RedisKeys;
    private readonly defaultTtl: number;
    private readonly policy: IPermissionPolicy;
    private seeding: Promise<void> | null = null;

    constructor(options: IRedisSessionStoreOptions) {
        this.client = options.client;
        this.keys = options.keys;
        this.defaultTtl = options.defaultTtl;
        this.policy = options.policy ?? DEFAULT_PERMISSION_POLICY;
    }

    async createSession(
        sessionId: string,
        userId: string,
        roles: string[] | null = null,
        ttl: number | null = null,
        metadata: Record<string, unknown> | null = null
    ): Promise<IUserSession> {
        const lifetime = ttl ?? this.defaultTtl;
        const createdAt = nowSeconds();
        const session: IUserSession = {
            sessionId,
            userId,
            roles: [...(roles ?? [])],
            createdAt,
            expiresAt: createdAt + lifetime,
            metadata: { ...(metadata ?? {}) }
        };

        const key = this.keys.session(sessionId);
        await execPipeline(
            this.client
                .multi()
                .hset(key, {
                    user_id: userId,
                    roles: JSON.stringify(session.roles),
                    created_at: String(createdAt),
                    expires_at: String(session.expiresAt),
                    ttl: String(lifetime),
                    metadata: JSON.stringify(session.metadata)
                })
                .expire(key, ttlSeconds(lifetime))
                .sadd(this.keys.userSessions(userId), sessionId),
            'session create'
        );

        return session;
    }

    async getSession(sessionId: string): Promise<IUserSession | null> {
        const stored = await this.readSession(sessionId);
        if (!stored) {
            return null;
        }
        if (stored.session.expiresAt !== null && stored.session.expiresAt < nowSeconds()) {
            await this.deleteSession(sessionId);
            return null;
        }
        return stored.session;
    }

    async validateSession(sessionId: string): Promise<boolean> {
        return (await this.getSession(sessionId)) !== null;
    }

    async deleteSession(sessionId: string): Promise<boolean> {
        const key = this.keys.session(sessionId);
        const userId = await this.client.hget(key, 'user_id');
        if (userId === null) {
            return false;
        }
        const [deleted] = await execPipeline(
            this.client.multi().del(key).srem(this.keys.userSessions(userId), sessionId),
            'session delete'
        );
        return deleted === 1;
    }

    async refreshSession(sessionId: string, extendTtl: number | null = null): Promise<boolean> {
        const stored = await this.readSession(sessionId);
        const now = nowSeconds();
        if (!stored || (stored.session.expiresAt !== null && stored.session.expiresAt < now)) {
            return false;
        }

        const lifetime = extendTtl ?? stored.ttl;
        const key = this.keys.session(sessionId);
        await execPipeline(
            this.client
                .multi()
                .hset(key, 'expires_at', String(now + lifetime))
                .expire(key, ttlSeconds(lifetime)),
            'session refresh'
        );
        return true;
    }

    async updateSession(sessionId: string, update: IUserSessionUpdate): Promise<IUserSession | null> {
        const session = await this.getSession(sessionId);
        if (!session) {
            return null;
        }

        const fields: Record<string, string> = {};
        if (update.roles) {
            session.roles = [...update.roles];
            fields['roles'] = JSON.stringify(session.roles);
        }
        if (update.metadata) {
            session.metadata = { ...update.metadata };
            fields['metadata'] = JSON.stringify(session.metadata);
        }
        if (Object.keys(fields).length > 0) {
            await this.client.hset(this.keys.session(sessionId), fields);
        }
        return session;
    }

    async listUserSessions(userId: string): Promise<IUserSession[]> {
        const setKey = this.keys.userSessions(userId);
        const sessionIds = await this.client.smembers(setKey);

        const sessions: IUserSession[] = [];
        const stale: string[] = [];
        for (const sessionId of sessionIds) {
            const session = await this.getSession(sessionId);
            if (session) {
                sessions.push(session);
            } else {
                stale.push(sessionId);
            }
        }

        if (stale.length > 0) {
            await this.client.srem(setKey, ...stale);
        }
        return sessions;
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

        const rolePermissions = new Map<string, Set<Permission>>();
        if (session.roles.length > 0) {
            await this.ensureRolesSeeded();
            const stored = await this.client.hmget(this.keys.rolePermissions, ...session.roles);
            session.roles.forEach((role, index) => {
                rolePermissions.set(role, new Set(parseStringList(stored[index])));
            });
        }

        return resolvePermission({
            session,
            resourceType,
            resourceId,
            permission,
            rolePermissions,
            policy: this.policy
        });
    }

    async setRolePermissions(role: string, permissions: Iterable<Permission>): Promise<void> {
        await this.ensureRolesSeeded();
        const unique = Array.from(new Set(permissions));
        await this.client.hset(this.keys.rolePermissions, role, JSON.stringify(unique));
    }

    async getRolePermissions(role: string): Promise<Permission[]> {
        await this.ensureRolesSeeded();
        return parseStringList(await this.client.hget(this.keys.rolePermissions, role));
    }

    private async readSession(sessionId: string): Promise<{ session: IUserSession; ttl: number } | null> {
        const fields = await this.client.hgetall(this.keys.session(sessionId));
        if (fields['user_id'] === undefined) {
            return null;
        }

        const createdAt = numberField(fields['created_at']);
        const expiresAt = fields['expires_at'] ? numberField(fields['expires_at']) : null;
        const storedTtl = numberField(fields['ttl']);
        const ttl = storedTtl > 0 ? storedTtl : expiresAt !== null ? expiresAt - createdAt : this.defaultTtl;

        return {
            session: {
                sessionId,
                userId: fields['user_id'],
                roles: parseStringList(fields['roles']),
                createdAt,
                expiresAt,
                metadata: parseJsonObject(fields['metadata'])
            },
            ttl
        };
    }

    /**
     * Write the built-in roles unless some worker already has; HSETNX keeps
     * permissions an operator changed.
     */
    private ensureRolesSeeded(): Promise<void> {
        if (!this.seeding) {
            const pipeline = this.client.pipeline();
            for (const [role, permissions] of Object.entries(DEFAULT_ROLE_PERMISSIONS)) {
                pipeline.hsetnx(this.keys.rolePermissions, role, JSON.stringify(permissions));
            }
            this.seeding = execPipeline(pipeline, 'role seed').then(
                () => undefined,
                (error: unknown) => {
                    this.seeding = null;
                    throw error;
                }
            );
        }
        return this.seeding;
    }
}
