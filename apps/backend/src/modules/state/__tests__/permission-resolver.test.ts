/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import type { IUserSession, Permission } from '@meshstate/types';
import { resolvePermission, resourceGrantFor, resourceKey } from '../services/permission-resolver.js';

const rolePermissions = new Map<string, Set<Permission>>([
    ['admin', new Set<Permission>(['read', 'write', 'admin'])],
    ['viewer', new Set<Permission>(['read'])]
]);

function session(roles: string[], metadata: Record<string, unknown> = {}): IUserSession {
    return { sessionId: 's1', userId: 'u1', roles, createdAt: 0, expiresAt: null, metadata };
}

describe('permission resolver', () => {
    it('should build resource keys', () => {
        expect(resourceKey('widget', 'w1')).toBe('widget:w1');
    });

    it('should ignore malformed grant metadata', () => {
        expect(resourceGrantFor(session([], { permissions: 'all' }), 'widget', 'w1')).toBeNull();
        expect(resourceGrantFor(session([], { permissions: { 'widget:w1': [1] } }), 'widget', 'w1')).toBeNull();
        expect(resourceGrantFor(session([], { permissions: { 'widget:w1': ['read'] } }), 'widget', 'w1')).toEqual(['read']);
    });

    it('should grant through either layer under union', () => {
        const policy = { resourceGrants: 'union' as const, privilegedRoles: ['admin'] };
        const viewer = session(['viewer'], { permissions: { 'widget:w1': ['write'] } });

        expect(resolvePermission({ session: viewer, resourceType: 'widget', resourceId: 'w1', permission: 'write', rolePermissions, policy })).toBe(true);
        expect(resolvePermission({ session: viewer, resourceType: 'widget', resourceId: 'w1', permission: 'read', rolePermissions, policy })).toBe(true);
        expect(resolvePermission({ session: viewer, resourceType: 'widget', resourceId: 'w2', permission: 'write', rolePermissions, policy })).toBe(false);
    });

    it('should let explicit grants narrow access under scoped', () => {
        const policy = { resourceGrants: 'scoped' as const, privilegedRoles: ['admin'] };
        const viewer = session(['viewer'], { permissions: { 'widget:w1': [] } });
        const admin = session(['admin'], { permissions: { 'widget:w1': [] } });

        expect(resolvePermission({ session: viewer, resourceType: 'widget', resourceId: 'w1', permission: 'read', rolePermissions, policy })).toBe(false);
        expect(resolvePermission({ session: viewer, resourceType: 'widget', resourceId: 'w2', permission: 'read', rolePermissions, policy })).toBe(true);
        expect(resolvePermission({ session: admin, resourceType: 'widget', resourceId: 'w1', permission: 'write', rolePermissions, policy })).toBe(true);
    });
});
