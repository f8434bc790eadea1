/// <reference types="vitest" />

import { describe, it, expect, vi } from 'vitest';
import type { IUserSession } from '@meshstate/types';
import { checkWidgetPermission, hasPermission, isAdmin } from '../access.js';
import { MemorySessionStore } from '../../state/memory/memory-session-store.js';

function session(roles: string[]): IUserSession {
    return { sessionId: 's-1', userId: 'user-1', roles, createdAt: 1_700_000_000, expiresAt: null, metadata: {} };
}

describe('access helpers', () => {
    describe('hasPermission', () => {
        it('should use the built-in role table', () => {
            expect(hasPermission(session(['viewer']), 'read')).toBe(true);
            expect(hasPermission(session(['viewer']), 'write')).toBe(false);
            expect(hasPermission(session(['viewer', 'editor']), 'write')).toBe(true);
            expect(hasPermission(session(['admin']), 'manage_users')).toBe(true);
        });

        it('should deny unknown roles and missing sessions', () => {
            expect(hasPermission(session(['guest']), 'read')).toBe(false);
            expect(hasPermission(session(['anonymous']), 'read')).toBe(false);
            expect(hasPermission(null, 'read')).toBe(false);
        });
    });

    describe('isAdmin', () => {
        it('should look for the admin role', () => {
            expect(isAdmin(session(['editor', 'admin']))).toBe(true);
            expect(isAdmin(session(['editor']))).toBe(false);
            expect(isAdmin(null)).toBe(false);
        });
    });

    describe('checkWidgetPermission', () => {
        it('should ask the session store about the widget', async () => {
            const store = { checkPermission: vi.fn().mockResolvedValue(true) };

            expect(await checkWidgetPermission(session(['viewer']), 'chart-1', 'write', store)).toBe(true);
            expect(store.checkPermission).toHaveBeenCalledWith('s-1', 'widget', 'chart-1', 'write');
        });

        it('should deny without a session', async () => {
            const store = { checkPermission: vi.fn().mockResolvedValue(true) };

            expect(await checkWidgetPermission(null, 'chart-1', 'read', store)).toBe(false);
            expect(store.checkPermission).not.toHaveBeenCalled();
        });

        it('should apply stored role permissions', async () => {
            const store = new MemorySessionStore();
            const created = await store.createSession('s-2', 'user-2', ['editor']);

            expect(await checkWidgetPermission(created, 'chart-1', 'write', store)).toBe(true);
            expect(await checkWidgetPermission(created, 'chart-1', 'delete', store)).toBe(false);
        });
    });
});
