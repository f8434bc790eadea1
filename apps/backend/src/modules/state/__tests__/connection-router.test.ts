/// <reference types="vitest" />

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { IConnectionRouter } from '@meshstate/types';
import { MemoryConnectionRouter } from '../memory/memory-connection-router.js';
import { RedisConnectionRouter } from '../redis/redis-connection-router.js';
import { RedisKeys } from '../redis/keys.js';
import { createRedisMock, uniquePrefix } from '../../../tests/vitest/mocks/redis.js';

const NOW = 1_700_000_000_000;

const backends: Array<{ name: string; create: () => IConnectionRouter }> = [
    { name: 'memory', create: () => new MemoryConnectionRouter() },
    {
        name: 'redis',
        create: () => new RedisConnectionRouter({ client: createRedisMock(), keys: new RedisKeys(uniquePrefix()), ttl: 300 })
    }
];

describe.each(backends)('$name connection router', ({ create }) => {
    let router: IConnectionRouter;

    beforeEach(() => {
        vi.useFakeTimers({ toFake: ['Date'] });
        vi.setSystemTime(NOW);
        router = create();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('should record the owner of a connection', async () => {
        await router.registerConnection('w1', 'worker-a', 'user-1', 'session-1');

        expect(await router.getConnectionInfo('w1')).toEqual({
            widgetId: 'w1',
            workerId: 'worker-a',
            connectedAt: 1_700_000_000,
            lastHeartbeat: 1_700_000_000,
            userId: 'user-1',
            sessionId: 'session-1'
        });
        expect(await router.getOwner('w1')).toBe('worker-a');
        expect(await router.listWorkerConnections('worker-a')).toEqual(['w1']);
    });

    it('should default user and session to null', async () => {
        await router.registerConnection('w1', 'worker-a');

        expect(await router.getConnectionInfo('w1')).toMatchObject({ userId: null, sessionId: null });
    });

    it('should let the last registration win', async () => {
        await router.registerConnection('w1', 'worker-a');
        await router.registerConnection('w1', 'worker-b');

        expect(await router.getOwner('w1')).toBe('worker-b');
        expect(await router.listWorkerConnections('worker-a')).toEqual([]);
        expect(await router.listWorkerConnections('worker-b')).toEqual(['w1']);
    });

    it('should refresh the heartbeat of a live connection', async () => {
        await router.registerConnection('w1', 'worker-a');
        vi.setSystemTime(NOW + 10_000);

        expect(await router.refreshHeartbeat('w1')).toBe(true);

        expect(await router.getConnectionInfo('w1')).toMatchObject({
            connectedAt: 1_700_000_000,
            lastHeartbeat: 1_700_000_010
        });
    });

    it('should report a missing connection on heartbeat', async () => {
        expect(await router.refreshHeartbeat('missing')).toBe(false);
    });

    it('should unregister a connection once', async () => {
        await router.registerConnection('w1', 'worker-a');

        expect(await router.unregisterConnection('w1')).toBe(true);
        expect(await router.unregisterConnection('w1')).toBe(false);

        expect(await router.getOwner('w1')).toBeNull();
        expect(await router.getConnectionInfo('w1')).toBeNull();
        expect(await router.listWorkerConnections('worker-a')).toEqual([]);
    });

    it('should list only the given worker connections', async () => {
        await router.registerConnection('w1', 'worker-a');
        await router.registerConnection('w2', 'worker-b');
        await router.registerConnection('w3', 'worker-a');

        expect((await router.listWorkerConnections('worker-a')).sort()).toEqual(['w1', 'w3']);
        expect(await router.listWorkerConnections('worker-c')).toEqual([]);
    });
});
