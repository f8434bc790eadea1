/// <reference types="vitest" />

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { IWidgetStore } from '@meshstate/types';
import { MemoryWidgetStore } from '../memory/memory-widget-store.js';
import { RedisWidgetStore } from '../redis/redis-widget-store.js';
import { RedisKeys } from '../redis/keys.js';
import { createRedisMock, uniquePrefix } from '../../../tests/vitest/mocks/redis.js';

const NOW = 1_700_000_000_000;

const backends: Array<{ name: string; create: () => IWidgetStore }> = [
    { name: 'memory', create: () => new MemoryWidgetStore() },
    {
        name: 'redis',
        create: () => new RedisWidgetStore({ client: createRedisMock(), keys: new RedisKeys(uniquePrefix()), ttl: 3600 })
    }
];

describe.each(backends)('$name widget store', ({ create }) => {
    let store: IWidgetStore;

    beforeEach(() => {
        vi.useFakeTimers({ toFake: ['Date'] });
        vi.setSystemTime(NOW);
        store = create();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('should return the registered record', async () => {
        await store.register('w1', '<div>chart</div>', 'tok-1', 'worker-a', { title: 'Chart', size: { w: 2 } });

        expect(await store.get('w1')).toEqual({
            widgetId: 'w1',
            html: '<div>chart</div>',
            token: 'tok-1',
            createdAt: 1_700_000_000,
            ownerWorkerId: 'worker-a',
            metadata: { title: 'Chart', size: { w: 2 } }
        });
        expect(await store.getHtml('w1')).toBe('<div>chart</div>');
        expect(await store.getToken('w1')).toBe('tok-1');
        expect(await store.exists('w1')).toBe(true);
    });

    it('should default optional fields', async () => {
        await store.register('w1', '<p/>');

        expect(await store.get('w1')).toMatchObject({ token: null, ownerWorkerId: null, metadata: {} });
        expect(await store.getToken('w1')).toBeNull();
    });

    it('should return null and false for unknown widgets', async () => {
        expect(await store.get('missing')).toBeNull();
        expect(await store.getHtml('missing')).toBeNull();
        expect(await store.getToken('missing')).toBeNull();
        expect(await store.exists('missing')).toBe(false);
        expect(await store.delete('missing')).toBe(false);
        expect(await store.updateHtml('missing', '<p/>')).toBe(false);
        expect(await store.updateToken('missing', 'tok')).toBe(false);
    });

    it('should treat register as an upsert', async () => {
        await store.register('w1', '<p>one</p>', 'tok-1');
        await store.register('w1', '<p>two</p>');

        expect(await store.count()).toBe(1);
        expect(await store.getHtml('w1')).toBe('<p>two</p>');
        expect(await store.getToken('w1')).toBeNull();
    });

    it('should update html and token in place', async () => {
        await store.register('w1', '<p>old</p>', 'tok-1', 'worker-a');

        expect(await store.updateHtml('w1', '<p>new</p>')).toBe(true);
        expect(await store.updateToken('w1', 'tok-2')).toBe(true);

        expect(await store.get('w1')).toMatchObject({ html: '<p>new</p>', token: 'tok-2', ownerWorkerId: 'worker-a' });
    });

    it('should delete a widget', async () => {
        await store.register('w1', '<p/>');
        await store.register('w2', '<p/>');

        expect(await store.delete('w1')).toBe(true);

        expect(await store.exists('w1')).toBe(false);
        expect(await store.listActive()).toEqual(['w2']);
        expect(await store.count()).toBe(1);
    });

    it('should list every active widget', async () => {
        await store.register('a', '<p/>');
        await store.register('b', '<p/>');
        await store.register('c', '<p/>');

        expect((await store.listActive()).sort()).toEqual(['a', 'b', 'c']);
        expect(await store.count()).toBe(3);
    });

    it('should return copies that do not alias stored state', async () => {
        await store.register('w1', '<p/>', null, null, { title: 'A' });

        const record = await store.get('w1');
        if (record) {
            record.metadata['title'] = 'B';
        }

        expect((await store.get('w1'))?.metadata).toEqual({ title: 'A' });
    });
});
