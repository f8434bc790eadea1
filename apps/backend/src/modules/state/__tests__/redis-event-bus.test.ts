/// <reference types="vitest" />

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { Redis } from 'ioredis';
import { RedisEventBus } from '../redis/redis-event-bus.js';
import { RedisKeys } from '../redis/keys.js';
import { createEventMessage } from '../events/event-message.js';
import { MockLogger } from '../../../tests/vitest/mocks/logger.js';
import { createRedisMock, uniquePrefix } from '../../../tests/vitest/mocks/redis.js';

describe('RedisEventBus', () => {
    let logger: MockLogger;
    let client: Redis;
    let keys: RedisKeys;
    let bus: RedisEventBus;

    beforeEach(() => {
        logger = new MockLogger();
        client = createRedisMock();
        keys = new RedisKeys(uniquePrefix());
        bus = new RedisEventBus({ client, keys, logger });
    });

    afterEach(async () => {
        await bus.close();
    });

    it('should deliver events published by another worker', async () => {
        const subscription = bus.subscribe('widget:w1');
        await subscription.ready;
        const otherWorker = new RedisEventBus({ client: createRedisMock(), keys, logger });
        const message = createEventMessage({ eventType: 'update', widgetId: 'w1', data: { v: 1 }, sourceWorkerId: 'worker-b' });

        await otherWorker.publish('widget:w1', message);

        const next = await subscription[Symbol.asyncIterator]().next();
        expect(next.value).toEqual(message);
    });

    it('should publish JSON on the prefixed channel', async () => {
        const publish = vi.spyOn(client, 'publish');
        const message = createEventMessage({ eventType: 'update', widgetId: 'w1', sourceWorkerId: 'worker-a' });

        await bus.publish('widget:w1', message);

        expect(publish).toHaveBeenCalledWith(`${keys.prefix}:channel:widget:w1`, JSON.stringify(message));
    });

    it('should skip payloads it cannot decode', async () => {
        const subscription = bus.subscribe('widget:w1');
        await subscription.ready;
        const message = createEventMessage({ eventType: 'update', widgetId: 'w1', sourceWorkerId: 'worker-b' });

        await client.publish(keys.channel('widget:w1'), 'not json');
        await bus.publish('widget:w1', message);

        const next = await subscription[Symbol.asyncIterator]().next();
        expect(next.value).toEqual(message);
        expect(logger.warn).toHaveBeenCalledWith({ channel: 'widget:w1' }, 'Skipping undecodable event payload');
    });

    it('should use a dedicated connection per subscription', () => {
        const duplicate = vi.spyOn(client, 'duplicate');

        bus.subscribe('widget:w1');
        bus.subscribe('widget:w2');

        expect(duplicate).toHaveBeenCalledTimes(2);
    });

    it('should close local subscriptions on unsubscribe', async () => {
        const first = bus.subscribe('widget:w1');
        const second = bus.subscribe('widget:w1');
        await Promise.all([first.ready, second.ready]);

        await bus.unsubscribe('widget:w1');

        expect(first.closed).toBe(true);
        expect(second.closed).toBe(true);
    });

    it('should not open a connection for an already aborted signal', () => {
        const duplicate = vi.spyOn(client, 'duplicate');
        const controller = new AbortController();
        controller.abort();

        const subscription = bus.subscribe('widget:w1', { signal: controller.signal });

        expect(subscription.closed).toBe(true);
        expect(duplicate).not.toHaveBeenCalled();
    });
});
