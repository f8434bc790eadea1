/// <reference types="vitest" />

import { beforeEach, describe, it, expect, vi } from 'vitest';
import { CallbackRegistry } from '../services/callback-registry.service.js';
import { MockLogger } from '../../../tests/vitest/mocks/logger.js';

describe('CallbackRegistry', () => {
    let logger: MockLogger;
    let registry: CallbackRegistry;

    beforeEach(() => {
        logger = new MockLogger();
        registry = new CallbackRegistry(logger);
    });

    describe('registration', () => {
        it('should record a callback with fresh counters', async () => {
            const callback = vi.fn();

            await registry.register('w1', 'click', callback);

            const registration = await registry.get('w1', 'click');
            expect(registration).toMatchObject({
                widgetId: 'w1',
                eventType: 'click',
                callback,
                isAsync: false,
                invokeCount: 0,
                lastInvoked: null
            });
            expect(await registry.hasCallback('w1', 'click')).toBe(true);
            expect(await registry.hasWidget('w1')).toBe(true);
        });

        it('should hand out copies that cannot change the registry', async () => {
            const callback = vi.fn(() => 'original');
            await registry.register('w1', 'click', callback);

            const snapshot = await registry.get('w1', 'click');
            if (!snapshot) {
                throw new Error('expected a registration');
            }
            snapshot.invokeCount = 99;
            snapshot.callback = () => 'replaced';

            expect(await registry.invoke('w1', 'click', {})).toEqual({ handled: true, result: 'original' });
            expect((await registry.get('w1', 'click'))?.invokeCount).toBe(1);
        });

        it('should detect async callbacks', async () => {
            await registry.register('w1', 'load', async () => 'done');

            expect((await registry.get('w1', 'load'))?.isAsync).toBe(true);
        });

        it('should replace an existing registration', async () => {
            const first = vi.fn(() => 'first');
            const second = vi.fn(() => 'second');
            await registry.register('w1', 'click', first);
            await registry.register('w1', 'click', second);

            const invocation = await registry.invoke('w1', 'click', {});

            expect(invocation.result).toBe('second');
            expect(first).not.toHaveBeenCalled();
        });

        it('should list widgets and their events', async () => {
            await registry.register('w1', 'click', vi.fn());
            await registry.register('w1', 'hover', vi.fn());
            await registry.register('w2', 'click', vi.fn());

            expect(await registry.listWidgets()).toEqual(['w1', 'w2']);
            expect(await registry.listWidgetEvents('w1')).toEqual(['click', 'hover']);
            expect(await registry.listWidgetEvents('missing')).toEqual([]);
        });

        it('should unregister one event or a whole widget', async () => {
            await registry.register('w1', 'click', vi.fn());
            await registry.register('w1', 'hover', vi.fn());
            await registry.register('w2', 'click', vi.fn());

            expect(await registry.unregister('w2', 'click')).toBe(true);
            expect(await registry.unregister('w2', 'click')).toBe(false);
            expect(await registry.hasWidget('w2')).toBe(false);

            expect(await registry.unregisterWidget('w1')).toBe(2);
            expect(await registry.unregisterWidget('w1')).toBe(0);
            expect(await registry.listWidgets()).toEqual([]);
        });
    });

    describe('invoke', () => {
        it('should pass data, widget id and event type to the callback', async () => {
            const callback = vi.fn((data: Record<string, unknown>) => data['x']);
            await registry.register('w1', 'click', callback);

            const invocation = await registry.invoke('w1', 'click', { x: 3 });

            expect(invocation).toEqual({ handled: true, result: 3 });
            expect(callback).toHaveBeenCalledWith({ x: 3 }, 'w1', 'click');
        });

        it('should await async callbacks', async () => {
            await registry.register('w1', 'load', async (data: Record<string, unknown>) => {
                await new Promise(resolve => setTimeout(resolve, 5));
                return `loaded ${String(data['id'])}`;
            });

            await expect(registry.invoke('w1', 'load', { id: 7 })).resolves.toEqual({ handled: true, result: 'loaded 7' });
        });

        it('should not run a synchronous callback on the caller stack', async () => {
            const order: string[] = [];
            await registry.register('w1', 'click', () => {
                order.push('callback');
            });

            const pending = registry.invoke('w1', 'click', {});
            order.push('caller');
            await pending;

            expect(order).toEqual(['caller', 'callback']);
        });

        it('should await a promise returned by a plain function', async () => {
            await registry.register('w1', 'click', () => Promise.resolve('later'));

            await expect(registry.invoke('w1', 'click', {})).resolves.toEqual({ handled: true, result: 'later' });
        });

        it('should report a missing callback as not handled', async () => {
            await expect(registry.invoke('w1', 'click', {})).resolves.toEqual({ handled: false, result: null });
        });

        it('should swallow and log a throwing callback', async () => {
            const failure = new Error('handler failed');
            await registry.register('w1', 'click', () => {
                throw failure;
            });

            const invocation = await registry.invoke('w1', 'click', {});

            expect(invocation).toEqual({ handled: false, result: null });
            expect(logger.error).toHaveBeenCalledWith({ error: failure, widgetId: 'w1', eventType: 'click' }, 'Callback failed');
        });

        it('should swallow a rejecting async callback', async () => {
            await registry.register('w1', 'load', async () => {
                throw new Error('rejected');
            });

            await expect(registry.invoke('w1', 'load', {})).resolves.toEqual({ handled: false, result: null });
        });

        it('should keep other callbacks working after one fails', async () => {
            await registry.register('w1', 'bad', () => {
                throw new Error('bad');
            });
            await registry.register('w1', 'good', () => 'ok');

            await registry.invoke('w1', 'bad', {});

            await expect(registry.invoke('w1', 'good', {})).resolves.toEqual({ handled: true, result: 'ok' });
        });

        it('should count invocations', async () => {
            vi.useFakeTimers({ toFake: ['Date'] });
            vi.setSystemTime(1_700_000_000_000);
            try {
                await registry.register('w1', 'click', vi.fn());
                await registry.register('w2', 'click', vi.fn());

                await registry.invoke('w1', 'click', {});
                await registry.invoke('w1', 'click', {});
                await registry.invoke('w2', 'click', {});

                expect(await registry.get('w1', 'click')).toMatchObject({ invokeCount: 2, lastInvoked: 1_700_000_000 });
                expect(await registry.getStats()).toEqual({
                    widgetCount: 2,
                    totalCallbacks: 2,
                    totalInvocations: 3,
                    widgets: { w1: ['click'], w2: ['click'] }
                });
            } finally {
                vi.useRealTimers();
            }
        });
    });
});
