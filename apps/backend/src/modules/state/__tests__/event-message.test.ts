/// <reference types="vitest" />

import { afterEach, describe, it, expect, vi } from 'vitest';
import {
    createEventMessage,
    decodeEventMessage,
    encodeEventMessage,
    widgetChannel,
    workerChannel
} from '../events/event-message.js';

describe('event messages', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('should stamp time and a uuid when not supplied', () => {
        vi.useFakeTimers({ toFake: ['Date'] });
        vi.setSystemTime(new Date(1_700_000_000_000));

        const message = createEventMessage({ eventType: 'click', widgetId: 'w1', sourceWorkerId: 'worker-a' });

        expect(message.timestamp).toBe(1_700_000_000);
        expect(message.messageId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
        expect(message.targetWorkerId).toBeNull();
        expect(message.data).toEqual({});
    });

    it('should keep supplied fields', () => {
        const message = createEventMessage({
            eventType: 'click',
            widgetId: 'w1',
            data: { x: 1 },
            sourceWorkerId: 'worker-a',
            targetWorkerId: 'worker-b',
            timestamp: 12.5,
            messageId: 'm-1'
        });

        expect(message).toEqual({
            eventType: 'click',
            widgetId: 'w1',
            data: { x: 1 },
            sourceWorkerId: 'worker-a',
            targetWorkerId: 'worker-b',
            timestamp: 12.5,
            messageId: 'm-1'
        });
    });

    it('should produce frozen messages', () => {
        const message = createEventMessage({ eventType: 'click', widgetId: 'w1', data: { x: 1 }, sourceWorkerId: 'a' });

        expect(Object.isFrozen(message)).toBe(true);
        expect(Object.isFrozen(message.data)).toBe(true);
    });

    it('should decode what it encodes', () => {
        const message = createEventMessage({ eventType: 'update', widgetId: 'w2', data: { value: [1, 2] }, sourceWorkerId: 'a' });

        expect(decodeEventMessage(encodeEventMessage(message))).toEqual(message);
    });

    it('should reject payloads that are not messages', () => {
        expect(decodeEventMessage('not json')).toBeNull();
        expect(decodeEventMessage('{"eventType":"x"}')).toBeNull();
    });

    it('should name channels', () => {
        expect(widgetChannel('w1')).toBe('widget:w1');
        expect(workerChannel('worker-a')).toBe('worker:worker-a');
    });
});
