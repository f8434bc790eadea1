import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type { IEventMessage, IEventMessageInput } from '@meshstate/types';
import { nowSeconds } from '../../../lib/clock.js';

/** Channel carrying client-bound events for one widget. */
export function widgetChannel(widgetId: string): string {
    return `widget:${widgetId}`;
}

/** Channel addressed to a single worker. */
export function workerChannel(workerId: string): string {
    return `worker:${workerId}`;
}

/** Fleet-wide notices. */
export const WORKERS_CHANNEL = 'workers';

/**
 * Event types the manager itself puts on the bus, as opposed to widget
 * event types chosen by application code.
 */
export const SystemEventType = {
    CallbackDispatch: 'callback:dispatch',
    ConnectionSuperseded: 'connection:superseded',
    WorkerShutdown: 'worker:shutdown'
} as const;

/**
 * Build an immutable event message, stamping the time and a fresh id unless
 * the caller supplies them.
 */
export function createEventMessage(input: IEventMessageInput): IEventMessage {
    return Object.freeze({
        eventType: input.eventType,
        widgetId: input.widgetId,
        data: Object.freeze({ ...(input.data ?? {}) }),
        sourceWorkerId: input.sourceWorkerId,
        targetWorkerId: input.targetWorkerId ?? null,
        timestamp: input.timestamp ?? nowSeconds(),
        messageId: input.messageId ?? uuid()
    });
}

const eventMessageSchema = z.object({
    eventType: z.string(),
    widgetId: z.string(),
    data: z.record(z.unknown()).default({}),
    sourceWorkerId: z.string(),
    targetWorkerId: z.string().nullable().default(null),
    timestamp: z.number(),
    messageId: z.string()
});

export function encodeEventMessage(message: IEventMessage): string {
    return JSON.stringify(message);
}

/**
 * Parse a wire payload back into a message.
 *
 * @returns `null` when the payload is not JSON or lacks required fields
 */
export function decodeEventMessage(payload: string): IEventMessage | null {
    let raw: unknown;
    try {
        raw = JSON.parse(payload);
    } catch {
        return null;
    }

    const parsed = eventMessageSchema.safeParse(raw);
    return parsed.success ? createEventMessage(parsed.data) : null;
}
