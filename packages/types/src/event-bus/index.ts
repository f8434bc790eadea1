/**
 * Cross-worker event bus type definitions.
 */

export type { IEventMessage, IEventMessageInput, IWidgetEvent } from './IEventMessage.js';
export type { IEventBus, IEventSubscription, ISubscribeOptions } from './IEventBus.js';
