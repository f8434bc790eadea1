export { MemoryWidgetStore } from './memory-widget-store.js';
export { MemoryEventBus } from './memory-event-bus.js';
export type { IMemoryEventBusOptions } from './memory-event-bus.js';
export { MemoryConnectionRouter } from './memory-connection-router.js';
export { MemorySessionStore } from './memory-session-store.js';
