export { RedisKeys } from './keys.js';
export { RedisWidgetStore } from './redis-widget-store.js';
export { RedisEventBus } from './redis-event-bus.js';
export { RedisConnectionRouter } from './redis-connection-router.js';
export { RedisSessionStore } from './redis-session-store.js';
