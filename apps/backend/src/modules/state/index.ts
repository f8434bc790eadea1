export { StateModule } from './StateModule.js';
export type { IStateModuleDependencies } from './StateModule.js';
export { StateManager, CLOSE_GOING_AWAY, CLOSE_SUPERSEDED, generateWorkerId } from './services/state-manager.service.js';
export type { IStateManagerOptions } from './services/state-manager.service.js';
export { CallbackRegistry } from './services/callback-registry.service.js';
export { WidgetEventQueue } from './services/widget-event-queue.js';
export { createMemoryStores, createRedisStores, createStateStores, resolveBackend } from './services/state-factory.js';
export type { IStateStoreDependencies, IStateStores } from './services/state-factory.js';
export { SYNC_BRIDGE_METHODS, SyncBridgeHost, SyncStateClient, isSyncBridgeMethod } from './services/sync-bridge.js';
export type { ISyncBridgeChannel, ISyncStateClientOptions, SyncBridgeMethod, SyncBridgeResult } from './services/sync-bridge.js';
export { resolvePermission, resourceGrantFor, resourceKey } from './services/permission-resolver.js';
export {
    SystemEventType,
    WORKERS_CHANNEL,
    createEventMessage,
    decodeEventMessage,
    encodeEventMessage,
    widgetChannel,
    workerChannel
} from './events/event-message.js';
export * from './memory/index.js';
export * from './redis/index.js';
