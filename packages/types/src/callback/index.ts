/**
 * Process-local callback registry type definitions.
 */

export type {
    ICallbackInvocation,
    ICallbackRegistration,
    ICallbackRegistryStats,
    WidgetCallback
} from './ICallbackRegistration.js';
export type { ICallbackRegistry } from './ICallbackRegistry.js';
