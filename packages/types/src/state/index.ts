/**
 * State manager type definitions.
 */

export type { IStateConfig, StateBackend } from './IStateConfig.js';
export type { IWidgetEventQueue } from './IWidgetEventQueue.js';
export type {
    ICreateSessionOptions,
    IDispatchResult,
    IRegisterConnectionOptions,
    IRegisterWidgetOptions,
    IStateManager,
    WidgetLifecycleState
} from './IStateManager.js';
