import type { ICallbackInvocation, ICallbackRegistration, WidgetCallback } from '../callback/ICallbackRegistration.js';
import type { IConnectionInfo } from '../connection/IConnectionInfo.js';
import type { ILiveConnection } from '../connection/ILiveConnection.js';
import type { IWidgetEvent } from '../event-bus/IEventMessage.js';
import type { IUserSession } from '../session/IUserSession.js';
import type { Permission, ResourceType } from '../session/permissions.js';
import type { IWidgetRecord } from '../widget/IWidgetRecord.js';
import type { StateBackend } from './IStateConfig.js';
import type { IWidgetEventQueue } from './IWidgetEventQueue.js';

/**
 * Observed lifecycle of a widget, combining the widget store and the
 * connection router.
 */
export type WidgetLifecycleState = 'unregistered' | 'registered' | 'connected';

/**
 * Outcome of dispatching a client event.
 *
 * - `handled`: a handler on this worker ran successfully
 * - `routed`: the event was published to the worker holding the handler
 */
export interface IDispatchResult {
    handled: boolean;
    routed: boolean;
    result: unknown;
}

export interface IRegisterWidgetOptions {
    token?: string | null;
    metadata?: Record<string, unknown> | null;
}

export interface IRegisterConnectionOptions {
    userId?: string | null;
    sessionId?: string | null;
}

export interface ICreateSessionOptions {
    roles?: string[];
    ttl?: number | null;
    metadata?: Record<string, unknown> | null;
}

/**
 * Single facade over widget, connection, event, session and callback state.
 *
 * Callers never branch on deploy mode: whether state lives in this process or
 * in Redis, and whether an event is delivered locally or through the event
 * bus, is decided inside the manager.
 */
export interface IStateManager {
    readonly deployMode: boolean;
    readonly workerId: string;
    readonly backend: StateBackend;

    registerWidget(widgetId: string, html: string, options?: IRegisterWidgetOptions): Promise<void>;
    getWidget(widgetId: string): Promise<IWidgetRecord | null>;
    getWidgetHtml(widgetId: string): Promise<string | null>;
    getWidgetToken(widgetId: string): Promise<string | null>;
    updateWidgetHtml(widgetId: string, html: string): Promise<boolean>;
    updateWidgetToken(widgetId: string, token: string): Promise<boolean>;
    widgetExists(widgetId: string): Promise<boolean>;
    removeWidget(widgetId: string): Promise<boolean>;
    listWidgets(): Promise<string[]>;
    countWidgets(): Promise<number>;
    getWidgetLifecycle(widgetId: string): Promise<WidgetLifecycleState>;

    registerConnection(
        widgetId: string,
        connection: ILiveConnection,
        options?: IRegisterConnectionOptions
    ): Promise<IWidgetEventQueue>;
    unregisterConnection(widgetId: string): Promise<void>;
    refreshHeartbeat(widgetId: string): Promise<boolean>;
    getConnection(widgetId: string): ILiveConnection | null;
    getEventQueue(widgetId: string): IWidgetEventQueue | null;
    getConnectionInfo(widgetId: string): Promise<IConnectionInfo | null>;
    getConnectionOwner(widgetId: string): Promise<string | null>;
    listLocalConnections(): string[];

    registerCallback(widgetId: string, eventType: string, callback: WidgetCallback): Promise<void>;
    getCallback(widgetId: string, eventType: string): Promise<ICallbackRegistration | null>;
    invokeCallback(widgetId: string, eventType: string, data: Record<string, unknown>): Promise<ICallbackInvocation>;
    unregisterCallback(widgetId: string, eventType: string): Promise<boolean>;

    dispatchEvent(widgetId: string, eventType: string, data: Record<string, unknown>): Promise<IDispatchResult>;
    broadcastEvent(widgetId: string, eventType: string, data: Record<string, unknown>): Promise<void>;
    sendToWidget(widgetId: string, event: IWidgetEvent): Promise<boolean>;

    createSession(userId: string, options?: ICreateSessionOptions): Promise<string>;
    getSession(sessionId: string): Promise<IUserSession | null>;
    validateSession(sessionId: string): Promise<boolean>;
    deleteSession(sessionId: string): Promise<boolean>;
    refreshSession(sessionId: string, extendTtl?: number | null): Promise<boolean>;
    listUserSessions(userId: string): Promise<IUserSession[]>;
    checkPermission(
        sessionId: string,
        resourceType: ResourceType,
        resourceId: string,
        permission: Permission
    ): Promise<boolean>;

    shutdown(): Promise<void>;
}
