import type { Redis as RedisClient } from 'ioredis';
import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type {
    ICallbackInvocation,
    ICallbackRegistration,
    IConnectionInfo,
    ICreateSessionOptions,
    IDispatchResult,
    IEventMessage,
    IEventSubscription,
    ILiveConnection,
    ILogger,
    IRegisterConnectionOptions,
    IRegisterWidgetOptions,
    IStateConfig,
    IStateManager,
    IUserSession,
    IWidgetEvent,
    IWidgetEventQueue,
    IWidgetRecord,
    Permission,
    ResourceType,
    StateBackend,
    WidgetCallback,
    WidgetLifecycleState
} from '@meshstate/types';
import { MeshStateError } from '../../../lib/errors.js';
import {
    SystemEventType,
    WORKERS_CHANNEL,
    createEventMessage,
    widgetChannel,
    workerChannel
} from '../events/event-message.js';
import { CallbackRegistry } from './callback-registry.service.js';
import { createStateStores, resolveBackend, type IStateStores } from './state-factory.js';
import { SyncBridgeHost, type ISyncBridgeChannel } from './sync-bridge.js';
import { WidgetEventQueue } from './widget-event-queue.js';

/** Close code sent to a connection replaced by a newer one for the same widget. */
export const CLOSE_SUPERSEDED = 4000;

/** Close code sent to connections when their worker shuts down. */
export const CLOSE_GOING_AWAY = 1001;

const dispatchPayloadSchema = z.object({
    eventType: z.string(),
    data: z.record(z.unknown()).default({})
});

export interface IStateManagerOptions {
    config: IStateConfig;
    logger: ILogger;
    /** Shared Redis client; the manager does not close it. */
    redisClient?: RedisClient;
}

/**
 * Generate a worker id of the form `worker-1a2b3c4d`.
 */
export function generateWorkerId(): string {
    return `worker-${uuid().replace(/-/g, '').slice(0, 8)}`;
}

/**
 * Single entry point to widget, connection, callback and session state.
 *
 * In deploy mode the shared stores live in Redis and events for widgets or
 * callbacks owned by other workers travel over the event bus; otherwise
 * everything stays in this process. Callers use the same API either way.
 *
 * Stores are created on first use. Live connections, event queues and
 * callbacks are always local to this process.
 */
export class StateManager implements IStateManager {
    readonly deployMode: boolean;
    readonly workerId: string;
    readonly backend: StateBackend;

    private readonly config: IStateConfig;
    private readonly logger: ILogger;
    private readonly redisClient: RedisClient | undefined;
    private readonly callbacks: CallbackRegistry;

    private readonly connections = new Map<string, ILiveConnection>();
    private readonly queues = new Map<string, WidgetEventQueue>();
    private readonly widgetSubscriptions = new Map<string, IEventSubscription>();
    private readonly pumps = new Set<Promise<void>>();
    private readonly routedInvocations = new Set<Promise<void>>();

    private stores: IStateStores | null = null;
    private initializing: Promise<IStateStores> | null = null;
    private workerSubscription: IEventSubscription | null = null;
    private syncHost: SyncBridgeHost | null = null;
    private isShutdown = false;

    constructor(options: IStateManagerOptions) {
        this.config = options.config;
        this.deployMode = options.config.deployMode;
        this.backend = resolveBackend(options.config);
        this.workerId = options.config.workerId ?? generateWorkerId();
        this.redisClient = options.redisClient;
        this.logger = options.logger.child({ module: 'state-manager', workerId: this.workerId });
        this.callbacks = new CallbackRegistry(this.logger);
    }

    /**
     * Create the stores if that has not happened yet. Concurrent callers share
     * one initialization.
     */
    async initialize(): Promise<void> {
        await this.ready();
    }

    get initialized(): boolean {
        return this.stores !== null;
    }

    // Widgets

    async registerWidget(widgetId: string, html: string, options: IRegisterWidgetOptions = {}): Promise<void> {
        const { widgets } = await this.ready();
        await widgets.register(widgetId, html, options.token ?? null, this.workerId, options.metadata ?? null);
        this.logger.debug({ widgetId }, 'Registered widget');
    }

    async getWidget(widgetId: string): Promise<IWidgetRecord | null> {
        return (await this.ready()).widgets.get(widgetId);
    }

    async getWidgetHtml(widgetId: string): Promise<string | null> {
        return (await this.ready()).widgets.getHtml(widgetId);
    }

    async getWidgetToken(widgetId: string): Promise<string | null> {
        return (await this.ready()).widgets.getToken(widgetId);
    }

    async updateWidgetHtml(widgetId: string, html: string): Promise<boolean> {
        return (await this.ready()).widgets.updateHtml(widgetId, html);
    }

    async updateWidgetToken(widgetId: string, token: string): Promise<boolean> {
        return (await this.ready()).widgets.updateToken(widgetId, token);
    }

    async widgetExists(widgetId: string): Promise<boolean> {
        return (await this.ready()).widgets.exists(widgetId);
    }

    /**
     * Delete the widget record and this process's callbacks for it.
     */
    async removeWidget(widgetId: string): Promise<boolean> {
        const { widgets } = await this.ready();
        await this.callbacks.unregisterWidget(widgetId);
        return widgets.delete(widgetId);
    }

    async listWidgets(): Promise<string[]> {
        return (await this.ready()).widgets.listActive();
    }

    async countWidgets(): Promise<number> {
        return (await this.ready()).widgets.count();
    }

    async getWidgetLifecycle(widgetId: string): Promise<WidgetLifecycleState> {
        const { widgets, connections } = await this.ready();
        if (!(await widgets.exists(widgetId))) {
            return 'unregistered';
        }
        return (await connections.getOwner(widgetId)) ? 'connected' : 'registered';
    }

    // Connections

    /**
     * Take ownership of a widget's live connection.
     *
     * A connection this process already held for the widget is closed as
     * superseded. When another worker held it, that worker is told to drop
     * its stale connection.
     *
     * @returns The queue of events to write to the connection
     */
    async registerConnection(
        widgetId: string,
        connection: ILiveConnection,
        options: IRegisterConnectionOptions = {}
    ): Promise<IWidgetEventQueue> {
        const stores = await this.ready();

        const previousLocal = this.connections.get(widgetId);
        if (previousLocal && previousLocal !== connection) {
            await this.closeLive(widgetId, previousLocal, CLOSE_SUPERSEDED, 'superseded');
        }
        await this.releaseLocal(widgetId);

        const previousOwner = await stores.connections.getOwner(widgetId);
        await stores.connections.registerConnection(
            widgetId,
            this.workerId,
            options.userId ?? null,
            options.sessionId ?? null
        );

        const queue = new WidgetEventQueue(widgetId, this.config.eventQueueSize, this.logger);
        this.connections.set(widgetId, connection);
        this.queues.set(widgetId, queue);

        if (this.deployMode) {
            const subscription = stores.events.subscribe(widgetChannel(widgetId));
            this.widgetSubscriptions.set(widgetId, subscription);
            this.pump(subscription, message => queue.put({ type: message.eventType, data: { ...message.data } }));
            try {
                await subscription.ready;
            } catch (error) {
                await this.abandonConnection(stores, widgetId, connection);
                throw error;
            }

            if (previousOwner && previousOwner !== this.workerId) {
                await this.notifySuperseded(stores, widgetId, previousOwner);
            }
        }

        this.logger.info({ widgetId, previousOwner }, 'Connection registered');
        return queue;
    }

    /**
     * Forget the widget's local connection. The routing entry is removed only
     * while this worker still owns it.
     */
    async unregisterConnection(widgetId: string): Promise<void> {
        const { connections } = await this.ready();
        await this.releaseLocal(widgetId);
        this.connections.delete(widgetId);

        if ((await connections.getOwner(widgetId)) === this.workerId) {
            await connections.unregisterConnection(widgetId);
        }
        this.logger.debug({ widgetId }, 'Connection unregistered');
    }

    /**
     * @returns `false` when the routing entry is gone; the caller should
     *     register the connection again
     */
    async refreshHeartbeat(widgetId: string): Promise<boolean> {
        return (await this.ready()).connections.refreshHeartbeat(widgetId);
    }

    getConnection(widgetId: string): ILiveConnection | null {
        return this.connections.get(widgetId) ?? null;
    }

    getEventQueue(widgetId: string): IWidgetEventQueue | null {
        return this.queues.get(widgetId) ?? null;
    }

    async getConnectionInfo(widgetId: string): Promise<IConnectionInfo | null> {
        return (await this.ready()).connections.getConnectionInfo(widgetId);
    }

    async getConnectionOwner(widgetId: string): Promise<string | null> {
        return (await this.ready()).connections.getOwner(widgetId);
    }

    listLocalConnections(): string[] {
        return Array.from(this.connections.keys());
    }

    // Callbacks

    async registerCallback(widgetId: string, eventType: string, callback: WidgetCallback): Promise<void> {
        await this.callbacks.register(widgetId, eventType, callback);
    }

    async getCallback(widgetId: string, eventType: string): Promise<ICallbackRegistration | null> {
        return this.callbacks.get(widgetId, eventType);
    }

    async invokeCallback(widgetId: string, eventType: string, data: Record<string, unknown>): Promise<ICallbackInvocation> {
        return this.callbacks.invoke(widgetId, eventType, data);
    }

    async unregisterCallback(widgetId: string, eventType: string): Promise<boolean> {
        return this.callbacks.unregister(widgetId, eventType);
    }

    /**
     * Run the handler for a widget event wherever it was registered.
     *
     * A local handler runs here. Otherwise, in deploy mode, the event is sent
     * to the worker that registered the widget (or, failing that, the one
     * holding its connection) and `routed` is set; the result then stays on
     * that worker.
     */
    async dispatchEvent(widgetId: string, eventType: string, data: Record<string, unknown>): Promise<IDispatchResult> {
        const stores = await this.ready();

        if (await this.callbacks.hasCallback(widgetId, eventType)) {
            const invocation = await this.callbacks.invoke(widgetId, eventType, data);
            return { handled: invocation.handled, routed: false, result: invocation.result };
        }

        if (!this.deployMode) {
            return { handled: false, routed: false, result: null };
        }

        const record = await stores.widgets.get(widgetId);
        const owner = record?.ownerWorkerId ?? (await stores.connections.getOwner(widgetId));
        if (!owner || owner === this.workerId) {
            this.logger.debug({ widgetId, eventType }, 'No handler for widget event');
            return { handled: false, routed: false, result: null };
        }

        await stores.events.publish(
            workerChannel(owner),
            createEventMessage({
                eventType: SystemEventType.CallbackDispatch,
                widgetId,
                data: { eventType, data },
                sourceWorkerId: this.workerId,
                targetWorkerId: owner
            })
        );
        return { handled: false, routed: true, result: null };
    }

    /**
     * Send an event to the widget's browser, whichever worker holds its
     * connection.
     */
    async broadcastEvent(widgetId: string, eventType: string, data: Record<string, unknown>): Promise<void> {
        const { events } = await this.ready();
        if (this.deployMode) {
            await events.publish(
                widgetChannel(widgetId),
                createEventMessage({ eventType, widgetId, data, sourceWorkerId: this.workerId })
            );
            return;
        }
        this.queues.get(widgetId)?.put({ type: eventType, data: { ...data } });
    }

    /**
     * @returns `false` only when the event could not be sent anywhere
     */
    async sendToWidget(widgetId: string, event: IWidgetEvent): Promise<boolean> {
        const queue = this.queues.get(widgetId);
        if (queue) {
            queue.put(event);
            return true;
        }
        if (!this.deployMode) {
            return false;
        }

        const { events } = await this.ready();
        await events.publish(
            widgetChannel(widgetId),
            createEventMessage({ eventType: event.type, widgetId, data: event.data, sourceWorkerId: this.workerId })
        );
        return true;
    }

    // Sessions

    /**
     * @returns The new session id
     */
    async createSession(userId: string, options: ICreateSessionOptions = {}): Promise<string> {
        const { sessions } = await this.ready();
        const sessionId = uuid();
        await sessions.createSession(
            sessionId,
            userId,
            options.roles ?? ['viewer'],
            options.ttl ?? null,
            options.metadata ?? null
        );
        return sessionId;
    }

    async getSession(sessionId: string): Promise<IUserSession | null> {
        return (await this.ready()).sessions.getSession(sessionId);
    }

    async validateSession(sessionId: string): Promise<boolean> {
        return (await this.ready()).sessions.validateSession(sessionId);
    }

    async deleteSession(sessionId: string): Promise<boolean> {
        return (await this.ready()).sessions.deleteSession(sessionId);
    }

    async refreshSession(sessionId: string, extendTtl: number | null = null): Promise<boolean> {
        return (await this.ready()).sessions.refreshSession(sessionId, extendTtl);
    }

    async listUserSessions(userId: string): Promise<IUserSession[]> {
        return (await this.ready()).sessions.listUserSessions(userId);
    }

    async checkPermission(
        sessionId: string,
        resourceType: ResourceType,
        resourceId: string,
        permission: Permission
    ): Promise<boolean> {
        return (await this.ready()).sessions.checkPermission(sessionId, resourceType, resourceId, permission);
    }

    /**
     * Underlying stores, for collaborators such as the auth helpers that need
     * more than the facade offers.
     */
    async getStores(): Promise<IStateStores> {
        return this.ready();
    }

    // Sync bridge

    /**
     * Open a channel for a `SyncStateClient` on another thread.
     */
    openSyncChannel(): ISyncBridgeChannel {
        this.assertRunning();
        if (!this.syncHost) {
            this.syncHost = new SyncBridgeHost(this, this.logger, { timeoutMs: this.config.syncBridgeTimeoutMs });
        }
        return this.syncHost.openChannel();
    }

    // Lifecycle

    /**
     * Release everything this worker holds.
     *
     * Local connections are closed and their routing entries removed, the
     * fleet is told this worker is leaving, and subscriptions and owned Redis
     * connections are closed. Widget records and sessions stay in the store.
     */
    async shutdown(): Promise<void> {
        if (this.isShutdown) {
            return;
        }
        this.isShutdown = true;

        this.syncHost?.close();
        this.syncHost = null;

        const stores = await this.settledStores();
        if (stores) {
            await this.releaseAllConnections(stores);

            if (this.deployMode) {
                await this.bestEffort('Failed to announce worker shutdown', () =>
                    stores.events.publish(
                        WORKERS_CHANNEL,
                        createEventMessage({
                            eventType: SystemEventType.WorkerShutdown,
                            widgetId: '',
                            sourceWorkerId: this.workerId
                        })
                    )
                );
            }

            await this.workerSubscription?.close();
            this.workerSubscription = null;
            await stores.close();
        }

        await Promise.all(this.pumps);
        await this.callbacks.clear();
        this.logger.info('State manager shut down');
    }

    private ready(): Promise<IStateStores> {
        this.assertRunning();
        if (this.stores) {
            return Promise.resolve(this.stores);
        }
        if (!this.initializing) {
            this.initializing = this.createStores().then(
                stores => {
                    this.stores = stores;
                    return stores;
                },
                (error: unknown) => {
                    this.initializing = null;
                    throw error;
                }
            );
        }
        return this.initializing;
    }

    private async createStores(): Promise<IStateStores> {
        const stores = createStateStores(this.config, { logger: this.logger, redisClient: this.redisClient });

        if (this.deployMode) {
            const subscription = stores.events.subscribe(workerChannel(this.workerId));
            this.workerSubscription = subscription;
            this.pump(subscription, message => this.handleWorkerMessage(message));
            await subscription.ready;
        }

        this.logger.info({ backend: stores.backend, deployMode: this.deployMode }, 'State stores initialized');
        return stores;
    }

    private async settledStores(): Promise<IStateStores | null> {
        if (this.stores || !this.initializing) {
            return this.stores;
        }
        try {
            return await this.initializing;
        } catch (error) {
            this.logger.warn({ error }, 'State stores never initialized');
            return null;
        }
    }

    private assertRunning(): void {
        if (this.isShutdown) {
            throw new MeshStateError('State manager has been shut down', 'STATE_MANAGER_SHUTDOWN', { workerId: this.workerId });
        }
    }

    private async handleWorkerMessage(message: IEventMessage): Promise<void> {
        if (message.eventType === SystemEventType.CallbackDispatch) {
            const payload = dispatchPayloadSchema.safeParse(message.data);
            if (!payload.success) {
                this.logger.warn({ messageId: message.messageId }, 'Ignoring malformed callback dispatch');
                return;
            }
            this.startRoutedInvocation(message.widgetId, payload.data.eventType, payload.data.data);
            return;
        }

        if (message.eventType === SystemEventType.ConnectionSuperseded) {
            await this.dropSupersededConnection(message.widgetId, message.sourceWorkerId);
        }
    }

    /**
     * Run a routed callback without holding up the worker channel; other
     * widgets' dispatches and notices keep flowing while it runs.
     */
    private startRoutedInvocation(widgetId: string, eventType: string, data: Record<string, unknown>): void {
        const invocation = this.callbacks.invoke(widgetId, eventType, data).then(
            () => undefined,
            (error: unknown) => {
                this.logger.error({ error, widgetId, eventType }, 'Routed callback failed');
            }
        );
        this.routedInvocations.add(invocation);
        void invocation.finally(() => this.routedInvocations.delete(invocation));
    }

    private async dropSupersededConnection(widgetId: string, newOwner: string): Promise<void> {
        const connection = this.connections.get(widgetId);
        if (!connection) {
            return;
        }

        if (!this.stores || (await this.stores.connections.getOwner(widgetId)) === this.workerId) {
            // Reconnected here again after the notice was sent
            return;
        }

        this.connections.delete(widgetId);
        await this.releaseLocal(widgetId);
        await this.closeLive(widgetId, connection, CLOSE_SUPERSEDED, 'superseded');
        this.logger.info({ widgetId, newOwner }, 'Connection moved to another worker');
    }

    private async notifySuperseded(stores: IStateStores, widgetId: string, previousOwner: string): Promise<void> {
        await this.bestEffort('Failed to notify previous connection owner', () =>
            stores.events.publish(
                workerChannel(previousOwner),
                createEventMessage({
                    eventType: SystemEventType.ConnectionSuperseded,
                    widgetId,
                    sourceWorkerId: this.workerId,
                    targetWorkerId: previousOwner
                })
            )
        );
    }

    /**
     * Undo a registration whose widget subscription could not be started.
     */
    private async abandonConnection(stores: IStateStores, widgetId: string, connection: ILiveConnection): Promise<void> {
        if (this.connections.get(widgetId) === connection) {
            this.connections.delete(widgetId);
            await this.releaseLocal(widgetId);
        }
        await this.bestEffort('Failed to remove routing entry', async () => {
            if ((await stores.connections.getOwner(widgetId)) === this.workerId) {
                await stores.connections.unregisterConnection(widgetId);
            }
        });
        this.logger.warn({ widgetId }, 'Connection registration rolled back');
    }

    private async releaseAllConnections(stores: IStateStores): Promise<void> {
        for (const [widgetId, connection] of Array.from(this.connections)) {
            this.connections.delete(widgetId);
            await this.releaseLocal(widgetId);
            await this.closeLive(widgetId, connection, CLOSE_GOING_AWAY, 'worker shutting down');
        }

        await this.bestEffort('Failed to remove routing entries', async () => {
            for (const widgetId of await stores.connections.listWorkerConnections(this.workerId)) {
                await stores.connections.unregisterConnection(widgetId);
            }
        });
    }

    /**
     * Drop the widget's queue and bus subscription, leaving the live
     * connection itself to the caller.
     */
    private async releaseLocal(widgetId: string): Promise<void> {
        this.queues.get(widgetId)?.close();
        this.queues.delete(widgetId);

        const subscription = this.widgetSubscriptions.get(widgetId);
        if (subscription) {
            this.widgetSubscriptions.delete(widgetId);
            await subscription.close();
        }
    }

    private async closeLive(widgetId: string, connection: ILiveConnection, code: number, reason: string): Promise<void> {
        try {
            await connection.close(code, reason);
        } catch (error) {
            this.logger.warn({ error, widgetId, code }, 'Failed to close connection');
        }
    }

    private async bestEffort(failureMessage: string, operation: () => Promise<unknown>): Promise<void> {
        try {
            await operation();
        } catch (error) {
            this.logger.warn({ error }, failureMessage);
        }
    }

    /**
     * Feed a subscription into a handler until the subscription ends.
     */
    private pump(subscription: IEventSubscription, handler: (message: IEventMessage) => unknown): void {
        const run = async (): Promise<void> => {
            for await (const message of subscription) {
                try {
                    await handler(message);
                } catch (error) {
                    this.logger.error({ error, channel: subscription.channel, eventType: message.eventType }, 'Event handler failed');
                }
            }
        };

        const pumping = run();
        this.pumps.add(pumping);
        void pumping.then(() => this.pumps.delete(pumping));
    }
}
