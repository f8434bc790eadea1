import type {
    ICallbackInvocation,
    ICallbackRegistration,
    ICallbackRegistry,
    ICallbackRegistryStats,
    ILogger,
    WidgetCallback
} from '@meshstate/types';
import { AsyncLock } from '../../../lib/async-lock.js';
import { nowSeconds } from '../../../lib/clock.js';

function isAsyncFunction(fn: WidgetCallback): boolean {
    return Object.prototype.toString.call(fn) === '[object AsyncFunction]';
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
    return (
        value !== null &&
        (typeof value === 'object' || typeof value === 'function') &&
        'then' in value &&
        typeof value.then === 'function'
    );
}

/**
 * Event handlers registered by this process, keyed by widget and event type.
 *
 * Handlers are plain functions and never leave the process; other workers
 * reach them by routing events to the owning worker.
 */
export class CallbackRegistry implements ICallbackRegistry {
    private readonly callbacks = new Map<string, Map<string, ICallbackRegistration>>();
    private readonly lock = new AsyncLock();
    private readonly logger: ILogger;

    constructor(logger: ILogger) {
        this.logger = logger.child({ module: 'callback-registry' });
    }

    async register(widgetId: string, eventType: string, callback: WidgetCallback): Promise<void> {
        await this.lock.run(() => {
            let events = this.callbacks.get(widgetId);
            if (!events) {
                events = new Map();
                this.callbacks.set(widgetId, events);
            }
            events.set(eventType, {
                widgetId,
                eventType,
                callback,
                isAsync: isAsyncFunction(callback),
                createdAt: nowSeconds(),
                invokeCount: 0,
                lastInvoked: null
            });
        });
        this.logger.debug({ widgetId, eventType }, 'Registered callback');
    }

    /**
     * @returns A snapshot of the registration; later invocations do not update it
     */
    async get(widgetId: string, eventType: string): Promise<ICallbackRegistration | null> {
        return this.lock.run(() => {
            const registration = this.callbacks.get(widgetId)?.get(eventType);
            return registration ? { ...registration } : null;
        });
    }

    async hasCallback(widgetId: string, eventType: string): Promise<boolean> {
        return this.lock.run(() => this.callbacks.get(widgetId)?.has(eventType) ?? false);
    }

    async hasWidget(widgetId: string): Promise<boolean> {
        return this.lock.run(() => this.callbacks.has(widgetId));
    }

    /**
     * Run the handler for an event, if this process has one.
     *
     * Synchronous handlers are deferred to a later macrotask so they never run
     * on the caller's stack; async handlers are awaited. A failing handler is
     * logged and reported as not handled.
     */
    async invoke(widgetId: string, eventType: string, data: Record<string, unknown>): Promise<ICallbackInvocation> {
        const registration = await this.lock.run(() => {
            const live = this.callbacks.get(widgetId)?.get(eventType);
            if (!live) {
                return null;
            }
            live.invokeCount++;
            live.lastInvoked = nowSeconds();
            return { ...live };
        });
        if (!registration) {
            return { handled: false, result: null };
        }

        try {
            const result = registration.isAsync
                ? await registration.callback(data, widgetId, eventType)
                : await this.runDeferred(registration.callback, data, widgetId, eventType);

            this.logger.debug({ widgetId, eventType, invokeCount: registration.invokeCount }, 'Invoked callback');
            return { handled: true, result };
        } catch (error) {
            this.logger.error({ error, widgetId, eventType }, 'Callback failed');
            return { handled: false, result: null };
        }
    }

    async unregister(widgetId: string, eventType: string): Promise<boolean> {
        return this.lock.run(() => {
            const events = this.callbacks.get(widgetId);
            if (!events || !events.delete(eventType)) {
                return false;
            }
            if (events.size === 0) {
                this.callbacks.delete(widgetId);
            }
            return true;
        });
    }

    async unregisterWidget(widgetId: string): Promise<number> {
        return this.lock.run(() => {
            const events = this.callbacks.get(widgetId);
            if (!events) {
                return 0;
            }
            this.callbacks.delete(widgetId);
            return events.size;
        });
    }

    async listWidgetEvents(widgetId: string): Promise<string[]> {
        return this.lock.run(() => Array.from(this.callbacks.get(widgetId)?.keys() ?? []));
    }

    async listWidgets(): Promise<string[]> {
        return this.lock.run(() => Array.from(this.callbacks.keys()));
    }

    async getStats(): Promise<ICallbackRegistryStats> {
        return this.lock.run(() => {
            const widgets: Record<string, string[]> = {};
            let totalCallbacks = 0;
            let totalInvocations = 0;

            for (const [widgetId, events] of this.callbacks) {
                widgets[widgetId] = Array.from(events.keys());
                totalCallbacks += events.size;
                for (const registration of events.values()) {
                    totalInvocations += registration.invokeCount;
                }
            }

            return { widgetCount: this.callbacks.size, totalCallbacks, totalInvocations, widgets };
        });
    }

    /**
     * Drop every registration. Used on shutdown.
     */
    async clear(): Promise<void> {
        await this.lock.run(() => {
            this.callbacks.clear();
        });
    }

    private runDeferred(
        callback: WidgetCallback,
        data: Record<string, unknown>,
        widgetId: string,
        eventType: string
    ): Promise<unknown> {
        return new Promise<unknown>((resolve, reject) => {
            setImmediate(() => {
                try {
                    const result = callback(data, widgetId, eventType);
                    // A plain function may still hand back a promise
                    if (isThenable(result)) {
                        Promise.resolve(result).then(resolve, reject);
                    } else {
                        resolve(result);
                    }
                } catch (error) {
                    reject(error);
                }
            });
        });
    }
}
