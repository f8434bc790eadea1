import type {
    ICallbackInvocation,
    ICallbackRegistration,
    ICallbackRegistryStats,
    WidgetCallback
} from './ICallbackRegistration.js';

/**
 * Process-local map of (widget, event type) to handler.
 *
 * Deliberately not backed by any shared store: handlers are closures and
 * cannot cross a process boundary. Events for widgets whose handlers live on
 * another worker are routed there through the event bus instead.
 */
export interface ICallbackRegistry {
    /**
     * Register a handler, replacing any previous handler for the same pair.
     */
    register(widgetId: string, eventType: string, callback: WidgetCallback): Promise<void>;

    /**
     * Get a registration.
     *
     * @returns The registration, or `null` when none exists
     */
    get(widgetId: string, eventType: string): Promise<ICallbackRegistration | null>;

    /**
     * Check whether a handler exists for the pair.
     */
    hasCallback(widgetId: string, eventType: string): Promise<boolean>;

    /**
     * Check whether any handler exists for a widget.
     */
    hasWidget(widgetId: string): Promise<boolean>;

    /**
     * Run the handler registered for the pair.
     *
     * Synchronous handlers are deferred so they never run on the caller's
     * stack; asynchronous handlers are awaited. A failing handler is logged
     * and reported as `{ handled: false, result: null }`. Never rejects.
     */
    invoke(widgetId: string, eventType: string, data: Record<string, unknown>): Promise<ICallbackInvocation>;

    /**
     * Remove one handler.
     *
     * @returns `true` if a handler was removed
     */
    unregister(widgetId: string, eventType: string): Promise<boolean>;

    /**
     * Remove every handler of a widget.
     *
     * @returns Number of handlers removed
     */
    unregisterWidget(widgetId: string): Promise<number>;

    /**
     * List event types with handlers for a widget.
     */
    listWidgetEvents(widgetId: string): Promise<string[]>;

    /**
     * List widget ids with at least one handler.
     */
    listWidgets(): Promise<string[]>;

    /**
     * Summarize the registry contents.
     */
    getStats(): Promise<ICallbackRegistryStats>;
}
