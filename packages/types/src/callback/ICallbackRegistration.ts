/**
 * A widget event handler.
 *
 * Receives the event payload, the widget id and the event type. May return a
 * value or a promise; the resolved value is reported back to the caller of
 * `invoke`.
 */
export type WidgetCallback = (
    data: Record<string, unknown>,
    widgetId: string,
    eventType: string
) => unknown;

/**
 * A handler registered on this process.
 *
 * Handlers are closures and never leave the process that registered them.
 */
export interface ICallbackRegistration {
    widgetId: string;
    eventType: string;
    callback: WidgetCallback;

    /**
     * Whether the handler was declared `async`.
     */
    isAsync: boolean;

    /**
     * Unix timestamp (seconds) of registration.
     */
    createdAt: number;

    invokeCount: number;

    /**
     * Unix timestamp (seconds) of the last invocation, or `null` before the first.
     */
    lastInvoked: number | null;
}

/**
 * Outcome of invoking a handler.
 *
 * `handled` is `false` both when no handler is registered and when the
 * handler threw; `result` is then `null`.
 */
export interface ICallbackInvocation {
    handled: boolean;
    result: unknown;
}

/**
 * Snapshot of the registry contents.
 */
export interface ICallbackRegistryStats {
    widgetCount: number;
    totalCallbacks: number;
    totalInvocations: number;
    widgets: Record<string, string[]>;
}
