/**
 * A rendered widget as held by the widget store.
 *
 * Created the first time a widget is rendered, updated in place when its HTML
 * or token changes, and removed on explicit teardown or TTL expiry. The
 * `widgetId` is unique across the whole deployment.
 */
export interface IWidgetRecord {
    /**
     * Deployment-wide unique widget identifier.
     */
    widgetId: string;

    /**
     * Current rendered HTML document.
     */
    html: string;

    /**
     * Per-widget secret used to authenticate the widget's live connection.
     *
     * `null` when the widget was registered without one.
     */
    token: string | null;

    /**
     * Unix timestamp (seconds) when the widget was registered.
     */
    createdAt: number;

    /**
     * Worker that registered the widget and holds its callbacks.
     *
     * This is not necessarily the worker holding the live connection; the
     * connection router is authoritative for that.
     */
    ownerWorkerId: string | null;

    /**
     * Open metadata map (title, theme, and similar rendering hints).
     */
    metadata: Record<string, unknown>;
}

/**
 * Optional fields accepted when registering a widget.
 */
export interface IWidgetRegistration {
    token?: string | null;
    ownerWorkerId?: string | null;
    metadata?: Record<string, unknown> | null;
}
