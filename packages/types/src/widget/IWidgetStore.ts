import type { IWidgetRecord } from './IWidgetRecord.js';

/**
 * Storage contract for widget HTML, tokens and metadata.
 *
 * Implemented by an in-process store for single-worker deployments and by a
 * Redis store shared by every worker of a deployment. Lookups on unknown ids
 * resolve to `null` or `false`; they never reject. Backend connectivity
 * failures do reject, so callers can tell an outage from a missing widget.
 *
 * @example
 * ```typescript
 * await widgets.register('chart-1', '<div>...</div>', 'test-secret', 'worker-a1b2c3d4');
 * const html = await widgets.getHtml('chart-1');
 * ```
 */
export interface IWidgetStore {
    /**
     * Register a widget, replacing any existing record with the same id.
     *
     * The Redis implementation writes the record, its TTL and its membership
     * in the active set in a single atomic pipeline.
     *
     * @param widgetId - Unique widget identifier
     * @param html - Rendered HTML document
     * @param token - Optional per-widget authentication token
     * @param ownerWorkerId - Worker registering the widget
     * @param metadata - Additional metadata
     */
    register(
        widgetId: string,
        html: string,
        token?: string | null,
        ownerWorkerId?: string | null,
        metadata?: Record<string, unknown> | null
    ): Promise<void>;

    /**
     * Get the complete widget record.
     *
     * @returns The record, or `null` when the widget does not exist
     */
    get(widgetId: string): Promise<IWidgetRecord | null>;

    /**
     * Get the widget's HTML document.
     *
     * @returns The HTML, or `null` when the widget does not exist
     */
    getHtml(widgetId: string): Promise<string | null>;

    /**
     * Get the widget's authentication token.
     *
     * @returns The token, or `null` when the widget does not exist or has none
     */
    getToken(widgetId: string): Promise<string | null>;

    /**
     * Check whether a widget exists.
     */
    exists(widgetId: string): Promise<boolean>;

    /**
     * Replace the widget's HTML document.
     *
     * The Redis implementation also refreshes the widget TTL so an actively
     * updated widget is not evicted.
     *
     * @returns `true` if the widget existed and was updated
     */
    updateHtml(widgetId: string, html: string): Promise<boolean>;

    /**
     * Replace the widget's authentication token.
     *
     * Refreshes the TTL the same way as {@link IWidgetStore.updateHtml}.
     *
     * @returns `true` if the widget existed and was updated
     */
    updateToken(widgetId: string, token: string): Promise<boolean>;

    /**
     * Delete a widget.
     *
     * @returns `true` if the widget existed
     */
    delete(widgetId: string): Promise<boolean>;

    /**
     * List the ids of all active widgets.
     */
    listActive(): Promise<string[]>;

    /**
     * Count active widgets.
     */
    count(): Promise<number>;
}
