import type { IConnectionInfo } from './IConnectionInfo.js';

/**
 * Tracks which worker owns each widget's live connection.
 *
 * Entries are refreshed by heartbeats and, in the Redis implementation,
 * expire when heartbeats stop.
 */
export interface IConnectionRouter {
    /**
     * Record that a widget's live connection is held by a worker.
     *
     * Last registration wins. The router does not close the connection it
     * replaces.
     */
    registerConnection(
        widgetId: string,
        workerId: string,
        userId?: string | null,
        sessionId?: string | null
    ): Promise<void>;

    /**
     * Get the ownership record for a widget.
     *
     * @returns The record, or `null` when the widget has no live connection
     */
    getConnectionInfo(widgetId: string): Promise<IConnectionInfo | null>;

    /**
     * Get the worker holding a widget's live connection.
     *
     * @returns The worker id, or `null` when nobody holds it
     */
    getOwner(widgetId: string): Promise<string | null>;

    /**
     * Update the heartbeat timestamp and extend the entry's TTL.
     *
     * @returns `false` when the entry already expired; the caller should
     * register the connection again
     */
    refreshHeartbeat(widgetId: string): Promise<boolean>;

    /**
     * Remove a widget's ownership record.
     *
     * @returns `true` if a record existed
     */
    unregisterConnection(widgetId: string): Promise<boolean>;

    /**
     * List widget ids whose live connection is held by a worker.
     *
     * Used on shutdown to find and close every connection a worker owns.
     */
    listWorkerConnections(workerId: string): Promise<string[]>;
}
