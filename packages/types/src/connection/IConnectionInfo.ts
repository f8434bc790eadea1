/**
 * Ownership record for a widget's live connection.
 *
 * At most one exists per widget. A new registration for the same widget
 * overwrites it; the superseded connection must then be closed by whoever
 * holds it.
 */
export interface IConnectionInfo {
    widgetId: string;

    /**
     * Worker currently holding the live connection.
     */
    workerId: string;

    /**
     * Unix timestamp (seconds) when the connection was accepted.
     */
    connectedAt: number;

    /**
     * Unix timestamp (seconds) of the last heartbeat.
     */
    lastHeartbeat: number;

    userId: string | null;

    sessionId: string | null;
}
