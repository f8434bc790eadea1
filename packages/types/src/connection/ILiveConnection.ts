/**
 * The duplex channel a browser widget is connected through.
 *
 * Implemented by the channel layer (a WebSocket handler, for example) and
 * handed to the state manager when the connection is accepted. The manager
 * only ever closes it; message framing stays with the channel layer.
 */
export interface ILiveConnection {
    /**
     * Close the connection gracefully.
     *
     * @param code - Close code (WebSocket semantics)
     * @param reason - Human-readable reason sent to the peer
     */
    close(code?: number, reason?: string): void | Promise<void>;
}
