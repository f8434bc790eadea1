/**
 * Structured logging contract shared by every state component.
 *
 * Components log through this surface instead of importing a concrete logging
 * library, which lets tests pass a recording logger and lets the process wire
 * in Pino. Arguments follow the Pino convention: an optional bindings object
 * first, then the message.
 *
 * @example
 * ```typescript
 * logger.info({ widgetId }, 'Widget registered');
 * const scoped = logger.child({ module: 'event-bus' });
 * ```
 */
export interface ILogger {
    /**
     * Emit a fatal-level log entry for failures that stop the process.
     */
    fatal(...args: readonly unknown[]): void;

    /**
     * Emit an error-level log entry.
     *
     * Used for failures that were contained (a throwing widget callback, an
     * undecodable pub/sub payload) but still need attention.
     */
    error(...args: readonly unknown[]): void;

    /**
     * Emit a warning-level log entry for degraded but working behavior,
     * such as a subscriber queue dropping events.
     */
    warn(...args: readonly unknown[]): void;

    /**
     * Emit an info-level log entry for lifecycle milestones.
     */
    info(...args: readonly unknown[]): void;

    /**
     * Emit a debug-level log entry with diagnostic context.
     */
    debug(...args: readonly unknown[]): void;

    /**
     * Emit a trace-level log entry.
     */
    trace(...args: readonly unknown[]): void;

    /**
     * Create a scoped child logger.
     *
     * Bindings (for example `{ module: 'callback-registry', workerId }`) are
     * merged into every entry written through the child.
     *
     * @param bindings - Static key-value pairs merged into each log entry
     * @returns A logger that applies the bindings
     */
    child(bindings: Record<string, unknown>): ILogger;
}
