import type { IPermissionPolicy } from '../session/permissions.js';

/**
 * Storage backends the state manager can run on.
 */
export type StateBackend = 'memory' | 'redis';

/**
 * Immutable configuration of a state manager and its stores.
 *
 * Built once from the environment; stores never change it after
 * construction.
 */
export interface IStateConfig {
    /**
     * Whether this process is one worker of a horizontally scaled deployment.
     */
    deployMode: boolean;

    backend: StateBackend;

    /**
     * Stable worker id; generated once per manager when `null`.
     */
    workerId: string | null;

    redis: {
        url: string;

        /**
         * Namespace prepended to every key and channel.
         */
        prefix: string;

        maxRetriesPerRequest: number;
    };

    /**
     * Lifetimes in seconds.
     */
    ttl: {
        widget: number;
        connection: number;
        session: number;
    };

    /**
     * Capacity of each in-process subscriber queue before events are dropped.
     */
    eventQueueSize: number;

    /**
     * How long a synchronous bridge call may block, in milliseconds.
     */
    syncBridgeTimeoutMs: number;

    permissions: IPermissionPolicy;
}
