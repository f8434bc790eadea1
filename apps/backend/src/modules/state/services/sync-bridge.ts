import { MessageChannel, type MessagePort, receiveMessageOnPort, threadId } from 'node:worker_threads';
import type { ILogger, IStateManager } from '@meshstate/types';
import { SyncBridgeCallError, SyncBridgeDeadlockError, SyncBridgeTimeoutError } from '../../../lib/errors.js';

/**
 * Manager methods a synchronous caller may reach. Methods that take or
 * return functions or live connections cannot cross a thread boundary and
 * are left out.
 */
export const SYNC_BRIDGE_METHODS = [
    'registerWidget',
    'getWidget',
    'getWidgetHtml',
    'getWidgetToken',
    'updateWidgetHtml',
    'updateWidgetToken',
    'widgetExists',
    'removeWidget',
    'listWidgets',
    'countWidgets',
    'getWidgetLifecycle',
    'refreshHeartbeat',
    'getConnectionInfo',
    'getConnectionOwner',
    'invokeCallback',
    'unregisterCallback',
    'dispatchEvent',
    'broadcastEvent',
    'sendToWidget',
    'createSession',
    'getSession',
    'validateSession',
    'deleteSession',
    'refreshSession',
    'listUserSessions',
    'checkPermission'
] as const satisfies ReadonlyArray<keyof IStateManager>;

export type SyncBridgeMethod = (typeof SYNC_BRIDGE_METHODS)[number];

export type SyncBridgeTarget = Pick<IStateManager, SyncBridgeMethod>;

export type SyncBridgeResult<M extends SyncBridgeMethod> = Awaited<ReturnType<SyncBridgeTarget[M]>>;

/**
 * Everything a thread needs to talk to the host. Pass it through
 * `workerData` with `port` in the transfer list.
 */
export interface ISyncBridgeChannel {
    port: MessagePort;
    /** One Int32 slot the host raises after posting a reply. */
    signal: SharedArrayBuffer;
    /** Thread that runs the state manager. */
    hostThreadId: number;
    /** Default milliseconds a client blocks before giving up. */
    timeoutMs: number;
}

interface ISyncBridgeRequest {
    id: number;
    method: string;
    args: unknown[];
    oneway?: boolean;
}

interface ISyncBridgeSuccess<T> {
    id: number;
    ok: true;
    value: T;
}

interface ISyncBridgeFailure {
    id: number;
    ok: false;
    error: { name: string; message: string };
}

type SyncBridgeReply<T> = ISyncBridgeSuccess<T> | ISyncBridgeFailure;

const allowedMethods: ReadonlySet<string> = new Set(SYNC_BRIDGE_METHODS);

export function isSyncBridgeMethod(value: unknown): value is SyncBridgeMethod {
    return typeof value === 'string' && allowedMethods.has(value);
}

function isRequest(value: unknown): value is ISyncBridgeRequest {
    return (
        typeof value === 'object' &&
        value !== null &&
        'id' in value &&
        typeof value.id === 'number' &&
        'method' in value &&
        typeof value.method === 'string' &&
        'args' in value &&
        Array.isArray(value.args)
    );
}

/**
 * Replies are produced by the host from the very method that was requested,
 * so the value type follows from the method name.
 */
function isReply<T>(value: unknown): value is SyncBridgeReply<T> {
    return (
        typeof value === 'object' &&
        value !== null &&
        'id' in value &&
        typeof value.id === 'number' &&
        'ok' in value &&
        typeof value.ok === 'boolean'
    );
}

const DEFAULT_SYNC_TIMEOUT_MS = 5000;

export interface ISyncBridgeHostOptions {
    /** Timeout handed to clients of the channels this host opens. */
    timeoutMs?: number;
}

interface IHostedChannel {
    port: MessagePort;
    flag: Int32Array;
}

/**
 * Serves synchronous callers on other threads from the state manager's own
 * event loop.
 *
 * Lives as long as the manager and is closed by its shutdown.
 */
export class SyncBridgeHost {
    private readonly channels = new Set<IHostedChannel>();
    private readonly logger: ILogger;
    private readonly timeoutMs: number;
    private isClosed = false;

    constructor(
        private readonly target: SyncBridgeTarget,
        logger: ILogger,
        options: ISyncBridgeHostOptions = {}
    ) {
        this.logger = logger.child({ module: 'sync-bridge' });
        this.timeoutMs = options.timeoutMs ?? DEFAULT_SYNC_TIMEOUT_MS;
    }

    get closed(): boolean {
        return this.isClosed;
    }

    openChannel(): ISyncBridgeChannel {
        if (this.isClosed) {
            throw new SyncBridgeCallError('openChannel', 'Sync bridge host is closed');
        }

        const { port1, port2 } = new MessageChannel();
        const signal = new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT);
        const hosted: IHostedChannel = { port: port1, flag: new Int32Array(signal) };

        port1.on('message', (request: unknown) => void this.handle(hosted, request));
        port1.on('close', () => this.channels.delete(hosted));
        // An idle bridge must not keep the process alive
        port1.unref();
        this.channels.add(hosted);

        return { port: port2, signal, hostThreadId: threadId, timeoutMs: this.timeoutMs };
    }

    close(): void {
        this.isClosed = true;
        for (const { port } of this.channels) {
            port.close();
        }
        this.channels.clear();
    }

    private async handle(channel: IHostedChannel, request: unknown): Promise<void> {
        if (!isRequest(request)) {
            this.logger.warn({ request }, 'Ignoring malformed sync bridge request');
            return;
        }

        const { id, method, args } = request;
        let reply: SyncBridgeReply<unknown>;
        if (!isSyncBridgeMethod(method)) {
            reply = this.failure(id, new SyncBridgeCallError(method, 'Method is not available over the sync bridge'));
        } else {
            try {
                const value: unknown = await Reflect.apply(this.target[method], this.target, args);
                reply = { id, ok: true, value };
            } catch (error) {
                this.logger.warn({ error, method }, 'Sync bridge call failed');
                reply = this.failure(id, error);
            }
        }

        if (request.oneway) {
            return;
        }

        try {
            channel.port.postMessage(reply);
        } catch (error) {
            // Result could not be cloned across threads
            channel.port.postMessage(this.failure(id, error));
        }
        Atomics.store(channel.flag, 0, 1);
        Atomics.notify(channel.flag, 0);
    }

    private failure(id: number, error: unknown): ISyncBridgeFailure {
        return {
            id,
            ok: false,
            error: error instanceof Error
                ? { name: error.name, message: error.message }
                : { name: 'Error', message: String(error) }
        };
    }
}

export interface ISyncStateClientOptions {
    /** Milliseconds to block before giving up on a reply; defaults to the channel's. */
    timeoutMs?: number;
}

/**
 * Blocking access to the state manager from a thread that cannot await.
 *
 * @example
 * ```typescript
 * // In the worker thread
 * const client = new SyncStateClient(workerData.stateChannel, { timeoutMs: 2000 });
 * const html = client.call('getWidgetHtml', 'chart-1');
 * client.notify('broadcastEvent', 'chart-1', 'tick', { n: 1 });
 * ```
 */
export class SyncStateClient {
    private readonly port: MessagePort;
    private readonly flag: Int32Array;
    private readonly hostThreadId: number;
    private readonly timeoutMs: number;
    private nextId = 1;

    constructor(channel: ISyncBridgeChannel, options: ISyncStateClientOptions = {}) {
        this.port = channel.port;
        this.flag = new Int32Array(channel.signal);
        this.hostThreadId = channel.hostThreadId;
        this.timeoutMs = options.timeoutMs ?? channel.timeoutMs;
    }

    /**
     * Call a manager method and block until it settles.
     *
     * @throws SyncBridgeDeadlockError when called on the manager's own thread
     * @throws SyncBridgeTimeoutError when no reply arrives in time
     * @throws SyncBridgeCallError when the method failed on the host
     */
    call<M extends SyncBridgeMethod>(method: M, ...args: Parameters<SyncBridgeTarget[M]>): SyncBridgeResult<M> {
        this.assertOffHostThread();

        const id = this.nextId++;
        Atomics.store(this.flag, 0, 0);
        this.port.postMessage({ id, method, args, oneway: false } satisfies ISyncBridgeRequest);

        const deadline = Date.now() + this.timeoutMs;
        while (true) {
            const received = receiveMessageOnPort(this.port);
            if (received) {
                const reply: unknown = received.message;
                if (!isReply<SyncBridgeResult<M>>(reply) || reply.id !== id) {
                    // Late reply to a call that already timed out
                    continue;
                }
                if (!reply.ok) {
                    throw new SyncBridgeCallError(method, reply.error.message, reply.error.name);
                }
                return reply.value;
            }

            const remaining = deadline - Date.now();
            if (remaining <= 0) {
                throw new SyncBridgeTimeoutError(method, this.timeoutMs);
            }
            Atomics.wait(this.flag, 0, 0, remaining);
            Atomics.store(this.flag, 0, 0);
        }
    }

    /**
     * Submit a call without waiting for it. Failures are logged on the host.
     */
    notify<M extends SyncBridgeMethod>(method: M, ...args: Parameters<SyncBridgeTarget[M]>): void {
        this.assertOffHostThread();
        this.port.postMessage({ id: this.nextId++, method, args, oneway: true } satisfies ISyncBridgeRequest);
    }

    close(): void {
        this.port.close();
    }

    private assertOffHostThread(): void {
        if (threadId === this.hostThreadId) {
            throw new SyncBridgeDeadlockError();
        }
    }
}
