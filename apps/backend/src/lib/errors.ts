export class MeshStateError extends Error {
  constructor(message: string, public readonly code = 'INTERNAL_ERROR', public readonly details?: unknown) {
    super(message);
    this.name = 'MeshStateError';
  }
}

export class ConfigurationError extends MeshStateError {
  constructor(message = 'Invalid configuration', details?: unknown) {
    super(message, 'CONFIGURATION_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when the external store rejects or fails a command.
 *
 * The original driver error is kept as `cause`. This layer never retries and
 * never turns an outage into an empty result.
 */
export class StateBackendError extends MeshStateError {
  constructor(message = 'State backend command failed', options?: { cause?: unknown; details?: unknown }) {
    super(message, 'STATE_BACKEND_ERROR', options?.details);
    this.name = 'StateBackendError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Raised when a synchronous bridge call is made from the thread that hosts
 * the state manager; blocking there would stall the very loop that has to
 * answer the call.
 */
export class SyncBridgeDeadlockError extends MeshStateError {
  constructor(message = 'Synchronous state call made from the state manager thread; await the async API instead') {
    super(message, 'SYNC_BRIDGE_DEADLOCK');
    this.name = 'SyncBridgeDeadlockError';
  }
}

export class SyncBridgeTimeoutError extends MeshStateError {
  constructor(method: string, timeoutMs: number) {
    super(`Synchronous state call "${method}" timed out after ${timeoutMs}ms`, 'SYNC_BRIDGE_TIMEOUT', { method, timeoutMs });
    this.name = 'SyncBridgeTimeoutError';
  }
}

export class SyncBridgeCallError extends MeshStateError {
  constructor(method: string, remoteMessage: string, remoteName?: string) {
    super(`Synchronous state call "${method}" failed: ${remoteMessage}`, 'SYNC_BRIDGE_CALL_FAILED', { method, remoteName });
    this.name = 'SyncBridgeCallError';
  }
}

export class ValidationError extends MeshStateError {
  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}
