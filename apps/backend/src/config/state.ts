import type { IStateConfig, StateBackend } from '@meshstate/types';
import { env as processEnv, type EnvConfig } from './env.js';

/**
 * Whether the process runs as one worker of a multi-worker deployment.
 *
 * On when explicitly requested, when Redis is selected as the backend, or
 * when running headless with any backend configured.
 */
export function isDeployMode(source: EnvConfig): boolean {
  if (source.STATE_DEPLOY_MODE) {
    return true;
  }
  if (source.STATE_BACKEND === 'redis') {
    return true;
  }
  return source.STATE_HEADLESS && source.STATE_BACKEND !== undefined;
}

/**
 * Build the state layer configuration from parsed environment variables.
 *
 * Redis is only used in deploy mode; a single local process always keeps its
 * state in memory.
 */
export function loadStateConfig(source: EnvConfig = processEnv): IStateConfig {
  const deployMode = isDeployMode(source);
  const backend: StateBackend = deployMode && source.STATE_BACKEND === 'redis' ? 'redis' : 'memory';

  return {
    deployMode,
    backend,
    workerId: source.STATE_WORKER_ID ?? null,
    redis: {
      url: source.STATE_REDIS_URL,
      prefix: source.STATE_REDIS_PREFIX,
      maxRetriesPerRequest: source.STATE_REDIS_MAX_RETRIES
    },
    ttl: {
      widget: source.STATE_WIDGET_TTL,
      connection: source.STATE_CONNECTION_TTL,
      session: source.STATE_SESSION_TTL
    },
    eventQueueSize: source.STATE_EVENT_QUEUE_SIZE,
    syncBridgeTimeoutMs: source.STATE_SYNC_BRIDGE_TIMEOUT_MS,
    permissions: {
      resourceGrants: source.STATE_RESOURCE_GRANTS,
      privilegedRoles: source.STATE_PRIVILEGED_ROLES
    }
  };
}
