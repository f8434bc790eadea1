import 'dotenv/config';
import { z } from 'zod';
import { ConfigurationError } from '../lib/errors.js';

const booleanFlag = z
  .union([
    z.boolean(),
    z
      .string()
      .transform(value => value.trim().toLowerCase())
      .transform(value => ['1', 'true', 'yes', 'on'].includes(value))
  ]);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
  // Explicit deploy-mode switch; a Redis backend (or headless + backend) also implies it
  STATE_DEPLOY_MODE: booleanFlag.default(false),
  STATE_HEADLESS: booleanFlag.default(false),
  STATE_BACKEND: z
    .string()
    .transform(value => value.trim().toLowerCase())
    .pipe(z.enum(['memory', 'redis']))
    .optional(),
  STATE_WORKER_ID: z.string().trim().min(1).optional(),
  STATE_REDIS_URL: z.string().min(1).default('redis://localhost:6379/0'),
  STATE_REDIS_PREFIX: z.string().min(1).default('meshstate'),
  STATE_REDIS_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  STATE_WIDGET_TTL: z.coerce.number().int().min(60).default(86_400),
  STATE_CONNECTION_TTL: z.coerce.number().int().min(30).default(300),
  STATE_SESSION_TTL: z.coerce.number().int().min(60).default(86_400),
  STATE_EVENT_QUEUE_SIZE: z.coerce.number().int().positive().default(1000),
  STATE_SYNC_BRIDGE_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  STATE_RESOURCE_GRANTS: z.enum(['union', 'scoped']).default('union'),
  STATE_PRIVILEGED_ROLES: z
    .string()
    .default('admin')
    .transform(value => value.split(',').map(role => role.trim()).filter(role => role.length > 0)),
  AUTH_TOKEN_SECRET: z.string().optional()
});

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * Parse an environment map into typed configuration.
 *
 * @throws ConfigurationError listing the offending variables
 */
export function parseEnv(source: NodeJS.ProcessEnv): EnvConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const fieldErrors = parsed.error.flatten().fieldErrors;
    throw new ConfigurationError('Invalid environment configuration', fieldErrors);
  }

  return parsed.data;
}

export const env: EnvConfig = parseEnv(process.env);
