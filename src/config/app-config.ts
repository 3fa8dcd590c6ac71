/**
 * Unified Application Configuration
 *
 * Single source of truth for all configuration with Zod validation.
 * Environment variables are read once and validated; fixed values live in ./defaults.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { DEFAULT_AZURE, DEFAULT_RETRY, DEFAULT_TIMEOUTS } from './defaults';

const NodeEnvSchema = z.enum(['development', 'production', 'test']).default('production');
const LogLevelSchema = z
  .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  .default('info');

const AppConfigSchema = z.object({
  server: z.object({
    nodeEnv: NodeEnvSchema,
    logLevel: LogLevelSchema,
  }),
  azure: z.object({
    subscriptionId: z.string().min(1).optional(),
    tenantId: z.string().min(1).optional(),
    clientId: z.string().min(1).optional(),
    clientSecret: z.string().min(1).optional(),
    resourceManagerEndpoint: z.string().url().default(DEFAULT_AZURE.resourceManagerEndpoint),
    authorityHost: z.string().url().default(DEFAULT_AZURE.authorityHost),
  }),
  kubernetes: z.object({
    kubeconfig: z.string().min(1).optional(),
    namespace: z.string().min(1).default('default'),
  }),
  retry: z.object({
    maxAttempts: z.coerce.number().int().min(1).default(DEFAULT_RETRY.maxAttempts),
    delayMs: z.coerce.number().int().nonnegative().default(DEFAULT_RETRY.delayMs),
    maxDelayMs: z.coerce.number().int().nonnegative().default(DEFAULT_RETRY.maxDelayMs),
  }),
  operations: z.object({
    requestTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUTS.armRequest),
    operationTimeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUTS.armOperation),
    pollIntervalMs: z.coerce.number().int().nonnegative().default(DEFAULT_TIMEOUTS.armPoll),
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AzureConfig = AppConfig['azure'];

type Env = Record<string, string | undefined>;

/**
 * Unset and blank variables both fall through to the schema default
 */
function getEnvValue(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Create configuration from environment variables, validated with Zod
 */
export function createAppConfig(env: Env = process.env): AppConfig {
  const rawConfig = {
    server: {
      nodeEnv: getEnvValue(env, 'NODE_ENV'),
      logLevel: getEnvValue(env, 'LOG_LEVEL'),
    },
    azure: {
      subscriptionId: getEnvValue(env, 'AZURE_SUBSCRIPTION_ID'),
      tenantId: getEnvValue(env, 'AZURE_TENANT_ID'),
      clientId: getEnvValue(env, 'AZURE_CLIENT_ID'),
      clientSecret: getEnvValue(env, 'AZURE_CLIENT_SECRET'),
      resourceManagerEndpoint: getEnvValue(env, 'AZURE_RESOURCE_MANAGER_ENDPOINT'),
      authorityHost: getEnvValue(env, 'AZURE_AUTHORITY_HOST'),
    },
    kubernetes: {
      kubeconfig: getEnvValue(env, 'KUBECONFIG'),
      namespace: getEnvValue(env, 'CLUSTER_NAMESPACE'),
    },
    retry: {
      maxAttempts: getEnvValue(env, 'ARM_RETRY_MAX_ATTEMPTS'),
      delayMs: getEnvValue(env, 'ARM_RETRY_DELAY_MS'),
      maxDelayMs: getEnvValue(env, 'ARM_RETRY_MAX_DELAY_MS'),
    },
    operations: {
      requestTimeoutMs: getEnvValue(env, 'ARM_REQUEST_TIMEOUT_MS'),
      operationTimeoutMs: getEnvValue(env, 'ARM_OPERATION_TIMEOUT_MS'),
      pollIntervalMs: getEnvValue(env, 'ARM_POLL_INTERVAL_MS'),
    },
  };

  const result = AppConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(
      `Configuration validation failed: ${result.error.message}`,
      issue?.path.join('.'),
    );
  }

  return result.data;
}
