/**
 * Azure Resource Manager client
 *
 * Direct REST access to ARM: idempotent PUT/GET/DELETE by resource id, with
 * retry on throttling and server errors and polling of long-running operations.
 *
 * @example
 * ```typescript
 * const arm = createArmClient({ config, credential, logger });
 * await arm.put('/subscriptions/sub/resourcegroups/rg', '2019-05-01', { location: 'westus2' });
 * ```
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import type { AppConfig } from '../../config/app-config';
import { DEFAULT_RETRY } from '../../config/defaults';
import { CloudError, TimeoutError, isCloudError } from '../../errors';
import { retry, sleep } from '../../shared/async';
import type { TokenCredential } from './credentials';
import { defaultFetch, readJson, type HttpFetch, type HttpResponse } from './http';

export const ArmResourceSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().optional(),
    type: z.string().optional(),
    location: z.string().optional(),
    tags: z.record(z.string()).optional(),
    properties: z.record(z.unknown()).optional(),
  })
  .passthrough();

export type ArmResource = z.infer<typeof ArmResourceSchema>;

export interface ArmClient {
  get: (resourceId: string, apiVersion: string) => Promise<ArmResource | undefined>;
  put: (resourceId: string, apiVersion: string, body: Record<string, unknown>) => Promise<ArmResource>;
  delete: (resourceId: string, apiVersion: string) => Promise<void>;
}

export interface ArmClientOptions {
  config: Pick<AppConfig, 'azure' | 'retry' | 'operations'>;
  credential: TokenCredential;
  logger: Logger;
  fetch?: HttpFetch;
}

const ArmErrorSchema = z.object({
  error: z
    .object({
      code: z.string().optional(),
      message: z.string().optional(),
    })
    .passthrough(),
});

const OperationStatusSchema = z
  .object({
    status: z.string(),
    error: z.object({ code: z.string().optional(), message: z.string().optional() }).optional(),
  })
  .passthrough();

const TERMINAL_OPERATION_STATES = ['Succeeded', 'Failed', 'Canceled'];

async function toCloudError(response: HttpResponse, resourceId: string): Promise<CloudError> {
  const body = await readJson(response);
  const parsed = ArmErrorSchema.safeParse(body);
  const code = parsed.success ? parsed.data.error.code : undefined;
  const message = parsed.success ? parsed.data.error.message : undefined;
  return new CloudError(
    message ?? `Azure request for ${resourceId} failed with HTTP ${response.status}`,
    response.status,
    code ?? 'CLOUD_ERROR',
    resourceId,
  );
}

const hasPendingOperation = (response: HttpResponse): boolean =>
  response.headers.get('azure-asyncoperation') !== null || response.headers.get('location') !== null;

/**
 * Network failures from fetch surface as TypeError; those are retried too
 */
function isRetryable(error: unknown): boolean {
  if (isCloudError(error)) return error.retryable;
  return error instanceof TypeError;
}

export const createArmClient = (options: ArmClientOptions): ArmClient => {
  const { config, credential, logger } = options;
  const doFetch = options.fetch ?? defaultFetch;
  const endpoint = config.azure.resourceManagerEndpoint.replace(/\/+$/, '');

  const send = async (
    method: 'GET' | 'PUT' | 'DELETE',
    url: string,
    resourceId: string,
    body?: Record<string, unknown>,
  ): Promise<HttpResponse> =>
    retry(
      async () => {
        const token = await credential.getToken();
        const response = await doFetch(url, {
          method,
          headers: {
            Authorization: `Bearer ${token}`,
            'Content-Type': 'application/json',
          },
          ...(body && { body: JSON.stringify(body) }),
          signal: AbortSignal.timeout(config.operations.requestTimeoutMs),
        });
        if (response.status === 429 || response.status >= 500) {
          throw await toCloudError(response, resourceId);
        }
        return response;
      },
      {
        maxAttempts: config.retry.maxAttempts,
        delayMs: config.retry.delayMs,
        backoff: DEFAULT_RETRY.backoff,
        maxDelayMs: config.retry.maxDelayMs,
        shouldRetry: isRetryable,
        onRetry: (error, attempt, waitMs) =>
          logger.warn(
            { method, resourceId, attempt, waitMs, error: error instanceof Error ? error.message : String(error) },
            'Retrying Azure request',
          ),
      },
    );

  const resourceUrl = (resourceId: string, apiVersion: string): string =>
    `${endpoint}${resourceId}?api-version=${encodeURIComponent(apiVersion)}`;

  /**
   * Wait for a long-running operation announced by Azure-AsyncOperation or Location
   */
  const waitForOperation = async (response: HttpResponse, resourceId: string): Promise<void> => {
    const asyncUrl = response.headers.get('azure-asyncoperation');
    const locationUrl = response.headers.get('location');
    const pollUrl = asyncUrl ?? locationUrl;
    if (!pollUrl) return;

    const deadline = Date.now() + config.operations.operationTimeoutMs;
    logger.debug({ resourceId, pollUrl }, 'Waiting for long-running operation');

    while (Date.now() < deadline) {
      await sleep(config.operations.pollIntervalMs);
      const poll = await send('GET', pollUrl, resourceId);

      if (poll.status >= 400) {
        throw await toCloudError(poll, resourceId);
      }

      if (asyncUrl) {
        const status = OperationStatusSchema.safeParse(await readJson(poll));
        if (!status.success) continue;
        if (!TERMINAL_OPERATION_STATES.includes(status.data.status)) continue;
        if (status.data.status === 'Succeeded') return;
        throw new CloudError(
          status.data.error?.message ?? `Operation on ${resourceId} ended as ${status.data.status}`,
          200,
          status.data.error?.code ?? `Operation${status.data.status}`,
          resourceId,
        );
      }

      // Location polling: 202 while running, 200/204 once done
      if (poll.status !== 202) return;
    }

    throw new TimeoutError(
      `Timed out waiting for operation on ${resourceId}`,
      config.operations.operationTimeoutMs,
      'arm-operation',
    );
  };

  return {
    async get(resourceId: string, apiVersion: string): Promise<ArmResource | undefined> {
      const response = await send('GET', resourceUrl(resourceId, apiVersion), resourceId);
      if (response.status === 404) return undefined;
      if (response.status >= 400) throw await toCloudError(response, resourceId);
      return ArmResourceSchema.parse(await readJson(response) ?? {});
    },

    async put(
      resourceId: string,
      apiVersion: string,
      body: Record<string, unknown>,
    ): Promise<ArmResource> {
      const url = resourceUrl(resourceId, apiVersion);
      const response = await send('PUT', url, resourceId, body);
      if (response.status >= 400) throw await toCloudError(response, resourceId);

      logger.debug({ resourceId, status: response.status }, 'Azure resource put');

      // Updates of existing resources answer 200 and still run asynchronously
      if (hasPendingOperation(response)) {
        await waitForOperation(response, resourceId);
        const final = await send('GET', url, resourceId);
        if (final.status >= 400) throw await toCloudError(final, resourceId);
        return ArmResourceSchema.parse(await readJson(final) ?? {});
      }

      return ArmResourceSchema.parse(await readJson(response) ?? {});
    },

    async delete(resourceId: string, apiVersion: string): Promise<void> {
      const response = await send('DELETE', resourceUrl(resourceId, apiVersion), resourceId);
      if (response.status === 404) {
        logger.debug({ resourceId }, 'Azure resource already deleted');
        return;
      }
      if (response.status >= 400) throw await toCloudError(response, resourceId);
      if (hasPendingOperation(response)) {
        await waitForOperation(response, resourceId);
      }
      logger.debug({ resourceId }, 'Azure resource deleted');
    },
  };
};
