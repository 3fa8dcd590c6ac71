/**
 * Client-secret credential for Azure Resource Manager
 *
 * Exchanges the service principal's secret for a bearer token with the OAuth2
 * client-credentials grant and caches it until shortly before expiry.
 */

import type { Logger } from 'pino';
import { z } from 'zod';
import type { AzureConfig } from '../../config/app-config';
import { DEFAULT_AZURE } from '../../config/defaults';
import { ConfigurationError, CloudError } from '../../errors';
import { defaultFetch, readJson, type HttpFetch } from './http';

export interface TokenCredential {
  getToken: () => Promise<string>;
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive(),
});

const TokenErrorSchema = z
  .object({
    error: z.string().optional(),
    error_description: z.string().optional(),
  })
  .passthrough();

export interface CredentialOptions {
  fetch?: HttpFetch;
  now?: () => number;
}

export const createClientSecretCredential = (
  config: AzureConfig,
  logger: Logger,
  options: CredentialOptions = {},
): TokenCredential => {
  const doFetch = options.fetch ?? defaultFetch;
  const now = options.now ?? Date.now;
  let cached: { token: string; expiresAt: number } | undefined;

  return {
    async getToken(): Promise<string> {
      if (cached && now() < cached.expiresAt - DEFAULT_AZURE.tokenRefreshSkewMs) {
        return cached.token;
      }

      const { tenantId, clientId, clientSecret } = config;
      if (!tenantId || !clientId || !clientSecret) {
        throw new ConfigurationError(
          'AZURE_TENANT_ID, AZURE_CLIENT_ID and AZURE_CLIENT_SECRET must be set',
          'azure',
        );
      }

      const authority = config.authorityHost.replace(/\/+$/, '');
      const scope = `${config.resourceManagerEndpoint.replace(/\/+$/, '')}/.default`;
      const response = await doFetch(`${authority}/${tenantId}/oauth2/v2.0/token`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({
          grant_type: 'client_credentials',
          client_id: clientId,
          client_secret: clientSecret,
          scope,
        }).toString(),
      });

      const body = await readJson(response);
      if (response.status !== 200) {
        const details = TokenErrorSchema.safeParse(body);
        const description = details.success ? details.data.error_description : undefined;
        throw new CloudError(
          `Failed to acquire Azure token: ${description ?? `HTTP ${response.status}`}`,
          response.status,
          details.success && details.data.error ? details.data.error : 'AUTH_ERROR',
        );
      }

      const token = TokenResponseSchema.parse(body);
      cached = { token: token.access_token, expiresAt: now() + token.expires_in * 1000 };
      logger.debug({ tenantId, expiresIn: token.expires_in }, 'Acquired Azure access token');
      return cached.token;
    },
  };
};
