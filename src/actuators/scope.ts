/**
 * Cluster Scope
 *
 * Per-call session bound to one Cluster: the parsed Azure provider spec and
 * status, an ARM client for the cluster's subscription, and a logger bound to
 * the cluster. `close()` writes whatever the services changed back to the
 * Cluster object.
 */

import { isDeepStrictEqual } from 'node:util';
import type { Logger } from 'pino';
import { createAppConfig, type AppConfig } from '../config/app-config';
import {
  AzureClusterProviderSpecSchema,
  AzureClusterProviderStatusSchema,
  Failure,
  Success,
  type ApiEndpoint,
  type AzureClusterProviderSpec,
  type AzureClusterProviderStatus,
  type Cluster,
  type Result,
} from '../domain/types';
import { ScopeError, toError } from '../errors';
import { createArmClient, createClientSecretCredential, type ArmClient } from '../infrastructure/azure';
import type { ClusterClient } from '../infrastructure/kubernetes/cluster-client';
import { createLogger } from '../lib/logger';

export interface ScopeParams {
  cluster: Cluster;
  /** Without a client the scope never persists changes */
  client?: ClusterClient | undefined;
  config?: AppConfig;
  logger?: Logger;
  arm?: ArmClient;
}

interface StatusSnapshot {
  apiEndpoints: ApiEndpoint[] | undefined;
  providerStatus: AzureClusterProviderStatus;
}

export class ClusterScope {
  private closed = false;

  constructor(
    public readonly cluster: Cluster,
    public readonly clusterConfig: AzureClusterProviderSpec,
    public readonly clusterStatus: AzureClusterProviderStatus,
    public readonly subscriptionId: string,
    public readonly arm: ArmClient,
    public readonly logger: Logger,
    private readonly client: ClusterClient | undefined,
    private readonly originalSpec: unknown,
    private readonly originalStatus: StatusSnapshot,
  ) {}

  get name(): string {
    return this.cluster.metadata.name;
  }

  get namespace(): string {
    return this.cluster.metadata.namespace;
  }

  get location(): string {
    return this.clusterConfig.location;
  }

  get resourceGroup(): string {
    return this.clusterConfig.resourceGroup ?? this.name;
  }

  get vnetName(): string {
    return this.clusterConfig.networkSpec.vnet.name ?? `${this.resourceGroup}-vnet`;
  }

  get vnetCidr(): string {
    return this.clusterConfig.networkSpec.vnet.cidrBlock;
  }

  get apiEndpoints(): ApiEndpoint[] {
    return this.cluster.status?.apiEndpoints ?? [];
  }

  setApiEndpoints(endpoints: ApiEndpoint[]): void {
    this.cluster.status = { ...this.cluster.status, apiEndpoints: endpoints };
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Persist provider spec and status changes; runs once, later calls are no-ops
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    if (!this.client) return;

    try {
      let current = this.cluster;

      if (!isDeepStrictEqual(this.originalSpec, this.clusterConfig)) {
        current = await this.client.updateCluster({
          ...current,
          spec: {
            ...current.spec,
            providerSpec: { ...current.spec.providerSpec, value: this.clusterConfig },
          },
        });
        this.logger.debug('Stored cluster provider spec');
      }

      const status: StatusSnapshot = {
        apiEndpoints: this.cluster.status?.apiEndpoints,
        providerStatus: this.clusterStatus,
      };
      if (!isDeepStrictEqual(this.originalStatus, status)) {
        await this.client.updateClusterStatus({
          ...current,
          status: {
            ...current.status,
            ...(status.apiEndpoints && { apiEndpoints: status.apiEndpoints }),
            providerStatus: status.providerStatus,
          },
        });
        this.logger.debug('Stored cluster provider status');
      }
    } catch (error) {
      // close() runs from finally blocks, so the failure is reported here
      this.logger.error({ error: toError(error).message }, 'Failed to store cluster provider spec and status');
    }
  }
}

/**
 * Build a scope for one reconcile or delete call
 */
export function newScope(params: ScopeParams): Result<ClusterScope, ScopeError> {
  const { cluster } = params;
  const name = cluster.metadata.name;

  let config: AppConfig;
  try {
    config = params.config ?? createAppConfig();
  } catch (error) {
    return Failure(new ScopeError('failed to load configuration', name, toError(error)));
  }

  const rawSpec = cluster.spec.providerSpec?.value;
  const spec = AzureClusterProviderSpecSchema.safeParse(rawSpec ?? {});
  if (!spec.success) {
    return Failure(
      new ScopeError(`failed to load cluster provider spec: ${spec.error.message}`, name, spec.error),
    );
  }

  const status = AzureClusterProviderStatusSchema.safeParse(cluster.status?.providerStatus ?? {});
  if (!status.success) {
    return Failure(
      new ScopeError(
        `failed to load cluster provider status: ${status.error.message}`,
        name,
        status.error,
      ),
    );
  }

  const subscriptionId = config.azure.subscriptionId;
  if (!subscriptionId) {
    return Failure(new ScopeError('AZURE_SUBSCRIPTION_ID is not set', name));
  }

  const logger = (params.logger ?? createLogger({ level: config.server.logLevel })).child({
    cluster: name,
    namespace: cluster.metadata.namespace,
  });

  const arm =
    params.arm ??
    createArmClient({
      config,
      credential: createClientSecretCredential(config.azure, logger),
      logger,
    });

  const owned = structuredClone(cluster);
  return Success(
    new ClusterScope(
      owned,
      spec.data,
      status.data,
      subscriptionId,
      arm,
      logger,
      params.client,
      structuredClone(rawSpec),
      structuredClone({ apiEndpoints: owned.status?.apiEndpoints, providerStatus: status.data }),
    ),
  );
}
