/**
 * Deployer
 *
 * Answers the two questions the cluster controller asks about a provisioned
 * cluster: where its API server is, and how to reach it as an administrator.
 */

import type { Logger } from 'pino';
import type { ClusterScope } from '../actuators/scope';
import type { ScopeGetter } from '../actuators/scope-getter';
import type { AppConfig } from '../config/app-config';
import { DEFAULT_NETWORK } from '../config/defaults';
import { isFail, type Cluster } from '../domain/types';
import { NotFoundError } from '../errors';
import { createLogger } from '../lib/logger';
import { createAdminKubeconfig } from '../services/certificates/kubeconfig';

export interface DeployerParams {
  scopeGetter: ScopeGetter;
  config?: AppConfig | undefined;
  logger?: Logger | undefined;
}

export class Deployer {
  protected readonly scopeGetter: ScopeGetter;
  protected readonly config: AppConfig | undefined;
  protected readonly logger: Logger;

  constructor(params: DeployerParams) {
    this.scopeGetter = params.scopeGetter;
    this.config = params.config;
    this.logger = params.logger ?? createLogger({ level: params.config?.server.logLevel });
  }

  /**
   * Address of the cluster's API server
   */
  async getIP(cluster: Cluster): Promise<string> {
    const endpoint = cluster.status?.apiEndpoints?.[0];
    if (endpoint?.host) {
      return endpoint.host;
    }

    const scope = this.getScope(cluster);
    try {
      const ipAddress = scope.clusterStatus.network.apiServerIp?.ipAddress;
      if (!ipAddress) {
        throw new NotFoundError(
          `API server address of cluster "${cluster.metadata.name}" is not known yet`,
          'PublicIPAddress',
          scope.clusterStatus.network.apiServerIp?.id,
        );
      }
      return ipAddress;
    } finally {
      await scope.close();
    }
  }

  /**
   * Admin kubeconfig for the cluster, generated from its CA when not stored
   */
  async getKubeConfig(cluster: Cluster): Promise<string> {
    const scope = this.getScope(cluster);
    try {
      const { adminKubeconfig, caKeyPair } = scope.clusterConfig;
      if (adminKubeconfig) {
        return adminKubeconfig;
      }
      if (!caKeyPair) {
        throw new NotFoundError(
          `Cluster "${cluster.metadata.name}" has no CA key pair yet`,
          'KeyPair',
          'caKeyPair',
        );
      }

      const host = await this.getIP(cluster);
      return createAdminKubeconfig(
        scope.name,
        `https://${host}:${scope.apiEndpoints[0]?.port ?? DEFAULT_NETWORK.apiServerPort}`,
        caKeyPair,
      );
    } finally {
      await scope.close();
    }
  }

  /**
   * Read-only scope: no client is passed, so close() persists nothing
   */
  private getScope(cluster: Cluster): ClusterScope {
    const result = this.scopeGetter.getScope({
      cluster,
      logger: this.logger,
      ...(this.config && { config: this.config }),
    });
    if (isFail(result)) {
      throw result.error;
    }
    return result.value;
  }
}
