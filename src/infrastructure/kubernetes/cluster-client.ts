/**
 * Cluster Client - cluster.k8s.io/v1alpha1 Cluster objects
 *
 * Reads and writes Cluster objects through the CustomObjects API of
 * @kubernetes/client-node.
 */

import * as k8s from '@kubernetes/client-node';
import type { Logger } from 'pino';
import { CLUSTER_API } from '../../config/defaults';
import { ClusterSchema, type Cluster } from '../../domain/types';
import { KubernetesError, NotFoundError, ValidationError, toError } from '../../errors';

export interface ClusterClient {
  getCluster: (namespace: string, name: string) => Promise<Cluster>;
  updateCluster: (cluster: Cluster) => Promise<Cluster>;
  updateClusterStatus: (cluster: Cluster) => Promise<Cluster>;
}

/**
 * The part of k8s.CustomObjectsApi the client uses
 */
export interface ClusterObjectsApi {
  getNamespacedCustomObject(
    group: string,
    version: string,
    namespace: string,
    plural: string,
    name: string,
  ): Promise<{ body: object }>;
  replaceNamespacedCustomObject(
    group: string,
    version: string,
    namespace: string,
    plural: string,
    name: string,
    body: object,
  ): Promise<{ body: object }>;
  replaceNamespacedCustomObjectStatus(
    group: string,
    version: string,
    namespace: string,
    plural: string,
    name: string,
    body: object,
  ): Promise<{ body: object }>;
}

export interface ClusterClientOptions {
  kubeconfig?: string | undefined;
}

function statusCodeOf(error: unknown): number | undefined {
  if (
    typeof error === 'object' &&
    error !== null &&
    'statusCode' in error &&
    typeof error.statusCode === 'number'
  ) {
    return error.statusCode;
  }
  return undefined;
}

function parseCluster(body: object): Cluster {
  const parsed = ClusterSchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(
      `Invalid Cluster object: ${parsed.error.message}`,
      parsed.error.issues.map((issue) => issue.path.join('.')),
    );
  }
  return parsed.data;
}

/**
 * Create a cluster client over an existing CustomObjects API
 */
export const createClusterClientFromApi = (
  api: ClusterObjectsApi,
  logger: Logger,
): ClusterClient => {
  const { group, version, plural } = CLUSTER_API;

  const failure = (operation: string, namespace: string, name: string, error: unknown): Error => {
    const statusCode = statusCodeOf(error);
    if (statusCode === 404) {
      return new NotFoundError(`Cluster ${namespace}/${name} not found`, 'Cluster', name, {
        namespace,
      });
    }
    const cause = toError(error);
    logger.debug({ operation, namespace, name, statusCode, error: cause.message }, 'Cluster API call failed');
    return new KubernetesError(
      `Failed to ${operation} cluster ${namespace}/${name}: ${cause.message}`,
      statusCode === 409 ? 'K8S_CONFLICT' : 'K8S_ERROR',
      'clusters',
      namespace,
      cause,
    );
  };

  return {
    async getCluster(namespace: string, name: string): Promise<Cluster> {
      try {
        const { body } = await api.getNamespacedCustomObject(group, version, namespace, plural, name);
        return parseCluster(body);
      } catch (error) {
        if (error instanceof ValidationError) throw error;
        throw failure('get', namespace, name, error);
      }
    },

    async updateCluster(cluster: Cluster): Promise<Cluster> {
      const { name, namespace } = cluster.metadata;
      try {
        const { body } = await api.replaceNamespacedCustomObject(
          group,
          version,
          namespace,
          plural,
          name,
          cluster,
        );
        logger.debug({ namespace, name }, 'Cluster updated');
        return parseCluster(body);
      } catch (error) {
        if (error instanceof ValidationError) throw error;
        throw failure('update', namespace, name, error);
      }
    },

    async updateClusterStatus(cluster: Cluster): Promise<Cluster> {
      const { name, namespace } = cluster.metadata;
      try {
        const { body } = await api.replaceNamespacedCustomObjectStatus(
          group,
          version,
          namespace,
          plural,
          name,
          cluster,
        );
        logger.debug({ namespace, name }, 'Cluster status updated');
        return parseCluster(body);
      } catch (error) {
        if (error instanceof ValidationError) throw error;
        throw failure('update status of', namespace, name, error);
      }
    },
  };
};

/**
 * Create a cluster client from the default kubeconfig locations or the given file
 */
export const createClusterClient = (
  logger: Logger,
  options: ClusterClientOptions = {},
): ClusterClient => {
  const kc = new k8s.KubeConfig();

  if (options.kubeconfig) {
    kc.loadFromFile(options.kubeconfig);
  } else {
    kc.loadFromDefault();
  }

  return createClusterClientFromApi(kc.makeApiClient(k8s.CustomObjectsApi), logger);
};
