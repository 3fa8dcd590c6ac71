/**
 * Unit Tests: Cluster client
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { KubernetesError, NotFoundError, ValidationError } from '../../../../src/errors';
import {
  createClusterClientFromApi,
  type ClusterClient,
  type ClusterObjectsApi,
} from '../../../../src/infrastructure/kubernetes/cluster-client';
import { createCluster } from '../../../__support__/fixtures/clusters';
import { createMockLogger } from '../../../__support__/utilities/mock-factories';

class HttpError extends Error {
  constructor(public readonly statusCode: number) {
    super(`HTTP request failed with ${statusCode}`);
  }
}

describe('createClusterClientFromApi', () => {
  let api: {
    getNamespacedCustomObject: jest.Mock<ClusterObjectsApi['getNamespacedCustomObject']>;
    replaceNamespacedCustomObject: jest.Mock<ClusterObjectsApi['replaceNamespacedCustomObject']>;
    replaceNamespacedCustomObjectStatus: jest.Mock<ClusterObjectsApi['replaceNamespacedCustomObjectStatus']>;
  };
  let client: ClusterClient;
  const cluster = createCluster();

  beforeEach(() => {
    api = {
      getNamespacedCustomObject: jest.fn<ClusterObjectsApi['getNamespacedCustomObject']>(),
      replaceNamespacedCustomObject: jest.fn<ClusterObjectsApi['replaceNamespacedCustomObject']>(),
      replaceNamespacedCustomObjectStatus: jest.fn<ClusterObjectsApi['replaceNamespacedCustomObjectStatus']>(),
    };
    client = createClusterClientFromApi(api, createMockLogger());
  });

  describe('getCluster', () => {
    it('should read the Cluster object from cluster.k8s.io/v1alpha1', async () => {
      api.getNamespacedCustomObject.mockResolvedValueOnce({ body: cluster });

      await expect(client.getCluster('default', 'test-cluster')).resolves.toEqual(cluster);
      expect(api.getNamespacedCustomObject).toHaveBeenCalledWith(
        'cluster.k8s.io',
        'v1alpha1',
        'default',
        'clusters',
        'test-cluster',
      );
    });

    it('should report a missing Cluster as not found', async () => {
      api.getNamespacedCustomObject.mockRejectedValueOnce(new HttpError(404));

      const error = await client.getCluster('default', 'absent').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({
        message: 'Cluster default/absent not found',
        resourceType: 'Cluster',
        resourceId: 'absent',
      });
    });

    it('should reject objects that are not Clusters', async () => {
      api.getNamespacedCustomObject.mockResolvedValueOnce({ body: { kind: 'Cluster' } });

      await expect(client.getCluster('default', 'test-cluster')).rejects.toBeInstanceOf(ValidationError);
    });

    it('should wrap other API failures', async () => {
      api.getNamespacedCustomObject.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));

      await expect(client.getCluster('default', 'test-cluster')).rejects.toMatchObject({
        message: 'Failed to get cluster default/test-cluster: connect ECONNREFUSED',
        code: 'K8S_ERROR',
        namespace: 'default',
      });
    });
  });

  describe('updateCluster', () => {
    it('should replace the object and return the stored version', async () => {
      const stored = { ...cluster, metadata: { ...cluster.metadata, resourceVersion: '2' } };
      api.replaceNamespacedCustomObject.mockResolvedValueOnce({ body: stored });

      await expect(client.updateCluster(cluster)).resolves.toEqual(stored);
      expect(api.replaceNamespacedCustomObject).toHaveBeenCalledWith(
        'cluster.k8s.io',
        'v1alpha1',
        'default',
        'clusters',
        'test-cluster',
        cluster,
      );
    });

    it('should mark write conflicts', async () => {
      api.replaceNamespacedCustomObject.mockRejectedValueOnce(new HttpError(409));

      const error = await client.updateCluster(cluster).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(KubernetesError);
      expect(error).toMatchObject({
        message: 'Failed to update cluster default/test-cluster: HTTP request failed with 409',
        code: 'K8S_CONFLICT',
      });
    });
  });

  describe('updateClusterStatus', () => {
    it('should write through the status subresource', async () => {
      api.replaceNamespacedCustomObjectStatus.mockResolvedValueOnce({ body: cluster });

      await client.updateClusterStatus(cluster);

      expect(api.replaceNamespacedCustomObjectStatus).toHaveBeenCalledWith(
        'cluster.k8s.io',
        'v1alpha1',
        'default',
        'clusters',
        'test-cluster',
        cluster,
      );
      expect(api.replaceNamespacedCustomObject).not.toHaveBeenCalled();
    });

    it('should wrap failures', async () => {
      api.replaceNamespacedCustomObjectStatus.mockRejectedValueOnce(new HttpError(500));

      await expect(client.updateClusterStatus(cluster)).rejects.toThrow(
        'Failed to update status of cluster default/test-cluster: HTTP request failed with 500',
      );
    });
  });
});
