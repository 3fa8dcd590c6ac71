/**
 * Unit Tests: Cluster Actuator
 * Step ordering, fail-fast wrapping, requeue on delete and scope release
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { Actuator } from '../../../src/actuators/cluster/actuator';
import type { ClusterScope } from '../../../src/actuators/scope';
import type { ScopeGetter } from '../../../src/actuators/scope-getter';
import { Failure, Success } from '../../../src/domain/types';
import {
  ActuatorError,
  RequeueAfterError,
  ScopeError,
  isRequeueAfterError,
} from '../../../src/errors';
import type { ClusterClient } from '../../../src/infrastructure/kubernetes/cluster-client';
import type { ServiceFactory } from '../../../src/services';
import { createCluster } from '../../__support__/fixtures/clusters';
import { createTestScope } from '../../__support__/fakes/scope';
import { createMockLogger, createTestConfig } from '../../__support__/utilities/mock-factories';

function createMockClusterClient() {
  return {
    getCluster: jest.fn<ClusterClient['getCluster']>(),
    updateCluster: jest.fn<ClusterClient['updateCluster']>(),
    updateClusterStatus: jest.fn<ClusterClient['updateClusterStatus']>(),
  };
}

function createMockServices() {
  const calls: string[] = [];
  const certificates = {
    reconcileCertificates: jest.fn(async () => {
      calls.push('certificates');
    }),
  };
  const resources = {
    reconcileResourceGroup: jest.fn(async () => {
      calls.push('resource-group');
    }),
    deleteResourceGroup: jest.fn(async () => {
      calls.push('delete-resource-group');
    }),
  };
  const network = {
    reconcileNetwork: jest.fn(async () => {
      calls.push('network');
    }),
    reconcileLoadBalancer: jest.fn(async (role: string) => {
      calls.push(`load-balancer:${role}`);
    }),
  };
  const factory: ServiceFactory = {
    certificates: jest.fn(() => certificates),
    resources: jest.fn(() => resources),
    network: jest.fn(() => network),
  };
  return { calls, certificates, resources, network, factory };
}

describe('Actuator', () => {
  let logger: ReturnType<typeof createMockLogger>;
  let client: ReturnType<typeof createMockClusterClient>;
  let services: ReturnType<typeof createMockServices>;
  let scope: ClusterScope;
  let close: jest.SpiedFunction<ClusterScope['close']>;
  let scopeGetter: { getScope: jest.Mock<ScopeGetter['getScope']> };
  let actuator: Actuator;
  const cluster = createCluster();

  beforeEach(() => {
    logger = createMockLogger();
    client = createMockClusterClient();
    services = createMockServices();
    scope = createTestScope({ cluster }).scope;
    close = jest.spyOn(scope, 'close');
    scopeGetter = { getScope: jest.fn<ScopeGetter['getScope']>(() => Success(scope)) };
    actuator = new Actuator({
      client,
      scopeGetter,
      services: services.factory,
      config: createTestConfig(),
      logger,
    });
  });

  describe('reconcile', () => {
    it('should run certificates, resource group, network and api load balancer in order', async () => {
      await expect(actuator.reconcile(cluster)).resolves.toBeUndefined();

      expect(services.calls).toEqual([
        'certificates',
        'resource-group',
        'network',
        'load-balancer:api',
      ]);
      expect(close).toHaveBeenCalledTimes(1);
    });

    it('should build the scope from the cluster and the injected client', async () => {
      await actuator.reconcile(cluster);

      expect(scopeGetter.getScope).toHaveBeenCalledWith(
        expect.objectContaining({ cluster, client, logger }),
      );
    });

    it('should log one line naming the cluster', async () => {
      await actuator.reconcile(cluster);

      expect(logger.info).toHaveBeenCalledTimes(1);
      expect(logger.info).toHaveBeenCalledWith(
        { cluster: 'test-cluster' },
        'Reconciling cluster test-cluster',
      );
    });

    it('should stop after a certificate failure and name the cluster in the error', async () => {
      services.certificates.reconcileCertificates.mockRejectedValueOnce(new Error('key generation failed'));

      const error = await actuator.reconcile(cluster).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ActuatorError);
      expect(error).toMatchObject({
        message: 'failed to reconcile certificates for cluster "test-cluster": key generation failed',
        clusterName: 'test-cluster',
        step: 'certificates',
      });
      expect(services.resources.reconcileResourceGroup).not.toHaveBeenCalled();
      expect(services.network.reconcileNetwork).not.toHaveBeenCalled();
      expect(services.network.reconcileLoadBalancer).not.toHaveBeenCalled();
      expect(close).toHaveBeenCalledTimes(1);
    });

    it('should keep the original failure as the cause', async () => {
      const cause = new Error('quota exceeded');
      services.resources.reconcileResourceGroup.mockRejectedValueOnce(cause);

      await expect(actuator.reconcile(cluster)).rejects.toMatchObject({
        message: 'failed to reconcile resource group for cluster "test-cluster": quota exceeded',
        step: 'resource-group',
        cause,
      });
      expect(services.calls).toEqual(['certificates']);
      expect(close).toHaveBeenCalledTimes(1);
    });

    it('should not reconcile the load balancer when the network fails', async () => {
      services.network.reconcileNetwork.mockRejectedValueOnce(new Error('subnet conflict'));

      await expect(actuator.reconcile(cluster)).rejects.toThrow(
        'failed to reconcile network for cluster "test-cluster": subnet conflict',
      );
      expect(services.network.reconcileLoadBalancer).not.toHaveBeenCalled();
      expect(close).toHaveBeenCalledTimes(1);
    });

    it('should wrap a load balancer failure', async () => {
      services.network.reconcileLoadBalancer.mockRejectedValueOnce(new Error('ip exhausted'));

      await expect(actuator.reconcile(cluster)).rejects.toThrow(
        'failed to reconcile load balancers for cluster "test-cluster": ip exhausted',
      );
      expect(close).toHaveBeenCalledTimes(1);
    });

    it('should fail without calling any service when the scope cannot be built', async () => {
      scopeGetter.getScope.mockReturnValueOnce(
        Failure(new ScopeError('AZURE_SUBSCRIPTION_ID is not set', 'test-cluster')),
      );

      await expect(actuator.reconcile(cluster)).rejects.toMatchObject({
        message: 'failed to create scope: AZURE_SUBSCRIPTION_ID is not set',
        step: 'scope',
      });
      expect(services.factory.certificates).not.toHaveBeenCalled();
      expect(services.factory.resources).not.toHaveBeenCalled();
      expect(services.factory.network).not.toHaveBeenCalled();
      expect(close).not.toHaveBeenCalled();
    });

    it('should fail through the default scope getter when the subscription is missing', async () => {
      const defaultActuator = new Actuator({
        client,
        services: services.factory,
        config: createTestConfig({ AZURE_SUBSCRIPTION_ID: '' }),
        logger,
      });

      await expect(defaultActuator.reconcile(cluster)).rejects.toThrow(
        'failed to create scope: AZURE_SUBSCRIPTION_ID is not set',
      );
      expect(services.calls).toEqual([]);
    });
  });

  describe('delete', () => {
    it('should delete only the resource group', async () => {
      await expect(actuator.delete(cluster)).resolves.toBeUndefined();

      expect(services.calls).toEqual(['delete-resource-group']);
      expect(services.factory.certificates).not.toHaveBeenCalled();
      expect(services.factory.network).not.toHaveBeenCalled();
      expect(close).toHaveBeenCalledTimes(1);
    });

    it('should ask for a requeue after 5 seconds when the resource group delete fails', async () => {
      services.resources.deleteResourceGroup.mockRejectedValueOnce(new Error('operation conflict'));

      const error = await actuator.delete(cluster).catch((e: unknown) => e);

      expect(isRequeueAfterError(error)).toBe(true);
      expect(error).toBeInstanceOf(RequeueAfterError);
      expect(error).not.toBeInstanceOf(ActuatorError);
      expect(error).toMatchObject({ requeueAfterMs: 5000, message: 'requeue in: 5s' });
      expect(logger.error).toHaveBeenCalledWith(
        { cluster: 'test-cluster', error: 'operation conflict' },
        'Error deleting resource group: operation conflict',
      );
      expect(close).toHaveBeenCalledTimes(1);
    });

    it('should return a terminal error, not a requeue, when the scope cannot be built', async () => {
      scopeGetter.getScope.mockReturnValueOnce(Failure(new ScopeError('bad provider spec')));

      const error = await actuator.delete(cluster).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ActuatorError);
      expect(isRequeueAfterError(error)).toBe(false);
      expect(services.resources.deleteResourceGroup).not.toHaveBeenCalled();
    });
  });
});
