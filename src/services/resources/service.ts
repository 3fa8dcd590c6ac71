/**
 * Resources service
 *
 * Owns the cluster's resource group. Deleting the group removes every resource
 * the other services created inside it.
 */

import type { ClusterScope } from '../../actuators/scope';
import { ARM_API_VERSIONS, clusterOwnedTag } from '../../config/defaults';
import { resourceGroupId } from '../../infrastructure/azure';
import { createTimer } from '../../lib/logger';
import type { ResourcesService } from '../types';

export const createResourcesService = (scope: ClusterScope): ResourcesService => {
  const groupId = (): string => resourceGroupId(scope.subscriptionId, scope.resourceGroup);

  return {
    async reconcileResourceGroup(): Promise<void> {
      const timer = createTimer(scope.logger, 'reconcile-resource-group', {
        resourceGroup: scope.resourceGroup,
      });
      try {
        const existing = await scope.arm.get(groupId(), ARM_API_VERSIONS.resourceGroups);
        await scope.arm.put(groupId(), ARM_API_VERSIONS.resourceGroups, {
          location: scope.location,
          tags: { ...existing?.tags, ...clusterOwnedTag(scope.name) },
        });
        timer.end({ created: existing === undefined });
      } catch (error) {
        timer.error(error);
        throw error;
      }
    },

    async deleteResourceGroup(): Promise<void> {
      const timer = createTimer(scope.logger, 'delete-resource-group', {
        resourceGroup: scope.resourceGroup,
      });
      try {
        await scope.arm.delete(groupId(), ARM_API_VERSIONS.resourceGroups);
        timer.end();
      } catch (error) {
        timer.error(error);
        throw error;
      }
    },
  };
};
