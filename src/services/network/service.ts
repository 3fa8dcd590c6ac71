/**
 * Network service
 *
 * Builds the cluster's network in a fixed order: virtual network, security
 * groups, subnets. The `api` load balancer fronts the control plane with a
 * static public IP and publishes the API endpoint on the Cluster.
 */

import { z } from 'zod';
import type { ClusterScope } from '../../actuators/scope';
import { ARM_API_VERSIONS, DEFAULT_NETWORK, clusterOwnedTag } from '../../config/defaults';
import type { ResourceRef, SecurityGroupRole, SubnetStatus } from '../../domain/types';
import { ValidationError } from '../../errors';
import {
  loadBalancerChildId,
  loadBalancerId,
  publicIPId,
  securityGroupId,
  subnetId,
  virtualNetworkId,
  type ArmResource,
} from '../../infrastructure/azure';
import { createTimer } from '../../lib/logger';
import type { NetworkService } from '../types';

const LoadBalancerRoleSchema = z.enum(['api']);

const PublicIPPropertiesSchema = z
  .object({
    ipAddress: z.string().optional(),
    dnsSettings: z.object({ fqdn: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

interface SecurityRule {
  name: string;
  port: number;
  priority: number;
}

const SECURITY_RULES: Record<SecurityGroupRole, SecurityRule[]> = {
  controlplane: [
    { name: 'allow_ssh', port: DEFAULT_NETWORK.sshPort, priority: 100 },
    { name: 'allow_apiserver', port: DEFAULT_NETWORK.apiServerPort, priority: 101 },
  ],
  node: [],
};

const SUBNET_CIDRS: Record<SecurityGroupRole, string> = {
  controlplane: DEFAULT_NETWORK.controlPlaneSubnetCidr,
  node: DEFAULT_NETWORK.nodeSubnetCidr,
};

const ROLES: readonly SecurityGroupRole[] = ['controlplane', 'node'];

const refOf = (resource: ArmResource, fallbackId: string, name: string): ResourceRef => ({
  id: resource.id ?? fallbackId,
  name,
});

export const createNetworkService = (scope: ClusterScope): NetworkService => {
  const { subscriptionId } = scope;
  const tags = (): Record<string, string> => clusterOwnedTag(scope.name);
  const network = () => scope.clusterStatus.network;

  const reconcileVirtualNetwork = async (): Promise<void> => {
    const name = scope.vnetName;
    const id = virtualNetworkId(subscriptionId, scope.resourceGroup, name);
    const existing = await scope.arm.get(id, ARM_API_VERSIONS.network);
    if (existing) {
      // A PUT would replace the subnet list, so an existing vnet is left as is
      scope.logger.debug({ vnet: name }, 'Virtual network exists');
      network().vnet = refOf(existing, id, name);
      return;
    }

    const created = await scope.arm.put(id, ARM_API_VERSIONS.network, {
      location: scope.location,
      tags: tags(),
      properties: {
        addressSpace: { addressPrefixes: [scope.vnetCidr] },
      },
    });
    network().vnet = refOf(created, id, name);
    scope.logger.info({ vnet: name, cidr: scope.vnetCidr }, 'Virtual network created');
  };

  const reconcileSecurityGroup = async (role: SecurityGroupRole): Promise<ResourceRef> => {
    const name = `${scope.name}-${role}-nsg`;
    const id = securityGroupId(subscriptionId, scope.resourceGroup, name);
    const result = await scope.arm.put(id, ARM_API_VERSIONS.network, {
      location: scope.location,
      tags: tags(),
      properties: {
        securityRules: SECURITY_RULES[role].map((rule) => ({
          name: rule.name,
          properties: {
            protocol: 'Tcp',
            sourcePortRange: '*',
            destinationPortRange: String(rule.port),
            sourceAddressPrefix: '*',
            destinationAddressPrefix: '*',
            access: 'Allow',
            direction: 'Inbound',
            priority: rule.priority,
          },
        })),
      },
    });
    const ref = refOf(result, id, name);
    network().securityGroups[role] = ref;
    return ref;
  };

  const reconcileSubnet = async (
    role: SecurityGroupRole,
    securityGroup: ResourceRef,
  ): Promise<SubnetStatus> => {
    const name = `${scope.name}-${role}-subnet`;
    const id = subnetId(subscriptionId, scope.resourceGroup, scope.vnetName, name);
    const cidrBlock = SUBNET_CIDRS[role];
    const result = await scope.arm.put(id, ARM_API_VERSIONS.network, {
      properties: {
        addressPrefix: cidrBlock,
        networkSecurityGroup: { id: securityGroup.id },
      },
    });
    return {
      ...refOf(result, id, name),
      role,
      cidrBlock,
      securityGroupId: securityGroup.id,
    };
  };

  const reconcileApiLoadBalancer = async (): Promise<void> => {
    const { resourceGroup, location } = scope;
    const port = DEFAULT_NETWORK.apiServerPort;

    const ipName = `${scope.name}-api-ip`;
    const ipId = publicIPId(subscriptionId, resourceGroup, ipName);
    const ip = await scope.arm.put(ipId, ARM_API_VERSIONS.network, {
      location,
      tags: tags(),
      sku: { name: 'Standard' },
      properties: {
        publicIPAllocationMethod: 'Static',
        publicIPAddressVersion: 'IPv4',
        dnsSettings: { domainNameLabel: `${scope.name}-api`.toLowerCase() },
      },
    });
    const ipProperties = PublicIPPropertiesSchema.parse(ip.properties ?? {});

    const lbName = `${scope.name}-api-lb`;
    const lbId = loadBalancerId(subscriptionId, resourceGroup, lbName);
    const frontendName = `${scope.name}-frontend`;
    const poolName = `${scope.name}-controlplane-pool`;
    const probeName = 'tcpHTTPSProbe';
    const frontendId = loadBalancerChildId(lbId, 'frontendIPConfigurations', frontendName);
    const poolId = loadBalancerChildId(lbId, 'backendAddressPools', poolName);

    const lb = await scope.arm.put(lbId, ARM_API_VERSIONS.network, {
      location,
      tags: tags(),
      sku: { name: 'Standard' },
      properties: {
        frontendIPConfigurations: [
          { name: frontendName, properties: { publicIPAddress: { id: ip.id ?? ipId } } },
        ],
        backendAddressPools: [{ name: poolName }],
        probes: [
          {
            name: probeName,
            properties: { protocol: 'Tcp', port, intervalInSeconds: 15, numberOfProbes: 4 },
          },
        ],
        loadBalancingRules: [
          {
            name: 'LBRuleHTTPS',
            properties: {
              protocol: 'Tcp',
              frontendPort: port,
              backendPort: port,
              idleTimeoutInMinutes: 4,
              enableFloatingIP: false,
              loadDistribution: 'Default',
              frontendIPConfiguration: { id: frontendId },
              backendAddressPool: { id: poolId },
              probe: { id: loadBalancerChildId(lbId, 'probes', probeName) },
            },
          },
        ],
      },
    });

    network().apiServerIp = {
      ...refOf(ip, ipId, ipName),
      ipAddress: ipProperties.ipAddress,
      dnsName: ipProperties.dnsSettings?.fqdn,
    };
    network().apiServerLb = {
      ...refOf(lb, lbId, lbName),
      frontendIpConfigurationId: frontendId,
      backendPoolId: poolId,
    };

    const host = ipProperties.ipAddress ?? ipProperties.dnsSettings?.fqdn;
    if (host) {
      scope.setApiEndpoints([{ host, port }]);
    } else {
      scope.logger.warn({ publicIp: ipName }, 'API server public IP has no address yet');
    }
  };

  return {
    async reconcileNetwork(): Promise<void> {
      const timer = createTimer(scope.logger, 'reconcile-network');
      try {
        await reconcileVirtualNetwork();

        const securityGroups: Array<[SecurityGroupRole, ResourceRef]> = [];
        for (const role of ROLES) {
          securityGroups.push([role, await reconcileSecurityGroup(role)]);
        }

        const subnets: SubnetStatus[] = [];
        for (const [role, securityGroup] of securityGroups) {
          subnets.push(await reconcileSubnet(role, securityGroup));
        }
        network().subnets = subnets;

        timer.end({ vnet: scope.vnetName, subnets: subnets.length });
      } catch (error) {
        timer.error(error);
        throw error;
      }
    },

    async reconcileLoadBalancer(role: string): Promise<void> {
      const parsed = LoadBalancerRoleSchema.safeParse(role);
      if (!parsed.success) {
        throw new ValidationError(`Unknown load balancer role "${role}"`, ['role']);
      }

      const timer = createTimer(scope.logger, 'reconcile-load-balancer', { role: parsed.data });
      try {
        await reconcileApiLoadBalancer();
        timer.end({ endpoint: scope.apiEndpoints[0] });
      } catch (error) {
        timer.error(error);
        throw error;
      }
    },
  };
};
