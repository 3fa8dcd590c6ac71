/**
 * Cluster API types
 *
 * The Cluster object is owned by the cluster controller; the actuator only reads its
 * spec and writes the Azure provider spec/status embedded in it.
 */

import { z } from 'zod';
import { DEFAULT_NETWORK } from '../../config/defaults';

export const ObjectMetaSchema = z
  .object({
    name: z.string().min(1),
    namespace: z.string().min(1).default('default'),
    uid: z.string().optional(),
    resourceVersion: z.string().optional(),
    labels: z.record(z.string()).optional(),
    annotations: z.record(z.string()).optional(),
  })
  .passthrough();

export const ApiEndpointSchema = z.object({
  host: z.string(),
  port: z.number().int(),
});

export const ClusterSchema = z
  .object({
    apiVersion: z.string().default('cluster.k8s.io/v1alpha1'),
    kind: z.string().default('Cluster'),
    metadata: ObjectMetaSchema,
    spec: z
      .object({
        clusterNetwork: z
          .object({
            services: z.object({ cidrBlocks: z.array(z.string()) }).partial().optional(),
            pods: z.object({ cidrBlocks: z.array(z.string()) }).partial().optional(),
            serviceDomain: z.string().optional(),
          })
          .passthrough()
          .optional(),
        providerSpec: z.object({ value: z.unknown().optional() }).passthrough().optional(),
      })
      .passthrough()
      .default({}),
    status: z
      .object({
        apiEndpoints: z.array(ApiEndpointSchema).optional(),
        providerStatus: z.unknown().optional(),
        errorReason: z.string().optional(),
        errorMessage: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type Cluster = z.infer<typeof ClusterSchema>;
export type ApiEndpoint = z.infer<typeof ApiEndpointSchema>;

export const KeyPairSchema = z.object({
  cert: z.string().min(1),
  key: z.string().min(1),
});

export type KeyPair = z.infer<typeof KeyPairSchema>;

export const VnetSpecSchema = z.object({
  id: z.string().optional(),
  name: z.string().min(1).optional(),
  cidrBlock: z.string().default(DEFAULT_NETWORK.vnetCidr),
});

/**
 * Value of `spec.providerSpec.value` for Azure clusters
 */
export const AzureClusterProviderSpecSchema = z
  .object({
    apiVersion: z.string().default('azureprovider.k8s.io/v1alpha1'),
    kind: z.string().default('AzureClusterProviderSpec'),
    resourceGroup: z.string().min(1).optional(),
    location: z.string().min(1),
    networkSpec: z.object({ vnet: VnetSpecSchema.default({}) }).default({}),
    caKeyPair: KeyPairSchema.optional(),
    etcdCAKeyPair: KeyPairSchema.optional(),
    frontProxyCAKeyPair: KeyPairSchema.optional(),
    saKeyPair: KeyPairSchema.optional(),
    adminKubeconfig: z.string().optional(),
    discoveryHashes: z.array(z.string()).optional(),
    clusterConfiguration: z.record(z.unknown()).optional(),
  })
  .passthrough();

export type AzureClusterProviderSpec = z.infer<typeof AzureClusterProviderSpecSchema>;

export const SecurityGroupRoleSchema = z.enum(['controlplane', 'node']);
export type SecurityGroupRole = z.infer<typeof SecurityGroupRoleSchema>;

export const ResourceRefSchema = z.object({
  id: z.string(),
  name: z.string(),
});

export type ResourceRef = z.infer<typeof ResourceRefSchema>;

export const SubnetStatusSchema = ResourceRefSchema.extend({
  role: SecurityGroupRoleSchema,
  cidrBlock: z.string(),
  securityGroupId: z.string().optional(),
});

export const PublicIPStatusSchema = ResourceRefSchema.extend({
  ipAddress: z.string().optional(),
  dnsName: z.string().optional(),
});

export const LoadBalancerStatusSchema = ResourceRefSchema.extend({
  frontendIpConfigurationId: z.string().optional(),
  backendPoolId: z.string().optional(),
});

/**
 * Value of `status.providerStatus` for Azure clusters
 */
export const AzureClusterProviderStatusSchema = z
  .object({
    apiVersion: z.string().default('azureprovider.k8s.io/v1alpha1'),
    kind: z.string().default('AzureClusterProviderStatus'),
    network: z
      .object({
        vnet: ResourceRefSchema.optional(),
        securityGroups: z.record(SecurityGroupRoleSchema, ResourceRefSchema).default({}),
        subnets: z.array(SubnetStatusSchema).default([]),
        apiServerIp: PublicIPStatusSchema.optional(),
        apiServerLb: LoadBalancerStatusSchema.optional(),
      })
      .default({}),
    bastion: z.record(z.unknown()).optional(),
  })
  .passthrough();

export type AzureClusterProviderStatus = z.infer<typeof AzureClusterProviderStatusSchema>;
export type SubnetStatus = z.infer<typeof SubnetStatusSchema>;
