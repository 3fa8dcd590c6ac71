/**
 * Centralized Configuration Defaults
 *
 * Single source of truth for the fixed values the actuator and its services share.
 */

/**
 * Delay handed back to the cluster controller when a delete must be retried
 */
export const REQUEUE_AFTER_MS = 5_000;

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  armRequest: 30_000, // 30 seconds
  armOperation: 1_200_000, // 20 minutes (resource group deletes are slow)
  armPoll: 5_000, // 5 seconds between long-running operation polls
} as const;

/**
 * Retry policy for throttled or failed ARM calls
 */
export const DEFAULT_RETRY = {
  maxAttempts: 4,
  delayMs: 1_000,
  backoff: 2,
  maxDelayMs: 30_000,
} as const;

/**
 * Azure endpoints for the public cloud
 */
export const DEFAULT_AZURE = {
  resourceManagerEndpoint: 'https://management.azure.com',
  authorityHost: 'https://login.microsoftonline.com',
  // Token refresh happens this long before expiry
  tokenRefreshSkewMs: 60_000,
} as const;

/**
 * API versions used against the resource providers
 */
export const ARM_API_VERSIONS = {
  resourceGroups: '2019-05-01',
  network: '2019-06-01',
} as const;

/**
 * Cluster API object coordinates
 */
export const CLUSTER_API = {
  group: 'cluster.k8s.io',
  version: 'v1alpha1',
  plural: 'clusters',
} as const;

/**
 * Default network layout for new clusters
 */
export const DEFAULT_NETWORK = {
  vnetCidr: '10.0.0.0/8',
  controlPlaneSubnetCidr: '10.0.0.0/16',
  nodeSubnetCidr: '10.1.0.0/16',
  apiServerPort: 6443,
  sshPort: 22,
} as const;

/**
 * Certificate material defaults
 */
export const DEFAULT_CERTIFICATES = {
  rsaKeySize: 2048,
  caValidityYears: 10,
  clientValidityYears: 1,
  adminUser: 'kubernetes-admin',
  adminGroup: 'system:masters',
} as const;

/**
 * Tag that marks Azure resources as owned by a cluster
 */
export const clusterOwnedTag = (clusterName: string): Record<string, string> => ({
  [`sigs.k8s.io_cluster-api-provider-azure_cluster_${clusterName}`]: 'owned',
});
