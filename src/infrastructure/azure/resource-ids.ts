/**
 * ARM resource id builders
 */

export const resourceGroupId = (subscriptionId: string, resourceGroup: string): string =>
  `/subscriptions/${subscriptionId}/resourceGroups/${resourceGroup}`;

const networkId = (
  subscriptionId: string,
  resourceGroup: string,
  type: string,
  name: string,
): string =>
  `${resourceGroupId(subscriptionId, resourceGroup)}/providers/Microsoft.Network/${type}/${name}`;

export const virtualNetworkId = (subscriptionId: string, resourceGroup: string, name: string): string =>
  networkId(subscriptionId, resourceGroup, 'virtualNetworks', name);

export const subnetId = (
  subscriptionId: string,
  resourceGroup: string,
  vnetName: string,
  name: string,
): string => `${virtualNetworkId(subscriptionId, resourceGroup, vnetName)}/subnets/${name}`;

export const securityGroupId = (subscriptionId: string, resourceGroup: string, name: string): string =>
  networkId(subscriptionId, resourceGroup, 'networkSecurityGroups', name);

export const publicIPId = (subscriptionId: string, resourceGroup: string, name: string): string =>
  networkId(subscriptionId, resourceGroup, 'publicIPAddresses', name);

export const loadBalancerId = (subscriptionId: string, resourceGroup: string, name: string): string =>
  networkId(subscriptionId, resourceGroup, 'loadBalancers', name);

/**
 * Id of a child of a load balancer (frontend, pool, probe, rule)
 */
export const loadBalancerChildId = (
  loadBalancer: string,
  kind: 'frontendIPConfigurations' | 'backendAddressPools' | 'probes' | 'loadBalancingRules',
  name: string,
): string => `${loadBalancer}/${kind}/${name}`;
