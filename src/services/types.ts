/**
 * Contracts of the services the cluster actuator drives.
 *
 * Each service is built for one scope and converges one category of Azure
 * resources. Every operation is idempotent: running it again against a
 * converged cluster changes nothing.
 */

import type { ClusterScope } from '../actuators/scope';

export interface CertificatesService {
  /** Generate missing CA and service-account key pairs into the provider spec */
  reconcileCertificates: () => Promise<void>;
}

export interface ResourcesService {
  reconcileResourceGroup: () => Promise<void>;
  /** Deletes the group and everything in it; an absent group counts as deleted */
  deleteResourceGroup: () => Promise<void>;
}

export interface NetworkService {
  reconcileNetwork: () => Promise<void>;
  /** Only the `api` role is known; others are rejected */
  reconcileLoadBalancer: (role: string) => Promise<void>;
}

export interface ServiceFactory {
  certificates: (scope: ClusterScope) => CertificatesService;
  resources: (scope: ClusterScope) => ResourcesService;
  network: (scope: ClusterScope) => NetworkService;
}
