/**
 * Azure services driven by the cluster actuator
 */

import { createCertificatesService } from './certificates';
import { createNetworkService } from './network';
import { createResourcesService } from './resources';
import type { ServiceFactory } from './types';

export const defaultServiceFactory: ServiceFactory = {
  certificates: createCertificatesService,
  resources: createResourcesService,
  network: createNetworkService,
};

export { createCertificatesService, createNetworkService, createResourcesService };
export type {
  CertificatesService,
  NetworkService,
  ResourcesService,
  ServiceFactory,
} from './types';
