/**
 * Certificates service
 *
 * Keeps the cluster's CA material in the provider spec. Existing pairs are never
 * regenerated, so machines joining later see the same CAs.
 */

import type { ClusterScope } from '../../actuators/scope';
import type { AzureClusterProviderSpec, KeyPair } from '../../domain/types';
import { createTimer } from '../../lib/logger';
import type { CertificatesService } from '../types';
import { createAdminKubeconfig } from './kubeconfig';
import { createCAKeyPair, createServiceAccountKeyPair, discoveryHash } from './pki';

type CAField = 'caKeyPair' | 'etcdCAKeyPair' | 'frontProxyCAKeyPair';

const CERTIFICATE_AUTHORITIES: ReadonlyArray<{ field: CAField; commonName: string }> = [
  { field: 'caKeyPair', commonName: 'kubernetes' },
  { field: 'etcdCAKeyPair', commonName: 'etcd-ca' },
  { field: 'frontProxyCAKeyPair', commonName: 'front-proxy-ca' },
];

export const createCertificatesService = (scope: ClusterScope): CertificatesService => ({
  async reconcileCertificates(): Promise<void> {
    const spec: AzureClusterProviderSpec = scope.clusterConfig;
    const timer = createTimer(scope.logger, 'reconcile-certificates');
    const generated: string[] = [];

    for (const { field, commonName } of CERTIFICATE_AUTHORITIES) {
      if (!spec[field]) {
        spec[field] = createCAKeyPair(commonName);
        generated.push(field);
      }
    }

    if (!spec.saKeyPair) {
      spec.saKeyPair = createServiceAccountKeyPair();
      generated.push('saKeyPair');
    }

    const ca: KeyPair | undefined = spec.caKeyPair;
    if (ca) {
      spec.discoveryHashes = [discoveryHash(ca.cert)];

      const endpoint = scope.apiEndpoints[0];
      if (endpoint && !spec.adminKubeconfig) {
        spec.adminKubeconfig = createAdminKubeconfig(
          scope.name,
          `https://${endpoint.host}:${endpoint.port}`,
          ca,
        );
        generated.push('adminKubeconfig');
      }
    }

    timer.end({ generated });
  },
});
