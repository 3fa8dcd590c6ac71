/**
 * Admin kubeconfig for a workload cluster
 */

import * as yaml from 'js-yaml';
import { DEFAULT_CERTIFICATES } from '../../config/defaults';
import type { KeyPair } from '../../domain/types';
import { createClientKeyPair } from './pki';

const base64 = (value: string): string => Buffer.from(value, 'utf-8').toString('base64');

/**
 * Render a kubeconfig whose user is a `system:masters` client certificate signed by the cluster CA
 */
export function createAdminKubeconfig(clusterName: string, server: string, ca: KeyPair): string {
  const user = DEFAULT_CERTIFICATES.adminUser;
  const client = createClientKeyPair(ca, user, DEFAULT_CERTIFICATES.adminGroup);
  const contextName = `${user}@${clusterName}`;

  return yaml.dump({
    apiVersion: 'v1',
    kind: 'Config',
    clusters: [
      {
        name: clusterName,
        cluster: {
          'certificate-authority-data': base64(ca.cert),
          server,
        },
      },
    ],
    contexts: [
      {
        name: contextName,
        context: { cluster: clusterName, user },
      },
    ],
    'current-context': contextName,
    preferences: {},
    users: [
      {
        name: user,
        user: {
          'client-certificate-data': base64(client.cert),
          'client-key-data': base64(client.key),
        },
      },
    ],
  });
}
