export { createCertificatesService } from './service';
export { createAdminKubeconfig } from './kubeconfig';
export { createCAKeyPair, createClientKeyPair, createServiceAccountKeyPair, discoveryHash } from './pki';
