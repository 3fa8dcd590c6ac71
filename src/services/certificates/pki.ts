/**
 * PKI helpers: key pairs, self-signed CAs, CA-signed client certificates
 * and kubeadm discovery hashes.
 *
 * Keys come from node:crypto; node-forge assembles and signs the X.509 certificates.
 */

import { createHash, generateKeyPairSync, randomBytes, X509Certificate } from 'node:crypto';
import * as forge from 'node-forge';
import { DEFAULT_CERTIFICATES } from '../../config/defaults';
import type { KeyPair } from '../../domain/types';

interface RsaKeys {
  publicKeyPem: string;
  privateKeyPem: string;
}

function generateRsaKeys(): RsaKeys {
  const { publicKey, privateKey } = generateKeyPairSync('rsa', {
    modulusLength: DEFAULT_CERTIFICATES.rsaKeySize,
    publicKeyEncoding: { type: 'spki', format: 'pem' },
    privateKeyEncoding: { type: 'pkcs1', format: 'pem' },
  });
  return { publicKeyPem: publicKey, privateKeyPem: privateKey };
}

// Positive serial: the leading byte stays below 0x80
function serialNumber(): string {
  return `01${randomBytes(15).toString('hex')}`;
}

function validity(years: number, now: Date): { notBefore: Date; notAfter: Date } {
  const notBefore = new Date(now.getTime());
  const notAfter = new Date(now.getTime());
  notAfter.setUTCFullYear(notAfter.getUTCFullYear() + years);
  return { notBefore, notAfter };
}

/**
 * Self-signed CA certificate with a fresh RSA key
 */
export function createCAKeyPair(commonName: string, now: Date = new Date()): KeyPair {
  const keys = generateRsaKeys();
  const cert = forge.pki.createCertificate();
  cert.publicKey = forge.pki.publicKeyFromPem(keys.publicKeyPem);
  cert.serialNumber = serialNumber();
  const { notBefore, notAfter } = validity(DEFAULT_CERTIFICATES.caValidityYears, now);
  cert.validity.notBefore = notBefore;
  cert.validity.notAfter = notAfter;

  const subject = [{ name: 'commonName', value: commonName }];
  cert.setSubject(subject);
  cert.setIssuer(subject);
  cert.setExtensions([
    { name: 'basicConstraints', cA: true, critical: true },
    { name: 'keyUsage', keyCertSign: true, digitalSignature: true, keyEncipherment: true, critical: true },
    { name: 'subjectKeyIdentifier' },
  ]);
  cert.sign(forge.pki.privateKeyFromPem(keys.privateKeyPem), forge.md.sha256.create());

  return { cert: forge.pki.certificateToPem(cert), key: keys.privateKeyPem };
}

/**
 * Client certificate signed by the given CA
 */
export function createClientKeyPair(
  ca: KeyPair,
  commonName: string,
  organization: string,
  now: Date = new Date(),
): KeyPair {
  const caCert = forge.pki.certificateFromPem(ca.cert);
  const keys = generateRsaKeys();
  const cert = forge.pki.createCertificate();
  cert.publicKey = forge.pki.publicKeyFromPem(keys.publicKeyPem);
  cert.serialNumber = serialNumber();
  const { notBefore, notAfter } = validity(DEFAULT_CERTIFICATES.clientValidityYears, now);
  cert.validity.notBefore = notBefore;
  cert.validity.notAfter = notAfter;

  cert.setSubject([
    { name: 'commonName', value: commonName },
    { name: 'organizationName', value: organization },
  ]);
  cert.setIssuer(caCert.subject.attributes);
  cert.setExtensions([
    { name: 'basicConstraints', cA: false },
    { name: 'keyUsage', digitalSignature: true, keyEncipherment: true, critical: true },
    { name: 'extKeyUsage', clientAuth: true },
  ]);
  cert.sign(forge.pki.privateKeyFromPem(ca.key), forge.md.sha256.create());

  return { cert: forge.pki.certificateToPem(cert), key: keys.privateKeyPem };
}

/**
 * Service-account signing keys: the "cert" half holds the public key
 */
export function createServiceAccountKeyPair(): KeyPair {
  const keys = generateRsaKeys();
  return { cert: keys.publicKeyPem, key: keys.privateKeyPem };
}

/**
 * kubeadm discovery hash: sha256 over the CA's DER SubjectPublicKeyInfo
 */
export function discoveryHash(caCertPem: string): string {
  const spki = new X509Certificate(caCertPem).publicKey.export({ type: 'spki', format: 'der' });
  return `sha256:${createHash('sha256').update(spki).digest('hex')}`;
}
