import type * as k8s from '@kubernetes/client-node';
import { API_VERSION } from '../../src/api/v1alpha1/group-version.js';
import { CREDENTIALS_KEY } from '../../src/clients/issuance/index.js';

export const NAMESPACE = 'shop';
export const CERTIFICATE_NAME = 'web';
export const CONFIG_NAME = 'issuer-config';
export const CREDENTIALS_SECRET = { namespace: 'cert-system', name: 'issuer-credentials' };

export interface CertificateFixtureOptions {
  name?: string;
  namespace?: string;
  secretName?: string;
  configName?: string;
  /** null leaves the uid out */
  uid?: string | null;
  status?: Record<string, unknown>;
}

export function certificateResource(options: CertificateFixtureOptions = {}) {
  return {
    apiVersion: API_VERSION,
    kind: 'Certificate',
    metadata: {
      name: options.name ?? CERTIFICATE_NAME,
      namespace: options.namespace ?? NAMESPACE,
      ...(options.uid !== null && { uid: options.uid ?? 'uid-web' }),
      generation: 1,
    },
    spec: {
      certificateData: {
        subject: { commonName: 'web.shop.test', organization: 'Shop' },
        san: { dns: ['web.shop.test'] },
        form: 'pfx',
      },
      secretName: options.secretName ?? 'web-tls',
      configRef: { name: options.configName ?? CONFIG_NAME },
    },
    ...(options.status && { status: options.status }),
  };
}

export interface ConfigFixtureOptions {
  name?: string;
  daysBeforeRenewal?: number;
  forceExpirationUpdate?: boolean;
  finalizers?: string[];
  deletionTimestamp?: string;
}

export function certificateConfigResource(options: ConfigFixtureOptions = {}) {
  return {
    apiVersion: API_VERSION,
    kind: 'CertificateConfig',
    metadata: {
      name: options.name ?? CONFIG_NAME,
      ...(options.finalizers && { finalizers: options.finalizers }),
      ...(options.deletionTimestamp && { deletionTimestamp: options.deletionTimestamp }),
    },
    spec: {
      secretRef: { ...CREDENTIALS_SECRET },
      daysBeforeRenewal: options.daysBeforeRenewal ?? 10,
      ...(options.forceExpirationUpdate !== undefined && {
        forceExpirationUpdate: options.forceExpirationUpdate,
      }),
    },
  };
}

export function encodeCredentials(document: Record<string, string>): string {
  return Buffer.from(JSON.stringify(document)).toString('base64');
}

export const TEST_CREDENTIALS = {
  apiEndpoint: 'https://issuer.test/api/certificates/',
  downloadEndpoint: '/download/',
  token: 'test-token',
};

export function credentialsSecret(document: Record<string, string> = TEST_CREDENTIALS): k8s.V1Secret {
  return {
    apiVersion: 'v1',
    kind: 'Secret',
    metadata: { ...CREDENTIALS_SECRET },
    data: { [CREDENTIALS_KEY]: encodeCredentials(document) },
  };
}
