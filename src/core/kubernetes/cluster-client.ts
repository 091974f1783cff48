/**
 * Typed access to the objects the operator reads and writes.
 *
 * Reconcilers depend on the ClusterClient interface only; the Kubernetes
 * implementation below talks to the API server, tests use an in-memory one.
 * Every write carries `metadata.resourceVersion`, so a stale write fails with
 * a 409 ClusterError.
 */

import type * as k8s from '@kubernetes/client-node';
import {
  type Certificate,
  type CertificateConfig,
  certificateConfigFromResource,
  certificateFromResource,
  certificateToResource,
} from '../../api/v1alpha1/index.js';
import {
  API_VERSION,
  CERTIFICATE_CONFIG_KIND,
  CERTIFICATE_CONFIG_PLURAL,
  CERTIFICATE_PLURAL,
  GROUP,
  VERSION,
} from '../../api/v1alpha1/group-version.js';
import { errorMessage } from '../errors.js';
import { getComponentLogger, type OperatorLogger } from '../logging/index.js';
import { toClusterError } from './errors.js';

export interface NamespacedName {
  namespace: string;
  name: string;
}

export interface ClusterClient {
  getCertificate(key: NamespacedName): Promise<Certificate>;

  /**
   * List Certificates in one namespace, or in all namespaces when omitted
   */
  listCertificates(namespace?: string): Promise<Certificate[]>;

  /**
   * Write `certificate.status` through the status subresource and return the
   * stored object.
   */
  updateCertificateStatus(certificate: Certificate): Promise<Certificate>;

  getCertificateConfig(name: string): Promise<CertificateConfig>;

  listCertificateConfigs(): Promise<CertificateConfig[]>;

  updateCertificateConfig(config: CertificateConfig): Promise<CertificateConfig>;

  getSecret(key: NamespacedName): Promise<k8s.V1Secret>;

  createSecret(secret: k8s.V1Secret): Promise<k8s.V1Secret>;

  updateSecret(secret: k8s.V1Secret): Promise<k8s.V1Secret>;
}

/**
 * Certificates whose `spec.configRef.name` is `configName`, across all namespaces
 */
export async function listCertificatesForConfig(
  cluster: ClusterClient,
  configName: string
): Promise<Certificate[]> {
  const certificates = await cluster.listCertificates();
  return certificates.filter((certificate) => certificate.spec.configRef.name === configName);
}

function listItems(list: unknown): unknown[] {
  if (typeof list === 'object' && list !== null && 'items' in list && Array.isArray(list.items)) {
    return list.items;
  }
  return [];
}

export class KubernetesClusterClient implements ClusterClient {
  private readonly logger: OperatorLogger;

  constructor(
    private readonly coreApi: k8s.CoreV1Api,
    private readonly customObjectsApi: k8s.CustomObjectsApi,
    logger?: OperatorLogger
  ) {
    this.logger = logger ?? getComponentLogger('cluster-client');
  }

  async getCertificate({ namespace, name }: NamespacedName): Promise<Certificate> {
    const resource = await this.call(() =>
      this.customObjectsApi.getNamespacedCustomObject({
        group: GROUP,
        version: VERSION,
        namespace,
        plural: CERTIFICATE_PLURAL,
        name,
      })
    );
    return certificateFromResource(resource);
  }

  async listCertificates(namespace?: string): Promise<Certificate[]> {
    const list = await this.call(() =>
      namespace
        ? this.customObjectsApi.listNamespacedCustomObject({
            group: GROUP,
            version: VERSION,
            namespace,
            plural: CERTIFICATE_PLURAL,
          })
        : this.customObjectsApi.listClusterCustomObject({
            group: GROUP,
            version: VERSION,
            plural: CERTIFICATE_PLURAL,
          })
    );

    return this.parseItems(listItems(list), certificateFromResource);
  }

  async updateCertificateStatus(certificate: Certificate): Promise<Certificate> {
    const resource = await this.call(() =>
      this.customObjectsApi.replaceNamespacedCustomObjectStatus({
        group: GROUP,
        version: VERSION,
        namespace: certificate.metadata.namespace ?? '',
        plural: CERTIFICATE_PLURAL,
        name: certificate.metadata.name,
        body: certificateToResource(certificate),
      })
    );
    return certificateFromResource(resource);
  }

  async getCertificateConfig(name: string): Promise<CertificateConfig> {
    const resource = await this.call(() =>
      this.customObjectsApi.getClusterCustomObject({
        group: GROUP,
        version: VERSION,
        plural: CERTIFICATE_CONFIG_PLURAL,
        name,
      })
    );
    return certificateConfigFromResource(resource);
  }

  async listCertificateConfigs(): Promise<CertificateConfig[]> {
    const list = await this.call(() =>
      this.customObjectsApi.listClusterCustomObject({
        group: GROUP,
        version: VERSION,
        plural: CERTIFICATE_CONFIG_PLURAL,
      })
    );
    return this.parseItems(listItems(list), certificateConfigFromResource);
  }

  async updateCertificateConfig(config: CertificateConfig): Promise<CertificateConfig> {
    const resource = await this.call(() =>
      this.customObjectsApi.replaceClusterCustomObject({
        group: GROUP,
        version: VERSION,
        plural: CERTIFICATE_CONFIG_PLURAL,
        name: config.metadata.name,
        body: {
          apiVersion: API_VERSION,
          kind: CERTIFICATE_CONFIG_KIND,
          metadata: config.metadata,
          spec: config.spec,
        },
      })
    );
    return certificateConfigFromResource(resource);
  }

  getSecret({ namespace, name }: NamespacedName): Promise<k8s.V1Secret> {
    return this.call(() => this.coreApi.readNamespacedSecret({ name, namespace }));
  }

  createSecret(secret: k8s.V1Secret): Promise<k8s.V1Secret> {
    return this.call(() =>
      this.coreApi.createNamespacedSecret({
        namespace: secret.metadata?.namespace ?? '',
        body: secret,
      })
    );
  }

  updateSecret(secret: k8s.V1Secret): Promise<k8s.V1Secret> {
    return this.call(() =>
      this.coreApi.replaceNamespacedSecret({
        name: secret.metadata?.name ?? '',
        namespace: secret.metadata?.namespace ?? '',
        body: secret,
      })
    );
  }

  private async call<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw toClusterError(error);
    }
  }

  private parseItems<T>(items: unknown[], parse: (item: unknown) => T): T[] {
    const parsed: T[] = [];
    for (const item of items) {
      try {
        parsed.push(parse(item));
      } catch (error) {
        this.logger.warn('Skipping invalid resource in list', { error: errorMessage(error) });
      }
    }
    return parsed;
  }
}
