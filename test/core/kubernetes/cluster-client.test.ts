import type * as k8s from '@kubernetes/client-node';
import { describe, expect, it, vi } from 'vitest';
import { certificateFromResource } from '../../../src/api/v1alpha1/index.js';
import { ClusterError } from '../../../src/core/errors.js';
import {
  KubernetesClusterClient,
  listCertificatesForConfig,
} from '../../../src/core/kubernetes/index.js';
import { createLogger } from '../../../src/core/logging/index.js';
import { FakeClusterClient } from '../../helpers/fake-cluster.js';
import { certificateConfigResource, certificateResource } from '../../helpers/fixtures.js';

const logger = createLogger({ level: 'fatal' });

function createClient() {
  const coreApi = {
    readNamespacedSecret: vi.fn(),
    createNamespacedSecret: vi.fn(),
    replaceNamespacedSecret: vi.fn(),
  };
  const customObjectsApi = {
    getNamespacedCustomObject: vi.fn(),
    listNamespacedCustomObject: vi.fn(),
    listClusterCustomObject: vi.fn(),
    replaceNamespacedCustomObjectStatus: vi.fn(),
    getClusterCustomObject: vi.fn(),
    replaceClusterCustomObject: vi.fn(),
  };
  const client = new KubernetesClusterClient(
    coreApi as unknown as k8s.CoreV1Api,
    customObjectsApi as unknown as k8s.CustomObjectsApi,
    logger
  );
  return { client, coreApi, customObjectsApi };
}

describe('KubernetesClusterClient', () => {
  it('should read a Certificate from its namespace', async () => {
    const { client, customObjectsApi } = createClient();
    customObjectsApi.getNamespacedCustomObject.mockResolvedValue(certificateResource());

    const certificate = await client.getCertificate({ namespace: 'shop', name: 'web' });

    expect(certificate.spec.secretName).toBe('web-tls');
    expect(customObjectsApi.getNamespacedCustomObject).toHaveBeenCalledWith({
      group: 'certops.io',
      version: 'v1alpha1',
      namespace: 'shop',
      plural: 'certificates',
      name: 'web',
    });
  });

  it('should list in one namespace or across the cluster', async () => {
    const { client, customObjectsApi } = createClient();
    customObjectsApi.listNamespacedCustomObject.mockResolvedValue({ items: [certificateResource()] });
    customObjectsApi.listClusterCustomObject.mockResolvedValue({ items: [] });

    expect(await client.listCertificates('shop')).toHaveLength(1);
    expect(await client.listCertificates()).toEqual([]);
    expect(customObjectsApi.listClusterCustomObject).toHaveBeenCalledWith({
      group: 'certops.io',
      version: 'v1alpha1',
      plural: 'certificates',
    });
  });

  it('should skip list items that fail validation', async () => {
    const { client, customObjectsApi } = createClient();
    customObjectsApi.listClusterCustomObject.mockResolvedValue({
      items: [certificateConfigResource(), { metadata: { name: 'broken' }, spec: {} }],
    });

    const configs = await client.listCertificateConfigs();

    expect(configs.map((config) => config.metadata.name)).toEqual(['issuer-config']);
  });

  it('should write status through the status subresource', async () => {
    const { client, customObjectsApi } = createClient();
    const certificate = certificateFromResource(certificateResource());
    customObjectsApi.replaceNamespacedCustomObjectStatus.mockResolvedValue(certificateResource());

    await client.updateCertificateStatus(certificate);

    const call = customObjectsApi.replaceNamespacedCustomObjectStatus.mock.calls[0];
    expect(call?.[0]).toMatchObject({
      namespace: 'shop',
      plural: 'certificates',
      name: 'web',
      body: { kind: 'Certificate', metadata: { name: 'web' } },
    });
  });

  it('should address Secrets by their metadata', async () => {
    const { client, coreApi } = createClient();
    const secret: k8s.V1Secret = { metadata: { name: 'web-tls', namespace: 'shop' } };
    coreApi.createNamespacedSecret.mockResolvedValue(secret);
    coreApi.replaceNamespacedSecret.mockResolvedValue(secret);

    await client.createSecret(secret);
    await client.updateSecret(secret);

    expect(coreApi.createNamespacedSecret).toHaveBeenCalledWith({ namespace: 'shop', body: secret });
    expect(coreApi.replaceNamespacedSecret).toHaveBeenCalledWith({
      name: 'web-tls',
      namespace: 'shop',
      body: secret,
    });
  });

  it('should turn API failures into ClusterErrors', async () => {
    const { client, coreApi } = createClient();
    coreApi.readNamespacedSecret.mockRejectedValue(
      Object.assign(new Error('HTTP-Code: 404'), {
        code: 404,
        body: '{"message":"secrets \\"web-tls\\" not found"}',
      })
    );

    const failure = client.getSecret({ namespace: 'shop', name: 'web-tls' });

    await expect(failure).rejects.toBeInstanceOf(ClusterError);
    await expect(failure).rejects.toMatchObject({
      message: 'secrets "web-tls" not found',
      statusCode: 404,
    });
  });
});

describe('listCertificatesForConfig', () => {
  it('should return Certificates referencing the config in every namespace', async () => {
    const cluster = new FakeClusterClient();
    cluster.seedCertificate(certificateResource());
    cluster.seedCertificate(certificateResource({ namespace: 'blog', name: 'api' }));
    cluster.seedCertificate(certificateResource({ name: 'other', configName: 'second-config' }));

    const certificates = await listCertificatesForConfig(cluster, 'issuer-config');

    expect(certificates.map((certificate) => `${certificate.metadata.namespace}/${certificate.metadata.name}`)).toEqual([
      'shop/web',
      'blog/api',
    ]);
  });
});
