/**
 * Builds the TLS Secret for a Certificate and writes it to the cluster.
 */

import type * as k8s from '@kubernetes/client-node';
import type { Certificate } from '../api/v1alpha1/index.js';
import { ClusterError, OwnerReferenceError, errorMessage } from '../core/errors.js';
import type { ClusterClient } from '../core/kubernetes/cluster-client.js';
import { getErrorStatusCode, isNotFoundError } from '../core/kubernetes/errors.js';
import type { OperatorLogger } from '../core/logging/index.js';
import type { TLSMaterial } from './decoder.js';

export const SECRET_TYPE_TLS = 'kubernetes.io/tls';
export const TLS_CERT_KEY = 'tls.crt';
export const TLS_PRIVATE_KEY_KEY = 'tls.key';

/**
 * Secret named after `spec.secretName` in `namespace`, holding the PEM
 * certificate and key under the standard TLS keys.
 */
export function buildTlsSecret(
  material: TLSMaterial,
  certificate: Certificate,
  namespace: string
): k8s.V1Secret {
  return {
    apiVersion: 'v1',
    kind: 'Secret',
    metadata: {
      name: certificate.spec.secretName,
      namespace,
    },
    type: SECRET_TYPE_TLS,
    data: {
      [TLS_CERT_KEY]: material.certificate.toString('base64'),
      [TLS_PRIVATE_KEY_KEY]: material.privateKey.toString('base64'),
    },
  };
}

/**
 * Make `owner` the controlling owner of `secret`. An existing reference to
 * the same owner is replaced; references to other owners are kept.
 *
 * @throws OwnerReferenceError when the namespaces differ or the owner has no uid
 */
export function setOwnerReference(owner: Certificate, secret: k8s.V1Secret): k8s.V1Secret {
  const ownerNamespace = owner.metadata.namespace ?? '';
  const secretNamespace = secret.metadata?.namespace ?? '';

  if (ownerNamespace !== secretNamespace) {
    throw new OwnerReferenceError(
      `cross-namespace owner references are disallowed, owner's namespace ${ownerNamespace}, obj's namespace ${secretNamespace}`,
      { ownerNamespace, secretNamespace }
    );
  }

  const uid = owner.metadata.uid;
  if (!uid) {
    throw new OwnerReferenceError(`${owner.kind} "${owner.metadata.name}" has no uid`, {
      owner: owner.metadata.name,
    });
  }

  const reference: k8s.V1OwnerReference = {
    apiVersion: owner.apiVersion,
    kind: owner.kind,
    name: owner.metadata.name,
    uid,
    controller: true,
    blockOwnerDeletion: true,
  };

  const others = (secret.metadata?.ownerReferences ?? []).filter(
    (existing) =>
      !(
        existing.kind === reference.kind &&
        existing.name === reference.name &&
        existing.apiVersion.split('/')[0] === reference.apiVersion.split('/')[0]
      )
  );

  return {
    ...secret,
    metadata: {
      ...secret.metadata,
      ownerReferences: [...others, reference],
    },
  };
}

function secretError(
  action: 'create' | 'get' | 'update',
  secret: k8s.V1Secret,
  cause: unknown
): ClusterError {
  const name = secret.metadata?.name ?? '';
  const namespace = secret.metadata?.namespace ?? '';
  return new ClusterError(
    `cannot ${action} secret "${name}" in the namespace "${namespace}": ${errorMessage(cause)}`,
    getErrorStatusCode(cause),
    { cause }
  );
}

/**
 * Create `secret`, or when it already exists replace only its `data`.
 * Labels, annotations and other fields of an existing Secret stay as they are.
 */
export async function createOrUpdateTlsSecret(
  cluster: ClusterClient,
  secret: k8s.V1Secret,
  logger?: OperatorLogger
): Promise<k8s.V1Secret> {
  const key = {
    namespace: secret.metadata?.namespace ?? '',
    name: secret.metadata?.name ?? '',
  };

  let existing: k8s.V1Secret;
  try {
    existing = await cluster.getSecret(key);
  } catch (error) {
    if (!isNotFoundError(error)) {
      throw secretError('get', secret, error);
    }

    try {
      const created = await cluster.createSecret(secret);
      logger?.info('Created TLS secret', { secret: `${key.namespace}/${key.name}` });
      return created;
    } catch (createError) {
      throw secretError('create', secret, createError);
    }
  }

  try {
    const updated = await cluster.updateSecret({ ...existing, data: secret.data });
    logger?.info('Updated TLS secret', { secret: `${key.namespace}/${key.name}` });
    return updated;
  } catch (error) {
    throw secretError('update', secret, error);
  }
}
