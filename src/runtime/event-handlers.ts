/**
 * Mapping of watch events to work queue keys
 */

import { CERTIFICATE_KIND, GROUP } from '../api/v1alpha1/group-version.js';
import type { WatchPhase } from './resource-watcher.js';

interface EventMeta {
  name: string;
  namespace?: string;
  generation?: number;
  ownerReferences: Array<{ apiVersion: string; kind: string; name: string; controller?: boolean }>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readMeta(object: unknown): EventMeta | undefined {
  if (!isRecord(object) || !isRecord(object.metadata)) {
    return undefined;
  }
  const { name, namespace, generation, ownerReferences } = object.metadata;
  if (typeof name !== 'string') {
    return undefined;
  }

  const owners: EventMeta['ownerReferences'] = [];
  if (Array.isArray(ownerReferences)) {
    for (const reference of ownerReferences) {
      if (
        isRecord(reference) &&
        typeof reference.apiVersion === 'string' &&
        typeof reference.kind === 'string' &&
        typeof reference.name === 'string'
      ) {
        owners.push({
          apiVersion: reference.apiVersion,
          kind: reference.kind,
          name: reference.name,
          ...(typeof reference.controller === 'boolean' && { controller: reference.controller }),
        });
      }
    }
  }

  return {
    name,
    ...(typeof namespace === 'string' && { namespace }),
    ...(typeof generation === 'number' && { generation }),
    ownerReferences: owners,
  };
}

export function namespacedKey(namespace: string, name: string): string {
  return `${namespace}/${name}`;
}

/**
 * Split a `namespace/name` key
 */
export function parseNamespacedKey(key: string): { namespace: string; name: string } {
  const separator = key.indexOf('/');
  if (separator === -1) {
    return { namespace: '', name: key };
  }
  return { namespace: key.slice(0, separator), name: key.slice(separator + 1) };
}

/**
 * Decides which Certificate events need a reconcile.
 *
 * Additions and deletions always do. A modification only does when
 * `metadata.generation` moved, which leaves out the operator's own status
 * writes.
 */
export class CertificateEventFilter {
  private readonly generations = new Map<string, number | undefined>();

  keyFor(phase: WatchPhase, object: unknown): string | undefined {
    const meta = readMeta(object);
    if (!meta) {
      return undefined;
    }

    const key = namespacedKey(meta.namespace ?? '', meta.name);
    switch (phase) {
      case 'ADDED':
        this.generations.set(key, meta.generation);
        return key;
      case 'MODIFIED': {
        const known = this.generations.has(key);
        const previous = this.generations.get(key);
        this.generations.set(key, meta.generation);
        return !known || previous !== meta.generation ? key : undefined;
      }
      case 'DELETED':
        this.generations.delete(key);
        return key;
    }
  }
}

/**
 * `spec.configRef.name` of a Certificate object
 */
export function configRefOf(object: unknown): string | undefined {
  if (!isRecord(object) || !isRecord(object.spec) || !isRecord(object.spec.configRef)) {
    return undefined;
  }
  const { name } = object.spec.configRef;
  return typeof name === 'string' && name.length > 0 ? name : undefined;
}

/**
 * Key of the Certificate controlling a Secret, if any
 */
export function controllingCertificateKey(secret: unknown): string | undefined {
  const meta = readMeta(secret);
  if (!meta) {
    return undefined;
  }

  const owner = meta.ownerReferences.find(
    (reference) =>
      reference.controller === true &&
      reference.kind === CERTIFICATE_KIND &&
      reference.apiVersion.split('/')[0] === GROUP
  );
  return owner ? namespacedKey(meta.namespace ?? '', owner.name) : undefined;
}

/**
 * A deleted Secret sends its controlling Certificate back to the queue so the
 * Secret is recreated
 */
export function secretEventKey(phase: WatchPhase, secret: unknown): string | undefined {
  return phase === 'DELETED' ? controllingCertificateKey(secret) : undefined;
}

export function clusterScopedKey(object: unknown): string | undefined {
  return readMeta(object)?.name;
}
