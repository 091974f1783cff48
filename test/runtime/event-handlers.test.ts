import { describe, expect, it } from 'vitest';
import {
  CertificateEventFilter,
  clusterScopedKey,
  configRefOf,
  controllingCertificateKey,
  namespacedKey,
  parseNamespacedKey,
  secretEventKey,
} from '../../src/runtime/event-handlers.js';
import { certificateResource } from '../helpers/fixtures.js';

function withGeneration(generation: number) {
  const resource = certificateResource();
  return { ...resource, metadata: { ...resource.metadata, generation } };
}

function ownedSecret(owner: Record<string, unknown>) {
  return { metadata: { name: 'web-tls', namespace: 'shop', ownerReferences: [owner] } };
}

const CONTROLLER_REFERENCE = {
  apiVersion: 'certops.io/v1alpha1',
  kind: 'Certificate',
  name: 'web',
  uid: 'uid-web',
  controller: true,
};

describe('namespaced keys', () => {
  it('should build and split keys', () => {
    expect(namespacedKey('shop', 'web')).toBe('shop/web');
    expect(parseNamespacedKey('shop/web')).toEqual({ namespace: 'shop', name: 'web' });
    expect(parseNamespacedKey('issuer-config')).toEqual({ namespace: '', name: 'issuer-config' });
  });
});

describe('CertificateEventFilter', () => {
  it('should always enqueue additions and deletions', () => {
    const filter = new CertificateEventFilter();
    expect(filter.keyFor('ADDED', withGeneration(1))).toBe('shop/web');
    expect(filter.keyFor('DELETED', withGeneration(1))).toBe('shop/web');
  });

  it('should enqueue modifications only when the generation moves', () => {
    const filter = new CertificateEventFilter();
    filter.keyFor('ADDED', withGeneration(1));

    expect(filter.keyFor('MODIFIED', withGeneration(1))).toBeUndefined();
    expect(filter.keyFor('MODIFIED', withGeneration(2))).toBe('shop/web');
    expect(filter.keyFor('MODIFIED', withGeneration(2))).toBeUndefined();
  });

  it('should enqueue a modification of an unknown object', () => {
    const filter = new CertificateEventFilter();
    expect(filter.keyFor('MODIFIED', withGeneration(3))).toBe('shop/web');
  });

  it('should ignore objects without a name', () => {
    const filter = new CertificateEventFilter();
    expect(filter.keyFor('ADDED', { metadata: {} })).toBeUndefined();
    expect(filter.keyFor('ADDED', 'garbage')).toBeUndefined();
  });
});

describe('configRefOf', () => {
  it('should read spec.configRef.name', () => {
    expect(configRefOf(certificateResource())).toBe('issuer-config');
    expect(configRefOf({ spec: { configRef: { name: '' } } })).toBeUndefined();
    expect(configRefOf({ spec: {} })).toBeUndefined();
  });
});

describe('Secret events', () => {
  it('should find the controlling Certificate', () => {
    expect(controllingCertificateKey(ownedSecret(CONTROLLER_REFERENCE))).toBe('shop/web');
  });

  it('should ignore owners that do not control the secret or are not Certificates', () => {
    expect(
      controllingCertificateKey(ownedSecret({ ...CONTROLLER_REFERENCE, controller: false }))
    ).toBeUndefined();
    expect(
      controllingCertificateKey(ownedSecret({ ...CONTROLLER_REFERENCE, apiVersion: 'cert-manager.io/v1' }))
    ).toBeUndefined();
    expect(
      controllingCertificateKey(ownedSecret({ ...CONTROLLER_REFERENCE, kind: 'Issuer' }))
    ).toBeUndefined();
  });

  it('should enqueue the owner only when the secret is deleted', () => {
    const secret = ownedSecret(CONTROLLER_REFERENCE);
    expect(secretEventKey('DELETED', secret)).toBe('shop/web');
    expect(secretEventKey('MODIFIED', secret)).toBeUndefined();
    expect(secretEventKey('ADDED', secret)).toBeUndefined();
  });
});

describe('clusterScopedKey', () => {
  it('should use the object name', () => {
    expect(clusterScopedKey({ metadata: { name: 'issuer-config' } })).toBe('issuer-config');
    expect(clusterScopedKey({})).toBeUndefined();
  });
});
