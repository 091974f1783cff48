import { describe, expect, it } from 'vitest';
import {
  DEPENDENCIES_FINALIZER,
  archiveForm,
  certificateConfigFromResource,
  certificateFromResource,
  certificateKey,
  certificateToResource,
  isBeingDeleted,
  skipTLSVerify,
  waitTimeoutMs,
} from '../../../src/api/v1alpha1/index.js';
import { ValidationError } from '../../../src/core/errors.js';
import { certificateConfigResource, certificateResource } from '../../helpers/fixtures.js';

describe('Certificate conversion', () => {
  it('should read status timestamps into a validity window', () => {
    const certificate = certificateFromResource(
      certificateResource({
        status: {
          guid: 'task-1',
          validFrom: '2031-01-01T00:00:00Z',
          validTo: '2032-01-01T00:00:00Z',
          secretName: 'web-tls',
        },
      })
    );

    expect(certificate.status.guid).toBe('task-1');
    expect(certificate.status.validity).toEqual({
      validFrom: new Date(Date.UTC(2031, 0, 1)),
      validTo: new Date(Date.UTC(2032, 0, 1)),
    });
    expect(certificate.status.secretName).toBe('web-tls');
    expect(certificate.status.conditions.size).toBe(0);
  });

  it('should leave validity unset when one end is missing', () => {
    const certificate = certificateFromResource(
      certificateResource({ status: { validTo: '2032-01-01T00:00:00Z' } })
    );
    expect(certificate.status.validity).toBeUndefined();
  });

  it('should write the status back in wire form', () => {
    const certificate = certificateFromResource(certificateResource());
    certificate.status.guid = 'task-1';
    certificate.status.validity = {
      validFrom: new Date(Date.UTC(2031, 0, 1)),
      validTo: new Date(Date.UTC(2032, 0, 1)),
    };

    expect(certificateToResource(certificate).status).toEqual({
      guid: 'task-1',
      validFrom: '2031-01-01T00:00:00Z',
      validTo: '2032-01-01T00:00:00Z',
    });
  });

  it('should reject a Certificate without secretName', () => {
    const resource = certificateResource();
    const invalid = { ...resource, spec: { ...resource.spec, secretName: '' } };
    expect(() => certificateFromResource(invalid)).toThrow(ValidationError);
  });

  it('should default the archive form and build the queue key', () => {
    const resource = certificateResource();
    const certificate = certificateFromResource({
      ...resource,
      spec: { ...resource.spec, certificateData: { subject: { commonName: 'web.shop.test' } } },
    });
    expect(archiveForm(certificate.spec)).toBe('pfx');
    expect(certificateKey(certificate)).toBe('shop/web');
  });
});

describe('CertificateConfig conversion', () => {
  it('should apply defaults for wait timeout and TLS verification', () => {
    const config = certificateConfigFromResource(certificateConfigResource());
    expect(waitTimeoutMs(config)).toBe(60_000);
    expect(skipTLSVerify(config)).toBe(true);
    expect(isBeingDeleted(config)).toBe(false);
  });

  it('should read configured values', () => {
    const resource = certificateConfigResource({
      finalizers: [DEPENDENCIES_FINALIZER],
      deletionTimestamp: '2031-01-01T00:00:00Z',
    });
    const config = certificateConfigFromResource({
      ...resource,
      spec: { ...resource.spec, waitTimeout: '2m', skipTLSVerify: false },
    });
    expect(waitTimeoutMs(config)).toBe(120_000);
    expect(skipTLSVerify(config)).toBe(false);
    expect(isBeingDeleted(config)).toBe(true);
    expect(DEPENDENCIES_FINALIZER).toBe('certops.io/check-dependencies');
  });

  it('should reject a negative renewal window', () => {
    expect(() =>
      certificateConfigFromResource(certificateConfigResource({ daysBeforeRenewal: -1 }))
    ).toThrow(ValidationError);
  });
});
