import { describe, expect, it } from 'vitest';
import { ClusterError } from '../../../src/core/errors.js';
import {
  formatKubernetesError,
  getErrorStatusCode,
  getStatusBody,
  isConflictError,
  isNotFoundError,
  toClusterError,
} from '../../../src/core/kubernetes/errors.js';

class FakeApiException extends Error {
  constructor(
    public readonly code: number,
    public readonly body: string
  ) {
    super(`HTTP-Code: ${code}`);
  }
}

describe('Kubernetes error helpers', () => {
  describe('getErrorStatusCode', () => {
    it('should read statusCode of operator errors', () => {
      expect(getErrorStatusCode(new ClusterError('gone', 404))).toBe(404);
    });

    it('should read the numeric code of client exceptions', () => {
      expect(getErrorStatusCode(new FakeApiException(409, '{}'))).toBe(409);
    });

    it('should read the status code of a nested response', () => {
      expect(getErrorStatusCode({ response: { statusCode: 500 } })).toBe(500);
    });

    it('should fall back to the code of the Status body', () => {
      expect(getErrorStatusCode({ body: '{"kind":"Status","code":403}' })).toBe(403);
    });

    it('should return undefined for errors without a status', () => {
      expect(getErrorStatusCode(new Error('boom'))).toBeUndefined();
      expect(getErrorStatusCode('boom')).toBeUndefined();
      expect(getErrorStatusCode(null)).toBeUndefined();
    });
  });

  describe('getStatusBody', () => {
    it('should parse a raw JSON body', () => {
      expect(
        getStatusBody({ body: '{"code":404,"message":"secrets \\"web-tls\\" not found","reason":"NotFound"}' })
      ).toEqual({ code: 404, message: 'secrets "web-tls" not found', reason: 'NotFound' });
    });

    it('should return undefined for a body that is not JSON', () => {
      expect(getStatusBody({ body: '<html>' })).toBeUndefined();
    });
  });

  it('should classify not found and conflict errors', () => {
    expect(isNotFoundError(new ClusterError('x', 404))).toBe(true);
    expect(isNotFoundError(new ClusterError('x', 409))).toBe(false);
    expect(isConflictError(new FakeApiException(409, ''))).toBe(true);
    expect(isConflictError(new Error('x'))).toBe(false);
  });

  describe('formatKubernetesError', () => {
    it('should prefer the API server message', () => {
      const error = new FakeApiException(404, '{"message":"certificates.certops.io \\"web\\" not found"}');
      expect(formatKubernetesError(error)).toBe('certificates.certops.io "web" not found');
    });

    it('should fall back to the error message', () => {
      expect(formatKubernetesError(new FakeApiException(500, ''))).toBe('HTTP-Code: 500');
      expect(formatKubernetesError('plain')).toBe('plain');
    });
  });

  describe('toClusterError', () => {
    it('should keep ClusterErrors as they are', () => {
      const error = new ClusterError('conflict', 409);
      expect(toClusterError(error)).toBe(error);
    });

    it('should wrap client exceptions with their status code', () => {
      const source = new FakeApiException(404, '{"message":"secrets \\"web-tls\\" not found"}');
      const wrapped = toClusterError(source);
      expect(wrapped).toBeInstanceOf(ClusterError);
      expect(wrapped.message).toBe('secrets "web-tls" not found');
      expect(wrapped.statusCode).toBe(404);
      expect(wrapped.cause).toBe(source);
    });
  });
});
