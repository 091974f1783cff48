/**
 * Kubernetes Error Handling Utilities
 *
 * Centralized classification of Kubernetes API errors. The 1.x client throws
 * `ApiException` carrying `code` and a raw response `body`; errors raised by
 * this codebase carry `statusCode`. Both shapes are understood here.
 */

import { ClusterError } from '../errors.js';

/**
 * Structure of a Kubernetes `Status` object returned with failed API calls
 */
export interface KubernetesStatusBody {
  code?: number;
  message?: string;
  reason?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Extract the HTTP status code from a Kubernetes API error.
 *
 * @example
 * ```typescript
 * try {
 *   await coreApi.readNamespacedSecret({ name, namespace });
 * } catch (error) {
 *   if (getErrorStatusCode(error) === 404) {
 *     // Handle not found
 *   }
 * }
 * ```
 */
export function getErrorStatusCode(error: unknown): number | undefined {
  if (!isRecord(error)) {
    return undefined;
  }

  if (typeof error.statusCode === 'number') {
    return error.statusCode;
  }

  // ApiException from the generated 1.x client
  if (typeof error.code === 'number') {
    return error.code;
  }

  if (isRecord(error.response) && typeof error.response.statusCode === 'number') {
    return error.response.statusCode;
  }

  const body = getStatusBody(error);
  return typeof body?.code === 'number' ? body.code : undefined;
}

/**
 * Parse the `Status` body of an API error; the generated client leaves it as
 * the raw response text.
 */
export function getStatusBody(error: unknown): KubernetesStatusBody | undefined {
  if (!isRecord(error)) {
    return undefined;
  }

  let body: unknown = error.body;
  if (typeof body === 'string') {
    try {
      body = JSON.parse(body);
    } catch {
      return undefined;
    }
  }

  if (!isRecord(body)) {
    return undefined;
  }

  return {
    ...(typeof body.code === 'number' && { code: body.code }),
    ...(typeof body.message === 'string' && { message: body.message }),
    ...(typeof body.reason === 'string' && { reason: body.reason }),
  };
}

/**
 * Check if an error is a "Not Found" (404) error.
 */
export function isNotFoundError(error: unknown): boolean {
  return getErrorStatusCode(error) === 404;
}

/**
 * Check if an error is a "Conflict" (409) error.
 *
 * Conflict errors typically occur when:
 * - Trying to create a resource that already exists
 * - Optimistic locking fails due to resource version mismatch
 */
export function isConflictError(error: unknown): boolean {
  return getErrorStatusCode(error) === 409;
}

/**
 * Format a Kubernetes API error into a human-readable message.
 *
 * Prefers the API server's own `Status.message` (e.g.
 * `secrets "web-tls" not found`) over the client's generic exception text.
 */
export function formatKubernetesError(error: unknown): string {
  const body = getStatusBody(error);
  if (body?.message) {
    return body.message;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

/**
 * Wrap a Kubernetes API failure into a ClusterError, keeping its status code.
 */
export function toClusterError(error: unknown): ClusterError {
  if (error instanceof ClusterError) {
    return error;
  }

  return new ClusterError(formatKubernetesError(error), getErrorStatusCode(error), { cause: error });
}
