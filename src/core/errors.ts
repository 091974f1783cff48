/**
 * Error taxonomy for the operator.
 *
 * Every error carries a stable `code` and optional structured context. Errors
 * that wrap another keep it as `cause` so log lines show the full chain.
 */

import type { ArkErrors } from 'arktype';

export class OperatorError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'OperatorError';
  }
}

/**
 * Operator or credentials configuration is unusable. Raised before any
 * network call is made.
 */
export class ConfigurationError extends OperatorError {
  constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, 'CONFIGURATION_ERROR', context, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Network or HTTP level failure talking to the issuance service. For non-200
 * responses the message is the HTTP status text, e.g. `Not Found`.
 */
export class TransportError extends OperatorError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'TRANSPORT_ERROR', statusCode === undefined ? undefined : { statusCode }, options);
    this.name = 'TransportError';
  }
}

/**
 * The issuance service answered 200 with a body that is not the expected JSON.
 */
export class ProtocolError extends OperatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PROTOCOL_ERROR', undefined, options);
    this.name = 'ProtocolError';
  }
}

/**
 * Malformed base64 or PKCS#12 archive.
 */
export class DecodeError extends OperatorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'DECODE_ERROR', undefined, options);
    this.name = 'DecodeError';
  }
}

/**
 * The archive holds a private key of an unsupported family.
 */
export class CastError extends OperatorError {
  constructor(message: string, public readonly keyType?: string) {
    super(message, 'CAST_ERROR', keyType === undefined ? undefined : { keyType });
    this.name = 'CastError';
  }
}

export class TimestampParseError extends OperatorError {
  constructor(
    message: string,
    public readonly value: string
  ) {
    super(message, 'TIMESTAMP_PARSE_ERROR', { value });
    this.name = 'TimestampParseError';
  }
}

export class OwnerReferenceError extends OperatorError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'OWNER_REFERENCE_ERROR', context);
    this.name = 'OwnerReferenceError';
  }
}

/**
 * A read or write against the Kubernetes API failed. `statusCode` is the
 * HTTP status of the API response when there was one (404, 409, ...).
 */
export class ClusterError extends OperatorError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'CLUSTER_ERROR', statusCode === undefined ? undefined : { statusCode }, options);
    this.name = 'ClusterError';
  }
}

/**
 * A custom resource read from the cluster does not match its schema.
 */
export class ValidationError extends OperatorError {
  constructor(
    message: string,
    public readonly resourceKind: string,
    public readonly resourceName: string,
    public readonly field?: string
  ) {
    super(message, 'VALIDATION_ERROR', { resourceKind, resourceName, field });
    this.name = 'ValidationError';
  }
}

/**
 * A reconcile pipeline step failed. `reason` is the reason written to the
 * Certificate's Error condition for it.
 */
export class ReconcileError extends OperatorError {
  constructor(
    message: string,
    public readonly reason: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'RECONCILE_ERROR', { reason }, options);
    this.name = 'ReconcileError';
  }
}

/**
 * Fails the current reconcile pass and asks the work queue to process the key
 * again after a fixed delay instead of its default backoff.
 */
export class RequeueAfterError extends OperatorError {
  constructor(
    message: string,
    public readonly requeueAfterMs: number,
    options?: { cause?: unknown }
  ) {
    super(message, 'REQUEUE_AFTER', { requeueAfterMs }, options);
    this.name = 'RequeueAfterError';
  }
}

/**
 * Build a ValidationError from arktype problems
 */
export function formatValidationError(
  errors: ArkErrors,
  resourceKind: string,
  resourceName: string
): ValidationError {
  const first = errors[0];
  const field = first && first.path.length > 0 ? first.path.map(String).join('.') : undefined;

  return new ValidationError(
    `Invalid ${resourceKind} '${resourceName}': ${errors.summary}`,
    resourceKind,
    resourceName,
    field
  );
}

/**
 * Text of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function ensureError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
