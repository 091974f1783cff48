import { type } from 'arktype';
import { formatValidationError } from '../../core/errors.js';
import { parseDuration } from '../../core/utils/time.js';
import { API_VERSION, CERTIFICATE_CONFIG_KIND, GROUP } from './group-version.js';
import { ObjectMetaSchema, resourceName, type ObjectMeta } from './object-meta.js';

/**
 * Finalizer that blocks deletion of a CertificateConfig while Certificates
 * still reference it
 */
export const DEPENDENCIES_FINALIZER = `${GROUP}/check-dependencies`;

export const DEFAULT_WAIT_TIMEOUT_MS = 60_000;

export const CertificateConfigSpecSchema = type({
  secretRef: {
    name: 'string > 0',
    namespace: 'string > 0',
  },
  daysBeforeRenewal: 'number >= 0',
  'waitTimeout?': 'string',
  'forceExpirationUpdate?': 'boolean',
  'skipTLSVerify?': 'boolean',
});

export const CertificateConfigResourceSchema = type({
  'apiVersion?': 'string',
  'kind?': 'string',
  metadata: ObjectMetaSchema,
  spec: CertificateConfigSpecSchema,
});

export type CertificateConfigSpec = typeof CertificateConfigSpecSchema.infer;

export interface CertificateConfig {
  apiVersion: string;
  kind: string;
  metadata: ObjectMeta;
  spec: CertificateConfigSpec;
}

/**
 * Validate a CertificateConfig read from the API server.
 *
 * @throws ValidationError when the object does not match the schema
 */
export function certificateConfigFromResource(resource: unknown): CertificateConfig {
  const parsed = CertificateConfigResourceSchema(resource);
  if (parsed instanceof type.errors) {
    throw formatValidationError(parsed, CERTIFICATE_CONFIG_KIND, resourceName(resource));
  }

  return {
    apiVersion: parsed.apiVersion ?? API_VERSION,
    kind: parsed.kind ?? CERTIFICATE_CONFIG_KIND,
    metadata: parsed.metadata,
    spec: parsed.spec,
  };
}

/**
 * Timeout for calls to the issuance service, one minute unless configured
 */
export function waitTimeoutMs(config: CertificateConfig): number {
  return config.spec.waitTimeout === undefined
    ? DEFAULT_WAIT_TIMEOUT_MS
    : parseDuration(config.spec.waitTimeout);
}

/**
 * Whether TLS verification of the issuance service is skipped (default true)
 */
export function skipTLSVerify(config: CertificateConfig): boolean {
  return config.spec.skipTLSVerify ?? true;
}

export function isBeingDeleted(config: CertificateConfig): boolean {
  return config.metadata.deletionTimestamp !== undefined;
}
