import { type } from 'arktype';
import { formatValidationError } from '../../core/errors.js';
import { formatRfc3339, parseRfc3339 } from '../../core/utils/time.js';
import { ConditionResourceSchema, ConditionSet } from './conditions.js';
import { API_VERSION, CERTIFICATE_KIND } from './group-version.js';
import { ObjectMetaSchema, resourceName, type ObjectMeta } from './object-meta.js';

export const ARCHIVE_FORMS = ['pfx'] as const;
export type ArchiveForm = (typeof ARCHIVE_FORMS)[number];
export const DEFAULT_ARCHIVE_FORM: ArchiveForm = 'pfx';

export const SubjectSchema = type({
  'commonName?': 'string',
  'country?': 'string',
  'state?': 'string',
  'locality?': 'string',
  'organization?': 'string',
  'organizationUnit?': 'string',
});

export const SanSchema = type({
  'dns?': 'string[]',
  'ips?': 'string[]',
});

export const CertificateDataSchema = type({
  'subject?': SubjectSchema,
  'san?': SanSchema,
  'template?': 'string',
  'form?': "'pfx'",
});

export const CertificateSpecSchema = type({
  certificateData: CertificateDataSchema,
  secretName: 'string > 0',
  configRef: {
    name: 'string > 0',
  },
});

export const CertificateStatusResourceSchema = type({
  'conditions?': ConditionResourceSchema.array(),
  'validFrom?': 'string',
  'validTo?': 'string',
  'issuer?': 'string',
  'guid?': 'string',
  'signatureHashAlgorithm?': 'string',
  'secretName?': 'string',
});

export const CertificateResourceSchema = type({
  'apiVersion?': 'string',
  'kind?': 'string',
  metadata: ObjectMetaSchema,
  spec: CertificateSpecSchema,
  'status?': CertificateStatusResourceSchema,
});

export type Subject = typeof SubjectSchema.infer;
export type San = typeof SanSchema.infer;
export type CertificateData = typeof CertificateDataSchema.infer;
export type CertificateSpec = typeof CertificateSpecSchema.infer;
export type CertificateStatusResource = typeof CertificateStatusResourceSchema.infer;

/**
 * Wire shape of a Certificate as stored by the API server
 */
export interface CertificateResource {
  apiVersion: string;
  kind: string;
  metadata: ObjectMeta;
  spec: CertificateSpec;
  status?: CertificateStatusResource;
}

/**
 * Validity window reported by the issuance service. Both ends are always
 * known together.
 */
export interface CertificateValidity {
  validFrom: Date;
  validTo: Date;
}

export interface CertificateStatus {
  conditions: ConditionSet;
  validity?: CertificateValidity;
  issuer?: string;
  guid?: string;
  signatureHashAlgorithm?: string;
  secretName?: string;
}

export interface Certificate {
  apiVersion: string;
  kind: string;
  metadata: ObjectMeta;
  spec: CertificateSpec;
  status: CertificateStatus;
}

/**
 * Validate a Certificate read from the API server and convert it to the
 * in-memory model.
 *
 * @throws ValidationError when the object does not match the schema
 */
export function certificateFromResource(resource: unknown): Certificate {
  const parsed = CertificateResourceSchema(resource);
  if (parsed instanceof type.errors) {
    throw formatValidationError(parsed, CERTIFICATE_KIND, resourceName(resource));
  }

  const status: CertificateStatusResource = parsed.status ?? {};
  const validFrom = parseRfc3339(status.validFrom);
  const validTo = parseRfc3339(status.validTo);

  return {
    apiVersion: parsed.apiVersion ?? API_VERSION,
    kind: parsed.kind ?? CERTIFICATE_KIND,
    metadata: parsed.metadata,
    spec: parsed.spec,
    status: {
      conditions: ConditionSet.fromResource(status.conditions),
      ...(validFrom && validTo && { validity: { validFrom, validTo } }),
      ...(status.issuer !== undefined && { issuer: status.issuer }),
      ...(status.guid !== undefined && { guid: status.guid }),
      ...(status.signatureHashAlgorithm !== undefined && {
        signatureHashAlgorithm: status.signatureHashAlgorithm,
      }),
      ...(status.secretName !== undefined && { secretName: status.secretName }),
    },
  };
}

export function certificateStatusToResource(status: CertificateStatus): CertificateStatusResource {
  const conditions = status.conditions.toResource();
  return {
    ...(conditions.length > 0 && { conditions }),
    ...(status.validity && {
      validFrom: formatRfc3339(status.validity.validFrom),
      validTo: formatRfc3339(status.validity.validTo),
    }),
    ...(status.issuer && { issuer: status.issuer }),
    ...(status.guid && { guid: status.guid }),
    ...(status.signatureHashAlgorithm && { signatureHashAlgorithm: status.signatureHashAlgorithm }),
    ...(status.secretName && { secretName: status.secretName }),
  };
}

export function certificateToResource(certificate: Certificate): CertificateResource {
  return {
    apiVersion: certificate.apiVersion,
    kind: certificate.kind,
    metadata: certificate.metadata,
    spec: certificate.spec,
    status: certificateStatusToResource(certificate.status),
  };
}

/**
 * Archive form requested for download, defaulting to pfx
 */
export function archiveForm(spec: CertificateSpec): ArchiveForm {
  return spec.certificateData.form ?? DEFAULT_ARCHIVE_FORM;
}

/**
 * `namespace/name` key of a Certificate
 */
export function certificateKey(certificate: Pick<Certificate, 'metadata'>): string {
  return `${certificate.metadata.namespace ?? ''}/${certificate.metadata.name}`;
}
