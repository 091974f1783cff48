import { type } from 'arktype';
import type { CertificateConfig } from '../../api/v1alpha1/index.js';
import type { OperatorLogger } from '../../core/logging/index.js';

export interface IssueSubject {
  commonName?: string;
  country?: string;
  state?: string;
  locality?: string;
  organization?: string;
  organizationalUnit?: string;
}

export interface IssueRequest {
  subject: IssueSubject;
  san: {
    dns?: string[];
    ips?: string[];
  };
  template?: string;
}

export const IssueResponseSchema = type({
  taskId: 'string',
});

/**
 * Absent timestamps default to empty so they fail at parsing, not here
 */
export const ValidityResponseSchema = type({
  validTo: "string = ''",
  validFrom: "string = ''",
  'signatureHashAlgorithm?': 'string',
});

export const DownloadResponseSchema = type({
  'form?': 'string',
  'format?': 'string',
  data: 'string',
  password: 'string',
});

export type ValidityResponse = typeof ValidityResponseSchema.infer;
export type DownloadResponse = typeof DownloadResponseSchema.infer;

/**
 * Client of the external certificate issuance service.
 *
 * Implementations are interchangeable: the reconciler only sees this
 * interface, tests substitute their own.
 */
export interface IssuanceClient {
  /**
   * Request a new certificate and return the guid of the issuance task
   */
  issue(request: IssueRequest): Promise<string>;

  /**
   * Validity window of an issued certificate, timestamps as `YYYY-MM-DDTHH:MM:SS`
   */
  fetchValidity(guid: string): Promise<ValidityResponse>;

  /**
   * Password-protected archive of the issued certificate, base64 encoded
   */
  download(guid: string, form: string): Promise<DownloadResponse>;
}

export interface IssuanceClientContext {
  logger: OperatorLogger;
  signal?: AbortSignal;
}

/**
 * Builds a client from a CertificateConfig and the data of its credentials
 * Secret. Called on every reconcile so rotated credentials apply at once.
 */
export type IssuanceClientBuilder = (
  config: CertificateConfig,
  secretData: Record<string, string> | undefined,
  context: IssuanceClientContext
) => IssuanceClient;
