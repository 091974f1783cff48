export { CertificateApiClient, createIssuanceClient, parseResponseBody } from './client.js';
export type { CertificateApiClientOptions } from './client.js';
export { CREDENTIALS_KEY, parseCredentials } from './credentials.js';
export { issueRequestFromSpec } from './request.js';
export type { Credentials } from './credentials.js';
export type {
  DownloadResponse,
  IssuanceClient,
  IssuanceClientBuilder,
  IssuanceClientContext,
  IssueRequest,
  IssueSubject,
  ValidityResponse,
} from './types.js';
