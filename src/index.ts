/**
 * cert-issuance-operator - reconciles Certificate resources into TLS Secrets
 * issued by an external certificate API.
 */

export * from './api/v1alpha1/index.js';
export { decodeArchive, decodeBase64Strict, requireRsaPrivateKey } from './certificates/decoder.js';
export type { TLSMaterial } from './certificates/decoder.js';
export {
  buildTlsSecret,
  createOrUpdateTlsSecret,
  SECRET_TYPE_TLS,
  setOwnerReference,
  TLS_CERT_KEY,
  TLS_PRIVATE_KEY_KEY,
} from './certificates/secret-materializer.js';
export { NodeHttpClient, statusText } from './clients/http/client.js';
export type { HttpClient, HttpMethod, HttpRequest, HttpResponse } from './clients/http/client.js';
export * from './clients/issuance/index.js';
export * from './controller/index.js';
export * from './core/config/index.js';
export {
  CastError,
  ClusterError,
  ConfigurationError,
  DecodeError,
  errorMessage,
  ensureError,
  OperatorError,
  OwnerReferenceError,
  ProtocolError,
  ReconcileError,
  RequeueAfterError,
  TimestampParseError,
  TransportError,
  ValidationError,
} from './core/errors.js';
export * from './core/kubernetes/index.js';
export {
  createContextLogger,
  createLogger,
  getComponentLogger,
  getResourceLogger,
  logger,
} from './core/logging/index.js';
export type { LoggerConfig, LoggerContext, LogLevel, LogMetadata, OperatorLogger } from './core/logging/index.js';
export {
  formatRfc3339,
  parseDuration,
  parseIssuanceTimestamp,
  parseRfc3339,
} from './core/utils/time.js';
export * from './runtime/index.js';
