export { CertificateConfigReconciler, CERTIFICATES_EXIST_MESSAGE } from './certificate-config-reconciler.js';
export type { CertificateConfigReconcilerOptions } from './certificate-config-reconciler.js';
export { CertificateReconciler, NOT_FOUND_REQUEUE_DELAY_MS } from './certificate-reconciler.js';
export type { CertificateReconcilerOptions } from './certificate-reconciler.js';
export {
  CONDITION_ERROR,
  ConditionReason,
  NOT_FOUND_STATUS_TEXT,
  errorCondition,
  hasNotFoundErrorCondition,
  mentionsNotFound,
} from './conditions.js';
