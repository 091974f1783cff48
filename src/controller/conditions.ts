import { STATUS_CODES } from 'node:http';
import type { ConditionInput, ConditionSet } from '../api/v1alpha1/index.js';
import { errorMessage } from '../core/errors.js';

/**
 * Type of the singleton condition recording the latest reconcile failure
 */
export const CONDITION_ERROR = 'Error';

export const ConditionReason = {
  ConfigRetrievalFailed: 'ConfigRetrievalFailed',
  PostToCertAPIFailed: 'PostToCertAPIFailed',
  GetCertDataFromCertAPIFailed: 'GetCertDataFromCertAPIFailed',
  StatusUpdateFailed: 'StatusUpdateFailed',
  ParseValidToFailed: 'ParseValidToFailed',
  ParseValidFromFailed: 'ParseValidFromFailed',
  SetOwnerRefFailed: 'SetOwnerRefFailed',
  DownloadCertFromCertAPIFailed: 'DownloadCertFromCertAPIFailed',
  DecodeCertFailed: 'DecodeCertFailed',
  CreateOrUpdateTLSSecretFailed: 'CreateOrUpdateTLSSecretFailed',
} as const;

export type ConditionReason = (typeof ConditionReason)[keyof typeof ConditionReason];

/**
 * HTTP status text the issuance service returns for an unknown guid
 */
export const NOT_FOUND_STATUS_TEXT = STATUS_CODES[404] ?? 'Not Found';

/**
 * Error condition for a failed step. `reason` is one of ConditionReason.
 */
export function errorCondition(reason: string, error: unknown): ConditionInput {
  return {
    type: CONDITION_ERROR,
    status: 'True',
    reason,
    message: errorMessage(error),
  };
}

/**
 * Whether an error text carries the issuance service's not-found status text.
 *
 * This matches on the status text embedded in the message, so it breaks if the
 * transport ever changes how it words non-200 responses.
 */
export function mentionsNotFound(text: string): boolean {
  return text.includes(NOT_FOUND_STATUS_TEXT);
}

export function hasNotFoundErrorCondition(conditions: ConditionSet): boolean {
  const condition = conditions.get(CONDITION_ERROR);
  return condition !== undefined && mentionsNotFound(condition.message);
}
