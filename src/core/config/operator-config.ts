/**
 * Runtime configuration of the operator process, read from the environment.
 * `KUBECONFIG` is not read here: the client's default loading rules honour it.
 */

import { type } from 'arktype';
import { ConfigurationError } from '../errors.js';

export const DEFAULT_MAX_CONCURRENT_RECONCILES = 4;
export const DEFAULT_RESYNC_PERIOD_SECONDS = 600;

export const OperatorConfigSchema = type({
  maxConcurrentReconciles: 'number.integer >= 1',
  resyncPeriodSeconds: 'number.integer >= 0',
  'watchNamespace?': 'string > 0',
});

export type OperatorConfig = typeof OperatorConfigSchema.infer;

function numberFromEnv(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${name} must be a number, got "${value}"`, { [name]: value });
  }
  return parsed;
}

function optionalString(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Build the operator configuration from environment variables:
 *
 * - `CERT_OPERATOR_MAX_CONCURRENT_RECONCILES` (default 4)
 * - `CERT_OPERATOR_RESYNC_PERIOD_SECONDS` (default 600, 0 disables resync)
 * - `CERT_OPERATOR_WATCH_NAMESPACE` (default: all namespaces)
 *
 * @throws ConfigurationError when a value is malformed or out of range
 */
export function loadOperatorConfig(env: NodeJS.ProcessEnv = process.env): OperatorConfig {
  const watchNamespace = optionalString(env.CERT_OPERATOR_WATCH_NAMESPACE);

  const candidate = {
    maxConcurrentReconciles: numberFromEnv(
      'CERT_OPERATOR_MAX_CONCURRENT_RECONCILES',
      env.CERT_OPERATOR_MAX_CONCURRENT_RECONCILES,
      DEFAULT_MAX_CONCURRENT_RECONCILES
    ),
    resyncPeriodSeconds: numberFromEnv(
      'CERT_OPERATOR_RESYNC_PERIOD_SECONDS',
      env.CERT_OPERATOR_RESYNC_PERIOD_SECONDS,
      DEFAULT_RESYNC_PERIOD_SECONDS
    ),
    ...(watchNamespace && { watchNamespace }),
  };

  const result = OperatorConfigSchema(candidate);
  if (result instanceof type.errors) {
    throw new ConfigurationError(`Invalid operator configuration: ${result.summary}`, candidate);
  }
  return result;
}
