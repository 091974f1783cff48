/**
 * Kubernetes Module
 *
 * Centralized exports for Kubernetes client functionality:
 * - Client provider for the KubeConfig and API clients
 * - Typed cluster access used by the reconcilers
 * - Error handling utilities for consistent error management
 */

export { KubernetesClientProvider } from './client-provider.js';
export type { KubernetesClientConfig } from './client-provider.js';

export {
  KubernetesClusterClient,
  listCertificatesForConfig,
} from './cluster-client.js';
export type { ClusterClient, NamespacedName } from './cluster-client.js';

export {
  formatKubernetesError,
  getErrorStatusCode,
  getStatusBody,
  isConflictError,
  isNotFoundError,
  toClusterError,
} from './errors.js';
export type { KubernetesStatusBody } from './errors.js';
