export { backoffDelay } from './backoff.js';
export type { BackoffOptions } from './backoff.js';
export { Controller } from './controller.js';
export type { ControllerOptions, Reconcile } from './controller.js';
export {
  CertificateEventFilter,
  clusterScopedKey,
  configRefOf,
  controllingCertificateKey,
  namespacedKey,
  parseNamespacedKey,
  secretEventKey,
} from './event-handlers.js';
export {
  Manager,
  certificateConfigsPath,
  certificatesPath,
  secretsPath,
} from './manager.js';
export type { ManagerOptions } from './manager.js';
export { DEFAULT_RECONNECT_BACKOFF, ResourceWatcher } from './resource-watcher.js';
export type { ResourceWatcherOptions, WatchClient, WatchFactory, WatchPhase } from './resource-watcher.js';
export { DEFAULT_QUEUE_BACKOFF, WorkQueue } from './work-queue.js';
