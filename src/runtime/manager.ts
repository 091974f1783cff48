/**
 * Operator manager
 *
 * Wires the watches, work queues and reconcile workers of both controllers:
 *
 * - Certificate events enqueue `namespace/name`; a deleted Certificate also
 *   enqueues its CertificateConfig so a pending deletion can proceed.
 * - A deleted Secret controlled by a Certificate enqueues that Certificate.
 * - CertificateConfig events enqueue the config name.
 * - A periodic resync lists both kinds and enqueues every key.
 */

import {
  API_VERSION,
  CERTIFICATE_CONFIG_PLURAL,
  CERTIFICATE_PLURAL,
} from '../api/v1alpha1/group-version.js';
import { certificateKey } from '../api/v1alpha1/index.js';
import type { IssuanceClientBuilder } from '../clients/issuance/index.js';
import { CertificateConfigReconciler } from '../controller/certificate-config-reconciler.js';
import { CertificateReconciler } from '../controller/certificate-reconciler.js';
import { errorMessage } from '../core/errors.js';
import type { ClusterClient } from '../core/kubernetes/index.js';
import { getComponentLogger, type OperatorLogger } from '../core/logging/index.js';
import { Controller } from './controller.js';
import {
  CertificateEventFilter,
  clusterScopedKey,
  configRefOf,
  parseNamespacedKey,
  secretEventKey,
} from './event-handlers.js';
import { ResourceWatcher, type WatchFactory, type WatchPhase } from './resource-watcher.js';
import { WorkQueue } from './work-queue.js';

export interface ManagerOptions {
  cluster: ClusterClient;
  watchFactory: WatchFactory;
  issuanceClientBuilder?: IssuanceClientBuilder;
  logger?: OperatorLogger;
  maxConcurrentReconciles: number;
  /** 0 disables the periodic resync */
  resyncPeriodMs: number;
  /** Restrict Certificates and Secrets to one namespace */
  watchNamespace?: string;
  /** Server-side timeout of each watch connection */
  watchTimeoutSeconds?: number;
}

const DEFAULT_WATCH_TIMEOUT_SECONDS = 300;

export function certificatesPath(namespace?: string): string {
  return namespace
    ? `/apis/${API_VERSION}/namespaces/${namespace}/${CERTIFICATE_PLURAL}`
    : `/apis/${API_VERSION}/${CERTIFICATE_PLURAL}`;
}

export function secretsPath(namespace?: string): string {
  return namespace ? `/api/v1/namespaces/${namespace}/secrets` : '/api/v1/secrets';
}

export function certificateConfigsPath(): string {
  return `/apis/${API_VERSION}/${CERTIFICATE_CONFIG_PLURAL}`;
}

export class Manager {
  readonly certificateQueue = new WorkQueue();
  readonly configQueue = new WorkQueue();

  private readonly logger: OperatorLogger;
  private readonly controllers: Controller[];
  private readonly watchers: ResourceWatcher[];
  private readonly certificateFilter = new CertificateEventFilter();
  private resyncTimer: NodeJS.Timeout | undefined;
  private running: Promise<void> | undefined;
  private readonly abortController = new AbortController();

  constructor(private readonly options: ManagerOptions) {
    this.logger = options.logger ?? getComponentLogger('manager');

    const certificateReconciler = new CertificateReconciler({
      cluster: options.cluster,
      logger: this.logger.child({ controller: 'certificate' }),
      signal: this.abortController.signal,
      ...(options.issuanceClientBuilder && {
        issuanceClientBuilder: options.issuanceClientBuilder,
      }),
    });
    const configReconciler = new CertificateConfigReconciler({
      cluster: options.cluster,
      logger: this.logger.child({ controller: 'certificateconfig' }),
    });

    this.controllers = [
      new Controller({
        name: 'certificate',
        queue: this.certificateQueue,
        reconcile: (key) => certificateReconciler.reconcile(parseNamespacedKey(key)),
        logger: this.logger,
        concurrency: options.maxConcurrentReconciles,
      }),
      new Controller({
        name: 'certificateconfig',
        queue: this.configQueue,
        reconcile: (name) => configReconciler.reconcile(name),
        logger: this.logger,
        concurrency: options.maxConcurrentReconciles,
      }),
    ];

    const timeoutSeconds = options.watchTimeoutSeconds ?? DEFAULT_WATCH_TIMEOUT_SECONDS;
    const namespace = options.watchNamespace;
    this.watchers = [
      new ResourceWatcher({
        path: certificatesPath(namespace),
        watchFactory: options.watchFactory,
        onEvent: (phase, object) => this.onCertificateEvent(phase, object),
        logger: this.logger,
        timeoutSeconds,
      }),
      new ResourceWatcher({
        path: secretsPath(namespace),
        watchFactory: options.watchFactory,
        onEvent: (phase, object) => {
          const key = secretEventKey(phase, object);
          if (key) {
            this.certificateQueue.add(key);
          }
        },
        logger: this.logger,
        timeoutSeconds,
      }),
      new ResourceWatcher({
        path: certificateConfigsPath(),
        watchFactory: options.watchFactory,
        onEvent: (_phase, object) => {
          const name = clusterScopedKey(object);
          if (name) {
            this.configQueue.add(name);
          }
        },
        logger: this.logger,
        timeoutSeconds,
      }),
    ];
  }

  /**
   * Start watches, workers and resync. The returned promise settles after
   * `stop` once every worker has finished.
   */
  start(): Promise<void> {
    if (this.running) {
      return this.running;
    }

    for (const watcher of this.watchers) {
      watcher.start();
    }

    if (this.options.resyncPeriodMs > 0) {
      this.resyncTimer = setInterval(() => {
        this.resync().catch((error: unknown) => {
          this.logger.warn('Resync failed', { error: errorMessage(error) });
        });
      }, this.options.resyncPeriodMs);
    }

    this.logger.info('Manager started', {
      watchNamespace: this.options.watchNamespace ?? '(all)',
      maxConcurrentReconciles: this.options.maxConcurrentReconciles,
      resyncPeriodMs: this.options.resyncPeriodMs,
    });

    this.running = Promise.all(this.controllers.map((controller) => controller.start())).then(
      () => undefined
    );
    return this.running;
  }

  /**
   * Stop watching and shut the queues down. Calls to the issuance service in
   * flight are aborted. A stopped manager cannot be started again.
   */
  async stop(): Promise<void> {
    this.logger.info('Stopping manager');
    if (this.resyncTimer) {
      clearInterval(this.resyncTimer);
      this.resyncTimer = undefined;
    }
    for (const watcher of this.watchers) {
      watcher.stop();
    }
    this.abortController.abort();
    this.certificateQueue.shutDown();
    this.configQueue.shutDown();

    await this.running;
    this.running = undefined;
    this.logger.info('Manager stopped');
  }

  /**
   * Enqueue every Certificate and CertificateConfig
   */
  async resync(): Promise<void> {
    const [certificates, configs] = await Promise.all([
      this.options.cluster.listCertificates(this.options.watchNamespace),
      this.options.cluster.listCertificateConfigs(),
    ]);
    for (const certificate of certificates) {
      this.certificateQueue.add(certificateKey(certificate));
    }
    for (const config of configs) {
      this.configQueue.add(config.metadata.name);
    }
    this.logger.debug('Resync enqueued resources', {
      certificates: certificates.length,
      certificateConfigs: configs.length,
    });
  }

  private onCertificateEvent(phase: WatchPhase, object: unknown): void {
    const key = this.certificateFilter.keyFor(phase, object);
    if (key) {
      this.certificateQueue.add(key);
    }
    if (phase === 'DELETED') {
      const configName = configRefOf(object);
      if (configName) {
        this.configQueue.add(configName);
      }
    }
  }
}
