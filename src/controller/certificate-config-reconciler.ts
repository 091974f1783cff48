/**
 * CertificateConfig reconciler
 *
 * Keeps the dependencies finalizer on every CertificateConfig and releases it
 * on deletion only once no Certificate references the config any more.
 */

import {
  type Certificate,
  type CertificateConfig,
  DEPENDENCIES_FINALIZER,
  isBeingDeleted,
} from '../api/v1alpha1/index.js';
import { ClusterError, OperatorError, errorMessage } from '../core/errors.js';
import {
  type ClusterClient,
  getErrorStatusCode,
  isNotFoundError,
  listCertificatesForConfig,
} from '../core/kubernetes/index.js';
import { getComponentLogger, getResourceLogger, type OperatorLogger } from '../core/logging/index.js';

export const CERTIFICATES_EXIST_MESSAGE =
  'cannot delete CertificateConfig because associated Certificates exist';

export interface CertificateConfigReconcilerOptions {
  cluster: ClusterClient;
  logger?: OperatorLogger;
}

export class CertificateConfigReconciler {
  private readonly cluster: ClusterClient;
  private readonly logger: OperatorLogger;

  constructor(options: CertificateConfigReconcilerOptions) {
    this.cluster = options.cluster;
    this.logger = options.logger ?? getComponentLogger('certificate-config-reconciler');
  }

  async reconcile(name: string): Promise<void> {
    const log = getResourceLogger(this.logger, name);
    log.info('Starting reconcile');

    let config: CertificateConfig;
    try {
      config = await this.cluster.getCertificateConfig(name);
    } catch (error) {
      if (isNotFoundError(error)) {
        log.debug('CertificateConfig no longer exists');
        return;
      }
      throw new ClusterError(
        `failed to get CertificateConfig "${name}": ${errorMessage(error)}`,
        getErrorStatusCode(error),
        { cause: error }
      );
    }

    try {
      await this.cluster.getSecret(config.spec.secretRef);
    } catch (error) {
      throw new ClusterError(`failed to get secret: ${errorMessage(error)}`, getErrorStatusCode(error), {
        cause: error,
      });
    }

    config = await this.ensureFinalizer(config);

    if (isBeingDeleted(config)) {
      log.info('Deletion detected, checking for dependent Certificates');
      await this.releaseFinalizer(config, log);
    }
  }

  private async ensureFinalizer(config: CertificateConfig): Promise<CertificateConfig> {
    const finalizers = config.metadata.finalizers ?? [];
    if (finalizers.includes(DEPENDENCIES_FINALIZER)) {
      return config;
    }

    try {
      return await this.cluster.updateCertificateConfig({
        ...config,
        metadata: { ...config.metadata, finalizers: [...finalizers, DEPENDENCIES_FINALIZER] },
      });
    } catch (error) {
      throw new ClusterError(
        `error occurred while setting the finalizers of the CertificateConfig resource: ${errorMessage(error)}`,
        getErrorStatusCode(error),
        { cause: error }
      );
    }
  }

  private async releaseFinalizer(config: CertificateConfig, log: OperatorLogger): Promise<void> {
    let dependents: Certificate[];
    try {
      dependents = await listCertificatesForConfig(this.cluster, config.metadata.name);
    } catch (error) {
      throw new ClusterError(
        `failed to list Certificates: ${errorMessage(error)}`,
        getErrorStatusCode(error),
        { cause: error }
      );
    }

    if (dependents.length > 0) {
      log.info('Found associated Certificates', { count: dependents.length });
      throw new OperatorError(CERTIFICATES_EXIST_MESSAGE, 'DEPENDENTS_EXIST', {
        certificates: dependents.length,
      });
    }

    const finalizers = (config.metadata.finalizers ?? []).filter(
      (finalizer) => finalizer !== DEPENDENCIES_FINALIZER
    );
    try {
      await this.cluster.updateCertificateConfig({
        ...config,
        metadata: { ...config.metadata, finalizers },
      });
    } catch (error) {
      throw new ClusterError(
        'error occurred while deleting the finalizers of the CertificateConfig resource',
        getErrorStatusCode(error),
        { cause: error }
      );
    }

    log.info('Removed finalizer', { finalizer: DEPENDENCIES_FINALIZER });
  }
}
