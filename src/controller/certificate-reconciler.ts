/**
 * Certificate reconciler
 *
 * Drives one Certificate towards an issued certificate stored in its TLS
 * Secret. A pass walks these states, stopping early when the recorded
 * certificate is still valid and its Secret is in place:
 *
 *   Start -> ConfigLoaded -> ValidityChecked -> {UpToDate | NeedsIssuance}
 *         -> Issued -> ValidityFetched -> Downloaded -> SecretMaterialized -> Done
 *
 * A failing pipeline step records the singleton `Error` condition with the
 * step's reason, writes the status and throws. A successful pass clears it.
 */

import type * as k8s from '@kubernetes/client-node';
import {
  type Certificate,
  type CertificateConfig,
  archiveForm,
  certificateKey,
} from '../api/v1alpha1/index.js';
import { decodeArchive, type TLSMaterial } from '../certificates/decoder.js';
import {
  buildTlsSecret,
  createOrUpdateTlsSecret,
  setOwnerReference,
} from '../certificates/secret-materializer.js';
import {
  createIssuanceClient,
  type DownloadResponse,
  type IssuanceClient,
  type IssuanceClientBuilder,
  issueRequestFromSpec,
  type ValidityResponse,
} from '../clients/issuance/index.js';
import {
  ClusterError,
  ConfigurationError,
  ReconcileError,
  RequeueAfterError,
  errorMessage,
} from '../core/errors.js';
import {
  type ClusterClient,
  type NamespacedName,
  getErrorStatusCode,
  isNotFoundError,
} from '../core/kubernetes/index.js';
import { getComponentLogger, getResourceLogger, type OperatorLogger } from '../core/logging/index.js';
import { parseIssuanceTimestamp, subtractDays } from '../core/utils/time.js';
import {
  CONDITION_ERROR,
  ConditionReason,
  errorCondition,
  hasNotFoundErrorCondition,
  mentionsNotFound,
} from './conditions.js';

/**
 * Delay before retrying a Certificate whose guid the issuance service does
 * not know yet
 */
export const NOT_FOUND_REQUEUE_DELAY_MS = 5_000;

export interface CertificateReconcilerOptions {
  cluster: ClusterClient;
  issuanceClientBuilder?: IssuanceClientBuilder;
  logger?: OperatorLogger;
  /** Current time, overridable in tests */
  clock?: () => Date;
  /** Cancels in-flight calls to the issuance service */
  signal?: AbortSignal;
}

function wrap(prefix: string, error: unknown): string {
  return `${prefix}: ${errorMessage(error)}`;
}

export class CertificateReconciler {
  private readonly cluster: ClusterClient;
  private readonly buildIssuanceClient: IssuanceClientBuilder;
  private readonly logger: OperatorLogger;
  private readonly clock: () => Date;
  private readonly signal: AbortSignal | undefined;

  constructor(options: CertificateReconcilerOptions) {
    this.cluster = options.cluster;
    this.buildIssuanceClient = options.issuanceClientBuilder ?? createIssuanceClient;
    this.logger = options.logger ?? getComponentLogger('certificate-reconciler');
    this.clock = options.clock ?? (() => new Date());
    this.signal = options.signal;
  }

  async reconcile(request: NamespacedName): Promise<void> {
    const log = getResourceLogger(this.logger, `${request.namespace}/${request.name}`);
    log.info('Starting reconcile');

    let certificate: Certificate;
    try {
      certificate = await this.cluster.getCertificate(request);
    } catch (error) {
      if (isNotFoundError(error)) {
        log.debug('Certificate no longer exists');
        return;
      }
      throw new ClusterError(wrap('failed to get Certificate', error), getErrorStatusCode(error), {
        cause: error,
      });
    }

    const config = await this.loadConfig(certificate);
    const client = await this.loadIssuanceClient(config, log);

    if (this.isCertificateValid(certificate, config)) {
      await this.removeErrorCondition(certificate);

      if (config.spec.forceExpirationUpdate) {
        await this.forceExpirationUpdate(client, certificate, log);
      }

      if (await this.isSecretUpToDate(certificate, request.namespace)) {
        log.debug('Certificate is valid and its secret is up to date');
        return;
      }
    }

    await this.runStep(certificate, () => this.issue(client, certificate, log));

    try {
      await this.updateValidity(client, certificate);
    } catch (error) {
      await this.recordFailure(certificate, error);
      if (
        error instanceof ReconcileError &&
        error.reason === ConditionReason.GetCertDataFromCertAPIFailed &&
        mentionsNotFound(error.message)
      ) {
        log.info('Certificate not known to the issuance service yet, requeueing', {
          delayMs: NOT_FOUND_REQUEUE_DELAY_MS,
        });
        throw new RequeueAfterError(error.message, NOT_FOUND_REQUEUE_DELAY_MS, { cause: error });
      }
      throw error;
    }

    const material = await this.runStep(certificate, () => this.download(client, certificate));
    await this.runStep(certificate, () =>
      this.materialize(certificate, material, request.namespace, log)
    );

    await this.removeErrorCondition(certificate);
    log.info('Certificate reconciled', { secret: certificate.spec.secretName });
  }

  /**
   * A certificate is valid while `validTo` lies after now minus the renewal window
   */
  isCertificateValid(certificate: Certificate, config: CertificateConfig): boolean {
    const validity = certificate.status.validity;
    if (!validity) {
      return false;
    }
    const renewDate = subtractDays(this.clock(), config.spec.daysBeforeRenewal);
    return validity.validTo.getTime() > renewDate.getTime();
  }

  private async loadConfig(certificate: Certificate): Promise<CertificateConfig> {
    try {
      return await this.cluster.getCertificateConfig(certificate.spec.configRef.name);
    } catch (error) {
      certificate.status.conditions.set(
        errorCondition(ConditionReason.ConfigRetrievalFailed, error),
        this.clock()
      );
      try {
        await this.writeStatus(certificate);
      } catch (updateError) {
        throw new ClusterError(
          wrap('failed to create Certificate', updateError),
          getErrorStatusCode(updateError),
          { cause: updateError }
        );
      }
      throw new ClusterError(wrap('failed to create Certificate', error), getErrorStatusCode(error), {
        cause: error,
      });
    }
  }

  private async loadIssuanceClient(
    config: CertificateConfig,
    log: OperatorLogger
  ): Promise<IssuanceClient> {
    let secretData: Record<string, string> | undefined;
    try {
      const secret = await this.cluster.getSecret(config.spec.secretRef);
      secretData = secret.data;
    } catch (error) {
      throw new ClusterError(wrap('failed to get secret', error), getErrorStatusCode(error), {
        cause: error,
      });
    }

    try {
      return this.buildIssuanceClient(config, secretData, {
        logger: log,
        ...(this.signal && { signal: this.signal }),
      });
    } catch (error) {
      throw new ConfigurationError(
        wrap('failed to build issuance client', error),
        { config: config.metadata.name },
        { cause: error }
      );
    }
  }

  /**
   * The Secret needs no work when it still has the desired name and exists
   */
  private async isSecretUpToDate(certificate: Certificate, namespace: string): Promise<boolean> {
    const recorded = certificate.status.secretName;
    if (recorded !== certificate.spec.secretName || recorded === undefined) {
      return false;
    }

    try {
      await this.cluster.getSecret({ namespace, name: recorded });
      return true;
    } catch (error) {
      if (isNotFoundError(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Refresh the validity window of a valid certificate. A failure is recorded
   * on the Error condition and the pass carries on.
   */
  private async forceExpirationUpdate(
    client: IssuanceClient,
    certificate: Certificate,
    log: OperatorLogger
  ): Promise<void> {
    try {
      await this.updateValidity(client, certificate);
    } catch (error) {
      log.warn('Forced expiration update failed', { error: errorMessage(error) });
      await this.recordFailure(certificate, error);
    }
  }

  private async issue(
    client: IssuanceClient,
    certificate: Certificate,
    log: OperatorLogger
  ): Promise<void> {
    if (hasNotFoundErrorCondition(certificate.status.conditions)) {
      log.debug('Skipping issuance while the previous request is not found upstream', {
        guid: certificate.status.guid,
      });
      return;
    }

    let guid: string;
    try {
      guid = await client.issue(issueRequestFromSpec(certificate.spec));
    } catch (error) {
      throw this.stepError(ConditionReason.PostToCertAPIFailed, 'failed to create Certificate', error);
    }

    certificate.status.guid = guid;
    log.info('Requested certificate issuance', { guid });
    try {
      await this.writeStatus(certificate);
    } catch (error) {
      throw this.stepError(ConditionReason.StatusUpdateFailed, 'failed to create Certificate', error);
    }
  }

  private async updateValidity(client: IssuanceClient, certificate: Certificate): Promise<void> {
    const guid = certificate.status.guid;
    if (!guid) {
      throw new ReconcileError(
        'no issuance guid recorded in status',
        ConditionReason.GetCertDataFromCertAPIFailed
      );
    }

    let response: ValidityResponse;
    try {
      response = await client.fetchValidity(guid);
    } catch (error) {
      throw new ReconcileError(errorMessage(error), ConditionReason.GetCertDataFromCertAPIFailed, {
        cause: error,
      });
    }

    let validTo: Date;
    try {
      validTo = parseIssuanceTimestamp(response.validTo);
    } catch (error) {
      throw this.stepError(ConditionReason.ParseValidToFailed, 'failed to parse validTo', error);
    }

    let validFrom: Date;
    try {
      validFrom = parseIssuanceTimestamp(response.validFrom);
    } catch (error) {
      throw this.stepError(ConditionReason.ParseValidFromFailed, 'failed to parse validFrom', error);
    }

    certificate.status.validity = { validFrom, validTo };
    if (response.signatureHashAlgorithm) {
      certificate.status.signatureHashAlgorithm = response.signatureHashAlgorithm;
    } else {
      delete certificate.status.signatureHashAlgorithm;
    }

    try {
      await this.writeStatus(certificate);
    } catch (error) {
      throw this.stepError(
        ConditionReason.StatusUpdateFailed,
        'failed to update Certificate status',
        error
      );
    }
  }

  private async download(client: IssuanceClient, certificate: Certificate): Promise<TLSMaterial> {
    const guid = certificate.status.guid ?? '';

    let archive: DownloadResponse;
    try {
      archive = await client.download(guid, archiveForm(certificate.spec));
    } catch (error) {
      throw this.stepError(
        ConditionReason.DownloadCertFromCertAPIFailed,
        'failed downloading certificate',
        error
      );
    }

    try {
      return decodeArchive(archive.data, archive.password);
    } catch (error) {
      throw this.stepError(ConditionReason.DecodeCertFailed, 'failed downloading certificate', error);
    }
  }

  private async materialize(
    certificate: Certificate,
    material: TLSMaterial,
    namespace: string,
    log: OperatorLogger
  ): Promise<void> {
    const built = buildTlsSecret(material, certificate, namespace);

    let secret: k8s.V1Secret;
    try {
      secret = setOwnerReference(certificate, built);
    } catch (error) {
      throw this.stepError(
        ConditionReason.SetOwnerRefFailed,
        `failed to set owner reference for secret ${certificate.spec.secretName}`,
        error
      );
    }

    try {
      await createOrUpdateTlsSecret(this.cluster, secret, log);
    } catch (error) {
      throw this.stepError(
        ConditionReason.CreateOrUpdateTLSSecretFailed,
        'failed to create or update tls secret',
        error
      );
    }

    certificate.status.secretName = certificate.spec.secretName;
    try {
      await this.writeStatus(certificate);
    } catch (error) {
      throw this.stepError(
        ConditionReason.StatusUpdateFailed,
        'failed to update Certificate status',
        error
      );
    }
  }

  /**
   * Run a pipeline step, recording its failure on the Error condition
   */
  private async runStep<T>(certificate: Certificate, step: () => Promise<T>): Promise<T> {
    try {
      return await step();
    } catch (error) {
      await this.recordFailure(certificate, error);
      throw error;
    }
  }

  /**
   * Set the Error condition for a failed step and write the status. Errors
   * that are not step failures pass through untouched.
   */
  private async recordFailure(certificate: Certificate, error: unknown): Promise<void> {
    if (!(error instanceof ReconcileError)) {
      return;
    }

    const cause = error.cause ?? error;
    certificate.status.conditions.set(errorCondition(error.reason, cause), this.clock());
    await this.writeStatusOrFail(certificate);
  }

  private async removeErrorCondition(certificate: Certificate): Promise<void> {
    if (certificate.status.conditions.remove(CONDITION_ERROR)) {
      await this.writeStatusOrFail(certificate);
    }
  }

  private stepError(reason: ConditionReason, prefix: string, cause: unknown): ReconcileError {
    return new ReconcileError(wrap(prefix, cause), reason, { cause });
  }

  private async writeStatusOrFail(certificate: Certificate): Promise<void> {
    try {
      await this.writeStatus(certificate);
    } catch (error) {
      throw new ClusterError(
        wrap('failed to update Certificate status', error),
        getErrorStatusCode(error),
        { cause: error }
      );
    }
  }

  /**
   * Write the status subresource and adopt the new resourceVersion, keeping
   * the in-memory status as the source of truth for the rest of the pass
   */
  private async writeStatus(certificate: Certificate): Promise<void> {
    const stored = await this.cluster.updateCertificateStatus(certificate);
    certificate.metadata.resourceVersion = stored.metadata.resourceVersion;
    this.logger.trace('Wrote Certificate status', {
      certificate: certificateKey(certificate),
      resourceVersion: stored.metadata.resourceVersion,
    });
  }
}
