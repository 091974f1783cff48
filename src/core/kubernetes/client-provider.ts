/**
 * Kubernetes Client Provider
 *
 * Loads the KubeConfig once and hands out API clients built from it, so every
 * component talks to the same cluster with the same credentials.
 */

import * as k8s from '@kubernetes/client-node';
import { getComponentLogger } from '../logging/index.js';
import { KubernetesClusterClient, type ClusterClient } from './cluster-client.js';

/**
 * Configuration options for the Kubernetes client provider
 */
export interface KubernetesClientConfig {
  /**
   * Custom kubeconfig file path. When omitted the default loading rules apply:
   * `KUBECONFIG`, `~/.kube/config`, then the in-cluster service account.
   */
  kubeconfigPath?: string;

  /**
   * Context to switch to after loading
   */
  context?: string;

  /**
   * SECURITY WARNING: Only set to true in non-production environments.
   * This disables TLS certificate verification of the API server.
   *
   * @default false (secure by default)
   */
  skipTLSVerify?: boolean;
}

export class KubernetesClientProvider {
  private readonly kubeConfig: k8s.KubeConfig;
  private readonly logger = getComponentLogger('kubernetes-client-provider');
  private coreApi: k8s.CoreV1Api | undefined;
  private customObjectsApi: k8s.CustomObjectsApi | undefined;

  private constructor(kubeConfig: k8s.KubeConfig) {
    this.kubeConfig = kubeConfig;
  }

  /**
   * Create a provider from kubeconfig loading rules
   */
  static fromConfig(config: KubernetesClientConfig = {}): KubernetesClientProvider {
    const kc = new k8s.KubeConfig();

    try {
      if (config.kubeconfigPath) {
        kc.loadFromFile(config.kubeconfigPath);
      } else {
        kc.loadFromDefault();
      }

      if (config.context) {
        kc.setCurrentContext(config.context);
      }
    } catch (error) {
      throw new Error(
        `Failed to load kubeconfig: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    const provider = new KubernetesClientProvider(kc);
    provider.applySecuritySettings(config);
    return provider;
  }

  /**
   * Create a provider around a pre-configured KubeConfig
   */
  static fromKubeConfig(kubeConfig: k8s.KubeConfig): KubernetesClientProvider {
    return new KubernetesClientProvider(kubeConfig);
  }

  getKubeConfig(): k8s.KubeConfig {
    return this.kubeConfig;
  }

  getCoreV1Api(): k8s.CoreV1Api {
    if (!this.coreApi) {
      this.coreApi = this.kubeConfig.makeApiClient(k8s.CoreV1Api);
      this.logger.debug('Created API client', { clientType: 'CoreV1Api' });
    }
    return this.coreApi;
  }

  getCustomObjectsApi(): k8s.CustomObjectsApi {
    if (!this.customObjectsApi) {
      this.customObjectsApi = this.kubeConfig.makeApiClient(k8s.CustomObjectsApi);
      this.logger.debug('Created API client', { clientType: 'CustomObjectsApi' });
    }
    return this.customObjectsApi;
  }

  /**
   * Watches are long-lived; each caller gets its own instance
   */
  createWatch(): k8s.Watch {
    return new k8s.Watch(this.kubeConfig);
  }

  createClusterClient(): ClusterClient {
    return new KubernetesClusterClient(this.getCoreV1Api(), this.getCustomObjectsApi());
  }

  private applySecuritySettings(config: KubernetesClientConfig): void {
    const cluster = this.kubeConfig.getCurrentCluster();

    if (config.skipTLSVerify === true && cluster) {
      this.logger.warn(
        'TLS verification disabled for the Kubernetes API server - this is insecure and should only be used in development',
        { server: cluster.server, security: 'tls-disabled' }
      );
      this.kubeConfig.clusters = this.kubeConfig.clusters.map((entry) =>
        entry.name === cluster.name ? { ...entry, skipTLSVerify: true } : entry
      );
    }

    this.logger.info('Kubernetes client provider initialized', {
      currentContext: this.kubeConfig.getCurrentContext(),
      server: this.kubeConfig.getCurrentCluster()?.server,
    });
  }
}
