/**
 * Kubernetes Client Provider
 *
 * Owns KubeConfig loading and API client instantiation so every module
 * talks to the cluster with the same context and credentials.
 */

import * as k8s from '@kubernetes/client-node';
import { getComponentLogger } from '../logging/index.js';
import { errorMessage } from '../utils/error-helpers.js';

/**
 * Configuration options for the Kubernetes client provider
 */
export interface KubernetesClientConfig {
  /**
   * Custom kubeconfig file path. When absent, client-node's default lookup
   * applies: $KUBECONFIG, ~/.kube/config, then the in-cluster service account.
   */
  kubeconfigPath?: string;

  /**
   * Context to switch to after loading
   */
  context?: string;

  /**
   * SECURITY WARNING: Only set to true in non-production environments.
   * This disables TLS certificate verification for the current cluster.
   *
   * @default false
   */
  skipTLSVerify?: boolean;
}

export class KubernetesClientProvider {
  private static instance: KubernetesClientProvider | null = null;
  private kubeConfig: k8s.KubeConfig | null = null;
  private logger = getComponentLogger('kubernetes-client-provider');

  private constructor() {}

  static getInstance(): KubernetesClientProvider {
    if (!KubernetesClientProvider.instance) {
      KubernetesClientProvider.instance = new KubernetesClientProvider();
    }
    return KubernetesClientProvider.instance;
  }

  /**
   * Create a new, non-singleton instance
   */
  static createInstance(config?: KubernetesClientConfig): KubernetesClientProvider {
    const instance = new KubernetesClientProvider();
    instance.initialize(config);
    return instance;
  }

  static reset(): void {
    KubernetesClientProvider.instance = null;
  }

  /**
   * Load the kubeconfig. Calling it again replaces the loaded configuration.
   */
  initialize(config: KubernetesClientConfig = {}): void {
    this.logger.debug('Initializing Kubernetes client provider', {
      kubeconfigPath: config.kubeconfigPath,
      context: config.context,
      skipTLSVerify: config.skipTLSVerify,
    });

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
      const enhancedError = new Error(
        `Failed to initialize Kubernetes client provider: ${errorMessage(error)}`
      );
      enhancedError.cause = error;
      throw enhancedError;
    }

    const cluster = kc.getCurrentCluster();
    if (config.skipTLSVerify === true && cluster) {
      this.logger.warn('TLS verification disabled for cluster', { cluster: cluster.name });
      kc.clusters = kc.clusters.map((c) =>
        c.name === cluster.name ? { ...c, skipTLSVerify: true } : c
      );
    }

    this.kubeConfig = kc;
    this.logger.info('Kubernetes client provider initialized', {
      currentContext: kc.getCurrentContext(),
      server: kc.getCurrentCluster()?.server,
    });
  }

  /**
   * Use a KubeConfig that was loaded elsewhere
   */
  initializeWithKubeConfig(kubeConfig: k8s.KubeConfig): void {
    this.kubeConfig = kubeConfig;
    this.logger.debug('Kubernetes client provider initialized with pre-configured KubeConfig', {
      currentContext: kubeConfig.getCurrentContext(),
    });
  }

  isInitialized(): boolean {
    return this.kubeConfig !== null;
  }

  getKubeConfig(): k8s.KubeConfig {
    if (!this.kubeConfig) {
      throw new Error('KubernetesClientProvider not initialized. Call initialize() first.');
    }
    return this.kubeConfig;
  }

  getKubernetesApi(): k8s.KubernetesObjectApi {
    return k8s.KubernetesObjectApi.makeApiClient(this.getKubeConfig());
  }

  getCoreV1Api(): k8s.CoreV1Api {
    return this.getKubeConfig().makeApiClient(k8s.CoreV1Api);
  }

  getExec(): k8s.Exec {
    return new k8s.Exec(this.getKubeConfig());
  }
}

/**
 * Get the shared provider, loading the default kubeconfig on first use
 */
export function getKubernetesClientProvider(config?: KubernetesClientConfig): KubernetesClientProvider {
  const provider = KubernetesClientProvider.getInstance();
  if (!provider.isInitialized() || config) {
    provider.initialize(config);
  }
  return provider;
}

export function createKubernetesClientProvider(config?: KubernetesClientConfig): KubernetesClientProvider {
  return KubernetesClientProvider.createInstance(config);
}
