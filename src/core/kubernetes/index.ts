/**
 * Kubernetes Module
 *
 * Client provider, the ClusterClient seam, network probes and error
 * classification for raw API errors.
 */

export {
  KubernetesClientProvider,
  createKubernetesClientProvider,
  getKubernetesClientProvider,
} from './client-provider.js';
export type { KubernetesClientConfig } from './client-provider.js';

export { FIELD_MANAGER, KubernetesClusterClient, exitCodeFromStatus, runExecSession } from './cluster-client.js';
export type { ClusterClient, ExecSession, KubernetesClusterClientOptions } from './cluster-client.js';

export { DefaultNetworkProber } from './network-prober.js';
export type { NetworkProber } from './network-prober.js';

export {
  extractSecurityViolations,
  formatKubernetesError,
  getErrorDetails,
  getErrorReason,
  getErrorStatusCode,
  isConflictError,
  isNotFoundError,
  isRetryableError,
} from './errors.js';
export type { KubernetesStatusBody } from './errors.js';
