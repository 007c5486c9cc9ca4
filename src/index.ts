/**
 * kubeconverge - converge a Kubernetes/OpenShift namespace to a declared
 * stack of components.
 */

export * from './core.js';

// =============================================================================
// PRESETS
// =============================================================================
export {
  CRON_INTERVAL_SECONDS,
  loadNginxConfig,
  NEXTCLOUD_BUCKET,
  NEXTCLOUD_IMAGES,
  NEXTCLOUD_ROUTE,
  nextcloudStack,
} from './presets/nextcloud.js';
export type { NextcloudStackOptions } from './presets/nextcloud.js';
