/**
 * Cleanup
 *
 * Deletes everything labelled with a deployment instance, in reverse apply
 * order: routes and services go before the workloads, workloads before
 * their claims, config maps and secrets.
 */

import type { ApiRetryPolicy } from '../config/run-context.js';
import { ROUTE_API_VERSION } from '../config/hostname.js';
import { formatResourceRef, ValidationError } from '../errors.js';
import type { ClusterClient } from '../kubernetes/cluster-client.js';
import { formatKubernetesError, isNotFoundError } from '../kubernetes/errors.js';
import { getComponentLogger, type KubeconvergeLogger } from '../logging/index.js';
import { instanceSelector } from '../rendering/labels.js';
import { type ClusterObject, type ResourceRef, toResourceRef } from '../types/kubernetes.js';
import { withRetry } from '../utils/retry.js';
import { kindRank } from './applier.js';

export interface ManagedKind {
  apiVersion: string;
  kind: string;
}

export const MANAGED_KINDS: readonly ManagedKind[] = [
  { apiVersion: 'v1', kind: 'Secret' },
  { apiVersion: 'v1', kind: 'ConfigMap' },
  { apiVersion: 'v1', kind: 'PersistentVolumeClaim' },
  { apiVersion: 'apps/v1', kind: 'StatefulSet' },
  { apiVersion: 'apps/v1', kind: 'Deployment' },
  { apiVersion: 'v1', kind: 'Service' },
  { apiVersion: ROUTE_API_VERSION, kind: 'Route' },
];

export interface CleanupOptions {
  retainSecrets: boolean;
  retainVolumes: boolean;
  retry?: ApiRetryPolicy;
}

export interface CleanupFailure {
  ref: ResourceRef;
  message: string;
}

export interface CleanupResult {
  deleted: ResourceRef[];
  retained: ResourceRef[];
  failed: CleanupFailure[];
}

export function teardownKinds(): ManagedKind[] {
  return [...MANAGED_KINDS].sort((a, b) => kindRank(b.kind) - kindRank(a.kind));
}

export class ResourceCleaner {
  private readonly logger: KubeconvergeLogger;

  constructor(
    private readonly client: ClusterClient,
    logger?: KubeconvergeLogger
  ) {
    this.logger = logger ?? getComponentLogger('cleanup');
  }

  /**
   * Delete the deployment's objects. Failures are collected, not thrown,
   * so one stuck object does not keep the rest alive.
   *
   * @throws ValidationError when secrets would be deleted but volume claims
   *   kept; the next run would generate new credentials for the old data
   */
  async cleanup(deploymentName: string, namespace: string, options: CleanupOptions): Promise<CleanupResult> {
    if (!options.retainSecrets && options.retainVolumes) {
      throw new ValidationError(
        'Secrets can only be deleted together with the volume claims; the retained database volume ' +
          'still expects the current credentials',
        `deployment ${deploymentName}`,
        'retainSecrets',
        ['Delete the volume claims as well', 'Keep the secrets']
      );
    }

    const result: CleanupResult = { deleted: [], retained: [], failed: [] };
    const selector = instanceSelector(deploymentName);

    for (const { apiVersion, kind } of teardownKinds()) {
      let objects: ClusterObject[];
      try {
        objects = await withRetry(
          () => this.client.list(apiVersion, kind, namespace, selector),
          `list ${kind}`,
          options.retry
        );
      } catch (error) {
        // Route is not served outside OpenShift
        if (isNotFoundError(error)) {
          this.logger.debug('Kind not served by the cluster', { kind });
          continue;
        }
        throw error;
      }

      for (const object of objects) {
        const ref = toResourceRef(object);
        const retain =
          (kind === 'Secret' && options.retainSecrets) ||
          (kind === 'PersistentVolumeClaim' && options.retainVolumes);
        if (retain) {
          result.retained.push(ref);
          continue;
        }
        try {
          const existed = await withRetry(() => this.client.delete(ref), `delete ${kind}`, options.retry);
          if (existed) {
            result.deleted.push(ref);
          }
        } catch (error) {
          const message = formatKubernetesError(error);
          this.logger.warn('Failed to delete resource', { resource: formatResourceRef(ref), error: message });
          result.failed.push({ ref, message });
        }
      }
    }

    this.logger.info('Cleanup finished', {
      deployment: deploymentName,
      namespace,
      deleted: result.deleted.length,
      retained: result.retained.length,
      failed: result.failed.length,
    });
    return result;
  }
}
