/**
 * Resource Applier
 *
 * Create-or-patch of rendered documents in a fixed kind order. A document
 * whose spec-hash annotation matches the live object, and whose fields all
 * still hold on it, is not sent at all, so a converged deployment costs
 * reads only.
 */

import type { ApiRetryPolicy } from '../config/run-context.js';
import { ApplyError, formatResourceRef } from '../errors.js';
import type { ClusterClient } from '../kubernetes/cluster-client.js';
import {
  extractSecurityViolations,
  formatKubernetesError,
  getErrorReason,
  getErrorStatusCode,
  isConflictError,
} from '../kubernetes/errors.js';
import { getComponentLogger, type KubeconvergeLogger } from '../logging/index.js';
import { readSpecHash } from '../rendering/hash.js';
import { type ClusterObject, type ResourceRef, toResourceRef } from '../types/kubernetes.js';
import type { AppliedResourceResult } from '../types/state.js';
import { withRetry } from '../utils/retry.js';
import { findDrift } from './drift.js';

/**
 * Storage and configuration first, then stateful and stateless workloads,
 * then what exposes them.
 */
export const KIND_APPLY_ORDER: Readonly<Record<string, number>> = {
  Namespace: 0,
  Secret: 0,
  ConfigMap: 0,
  PersistentVolumeClaim: 0,
  StatefulSet: 1,
  Deployment: 2,
  Service: 3,
  Route: 4,
};

const UNKNOWN_KIND_RANK = 5;

export function kindRank(kind: string): number {
  return KIND_APPLY_ORDER[kind] ?? UNKNOWN_KIND_RANK;
}

/**
 * Stable sort by kind rank; documents of the same rank keep their order
 */
export function sortForApply<T extends { kind: string }>(resources: readonly T[]): T[] {
  return resources
    .map((resource, index) => ({ resource, index }))
    .sort((a, b) => kindRank(a.resource.kind) - kindRank(b.resource.kind) || a.index - b.index)
    .map(({ resource }) => resource);
}

export interface ApplyOutcome {
  /** Every resource handled before the first failure, in apply order */
  resources: AppliedResourceResult[];
  error?: ApplyError;
}

export interface ApplyOptions {
  retry?: ApiRetryPolicy;
  signal?: AbortSignal;
  logger?: KubeconvergeLogger;
}

export function toApplyError(ref: ResourceRef, cause: unknown): ApplyError {
  const violations = extractSecurityViolations(cause);
  const statusCode = getErrorStatusCode(cause);
  let message = `Failed to apply ${formatResourceRef(ref)}: ${formatKubernetesError(cause)}`;
  if (violations.length > 0) {
    message += `\nViolated security constraints:\n${violations.map((v) => `  - ${v}`).join('\n')}`;
  }
  return new ApplyError(ref, cause, statusCode, getErrorReason(cause), violations, message);
}

export class ResourceApplier {
  private logger = getComponentLogger('resource-applier');

  constructor(private readonly client: ClusterClient) {}

  /**
   * Apply documents in kind order. Stops at the first failure; what was
   * applied before it stays applied.
   */
  async apply(resources: readonly ClusterObject[], options: ApplyOptions = {}): Promise<ApplyOutcome> {
    const logger = options.logger ?? this.logger;
    const results: AppliedResourceResult[] = [];

    for (const resource of sortForApply(resources)) {
      const ref = toResourceRef(resource);
      try {
        const result = await this.applyOne(resource, options);
        results.push(result);
        logger.debug('Resource applied', {
          resource: formatResourceRef(ref),
          operation: result.operation,
        });
      } catch (error) {
        const applyError = toApplyError(ref, error);
        logger.error('Resource rejected', applyError, {
          resource: formatResourceRef(ref),
          statusCode: applyError.statusCode,
          violations: applyError.violations,
        });
        return { resources: results, error: applyError };
      }
    }

    return { resources: results };
  }

  private async applyOne(resource: ClusterObject, options: ApplyOptions): Promise<AppliedResourceResult> {
    const ref = toResourceRef(resource);
    const key = formatResourceRef(ref);
    const retry = { ...options.retry, ...(options.signal && { signal: options.signal }) };

    const desiredHash = readSpecHash(resource);
    const live = await withRetry(() => this.client.read(ref), `read ${key}`, retry);

    if (!live) {
      try {
        const created = await withRetry(() => this.client.create(resource), `create ${key}`, retry);
        return { ref, operation: 'created', ...this.version(created) };
      } catch (error) {
        // Another writer created it between our read and create
        if (!isConflictError(error)) {
          throw error;
        }
        this.logger.debug('Create conflicted, patching instead', { resource: key });
      }
    } else if (desiredHash !== undefined && readSpecHash(live) === desiredHash) {
      const drifted = findDrift(resource, live);
      if (!drifted) {
        return { ref, operation: 'unchanged', ...this.version(live) };
      }
      this.logger.info('Live object drifted from its rendered spec', { resource: key, field: drifted });
    }

    const patched = await withRetry(() => this.client.patch(resource), `patch ${key}`, retry);
    return { ref, operation: 'configured', ...this.version(patched) };
  }

  private version(object: ClusterObject): { resourceVersion?: string } {
    const { resourceVersion } = object.metadata;
    return resourceVersion ? { resourceVersion } : {};
  }
}
