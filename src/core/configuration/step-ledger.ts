/**
 * Step ledger
 *
 * Completed configuration steps are recorded in a ConfigMap next to the
 * deployment, keyed by step id, so a step that failed (or never ran
 * because the run ended early) is retried on the next run even when its
 * target is unchanged. The value is a hash of what the step runs; editing
 * a step's command makes it due again.
 */

import type { ApiRetryPolicy } from '../config/run-context.js';
import type { ClusterClient } from '../kubernetes/cluster-client.js';
import { getComponentLogger, type KubeconvergeLogger } from '../logging/index.js';
import { canonicalJson, sha256 } from '../rendering/hash.js';
import { deploymentLabels } from '../rendering/labels.js';
import { type ClusterObject, isRecord, type ResourceRef } from '../types/kubernetes.js';
import type { ConfigStepSpec } from '../types/spec.js';
import { errorMessage } from '../utils/error-helpers.js';
import { type RetryOptions, withRetry } from '../utils/retry.js';

export function stepLedgerName(deploymentName: string): string {
  return `${deploymentName}-config-steps`;
}

export function stepFingerprint(step: ConfigStepSpec): string {
  return sha256(canonicalJson({ target: step.target, command: step.command, container: step.container ?? null }));
}

export interface StepLedgerOptions {
  namespace: string;
  deploymentName: string;
  retry?: ApiRetryPolicy;
  signal?: AbortSignal;
  logger?: KubeconvergeLogger;
}

export class StepLedger {
  /**
   * Undefined when the ledger could not be read; every step then counts
   * as completed so nothing reruns on an unchanged target
   */
  private entries: Record<string, string> | undefined;
  private stored: Record<string, string> = {};
  private exists = false;
  private readonly logger: KubeconvergeLogger;

  constructor(
    private readonly client: ClusterClient,
    private readonly options: StepLedgerOptions
  ) {
    this.logger = options.logger ?? getComponentLogger('step-ledger');
  }

  private ref(): ResourceRef {
    return {
      apiVersion: 'v1',
      kind: 'ConfigMap',
      name: stepLedgerName(this.options.deploymentName),
      namespace: this.options.namespace,
    };
  }

  private retry(): RetryOptions {
    return { ...this.options.retry, ...(this.options.signal && { signal: this.options.signal }) };
  }

  async load(): Promise<void> {
    const ref = this.ref();
    try {
      const live = await withRetry(() => this.client.read(ref), `read ConfigMap ${ref.name}`, this.retry());
      this.exists = live !== undefined;
      const entries: Record<string, string> = {};
      if (live && isRecord(live.data)) {
        for (const [id, fingerprint] of Object.entries(live.data)) {
          if (typeof fingerprint === 'string') {
            entries[id] = fingerprint;
          }
        }
      }
      this.stored = entries;
      this.entries = { ...entries };
    } catch (error) {
      this.entries = undefined;
      this.logger.warn('Could not read the configuration step ledger', { ledger: ref.name, error: errorMessage(error) });
    }
  }

  isCompleted(step: ConfigStepSpec): boolean {
    return this.entries === undefined || this.entries[step.id] === stepFingerprint(step);
  }

  markSucceeded(step: ConfigStepSpec): void {
    if (this.entries) {
      this.entries[step.id] = stepFingerprint(step);
    }
  }

  markFailed(step: ConfigStepSpec): void {
    if (this.entries) {
      delete this.entries[step.id];
    }
  }

  /**
   * Write the ledger back when it changed. A failed write is logged; the
   * steps it would have recorded run again next time.
   */
  async save(): Promise<void> {
    const entries = this.entries;
    if (!entries || canonicalJson(entries) === canonicalJson(this.stored)) {
      return;
    }

    const ref = this.ref();
    const data: Record<string, string | null> = { ...entries };
    for (const id of Object.keys(this.stored)) {
      if (!(id in entries)) {
        data[id] = null;
      }
    }
    const ledger: ClusterObject = {
      apiVersion: 'v1',
      kind: 'ConfigMap',
      metadata: {
        name: ref.name,
        namespace: this.options.namespace,
        labels: deploymentLabels(this.options.deploymentName),
      },
      data: this.exists ? data : entries,
    };

    try {
      if (this.exists) {
        await withRetry(() => this.client.patch(ledger), `patch ConfigMap ${ref.name}`, this.retry());
      } else {
        await withRetry(() => this.client.create(ledger), `create ConfigMap ${ref.name}`, this.retry());
        this.exists = true;
      }
      this.stored = { ...entries };
      this.logger.debug('Configuration step ledger saved', { ledger: ref.name, completed: Object.keys(entries) });
    } catch (error) {
      this.logger.warn('Could not save the configuration step ledger', { ledger: ref.name, error: errorMessage(error) });
    }
  }
}
