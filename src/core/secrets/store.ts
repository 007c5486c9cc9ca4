/**
 * Credential Store
 *
 * Generate-once semantics for Kubernetes Secrets: an existing secret is
 * never regenerated, so every run after the first sees the same values.
 */

import type { ApiRetryPolicy } from '../config/run-context.js';
import { SecretStoreError } from '../errors.js';
import type { ClusterClient } from '../kubernetes/cluster-client.js';
import { formatKubernetesError, isConflictError } from '../kubernetes/errors.js';
import { getComponentLogger, type KubeconvergeLogger } from '../logging/index.js';
import { deploymentLabels } from '../rendering/labels.js';
import { type ClusterObject, isRecord, type ResourceRef } from '../types/kubernetes.js';
import type { SecretRecord } from '../types/state.js';
import type { SecretFieldSpec } from '../types/spec.js';
import { withRetry } from '../utils/retry.js';
import { resolveSecretFields } from './generator.js';

export const CREATED_AT_ANNOTATION = 'kubeconverge.io/created-at';

export interface SecretStoreOptions {
  namespace: string;
  deploymentName: string;
  retry?: ApiRetryPolicy;
  logger?: KubeconvergeLogger;
}

export interface EnsureSecretOptions {
  /** Component that consumes the secret, used for its name label */
  component?: string;
  signal?: AbortSignal;
}

function decodeData(secret: ClusterObject): Record<string, string> {
  const values: Record<string, string> = {};
  if (isRecord(secret.data)) {
    for (const [key, encoded] of Object.entries(secret.data)) {
      if (typeof encoded === 'string') {
        values[key] = Buffer.from(encoded, 'base64').toString('utf8');
      }
    }
  }
  return values;
}

function createdAtOf(secret: ClusterObject): Date {
  const candidates = [secret.metadata.annotations?.[CREATED_AT_ANNOTATION], secret.metadata.creationTimestamp];
  for (const candidate of candidates) {
    if (candidate === undefined) {
      continue;
    }
    const date = candidate instanceof Date ? candidate : new Date(candidate);
    if (!Number.isNaN(date.getTime())) {
      return date;
    }
  }
  return new Date(0);
}

export class SecretStore {
  private readonly logger: KubeconvergeLogger;
  /** Tail of the in-flight chain per secret name; never rejects */
  private readonly inFlight = new Map<string, Promise<void>>();

  constructor(
    private readonly client: ClusterClient,
    private readonly options: SecretStoreOptions
  ) {
    this.logger = options.logger ?? getComponentLogger('secret-store');
  }

  /**
   * Return the secret's values, creating it first if it does not exist.
   * Calls for the same name run one after another.
   *
   * @throws SecretStoreError when the secret can be neither read nor created
   */
  ensureSecret(
    name: string,
    fields: Readonly<Record<string, SecretFieldSpec>>,
    options: EnsureSecretOptions = {}
  ): Promise<SecretRecord> {
    const previous = this.inFlight.get(name) ?? Promise.resolve();
    const run = previous.then(() => this.ensureNow(name, fields, options));
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.inFlight.set(name, tail);
    void tail.then(() => {
      if (this.inFlight.get(name) === tail) {
        this.inFlight.delete(name);
      }
    });
    return run;
  }

  private ref(name: string): ResourceRef {
    return { apiVersion: 'v1', kind: 'Secret', name, namespace: this.options.namespace };
  }

  private async ensureNow(
    name: string,
    fields: Readonly<Record<string, SecretFieldSpec>>,
    options: EnsureSecretOptions
  ): Promise<SecretRecord> {
    const ref = this.ref(name);
    const retry = { ...this.options.retry, ...(options.signal && { signal: options.signal }) };

    try {
      const existing = await withRetry(() => this.client.read(ref), `read Secret ${name}`, retry);
      if (existing) {
        return this.fromExisting(existing, fields);
      }

      const values = resolveSecretFields(fields);
      const createdAt = new Date();
      const secret: ClusterObject = {
        apiVersion: 'v1',
        kind: 'Secret',
        metadata: {
          name,
          namespace: this.options.namespace,
          labels: deploymentLabels(this.options.deploymentName, options.component),
          annotations: { [CREATED_AT_ANNOTATION]: createdAt.toISOString() },
        },
        type: 'Opaque',
        stringData: values,
      };

      try {
        await withRetry(() => this.client.create(secret), `create Secret ${name}`, retry);
      } catch (error) {
        if (!isConflictError(error)) {
          throw error;
        }
        // Another writer created it first; its values win
        const winner = await withRetry(() => this.client.read(ref), `read Secret ${name}`, retry);
        if (!winner) {
          throw new SecretStoreError(`Secret '${name}' conflicted on create but cannot be read`, name, error);
        }
        this.logger.info('Secret created concurrently, using existing values', { secret: name });
        return this.fromExisting(winner, fields);
      }

      this.logger.info('Secret created', { secret: name, keys: Object.keys(values) });
      return { name, values: Object.freeze(values), createdAt, created: true };
    } catch (error) {
      if (error instanceof SecretStoreError) {
        throw error;
      }
      throw new SecretStoreError(
        `Failed to ensure secret '${name}': ${formatKubernetesError(error)}`,
        name,
        error
      );
    }
  }

  private fromExisting(secret: ClusterObject, fields: Readonly<Record<string, SecretFieldSpec>>): SecretRecord {
    const name = secret.metadata.name;
    const values = decodeData(secret);
    const missing = Object.keys(fields).filter((key) => !(key in values));
    if (missing.length > 0) {
      this.logger.warn('Existing secret lacks declared keys; it is left unchanged', {
        secret: name,
        missing,
      });
    } else {
      this.logger.debug('Secret exists, reusing values', { secret: name });
    }
    return { name, values: Object.freeze(values), createdAt: createdAtOf(secret), created: false };
  }
}
