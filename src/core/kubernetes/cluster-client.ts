/**
 * Cluster Client
 *
 * The narrow surface the reconciler needs from the API server. Everything
 * above this layer depends on the `ClusterClient` interface only, which
 * keeps the applier, waiter and configurator testable with in-process fakes.
 */

import { Writable } from 'node:stream';
import * as k8s from '@kubernetes/client-node';
import { getComponentLogger } from '../logging/index.js';
import {
  type ClusterObject,
  type ExecResult,
  type ExecTarget,
  isClusterObject,
  type ResourceRef,
} from '../types/kubernetes.js';
import { type KubernetesClientProvider, getKubernetesClientProvider } from './client-provider.js';
import { isNotFoundError } from './errors.js';

export const FIELD_MANAGER = 'kubeconverge';

export interface ClusterClient {
  /** Returns undefined when the object does not exist */
  read(ref: ResourceRef): Promise<ClusterObject | undefined>;
  create(object: ClusterObject): Promise<ClusterObject>;
  /** JSON merge patch (RFC 7386) */
  patch(object: ClusterObject): Promise<ClusterObject>;
  /** Returns false when the object was already gone */
  delete(ref: ResourceRef): Promise<boolean>;
  list(
    apiVersion: string,
    kind: string,
    namespace?: string,
    labelSelector?: string
  ): Promise<ClusterObject[]>;
  /** Run a command in the first ready pod matching the target selector */
  exec(target: ExecTarget, command: string[]): Promise<ExecResult>;
}

export interface KubernetesClusterClientOptions {
  /** Upper bound for a single exec session */
  execTimeoutMs?: number;
}

class StringCollector extends Writable {
  private chunks: Buffer[] = [];

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: () => void): void {
    this.chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    callback();
  }

  text(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

/**
 * Map the exec status frame to a process exit code. A failed command
 * reports `NonZeroExitCode` with an `ExitCode` cause; other failures
 * (unknown binary, container gone) have no exit code and map to -1.
 */
export function exitCodeFromStatus(status: k8s.V1Status): number {
  if (status.status === 'Success') {
    return 0;
  }
  const cause = status.details?.causes?.find((c) => c.reason === 'ExitCode');
  const code = cause?.message !== undefined ? Number.parseInt(cause.message, 10) : Number.NaN;
  return Number.isNaN(code) ? -1 : code;
}

/** The part of an exec WebSocket the client needs */
export interface ExecSession {
  close(): void;
}

/**
 * Run one exec session and wait for its status frame. When the status does
 * not arrive within `timeoutMs` the session is closed (also when it is only
 * opened after the deadline) and the returned promise rejects.
 */
export function runExecSession<T>(
  start: (onStatus: (status: T) => void) => Promise<ExecSession>,
  timeoutMs: number,
  label: string
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let session: ExecSession | undefined;
    let expired = false;
    const timer = setTimeout(() => {
      expired = true;
      session?.close();
      reject(new Error(`exec in ${label} did not finish within ${timeoutMs}ms`));
    }, timeoutMs);

    start((status) => {
      clearTimeout(timer);
      resolve(status);
    }).then(
      (opened) => {
        session = opened;
        if (expired) {
          opened.close();
        }
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

function isPodReady(pod: k8s.V1Pod): boolean {
  return (
    !pod.metadata?.deletionTimestamp &&
    pod.status?.phase === 'Running' &&
    (pod.status.conditions ?? []).some((c) => c.type === 'Ready' && c.status === 'True')
  );
}

/**
 * ClusterClient backed by @kubernetes/client-node
 */
export class KubernetesClusterClient implements ClusterClient {
  private logger = getComponentLogger('cluster-client');
  private readonly objectApi: k8s.KubernetesObjectApi;
  private readonly coreApi: k8s.CoreV1Api;
  private readonly execApi: k8s.Exec;
  private readonly execTimeoutMs: number;

  constructor(
    provider: KubernetesClientProvider = getKubernetesClientProvider(),
    options: KubernetesClusterClientOptions = {}
  ) {
    this.objectApi = provider.getKubernetesApi();
    this.coreApi = provider.getCoreV1Api();
    this.execApi = provider.getExec();
    this.execTimeoutMs = options.execTimeoutMs ?? 300000;
  }

  async read(ref: ResourceRef): Promise<ClusterObject | undefined> {
    try {
      const { body } = await this.objectApi.read({
        apiVersion: ref.apiVersion,
        kind: ref.kind,
        metadata: {
          name: ref.name,
          ...(ref.namespace && { namespace: ref.namespace }),
        },
      });
      return this.expectObject(body, ref.kind);
    } catch (error) {
      if (isNotFoundError(error)) {
        return undefined;
      }
      throw error;
    }
  }

  async create(object: ClusterObject): Promise<ClusterObject> {
    const { body } = await this.objectApi.create(object, undefined, undefined, FIELD_MANAGER);
    return this.expectObject(body, object.kind);
  }

  async patch(object: ClusterObject): Promise<ClusterObject> {
    const { body } = await this.objectApi.patch(
      object,
      undefined,
      undefined,
      FIELD_MANAGER,
      undefined,
      {
        headers: {
          'Content-Type': k8s.PatchUtils.PATCH_FORMAT_JSON_MERGE_PATCH,
        },
      }
    );
    return this.expectObject(body, object.kind);
  }

  async delete(ref: ResourceRef): Promise<boolean> {
    try {
      await this.objectApi.delete(
        {
          apiVersion: ref.apiVersion,
          kind: ref.kind,
          metadata: {
            name: ref.name,
            ...(ref.namespace && { namespace: ref.namespace }),
          },
        },
        undefined,
        undefined,
        undefined,
        undefined,
        'Background'
      );
      return true;
    } catch (error) {
      if (isNotFoundError(error)) {
        return false;
      }
      throw error;
    }
  }

  async list(
    apiVersion: string,
    kind: string,
    namespace?: string,
    labelSelector?: string
  ): Promise<ClusterObject[]> {
    const { body } = await this.objectApi.list(
      apiVersion,
      kind,
      namespace,
      undefined,
      undefined,
      undefined,
      undefined,
      labelSelector
    );

    // List items come back without apiVersion and kind
    return body.items
      .map((item) => ({ ...item, apiVersion, kind }))
      .filter(isClusterObject);
  }

  async exec(target: ExecTarget, command: string[]): Promise<ExecResult> {
    const pod = await this.findReadyPod(target);
    const podName = pod.metadata?.name;
    const container = target.container ?? pod.spec?.containers[0]?.name;
    if (!podName || !container) {
      throw new Error(`Pod matching '${target.labelSelector}' has no name or containers`);
    }

    this.logger.debug('Executing command', {
      namespace: target.namespace,
      pod: podName,
      container,
      command: command[0],
    });

    const stdout = new StringCollector();
    const stderr = new StringCollector();

    const result = await runExecSession<k8s.V1Status>(
      (onStatus) =>
        this.execApi.exec(target.namespace, podName, container, command, stdout, stderr, null, false, onStatus),
      this.execTimeoutMs,
      `${podName}/${container}`
    );
    return {
      exitCode: exitCodeFromStatus(result),
      stdout: stdout.text(),
      stderr: result.status === 'Success' || !result.message
        ? stderr.text()
        : `${stderr.text()}${result.message}`,
    };
  }

  private async findReadyPod(target: ExecTarget): Promise<k8s.V1Pod> {
    const { body } = await this.coreApi.listNamespacedPod(
      target.namespace,
      undefined,
      undefined,
      undefined,
      undefined,
      target.labelSelector
    );
    const pod = body.items.find(isPodReady);
    if (!pod) {
      throw new Error(
        `No ready pod matches '${target.labelSelector}' in namespace ${target.namespace}`
      );
    }
    return pod;
  }

  private expectObject(body: unknown, kind: string): ClusterObject {
    if (!isClusterObject(body)) {
      throw new Error(`API server returned a malformed ${kind} object`);
    }
    return body;
  }
}
