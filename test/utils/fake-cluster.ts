/**
 * In-process stand-ins for the API server and the network prober
 */

import type { ClusterClient } from '../../src/core/kubernetes/cluster-client.js';
import type { NetworkProber } from '../../src/core/kubernetes/network-prober.js';
import {
  type ClusterObject,
  type ExecResult,
  type ExecTarget,
  isRecord,
  type ResourceRef,
  resourceKey,
  toResourceRef,
} from '../../src/core/types/kubernetes.js';

/**
 * Shaped like the HttpError thrown by @kubernetes/client-node 0.x
 */
export class FakeApiError extends Error {
  readonly body: { code: number; reason: string; message: string };

  constructor(
    readonly statusCode: number,
    reason: string,
    message: string
  ) {
    super(`HTTP request failed`);
    this.name = 'HttpError';
    this.body = { code: statusCode, reason, message };
  }
}

export function notFound(kind: string, name: string): FakeApiError {
  return new FakeApiError(404, 'NotFound', `${kind.toLowerCase()}s "${name}" not found`);
}

export function forbiddenBySecurityConstraints(name: string): FakeApiError {
  return new FakeApiError(
    403,
    'Forbidden',
    `pods "${name}" is forbidden: unable to validate against any security context constraint: [provider "anyuid": Forbidden: not usable by user or serviceaccount, spec.containers[0].securityContext.runAsUser: Invalid value: 0: must be in the ranges: [1000660000, 1000669999]]`
  );
}

export type FakeOperation = 'read' | 'create' | 'patch' | 'delete' | 'list';

interface FailureRule {
  operation: FakeOperation;
  kind?: string;
  name?: string;
  error: Error;
  /** Remaining failures; undefined fails forever */
  times?: number;
}

export type ExecHandler = (target: ExecTarget, command: string[]) => ExecResult | Promise<ExecResult>;

export interface ExecCall {
  target: ExecTarget;
  command: string[];
}

function mergePatch(target: unknown, patch: unknown): unknown {
  if (!isRecord(patch)) {
    return patch;
  }
  const result: Record<string, unknown> = isRecord(target) ? { ...target } : {};
  for (const [key, value] of Object.entries(patch)) {
    if (value === null) {
      delete result[key];
    } else if (value !== undefined) {
      result[key] = mergePatch(result[key], value);
    }
  }
  return result;
}

function matchesSelector(object: ClusterObject, selector: string | undefined): boolean {
  if (!selector) {
    return true;
  }
  const labels = object.metadata.labels ?? {};
  return selector.split(',').every((term) => {
    const [key = '', value] = term.split('=');
    return labels[key] === value;
  });
}

function desiredReplicas(object: ClusterObject): number {
  return isRecord(object.spec) && typeof object.spec.replicas === 'number' ? object.spec.replicas : 1;
}

/**
 * In-memory ClusterClient.
 *
 * Workloads report a finished rollout as soon as they are written and
 * routes are admitted at once, unless told otherwise. Every create, patch
 * and delete is counted in `mutations`.
 */
export class FakeCluster implements ClusterClient {
  readonly objects = new Map<string, ClusterObject>();
  readonly operations: { operation: FakeOperation; key: string }[] = [];
  readonly execCalls: ExecCall[] = [];
  private readonly failures: FailureRule[] = [];
  private readonly neverReady = new Set<string>();
  private readonly notAdmitted = new Set<string>();
  private execHandler: ExecHandler = () => ({ exitCode: 0, stdout: '', stderr: '' });
  private versions = 0;

  get mutations(): number {
    return this.operations.filter((o) => o.operation !== 'read' && o.operation !== 'list').length;
  }

  count(operation: FakeOperation, kind?: string): number {
    return this.operations.filter((o) => o.operation === operation && (!kind || o.key.startsWith(`${kind}/`))).length;
  }

  resetOperations(): void {
    this.operations.length = 0;
    this.execCalls.length = 0;
  }

  failOn(operation: FakeOperation, error: Error, match: { kind?: string; name?: string; times?: number } = {}): this {
    this.failures.push({ operation, error, ...match });
    return this;
  }

  /** The Deployment never reports ready replicas */
  keepNotReady(name: string): this {
    this.neverReady.add(name);
    return this;
  }

  keepNotAdmitted(name: string): this {
    this.notAdmitted.add(name);
    return this;
  }

  onExec(handler: ExecHandler): this {
    this.execHandler = handler;
    return this;
  }

  /** Store an object as if another writer had created it */
  seed(object: ClusterObject): this {
    const stored = this.store(structuredClone(object), 1);
    this.objects.set(resourceKey(toResourceRef(stored)), stored);
    return this;
  }

  get(kind: string, name: string, namespace?: string): ClusterObject | undefined {
    const object = this.objects.get(resourceKey({ apiVersion: '', kind, name, ...(namespace && { namespace }) }));
    return object && structuredClone(object);
  }

  names(kind: string): string[] {
    return Array.from(this.objects.values())
      .filter((o) => o.kind === kind)
      .map((o) => o.metadata.name)
      .sort();
  }

  async read(ref: ResourceRef): Promise<ClusterObject | undefined> {
    const key = resourceKey(ref);
    this.record('read', ref.kind, ref.name, key);
    const object = this.objects.get(key);
    return object && structuredClone(object);
  }

  async create(object: ClusterObject): Promise<ClusterObject> {
    const key = resourceKey(toResourceRef(object));
    this.record('create', object.kind, object.metadata.name, key);
    if (this.objects.has(key)) {
      throw new FakeApiError(409, 'AlreadyExists', `${object.kind} "${object.metadata.name}" already exists`);
    }
    const stored = this.store(structuredClone(object), 1);
    this.objects.set(key, stored);
    return structuredClone(stored);
  }

  async patch(object: ClusterObject): Promise<ClusterObject> {
    const key = resourceKey(toResourceRef(object));
    this.record('patch', object.kind, object.metadata.name, key);
    const live = this.objects.get(key);
    if (!live) {
      throw notFound(object.kind, object.metadata.name);
    }
    const merged = mergePatch(live, structuredClone(object));
    if (!isRecord(merged) || !isRecord(merged.metadata) || typeof merged.metadata.name !== 'string') {
      throw new Error('merge patch produced an invalid object');
    }
    const next: ClusterObject = {
      ...merged,
      apiVersion: object.apiVersion,
      kind: object.kind,
      metadata: { ...merged.metadata, name: merged.metadata.name },
    };
    const stored = this.store(next, (live.metadata.generation ?? 1) + 1);
    this.objects.set(key, stored);
    return structuredClone(stored);
  }

  async delete(ref: ResourceRef): Promise<boolean> {
    const key = resourceKey(ref);
    this.record('delete', ref.kind, ref.name, key);
    return this.objects.delete(key);
  }

  async list(apiVersion: string, kind: string, namespace?: string, labelSelector?: string): Promise<ClusterObject[]> {
    this.record('list', kind, undefined, `${kind}/`);
    return Array.from(this.objects.values())
      .filter(
        (o) =>
          o.apiVersion === apiVersion &&
          o.kind === kind &&
          (namespace === undefined || o.metadata.namespace === namespace) &&
          matchesSelector(o, labelSelector)
      )
      .map((o) => structuredClone(o));
  }

  async exec(target: ExecTarget, command: string[]): Promise<ExecResult> {
    this.execCalls.push({ target, command });
    return this.execHandler(target, command);
  }

  private record(operation: FakeOperation, kind: string, name: string | undefined, key: string): void {
    this.operations.push({ operation, key });
    const index = this.failures.findIndex(
      (f) => f.operation === operation && (!f.kind || f.kind === kind) && (!f.name || f.name === name)
    );
    const rule = this.failures[index];
    if (!rule) {
      return;
    }
    if (rule.times !== undefined) {
      rule.times -= 1;
      if (rule.times <= 0) {
        this.failures.splice(index, 1);
      }
    }
    throw rule.error;
  }

  private store(object: ClusterObject, generation: number): ClusterObject {
    this.versions += 1;
    const metadata = { ...object.metadata, resourceVersion: String(this.versions), generation };
    const stored: ClusterObject = { ...object, metadata };

    if (object.kind === 'Secret' && isRecord(object.stringData)) {
      const data: Record<string, string> = isRecord(object.data)
        ? Object.fromEntries(Object.entries(object.data).filter((e): e is [string, string] => typeof e[1] === 'string'))
        : {};
      for (const [key, value] of Object.entries(object.stringData)) {
        if (typeof value === 'string') {
          data[key] = Buffer.from(value, 'utf8').toString('base64');
        }
      }
      stored.data = data;
      delete stored.stringData;
    }

    if (object.kind === 'Deployment' || object.kind === 'StatefulSet') {
      const replicas = this.neverReady.has(object.metadata.name) ? 0 : desiredReplicas(object);
      stored.status = {
        observedGeneration: generation,
        replicas: desiredReplicas(object),
        readyReplicas: replicas,
        updatedReplicas: replicas,
        availableReplicas: replicas,
      };
    }

    if (object.kind === 'Route' && !this.notAdmitted.has(object.metadata.name)) {
      stored.status = {
        ingress: [{ routerName: 'default', conditions: [{ type: 'Admitted', status: 'True' }] }],
      };
    }

    return stored;
  }
}

/**
 * NetworkProber with scripted answers per host:port and per URL
 */
export class FakeProber implements NetworkProber {
  readonly tcpCalls: string[] = [];
  readonly httpCalls: string[] = [];
  private readonly open = new Set<string>();
  private readonly statuses = new Map<string, number>();

  acceptConnections(host: string, port: number): this {
    this.open.add(`${host}:${port}`);
    return this;
  }

  respond(url: string, status: number): this {
    this.statuses.set(url, status);
    return this;
  }

  async tcp(host: string, port: number): Promise<void> {
    this.tcpCalls.push(`${host}:${port}`);
    if (!this.open.has(`${host}:${port}`)) {
      throw new Error('connect ECONNREFUSED');
    }
  }

  async http(url: string): Promise<number> {
    this.httpCalls.push(url);
    const status = this.statuses.get(url);
    if (status === undefined) {
      throw new Error('fetch failed');
    }
    return status;
  }
}
