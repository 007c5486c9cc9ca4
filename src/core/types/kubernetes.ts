/**
 * Kubernetes-facing types shared by the applier, waiter and cluster client
 */

import type { KubernetesObject, V1ObjectMeta } from '@kubernetes/client-node';

/**
 * Identifies one object in the cluster
 */
export interface ResourceRef {
  apiVersion: string;
  kind: string;
  name: string;
  namespace?: string;
}

/**
 * A resource document as submitted to or read back from the cluster.
 * Kind-specific sections (spec, data, status) are kept as unknown and
 * narrowed where they are read.
 */
export interface ClusterObject extends KubernetesObject {
  apiVersion: string;
  kind: string;
  metadata: V1ObjectMeta & { name: string };
  [section: string]: unknown;
}

/**
 * Result of running a command inside a container
 */
export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Where an exec command is sent: the first ready pod matching the selector
 */
export interface ExecTarget {
  namespace: string;
  labelSelector: string;
  container?: string;
}

/**
 * Outcome of a readiness evaluation
 */
export interface ReadinessStatus {
  ready: boolean;
  message: string;
  reason?: string;
  details?: Record<string, unknown>;
}

export function toResourceRef(object: ClusterObject): ResourceRef {
  return {
    apiVersion: object.apiVersion,
    kind: object.kind,
    name: object.metadata.name,
    ...(object.metadata.namespace && { namespace: object.metadata.namespace }),
  };
}

export function resourceKey(ref: ResourceRef): string {
  return `${ref.kind}/${ref.namespace ?? '_'}/${ref.name}`;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isClusterObject(value: unknown): value is ClusterObject {
  return (
    isRecord(value) &&
    typeof value.apiVersion === 'string' &&
    typeof value.kind === 'string' &&
    isRecord(value.metadata) &&
    typeof value.metadata.name === 'string'
  );
}
