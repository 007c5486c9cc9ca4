/**
 * Readiness Evaluator Registry
 *
 * Status evaluators indexed by resource kind. The waiter polls every
 * rendered resource whose kind has an evaluator; other kinds count as
 * ready once applied.
 */

import { type ClusterObject, isRecord, type ReadinessStatus } from '../types/kubernetes.js';

export type ReadinessEvaluator = (object: ClusterObject) => ReadinessStatus;

/**
 * Kinds that are usable as soon as the API server accepted them
 */
export const IMMEDIATELY_READY_KINDS: readonly string[] = [
  'Secret',
  'ConfigMap',
  'PersistentVolumeClaim',
  'Service',
  'Namespace',
];

function count(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

/**
 * Deployment and StatefulSet rollout: the controller has seen the latest
 * generation and every desired replica is updated, ready and available.
 */
export function evaluateRollout(object: ClusterObject): ReadinessStatus {
  const spec = isRecord(object.spec) ? object.spec : {};
  const status = isRecord(object.status) ? object.status : undefined;
  const desired = count(spec.replicas) ?? 1;
  const generation = object.metadata.generation;
  const observed = status ? count(status.observedGeneration) : undefined;

  if (generation !== undefined && (observed === undefined || observed < generation)) {
    return {
      ready: false,
      reason: 'RolloutPending',
      message: `Waiting for the controller to observe generation ${generation} (observed ${observed ?? 'none'})`,
    };
  }

  if (desired === 0) {
    return { ready: true, message: `${object.kind} is scaled to 0 replicas` };
  }

  if (!status) {
    return {
      ready: false,
      reason: 'StatusMissing',
      message: `${object.kind} status not available yet`,
    };
  }

  const ready = count(status.readyReplicas) ?? 0;
  const updated = count(status.updatedReplicas) ?? 0;
  // Older StatefulSet controllers do not report availableReplicas
  const available =
    count(status.availableReplicas) ?? (object.kind === 'StatefulSet' ? ready : 0);

  if (ready >= desired && updated >= desired && available >= desired) {
    return {
      ready: true,
      message: `${object.kind} has ${ready}/${desired} ready replicas`,
    };
  }

  return {
    ready: false,
    reason: 'ReplicasNotReady',
    message: `Waiting for replicas: ${ready}/${desired} ready, ${updated}/${desired} updated, ${available}/${desired} available`,
    details: { desired, ready, updated, available },
  };
}

/**
 * A Route is usable once a router has admitted it
 */
export function evaluateRouteAdmission(object: ClusterObject): ReadinessStatus {
  const status = isRecord(object.status) ? object.status : {};
  const ingress = Array.isArray(status.ingress) ? status.ingress.filter(isRecord) : [];

  let rejection: string | undefined;
  for (const entry of ingress) {
    const conditions = Array.isArray(entry.conditions) ? entry.conditions.filter(isRecord) : [];
    const admitted = conditions.find((c) => c.type === 'Admitted');
    if (admitted?.status === 'True') {
      const router = typeof entry.routerName === 'string' ? entry.routerName : 'unknown';
      return { ready: true, message: `Route admitted by router ${router}` };
    }
    if (admitted && typeof admitted.message === 'string') {
      rejection = admitted.message;
    }
  }

  return {
    ready: false,
    reason: 'NotAdmitted',
    message: rejection ? `Route not admitted: ${rejection}` : 'Route not admitted yet',
  };
}

export class ReadinessEvaluatorRegistry {
  private static instance: ReadinessEvaluatorRegistry | undefined;
  private kindToEvaluator = new Map<string, ReadinessEvaluator>();

  static getInstance(): ReadinessEvaluatorRegistry {
    if (!ReadinessEvaluatorRegistry.instance) {
      ReadinessEvaluatorRegistry.instance = ReadinessEvaluatorRegistry.withDefaults();
    }
    return ReadinessEvaluatorRegistry.instance;
  }

  /**
   * A fresh registry with the built-in evaluators
   */
  static withDefaults(): ReadinessEvaluatorRegistry {
    const registry = new ReadinessEvaluatorRegistry();
    registry.registerForKind('Deployment', evaluateRollout);
    registry.registerForKind('StatefulSet', evaluateRollout);
    registry.registerForKind('Route', evaluateRouteAdmission);
    return registry;
  }

  registerForKind(kind: string, evaluator: ReadinessEvaluator): void {
    this.kindToEvaluator.set(kind, evaluator);
  }

  getEvaluatorForKind(kind: string): ReadinessEvaluator | undefined {
    return this.kindToEvaluator.get(kind);
  }

  hasEvaluatorForKind(kind: string): boolean {
    return this.kindToEvaluator.has(kind);
  }

  kinds(): string[] {
    return Array.from(this.kindToEvaluator.keys());
  }

  clear(): void {
    this.kindToEvaluator.clear();
  }
}
