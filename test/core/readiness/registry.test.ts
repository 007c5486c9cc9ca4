import { describe, expect, it } from 'vitest';
import {
  evaluateRollout,
  evaluateRouteAdmission,
  ReadinessEvaluatorRegistry,
} from '../../../src/core/readiness/registry.js';
import type { ClusterObject } from '../../../src/core/types/kubernetes.js';

function workload(
  kind: string,
  replicas: number,
  status?: Record<string, number>,
  generation?: number
): ClusterObject {
  return {
    apiVersion: 'apps/v1',
    kind,
    metadata: { name: 'web', ...(generation !== undefined && { generation }) },
    spec: { replicas },
    ...(status && { status }),
  };
}

function route(ingress: unknown[]): ClusterObject {
  return {
    apiVersion: 'route.openshift.io/v1',
    kind: 'Route',
    metadata: { name: 'web' },
    status: { ingress },
  };
}

describe('evaluateRollout', () => {
  it('waits for the controller to observe the latest generation', () => {
    expect(evaluateRollout(workload('Deployment', 2, { observedGeneration: 1 }, 2))).toEqual({
      ready: false,
      reason: 'RolloutPending',
      message: 'Waiting for the controller to observe generation 2 (observed 1)',
    });
    expect(evaluateRollout(workload('Deployment', 2, undefined, 1)).message).toBe(
      'Waiting for the controller to observe generation 1 (observed none)'
    );
  });

  it('is ready when scaled to zero', () => {
    expect(evaluateRollout(workload('Deployment', 0))).toEqual({
      ready: true,
      message: 'Deployment is scaled to 0 replicas',
    });
  });

  it('needs a status', () => {
    expect(evaluateRollout(workload('Deployment', 1)).reason).toBe('StatusMissing');
  });

  it('is ready when every replica is ready, updated and available', () => {
    const status = { observedGeneration: 3, readyReplicas: 3, updatedReplicas: 3, availableReplicas: 3 };
    expect(evaluateRollout(workload('Deployment', 3, status, 3))).toEqual({
      ready: true,
      message: 'Deployment has 3/3 ready replicas',
    });
  });

  it('reports replica counts while rolling out', () => {
    const status = { readyReplicas: 1, updatedReplicas: 3, availableReplicas: 1 };
    expect(evaluateRollout(workload('Deployment', 3, status)).message).toBe(
      'Waiting for replicas: 1/3 ready, 3/3 updated, 1/3 available'
    );
  });

  it('counts ready StatefulSet replicas as available when the controller omits them', () => {
    expect(evaluateRollout(workload('StatefulSet', 2, { readyReplicas: 2, updatedReplicas: 2 })).ready).toBe(true);
  });
});

describe('evaluateRouteAdmission', () => {
  it('is ready once a router admits the route', () => {
    expect(
      evaluateRouteAdmission(route([{ routerName: 'default', conditions: [{ type: 'Admitted', status: 'True' }] }]))
    ).toEqual({ ready: true, message: 'Route admitted by router default' });
  });

  it('reports the rejection message', () => {
    expect(
      evaluateRouteAdmission(
        route([
          {
            routerName: 'default',
            conditions: [{ type: 'Admitted', status: 'False', message: 'route web already exposes this host' }],
          },
        ])
      ).message
    ).toBe('Route not admitted: route web already exposes this host');
  });

  it('waits while there is no ingress status', () => {
    expect(evaluateRouteAdmission(route([]))).toEqual({
      ready: false,
      reason: 'NotAdmitted',
      message: 'Route not admitted yet',
    });
  });
});

describe('ReadinessEvaluatorRegistry', () => {
  it('knows workloads and routes by default', () => {
    expect(ReadinessEvaluatorRegistry.withDefaults().kinds()).toEqual(['Deployment', 'StatefulSet', 'Route']);
  });

  it('accepts custom evaluators', () => {
    const registry = ReadinessEvaluatorRegistry.withDefaults();
    registry.registerForKind('Job', () => ({ ready: true, message: 'done' }));
    expect(registry.hasEvaluatorForKind('Job')).toBe(true);
    expect(registry.getEvaluatorForKind('Job')?.(workload('Job', 1))).toEqual({ ready: true, message: 'done' });
  });

  it('can be cleared', () => {
    const registry = ReadinessEvaluatorRegistry.withDefaults();
    registry.clear();
    expect(registry.kinds()).toEqual([]);
  });

  it('shares one default instance', () => {
    expect(ReadinessEvaluatorRegistry.getInstance()).toBe(ReadinessEvaluatorRegistry.getInstance());
  });
});
