import { beforeEach, describe, expect, it } from 'vitest';
import { ResourceCleaner, teardownKinds } from '../../../src/core/deployment/cleanup.js';
import { Reconciler } from '../../../src/core/deployment/reconciler.js';
import { ValidationError } from '../../../src/core/errors.js';
import { ReadinessEvaluatorRegistry } from '../../../src/core/readiness/registry.js';
import type { ResourceRef } from '../../../src/core/types/kubernetes.js';
import { FakeApiError, FakeCluster, FakeProber, notFound } from '../../utils/fake-cluster.js';
import { shopSpec, testContext } from '../../utils/specs.js';

const label = (ref: ResourceRef): string => `${ref.kind}/${ref.name}`;

describe('teardownKinds', () => {
  it('removes traffic first and storage last', () => {
    expect(teardownKinds().map((k) => k.kind)).toEqual([
      'Route',
      'Service',
      'Deployment',
      'StatefulSet',
      'Secret',
      'ConfigMap',
      'PersistentVolumeClaim',
    ]);
  });
});

describe('cleanup', () => {
  let cluster: FakeCluster;
  let reconciler: Reconciler;

  beforeEach(async () => {
    cluster = new FakeCluster();
    reconciler = new Reconciler(cluster, {
      prober: new FakeProber(),
      registry: ReadinessEvaluatorRegistry.withDefaults(),
    });
    await reconciler.reconcile(shopSpec(), testContext());
    cluster.resetOperations();
  });

  it('deletes in teardown order and keeps secrets and claims by default', async () => {
    const result = await reconciler.cleanup('shop', testContext());

    // db and cache are created concurrently, so only the kind order is fixed
    expect(result.deleted.map((r) => r.kind)).toEqual([
      'Route',
      'Service',
      'Service',
      'Service',
      'Deployment',
      'Deployment',
      'Deployment',
      'ConfigMap',
    ]);
    expect(result.deleted.map(label).sort()).toEqual([
      'ConfigMap/shop-config-steps',
      'Deployment/cache',
      'Deployment/db',
      'Deployment/web',
      'Route/web-route',
      'Service/cache',
      'Service/db',
      'Service/web',
    ]);
    expect(result.retained.map(label)).toEqual(['Secret/db-secret', 'PersistentVolumeClaim/db-data']);
    expect(result.failed).toEqual([]);
    expect(result.statesDropped).toBe(4);
    expect(reconciler.stateStore.list('shop')).toEqual([]);
    expect(cluster.names('Secret')).toEqual(['db-secret']);
  });

  it('deletes secrets and claims when asked to', async () => {
    const result = await reconciler.cleanup(
      'shop',
      testContext({ retainSecretsOnCleanup: false, retainVolumesOnCleanup: false })
    );

    expect(result.retained).toEqual([]);
    expect(result.deleted).toHaveLength(10);
    expect(cluster.objects.size).toBe(0);
  });

  it('deletes claims but keeps secrets when asked to delete volumes only', async () => {
    const result = await reconciler.cleanup('shop', testContext({ retainVolumesOnCleanup: false }));

    expect(result.retained.map(label)).toEqual(['Secret/db-secret']);
    expect(cluster.names('PersistentVolumeClaim')).toEqual([]);
  });

  it('refuses to delete secrets while keeping the volume claims', async () => {
    const result = reconciler.cleanup('shop', testContext({ retainSecretsOnCleanup: false }));

    await expect(result).rejects.toBeInstanceOf(ValidationError);
    await expect(result).rejects.toMatchObject({ field: 'retainSecrets' });
    expect(cluster.mutations).toBe(0);
    expect(cluster.names('Secret')).toEqual(['db-secret']);
    expect(reconciler.stateStore.list('shop')).toHaveLength(4);
  });

  it('leaves objects of other deployments alone', async () => {
    cluster.seed({
      apiVersion: 'v1',
      kind: 'Service',
      metadata: {
        name: 'other',
        namespace: 'demo',
        labels: { 'app.kubernetes.io/instance': 'blog', 'app.kubernetes.io/managed-by': 'kubeconverge' },
      },
    });

    await reconciler.cleanup('shop', testContext());

    expect(cluster.names('Service')).toEqual(['other']);
  });

  it('skips kinds the cluster does not serve', async () => {
    cluster.failOn('list', notFound('route', 'routes'), { kind: 'Route' });

    const result = await reconciler.cleanup('shop', testContext());

    expect(result.deleted.map((r) => r.kind)).not.toContain('Route');
    expect(cluster.names('Route')).toEqual(['web-route']);
    expect(result.failed).toEqual([]);
  });

  it('collects delete failures and carries on', async () => {
    cluster.failOn('delete', new FakeApiError(500, 'InternalError', 'etcd timeout'), { kind: 'Service', name: 'cache' });

    const result = await new ResourceCleaner(cluster).cleanup('shop', 'demo', {
      retainSecrets: true,
      retainVolumes: true,
      retry: testContext().retry,
    });

    expect(result.failed).toEqual([
      {
        ref: { apiVersion: 'v1', kind: 'Service', name: 'cache', namespace: 'demo' },
        message: 'Kubernetes API error (500): InternalError: etcd timeout',
      },
    ]);
    expect(result.deleted).toHaveLength(7);
    expect(cluster.names('Service')).toEqual(['cache']);
  });

  it('throws when listing fails for another reason', async () => {
    cluster.failOn('list', new FakeApiError(403, 'Forbidden', 'services is forbidden'), { kind: 'Service' });

    await expect(
      new ResourceCleaner(cluster).cleanup('shop', 'demo', {
        retainSecrets: true,
        retainVolumes: true,
        retry: testContext().retry,
      })
    ).rejects.toBeInstanceOf(FakeApiError);
  });
});
