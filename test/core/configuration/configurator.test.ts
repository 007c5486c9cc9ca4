import { beforeEach, describe, expect, it } from 'vitest';
import { Configurator, shouldRunStep } from '../../../src/core/configuration/configurator.js';
import { stepFingerprint, stepLedgerName } from '../../../src/core/configuration/step-ledger.js';
import { ConfigStepError } from '../../../src/core/errors.js';
import { ReadinessEvaluatorRegistry } from '../../../src/core/readiness/registry.js';
import { ReadinessWaiter } from '../../../src/core/readiness/waiter.js';
import type { ComponentSpec, ConfigStepSpec } from '../../../src/core/types/spec.js';
import type { ReconciliationOutcome } from '../../../src/core/types/state.js';
import { FakeApiError, FakeCluster, FakeProber } from '../../utils/fake-cluster.js';
import { shopSpec, testContext } from '../../utils/specs.js';

const context = testContext();

describe('shouldRunStep', () => {
  const step: ConfigStepSpec = { id: 's', target: 'web', command: ['x'], fatal: false };

  it('runs after the target was applied', () => {
    expect(shouldRunStep(step, 'applied')).toBe(true);
  });

  it('runs on an unchanged target only when marked always', () => {
    expect(shouldRunStep(step, 'unchanged')).toBe(false);
    expect(shouldRunStep({ ...step, always: true }, 'unchanged')).toBe(true);
  });

  it('runs on an unchanged target while the step has not succeeded', () => {
    expect(shouldRunStep(step, 'unchanged', false)).toBe(true);
    expect(shouldRunStep(step, 'unchanged', true)).toBe(false);
    expect(shouldRunStep(step, 'failed', false)).toBe(false);
  });

  it('never runs on a failed, skipped or unknown target', () => {
    expect(shouldRunStep({ ...step, always: true }, 'failed')).toBe(false);
    expect(shouldRunStep({ ...step, always: true }, 'skipped')).toBe(false);
    expect(shouldRunStep({ ...step, always: true }, undefined)).toBe(false);
  });
});

describe('Configurator', () => {
  let cluster: FakeCluster;
  let configurator: Configurator;
  let components: Map<string, ComponentSpec>;
  let steps: ConfigStepSpec[];

  function run(outcomes: Record<string, ReconciliationOutcome>, signal?: AbortSignal) {
    return configurator.run({
      deploymentName: 'shop',
      steps,
      components,
      outcomes: new Map(Object.entries(outcomes)),
      context,
      ...(signal && { signal }),
    });
  }

  function ledgerIds(): string[] {
    const data = cluster.get('ConfigMap', stepLedgerName('shop'), 'demo')?.data;
    return typeof data === 'object' && data !== null ? Object.keys(data) : [];
  }

  beforeEach(() => {
    cluster = new FakeCluster();
    const waiter = new ReadinessWaiter(cluster, {
      prober: new FakeProber(),
      registry: ReadinessEvaluatorRegistry.withDefaults(),
    });
    configurator = new Configurator(cluster, waiter);
    const spec = shopSpec();
    components = new Map(spec.components.map((c) => [c.name, c]));
    steps = spec.configuration ?? [];
  });

  it('runs every step in the target main container', async () => {
    const outcome = await run({ web: 'applied' });

    expect(outcome.error).toBeUndefined();
    expect(outcome.steps.map((s) => s.state)).toEqual(['succeeded', 'succeeded']);
    expect(cluster.execCalls.map((c) => [c.target.container, c.command.join(' ')])).toEqual([
      ['web', 'bin/migrate'],
      ['web', 'bin/warm'],
    ]);
  });

  it('records a failed non-fatal step and carries on', async () => {
    cluster.onExec((_target, command) =>
      command[0] === 'bin/warm'
        ? { exitCode: 3, stdout: 'warming', stderr: 'cache busy\n' }
        : { exitCode: 0, stdout: '', stderr: '' }
    );

    const outcome = await run({ web: 'applied' });

    expect(outcome.error).toBeUndefined();
    expect(outcome.steps[1]).toEqual({
      id: 'warm-cache',
      target: 'web',
      fatal: false,
      state: 'skipped-failed',
      exitCode: 3,
      detail: 'cache busy',
    });
  });

  it('stops at a failed fatal step and leaves the rest pending', async () => {
    cluster.onExec(() => ({ exitCode: 1, stdout: 'migration 7 failed\n', stderr: '' }));

    const outcome = await run({ web: 'applied' });

    expect(outcome.error).toBeInstanceOf(ConfigStepError);
    expect(outcome.error?.message).toBe("Configuration step 'migrate' on 'web' failed with exit code 1: migration 7 failed");
    expect(outcome.steps).toEqual([
      { id: 'migrate', target: 'web', fatal: true, state: 'skipped-failed', exitCode: 1, detail: 'migration 7 failed' },
      { id: 'warm-cache', target: 'web', fatal: false, state: 'pending' },
    ]);
    expect(cluster.execCalls).toHaveLength(1);
  });

  it('falls back to the exit code when the command printed nothing', async () => {
    cluster.onExec(() => ({ exitCode: 2, stdout: '', stderr: '  ' }));
    steps = steps.filter((s) => !s.fatal);

    const outcome = await run({ web: 'applied' });

    expect(outcome.steps[0]?.detail).toBe('exit code 2');
  });

  it('reports an exec transport error without an exit code', async () => {
    cluster.onExec(() => {
      throw new Error('No ready pod matches app.kubernetes.io/name=web');
    });
    steps = steps.filter((s) => !s.fatal);

    const outcome = await run({ web: 'applied' });

    expect(outcome.steps[0]).toMatchObject({
      state: 'skipped-failed',
      detail: 'No ready pod matches app.kubernetes.io/name=web',
    });
    expect(outcome.steps[0]?.exitCode).toBeUndefined();
  });

  it('does not rerun completed steps whose target was left unchanged', async () => {
    steps = [...steps, { id: 'rotate-logs', target: 'web', command: ['bin/rotate'], fatal: false, always: true }];
    await run({ web: 'applied' });
    cluster.resetOperations();

    const outcome = await run({ web: 'unchanged' });

    expect(outcome.steps.map((s) => [s.id, s.state, s.detail])).toEqual([
      ['migrate', 'pending', 'not run: target unchanged'],
      ['warm-cache', 'pending', 'not run: target unchanged'],
      ['rotate-logs', 'succeeded', undefined],
    ]);
    expect(cluster.mutations).toBe(0);
  });

  it('records completed steps in the ledger ConfigMap', async () => {
    const [migrate, warm] = steps;
    if (!migrate || !warm) throw new Error('missing steps');

    await run({ web: 'applied' });

    const ledger = cluster.get('ConfigMap', stepLedgerName('shop'), 'demo');
    expect(ledger?.metadata.labels).toMatchObject({ 'app.kubernetes.io/instance': 'shop' });
    expect(ledger?.data).toEqual({ migrate: stepFingerprint(migrate), 'warm-cache': stepFingerprint(warm) });
  });

  it('retries a step that failed on an earlier run although its target is unchanged', async () => {
    cluster.onExec((_target, command) =>
      command[0] === 'bin/migrate' ? { exitCode: 1, stdout: '', stderr: 'lock held' } : { exitCode: 0, stdout: '', stderr: '' }
    );
    const first = await run({ web: 'applied' });
    expect(first.steps.map((s) => s.state)).toEqual(['skipped-failed', 'pending']);

    cluster.onExec(() => ({ exitCode: 0, stdout: '', stderr: '' }));
    cluster.resetOperations();
    const second = await run({ web: 'unchanged' });

    expect(second.error).toBeUndefined();
    expect(second.steps.map((s) => s.state)).toEqual(['succeeded', 'succeeded']);
    expect(cluster.execCalls.map((c) => c.command[0])).toEqual(['bin/migrate', 'bin/warm']);
    expect(ledgerIds()).toEqual(['migrate', 'warm-cache']);
  });

  it('drops a step from the ledger when it fails again', async () => {
    await run({ web: 'applied' });
    cluster.onExec((_target, command) =>
      command[0] === 'bin/warm' ? { exitCode: 5, stdout: '', stderr: '' } : { exitCode: 0, stdout: '', stderr: '' }
    );

    await run({ web: 'applied' });

    expect(ledgerIds()).toEqual(['migrate']);
  });

  it('runs a step again after its command changed', async () => {
    await run({ web: 'applied' });
    cluster.resetOperations();
    steps = steps.map((s) => (s.id === 'warm-cache' ? { ...s, command: ['bin/warm', '--all'] } : s));

    await run({ web: 'unchanged' });

    expect(cluster.execCalls.map((c) => c.command.join(' '))).toEqual(['bin/warm --all']);
  });

  it('runs only applied targets when the ledger cannot be read', async () => {
    cluster.failOn('read', new FakeApiError(403, 'Forbidden', 'configmaps is forbidden'), { kind: 'ConfigMap' });

    const outcome = await run({ web: 'unchanged' });

    expect(outcome.steps.map((s) => s.detail)).toEqual(['not run: target unchanged', 'not run: target unchanged']);
    expect(cluster.execCalls).toEqual([]);
  });

  it('waits for exec readiness once per target', async () => {
    const web = components.get('web');
    if (web) {
      web.execReady = { command: ['bin/ready'] };
    }

    await run({ web: 'applied' });

    expect(cluster.execCalls.map((c) => c.command[0])).toEqual(['bin/ready', 'bin/migrate', 'bin/warm']);
  });

  it('fails the steps of a target that never becomes exec-ready', async () => {
    const web = components.get('web');
    if (web) {
      web.execReady = { command: ['bin/ready'] };
    }
    cluster.onExec(() => ({ exitCode: 1, stdout: '', stderr: '' }));

    const outcome = await run({ web: 'applied' });

    expect(outcome.steps[0]?.state).toBe('skipped-failed');
    expect(outcome.steps[0]?.detail).toBe(
      "target not exec-ready: Timeout after 50ms waiting for web: exec 'bin/ready' in app.kubernetes.io/name=web,app.kubernetes.io/instance=shop to be ready (last observed: command exited with 1)"
    );
    expect(outcome.error).toBeInstanceOf(ConfigStepError);
  });

  it('stops when the run deadline has passed', async () => {
    const outcome = await run({ web: 'applied' }, AbortSignal.abort());

    expect(outcome.error?.message).toBe('Run deadline reached before configuration finished');
    expect(outcome.steps.map((s) => s.state)).toEqual(['pending', 'pending']);
  });
});
