import { describe, expect, it } from 'vitest';
import {
  createRunContext,
  DEFAULT_API_RETRY,
  DEFAULT_EXEC_READY_POLICY,
  DEFAULT_RUN_TIMEOUT_MS,
  loadRunOptionsFromEnv,
} from '../../../src/core/config/run-context.js';
import { ValidationError } from '../../../src/core/errors.js';
import { DEFAULT_POLL_POLICY } from '../../../src/core/utils/poll.js';

describe('createRunContext', () => {
  it('fills in defaults', () => {
    const context = createRunContext({ namespace: 'demo' });

    expect(context).toMatchObject({
      namespace: 'demo',
      hostname: undefined,
      storageClass: undefined,
      parameters: { namespace: 'demo' },
      runTimeoutMs: DEFAULT_RUN_TIMEOUT_MS,
      readinessPolicy: DEFAULT_POLL_POLICY,
      execReadyPolicy: DEFAULT_EXEC_READY_POLICY,
      retry: DEFAULT_API_RETRY,
      retainSecretsOnCleanup: true,
      retainVolumesOnCleanup: true,
    });
    expect(Object.isFrozen(context)).toBe(true);
  });

  it('adds hostname and storage class to the parameters', () => {
    const context = createRunContext({
      namespace: 'demo',
      hostname: 'cloud.example.test',
      storageClass: 'fast',
      parameters: { replicas: 2, namespace: 'ignored' },
    });

    expect(context.parameters).toEqual({
      replicas: 2,
      namespace: 'demo',
      hostname: 'cloud.example.test',
      storageClass: 'fast',
    });
  });

  it('merges partial policies over the defaults', () => {
    const context = createRunContext({ namespace: 'demo', readinessPolicy: { timeout: 5000 }, retry: { maxAttempts: 5 } });

    expect(context.readinessPolicy).toEqual({ ...DEFAULT_POLL_POLICY, timeout: 5000 });
    expect(context.retry).toEqual({ ...DEFAULT_API_RETRY, maxAttempts: 5 });
  });

  it('rejects an empty namespace', () => {
    expect(() => createRunContext({ namespace: '' })).toThrow(ValidationError);
  });

  it('names the offending option', () => {
    try {
      createRunContext({ namespace: 'demo', runTimeoutMs: 0 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof ValidationError && error.field).toBe('runTimeoutMs');
    }
  });
});

describe('loadRunOptionsFromEnv', () => {
  it('reads KUBECONVERGE_* variables', () => {
    expect(
      loadRunOptionsFromEnv(
        {},
        {
          KUBECONVERGE_NAMESPACE: 'cloud',
          KUBECONVERGE_HOSTNAME: 'cloud.example.test',
          KUBECONVERGE_STORAGE_CLASS: 'fast',
          KUBECONVERGE_RUN_TIMEOUT_MS: '5000',
        }
      )
    ).toEqual({ namespace: 'cloud', hostname: 'cloud.example.test', storageClass: 'fast', runTimeoutMs: 5000 });
  });

  it('falls back to the default namespace and lets overrides win', () => {
    expect(loadRunOptionsFromEnv({}, {})).toEqual({ namespace: 'default' });
    expect(loadRunOptionsFromEnv({ namespace: 'demo' }, { KUBECONVERGE_NAMESPACE: 'cloud' })).toEqual({
      namespace: 'demo',
    });
  });
});
