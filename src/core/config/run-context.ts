/**
 * Run context
 *
 * Cluster context and tuning resolved once before a run starts and passed,
 * read-only, to every stage.
 */

import { type } from 'arktype';
import { formatArktypeError } from '../errors.js';
import type { DeploymentParameters } from '../types/spec.js';
import { DEFAULT_POLL_POLICY, type PollPolicy } from '../utils/poll.js';
import type { RetryOptions } from '../utils/retry.js';

const pollPolicySchema = type({
  'interval?': 'number.integer >= 0',
  'increment?': 'number.integer >= 0',
  'maxInterval?': 'number.integer >= 0',
  'timeout?': 'number.integer >= 0',
});

export const runOptionsSchema = type({
  namespace: 'string > 0',
  'hostname?': 'string',
  'storageClass?': 'string',
  'parameters?': { '[string]': 'string | number | boolean' },
  'runTimeoutMs?': 'number.integer > 0',
  'readinessPolicy?': pollPolicySchema,
  'execReadyPolicy?': pollPolicySchema,
  'retry?': {
    'maxAttempts?': 'number.integer >= 1',
    'baseDelay?': 'number.integer >= 0',
    'maxDelay?': 'number.integer >= 0',
    'backoffFactor?': 'number >= 1',
  },
  'retainSecretsOnCleanup?': 'boolean',
  'retainVolumesOnCleanup?': 'boolean',
});

export type RunOptions = typeof runOptionsSchema.infer;

export type ApiRetryPolicy = Readonly<Required<Omit<RetryOptions, 'retryableErrors' | 'signal'>>>;

export interface RunContext {
  readonly namespace: string;
  readonly hostname: string | undefined;
  readonly storageClass: string | undefined;
  /** Parameter bag for placeholders; includes namespace, hostname and storageClass */
  readonly parameters: DeploymentParameters;
  readonly runTimeoutMs: number;
  readonly readinessPolicy: Readonly<PollPolicy>;
  readonly execReadyPolicy: Readonly<PollPolicy>;
  readonly retry: ApiRetryPolicy;
  readonly retainSecretsOnCleanup: boolean;
  readonly retainVolumesOnCleanup: boolean;
}

export const DEFAULT_RUN_TIMEOUT_MS = 30 * 60 * 1000;

export const DEFAULT_EXEC_READY_POLICY: PollPolicy = {
  interval: 2000,
  increment: 1000,
  maxInterval: 5000,
  timeout: 120000,
};

export const DEFAULT_API_RETRY: ApiRetryPolicy = {
  maxAttempts: 3,
  baseDelay: 1000,
  maxDelay: 10000,
  backoffFactor: 2,
};

/**
 * Validate run options and freeze them into a RunContext
 *
 * @throws ValidationError naming the offending option
 */
export function createRunContext(input: RunOptions): RunContext {
  const options = runOptionsSchema(input);
  if (options instanceof type.errors) {
    throw formatArktypeError(options, 'run options');
  }

  const parameters: Record<string, string | number | boolean> = {
    ...options.parameters,
    namespace: options.namespace,
  };
  if (options.hostname) {
    parameters.hostname = options.hostname;
  }
  if (options.storageClass) {
    parameters.storageClass = options.storageClass;
  }

  return Object.freeze({
    namespace: options.namespace,
    hostname: options.hostname || undefined,
    storageClass: options.storageClass || undefined,
    parameters: Object.freeze(parameters),
    runTimeoutMs: options.runTimeoutMs ?? DEFAULT_RUN_TIMEOUT_MS,
    readinessPolicy: Object.freeze({ ...DEFAULT_POLL_POLICY, ...options.readinessPolicy }),
    execReadyPolicy: Object.freeze({ ...DEFAULT_EXEC_READY_POLICY, ...options.execReadyPolicy }),
    retry: Object.freeze({ ...DEFAULT_API_RETRY, ...options.retry }),
    retainSecretsOnCleanup: options.retainSecretsOnCleanup ?? true,
    retainVolumesOnCleanup: options.retainVolumesOnCleanup ?? true,
  });
}

/**
 * Read run options from KUBECONVERGE_* environment variables. Values given
 * in `overrides` win over the environment.
 */
export function loadRunOptionsFromEnv(
  overrides: Partial<RunOptions> = {},
  env: NodeJS.ProcessEnv = process.env
): RunOptions {
  const timeout = env.KUBECONVERGE_RUN_TIMEOUT_MS;
  const runTimeoutMs = timeout !== undefined && timeout !== '' ? Number(timeout) : undefined;

  return {
    namespace: env.KUBECONVERGE_NAMESPACE ?? 'default',
    ...(env.KUBECONVERGE_HOSTNAME && { hostname: env.KUBECONVERGE_HOSTNAME }),
    ...(env.KUBECONVERGE_STORAGE_CLASS && { storageClass: env.KUBECONVERGE_STORAGE_CLASS }),
    ...(runTimeoutMs !== undefined && { runTimeoutMs }),
    ...overrides,
  };
}
