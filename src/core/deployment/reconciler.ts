/**
 * Reconciler
 *
 * The control loop: validate, render, ensure credentials, then per
 * dependency level apply and wait for every component concurrently, run
 * the post-deploy configuration and report. A component is only attempted
 * once all of its dependencies are ready; dependents of a failed component
 * are skipped while independent components carry on.
 */

import type { RunContext } from '../config/run-context.js';
import { Configurator } from '../configuration/configurator.js';
import { DependencyResolver } from '../dependencies/resolver.js';
import { SecretStoreError, TimeoutError } from '../errors.js';
import type { ClusterClient } from '../kubernetes/cluster-client.js';
import type { NetworkProber } from '../kubernetes/network-prober.js';
import { getDeploymentLogger, type KubeconvergeLogger } from '../logging/index.js';
import type { ReadinessEvaluatorRegistry } from '../readiness/registry.js';
import { ReadinessWaiter } from '../readiness/waiter.js';
import { type RenderedComponent, renderDeployment } from '../rendering/renderer.js';
import { buildReport, type DeploymentReport, routeEndpoints } from '../reporting/reporter.js';
import { SecretStore } from '../secrets/store.js';
import type { ComponentSpec, DeploymentSpec } from '../types/spec.js';
import type {
  AppliedResourceResult,
  ConfigStepResult,
  ReconciliationOutcome,
  ReconciliationResult,
  RunStatus,
  SecretRecord,
} from '../types/state.js';
import { errorMessage, toError } from '../utils/error-helpers.js';
import { parseDeploymentSpec } from '../validation/spec-validation.js';
import { ResourceApplier } from './applier.js';
import { type CleanupResult, ResourceCleaner } from './cleanup.js';
import { ComponentStateStore } from './state-store.js';

export interface ReconcilerOptions {
  prober?: NetworkProber;
  registry?: ReadinessEvaluatorRegistry;
  stateStore?: ComponentStateStore;
  logger?: KubeconvergeLogger;
}

export interface ReconcileOptions {
  /** Aborts the run early, in addition to the run timeout */
  signal?: AbortSignal;
}

export interface ReconcileRun {
  /** The deployment spec with every placeholder resolved */
  spec: DeploymentSpec;
  status: RunStatus;
  results: ReconciliationResult[];
  steps: ConfigStepResult[];
  secrets: SecretRecord[];
  report: DeploymentReport;
  /** Error that ended the run early: the run deadline or a fatal configuration step */
  error?: Error;
}

export interface DeploymentCleanupResult extends CleanupResult {
  statesDropped: number;
}

const READY_OUTCOMES: ReadonlySet<ReconciliationOutcome> = new Set(['applied', 'unchanged']);

/**
 * Names of the secrets a component consumes: env references of all its
 * containers and secrets declared as belonging to it
 */
export function secretsUsedBy(component: ComponentSpec, spec: DeploymentSpec): Set<string> {
  const names = new Set<string>();
  const containers = [component, ...(component.sidecars ?? []), ...(component.initContainers ?? [])];
  for (const container of containers) {
    for (const binding of container.env ?? []) {
      if ('secret' in binding) {
        names.add(binding.secret.name);
      }
    }
  }
  for (const secret of spec.secrets ?? []) {
    if (secret.component === component.name) {
      names.add(secret.name);
    }
  }
  return names;
}

function summarizeOperations(resources: readonly AppliedResourceResult[]): string {
  const counts = new Map<string, number>();
  for (const { operation } of resources) {
    counts.set(operation, (counts.get(operation) ?? 0) + 1);
  }
  return Array.from(counts, ([operation, count]) => `${count} ${operation}`).join(', ') || 'nothing to apply';
}

export class Reconciler {
  private readonly applier: ResourceApplier;
  private readonly waiter: ReadinessWaiter;
  private readonly configurator: Configurator;
  private readonly cleaner: ResourceCleaner;
  private readonly resolver = new DependencyResolver();
  private readonly states: ComponentStateStore;

  constructor(
    private readonly client: ClusterClient,
    private readonly options: ReconcilerOptions = {}
  ) {
    this.applier = new ResourceApplier(client);
    this.waiter = new ReadinessWaiter(client, {
      ...(options.prober && { prober: options.prober }),
      ...(options.registry && { registry: options.registry }),
    });
    this.configurator = new Configurator(client, this.waiter);
    this.cleaner = new ResourceCleaner(client);
    this.states = options.stateStore ?? new ComponentStateStore();
  }

  get stateStore(): ComponentStateStore {
    return this.states;
  }

  /**
   * Converge the namespace to the deployment spec.
   *
   * Spec problems (ValidationError, CircularDependencyError, TemplateError)
   * are thrown before anything is sent to the cluster. Everything after
   * that ends up in the returned run and its report.
   */
  async reconcile(input: unknown, context: RunContext, options: ReconcileOptions = {}): Promise<ReconcileRun> {
    const startedAt = new Date();
    const parsed = parseDeploymentSpec(input);
    const graph = this.resolver.buildDependencyGraph(parsed.components);
    this.resolver.validateNoCycles(graph);
    const plan = this.resolver.analyzeDeploymentOrder(graph);
    const { spec, components: rendered } = renderDeployment(parsed, context);

    const logger = (this.options.logger ?? getDeploymentLogger(spec.name, context.namespace)).child({
      deployment: spec.name,
    });
    logger.info('Starting reconciliation', {
      components: plan.totalComponents,
      levels: plan.levels.length,
      maxParallelism: plan.maxParallelism,
    });

    const controller = new AbortController();
    const deadline = setTimeout(() => controller.abort(), context.runTimeoutMs);
    const forwardAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', forwardAbort, { once: true });
    if (options.signal?.aborted) {
      controller.abort();
    }
    const signal = controller.signal;

    try {
      const { records: secrets, failures: secretFailures } = await this.ensureSecrets(spec, context, signal);

      const componentsByName = new Map(spec.components.map((c) => [c.name, c]));
      const outcomes = new Map<string, ReconciliationOutcome>();
      const results = new Map<string, ReconciliationResult>();
      let runError: Error | undefined;

      for (const [index, level] of plan.levels.entries()) {
        const levelLogger = logger.child({ level: index + 1 });
        levelLogger.debug('Reconciling level', { components: level });

        const settled = await Promise.allSettled(
          level.map(async (name): Promise<ReconciliationResult> => {
            const component = componentsByName.get(name);
            const renderedComponent = rendered.get(name);
            if (!component || !renderedComponent) {
              return { component: name, outcome: 'failed', detail: 'component not rendered', resources: [] };
            }

            if (signal.aborted) {
              return { component: name, outcome: 'skipped', detail: 'run deadline reached', resources: [] };
            }

            for (const dependency of graph.getDependencies(name)) {
              const outcome = outcomes.get(dependency);
              if (!outcome || !READY_OUTCOMES.has(outcome)) {
                return {
                  component: name,
                  outcome: 'skipped',
                  detail: `dependency '${dependency}' ${outcome ?? 'not reconciled'}`,
                  resources: [],
                };
              }
            }

            const secretFailure = [...secretsUsedBy(component, spec)]
              .map((secret) => secretFailures.get(secret))
              .find((failure) => failure !== undefined);
            if (secretFailure) {
              return {
                component: name,
                outcome: 'failed',
                detail: secretFailure.message,
                resources: [],
                error: secretFailure,
              };
            }

            return this.reconcileComponent(component, renderedComponent, spec.name, context, signal, levelLogger);
          })
        );

        settled.forEach((settlement, i) => {
          const name = level[i] ?? 'unknown';
          const result: ReconciliationResult =
            settlement.status === 'fulfilled'
              ? settlement.value
              : {
                  component: name,
                  outcome: 'failed',
                  detail: errorMessage(settlement.reason),
                  resources: [],
                  error: toError(settlement.reason),
                };
          outcomes.set(result.component, result.outcome);
          results.set(result.component, result);
        });
      }

      if (signal.aborted && !options.signal?.aborted) {
        runError = new TimeoutError(`deployment ${spec.name}`, 'run timeout elapsed', context.runTimeoutMs, true);
      } else if (signal.aborted) {
        runError = new Error('Reconciliation aborted');
      }

      let steps: ConfigStepResult[] = [];
      if (!runError && spec.configuration && spec.configuration.length > 0) {
        const configuration = await this.configurator.run({
          deploymentName: spec.name,
          steps: spec.configuration,
          components: componentsByName,
          outcomes,
          context,
          signal,
        });
        steps = configuration.steps;
        runError = configuration.error;
      } else {
        steps = (spec.configuration ?? []).map((step): ConfigStepResult => ({
          id: step.id,
          target: step.target,
          fatal: step.fatal,
          state: 'pending',
          ...(step.description && { description: step.description }),
          detail: 'not run: reconciliation ended early',
        }));
      }

      // Report rows follow declaration order
      const ordered = spec.components.flatMap((c) => {
        const result = results.get(c.name);
        return result ? [result] : [];
      });

      const report = buildReport({
        deploymentName: spec.name,
        namespace: context.namespace,
        results: ordered,
        steps,
        secrets,
        ...(spec.secrets && { secretSpecs: spec.secrets }),
        endpoints: routeEndpoints(spec),
        ...(runError && { error: runError }),
        startedAt,
        finishedAt: new Date(),
      });

      const log = report.status === 'failed' ? logger.warn.bind(logger) : logger.info.bind(logger);
      log('Reconciliation finished', {
        status: report.status,
        durationMs: report.durationMs,
        failed: ordered.filter((r) => r.outcome === 'failed').map((r) => r.component),
        skipped: ordered.filter((r) => r.outcome === 'skipped').map((r) => r.component),
      });

      return {
        spec,
        status: report.status,
        results: ordered,
        steps,
        secrets,
        report,
        ...(runError && { error: runError }),
      };
    } finally {
      clearTimeout(deadline);
      options.signal?.removeEventListener('abort', forwardAbort);
    }
  }

  /**
   * Delete every object of the deployment and forget its component state.
   * Secrets and volume claims are kept unless the context says otherwise.
   */
  async cleanup(deploymentName: string, context: RunContext): Promise<DeploymentCleanupResult> {
    const result = await this.cleaner.cleanup(deploymentName, context.namespace, {
      retainSecrets: context.retainSecretsOnCleanup,
      retainVolumes: context.retainVolumesOnCleanup,
      retry: context.retry,
    });
    return { ...result, statesDropped: this.states.deleteDeployment(deploymentName) };
  }

  private async ensureSecrets(
    spec: DeploymentSpec,
    context: RunContext,
    signal: AbortSignal
  ): Promise<{ records: SecretRecord[]; failures: Map<string, SecretStoreError> }> {
    const store = new SecretStore(this.client, {
      namespace: context.namespace,
      deploymentName: spec.name,
      retry: context.retry,
    });
    const declared = spec.secrets ?? [];
    const settled = await Promise.allSettled(
      declared.map((secret) =>
        store.ensureSecret(secret.name, secret.fields, {
          ...(secret.component && { component: secret.component }),
          signal,
        })
      )
    );

    const records: SecretRecord[] = [];
    const failures = new Map<string, SecretStoreError>();
    settled.forEach((settlement, i) => {
      const name = declared[i]?.name ?? 'unknown';
      if (settlement.status === 'fulfilled') {
        records.push(settlement.value);
      } else {
        const reason = settlement.reason;
        failures.set(
          name,
          reason instanceof SecretStoreError
            ? reason
            : new SecretStoreError(`Failed to ensure secret '${name}': ${errorMessage(reason)}`, name, reason)
        );
      }
    });
    return { records, failures };
  }

  private async reconcileComponent(
    component: ComponentSpec,
    rendered: RenderedComponent,
    deploymentName: string,
    context: RunContext,
    signal: AbortSignal,
    parentLogger: KubeconvergeLogger
  ): Promise<ReconciliationResult> {
    const logger = parentLogger.child({ component: component.name });
    const applied = await this.applier.apply(rendered.resources, { retry: context.retry, signal, logger });

    if (applied.error) {
      this.states.record(deploymentName, { rendered, resources: applied.resources, error: applied.error });
      return {
        component: component.name,
        outcome: 'failed',
        detail: applied.error.message,
        resources: applied.resources,
        error: applied.error,
      };
    }

    const appliedAt = new Date();
    const changed = applied.resources.some((r) => r.operation !== 'unchanged');
    const operations = summarizeOperations(applied.resources);
    logger.debug('Component applied', { operations });

    try {
      const readiness = await this.waiter.waitForComponent(component, rendered, context, signal);
      const readyAt = new Date();
      this.states.record(deploymentName, { rendered, resources: applied.resources, readiness });
      return {
        component: component.name,
        outcome: changed ? 'applied' : 'unchanged',
        detail: `${operations}; ${readiness.message}`,
        resources: applied.resources,
        appliedAt,
        readyAt,
      };
    } catch (error) {
      const failure = toError(error);
      logger.error('Component did not become ready', failure);
      this.states.record(deploymentName, {
        rendered,
        resources: applied.resources,
        readiness: { ready: false, message: failure.message },
        error: failure,
      });
      return {
        component: component.name,
        outcome: 'failed',
        detail: failure.message,
        resources: applied.resources,
        appliedAt,
        error: failure,
      };
    }
  }
}
