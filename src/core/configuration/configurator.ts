/**
 * Post-Deploy Configurator
 *
 * Runs configuration commands inside component containers, strictly in
 * declared order. Each step moves pending -> attempted -> succeeded or
 * skipped-failed; a failed fatal step stops the sequence and leaves the
 * remaining steps pending. Completions are kept in the step ledger, so a
 * step that has not succeeded yet is due again on the next run.
 */

import type { RunContext } from '../config/run-context.js';
import { ConfigStepError } from '../errors.js';
import type { ClusterClient } from '../kubernetes/cluster-client.js';
import { getComponentLogger, type KubeconvergeLogger } from '../logging/index.js';
import { execTargetFor, type ReadinessWaiter } from '../readiness/waiter.js';
import type { ComponentSpec, ConfigStepSpec } from '../types/spec.js';
import type { ConfigStepResult, ReconciliationOutcome } from '../types/state.js';
import { errorMessage } from '../utils/error-helpers.js';
import { StepLedger } from './step-ledger.js';

export interface ConfigurationInput {
  deploymentName: string;
  steps: readonly ConfigStepSpec[];
  components: ReadonlyMap<string, ComponentSpec>;
  /** Outcome of each component in this run */
  outcomes: ReadonlyMap<string, ReconciliationOutcome>;
  context: RunContext;
  signal?: AbortSignal;
}

export interface ConfigurationOutcome {
  steps: ConfigStepResult[];
  /** Set when a fatal step failed or the run deadline passed */
  error?: Error;
}

type StepCheck = { ok: true } | { ok: false; detail: string; exitCode?: number };

/**
 * Whether a step is due in this run: its target was applied, or the
 * target is up and the step is marked `always` or has not succeeded yet
 */
export function shouldRunStep(
  step: ConfigStepSpec,
  outcome: ReconciliationOutcome | undefined,
  completed = true
): boolean {
  if (outcome === 'applied') {
    return true;
  }
  return outcome === 'unchanged' && (step.always === true || !completed);
}

function failureDetail(exitCode: number, stdout: string, stderr: string): string {
  const output = stderr.trim() || stdout.trim();
  return output || `exit code ${exitCode}`;
}

export class Configurator {
  private readonly logger: KubeconvergeLogger;

  constructor(
    private readonly client: ClusterClient,
    private readonly waiter: ReadinessWaiter,
    logger?: KubeconvergeLogger
  ) {
    this.logger = logger ?? getComponentLogger('configurator');
  }

  async run(input: ConfigurationInput): Promise<ConfigurationOutcome> {
    const results: ConfigStepResult[] = input.steps.map((step): ConfigStepResult => ({
      id: step.id,
      target: step.target,
      fatal: step.fatal,
      state: 'pending',
      ...(step.description && { description: step.description }),
    }));
    const readiness = new Map<string, StepCheck>();
    const ledger = new StepLedger(this.client, {
      namespace: input.context.namespace,
      deploymentName: input.deploymentName,
      retry: input.context.retry,
      logger: this.logger,
      ...(input.signal && { signal: input.signal }),
    });
    await ledger.load();

    const outcome = await this.runSteps(input, results, readiness, ledger);
    await ledger.save();
    return outcome;
  }

  private async runSteps(
    input: ConfigurationInput,
    results: ConfigStepResult[],
    readiness: Map<string, StepCheck>,
    ledger: StepLedger
  ): Promise<ConfigurationOutcome> {
    for (const [index, step] of input.steps.entries()) {
      const result = results[index];
      if (!result) {
        continue;
      }

      if (input.signal?.aborted) {
        return { steps: results, error: new Error('Run deadline reached before configuration finished') };
      }

      const outcome = input.outcomes.get(step.target);
      if (!shouldRunStep(step, outcome, ledger.isCompleted(step))) {
        result.detail = `not run: target ${outcome ?? 'unknown'}`;
        this.logger.debug('Configuration step not due', { step: step.id, target: step.target, outcome });
        continue;
      }

      const component = input.components.get(step.target);
      if (!component) {
        result.detail = 'not run: unknown target';
        continue;
      }

      let ready = readiness.get(step.target);
      if (!ready) {
        ready = await this.awaitExecReady(component, input);
        readiness.set(step.target, ready);
      }

      result.state = 'attempted';
      const attempt = ready.ok ? await this.execute(step, component, input) : ready;

      if (attempt.ok) {
        result.state = 'succeeded';
        ledger.markSucceeded(step);
        this.logger.info('Configuration step succeeded', { step: step.id, target: step.target });
        continue;
      }

      result.state = 'skipped-failed';
      result.detail = attempt.detail;
      ledger.markFailed(step);
      if (attempt.exitCode !== undefined) {
        result.exitCode = attempt.exitCode;
      }

      const error = new ConfigStepError(step.id, step.target, step.fatal, attempt.exitCode, attempt.detail);
      if (step.fatal) {
        this.logger.error('Fatal configuration step failed', error, { step: step.id, target: step.target });
        return { steps: results, error };
      }
      this.logger.warn('Configuration step failed, continuing', {
        step: step.id,
        target: step.target,
        exitCode: attempt.exitCode,
        detail: attempt.detail,
      });
    }

    return { steps: results };
  }

  private async awaitExecReady(component: ComponentSpec, input: ConfigurationInput): Promise<StepCheck> {
    try {
      await this.waiter.waitForExecReady(component, input.deploymentName, input.context, input.signal);
      return { ok: true };
    } catch (error) {
      return { ok: false, detail: `target not exec-ready: ${errorMessage(error)}` };
    }
  }

  private async execute(
    step: ConfigStepSpec,
    component: ComponentSpec,
    input: ConfigurationInput
  ): Promise<StepCheck> {
    const target = execTargetFor(component, input.deploymentName, input.context.namespace, step.container);
    this.logger.debug('Running configuration step', {
      step: step.id,
      target: step.target,
      container: target.container,
      description: step.description,
    });

    try {
      const result = await this.client.exec(target, step.command);
      if (result.exitCode === 0) {
        return { ok: true };
      }
      return {
        ok: false,
        exitCode: result.exitCode,
        detail: failureDetail(result.exitCode, result.stdout, result.stderr),
      };
    } catch (error) {
      return { ok: false, detail: errorMessage(error) };
    }
  }
}
