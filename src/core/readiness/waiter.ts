/**
 * Readiness Waiter
 *
 * Turns a component's rendered resources and declared health check into
 * predicates and polls them one after another under a shared per-component
 * deadline.
 */

import type { RunContext } from '../config/run-context.js';
import type { ClusterClient } from '../kubernetes/cluster-client.js';
import { DefaultNetworkProber, type NetworkProber } from '../kubernetes/network-prober.js';
import { getComponentLogger, type KubeconvergeLogger } from '../logging/index.js';
import { podSelectorLabels, toLabelSelector } from '../rendering/labels.js';
import type { RenderedComponent } from '../rendering/renderer.js';
import { type ExecTarget, type ReadinessStatus, toResourceRef } from '../types/kubernetes.js';
import type { ComponentSpec } from '../types/spec.js';
import { isWorkloadComponent, servicePorts } from '../validation/spec-validation.js';
import { poll, type PollOptions, type PollPolicy } from '../utils/poll.js';
import {
  execReadyPredicate,
  httpPredicate,
  objectStatusPredicate,
  type ReadinessPredicate,
  tcpPredicate,
} from './predicates.js';
import { IMMEDIATELY_READY_KINDS, ReadinessEvaluatorRegistry } from './registry.js';

export interface ReadinessWaiterOptions {
  prober?: NetworkProber;
  registry?: ReadinessEvaluatorRegistry;
  logger?: KubeconvergeLogger;
}

/**
 * Exec commands for a component go to its first ready pod; the container
 * defaults to the main container, which carries the component's name.
 */
export function execTargetFor(
  component: ComponentSpec,
  deploymentName: string,
  namespace: string,
  container?: string
): ExecTarget {
  return {
    namespace,
    labelSelector: toLabelSelector(podSelectorLabels(deploymentName, component.name)),
    container: container ?? component.container ?? component.name,
  };
}

function serviceHost(name: string, namespace: string): string {
  return `${name}.${namespace}.svc`;
}

function withLeadingSlash(path: string): string {
  return path.startsWith('/') ? path : `/${path}`;
}

export class ReadinessWaiter {
  private readonly prober: NetworkProber;
  private readonly registry: ReadinessEvaluatorRegistry;
  private readonly logger: KubeconvergeLogger;

  constructor(
    private readonly client: ClusterClient,
    options: ReadinessWaiterOptions = {}
  ) {
    this.prober = options.prober ?? new DefaultNetworkProber();
    this.registry = options.registry ?? ReadinessEvaluatorRegistry.getInstance();
    this.logger = options.logger ?? getComponentLogger('readiness-waiter');
  }

  /**
   * Poll a predicate until it holds
   *
   * @throws TimeoutError at the policy deadline, or when the signal aborts
   */
  async waitFor(
    label: string,
    predicate: ReadinessPredicate,
    policy: PollPolicy,
    signal?: AbortSignal,
    options: PollOptions = {}
  ): Promise<ReadinessStatus> {
    const resource = `${label}: ${predicate.description}`;
    const observation = await poll(
      resource,
      async (attempt) => {
        const status = await predicate.check(attempt);
        if (!status.ready) {
          this.logger.debug('Not ready yet', {
            resource,
            attempt: attempt.attempt,
            reason: status.reason,
            state: status.message,
          });
        }
        return { done: status.ready, state: status.message, value: status };
      },
      policy,
      signal,
      options
    );
    return observation.value ?? { ready: true, message: observation.state };
  }

  /**
   * Predicates for a component, in the order they are waited on: the
   * status of every rendered resource that has an evaluator, then the
   * declared tcp or http check.
   */
  predicatesFor(component: ComponentSpec, rendered: RenderedComponent, context: RunContext): ReadinessPredicate[] {
    const predicates = rendered.resources
      .filter((r) => !IMMEDIATELY_READY_KINDS.includes(r.kind) && this.registry.hasEvaluatorForKind(r.kind))
      .map((r) => objectStatusPredicate(this.client, toResourceRef(r), this.registry));

    const check = component.healthCheck;
    if (!check || check.type === 'rollout') {
      return predicates;
    }

    if (check.type === 'tcp') {
      const host = check.host ?? (isWorkloadComponent(component)
        ? serviceHost(component.name, context.namespace)
        : component.route?.host ?? serviceHost(component.name, context.namespace));
      predicates.push(tcpPredicate(this.prober, host, check.port));
      return predicates;
    }

    const path = withLeadingSlash(check.path);
    if (isWorkloadComponent(component)) {
      const port = check.port ?? servicePorts(component)[0]?.port ?? 80;
      const host = check.host ?? serviceHost(component.name, context.namespace);
      predicates.push(
        httpPredicate(this.prober, `${check.scheme ?? 'http'}://${host}:${port}${path}`, check.expectStatus)
      );
    } else {
      const host = check.host ?? component.route?.host ?? context.hostname ?? component.name;
      const authority = check.port !== undefined ? `${host}:${check.port}` : host;
      predicates.push(
        httpPredicate(this.prober, `${check.scheme ?? 'https'}://${authority}${path}`, check.expectStatus)
      );
    }
    return predicates;
  }

  /**
   * Wait until every readiness signal of a component holds. The
   * readiness policy timeout bounds the whole component, not each check.
   */
  async waitForComponent(
    component: ComponentSpec,
    rendered: RenderedComponent,
    context: RunContext,
    signal?: AbortSignal
  ): Promise<ReadinessStatus> {
    const predicates = this.predicatesFor(component, rendered, context);
    if (predicates.length === 0) {
      return { ready: true, message: 'ready after apply' };
    }

    const deadline = Date.now() + context.readinessPolicy.timeout;
    let status: ReadinessStatus = { ready: false, message: 'not checked' };
    for (const predicate of predicates) {
      status = await this.waitFor(component.name, predicate, context.readinessPolicy, signal, { deadline });
      this.logger.debug('Readiness signal holds', {
        component: component.name,
        check: predicate.description,
        state: status.message,
      });
    }

    this.logger.info('Component ready', { component: component.name, state: status.message });
    return status;
  }

  /**
   * Wait for the component's exec-ready signal, if it declares one
   */
  async waitForExecReady(
    component: ComponentSpec,
    deploymentName: string,
    context: RunContext,
    signal?: AbortSignal
  ): Promise<ReadinessStatus | undefined> {
    if (!component.execReady) {
      return undefined;
    }
    const target = execTargetFor(component, deploymentName, context.namespace);
    return this.waitFor(
      component.name,
      execReadyPredicate(this.client, target, component.execReady),
      context.execReadyPolicy,
      signal
    );
  }
}
