/**
 * Readiness predicates
 *
 * One check per signal. A predicate never waits by itself; the waiter
 * drives it through `poll`, and each check is bounded by the time left
 * until the deadline.
 */

import type { ClusterClient } from '../kubernetes/cluster-client.js';
import type { NetworkProber } from '../kubernetes/network-prober.js';
import type { ExecReadySpec } from '../types/spec.js';
import type { ExecTarget, ReadinessStatus, ResourceRef } from '../types/kubernetes.js';
import { errorMessage } from '../utils/error-helpers.js';
import type { PollAttempt } from '../utils/poll.js';
import { ReadinessEvaluatorRegistry } from './registry.js';

export interface ReadinessPredicate {
  /** Shown in logs and in the TimeoutError */
  description: string;
  check(attempt: PollAttempt): Promise<ReadinessStatus>;
}

/** Upper bound for a single network probe */
const PROBE_TIMEOUT_MS = 5000;

function probeTimeout(attempt: PollAttempt): number {
  return Math.max(Math.min(attempt.remainingMs, PROBE_TIMEOUT_MS), 1);
}

/**
 * Reads the object and hands it to the evaluator registered for its kind
 */
export function objectStatusPredicate(
  client: ClusterClient,
  ref: ResourceRef,
  registry: ReadinessEvaluatorRegistry = ReadinessEvaluatorRegistry.getInstance()
): ReadinessPredicate {
  return {
    description: `${ref.kind}/${ref.name}`,
    async check() {
      const evaluator = registry.getEvaluatorForKind(ref.kind);
      if (!evaluator) {
        return { ready: true, message: `${ref.kind} has no readiness evaluator` };
      }
      const live = await client.read(ref);
      if (!live) {
        return { ready: false, reason: 'NotFound', message: `${ref.kind}/${ref.name} not found` };
      }
      return evaluator(live);
    },
  };
}

export function tcpPredicate(prober: NetworkProber, host: string, port: number): ReadinessPredicate {
  return {
    description: `tcp://${host}:${port}`,
    async check(attempt) {
      try {
        await prober.tcp(host, port, probeTimeout(attempt));
        return { ready: true, message: `${host}:${port} accepts connections` };
      } catch (error) {
        return {
          ready: false,
          reason: 'ConnectionFailed',
          message: `connect to ${host}:${port} failed: ${errorMessage(error)}`,
        };
      }
    },
  };
}

export function httpPredicate(
  prober: NetworkProber,
  url: string,
  expectStatus = 200
): ReadinessPredicate {
  return {
    description: url,
    async check(attempt) {
      try {
        const status = await prober.http(url, probeTimeout(attempt));
        if (status === expectStatus) {
          return { ready: true, message: `GET ${url} returned ${status}` };
        }
        return {
          ready: false,
          reason: 'UnexpectedStatus',
          message: `GET ${url} returned ${status}, expected ${expectStatus}`,
          details: { status },
        };
      } catch (error) {
        return {
          ready: false,
          reason: 'RequestFailed',
          message: `GET ${url} failed: ${errorMessage(error)}`,
        };
      }
    },
  };
}

/**
 * Ready when the command exits 0 and, if `expect` is set, its stdout
 * contains it. Distinct from network readiness: an application can accept
 * connections before its installer has written the files a command needs.
 */
export function execReadyPredicate(
  client: ClusterClient,
  target: ExecTarget,
  spec: ExecReadySpec
): ReadinessPredicate {
  const execTarget: ExecTarget = spec.container ? { ...target, container: spec.container } : target;
  return {
    description: `exec '${spec.command.join(' ')}' in ${execTarget.labelSelector}`,
    async check() {
      const result = await client.exec(execTarget, spec.command);
      if (result.exitCode !== 0) {
        const stderr = result.stderr.trim();
        return {
          ready: false,
          reason: 'NonZeroExit',
          message: `command exited with ${result.exitCode}${stderr ? `: ${stderr}` : ''}`,
        };
      }
      if (spec.expect !== undefined && !result.stdout.includes(spec.expect)) {
        return {
          ready: false,
          reason: 'UnexpectedOutput',
          message: `command output does not contain '${spec.expect}'`,
        };
      }
      return { ready: true, message: 'command succeeded' };
    },
  };
}
