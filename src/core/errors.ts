/**
 * Error taxonomy for the reconciler.
 *
 * Every error carries a stable `code` and a `context` bag that the reporter
 * and the logs use to explain which component, resource or step failed.
 */

import type { ArkErrors } from 'arktype';
import type { ResourceRef } from './types/kubernetes.js';

export class KubeconvergeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'KubeconvergeError';
  }
}

export class ValidationError extends KubeconvergeError {
  constructor(
    message: string,
    public readonly subject: string,
    public readonly field?: string,
    public readonly suggestions?: string[]
  ) {
    super(message, 'VALIDATION_ERROR', { subject, field, suggestions });
    this.name = 'ValidationError';
  }
}

/**
 * Semantic problems in a deployment spec that the schema alone cannot catch
 */
export class SpecValidationError extends ValidationError {
  constructor(
    public readonly problems: string[],
    subject: string
  ) {
    super(
      `Invalid deployment spec '${subject}':\n${problems.map((p, i) => `  ${i + 1}. ${p}`).join('\n')}`,
      subject
    );
    this.name = 'SpecValidationError';
  }
}

export class CircularDependencyError extends KubeconvergeError {
  constructor(
    message: string,
    public readonly cycle: string[],
    public readonly suggestions?: string[]
  ) {
    super(message, 'CIRCULAR_DEPENDENCY', { cycle, suggestions });
    this.name = 'CircularDependencyError';
  }
}

/**
 * A placeholder in the deployment spec could not be resolved
 */
export class TemplateError extends KubeconvergeError {
  constructor(
    message: string,
    public readonly parameter: string,
    public readonly path: string
  ) {
    super(message, 'TEMPLATE_ERROR', { parameter, path });
    this.name = 'TemplateError';
  }
}

/**
 * The cluster rejected a resource. `violations` lists the security context
 * constraints quoted by an admission rejection, when there were any.
 */
export class ApplyError extends KubeconvergeError {
  constructor(
    public readonly resource: ResourceRef,
    cause: unknown,
    public readonly statusCode: number | undefined,
    public readonly reason: string | undefined,
    public readonly violations: string[],
    message: string
  ) {
    super(message, 'APPLY_ERROR', {
      resource: formatResourceRef(resource),
      statusCode,
      reason,
      violations,
    });
    this.name = 'ApplyError';
    this.cause = cause;
  }
}

/**
 * A readiness predicate did not hold before its deadline
 */
export class TimeoutError extends KubeconvergeError {
  constructor(
    public readonly resource: string,
    public readonly lastObservedState: string,
    public readonly timeoutMs: number,
    public readonly aborted = false
  ) {
    super(
      aborted
        ? `Run deadline reached while waiting for ${resource} (last observed: ${lastObservedState})`
        : `Timeout after ${timeoutMs}ms waiting for ${resource} to be ready (last observed: ${lastObservedState})`,
      'READINESS_TIMEOUT',
      { resource, lastObservedState, timeoutMs, aborted }
    );
    this.name = 'TimeoutError';
  }
}

/**
 * A post-deploy configuration step failed
 */
export class ConfigStepError extends KubeconvergeError {
  constructor(
    public readonly stepId: string,
    public readonly target: string,
    public readonly fatal: boolean,
    public readonly exitCode: number | undefined,
    public readonly detail: string
  ) {
    super(
      `Configuration step '${stepId}' on '${target}' failed${
        exitCode !== undefined ? ` with exit code ${exitCode}` : ''
      }: ${detail}`,
      'CONFIG_STEP_ERROR',
      { stepId, target, fatal, exitCode }
    );
    this.name = 'ConfigStepError';
  }
}

export class SecretStoreError extends KubeconvergeError {
  constructor(
    message: string,
    public readonly secretName: string,
    cause?: unknown
  ) {
    super(message, 'SECRET_STORE_ERROR', { secretName });
    this.name = 'SecretStoreError';
    this.cause = cause;
  }
}

export function formatResourceRef(ref: ResourceRef): string {
  return `${ref.kind}/${ref.name}${ref.namespace ? ` (namespace ${ref.namespace})` : ''}`;
}

/**
 * Format arktype validation errors with the failing path and suggestions
 */
export function formatArktypeError(errors: ArkErrors, subject: string): ValidationError {
  const [first, ...rest] = [...errors];
  if (!first) {
    return new ValidationError(`Invalid ${subject}: ${errors.summary}`, subject);
  }

  const fieldPath = first.path.length > 0 ? first.path.map(String).join('.') : 'root';
  let message = `Invalid ${subject} at field '${fieldPath}': ${first.message}`;

  const suggestions: string[] = [];
  if (first.code === 'required') {
    suggestions.push(`Add the required field '${fieldPath}'`);
  } else {
    suggestions.push(`Check the value of '${fieldPath}'`);
  }

  if (rest.length > 0) {
    message += '\n\nAdditional validation errors:';
    rest.forEach((problem, index) => {
      const path = problem.path.length > 0 ? problem.path.map(String).join('.') : 'root';
      message += `\n  ${index + 2}. ${path}: ${problem.message}`;
    });
    suggestions.push(`Fix all ${rest.length + 1} validation errors listed above`);
  }

  return new ValidationError(message, subject, fieldPath, suggestions);
}

/**
 * Format circular dependency errors with the cycle spelled out
 */
export function formatCircularDependencyError(cycle: string[]): CircularDependencyError {
  const cycleStr = cycle.join(' → ');
  return new CircularDependencyError(`Circular dependency detected between components: ${cycleStr}`, cycle, [
    'Remove one of the dependsOn entries to break the cycle',
    'Routes depend on their target implicitly; do not list the route in the target\'s dependsOn',
  ]);
}
