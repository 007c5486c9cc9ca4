/**
 * Kubernetes Error Handling Utilities
 *
 * Classifies raw errors thrown by @kubernetes/client-node. The request-based
 * client (0.x) throws `HttpError { statusCode, body }`; some code paths and
 * the fetch-based client put the status on `response.statusCode` or
 * `body.code` instead, so every shape is checked.
 */

import { getComponentLogger } from '../logging/index.js';
import { isRecord } from '../types/kubernetes.js';

const logger = getComponentLogger('kubernetes-errors');

/**
 * Status body returned by the API server on a failed request
 */
export interface KubernetesStatusBody {
  code?: number;
  message?: string;
  reason?: string;
  details?: unknown;
}

function readStatusBody(error: Record<string, unknown>): KubernetesStatusBody | undefined {
  const body = isRecord(error.body)
    ? error.body
    : isRecord(error.response) && isRecord(error.response.body)
      ? error.response.body
      : undefined;
  if (!body) {
    return undefined;
  }

  return {
    ...(typeof body.code === 'number' && { code: body.code }),
    ...(typeof body.message === 'string' && { message: body.message }),
    ...(typeof body.reason === 'string' && { reason: body.reason }),
    ...(body.details !== undefined && { details: body.details }),
  };
}

/**
 * Extract the HTTP status code from a Kubernetes API error.
 *
 * @example
 * ```typescript
 * try {
 *   await api.read(resource);
 * } catch (error) {
 *   if (getErrorStatusCode(error) === 404) {
 *     // Handle not found
 *   }
 * }
 * ```
 */
export function getErrorStatusCode(error: unknown): number | undefined {
  if (!isRecord(error)) {
    return undefined;
  }

  if (typeof error.statusCode === 'number') {
    return error.statusCode;
  }

  if (isRecord(error.response) && typeof error.response.statusCode === 'number') {
    return error.response.statusCode;
  }

  // 1.x ApiException
  if (typeof error.code === 'number') {
    return error.code;
  }

  const body = readStatusBody(error);
  if (body?.code !== undefined) {
    return body.code;
  }

  logger.debug('Could not extract status code from error', {
    hasResponse: 'response' in error,
    hasBody: 'body' in error,
    errorKeys: Object.keys(error),
  });

  return undefined;
}

export function isNotFoundError(error: unknown): boolean {
  return getErrorStatusCode(error) === 404;
}

/**
 * Conflict errors occur when creating a resource that already exists or
 * when optimistic locking fails on a stale resourceVersion.
 */
export function isConflictError(error: unknown): boolean {
  return getErrorStatusCode(error) === 409;
}

/**
 * HTTP status codes that indicate a temporary condition
 */
const RETRYABLE_STATUS_CODES = [
  408, // Request Timeout
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
];

const RETRYABLE_NETWORK_CODES = ['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'EPIPE'];

/**
 * Check if an error is transient: a retryable HTTP status, a network
 * connectivity error or an aborted request.
 */
export function isRetryableError(error: unknown): boolean {
  const statusCode = getErrorStatusCode(error);
  if (statusCode !== undefined && RETRYABLE_STATUS_CODES.includes(statusCode)) {
    return true;
  }

  if (isRecord(error) && typeof error.code === 'string' && RETRYABLE_NETWORK_CODES.includes(error.code)) {
    return true;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (
      message.includes('econnrefused') ||
      message.includes('econnreset') ||
      message.includes('enotfound') ||
      message.includes('etimedout') ||
      message.includes('network error') ||
      message.includes('socket hang up') ||
      message.includes('connection reset')
    ) {
      return true;
    }

    if (error.name === 'AbortError') {
      return true;
    }
  }

  return false;
}

/**
 * Format a Kubernetes API error into a single-line message.
 *
 * @example
 * ```typescript
 * formatKubernetesError(error);
 * // "Kubernetes API error (404): NotFound: deployments.apps \"web\" not found"
 * ```
 */
export function formatKubernetesError(error: unknown): string {
  if (!isRecord(error)) {
    return String(error);
  }

  const statusCode = getErrorStatusCode(error);
  const body = readStatusBody(error);
  const parts: string[] = [
    statusCode !== undefined ? `Kubernetes API error (${statusCode})` : 'Kubernetes API error',
  ];

  if (body?.reason) {
    parts.push(body.reason);
  }

  if (body?.message) {
    parts.push(body.message);
  } else if (typeof error.message === 'string' && error.message.length > 0) {
    parts.push(error.message);
  }

  return parts.join(': ');
}

export function getErrorReason(error: unknown): string | undefined {
  return isRecord(error) ? readStatusBody(error)?.reason : undefined;
}

export function getErrorDetails(error: unknown): {
  statusCode: number | undefined;
  reason: string | undefined;
  message: string | undefined;
  details: unknown;
} {
  if (!isRecord(error)) {
    return {
      statusCode: undefined,
      reason: undefined,
      message: String(error),
      details: undefined,
    };
  }

  const body = readStatusBody(error);
  return {
    statusCode: getErrorStatusCode(error),
    reason: body?.reason,
    message: body?.message ?? (typeof error.message === 'string' ? error.message : undefined),
    details: body?.details,
  };
}

// unable to validate against any security context constraint: [provider "anyuid": Forbidden: not usable by user or serviceaccount, spec.containers[0].securityContext.runAsUser: Invalid value: 0: must be in the ranges: [1000660000, 1000669999]]
const SCC_VIOLATION =
  /(?:pod\.)?spec\.(?:(?:initContainers|containers)\[\d+\]\.)?securityContext\.[A-Za-z.]+: Invalid value: [^:,\]]+/g;

// violates PodSecurity "restricted:latest": allowPrivilegeEscalation != false (container "app" must set securityContext.allowPrivilegeEscalation=false), ...
const POD_SECURITY_VIOLATION = /[A-Za-z][A-Za-z ]*(?:!=|=)?[^(,]*\([^)]*securityContext[^)]*\)/g;

/**
 * Extract the securityContext constraints quoted by an SCC or PodSecurity
 * admission rejection. Returns an empty list for any other error.
 */
export function extractSecurityViolations(error: unknown): string[] {
  const message = getErrorDetails(error).message;
  if (!message || !message.includes('securityContext')) {
    return [];
  }

  let matches: string[];
  if (message.includes('violates PodSecurity')) {
    const [, violations = ''] = message.split(/violates PodSecurity "[^"]*": /);
    matches = [...violations.matchAll(POD_SECURITY_VIOLATION)].map((m) => m[0].trim());
  } else {
    matches = [...message.matchAll(SCC_VIOLATION)].map((m) => m[0].trim());
  }

  return [...new Set(matches)];
}
