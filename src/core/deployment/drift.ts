/**
 * Drift detection
 *
 * A live object has drifted when a field the rendered document sets no
 * longer holds the rendered value. Fields the server adds (defaults,
 * status, bookkeeping metadata) are not compared.
 */

import { type ClusterObject, isRecord } from '../types/kubernetes.js';

const CPU_QUANTITY = /^(\d+(?:\.\d+)?)(m?)$/;

/**
 * `1` and `1000m` are the same quantity; the API server stores the short form
 */
function sameQuantity(desired: string, live: string): boolean {
  const a = CPU_QUANTITY.exec(desired);
  const b = CPU_QUANTITY.exec(live);
  if (!a || !b) {
    return false;
  }
  const millis = (match: RegExpExecArray): number => Number(match[1]) * (match[2] === 'm' ? 1 : 1000);
  return millis(a) === millis(b);
}

function driftAt(desired: unknown, live: unknown, path: string): string | undefined {
  if (desired === undefined || desired === null) {
    return undefined;
  }

  if (Array.isArray(desired)) {
    if (desired.length === 0) {
      return live === undefined || (Array.isArray(live) && live.length === 0) ? undefined : path;
    }
    if (!Array.isArray(live) || live.length !== desired.length) {
      return path;
    }
    for (const [index, item] of desired.entries()) {
      const drifted = driftAt(item, live[index], `${path}[${index}]`);
      if (drifted) {
        return drifted;
      }
    }
    return undefined;
  }

  if (isRecord(desired)) {
    if (live === undefined) {
      return Object.keys(desired).length === 0 ? undefined : path;
    }
    if (!isRecord(live)) {
      return path;
    }
    for (const [key, value] of Object.entries(desired)) {
      const drifted = driftAt(value, live[key], path ? `${path}.${key}` : key);
      if (drifted) {
        return drifted;
      }
    }
    return undefined;
  }

  if (desired === live) {
    return undefined;
  }
  if (typeof desired === 'string' && typeof live === 'string' && sameQuantity(desired, live)) {
    return undefined;
  }
  return path;
}

/**
 * Path of the first field that differs between the rendered document and
 * the live object, or undefined when the live object still matches.
 * Only labels and annotations are compared from metadata.
 */
export function findDrift(desired: ClusterObject, live: ClusterObject): string | undefined {
  const { metadata, ...body } = desired;
  const { metadata: liveMetadata, ...liveBody } = live;
  return (
    driftAt(metadata.labels, liveMetadata.labels, 'metadata.labels') ??
    driftAt(metadata.annotations, liveMetadata.annotations, 'metadata.annotations') ??
    driftAt(body, liveBody, '')
  );
}
