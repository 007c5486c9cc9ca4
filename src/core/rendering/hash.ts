/**
 * Content hashing for drift detection
 */

import { createHash } from 'node:crypto';
import type { ClusterObject } from '../types/kubernetes.js';

export const SPEC_HASH_ANNOTATION = 'kubeconverge.io/spec-hash';

/** On pod templates; subPath mounts never see ConfigMap updates, a new hash rolls the pods */
export const CONFIG_HASH_ANNOTATION = 'kubeconverge.io/config-hash';

/**
 * JSON with object keys sorted at every level and undefined values dropped
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, item: unknown) => {
    if (typeof item === 'object' && item !== null && !Array.isArray(item)) {
      return Object.fromEntries(
        Object.entries(item)
          .filter(([, v]) => v !== undefined)
          .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      );
    }
    return item;
  });
}

export function sha256(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

/**
 * Hash of the mounted configuration files of a workload
 */
export function computeConfigHash(fileSets: readonly { name: string; files: Readonly<Record<string, string>> }[]): string {
  return sha256(canonicalJson(fileSets.map(({ name, files }) => ({ name, files }))));
}

/**
 * Hash of a resource document, ignoring its own spec-hash annotation
 */
export function computeSpecHash(object: ClusterObject): string {
  const { [SPEC_HASH_ANNOTATION]: _ignored, ...annotations } = object.metadata.annotations ?? {};
  return sha256(
    canonicalJson({
      ...object,
      metadata: {
        ...object.metadata,
        annotations: Object.keys(annotations).length > 0 ? annotations : undefined,
      },
    })
  );
}

/**
 * Return a copy of the document carrying its spec-hash annotation
 */
export function stampSpecHash(object: ClusterObject): ClusterObject {
  return {
    ...object,
    metadata: {
      ...object.metadata,
      annotations: {
        ...object.metadata.annotations,
        [SPEC_HASH_ANNOTATION]: computeSpecHash(object),
      },
    },
  };
}

export function readSpecHash(object: ClusterObject | undefined): string | undefined {
  return object?.metadata.annotations?.[SPEC_HASH_ANNOTATION];
}
