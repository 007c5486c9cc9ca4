/**
 * Observed state and per-run results
 */

import type { ResourceRef } from './kubernetes.js';

/**
 * Observed state of one component, kept across reconciliation passes
 */
export interface ComponentState {
  name: string;
  /** Hash over the rendered resources of the component */
  specHash: string;
  /** resourceVersion per applied resource, keyed by `resourceKey()` */
  appliedVersions: Record<string, string>;
  lastReadiness?: {
    ready: boolean;
    message: string;
    checkedAt: Date;
  };
  lastError?: string;
  updatedAt: Date;
}

export interface SecretRecord {
  name: string;
  values: Readonly<Record<string, string>>;
  createdAt: Date;
  /** True only in the call that generated and stored the values */
  created: boolean;
}

export type ApplyOperation = 'created' | 'configured' | 'unchanged';

export interface AppliedResourceResult {
  ref: ResourceRef;
  operation: ApplyOperation;
  resourceVersion?: string;
}

export type ReconciliationOutcome = 'applied' | 'unchanged' | 'failed' | 'skipped';

export interface ReconciliationResult {
  component: string;
  outcome: ReconciliationOutcome;
  detail: string;
  resources: AppliedResourceResult[];
  appliedAt?: Date;
  readyAt?: Date;
  error?: Error;
}

export type ConfigStepState = 'pending' | 'attempted' | 'succeeded' | 'skipped-failed';

export interface ConfigStepResult {
  id: string;
  target: string;
  fatal: boolean;
  state: ConfigStepState;
  description?: string;
  exitCode?: number;
  detail?: string;
}

export type RunStatus = 'succeeded' | 'succeeded-with-warnings' | 'failed';
