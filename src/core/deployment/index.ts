/**
 * Deployment module exports
 */

export { KIND_APPLY_ORDER, kindRank, ResourceApplier, sortForApply, toApplyError } from './applier.js';
export type { ApplyOptions, ApplyOutcome } from './applier.js';
export { MANAGED_KINDS, ResourceCleaner, teardownKinds } from './cleanup.js';
export { findDrift } from './drift.js';
export type { CleanupFailure, CleanupOptions, CleanupResult, ManagedKind } from './cleanup.js';
export { Reconciler, secretsUsedBy } from './reconciler.js';
export type {
  DeploymentCleanupResult,
  ReconcileOptions,
  ReconcileRun,
  ReconcilerOptions,
} from './reconciler.js';
export { ComponentStateStore, componentSpecHash } from './state-store.js';
export type { ComponentStateUpdate } from './state-store.js';
