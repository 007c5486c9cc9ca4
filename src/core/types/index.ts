export type { DependencyNode, DeploymentPlan } from './dependencies.js';
export type { ClusterObject, ExecResult, ExecTarget, ReadinessStatus, ResourceRef } from './kubernetes.js';
export { isClusterObject, isRecord, resourceKey, toResourceRef } from './kubernetes.js';
export type {
  ComponentKind,
  ComponentSpec,
  ConfigFileSpec,
  ConfigStepSpec,
  ContainerSpec,
  DeploymentParameters,
  DeploymentSpec,
  EnvBinding,
  ExecReadySpec,
  HealthCheck,
  ProbeSpec,
  ResourceRequirements,
  RouteSpec,
  SecretFieldSpec,
  SecretSpec,
  StorageRequirement,
  WorkloadKind,
} from './spec.js';
export type {
  AppliedResourceResult,
  ApplyOperation,
  ComponentState,
  ConfigStepResult,
  ConfigStepState,
  ReconciliationOutcome,
  ReconciliationResult,
  RunStatus,
  SecretRecord,
} from './state.js';
