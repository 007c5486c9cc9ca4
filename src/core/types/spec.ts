/**
 * Deployment spec types, inferred from the arktype schemas
 */

import type {
  COMPONENT_KINDS,
  componentSchema,
  configFileSchema,
  configStepSchema,
  containerSchema,
  deploymentSpecSchema,
  envBindingSchema,
  execReadySchema,
  healthCheckSchema,
  probeSchema,
  resourceRequirementsSchema,
  routeSchema,
  secretFieldSchema,
  secretSpecSchema,
  storageSchema,
  WORKLOAD_KINDS,
} from '../validation/spec-schema.js';

export type ComponentKind = (typeof COMPONENT_KINDS)[number];
export type WorkloadKind = (typeof WORKLOAD_KINDS)[number];

export type DeploymentSpec = typeof deploymentSpecSchema.infer;
export type ComponentSpec = typeof componentSchema.infer;
export type ContainerSpec = typeof containerSchema.infer;
export type EnvBinding = typeof envBindingSchema.infer;
export type ResourceRequirements = typeof resourceRequirementsSchema.infer;
export type StorageRequirement = typeof storageSchema.infer;
export type ProbeSpec = typeof probeSchema.infer;
export type HealthCheck = typeof healthCheckSchema.infer;
export type ExecReadySpec = typeof execReadySchema.infer;
export type ConfigFileSpec = typeof configFileSchema.infer;
export type RouteSpec = typeof routeSchema.infer;
export type SecretFieldSpec = typeof secretFieldSchema.infer;
export type SecretSpec = typeof secretSpecSchema.infer;
export type ConfigStepSpec = typeof configStepSchema.infer;

/**
 * Flat parameter bag substituted into `${name}` placeholders
 */
export type DeploymentParameters = Readonly<Record<string, string | number | boolean>>;
