export {
  COMPONENT_KINDS,
  componentSchema,
  configStepSchema,
  deploymentSpecSchema,
  healthCheckSchema,
  secretSpecSchema,
  WORKLOAD_KINDS,
} from './spec-schema.js';
export {
  findSpecProblems,
  isWorkloadComponent,
  loadDeploymentSpec,
  parseDeploymentSpec,
  servicePorts,
} from './spec-validation.js';
